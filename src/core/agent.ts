import type { ModelTransport, VendorAdapter } from '../adapters/types.js'
import { DEFAULT_YOLO_PROMPT } from '../permissions/policy.js'
import { Conversation } from './conversation.js'
import { DispatchLoop, type DispatchOptions } from './dispatch-loop.js'
import { errorMessage } from './logger.js'
import type { ToolDefinition, ToolRegistry } from './tool-registry.js'
import type { Logger, RoundResult, UpdateListener, VendorName } from './types.js'

export const DEFAULT_SYSTEM_PROMPT =
  'You are a careful coding assistant working inside a local workspace. ' +
  'Use the provided tools to inspect and change files or run commands. ' +
  'Some operations need the user\'s permission; when a tool reports that permission was denied, ' +
  'do not retry it and explain what you could not do.'

export interface ChatOptions {
  /** Extra state about the user's environment, sent as a `<user_info>` block. */
  userInfo?: Record<string, unknown>
  signal?: AbortSignal
  onUpdate?: UpdateListener
}

/**
 * Vendor-independent surface of an agent.
 */
export interface ChatAgent {
  readonly vendor: VendorName
  readonly history: Conversation
  chat(message: string, options?: ChatOptions): Promise<RoundResult>
  registerTool(tool: ToolDefinition): void
  startNewSession(): void
  compactHistory(maxTurns: number): void
}

/** Wraps a user message the way the model's system prompt expects it. */
export function formatUserMessage(message: string, userInfo?: Record<string, unknown>): string {
  const query = `<user_query>\n${message}\n</user_query>`
  if (!userInfo) return query
  return `<user_info>\n${JSON.stringify(userInfo, null, 2)}\n</user_info>\n\n${query}`
}

/**
 * Owns one conversation and runs rounds against one vendor.
 *
 * A round's history is committed only when the round returns. A round that throws
 * leaves the history as it was.
 */
export class Agent<TMessage, TTool, TResponse> implements ChatAgent {
  private conversation = Conversation.empty()
  private readonly loop: DispatchLoop<TMessage, TTool, TResponse>

  constructor(
    private readonly adapter: VendorAdapter<TMessage, TTool, TResponse>,
    transport: ModelTransport<TMessage, TTool, TResponse>,
    private readonly registry: ToolRegistry,
    options: DispatchOptions,
    private readonly logger: Logger
  ) {
    this.loop = new DispatchLoop(adapter, transport, registry, options, logger)
    if (options.permissions.yoloMode) {
      this.logger.warn('permissions.yolo_enabled', {
        message: options.permissions.yoloPrompt ?? DEFAULT_YOLO_PROMPT
      })
    }
  }

  get vendor(): VendorName {
    return this.adapter.vendor
  }

  get history(): Conversation {
    return this.conversation
  }

  registerTool(tool: ToolDefinition): void {
    this.registry.register(tool)
    this.logger.info('agent.tool_registered', { tool: tool.name })
  }

  async chat(message: string, options: ChatOptions = {}): Promise<RoundResult> {
    const pending = this.conversation.appendUserText(formatUserMessage(message, options.userInfo))
    this.logger.info('agent.round_started', { vendor: this.vendor, turns: pending.length })

    try {
      const { conversation, result } = await this.loop.run(pending, {
        ...(options.signal ? { signal: options.signal } : {}),
        ...(options.onUpdate ? { onUpdate: options.onUpdate } : {})
      })
      this.conversation = conversation
      this.logger.info('agent.round_finished', {
        vendor: this.vendor,
        stopReason: result.stopReason,
        toolCalls: result.toolLog.length,
        modelCalls: result.modelCalls
      })
      return result
    } catch (error) {
      this.logger.error('agent.round_failed', {
        vendor: this.vendor,
        error: errorMessage(error)
      })
      throw error
    }
  }

  /** Clears the conversation so the next message starts fresh. */
  startNewSession(): void {
    this.conversation = Conversation.empty()
    this.logger.info('agent.session_reset', { vendor: this.vendor })
  }

  compactHistory(maxTurns: number): void {
    const before = this.conversation.length
    this.conversation = this.conversation.compact(maxTurns)
    this.logger.info('agent.history_compacted', { before, after: this.conversation.length })
  }
}
