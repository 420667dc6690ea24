import { assertUniqueCallIds } from '../adapters/pairing.js'
import type { ModelTransport, VendorAdapter } from '../adapters/types.js'
import { PermissionChannel } from '../permissions/channel.js'
import { createConsoleContinuationPrompt } from '../permissions/console-prompt.js'
import type { Conversation } from './conversation.js'
import {
  PermissionDeniedError,
  ToolExecutionError,
  UnknownToolError,
  throwIfCancelled
} from './errors.js'
import { errorMessage } from './logger.js'
import type { ToolRegistry } from './tool-registry.js'
import type {
  AgentTurnUpdate,
  ContinuationCallback,
  JsonValue,
  Logger,
  PermissionCallback,
  PermissionDecision,
  PermissionOptions,
  PermissionRequest,
  RoundResult,
  StopReason,
  ToolCall,
  ToolLogEntry,
  ToolResult,
  UpdateListener
} from './types.js'

export type DispatchState =
  | 'awaiting_model'
  | 'has_tool_calls'
  | 'no_tool_calls'
  | 'executing_tools'
  | 'done'

export interface DispatchOptions {
  systemPrompt: string
  workspace: string
  /** Model calls that may end in tool use before the round stops. */
  maxToolIterations: number
  /** Tool calls allowed before the round pauses for confirmation; also the step it grows by. */
  toolCallThreshold: number
  permissions: PermissionOptions
  confirmContinuation?: ContinuationCallback
  /** Used when `permissions.permissionCallback` is absent. Defaults to the console prompt. */
  fallbackPermissionPrompt?: PermissionCallback
}

export interface RunOptions {
  signal?: AbortSignal
  onUpdate?: UpdateListener
}

export interface RoundOutcome {
  conversation: Conversation
  result: RoundResult
}

interface CallOutcome {
  result: ToolResult
  decision?: PermissionDecision
}

/**
 * Drives one round: model turn, tool execution behind the permission gate, results back
 * to the model, until the model stops calling tools.
 *
 * Tool calls run one at a time in the order the model emitted them; later calls may depend
 * on files earlier ones wrote.
 */
export class DispatchLoop<TMessage, TTool, TResponse> {
  private readonly confirmContinuation: ContinuationCallback

  constructor(
    private readonly adapter: VendorAdapter<TMessage, TTool, TResponse>,
    private readonly transport: ModelTransport<TMessage, TTool, TResponse>,
    private readonly registry: ToolRegistry,
    private readonly options: DispatchOptions,
    private readonly logger: Logger
  ) {
    this.confirmContinuation = options.confirmContinuation ?? createConsoleContinuationPrompt()
  }

  /**
   * Runs a round over `conversation`, which already ends with the user's message.
   * The returned conversation is a new value; the input is left untouched.
   */
  async run(conversation: Conversation, runOptions: RunOptions = {}): Promise<RoundOutcome> {
    const { signal } = runOptions
    const permissions = new PermissionChannel(
      this.options.permissions,
      this.logger,
      this.options.fallbackPermissionPrompt
    )
    const toolLog: ToolLogEntry[] = []
    let current = conversation
    let toolCalls = 0
    let threshold = this.options.toolCallThreshold
    let modelCalls = 0
    let lastText = ''

    const finish = async (stopReason: StopReason): Promise<RoundOutcome> => {
      this.transition('done', { stopReason, modelCalls, toolCalls })
      await this.publish(runOptions.onUpdate, { kind: 'turn_finished', message: 'Turn finished' })
      return { conversation: current, result: { text: lastText, toolLog, stopReason, modelCalls } }
    }

    await this.publish(runOptions.onUpdate, { kind: 'turn_started', message: 'Working on it...' })

    for (;;) {
      throwIfCancelled(signal)
      this.transition('awaiting_model', { turns: current.length })
      const response = await this.transport.send(
        {
          system: this.options.systemPrompt,
          messages: this.adapter.toMessages(current.turns),
          tools: this.adapter.formatTools(this.registry.schemas())
        },
        signal
      )
      modelCalls++
      throwIfCancelled(signal)

      lastText = this.adapter.extractText(response)
      const calls = [...this.adapter.extractToolCalls(response)]
      // Checked before any call runs.
      assertUniqueCallIds(calls)
      current = current.appendAssistant(lastText, calls)

      if (calls.length === 0) {
        this.transition('no_tool_calls')
        return finish('completed')
      }

      this.transition('has_tool_calls', { count: calls.length })
      this.transition('executing_tools')

      const results: ToolResult[] = []
      for (const call of calls) {
        const outcome = await this.executeCall(call, permissions, runOptions)
        throwIfCancelled(signal)
        results.push(outcome.result)
        toolLog.push({
          call,
          result: outcome.result,
          ...(outcome.decision ? { decision: outcome.decision } : {})
        })
        toolCalls++
      }

      // Fatal on broken pairing; nothing from this round is committed by the caller.
      this.adapter.formatToolResults(calls, results)
      current = current.appendToolResults(results)

      if (modelCalls >= this.options.maxToolIterations) {
        this.logger.warn('dispatch.iteration_limit', { modelCalls, toolCalls })
        return finish('iteration_limit')
      }

      while (toolCalls >= threshold) {
        this.logger.info('dispatch.threshold_reached', { toolCalls, threshold })
        const proceed = await this.confirmContinuation({ toolCalls, threshold }, signal)
        throwIfCancelled(signal)
        if (!proceed) {
          this.logger.info('dispatch.paused', { toolCalls, threshold })
          return finish('paused')
        }
        threshold += this.options.toolCallThreshold
        this.logger.info('dispatch.threshold_raised', { toolCalls, threshold })
      }
    }
  }

  private async executeCall(
    call: ToolCall,
    permissions: PermissionChannel,
    runOptions: RunOptions
  ): Promise<CallOutcome> {
    const { signal, onUpdate } = runOptions
    const fail = async (output: string, decision?: PermissionDecision): Promise<CallOutcome> => {
      this.logger.warn('tool.failed', { tool: call.name, callId: call.callId, error: output })
      await this.publish(onUpdate, {
        kind: 'tool_call_failed',
        message: `Tool failed: ${call.name}`,
        toolName: call.name,
        toolUseId: call.callId
      })
      return {
        result: { callId: call.callId, output, isError: true },
        ...(decision ? { decision } : {})
      }
    }

    await this.publish(onUpdate, {
      kind: 'tool_call_started',
      message: `Using tool: ${call.name}`,
      toolName: call.name,
      toolUseId: call.callId
    })

    const tool = this.registry.get(call.name)
    if (!tool) {
      return fail(new UnknownToolError(call.name).message)
    }

    let request: PermissionRequest | undefined
    try {
      request = tool.permission?.(call.arguments)
    } catch (error) {
      return fail(`Invalid arguments for ${call.name}: ${errorMessage(error)}`)
    }

    let decision: PermissionDecision | undefined
    if (request) {
      decision = await permissions.request(request, signal)
      if (decision === 'denied') {
        return fail(new PermissionDeniedError(request.operation).message, decision)
      }
    }

    let output: JsonValue
    try {
      output = await tool.execute(call.arguments, {
        workspace: this.options.workspace,
        logger: this.logger,
        ...(signal ? { signal } : {}),
        ...(onUpdate ? { onUpdate } : {})
      })
    } catch (error) {
      return fail(new ToolExecutionError(call.name, errorMessage(error)).message, decision)
    }

    this.logger.info('tool.executed', { tool: call.name, callId: call.callId })
    await this.publish(onUpdate, {
      kind: 'tool_call_finished',
      message: `Tool completed: ${call.name}`,
      toolName: call.name,
      toolUseId: call.callId
    })
    return {
      result: { callId: call.callId, output, isError: false },
      ...(decision ? { decision } : {})
    }
  }

  private transition(state: DispatchState, data?: Record<string, unknown>): void {
    this.logger.debug?.('dispatch.state', { state, ...(data ?? {}) })
  }

  private async publish(listener: UpdateListener | undefined, update: AgentTurnUpdate): Promise<void> {
    if (!listener) return
    try {
      await listener(update)
    } catch (error) {
      // Listener failures never reach the tool result.
      this.logger.warn('dispatch.update_failed', { kind: update.kind, error: errorMessage(error) })
    }
  }
}
