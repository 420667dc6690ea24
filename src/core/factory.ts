import type Anthropic from '@anthropic-ai/sdk'
import type OpenAI from 'openai'

import { AnthropicAdapter, type AnthropicResponse } from '../adapters/anthropic.js'
import { OpenAIAdapter, type OpenAIResponse } from '../adapters/openai.js'
import type { ToolgateConfig } from '../config/schema.js'
import { AnthropicTransport } from '../transports/anthropic.js'
import { OpenAITransport } from '../transports/openai.js'
import { Agent, DEFAULT_SYSTEM_PROMPT, type ChatAgent } from './agent.js'
import type { DispatchOptions } from './dispatch-loop.js'
import { ConfigError } from './errors.js'
import { createLogger } from './logger.js'
import { registerDefaultTools } from './register-tools.js'
import { ToolRegistry } from './tool-registry.js'
import type { ContinuationCallback, Logger, PermissionCallback } from './types.js'

export interface AgentDependencies {
  logger?: Logger
  permissionCallback?: PermissionCallback
  confirmContinuation?: ContinuationCallback
  registry?: ToolRegistry
  /** Defaults to true. */
  registerDefaultTools?: boolean
}

function dispatchOptions(config: ToolgateConfig, deps: AgentDependencies): DispatchOptions {
  return {
    systemPrompt: config.systemPrompt ?? DEFAULT_SYSTEM_PROMPT,
    workspace: config.workspace,
    maxToolIterations: config.maxToolIterations,
    toolCallThreshold: config.toolCallThreshold,
    permissions: {
      ...config.permissions,
      ...(deps.permissionCallback ? { permissionCallback: deps.permissionCallback } : {})
    },
    ...(deps.confirmContinuation ? { confirmContinuation: deps.confirmContinuation } : {})
  }
}

/**
 * Creates an agent for the configured vendor. The vendor is chosen here, once; the
 * dispatch loop only ever sees the adapter interface.
 */
export function createAgent(config: ToolgateConfig, deps: AgentDependencies = {}): ChatAgent {
  const logger = deps.logger ?? createLogger(config.logLevel)
  if (!config.apiKey) {
    throw new ConfigError(`No API key configured for provider ${config.provider}`)
  }
  const registry = deps.registry ?? new ToolRegistry()
  if (deps.registerDefaultTools !== false) registerDefaultTools(registry, config)
  const transportOptions = {
    model: config.model,
    maxTokens: config.maxTokens,
    temperature: config.temperature
  }
  const options = dispatchOptions(config, deps)

  logger.info('agent.create', { provider: config.provider, model: config.model })

  if (config.provider === 'anthropic') {
    return new Agent<Anthropic.MessageParam, Anthropic.Tool, AnthropicResponse>(
      new AnthropicAdapter(),
      AnthropicTransport.fromApiKey(config.apiKey, transportOptions),
      registry,
      options,
      logger
    )
  }
  return new Agent<OpenAI.Chat.ChatCompletionMessageParam, OpenAI.Chat.ChatCompletionTool, OpenAIResponse>(
    new OpenAIAdapter(),
    OpenAITransport.fromApiKey(config.apiKey, transportOptions),
    registry,
    options,
    logger
  )
}
