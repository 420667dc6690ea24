export { AnthropicAdapter, type AnthropicResponse } from './adapters/anthropic.js'
export { OpenAIAdapter, type OpenAIResponse } from './adapters/openai.js'
export type { MessageRoles, ModelRequest, ModelTransport, VendorAdapter } from './adapters/types.js'
export { configFromEnv, inferProvider, loadConfig } from './config/load.js'
export { configSchema, permissionsSchema, type ToolgateConfig, type ToolgateConfigInput } from './config/schema.js'
export { Agent, DEFAULT_SYSTEM_PROMPT, formatUserMessage, type ChatAgent, type ChatOptions } from './core/agent.js'
export { Conversation } from './core/conversation.js'
export { DispatchLoop, type DispatchOptions, type DispatchState, type RunOptions } from './core/dispatch-loop.js'
export {
  AdapterCorrelationError,
  ConfigError,
  PermissionDeniedError,
  RoundCancelledError,
  ToolExecutionError,
  ToolgateError,
  UnknownToolError
} from './core/errors.js'
export { createAgent, type AgentDependencies } from './core/factory.js'
export { createLogger, logger } from './core/logger.js'
export { registerDefaultTools } from './core/register-tools.js'
export { ToolRegistry, toParameterSchema, type ToolDefinition } from './core/tool-registry.js'
export type * from './core/types.js'
export { PermissionChannel, permissionFingerprint } from './permissions/channel.js'
export {
  askYesNo,
  createConsoleContinuationPrompt,
  createConsolePermissionPrompt,
  type ConsoleIo
} from './permissions/console-prompt.js'
export {
  DEFAULT_YOLO_PROMPT,
  createPermissionRequest,
  decidePermission,
  defaultPermissionOptions,
  matchesCommandPrefix
} from './permissions/policy.js'
export { AnthropicTransport, type AnthropicTransportOptions } from './transports/anthropic.js'
export { OpenAITransport, type OpenAITransportOptions } from './transports/openai.js'
