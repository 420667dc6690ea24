export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue }

export type VendorName = 'anthropic' | 'openai'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

/**
 * Minimal structured logger interface used across modules.
 */
export interface Logger {
  debug?(event: string, data?: Record<string, unknown>): void
  info(event: string, data?: Record<string, unknown>): void
  warn(event: string, data?: Record<string, unknown>): void
  error(event: string, data?: Record<string, unknown>): void
}

// ── Permissions ──

export type PermissionOperation = 'create_file' | 'edit_file' | 'delete_file' | 'run_command'

/**
 * A side effect a tool wants to perform, surfaced to the policy and, when needed, a human.
 */
export interface PermissionRequest {
  readonly operation: PermissionOperation
  readonly details: Readonly<Record<string, unknown>>
}

export type PermissionDecision = 'granted' | 'denied'

/** Outcome of the pure policy check, before any human is involved. */
export type PolicyVerdict = 'auto_grant' | 'auto_deny' | 'ask'

export type PermissionCallback = (
  request: PermissionRequest,
  signal?: AbortSignal
) => PermissionDecision | Promise<PermissionDecision>

export interface PermissionOptions {
  /** Skip interactive confirmation, subject to the command lists and delete protection. */
  yoloMode: boolean
  /** Warning shown once when yolo mode is enabled. */
  yoloPrompt?: string
  commandAllowlist: readonly string[]
  commandDenylist: readonly string[]
  /** Forces confirmation for `delete_file` even in yolo mode. */
  deleteFileProtection: boolean
  permissionCallback?: PermissionCallback
}

// ── Tool calls and conversation ──

/**
 * Vendor-independent tool invocation.
 */
export interface ToolCall {
  callId: string
  name: string
  arguments: Record<string, unknown>
}

export interface ToolResult {
  callId: string
  output: JsonValue
  isError: boolean
}

export interface TextBlock {
  type: 'text'
  text: string
}

export interface ToolUseBlock {
  type: 'tool_use'
  callId: string
  name: string
  arguments: Record<string, unknown>
}

export interface ToolResultBlock {
  type: 'tool_result'
  callId: string
  output: JsonValue
  isError: boolean
}

export type ContentBlock = TextBlock | ToolUseBlock | ToolResultBlock

export type TurnRole = 'user' | 'assistant'

export interface ConversationTurn {
  readonly role: TurnRole
  readonly content: readonly ContentBlock[]
}

/**
 * JSON-schema object sent to vendors as a tool's parameter declaration.
 */
export interface JsonSchemaObject {
  type: 'object'
  properties: Record<string, unknown>
  required: string[]
}

/** Vendor-neutral tool declaration. */
export interface ToolSchema {
  name: string
  description: string
  parameters: JsonSchemaObject
}

// ── Progress and round results ──

export type AgentTurnUpdateKind =
  | 'turn_started'
  | 'tool_call_started'
  | 'tool_call_finished'
  | 'tool_call_failed'
  | 'turn_finished'

export interface AgentTurnUpdate {
  kind: AgentTurnUpdateKind
  message: string
  toolName?: string
  toolUseId?: string
}

export type UpdateListener = (update: AgentTurnUpdate) => Promise<void> | void

/**
 * Per-call execution context passed to tools.
 */
export interface ToolContext {
  workspace: string
  logger: Logger
  signal?: AbortSignal
  onUpdate?: UpdateListener
}

export interface ToolLogEntry {
  call: ToolCall
  result: ToolResult
  /** Present only when the tool needed a permission decision. */
  decision?: PermissionDecision
}

export type StopReason = 'completed' | 'iteration_limit' | 'paused'

/**
 * What one user-message-to-completion round produced.
 */
export interface RoundResult {
  text: string
  toolLog: ToolLogEntry[]
  stopReason: StopReason
  modelCalls: number
}

export interface ContinuationRequest {
  toolCalls: number
  threshold: number
}

export type ContinuationCallback = (
  request: ContinuationRequest,
  signal?: AbortSignal
) => boolean | Promise<boolean>
