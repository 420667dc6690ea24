import type { ConversationTurn, ToolCall, ToolResult, ToolSchema, VendorName } from '../core/types.js'

export interface MessageRoles {
  /** Role carrying tool invocations. */
  toolCall: 'assistant'
  /** Role carrying tool results back to the model. */
  toolResult: 'user' | 'tool'
}

/**
 * Bidirectional translation between one vendor's wire shapes and the canonical model.
 *
 * The dispatch loop depends only on this interface.
 */
export interface VendorAdapter<TMessage, TTool, TResponse> {
  readonly vendor: VendorName
  readonly requiredMessageRoles: MessageRoles

  formatTools(tools: readonly ToolSchema[]): TTool[]
  /** Lazily yields the tool calls in a response, in the order the vendor emitted them. */
  extractToolCalls(response: TResponse): Generator<ToolCall, void, undefined>
  extractText(response: TResponse): string
  /** Builds the assistant message that carries `calls`. */
  formatToolCalls(text: string, calls: readonly ToolCall[]): TMessage
  /**
   * Builds the message fragment(s) answering `calls`.
   * Throws AdapterCorrelationError when a call id is missing, duplicated or unknown.
   */
  formatToolResults(calls: readonly ToolCall[], results: readonly ToolResult[]): TMessage[]
  /** Renders the canonical history as the vendor's message list. */
  toMessages(turns: readonly ConversationTurn[]): TMessage[]
}

export interface ModelRequest<TMessage, TTool> {
  system: string
  messages: TMessage[]
  tools: TTool[]
}

/**
 * Sends one request to a vendor. Failures propagate unchanged to the caller.
 */
export interface ModelTransport<TMessage, TTool, TResponse> {
  send(request: ModelRequest<TMessage, TTool>, signal?: AbortSignal): Promise<TResponse>
}
