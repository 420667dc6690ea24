import { AdapterCorrelationError } from '../core/errors.js'
import type { ConversationTurn, JsonValue, ToolCall, ToolResult } from '../core/types.js'

export type JsonRecord = Record<string, unknown>

export function isRecord(value: unknown): value is JsonRecord {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value)
}

/** Tool output as the text vendors accept in a result message. */
export function serializeOutput(output: JsonValue): string {
  return typeof output === 'string' ? output : JSON.stringify(output)
}

/** Rejects a batch of calls that reuses a call id. Returns the ids in call order. */
export function assertUniqueCallIds(calls: readonly ToolCall[]): Set<string> {
  const ids = new Set<string>()
  for (const call of calls) {
    if (ids.has(call.callId)) {
      throw new AdapterCorrelationError(`duplicate tool call id: ${call.callId}`, [call.callId])
    }
    ids.add(call.callId)
  }
  return ids
}

/**
 * Checks that every call has exactly one result and no result answers an unknown call.
 */
export function assertPairing(calls: readonly ToolCall[], results: readonly ToolResult[]): void {
  const expected = assertUniqueCallIds(calls)

  const answered = new Set<string>()
  for (const result of results) {
    if (!expected.has(result.callId)) {
      throw new AdapterCorrelationError(`tool result for unknown call id: ${result.callId}`, [result.callId])
    }
    if (answered.has(result.callId)) {
      throw new AdapterCorrelationError(`duplicate tool result for call id: ${result.callId}`, [result.callId])
    }
    answered.add(result.callId)
  }

  const missing = [...expected].filter((id) => !answered.has(id))
  if (missing.length > 0) {
    throw new AdapterCorrelationError(`missing tool result for call id: ${missing.join(', ')}`, missing)
  }
}

export function toolCallsOf(turn: ConversationTurn): ToolCall[] {
  const calls: ToolCall[] = []
  for (const block of turn.content) {
    if (block.type === 'tool_use') {
      calls.push({ callId: block.callId, name: block.name, arguments: block.arguments })
    }
  }
  return calls
}

export function toolResultsOf(turn: ConversationTurn): ToolResult[] {
  const results: ToolResult[] = []
  for (const block of turn.content) {
    if (block.type === 'tool_result') {
      results.push({ callId: block.callId, output: block.output, isError: block.isError })
    }
  }
  return results
}

export function textOf(turn: ConversationTurn): string {
  return turn.content
    .map((block) => (block.type === 'text' ? block.text : ''))
    .join('')
}

/**
 * Walks the history and validates that each tool_use turn is answered by the next turn.
 * Yields each turn with the results it answers for (if it is a tool_use turn).
 */
export function* pairedTurns(
  turns: readonly ConversationTurn[]
): Generator<{ turn: ConversationTurn; pendingCalls: ToolCall[] }, void, undefined> {
  let pending: ToolCall[] = []
  for (const turn of turns) {
    if (pending.length > 0) {
      if (turn.role !== 'user') {
        throw new AdapterCorrelationError(
          `missing tool result for call id: ${pending.map((c) => c.callId).join(', ')}`,
          pending.map((c) => c.callId)
        )
      }
      assertPairing(pending, toolResultsOf(turn))
    } else if (toolResultsOf(turn).length > 0) {
      throw new AdapterCorrelationError(
        'tool result without a preceding tool call',
        toolResultsOf(turn).map((r) => r.callId)
      )
    }
    yield { turn, pendingCalls: pending }
    pending = turn.role === 'assistant' ? toolCallsOf(turn) : []
  }
}
