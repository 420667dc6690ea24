import type { ContentBlock, ConversationTurn, TextBlock, ToolCall, ToolResult, TurnRole } from './types.js'

function freezeTurn(role: TurnRole, content: readonly ContentBlock[]): ConversationTurn {
  return Object.freeze({
    role,
    content: Object.freeze(content.map((block) => Object.freeze({ ...block })))
  })
}

function hasToolResults(turn: ConversationTurn): boolean {
  return turn.content.some((block) => block.type === 'tool_result')
}

/**
 * Append-only conversation history.
 *
 * Every change returns a new value, so a round can build on a copy and the agent
 * commits it only when the round finishes.
 */
export class Conversation {
  private constructor(readonly turns: readonly ConversationTurn[]) {}

  static empty(): Conversation {
    return new Conversation(Object.freeze([]))
  }

  static from(turns: readonly ConversationTurn[]): Conversation {
    return new Conversation(Object.freeze(turns.map((turn) => freezeTurn(turn.role, turn.content))))
  }

  get length(): number {
    return this.turns.length
  }

  get lastTurn(): ConversationTurn | undefined {
    return this.turns[this.turns.length - 1]
  }

  append(turn: ConversationTurn): Conversation {
    return new Conversation(Object.freeze([...this.turns, freezeTurn(turn.role, turn.content)]))
  }

  appendUserText(text: string): Conversation {
    return this.append({ role: 'user', content: [{ type: 'text', text }] })
  }

  /** Records a model reply: its text (if any) followed by its tool invocations. */
  appendAssistant(text: string, calls: readonly ToolCall[]): Conversation {
    const content: ContentBlock[] = []
    if (text) content.push({ type: 'text', text })
    for (const call of calls) {
      content.push({ type: 'tool_use', callId: call.callId, name: call.name, arguments: call.arguments })
    }
    return this.append({ role: 'assistant', content })
  }

  appendToolResults(results: readonly ToolResult[]): Conversation {
    return this.append({
      role: 'user',
      content: results.map((result): ContentBlock => ({
        type: 'tool_result',
        callId: result.callId,
        output: result.output,
        isError: result.isError
      }))
    })
  }

  /**
   * Keeps at most `maxTurns` trailing turns. The kept window never opens on a tool-result
   * turn, which would orphan it from its tool_use turn.
   */
  compact(maxTurns: number): Conversation {
    if (maxTurns <= 0) return Conversation.empty()
    if (this.turns.length <= maxTurns) return this

    let start = this.turns.length - maxTurns
    while (start < this.turns.length) {
      const turn = this.turns[start]
      if (turn && turn.role === 'user' && !hasToolResults(turn)) break
      start++
    }
    return new Conversation(Object.freeze(this.turns.slice(start)))
  }

  /** Text of the last assistant turn, or an empty string. */
  lastAssistantText(): string {
    for (let i = this.turns.length - 1; i >= 0; i--) {
      const turn = this.turns[i]
      if (turn?.role !== 'assistant') continue
      return turn.content
        .filter((block): block is TextBlock => block.type === 'text')
        .map((block) => block.text)
        .join('')
    }
    return ''
  }
}
