import readline from 'node:readline'
import type { Readable, Writable } from 'node:stream'

import type { ContinuationCallback, PermissionCallback } from '../core/types.js'

export interface ConsoleIo {
  input: Readable
  output: Writable
}

function resolveIo(io?: Partial<ConsoleIo>): ConsoleIo {
  return {
    input: io?.input ?? process.stdin,
    output: io?.output ?? process.stdout
  }
}

function isYes(answer: string): boolean {
  const normalized = answer.trim().toLowerCase()
  return normalized === 'y' || normalized === 'yes'
}

/**
 * Asks one yes/no question on the terminal.
 *
 * Resolves false when the signal fires first; the readline interface is closed either way.
 */
export function askYesNo(question: string, io?: Partial<ConsoleIo>, signal?: AbortSignal): Promise<boolean> {
  if (signal?.aborted) return Promise.resolve(false)
  const { input, output } = resolveIo(io)
  const rl = readline.createInterface({ input, output, terminal: false })

  return new Promise<boolean>((resolve) => {
    let settled = false
    const finish = (value: boolean): void => {
      if (settled) return
      settled = true
      signal?.removeEventListener('abort', onAbort)
      rl.close()
      resolve(value)
    }
    const onAbort = (): void => {
      output.write('\n(prompt withdrawn)\n')
      finish(false)
    }
    signal?.addEventListener('abort', onAbort, { once: true })
    rl.on('close', () => finish(false))
    rl.question(question, (answer) => finish(isYes(answer)))
  })
}

/**
 * Default permission prompt: prints the operation and its details, then blocks for y/n.
 * Anything other than y/yes is a denial.
 */
export function createConsolePermissionPrompt(io?: Partial<ConsoleIo>): PermissionCallback {
  return async (request, signal) => {
    const { output } = resolveIo(io)
    output.write(`\nPermission Request: ${request.operation}\n`)
    output.write(`Details: ${JSON.stringify(request.details, null, 2)}\n`)
    const allowed = await askYesNo('Allow this operation? (y/n): ', io, signal)
    return allowed ? 'granted' : 'denied'
  }
}

/** Default continuation prompt shown when a round reaches its tool-call threshold. */
export function createConsoleContinuationPrompt(io?: Partial<ConsoleIo>): ContinuationCallback {
  return (request, signal) => {
    const { output } = resolveIo(io)
    output.write(`\nThe agent has made ${request.toolCalls} tool calls in this round.\n`)
    return askYesNo('Continue allowing more tool calls? (y/n): ', io, signal)
  }
}
