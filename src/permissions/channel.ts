import { errorMessage } from '../core/logger.js'
import type {
  Logger,
  PermissionCallback,
  PermissionDecision,
  PermissionOptions,
  PermissionRequest
} from '../core/types.js'
import { createConsolePermissionPrompt } from './console-prompt.js'
import { decidePermission } from './policy.js'

function stableStringify(value: unknown): string {
  if (Array.isArray(value)) return `[${value.map(stableStringify).join(',')}]`
  if (value && typeof value === 'object') {
    const entries = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    return `{${entries.map(([k, v]) => `${JSON.stringify(k)}:${stableStringify(v)}`).join(',')}}`
  }
  return JSON.stringify(value) ?? 'undefined'
}

/** Operation plus key-order-independent details; equal fingerprints get equal decisions. */
export function permissionFingerprint(request: PermissionRequest): string {
  return `${request.operation}:${stableStringify(request.details)}`
}

/**
 * Turns policy verdicts into final decisions, asking the configured callback when needed.
 *
 * One instance lives for one dispatch round: decisions are memoized per fingerprint so the
 * same operation is never prompted twice in a round.
 */
export class PermissionChannel {
  private readonly decisions = new Map<string, Promise<PermissionDecision>>()
  private readonly callback: PermissionCallback

  constructor(
    private readonly options: PermissionOptions,
    private readonly logger: Logger,
    fallback?: PermissionCallback
  ) {
    this.callback = options.permissionCallback ?? fallback ?? createConsolePermissionPrompt()
  }

  /** Number of distinct requests decided so far in this round. */
  get size(): number {
    return this.decisions.size
  }

  async request(request: PermissionRequest, signal?: AbortSignal): Promise<PermissionDecision> {
    if (signal?.aborted) return 'denied'

    const key = permissionFingerprint(request)
    const existing = this.decisions.get(key)
    if (existing) {
      this.logger.debug?.('permission.memoized', { operation: request.operation })
      return existing
    }

    const pending = this.resolve(request, signal)
    this.decisions.set(key, pending)
    const decision = await pending
    if (signal?.aborted) {
      // A cancelled prompt must not leave a decision behind for a later retry.
      this.decisions.delete(key)
      return 'denied'
    }
    return decision
  }

  private async resolve(request: PermissionRequest, signal?: AbortSignal): Promise<PermissionDecision> {
    const verdict = decidePermission(request, this.options)
    this.logger.info('permission.verdict', { operation: request.operation, verdict })

    if (verdict === 'auto_grant') return 'granted'
    if (verdict === 'auto_deny') {
      this.logger.warn('permission.auto_denied', { operation: request.operation, details: request.details })
      return 'denied'
    }

    try {
      const decision = await this.askWithCancellation(request, signal)
      this.logger.info('permission.decided', { operation: request.operation, decision })
      return decision
    } catch (error) {
      this.logger.error('permission.callback_failed', {
        operation: request.operation,
        error: errorMessage(error)
      })
      return 'denied'
    }
  }

  private askWithCancellation(request: PermissionRequest, signal?: AbortSignal): Promise<PermissionDecision> {
    const answer = Promise.resolve(this.callback(request, signal)).then(
      (decision): PermissionDecision => (decision === 'granted' ? 'granted' : 'denied')
    )
    if (!signal) return answer

    return new Promise<PermissionDecision>((resolve, reject) => {
      const onAbort = (): void => resolve('denied')
      signal.addEventListener('abort', onAbort, { once: true })
      // The callback itself may have aborted the round.
      if (signal.aborted) onAbort()
      answer.then(
        (decision) => {
          signal.removeEventListener('abort', onAbort)
          resolve(decision)
        },
        (error: unknown) => {
          signal.removeEventListener('abort', onAbort)
          reject(error)
        }
      )
    })
  }
}
