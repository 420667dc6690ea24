export type ToolgateErrorCode =
  | 'adapter_correlation'
  | 'unknown_tool'
  | 'permission_denied'
  | 'tool_execution'
  | 'round_cancelled'
  | 'config'

/**
 * Base class for errors raised by the dispatch subsystem.
 */
export class ToolgateError extends Error {
  constructor(
    readonly code: ToolgateErrorCode,
    message: string
  ) {
    super(message)
    this.name = new.target.name
  }
}

/**
 * Tool calls and tool results could not be paired by call id.
 * Fatal to the round: vendors reject histories with broken pairing.
 */
export class AdapterCorrelationError extends ToolgateError {
  constructor(
    message: string,
    readonly callIds: readonly string[] = []
  ) {
    super('adapter_correlation', message)
  }
}

export class UnknownToolError extends ToolgateError {
  constructor(readonly toolName: string) {
    super('unknown_tool', `Tool '${toolName}' not found`)
  }
}

export class PermissionDeniedError extends ToolgateError {
  constructor(readonly operation: string) {
    super('permission_denied', 'permission denied')
  }
}

export class ToolExecutionError extends ToolgateError {
  constructor(
    readonly toolName: string,
    cause: string
  ) {
    super('tool_execution', `Error executing ${toolName}: ${cause}`)
  }
}

/** The round was aborted through its signal; nothing from it was committed. */
export class RoundCancelledError extends ToolgateError {
  constructor(message = 'round cancelled') {
    super('round_cancelled', message)
  }
}

export class ConfigError extends ToolgateError {
  constructor(message: string) {
    super('config', message)
  }
}

/** Throws {@link RoundCancelledError} when the signal has fired. */
export function throwIfCancelled(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new RoundCancelledError()
  }
}
