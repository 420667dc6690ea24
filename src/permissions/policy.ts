import type { PermissionOptions, PermissionRequest, PolicyVerdict } from '../core/types.js'

export const DEFAULT_YOLO_PROMPT =
  'YOLO MODE ENABLED: Some operations will be performed automatically without confirmation.'

export const defaultPermissionOptions: PermissionOptions = {
  yoloMode: false,
  commandAllowlist: [],
  commandDenylist: [],
  deleteFileProtection: true
}

/** Builds a frozen request so nothing downstream can alter what was asked for. */
export function createPermissionRequest(
  operation: PermissionRequest['operation'],
  details: Record<string, unknown>
): PermissionRequest {
  return Object.freeze({ operation, details: Object.freeze({ ...details }) })
}

function commandOf(request: PermissionRequest): string {
  const command = request.details.command
  return typeof command === 'string' ? command.trim() : ''
}

/** True when the trimmed command starts with any non-empty trimmed entry. */
export function matchesCommandPrefix(command: string, entries: readonly string[]): boolean {
  const trimmed = command.trim()
  return entries.some((entry) => {
    const prefix = entry.trim()
    return prefix.length > 0 && trimmed.startsWith(prefix)
  })
}

/**
 * Decides whether a request can proceed without asking anyone.
 *
 * Delete protection beats yolo mode, and the command denylist beats the allowlist.
 */
export function decidePermission(request: PermissionRequest, options: PermissionOptions): PolicyVerdict {
  if (request.operation === 'delete_file' && options.deleteFileProtection) return 'ask'
  if (!options.yoloMode) return 'ask'

  if (request.operation === 'run_command') {
    const command = commandOf(request)
    if (matchesCommandPrefix(command, options.commandDenylist)) return 'auto_deny'
    if (options.commandAllowlist.length > 0) {
      return matchesCommandPrefix(command, options.commandAllowlist) ? 'auto_grant' : 'ask'
    }
    return 'auto_grant'
  }

  return 'auto_grant'
}
