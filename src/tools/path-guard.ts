import { isAbsolute, relative, resolve } from 'node:path'

/**
 * Resolves `target` against the workspace and rejects anything that lands outside it.
 */
export function resolveInWorkspace(workspace: string, target: string): string {
  const root = resolve(workspace)
  const resolved = resolve(root, target)
  const rel = relative(root, resolved)
  if (rel.startsWith('..') || isAbsolute(rel)) {
    throw new Error(`path escapes workspace: ${target}`)
  }
  return resolved
}

/** Resolves an optional working directory, defaulting to the workspace root. */
export function resolveWorkingDir(workspace: string, workingDir?: string): string {
  return workingDir ? resolveInWorkspace(workspace, workingDir) : resolve(workspace)
}
