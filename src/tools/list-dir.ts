import { readdir } from 'node:fs/promises'

import { z } from 'zod/v4'

import type { ToolDefinition } from '../core/tool-registry.js'
import { resolveInWorkspace } from './path-guard.js'

const inputSchema = {
  path: z.string().optional().describe('Directory relative to the workspace; defaults to its root')
}

/** Lists files/directories under a workspace-relative path. */
export const listDirTool: ToolDefinition = {
  name: 'list_dir',
  description: 'List directory contents at a given path.',
  inputSchema,
  async execute(input, ctx) {
    const parsed = z.object(inputSchema).parse(input)
    const target = resolveInWorkspace(ctx.workspace, parsed.path ?? '.')
    const entries = await readdir(target, { withFileTypes: true })
    if (!entries.length) return '(empty)'

    return entries
      .map((entry) => `${entry.isDirectory() ? 'DIR ' : 'FILE'} ${entry.name}`)
      .sort()
      .join('\n')
  }
}
