import { rm, stat } from 'node:fs/promises'

import { z } from 'zod/v4'

import type { ToolDefinition } from '../core/tool-registry.js'
import { createPermissionRequest } from '../permissions/policy.js'
import { resolveInWorkspace } from './path-guard.js'

const inputSchema = {
  path: z.string().describe('Path of the file to delete, relative to the workspace')
}
const parseInput = (input: Record<string, unknown>) => z.object(inputSchema).parse(input)

export const deleteFileTool: ToolDefinition = {
  name: 'delete_file',
  description: 'Delete a file at the specified path.',
  inputSchema,
  permission(input) {
    return createPermissionRequest('delete_file', { path: parseInput(input).path })
  },
  async execute(input, ctx) {
    const parsed = parseInput(input)
    const target = resolveInWorkspace(ctx.workspace, parsed.path)
    const info = await stat(target)
    if (!info.isFile()) throw new Error(`not a file: ${parsed.path}`)
    await rm(target)
    return `Deleted ${parsed.path}`
  }
}
