import { readFile } from 'node:fs/promises'

import { z } from 'zod/v4'

import type { ToolDefinition } from '../core/tool-registry.js'
import { resolveInWorkspace } from './path-guard.js'

const inputSchema = {
  path: z.string().describe('Path relative to the workspace'),
  offset: z.number().int().positive().optional().describe('First line to return (1-indexed)'),
  limit: z.number().int().positive().optional().describe('Number of lines to return')
}

/** Reads UTF-8 file content from the workspace, optionally a line range. */
export const readFileTool: ToolDefinition = {
  name: 'read_file',
  description: 'Read the contents of a UTF-8 text file from the workspace.',
  inputSchema,
  async execute(input, ctx) {
    const parsed = z.object(inputSchema).parse(input)
    const target = resolveInWorkspace(ctx.workspace, parsed.path)
    const content = await readFile(target, 'utf-8')
    if (parsed.offset === undefined && parsed.limit === undefined) return content

    const lines = content.split('\n')
    const start = (parsed.offset ?? 1) - 1
    const end = parsed.limit === undefined ? lines.length : start + parsed.limit
    return lines.slice(start, end).join('\n')
  }
}
