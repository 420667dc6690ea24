import { mkdir, writeFile } from 'node:fs/promises'
import { dirname } from 'node:path'

import { z } from 'zod/v4'

import type { ToolDefinition } from '../core/tool-registry.js'
import { createPermissionRequest } from '../permissions/policy.js'
import { resolveInWorkspace } from './path-guard.js'

const inputSchema = {
  path: z.string().describe('Path relative to the workspace'),
  content: z.string().describe('Full file content')
}
const parseInput = (input: Record<string, unknown>) => z.object(inputSchema).parse(input)

/** Creates (or overwrites) a file, creating parent directories as needed. */
export const createFileTool: ToolDefinition = {
  name: 'create_file',
  description: 'Create a new file with the given content.',
  inputSchema,
  permission(input) {
    const parsed = parseInput(input)
    return createPermissionRequest('create_file', {
      path: parsed.path,
      content: parsed.content
    })
  },
  async execute(input, ctx) {
    const parsed = parseInput(input)
    const target = resolveInWorkspace(ctx.workspace, parsed.path)
    await mkdir(dirname(target), { recursive: true })
    await writeFile(target, parsed.content, 'utf-8')
    return `Created ${parsed.path}`
  }
}
