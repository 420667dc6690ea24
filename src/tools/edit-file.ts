import { readFile, writeFile } from 'node:fs/promises'

import { z } from 'zod/v4'

import type { ToolDefinition } from '../core/tool-registry.js'
import { createPermissionRequest } from '../permissions/policy.js'
import { resolveInWorkspace } from './path-guard.js'

const inputSchema = {
  path: z.string(),
  old_text: z.string(),
  new_text: z.string()
}
const parseInput = (input: Record<string, unknown>) => z.object(inputSchema).parse(input)

/** Performs a guarded single-occurrence text replacement inside a file. */
export const editFileTool: ToolDefinition = {
  name: 'edit_file',
  description: 'Replace old_text with new_text in a file. Fails on missing or ambiguous matches.',
  inputSchema,
  permission(input) {
    const parsed = parseInput(input)
    return createPermissionRequest('edit_file', {
      path: parsed.path,
      old_text: parsed.old_text,
      new_text: parsed.new_text
    })
  },
  async execute(input, ctx) {
    const parsed = parseInput(input)
    const target = resolveInWorkspace(ctx.workspace, parsed.path)
    const current = await readFile(target, 'utf-8')
    const count = current.split(parsed.old_text).length - 1

    if (count === 0) throw new Error('old_text not found')
    if (count > 1) throw new Error(`old_text appears ${count} times`)

    // Function replacer: `$` sequences in new_text are literal.
    const updated = current.replace(parsed.old_text, () => parsed.new_text)
    await writeFile(target, updated, 'utf-8')
    return `Edited ${parsed.path}`
  }
}
