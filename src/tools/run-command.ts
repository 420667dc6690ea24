import { exec as execCb } from 'node:child_process'
import { promisify } from 'node:util'

import { z } from 'zod/v4'

import type { ToolDefinition } from '../core/tool-registry.js'
import { createPermissionRequest } from '../permissions/policy.js'
import { resolveWorkingDir } from './path-guard.js'

const exec = promisify(execCb)

// Blocked regardless of permission settings or user approval.
const DENY_PATTERNS: RegExp[] = [
  /\brm\s+-[\w-]*r[\w-]*f?[\w-]*\s+\/(?:\s|$)/i,
  /\bshutdown\b/i,
  /\breboot\b/i,
  /\bpoweroff\b/i,
  /\bdd\s+if=/i,
  /\bmkfs\b/i,
  /\bchmod\s+[0-7]{3,4}\s+\//i,
  /\bcurl\b.*\|\s*\b(?:ba)?sh\b/i,
  /\bwget\b.*\|\s*\b(?:ba)?sh\b/i,
  /:\(\)\s*\{.*\|.*&\s*\}\s*;/,
  />\s*\/dev\/(?:[sh]d|nvme|vd|xvd|loop)/i,
  /\bnc\s+-[\w]*l/i
]

// Commands that would otherwise open a pager and hang without a terminal.
const PAGER_PREFIXES = ['less', 'more', 'git diff', 'git show', 'git log']

export function isCommandBlocked(command: string): boolean {
  return DENY_PATTERNS.some((pattern) => pattern.test(command))
}

function withoutPager(command: string): string {
  const trimmed = command.trim()
  const paged = PAGER_PREFIXES.some((prefix) => trimmed === prefix || trimmed.startsWith(`${prefix} `))
  return paged && !trimmed.includes('| cat') ? `${trimmed} | cat` : trimmed
}

function outputOf(error: unknown, key: 'stdout' | 'stderr'): string {
  if (typeof error !== 'object' || error === null) return ''
  const value: unknown = Object.getOwnPropertyDescriptor(error, key)?.value
  return typeof value === 'string' ? value.trim() : ''
}

const inputSchema = {
  command: z.string().describe('Shell command to run'),
  working_dir: z.string().optional().describe('Directory relative to the workspace')
}
const parseInput = (input: Record<string, unknown>) => z.object(inputSchema).parse(input)

/** Builds the shell execution tool with a configurable timeout. */
export function createRunCommandTool(timeoutSec: number): ToolDefinition {
  return {
    name: 'run_command',
    description: 'Execute a shell command in the workspace and return its exit code, stdout and stderr.',
    inputSchema,
    permission(input) {
      const parsed = parseInput(input)
      return createPermissionRequest('run_command', {
        command: parsed.command,
        ...(parsed.working_dir ? { working_dir: parsed.working_dir } : {})
      })
    },
    async execute(input, ctx) {
      const parsed = parseInput(input)
      if (isCommandBlocked(parsed.command)) {
        throw new Error('command blocked by safety policy')
      }

      const cwd = resolveWorkingDir(ctx.workspace, parsed.working_dir)
      const command = withoutPager(parsed.command)

      try {
        const { stdout, stderr } = await exec(command, {
          cwd,
          timeout: timeoutSec * 1000,
          maxBuffer: 1024 * 1024,
          ...(ctx.signal ? { signal: ctx.signal } : {})
        })
        return { command, exit_code: 0, stdout: stdout.trim(), stderr: stderr.trim() }
      } catch (error) {
        const stderr = outputOf(error, 'stderr')
        const reason = error instanceof Error ? (error.message.split('\n')[0] ?? error.message) : String(error)
        throw new Error(stderr ? `${reason}\nSTDERR:\n${stderr}` : reason)
      }
    }
  }
}
