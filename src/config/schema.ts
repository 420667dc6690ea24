import { z } from 'zod/v4'

export const permissionsSchema = z.object({
  yoloMode: z.boolean().default(false),
  yoloPrompt: z.string().optional(),
  commandAllowlist: z.array(z.string()).default([]),
  commandDenylist: z.array(z.string()).default([]),
  // Deletions keep asking even in yolo mode unless explicitly turned off.
  deleteFileProtection: z.boolean().default(true)
})

/**
 * Runtime configuration for one agent. Parsed once at startup and passed explicitly.
 */
export const configSchema = z.object({
  provider: z.enum(['anthropic', 'openai']),
  model: z.string().min(1),
  apiKey: z.string().optional(),
  workspace: z.string(),
  systemPrompt: z.string().optional(),
  maxTokens: z.number().int().positive().default(4096),
  temperature: z.number().min(0).max(2).default(0),
  maxToolIterations: z.number().int().positive().default(20),
  toolCallThreshold: z.number().int().positive().default(5),
  execTimeoutSec: z.number().int().positive().default(60),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  permissions: permissionsSchema.default({
    yoloMode: false,
    commandAllowlist: [],
    commandDenylist: [],
    deleteFileProtection: true
  })
})

export type ToolgateConfig = z.infer<typeof configSchema>
export type ToolgateConfigInput = z.input<typeof configSchema>
