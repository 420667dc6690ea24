import { config as loadEnv } from 'dotenv'

import { ConfigError } from '../core/errors.js'
import type { VendorName } from '../core/types.js'
import { configSchema, type ToolgateConfig } from './schema.js'

/** Parses comma-separated list env values. */
function parseCsv(input: string | undefined): string[] | undefined {
  if (input === undefined) return undefined
  return input
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean)
}

function parseBool(name: string, input: string | undefined): boolean | undefined {
  if (input === undefined || input.trim() === '') return undefined
  const value = input.trim().toLowerCase()
  if (value === 'true') return true
  if (value === 'false') return false
  throw new ConfigError(`${name} must be true or false, got: ${input}`)
}

function parseNumber(input: string | undefined): number | undefined {
  if (input === undefined || input.trim() === '') return undefined
  return Number(input)
}

/**
 * Maps a model name to its vendor.
 */
export function inferProvider(model: string): VendorName {
  const name = model.trim().toLowerCase()
  if (name.startsWith('claude') || name.startsWith('anthropic')) return 'anthropic'
  if (/^(gpt-|o1|o3|o4|openai)/.test(name)) return 'openai'
  throw new ConfigError(`Unsupported model: ${model}`)
}

/**
 * Builds a validated config from `TOOLGATE_*` variables.
 *
 * Falls back to the vendor's conventional API-key variable when `TOOLGATE_API_KEY` is unset.
 */
export function configFromEnv(env: NodeJS.ProcessEnv): ToolgateConfig {
  const model = env.TOOLGATE_MODEL?.trim() ?? ''
  if (!model) throw new ConfigError('TOOLGATE_MODEL is not set')

  const explicit = env.TOOLGATE_PROVIDER?.trim()
  const provider: VendorName =
    explicit === 'anthropic' || explicit === 'openai' ? explicit : inferProvider(model)
  const vendorKey = provider === 'anthropic' ? env.ANTHROPIC_API_KEY : env.OPENAI_API_KEY

  const parsed = configSchema.safeParse({
    provider,
    model,
    apiKey: env.TOOLGATE_API_KEY || vendorKey || undefined,
    workspace: env.TOOLGATE_WORKSPACE ?? process.cwd(),
    systemPrompt: env.TOOLGATE_SYSTEM_PROMPT || undefined,
    maxTokens: parseNumber(env.TOOLGATE_MAX_TOKENS),
    temperature: parseNumber(env.TOOLGATE_TEMPERATURE),
    maxToolIterations: parseNumber(env.TOOLGATE_MAX_TOOL_ITERATIONS),
    toolCallThreshold: parseNumber(env.TOOLGATE_TOOL_CALL_THRESHOLD),
    execTimeoutSec: parseNumber(env.TOOLGATE_EXEC_TIMEOUT_SEC),
    logLevel: env.TOOLGATE_LOG_LEVEL || undefined,
    permissions: {
      yoloMode: parseBool('TOOLGATE_YOLO_MODE', env.TOOLGATE_YOLO_MODE),
      yoloPrompt: env.TOOLGATE_YOLO_PROMPT || undefined,
      commandAllowlist: parseCsv(env.TOOLGATE_COMMAND_ALLOWLIST),
      commandDenylist: parseCsv(env.TOOLGATE_COMMAND_DENYLIST),
      deleteFileProtection: parseBool('TOOLGATE_DELETE_FILE_PROTECTION', env.TOOLGATE_DELETE_FILE_PROTECTION)
    }
  })

  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`)
  }
  return parsed.data
}

/**
 * Loads `.env` from the working directory, then reads the environment.
 */
export function loadConfig(): ToolgateConfig {
  loadEnv()
  return configFromEnv(process.env)
}
