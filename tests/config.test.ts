import { describe, expect, it } from 'vitest'

import { configFromEnv, inferProvider } from '../src/config/load.js'
import { ConfigError } from '../src/core/errors.js'

describe('inferProvider', () => {
  it('maps model families to vendors', () => {
    expect(inferProvider('claude-sonnet-4-5')).toBe('anthropic')
    expect(inferProvider('gpt-4o')).toBe('openai')
    expect(inferProvider('o3-mini')).toBe('openai')
  })

  it('rejects unknown models', () => {
    expect(() => inferProvider('llama-3')).toThrow('Unsupported model: llama-3')
  })
})

describe('configFromEnv', () => {
  it('applies defaults around the required model', () => {
    const config = configFromEnv({ TOOLGATE_MODEL: 'claude-sonnet-4-5', TOOLGATE_WORKSPACE: '/tmp/ws' })

    expect(config).toEqual({
      provider: 'anthropic',
      model: 'claude-sonnet-4-5',
      workspace: '/tmp/ws',
      maxTokens: 4096,
      temperature: 0,
      maxToolIterations: 20,
      toolCallThreshold: 5,
      execTimeoutSec: 60,
      logLevel: 'info',
      permissions: {
        yoloMode: false,
        commandAllowlist: [],
        commandDenylist: [],
        deleteFileProtection: true
      }
    })
  })

  it('reads permission settings and numeric overrides', () => {
    const config = configFromEnv({
      TOOLGATE_MODEL: 'gpt-4o',
      TOOLGATE_WORKSPACE: '/tmp/ws',
      TOOLGATE_TOOL_CALL_THRESHOLD: '3',
      TOOLGATE_YOLO_MODE: 'true',
      TOOLGATE_COMMAND_ALLOWLIST: 'ls, git status ,',
      TOOLGATE_COMMAND_DENYLIST: 'rm',
      TOOLGATE_DELETE_FILE_PROTECTION: 'false'
    })

    expect(config.provider).toBe('openai')
    expect(config.toolCallThreshold).toBe(3)
    expect(config.permissions).toEqual({
      yoloMode: true,
      commandAllowlist: ['ls', 'git status'],
      commandDenylist: ['rm'],
      deleteFileProtection: false
    })
  })

  it('falls back to the vendor api key variable', () => {
    const env = { TOOLGATE_MODEL: 'gpt-4o', TOOLGATE_WORKSPACE: '/tmp/ws', OPENAI_API_KEY: 'test-secret' }
    expect(configFromEnv(env).apiKey).toBe('test-secret')
    expect(configFromEnv({ ...env, TOOLGATE_API_KEY: 'test-override' }).apiKey).toBe('test-override')
  })

  it('lets an explicit provider win over inference', () => {
    const config = configFromEnv({
      TOOLGATE_MODEL: 'my-proxy-model',
      TOOLGATE_PROVIDER: 'openai',
      TOOLGATE_WORKSPACE: '/tmp/ws'
    })
    expect(config.provider).toBe('openai')
  })

  it('rejects boolean values other than true or false', () => {
    const env = { TOOLGATE_MODEL: 'gpt-4o', TOOLGATE_WORKSPACE: '/tmp/ws' }

    expect(() => configFromEnv({ ...env, TOOLGATE_DELETE_FILE_PROTECTION: 'yes' })).toThrow(
      'TOOLGATE_DELETE_FILE_PROTECTION must be true or false, got: yes'
    )
    expect(() => configFromEnv({ ...env, TOOLGATE_YOLO_MODE: '1' })).toThrow(ConfigError)
    expect(configFromEnv({ ...env, TOOLGATE_YOLO_MODE: ' TRUE ' }).permissions.yoloMode).toBe(true)
  })

  it('requires a model', () => {
    expect(() => configFromEnv({})).toThrow('TOOLGATE_MODEL is not set')
  })

  it('reports invalid values', () => {
    expect(() =>
      configFromEnv({ TOOLGATE_MODEL: 'gpt-4o', TOOLGATE_WORKSPACE: '/tmp/ws', TOOLGATE_TOOL_CALL_THRESHOLD: '0' })
    ).toThrow(ConfigError)
    expect(() =>
      configFromEnv({ TOOLGATE_MODEL: 'gpt-4o', TOOLGATE_WORKSPACE: '/tmp/ws', TOOLGATE_TEMPERATURE: 'hot' })
    ).toThrow(/^Invalid configuration: temperature:/)
  })
})
