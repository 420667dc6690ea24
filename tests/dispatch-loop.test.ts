import type Anthropic from '@anthropic-ai/sdk'
import { describe, expect, it, vi } from 'vitest'
import { z } from 'zod/v4'

import { AnthropicAdapter, type AnthropicResponse } from '../src/adapters/anthropic.js'
import type { ModelRequest, ModelTransport } from '../src/adapters/types.js'
import { Conversation } from '../src/core/conversation.js'
import { DispatchLoop, type DispatchOptions } from '../src/core/dispatch-loop.js'
import { AdapterCorrelationError, RoundCancelledError } from '../src/core/errors.js'
import { ToolRegistry, type ToolDefinition } from '../src/core/tool-registry.js'
import type { AgentTurnUpdate, ContinuationRequest } from '../src/core/types.js'
import { createPermissionRequest, defaultPermissionOptions } from '../src/permissions/policy.js'

type AnthropicRequest = ModelRequest<Anthropic.MessageParam, Anthropic.Tool>

class ScriptedTransport implements ModelTransport<Anthropic.MessageParam, Anthropic.Tool, AnthropicResponse> {
  readonly requests: AnthropicRequest[] = []

  constructor(private readonly replies: AnthropicResponse[]) {}

  async send(request: AnthropicRequest): Promise<AnthropicResponse> {
    this.requests.push(request)
    const reply = this.replies.shift()
    if (!reply) throw new Error('no scripted reply left')
    return reply
  }
}

function text(value: string): AnthropicResponse {
  const content = [{ type: 'text', text: value }]
  return { content }
}

function toolUse(...calls: Array<[id: string, name: string, input?: Record<string, unknown>]>): AnthropicResponse {
  return {
    content: calls.map(([id, name, input]) => ({ type: 'tool_use', id, name, input: input ?? {} }))
  }
}

function makeLogger() {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() }
}

const echoTool: ToolDefinition = {
  name: 'echo',
  description: 'Echo the message back',
  inputSchema: { message: z.string().optional() },
  async execute(input) {
    return typeof input.message === 'string' ? input.message : 'echo'
  }
}

const explodingTool: ToolDefinition = {
  name: 'explode',
  description: 'Always fails',
  inputSchema: {},
  async execute() {
    throw new Error('kaboom')
  }
}

function makeRegistry(...tools: ToolDefinition[]): ToolRegistry {
  const registry = new ToolRegistry()
  for (const tool of [echoTool, explodingTool, ...tools]) registry.register(tool)
  return registry
}

function makeOptions(overrides: Partial<DispatchOptions> = {}): DispatchOptions {
  return {
    systemPrompt: 'test system prompt',
    workspace: '/tmp/workspace',
    maxToolIterations: 20,
    toolCallThreshold: 50,
    permissions: { ...defaultPermissionOptions },
    confirmContinuation: () => true,
    fallbackPermissionPrompt: () => 'denied',
    ...overrides
  }
}

function makeLoop(replies: AnthropicResponse[], registry = makeRegistry(), overrides: Partial<DispatchOptions> = {}) {
  const transport = new ScriptedTransport(replies)
  const logger = makeLogger()
  const loop = new DispatchLoop(new AnthropicAdapter(), transport, registry, makeOptions(overrides), logger)
  return { loop, transport, logger }
}

const start = Conversation.empty().appendUserText('please help')

describe('DispatchLoop', () => {
  it('returns the reply directly when the model calls no tools', async () => {
    const { loop, transport } = makeLoop([text('Hello!')])

    const { conversation, result } = await loop.run(start)

    expect(result).toEqual({ text: 'Hello!', toolLog: [], stopReason: 'completed', modelCalls: 1 })
    expect(conversation.length).toBe(2)
    expect(transport.requests[0]?.system).toBe('test system prompt')
    expect(transport.requests[0]?.tools.map((tool) => tool.name)).toEqual(['echo', 'explode'])
  })

  it('answers every call even when one of them fails', async () => {
    const { loop, transport } = makeLoop([
      toolUse(['toolu_1', 'echo', { message: 'first' }], ['toolu_2', 'explode']),
      text('Finished.')
    ])

    const { conversation, result } = await loop.run(start)

    expect(result.stopReason).toBe('completed')
    expect(result.text).toBe('Finished.')
    expect(result.modelCalls).toBe(2)
    expect(result.toolLog.map((entry) => entry.result)).toEqual([
      { callId: 'toolu_1', output: 'first', isError: false },
      { callId: 'toolu_2', output: 'Error executing explode: kaboom', isError: true }
    ])
    expect(conversation.turns.map((turn) => turn.role)).toEqual(['user', 'assistant', 'user', 'assistant'])

    const followUp = transport.requests[1]?.messages
    expect(followUp?.[2]).toEqual({
      role: 'user',
      content: [
        { type: 'tool_result', tool_use_id: 'toolu_1', content: 'first' },
        { type: 'tool_result', tool_use_id: 'toolu_2', content: 'Error executing explode: kaboom', is_error: true }
      ]
    })
  })

  it('reports unknown tools as error results', async () => {
    const { loop } = makeLoop([toolUse(['toolu_1', 'teleport']), text('Sorry.')])

    const { result } = await loop.run(start)

    expect(result.toolLog[0]?.result).toEqual({
      callId: 'toolu_1',
      output: "Tool 'teleport' not found",
      isError: true
    })
  })

  it('skips execution and records the decision when permission is denied', async () => {
    const execute = vi.fn(async () => 'removed')
    const removeTool: ToolDefinition = {
      name: 'remove',
      description: 'Remove a file',
      inputSchema: { path: z.string() },
      permission: (input) => createPermissionRequest('delete_file', { path: input.path }),
      execute
    }
    const permissionCallback = vi.fn(() => 'denied' as const)
    const { loop } = makeLoop(
      [toolUse(['toolu_1', 'remove', { path: 'notes.txt' }]), text('Could not delete.')],
      makeRegistry(removeTool),
      { permissions: { ...defaultPermissionOptions, yoloMode: true, permissionCallback } }
    )

    const { result } = await loop.run(start)

    expect(execute).not.toHaveBeenCalled()
    expect(permissionCallback).toHaveBeenCalledTimes(1)
    expect(result.toolLog[0]).toMatchObject({
      decision: 'denied',
      result: { callId: 'toolu_1', output: 'permission denied', isError: true }
    })
  })

  it('runs the tool after a granted permission', async () => {
    const writeTool: ToolDefinition = {
      name: 'write',
      description: 'Write a file',
      inputSchema: { path: z.string() },
      permission: (input) => createPermissionRequest('create_file', { path: input.path }),
      async execute() {
        return 'written'
      }
    }
    const { loop } = makeLoop(
      [toolUse(['toolu_1', 'write', { path: 'a.txt' }]), text('ok')],
      makeRegistry(writeTool),
      { fallbackPermissionPrompt: () => 'granted' }
    )

    const { result } = await loop.run(start)

    expect(result.toolLog[0]).toEqual({
      call: { callId: 'toolu_1', name: 'write', arguments: { path: 'a.txt' } },
      result: { callId: 'toolu_1', output: 'written', isError: false },
      decision: 'granted'
    })
  })

  it('reports a failing permission description as invalid arguments', async () => {
    const strictTool: ToolDefinition = {
      name: 'strict',
      description: 'Needs a path',
      inputSchema: { path: z.string() },
      permission: (input) => {
        if (typeof input.path !== 'string') throw new Error('path is required')
        return createPermissionRequest('edit_file', { path: input.path })
      },
      async execute() {
        return 'edited'
      }
    }
    const { loop } = makeLoop([toolUse(['toolu_1', 'strict']), text('ok')], makeRegistry(strictTool))

    const { result } = await loop.run(start)

    expect(result.toolLog[0]?.result.output).toBe('Invalid arguments for strict: path is required')
  })

  it('asks to continue each time the threshold is reached and raises it by its increment', async () => {
    const requests: ContinuationRequest[] = []
    const { loop } = makeLoop(
      [
        toolUse(['t1', 'echo']),
        toolUse(['t2', 'echo']),
        toolUse(['t3', 'echo']),
        toolUse(['t4', 'echo']),
        toolUse(['t5', 'echo']),
        text('All done.')
      ],
      makeRegistry(),
      {
        toolCallThreshold: 2,
        confirmContinuation: (request) => {
          requests.push(request)
          return true
        }
      }
    )

    const { result } = await loop.run(start)

    expect(result.stopReason).toBe('completed')
    expect(result.toolLog).toHaveLength(5)
    expect(requests).toEqual([
      { toolCalls: 2, threshold: 2 },
      { toolCalls: 4, threshold: 4 }
    ])
  })

  it('asks again when one model turn jumps past several thresholds', async () => {
    const requests: ContinuationRequest[] = []
    const { loop } = makeLoop(
      [toolUse(['t1', 'echo'], ['t2', 'echo'], ['t3', 'echo'], ['t4', 'echo'], ['t5', 'echo']), text('ok')],
      makeRegistry(),
      {
        toolCallThreshold: 2,
        confirmContinuation: (request) => {
          requests.push(request)
          return true
        }
      }
    )

    await loop.run(start)

    expect(requests).toEqual([
      { toolCalls: 5, threshold: 2 },
      { toolCalls: 5, threshold: 4 }
    ])
  })

  it('pauses the round when continuation is declined', async () => {
    const { loop, transport } = makeLoop(
      [toolUse(['t1', 'echo', { message: 'a' }], ['t2', 'echo', { message: 'b' }]), text('never sent')],
      makeRegistry(),
      { toolCallThreshold: 2, confirmContinuation: () => false }
    )

    const { conversation, result } = await loop.run(start)

    expect(result.stopReason).toBe('paused')
    expect(result.modelCalls).toBe(1)
    expect(transport.requests).toHaveLength(1)
    expect(conversation.lastTurn?.content).toEqual([
      { type: 'tool_result', callId: 't1', output: 'a', isError: false },
      { type: 'tool_result', callId: 't2', output: 'b', isError: false }
    ])
  })

  it('stops at the iteration limit', async () => {
    const { loop, transport, logger } = makeLoop(
      [toolUse(['t1', 'echo']), toolUse(['t2', 'echo']), toolUse(['t3', 'echo'])],
      makeRegistry(),
      { maxToolIterations: 2 }
    )

    const { result } = await loop.run(start)

    expect(result.stopReason).toBe('iteration_limit')
    expect(result.modelCalls).toBe(2)
    expect(transport.requests).toHaveLength(2)
    expect(logger.warn).toHaveBeenCalledWith('dispatch.iteration_limit', { modelCalls: 2, toolCalls: 2 })
  })

  it('fails the round on a tool call without an id', async () => {
    const content = [{ type: 'tool_use', name: 'echo', input: {} }]
    const { loop } = makeLoop([{ content }])

    await expect(loop.run(start)).rejects.toBeInstanceOf(AdapterCorrelationError)
  })

  it('does not call the model when the signal is already aborted', async () => {
    const { loop, transport } = makeLoop([text('unused')])

    await expect(loop.run(start, { signal: AbortSignal.abort() })).rejects.toBeInstanceOf(RoundCancelledError)
    expect(transport.requests).toHaveLength(0)
  })

  it('cancels between tool calls', async () => {
    const controller = new AbortController()
    const second = vi.fn(async () => 'never')
    const stopTool: ToolDefinition = {
      name: 'stop',
      description: 'Aborts the round',
      inputSchema: {},
      async execute() {
        controller.abort()
        return 'stopping'
      }
    }
    const laterTool: ToolDefinition = { name: 'later', description: 'Runs later', inputSchema: {}, execute: second }
    const { loop } = makeLoop([toolUse(['t1', 'stop'], ['t2', 'later'])], makeRegistry(stopTool, laterTool))

    await expect(loop.run(start, { signal: controller.signal })).rejects.toBeInstanceOf(RoundCancelledError)
    expect(second).not.toHaveBeenCalled()
  })

  it('publishes progress updates in order', async () => {
    const updates: AgentTurnUpdate[] = []
    const { loop } = makeLoop([toolUse(['t1', 'echo'], ['t2', 'explode']), text('done')])

    await loop.run(start, {
      onUpdate: (update) => {
        updates.push(update)
      }
    })

    expect(updates.map((update) => update.kind)).toEqual([
      'turn_started',
      'tool_call_started',
      'tool_call_finished',
      'tool_call_started',
      'tool_call_failed',
      'turn_finished'
    ])
    expect(updates[1]).toEqual({
      kind: 'tool_call_started',
      message: 'Using tool: echo',
      toolName: 'echo',
      toolUseId: 't1'
    })
  })

  it('rejects reused call ids before running any of the calls', async () => {
    const execute = vi.fn(async () => 'ran')
    const sideTool: ToolDefinition = { name: 'side', description: 'Has a side effect', inputSchema: {}, execute }
    const { loop } = makeLoop([toolUse(['dup', 'side'], ['dup', 'side'])], makeRegistry(sideTool))

    await expect(loop.run(start)).rejects.toThrow('duplicate tool call id: dup')
    expect(execute).not.toHaveBeenCalled()
  })

  it('keeps a successful result when the progress listener throws', async () => {
    const execute = vi.fn(async () => 'written')
    const sideTool: ToolDefinition = { name: 'side', description: 'Has a side effect', inputSchema: {}, execute }
    const { loop, logger } = makeLoop([toolUse(['t1', 'side']), text('done')], makeRegistry(sideTool))

    const { result } = await loop.run(start, {
      onUpdate: (update) => {
        if (update.kind === 'tool_call_finished') throw new Error('ui gone')
      }
    })

    expect(execute).toHaveBeenCalledTimes(1)
    expect(result.toolLog[0]?.result).toEqual({ callId: 't1', output: 'written', isError: false })
    expect(logger.warn).toHaveBeenCalledWith('dispatch.update_failed', {
      kind: 'tool_call_finished',
      error: 'ui gone'
    })
  })

  it('reports a denied deletion to the model when confirmation is required', async () => {
    const execute = vi.fn(async () => 'removed')
    const removeTool: ToolDefinition = {
      name: 'remove',
      description: 'Remove a file',
      inputSchema: { path: z.string() },
      permission: (input) => createPermissionRequest('delete_file', { path: input.path }),
      execute
    }
    const permissionCallback = vi.fn(() => 'denied' as const)
    const { loop, transport } = makeLoop(
      [toolUse(['toolu_1', 'remove', { path: 'notes.txt' }]), text('I could not delete it.')],
      makeRegistry(removeTool),
      { permissions: { ...defaultPermissionOptions, yoloMode: false, permissionCallback } }
    )

    const { result } = await loop.run(start)

    expect(execute).not.toHaveBeenCalled()
    expect(permissionCallback).toHaveBeenCalledWith(
      { operation: 'delete_file', details: { path: 'notes.txt' } },
      undefined
    )
    expect(result.toolLog[0]?.result.output).toContain('denied')
    expect(transport.requests[1]?.messages[2]).toEqual({
      role: 'user',
      content: [{ type: 'tool_result', tool_use_id: 'toolu_1', content: 'permission denied', is_error: true }]
    })
  })

  it('leaves the input conversation untouched', async () => {
    const { loop } = makeLoop([toolUse(['t1', 'echo']), text('done')])

    await loop.run(start)

    expect(start.length).toBe(1)
  })
})
