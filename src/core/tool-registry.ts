import { z, type ZodRawShape } from 'zod/v4'

import type { JsonSchemaObject, JsonValue, PermissionRequest, ToolContext, ToolSchema } from './types.js'

/**
 * Contract for a tool exposed to the model.
 *
 * Tools validate their own input; the dispatch loop turns thrown errors into error results.
 */
export interface ToolDefinition {
  /** Unique tool identifier used by the model. */
  name: string
  /** Human-readable usage description for model selection. */
  description: string
  /** Zod raw shape describing the tool's arguments. */
  inputSchema: ZodRawShape
  /**
   * Describes the side effect this call would have. Read-only tools leave this out
   * and never go through the permission gate.
   */
  permission?(input: Record<string, unknown>): PermissionRequest
  /** Executes the tool. Throwing is allowed. */
  execute(input: Record<string, unknown>, ctx: ToolContext): Promise<JsonValue>
}

/** Converts a zod raw shape into the JSON-schema object vendors expect. */
export function toParameterSchema(shape: ZodRawShape): JsonSchemaObject {
  const schema = z.toJSONSchema(z.object(shape))
  return {
    type: 'object',
    properties: { ...(schema.properties ?? {}) },
    required: [...(schema.required ?? [])]
  }
}

/**
 * In-memory registry of all model-callable tools.
 */
export class ToolRegistry {
  private readonly tools = new Map<string, ToolDefinition>()

  /** Registers a tool. Names are unique and registrations are never replaced. */
  register(tool: ToolDefinition): void {
    if (this.tools.has(tool.name)) {
      throw new Error(`Tool '${tool.name}' is already registered`)
    }
    this.tools.set(tool.name, tool)
  }

  /** Gets a tool by name. */
  get(name: string): ToolDefinition | undefined {
    return this.tools.get(name)
  }

  has(name: string): boolean {
    return this.tools.has(name)
  }

  /** Returns all tools in registration order. */
  list(): ToolDefinition[] {
    return [...this.tools.values()]
  }

  /** Vendor-neutral declarations for every registered tool. */
  schemas(): ToolSchema[] {
    return this.list().map((tool) => ({
      name: tool.name,
      description: tool.description,
      parameters: toParameterSchema(tool.inputSchema)
    }))
  }
}
