import type { ToolgateConfig } from '../config/schema.js'
import { createFileTool } from '../tools/create-file.js'
import { deleteFileTool } from '../tools/delete-file.js'
import { editFileTool } from '../tools/edit-file.js'
import { listDirTool } from '../tools/list-dir.js'
import { readFileTool } from '../tools/read-file.js'
import { createRunCommandTool } from '../tools/run-command.js'
import { ToolRegistry } from './tool-registry.js'

/** Registers the built-in workspace tools in deterministic order. */
export function registerDefaultTools(registry: ToolRegistry, config: Pick<ToolgateConfig, 'execTimeoutSec'>): void {
  registry.register(readFileTool)
  registry.register(listDirTool)
  registry.register(createFileTool)
  registry.register(editFileTool)
  registry.register(deleteFileTool)
  registry.register(createRunCommandTool(config.execTimeoutSec))
}
