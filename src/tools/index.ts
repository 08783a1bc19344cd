import { createCalculatorTools } from "./calculator.js"
import { createFsTools } from "./fs.js"
import { ToolRegistry } from "./registry.js"
import { createSearchTools } from "./search.js"
import { createShellTools } from "./shell.js"
import { createDelegationTool } from "./task.js"
import { createTodoTools } from "./todo.js"
import type { ToolDefinition } from "./types.js"
import { createWebTools } from "./web.js"

export function createBuiltInTools(): ToolDefinition[] {
  return [
    ...createShellTools(),
    ...createFsTools(),
    ...createSearchTools(),
    ...createWebTools(),
    ...createTodoTools(),
    ...createCalculatorTools(),
  ]
}

/** Built-in tools followed by the delegation tool. */
export function createToolRegistry(options: { delegation?: boolean } = {}): ToolRegistry {
  return new ToolRegistry(createBuiltInTools(), options.delegation === false ? undefined : createDelegationTool())
}
