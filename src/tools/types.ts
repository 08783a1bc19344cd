import { z } from "zod"

export type ToolRisk = "safe" | "dangerous"

export type ToolContext = {
  workspaceRoot: string
  enableShell: boolean
  enableWrite: boolean
  maxFileReadChars: number
  maxToolOutputChars: number
}

export type ToolDefinition<InputSchema extends z.ZodTypeAny = z.ZodTypeAny> = {
  name: string
  description: string
  risk: ToolRisk
  parametersJsonSchema: Record<string, unknown>
  inputSchema: InputSchema
  handler(input: z.output<InputSchema>, ctx: ToolContext): Promise<unknown>
}

/** Wire form sent in the `tools` array of a chat request. */
export type ToolSchema = {
  type: "function"
  function: {
    name: string
    description: string
    parameters: Record<string, unknown>
  }
}

export function toToolSchema(tool: { name: string; description: string; parametersJsonSchema: Record<string, unknown> }): ToolSchema {
  return {
    type: "function",
    function: {
      name: tool.name,
      description: tool.description,
      parameters: tool.parametersJsonSchema,
    },
  }
}
