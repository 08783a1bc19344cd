import fs from "node:fs/promises"
import path from "node:path"
import { z } from "zod"
import { truncate } from "../util/text.js"
import { resolveToolPath } from "../util/workspace-path.js"
import type { ToolContext, ToolDefinition } from "./types.js"

const ReadInput = z.object({
  file_path: z.string().min(1),
  offset: z.number().int().min(1).optional(),
  limit: z.number().int().min(1).optional(),
})

const WriteInput = z.object({
  file_path: z.string().min(1),
  content: z.string(),
})

const EditInput = z.object({
  file_path: z.string().min(1),
  old_string: z.string().min(1, "old_string must not be empty"),
  new_string: z.string(),
  replace_all: z.boolean().default(false),
})

function assertWritable(ctx: ToolContext, toolName: string) {
  if (!ctx.enableWrite) {
    throw new Error(`${toolName} is disabled. Set TASKFORCE_ENABLE_WRITE=1 or pass --enable-write to enable.`)
  }
}

export function createFsTools(): ToolDefinition[] {
  const read: ToolDefinition<typeof ReadInput> = {
    name: "read",
    description: "Read a text file in the workspace. Use offset/limit (1-based lines) for large files.",
    risk: "safe",
    parametersJsonSchema: {
      type: "object",
      additionalProperties: false,
      properties: {
        file_path: { type: "string", description: "Path relative to the workspace root" },
        offset: { type: "integer", minimum: 1, description: "First line to return (1-based)" },
        limit: { type: "integer", minimum: 1, description: "Maximum number of lines to return" },
      },
      required: ["file_path"],
    },
    inputSchema: ReadInput,
    handler: async (input, ctx) => {
      const fullPath = resolveToolPath(ctx.workspaceRoot, input.file_path)
      const content = await fs.readFile(fullPath, "utf8")
      if (input.offset === undefined && input.limit === undefined) {
        return truncate(content, ctx.maxFileReadChars)
      }
      const lines = content.split("\n")
      const start = (input.offset ?? 1) - 1
      const end = input.limit === undefined ? lines.length : start + input.limit
      return truncate(lines.slice(start, end).join("\n"), ctx.maxFileReadChars)
    },
  }

  const write: ToolDefinition<typeof WriteInput> = {
    name: "write",
    description: "Write a text file in the workspace, creating or overwriting it (disabled unless writes are enabled)",
    risk: "dangerous",
    parametersJsonSchema: {
      type: "object",
      additionalProperties: false,
      properties: {
        file_path: { type: "string", description: "Path relative to the workspace root" },
        content: { type: "string", description: "The full content to write" },
      },
      required: ["file_path", "content"],
    },
    inputSchema: WriteInput,
    handler: async (input, ctx) => {
      assertWritable(ctx, "write")
      const fullPath = resolveToolPath(ctx.workspaceRoot, input.file_path)
      await fs.mkdir(path.dirname(fullPath), { recursive: true })
      await fs.writeFile(fullPath, input.content, "utf8")
      return `Successfully wrote to file: ${input.file_path}`
    },
  }

  const edit: ToolDefinition<typeof EditInput> = {
    name: "edit",
    description:
      "Edit a workspace file by replacing old_string with new_string (first occurrence, or all with replace_all)",
    risk: "dangerous",
    parametersJsonSchema: {
      type: "object",
      additionalProperties: false,
      properties: {
        file_path: { type: "string", description: "Path relative to the workspace root" },
        old_string: { type: "string", description: "Exact text to replace" },
        new_string: { type: "string", description: "Replacement text" },
        replace_all: { type: "boolean", default: false, description: "Replace every occurrence" },
      },
      required: ["file_path", "old_string", "new_string"],
    },
    inputSchema: EditInput,
    handler: async (input, ctx) => {
      assertWritable(ctx, "edit")
      const fullPath = resolveToolPath(ctx.workspaceRoot, input.file_path)
      const original = await fs.readFile(fullPath, "utf8")
      if (!original.includes(input.old_string)) {
        throw new Error(`Old string '${input.old_string}' not found in file '${input.file_path}'`)
      }
      const updated = input.replace_all
        ? original.split(input.old_string).join(input.new_string)
        : original.replace(input.old_string, () => input.new_string)
      await fs.writeFile(fullPath, updated, "utf8")
      const scope = input.replace_all ? "all occurrences" : "first occurrence"
      return `Replaced ${scope} of '${input.old_string}' in file '${input.file_path}'`
    },
  }

  return [read, write, edit]
}
