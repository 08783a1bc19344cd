import fs from "node:fs/promises"
import path from "node:path"
import fg from "fast-glob"
import { z } from "zod"
import { isSensitivePath, resolveToolPath } from "../util/workspace-path.js"
import type { ToolDefinition } from "./types.js"

const IGNORED = ["**/node_modules/**", "**/.git/**", "**/dist/**"]

const GlobInput = z.object({
  pattern: z.string().min(1),
  path: z.string().default("."),
  maxResults: z.number().int().min(1).max(5000).default(200),
})

const GrepInput = z.object({
  pattern: z.string().min(1),
  path: z.string().default("."),
  glob: z.string().optional(),
  case_insensitive: z.boolean().default(false),
  output_mode: z.enum(["content", "files_with_matches", "count"]).default("content"),
  maxResults: z.number().int().min(1).max(5000).default(500),
})

export type GrepMode = z.output<typeof GrepInput>["output_mode"]

function toDisplayPath(workspaceRoot: string, fullPath: string): string {
  return path.relative(path.resolve(workspaceRoot), fullPath).split(path.sep).join("/") || "."
}

async function listFiles(workspaceRoot: string, base: string, pattern: string): Promise<string[]> {
  const entries = await fg(pattern, { cwd: base, absolute: true, onlyFiles: true, dot: false, ignore: IGNORED })
  return entries.map((e) => path.normalize(e)).filter((e) => !isSensitivePath(workspaceRoot, e))
}

async function isBinary(filePath: string): Promise<boolean> {
  const handle = await fs.open(filePath, "r")
  try {
    const buffer = Buffer.alloc(512)
    const { bytesRead } = await handle.read(buffer, 0, 512, 0)
    return buffer.subarray(0, bytesRead).includes(0)
  } finally {
    await handle.close()
  }
}

/**
 * Scans `files` line by line. Output lines are `path:line:text`,
 * `path`, or `path:count` depending on `mode`.
 */
export async function grepFiles(params: {
  workspaceRoot: string
  files: string[]
  regex: RegExp
  mode: GrepMode
  maxResults: number
}): Promise<string[]> {
  const results: string[] = []
  for (const file of params.files) {
    if (results.length >= params.maxResults) break
    if (await isBinary(file)) continue
    const display = toDisplayPath(params.workspaceRoot, file)
    const lines = (await fs.readFile(file, "utf8")).split("\n")
    let count = 0
    for (let i = 0; i < lines.length; i += 1) {
      const line = lines[i] ?? ""
      if (!params.regex.test(line)) continue
      count += 1
      if (params.mode === "content") {
        results.push(`${display}:${i + 1}:${line}`)
        if (results.length >= params.maxResults) break
      }
    }
    if (count === 0) continue
    if (params.mode === "files_with_matches") results.push(display)
    if (params.mode === "count") results.push(`${display}:${count}`)
  }
  return results
}

export function createSearchTools(): ToolDefinition[] {
  const glob: ToolDefinition<typeof GlobInput> = {
    name: "glob",
    description: "Find workspace files matching a glob pattern (e.g. '**/*.ts'). Newest files first.",
    risk: "safe",
    parametersJsonSchema: {
      type: "object",
      additionalProperties: false,
      properties: {
        pattern: { type: "string", description: "Glob pattern; * matches within a segment, ** across segments" },
        path: { type: "string", description: "Directory to search from, relative to the workspace root", default: "." },
        maxResults: { type: "integer", minimum: 1, maximum: 5000, default: 200 },
      },
      required: ["pattern"],
    },
    inputSchema: GlobInput,
    handler: async (input, ctx) => {
      const base = resolveToolPath(ctx.workspaceRoot, input.path)
      const files = await listFiles(ctx.workspaceRoot, base, input.pattern)
      if (files.length === 0) return `No files found matching pattern: ${input.pattern}`
      const withTimes = await Promise.all(
        files.map(async (file) => ({ file, mtimeMs: (await fs.stat(file)).mtimeMs })),
      )
      withTimes.sort((a, b) => b.mtimeMs - a.mtimeMs || a.file.localeCompare(b.file))
      return withTimes
        .slice(0, input.maxResults)
        .map((f) => toDisplayPath(ctx.workspaceRoot, f.file))
        .join("\n")
    },
  }

  const grep: ToolDefinition<typeof GrepInput> = {
    name: "grep",
    description:
      "Search file contents with a regular expression. output_mode: 'content' (matching lines), 'files_with_matches', or 'count'.",
    risk: "safe",
    parametersJsonSchema: {
      type: "object",
      additionalProperties: false,
      properties: {
        pattern: { type: "string", description: "JavaScript regular expression" },
        path: { type: "string", description: "File or directory to search, relative to the workspace root", default: "." },
        glob: { type: "string", description: "Only search files matching this glob (e.g. '**/*.json')" },
        case_insensitive: { type: "boolean", default: false },
        output_mode: { type: "string", enum: ["content", "files_with_matches", "count"], default: "content" },
        maxResults: { type: "integer", minimum: 1, maximum: 5000, default: 500 },
      },
      required: ["pattern"],
    },
    inputSchema: GrepInput,
    handler: async (input, ctx) => {
      let regex: RegExp
      try {
        regex = new RegExp(input.pattern, input.case_insensitive ? "i" : "")
      } catch (e) {
        throw new Error(`Invalid regex pattern '${input.pattern}': ${e instanceof Error ? e.message : String(e)}`)
      }

      const target = resolveToolPath(ctx.workspaceRoot, input.path)
      const stat = await fs.stat(target)
      const files = stat.isFile() ? [target] : await listFiles(ctx.workspaceRoot, target, input.glob ?? "**/*")
      files.sort()

      const results = await grepFiles({
        workspaceRoot: ctx.workspaceRoot,
        files,
        regex,
        mode: input.output_mode,
        maxResults: input.maxResults,
      })
      return results.length > 0 ? results.join("\n") : `No matches found for pattern: ${input.pattern}`
    },
  }

  return [glob, grep]
}
