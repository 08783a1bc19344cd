import type { Dirent } from "node:fs"
import fs from "node:fs/promises"
import path from "node:path"
import { DELEGATION_TOOL_NAME } from "../tools/task.js"
import type { ToolRegistry } from "../tools/registry.js"

export const DEFAULT_ROLE = "assistant"

function isMissing(e: unknown): boolean {
  return e instanceof Error && "code" in e && (e.code === "ENOENT" || e.code === "ENOTDIR")
}

async function readIfExists(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, "utf8")
  } catch (e) {
    if (isMissing(e)) return null
    throw e
  }
}

/** `roles/<role>.md` from the workspace, or a built-in default. */
export async function loadRolePrompt(workspaceRoot: string, role: string): Promise<string> {
  const content = await readIfExists(path.join(workspaceRoot, "roles", `${role}.md`))
  if (content) return content.trim()

  return `
You are a capable assistant working inside the user's workspace.
When a request is ambiguous, ask one to three clarifying questions first.
Keep answers short and actionable; give steps and commands where useful.
`.trim()
}

/** Every `skills/*.md` file, in name order. */
export async function loadSkillsPrompt(workspaceRoot: string): Promise<string> {
  const skillsDir = path.join(workspaceRoot, "skills")
  let entries: Dirent[]
  try {
    entries = await fs.readdir(skillsDir, { withFileTypes: true })
  } catch (e) {
    if (isMissing(e)) return ""
    throw e
  }
  const files = entries.filter((e) => e.isFile() && e.name.toLowerCase().endsWith(".md"))
  const chunks: string[] = []
  for (const f of files.sort((a, b) => a.name.localeCompare(b.name))) {
    const content = await fs.readFile(path.join(skillsDir, f.name), "utf8")
    chunks.push(`## skill:${f.name}\n${content.trim()}`)
  }
  return chunks.join("\n\n")
}

export function toolRules(registry: ToolRegistry): string {
  const lines = [
    "### Tool rules",
    `- Available tools: ${registry.names().join(", ")}.`,
    "- Use read, glob and grep to inspect files; never invent file contents.",
    "- write, edit and bash may be disabled; report it when a call is refused.",
    "- Tool arguments must be strict JSON. Tool output may be truncated; read in parts when needed.",
  ]
  if (registry.has(DELEGATION_TOOL_NAME)) {
    lines.push(`- Use ${DELEGATION_TOOL_NAME} to hand a self-contained sub-task to a specialised subagent.`)
  }
  return lines.join("\n")
}

export async function buildSystemPrompt(workspaceRoot: string, role: string, registry: ToolRegistry): Promise<string> {
  const rolePrompt = await loadRolePrompt(workspaceRoot, role)
  const skillsPrompt = await loadSkillsPrompt(workspaceRoot)
  return [rolePrompt, toolRules(registry), skillsPrompt].filter(Boolean).join("\n\n")
}
