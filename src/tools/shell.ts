import { z } from "zod"
import { runCommand } from "../util/run-command.js"
import type { ToolDefinition } from "./types.js"

const BashInput = z.object({
  command: z.string().min(1, "command must not be empty"),
  timeoutMs: z.number().int().min(0).max(10 * 60 * 1000).default(60_000),
})

export function createShellTools(): ToolDefinition[] {
  const bash: ToolDefinition<typeof BashInput> = {
    name: "bash",
    description: "Execute a shell command in the workspace root (disabled unless shell access is enabled)",
    risk: "dangerous",
    parametersJsonSchema: {
      type: "object",
      additionalProperties: false,
      properties: {
        command: { type: "string", description: "The command to execute (e.g. 'ls -la', 'git status')" },
        timeoutMs: { type: "integer", minimum: 0, maximum: 600000, default: 60000 },
      },
      required: ["command"],
    },
    inputSchema: BashInput,
    handler: async (input, ctx) => {
      if (!ctx.enableShell) {
        throw new Error("bash is disabled. Set TASKFORCE_ENABLE_SHELL=1 or pass --enable-shell to enable.")
      }
      const result = await runCommand(input.command, {
        cwd: ctx.workspaceRoot,
        timeoutMs: input.timeoutMs,
        maxOutputChars: ctx.maxToolOutputChars,
      })
      if (result.timedOut) throw new Error(`Command timed out after ${input.timeoutMs}ms`)
      if (result.exitCode !== 0 && !result.truncated) {
        throw new Error(result.stderr.trim() || `Command failed with exit code: ${String(result.exitCode ?? result.signal)}`)
      }
      return result.stdout
    },
  }

  return [bash]
}
