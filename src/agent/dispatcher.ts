import type { z } from "zod"
import { ToolExecutionError, ToolNotFoundError, errorMessage, isAgentError, type AgentError } from "../errors.js"
import type { Logger } from "../logger.js"
import type { ToolRegistry } from "../tools/registry.js"
import type { DelegationInput } from "../tools/task.js"
import type { ToolContext } from "../tools/types.js"
import { toToolText, truncate } from "../util/text.js"
import { createSubagentTask, type SubagentTask } from "./subagents.js"
import type { AgentEventHandler, ChatMessage, ToolCall } from "./types.js"

export const RECURSION_REJECTION = JSON.stringify({
  error: "Subagents cannot spawn additional subagents",
  suggestion: "Complete the task yourself using available tools",
})

/** What the dispatcher needs from the orchestrator. */
export interface SubagentSpawner {
  spawnFormatted(
    task: SubagentTask,
    options?: { context?: readonly ChatMessage[]; depth?: number; maxResultChars?: number },
  ): Promise<string>
}

/**
 * `ok`: the tool ran. `failed`: the content describes an error the caller may
 * treat as fatal. `rejected`: a refused delegation, never fatal.
 */
export type DispatchOutcome =
  | { status: "ok"; content: string }
  | { status: "failed"; content: string; error: AgentError }
  | { status: "rejected"; content: string }

function describeIssues(error: z.ZodError): string {
  return error.issues.map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message)).join("; ")
}

function parseArguments(call: ToolCall): { ok: true; value: unknown } | { ok: false; error: ToolExecutionError } {
  if (typeof call.arguments !== "string") return { ok: true, value: call.arguments }
  try {
    return { ok: true, value: JSON.parse(call.arguments) }
  } catch (e) {
    return {
      ok: false,
      error: new ToolExecutionError(call.name, `Invalid JSON arguments for tool ${call.name}: ${errorMessage(e)}`),
    }
  }
}

/**
 * Routes tool calls by name. Ordinary tools run their handler; the delegation
 * tool goes to the subagent spawner, or is refused once `depth >= 1`.
 * Never throws for tool-level problems: those come back as outcomes.
 */
export class ToolDispatcher {
  private readonly log?: Logger

  public constructor(
    private readonly params: {
      registry: ToolRegistry
      toolContext: ToolContext
      spawner?: SubagentSpawner
      onEvent?: AgentEventHandler
      logger?: Logger
    },
  ) {
    this.log = params.logger?.child({ component: "dispatcher" })
  }

  public async dispatch(call: ToolCall, options: { depth: number }): Promise<DispatchOutcome> {
    const { depth } = options
    const entry = this.params.registry.resolve(call.name)
    const startedAt = Date.now()

    let outcome: DispatchOutcome
    if (!entry) {
      const error = new ToolNotFoundError(call.name)
      outcome = { status: "failed", content: error.message, error }
    } else {
      switch (entry.kind) {
        case "delegate":
          outcome =
            depth >= 1
              ? { status: "rejected", content: RECURSION_REJECTION }
              : await this.delegate(call, entry.tool.inputSchema, depth)
          break
        case "builtin":
          outcome = await this.execute(call, depth, entry.tool.inputSchema, (input) =>
            entry.tool.handler(input, this.params.toolContext),
          )
          break
      }
    }

    if (outcome.status === "ok") {
      this.params.onEvent?.({ type: "tool_result", toolName: call.name, result: outcome.content, depth })
    } else {
      this.params.onEvent?.({ type: "error", message: outcome.content, depth })
    }
    this.log?.info(
      { tool: call.name, toolCallId: call.id, status: outcome.status, depth, durationMs: Date.now() - startedAt },
      "tool dispatched",
    )
    return outcome
  }

  private async execute<S extends z.ZodTypeAny>(
    call: ToolCall,
    depth: number,
    schema: S,
    run: (input: z.output<S>) => Promise<unknown>,
    options: { truncateOutput: boolean } = { truncateOutput: true },
  ): Promise<DispatchOutcome> {
    const parsedArgs = parseArguments(call)
    if (!parsedArgs.ok) return { status: "failed", content: parsedArgs.error.message, error: parsedArgs.error }

    this.params.onEvent?.({ type: "tool_call", toolName: call.name, args: parsedArgs.value, depth })

    const input = schema.safeParse(parsedArgs.value)
    if (!input.success) {
      const error = new ToolExecutionError(call.name, `Invalid arguments for tool ${call.name}: ${describeIssues(input.error)}`)
      return { status: "failed", content: error.message, error }
    }

    try {
      const text = toToolText(await run(input.data))
      return {
        status: "ok",
        content: options.truncateOutput ? truncate(text, this.params.toolContext.maxToolOutputChars) : text,
      }
    } catch (e) {
      const error = isAgentError(e) ? e : new ToolExecutionError(call.name, errorMessage(e), { cause: e })
      return { status: "failed", content: `Tool execution error: ${errorMessage(e)}`, error }
    }
  }

  private async delegate(call: ToolCall, schema: typeof DelegationInput, depth: number): Promise<DispatchOutcome> {
    const spawner = this.params.spawner
    if (!spawner) {
      const error = new ToolExecutionError(call.name, "Delegation is not available in this agent")
      return { status: "failed", content: error.message, error }
    }
    // The subagent result is truncated inside the formatted block, which must stay valid JSON.
    return this.execute(
      call,
      depth,
      schema,
      (args) => {
        const task = createSubagentTask(args.subagent_type, args.description, args.prompt, {
          includeTools: args.include_tools,
          model: args.model,
        })
        return spawner.spawnFormatted(task, { depth, maxResultChars: this.params.toolContext.maxToolOutputChars })
      },
      { truncateOutput: false },
    )
  }
}
