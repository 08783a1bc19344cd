import { ulid } from "ulid"
import { DelegationDepthError, SubagentError, isAgentError, type AgentError } from "../errors.js"
import type { Logger } from "../logger.js"
import type { ProviderFactory } from "../llm/types.js"
import type { ToolRegistry } from "../tools/registry.js"
import type { ToolContext } from "../tools/types.js"
import { truncate } from "../util/text.js"
import { Conversation, recentMessages } from "./conversation.js"
import { ToolDispatcher, type SubagentSpawner } from "./dispatcher.js"
import { MAX_SUBAGENT_TURNS, MAX_TOOL_ITERATIONS, runSubagentLoop } from "./run-task.js"
import { SUBAGENT_PROFILES, subagentTaskPrompt, type SubagentTask } from "./subagents.js"
import type { AgentEventHandler, ChatMessage } from "./types.js"

export const SUBAGENT_CONTEXT_MESSAGES = 10
export const SUBAGENT_RESULT_BANNER = "=== Subagent Task Complete ==="

export type SubagentLimits = {
  maxTurns: number
  maxIterations: number
  contextMessages: number
}

export type SubagentRun = {
  id: string
  task: SubagentTask
  /** Human-readable description of the role. */
  agentType: string
  model: string
  durationMs: number
  usedTools: boolean
  result: string
}

export type SettledSubagentRun = { ok: true; output: string } | { ok: false; error: AgentError }

export function formatSubagentResult(run: SubagentRun): string {
  const body = {
    task: run.task.description,
    agent_type: run.agentType,
    model: run.model,
    duration_ms: run.durationMs,
    used_tools: run.usedTools,
    result: run.result,
  }
  return `${SUBAGENT_RESULT_BANNER}\n${JSON.stringify(body, null, 2)}`
}

/**
 * Runs subagents: short-lived agents with their own conversation and client,
 * sharing the parent's tool registry. A subagent never delegates further.
 */
export class SubagentOrchestrator implements SubagentSpawner {
  private readonly limits: SubagentLimits
  private readonly log?: Logger

  public constructor(
    private readonly params: {
      createProvider: ProviderFactory
      registry: ToolRegistry
      toolContext: ToolContext
      model: string
      limits?: Partial<SubagentLimits>
      onEvent?: AgentEventHandler
      logger?: Logger
    },
  ) {
    this.limits = {
      maxTurns: params.limits?.maxTurns ?? MAX_SUBAGENT_TURNS,
      maxIterations: params.limits?.maxIterations ?? MAX_TOOL_ITERATIONS,
      contextMessages: params.limits?.contextMessages ?? SUBAGENT_CONTEXT_MESSAGES,
    }
    this.log = params.logger?.child({ component: "subagents" })
  }

  /**
   * Builds the subagent's history (role prompt, recent caller context, task
   * prompt) and runs it to completion. `depth` is the caller's depth; only a
   * top-level caller (depth 0) may spawn.
   */
  public async spawn(task: SubagentTask, options: { context?: readonly ChatMessage[]; depth?: number } = {}): Promise<SubagentRun> {
    const depth = options.depth ?? 0
    if (depth >= 1) throw new DelegationDepthError(depth)

    const id = ulid()
    const profile = SUBAGENT_PROFILES[task.role]
    const model = task.model ?? this.params.model
    const usedTools = task.includeTools && profile.usesTools
    const log = this.log?.child({ subagentId: id, role: task.role })

    const initial: ChatMessage[] = []
    if (profile.systemPrompt) initial.push({ role: "system", content: profile.systemPrompt })
    if (task.includeContext && options.context) {
      initial.push(...recentMessages(options.context, this.limits.contextMessages))
    }
    initial.push({ role: "user", content: subagentTaskPrompt(task) })

    const provider = this.params.createProvider({
      tools: usedTools ? this.params.registry.schemas({ includeDelegation: false }) : [],
    })
    const dispatcher = new ToolDispatcher({
      registry: this.params.registry,
      toolContext: this.params.toolContext,
      onEvent: this.params.onEvent,
      logger: log,
    })

    this.params.onEvent?.({ type: "subagent_start", subagentId: id, role: task.role, description: task.description })
    log?.info({ description: task.description, model, usedTools }, "subagent started")
    const startedAt = Date.now()

    let result: string
    try {
      result = await runSubagentLoop({
        provider,
        model,
        conversation: new Conversation(initial),
        dispatcher,
        depth: depth + 1,
        maxTurns: this.limits.maxTurns,
        maxIterations: this.limits.maxIterations,
        onEvent: this.params.onEvent,
        logger: log,
      })
    } catch (e) {
      const durationMs = Date.now() - startedAt
      this.params.onEvent?.({ type: "subagent_end", subagentId: id, role: task.role, durationMs, ok: false })
      log?.warn({ err: e, durationMs }, "subagent failed")
      throw e
    }

    const durationMs = Date.now() - startedAt
    this.params.onEvent?.({ type: "subagent_end", subagentId: id, role: task.role, durationMs, ok: true })
    log?.info({ durationMs }, "subagent finished")
    return { id, task, agentType: profile.description, model, durationMs, usedTools, result }
  }

  /** `maxResultChars` truncates the result before it is embedded in the JSON block. */
  public async spawnFormatted(
    task: SubagentTask,
    options: { context?: readonly ChatMessage[]; depth?: number; maxResultChars?: number } = {},
  ): Promise<string> {
    const run = await this.spawn(task, options)
    const result = options.maxResultChars === undefined ? run.result : truncate(run.result, options.maxResultChars)
    return formatSubagentResult({ ...run, result })
  }

  /**
   * Runs every task concurrently and returns the formatted results in request
   * order. All tasks run to completion; then the first failure, in request
   * order, is thrown.
   */
  public async spawnAll(tasks: readonly SubagentTask[], context?: readonly ChatMessage[]): Promise<string[]> {
    const settled = await this.spawnAllSettled(tasks, context)
    const outputs: string[] = []
    for (const entry of settled) {
      if (!entry.ok) throw entry.error
      outputs.push(entry.output)
    }
    return outputs
  }

  /** Like {@link spawnAll}, but reports each task's outcome instead of throwing. */
  public async spawnAllSettled(tasks: readonly SubagentTask[], context?: readonly ChatMessage[]): Promise<SettledSubagentRun[]> {
    this.log?.info({ count: tasks.length }, "spawning subagents concurrently")
    const settled = await Promise.allSettled(tasks.map((task) => this.spawnFormatted(task, { context })))
    return settled.map((entry) =>
      entry.status === "fulfilled"
        ? { ok: true, output: entry.value }
        : {
            ok: false,
            error: isAgentError(entry.reason)
              ? entry.reason
              : new SubagentError(`Subagent failed: ${String(entry.reason)}`, { cause: entry.reason }),
          },
    )
  }
}
