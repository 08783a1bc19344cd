import type { AppConfig } from "../config.js"
import type { Logger } from "../logger.js"
import { createProvider, createSubagentProviderFactory } from "../llm/index.js"
import type { StreamObserver } from "../llm/stream-decoder.js"
import type { ModelProvider, ProviderFactory } from "../llm/types.js"
import { createToolRegistry } from "../tools/index.js"
import type { ToolRegistry } from "../tools/registry.js"
import type { ToolContext } from "../tools/types.js"
import { Conversation } from "./conversation.js"
import { ToolDispatcher } from "./dispatcher.js"
import { SubagentOrchestrator, type SettledSubagentRun, type SubagentRun } from "./orchestrator.js"
import { runAgentTurn } from "./run-task.js"
import type { SubagentTask } from "./subagents.js"
import type { AgentEventHandler, TurnState } from "./types.js"

export type FanOutMode = "all-or-nothing" | "settled"

export type FanOutResult =
  | { mode: "all-or-nothing"; outputs: string[] }
  | { mode: "settled"; outcomes: SettledSubagentRun[] }

export function toolContextFromConfig(config: AppConfig): ToolContext {
  return {
    workspaceRoot: config.workspaceRoot,
    enableShell: config.enableShell,
    enableWrite: config.enableWrite,
    maxFileReadChars: config.maxFileReadChars,
    maxToolOutputChars: config.maxToolOutputChars,
  }
}

/**
 * The top-level agent: one conversation, one client, one dispatcher at depth 0
 * wired to a subagent orchestrator. Turns must not overlap.
 */
export class AgentSession {
  public readonly conversation: Conversation
  private readonly dispatcher: ToolDispatcher
  private readonly systemPrompt?: string
  private busy = false

  public constructor(
    private readonly params: {
      provider: ModelProvider
      model: string
      registry: ToolRegistry
      orchestrator: SubagentOrchestrator
      toolContext: ToolContext
      systemPrompt?: string
      maxIterations?: number
      onEvent?: AgentEventHandler
      onStateChange?: (state: TurnState) => void
      logger?: Logger
    },
  ) {
    this.systemPrompt = params.systemPrompt
    this.conversation = new Conversation(params.systemPrompt ? [{ role: "system", content: params.systemPrompt }] : [])
    this.dispatcher = new ToolDispatcher({
      registry: params.registry,
      toolContext: params.toolContext,
      spawner: {
        spawnFormatted: (task, options) =>
          params.orchestrator.spawnFormatted(task, { ...options, context: this.conversation.messages }),
      },
      onEvent: params.onEvent,
      logger: params.logger,
    })
  }

  /** Runs one user turn. On failure the history keeps what was appended. */
  public async invoke(prompt: string): Promise<string> {
    if (this.busy) throw new Error("A turn is already running in this session")
    this.busy = true
    try {
      const { finalText } = await runAgentTurn({
        provider: this.params.provider,
        model: this.params.model,
        conversation: this.conversation,
        userInput: prompt,
        dispatcher: this.dispatcher,
        maxIterations: this.params.maxIterations,
        onEvent: this.params.onEvent,
        onStateChange: this.params.onStateChange,
        logger: this.params.logger,
      })
      return finalText
    } finally {
      this.busy = false
    }
  }

  /** Empties the history, keeping the system prompt. */
  public clear(): void {
    this.conversation.clear()
    if (this.systemPrompt) this.conversation.append({ role: "system", content: this.systemPrompt })
  }

  public async spawnTask(task: SubagentTask): Promise<SubagentRun> {
    return this.params.orchestrator.spawn(task, { context: this.conversation.messages })
  }

  public async spawnTasks(tasks: readonly SubagentTask[], mode: FanOutMode = "all-or-nothing"): Promise<FanOutResult> {
    const context = this.conversation.messages
    if (mode === "settled") {
      return { mode, outcomes: await this.params.orchestrator.spawnAllSettled(tasks, context) }
    }
    return { mode, outputs: await this.params.orchestrator.spawnAll(tasks, context) }
  }
}

/** Wires a session from configuration. `createSubagentProvider` and `fetch` exist for tests. */
export function createAgentSession(
  config: AppConfig,
  options: {
    systemPrompt?: string
    registry?: ToolRegistry
    provider?: ModelProvider
    createSubagentProvider?: ProviderFactory
    observer?: StreamObserver
    onEvent?: AgentEventHandler
    onStateChange?: (state: TurnState) => void
    fetch?: typeof fetch
    logger?: Logger
  } = {},
): AgentSession {
  const registry = options.registry ?? createToolRegistry()
  const toolContext = toolContextFromConfig(config)
  const provider =
    options.provider ??
    createProvider(config, { tools: registry.schemas(), observer: options.observer, fetch: options.fetch, logger: options.logger })
  const orchestrator = new SubagentOrchestrator({
    createProvider:
      options.createSubagentProvider ?? createSubagentProviderFactory(config, { fetch: options.fetch, logger: options.logger }),
    registry,
    toolContext,
    model: config.model,
    limits: {
      maxTurns: config.subagentMaxTurns,
      maxIterations: config.subagentMaxIterations,
      contextMessages: config.subagentContextMessages,
    },
    onEvent: options.onEvent,
    logger: options.logger,
  })
  return new AgentSession({
    provider,
    model: config.model,
    registry,
    orchestrator,
    toolContext,
    systemPrompt: options.systemPrompt,
    maxIterations: config.maxIterations,
    onEvent: options.onEvent,
    onStateChange: options.onStateChange,
    logger: options.logger,
  })
}
