import { IterationLimitError, SubagentError } from "../errors.js"
import type { Logger } from "../logger.js"
import type { ModelProvider } from "../llm/types.js"
import type { Conversation } from "./conversation.js"
import type { ToolDispatcher } from "./dispatcher.js"
import type { AgentEventHandler, ToolCall, TurnState } from "./types.js"

export const MAX_TOOL_ITERATIONS = 5
export const MAX_SUBAGENT_TURNS = 10

/**
 * How a failed tool dispatch is treated. The top-level loop fails fast;
 * a subagent degrades the failure into a tool message and keeps going.
 */
export type ToolFailurePolicy = "fail-fast" | "degrade"

type LoopParams = {
  provider: ModelProvider
  model: string
  conversation: Conversation
  dispatcher: ToolDispatcher
  onEvent?: AgentEventHandler
  logger?: Logger
}

type StepResult = { done: true; content: string } | { done: false }

/**
 * One iteration: call the model with the whole history, then either record the
 * final answer or record the tool calls and dispatch each, in order.
 */
async function step(params: LoopParams, policy: ToolFailurePolicy, depth: number, onState?: (state: TurnState) => void): Promise<StepResult> {
  onState?.("AwaitingModel")
  const response = await params.provider.complete({ model: params.model, messages: params.conversation.messages })

  if (!response.toolCalls || response.toolCalls.length === 0) {
    params.conversation.append({ role: "assistant", content: response.content })
    params.onEvent?.({ type: "assistant_message", content: response.content, depth })
    return { done: true, content: response.content }
  }

  const toolCalls: readonly ToolCall[] = response.toolCalls
  params.conversation.append({ role: "assistant", content: response.content, toolCalls })
  onState?.("DispatchingTools")

  for (const call of toolCalls) {
    const outcome = await params.dispatcher.dispatch(call, { depth })
    params.conversation.append({ role: "tool", toolCallId: call.id, name: call.name, content: outcome.content })
    if (outcome.status === "failed" && policy === "fail-fast") throw outcome.error
  }
  return { done: false }
}

/**
 * Drives one top-level user turn: append the prompt, then iterate
 * model-call/dispatch until the model answers without tool calls.
 *
 * Throws `IterationLimitError` after `maxIterations` model calls that all
 * requested tools, and rethrows transport and tool failures. The conversation
 * keeps whatever was appended before the failure.
 */
export async function runAgentTurn(
  params: LoopParams & {
    userInput: string
    maxIterations?: number
    onStateChange?: (state: TurnState) => void
  },
): Promise<{ finalText: string; iterations: number }> {
  const maxIterations = params.maxIterations ?? MAX_TOOL_ITERATIONS
  const log = params.logger?.child({ component: "agent-loop" })
  params.conversation.append({ role: "user", content: params.userInput })

  try {
    for (let iteration = 1; iteration <= maxIterations; iteration += 1) {
      const result = await step(params, "fail-fast", 0, params.onStateChange)
      if (result.done) {
        params.onStateChange?.("Done")
        log?.debug({ iterations: iteration }, "turn complete")
        return { finalText: result.content, iterations: iteration }
      }
    }
    log?.warn({ maxIterations }, "iteration ceiling reached")
    throw new IterationLimitError(maxIterations)
  } catch (e) {
    params.onStateChange?.("Failed")
    params.onEvent?.({ type: "error", message: e instanceof Error ? e.message : String(e), depth: 0 })
    throw e
  }
}

/**
 * The subagent variant. Tool failures become tool messages. Each model call
 * counts against both `maxTurns` and `maxIterations`: running out of turns
 * returns the last assistant content seen, running out of iterations throws.
 */
export async function runSubagentLoop(
  params: LoopParams & {
    depth: number
    maxTurns?: number
    maxIterations?: number
  },
): Promise<string> {
  const maxTurns = params.maxTurns ?? MAX_SUBAGENT_TURNS
  const maxIterations = params.maxIterations ?? MAX_TOOL_ITERATIONS

  for (let call = 1; call <= maxTurns; call += 1) {
    if (call > maxIterations) {
      params.logger?.warn({ maxIterations }, "subagent iteration ceiling reached")
      throw new IterationLimitError(maxIterations, "Subagent: Too many iterations in one turn")
    }
    const result = await step(params, "degrade", params.depth)
    if (result.done) return result.content
  }

  params.logger?.warn({ maxTurns }, "subagent turn ceiling reached")
  const last = params.conversation.lastAssistant()
  if (last) return last.content
  throw new SubagentError("Subagent: No response generated")
}
