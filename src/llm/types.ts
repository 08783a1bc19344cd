import type { ToolSchema } from "../tools/types.js"
import type { ChatMessage, ToolCall } from "../agent/types.js"

/** One aggregated model reply. `toolCalls` is either absent or non-empty. */
export type ModelResponse = {
  content: string
  toolCalls?: ToolCall[]
}

export type ModelCompleteRequest = {
  model: string
  messages: readonly ChatMessage[]
}

export interface ModelProvider {
  readonly name: string
  /** Tool schemas advertised to the model on every request. */
  readonly tools: readonly ToolSchema[]
  complete(request: ModelCompleteRequest): Promise<ModelResponse>
}

/** Builds a fresh client for one agent, e.g. a tool-less one for a subagent. */
export type ProviderFactory = (options: { tools: readonly ToolSchema[] }) => ModelProvider
