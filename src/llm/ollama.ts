import type { ChatMessage } from "../agent/types.js"
import { TransportError, errorMessage } from "../errors.js"
import type { Logger } from "../logger.js"
import type { ToolSchema } from "../tools/types.js"
import { decodeChatStream, type StreamObserver } from "./stream-decoder.js"
import type { ModelCompleteRequest, ModelProvider, ModelResponse } from "./types.js"

export const DEFAULT_OLLAMA_BASE_URL = "http://127.0.0.1:11434"
export const OLLAMA_CHAT_PATH = "/api/chat"

type OllamaMessage =
  | { role: "system"; content: string }
  | { role: "user"; content: string }
  | {
      role: "assistant"
      content: string
      tool_calls?: Array<{
        id: string
        type: "function"
        function: { name: string; arguments: unknown }
      }>
    }
  | { role: "tool"; tool_call_id: string; tool_name: string; content: string }

export type OllamaChatRequest = {
  model: string
  messages: OllamaMessage[]
  stream: boolean
  think: boolean
  tools?: ToolSchema[]
}

export type OllamaProviderOptions = {
  baseUrl?: string
  stream?: boolean
  think?: boolean
  /** When false, the stream observer is never called. */
  verbose?: boolean
  tools?: readonly ToolSchema[]
  lenient?: boolean
  observer?: StreamObserver
  fetch?: typeof fetch
  logger?: Logger
}

function toOllamaMessages(messages: readonly ChatMessage[]): OllamaMessage[] {
  return messages.map((m) => {
    if (m.role === "system") return { role: "system", content: m.content }
    if (m.role === "user") return { role: "user", content: m.content }
    if (m.role === "tool") return { role: "tool", tool_call_id: m.toolCallId, tool_name: m.name, content: m.content }
    if (!m.toolCalls || m.toolCalls.length === 0) return { role: "assistant", content: m.content }
    return {
      role: "assistant",
      content: m.content,
      tool_calls: m.toolCalls.map((tc) => ({
        id: tc.id,
        type: "function",
        function: { name: tc.name, arguments: tc.arguments },
      })),
    }
  })
}

async function* iterateBody(body: NonNullable<Response["body"]>): AsyncGenerator<Uint8Array> {
  const reader = body.getReader()
  try {
    for (;;) {
      const { done, value } = await reader.read()
      if (done) return
      yield value
    }
  } finally {
    reader.releaseLock()
  }
}

export function chatEndpoint(baseUrl: string): string {
  return `${baseUrl.replace(/\/+$/, "")}${OLLAMA_CHAT_PATH}`
}

/**
 * Chat client for the Ollama `/api/chat` protocol. Holds only fixed options,
 * so one instance can serve any number of sequential or concurrent calls.
 */
export class OllamaProvider implements ModelProvider {
  public readonly name = "ollama"

  public constructor(private readonly options: OllamaProviderOptions = {}) {}

  public get tools(): readonly ToolSchema[] {
    return this.options.tools ?? []
  }

  public get url(): string {
    return chatEndpoint(this.options.baseUrl ?? DEFAULT_OLLAMA_BASE_URL)
  }

  public withOptions(overrides: Partial<OllamaProviderOptions>): OllamaProvider {
    return new OllamaProvider({ ...this.options, ...overrides })
  }

  public buildPayload(request: ModelCompleteRequest): OllamaChatRequest {
    const payload: OllamaChatRequest = {
      model: request.model,
      messages: toOllamaMessages(request.messages),
      stream: this.options.stream ?? true,
      think: this.options.think ?? false,
    }
    if (this.tools.length > 0) payload.tools = [...this.tools]
    return payload
  }

  public async complete(request: ModelCompleteRequest): Promise<ModelResponse> {
    const url = this.url
    const doFetch = this.options.fetch ?? fetch
    const log = this.options.logger?.child({ component: "ollama", model: request.model })
    const startedAt = Date.now()
    log?.debug({ url, messages: request.messages.length, tools: this.tools.length }, "chat request")

    let res: Response
    try {
      res = await doFetch(url, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(this.buildPayload(request)),
      })
    } catch (e) {
      throw new TransportError(`Chat request to ${url} failed: ${errorMessage(e)}`, undefined, { cause: e })
    }

    if (!res.ok) {
      const raw = await res.text().catch((e: unknown) => `<unreadable body: ${errorMessage(e)}>`)
      throw new TransportError(`Ollama error ${res.status}: ${raw}`, res.status)
    }
    if (!res.body) {
      throw new TransportError(`Ollama returned an empty body for ${url}`, res.status)
    }

    const response = await decodeChatStream(iterateBody(res.body), {
      observer: this.options.verbose === false ? undefined : this.options.observer,
      lenient: this.options.lenient ?? true,
      logger: log,
    })
    log?.debug(
      { durationMs: Date.now() - startedAt, chars: response.content.length, toolCalls: response.toolCalls?.length ?? 0 },
      "chat response",
    )
    return response
  }
}
