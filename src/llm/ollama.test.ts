import os from "node:os"
import path from "node:path"
import { describe, expect, it } from "vitest"
import type { ChatMessage } from "../agent/types.js"
import { loadConfig } from "../config.js"
import { TransportError } from "../errors.js"
import { toToolSchema } from "../tools/types.js"
import { createSubagentProviderFactory } from "./index.js"
import { OllamaProvider, chatEndpoint } from "./ollama.js"

type RecordedRequest = { url: string; method?: string; body: unknown }

function fakeFetch(respond: () => Response): { impl: typeof fetch; requests: RecordedRequest[] } {
  const requests: RecordedRequest[] = []
  const impl: typeof fetch = async (input, init) => {
    requests.push({ url: String(input), method: init?.method, body: JSON.parse(String(init?.body)) })
    return respond()
  }
  return { impl, requests }
}

function ndjsonResponse(...chunks: unknown[]): Response {
  return new Response(chunks.map((c) => `${JSON.stringify(c)}\n`).join(""), {
    status: 200,
    headers: { "Content-Type": "application/x-ndjson" },
  })
}

const echoTool = toToolSchema({
  name: "echo",
  description: "Echo the input",
  parametersJsonSchema: { type: "object", properties: { text: { type: "string" } }, required: ["text"] },
})

describe("chatEndpoint", () => {
  it("appends the chat path once", () => {
    expect(chatEndpoint("http://localhost:11434/")).toBe("http://localhost:11434/api/chat")
    expect(chatEndpoint("http://gpu-box:8080")).toBe("http://gpu-box:8080/api/chat")
  })
})

describe("OllamaProvider", () => {
  it("posts a streaming request without tools and decodes the reply", async () => {
    const fetch = fakeFetch(() => ndjsonResponse({ message: { content: "Hi" } }, { message: { content: "!" } }, { done: true }))
    const provider = new OllamaProvider({ fetch: fetch.impl })

    const response = await provider.complete({ model: "qwen3", messages: [{ role: "user", content: "hello" }] })

    expect(response).toEqual({ content: "Hi!" })
    expect(fetch.requests).toEqual([
      {
        url: "http://127.0.0.1:11434/api/chat",
        method: "POST",
        body: { model: "qwen3", messages: [{ role: "user", content: "hello" }], stream: true, think: false },
      },
    ])
  })

  it("sends configured tools and flags", async () => {
    const fetch = fakeFetch(() => ndjsonResponse({ done: true }))
    const provider = new OllamaProvider({ fetch: fetch.impl, baseUrl: "http://gpu-box:8080", tools: [echoTool], stream: false, think: true })

    await provider.complete({ model: "llama3", messages: [] })

    expect(fetch.requests[0]?.url).toBe("http://gpu-box:8080/api/chat")
    expect(fetch.requests[0]?.body).toEqual({ model: "llama3", messages: [], stream: false, think: true, tools: [echoTool] })
  })

  it("maps assistant tool calls and tool results to the wire format", () => {
    const provider = new OllamaProvider()
    const messages: ChatMessage[] = [
      { role: "system", content: "be brief" },
      { role: "user", content: "what is 2+2?" },
      { role: "assistant", content: "", toolCalls: [{ id: "call_1", name: "calculator", arguments: { expression: "2+2" } }] },
      { role: "tool", toolCallId: "call_1", name: "calculator", content: "4" },
    ]

    expect(provider.buildPayload({ model: "qwen3", messages }).messages).toEqual([
      { role: "system", content: "be brief" },
      { role: "user", content: "what is 2+2?" },
      {
        role: "assistant",
        content: "",
        tool_calls: [{ id: "call_1", type: "function", function: { name: "calculator", arguments: { expression: "2+2" } } }],
      },
      { role: "tool", tool_call_id: "call_1", tool_name: "calculator", content: "4" },
    ])
  })

  it("raises TransportError with status and body on a non-2xx reply", async () => {
    const fetch = fakeFetch(() => new Response("model 'nope' not found", { status: 404 }))
    const provider = new OllamaProvider({ fetch: fetch.impl })

    const error = await provider.complete({ model: "nope", messages: [] }).catch((e: unknown) => e)

    expect(error).toBeInstanceOf(TransportError)
    if (!(error instanceof TransportError)) return
    expect(error.status).toBe(404)
    expect(error.message).toBe("Ollama error 404: model 'nope' not found")
  })

  it("raises TransportError when the request cannot be sent", async () => {
    const failingFetch: typeof fetch = async () => {
      throw new Error("connect ECONNREFUSED")
    }
    const provider = new OllamaProvider({ fetch: failingFetch })

    await expect(provider.complete({ model: "qwen3", messages: [] })).rejects.toThrow(
      "Chat request to http://127.0.0.1:11434/api/chat failed: connect ECONNREFUSED",
    )
  })

  it("does not call the observer when not verbose", async () => {
    const seen: string[] = []
    const observer = { onContent: (fragment: string) => seen.push(fragment) }
    const reply = () => ndjsonResponse({ message: { content: "quiet" } }, { done: true })

    await new OllamaProvider({ fetch: fakeFetch(reply).impl, observer, verbose: false }).complete({ model: "m", messages: [] })
    expect(seen).toEqual([])

    await new OllamaProvider({ fetch: fakeFetch(reply).impl, observer }).complete({ model: "m", messages: [] })
    expect(seen).toEqual(["quiet"])
  })

  it("creates variants with withOptions without changing the original", () => {
    const base = new OllamaProvider({ tools: [echoTool] })
    const bare = base.withOptions({ tools: [] })

    expect(base.tools).toEqual([echoTool])
    expect(bare.tools).toEqual([])
  })
})

describe("createSubagentProviderFactory", () => {
  const config = loadConfig({ provider: "ollama", workspaceRoot: path.join(os.tmpdir(), "taskforce-llm-absent") }, {})

  it("decodes the single object a tool-less subagent client receives", async () => {
    const fetch = fakeFetch(
      () =>
        new Response(JSON.stringify({ model: "qwen3", message: { role: "assistant", content: "the answer" }, done: true }), {
          status: 200,
          headers: { "Content-Type": "application/json" },
        }),
    )
    const provider = createSubagentProviderFactory(config, { fetch: fetch.impl })({ tools: [] })

    const response = await provider.complete({ model: "qwen3", messages: [{ role: "user", content: "Task: a\n\nDetails:\nb" }] })

    expect(response).toEqual({ content: "the answer" })
    expect(fetch.requests[0]?.body).toEqual({
      model: "qwen3",
      messages: [{ role: "user", content: "Task: a\n\nDetails:\nb" }],
      stream: false,
      think: false,
    })
  })
})
