import { TextDecoder } from "node:util"
import { ulid } from "ulid"
import { z } from "zod"
import type { ToolCall } from "../agent/types.js"
import { ProtocolError, TransportError, errorMessage } from "../errors.js"
import type { Logger } from "../logger.js"
import type { ModelResponse } from "./types.js"

export type StreamPhase = "idle" | "reasoning" | "responding"

/** UI hooks. Advisory only: nothing they do changes what gets decoded. */
export interface StreamObserver {
  onReasoningStart?(): void
  onReasoningLine?(line: string): void
  onReasoningEnd?(): void
  onResponseStart?(): void
  onContent?(fragment: string): void
}

export type DecodeOptions = {
  observer?: StreamObserver
  /** Skip lines that are not valid chunks instead of failing the call. Defaults to true. */
  lenient?: boolean
  logger?: Logger
  createId?: () => string
}

const WireToolCallSchema = z.object({
  id: z.string().optional(),
  function: z.object({
    name: z.string(),
    arguments: z.unknown().optional(),
  }),
})

const ChunkSchema = z.object({
  message: z
    .object({
      content: z.string().nullish(),
      thinking: z.string().nullish(),
      tool_calls: z.array(WireToolCallSchema).nullish(),
    })
    .nullish(),
  done: z.boolean().optional(),
})

export type StreamChunk = z.infer<typeof ChunkSchema>

function normalizeArguments(raw: unknown): unknown {
  if (raw === undefined || raw === null) return {}
  if (typeof raw !== "string") return raw
  if (raw.trim() === "") return {}
  try {
    return JSON.parse(raw)
  } catch {
    // Left as a string; the dispatcher reports it to the model.
    return raw
  }
}

/**
 * Incremental decoder for a newline-delimited JSON chat stream.
 *
 * Feed raw byte chunks with `push`; call `finish` once the source ends.
 * Lines may span chunks and multi-byte characters may be split across them.
 */
export class ChatStreamDecoder {
  private readonly text = new TextDecoder("utf-8")
  private readonly observer: StreamObserver
  private readonly lenient: boolean
  private readonly createId: () => string

  private pending = ""
  private phase: StreamPhase = "idle"
  private reasoning = ""
  private content = ""
  private readonly toolCalls: ToolCall[] = []
  private readonly seenIds = new Set<string>()
  private finished = false
  private skipped = 0

  public constructor(private readonly options: DecodeOptions = {}) {
    this.observer = options.observer ?? {}
    this.lenient = options.lenient ?? true
    this.createId = options.createId ?? (() => `call_${ulid()}`)
  }

  public get currentPhase(): StreamPhase {
    return this.phase
  }

  /** True once a `done` chunk has been seen; further input is ignored. */
  public get done(): boolean {
    return this.finished
  }

  public get skippedLines(): number {
    return this.skipped
  }

  public push(bytes: Uint8Array): void {
    if (this.finished) return
    this.pending += this.text.decode(bytes, { stream: true })
    let newline = this.pending.indexOf("\n")
    while (newline >= 0 && !this.finished) {
      const line = this.pending.slice(0, newline)
      this.pending = this.pending.slice(newline + 1)
      this.consumeLine(line)
      newline = this.pending.indexOf("\n")
    }
  }

  public finish(): ModelResponse {
    if (!this.finished) {
      this.pending += this.text.decode()
      const rest = this.pending
      this.pending = ""
      this.consumeLine(rest)
    }
    this.pending = ""

    if (this.reasoning.length > 0) {
      this.observer.onReasoningLine?.(this.reasoning)
      this.reasoning = ""
    }
    if (this.phase === "reasoning") this.observer.onReasoningEnd?.()

    return this.toolCalls.length > 0
      ? { content: this.content, toolCalls: [...this.toolCalls] }
      : { content: this.content }
  }

  private consumeLine(raw: string): void {
    const line = raw.trim()
    if (!line) return

    let chunk: StreamChunk
    try {
      const parsed = ChunkSchema.safeParse(JSON.parse(line))
      if (!parsed.success) throw new Error(parsed.error.issues.map((i) => i.message).join("; "))
      chunk = parsed.data
    } catch (e) {
      if (!this.lenient) throw new ProtocolError(`Malformed stream chunk: ${errorMessage(e)}`, line)
      this.skipped += 1
      this.options.logger?.debug({ line: line.slice(0, 200), reason: errorMessage(e) }, "skipped malformed stream chunk")
      return
    }

    this.consumeChunk(chunk)
  }

  private consumeChunk(chunk: StreamChunk): void {
    const message = chunk.message
    for (const call of message?.tool_calls ?? []) {
      let id = call.id && call.id.length > 0 ? call.id : this.createId()
      while (this.seenIds.has(id)) id = this.createId()
      this.seenIds.add(id)
      this.toolCalls.push({ id, name: call.function.name, arguments: normalizeArguments(call.function.arguments) })
    }

    const thinking = message?.thinking
    const fragment = message?.content
    if (thinking) this.onThinking(thinking)
    else if (fragment) this.onContent(fragment)

    // A non-streamed reply arrives as a single done chunk carrying the whole message.
    if (chunk.done === true) this.finished = true
  }

  private onThinking(fragment: string): void {
    if (this.phase === "idle") {
      this.phase = "reasoning"
      this.observer.onReasoningStart?.()
    }
    this.reasoning += fragment
    let newline = this.reasoning.indexOf("\n")
    while (newline >= 0) {
      this.observer.onReasoningLine?.(this.reasoning.slice(0, newline))
      this.reasoning = this.reasoning.slice(newline + 1)
      newline = this.reasoning.indexOf("\n")
    }
  }

  private onContent(fragment: string): void {
    if (this.phase === "idle") {
      this.phase = "responding"
      this.observer.onResponseStart?.()
    } else if (this.phase === "reasoning") {
      if (this.reasoning.length > 0) {
        this.observer.onReasoningLine?.(this.reasoning)
        this.reasoning = ""
      }
      this.observer.onReasoningEnd?.()
      this.phase = "responding"
      this.observer.onResponseStart?.()
    }
    this.content += fragment
    this.observer.onContent?.(fragment)
  }
}

/**
 * Drains `source` through a {@link ChatStreamDecoder}. Stops reading at the
 * first `done` chunk. Errors raised by the source surface as `TransportError`.
 */
export async function decodeChatStream(
  source: AsyncIterable<Uint8Array>,
  options: DecodeOptions = {},
): Promise<ModelResponse> {
  const decoder = new ChatStreamDecoder(options)
  const iterator = source[Symbol.asyncIterator]()
  let exhausted = false
  try {
    for (;;) {
      let next: IteratorResult<Uint8Array>
      try {
        next = await iterator.next()
      } catch (e) {
        exhausted = true
        throw new TransportError(`Chat stream interrupted: ${errorMessage(e)}`, undefined, { cause: e })
      }
      if (next.done) {
        exhausted = true
        break
      }
      decoder.push(next.value)
      if (decoder.done) break
    }
  } finally {
    if (!exhausted) {
      const closing = iterator.return?.()
      if (closing) {
        await closing.catch((e: unknown) => options.logger?.debug({ err: e }, "failed to close chat stream"))
      }
    }
  }
  return decoder.finish()
}
