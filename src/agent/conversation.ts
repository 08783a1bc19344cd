import { ConversationError } from "../errors.js"
import type { AssistantMessage, ChatMessage } from "./types.js"

/**
 * Append-only, insertion-ordered message log. Messages are frozen on append.
 *
 * A `tool` message is only accepted directly after the assistant message that
 * requested it (or after sibling tool messages answering the same assistant
 * message), and its `toolCallId` must name one of that message's calls.
 */
export class Conversation {
  private readonly log: ChatMessage[] = []

  public constructor(initial: readonly ChatMessage[] = []) {
    for (const message of initial) this.append(message)
  }

  public get messages(): readonly ChatMessage[] {
    return this.log
  }

  public get length(): number {
    return this.log.length
  }

  public append(message: ChatMessage): void {
    if (message.role === "tool") {
      const owner = this.pendingToolCallOwner()
      if (!owner?.toolCalls?.some((call) => call.id === message.toolCallId)) {
        throw new ConversationError(
          `Tool result ${message.toolCallId} does not answer a call of the preceding assistant message`,
        )
      }
    }
    const frozen: ChatMessage =
      message.role === "assistant" && message.toolCalls
        ? { ...message, toolCalls: Object.freeze([...message.toolCalls]) }
        : { ...message }
    this.log.push(Object.freeze(frozen))
  }

  public lastAssistant(): AssistantMessage | undefined {
    for (let i = this.log.length - 1; i >= 0; i -= 1) {
      const message = this.log[i]
      if (message?.role === "assistant") return message
    }
    return undefined
  }

  /** See {@link recentMessages}. */
  public recent(limit: number): ChatMessage[] {
    return recentMessages(this.log, limit)
  }

  public clear(): void {
    this.log.length = 0
  }

  private pendingToolCallOwner(): AssistantMessage | undefined {
    for (let i = this.log.length - 1; i >= 0; i -= 1) {
      const message = this.log[i]
      if (message?.role === "tool") continue
      return message?.role === "assistant" ? message : undefined
    }
    return undefined
  }
}

/**
 * The last `limit` non-system messages of `messages`, with leading tool results
 * dropped when the assistant message they answer fell outside the window.
 */
export function recentMessages(messages: readonly ChatMessage[], limit: number): ChatMessage[] {
  if (limit <= 0) return []
  const window = messages.filter((m) => m.role !== "system").slice(-limit)
  let start = 0
  while (start < window.length && window[start]?.role === "tool") start += 1
  return window.slice(start)
}
