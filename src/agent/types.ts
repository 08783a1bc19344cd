export type ToolCall = {
  id: string
  name: string
  arguments: unknown
}

export type ChatMessage =
  | { role: "system"; content: string }
  | { role: "user"; content: string }
  | { role: "assistant"; content: string; toolCalls?: readonly ToolCall[] }
  | { role: "tool"; toolCallId: string; name: string; content: string }

export type AssistantMessage = Extract<ChatMessage, { role: "assistant" }>
export type ToolMessage = Extract<ChatMessage, { role: "tool" }>

export type AgentEvent =
  | { type: "tool_call"; toolName: string; args: unknown; depth: number }
  | { type: "tool_result"; toolName: string; result: string; depth: number }
  | { type: "assistant_message"; content: string; depth: number }
  | { type: "error"; message: string; depth: number }
  | { type: "subagent_start"; subagentId: string; role: string; description: string }
  | { type: "subagent_end"; subagentId: string; role: string; durationMs: number; ok: boolean }

export type AgentEventHandler = (event: AgentEvent) => void

export type TurnState = "AwaitingModel" | "DispatchingTools" | "Done" | "Failed"
