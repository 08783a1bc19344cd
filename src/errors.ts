export type AgentErrorCode =
  | "TRANSPORT"
  | "PROTOCOL"
  | "TOOL_NOT_FOUND"
  | "TOOL_EXECUTION"
  | "ITERATION_LIMIT"
  | "SUBAGENT"
  | "DELEGATION_DEPTH"
  | "CONVERSATION"
  | "CONFIG"

export class AgentError extends Error {
  public constructor(
    public readonly code: AgentErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options)
    this.name = "AgentError"
  }
}

/** Network or HTTP failure talking to the chat endpoint. Fatal for the call. */
export class TransportError extends AgentError {
  public constructor(
    message: string,
    public readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super("TRANSPORT", message, options)
    this.name = "TransportError"
  }
}

/** Only raised when the stream decoder runs in strict mode. */
export class ProtocolError extends AgentError {
  public constructor(message: string, public readonly line: string) {
    super("PROTOCOL", message)
    this.name = "ProtocolError"
  }
}

export class ToolNotFoundError extends AgentError {
  public constructor(public readonly toolName: string) {
    super("TOOL_NOT_FOUND", `Tool not found: ${toolName}`)
    this.name = "ToolNotFoundError"
  }
}

export class ToolExecutionError extends AgentError {
  public constructor(
    public readonly toolName: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super("TOOL_EXECUTION", message, options)
    this.name = "ToolExecutionError"
  }
}

export class IterationLimitError extends AgentError {
  public constructor(
    public readonly limit: number,
    message = "Too many tool call iterations",
  ) {
    super("ITERATION_LIMIT", message)
    this.name = "IterationLimitError"
  }
}

export class SubagentError extends AgentError {
  public constructor(message: string, options?: { cause?: unknown }) {
    super("SUBAGENT", message, options)
    this.name = "SubagentError"
  }
}

export class DelegationDepthError extends AgentError {
  public constructor(public readonly depth: number) {
    super("DELEGATION_DEPTH", `Subagents cannot spawn additional subagents (delegation depth ${depth})`)
    this.name = "DelegationDepthError"
  }
}

export class ConversationError extends AgentError {
  public constructor(message: string) {
    super("CONVERSATION", message)
    this.name = "ConversationError"
  }
}

export class ConfigError extends AgentError {
  public constructor(message: string, options?: { cause?: unknown }) {
    super("CONFIG", message, options)
    this.name = "ConfigError"
  }
}

export function isAgentError(value: unknown): value is AgentError {
  return value instanceof AgentError
}

export function errorMessage(value: unknown): string {
  return value instanceof Error ? value.message : String(value)
}
