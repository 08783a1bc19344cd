export * from "./errors.js"
export { makeLogger, makeNoopLogger, type Logger } from "./logger.js"
export { loadConfig, loadSettingsFile, type AppConfig, type ProviderName } from "./config.js"

export type { AgentEvent, AgentEventHandler, ChatMessage, ToolCall, TurnState } from "./agent/types.js"
export { Conversation, recentMessages } from "./agent/conversation.js"
export { ToolDispatcher, RECURSION_REJECTION, type DispatchOutcome, type SubagentSpawner } from "./agent/dispatcher.js"
export { runAgentTurn, runSubagentLoop, MAX_TOOL_ITERATIONS, MAX_SUBAGENT_TURNS } from "./agent/run-task.js"
export {
  SubagentOrchestrator,
  formatSubagentResult,
  type SettledSubagentRun,
  type SubagentLimits,
  type SubagentRun,
} from "./agent/orchestrator.js"
export {
  SUBAGENT_PROFILES,
  SUBAGENT_ROLES,
  createSubagentTask,
  parseSubagentRole,
  type SubagentRole,
  type SubagentTask,
} from "./agent/subagents.js"
export { AgentSession, createAgentSession, type FanOutMode, type FanOutResult } from "./agent/session.js"
export { buildSystemPrompt } from "./agent/prompt.js"

export { ChatStreamDecoder, decodeChatStream, type DecodeOptions, type StreamObserver } from "./llm/stream-decoder.js"
export { OllamaProvider, chatEndpoint, type OllamaProviderOptions } from "./llm/ollama.js"
export { MockProvider, type MockStep } from "./llm/mock.js"
export { createProvider, createSubagentProviderFactory } from "./llm/index.js"
export type { ModelProvider, ModelResponse, ProviderFactory } from "./llm/types.js"

export { ToolRegistry, type ToolEntry } from "./tools/registry.js"
export { createBuiltInTools, createToolRegistry } from "./tools/index.js"
export type { ToolContext, ToolDefinition, ToolSchema } from "./tools/types.js"
