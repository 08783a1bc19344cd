import { describe, expect, it } from "vitest"
import { IterationLimitError, SubagentError, ToolNotFoundError, TransportError } from "../errors.js"
import { MockProvider } from "../llm/mock.js"
import { makeNoopLogger } from "../logger.js"
import type { ModelProvider } from "../llm/types.js"
import { createCalculatorTools } from "../tools/calculator.js"
import { ToolRegistry } from "../tools/registry.js"
import { createDelegationTool } from "../tools/task.js"
import type { ToolContext } from "../tools/types.js"
import { Conversation } from "./conversation.js"
import { RECURSION_REJECTION, ToolDispatcher } from "./dispatcher.js"
import { runAgentTurn, runSubagentLoop } from "./run-task.js"
import type { ToolCall, TurnState } from "./types.js"

const toolContext: ToolContext = {
  workspaceRoot: "/tmp/taskforce-loop",
  enableShell: false,
  enableWrite: false,
  maxFileReadChars: 1_000,
  maxToolOutputChars: 1_000,
}

const registry = new ToolRegistry(createCalculatorTools(), createDelegationTool())

function calc(id: string, expression: string): ToolCall {
  return { id, name: "calculator", arguments: { expression } }
}

function dispatcher(): ToolDispatcher {
  return new ToolDispatcher({ registry, toolContext })
}

describe("runAgentTurn", () => {
  it("answers after one tool round trip", async () => {
    const provider = new MockProvider([{ content: "", toolCalls: [calc("call_1", "2+2")] }, { content: "The answer is 4." }])
    const conversation = new Conversation([{ role: "system", content: "You can use tools." }])
    const states: TurnState[] = []

    const result = await runAgentTurn({
      provider,
      model: "qwen3",
      conversation,
      userInput: "What is 2+2?",
      dispatcher: dispatcher(),
      onStateChange: (s) => states.push(s),
      logger: makeNoopLogger(),
    })

    expect(result).toEqual({ finalText: "The answer is 4.", iterations: 2 })
    expect(provider.calls).toBe(2)
    expect(states).toEqual(["AwaitingModel", "DispatchingTools", "AwaitingModel", "Done"])
    expect(conversation.messages).toEqual([
      { role: "system", content: "You can use tools." },
      { role: "user", content: "What is 2+2?" },
      { role: "assistant", content: "", toolCalls: [calc("call_1", "2+2")] },
      { role: "tool", toolCallId: "call_1", name: "calculator", content: "4" },
      { role: "assistant", content: "The answer is 4." },
    ])
    expect(provider.requests[1]?.messages.at(-1)).toEqual({ role: "tool", toolCallId: "call_1", name: "calculator", content: "4" })
  })

  it("dispatches several calls of one reply in order", async () => {
    const provider = new MockProvider([
      { content: "", toolCalls: [calc("call_a", "1+1"), calc("call_b", "3*3")] },
      { content: "2 and 9" },
    ])
    const conversation = new Conversation()

    await runAgentTurn({ provider, model: "qwen3", conversation, userInput: "two sums", dispatcher: dispatcher() })

    expect(conversation.messages.filter((m) => m.role === "tool").map((m) => m.content)).toEqual(["2", "9"])
  })

  it("stops after exactly five model calls when every reply asks for tools", async () => {
    const provider = new MockProvider([], [], { content: "", toolCalls: [calc("call_loop", "1+1")] })
    const states: TurnState[] = []

    const turn = runAgentTurn({
      provider,
      model: "qwen3",
      conversation: new Conversation(),
      userInput: "loop forever",
      dispatcher: dispatcher(),
      onStateChange: (s) => states.push(s),
    })

    await expect(turn).rejects.toThrow(IterationLimitError)
    await expect(turn).rejects.toThrow("Too many tool call iterations")
    expect(provider.calls).toBe(5)
    expect(states.at(-1)).toBe("Failed")
  })

  it("honours a custom iteration ceiling", async () => {
    const provider = new MockProvider([], [], { content: "", toolCalls: [calc("call_loop", "1+1")] })

    await expect(
      runAgentTurn({
        provider,
        model: "qwen3",
        conversation: new Conversation(),
        userInput: "loop",
        dispatcher: dispatcher(),
        maxIterations: 2,
      }),
    ).rejects.toThrow(IterationLimitError)
    expect(provider.calls).toBe(2)
  })

  it("aborts on an unknown tool and keeps the history", async () => {
    const provider = new MockProvider([{ content: "", toolCalls: [{ id: "call_1", name: "teleport", arguments: {} }] }])
    const conversation = new Conversation()

    await expect(
      runAgentTurn({ provider, model: "qwen3", conversation, userInput: "beam me up", dispatcher: dispatcher() }),
    ).rejects.toThrow(ToolNotFoundError)

    expect(provider.calls).toBe(1)
    expect(conversation.messages.map((m) => m.role)).toEqual(["user", "assistant", "tool"])
    expect(conversation.messages.at(-1)?.content).toBe("Tool not found: teleport")
  })

  it("propagates transport failures", async () => {
    const provider: ModelProvider = {
      name: "down",
      tools: [],
      complete: async () => {
        throw new TransportError("Chat request to http://127.0.0.1:11434/api/chat failed: connect ECONNREFUSED")
      },
    }
    const conversation = new Conversation()

    await expect(
      runAgentTurn({ provider, model: "qwen3", conversation, userInput: "hello", dispatcher: dispatcher() }),
    ).rejects.toThrow(TransportError)
    expect(conversation.messages).toEqual([{ role: "user", content: "hello" }])
  })
})

describe("runSubagentLoop", () => {
  function subagentDispatcher(): ToolDispatcher {
    return new ToolDispatcher({ registry, toolContext })
  }

  it("turns tool failures into tool messages and keeps going", async () => {
    const provider = new MockProvider([
      { content: "", toolCalls: [{ id: "call_1", name: "teleport", arguments: {} }] },
      { content: "Could not teleport, so here is a summary." },
    ])
    const conversation = new Conversation([{ role: "user", content: "Task: move\n\nDetails:\nGo" }])

    const result = await runSubagentLoop({ provider, model: "qwen3", conversation, dispatcher: subagentDispatcher(), depth: 1 })

    expect(result).toBe("Could not teleport, so here is a summary.")
    expect(conversation.messages[2]).toEqual({ role: "tool", toolCallId: "call_1", name: "teleport", content: "Tool not found: teleport" })
  })

  it("refuses nested delegation with a tool message", async () => {
    const provider = new MockProvider([
      {
        content: "",
        toolCalls: [{ id: "call_1", name: "task", arguments: { subagent_type: "explore", description: "d", prompt: "p" } }],
      },
      { content: "Did it myself." },
    ])
    const conversation = new Conversation([{ role: "user", content: "Task: nest\n\nDetails:\nTry" }])

    const result = await runSubagentLoop({ provider, model: "qwen3", conversation, dispatcher: subagentDispatcher(), depth: 1 })

    expect(result).toBe("Did it myself.")
    expect(provider.requests[1]?.messages.at(-1)).toEqual({
      role: "tool",
      toolCallId: "call_1",
      name: "task",
      content: RECURSION_REJECTION,
    })
  })

  it("returns the last assistant content when the turns run out first", async () => {
    const provider = new MockProvider([], [], { content: "still working", toolCalls: [calc("call_loop", "1+1")] })

    const result = await runSubagentLoop({
      provider,
      model: "qwen3",
      conversation: new Conversation([{ role: "user", content: "Task: grind\n\nDetails:\nKeep going" }]),
      dispatcher: subagentDispatcher(),
      depth: 1,
      maxTurns: 2,
      maxIterations: 3,
    })

    expect(result).toBe("still working")
    expect(provider.calls).toBe(2)
  })

  it("fails after five model calls when every reply asks for tools", async () => {
    const provider = new MockProvider([], [], { content: "", toolCalls: [calc("call_loop", "1+1")] })

    const loop = runSubagentLoop({
      provider,
      model: "qwen3",
      conversation: new Conversation([{ role: "user", content: "Task: grind\n\nDetails:\nKeep going" }]),
      dispatcher: subagentDispatcher(),
      depth: 1,
    })

    await expect(loop).rejects.toThrow(IterationLimitError)
    await expect(loop).rejects.toThrow("Subagent: Too many iterations in one turn")
    expect(provider.calls).toBe(5)
  })

  it("fails when no assistant message was produced", async () => {
    const provider = new MockProvider()

    await expect(
      runSubagentLoop({
        provider,
        model: "qwen3",
        conversation: new Conversation([{ role: "user", content: "Task: none\n\nDetails:\nNothing" }]),
        dispatcher: subagentDispatcher(),
        depth: 1,
        maxTurns: 0,
      }),
    ).rejects.toThrow(new SubagentError("Subagent: No response generated"))
    expect(provider.calls).toBe(0)
  })
})
