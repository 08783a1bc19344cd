import type { ToolSchema } from "../tools/types.js"
import type { ModelCompleteRequest, ModelProvider, ModelResponse } from "./types.js"

export type MockStep = ModelResponse | ((request: ModelCompleteRequest) => ModelResponse | Promise<ModelResponse>)

export const MOCK_NOTICE =
  "(mock model) No model is connected. Start Ollama and use --provider ollama to talk to a real model."

/**
 * Replays a fixed script of replies, one per call, then keeps answering with
 * `fallback`. Every request is recorded in `requests`.
 */
export class MockProvider implements ModelProvider {
  public readonly name = "mock"
  public readonly requests: ModelCompleteRequest[] = []
  private cursor = 0

  public constructor(
    private readonly script: readonly MockStep[] = [],
    public readonly tools: readonly ToolSchema[] = [],
    private readonly fallback: MockStep = { content: MOCK_NOTICE },
  ) {}

  public get calls(): number {
    return this.requests.length
  }

  public async complete(request: ModelCompleteRequest): Promise<ModelResponse> {
    this.requests.push({ model: request.model, messages: [...request.messages] })
    const step = this.script[this.cursor] ?? this.fallback
    if (this.cursor < this.script.length) this.cursor += 1
    return typeof step === "function" ? step(request) : step
  }
}
