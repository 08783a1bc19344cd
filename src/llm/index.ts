import type { AppConfig } from "../config.js"
import type { Logger } from "../logger.js"
import type { ToolSchema } from "../tools/types.js"
import { MockProvider } from "./mock.js"
import { OllamaProvider } from "./ollama.js"
import type { StreamObserver } from "./stream-decoder.js"
import type { ModelProvider, ProviderFactory } from "./types.js"

type ProviderOptions = {
  tools: readonly ToolSchema[]
  observer?: StreamObserver
  logger?: Logger
  fetch?: typeof fetch
}

/** The top-level client: streaming, with the configured think and verbose flags. */
export function createProvider(config: AppConfig, options: ProviderOptions): ModelProvider {
  if (config.provider === "mock") return new MockProvider([], options.tools)
  return new OllamaProvider({
    baseUrl: config.baseUrl,
    stream: true,
    think: config.think,
    verbose: config.verbose,
    tools: options.tools,
    observer: options.observer,
    fetch: options.fetch,
    logger: options.logger,
  })
}

/**
 * Clients for subagents. Never verbose; a client without tools also turns off
 * streaming and thinking.
 */
export function createSubagentProviderFactory(
  config: AppConfig,
  options: Omit<ProviderOptions, "tools" | "observer"> = {},
): ProviderFactory {
  return ({ tools }) => {
    if (config.provider === "mock") return new MockProvider([], tools)
    const toolless = tools.length === 0
    return new OllamaProvider({
      baseUrl: config.baseUrl,
      stream: !toolless,
      think: toolless ? false : config.think,
      verbose: false,
      tools,
      fetch: options.fetch,
      logger: options.logger,
    })
  }
}
