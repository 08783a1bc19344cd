import pino from "pino"
import type { Logger } from "pino"

export type { Logger } from "pino"

export const REDACT_PATHS = [
  "apiKey",
  "api_key",
  "token",
  "password",
  "secret",
  "headers.authorization",
  "headers.Authorization",
  "*.headers.authorization",
]

/**
 * Root logger. Emits JSON to stderr so it never interleaves with the
 * assistant text streamed to stdout. Silenced under test tooling.
 */
export function makeLogger(options: { level?: string; bindings?: Record<string, unknown> } = {}): Logger {
  const isTestTooling = process.env.VITEST === "true" || process.env.NODE_ENV === "test"
  const level = options.level ?? process.env.TASKFORCE_LOG_LEVEL ?? "warn"

  return pino(
    {
      level,
      enabled: !isTestTooling,
      base: { ...options.bindings, app: "taskforce" },
      messageKey: "msg",
      timestamp: pino.stdTimeFunctions.isoTime,
      redact: { paths: REDACT_PATHS, censor: "[REDACTED]" },
    },
    pino.destination({ dest: 2, sync: true }),
  )
}

export function makeNoopLogger(): Logger {
  return pino({ enabled: false })
}
