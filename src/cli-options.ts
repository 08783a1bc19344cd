import { z } from "zod"
import type { AppConfig } from "./config.js"
import { ConfigError } from "./errors.js"

/** Options commander collects across `run`, `chat`, `spawn` and `fanout`. */
export const CliOptionsSchema = z
  .object({
    provider: z.enum(["ollama", "mock"]).optional(),
    model: z.string().min(1).optional(),
    baseUrl: z.string().url().optional(),
    workspace: z.string().min(1).optional(),
    enableShell: z.boolean().optional(),
    enableWrite: z.boolean().optional(),
    think: z.boolean().optional(),
    quiet: z.boolean().optional(),
    maxIterations: z.coerce.number().int().positive().optional(),
    role: z.string().min(1).optional(),
    tools: z.boolean().optional(),
    allOrNothing: z.boolean().optional(),
  })
  .strict()

export type CliOptions = z.infer<typeof CliOptionsSchema>

export function parseOptions(raw: unknown): CliOptions {
  const parsed = CliOptionsSchema.safeParse(raw)
  if (!parsed.success) {
    throw new ConfigError(
      `Invalid options: ${parsed.error.issues
        .map((i) => (i.code === "unrecognized_keys" ? `unknown ${i.keys.join(", ")}` : `--${i.path.join(".")}: ${i.message}`))
        .join("; ")}`,
    )
  }
  return parsed.data
}

export function toOverrides(opts: CliOptions): Partial<AppConfig> {
  const overrides: Partial<AppConfig> = {}
  if (opts.provider) overrides.provider = opts.provider
  if (opts.model) overrides.model = opts.model
  if (opts.baseUrl) overrides.baseUrl = opts.baseUrl
  if (opts.workspace) overrides.workspaceRoot = opts.workspace
  if (opts.enableShell) overrides.enableShell = true
  if (opts.enableWrite) overrides.enableWrite = true
  if (opts.think) overrides.think = true
  if (opts.quiet) overrides.verbose = false
  if (opts.maxIterations !== undefined) overrides.maxIterations = opts.maxIterations
  return overrides
}
