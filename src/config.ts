import fs from "node:fs"
import path from "node:path"
import { z } from "zod"
import { ConfigError, errorMessage } from "./errors.js"
import { DEFAULT_OLLAMA_BASE_URL } from "./llm/ollama.js"

export type ProviderName = "ollama" | "mock"

export const DEFAULT_MODEL = "qwen3"
export const SETTINGS_FILE = path.join(".taskforce", "settings.json")

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent"

export type AppConfig = {
  provider: ProviderName
  baseUrl: string
  model: string
  workspaceRoot: string
  enableShell: boolean
  enableWrite: boolean
  think: boolean
  verbose: boolean
  maxIterations: number
  subagentMaxTurns: number
  subagentMaxIterations: number
  subagentContextMessages: number
  maxToolOutputChars: number
  maxFileReadChars: number
  logLevel: LogLevel
}

const ProviderSchema = z.enum(["ollama", "mock"])
const LogLevelSchema = z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])

const EnvSchema = z
  .object({
    TASKFORCE_PROVIDER: ProviderSchema.optional(),
    TASKFORCE_BASE_URL: z.string().url().optional(),
    TASKFORCE_MODEL: z.string().min(1).optional(),
    TASKFORCE_WORKSPACE: z.string().optional(),
    TASKFORCE_ENABLE_SHELL: z.string().optional(),
    TASKFORCE_ENABLE_WRITE: z.string().optional(),
    TASKFORCE_THINK: z.string().optional(),
    TASKFORCE_VERBOSE: z.string().optional(),
    TASKFORCE_MAX_ITERATIONS: z.string().optional(),
    TASKFORCE_SUBAGENT_MAX_TURNS: z.string().optional(),
    TASKFORCE_SUBAGENT_MAX_ITERATIONS: z.string().optional(),
    TASKFORCE_SUBAGENT_CONTEXT_MESSAGES: z.string().optional(),
    TASKFORCE_MAX_TOOL_OUTPUT_CHARS: z.string().optional(),
    TASKFORCE_MAX_FILE_READ_CHARS: z.string().optional(),
    TASKFORCE_LOG_LEVEL: LogLevelSchema.optional(),
  })
  .passthrough()

const SettingsSchema = z
  .object({
    provider: ProviderSchema.optional(),
    base_url: z.string().url().optional(),
    model: z.string().min(1).optional(),
  })
  .strict()

export type Settings = z.infer<typeof SettingsSchema>

function parseBool(value: string | undefined, defaultValue: boolean): boolean {
  if (value === undefined) return defaultValue
  const normalized = value.trim().toLowerCase()
  if (["1", "true", "yes", "y", "on"].includes(normalized)) return true
  if (["0", "false", "no", "n", "off"].includes(normalized)) return false
  return defaultValue
}

function parseIntWithDefault(value: string | undefined, defaultValue: number): number {
  if (value === undefined) return defaultValue
  const parsed = Number.parseInt(value, 10)
  return Number.isFinite(parsed) ? parsed : defaultValue
}

function describeIssues(error: z.ZodError): string {
  return error.issues.map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message)).join("; ")
}

/** Reads `<workspace>/.taskforce/settings.json`. A missing file yields `{}`. */
export function loadSettingsFile(workspaceRoot: string): Settings {
  const filePath = path.join(workspaceRoot, SETTINGS_FILE)
  let raw: string
  try {
    raw = fs.readFileSync(filePath, "utf8")
  } catch (e) {
    if (e instanceof Error && "code" in e && e.code === "ENOENT") return {}
    throw new ConfigError(`Cannot read settings file ${filePath}: ${errorMessage(e)}`, { cause: e })
  }

  let json: unknown
  try {
    json = JSON.parse(raw)
  } catch (e) {
    throw new ConfigError(`Invalid JSON in settings file ${filePath}: ${errorMessage(e)}`, { cause: e })
  }
  const parsed = SettingsSchema.safeParse(json)
  if (!parsed.success) {
    throw new ConfigError(`Invalid settings file ${filePath}: ${describeIssues(parsed.error)}`)
  }
  return parsed.data
}

function positive(name: string, value: number): number {
  if (!Number.isInteger(value) || value < 1) throw new ConfigError(`${name} must be a positive integer, got ${value}`)
  return value
}

/**
 * Resolves the configuration once. Precedence: `overrides`, then `TASKFORCE_*`
 * environment variables, then the workspace settings file, then defaults.
 */
export function loadConfig(overrides: Partial<AppConfig> = {}, environment: NodeJS.ProcessEnv = process.env): AppConfig {
  const envResult = EnvSchema.safeParse(environment)
  if (!envResult.success) throw new ConfigError(`Invalid environment: ${describeIssues(envResult.error)}`)
  const env = envResult.data

  const workspaceRoot = path.resolve(overrides.workspaceRoot ?? env.TASKFORCE_WORKSPACE ?? process.cwd())
  const settings = loadSettingsFile(workspaceRoot)

  return {
    provider: overrides.provider ?? env.TASKFORCE_PROVIDER ?? settings.provider ?? "ollama",
    baseUrl: overrides.baseUrl ?? env.TASKFORCE_BASE_URL ?? settings.base_url ?? DEFAULT_OLLAMA_BASE_URL,
    model: overrides.model ?? env.TASKFORCE_MODEL ?? settings.model ?? DEFAULT_MODEL,
    workspaceRoot,
    enableShell: overrides.enableShell ?? parseBool(env.TASKFORCE_ENABLE_SHELL, false),
    enableWrite: overrides.enableWrite ?? parseBool(env.TASKFORCE_ENABLE_WRITE, false),
    think: overrides.think ?? parseBool(env.TASKFORCE_THINK, false),
    verbose: overrides.verbose ?? parseBool(env.TASKFORCE_VERBOSE, true),
    maxIterations: positive(
      "maxIterations",
      overrides.maxIterations ?? parseIntWithDefault(env.TASKFORCE_MAX_ITERATIONS, 5),
    ),
    subagentMaxTurns: positive(
      "subagentMaxTurns",
      overrides.subagentMaxTurns ?? parseIntWithDefault(env.TASKFORCE_SUBAGENT_MAX_TURNS, 10),
    ),
    subagentMaxIterations: positive(
      "subagentMaxIterations",
      overrides.subagentMaxIterations ?? parseIntWithDefault(env.TASKFORCE_SUBAGENT_MAX_ITERATIONS, 5),
    ),
    subagentContextMessages:
      overrides.subagentContextMessages ?? parseIntWithDefault(env.TASKFORCE_SUBAGENT_CONTEXT_MESSAGES, 10),
    maxToolOutputChars:
      overrides.maxToolOutputChars ?? parseIntWithDefault(env.TASKFORCE_MAX_TOOL_OUTPUT_CHARS, 12_000),
    maxFileReadChars: overrides.maxFileReadChars ?? parseIntWithDefault(env.TASKFORCE_MAX_FILE_READ_CHARS, 120_000),
    logLevel: overrides.logLevel ?? env.TASKFORCE_LOG_LEVEL ?? "warn",
  }
}
