import { z } from "zod"

export const SUBAGENT_ROLES = ["general-purpose", "explore", "plan", "code-review", "test-runner"] as const

export type SubagentRole = (typeof SUBAGENT_ROLES)[number]

export type SubagentProfile = {
  description: string
  systemPrompt?: string
  /** Whether the role may be handed tool schemas at all. */
  usesTools: boolean
}

export const SUBAGENT_PROFILES: Readonly<Record<SubagentRole, Readonly<SubagentProfile>>> = Object.freeze({
  "general-purpose": {
    description: "General-purpose agent for complex tasks",
    usesTools: true,
  },
  explore: {
    description: "Fast agent for exploring codebases",
    systemPrompt:
      "You are a codebase exploration agent. Your goal is to quickly find files, search code, and answer " +
      "questions about the codebase structure. Be thorough but efficient in your exploration.",
    usesTools: true,
  },
  plan: {
    description: "Software architect agent for designing implementation plans",
    systemPrompt:
      "You are a software architect agent. Your goal is to design implementation plans by exploring the " +
      "codebase and providing step-by-step plans. Focus on: 1) Understanding existing patterns, " +
      "2) Identifying critical files, 3) Considering architectural trade-offs.",
    usesTools: false,
  },
  "code-review": {
    description: "Code reviewer agent for analyzing code quality",
    systemPrompt:
      "You are a code reviewer agent. Your goal is to analyze code quality, identify potential bugs, suggest " +
      "improvements, and ensure best practices. Focus on: correctness, performance, security, and maintainability.",
    usesTools: true,
  },
  "test-runner": {
    description: "Test runner agent for testing and validation",
    systemPrompt:
      "You are a test runner agent. Your goal is to design and execute tests, validate functionality, and " +
      "report issues. Be thorough in testing edge cases and providing actionable feedback.",
    usesTools: true,
  },
})

const ROLE_ALIASES: Readonly<Record<string, SubagentRole>> = {
  Explore: "explore",
  Plan: "plan",
}

export const SubagentRoleSchema = z.preprocess(
  (value) => (typeof value === "string" ? (ROLE_ALIASES[value] ?? value) : value),
  z.enum(SUBAGENT_ROLES, {
    errorMap: (_issue, ctx) => ({
      message: `Unknown subagent type '${String(ctx.data)}'. Valid types are: ${SUBAGENT_ROLES.join(", ")}`,
    }),
  }),
)

export function parseSubagentRole(value: string): SubagentRole {
  const parsed = SubagentRoleSchema.safeParse(value)
  if (!parsed.success) throw new Error(parsed.error.issues[0]?.message ?? `Unknown subagent type '${value}'`)
  return parsed.data
}

export type SubagentTask = {
  role: SubagentRole
  description: string
  prompt: string
  /** Seed the subagent with the caller's recent history. */
  includeContext: boolean
  /** Ask for tools; still refused when the role does not use tools. */
  includeTools: boolean
  /** Overrides the configured model for this task only. */
  model?: string
}

export function createSubagentTask(
  role: SubagentRole,
  description: string,
  prompt: string,
  options: { includeContext?: boolean; includeTools?: boolean; model?: string } = {},
): SubagentTask {
  return {
    role,
    description,
    prompt,
    includeContext: options.includeContext ?? false,
    includeTools: options.includeTools ?? false,
    ...(options.model ? { model: options.model } : {}),
  }
}

export const SubagentTaskSchema = z.object({
  role: SubagentRoleSchema,
  description: z.string().min(1),
  prompt: z.string().min(1),
  includeContext: z.boolean().default(false),
  includeTools: z.boolean().default(false),
  model: z.string().min(1).optional(),
})

export function subagentTaskPrompt(task: Pick<SubagentTask, "description" | "prompt">): string {
  return `Task: ${task.description}\n\nDetails:\n${task.prompt}`
}
