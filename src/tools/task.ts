import { z } from "zod"
import { SUBAGENT_PROFILES, SUBAGENT_ROLES, SubagentRoleSchema } from "../agent/subagents.js"

export const DELEGATION_TOOL_NAME = "task"

export const DelegationInput = z.object({
  subagent_type: SubagentRoleSchema,
  description: z.string().min(1, "Missing 'description' argument"),
  prompt: z.string().min(1, "Missing 'prompt' argument"),
  include_tools: z.boolean().default(false),
  model: z.string().min(1).optional(),
})

/**
 * The delegation tool. It has no handler: the dispatcher routes it to the
 * subagent orchestrator.
 */
export type DelegationToolDefinition = {
  name: typeof DELEGATION_TOOL_NAME
  description: string
  parametersJsonSchema: Record<string, unknown>
  inputSchema: typeof DelegationInput
}

export function createDelegationTool(): DelegationToolDefinition {
  const roleList = SUBAGENT_ROLES.map((role) => `- ${role}: ${SUBAGENT_PROFILES[role].description}`).join("\n")
  return {
    name: DELEGATION_TOOL_NAME,
    description: `Launch a specialized subagent to handle a complex, multi-step task autonomously. Available subagents:\n${roleList}`,
    parametersJsonSchema: {
      type: "object",
      additionalProperties: false,
      properties: {
        subagent_type: {
          type: "string",
          description: "The type of subagent to launch",
          enum: [...SUBAGENT_ROLES],
        },
        description: { type: "string", description: "A short description (3-5 words) of what the agent will do" },
        prompt: { type: "string", description: "The detailed task for the agent to perform" },
        include_tools: {
          type: "boolean",
          default: false,
          description: "Let the subagent use tools (ignored for roles that never use tools)",
        },
        model: { type: "string", description: "Optional model to use (defaults to the configured model)" },
      },
      required: ["subagent_type", "description", "prompt"],
    },
    inputSchema: DelegationInput,
  }
}
