import { evaluate } from "mathjs"
import { z } from "zod"
import type { ToolDefinition } from "./types.js"

const CalculatorInput = z.object({
  expression: z.string().trim().min(1, "Expression is required"),
})

export function evaluateExpression(expression: string): string {
  const result: unknown = evaluate(expression)
  if (typeof result === "number" || typeof result === "bigint" || typeof result === "boolean") return String(result)
  if (typeof result === "function" || result === undefined) {
    throw new Error(`Expression did not produce a value: ${expression}`)
  }
  return String(result)
}

export function createCalculatorTools(): ToolDefinition[] {
  const calculator: ToolDefinition<typeof CalculatorInput> = {
    name: "calculator",
    description: "Evaluate a mathematical expression, e.g. '2 + 3 * 4', 'sqrt(16)', '10 / 4'",
    risk: "safe",
    parametersJsonSchema: {
      type: "object",
      additionalProperties: false,
      properties: {
        expression: { type: "string", description: "Mathematical expression to evaluate" },
      },
      required: ["expression"],
    },
    inputSchema: CalculatorInput,
    handler: async (input) => {
      try {
        return evaluateExpression(input.expression)
      } catch (e) {
        throw new Error(`Evaluation error: ${e instanceof Error ? e.message : String(e)}`)
      }
    },
  }

  return [calculator]
}
