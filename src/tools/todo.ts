import { z } from "zod"
import type { ToolDefinition } from "./types.js"

const TodoStatus = z.enum(["pending", "in_progress", "completed"])

const TodoItem = z.object({
  content: z.string().min(1),
  status: TodoStatus,
  activeForm: z.string().min(1),
})

const TodoWriteInput = z.object({
  todos: z.array(TodoItem),
})

export type TodoItem = z.output<typeof TodoItem>

const STATUS_ICONS: Record<TodoItem["status"], string> = {
  pending: "○",
  in_progress: "◐",
  completed: "●",
}

export function renderTodoList(todos: readonly TodoItem[]): string {
  const count = (status: TodoItem["status"]) => todos.filter((t) => t.status === status).length
  const lines = ["Todo list updated:", ...todos.map((t) => `  ${STATUS_ICONS[t.status]} ${t.activeForm}`)]
  return (
    `${lines.join("\n")}\n\n` +
    `Total: ${todos.length} tasks (${count("pending")} pending, ${count("in_progress")} in progress, ${count("completed")} completed)`
  )
}

export function createTodoTools(): ToolDefinition[] {
  const todo_write: ToolDefinition<typeof TodoWriteInput> = {
    name: "todo_write",
    description: "Replace the todo list used to track progress on multi-step work",
    risk: "safe",
    parametersJsonSchema: {
      type: "object",
      additionalProperties: false,
      properties: {
        todos: {
          type: "array",
          description: "The full updated todo list",
          items: {
            type: "object",
            properties: {
              content: { type: "string", description: "Imperative form, e.g. 'Run tests'" },
              status: { type: "string", enum: ["pending", "in_progress", "completed"] },
              activeForm: { type: "string", description: "Present continuous form, e.g. 'Running tests'" },
            },
            required: ["content", "status", "activeForm"],
          },
        },
      },
      required: ["todos"],
    },
    inputSchema: TodoWriteInput,
    handler: async (input) => renderTodoList(input.todos),
  }

  return [todo_write]
}
