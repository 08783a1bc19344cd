import type { DelegationToolDefinition } from "./task.js"
import { toToolSchema, type ToolDefinition, type ToolSchema } from "./types.js"

/** Closed set of tool kinds; the dispatcher switches on `kind`. */
export type ToolEntry =
  | { kind: "builtin"; tool: ToolDefinition }
  | { kind: "delegate"; tool: DelegationToolDefinition }

/**
 * Ordered, read-only set of tools. Built once and shared by every agent,
 * including concurrently running subagents.
 */
export class ToolRegistry {
  private readonly entries: readonly ToolEntry[]
  private readonly byName: ReadonlyMap<string, ToolEntry>

  public constructor(tools: readonly ToolDefinition[], delegation?: DelegationToolDefinition) {
    const entries: ToolEntry[] = tools.map((tool) => ({ kind: "builtin", tool }))
    if (delegation) entries.push({ kind: "delegate", tool: delegation })

    const byName = new Map<string, ToolEntry>()
    for (const entry of entries) {
      if (byName.has(entry.tool.name)) throw new Error(`Duplicate tool name: ${entry.tool.name}`)
      byName.set(entry.tool.name, entry)
    }
    this.entries = Object.freeze(entries)
    this.byName = byName
  }

  public get size(): number {
    return this.entries.length
  }

  public names(): string[] {
    return this.entries.map((e) => e.tool.name)
  }

  public resolve(name: string): ToolEntry | undefined {
    return this.byName.get(name)
  }

  public has(name: string): boolean {
    return this.byName.has(name)
  }

  public get delegation(): DelegationToolDefinition | undefined {
    for (const entry of this.entries) {
      if (entry.kind === "delegate") return entry.tool
    }
    return undefined
  }

  /** Wire schemas in registration order. */
  public schemas(options: { includeDelegation?: boolean } = {}): ToolSchema[] {
    const includeDelegation = options.includeDelegation ?? true
    return this.entries
      .filter((e) => includeDelegation || e.kind !== "delegate")
      .map((e) => toToolSchema(e.tool))
  }
}
