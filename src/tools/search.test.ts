import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { afterAll, beforeAll, describe, expect, it } from "vitest"
import { createSearchTools } from "./search.js"
import type { ToolContext } from "./types.js"

let root: string

async function call(name: "glob" | "grep", args: unknown): Promise<unknown> {
  const t = createSearchTools().find((candidate) => candidate.name === name)
  if (!t) throw new Error(`missing tool ${name}`)
  const ctx: ToolContext = {
    workspaceRoot: root,
    enableShell: false,
    enableWrite: false,
    maxFileReadChars: 10_000,
    maxToolOutputChars: 10_000,
  }
  return t.handler(t.inputSchema.parse(args), ctx)
}

beforeAll(async () => {
  root = await fs.mkdtemp(path.join(os.tmpdir(), "taskforce-search-"))
  await fs.mkdir(path.join(root, "src"))
  await fs.writeFile(path.join(root, "src", "a.ts"), "const alpha = 1\nconst beta = 2\n")
  await fs.writeFile(path.join(root, "src", "b.ts"), "// alpha\n")
  await fs.writeFile(path.join(root, "notes.md"), "Alpha notes\n")
  await fs.writeFile(path.join(root, ".env"), "API_KEY=test-secret\n")
  await fs.utimes(path.join(root, "src", "a.ts"), new Date("2024-01-01T00:00:00Z"), new Date("2024-01-01T00:00:00Z"))
  await fs.utimes(path.join(root, "src", "b.ts"), new Date("2024-06-01T00:00:00Z"), new Date("2024-06-01T00:00:00Z"))
})

afterAll(async () => {
  await fs.rm(root, { recursive: true, force: true })
})

describe("glob", () => {
  it("lists matches newest first", async () => {
    await expect(call("glob", { pattern: "**/*.ts" })).resolves.toBe("src/b.ts\nsrc/a.ts")
  })

  it("reports when nothing matches", async () => {
    await expect(call("glob", { pattern: "**/*.py" })).resolves.toBe("No files found matching pattern: **/*.py")
  })
})

describe("grep", () => {
  it("prints matching lines in content mode", async () => {
    await expect(call("grep", { pattern: "alpha" })).resolves.toBe("src/a.ts:1:const alpha = 1\nsrc/b.ts:1:// alpha")
  })

  it("lists files in files_with_matches mode", async () => {
    await expect(call("grep", { pattern: "alpha", case_insensitive: true, output_mode: "files_with_matches" })).resolves.toBe(
      "notes.md\nsrc/a.ts\nsrc/b.ts",
    )
  })

  it("counts matches per file in count mode", async () => {
    await expect(call("grep", { pattern: "^const", output_mode: "count" })).resolves.toBe("src/a.ts:2")
  })

  it("restricts the search with a glob", async () => {
    await expect(call("grep", { pattern: "alpha", case_insensitive: true, glob: "**/*.md" })).resolves.toBe(
      "notes.md:1:Alpha notes",
    )
  })

  it("never searches .env files", async () => {
    await expect(call("grep", { pattern: "test-secret" })).resolves.toBe("No matches found for pattern: test-secret")
  })

  it("rejects an invalid regular expression", async () => {
    await expect(call("grep", { pattern: "(" })).rejects.toThrow("Invalid regex pattern '('")
  })
})
