import { describe, expect, it } from "vitest"
import { parseOptions, toOverrides } from "./cli-options.js"
import { ConfigError } from "./errors.js"

describe("parseOptions", () => {
  it("accepts the options commander collects for spawn", () => {
    expect(parseOptions({ tools: true, model: "llama3", maxIterations: "3" })).toEqual({
      tools: true,
      model: "llama3",
      maxIterations: 3,
    })
  })

  it("rejects options no command declares", () => {
    expect(() => parseOptions({ tools: true, context: true })).toThrow(ConfigError)
    expect(() => parseOptions({ context: true })).toThrow("Invalid options: unknown context")
  })

  it("reports the offending flag", () => {
    expect(() => parseOptions({ baseUrl: "not a url" })).toThrow("Invalid options: --baseUrl: Invalid url")
  })
})

describe("toOverrides", () => {
  it("maps flags onto configuration keys", () => {
    expect(toOverrides({ workspace: "/tmp/ws", enableShell: true, quiet: true, maxIterations: 2 })).toEqual({
      workspaceRoot: "/tmp/ws",
      enableShell: true,
      verbose: false,
      maxIterations: 2,
    })
  })

  it("leaves unset flags to the other configuration sources", () => {
    expect(toOverrides({})).toEqual({})
  })
})
