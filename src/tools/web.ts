import { z } from "zod"
import { truncate } from "../util/text.js"
import type { ToolDefinition } from "./types.js"

const WebFetchInput = z.object({
  url: z.string().url(),
  method: z.enum(["GET", "POST", "PUT", "PATCH", "DELETE", "HEAD"]).default("GET"),
  headers: z.record(z.string()).optional(),
  body: z.string().optional(),
  timeout: z.number().int().min(1).max(300).default(30),
})

export function createWebTools(fetchImpl: typeof fetch = fetch): ToolDefinition[] {
  const web_fetch: ToolDefinition<typeof WebFetchInput> = {
    name: "web_fetch",
    description: "Fetch a URL over HTTP and return the status, final URL and response body as text",
    risk: "safe",
    parametersJsonSchema: {
      type: "object",
      additionalProperties: false,
      properties: {
        url: { type: "string", description: "Absolute http(s) URL" },
        method: { type: "string", enum: ["GET", "POST", "PUT", "PATCH", "DELETE", "HEAD"], default: "GET" },
        headers: { type: "object", additionalProperties: { type: "string" } },
        body: { type: "string", description: "Request body for POST/PUT/PATCH" },
        timeout: { type: "integer", minimum: 1, maximum: 300, default: 30, description: "Timeout in seconds" },
      },
      required: ["url"],
    },
    inputSchema: WebFetchInput,
    handler: async (input, ctx) => {
      const res = await fetchImpl(input.url, {
        method: input.method,
        headers: input.headers,
        body: input.method === "GET" || input.method === "HEAD" ? undefined : input.body,
        signal: AbortSignal.timeout(input.timeout * 1000),
      })
      const body = await res.text()
      return truncate(`Status: ${res.status}\nURL: ${res.url || input.url}\n\n${body}`, ctx.maxToolOutputChars)
    },
  }

  return [web_fetch]
}
