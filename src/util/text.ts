export function truncate(text: string, maxChars: number): string {
  if (text.length <= maxChars) return text
  return `${text.slice(0, Math.max(0, maxChars - 14))}\n…(truncated)`
}

export function safeJsonStringify(value: unknown): string {
  try {
    return JSON.stringify(value, null, 2) ?? String(value)
  } catch {
    return String(value)
  }
}

/** Tool results reach the model as text: strings verbatim, anything else as JSON. */
export function toToolText(value: unknown): string {
  if (typeof value === "string") return value
  if (value === undefined) return ""
  return safeJsonStringify(value)
}

export function formatDuration(ms: number): string {
  return `${(ms / 1000).toFixed(2)}s`
}
