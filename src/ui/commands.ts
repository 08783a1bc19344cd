export type ChatInput =
  | { kind: "empty" }
  | { kind: "quit" }
  | { kind: "clear" }
  | { kind: "help" }
  | { kind: "unknown"; command: string }
  | { kind: "prompt"; text: string }

export const CHAT_HELP = [
  "Available commands:",
  "  /help             show this help",
  "  /clear            clear the conversation history",
  "  /quit, /exit, /q  leave the session",
].join("\n")

export function parseChatInput(line: string): ChatInput {
  const text = line.trim()
  if (!text) return { kind: "empty" }
  if (!text.startsWith("/")) return { kind: "prompt", text }

  const command = text.split(/\s+/, 1)[0]?.toLowerCase() ?? text
  switch (command) {
    case "/quit":
    case "/exit":
    case "/q":
      return { kind: "quit" }
    case "/clear":
      return { kind: "clear" }
    case "/help":
      return { kind: "help" }
    default:
      return { kind: "unknown", command }
  }
}
