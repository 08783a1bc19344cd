import chalk from "chalk"
import type { AgentEvent } from "../agent/types.js"
import type { StreamObserver } from "../llm/stream-decoder.js"
import { formatDuration, truncate } from "../util/text.js"

const THINKING_TOP = "┌─ thinking"
const THINKING_BORDER = "│"
const THINKING_BOTTOM = "└─"
const PREVIEW_CHARS = 400

export type Writer = (text: string) => void

/**
 * Renders the streamed reply and agent events to a terminal. Output only;
 * the decoder and loop never depend on what it does.
 */
export class TerminalRenderer implements StreamObserver {
  private atLineStart = true
  private streamed = false

  public constructor(
    private readonly write: Writer = (text) => {
      process.stdout.write(text)
    },
  ) {}

  public onReasoningStart(): void {
    this.line(chalk.dim(THINKING_TOP))
  }

  public onReasoningLine(line: string): void {
    this.line(`${chalk.dim(THINKING_BORDER)} ${chalk.dim.italic(line)}`)
  }

  public onReasoningEnd(): void {
    this.line(chalk.dim(THINKING_BOTTOM))
  }

  public onResponseStart(): void {
    this.breakLine()
  }

  public onContent(fragment: string): void {
    this.streamed = true
    this.emit(fragment)
  }

  /** Assistant messages were already streamed through `onContent`. */
  public onEvent = (event: AgentEvent): void => {
    switch (event.type) {
      case "tool_call":
        this.line(`${indent(event.depth)}${chalk.cyan("⏺")} ${chalk.bold(event.toolName)} ${chalk.gray(preview(event.args))}`)
        break
      case "tool_result":
        for (const l of truncate(event.result, PREVIEW_CHARS).split("\n")) {
          this.line(`${indent(event.depth)} ${chalk.gray("=")} ${chalk.green(l)}`)
        }
        break
      case "assistant_message":
        if (event.depth > 0) this.line(`${indent(event.depth)}${chalk.magenta("↳")} ${truncate(event.content, PREVIEW_CHARS)}`)
        break
      case "error":
        this.line(`${indent(event.depth)}${chalk.redBright("✖")} ${chalk.redBright(event.message)}`)
        break
      case "subagent_start":
        this.line(`${chalk.blueBright("ℹ")} ${chalk.blueBright(`Spawning ${event.role} subagent: ${event.description}`)}`)
        break
      case "subagent_end":
        this.line(
          event.ok
            ? `${chalk.greenBright("✓")} ${chalk.greenBright(`Subagent completed in ${formatDuration(event.durationMs)}`)}`
            : `${chalk.redBright("✖")} ${chalk.redBright(`Subagent failed after ${formatDuration(event.durationMs)}`)}`,
        )
        break
    }
  }

  public info(message: string): void {
    this.line(`${chalk.blueBright("ℹ")} ${chalk.blueBright(message)}`)
  }

  public error(message: string): void {
    this.line(`${chalk.redBright("✖")} ${chalk.redBright(message)}`)
  }

  /** Ends a turn; prints `finalText` unless it was already streamed. */
  public finishTurn(finalText: string): void {
    if (this.streamed) this.breakLine()
    else this.line(finalText)
    this.streamed = false
  }

  private line(text: string): void {
    this.breakLine()
    this.emit(`${text}\n`)
  }

  private breakLine(): void {
    if (!this.atLineStart) this.emit("\n")
  }

  private emit(text: string): void {
    if (text.length === 0) return
    this.write(text)
    this.atLineStart = text.endsWith("\n")
  }
}

function indent(depth: number): string {
  return "  ".repeat(depth)
}

function preview(args: unknown): string {
  const text = typeof args === "string" ? args : JSON.stringify(args)
  return truncate(text ?? "", 200)
}
