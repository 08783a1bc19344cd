#!/usr/bin/env node
import "dotenv/config"
import { Command } from "commander"
import fs from "node:fs/promises"
import process from "node:process"
import { createInterface } from "node:readline/promises"
import { z } from "zod"
import { formatSubagentResult } from "./agent/orchestrator.js"
import { DEFAULT_ROLE, buildSystemPrompt } from "./agent/prompt.js"
import { createAgentSession, type AgentSession } from "./agent/session.js"
import { SubagentTaskSchema, createSubagentTask, parseSubagentRole } from "./agent/subagents.js"
import { parseOptions, toOverrides, type CliOptions } from "./cli-options.js"
import { loadConfig } from "./config.js"
import { ConfigError, errorMessage } from "./errors.js"
import { makeLogger } from "./logger.js"
import { createToolRegistry } from "./tools/index.js"
import { CHAT_HELP, parseChatInput } from "./ui/commands.js"
import { TerminalRenderer } from "./ui/terminal.js"

const FanOutFileSchema = z.array(SubagentTaskSchema).min(1)

async function setup(raw: unknown): Promise<{ opts: CliOptions; session: AgentSession; renderer: TerminalRenderer }> {
  const opts = parseOptions(raw)
  const config = loadConfig(toOverrides(opts))
  const logger = makeLogger({ level: config.logLevel, bindings: { provider: config.provider, model: config.model } })
  const renderer = new TerminalRenderer()
  const registry = createToolRegistry()
  const systemPrompt = await buildSystemPrompt(config.workspaceRoot, opts.role ?? DEFAULT_ROLE, registry)
  const session = createAgentSession(config, {
    systemPrompt,
    registry,
    observer: renderer,
    onEvent: config.verbose ? renderer.onEvent : undefined,
    logger,
  })
  logger.debug({ workspaceRoot: config.workspaceRoot, tools: registry.names() }, "session ready")
  return { opts, session, renderer }
}

async function runOnce(prompt: string, raw: unknown): Promise<void> {
  const { session, renderer } = await setup(raw)
  renderer.finishTurn(await session.invoke(prompt))
}

async function chat(raw: unknown): Promise<void> {
  const { session, renderer } = await setup(raw)
  const rl = createInterface({ input: process.stdin, output: process.stdout })
  renderer.info("Type /help for commands, /quit to leave.")
  try {
    for (;;) {
      const input = parseChatInput(await rl.question("> "))
      if (input.kind === "empty") continue
      if (input.kind === "quit") break
      if (input.kind === "help") {
        process.stdout.write(`${CHAT_HELP}\n`)
        continue
      }
      if (input.kind === "clear") {
        session.clear()
        renderer.info("Conversation history cleared.")
        continue
      }
      if (input.kind === "unknown") {
        renderer.error(`Unknown command: ${input.command}. Type /help for commands.`)
        continue
      }

      try {
        renderer.finishTurn(await session.invoke(input.text))
      } catch (e) {
        renderer.error(`error: ${errorMessage(e)}`)
      }
    }
  } finally {
    rl.close()
  }
}

async function spawnOne(role: string, description: string, prompt: string, raw: unknown): Promise<void> {
  const { opts, session } = await setup(raw)
  const task = createSubagentTask(parseSubagentRole(role), description, prompt, {
    includeTools: opts.tools ?? false,
    model: opts.model,
  })
  const run = await session.spawnTask(task)
  process.stdout.write(`${formatSubagentResult(run)}\n`)
}

async function fanOut(file: string, raw: unknown): Promise<void> {
  const { opts, session, renderer } = await setup(raw)
  let json: unknown
  try {
    json = JSON.parse(await fs.readFile(file, "utf8"))
  } catch (e) {
    throw new ConfigError(`Cannot load task file ${file}: ${errorMessage(e)}`, { cause: e })
  }
  const parsed = FanOutFileSchema.safeParse(json)
  if (!parsed.success) {
    throw new ConfigError(`Invalid task file ${file}: ${parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ")}`)
  }
  const tasks = parsed.data.map((t) =>
    createSubagentTask(t.role, t.description, t.prompt, {
      includeContext: t.includeContext,
      includeTools: t.includeTools,
      model: t.model,
    }),
  )

  const result = await session.spawnTasks(tasks, opts.allOrNothing ? "all-or-nothing" : "settled")
  if (result.mode === "all-or-nothing") {
    for (const output of result.outputs) process.stdout.write(`${output}\n`)
    return
  }
  result.outcomes.forEach((outcome, index) => {
    if (outcome.ok) {
      process.stdout.write(`${outcome.output}\n`)
    } else {
      renderer.error(`error: task ${index + 1} failed: ${outcome.error.message}`)
      process.exitCode = 1
    }
  })
}

async function main() {
  const program = new Command()

  program
    .name("taskforce")
    .description("Tool-using chat agent with subagent delegation, on an Ollama-compatible endpoint")
    .version("0.1.0")

  const withCommonOptions = (cmd: Command) =>
    cmd
      .option("--provider <provider>", "ollama | mock")
      .option("--model <model>", "model name")
      .option("--base-url <url>", "chat endpoint base URL")
      .option("--workspace <path>", "workspace root")
      .option("--enable-shell", "enable the bash tool (dangerous)")
      .option("--enable-write", "enable the write and edit tools (dangerous)")
      .option("--think", "ask the model to stream its reasoning")
      .option("--quiet", "print only final answers")
      .option("--max-iterations <n>", "tool-call iterations per turn")

  withCommonOptions(
    program
      .command("run")
      .description("run one turn and print the answer")
      .argument("<prompt>", "what to ask")
      .option("--role <role>", "role prompt (roles/<role>.md)")
      .action(async (prompt: string, opts: unknown) => {
        await runOnce(prompt, opts)
      }),
  )

  withCommonOptions(
    program
      .command("chat")
      .description("interactive session")
      .option("--role <role>", "role prompt (roles/<role>.md)")
      .action(async (opts: unknown) => {
        await chat(opts)
      }),
  )

  withCommonOptions(
    program
      .command("spawn")
      .description("run a single subagent")
      .argument("<role>", "general-purpose | explore | plan | code-review | test-runner")
      .argument("<description>", "short task description")
      .argument("<prompt>", "detailed instructions")
      .option("--tools", "let the subagent use tools")
      .action(async (role: string, description: string, prompt: string, opts: unknown) => {
        await spawnOne(role, description, prompt, opts)
      }),
  )

  withCommonOptions(
    program
      .command("fanout")
      .description("run the subagent tasks listed in a JSON file concurrently")
      .argument("<file>", "JSON array of {role, description, prompt, includeTools?, model?}")
      .option("--all-or-nothing", "fail on the first failed task")
      .action(async (file: string, opts: unknown) => {
        await fanOut(file, opts)
      }),
  )

  await program.parseAsync(process.argv)
}

main().catch((e: unknown) => {
  process.stderr.write(`error: ${errorMessage(e)}\n`)
  process.exitCode = 1
})
