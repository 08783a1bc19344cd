import { spawn } from "node:child_process"

export type RunCommandResult = {
  exitCode: number | null
  signal: NodeJS.Signals | null
  stdout: string
  stderr: string
  durationMs: number
  timedOut: boolean
  truncated: boolean
}

/**
 * Runs `command` through the shell in a child process, so a slow command
 * suspends only the agent that awaits it. Output beyond `maxOutputChars`
 * kills the child; so does the timeout.
 */
export async function runCommand(
  command: string,
  options: { cwd: string; timeoutMs: number; maxOutputChars: number },
): Promise<RunCommandResult> {
  const startedAt = Date.now()
  const child = spawn(command, {
    cwd: options.cwd,
    shell: true,
    env: process.env,
    stdio: ["ignore", "pipe", "pipe"],
  })

  let stdout = ""
  let stderr = ""
  let truncated = false

  const append = (target: "stdout" | "stderr", chunk: Buffer) => {
    const text = chunk.toString("utf8")
    if (target === "stdout") stdout += text
    else stderr += text

    if (stdout.length + stderr.length > options.maxOutputChars) {
      truncated = true
      child.kill("SIGKILL")
    }
  }

  child.stdout?.on("data", (c: Buffer) => append("stdout", c))
  child.stderr?.on("data", (c: Buffer) => append("stderr", c))

  let timeoutHandle: NodeJS.Timeout | undefined
  let timedOut = false
  if (options.timeoutMs > 0) {
    timeoutHandle = setTimeout(() => {
      timedOut = true
      child.kill("SIGKILL")
    }, options.timeoutMs)
  }

  try {
    const result = await new Promise<Pick<RunCommandResult, "exitCode" | "signal">>((resolve, reject) => {
      child.on("error", reject)
      child.on("close", (exitCode, signal) => resolve({ exitCode, signal }))
    })
    return { ...result, stdout, stderr, timedOut, truncated, durationMs: Date.now() - startedAt }
  } finally {
    if (timeoutHandle) clearTimeout(timeoutHandle)
  }
}
