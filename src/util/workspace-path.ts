import path from "node:path"

const ALLOWED_ENV_FILENAMES = new Set([".env.example", ".env.sample", ".env.template"])

export function resolveWorkspacePath(workspaceRoot: string, inputPath: string): string {
  const root = path.resolve(workspaceRoot)
  const resolved = path.resolve(root, inputPath)
  if (resolved === root) return resolved
  if (resolved.startsWith(root + path.sep)) return resolved
  throw new Error(`Path escapes workspace root: ${inputPath}`)
}

/** `.env` files and the runtime's own settings directory stay out of reach of tools. */
export function isSensitivePath(workspaceRoot: string, fullPath: string): boolean {
  const rel = path.relative(path.resolve(workspaceRoot), fullPath)
  const parts = rel.split(path.sep).filter(Boolean).map((p) => p.toLowerCase())
  if (parts.includes(".taskforce")) return true

  const base = path.basename(fullPath).toLowerCase()
  if (ALLOWED_ENV_FILENAMES.has(base)) return false
  return base === ".env" || base.startsWith(".env.")
}

export function resolveToolPath(workspaceRoot: string, inputPath: string): string {
  const fullPath = resolveWorkspacePath(workspaceRoot, inputPath)
  if (isSensitivePath(workspaceRoot, fullPath)) {
    throw new Error(`Access denied for sensitive path: ${inputPath}`)
  }
  return fullPath
}
