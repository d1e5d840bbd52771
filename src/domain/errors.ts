/**
 * Error taxonomy
 *
 * Every error is recovered at the boundary that produced it; only the
 * non-interactive commands turn one into an exit code.
 */

export class IndexIoError extends Error {
  readonly location: string

  constructor(location: string, action: "read" | "write", cause: unknown) {
    super(`Failed to ${action} index ${location}: ${describeCause(cause)}`, { cause })
    this.name = "IndexIoError"
    this.location = location
  }
}

export class PermissionDeniedError extends Error {
  readonly path: string

  constructor(path: string, cause?: unknown) {
    super(`Permission denied: ${path}`, { cause })
    this.name = "PermissionDeniedError"
    this.path = path
  }
}

export class NoMatchError extends Error {
  readonly query: string

  constructor(query: string) {
    super(query ? `No match for "${query}"` : "Index is empty")
    this.name = "NoMatchError"
    this.query = query
  }
}

export class InvalidPathError extends Error {
  readonly path: string

  constructor(path: string, reason = "not a directory") {
    super(`Invalid path ${JSON.stringify(path)}: ${reason}`)
    this.name = "InvalidPathError"
    this.path = path
  }
}

export function errorCode(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error) {
    const code = error.code
    return typeof code === "string" ? code : undefined
  }
  return undefined
}

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message
  return String(cause)
}
