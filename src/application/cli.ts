/**
 * CLI commands - argument parsing and the non-interactive subcommands
 *
 * Commands return an exit code instead of exiting so main stays the only
 * place that touches the process.
 */

import { resolve } from "path"
import type { FileSystemPort } from "../ports/index.ts"
import type { FrecencyIndex } from "./frecencyIndex.ts"
import { IndexIoError, InvalidPathError, NoMatchError, describeCause } from "../domain/errors.ts"

export type CliCommand =
  | { kind: "interactive" }
  | { kind: "push"; path: string }
  | { kind: "jump"; query: string }
  | { kind: "prune" }
  | { kind: "help" }
  | { kind: "invalid"; message: string }

export const USAGE = `Usage:
  dirhop              browse frecent and nearby directories, print the chosen one
  dirhop push <path>  record a visit to <path>
  dirhop z [query]    print the best frecent directory matching query
  dirhop prune        forget directories that no longer exist
  dirhop -h, --help   show this help

Index file: $DIRHOP_INDEX_FILE, settings.indexFile, or ~/.dirhop
`

export const ExitCode = {
  Ok: 0,
  Failure: 1,
  Usage: 2,
} as const

export interface CliOutput {
  stdout: (text: string) => void
  stderr: (text: string) => void
}

export interface CliContext extends CliOutput {
  index: FrecencyIndex
  fileSystem: FileSystemPort
  cwd: string
}

export function parseArgs(args: string[]): CliCommand {
  const [command, ...rest] = args

  if (command === undefined) return { kind: "interactive" }
  if (command === "-h" || command === "--help") return { kind: "help" }

  if (command === "push") {
    const [path, ...extra] = rest
    if (path === undefined || extra.length > 0) {
      return { kind: "invalid", message: "push takes exactly one path" }
    }
    return { kind: "push", path }
  }

  if (command === "z") {
    return { kind: "jump", query: rest.join(" ") }
  }

  if (command === "prune") {
    if (rest.length > 0) return { kind: "invalid", message: "prune takes no arguments" }
    return { kind: "prune" }
  }

  return { kind: "invalid", message: `Unknown command: ${command}` }
}

/**
 * Records a visit and writes the index before returning. A path that cannot
 * be recorded is reported and skipped; the shell hook must not fail on it.
 */
export async function push(context: CliContext, path: string): Promise<number> {
  const target = resolve(context.cwd, path)

  if (!(await context.fileSystem.isDirectory(target))) {
    context.stderr(`dirhop: ${new InvalidPathError(target).message}\n`)
    return ExitCode.Ok
  }

  try {
    context.index.recordVisit(target)
    await context.index.flush()
  } catch (error) {
    if (error instanceof InvalidPathError) {
      context.stderr(`dirhop: ${error.message}\n`)
      return ExitCode.Ok
    }
    if (error instanceof IndexIoError) {
      context.stderr(`dirhop: ${error.message}\n`)
      return ExitCode.Failure
    }
    throw error
  }

  return ExitCode.Ok
}

/**
 * Prints the best match for `query`. Prints nothing when there is none.
 */
export async function jump(context: CliContext, query: string): Promise<number> {
  try {
    const path = await context.index.bestMatch(query)
    context.stdout(`${path}\n`)
    return ExitCode.Ok
  } catch (error) {
    if (error instanceof NoMatchError) {
      return ExitCode.Failure
    }
    context.stderr(`dirhop: ${describeCause(error)}\n`)
    return ExitCode.Failure
  }
}

/**
 * Forgets every indexed directory that is gone and prints each removed path.
 */
export async function prune(context: CliContext): Promise<number> {
  try {
    const removed = await context.index.removeStale()
    for (const path of removed) {
      context.stdout(`${path}\n`)
    }
    return ExitCode.Ok
  } catch (error) {
    if (error instanceof IndexIoError) {
      context.stderr(`dirhop: ${error.message}\n`)
      return ExitCode.Failure
    }
    throw error
  }
}
