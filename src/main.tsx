/**
 * dirhop - entry point
 *
 * stdout carries nothing but the chosen path, so a shell function can
 * `cd "$(dirhop)"`. The interactive frame is drawn on stderr.
 */

import { render } from "ink"
import { fileSystem, FileIndexStore, resolveIndexLocation, settings } from "./adapters/index.ts"
import { EntrySource, ExitCode, FrecencyIndex, Navigator, USAGE, jump, parseArgs, prune, push } from "./application/index.ts"
import type { CliContext } from "./application/index.ts"
import type { Settings } from "./ports/index.ts"
import { describeCause } from "./domain/errors.ts"
import { App } from "./ui/App.tsx"

async function main(args: string[]): Promise<number> {
  const command = parseArgs(args)

  if (command.kind === "help") {
    process.stderr.write(USAGE)
    return ExitCode.Ok
  }

  if (command.kind === "invalid") {
    process.stderr.write(`dirhop: ${command.message}\n\n${USAGE}`)
    return ExitCode.Usage
  }

  const config = await settings.load()
  const store = new FileIndexStore(resolveIndexLocation(config.indexFile))
  const index = new FrecencyIndex(store, { fileSystem, flushDelayMs: config.flushDelayMs })
  await index.load()

  const context: CliContext = {
    index,
    fileSystem,
    cwd: process.cwd(),
    stdout: text => process.stdout.write(text),
    stderr: text => process.stderr.write(text),
  }

  switch (command.kind) {
    case "push":
      return push(context, command.path)
    case "jump":
      return jump(context, command.query)
    case "prune":
      return prune(context)
    case "interactive":
      return interactive(context, index, config)
  }
}

async function interactive(
  context: CliContext,
  index: FrecencyIndex,
  config: Settings
): Promise<number> {
  const source = new EntrySource(fileSystem, index, {
    showHidden: config.showHidden,
    frecentLimit: config.frecentLimit,
  })
  const navigator = new Navigator(source, {
    cwd: context.cwd,
    sequenceTimeoutMs: config.sequenceTimeoutMs,
  })

  const instance = render(<App navigator={navigator} />, {
    stdout: process.stderr,
    exitOnCtrlC: false,
  })

  await navigator.start()
  await instance.waitUntilExit()

  try {
    await index.flush()
  } catch (error) {
    console.error("[index]", describeCause(error))
  }

  const { result } = navigator.getState()
  if (result !== null) {
    context.stdout(`${result}\n`)
  }
  return ExitCode.Ok
}

main(process.argv.slice(2)).then(
  code => {
    process.exitCode = code
  },
  error => {
    console.error("[dirhop] Fatal error:", error)
    process.exitCode = ExitCode.Failure
  }
)
