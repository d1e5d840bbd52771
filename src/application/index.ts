/**
 * Application layer barrel export
 */

export { FrecencyIndex } from "./frecencyIndex.ts"
export { EntrySource, abbreviateHome } from "./entrySource.ts"
export { NavStore, navReducer, createInitialState, getFilteredEntries, getSelectedEntry } from "./store.ts"
export { resolveKey, printableKey, DEFAULT_SEQUENCE_TIMEOUT_MS } from "./keymap.ts"
export { selectView } from "./view.ts"
export { Navigator } from "./navigator.ts"
export { parseArgs, push, jump, prune, USAGE, ExitCode } from "./cli.ts"
export type { Listing } from "./entrySource.ts"
export type { NavCommand } from "./keymap.ts"
export type { NavView, VisibleRow } from "./view.ts"
export type { CliCommand, CliContext, CliOutput } from "./cli.ts"
