/**
 * Keymap - resolves a key event against the current NavState
 *
 * Browsing:
 *   j/k, arrows       move          gg/Home, G/End   first / last
 *   h/Left/Backspace  parent        l/Right/Enter    descend
 *   /                 search        _                clear search
 *   Ctrl+F / Ctrl+D   frecent / children
 *   ?                 help          .                choose current directory
 *   q/Esc             quit          labels           descend into that row
 *
 * Searching: printable keys extend the query unless they complete a label;
 * Enter keeps the filter, Esc drops it.
 */

import type { Category, KeyEvent, NavAction, NavState } from "../domain/types.ts"
import { resolveLabel } from "../domain/shortcuts.ts"
import { selectView } from "./view.ts"

export const DEFAULT_SEQUENCE_TIMEOUT_MS = 1000

export type NavCommand =
  | { type: "dispatch"; action: NavAction }
  | { type: "descend"; index?: number }
  | { type: "parent" }
  | { type: "switchCategory"; category: Category }
  | { type: "chooseCurrent" }
  | { type: "quit" }
  /** Handle the same event again once the preceding commands have run. */
  | { type: "replay" }

const dispatch = (action: NavAction): NavCommand => ({ type: "dispatch", action })

/**
 * The character a key types, or null for special keys and chords.
 */
export function printableKey(event: KeyEvent): string | null {
  if (event.ctrl || event.meta) return null
  if (event.sequence.length !== 1) return null
  return event.sequence >= " " && event.sequence !== "\x7f" ? event.sequence : null
}

export function resolveKey(
  state: NavState,
  event: KeyEvent,
  now: number,
  timeoutMs = DEFAULT_SEQUENCE_TIMEOUT_MS
): NavCommand[] {
  if (event.ctrl && event.name === "c") {
    return [{ type: "quit" }]
  }

  if (state.mode === "exiting") return []

  if (state.mode === "help") {
    if (event.name === "?" || event.name === "escape" || event.name === "q") {
      return [dispatch({ type: "TOGGLE_HELP" })]
    }
    return []
  }

  const commands: NavCommand[] = []
  const key = printableKey(event)

  if (state.pendingKeys) {
    commands.push(dispatch({ type: "CLEAR_PENDING_KEYS" }))
    const fresh = now - state.pendingKeys.at <= timeoutMs

    if (fresh && key !== null) {
      const sequence = state.pendingKeys.keys + key

      if (state.mode === "browsing" && sequence === "gg") {
        return [...commands, dispatch({ type: "SELECT_FIRST" })]
      }

      const completed = resolveSequence(state, sequence, now)
      if (completed) return [...commands, ...completed]
    }

    if (state.mode === "searching") {
      // The buffered keys were not a label after all: they are search text
      return [
        ...commands,
        dispatch({ type: "SEARCH_INPUT", text: state.pendingKeys.keys }),
        { type: "replay" },
      ]
    }
  }

  const resolved =
    state.mode === "searching" ? resolveSearching(state, event, key, now) : resolveBrowsing(state, event, key, now)

  return [...commands, ...resolved]
}

function resolveSequence(state: NavState, sequence: string, now: number): NavCommand[] | null {
  const view = selectView(state)
  const resolution = resolveLabel(view.labels, sequence)

  switch (resolution.kind) {
    case "match":
      return [{ type: "descend", index: state.scrollOffset + resolution.index }]
    case "prefix":
      return [dispatch({ type: "SET_PENDING_KEYS", keys: sequence, at: now })]
    default:
      return null
  }
}

function resolveCategoryChord(event: KeyEvent): NavCommand[] | null {
  if (!event.ctrl) return null
  if (event.name === "f") return [{ type: "switchCategory", category: "frecent" }]
  if (event.name === "d") return [{ type: "switchCategory", category: "children" }]
  return null
}

function resolveSearching(
  state: NavState,
  event: KeyEvent,
  key: string | null,
  now: number
): NavCommand[] {
  const chord = resolveCategoryChord(event)
  if (chord) return chord

  switch (event.name) {
    case "escape":
      return [dispatch({ type: "CANCEL_SEARCH" })]
    case "enter":
      return [dispatch({ type: "COMMIT_SEARCH" })]
    case "backspace":
      return [dispatch({ type: "SEARCH_BACKSPACE" })]
    case "up":
      return [dispatch({ type: "MOVE_CURSOR", delta: -1 })]
    case "down":
      return [dispatch({ type: "MOVE_CURSOR", delta: 1 })]
    case "pageup":
      return [dispatch({ type: "MOVE_CURSOR", delta: -state.viewportHeight })]
    case "pagedown":
      return [dispatch({ type: "MOVE_CURSOR", delta: state.viewportHeight })]
    case "home":
      return [dispatch({ type: "SELECT_FIRST" })]
    case "end":
      return [dispatch({ type: "SELECT_LAST" })]
    default:
      break
  }

  if (key === null) return []
  if (key === "_") return [dispatch({ type: "CLEAR_SEARCH" })]

  if (state.searchBuffer) {
    const completed = resolveSequence(state, key, now)
    if (completed) return completed
  }

  return [dispatch({ type: "SEARCH_INPUT", text: key })]
}

function resolveBrowsing(
  state: NavState,
  event: KeyEvent,
  key: string | null,
  now: number
): NavCommand[] {
  const chord = resolveCategoryChord(event)
  if (chord) return chord

  switch (event.name) {
    case "escape":
      return [{ type: "quit" }]
    case "down":
      return [dispatch({ type: "MOVE_CURSOR", delta: 1 })]
    case "up":
      return [dispatch({ type: "MOVE_CURSOR", delta: -1 })]
    case "pageup":
      return [dispatch({ type: "MOVE_CURSOR", delta: -state.viewportHeight })]
    case "pagedown":
      return [dispatch({ type: "MOVE_CURSOR", delta: state.viewportHeight })]
    case "home":
      return [dispatch({ type: "SELECT_FIRST" })]
    case "end":
      return [dispatch({ type: "SELECT_LAST" })]
    case "left":
    case "backspace":
      return [{ type: "parent" }]
    case "right":
    case "enter":
      return [{ type: "descend" }]
    default:
      break
  }

  switch (key) {
    case null:
      return []
    case "q":
      return [{ type: "quit" }]
    case "j":
      return [dispatch({ type: "MOVE_CURSOR", delta: 1 })]
    case "k":
      return [dispatch({ type: "MOVE_CURSOR", delta: -1 })]
    case "g":
      return [dispatch({ type: "SET_PENDING_KEYS", keys: "g", at: now })]
    case "G":
      return [dispatch({ type: "SELECT_LAST" })]
    case "h":
      return [{ type: "parent" }]
    case "l":
      return [{ type: "descend" }]
    case "/":
      return [dispatch({ type: "START_SEARCH" })]
    case "_":
      return [dispatch({ type: "CLEAR_SEARCH" })]
    case "?":
      return [dispatch({ type: "TOGGLE_HELP" })]
    case ".":
      return [{ type: "chooseCurrent" }]
    default:
      return resolveSequence(state, key, now) ?? []
  }
}
