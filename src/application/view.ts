/**
 * View projection - what one frame shows, derived from NavState only
 */

import type { Entry, NavState } from "../domain/types.ts"
import type { MatchParts } from "../domain/filter.ts"
import { splitMatch } from "../domain/filter.ts"
import { assignShortcuts } from "../domain/shortcuts.ts"
import { getFilteredEntries } from "./store.ts"

export interface VisibleRow {
  entry: Entry
  /** Index into the filtered list. */
  index: number
  label: string | null
  match: MatchParts
  isSelected: boolean
}

export interface NavView {
  rows: VisibleRow[]
  labels: string[]
  total: number
  hasMoreAbove: boolean
  hasMoreBelow: boolean
}

export function selectView(state: NavState): NavView {
  const filtered = getFilteredEntries(state)
  const window = filtered.slice(state.scrollOffset, state.scrollOffset + state.viewportHeight)
  const matches = window.map(entry => splitMatch(entry.name, state.searchBuffer))
  const labels = labelsFor(state, filtered, window.length)

  const rows = window.map((entry, offset) => {
    const index = state.scrollOffset + offset
    return {
      entry,
      index,
      label: labels[offset] ?? null,
      match: matches[offset] ?? splitMatch(entry.name, ""),
      isSelected: index === state.cursorIndex,
    }
  })

  return {
    rows,
    labels,
    total: filtered.length,
    hasMoreAbove: state.scrollOffset > 0,
    hasMoreBelow: state.scrollOffset + window.length < filtered.length,
  }
}

/**
 * While typing a search, keys that would extend any match, on screen or
 * not, are not usable as labels, and an empty search shows none.
 */
function labelsFor(state: NavState, filtered: Entry[], count: number): string[] {
  const mode = state.mode === "help" ? state.previousMode : state.mode

  if (mode === "exiting") return []

  if (mode === "searching") {
    if (!state.searchBuffer) return []
    const reserved = new Set<string>()
    for (const entry of filtered) {
      const { nextChar } = splitMatch(entry.name, state.searchBuffer)
      if (nextChar) reserved.add(nextChar)
    }
    return assignShortcuts(count, { reserved })
  }

  return assignShortcuts(count)
}
