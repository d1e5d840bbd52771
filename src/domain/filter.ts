/**
 * Live search over entry names
 */

import type { Entry } from "./types.ts"

export interface MatchParts {
  prefix: string
  hit: string
  suffix: string
  /** Character that would extend the match, lowercased; null at end of name. */
  nextChar: string | null
}

/**
 * Case-insensitive substring filter on display names. Keeps the input order;
 * an empty query returns the same list.
 */
export function filterEntries(entries: Entry[], query: string): Entry[] {
  if (!query) return entries

  const needle = query.toLowerCase()
  return entries.filter(entry => entry.name.toLowerCase().includes(needle))
}

export function splitMatch(name: string, query: string): MatchParts {
  if (!query) {
    return { prefix: name, hit: "", suffix: "", nextChar: null }
  }

  const index = name.toLowerCase().indexOf(query.toLowerCase())
  if (index === -1) {
    return { prefix: name, hit: "", suffix: "", nextChar: null }
  }

  const end = index + query.length
  const suffix = name.slice(end)
  const next = suffix.charAt(0)

  return {
    prefix: name.slice(0, index),
    hit: name.slice(index, end),
    suffix,
    nextChar: next ? next.toLowerCase() : null,
  }
}
