/**
 * Shortcut labels for visible rows
 *
 * Labels are a pure function of the visible rows: every frame gets a fresh
 * assignment, so a label always points at what is on screen right now.
 */

/** Priority order. Leaves out keys bound to navigation (h j k l g G q / ? _ .) and digits. */
export const SHORTCUT_ALPHABET: readonly string[] = [
  "a", "s", "w", "e", "r", "t", "z", "x", "c", "v",
  "b", "y", "u", "i", "o", "p", "n", "m", "d", "f",
]

export interface ShortcutOptions {
  alphabet?: readonly string[]
  /** Keys that must not start or appear in a label, e.g. characters that extend the search. */
  reserved?: ReadonlySet<string>
}

export type LabelResolution =
  | { kind: "match"; index: number }
  | { kind: "prefix" }
  | { kind: "none" }

/**
 * Every sequence of `length` keys over `alphabet`, in lexicographic order of
 * the alphabet's priority.
 */
export function generateSequences(alphabet: readonly string[], length: number): string[] {
  if (length <= 0 || alphabet.length === 0) return []

  let sequences = [...alphabet]
  for (let i = 1; i < length; i++) {
    const next: string[] = []
    for (const head of sequences) {
      for (const key of alphabet) {
        next.push(head + key)
      }
    }
    sequences = next
  }
  return sequences
}

/**
 * Labels for `count` rows. All labels share one length (the smallest that
 * fits), so no label is a prefix of another. Returns an empty list when the
 * usable alphabet cannot label the rows.
 */
export function assignShortcuts(count: number, options: ShortcutOptions = {}): string[] {
  if (count <= 0) return []

  const reserved = options.reserved ?? new Set<string>()
  const available = (options.alphabet ?? SHORTCUT_ALPHABET).filter(key => !reserved.has(key))

  if (available.length === 0) return []
  if (available.length === 1 && count > 1) return []

  let length = 1
  while (available.length ** length < count) {
    length += 1
  }

  return generateSequences(available, length).slice(0, count)
}

export function resolveLabel(labels: readonly string[], keys: string): LabelResolution {
  if (!keys) return { kind: "none" }

  const index = labels.indexOf(keys)
  if (index !== -1) {
    return { kind: "match", index }
  }

  if (labels.some(label => label.startsWith(keys))) {
    return { kind: "prefix" }
  }

  return { kind: "none" }
}
