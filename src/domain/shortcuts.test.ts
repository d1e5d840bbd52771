import { describe, expect, it } from "vitest"

import { SHORTCUT_ALPHABET, assignShortcuts, generateSequences, resolveLabel } from "./shortcuts.ts"

describe("generateSequences", () => {
  it("enumerates sequences in alphabet priority order", () => {
    expect(generateSequences(["a", "s"], 2)).toEqual(["aa", "as", "sa", "ss"])
  })

  it("returns nothing for a zero length or an empty alphabet", () => {
    expect(generateSequences(["a"], 0)).toEqual([])
    expect(generateSequences([], 2)).toEqual([])
  })
})

describe("assignShortcuts", () => {
  it("uses single keys while the alphabet is large enough", () => {
    expect(assignShortcuts(3)).toEqual(["a", "s", "w"])
    expect(assignShortcuts(SHORTCUT_ALPHABET.length)).toEqual([...SHORTCUT_ALPHABET])
  })

  it("switches every label to two keys once single keys run out", () => {
    const labels = assignShortcuts(21)

    expect(labels).toHaveLength(21)
    expect(labels.every(label => label.length === 2)).toBe(true)
    expect(labels.slice(0, 3)).toEqual(["aa", "as", "aw"])
    expect(new Set(labels).size).toBe(21)
  })

  it("never produces a label that prefixes another", () => {
    const labels = assignShortcuts(45)

    for (const label of labels) {
      expect(labels.filter(other => other !== label && other.startsWith(label))).toEqual([])
    }
  })

  it("skips reserved keys everywhere in a label", () => {
    const reserved = new Set(["a", "s"])
    const labels = assignShortcuts(25, { reserved })

    expect(labels[0]).toBe("ww")
    expect(labels.some(label => label.includes("a") || label.includes("s"))).toBe(false)
  })

  it("returns nothing when the usable alphabet cannot label the rows", () => {
    expect(assignShortcuts(0)).toEqual([])
    expect(assignShortcuts(2, { alphabet: ["a", "s"], reserved: new Set(["a", "s"]) })).toEqual([])
    expect(assignShortcuts(2, { alphabet: ["a", "s"], reserved: new Set(["s"]) })).toEqual([])
    expect(assignShortcuts(1, { alphabet: ["a", "s"], reserved: new Set(["s"]) })).toEqual(["a"])
  })

  it("leaves navigation keys out of the default alphabet", () => {
    for (const navKey of ["h", "j", "k", "l", "g", "q"]) {
      expect(SHORTCUT_ALPHABET).not.toContain(navKey)
    }
  })
})

describe("resolveLabel", () => {
  const labels = ["aa", "as", "sa"]

  it("matches a complete label", () => {
    expect(resolveLabel(labels, "as")).toEqual({ kind: "match", index: 1 })
  })

  it("reports a prefix of some label", () => {
    expect(resolveLabel(labels, "s")).toEqual({ kind: "prefix" })
  })

  it("reports keys that lead nowhere", () => {
    expect(resolveLabel(labels, "w")).toEqual({ kind: "none" })
    expect(resolveLabel(labels, "")).toEqual({ kind: "none" })
  })
})
