import { describe, expect, it } from "vitest"

import { decodeIndex, decodeRecord, encodeIndex, encodeRecord, isStorablePath } from "./indexFormat.ts"

describe("encodeRecord", () => {
  it("writes path, count and timestamp separated by pipes", () => {
    expect(encodeRecord({ path: "/home/u/src", visitCount: 3, lastVisited: 1700000000000 })).toBe(
      "/home/u/src|3|1700000000000"
    )
  })
})

describe("isStorablePath", () => {
  it("accepts pipes and spaces but not line breaks", () => {
    expect(isStorablePath("/a|b c")).toBe(true)
    expect(isStorablePath("/a\nb")).toBe(false)
    expect(isStorablePath("/a\rb")).toBe(false)
  })
})

describe("decodeRecord", () => {
  it("reads a well-formed line", () => {
    expect(decodeRecord("/a/b|2|1000")).toEqual({ path: "/a/b", visitCount: 2, lastVisited: 1000 })
  })

  it("keeps pipes that belong to the path", () => {
    expect(decodeRecord("/a|b|4|1000")).toEqual({ path: "/a|b", visitCount: 4, lastVisited: 1000 })
  })

  it("ignores a trailing carriage return", () => {
    expect(decodeRecord("/a|1|5\r")).toEqual({ path: "/a", visitCount: 1, lastVisited: 5 })
  })

  it("rejects malformed lines", () => {
    expect(decodeRecord("garbage")).toBeNull()
    expect(decodeRecord("/a|1")).toBeNull()
    expect(decodeRecord("relative|1|5")).toBeNull()
    expect(decodeRecord("/a|x|5")).toBeNull()
    expect(decodeRecord("/a|1|-5")).toBeNull()
    expect(decodeRecord("/a|0|5")).toBeNull()
    expect(decodeRecord("|1|5")).toBeNull()
  })
})

describe("encodeIndex / decodeIndex", () => {
  it("writes one line per record with a trailing newline", () => {
    const content = encodeIndex([
      { path: "/a", visitCount: 1, lastVisited: 10 },
      { path: "/b", visitCount: 2, lastVisited: 20 },
    ])

    expect(content).toBe("/a|1|10\n/b|2|20\n")
  })

  it("writes nothing for an empty index", () => {
    expect(encodeIndex([])).toBe("")
  })

  it("reads back what it wrote", () => {
    const records = [
      { path: "/a|pipe", visitCount: 7, lastVisited: 1700000000000 },
      { path: "/b", visitCount: 1, lastVisited: 0 },
    ]

    expect(decodeIndex(encodeIndex(records))).toEqual(records)
  })

  it("skips corrupt and blank lines", () => {
    expect(decodeIndex("/a|1|10\nnot a record\n\n/b|2|20\n")).toEqual([
      { path: "/a", visitCount: 1, lastVisited: 10 },
      { path: "/b", visitCount: 2, lastVisited: 20 },
    ])
  })

  it("leaves out a path with a line break instead of splitting it into a fake record", () => {
    const content = encodeIndex([
      { path: "/a", visitCount: 1, lastVisited: 10 },
      { path: "/x\n/etc|999|99", visitCount: 1, lastVisited: 20 },
    ])

    expect(content).toBe("/a|1|10\n")
    expect(decodeIndex(content)).toEqual([{ path: "/a", visitCount: 1, lastVisited: 10 }])
  })

  it("keeps the last line for a repeated path", () => {
    expect(decodeIndex("/a|1|10\n/a|5|50\n")).toEqual([{ path: "/a", visitCount: 5, lastVisited: 50 }])
  })
})
