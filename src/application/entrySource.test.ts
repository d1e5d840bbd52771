import { describe, expect, it } from "vitest"

import { EntrySource, abbreviateHome } from "./entrySource.ts"
import { FrecencyIndex } from "./frecencyIndex.ts"
import { FakeFileSystem, MemoryIndexStore } from "../testing/fakes.ts"
import type { VisitRecord } from "../domain/types.ts"

const NOW = 1_700_000_000_000

async function createSource(
  fileSystem: FakeFileSystem,
  records: VisitRecord[] = [],
  options: { showHidden?: boolean; frecentLimit?: number } = {}
) {
  const index = new FrecencyIndex(new MemoryIndexStore(records), { fileSystem, now: () => NOW })
  await index.load()
  return new EntrySource(fileSystem, index, { ...options, home: "/home/u" })
}

describe("EntrySource.childrenOf", () => {
  it("lists subdirectories only, sorted case-insensitively", async () => {
    const fileSystem = new FakeFileSystem(
      ["/p/beta", "/p/Alpha", "/p/alpha", "/p/gamma"],
      ["/p/aardvark.txt"]
    )
    const source = await createSource(fileSystem)

    const listing = await source.childrenOf("/p")

    expect(listing.warning).toBeNull()
    expect(listing.entries.map(entry => entry.name)).toEqual(["Alpha", "alpha", "beta", "gamma"])
    expect(listing.entries[0]).toEqual({ name: "Alpha", path: "/p/Alpha" })
  })

  it("hides dot-directories unless configured to show them", async () => {
    const fileSystem = new FakeFileSystem(["/p/.git", "/p/src"])

    const hidden = await (await createSource(fileSystem)).childrenOf("/p")
    const shown = await (await createSource(fileSystem, [], { showHidden: true })).childrenOf("/p")

    expect(hidden.entries.map(entry => entry.name)).toEqual(["src"])
    expect(shown.entries.map(entry => entry.name)).toEqual([".git", "src"])
  })

  it("turns a permission failure into a warning", async () => {
    const fileSystem = new FakeFileSystem(["/p/secret/inner"])
    fileSystem.denied.add("/p/secret")
    const source = await createSource(fileSystem)

    await expect(source.childrenOf("/p/secret")).resolves.toEqual({
      entries: [],
      warning: "Permission denied: /p/secret",
    })
  })

  it("reports a directory that disappeared", async () => {
    const source = await createSource(new FakeFileSystem())

    await expect(source.childrenOf("/vanished")).resolves.toEqual({
      entries: [],
      warning: "Directory no longer exists: /vanished",
    })
  })
})

describe("EntrySource.frecentEntries", () => {
  it("lists ranked directories with home abbreviated and scores attached", async () => {
    const fileSystem = new FakeFileSystem(["/home/u/code", "/srv/www"])
    const source = await createSource(fileSystem, [
      { path: "/srv/www", visitCount: 1, lastVisited: NOW },
      { path: "/home/u/code", visitCount: 2, lastVisited: NOW },
    ])

    const listing = await source.frecentEntries(10)

    expect(listing).toEqual({
      entries: [
        { name: "~/code", path: "/home/u/code", score: 60000 },
        { name: "/srv/www", path: "/srv/www", score: 30000 },
      ],
      warning: null,
    })
  })

  it("honours the configured limit through load", async () => {
    const fileSystem = new FakeFileSystem(["/a", "/b"])
    const source = await createSource(
      fileSystem,
      [
        { path: "/a", visitCount: 2, lastVisited: NOW },
        { path: "/b", visitCount: 1, lastVisited: NOW },
      ],
      { frecentLimit: 1 }
    )

    const listing = await source.load("frecent", "/")

    expect(listing.entries.map(entry => entry.path)).toEqual(["/a"])
    expect(source.hasHistory).toBe(true)
  })
})

describe("abbreviateHome", () => {
  it("replaces the home prefix with a tilde", () => {
    expect(abbreviateHome("/home/u", "/home/u")).toBe("~")
    expect(abbreviateHome("/home/u/x", "/home/u")).toBe("~/x")
  })

  it("leaves other paths alone", () => {
    expect(abbreviateHome("/home/user2", "/home/u")).toBe("/home/user2")
    expect(abbreviateHome("/x", "/")).toBe("/x")
  })
})
