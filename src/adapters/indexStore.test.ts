import { afterEach, beforeEach, describe, expect, it } from "vitest"
import { mkdir, mkdtemp, readFile, readdir, rm, writeFile } from "fs/promises"
import { tmpdir } from "os"
import { join } from "path"

import { DEFAULT_INDEX_FILE, FileIndexStore, resolveIndexLocation } from "./indexStore.ts"
import { IndexIoError } from "../domain/errors.ts"

let dir: string

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), "dirhop-index-"))
})

afterEach(async () => {
  await rm(dir, { recursive: true, force: true })
})

describe("FileIndexStore", () => {
  it("loads an empty index when the file does not exist", async () => {
    const store = new FileIndexStore(join(dir, "missing"))

    await expect(store.load()).resolves.toEqual([])
  })

  it("loads records and skips corrupt lines", async () => {
    const location = join(dir, "index")
    await writeFile(location, "/a|2|100\n???\n/b|1|200\n")

    await expect(new FileIndexStore(location).load()).resolves.toEqual([
      { path: "/a", visitCount: 2, lastVisited: 100 },
      { path: "/b", visitCount: 1, lastVisited: 200 },
    ])
  })

  it("saves records and leaves no temp file behind", async () => {
    const location = join(dir, "nested", "index")
    const store = new FileIndexStore(location)

    await store.save([{ path: "/a", visitCount: 3, lastVisited: 42 }])

    expect(await readFile(location, "utf8")).toBe("/a|3|42\n")
    expect(await readdir(join(dir, "nested"))).toEqual(["index"])
  })

  it("replaces the previous contents as a whole", async () => {
    const location = join(dir, "index")
    const store = new FileIndexStore(location)

    await store.save([
      { path: "/a", visitCount: 1, lastVisited: 1 },
      { path: "/b", visitCount: 1, lastVisited: 2 },
    ])
    await store.save([{ path: "/b", visitCount: 2, lastVisited: 3 }])

    expect(await readFile(location, "utf8")).toBe("/b|2|3\n")
  })

  it("wraps read failures in IndexIoError", async () => {
    const location = join(dir, "is-a-directory")
    await mkdir(location)

    await expect(new FileIndexStore(location).load()).rejects.toBeInstanceOf(IndexIoError)
  })

  it("wraps write failures in IndexIoError and cleans up", async () => {
    const location = join(dir, "is-a-directory")
    await mkdir(location)
    await writeFile(join(location, "child"), "")

    await expect(new FileIndexStore(location).save([])).rejects.toBeInstanceOf(IndexIoError)
    expect(await readdir(dir)).toEqual(["is-a-directory"])
  })
})

describe("resolveIndexLocation", () => {
  it("prefers the environment variable", () => {
    expect(resolveIndexLocation("/from/settings", { DIRHOP_INDEX_FILE: "/from/env" })).toBe("/from/env")
  })

  it("falls back to the configured path, then the default", () => {
    expect(resolveIndexLocation("/from/settings", {})).toBe("/from/settings")
    expect(resolveIndexLocation(null, { DIRHOP_INDEX_FILE: "  " })).toBe(DEFAULT_INDEX_FILE)
  })
})
