/**
 * Entry Source - builds the candidate list for a browsing context
 */

import { homedir } from "os"
import type { Category, Entry, FileEntry } from "../domain/types.ts"
import type { FileSystemPort } from "../ports/index.ts"
import { PermissionDeniedError, describeCause, errorCode } from "../domain/errors.ts"
import type { FrecencyIndex } from "./frecencyIndex.ts"

export interface Listing {
  entries: Entry[]
  warning: string | null
}

export interface EntrySourceOptions {
  showHidden?: boolean
  frecentLimit?: number
  home?: string
}

export class EntrySource {
  private readonly showHidden: boolean
  private readonly frecentLimit: number
  private readonly home: string

  constructor(
    private readonly fileSystem: FileSystemPort,
    private readonly index: FrecencyIndex,
    options: EntrySourceOptions = {}
  ) {
    this.showHidden = options.showHidden ?? false
    this.frecentLimit = options.frecentLimit ?? 50
    this.home = options.home ?? homedir()
  }

  get hasHistory(): boolean {
    return this.index.size > 0
  }

  load(category: Category, path: string): Promise<Listing> {
    return category === "frecent" ? this.frecentEntries(this.frecentLimit) : this.childrenOf(path)
  }

  /**
   * Immediate subdirectories, case-insensitive by name. Never rejects: a
   * directory that cannot be read yields no entries and a warning.
   */
  async childrenOf(path: string): Promise<Listing> {
    let items: FileEntry[]
    try {
      items = await this.fileSystem.listDirectory(path)
    } catch (error) {
      const code = errorCode(error)
      const reason =
        code === "EACCES" || code === "EPERM"
          ? new PermissionDeniedError(path, error).message
          : code === "ENOENT"
            ? `Directory no longer exists: ${path}`
            : `Cannot list ${path}: ${describeCause(error)}`
      return { entries: [], warning: reason }
    }

    const entries = items
      .filter(item => item.type === "directory")
      .filter(item => this.showHidden || !item.name.startsWith("."))
      .map(item => ({ name: item.name, path: item.path }))
      .sort(compareNames)

    return { entries, warning: null }
  }

  async frecentEntries(limit: number): Promise<Listing> {
    const ranked = await this.index.rankedList(limit)
    return {
      entries: ranked.map(record => ({
        name: abbreviateHome(record.path, this.home),
        path: record.path,
        score: record.score,
      })),
      warning: null,
    }
  }
}

function compareNames(a: Entry, b: Entry): number {
  const left = a.name.toLowerCase()
  const right = b.name.toLowerCase()
  if (left !== right) return left < right ? -1 : 1
  return a.name < b.name ? -1 : a.name > b.name ? 1 : 0
}

export function abbreviateHome(path: string, home: string): string {
  if (!home || home === "/") return path
  if (path === home) return "~"
  if (path.startsWith(`${home}/`)) return `~${path.slice(home.length)}`
  return path
}
