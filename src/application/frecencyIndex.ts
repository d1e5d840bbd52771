/**
 * Frecency Index
 *
 * In-memory map of visited directories backed by an IndexStorePort:
 * - load once at start (an unreadable store means an empty index that is
 *   never written back, so the file on disk is left as it was)
 * - recordVisit mutates in memory and schedules a deferred write
 * - flush writes now; callers await it before the process exits
 * - ranking and matching skip paths that are gone; removeStale forgets them
 */

import { resolve } from "path"
import type { RankedRecord, VisitRecord } from "../domain/types.ts"
import type { FileSystemPort, IndexStorePort } from "../ports/index.ts"
import { rankRecords } from "../domain/frecency.ts"
import { IndexIoError, InvalidPathError, NoMatchError, describeCause } from "../domain/errors.ts"
import { isStorablePath } from "../domain/indexFormat.ts"

const DEFAULT_FLUSH_DELAY_MS = 50

export interface FrecencyIndexOptions {
  fileSystem: FileSystemPort
  now?: () => number
  flushDelayMs?: number
}

export class FrecencyIndex {
  private records: Map<string, VisitRecord> = new Map()
  private dirty = false
  private loadFailed = false
  private flushTimer: ReturnType<typeof setTimeout> | null = null
  private pendingWrite: Promise<void> | null = null
  private readonly fileSystem: FileSystemPort
  private readonly now: () => number
  private readonly flushDelayMs: number

  constructor(
    private readonly store: IndexStorePort,
    options: FrecencyIndexOptions
  ) {
    this.fileSystem = options.fileSystem
    this.now = options.now ?? Date.now
    this.flushDelayMs = options.flushDelayMs ?? DEFAULT_FLUSH_DELAY_MS
  }

  async load(): Promise<void> {
    try {
      const loaded = await this.store.load()
      this.records = new Map(loaded.map(record => [record.path, { ...record }]))
      this.loadFailed = false
    } catch (error) {
      console.warn(`[index] ${describeCause(error)}; continuing with an empty index`)
      this.records = new Map()
      this.loadFailed = true
    }
    this.dirty = false
  }

  get size(): number {
    return this.records.size
  }

  get location(): string {
    return this.store.location
  }

  get(path: string): VisitRecord | undefined {
    const record = this.records.get(resolve(path))
    return record ? { ...record } : undefined
  }

  list(): VisitRecord[] {
    return Array.from(this.records.values(), record => ({ ...record }))
  }

  /**
   * Throws InvalidPathError for a path the index file cannot hold.
   */
  recordVisit(path: string): VisitRecord {
    const normalized = resolve(path)
    if (!isStorablePath(normalized)) {
      throw new InvalidPathError(normalized, "contains a line break")
    }

    const visitedAt = this.now()
    const existing = this.records.get(normalized)

    const record: VisitRecord = existing
      ? { path: normalized, visitCount: existing.visitCount + 1, lastVisited: visitedAt }
      : { path: normalized, visitCount: 1, lastVisited: visitedAt }

    this.records.set(normalized, record)
    this.dirty = true
    this.scheduleFlush()

    return { ...record }
  }

  /**
   * Ranked records whose directory still exists, best first.
   */
  async rankedList(limit = Number.POSITIVE_INFINITY): Promise<RankedRecord[]> {
    const result: RankedRecord[] = []

    for (const record of rankRecords(this.records.values(), this.now())) {
      if (result.length >= limit) break
      if (await this.fileSystem.isDirectory(record.path)) {
        result.push(record)
      }
    }

    return result
  }

  /**
   * Best-ranked existing path containing `query` (case-insensitive).
   * An empty query picks the top entry overall.
   */
  async bestMatch(query: string): Promise<string> {
    const needle = query.toLowerCase()

    for (const record of rankRecords(this.records.values(), this.now())) {
      if (needle && !record.path.toLowerCase().includes(needle)) continue
      if (await this.fileSystem.isDirectory(record.path)) {
        return record.path
      }
    }

    throw new NoMatchError(query)
  }

  /**
   * Drops every record whose directory is gone and writes the index.
   * Returns the removed paths.
   */
  async removeStale(): Promise<string[]> {
    const removed: string[] = []

    for (const path of Array.from(this.records.keys())) {
      if (!(await this.fileSystem.isDirectory(path))) {
        this.records.delete(path)
        removed.push(path)
      }
    }

    if (removed.length > 0) {
      this.dirty = true
    }
    await this.flush()

    return removed
  }

  /**
   * Writes pending changes now. Rejects with IndexIoError when the store
   * cannot be written, or was not readable at load; the changes stay pending.
   */
  async flush(): Promise<void> {
    if (this.flushTimer) {
      clearTimeout(this.flushTimer)
      this.flushTimer = null
    }

    if (this.pendingWrite) {
      // The flush that started that write reports its failure
      await this.pendingWrite.catch(() => undefined)
    }

    if (!this.dirty) return

    if (this.loadFailed) {
      throw new IndexIoError(this.store.location, "write", "it could not be read, refusing to overwrite it")
    }

    this.dirty = false
    this.pendingWrite = this.store.save(this.list())

    try {
      await this.pendingWrite
    } catch (error) {
      this.dirty = true
      throw error instanceof IndexIoError ? error : new IndexIoError(this.store.location, "write", error)
    } finally {
      this.pendingWrite = null
    }
  }

  private scheduleFlush(): void {
    if (this.flushTimer) return

    this.flushTimer = setTimeout(() => {
      this.flushTimer = null
      this.flush().catch(error => {
        console.error("[index] Deferred write failed:", describeCause(error))
      })
    }, this.flushDelayMs)
    this.flushTimer.unref()
  }
}
