/**
 * Ports - interfaces the application layer depends on
 */

import type { FileEntry, VisitRecord } from "../domain/types.ts"

// ============================================
// FileSystem Port
// ============================================

export interface FileSystemPort {
  /**
   * Immediate children of `path`, symlinks reported by what they point at.
   * Rejects when the directory itself cannot be read.
   */
  listDirectory(path: string): Promise<FileEntry[]>
  isDirectory(path: string): Promise<boolean>
}

// ============================================
// Index Store Port
// ============================================

export interface IndexStorePort {
  /** Resolves to an empty list when nothing has been stored yet. */
  load(): Promise<VisitRecord[]>
  /** Replaces the stored records as a whole. */
  save(records: VisitRecord[]): Promise<void>
  readonly location: string
}

// ============================================
// Settings Port
// ============================================

export interface Settings {
  /** Index file path; null uses $DIRHOP_INDEX_FILE or ~/.dirhop. */
  indexFile: string | null
  frecentLimit: number
  sequenceTimeoutMs: number
  flushDelayMs: number
  showHidden: boolean
}

export interface SettingsPort {
  /** Never rejects; anything unreadable falls back to the defaults. */
  load(): Promise<Settings>
}

export const defaultSettings: Settings = {
  indexFile: null,
  frecentLimit: 50,
  sequenceTimeoutMs: 1000,
  flushDelayMs: 50,
  showHidden: false,
}
