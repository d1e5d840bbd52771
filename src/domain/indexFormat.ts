/**
 * Index file format
 *
 *   <path>|<visitCount>|<lastVisited>
 *
 * One record per line. The path is everything before the last two
 * separators, so a "|" inside a path survives a round trip. A line break
 * cannot, so such paths are never written. Lines that do not parse are
 * skipped.
 */

import { isAbsolute } from "node:path"
import type { VisitRecord } from "./types.ts"

const SEPARATOR = "|"

/** Whether `path` can be written as one index line. */
export function isStorablePath(path: string): boolean {
  return !/[\r\n]/.test(path)
}

export function encodeRecord(record: VisitRecord): string {
  return `${record.path}${SEPARATOR}${record.visitCount}${SEPARATOR}${record.lastVisited}`
}

export function decodeRecord(line: string): VisitRecord | null {
  const trimmed = line.replace(/\r$/, "")
  const timeSep = trimmed.lastIndexOf(SEPARATOR)
  if (timeSep <= 0) return null

  const countSep = trimmed.lastIndexOf(SEPARATOR, timeSep - 1)
  if (countSep <= 0) return null

  const path = trimmed.slice(0, countSep)
  const countText = trimmed.slice(countSep + 1, timeSep)
  const timeText = trimmed.slice(timeSep + 1)

  if (!isAbsolute(path) || !/^\d+$/.test(countText) || !/^\d+$/.test(timeText)) {
    return null
  }

  const visitCount = Number(countText)
  const lastVisited = Number(timeText)
  if (visitCount < 1 || !Number.isSafeInteger(visitCount) || !Number.isSafeInteger(lastVisited)) {
    return null
  }

  return { path, visitCount, lastVisited }
}

export function encodeIndex(records: Iterable<VisitRecord>): string {
  const lines: string[] = []
  for (const record of records) {
    if (!isStorablePath(record.path)) continue
    lines.push(encodeRecord(record))
  }
  return lines.length > 0 ? `${lines.join("\n")}\n` : ""
}

/**
 * Later lines win when a path appears twice.
 */
export function decodeIndex(content: string): VisitRecord[] {
  const byPath = new Map<string, VisitRecord>()

  for (const line of content.split("\n")) {
    if (!line.trim()) continue
    const record = decodeRecord(line)
    if (record) {
      byPath.set(record.path, record)
    }
  }

  return Array.from(byPath.values())
}
