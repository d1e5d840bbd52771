import type { RankedRecord, VisitRecord } from "./types.ts"

// ---------------------------------------------------------------------------
// Frecency score, after rupa/z:
//
//   score = 10000 * visits * 3.75 / (0.0001 * ageSeconds + 1.25)
//
// The denominator grows linearly with age, so one minute costs almost
// nothing while a year divides the weight by ~2500. Five visits a minute ago
// (~149 283) outrank a hundred visits a year ago (~1 189).
// ---------------------------------------------------------------------------

const SCALE = 10000
const WEIGHT = 3.75
const AGE_FACTOR = 0.0001
const AGE_OFFSET = 1.25

export function frecencyScore(record: VisitRecord, now = Date.now()): number {
  const ageSeconds = Math.max(0, now - record.lastVisited) / 1000
  return (SCALE * record.visitCount * WEIGHT) / (AGE_FACTOR * ageSeconds + AGE_OFFSET)
}

/**
 * Descending score, then more recent visit, then path order.
 */
export function compareRanked(a: RankedRecord, b: RankedRecord): number {
  if (b.score !== a.score) {
    return b.score - a.score
  }
  if (b.lastVisited !== a.lastVisited) {
    return b.lastVisited - a.lastVisited
  }
  return a.path < b.path ? -1 : a.path > b.path ? 1 : 0
}

export function rankRecords(records: Iterable<VisitRecord>, now = Date.now()): RankedRecord[] {
  const ranked: RankedRecord[] = []
  for (const record of records) {
    ranked.push({ ...record, score: frecencyScore(record, now) })
  }
  return ranked.sort(compareRanked)
}
