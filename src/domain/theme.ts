/**
 * Theme - colors and glyphs used by the terminal UI
 *
 * Colors are hex strings; Ink passes them through chalk.
 */

import type { Theme } from "./types.ts"

export const folderIcon = "▸"
export const frecentIcon = "★"
export const selectionMarker = ">"

export const defaultTheme: Theme = {
  name: "default",
  colors: {
    foreground: "#d4d4d4",
    muted: "#6d8086",
    primary: "#569cd6",
    accent: "#c586c0",
    selection: "#264f78",
    label: "#89e051",
    labelText: "#1e1e1e",
    warning: "#e8ab53",
    border: "#3c3c3c",
  },
}

/**
 * Compact score for the frecent list: 149283 -> "149k", 1188.6 -> "1.2k".
 */
export function formatScore(score: number): string {
  if (score >= 100_000) return `${Math.round(score / 1000)}k`
  if (score >= 1000) return `${(score / 1000).toFixed(1)}k`
  return score.toFixed(0)
}
