/**
 * EntryList Component - the visible window of entries
 *
 * Features:
 * - Shortcut label badge per row
 * - Underlined search hit
 * - Score column for frecent entries
 * - Scroll indicators
 */

import { Box, Text } from "ink"
import type { Category, Theme } from "../../domain/types.ts"
import type { NavView, VisibleRow } from "../../application/view.ts"
import { folderIcon, formatScore, selectionMarker } from "../../domain/theme.ts"

interface EntryListProps {
  view: NavView
  category: Category
  theme: Theme
  width: number
  loading: boolean
}

export function EntryList({ view, category, theme, width, loading }: EntryListProps) {
  const { colors } = theme

  if (loading && view.rows.length === 0) {
    return (
      <Box paddingLeft={1}>
        <Text color={colors.muted}>Loading...</Text>
      </Box>
    )
  }

  if (view.rows.length === 0) {
    return (
      <Box paddingLeft={1}>
        <Text color={colors.muted}>
          {category === "frecent" ? "No frecent directories yet" : "No subdirectories"}
        </Text>
      </Box>
    )
  }

  const labelWidth = Math.max(0, ...view.labels.map(label => label.length))

  return (
    <Box flexDirection="column">
      {view.hasMoreAbove && <Text color={colors.muted}>{"  ↑ more"}</Text>}
      {view.rows.map(row => (
        <EntryRow
          key={row.entry.path}
          row={row}
          labelWidth={labelWidth}
          showScore={category === "frecent"}
          theme={theme}
          width={width}
        />
      ))}
      {view.hasMoreBelow && <Text color={colors.muted}>{"  ↓ more"}</Text>}
    </Box>
  )
}

interface EntryRowProps {
  row: VisibleRow
  labelWidth: number
  showScore: boolean
  theme: Theme
  width: number
}

function EntryRow({ row, labelWidth, showScore, theme, width }: EntryRowProps) {
  const { colors } = theme
  const bg = row.isSelected ? colors.selection : undefined
  const marker = row.isSelected ? selectionMarker : " "
  const score = showScore && row.entry.score !== undefined ? formatScore(row.entry.score) : null
  const nameWidth = Math.max(8, width - labelWidth - (score ? score.length + 1 : 0) - 6)
  const { prefix, hit, suffix } = fitMatch(row.match, nameWidth)

  return (
    <Box height={1} flexDirection="row">
      <Text color={colors.primary} backgroundColor={bg}>
        {marker}
      </Text>
      {labelWidth > 0 && (
        <Text color={colors.labelText} backgroundColor={row.label ? colors.label : bg}>
          {(row.label ?? "").padEnd(labelWidth)}
        </Text>
      )}
      <Text color={colors.muted} backgroundColor={bg}>
        {` ${folderIcon} `}
      </Text>
      <Text color={colors.foreground} backgroundColor={bg} bold={row.isSelected}>
        {prefix}
      </Text>
      <Text color={colors.accent} backgroundColor={bg} underline>
        {hit}
      </Text>
      <Text color={colors.foreground} backgroundColor={bg} bold={row.isSelected}>
        {`${suffix}/`}
      </Text>
      {score && (
        <Text color={colors.muted} backgroundColor={bg}>
          {` ${score}`}
        </Text>
      )}
    </Box>
  )
}

/**
 * Truncates from the start so the end of long paths stays readable.
 */
function fitMatch(
  match: VisibleRow["match"],
  maxLen: number
): { prefix: string; hit: string; suffix: string } {
  const total = match.prefix.length + match.hit.length + match.suffix.length
  if (total <= maxLen) {
    return match
  }

  let overflow = total - maxLen + 1
  let prefix = match.prefix
  let hit = match.hit
  let suffix = match.suffix

  const cutPrefix = Math.min(overflow, prefix.length)
  prefix = prefix.slice(cutPrefix)
  overflow -= cutPrefix

  const cutHit = Math.min(overflow, hit.length)
  hit = hit.slice(cutHit)
  overflow -= cutHit

  suffix = suffix.slice(overflow)

  return { prefix: `…${prefix}`, hit, suffix }
}
