/**
 * StatusBar Component - mode, search query, position and warnings
 */

import { Box, Text } from "ink"
import type { NavState, Theme } from "../../domain/types.ts"
import type { NavView } from "../../application/view.ts"

interface StatusBarProps {
  state: NavState
  view: NavView
  theme: Theme
}

export function StatusBar({ state, view, theme }: StatusBarProps) {
  const { colors } = theme
  const mode = getModeLabel(state)
  const position = view.total > 0 ? `${state.cursorIndex + 1}/${view.total}` : "0/0"
  const pending = state.pendingKeys ? ` ${state.pendingKeys.keys}…` : ""

  return (
    <Box flexDirection="column">
      {(state.mode === "searching" || state.searchBuffer) && (
        <Box height={1} paddingLeft={1}>
          <Text color={colors.primary}>/</Text>
          <Text color={colors.foreground}>{state.searchBuffer}</Text>
          {state.mode === "searching" && <Text color={colors.muted}>▏</Text>}
        </Box>
      )}

      {state.warning && (
        <Box height={1} paddingLeft={1}>
          <Text color={colors.warning}>{state.warning}</Text>
        </Box>
      )}

      <Box height={1} flexDirection="row">
        <Text color={colors.labelText} backgroundColor={getModeColor(state, theme)}>
          {` ${mode} `}
        </Text>
        <Text color={colors.muted}>{` ${position}${pending}`}</Text>
        <Text color={colors.muted}>{"  ?: help  .: choose  q: quit"}</Text>
      </Box>
    </Box>
  )
}

export function getModeLabel(state: NavState): string {
  switch (state.mode) {
    case "searching":
      return "SEARCH"
    case "help":
      return "HELP"
    case "exiting":
      return "EXIT"
    default:
      return state.category === "frecent" ? "FRECENT" : "BROWSE"
  }
}

function getModeColor(state: NavState, theme: Theme): string {
  const { colors } = theme

  switch (state.mode) {
    case "searching":
      return colors.accent
    case "help":
      return colors.warning
    default:
      return state.category === "frecent" ? colors.label : colors.primary
  }
}
