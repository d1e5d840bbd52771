/**
 * KeybindingsHelp Component - Keyboard shortcuts reference
 */

import { Box, Text } from "ink"
import type { Theme } from "../../domain/types.ts"

interface KeybindingsHelpProps {
  theme: Theme
  width: number
}

interface ShortcutItem {
  keys: string
  action: string
}

export const shortcutItems: ShortcutItem[] = [
  { keys: "j / k / ↑ ↓", action: "Move down / up" },
  { keys: "gg / G, Home / End", action: "First / last entry" },
  { keys: "PgUp / PgDn", action: "Move one page" },
  { keys: "l / → / Enter", action: "Open selected directory" },
  { keys: "h / ← / Backspace", action: "Go to parent directory" },
  { keys: "a s w e …", action: "Open the labelled directory" },
  { keys: "/", action: "Search (Enter keeps filter, Esc clears)" },
  { keys: "_", action: "Clear search" },
  { keys: "Ctrl+F / Ctrl+D", action: "Frecent / directory listing" },
  { keys: ".", action: "Choose current directory and exit" },
  { keys: "q / Esc", action: "Quit without changing directory" },
  { keys: "?", action: "Toggle this help" },
]

export function KeybindingsHelp({ theme, width }: KeybindingsHelpProps) {
  const { colors } = theme
  const innerWidth = Math.max(10, width - 2)

  return (
    <Box flexDirection="column" borderStyle="single" borderColor={colors.border} width={width}>
      <Box height={1} paddingLeft={1}>
        <Text color={colors.primary} bold>
          Keybindings
        </Text>
      </Box>

      {shortcutItems.map(item => (
        <ShortcutRow key={item.keys} item={item} theme={theme} width={innerWidth} />
      ))}

      <Box height={1} paddingLeft={1}>
        <Text color={colors.muted}>Esc / ?: close</Text>
      </Box>
    </Box>
  )
}

function ShortcutRow({ item, theme, width }: { item: ShortcutItem; theme: Theme; width: number }) {
  const { colors } = theme
  const keyColumnWidth = 21

  return (
    <Box height={1} paddingLeft={1} paddingRight={1} flexDirection="row">
      <Box width={keyColumnWidth}>
        <Text color={colors.primary}>{truncate(item.keys, keyColumnWidth - 1)}</Text>
      </Box>
      <Box flexGrow={1}>
        <Text color={colors.foreground}>{truncate(item.action, width - keyColumnWidth - 2)}</Text>
      </Box>
    </Box>
  )
}

function truncate(input: string, maxLen: number): string {
  if (maxLen <= 1) return ""
  if (input.length <= maxLen) return input
  return `${input.slice(0, Math.max(0, maxLen - 1))}…`
}
