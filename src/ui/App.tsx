/**
 * App - root Ink component of the navigator
 */

import { useCallback, useEffect, useMemo, useSyncExternalStore } from "react"
import { Box, Text, useApp, useStdout } from "ink"
import type { Theme } from "../domain/types.ts"
import type { Navigator } from "../application/navigator.ts"
import { selectView } from "../application/view.ts"
import { defaultTheme, folderIcon, frecentIcon } from "../domain/theme.ts"
import { EntryList } from "./components/EntryList.tsx"
import { StatusBar } from "./components/StatusBar.tsx"
import { KeybindingsHelp } from "./components/KeybindingsHelp.tsx"
import { useKeybindings } from "./hooks/useKeybindings.ts"

// Header, two scroll indicators, search line, warning line and status line
const RESERVED_ROWS = 6
const FALLBACK_ROWS = 24
const FALLBACK_COLUMNS = 80

interface AppProps {
  navigator: Navigator
  theme?: Theme
}

export function App({ navigator, theme = defaultTheme }: AppProps) {
  const { exit } = useApp()
  const { stdout } = useStdout()

  const subscribe = useCallback(
    (onChange: () => void) => navigator.store.subscribe(onChange),
    [navigator]
  )
  const getSnapshot = useCallback(() => navigator.getState(), [navigator])
  const state = useSyncExternalStore(subscribe, getSnapshot)
  const view = useMemo(() => selectView(state), [state])

  const rows = stdout.rows || FALLBACK_ROWS
  const columns = stdout.columns || FALLBACK_COLUMNS

  useEffect(() => {
    navigator.resize(Math.max(1, rows - RESERVED_ROWS))
  }, [navigator, rows])

  useEffect(() => {
    if (state.mode === "exiting") exit()
  }, [state.mode, exit])

  useKeybindings(navigator, state.mode !== "exiting")

  const { colors } = theme

  if (state.mode === "help") {
    return <KeybindingsHelp theme={theme} width={Math.min(columns, 60)} />
  }

  return (
    <Box flexDirection="column" width={columns}>
      <Box height={1} flexDirection="row">
        <Text color={colors.primary} bold>
          {state.category === "frecent" ? `${frecentIcon} frecent` : `${folderIcon} ${state.currentPath}`}
        </Text>
        {state.loading && <Text color={colors.muted}>{" …"}</Text>}
      </Box>

      <EntryList
        view={view}
        category={state.category}
        theme={theme}
        width={columns}
        loading={state.loading}
      />

      <StatusBar state={state} view={view} theme={theme} />
    </Box>
  )
}
