import { describe, expect, it } from "vitest"
import { render } from "ink-testing-library"

import { EntryList } from "./EntryList.tsx"
import { StatusBar } from "./StatusBar.tsx"
import { KeybindingsHelp } from "./KeybindingsHelp.tsx"
import { createInitialState, navReducer } from "../../application/store.ts"
import { selectView } from "../../application/view.ts"
import { defaultTheme } from "../../domain/theme.ts"
import type { Entry, NavAction, NavState } from "../../domain/types.ts"

function stateWith(entries: Entry[], category: NavState["category"], ...actions: NavAction[]): NavState {
  const loaded = navReducer(createInitialState(), {
    type: "ENTRIES_LOADED",
    path: "/p",
    category,
    entries,
    warning: null,
  })
  return actions.reduce(navReducer, loaded)
}

function frameLines(frame: string | undefined): string[] {
  return (frame ?? "").split("\n")
}

describe("EntryList", () => {
  it("shows a placeholder for an empty listing", () => {
    const state = stateWith([], "children")
    const { lastFrame } = render(
      <EntryList view={selectView(state)} category="children" theme={defaultTheme} width={80} loading={false} />
    )

    expect(lastFrame()).toContain("No subdirectories")
  })

  it("shows each row with its label and the score of frecent entries", () => {
    const state = stateWith(
      [
        { name: "~/code", path: "/home/u/code", score: 149283.44 },
        { name: "/srv", path: "/srv", score: 1188.65 },
      ],
      "frecent"
    )
    const { lastFrame } = render(
      <EntryList view={selectView(state)} category="frecent" theme={defaultTheme} width={80} loading={false} />
    )
    const lines = frameLines(lastFrame())

    expect(lines).toHaveLength(2)
    expect(lines[0]).toContain("~/code")
    expect(lines[0]).toContain("149k")
    expect(lines[1]).toContain("/srv")
    expect(lines[1]).toContain("1.2k")
  })
})

describe("StatusBar", () => {
  it("shows the mode, the position and a warning", () => {
    const state = {
      ...stateWith([{ name: "a", path: "/p/a" }, { name: "b", path: "/p/b" }], "children", {
        type: "MOVE_CURSOR",
        delta: 1,
      }),
      warning: "Permission denied: /p/x",
    }
    const { lastFrame } = render(<StatusBar state={state} view={selectView(state)} theme={defaultTheme} />)
    const frame = lastFrame() ?? ""

    expect(frame).toContain("BROWSE")
    expect(frame).toContain("2/2")
    expect(frame).toContain("Permission denied: /p/x")
  })

  it("shows the search query while searching", () => {
    const state = stateWith([{ name: "a", path: "/p/a" }], "children", { type: "START_SEARCH" }, {
      type: "SEARCH_INPUT",
      text: "doc",
    })
    const { lastFrame } = render(<StatusBar state={state} view={selectView(state)} theme={defaultTheme} />)
    const frame = lastFrame() ?? ""

    expect(frame).toContain("SEARCH")
    expect(frame).toContain("doc")
    expect(frame).toContain("0/0")
  })
})

describe("KeybindingsHelp", () => {
  it("lists the choose and quit bindings", () => {
    const { lastFrame } = render(<KeybindingsHelp theme={defaultTheme} width={60} />)
    const frame = lastFrame() ?? ""

    expect(frame).toContain("Keybindings")
    expect(frame).toContain("Choose current directory and exit")
    expect(frame).toContain("Quit without changing directory")
  })
})
