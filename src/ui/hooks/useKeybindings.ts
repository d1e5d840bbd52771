/**
 * useKeybindings hook - feeds terminal input to the Navigator
 */

import { useEffect } from "react"
import { useInput, useStdin } from "ink"
import type { Key } from "ink"
import type { KeyEvent } from "../../domain/types.ts"
import type { Navigator } from "../../application/navigator.ts"

export type InputKey = Pick<
  Key,
  | "upArrow"
  | "downArrow"
  | "leftArrow"
  | "rightArrow"
  | "pageUp"
  | "pageDown"
  | "return"
  | "escape"
  | "tab"
  | "backspace"
  | "delete"
  | "ctrl"
  | "shift"
  | "meta"
>

function special(name: string, key: InputKey): KeyEvent {
  return { name, sequence: "", ctrl: key.ctrl, shift: key.shift, meta: false }
}

// useInput reports Home and End as an empty input with no flag set, so
// they are read from the raw stdin chunk instead
const RAW_KEY_NAMES: ReadonlyMap<string, "home" | "end"> = new Map([
  ["\x1b[H", "home"],
  ["\x1bOH", "home"],
  ["\x1b[1~", "home"],
  ["\x1b[7~", "home"],
  ["\x1b[F", "end"],
  ["\x1bOF", "end"],
  ["\x1b[4~", "end"],
  ["\x1b[8~", "end"],
])

export function rawKeyName(data: string): "home" | "end" | null {
  return RAW_KEY_NAMES.get(data) ?? null
}

/**
 * Normalizes one Ink input callback into key events. Pasted text arrives as
 * a single input and becomes one event per character.
 */
export function toKeyEvents(input: string, key: InputKey): KeyEvent[] {
  if (key.upArrow) return [special("up", key)]
  if (key.downArrow) return [special("down", key)]
  if (key.leftArrow) return [special("left", key)]
  if (key.rightArrow) return [special("right", key)]
  if (key.pageUp) return [special("pageup", key)]
  if (key.pageDown) return [special("pagedown", key)]
  if (key.return) return [special("enter", key)]
  if (key.escape) return [special("escape", key)]
  if (key.tab) return [special("tab", key)]
  // Most terminals send DEL for the backspace key
  if (key.backspace || key.delete) return [special("backspace", key)]

  // Alt chords are not bound; they must not type into the search
  if (key.meta) {
    return input ? [{ name: input, sequence: "", ctrl: key.ctrl, shift: key.shift, meta: true }] : []
  }

  if (key.ctrl) {
    return [{ name: input.toLowerCase(), sequence: "", ctrl: true, shift: key.shift, meta: false }]
  }

  return Array.from(input, char => ({
    name: char,
    sequence: char,
    ctrl: false,
    shift: char !== char.toLowerCase(),
    meta: false,
  }))
}

export function useKeybindings(navigator: Navigator, isActive = true) {
  const { internal_eventEmitter: inputEvents } = useStdin()

  useEffect(() => {
    if (!isActive) return

    const handleData = (data: unknown) => {
      const name = typeof data === "string" ? rawKeyName(data) : null
      if (name) {
        void navigator.handleKey({ name, sequence: "", ctrl: false, shift: false, meta: false })
      }
    }

    inputEvents.on("input", handleData)
    return () => {
      inputEvents.removeListener("input", handleData)
    }
  }, [inputEvents, navigator, isActive])

  useInput(
    (input, key) => {
      for (const event of toKeyEvents(input, key)) {
        void navigator.handleKey(event)
      }
    },
    { isActive }
  )
}
