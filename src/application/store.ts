/**
 * Navigation store - NavState, its reducer and a small subscribable store
 *
 * The reducer is pure. Anything that touches the filesystem happens in the
 * Navigator, which dispatches ENTRIES_LOADED with the result.
 */

import type { Category, Entry, NavAction, NavState } from "../domain/types.ts"
import { filterEntries } from "../domain/filter.ts"

export const DEFAULT_VIEWPORT_HEIGHT = 20

export interface InitialStateOptions {
  currentPath?: string
  category?: Category
  viewportHeight?: number
}

export function createInitialState(options: InitialStateOptions = {}): NavState {
  return {
    mode: "browsing",
    previousMode: "browsing",
    currentPath: options.currentPath ?? "/",
    category: options.category ?? "children",
    entries: [],
    cursorIndex: 0,
    scrollOffset: 0,
    viewportHeight: Math.max(1, options.viewportHeight ?? DEFAULT_VIEWPORT_HEIGHT),
    searchBuffer: "",
    pendingKeys: null,
    warning: null,
    loading: false,
    result: null,
  }
}

/**
 * Entries after the search filter; the list the cursor indexes into.
 */
export function getFilteredEntries(state: NavState): Entry[] {
  return filterEntries(state.entries, state.searchBuffer)
}

export function getSelectedEntry(state: NavState): Entry | null {
  return getFilteredEntries(state)[state.cursorIndex] ?? null
}

function clamp(index: number, length: number): number {
  if (length <= 0) return 0
  return Math.max(0, Math.min(length - 1, index))
}

/**
 * Smallest scroll change that keeps the cursor inside the viewport.
 */
function scrollFor(cursor: number, offset: number, height: number, length: number): number {
  const maxOffset = Math.max(0, length - height)
  let next = Math.min(offset, maxOffset)
  if (cursor < next) next = cursor
  if (cursor >= next + height) next = cursor - height + 1
  return Math.max(0, next)
}

function moveTo(state: NavState, index: number): NavState {
  const length = getFilteredEntries(state).length
  const cursorIndex = clamp(index, length)
  return {
    ...state,
    cursorIndex,
    scrollOffset: scrollFor(cursorIndex, state.scrollOffset, state.viewportHeight, length),
    pendingKeys: null,
  }
}

/**
 * Applies a new search buffer, keeping the cursor on the same entry when it
 * survives the filter and resetting it to the top otherwise.
 */
function withSearch(state: NavState, searchBuffer: string): NavState {
  const selected = getSelectedEntry(state)
  const next = { ...state, searchBuffer }
  const filtered = getFilteredEntries(next)
  const kept = selected ? filtered.findIndex(entry => entry.path === selected.path) : -1
  return moveTo({ ...next, scrollOffset: kept === -1 ? 0 : next.scrollOffset }, Math.max(0, kept))
}

export function navReducer(state: NavState, action: NavAction): NavState {
  switch (action.type) {
    case "LOAD_STARTED":
      return { ...state, loading: true }

    case "ENTRIES_LOADED": {
      const focusIndex = action.focusPath
        ? action.entries.findIndex(entry => entry.path === action.focusPath)
        : -1
      const loaded: NavState = {
        ...state,
        mode: state.mode === "exiting" ? "exiting" : "browsing",
        previousMode: "browsing",
        currentPath: action.path,
        category: action.category,
        entries: action.entries,
        searchBuffer: "",
        warning: action.warning,
        loading: false,
        cursorIndex: 0,
        scrollOffset: 0,
      }
      return moveTo(loaded, Math.max(0, focusIndex))
    }

    case "MOVE_CURSOR":
      return moveTo(state, state.cursorIndex + action.delta)

    case "SELECT_FIRST":
      return moveTo(state, 0)

    case "SELECT_LAST":
      return moveTo(state, getFilteredEntries(state).length - 1)

    case "SELECT_INDEX":
      return moveTo(state, action.index)

    case "START_SEARCH":
      return withSearch({ ...state, mode: "searching", pendingKeys: null }, "")

    case "SEARCH_INPUT":
      return withSearch(state, state.searchBuffer + action.text)

    case "SEARCH_BACKSPACE":
      return withSearch(state, state.searchBuffer.slice(0, -1))

    case "CLEAR_SEARCH":
      return withSearch(state, "")

    case "CANCEL_SEARCH":
      return withSearch({ ...state, mode: "browsing" }, "")

    case "COMMIT_SEARCH":
      return { ...state, mode: "browsing", pendingKeys: null }

    case "TOGGLE_HELP":
      if (state.mode === "help") {
        return { ...state, mode: state.previousMode, pendingKeys: null }
      }
      if (state.mode === "exiting") return state
      return { ...state, mode: "help", previousMode: state.mode, pendingKeys: null }

    case "SET_PENDING_KEYS":
      return { ...state, pendingKeys: { keys: action.keys, at: action.at } }

    case "CLEAR_PENDING_KEYS":
      return state.pendingKeys ? { ...state, pendingKeys: null } : state

    case "RESIZE": {
      const viewportHeight = Math.max(1, action.height)
      const length = getFilteredEntries(state).length
      return {
        ...state,
        viewportHeight,
        scrollOffset: scrollFor(state.cursorIndex, state.scrollOffset, viewportHeight, length),
      }
    }

    case "EXIT":
      return { ...state, mode: "exiting", result: action.result, pendingKeys: null }

    default:
      return state
  }
}

type Listener = (state: NavState) => void

export class NavStore {
  private state: NavState
  private listeners: Set<Listener> = new Set()

  constructor(initialState: NavState = createInitialState()) {
    this.state = initialState
  }

  getState(): NavState {
    return this.state
  }

  dispatch(action: NavAction): void {
    const next = navReducer(this.state, action)
    if (next === this.state) return

    this.state = next
    for (const listener of this.listeners) {
      listener(next)
    }
  }

  subscribe(listener: Listener): () => void {
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }
}
