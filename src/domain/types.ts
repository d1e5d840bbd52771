/**
 * Domain types - shared across all layers
 */

// ============================================
// Frecency index
// ============================================

export interface VisitRecord {
  /** Normalized absolute directory path, unique within the index. */
  path: string
  visitCount: number
  /** Unix timestamp (ms) of the most recent visit. */
  lastVisited: number
}

export interface RankedRecord extends VisitRecord {
  score: number
}

// ============================================
// Filesystem
// ============================================

export interface FileEntry {
  name: string
  path: string
  type: "file" | "directory"
}

// ============================================
// Navigation
// ============================================

export type Category = "frecent" | "children"

export type NavMode = "browsing" | "searching" | "help" | "exiting"

export interface Entry {
  name: string
  path: string
  score?: number
}

export interface PendingKeys {
  keys: string
  at: number
}

export interface NavState {
  mode: NavMode
  /** Mode to return to when the help overlay closes. */
  previousMode: "browsing" | "searching"
  currentPath: string
  category: Category
  entries: Entry[]
  cursorIndex: number
  scrollOffset: number
  viewportHeight: number
  searchBuffer: string
  pendingKeys: PendingKeys | null
  warning: string | null
  loading: boolean
  /** Path printed on exit; null exits silently. */
  result: string | null
}

export type NavAction =
  | { type: "LOAD_STARTED" }
  | {
      type: "ENTRIES_LOADED"
      path: string
      category: Category
      entries: Entry[]
      warning: string | null
      focusPath?: string
    }
  | { type: "MOVE_CURSOR"; delta: number }
  | { type: "SELECT_FIRST" }
  | { type: "SELECT_LAST" }
  | { type: "SELECT_INDEX"; index: number }
  | { type: "START_SEARCH" }
  | { type: "SEARCH_INPUT"; text: string }
  | { type: "SEARCH_BACKSPACE" }
  | { type: "CLEAR_SEARCH" }
  | { type: "CANCEL_SEARCH" }
  | { type: "COMMIT_SEARCH" }
  | { type: "TOGGLE_HELP" }
  | { type: "SET_PENDING_KEYS"; keys: string; at: number }
  | { type: "CLEAR_PENDING_KEYS" }
  | { type: "RESIZE"; height: number }
  | { type: "EXIT"; result: string | null }

// ============================================
// Keyboard
// ============================================

export interface KeyEvent {
  /** Normalized key name: "a", "G", "enter", "escape", "up", ... */
  name: string
  /** Printable text produced by the key, empty for special keys. */
  sequence: string
  ctrl: boolean
  shift: boolean
  meta: boolean
}

// ============================================
// Theme
// ============================================

export interface ThemeColors {
  foreground: string
  muted: string
  primary: string
  accent: string
  selection: string
  label: string
  labelText: string
  warning: string
  border: string
}

export interface Theme {
  name: string
  colors: ThemeColors
}
