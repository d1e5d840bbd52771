/**
 * Navigator - drives the navigation state machine
 *
 * Key events are queued and handled one at a time: resolve the key to
 * commands, run them in order, and load entries whenever the browsing
 * context changes. Nothing here throws into the UI; listing problems end up
 * as a warning in NavState.
 */

import { dirname } from "path"
import type { Category, KeyEvent, NavState } from "../domain/types.ts"
import type { EntrySource } from "./entrySource.ts"
import type { NavCommand } from "./keymap.ts"
import { DEFAULT_SEQUENCE_TIMEOUT_MS, resolveKey } from "./keymap.ts"
import { NavStore, createInitialState, getFilteredEntries } from "./store.ts"

export interface NavigatorOptions {
  cwd: string
  viewportHeight?: number
  sequenceTimeoutMs?: number
  now?: () => number
}

export class Navigator {
  readonly store: NavStore
  private queue: Promise<void> = Promise.resolve()
  private readonly sequenceTimeoutMs: number
  private readonly now: () => number

  constructor(
    private readonly source: EntrySource,
    options: NavigatorOptions
  ) {
    this.sequenceTimeoutMs = options.sequenceTimeoutMs ?? DEFAULT_SEQUENCE_TIMEOUT_MS
    this.now = options.now ?? Date.now
    this.store = new NavStore(
      createInitialState({
        currentPath: options.cwd,
        category: source.hasHistory ? "frecent" : "children",
        viewportHeight: options.viewportHeight,
      })
    )
  }

  getState(): NavState {
    return this.store.getState()
  }

  /**
   * Loads the initial list: frecent directories when there is history,
   * otherwise the children of the working directory.
   */
  start(): Promise<void> {
    return this.enqueue(async () => {
      const { category, currentPath } = this.getState()
      await this.load(category, currentPath)
    })
  }

  handleKey(event: KeyEvent): Promise<void> {
    return this.enqueue(() => this.process(event, true))
  }

  resize(height: number): void {
    this.store.dispatch({ type: "RESIZE", height })
  }

  private enqueue(task: () => Promise<void>): Promise<void> {
    this.queue = this.queue.then(task).catch(error => {
      console.error("[dirhop] Event handling failed:", error)
    })
    return this.queue
  }

  private async process(event: KeyEvent, allowReplay: boolean): Promise<void> {
    const commands = resolveKey(this.getState(), event, this.now(), this.sequenceTimeoutMs)

    for (const command of commands) {
      if (command.type === "replay") {
        if (allowReplay) {
          await this.process(event, false)
        }
        continue
      }
      await this.execute(command)
    }
  }

  private async execute(command: Exclude<NavCommand, { type: "replay" }>): Promise<void> {
    const state = this.getState()

    switch (command.type) {
      case "dispatch":
        this.store.dispatch(command.action)
        return

      case "descend": {
        const entry = getFilteredEntries(state)[command.index ?? state.cursorIndex]
        if (!entry) return
        if (command.index !== undefined) {
          this.store.dispatch({ type: "SELECT_INDEX", index: command.index })
        }
        await this.load("children", entry.path)
        return
      }

      case "parent": {
        const parent = dirname(state.currentPath)
        if (parent === state.currentPath) {
          // At the root: still switch a frecent view back to the listing
          if (state.category === "children") return
          await this.load("children", state.currentPath)
          return
        }
        await this.load("children", parent, state.currentPath)
        return
      }

      case "switchCategory":
        await this.load(command.category, state.currentPath)
        return

      case "chooseCurrent":
        this.store.dispatch({ type: "EXIT", result: state.currentPath })
        return

      case "quit":
        this.store.dispatch({ type: "EXIT", result: null })
        return
    }
  }

  private async load(category: Category, path: string, focusPath?: string): Promise<void> {
    this.store.dispatch({ type: "LOAD_STARTED" })
    const listing = await this.source.load(category, path)
    this.store.dispatch({
      type: "ENTRIES_LOADED",
      path,
      category,
      entries: listing.entries,
      warning: listing.warning,
      focusPath,
    })
  }
}
