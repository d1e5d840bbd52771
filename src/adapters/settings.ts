/**
 * Settings Adapter - Reads settings from ~/.config/dirhop/settings.json
 */

import type { SettingsPort, Settings } from "../ports/index.ts"
import { defaultSettings as defaults } from "../ports/index.ts"
import { errorCode } from "../domain/errors.ts"
import { readFile } from "fs/promises"
import { join } from "path"
import { homedir } from "os"

const CONFIG_DIR = join(homedir(), ".config", "dirhop")
const SETTINGS_FILE = join(CONFIG_DIR, "settings.json")

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

function positiveInteger(value: unknown, fallback: number): number {
  return typeof value === "number" && Number.isInteger(value) && value > 0 ? value : fallback
}

function nonNegativeInteger(value: unknown, fallback: number): number {
  return typeof value === "number" && Number.isInteger(value) && value >= 0 ? value : fallback
}

export function mergeSettings(parsed: unknown): Settings {
  if (!isRecord(parsed)) {
    return { ...defaults }
  }

  const indexFile =
    typeof parsed.indexFile === "string" && parsed.indexFile.trim()
      ? parsed.indexFile.trim()
      : defaults.indexFile

  return {
    indexFile,
    frecentLimit: positiveInteger(parsed.frecentLimit, defaults.frecentLimit),
    sequenceTimeoutMs: positiveInteger(parsed.sequenceTimeoutMs, defaults.sequenceTimeoutMs),
    flushDelayMs: nonNegativeInteger(parsed.flushDelayMs, defaults.flushDelayMs),
    showHidden: typeof parsed.showHidden === "boolean" ? parsed.showHidden : defaults.showHidden,
  }
}

export class JsonSettingsAdapter implements SettingsPort {
  constructor(private readonly file: string = SETTINGS_FILE) {}

  async load(): Promise<Settings> {
    try {
      const content = await readFile(this.file, "utf8")
      // Merge with defaults so every key exists and has a sane value
      return mergeSettings(JSON.parse(content))
    } catch (error) {
      if (errorCode(error) !== "ENOENT") {
        console.error(`[settings] Failed to read ${this.file}, using defaults:`, error)
      }
    }

    return mergeSettings({})
  }
}

export const settings = new JsonSettingsAdapter()
