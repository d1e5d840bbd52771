/**
 * Adapters barrel export
 */

export { fileSystem, NodeFileSystemAdapter } from "./filesystem.ts"
export { FileIndexStore, DEFAULT_INDEX_FILE, resolveIndexLocation } from "./indexStore.ts"
export { settings, JsonSettingsAdapter, mergeSettings } from "./settings.ts"
