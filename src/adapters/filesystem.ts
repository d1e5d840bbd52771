/**
 * FileSystem Adapter - Node implementation
 */

import type { FileSystemPort } from "../ports/index.ts"
import type { FileEntry } from "../domain/types.ts"
import { readdir, stat } from "fs/promises"
import { join } from "path"

export class NodeFileSystemAdapter implements FileSystemPort {
  async listDirectory(path: string): Promise<FileEntry[]> {
    const items = await readdir(path, { withFileTypes: true })
    const entries: FileEntry[] = []

    for (const item of items) {
      const fullPath = join(path, item.name)
      let isDir = item.isDirectory()

      if (item.isSymbolicLink()) {
        try {
          isDir = (await stat(fullPath)).isDirectory()
        } catch {
          // Dangling or unreadable link
          continue
        }
      }

      entries.push({
        name: item.name,
        path: fullPath,
        type: isDir ? "directory" : "file",
      })
    }

    return entries
  }

  async isDirectory(path: string): Promise<boolean> {
    try {
      const info = await stat(path)
      return info.isDirectory()
    } catch {
      return false
    }
  }
}

export const fileSystem = new NodeFileSystemAdapter()
