/**
 * Index Store Adapter - line-oriented index file, replaced atomically
 *
 * Writers never touch the index file in place: records go to a temp file
 * beside it which is then renamed over the original. Concurrent shells may
 * overwrite each other's updates, but the file is always whole.
 */

import type { IndexStorePort } from "../ports/index.ts"
import type { VisitRecord } from "../domain/types.ts"
import { decodeIndex, encodeIndex } from "../domain/indexFormat.ts"
import { IndexIoError, errorCode } from "../domain/errors.ts"
import { mkdir, readFile, rename, unlink, writeFile } from "fs/promises"
import { randomBytes } from "crypto"
import { dirname, join } from "path"
import { homedir } from "os"

export const DEFAULT_INDEX_FILE = join(homedir(), ".dirhop")

export class FileIndexStore implements IndexStorePort {
  constructor(readonly location: string = DEFAULT_INDEX_FILE) {}

  async load(): Promise<VisitRecord[]> {
    let content: string
    try {
      content = await readFile(this.location, "utf8")
    } catch (error) {
      if (errorCode(error) === "ENOENT") {
        return []
      }
      throw new IndexIoError(this.location, "read", error)
    }

    return decodeIndex(content)
  }

  async save(records: VisitRecord[]): Promise<void> {
    const tempPath = `${this.location}.${process.pid}.${randomBytes(4).toString("hex")}.tmp`

    try {
      await mkdir(dirname(this.location), { recursive: true })
      await writeFile(tempPath, encodeIndex(records), { encoding: "utf8", mode: 0o600 })
      await rename(tempPath, this.location)
    } catch (error) {
      await unlink(tempPath).catch((cleanupError: unknown) => {
        if (errorCode(cleanupError) !== "ENOENT") {
          console.error(`[index] Failed to remove temp file ${tempPath}:`, cleanupError)
        }
      })
      throw new IndexIoError(this.location, "write", error)
    }
  }
}

/**
 * Index file resolution: $DIRHOP_INDEX_FILE, then the configured path, then ~/.dirhop.
 */
export function resolveIndexLocation(
  configured: string | null,
  env: NodeJS.ProcessEnv = process.env
): string {
  const fromEnv = env.DIRHOP_INDEX_FILE?.trim()
  if (fromEnv) return fromEnv
  if (configured) return configured
  return DEFAULT_INDEX_FILE
}
