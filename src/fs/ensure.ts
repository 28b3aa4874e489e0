import fs from 'node:fs'
import path from 'node:path'

/**
 * Ensure a directory exists (mkdir -p).
 */
export function ensureDir(dirPath: string): void {
  fs.mkdirSync(dirPath, { recursive: true })
}

export function ensureParentDir(filePath: string): void {
  ensureDir(path.dirname(filePath))
}
