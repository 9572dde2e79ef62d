import { mkdir, rename, writeFile } from 'fs/promises'
import * as path from 'path'

export function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}

/**
 * Write via a temp file beside the target and rename it into place, so a
 * crash never leaves half a file behind.
 */
export async function writeFileAtomic(filePath: string, contents: string): Promise<void> {
  await mkdir(path.dirname(filePath), { recursive: true })

  const tempPath = `${filePath}.${process.pid}.tmp`
  await writeFile(tempPath, contents, 'utf8')
  await rename(tempPath, filePath)
}
