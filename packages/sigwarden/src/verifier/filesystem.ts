import * as fs from 'node:fs/promises'
import type { TrustRootFileSystem } from './types.js'

/**
 * {@link TrustRootFileSystem} backed by the local disk.
 */
export const nodeFileSystem: TrustRootFileSystem = {
  async isDirectory(dirPath: string): Promise<boolean> {
    try {
      const stats = await fs.stat(dirPath)
      return stats.isDirectory()
    } catch {
      return false
    }
  },

  readDirectory(dirPath: string): Promise<string[]> {
    return fs.readdir(dirPath)
  },

  async readFile(filePath: string): Promise<Uint8Array> {
    const contents = await fs.readFile(filePath)
    return new Uint8Array(contents)
  },
}
