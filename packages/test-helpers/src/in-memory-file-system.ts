/**
 * In-memory filesystem for trust-root loading tests.
 */

import * as path from 'node:path'
import type { TrustRootFileSystem } from 'sigwarden'

/**
 * A {@link TrustRootFileSystem} over plain maps. Directories list their
 * entries in insertion order; files can be marked unreadable.
 *
 * @public
 */
export class InMemoryFileSystem implements TrustRootFileSystem {
  readonly #directories = new Map<string, string[]>()
  readonly #files = new Map<string, Uint8Array>()
  readonly #unreadable = new Set<string>()

  /** Add a file, creating its parent directory listing as needed. */
  addFile(filePath: string, contents: Uint8Array | string): this {
    const dir = path.dirname(filePath)
    const entries = this.#directories.get(dir) ?? []
    entries.push(path.basename(filePath))
    this.#directories.set(dir, entries)
    this.#files.set(
      filePath,
      typeof contents === 'string' ? new TextEncoder().encode(contents) : contents,
    )
    return this
  }

  /** Add an empty directory. */
  addDirectory(dirPath: string): this {
    if (!this.#directories.has(dirPath)) {
      this.#directories.set(dirPath, [])
    }
    return this
  }

  /** Make reads of `filePath` fail with a permission error. */
  markUnreadable(filePath: string): this {
    this.#unreadable.add(filePath)
    return this
  }

  isDirectory(dirPath: string): Promise<boolean> {
    return Promise.resolve(this.#directories.has(dirPath))
  }

  readDirectory(dirPath: string): Promise<string[]> {
    const entries = this.#directories.get(dirPath)
    if (entries === undefined) {
      return Promise.reject(new Error(`ENOENT: no such directory, scandir '${dirPath}'`))
    }
    return Promise.resolve([...entries])
  }

  readFile(filePath: string): Promise<Uint8Array> {
    if (this.#unreadable.has(filePath)) {
      return Promise.reject(new Error(`EACCES: permission denied, open '${filePath}'`))
    }
    const contents = this.#files.get(filePath)
    if (contents === undefined) {
      return Promise.reject(new Error(`ENOENT: no such file, open '${filePath}'`))
    }
    return Promise.resolve(contents)
  }
}
