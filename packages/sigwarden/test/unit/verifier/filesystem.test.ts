import { describe, it, expect, beforeAll, afterAll } from 'vitest'
import * as fs from 'node:fs/promises'
import * as os from 'node:os'
import * as path from 'node:path'
import { nodeFileSystem } from '../../../src/verifier/filesystem.js'
import { buildVerifierConfiguration } from '../../../src/verifier/configuration.js'

describe('nodeFileSystem', () => {
  let dir: string

  beforeAll(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'sigwarden-roots-'))
    await fs.writeFile(path.join(dir, 'root.cer'), Buffer.from([0x30, 0x82, 0x01]))
  })

  afterAll(async () => {
    await fs.rm(dir, { recursive: true, force: true })
  })

  it('should report directories and non-directories', async () => {
    expect(await nodeFileSystem.isDirectory(dir)).toBe(true)
    expect(await nodeFileSystem.isDirectory(path.join(dir, 'root.cer'))).toBe(false)
    expect(await nodeFileSystem.isDirectory(path.join(dir, 'absent'))).toBe(false)
  })

  it('should read trust roots from disk', async () => {
    const configuration = await buildVerifierConfiguration({ trustedRootCertificatesPath: dir })
    expect(configuration.trustedRoots).toHaveLength(1)
    expect(Array.from(configuration.trustedRoots[0] ?? [])).toEqual([0x30, 0x82, 0x01])
  })
})
