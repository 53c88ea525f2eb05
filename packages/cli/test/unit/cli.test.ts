import { describe, it, expect, vi, beforeEach } from 'vitest'
import { main } from '../../src/cli.js'

describe('main', () => {
  let stderrOutput: string
  let stdoutOutput: string

  beforeEach(() => {
    stderrOutput = ''
    stdoutOutput = ''
    vi.spyOn(process.stderr, 'write').mockImplementation((chunk) => {
      stderrOutput += String(chunk)
      return true
    })
    vi.spyOn(process.stdout, 'write').mockImplementation((chunk) => {
      stdoutOutput += String(chunk)
      return true
    })
  })

  it('should print help and return 0 with no arguments', async () => {
    expect(await main([])).toBe(0)
    expect(stdoutOutput.startsWith('Usage: sigwarden <command> [options]\n')).toBe(true)
    expect(stderrOutput).toBe('')
  })

  it('should print help for --help and -h', async () => {
    expect(await main(['--help'])).toBe(0)
    expect(await main(['-h'])).toBe(0)
    expect(stdoutOutput.match(/Usage: sigwarden/g)).toHaveLength(2)
  })

  it('should list check-config in the help text', async () => {
    await main([])
    expect(stdoutOutput).toContain('  check-config   ')
  })

  it('should reject an unknown command with exit code 1', async () => {
    expect(await main(['frobnicate'])).toBe(1)
    expect(stderrOutput).toBe('Unknown command: frobnicate\n')
    expect(stdoutOutput.startsWith('Usage: sigwarden')).toBe(true)
  })

  it('should dispatch check-config with the remaining arguments', async () => {
    expect(await main(['check-config'])).toBe(1)
    expect(stderrOutput).toContain('Error: --config, --registry and --package are required\n')
  })
})
