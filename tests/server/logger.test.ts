import { describe, it, expect, afterEach, vi } from 'vitest'
import { Logger, errorMessage, resolveLevel } from '../../server/utils/logger.ts'
import type { LogEntry } from '../../server/utils/logger.ts'

// ── Helpers ──────────────────────────────────────────────────────

function captureOutput(fn: () => void): { stdout: string[]; stderr: string[] } {
  const stdout: string[] = []
  const stderr: string[] = []
  vi.spyOn(process.stdout, 'write').mockImplementation((chunk: string | Uint8Array) => {
    stdout.push(String(chunk))
    return true
  })
  vi.spyOn(process.stderr, 'write').mockImplementation((chunk: string | Uint8Array) => {
    stderr.push(String(chunk))
    return true
  })
  try {
    fn()
  } finally {
    vi.restoreAllMocks()
  }
  return { stdout, stderr }
}

function parseLine(raw: string): LogEntry {
  return JSON.parse(raw.trimEnd())
}

// ── Tests ────────────────────────────────────────────────────────

describe('Logger', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  describe('JSON output format', () => {
    it('writes timestamp, level and message', () => {
      const log = new Logger('debug')
      const { stdout } = captureOutput(() => log.info('calculated'))

      expect(stdout).toHaveLength(1)
      const entry = parseLine(stdout[0])
      expect(entry.timestamp).toMatch(/^\d{4}-\d{2}-\d{2}T/)
      expect(entry.level).toBe('info')
      expect(entry.message).toBe('calculated')
    })

    it('spreads the context into the entry', () => {
      const log = new Logger('debug')
      const { stdout } = captureOutput(() => log.info('request', { method: 'POST', status: 200 }))

      const entry = parseLine(stdout[0])
      expect(entry.method).toBe('POST')
      expect(entry.status).toBe(200)
    })

    it('ends every entry with a newline', () => {
      const log = new Logger('debug')
      const { stdout } = captureOutput(() => {
        log.info('first')
        log.warn('second')
      })
      expect(stdout).toHaveLength(2)
      expect(stdout.every((line) => line.endsWith('\n'))).toBe(true)
    })
  })

  describe('streams', () => {
    it('sends errors to stderr and the rest to stdout', () => {
      const log = new Logger('debug')
      const { stdout, stderr } = captureOutput(() => {
        log.debug('d')
        log.error('e')
      })
      expect(stdout.map((l) => parseLine(l).message)).toEqual(['d'])
      expect(stderr.map((l) => parseLine(l).message)).toEqual(['e'])
    })
  })

  describe('levels', () => {
    it('drops entries below the threshold', () => {
      const log = new Logger('warn')
      const { stdout } = captureOutput(() => {
        log.debug('hidden')
        log.info('hidden')
        log.warn('shown')
      })
      expect(stdout.map((l) => parseLine(l).message)).toEqual(['shown'])
    })

    it('can change the threshold later', () => {
      const log = new Logger('error')
      log.setLevel('debug')
      const { stdout } = captureOutput(() => log.debug('now visible'))
      expect(stdout).toHaveLength(1)
    })

    it('resolves LOG_LEVEL case-insensitively and falls back to info', () => {
      expect(resolveLevel('WARN')).toBe('warn')
      expect(resolveLevel('verbose')).toBe('info')
      expect(resolveLevel(undefined)).toBe('info')
    })
  })

  describe('child loggers', () => {
    it('adds fixed fields to every entry', () => {
      const log = new Logger('debug').child({ component: 'http' })
      const { stdout } = captureOutput(() => log.info('listening', { port: 7891 }))

      const entry = parseLine(stdout[0])
      expect(entry.component).toBe('http')
      expect(entry.port).toBe(7891)
    })

    it('merges nested defaults, inner ones winning', () => {
      const log = new Logger('debug').child({ component: 'http', requestId: 'outer' }).child({ requestId: 'r-1' })
      const { stdout } = captureOutput(() => log.info('request'))

      const entry = parseLine(stdout[0])
      expect(entry.component).toBe('http')
      expect(entry.requestId).toBe('r-1')
    })
  })
})

describe('errorMessage', () => {
  it('reads the message of errors and stringifies anything else', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom')
    expect(errorMessage('plain')).toBe('plain')
    expect(errorMessage(42)).toBe('42')
  })
})
