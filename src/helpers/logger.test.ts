import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import * as fs from 'fs'
import * as os from 'os'
import * as path from 'path'
import { configureLogger, createLogger, formatLogLine } from './logger'

describe('formatLogLine', () => {
  it('prefixes the timestamp, level and scope', () => {
    const date = new Date(Date.UTC(2024, 0, 2, 3, 4, 5))
    expect(formatLogLine('warn', 'store', 'hello', date)).toBe('[2024-01-02T03:04:05.000Z] WARN  store: hello')
  })
})

describe('createLogger', () => {
  let dir: string
  let file: string

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'parley-log-'))
    file = path.join(dir, 'client.log')
  })

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true })
  })

  it('writes lines at or above the configured level', () => {
    configureLogger({ filePath: file, level: 'warn', truncate: true })
    const log = createLogger('test')

    log.info('skipped')
    log.warn('kept')
    log.error('also kept')

    const lines = fs.readFileSync(file, 'utf-8').trim().split('\n')
    expect(lines).toHaveLength(2)
    expect(lines[0]).toMatch(/ WARN  test: kept$/)
    expect(lines[1]).toMatch(/ ERROR test: also kept$/)
  })

  it('starts from an empty file when truncating', () => {
    fs.writeFileSync(file, 'old run\n')
    configureLogger({ filePath: file, level: 'debug', truncate: true })
    createLogger('test').debug('new run')

    expect(fs.readFileSync(file, 'utf-8')).toMatch(/^\[[^\]]+\] DEBUG test: new run\n$/)
  })
})
