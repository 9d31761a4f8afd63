import { describe, it, expect, vi } from 'vitest'
import { mkdtempSync, readFileSync, rmSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { createLogger, fileSink, type LogSink } from './logger.js'
import type { LogLevel } from './types.js'

function memorySink() {
  const lines: Array<{ level: LogLevel; line: string }> = []
  const sink: LogSink = {
    write(level, line) {
      lines.push({ level, line })
    }
  }
  return { sink, lines }
}

const clock = () => new Date('2024-05-01T10:00:00.000Z')

describe('createLogger', () => {
  it('prefixes lines with timestamp, level and namespace', () => {
    const { sink, lines } = memorySink()
    const logger = createLogger({ namespace: 'app', sink, clock })
    logger.info('loaded %d packages', 3)
    expect(lines).toEqual([{ level: 'info', line: '2024-05-01T10:00:00.000Z INFO  [app] loaded 3 packages' }])
  })

  it('drops messages below the current level', () => {
    const { sink, lines } = memorySink()
    const logger = createLogger({ namespace: 'app', level: 'warn', sink, clock })
    logger.debug('hidden')
    logger.info('hidden')
    logger.error('shown')
    expect(lines.map((l) => l.level)).toEqual(['error'])
  })

  it('creates children that share the level', () => {
    const { sink, lines } = memorySink()
    const logger = createLogger({ namespace: 'app', sink, clock })
    const child = logger.createChild('dispatcher')
    logger.setLevel('debug')
    child.debug('submitted')
    expect(child.getLevel()).toBe('debug')
    expect(lines[0].line).toBe('2024-05-01T10:00:00.000Z DEBUG [app:dispatcher] submitted')
  })
})

describe('fileSink', () => {
  it('appends lines to the file', async () => {
    const dir = mkdtempSync(join(tmpdir(), 'wingetdash-log-'))
    const path = join(dir, 'logs', 'app.log')
    const sink = fileSink(path)
    sink.write('info', 'first')
    sink.write('warn', 'second')
    await sink.close?.()
    expect(readFileSync(path, 'utf-8')).toBe('first\nsecond\n')
    rmSync(dir, { recursive: true, force: true })
  })

  it('reports an unwritable path once and drops later lines', async () => {
    const dir = mkdtempSync(join(tmpdir(), 'wingetdash-log-'))
    const errors: Error[] = []
    const sink = fileSink(dir, (error) => errors.push(error))
    sink.write('info', 'lost')

    await vi.waitFor(() => expect(errors).toHaveLength(1))
    sink.write('info', 'also lost')
    await sink.close?.()
    expect(errors).toHaveLength(1)
    rmSync(dir, { recursive: true, force: true })
  })
})
