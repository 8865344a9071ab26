// Unmock loggers for this test file so we get real coverage
// Must be before any imports
vi.unmock('./loggers.js')
import { describe, it, expect, vi } from 'vitest'
import fs from 'fs-extra'
import { Writable } from 'stream'
import { transports } from 'winston'
import { closeLogger, logger, openRunLog } from './loggers.js'

describe('loggers.ts', () => {
  it('formats messages as timestamp, level, label and message', async () => {
    const lines: string[] = []
    const capture = new transports.Stream({
      stream: new Writable({
        write(chunk: Buffer, _encoding: BufferEncoding, callback: (error?: Error | null) => void) {
          lines.push(chunk.toString())
          callback()
        }
      })
    })
    logger.add(capture)
    try {
      logger.error('formatted message')
      await vi.waitFor(() => expect(lines).toHaveLength(1))
    } finally {
      logger.remove(capture)
    }
    expect(lines[0]).toMatch(
      /^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2} - error: \[fragflow\] formatted message\n$/
    )
  })

  it('opens a run log in the log directory and closes it once', async () => {
    const run = openRunLog('unit-run')
    expect(run.logFile.startsWith(process.env.FRAGFLOW_LOGS ?? '')).toBe(true)
    expect(run.logFile).toMatch(/unit-run_\d{8}_\d{6}\.log$/)
    run.logger.info('hello from the run log')
    const first = run.close()
    expect(run.close()).toBe(first)
    await first
    expect(await fs.pathExists(run.logFile)).toBe(true)
  })

  it('gives each run only its own file and the console', () => {
    const run = openRunLog('transport-run')
    expect(run.logger.transports.map((transport) => transport.constructor.name)).toEqual([
      'File',
      'Console'
    ])
    return run.close()
  })

  // Ends the process logger, so it runs last
  it('closes the process logger once', async () => {
    const first = closeLogger()
    expect(closeLogger()).toBe(first)
    await first
    expect(logger.writable).toBe(false)
  })
})
