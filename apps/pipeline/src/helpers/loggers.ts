import { createLogger, transports, format } from 'winston'
import type { Logger as WinstonLogger } from 'winston'
import DailyRotateFile from 'winston-daily-rotate-file'
import moment from 'moment-timezone'
import path from 'path'
import { config } from '../config/config.js'

const { combine, timestamp, label, printf, colorize } = format

const customTimestamp = () =>
  moment().tz(config.logTimezone).format('YYYY-MM-DD HH:mm:ss')

const logFormat = printf(({ level, message, label, timestamp }) => {
  return `${timestamp} - ${level}: [${label}] ${message}`
})

// Validate log level
const validLogLevels = [
  'error',
  'warn',
  'info',
  'http',
  'verbose',
  'debug',
  'silly'
]
const logLevel = validLogLevels.includes(config.logLevel)
  ? config.logLevel
  : 'info'

if (!validLogLevels.includes(config.logLevel)) {
  console.warn(`Invalid LOG_LEVEL "${config.logLevel}", defaulting to "info"`)
}

const consoleTransport = (level: string) =>
  new transports.Console({
    level,
    format: combine(colorize(), logFormat)
  })

const logger = createLogger({
  level: logLevel,
  format: combine(
    label({ label: 'fragflow' }),
    timestamp({ format: customTimestamp }),
    logFormat
  ),
  transports: [
    new DailyRotateFile({
      level: logLevel,
      filename: path.join(config.logDir, 'fragflow-%DATE%.log'),
      datePattern: 'YYYY-MM-DD',
      zippedArchive: true,
      maxSize: '10m',
      maxFiles: '14d'
    }),
    new DailyRotateFile({
      level: 'error',
      filename: path.join(config.logDir, 'fragflow-error-%DATE%.log'),
      datePattern: 'YYYY-MM-DD',
      zippedArchive: true,
      maxSize: '10m',
      maxFiles: '30d'
    }),
    consoleTransport(logLevel)
  ]
})

// Ends a logger and resolves once its transports have been flushed
const endLogger = (target: WinstonLogger): Promise<void> =>
  new Promise<void>((resolve) => {
    target.on('finish', () => resolve())
    target.end()
  })

let processLoggerClosing: Promise<void> | undefined

/** Flushes and closes the rotating log files. Call once, at process exit. */
const closeLogger = (): Promise<void> => {
  processLoggerClosing ??= endLogger(logger)
  return processLoggerClosing
}

export interface RunLog {
  logger: WinstonLogger
  /** Per-run log file, e.g. logs/resp-submit_20240101_120000.log */
  logFile: string
  close: () => Promise<void>
}

/**
 * Opens a logger for one command run. It writes to the console and a file
 * of its own; the rotating files stay with the process-wide logger. Close
 * it once the run is over.
 */
const openRunLog = (runName: string, verbose = false): RunLog => {
  const stamp = moment().tz(config.logTimezone).format('YYYYMMDD_HHmmss')
  const logFile = path.join(config.logDir, `${runName}_${stamp}.log`)
  const level = verbose ? 'debug' : logLevel

  const runLogger = createLogger({
    level,
    format: combine(
      label({ label: runName }),
      timestamp({ format: customTimestamp }),
      logFormat
    ),
    transports: [new transports.File({ filename: logFile, level }), consoleTransport(level)]
  })

  let closing: Promise<void> | undefined
  const close = () => {
    closing ??= endLogger(runLogger)
    return closing
  }

  logger.info(`${runName} run log: ${logFile}`)
  return { logger: runLogger, logFile, close }
}

export { logger, openRunLog, closeLogger }
