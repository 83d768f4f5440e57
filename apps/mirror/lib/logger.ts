/**
 * Structured Logger
 *
 * Creates pino loggers for the three named streams a run writes:
 * - `run`: progress of the real run, also echoed to stdout
 * - `error`: failures and unexpected errors, also echoed to stderr
 * - `test`: the dry-run validation pass
 *
 * Each stream writes JSON lines through a pino-roll transport into numbered
 * files in the log directory (run.1.log, run.2.log, ...), rolling on size
 * and on a schedule and keeping a bounded number of old files.
 */

import { mkdir } from 'node:fs/promises'
import { join } from 'node:path'
import pino from 'pino'

export type Logger = pino.Logger

export type LogStreamName = 'run' | 'error' | 'test'

/**
 * One logger per named stream.
 */
export type RunLoggers = Record<LogStreamName, Logger>

export type RollFrequency = 'daily' | 'hourly'

export interface RotationOptions {
  /**
   * Roll to a new file once the current one reaches this size.
   * A number followed by k, m or g.
   * @default '10m'
   */
  size: string

  /**
   * Also roll on this schedule. Omit to roll on size only.
   * @default 'daily'
   */
  frequency?: RollFrequency

  /**
   * Old files kept besides the active one.
   * @default 5
   */
  keep: number
}

export const DEFAULT_ROTATION: RotationOptions = {
  size: '10m',
  frequency: 'daily',
  keep: 5,
}

/**
 * Options handed to the pino-roll transport.
 */
export type RollOptions = {
  file: string
  extension: string
  size: string
  frequency?: RollFrequency
  limit: { count: number }
}

export interface RunLoggerOptions {
  /**
   * Directory holding the run, error and test log files.
   * @example 'logs'
   */
  logDir: string

  /**
   * Minimum level written.
   * @default 'info'
   */
  level?: pino.Level

  /**
   * Echo `run` to stdout and `error` to stderr.
   * @default true
   */
  console?: boolean

  rotation?: RotationOptions
}

/**
 * Open loggers plus the means to flush and close their transports.
 */
export interface RunLogSession {
  loggers: RunLoggers
  close(): Promise<void>
}

/**
 * Path a stream's numbered files are built from.
 * @example logFileBase('logs', 'run') // 'logs/run', written as logs/run.1.log
 */
export function logFileBase(logDir: string, name: LogStreamName): string {
  return join(logDir, name)
}

export function rollOptions(file: string, rotation: RotationOptions): RollOptions {
  const options: RollOptions = {
    file,
    extension: '.log',
    size: rotation.size,
    limit: { count: rotation.keep },
  }
  if (rotation.frequency) {
    options.frequency = rotation.frequency
  }
  return options
}

function consoleDestination(name: LogStreamName): number | undefined {
  switch (name) {
    case 'run':
      return 1
    case 'error':
      return 2
    case 'test':
      return undefined
  }
}

type Transport = ReturnType<typeof pino.transport>

function closeTransport(transport: Transport): Promise<void> {
  return new Promise((resolve) => {
    transport.once('close', () => resolve())
    transport.end()
  })
}

/**
 * Open the three run log streams.
 */
export async function createRunLoggers(options: RunLoggerOptions): Promise<RunLogSession> {
  const level = options.level ?? 'info'
  const rotation = options.rotation ?? DEFAULT_ROTATION
  const echo = options.console ?? true

  await mkdir(options.logDir, { recursive: true })

  const transports: Transport[] = []
  const open = (name: LogStreamName): Logger => {
    const targets: pino.TransportTargetOptions[] = [
      {
        target: 'pino-roll',
        level,
        options: rollOptions(logFileBase(options.logDir, name), rotation),
      },
    ]
    const destination = echo ? consoleDestination(name) : undefined
    if (destination !== undefined) {
      targets.push({ target: 'pino/file', level, options: { destination } })
    }

    const transport = pino.transport({ targets })
    transports.push(transport)
    return pino({ level, base: { stream: name } }, transport)
  }

  return {
    loggers: { run: open('run'), error: open('error'), test: open('test') },
    close: async () => {
      await Promise.all(transports.map(closeTransport))
    },
  }
}

/**
 * Loggers that write nothing. Used when a run is embedded or under test.
 */
export function createSilentLoggers(): RunLoggers {
  const silent = pino({ level: 'silent' })
  return { run: silent, error: silent, test: silent }
}
