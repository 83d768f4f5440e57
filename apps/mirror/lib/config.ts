import { isAbsolute, resolve } from 'node:path'
import type pino from 'pino'
import { DEFAULT_ROTATION, type RollFrequency, type RotationOptions } from './logger'

/**
 * Process-level settings that live outside the job config file.
 * Every field can also be overridden from the command line.
 */
export interface RuntimeSettings {
  /**
   * Mirroring tool executable.
   * @default 'robocopy'
   */
  toolPath: string

  /**
   * Directory for the run, error and test log files.
   * @default '<cwd>/logs'
   */
  logDir: string

  /** @default 'info' */
  logLevel: pino.Level

  rotation: RotationOptions
}

type Env = Record<string, string | undefined>

const LOG_LEVELS: readonly pino.Level[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace']

function getEnvNumber(env: Env, key: string, defaultValue: number): number {
  const value = env[key]
  if (value === undefined) return defaultValue
  const parsed = Number.parseInt(value, 10)
  return Number.isNaN(parsed) ? defaultValue : parsed
}

function getEnvString(env: Env, key: string, defaultValue: string): string {
  return env[key] ?? defaultValue
}

function getEnvPath(env: Env, key: string, defaultValue: string): string {
  const value = env[key] ?? defaultValue
  // Resolve relative paths from current working directory
  return isAbsolute(value) ? value : resolve(process.cwd(), value)
}

export function isLogLevel(value: string): value is pino.Level {
  return LOG_LEVELS.some((level) => level === value)
}

function getEnvLogLevel(env: Env, key: string, defaultValue: pino.Level): pino.Level {
  const value = env[key]
  return value !== undefined && isLogLevel(value) ? value : defaultValue
}

const SIZE_PATTERN = /^\d+[kmg]?$/i

function getEnvSize(env: Env, key: string, defaultValue: string): string {
  const value = env[key]
  return value !== undefined && SIZE_PATTERN.test(value) ? value : defaultValue
}

/**
 * `daily` or `hourly`; `none` rolls on size only.
 */
function getEnvFrequency(
  env: Env,
  key: string,
  defaultValue: RollFrequency | undefined,
): RollFrequency | undefined {
  switch (env[key]) {
    case 'daily':
      return 'daily'
    case 'hourly':
      return 'hourly'
    case 'none':
      return undefined
    default:
      return defaultValue
  }
}

export function loadRuntimeSettings(env: Env = process.env): RuntimeSettings {
  return {
    toolPath: getEnvString(env, 'FANMIRROR_TOOL_PATH', 'robocopy'),
    logDir: getEnvPath(env, 'FANMIRROR_LOG_DIR', 'logs'),
    logLevel: getEnvLogLevel(env, 'FANMIRROR_LOG_LEVEL', 'info'),
    rotation: {
      size: getEnvSize(env, 'FANMIRROR_LOG_MAX_SIZE', DEFAULT_ROTATION.size),
      frequency: getEnvFrequency(env, 'FANMIRROR_LOG_FREQUENCY', DEFAULT_ROTATION.frequency),
      keep: Math.max(1, getEnvNumber(env, 'FANMIRROR_LOG_KEEP', DEFAULT_ROTATION.keep)),
    },
  }
}
