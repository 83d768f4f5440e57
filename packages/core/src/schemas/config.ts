import { z } from 'zod'
import { type CamelCasedPropertiesDeep, pascalToCamelDeep } from '../case-convert'

const DURATION_UNITS = {
  ms: 1,
  s: 1000,
  m: 60 * 1000,
  h: 60 * 60 * 1000,
} as const

type DurationUnit = keyof typeof DURATION_UNITS

const durationPattern = /^(\d+)(ms|s|m|h)$/

function isDurationUnit(unit: string): unit is DurationUnit {
  return unit in DURATION_UNITS
}

/**
 * Milliseconds in a duration string.
 * @example parseDuration('30s') // 30000
 */
export function parseDuration(duration: string): number {
  const [, amount, unit] = durationPattern.exec(duration) ?? []
  if (amount === undefined || unit === undefined || !isDurationUnit(unit)) {
    throw new Error(`Invalid duration format: ${duration}`)
  }
  return Number.parseInt(amount, 10) * DURATION_UNITS[unit]
}

const durationString = z
  .string()
  .regex(durationPattern, 'Expected a whole number followed by ms, s, m or h (e.g. "500ms", "30s")')

/** Tool flags used when the config file has no `Options`. */
export const DEFAULT_TOOL_OPTIONS = '/MIR /Z /R:5 /W:10 /MT:32'

export const DEFAULT_MAX_PARALLEL_JOBS = 2

export const DEFAULT_MAX_RETRIES = 3

export const DEFAULT_RETRY_DELAY = '30s'

export const DEFAULT_BACKOFF_MULTIPLIER = 2

/**
 * Mirror job configuration as written in the config file (PascalCase keys).
 */
export const mirrorConfigSchema = z.object({
  SourceDir: z.string().min(1, 'Source directory must not be empty'),
  DestDirs: z
    .array(z.string().min(1, 'Destination directory must not be empty'))
    .min(1, 'At least one destination directory is required')
    .refine((dirs) => new Set(dirs).size === dirs.length, {
      message: 'Destination directories must be unique',
    }),
  Exclusions: z.array(z.string().min(1, 'Exclusion must not be empty')),
  Options: z.string().default(DEFAULT_TOOL_OPTIONS),
  MaxParallelJobs: z.number().int().positive().default(DEFAULT_MAX_PARALLEL_JOBS),
  MaxRetries: z.number().int().nonnegative().default(DEFAULT_MAX_RETRIES),
  RetryDelay: durationString.default(DEFAULT_RETRY_DELAY),
  BackoffMultiplier: z
    .number()
    .gt(1, 'Backoff multiplier must be greater than 1')
    .default(DEFAULT_BACKOFF_MULTIPLIER),
})

/**
 * Config as it appears in the file, after defaults are applied.
 */
export type MirrorConfigRaw = z.output<typeof mirrorConfigSchema>

/**
 * Config with camelCase keys, as the rest of the code uses it.
 */
export type MirrorConfig = CamelCasedPropertiesDeep<MirrorConfigRaw>

/**
 * Validation error with path information
 */
export interface ValidationError {
  path: string
  message: string
}

/**
 * Parse result type
 */
export type ParseResult<T> =
  | { success: true; data: T }
  | { success: false; errors: ValidationError[] }

/**
 * Safely parse config data, returning result with errors (returns camelCase)
 */
export function safeParseMirrorConfig(data: unknown): ParseResult<MirrorConfig> {
  const result = mirrorConfigSchema.safeParse(data)
  if (result.success) {
    return { success: true, data: pascalToCamelDeep(result.data) }
  }
  const errors = result.error.issues.map((issue) => ({
    path: issue.path.join('.') || '/',
    message: issue.message,
  }))
  return { success: false, errors }
}
