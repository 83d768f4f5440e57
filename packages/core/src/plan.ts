/**
 * Plan construction
 *
 * Turns a validated config into the frozen values the engine runs on.
 */

import { type MirrorConfig, parseDuration } from './schemas/config'
import type { RetryPolicy, SyncPlan } from './types'

/**
 * Split a space-separated option string into discrete tool flags.
 * @example splitToolOptions('/MIR  /Z /MT:32') // ['/MIR', '/Z', '/MT:32']
 */
export function splitToolOptions(options: string): string[] {
  return options.split(/\s+/).filter((flag) => flag.length > 0)
}

export function createSyncPlan(config: MirrorConfig): SyncPlan {
  return Object.freeze({
    sourcePath: config.sourceDir,
    destinations: Object.freeze([...config.destDirs]),
    exclusions: Object.freeze([...new Set(config.exclusions)]),
    toolOptions: Object.freeze(splitToolOptions(config.options)),
    maxParallelJobs: config.maxParallelJobs,
  })
}

export function createRetryPolicy(config: MirrorConfig): RetryPolicy {
  return Object.freeze({
    maxRetries: config.maxRetries,
    initialDelayMs: parseDuration(config.retryDelay),
    backoffMultiplier: config.backoffMultiplier,
  })
}
