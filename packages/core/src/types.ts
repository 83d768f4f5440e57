/**
 * Core types for the fanmirror sync engine
 */

// =============================================================================
// Paths
// =============================================================================

/**
 * Absolute or relative filesystem path, passed to the mirroring tool verbatim.
 * @example 'D:\\Projects'
 * @example '/mnt/backup/projects'
 */
export type MirrorPath = string

// =============================================================================
// Plan
// =============================================================================

/**
 * Everything one run needs to know about what to mirror and where.
 * Built once by the config loader and frozen; every component receives the same object.
 */
export interface SyncPlan {
  /**
   * Tree to mirror from.
   * @example '/srv/projects'
   */
  readonly sourcePath: MirrorPath

  /**
   * Trees to mirror into, in the order they are validated.
   * Never empty.
   */
  readonly destinations: readonly MirrorPath[]

  /**
   * Directory names excluded from mirroring (one `/XD` pair each).
   * @example ['node_modules', '.git']
   */
  readonly exclusions: readonly string[]

  /**
   * Tool flags, already split on whitespace.
   * @example ['/MIR', '/Z', '/R:5', '/W:10', '/MT:32']
   */
  readonly toolOptions: readonly string[]

  /**
   * Ceiling on concurrently mirrored destinations during the real run.
   * @example 2
   */
  readonly maxParallelJobs: number
}

/**
 * Retry schedule applied to each destination during the real run.
 */
export interface RetryPolicy {
  /**
   * Retries after the first attempt. Zero disables retrying.
   * @example 3
   */
  readonly maxRetries: number

  /**
   * Delay before the first retry in milliseconds.
   * @example 30000
   */
  readonly initialDelayMs: number

  /**
   * Factor applied to the delay after each retry. Always greater than 1.
   * @example 2
   */
  readonly backoffMultiplier: number
}

// =============================================================================
// Results
// =============================================================================

/**
 * Classified meaning of a mirroring tool exit code.
 * - `success`: nothing needed copying
 * - `success_with_warnings`: files copied, extra or mismatched files seen, no errors
 * - `failure`: the tool reported at least one copy error
 */
export type Verdict = 'success' | 'success_with_warnings' | 'failure'

/**
 * Which pass produced a result.
 * - `validate`: list-only dry run
 * - `mirror`: the real copy
 */
export type SyncPhase = 'validate' | 'mirror'

/**
 * One destination under way in a phase.
 */
export interface DestinationTask {
  destination: MirrorPath
  /** 1-based attempt number. */
  attempt: number
}

/**
 * Outcome of one destination in one phase. Created once, never mutated.
 */
export interface ExecutionResult {
  readonly destination: MirrorPath
  readonly phase: SyncPhase
  readonly verdict: Verdict
  /** Exit code of the last attempt. */
  readonly exitCode: number
  /** Attempts made, at most `maxRetries + 1`. */
  readonly attempts: number
  /**
   * Human-readable reason for a failure verdict.
   * @example 'Retries exhausted after 4 attempts (last exit code 8)'
   */
  readonly errorDetail?: string
  /** Wall time across all attempts, including backoff sleeps, in milliseconds. */
  readonly durationMs: number
}

// =============================================================================
// Orchestrator
// =============================================================================

/**
 * Orchestrator lifecycle.
 * - `idle`: constructed, not started
 * - `validating`: dry run in progress
 * - `validation_failed`: dry run found a failure (terminal)
 * - `validated`: dry run passed
 * - `executing`: real run in progress
 * - `completed`: real run finished, with or without failed destinations (terminal)
 * - `failed`: an unexpected error ended the run (terminal)
 */
export type RunState =
  | 'idle'
  | 'validating'
  | 'validation_failed'
  | 'validated'
  | 'executing'
  | 'completed'
  | 'failed'

/**
 * Overall classification of a finished run.
 */
export type RunOutcome = 'success' | 'partial_failure' | 'validation_failed' | 'failed'

/**
 * Aggregated counts over a set of results.
 */
export interface ResultSummary {
  /** Phase the counted results come from. */
  phase: SyncPhase
  total: number
  succeeded: number
  warnings: number
  failed: number
  /** Sum of attempts across all destinations. */
  attempts: number
  failedDestinations: MirrorPath[]
}

/**
 * The single value an orchestrator run produces.
 */
export interface RunReport {
  state: RunState
  outcome: RunOutcome
  /** Process exit code the run maps to. */
  exitCode: 0 | 1
  /** Dry run results, in plan order, up to the first failure. */
  validation: ExecutionResult[]
  /** Real run results, in plan order. Empty unless validation passed. */
  results: ExecutionResult[]
  summary: ResultSummary
  /** Message of the unexpected error that ended a `failed` run. */
  error?: string
}
