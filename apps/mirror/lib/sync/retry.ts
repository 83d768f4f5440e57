/**
 * Retry Executor
 *
 * Runs the real mirror for one destination, retrying failure verdicts with
 * exponential backoff until the retry budget is spent.
 */

import { setTimeout as sleep } from 'node:timers/promises'
import type {
  DestinationTask,
  ExecutionResult,
  MirrorPath,
  RetryPolicy,
  SyncPlan,
} from '@fanmirror/core'
import { DestinationError } from '../errors'
import type { RunLoggers } from '../logger'
import { syncAttemptDuration, syncAttemptsTotal, syncRetrySleepsTotal } from '../metrics'
import { classify, describeExitCode, isFailure } from './exit-code'
import { freezeResult } from './results'
import { type ProcessRunner, buildMirrorArgs } from './robocopy'

/**
 * Suspends the calling destination only. Rejects if the signal aborts.
 */
export type Sleeper = (ms: number, signal?: AbortSignal) => Promise<void>

/** Longest delay a single Node timer holds; larger values fire after 1ms. */
export const MAX_TIMER_DELAY_MS = 2 ** 31 - 1

export const timerSleep: Sleeper = async (ms, signal) => {
  let remaining = ms
  do {
    const chunk = Math.min(remaining, MAX_TIMER_DELAY_MS)
    await sleep(chunk, undefined, { signal })
    remaining -= chunk
  } while (remaining > 0)
}

/**
 * Delay before the retry that follows `attempt`.
 * @example backoffDelay({ maxRetries: 3, initialDelayMs: 1000, backoffMultiplier: 2 }, 3) // 4000
 */
export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  return policy.initialDelayMs * policy.backoffMultiplier ** (attempt - 1)
}

export interface RetryExecutorConfig {
  /**
   * Mirroring tool executable.
   * @example 'robocopy'
   */
  toolPath: string

  /**
   * Backoff sleep. Replaced in tests.
   * @default timerSleep
   */
  sleep?: Sleeper

  /**
   * Clock in milliseconds.
   * @default Date.now
   */
  now?: () => number
}

export class RetryExecutor {
  private runner: ProcessRunner
  private toolPath: string
  private sleep: Sleeper
  private now: () => number
  private log: RunLoggers['run']
  private errorLog: RunLoggers['error']

  constructor(runner: ProcessRunner, loggers: Pick<RunLoggers, 'run' | 'error'>, config: RetryExecutorConfig) {
    this.runner = runner
    this.toolPath = config.toolPath
    this.sleep = config.sleep ?? timerSleep
    this.now = config.now ?? Date.now
    this.log = loggers.run.child({ component: 'RetryExecutor' })
    this.errorLog = loggers.error.child({ component: 'RetryExecutor' })
  }

  /**
   * Mirror one destination, retrying failures per `policy`.
   *
   * Never throws for a failure verdict: an exhausted budget comes back as a
   * `failure` result. A runner or sleep error (tool missing, aborted) is
   * rethrown as a DestinationError carrying the attempt it stopped on.
   */
  async execute(
    destination: MirrorPath,
    plan: SyncPlan,
    policy: RetryPolicy,
    signal?: AbortSignal,
  ): Promise<ExecutionResult> {
    const startTime = this.now()
    const args = buildMirrorArgs(plan, destination, 'mirror')
    const task: DestinationTask = { destination, attempt: 1 }

    try {
      for (;;) {
        const attemptStart = this.now()
        const exitCode = await this.runner.run(this.toolPath, args, signal)
        const verdict = classify(exitCode)

        syncAttemptsTotal.inc({ phase: 'mirror', verdict })
        syncAttemptDuration.observe({ phase: 'mirror' }, (this.now() - attemptStart) / 1000)
        this.log.info(
          { destination, attempt: task.attempt, exitCode, verdict },
          `Attempt ${task.attempt} for ${destination}: exit code ${exitCode} (${describeExitCode(exitCode)})`,
        )

        if (!isFailure(verdict)) {
          return freezeResult({
            destination,
            phase: 'mirror',
            verdict,
            exitCode,
            attempts: task.attempt,
            durationMs: this.now() - startTime,
          })
        }

        if (task.attempt > policy.maxRetries) {
          const errorDetail =
            `Retries exhausted after ${task.attempt} attempts ` +
            `(last exit code ${exitCode}: ${describeExitCode(exitCode)})`
          this.errorLog.error({ destination, attempts: task.attempt, exitCode }, errorDetail)

          return freezeResult({
            destination,
            phase: 'mirror',
            verdict,
            exitCode,
            attempts: task.attempt,
            errorDetail,
            durationMs: this.now() - startTime,
          })
        }

        const delay = backoffDelay(policy, task.attempt)
        this.log.warn(
          { destination, attempt: task.attempt, delayMs: delay },
          `Retrying ${destination} in ${delay}ms (${policy.maxRetries - task.attempt + 1} retries left)`,
        )
        syncRetrySleepsTotal.inc()
        await this.sleep(delay, signal)
        task.attempt++
      }
    } catch (err) {
      throw new DestinationError(destination, task.attempt, this.now() - startTime, err)
    }
  }
}
