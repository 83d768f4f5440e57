/**
 * Dry Run Validator
 *
 * Gate in front of the real run: lists every destination in turn with the
 * list-only flag and stops at the first failure. Runs strictly one destination
 * at a time so the test log reads in plan order. No retries.
 */

import type { ExecutionResult, SyncPlan } from '@fanmirror/core'
import type { Logger } from '../logger'
import { syncAttemptDuration, syncAttemptsTotal, syncResultsTotal } from '../metrics'
import { classify, describeExitCode, isFailure } from './exit-code'
import { freezeResult } from './results'
import { type ProcessRunner, buildMirrorArgs } from './robocopy'

export interface ValidationOutcome {
  /** True only if every destination was reached and none failed. */
  passed: boolean
  /** One result per destination tested, in plan order. */
  results: ExecutionResult[]
}

export interface DryRunValidatorConfig {
  toolPath: string
  now?: () => number
}

export class DryRunValidator {
  private runner: ProcessRunner
  private toolPath: string
  private now: () => number
  private log: Logger

  constructor(runner: ProcessRunner, testLogger: Logger, config: DryRunValidatorConfig) {
    this.runner = runner
    this.toolPath = config.toolPath
    this.now = config.now ?? Date.now
    this.log = testLogger.child({ component: 'DryRunValidator' })
  }

  async validate(plan: SyncPlan, signal?: AbortSignal): Promise<ValidationOutcome> {
    const results: ExecutionResult[] = []
    this.log.info(
      { source: plan.sourcePath, destinations: plan.destinations.length },
      `Dry run of ${plan.sourcePath} against ${plan.destinations.length} destination(s)`,
    )

    for (const destination of plan.destinations) {
      const startTime = this.now()
      const exitCode = await this.runner.run(
        this.toolPath,
        buildMirrorArgs(plan, destination, 'validate'),
        signal,
      )
      const verdict = classify(exitCode)
      const durationMs = this.now() - startTime

      syncAttemptsTotal.inc({ phase: 'validate', verdict })
      syncAttemptDuration.observe({ phase: 'validate' }, durationMs / 1000)
      syncResultsTotal.inc({ phase: 'validate', verdict })

      if (isFailure(verdict)) {
        const errorDetail = `Dry run reported ${describeExitCode(exitCode)}`
        results.push(
          freezeResult({
            destination,
            phase: 'validate',
            verdict,
            exitCode,
            attempts: 1,
            errorDetail,
            durationMs,
          }),
        )
        this.log.error(
          { destination, exitCode, verdict },
          `Dry run failed for ${destination}: exit code ${exitCode} (${describeExitCode(exitCode)})`,
        )
        return { passed: false, results }
      }

      results.push(
        freezeResult({ destination, phase: 'validate', verdict, exitCode, attempts: 1, durationMs }),
      )
      this.log.info(
        { destination, exitCode, verdict },
        `Dry run passed for ${destination}: exit code ${exitCode} (${describeExitCode(exitCode)})`,
      )
    }

    return { passed: results.length === plan.destinations.length, results }
  }
}
