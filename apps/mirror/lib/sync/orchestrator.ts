/**
 * Sync Orchestrator
 *
 * Drives one run through its states:
 *
 *   idle → validating → validation_failed
 *                     → validated → executing → completed
 *
 * plus `failed`, reachable from any non-terminal state when something
 * unexpected is thrown. Unexpected errors are caught here, once, and turned
 * into a failed report; run() itself never rejects for them.
 */

import type {
  ExecutionResult,
  RetryPolicy,
  RunOutcome,
  RunReport,
  RunState,
  SyncPhase,
  SyncPlan,
} from '@fanmirror/core'
import { DispatchError, IllegalTransitionError, ValidationFailure, toUnexpectedError } from '../errors'
import type { Logger, RunLoggers } from '../logger'
import { runOutcomesTotal } from '../metrics'
import type { Notification, Notifier } from '../notify'
import type { ParallelDispatcher } from './dispatcher'
import type { DryRunValidator } from './dry-run'
import { allSucceeded, logResults, summarizeResults } from './results'

const TRANSITIONS: Record<RunState, readonly RunState[]> = {
  idle: ['validating', 'failed'],
  validating: ['validation_failed', 'validated', 'failed'],
  validated: ['executing', 'failed'],
  executing: ['completed', 'failed'],
  validation_failed: [],
  completed: [],
  failed: [],
}

export function isTerminal(state: RunState): boolean {
  return TRANSITIONS[state].length === 0
}

export interface SyncOrchestratorDeps {
  validator: DryRunValidator
  dispatcher: ParallelDispatcher
  notifier: Notifier
  loggers: RunLoggers
  now?: () => number
}

export class SyncOrchestrator {
  private validator: DryRunValidator
  private dispatcher: ParallelDispatcher
  private notifier: Notifier
  private log: Logger
  private errorLog: Logger
  private now: () => number
  private _state: RunState = 'idle'

  constructor(deps: SyncOrchestratorDeps) {
    this.validator = deps.validator
    this.dispatcher = deps.dispatcher
    this.notifier = deps.notifier
    this.now = deps.now ?? Date.now
    this.log = deps.loggers.run.child({ component: 'SyncOrchestrator' })
    this.errorLog = deps.loggers.error.child({ component: 'SyncOrchestrator' })
  }

  get state(): RunState {
    return this._state
  }

  /**
   * Validate, then mirror. May be called once per orchestrator.
   *
   * @throws IllegalTransitionError if the orchestrator already ran
   */
  async run(plan: SyncPlan, policy: RetryPolicy, signal?: AbortSignal): Promise<RunReport> {
    if (this._state !== 'idle') {
      throw new IllegalTransitionError(this._state, 'validating')
    }

    const startTime = this.now()
    let validation: ExecutionResult[] = []
    let results: ExecutionResult[] = []

    try {
      this.transition('validating')
      this.log.info(
        { source: plan.sourcePath, destinations: plan.destinations },
        `Starting mirror of ${plan.sourcePath} to ${plan.destinations.length} destination(s)`,
      )

      const outcome = await this.validator.validate(plan, signal)
      validation = outcome.results

      if (!outcome.passed) {
        this.transition('validation_failed')
        const failed = validation.at(-1)
        const message =
          failed && failed.verdict === 'failure'
            ? new ValidationFailure(failed).message
            : 'Dry run did not reach every destination'

        this.errorLog.error({ phase: 'validate' }, `${message}; no destination was modified`)
        await this.safeNotify({ title: 'Mirror validation failed', message, level: 'error' })
        return this.finish('validation_failed', 'validate', validation, [], startTime)
      }

      this.transition('validated')
      this.log.info('Dry run passed for every destination')

      this.transition('executing')
      results = await this.dispatcher.dispatch(plan, policy, signal)

      this.transition('completed')
      logResults(results, this.log)

      const summary = summarizeResults(results, 'mirror')
      if (allSucceeded(results)) {
        await this.safeNotify({
          title: 'Mirror completed',
          message: `${summary.total} destination(s) mirrored from ${plan.sourcePath}`,
          level: 'info',
        })
        return this.finish('success', 'mirror', validation, results, startTime)
      }

      this.errorLog.error(
        { failedDestinations: summary.failedDestinations },
        `Mirror failed for ${summary.failed} of ${summary.total} destination(s): ${summary.failedDestinations.join(', ')}`,
      )
      await this.safeNotify({
        title: 'Mirror completed with failures',
        message: `Failed: ${summary.failedDestinations.join(', ')}`,
        level: 'warning',
      })
      return this.finish('partial_failure', 'mirror', validation, results, startTime)
    } catch (err) {
      const error = toUnexpectedError(err)
      const failedDuring = this.state
      if (!isTerminal(this._state)) {
        this.transition('failed')
      }
      if (err instanceof DispatchError) {
        results = [...err.results]
        logResults(results, this.log)
      }
      const reached: SyncPhase =
        failedDuring === 'executing' || failedDuring === 'completed' ? 'mirror' : 'validate'

      this.errorLog.error(
        { err: error, event: 'unexpected_error', state: failedDuring },
        `Unexpected error during ${failedDuring}: ${error.message}`,
      )
      await this.safeNotify({ title: 'Mirror aborted', message: error.message, level: 'error' })
      return {
        ...this.finish('failed', reached, validation, results, startTime),
        error: error.message,
      }
    }
  }

  private transition(to: RunState): void {
    if (!TRANSITIONS[this._state].includes(to)) {
      throw new IllegalTransitionError(this._state, to)
    }
    this.log.debug({ from: this._state, to }, `State ${this._state} -> ${to}`)
    this._state = to
  }

  private finish(
    outcome: RunOutcome,
    phase: SyncPhase,
    validation: ExecutionResult[],
    results: ExecutionResult[],
    startTime: number,
  ): RunReport {
    // Summarize the last phase that ran
    const summary = summarizeResults(phase === 'mirror' ? results : validation, phase)
    const exitCode = outcome === 'success' || outcome === 'partial_failure' ? 0 : 1

    runOutcomesTotal.inc({ outcome })
    this.log.info(
      { outcome, exitCode, ...summary, durationMs: this.now() - startTime },
      `Run ${outcome}: ${summary.succeeded} unchanged, ${summary.warnings} updated, ` +
        `${summary.failed} failed (${summary.total} total)`,
    )

    return { state: this._state, outcome, exitCode, validation, results, summary }
  }

  private async safeNotify(notification: Notification): Promise<void> {
    try {
      await this.notifier.notify(notification)
    } catch (err) {
      this.log.debug({ err, notifier: this.notifier.name }, 'Notification failed')
    }
  }
}
