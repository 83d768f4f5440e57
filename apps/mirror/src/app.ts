/**
 * fanmirror composition
 *
 * Wires the engine components around a ProcessRunner, loggers and a notifier.
 */

import type { RunLoggers } from '../lib/logger'
import type { Notifier } from '../lib/notify'
import {
  DryRunValidator,
  ParallelDispatcher,
  type ProcessRunner,
  RetryExecutor,
  type Sleeper,
  SyncOrchestrator,
} from '../lib/sync'

/**
 * Dependencies for one mirror run
 */
export interface MirrorDependencies {
  runner: ProcessRunner
  loggers: RunLoggers
  notifier: Notifier
  /** @example 'robocopy' */
  toolPath: string
  sleep?: Sleeper
  now?: () => number
}

/**
 * Build an orchestrator ready for a single run
 */
export function createOrchestrator(deps: MirrorDependencies): SyncOrchestrator {
  const { runner, loggers, notifier, toolPath, sleep, now } = deps

  const validator = new DryRunValidator(runner, loggers.test, { toolPath, now })
  const executor = new RetryExecutor(runner, loggers, { toolPath, sleep, now })
  const dispatcher = new ParallelDispatcher(executor, loggers.run)

  return new SyncOrchestrator({ validator, dispatcher, notifier, loggers, now })
}
