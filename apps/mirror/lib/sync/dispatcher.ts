/**
 * Parallel Dispatcher
 *
 * Fans the real run out across destinations with at most
 * `plan.maxParallelJobs` RetryExecutor invocations in flight. Each worker
 * resolves its own promise; one collector gathers them in plan order.
 */

import type { ExecutionResult, MirrorPath, RetryPolicy, SyncPlan } from '@fanmirror/core'
import { DestinationError, DispatchError, ReentrantDispatchError } from '../errors'
import type { Logger } from '../logger'
import { syncInFlight, syncQueueLength, syncResultsTotal } from '../metrics'
import { FATAL_EXIT_CODE } from './exit-code'
import type { RetryExecutor } from './retry'
import { freezeResult } from './results'

/**
 * Counting gate over a fixed number of slots.
 *
 * A released slot passes directly to the oldest waiter, so the running count
 * never exceeds the limit.
 */
export class SlotGate {
  private running = 0
  private waiters: Array<() => void> = []

  constructor(private readonly limit: number) {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new RangeError(`Slot limit must be a positive integer, got ${limit}`)
    }
  }

  acquire(): Promise<void> {
    if (this.running < this.limit) {
      this.running++
      return Promise.resolve()
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve)
    })
  }

  release(): void {
    const next = this.waiters.shift()
    if (next) {
      next()
    } else {
      this.running--
    }
  }

  get inUse(): number {
    return this.running
  }

  get waiting(): number {
    return this.waiters.length
  }
}

export interface DispatchStats {
  /** Destinations currently being mirrored. */
  runningOperations: number
  /** Destinations waiting for a slot. */
  pendingOperations: number
  /** Highest number of destinations in flight at once during the last dispatch. */
  peakRunning: number
}

export class ParallelDispatcher {
  private executor: RetryExecutor
  private log: Logger
  private gate: SlotGate | null = null
  private peakRunning = 0

  /** Plans already dispatched; a plan is dispatched once */
  private dispatched = new WeakSet<SyncPlan>()

  constructor(executor: RetryExecutor, logger: Logger) {
    this.executor = executor
    this.log = logger.child({ component: 'ParallelDispatcher' })
  }

  /**
   * Mirror every destination of `plan`. Resolves with one result per
   * destination, in plan order.
   *
   * A failing destination never stops its siblings. If a worker throws
   * (tool missing, aborted), the remaining workers still run to completion.
   *
   * @throws ReentrantDispatchError if `plan` was dispatched before
   * @throws DispatchError if any worker threw, carrying every destination's
   *   result with the thrown ones recorded as failures
   */
  async dispatch(plan: SyncPlan, policy: RetryPolicy, signal?: AbortSignal): Promise<ExecutionResult[]> {
    if (this.dispatched.has(plan)) {
      throw new ReentrantDispatchError(plan.sourcePath)
    }
    this.dispatched.add(plan)

    const gate = new SlotGate(plan.maxParallelJobs)
    this.gate = gate
    this.peakRunning = 0

    this.log.info(
      { destinations: plan.destinations.length, maxParallelJobs: plan.maxParallelJobs },
      `Dispatching ${plan.destinations.length} destination(s), ${plan.maxParallelJobs} at a time`,
    )

    const settled = await Promise.allSettled(
      plan.destinations.map((destination) => this.runWorker(gate, destination, plan, policy, signal)),
    )

    const results: ExecutionResult[] = []
    const errors: unknown[] = []
    for (const [index, outcome] of settled.entries()) {
      if (outcome.status === 'fulfilled') {
        results.push(outcome.value)
        continue
      }
      errors.push(outcome.reason)
      const failed = thrownResult(plan.destinations[index], outcome.reason)
      syncResultsTotal.inc({ phase: 'mirror', verdict: failed.verdict })
      results.push(failed)
    }

    if (errors.length > 0) {
      throw new DispatchError(results, errors[0])
    }
    return results
  }

  private async runWorker(
    gate: SlotGate,
    destination: MirrorPath,
    plan: SyncPlan,
    policy: RetryPolicy,
    signal?: AbortSignal,
  ): Promise<ExecutionResult> {
    this.updateGauges(gate)
    await gate.acquire()
    this.peakRunning = Math.max(this.peakRunning, gate.inUse)
    this.updateGauges(gate)

    try {
      signal?.throwIfAborted()
      this.log.debug({ destination }, `Slot acquired for ${destination}`)
      const result = await this.executor.execute(destination, plan, policy, signal)
      syncResultsTotal.inc({ phase: 'mirror', verdict: result.verdict })
      return result
    } finally {
      gate.release()
      this.updateGauges(gate)
    }
  }

  private updateGauges(gate: SlotGate): void {
    syncInFlight.set(gate.inUse)
    syncQueueLength.set(gate.waiting)
  }

  /**
   * Get current dispatch stats.
   */
  getStats(): DispatchStats {
    return {
      runningOperations: this.gate?.inUse ?? 0,
      pendingOperations: this.gate?.waiting ?? 0,
      peakRunning: this.peakRunning,
    }
  }
}

/**
 * Failure result for a destination whose worker threw instead of returning.
 */
function thrownResult(destination: MirrorPath, error: unknown): ExecutionResult {
  const message = error instanceof Error ? error.message : String(error)
  if (error instanceof DestinationError) {
    return freezeResult({
      destination,
      phase: 'mirror',
      verdict: 'failure',
      exitCode: FATAL_EXIT_CODE,
      attempts: error.attempts,
      errorDetail: `Stopped during attempt ${error.attempts}: ${message}`,
      durationMs: error.durationMs,
    })
  }
  return freezeResult({
    destination,
    phase: 'mirror',
    verdict: 'failure',
    exitCode: FATAL_EXIT_CODE,
    attempts: 0,
    errorDetail: `Not started: ${message}`,
    durationMs: 0,
  })
}
