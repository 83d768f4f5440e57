/**
 * Sync Metrics
 *
 * Metrics for mirroring tool invocations, retries and dispatch.
 */

import { Counter, Gauge, Histogram } from 'prom-client'
import { registry } from './registry'

// Mirror passes over large trees can take hours
const attemptBuckets = [1, 5, 30, 60, 300, 900, 1800, 3600, 7200]

export const syncAttemptsTotal = new Counter({
  name: 'fanmirror_sync_attempts_total',
  help: 'Mirroring tool invocations by phase and verdict',
  labelNames: ['phase', 'verdict'],
  registers: [registry],
})

export const syncAttemptDuration = new Histogram({
  name: 'fanmirror_sync_attempt_duration_seconds',
  help: 'Duration of a single mirroring tool invocation',
  labelNames: ['phase'],
  buckets: attemptBuckets,
  registers: [registry],
})

export const syncResultsTotal = new Counter({
  name: 'fanmirror_sync_results_total',
  help: 'Final per-destination results by phase and verdict',
  labelNames: ['phase', 'verdict'],
  registers: [registry],
})

export const syncRetrySleepsTotal = new Counter({
  name: 'fanmirror_sync_retry_sleeps_total',
  help: 'Backoff sleeps taken before a retry',
  registers: [registry],
})

export const syncInFlight = new Gauge({
  name: 'fanmirror_sync_in_flight',
  help: 'Destinations currently being mirrored',
  registers: [registry],
})

export const syncQueueLength = new Gauge({
  name: 'fanmirror_sync_queue_length',
  help: 'Destinations waiting for a dispatch slot',
  registers: [registry],
})

export const runOutcomesTotal = new Counter({
  name: 'fanmirror_run_outcomes_total',
  help: 'Finished runs by outcome',
  labelNames: ['outcome'],
  registers: [registry],
})
