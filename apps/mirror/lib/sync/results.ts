/**
 * Result Aggregation
 *
 * Helpers for building, summarizing and logging ExecutionResults.
 */

import type { ExecutionResult, ResultSummary, SyncPhase } from '@fanmirror/core'
import type { Logger } from '../logger'

export function freezeResult(result: ExecutionResult): ExecutionResult {
  return Object.freeze(result)
}

/**
 * Count results per verdict and collect the destinations that failed.
 */
export function summarizeResults(results: readonly ExecutionResult[], phase: SyncPhase): ResultSummary {
  const summary: ResultSummary = {
    phase,
    total: results.length,
    succeeded: 0,
    warnings: 0,
    failed: 0,
    attempts: 0,
    failedDestinations: [],
  }

  for (const result of results) {
    summary.attempts += result.attempts
    switch (result.verdict) {
      case 'success':
        summary.succeeded++
        break
      case 'success_with_warnings':
        summary.warnings++
        break
      case 'failure':
        summary.failed++
        summary.failedDestinations.push(result.destination)
        break
    }
  }

  return summary
}

export function allSucceeded(results: readonly ExecutionResult[]): boolean {
  return results.every((r) => r.verdict !== 'failure')
}

/**
 * One line per destination, failures at error level, so no destination
 * is missing from the report.
 */
export function logResults(results: readonly ExecutionResult[], logger: Logger): void {
  for (const result of results) {
    const line =
      `${result.destination}: ${result.verdict} (exit code ${result.exitCode}, ` +
      `${result.attempts} attempt${result.attempts === 1 ? '' : 's'}, ${result.durationMs}ms)`

    if (result.verdict === 'failure') {
      logger.error({ ...result }, result.errorDetail ? `${line}: ${result.errorDetail}` : line)
    } else {
      logger.info({ ...result }, line)
    }
  }
}
