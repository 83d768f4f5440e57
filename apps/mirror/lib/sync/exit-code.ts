/**
 * Mirroring tool exit codes.
 *
 * The tool packs several conditions into bits of its exit code. Anything at or
 * above FAILURE_THRESHOLD means at least one copy error; that threshold is the
 * tool's contract and must not change.
 */

import type { Verdict } from '@fanmirror/core'

export const FAILURE_THRESHOLD = 8

/** Reported for a child that ended on a signal instead of exiting. */
export const FATAL_EXIT_CODE = 16

const EXIT_CODE_FLAGS: ReadonlyArray<readonly [bit: number, label: string]> = [
  [1, 'files copied'],
  [2, 'extra files or directories'],
  [4, 'mismatched files or directories'],
  [8, 'copy failures'],
  [16, 'fatal error'],
]

export function classify(exitCode: number): Verdict {
  if (exitCode === 0) return 'success'
  if (exitCode > 0 && exitCode < FAILURE_THRESHOLD) return 'success_with_warnings'
  return 'failure'
}

export function isFailure(verdict: Verdict): boolean {
  return verdict === 'failure'
}

/**
 * Decode an exit code into the conditions it reports.
 * @example describeExitCode(3) // 'files copied, extra files or directories'
 */
export function describeExitCode(exitCode: number): string {
  if (exitCode === 0) return 'no changes'
  if (exitCode < 0) return `abnormal exit (${exitCode})`

  const labels = EXIT_CODE_FLAGS.filter(([bit]) => (exitCode & bit) !== 0).map(([, label]) => label)
  return labels.length > 0 ? labels.join(', ') : `unknown exit code ${exitCode}`
}
