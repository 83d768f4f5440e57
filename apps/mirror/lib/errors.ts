/**
 * Domain Error Types
 *
 * Custom error classes carrying the process exit code they map to.
 * The CLI maps error.exitCode to the process exit status.
 */

import type { ExecutionResult, ValidationError } from '@fanmirror/core'

export class ConfigurationError extends Error {
  readonly exitCode = 1

  constructor(
    message: string,
    public readonly file?: string,
    public readonly errors: ValidationError[] = [],
  ) {
    const errorList = errors.map((e) => `\n  - ${e.path}: ${e.message}`).join('')
    super(file ? `Invalid configuration in ${file}: ${message}${errorList}` : `${message}${errorList}`)
    this.name = 'ConfigurationError'
  }
}

export class ValidationFailure extends Error {
  readonly exitCode = 1

  constructor(public readonly result: ExecutionResult) {
    super(
      `Dry run failed for ${result.destination} with exit code ${result.exitCode}` +
        (result.errorDetail ? ` (${result.errorDetail})` : ''),
    )
    this.name = 'ValidationFailure'
  }
}

/**
 * A destination's attempt loop stopped on a thrown error (tool missing,
 * aborted) rather than an exit code.
 */
export class DestinationError extends Error {
  readonly exitCode = 1

  constructor(
    public readonly destination: string,
    public readonly attempts: number,
    public readonly durationMs: number,
    cause: unknown,
  ) {
    super(cause instanceof Error ? cause.message : String(cause), { cause })
    this.name = 'DestinationError'
  }
}

/**
 * One or more dispatch workers threw. Carries one result per destination,
 * the thrown ones recorded as failures.
 */
export class DispatchError extends Error {
  readonly exitCode = 1

  constructor(
    public readonly results: readonly ExecutionResult[],
    cause: unknown,
  ) {
    super(cause instanceof Error ? cause.message : String(cause), { cause })
    this.name = 'DispatchError'
  }
}

export class UnexpectedError extends Error {
  readonly exitCode = 1

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'UnexpectedError'
  }
}

export class ReentrantDispatchError extends Error {
  readonly exitCode = 1

  constructor(sourcePath: string) {
    super(`Plan for ${sourcePath} has already been dispatched`)
    this.name = 'ReentrantDispatchError'
  }
}

export class IllegalTransitionError extends Error {
  readonly exitCode = 1

  constructor(from: string, to: string) {
    super(`Illegal run state transition: ${from} -> ${to}`)
    this.name = 'IllegalTransitionError'
  }
}

/**
 * Type guard for domain errors with a process exit code.
 */
export function isFanmirrorError(err: unknown): err is Error & { exitCode: number } {
  return err instanceof Error && 'exitCode' in err && typeof err.exitCode === 'number'
}

/**
 * Wrap anything thrown into an UnexpectedError, keeping the original as cause.
 */
export function toUnexpectedError(err: unknown): UnexpectedError {
  if (err instanceof UnexpectedError) return err
  const message = err instanceof Error ? err.message : String(err)
  return new UnexpectedError(message, { cause: err })
}
