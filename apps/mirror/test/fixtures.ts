/**
 * Shared test fixtures using Faker.js
 *
 * Provides factory functions and a scripted ProcessRunner stand-in.
 */

import type { MirrorPath, RetryPolicy, SyncPhase, SyncPlan } from '@fanmirror/core'
import { faker } from '@faker-js/faker'
import pino from 'pino'
import type { Logger, RunLoggers } from '../lib/logger'
import { LIST_ONLY_FLAG, type ProcessRunner } from '../lib/sync/robocopy'

// =============================================================================
// Plan Fixtures
// =============================================================================

export function createDestinations(count: number): MirrorPath[] {
  return Array.from(
    { length: count },
    (_, index) => `/mnt/${faker.string.alphanumeric(6).toLowerCase()}-${index + 1}`,
  )
}

export function createPlan(overrides?: Partial<SyncPlan>): SyncPlan {
  return Object.freeze({
    sourcePath: `/srv/${faker.string.alphanumeric(8).toLowerCase()}`,
    destinations: createDestinations(2),
    exclusions: ['node_modules', '.git'],
    toolOptions: ['/MIR', '/Z', '/R:5', '/W:10', '/MT:32'],
    maxParallelJobs: 2,
    ...overrides,
  })
}

export function createRetryPolicy(overrides?: Partial<RetryPolicy>): RetryPolicy {
  return {
    maxRetries: 3,
    initialDelayMs: faker.number.int({ min: 100, max: 5000 }),
    backoffMultiplier: 2,
    ...overrides,
  }
}

// =============================================================================
// Loggers
// =============================================================================

/**
 * A logger that keeps every line it writes, parsed.
 */
export function createCapturingLogger(): { logger: Logger; lines: Array<Record<string, unknown>> } {
  const lines: Array<Record<string, unknown>> = []
  const logger = pino(
    { level: 'debug' },
    {
      write(line: string) {
        lines.push(JSON.parse(line))
      },
    },
  )
  return { logger, lines }
}

export function createCapturingLoggers(): {
  loggers: RunLoggers
  lines: Record<keyof RunLoggers, Array<Record<string, unknown>>>
} {
  const run = createCapturingLogger()
  const error = createCapturingLogger()
  const test = createCapturingLogger()
  return {
    loggers: { run: run.logger, error: error.logger, test: test.logger },
    lines: { run: run.lines, error: error.lines, test: test.lines },
  }
}

export function messages(lines: Array<Record<string, unknown>>): string[] {
  return lines.map((line) => String(line.msg))
}

// =============================================================================
// Scripted ProcessRunner
// =============================================================================

/**
 * Exit codes per destination and phase, consumed one per call.
 * The last code repeats once the list runs out; unscripted calls exit 0.
 */
export type ExitScript = Record<MirrorPath, Partial<Record<SyncPhase, number[]>>>

export interface RecordedCall {
  executable: string
  args: string[]
  destination: MirrorPath
  phase: SyncPhase
}

export interface ScriptedRunnerOptions {
  /** Awaited inside each call, while it counts as in flight. */
  delay?: (call: RecordedCall) => Promise<void>
  /** Thrown from every call, as a spawn failure would be. */
  error?: Error
}

export class ScriptedProcessRunner implements ProcessRunner {
  readonly calls: RecordedCall[] = []
  inFlight = 0
  maxInFlight = 0

  constructor(
    private readonly script: ExitScript = {},
    private readonly options: ScriptedRunnerOptions = {},
  ) {}

  async run(executable: string, args: readonly string[]): Promise<number> {
    const call: RecordedCall = {
      executable,
      args: [...args],
      destination: args[1],
      phase: args[args.length - 1] === LIST_ONLY_FLAG ? 'validate' : 'mirror',
    }
    const previous = this.callsFor(call.destination, call.phase).length
    this.calls.push(call)

    if (this.options.error) {
      throw this.options.error
    }

    this.inFlight++
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight)
    try {
      if (this.options.delay) {
        await this.options.delay(call)
      }
      const codes = this.script[call.destination]?.[call.phase] ?? []
      if (codes.length === 0) return 0
      return codes[Math.min(previous, codes.length - 1)]
    } finally {
      this.inFlight--
    }
  }

  callsFor(destination: MirrorPath, phase?: SyncPhase): RecordedCall[] {
    return this.calls.filter(
      (call) => call.destination === destination && (phase === undefined || call.phase === phase),
    )
  }
}

/**
 * Resolve after `ms` of real time.
 */
export function wait(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}
