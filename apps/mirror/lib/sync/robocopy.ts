/**
 * Mirroring Tool Runner
 *
 * The only place a child process is spawned for mirroring. Arguments are always
 * passed as a vector, never through a shell, so paths with spaces or shell
 * metacharacters reach the tool unchanged.
 */

import { spawn } from 'node:child_process'
import type { MirrorPath, SyncPhase, SyncPlan } from '@fanmirror/core'
import { FATAL_EXIT_CODE } from './exit-code'

/** Flag appended in the validate phase: list only, copy nothing. */
export const LIST_ONLY_FLAG = '/L'

/** Flag introducing one excluded directory. */
export const EXCLUDE_DIR_FLAG = '/XD'

/**
 * Runs one tool invocation and reports its exit code.
 * Implementations do not retry and do not interpret the code.
 */
export interface ProcessRunner {
  /**
   * @param executable - Tool to run
   * @param args - Argument vector, passed through unquoted
   * @param signal - Aborting kills the child
   * @throws when the process cannot be started (e.g. binary not found)
   */
  run(executable: string, args: readonly string[], signal?: AbortSignal): Promise<number>
}

/**
 * Build the argument vector for one destination.
 * The real run uses exactly the flags that were validated, minus the list-only flag.
 */
export function buildMirrorArgs(plan: SyncPlan, destination: MirrorPath, phase: SyncPhase): string[] {
  const args: string[] = [plan.sourcePath, destination]

  args.push(...plan.toolOptions)

  for (const exclusion of plan.exclusions) {
    args.push(EXCLUDE_DIR_FLAG, exclusion)
  }

  if (phase === 'validate') {
    args.push(LIST_ONLY_FLAG)
  }

  return args
}

export interface SpawnProcessRunnerConfig {
  /**
   * Forward the child's stdout and stderr to ours.
   * @default false
   */
  inheritOutput?: boolean
}

/**
 * ProcessRunner backed by child_process.spawn.
 */
export class SpawnProcessRunner implements ProcessRunner {
  private inheritOutput: boolean

  constructor(config?: SpawnProcessRunnerConfig) {
    this.inheritOutput = config?.inheritOutput ?? false
  }

  run(executable: string, args: readonly string[], signal?: AbortSignal): Promise<number> {
    return new Promise((resolve, reject) => {
      const proc = spawn(executable, [...args], {
        shell: false,
        windowsHide: true,
        stdio: this.inheritOutput ? 'inherit' : 'ignore',
        signal,
      })

      proc.on('error', (err) => {
        reject(err)
      })

      // code is null when the child was killed by a signal
      proc.on('close', (code) => {
        resolve(code ?? FATAL_EXIT_CODE)
      })
    })
  }
}
