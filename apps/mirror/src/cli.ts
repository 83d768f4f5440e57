import { Command, InvalidArgumentError } from 'commander'
import type pino from 'pino'
import { isLogLevel } from '../lib/config'
import { isFanmirrorError } from '../lib/errors'
import { VERSION } from '../lib/version'
import { type MirrorOptions, runMirror } from './run'

interface CliOptions {
  config: string
  tool?: string
  logDir?: string
  logLevel?: pino.Level
  metricsFile?: string
  notify: boolean
}

export interface ProgramHooks {
  run?: (options: MirrorOptions, signal?: AbortSignal) => Promise<number>
  setExitCode?: (code: number) => void
  signal?: AbortSignal
}

function parseLogLevel(value: string): pino.Level {
  if (!isLogLevel(value)) {
    throw new InvalidArgumentError('Expected one of fatal, error, warn, info, debug, trace.')
  }
  return value
}

export function createProgram(hooks: ProgramHooks = {}): Command {
  const run = hooks.run ?? ((options, signal) => runMirror(options, { signal }))
  const setExitCode =
    hooks.setExitCode ??
    ((code: number) => {
      process.exitCode = code
    })

  const program = new Command()

  program
    .name('fanmirror')
    .description('Validate, then mirror one directory tree into every configured destination')
    .version(VERSION)
    .option('-c, --config <path>', 'Job config file (JSON or YAML)', 'config.json')
    .option('--tool <path>', 'Mirroring tool executable (default: $FANMIRROR_TOOL_PATH or robocopy)')
    .option('--log-dir <dir>', 'Directory for run.log, error.log and test.log')
    .option('--log-level <level>', 'Minimum log level', parseLogLevel)
    .option('--metrics-file <path>', 'Write Prometheus metrics to this file when the run ends')
    .option('--no-notify', 'Do not send operator notifications')
    .action(async (options: CliOptions) => {
      try {
        const exitCode = await run(
          {
            config: options.config,
            tool: options.tool,
            logDir: options.logDir,
            logLevel: options.logLevel,
            metricsFile: options.metricsFile,
            notify: options.notify,
          },
          hooks.signal,
        )
        setExitCode(exitCode)
      } catch (e) {
        console.error(e instanceof Error ? e.message : 'Mirror run failed')
        setExitCode(isFanmirrorError(e) ? e.exitCode : 1)
      }
    })

  return program
}
