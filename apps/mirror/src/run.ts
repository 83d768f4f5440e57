/**
 * One complete invocation: settings, logs, config, orchestrated run, metrics.
 * Returns the process exit code instead of exiting.
 */

import type pino from 'pino'
import { loadRuntimeSettings } from '../lib/config'
import { ConfigurationError } from '../lib/errors'
import { loadSyncConfig } from '../lib/job/loader'
import { type RunLogSession, type RunLoggers, createRunLoggers } from '../lib/logger'
import { recordRunStart, writeMetricsFile } from '../lib/metrics'
import { type Notifier, SilentNotifier, createDefaultNotifier } from '../lib/notify'
import { type ProcessRunner, type Sleeper, SpawnProcessRunner } from '../lib/sync'
import { createOrchestrator } from './app'

export interface MirrorOptions {
  /** Job config file. */
  config: string
  /** Overrides FANMIRROR_TOOL_PATH. */
  tool?: string
  /** Overrides FANMIRROR_LOG_DIR. */
  logDir?: string
  /** Overrides FANMIRROR_LOG_LEVEL. */
  logLevel?: pino.Level
  /** Write Prometheus metrics here when the run ends. */
  metricsFile?: string
  /** @default true */
  notify?: boolean
}

/**
 * Replaceable collaborators, for embedding and tests.
 */
export interface MirrorOverrides {
  env?: Record<string, string | undefined>
  runner?: ProcessRunner
  loggers?: RunLoggers
  notifier?: Notifier
  sleep?: Sleeper
  signal?: AbortSignal
}

export async function runMirror(options: MirrorOptions, overrides: MirrorOverrides = {}): Promise<number> {
  const settings = loadRuntimeSettings(overrides.env)
  const toolPath = options.tool ?? settings.toolPath
  const runner = overrides.runner ?? new SpawnProcessRunner()

  let session: RunLogSession | undefined
  let loggers: RunLoggers
  if (overrides.loggers) {
    loggers = overrides.loggers
  } else {
    session = await createRunLoggers({
      logDir: options.logDir ?? settings.logDir,
      level: options.logLevel ?? settings.logLevel,
      rotation: settings.rotation,
    })
    loggers = session.loggers
  }

  const notifier =
    overrides.notifier ??
    (options.notify === false ? new SilentNotifier() : createDefaultNotifier(runner, loggers.run))

  try {
    const job = loadSyncConfig(options.config, overrides.env)
    loggers.run.info(
      { config: options.config, toolPath, retryPolicy: job.retryPolicy },
      `Loaded job from ${options.config}`,
    )
    recordRunStart(toolPath, job.plan.sourcePath, job.plan.destinations.length)

    const orchestrator = createOrchestrator({
      runner,
      loggers,
      notifier,
      toolPath,
      sleep: overrides.sleep,
    })
    const report = await orchestrator.run(job.plan, job.retryPolicy, overrides.signal)
    return report.exitCode
  } catch (err) {
    if (!(err instanceof ConfigurationError)) {
      throw err
    }
    loggers.error.error({ err, event: 'configuration_error' }, err.message)
    try {
      await notifier.notify({ title: 'Mirror configuration error', message: err.message, level: 'error' })
    } catch (notifyErr) {
      loggers.run.debug({ err: notifyErr }, 'Notification failed')
    }
    return err.exitCode
  } finally {
    if (options.metricsFile) {
      try {
        await writeMetricsFile(options.metricsFile)
      } catch (err) {
        loggers.error.error(
          { err, event: 'metrics_write_failed', metricsFile: options.metricsFile },
          `Cannot write metrics to ${options.metricsFile}`,
        )
      }
    }
    await session?.close()
  }
}
