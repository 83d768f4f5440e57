import { mkdirSync, mkdtempSync, readFileSync, readdirSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, test } from 'vitest'
import type { Notification, Notifier } from '../lib/notify'
import { VERSION } from '../lib/version'
import { ScriptedProcessRunner, createCapturingLoggers } from '../test/fixtures'
import { runMirror } from './run'

class RecordingNotifier implements Notifier {
  readonly name = 'recording'
  readonly sent: Notification[] = []

  async notify(notification: Notification): Promise<void> {
    this.sent.push(notification)
  }
}

const noSleep = async () => {}

let dir: string
let configFile: string

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), 'fanmirror-run-'))
  mkdirSync(join(dir, 'src'))
  configFile = join(dir, 'job.json')
  writeFileSync(
    configFile,
    JSON.stringify({ SourceDir: 'src', DestDirs: ['/mnt/a', '/mnt/b'], Exclusions: ['.git'], RetryDelay: '1ms' }),
  )
})

afterEach(() => {
  rmSync(dir, { recursive: true, force: true })
})

describe('runMirror', () => {
  test('validates then mirrors every destination with the configured tool', async () => {
    const runner = new ScriptedProcessRunner()
    const notifier = new RecordingNotifier()
    const { loggers } = createCapturingLoggers()

    const exitCode = await runMirror(
      { config: configFile, tool: 'mirror-tool' },
      { env: {}, runner, loggers, notifier, sleep: noSleep },
    )

    expect(exitCode).toBe(0)
    expect(runner.calls.slice(0, 2).map((c) => [c.executable, c.destination, c.phase])).toEqual([
      ['mirror-tool', '/mnt/a', 'validate'],
      ['mirror-tool', '/mnt/b', 'validate'],
    ])
    expect(runner.callsFor('/mnt/a', 'mirror')).toHaveLength(1)
    expect(runner.callsFor('/mnt/b', 'mirror')).toHaveLength(1)
    expect(runner.callsFor('/mnt/a', 'mirror')[0].args).toEqual([
      join(dir, 'src'),
      '/mnt/a',
      '/MIR',
      '/Z',
      '/R:5',
      '/W:10',
      '/MT:32',
      '/XD',
      '.git',
    ])
    expect(notifier.sent.map((n) => n.title)).toEqual(['Mirror completed'])
  })

  test('takes the tool from the environment when no override is given', async () => {
    const runner = new ScriptedProcessRunner()

    await runMirror(
      { config: configFile },
      {
        env: { FANMIRROR_TOOL_PATH: '/opt/tool' },
        runner,
        loggers: createCapturingLoggers().loggers,
        notifier: new RecordingNotifier(),
        sleep: noSleep,
      },
    )

    expect(new Set(runner.calls.map((c) => c.executable))).toEqual(new Set(['/opt/tool']))
  })

  test('returns 1 without mirroring when the dry run fails', async () => {
    const runner = new ScriptedProcessRunner({ '/mnt/b': { validate: [16] } })

    const exitCode = await runMirror(
      { config: configFile },
      { env: {}, runner, loggers: createCapturingLoggers().loggers, notifier: new RecordingNotifier(), sleep: noSleep },
    )

    expect(exitCode).toBe(1)
    expect(runner.calls.filter((c) => c.phase === 'mirror')).toEqual([])
  })

  test('returns 0 when some destinations fail the real run', async () => {
    const runner = new ScriptedProcessRunner({ '/mnt/a': { mirror: [8] } })

    const exitCode = await runMirror(
      { config: configFile },
      { env: {}, runner, loggers: createCapturingLoggers().loggers, notifier: new RecordingNotifier(), sleep: noSleep },
    )

    expect(exitCode).toBe(0)
    expect(runner.callsFor('/mnt/a', 'mirror')).toHaveLength(4)
  })

  test('reports a configuration error and returns 1', async () => {
    const runner = new ScriptedProcessRunner()
    const notifier = new RecordingNotifier()
    const { loggers, lines } = createCapturingLoggers()
    const missing = join(dir, 'absent.json')

    const exitCode = await runMirror({ config: missing }, { env: {}, runner, loggers, notifier })

    expect(exitCode).toBe(1)
    expect(runner.calls).toEqual([])
    expect(lines.error).toHaveLength(1)
    expect(lines.error[0].event).toBe('configuration_error')
    expect(String(lines.error[0].msg).startsWith(`Invalid configuration in ${missing}:`)).toBe(true)
    expect(notifier.sent.map((n) => [n.title, n.level])).toEqual([['Mirror configuration error', 'error']])
  })

  test('writes the metrics file when asked', async () => {
    const metricsFile = join(dir, 'fanmirror.prom')

    await runMirror(
      { config: configFile, metricsFile },
      {
        env: {},
        runner: new ScriptedProcessRunner(),
        loggers: createCapturingLoggers().loggers,
        notifier: new RecordingNotifier(),
        sleep: noSleep,
      },
    )

    const text = readFileSync(metricsFile, 'utf-8')
    expect(text).toContain('# TYPE fanmirror_run_outcomes_total counter')
    expect(text).toContain('# TYPE fanmirror_sync_attempts_total counter')
    expect(text).toContain('fanmirror_run_destinations 2')
    expect(text).toContain(`fanmirror_run_info{version="${VERSION}",tool="robocopy",source="${join(dir, 'src')}"} 1`)
  })

  test('keeps the exit code when the metrics file cannot be written', async () => {
    const metricsFile = join(dir, 'missing', 'fanmirror.prom')
    const { loggers, lines } = createCapturingLoggers()

    const exitCode = await runMirror(
      { config: configFile, metricsFile },
      { env: {}, runner: new ScriptedProcessRunner(), loggers, notifier: new RecordingNotifier(), sleep: noSleep },
    )

    expect(exitCode).toBe(0)
    expect(lines.error.map((l) => [l.event, l.msg])).toEqual([
      ['metrics_write_failed', `Cannot write metrics to ${metricsFile}`],
    ])
  })

  test('writes its own log files when no loggers are given', async () => {
    const logDir = join(dir, 'logs')

    const exitCode = await runMirror(
      { config: configFile, logDir, notify: false },
      { env: {}, runner: new ScriptedProcessRunner(), sleep: noSleep },
    )

    expect(exitCode).toBe(0)
    const testLog = readdirSync(logDir)
      .filter((file) => file.startsWith('test.'))
      .map((file) => readFileSync(join(logDir, file), 'utf-8'))
      .join('')
    expect(testLog).toContain('Dry run passed for /mnt/a')
  })
})
