import { join } from 'node:path'
import { describe, expect, test } from 'vitest'
import { isLogLevel, loadRuntimeSettings } from './config'

describe('loadRuntimeSettings', () => {
  test('defaults', () => {
    expect(loadRuntimeSettings({})).toEqual({
      toolPath: 'robocopy',
      logDir: join(process.cwd(), 'logs'),
      logLevel: 'info',
      rotation: { size: '10m', frequency: 'daily', keep: 5 },
    })
  })

  test('reads overrides from the environment', () => {
    const settings = loadRuntimeSettings({
      FANMIRROR_TOOL_PATH: '/usr/local/bin/mirror-tool',
      FANMIRROR_LOG_DIR: '/var/log/fanmirror',
      FANMIRROR_LOG_LEVEL: 'debug',
      FANMIRROR_LOG_MAX_SIZE: '512k',
      FANMIRROR_LOG_FREQUENCY: 'hourly',
      FANMIRROR_LOG_KEEP: '2',
    })

    expect(settings).toEqual({
      toolPath: '/usr/local/bin/mirror-tool',
      logDir: '/var/log/fanmirror',
      logLevel: 'debug',
      rotation: { size: '512k', frequency: 'hourly', keep: 2 },
    })
  })

  test('falls back on unusable values', () => {
    const settings = loadRuntimeSettings({
      FANMIRROR_LOG_LEVEL: 'verbose',
      FANMIRROR_LOG_MAX_SIZE: 'huge',
      FANMIRROR_LOG_FREQUENCY: 'weekly',
      FANMIRROR_LOG_KEEP: 'many',
    })

    expect(settings.logLevel).toBe('info')
    expect(settings.rotation).toEqual({ size: '10m', frequency: 'daily', keep: 5 })
  })

  test('rolls on size only when the schedule is off', () => {
    const settings = loadRuntimeSettings({ FANMIRROR_LOG_FREQUENCY: 'none', FANMIRROR_LOG_KEEP: '0' })

    expect(settings.rotation).toEqual({ size: '10m', frequency: undefined, keep: 1 })
  })
})

describe('isLogLevel', () => {
  test('accepts pino levels only', () => {
    expect(isLogLevel('warn')).toBe(true)
    expect(isLogLevel('warning')).toBe(false)
  })
})
