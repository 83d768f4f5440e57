import { describe, expect, test } from 'vitest'
import { createRetryPolicy, createSyncPlan, splitToolOptions } from './plan'
import { type MirrorConfig, safeParseMirrorConfig } from './schemas/config'

function parsed(data: unknown): MirrorConfig {
  const result = safeParseMirrorConfig(data)
  if (!result.success) {
    throw new Error(result.errors.map((e) => `${e.path}: ${e.message}`).join('; '))
  }
  return result.data
}

describe('splitToolOptions', () => {
  test('splits on any run of whitespace', () => {
    expect(splitToolOptions('  /MIR  /Z\t/MT:32 ')).toEqual(['/MIR', '/Z', '/MT:32'])
  })

  test('returns no flags for a blank string', () => {
    expect(splitToolOptions('   ')).toEqual([])
  })
})

describe('createSyncPlan', () => {
  const config = parsed({
    SourceDir: '/srv/projects',
    DestDirs: ['/mnt/a', '/mnt/b'],
    Exclusions: ['.git', 'node_modules', '.git'],
    Options: '/MIR /Z',
    MaxParallelJobs: 3,
  })

  test('builds a plan from config', () => {
    const plan = createSyncPlan(config)

    expect(plan).toEqual({
      sourcePath: '/srv/projects',
      destinations: ['/mnt/a', '/mnt/b'],
      exclusions: ['.git', 'node_modules'],
      toolOptions: ['/MIR', '/Z'],
      maxParallelJobs: 3,
    })
  })

  test('freezes the plan and its lists', () => {
    const plan = createSyncPlan(config)

    expect(Object.isFrozen(plan)).toBe(true)
    expect(Object.isFrozen(plan.destinations)).toBe(true)
    expect(Object.isFrozen(plan.toolOptions)).toBe(true)
  })
})

describe('createRetryPolicy', () => {
  test('converts the retry delay to milliseconds', () => {
    const config = parsed({
      SourceDir: '/srv/projects',
      DestDirs: ['/mnt/a'],
      Exclusions: [],
      MaxRetries: 5,
      RetryDelay: '2m',
      BackoffMultiplier: 3,
    })

    expect(createRetryPolicy(config)).toEqual({
      maxRetries: 5,
      initialDelayMs: 120_000,
      backoffMultiplier: 3,
    })
  })
})
