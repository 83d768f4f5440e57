/**
 * Exit code classification tests
 */

import { describe, expect, test } from 'vitest'
import { FAILURE_THRESHOLD, classify, describeExitCode, isFailure } from './exit-code'

describe('classify', () => {
  test('0 is success', () => {
    expect(classify(0)).toBe('success')
  })

  test.each([1, 2, 3, 4, 5, 6, 7])('%i is success with warnings', (code) => {
    expect(classify(code)).toBe('success_with_warnings')
  })

  test.each([8, 9, 15, 16, 24, 255])('%i is failure', (code) => {
    expect(classify(code)).toBe('failure')
  })

  test('the failure threshold is 8', () => {
    expect(FAILURE_THRESHOLD).toBe(8)
    expect(classify(FAILURE_THRESHOLD - 1)).toBe('success_with_warnings')
    expect(classify(FAILURE_THRESHOLD)).toBe('failure')
  })

  test('negative codes are failures', () => {
    expect(classify(-1)).toBe('failure')
  })
})

describe('isFailure', () => {
  test('only the failure verdict counts', () => {
    expect(isFailure('failure')).toBe(true)
    expect(isFailure('success_with_warnings')).toBe(false)
    expect(isFailure('success')).toBe(false)
  })
})

describe('describeExitCode', () => {
  test('describes 0 as no changes', () => {
    expect(describeExitCode(0)).toBe('no changes')
  })

  test('lists each set bit', () => {
    expect(describeExitCode(3)).toBe('files copied, extra files or directories')
    expect(describeExitCode(9)).toBe('files copied, copy failures')
    expect(describeExitCode(16)).toBe('fatal error')
  })

  test('reports unknown and negative codes', () => {
    expect(describeExitCode(32)).toBe('unknown exit code 32')
    expect(describeExitCode(-2)).toBe('abnormal exit (-2)')
  })
})
