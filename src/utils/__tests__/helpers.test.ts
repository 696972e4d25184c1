/**
 * Unit tests for general helpers.
 */

import { describe, it, expect } from 'vitest'
import { elapsedSeconds, formatDuration, generateId } from '../helpers.js'

describe('formatDuration', () => {
  it.each([
    [250, '250ms'],
    [1500, '1.5s'],
    [125_000, '2m 5s'],
    [3_780_000, '1h 3m'],
  ])('formats %i ms as %s', (ms, expected) => {
    expect(formatDuration(ms)).toBe(expected)
  })
})

describe('generateId', () => {
  it('returns 32 lowercase hex characters', () => {
    expect(generateId()).toMatch(/^[0-9a-f]{32}$/)
  })

  it('does not repeat', () => {
    expect(generateId()).not.toBe(generateId())
  })
})

describe('elapsedSeconds', () => {
  it('converts a millisecond interval to seconds', () => {
    expect(elapsedSeconds(1_000, 3_500)).toBe(2.5)
  })
})
