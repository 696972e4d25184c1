/**
 * Small shared helpers: ids, clocks and durations.
 */

import { randomUUID } from 'crypto'

const SECOND_MS = 1_000
const MINUTE_MS = 60 * SECOND_MS
const HOUR_MS = 60 * MINUTE_MS

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

/**
 * Render a duration at a resolution that suits its size:
 * `250ms`, `1.5s`, `2m 5s`, `1h 3m`.
 */
export function formatDuration(ms: number): string {
  if (ms < SECOND_MS) return `${String(ms)}ms`
  if (ms < MINUTE_MS) return `${(ms / SECOND_MS).toFixed(1)}s`

  if (ms < HOUR_MS) return twoUnits(ms, MINUTE_MS, 'm', SECOND_MS, 's')
  return twoUnits(ms, HOUR_MS, 'h', MINUTE_MS, 'm')
}

function twoUnits(ms: number, majorMs: number, majorUnit: string, minorMs: number, minorUnit: string): string {
  const major = Math.floor(ms / majorMs)
  const minor = Math.floor((ms % majorMs) / minorMs)
  return `${String(major)}${majorUnit} ${String(minor)}${minorUnit}`
}

/** Document and run ids: a v4 UUID without dashes */
export function generateId(): string {
  return randomUUID().replaceAll('-', '')
}

/** Seconds since a `Date.now()` reading, at millisecond precision */
export function elapsedSeconds(startedAtMs: number, nowMs: number = Date.now()): number {
  return Math.round(nowMs - startedAtMs) / SECOND_MS
}
