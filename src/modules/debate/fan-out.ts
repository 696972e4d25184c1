/**
 * Bounded fan-out / fan-in.
 *
 * Every task runs under the shared limiter and all of them settle before the
 * call returns. Outcomes are returned in input order, whatever the order of
 * completion.
 */

import type { ConcurrencyLimiter } from './concurrency-limiter.js'

export type TaskOutcome<T> =
  | { ok: true; value: T }
  | { ok: false; error: unknown }

export async function fanOut<I, T>(
  limiter: ConcurrencyLimiter,
  inputs: readonly I[],
  task: (input: I, index: number) => Promise<T>,
): Promise<TaskOutcome<T>[]> {
  const settled = await Promise.allSettled(
    inputs.map((input, index) => limiter.run(() => task(input, index))),
  )
  return settled.map((result): TaskOutcome<T> =>
    result.status === 'fulfilled'
      ? { ok: true, value: result.value }
      : { ok: false, error: result.reason },
  )
}
