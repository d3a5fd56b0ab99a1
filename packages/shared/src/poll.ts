import { sleep as defaultSleep } from './time-utils.js'

/**
 * A probe result counts as "ready" unless it is null, undefined or false.
 */
export type PollProbe<T> = () => T | null | undefined | false | Promise<T | null | undefined | false>

export interface PollOptions {
  maxAttempts: number
  intervalMs: number
  /** Name used in the timeout message */
  label?: string
  sleep?: (ms: number) => Promise<void>
}

export class PollTimeoutError extends Error {
  constructor(
    public readonly label: string,
    public readonly attempts: number,
    public readonly intervalMs: number
  ) {
    super(`${label} not ready after ${attempts} attempts (${intervalMs}ms apart)`)
    this.name = 'PollTimeoutError'
  }
}

export function isPollTimeoutError(error: unknown): error is PollTimeoutError {
  return error instanceof PollTimeoutError
}

/**
 * Evaluate `probe` until it yields a ready value, sleeping `intervalMs`
 * between attempts. Ready on attempt k means k evaluations and k - 1 sleeps;
 * never ready means exactly `maxAttempts` evaluations, then PollTimeoutError.
 */
export async function poll<T>(probe: PollProbe<T>, options: PollOptions): Promise<T> {
  const { maxAttempts, intervalMs, label = 'condition', sleep = defaultSleep } = options
  if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
    throw new RangeError(`maxAttempts must be a positive integer, got ${maxAttempts}`)
  }

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    const value = await probe()
    if (value !== null && value !== undefined && value !== false) {
      return value
    }
    if (attempt < maxAttempts) {
      await sleep(intervalMs)
    }
  }

  throw new PollTimeoutError(label, maxAttempts, intervalMs)
}
