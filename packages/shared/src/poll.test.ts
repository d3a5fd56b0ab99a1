import { describe, it, expect, vi } from 'vitest'
import { poll, PollTimeoutError, isPollTimeoutError } from './poll.js'

function noSleep() {
  return vi.fn(async (_ms: number) => {})
}

describe('poll', () => {
  it('should return the first ready value after k evaluations and k - 1 sleeps', async () => {
    const sleep = noSleep()
    const probe = vi.fn()
      .mockReturnValueOnce(false)
      .mockReturnValueOnce(null)
      .mockReturnValueOnce('socket')

    const result = await poll(probe, { maxAttempts: 5, intervalMs: 500, sleep })

    expect(result).toBe('socket')
    expect(probe).toHaveBeenCalledTimes(3)
    expect(sleep).toHaveBeenCalledTimes(2)
    expect(sleep).toHaveBeenNthCalledWith(1, 500)
    expect(sleep).toHaveBeenNthCalledWith(2, 500)
  })

  it('should not sleep when the first attempt is ready', async () => {
    const sleep = noSleep()
    const probe = vi.fn(() => true)

    await expect(poll(probe, { maxAttempts: 3, intervalMs: 100, sleep })).resolves.toBe(true)
    expect(probe).toHaveBeenCalledTimes(1)
    expect(sleep).not.toHaveBeenCalled()
  })

  it('should treat 0 as a ready value', async () => {
    const sleep = noSleep()

    await expect(poll(() => 0, { maxAttempts: 2, intervalMs: 10, sleep })).resolves.toBe(0)
    expect(sleep).not.toHaveBeenCalled()
  })

  it('should await async probes', async () => {
    const sleep = noSleep()
    let calls = 0
    const probe = async () => {
      calls++
      return calls === 2 ? { id: 42 } : undefined
    }

    await expect(poll(probe, { maxAttempts: 3, intervalMs: 10, sleep })).resolves.toEqual({ id: 42 })
    expect(sleep).toHaveBeenCalledTimes(1)
  })

  it('should throw PollTimeoutError after exactly maxAttempts evaluations', async () => {
    const sleep = noSleep()
    const probe = vi.fn(() => false)

    const error = await poll(probe, { maxAttempts: 4, intervalMs: 250, label: 'weston socket', sleep })
      .catch((e: unknown) => e)

    expect(error).toBeInstanceOf(PollTimeoutError)
    expect(isPollTimeoutError(error)).toBe(true)
    expect(probe).toHaveBeenCalledTimes(4)
    expect(sleep).toHaveBeenCalledTimes(3)
    if (isPollTimeoutError(error)) {
      expect(error.attempts).toBe(4)
      expect(error.intervalMs).toBe(250)
      expect(error.message).toBe('weston socket not ready after 4 attempts (250ms apart)')
    }
  })

  it('should propagate probe errors without retrying', async () => {
    const sleep = noSleep()
    const probe = vi.fn(() => {
      throw new Error('boom')
    })

    await expect(poll(probe, { maxAttempts: 3, intervalMs: 10, sleep })).rejects.toThrow('boom')
    expect(probe).toHaveBeenCalledTimes(1)
  })

  it('should reject a non-positive attempt count', async () => {
    await expect(poll(() => true, { maxAttempts: 0, intervalMs: 10 })).rejects.toBeInstanceOf(RangeError)
  })
})
