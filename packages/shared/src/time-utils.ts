/**
 * droidcast Shared Time Utilities
 */

/**
 * Resolve after `ms` milliseconds
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

/**
 * Format duration in seconds to MM:SS format, or H:MM:SS past the hour
 * @example formatDuration(65) // "1:05"
 * @example formatDuration(3725) // "1:02:05"
 */
export function formatDuration(seconds: number): string {
  const total = Math.max(0, Math.floor(seconds))
  const hours = Math.floor(total / 3600)
  const minutes = Math.floor((total % 3600) / 60)
  const secs = total % 60
  if (hours > 0) {
    return `${hours}:${minutes.toString().padStart(2, '0')}:${secs.toString().padStart(2, '0')}`
  }
  return `${minutes}:${secs.toString().padStart(2, '0')}`
}

/**
 * ISO timestamp used as the prefix of debug lines
 */
export function timestamp(date: Date = new Date()): string {
  return date.toISOString()
}
