/**
 * @droidcast/shared
 *
 * Polling, timing and debug helpers used by the sender
 */

export * from './poll.js'
export * from './time-utils.js'
export * from './debug.js'
