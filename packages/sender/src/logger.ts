import { destination, pino, stdTimeFunctions, type Logger } from 'pino'

const LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const

type Level = (typeof LEVELS)[number]

function parseLevel(value: string | undefined): Level {
  const normalized = value?.toLowerCase()
  return LEVELS.find((level) => level === normalized) ?? 'info'
}

/**
 * Diagnostics go to stderr so the pipeline keeps stdout to itself.
 */
export const logger: Logger = pino(
  {
    name: 'droidcast',
    level: parseLevel(process.env.LOG_LEVEL),
    timestamp: stdTimeFunctions.isoTime,
  },
  destination(2)
)

export type { Logger }

export function componentLogger(component: string): Logger {
  return logger.child({ component })
}
