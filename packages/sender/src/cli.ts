import { logger } from './logger.js'
import { errorMessage, isSenderError } from './utils/errors.js'

export const INTERRUPTED_EXIT_CODE = 130

/** Where termination signals come from; `process` in production */
export interface SignalSource {
  on(signal: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown
}

export interface SignalHandlerOptions {
  signals: SignalSource
  supervisor: { shutdownAll(): Promise<void> }
  exit: (code: number) => void
}

/**
 * On SIGINT or SIGTERM, stop every supervised process and exit with 130.
 * Later signals are ignored while the first shutdown runs.
 */
export function installSignalHandlers({ signals, supervisor, exit }: SignalHandlerOptions): void {
  let shuttingDown = false
  const shutdown = async (signal: NodeJS.Signals) => {
    if (shuttingDown) return
    shuttingDown = true
    logger.info(`${signal} received, cleaning up...`)
    try {
      await supervisor.shutdownAll()
    } catch (error) {
      logger.error(error, 'Error during shutdown')
    }
    exit(INTERRUPTED_EXIT_CODE)
  }

  signals.on('SIGINT', () => void shutdown('SIGINT'))
  signals.on('SIGTERM', () => void shutdown('SIGTERM'))
}

/** Log a failed run and pick its exit code: the error's own, or 1 */
export function exitCodeFor(error: unknown): number {
  if (isSenderError(error)) {
    logger.error({ code: error.code }, `ERROR: ${error.message}`)
    return error.exitCode
  }
  logger.error(error, `Unexpected failure: ${errorMessage(error)}`)
  return 1
}
