import { componentLogger } from '../logger.js'
import type { AcquiredSource, BackendContext, CaptureBackend } from './types.js'

const log = componentLogger('x11')

/** Fallback for X sessions: grab the whole display */
export const x11Backend: CaptureBackend = {
  kind: 'x11',

  async acquire(context: BackendContext): Promise<AcquiredSource> {
    await context.android.bringUp(context.config.app)

    log.info(`Capturing X display ${context.config.x11Display}`)
    return {
      session: { backendKind: 'x11', sourceHandle: context.config.x11Display, state: 'acquired' },
      release: async () => {},
    }
  },
}
