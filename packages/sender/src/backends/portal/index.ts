import fs from 'fs'
import { componentLogger } from '../../logger.js'
import { errorMessage } from '../../utils/errors.js'
import type { AcquiredSource, BackendContext, CaptureBackend } from '../types.js'
import { ScreenCastNegotiator } from './negotiator.js'

const log = componentLogger('portal')

function closeDescriptor(fd: number): void {
  try {
    fs.closeSync(fd)
  } catch (error) {
    log.debug(`Descriptor ${fd} was already closed: ${errorMessage(error)}`)
  }
}

/**
 * Desktop capture through the ScreenCast portal. The user picks the
 * Android window in the portal's dialog; the pipeline then reads the
 * granted node over the descriptor the portal hands back.
 */
export const portalBackend: CaptureBackend = {
  kind: 'portal',

  async acquire(context: BackendContext): Promise<AcquiredSource> {
    await context.android.bringUp(context.config.app)

    log.info('Starting PipeWire portal capture...')
    log.info('A screen-share dialog will appear, select the Waydroid window.')

    const broker = await context.connectBroker()
    const negotiator = new ScreenCastNegotiator(broker)

    try {
      const capture = await negotiator.negotiate()
      return {
        session: {
          backendKind: 'portal',
          sessionHandle: capture.sessionHandle,
          sourceHandle: String(capture.stream.nodeId),
          transportDescriptor: capture.transportDescriptor,
          state: 'acquired',
        },
        release: async () => {
          await negotiator.closeSession(capture.sessionHandle)
          closeDescriptor(capture.transportDescriptor)
          broker.disconnect()
        },
      }
    } catch (error) {
      broker.disconnect()
      throw error
    }
  },
}
