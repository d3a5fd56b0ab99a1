import { customAlphabet } from 'nanoid'
import { componentLogger } from '../../logger.js'
import { errorMessage, NegotiationError } from '../../utils/errors.js'
import { RequestDispatcher, type RequestToken } from './request-dispatcher.js'
import {
  transition,
  type NegotiationEffect,
  type NegotiationEvent,
  type NegotiationState,
  type PortalStep,
  type PortalStream,
} from './state-machine.js'
import { SOURCE_TYPE_MONITOR, SOURCE_TYPE_WINDOW, type ScreenCastBroker } from './types.js'

const log = componentLogger('portal')

// Object path elements only allow [A-Za-z0-9_]
const sessionSuffix = customAlphabet('0123456789abcdefghijklmnopqrstuvwxyz', 10)

export function newSessionToken(): string {
  return `droidcast_${sessionSuffix()}`
}

export interface NegotiatedCapture {
  sessionHandle: string
  stream: PortalStream
  streamCount: number
  transportDescriptor: number
}

export interface NegotiatorOptions {
  dispatcher?: RequestDispatcher
  sessionToken?: string
}

/**
 * Drives the ScreenCast handshake one request at a time. Each step takes a
 * fresh token, registers its response callback, and only then calls the
 * broker; the next step is registered only after this one succeeded.
 */
export class ScreenCastNegotiator {
  private current: NegotiationState = { kind: 'idle' }
  private readonly dispatcher: RequestDispatcher
  private readonly sessionToken: string

  constructor(
    private readonly broker: ScreenCastBroker,
    options: NegotiatorOptions = {}
  ) {
    this.dispatcher = options.dispatcher ?? new RequestDispatcher(broker.senderName)
    this.sessionToken = options.sessionToken ?? newSessionToken()
  }

  get state(): NegotiationState {
    return this.current
  }

  async negotiate(): Promise<NegotiatedCapture> {
    this.broker.onResponse((path, response) => {
      if (!this.dispatcher.dispatch(path, response)) {
        log.debug({ path }, 'Ignoring response for an unknown request')
      }
    })
    this.broker.onError((error) => {
      this.dispatcher.rejectAll(error)
    })

    let effect = this.apply({ type: 'begin' })
    for (;;) {
      switch (effect.type) {
        case 'create-session':
          log.info('Requesting a screencast session')
          effect = await this.request('CreateSession', (token) =>
            this.broker.createSession({ handleToken: token.token, sessionHandleToken: this.sessionToken })
          )
          break

        case 'select-sources': {
          const { sessionHandle } = effect
          log.info({ session: sessionHandle }, 'Session created, selecting sources')
          effect = await this.request('SelectSources', (token) =>
            this.broker.selectSources(sessionHandle, {
              handleToken: token.token,
              types: SOURCE_TYPE_MONITOR | SOURCE_TYPE_WINDOW,
              multiple: false,
            })
          )
          break
        }

        case 'start': {
          const { sessionHandle } = effect
          log.info('Sources selected, starting capture')
          effect = await this.request('Start', (token) =>
            this.broker.start(sessionHandle, { handleToken: token.token })
          )
          break
        }

        case 'open-remote':
          return this.openRemote(effect.sessionHandle, effect.stream)

        case 'abort':
          await this.closeSession(effect.sessionHandle)
          throw effect.error

        case 'none':
          throw new NegotiationError(`Handshake stalled in state ${this.current.kind}`)
      }
    }
  }

  /**
   * Best-effort Session.Close. Used on every failure after CreateSession
   * succeeded and by the backend once the pipeline is gone.
   */
  async closeSession(sessionHandle: string | undefined): Promise<void> {
    if (!sessionHandle) return
    try {
      await this.broker.closeSession(sessionHandle)
      log.debug({ session: sessionHandle }, 'Session closed')
    } catch (error) {
      log.warn({ session: sessionHandle, error: errorMessage(error) }, 'Could not close portal session')
    }
  }

  private apply(event: NegotiationEvent): NegotiationEffect {
    const next = transition(this.current, event)
    this.current = next.state
    return next.effect
  }

  private async request(step: PortalStep, call: (token: RequestToken) => Promise<string>): Promise<NegotiationEffect> {
    const token = this.dispatcher.nextToken()
    // Settled into a value right away: the bus may fail the request while
    // the call below is still in flight
    const answer = this.dispatcher.expect(token).then(
      (response) => ({ ok: true as const, response }),
      (error: unknown) => ({ ok: false as const, error })
    )

    try {
      const handle = await call(token)
      if (handle !== token.correlationPath) {
        log.warn({ expected: token.correlationPath, actual: handle }, `${step} request path differs from the predicted one`)
      }
    } catch (error) {
      this.dispatcher.discard(token)
      return this.apply({ type: 'call-failed', step, error })
    }

    const settled = await answer
    if (!settled.ok) {
      return this.apply({ type: 'call-failed', step, error: settled.error })
    }
    return this.apply({ type: 'response', step, response: settled.response })
  }

  private async openRemote(sessionHandle: string, stream: PortalStream): Promise<NegotiatedCapture> {
    const streamCount = this.current.kind === 'started' ? this.current.streamCount : 1
    if (streamCount > 1) {
      log.info(`Portal returned ${streamCount} streams, using the first`)
    }
    log.info({ node: stream.nodeId }, `PipeWire node: ${stream.nodeId}`)

    let transportDescriptor: number
    try {
      transportDescriptor = await this.broker.openPipeWireRemote(sessionHandle)
    } catch (error) {
      await this.closeSession(sessionHandle)
      throw new NegotiationError(`OpenPipeWireRemote failed: ${errorMessage(error)}`, 'OpenPipeWireRemote', undefined, {
        cause: error,
      })
    }
    log.info(`PipeWire fd: ${transportDescriptor}`)

    return { sessionHandle, stream, streamCount, transportDescriptor }
  }
}
