import { Message, Variant, sessionBus, type MessageBus } from 'dbus-next'
import { logBus } from '@droidcast/shared'
import { componentLogger } from '../../logger.js'
import { errorMessage, NegotiationError } from '../../utils/errors.js'
import { senderPathElement } from './request-dispatcher.js'
import type { BrokerErrorListener, PortalResponse, ResponseListener, ScreenCastBroker } from './types.js'

const PORTAL_BUS_NAME = 'org.freedesktop.portal.Desktop'
const PORTAL_OBJECT_PATH = '/org/freedesktop/portal/desktop'
const SCREENCAST_INTERFACE = 'org.freedesktop.portal.ScreenCast'
const REQUEST_INTERFACE = 'org.freedesktop.portal.Request'
const SESSION_INTERFACE = 'org.freedesktop.portal.Session'

const DBUS_NAME = 'org.freedesktop.DBus'
const DBUS_PATH = '/org/freedesktop/DBus'

const log = componentLogger('bus')

/**
 * a{sv} results arrive as an object of Variants; the negotiator only wants
 * the values.
 */
export function unwrapResults(value: unknown): Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return {}
  }
  return Object.fromEntries(
    Object.entries(value).map(([key, entry]) => [key, entry instanceof Variant ? entry.value : entry])
  )
}

class DBusScreenCastBroker implements ScreenCastBroker {
  private listeners: ResponseListener[] = []
  private errorListeners: BrokerErrorListener[] = []

  constructor(
    private readonly bus: MessageBus,
    readonly senderName: string
  ) {
    bus.on('message', (message: Message) => this.handleMessage(message))
    // Connection errors arrive as bus 'error' events for as long as the bus lives
    bus.on('error', (error: unknown) => this.handleError(error))
  }

  onResponse(listener: ResponseListener): void {
    this.listeners.push(listener)
  }

  onError(listener: BrokerErrorListener): void {
    this.errorListeners.push(listener)
  }

  /** Subscribe to every Request.Response signal */
  async subscribe(): Promise<void> {
    await this.bus.call(
      new Message({
        destination: DBUS_NAME,
        path: DBUS_PATH,
        interface: DBUS_NAME,
        member: 'AddMatch',
        signature: 's',
        body: [`type='signal',interface='${REQUEST_INTERFACE}',member='Response'`],
      })
    )
  }

  createSession(options: { handleToken: string; sessionHandleToken: string }): Promise<string> {
    return this.requestCall('CreateSession', 'a{sv}', [
      {
        handle_token: new Variant('s', options.handleToken),
        session_handle_token: new Variant('s', options.sessionHandleToken),
      },
    ])
  }

  selectSources(
    sessionHandle: string,
    options: { handleToken: string; types: number; multiple: boolean }
  ): Promise<string> {
    return this.requestCall('SelectSources', 'oa{sv}', [
      sessionHandle,
      {
        handle_token: new Variant('s', options.handleToken),
        types: new Variant('u', options.types),
        multiple: new Variant('b', options.multiple),
      },
    ])
  }

  start(sessionHandle: string, options: { handleToken: string }): Promise<string> {
    return this.requestCall('Start', 'osa{sv}', [
      sessionHandle,
      '',
      { handle_token: new Variant('s', options.handleToken) },
    ])
  }

  async openPipeWireRemote(sessionHandle: string): Promise<number> {
    const [fd] = await this.call(PORTAL_OBJECT_PATH, SCREENCAST_INTERFACE, 'OpenPipeWireRemote', 'oa{sv}', [
      sessionHandle,
      {},
    ])
    if (typeof fd !== 'number') {
      throw new NegotiationError('OpenPipeWireRemote returned no file descriptor', 'OpenPipeWireRemote')
    }
    return fd
  }

  async closeSession(sessionHandle: string): Promise<void> {
    await this.call(sessionHandle, SESSION_INTERFACE, 'Close', '', [])
  }

  disconnect(): void {
    this.bus.disconnect()
  }

  private handleError(error: unknown): void {
    log.error({ error: errorMessage(error) }, 'Session bus error')
    for (const listener of this.errorListeners) {
      listener(error)
    }
  }

  private handleMessage(message: Message): void {
    if (message.interface !== REQUEST_INTERFACE || message.member !== 'Response') {
      return
    }
    const [code, results] = message.body
    if (typeof code !== 'number') {
      return
    }
    const response: PortalResponse = { code, results: unwrapResults(results) }
    logBus('SIGNAL', `Response ${message.path}`, response)
    for (const listener of this.listeners) {
      listener(message.path, response)
    }
  }

  private async requestCall(member: string, signature: string, body: unknown[]): Promise<string> {
    const [handle] = await this.call(PORTAL_OBJECT_PATH, SCREENCAST_INTERFACE, member, signature, body)
    if (typeof handle !== 'string') {
      throw new NegotiationError(`${member} returned no request handle`, member)
    }
    return handle
  }

  private async call(
    path: string,
    iface: string,
    member: string,
    signature: string,
    body: unknown[]
  ): Promise<unknown[]> {
    logBus('CALL', `${iface}.${member}`, { path, body })
    const reply = await this.bus.call(
      new Message({ destination: PORTAL_BUS_NAME, path, interface: iface, member, signature, body })
    )
    const replyBody: unknown[] = reply?.body ?? []
    logBus('REPLY', member, replyBody)
    return replyBody
  }
}

/** The part of MessageBus needed to wait for the Hello reply */
export interface BusConnection {
  readonly name: string | null
  once(event: 'connect' | 'error', listener: (...args: unknown[]) => void): unknown
  off(event: 'connect' | 'error', listener: (...args: unknown[]) => void): unknown
}

/**
 * Resolve with the bus unique name once the connection is up. Leaves no
 * listener behind, so later errors reach the broker's own handler.
 */
export function waitForUniqueName(bus: BusConnection): Promise<string> {
  if (bus.name) {
    return Promise.resolve(bus.name)
  }
  return new Promise((resolve, reject) => {
    const onConnect = () => {
      bus.off('error', onError)
      if (bus.name) {
        resolve(bus.name)
      } else {
        reject(new NegotiationError('Session bus connected without a unique name'))
      }
    }
    const onError = (error: unknown) => {
      bus.off('connect', onConnect)
      reject(error)
    }
    bus.once('connect', onConnect)
    bus.once('error', onError)
  })
}

/**
 * Connect to the session bus with fd passing enabled and subscribe to
 * portal Request responses.
 */
export async function connectScreenCastBroker(): Promise<ScreenCastBroker> {
  let bus: MessageBus
  try {
    bus = sessionBus({ negotiateUnixFd: true })
  } catch (error) {
    throw new NegotiationError(`Cannot connect to the session bus: ${errorMessage(error)}`, undefined, undefined, {
      cause: error,
    })
  }

  try {
    const broker = new DBusScreenCastBroker(bus, senderPathElement(await waitForUniqueName(bus)))
    await broker.subscribe()
    return broker
  } catch (error) {
    bus.disconnect()
    throw new NegotiationError(`Cannot subscribe to portal responses: ${errorMessage(error)}`, undefined, undefined, {
      cause: error,
    })
  }
}
