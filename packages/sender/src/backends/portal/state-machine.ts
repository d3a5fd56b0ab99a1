import { z } from 'zod'
import { NegotiationError, NoSourceError, type SenderError } from '../../utils/errors.js'
import type { PortalResponse } from './types.js'

export type PortalStep = 'CreateSession' | 'SelectSources' | 'Start'

export interface PortalStream {
  nodeId: number
  properties: Record<string, unknown>
}

export type NegotiationState =
  | { kind: 'idle' }
  | { kind: 'session-created'; sessionHandle: string }
  | { kind: 'sources-selected'; sessionHandle: string }
  | { kind: 'started'; sessionHandle: string; stream: PortalStream; streamCount: number }
  | { kind: 'failed'; error: SenderError; sessionHandle?: string }

export type NegotiationEvent =
  | { type: 'begin' }
  | { type: 'response'; step: PortalStep; response: PortalResponse }
  | { type: 'call-failed'; step: PortalStep; error: unknown }

export type NegotiationEffect =
  | { type: 'create-session' }
  | { type: 'select-sources'; sessionHandle: string }
  | { type: 'start'; sessionHandle: string }
  | { type: 'open-remote'; sessionHandle: string; stream: PortalStream }
  | { type: 'abort'; error: SenderError; sessionHandle?: string }
  | { type: 'none' }

export interface Transition {
  state: NegotiationState
  effect: NegotiationEffect
}

const createSessionResults = z.object({
  session_handle: z.string().min(1),
})

const startResults = z.object({
  streams: z.array(z.tuple([z.number().int().nonnegative(), z.record(z.unknown())])).default([]),
})

const EXPECTED_STEP = {
  idle: 'CreateSession',
  'session-created': 'SelectSources',
  'sources-selected': 'Start',
} as const satisfies Record<string, PortalStep>

function describeCode(code: number): string {
  switch (code) {
    case 1:
      return 'cancelled by the user'
    case 2:
      return 'ended by the portal'
    default:
      return `response code ${code}`
  }
}

function fail(state: NegotiationState, error: SenderError): Transition {
  const sessionHandle = 'sessionHandle' in state ? state.sessionHandle : undefined
  return {
    state: { kind: 'failed', error, sessionHandle },
    effect: { type: 'abort', error, sessionHandle },
  }
}

/**
 * Pure step function of the ScreenCast handshake:
 * idle → session-created → sources-selected → started, or failed from any
 * of the first three. Terminal states ignore further events.
 */
export function transition(state: NegotiationState, event: NegotiationEvent): Transition {
  if (state.kind === 'started' || state.kind === 'failed') {
    return { state, effect: { type: 'none' } }
  }

  if (event.type === 'begin') {
    if (state.kind !== 'idle') {
      return fail(state, new NegotiationError(`Handshake already begun (state ${state.kind})`))
    }
    return { state, effect: { type: 'create-session' } }
  }

  const expected = EXPECTED_STEP[state.kind]
  if (event.step !== expected) {
    return fail(state, new NegotiationError(`Got ${event.step} event while waiting for ${expected}`, event.step))
  }

  if (event.type === 'call-failed') {
    const reason = event.error instanceof Error ? event.error.message : String(event.error)
    return fail(state, new NegotiationError(`${event.step} call failed: ${reason}`, event.step, undefined, { cause: event.error }))
  }

  const { code, results } = event.response
  if (code !== 0) {
    return fail(state, new NegotiationError(`${event.step} failed (${describeCode(code)})`, event.step, code))
  }

  switch (state.kind) {
    case 'idle': {
      const parsed = createSessionResults.safeParse(results)
      if (!parsed.success) {
        return fail(state, new NegotiationError('CreateSession response carried no session_handle', 'CreateSession', code))
      }
      const sessionHandle = parsed.data.session_handle
      return {
        state: { kind: 'session-created', sessionHandle },
        effect: { type: 'select-sources', sessionHandle },
      }
    }

    case 'session-created':
      return {
        state: { kind: 'sources-selected', sessionHandle: state.sessionHandle },
        effect: { type: 'start', sessionHandle: state.sessionHandle },
      }

    case 'sources-selected': {
      const parsed = startResults.safeParse(results)
      if (!parsed.success) {
        return fail(state, new NegotiationError('Start response carried malformed streams', 'Start', code))
      }
      const [first, ...rest] = parsed.data.streams
      if (!first) {
        return fail(state, new NoSourceError())
      }
      const stream: PortalStream = { nodeId: first[0], properties: first[1] }
      return {
        state: { kind: 'started', sessionHandle: state.sessionHandle, stream, streamCount: rest.length + 1 },
        effect: { type: 'open-remote', sessionHandle: state.sessionHandle, stream },
      }
    }
  }
}
