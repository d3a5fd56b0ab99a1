import { describe, it, expect } from 'vitest'
import { transition, type NegotiationState } from './state-machine.js'
import { NegotiationError, NoSourceError } from '../../utils/errors.js'

const SESSION = '/org/freedesktop/portal/desktop/session/1_42/droidcast_test'

describe('transition', () => {
  it('should ask for a session on begin', () => {
    expect(transition({ kind: 'idle' }, { type: 'begin' })).toEqual({
      state: { kind: 'idle' },
      effect: { type: 'create-session' },
    })
  })

  it('should carry the session handle from CreateSession into SelectSources', () => {
    const next = transition(
      { kind: 'idle' },
      { type: 'response', step: 'CreateSession', response: { code: 0, results: { session_handle: SESSION } } }
    )

    expect(next).toEqual({
      state: { kind: 'session-created', sessionHandle: SESSION },
      effect: { type: 'select-sources', sessionHandle: SESSION },
    })
  })

  it('should move from sources-selected to start', () => {
    const next = transition(
      { kind: 'session-created', sessionHandle: SESSION },
      { type: 'response', step: 'SelectSources', response: { code: 0, results: {} } }
    )

    expect(next.effect).toEqual({ type: 'start', sessionHandle: SESSION })
  })

  it('should pick the first stream and count the rest', () => {
    const next = transition(
      { kind: 'sources-selected', sessionHandle: SESSION },
      {
        type: 'response',
        step: 'Start',
        response: { code: 0, results: { streams: [[57, { source_type: 2 }], [58, {}]] } },
      }
    )

    expect(next.state).toEqual({
      kind: 'started',
      sessionHandle: SESSION,
      stream: { nodeId: 57, properties: { source_type: 2 } },
      streamCount: 2,
    })
    expect(next.effect).toEqual({
      type: 'open-remote',
      sessionHandle: SESSION,
      stream: { nodeId: 57, properties: { source_type: 2 } },
    })
  })

  it('should abort on a nonzero response code and keep the session handle for cleanup', () => {
    const next = transition(
      { kind: 'session-created', sessionHandle: SESSION },
      { type: 'response', step: 'SelectSources', response: { code: 1, results: {} } }
    )

    expect(next.state.kind).toBe('failed')
    expect(next.effect.type).toBe('abort')
    if (next.effect.type !== 'abort') return
    expect(next.effect.sessionHandle).toBe(SESSION)
    expect(next.effect.error).toBeInstanceOf(NegotiationError)
    expect(next.effect.error.message).toBe('SelectSources failed (cancelled by the user)')
  })

  it('should abort without a session handle when CreateSession fails', () => {
    const next = transition(
      { kind: 'idle' },
      { type: 'response', step: 'CreateSession', response: { code: 2, results: {} } }
    )

    expect(next.effect).toMatchObject({ type: 'abort', sessionHandle: undefined })
    if (next.effect.type !== 'abort') return
    expect(next.effect.error.message).toBe('CreateSession failed (ended by the portal)')
  })

  it('should reject a CreateSession answer without a session handle', () => {
    const next = transition({ kind: 'idle' }, { type: 'response', step: 'CreateSession', response: { code: 0, results: {} } })

    expect(next.state.kind).toBe('failed')
  })

  it('should raise NoSourceError for zero streams', () => {
    const next = transition(
      { kind: 'sources-selected', sessionHandle: SESSION },
      { type: 'response', step: 'Start', response: { code: 0, results: { streams: [] } } }
    )

    expect(next.effect.type).toBe('abort')
    if (next.effect.type !== 'abort') return
    expect(next.effect.error).toBeInstanceOf(NoSourceError)
    expect(next.effect.sessionHandle).toBe(SESSION)
  })

  it('should treat a missing streams entry as zero streams', () => {
    const next = transition(
      { kind: 'sources-selected', sessionHandle: SESSION },
      { type: 'response', step: 'Start', response: { code: 0, results: {} } }
    )

    expect(next.state).toMatchObject({ kind: 'failed' })
    if (next.state.kind !== 'failed') return
    expect(next.state.error).toBeInstanceOf(NoSourceError)
  })

  it('should fail on a response for the wrong step', () => {
    const next = transition(
      { kind: 'idle' },
      { type: 'response', step: 'Start', response: { code: 0, results: {} } }
    )

    expect(next.effect.type).toBe('abort')
    if (next.effect.type !== 'abort') return
    expect(next.effect.error.message).toBe('Got Start event while waiting for CreateSession')
  })

  it('should turn a failed call into an abort', () => {
    const next = transition(
      { kind: 'sources-selected', sessionHandle: SESSION },
      { type: 'call-failed', step: 'Start', error: new Error('No such interface') }
    )

    expect(next.effect).toMatchObject({ type: 'abort', sessionHandle: SESSION })
    if (next.effect.type !== 'abort') return
    expect(next.effect.error.message).toBe('Start call failed: No such interface')
  })

  it('should ignore events in terminal states', () => {
    const failed: NegotiationState = { kind: 'failed', error: new NoSourceError() }
    expect(transition(failed, { type: 'begin' })).toEqual({ state: failed, effect: { type: 'none' } })
  })
})
