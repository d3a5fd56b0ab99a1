import { describe, it, expect } from 'vitest'
import { RequestDispatcher, requestPath, senderPathElement } from './request-dispatcher.js'

describe('senderPathElement', () => {
  it('should strip the colon and replace dots', () => {
    expect(senderPathElement(':1.42')).toBe('1_42')
  })
})

describe('RequestDispatcher', () => {
  it('should hand out fresh tokens with their predicted request paths', () => {
    const dispatcher = new RequestDispatcher('1_42')

    expect(dispatcher.nextToken()).toEqual({
      serial: 1,
      token: 'u1',
      correlationPath: '/org/freedesktop/portal/desktop/request/1_42/u1',
    })
    expect(dispatcher.nextToken().token).toBe('u2')
  })

  it('should resolve the pending request whose path matches', async () => {
    const dispatcher = new RequestDispatcher('1_42')
    const token = dispatcher.nextToken()
    const response = dispatcher.expect(token)

    expect(dispatcher.dispatch(token.correlationPath, { code: 0, results: { ok: true } })).toBe(true)
    await expect(response).resolves.toEqual({ code: 0, results: { ok: true } })
    expect(dispatcher.pendingCount).toBe(0)
  })

  it('should ignore responses nobody waits for', () => {
    const dispatcher = new RequestDispatcher('1_42')
    dispatcher.expect(dispatcher.nextToken())

    expect(dispatcher.dispatch(requestPath('1_42', 'u9'), { code: 0, results: {} })).toBe(false)
    expect(dispatcher.pendingCount).toBe(1)
  })

  it('should deliver each response once', () => {
    const dispatcher = new RequestDispatcher('1_42')
    const token = dispatcher.nextToken()
    dispatcher.expect(token)

    expect(dispatcher.dispatch(token.correlationPath, { code: 0, results: {} })).toBe(true)
    expect(dispatcher.dispatch(token.correlationPath, { code: 0, results: {} })).toBe(false)
  })

  it('should refuse a second callback on the same path', () => {
    const dispatcher = new RequestDispatcher('1_42')
    const token = dispatcher.nextToken()
    dispatcher.expect(token)

    expect(() => dispatcher.expect(token)).toThrow('is already pending')
  })

  it('should drop a discarded request', () => {
    const dispatcher = new RequestDispatcher('1_42')
    const token = dispatcher.nextToken()
    dispatcher.expect(token)
    dispatcher.discard(token)

    expect(dispatcher.pendingCount).toBe(0)
    expect(dispatcher.dispatch(token.correlationPath, { code: 0, results: {} })).toBe(false)
  })

  it('should fail every pending request on rejectAll', async () => {
    const dispatcher = new RequestDispatcher('1_42')
    const first = dispatcher.expect(dispatcher.nextToken())
    const second = dispatcher.expect(dispatcher.nextToken())
    const lost = new Error('Connection closed')

    expect(dispatcher.rejectAll(lost)).toBe(2)

    await expect(first).rejects.toBe(lost)
    await expect(second).rejects.toBe(lost)
    expect(dispatcher.pendingCount).toBe(0)
  })

  it('should leave discarded requests out of rejectAll', () => {
    const dispatcher = new RequestDispatcher('1_42')
    const token = dispatcher.nextToken()
    dispatcher.expect(token)
    dispatcher.discard(token)

    expect(dispatcher.rejectAll(new Error('Connection closed'))).toBe(0)
  })
})
