import type { CaptureSession, CaptureSessionState } from '../types/index.js'

const ORDER: readonly CaptureSessionState[] = ['acquired', 'streaming', 'closed']

/**
 * Move a capture session forward. States only advance; `closed` may be
 * reached straight from `acquired` when the pipeline never started.
 */
export function advanceSession(session: CaptureSession, next: CaptureSessionState): CaptureSession {
  if (ORDER.indexOf(next) <= ORDER.indexOf(session.state)) {
    throw new Error(`Capture session cannot move from ${session.state} to ${next}`)
  }
  session.state = next
  return session
}
