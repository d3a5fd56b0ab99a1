import type { PortalResponse } from './types.js'

export const REQUEST_PATH_PREFIX = '/org/freedesktop/portal/desktop/request'

export interface RequestToken {
  serial: number
  token: string
  correlationPath: string
}

/**
 * ":1.42" → "1_42", the form the portal uses inside request paths.
 */
export function senderPathElement(uniqueName: string): string {
  return uniqueName.replace(/^:/, '').replace(/\./g, '_')
}

export function requestPath(senderName: string, token: string): string {
  return `${REQUEST_PATH_PREFIX}/${senderName}/${token}`
}

interface PendingRequest {
  resolve: (response: PortalResponse) => void
  reject: (error: unknown) => void
}

/**
 * Correlates Response signals with the request that caused them. Each
 * token is used once; a path holds at most one pending callback.
 */
export class RequestDispatcher {
  private serial = 0
  private pending = new Map<string, PendingRequest>()

  constructor(private readonly senderName: string) {}

  nextToken(): RequestToken {
    this.serial += 1
    const token = `u${this.serial}`
    return { serial: this.serial, token, correlationPath: requestPath(this.senderName, token) }
  }

  /**
   * Register the one-shot callback for `token`. Must happen before the call
   * that uses the token goes out, or a fast response would be dropped.
   */
  expect(token: RequestToken): Promise<PortalResponse> {
    if (this.pending.has(token.correlationPath)) {
      throw new Error(`Request ${token.correlationPath} is already pending`)
    }
    return new Promise((resolve, reject) => {
      this.pending.set(token.correlationPath, { resolve, reject })
    })
  }

  /** Drop the callback for a request whose call never went through */
  discard(token: RequestToken): void {
    this.pending.delete(token.correlationPath)
  }

  /** Returns false when nothing was waiting on `path` */
  dispatch(path: string, response: PortalResponse): boolean {
    const request = this.pending.get(path)
    if (!request) return false
    this.pending.delete(path)
    request.resolve(response)
    return true
  }

  /** Fail every pending request; their answers can no longer arrive */
  rejectAll(error: unknown): number {
    const requests = [...this.pending.values()]
    this.pending.clear()
    for (const request of requests) {
      request.reject(error)
    }
    return requests.length
  }

  get pendingCount(): number {
    return this.pending.size
  }
}
