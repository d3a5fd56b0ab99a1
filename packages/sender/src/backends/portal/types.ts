export interface PortalResponse {
  /** 0 success, 1 cancelled by the user, 2 ended some other way */
  code: number
  results: Record<string, unknown>
}

export type ResponseListener = (requestPath: string, response: PortalResponse) => void

/** Connection-level failure; every request still waiting for its answer is lost */
export type BrokerErrorListener = (error: unknown) => void

/** org.freedesktop.portal.ScreenCast source type bits */
export const SOURCE_TYPE_MONITOR = 1
export const SOURCE_TYPE_WINDOW = 2

/**
 * The capture broker as the negotiator sees it. Request-returning calls
 * resolve with the request object path; the real answer arrives later as a
 * Response signal delivered to every listener.
 */
export interface ScreenCastBroker {
  /** Bus unique name as it appears in request paths (no ':', '.' → '_') */
  readonly senderName: string
  onResponse(listener: ResponseListener): void
  onError(listener: BrokerErrorListener): void
  createSession(options: { handleToken: string; sessionHandleToken: string }): Promise<string>
  selectSources(
    sessionHandle: string,
    options: { handleToken: string; types: number; multiple: boolean }
  ): Promise<string>
  start(sessionHandle: string, options: { handleToken: string }): Promise<string>
  /** Descriptor of a PipeWire connection that can only see the session's streams */
  openPipeWireRemote(sessionHandle: string): Promise<number>
  closeSession(sessionHandle: string): Promise<void>
  disconnect(): void
}
