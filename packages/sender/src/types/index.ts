/**
 * Core data model shared by the backends, the launcher and the run loop
 */

export const BACKEND_KINDS = ['portal', 'headless', 'x11', 'test'] as const

export type BackendKind = (typeof BACKEND_KINDS)[number]

export interface ReceiverAddress {
  host: string
  port: number
}

export type CaptureSessionState = 'acquired' | 'streaming' | 'closed'

/**
 * The one capture source of a run.
 * `sourceHandle` is a PipeWire node id (portal, headless), an X display
 * (x11) or a test pattern name (test).
 */
export interface CaptureSession {
  backendKind: BackendKind
  sessionHandle?: string
  sourceHandle: string
  /** Open file descriptor handed to the pipeline child */
  transportDescriptor?: number
  state: CaptureSessionState
}

export interface PipelineSpec {
  readonly backend: BackendKind
  readonly sourceHandle: string
  readonly transportDescriptor?: number
  readonly receiver: Readonly<ReceiverAddress>
  readonly framerate: number
  readonly bitrateKbps: number
}

export interface PipelineCommand {
  command: string
  args: string[]
  /** Parent descriptors passed to the child, in order, starting at child fd 3 */
  inheritedFds: number[]
}

export interface SupervisedProcess {
  pid: number
  name: string
  startedAt: number
}
