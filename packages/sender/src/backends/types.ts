import type { SenderConfig } from '../config.js'
import type { AndroidSession } from '../services/android-session.js'
import type { ProcessSupervisor } from '../services/process-supervisor.js'
import type { SystemHost } from '../services/system-host.js'
import type { BackendKind, CaptureSession } from '../types/index.js'
import type { ScreenCastBroker } from './portal/types.js'

export interface BackendContext {
  config: SenderConfig
  host: SystemHost
  supervisor: ProcessSupervisor
  android: AndroidSession
  /** Environment of every child; the headless backend adds WAYLAND_DISPLAY */
  env: NodeJS.ProcessEnv
  connectBroker: () => Promise<ScreenCastBroker>
}

export interface AcquiredSource {
  session: CaptureSession
  /** Undo what acquire() set up outside the supervisor (broker session, temp files, descriptors) */
  release(): Promise<void>
}

export interface CaptureBackend {
  readonly kind: BackendKind
  acquire(context: BackendContext): Promise<AcquiredSource>
}
