import { selectBackend, type BackendContext } from './backends/index.js'
import { connectScreenCastBroker } from './backends/portal/dbus-broker.js'
import type { ScreenCastBroker } from './backends/portal/types.js'
import type { SenderConfig } from './config.js'
import { componentLogger } from './logger.js'
import { buildPipelineCommand } from './pipeline/args.js'
import { launchPipeline } from './pipeline/launcher.js'
import { AndroidSession } from './services/android-session.js'
import { advanceSession } from './services/capture-session.js'
import { startInputRelay } from './services/input-relay.js'
import type { ProcessSupervisor } from './services/process-supervisor.js'
import type { SystemHost } from './services/system-host.js'
import type { PipelineSpec } from './types/index.js'

const log = componentLogger('sender')

export interface RunDependencies {
  host: SystemHost
  supervisor: ProcessSupervisor
  /** Base environment for every child; copied, never mutated */
  env?: NodeJS.ProcessEnv
  connectBroker?: () => Promise<ScreenCastBroker>
  android?: AndroidSession
}

/**
 * One sender run: select the backend, start the input relay (except for
 * the test pattern), acquire the
 * capture source, then hand it to the pipeline and wait for the pipeline to
 * exit. Resolves with the pipeline's exit status.
 *
 * Supervised processes are shut down on every path out of here.
 */
export async function runSender(config: SenderConfig, deps: RunDependencies): Promise<number> {
  const backend = selectBackend(config.captureMethod)
  const { host, supervisor } = deps
  const env: NodeJS.ProcessEnv = { ...(deps.env ?? process.env) }

  const context: BackendContext = {
    config,
    host,
    supervisor,
    env,
    android: deps.android ?? new AndroidSession(host, env),
    connectBroker: deps.connectBroker ?? connectScreenCastBroker,
  }

  log.info(`Capture method: ${backend.kind}`)
  log.info(`Receiver: ${config.receiver.host}:${config.receiver.port}`)

  try {
    // Input goes to the Android session; the test pattern has none
    if (backend.kind !== 'test') {
      await startInputRelay(config.inputRelay, { host, supervisor, env })
    }

    const source = await backend.acquire(context)
    try {
      const session = advanceSession(source.session, 'streaming')
      const spec: PipelineSpec = {
        backend: session.backendKind,
        sourceHandle: session.sourceHandle,
        transportDescriptor: session.transportDescriptor,
        receiver: config.receiver,
        framerate: config.framerate,
        bitrateKbps: config.bitrateKbps,
      }

      const status = await launchPipeline(buildPipelineCommand(spec), { host, supervisor, env })
      advanceSession(session, 'closed')
      return status
    } finally {
      await source.release()
    }
  } finally {
    await supervisor.shutdownAll()
  }
}
