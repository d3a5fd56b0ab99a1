import type { AcquiredSource, BackendContext, CaptureBackend } from '../types.js'
import { CompositorSupervisor } from './compositor.js'
import { discoverVideoNode, pipeWireRegistry } from './node-discovery.js'

/**
 * Virtual display capture: weston with a PipeWire output, Android rendering
 * into it, and the pipeline reading the compositor's video node.
 *
 * Order matters: a session started against an earlier compositor never
 * renders into the new one, and the node only exists once weston is up.
 */
export const headlessBackend: CaptureBackend = {
  kind: 'headless',

  async acquire(context: BackendContext): Promise<AcquiredSource> {
    const { config, host, supervisor, android, env } = context

    await android.stopStaleSession()

    const compositor = new CompositorSupervisor(host, supervisor, config.headless)
    try {
      await compositor.start(env)
      await android.bringUp(config.app)
      const nodeId = await discoverVideoNode(pipeWireRegistry(host, env), { sleep: (ms) => host.sleep(ms) })

      return {
        session: { backendKind: 'headless', sourceHandle: String(nodeId), state: 'acquired' },
        release: async () => compositor.dispose(),
      }
    } catch (error) {
      compositor.dispose()
      throw error
    }
  },
}
