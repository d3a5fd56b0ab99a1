import { isPollTimeoutError, poll } from '@droidcast/shared'
import { z } from 'zod'
import { componentLogger } from '../../logger.js'
import type { SystemHost } from '../../services/system-host.js'
import { errorMessage, NodeNotFoundError } from '../../utils/errors.js'

const log = componentLogger('node-discovery')

export interface RegistryNode {
  id: number
  mediaClass: string
  nodeName: string
}

/** Resolves with the parsed registry dump, or null when none could be read */
export type RegistryQuery = () => Promise<unknown>

const registryEntrySchema = z.object({
  id: z.number().int().nonnegative(),
  info: z
    .object({
      props: z.record(z.unknown()).optional(),
    })
    .nullish(),
})

function stringProp(value: unknown): string {
  return typeof value === 'string' ? value : ''
}

/**
 * Flatten a pw-dump array into registry nodes. Entries that are not shaped
 * like registry objects are skipped.
 */
export function parseRegistryDump(dump: unknown): RegistryNode[] {
  const entries = z.array(z.unknown()).safeParse(dump)
  if (!entries.success) return []

  const nodes: RegistryNode[] = []
  for (const entry of entries.data) {
    const parsed = registryEntrySchema.safeParse(entry)
    if (!parsed.success) continue
    const props = parsed.data.info?.props ?? {}
    nodes.push({
      id: parsed.data.id,
      mediaClass: stringProp(props['media.class']),
      nodeName: stringProp(props['node.name']),
    })
  }
  return nodes
}

/**
 * First node that is a video node and belongs to the compositor.
 */
export function findVideoNode(dump: unknown, compositorName = 'weston'): number | undefined {
  return parseRegistryDump(dump).find(
    (node) => node.mediaClass.includes('Video') && node.nodeName.includes(compositorName)
  )?.id
}

export function pipeWireRegistry(host: SystemHost, env: NodeJS.ProcessEnv): RegistryQuery {
  return async () => {
    const result = await host.exec('pw-dump', [], { env })
    if (result.exitCode !== 0) {
      log.debug(`pw-dump exited with ${String(result.exitCode)}`)
      return null
    }
    try {
      return JSON.parse(result.stdout)
    } catch (error) {
      log.debug(`pw-dump output is not JSON yet: ${errorMessage(error)}`)
      return null
    }
  }
}

export interface DiscoveryOptions {
  compositorName?: string
  maxAttempts?: number
  intervalMs?: number
  sleep?: (ms: number) => Promise<void>
}

export async function discoverVideoNode(query: RegistryQuery, options: DiscoveryOptions = {}): Promise<number> {
  const { compositorName = 'weston', maxAttempts = 20, intervalMs = 500, sleep } = options

  log.info(`Looking for ${compositorName} PipeWire video node...`)
  try {
    const nodeId = await poll(
      async () => {
        const dump = await query()
        return dump === null ? null : findVideoNode(dump, compositorName)
      },
      { maxAttempts, intervalMs, label: `${compositorName} video node`, sleep }
    )
    log.info(`Found PipeWire video node: ${nodeId}`)
    return nodeId
  } catch (error) {
    if (isPollTimeoutError(error)) {
      throw new NodeNotFoundError(`No PipeWire video node found from ${compositorName}`, { cause: error })
    }
    throw error
  }
}
