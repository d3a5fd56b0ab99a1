import fs from 'fs'
import type { SenderConfig } from '../config.js'
import { componentLogger } from '../logger.js'
import type { SupervisedProcess } from '../types/index.js'
import type { ProcessSupervisor } from './process-supervisor.js'
import type { SystemHost } from './system-host.js'

const log = componentLogger('input-relay')

export const INPUT_RELAY_INTERPRETER = 'python3'

/**
 * Start the remote input relay (touch and key events back into the
 * session). Skipped, not fatal, when disabled or when the script is missing.
 */
export async function startInputRelay(
  options: SenderConfig['inputRelay'],
  deps: { host: SystemHost; supervisor: ProcessSupervisor; env: NodeJS.ProcessEnv }
): Promise<SupervisedProcess | null> {
  if (!options.enabled) {
    log.info('Input relay disabled (INPUT_SERVER=0)')
    return null
  }
  if (!fs.existsSync(options.script)) {
    log.warn(`Input relay script not found at ${options.script}, skipping`)
    return null
  }

  log.info(`Starting input relay on port ${options.port}...`)
  const child = await deps.host.spawn(INPUT_RELAY_INTERPRETER, [options.script, '--port', String(options.port)], {
    env: deps.env,
  })
  return deps.supervisor.register(child, 'input relay')
}
