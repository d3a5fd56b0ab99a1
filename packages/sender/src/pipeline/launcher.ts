import { constants } from 'os'
import { formatDuration } from '@droidcast/shared'
import { componentLogger } from '../logger.js'
import type { ProcessSupervisor } from '../services/process-supervisor.js'
import { isRunning, type SupervisableProcess, type SystemHost } from '../services/system-host.js'
import type { PipelineCommand } from '../types/index.js'

const log = componentLogger('pipeline')

export interface LaunchOptions {
  host: SystemHost
  supervisor: ProcessSupervisor
  env?: NodeJS.ProcessEnv
}

function exitStatus(process: SupervisableProcess): Promise<number> {
  const toStatus = (code: number | null, signal: NodeJS.Signals | null): number => {
    if (code !== null) return code
    return signal ? 128 + (constants.signals[signal] ?? 0) : 1
  }

  return new Promise((resolve) => {
    if (!isRunning(process)) {
      resolve(toStatus(process.exitCode, process.signalCode))
      return
    }
    process.once('exit', (code, signal) => resolve(toStatus(code, signal)))
  })
}

/**
 * Hand the capture source to the external pipeline and wait for it.
 *
 * The pipeline is spawned rather than exec'd: the headless compositor and
 * the portal session have to stay alive while it runs, and the supervisor
 * still has to clean up after it. Resolves with the pipeline's exit status
 * (128 + signal number when it was killed).
 */
export async function launchPipeline(command: PipelineCommand, options: LaunchOptions): Promise<number> {
  const { host, supervisor, env } = options

  log.info(`Launching: ${command.command} ${command.args.join(' ')}`)
  const child = await host.spawn(command.command, command.args, {
    env,
    inheritedFds: command.inheritedFds,
  })
  supervisor.register(child, command.command)

  const startedAt = Date.now()
  const status = await exitStatus(child)
  const ranFor = formatDuration((Date.now() - startedAt) / 1000)

  if (status === 0) {
    log.info(`Pipeline finished after ${ranFor}`)
  } else {
    log.error(`Pipeline exited with status ${status} after ${ranFor}`)
  }
  return status
}
