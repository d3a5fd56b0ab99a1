import fs from 'fs'
import os from 'os'
import path from 'path'
import { isPollTimeoutError, poll } from '@droidcast/shared'
import { componentLogger } from '../../logger.js'
import type { ProcessSupervisor } from '../../services/process-supervisor.js'
import { isRunning, type SystemHost } from '../../services/system-host.js'
import { errorMessage, ProcessSpawnError, StartupTimeoutError } from '../../utils/errors.js'

const log = componentLogger('compositor')

export const COMPOSITOR_SOCKET = 'droidcast-stream'

export interface CompositorOptions {
  width: number
  height: number
  runtimeDir: string
  socketName?: string
  maxAttempts?: number
  intervalMs?: number
  /** Pause after killing a compositor left over from an earlier run */
  staleKillDelayMs?: number
}

/**
 * A single PipeWire output: Android renders straight into it, so the
 * pipeline can capture it without a monitor attached.
 */
export function outputConfig(width: number, height: number): string {
  return `[output]\nname=pipewire\nmode=${width}x${height}\n`
}

export class CompositorSupervisor {
  readonly socketName: string
  private configDir?: string

  constructor(
    private readonly host: SystemHost,
    private readonly supervisor: ProcessSupervisor,
    private readonly options: CompositorOptions
  ) {
    this.socketName = options.socketName ?? COMPOSITOR_SOCKET
  }

  get socketPath(): string {
    return path.join(this.options.runtimeDir, this.socketName)
  }

  /**
   * A lock file means some weston still holds (or died holding) our socket
   * name.
   */
  async clearStaleSocket(env: NodeJS.ProcessEnv): Promise<boolean> {
    const lockPath = `${this.socketPath}.lock`
    if (!fs.existsSync(lockPath)) {
      return false
    }

    log.info('Cleaning stale weston socket...')
    try {
      // pkill exits 1 when nothing matched
      await this.host.exec('pkill', ['-f', `weston.*${this.socketName}`], { env })
    } catch (error) {
      log.warn(`Could not stop the stale compositor: ${errorMessage(error)}`)
    }
    await this.host.sleep(this.options.staleKillDelayMs ?? 1000)
    fs.rmSync(this.socketPath, { force: true })
    fs.rmSync(lockPath, { force: true })
    return true
  }

  /**
   * Start weston and wait for its socket. On success WAYLAND_DISPLAY is set
   * in `env` so every later child connects to this compositor.
   */
  async start(env: NodeJS.ProcessEnv): Promise<string> {
    const { width, height, runtimeDir, maxAttempts = 20, intervalMs = 500 } = this.options
    env.XDG_RUNTIME_DIR = runtimeDir

    await this.clearStaleSocket(env)

    log.info(`Starting weston PipeWire compositor (${width}x${height})...`)
    this.configDir = fs.mkdtempSync(path.join(os.tmpdir(), 'droidcast-weston-'))
    const configPath = path.join(this.configDir, 'weston.ini')
    fs.writeFileSync(configPath, outputConfig(width, height))

    const weston = await this.host.spawn(
      'weston',
      ['--backend=pipewire', '--renderer=gl', `--config=${configPath}`, `--socket=${this.socketName}`],
      { env }
    )
    this.supervisor.register(weston, 'weston')

    try {
      await poll(
        () => {
          if (!isRunning(weston)) {
            throw new ProcessSpawnError(
              `weston exited before creating its socket (code ${String(weston.exitCode ?? weston.signalCode)})`,
              'weston'
            )
          }
          return fs.existsSync(this.socketPath)
        },
        { maxAttempts, intervalMs, label: 'weston socket', sleep: (ms) => this.host.sleep(ms) }
      )
    } catch (error) {
      if (isPollTimeoutError(error)) {
        throw new StartupTimeoutError(`Weston socket did not appear at ${this.socketPath}`, { cause: error })
      }
      throw error
    }

    log.info(`Weston socket ready: ${this.socketPath}`)
    env.WAYLAND_DISPLAY = this.socketName
    return this.socketName
  }

  /** Remove the generated output configuration */
  dispose(): void {
    if (!this.configDir) return
    fs.rmSync(this.configDir, { recursive: true, force: true })
    this.configDir = undefined
  }
}
