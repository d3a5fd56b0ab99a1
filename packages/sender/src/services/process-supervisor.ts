import { componentLogger } from '../logger.js'
import type { SupervisedProcess } from '../types/index.js'
import { ProcessSpawnError } from '../utils/errors.js'
import { isRunning, type SupervisableProcess } from './system-host.js'

const log = componentLogger('supervisor')

export interface ProcessSupervisorOptions {
  /** How long a process gets to exit after SIGTERM before SIGKILL */
  graceMs?: number
  /** How long to wait for the exit after SIGKILL */
  killWaitMs?: number
}

interface TrackedProcess {
  record: SupervisedProcess
  process: SupervisableProcess
}

function waitForExit(process: SupervisableProcess, timeoutMs: number): Promise<boolean> {
  return new Promise((resolve) => {
    if (!isRunning(process)) {
      resolve(true)
      return
    }
    const timer = setTimeout(() => resolve(false), timeoutMs)
    process.once('exit', () => {
      clearTimeout(timer)
      resolve(true)
    })
  })
}

/**
 * Sole owner of auxiliary process lifetimes. Everything registered here is
 * signaled and joined by shutdownAll(), which every exit path calls.
 */
export class ProcessSupervisor {
  private tracked: TrackedProcess[] = []
  private shutdown?: Promise<void>
  private readonly graceMs: number
  private readonly killWaitMs: number

  constructor(options: ProcessSupervisorOptions = {}) {
    this.graceMs = options.graceMs ?? 3000
    this.killWaitMs = options.killWaitMs ?? 1000
  }

  register(process: SupervisableProcess, name: string): SupervisedProcess {
    if (process.pid === undefined) {
      throw new ProcessSpawnError(`${name} has no pid`, name)
    }
    const record: SupervisedProcess = { pid: process.pid, name, startedAt: Date.now() }
    this.tracked.push({ record, process })
    log.info({ pid: record.pid }, `${name} started (PID ${record.pid})`)
    return record
  }

  list(): SupervisedProcess[] {
    return this.tracked.map(({ record }) => ({ ...record }))
  }

  get size(): number {
    return this.tracked.length
  }

  /**
   * Stop tracked processes newest first. Callers arriving while a shutdown
   * is in flight get the same promise, so nobody resolves before every
   * process has been joined. Entries leave the registry as they are
   * handled; a later call only sees processes registered since.
   */
  shutdownAll(): Promise<void> {
    if (!this.shutdown) {
      this.shutdown = this.drain().finally(() => {
        this.shutdown = undefined
      })
    }
    return this.shutdown
  }

  private async drain(): Promise<void> {
    let entry = this.tracked.pop()
    while (entry) {
      await this.stop(entry)
      entry = this.tracked.pop()
    }
  }

  private async stop({ record, process }: TrackedProcess): Promise<void> {
    if (!isRunning(process)) {
      log.debug({ pid: record.pid }, `${record.name} already exited`)
      return
    }

    log.info({ pid: record.pid }, `Stopping ${record.name} (PID ${record.pid})`)
    process.kill('SIGTERM')
    if (await waitForExit(process, this.graceMs)) {
      return
    }

    log.warn({ pid: record.pid }, `${record.name} ignored SIGTERM for ${this.graceMs}ms, sending SIGKILL`)
    process.kill('SIGKILL')
    if (!(await waitForExit(process, this.killWaitMs))) {
      log.error({ pid: record.pid }, `${record.name} still running after SIGKILL`)
    }
  }
}
