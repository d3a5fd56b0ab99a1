import { spawn, type ChildProcess, type StdioOptions } from 'child_process'
import { logProcess, sleep } from '@droidcast/shared'
import { ProcessSpawnError } from '../utils/errors.js'

/**
 * The slice of a child process the supervisor needs. ChildProcess satisfies
 * it; tests substitute an in-memory fake.
 */
export interface SupervisableProcess {
  readonly pid?: number
  readonly exitCode: number | null
  readonly signalCode: NodeJS.Signals | null
  kill(signal?: NodeJS.Signals): boolean
  once(event: 'exit', listener: (code: number | null, signal: NodeJS.Signals | null) => void): this
}

export interface SpawnOptions {
  env?: NodeJS.ProcessEnv
  stdio?: 'inherit' | 'ignore'
  /** Parent descriptors exposed to the child as fd 3, 4, ... */
  inheritedFds?: readonly number[]
}

export interface CommandResult {
  exitCode: number | null
  stdout: string
  stderr: string
}

/**
 * Every external process the sender touches goes through this interface.
 */
export interface SystemHost {
  /** Start a child attached to this process; resolves once it is running */
  spawn(command: string, args: readonly string[], options?: SpawnOptions): Promise<SupervisableProcess>
  /** Start a child that is left to run on its own */
  spawnDetached(command: string, args: readonly string[], options?: Pick<SpawnOptions, 'env'>): Promise<void>
  /** Run a command to completion and capture its output */
  exec(command: string, args: readonly string[], options?: Pick<SpawnOptions, 'env'>): Promise<CommandResult>
  sleep(ms: number): Promise<void>
}

export function isRunning(process: SupervisableProcess): boolean {
  return process.exitCode === null && process.signalCode === null
}

function startChild(
  command: string,
  args: readonly string[],
  options: { env?: NodeJS.ProcessEnv; stdio: StdioOptions; detached?: boolean }
): Promise<ChildProcess> {
  logProcess(options.detached ? 'spawn (detached):' : 'spawn:', command, ...args)

  return new Promise((resolve, reject) => {
    const child = spawn(command, [...args], {
      env: options.env ?? process.env,
      stdio: options.stdio,
      detached: options.detached ?? false,
    })

    const onError = (error: Error) => {
      reject(new ProcessSpawnError(`Failed to start ${command}: ${error.message}`, command, { cause: error }))
    }

    child.once('error', onError)
    child.once('spawn', () => {
      child.off('error', onError)
      child.on('error', (error) => logProcess(`${command} error:`, error.message))
      resolve(child)
    })
  })
}

export const nodeSystemHost: SystemHost = {
  async spawn(command, args, options = {}) {
    const base = options.stdio ?? 'inherit'
    return startChild(command, args, {
      env: options.env,
      stdio: [base, base, base, ...(options.inheritedFds ?? [])],
    })
  },

  async spawnDetached(command, args, options = {}) {
    const child = await startChild(command, args, {
      env: options.env,
      stdio: 'ignore',
      detached: true,
    })
    child.unref()
  },

  async exec(command, args, options = {}) {
    const child = await startChild(command, args, {
      env: options.env,
      stdio: ['ignore', 'pipe', 'pipe'],
    })

    return new Promise<CommandResult>((resolve) => {
      let stdout = ''
      let stderr = ''
      child.stdout?.on('data', (chunk: Buffer | string) => {
        stdout += chunk.toString()
      })
      child.stderr?.on('data', (chunk: Buffer | string) => {
        stderr += chunk.toString()
      })
      child.on('close', (code) => {
        logProcess(`${command} exited with code ${String(code)}`)
        resolve({ exitCode: code, stdout, stderr })
      })
    })
  },

  sleep,
}
