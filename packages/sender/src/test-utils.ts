import { EventEmitter } from 'events'
import type { CommandResult, SpawnOptions, SupervisableProcess, SystemHost } from './services/system-host.js'
import { requestPath } from './backends/portal/request-dispatcher.js'
import type {
  BrokerErrorListener,
  PortalResponse,
  ResponseListener,
  ScreenCastBroker,
} from './backends/portal/types.js'
import { ProcessSpawnError } from './utils/errors.js'

/**
 * In-memory child process. Exits on the next tick when signaled unless told
 * to ignore SIGTERM.
 */
export class FakeProcess extends EventEmitter implements SupervisableProcess {
  exitCode: number | null = null
  signalCode: NodeJS.Signals | null = null
  readonly signals: NodeJS.Signals[] = []

  constructor(
    public readonly pid: number,
    private readonly behavior: { ignoreSigterm?: boolean; onKill?: (signal: NodeJS.Signals) => void } = {}
  ) {
    super()
  }

  kill(signal: NodeJS.Signals = 'SIGTERM'): boolean {
    this.signals.push(signal)
    this.behavior.onKill?.(signal)
    if (signal === 'SIGTERM' && this.behavior.ignoreSigterm) {
      return true
    }
    setImmediate(() => this.exit(null, signal))
    return true
  }

  exit(code: number | null, signal: NodeJS.Signals | null = null): void {
    if (this.exitCode !== null || this.signalCode !== null) return
    this.exitCode = code
    this.signalCode = signal
    this.emit('exit', code, signal)
  }
}

export interface SpawnRecord {
  command: string
  args: string[]
  options: SpawnOptions
  process: FakeProcess
}

export interface CommandRecord {
  command: string
  args: string[]
  env?: NodeJS.ProcessEnv
}

type ExecHandler = (args: readonly string[]) => Partial<CommandResult>
type SpawnHandler = (process: FakeProcess, args: readonly string[]) => void
type DetachedHandler = (args: readonly string[]) => void

/**
 * SystemHost stand-in: records every call, answers exec() from per-command
 * handlers and never touches a real process.
 */
export class FakeHost implements SystemHost {
  readonly spawned: SpawnRecord[] = []
  readonly detached: CommandRecord[] = []
  readonly executed: CommandRecord[] = []
  readonly slept: number[] = []

  private nextPid = 1000
  private execHandlers = new Map<string, ExecHandler>()
  private spawnHandlers = new Map<string, SpawnHandler>()
  private detachedHandlers = new Map<string, DetachedHandler>()
  private spawnFailures = new Set<string>()
  private sleepHooks: Array<(ms: number) => void> = []

  onExec(command: string, handler: ExecHandler): this {
    this.execHandlers.set(command, handler)
    return this
  }

  onSpawn(command: string, handler: SpawnHandler): this {
    this.spawnHandlers.set(command, handler)
    return this
  }

  onDetached(command: string, handler: DetachedHandler): this {
    this.detachedHandlers.set(command, handler)
    return this
  }

  failSpawn(command: string): this {
    this.spawnFailures.add(command)
    return this
  }

  onSleep(hook: (ms: number) => void): this {
    this.sleepHooks.push(hook)
    return this
  }

  spawnedCommands(): string[] {
    return this.spawned.map((record) => record.command)
  }

  async spawn(command: string, args: readonly string[], options: SpawnOptions = {}): Promise<FakeProcess> {
    if (this.spawnFailures.has(command)) {
      throw new ProcessSpawnError(`Failed to start ${command}: spawn ${command} ENOENT`, command)
    }
    const process = new FakeProcess(this.nextPid++)
    this.spawned.push({ command, args: [...args], options, process })
    this.spawnHandlers.get(command)?.(process, args)
    return process
  }

  async spawnDetached(command: string, args: readonly string[], options: Pick<SpawnOptions, 'env'> = {}): Promise<void> {
    if (this.spawnFailures.has(command)) {
      throw new ProcessSpawnError(`Failed to start ${command}: spawn ${command} ENOENT`, command)
    }
    this.detached.push({ command, args: [...args], env: options.env })
    this.detachedHandlers.get(command)?.(args)
  }

  async exec(command: string, args: readonly string[], options: Pick<SpawnOptions, 'env'> = {}): Promise<CommandResult> {
    this.executed.push({ command, args: [...args], env: options.env })
    if (this.spawnFailures.has(command)) {
      throw new ProcessSpawnError(`Failed to start ${command}: spawn ${command} ENOENT`, command)
    }
    const result = this.execHandlers.get(command)?.(args) ?? {}
    return { exitCode: 0, stdout: '', stderr: '', ...result }
  }

  async sleep(ms: number): Promise<void> {
    this.slept.push(ms)
    for (const hook of this.sleepHooks) {
      hook(ms)
    }
  }
}

type BrokerStep = 'CreateSession' | 'SelectSources' | 'Start'

export interface FakeBrokerOptions {
  /** Response signal per step; a step without one never gets an answer */
  responses?: Partial<Record<BrokerStep, PortalResponse>>
  /** Steps whose method call itself fails */
  failCalls?: BrokerStep[]
  transportDescriptor?: number
  failOpenRemote?: boolean
  failClose?: boolean
}

/**
 * ScreenCast portal stand-in. Response signals are delivered synchronously
 * from inside the method call, before the call resolves, the earliest a
 * real portal could answer.
 */
export class FakeBroker implements ScreenCastBroker {
  readonly senderName = '1_42'
  readonly calls: string[] = []
  readonly handleTokens: string[] = []
  readonly sessionTokens: string[] = []
  readonly closedSessions: string[] = []
  disconnected = false

  private listeners: ResponseListener[] = []
  private errorListeners: BrokerErrorListener[] = []

  constructor(private readonly options: FakeBrokerOptions = {}) {}

  onResponse(listener: ResponseListener): void {
    this.listeners.push(listener)
  }

  onError(listener: BrokerErrorListener): void {
    this.errorListeners.push(listener)
  }

  /** Simulate a connection-level bus error */
  fail(error: unknown): void {
    for (const listener of this.errorListeners) {
      listener(error)
    }
  }

  /** Deliver a Response signal for an arbitrary request path */
  emit(path: string, response: PortalResponse): void {
    for (const listener of this.listeners) {
      listener(path, response)
    }
  }

  async createSession(options: { handleToken: string; sessionHandleToken: string }): Promise<string> {
    this.sessionTokens.push(options.sessionHandleToken)
    return this.request('CreateSession', options.handleToken)
  }

  async selectSources(_sessionHandle: string, options: { handleToken: string }): Promise<string> {
    return this.request('SelectSources', options.handleToken)
  }

  async start(_sessionHandle: string, options: { handleToken: string }): Promise<string> {
    return this.request('Start', options.handleToken)
  }

  async openPipeWireRemote(): Promise<number> {
    this.calls.push('OpenPipeWireRemote')
    if (this.options.failOpenRemote) {
      throw new Error('org.freedesktop.DBus.Error.AccessDenied')
    }
    return this.options.transportDescriptor ?? 9
  }

  async closeSession(sessionHandle: string): Promise<void> {
    this.calls.push('Close')
    if (this.options.failClose) {
      throw new Error('org.freedesktop.DBus.Error.UnknownObject')
    }
    this.closedSessions.push(sessionHandle)
  }

  disconnect(): void {
    this.disconnected = true
  }

  private request(step: BrokerStep, handleToken: string): string {
    this.calls.push(step)
    this.handleTokens.push(handleToken)
    if (this.options.failCalls?.includes(step)) {
      throw new Error(`org.freedesktop.DBus.Error.Failed: ${step} rejected`)
    }
    const path = requestPath(this.senderName, handleToken)
    const response = this.options.responses?.[step]
    if (response) {
      this.emit(path, response)
    }
    return path
  }
}

export const TEST_SESSION_HANDLE = '/org/freedesktop/portal/desktop/session/1_42/droidcast_test'

/** Portal answers for a handshake that grants the given streams */
export function grantingResponses(streams: Array<[number, Record<string, unknown>]>): FakeBrokerOptions['responses'] {
  return {
    CreateSession: { code: 0, results: { session_handle: TEST_SESSION_HANDLE } },
    SelectSources: { code: 0, results: {} },
    Start: { code: 0, results: { streams } },
  }
}
