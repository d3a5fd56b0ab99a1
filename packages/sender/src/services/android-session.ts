import { isPollTimeoutError, poll } from '@droidcast/shared'
import type { SenderConfig } from '../config.js'
import { componentLogger } from '../logger.js'
import { StartupTimeoutError } from '../utils/errors.js'
import type { SystemHost } from './system-host.js'

const log = componentLogger('android')

const WAYDROID = 'waydroid'

/** Launched when neither GAME_PACKAGE nor the app inventory names a package */
export const FALLBACK_PACKAGE = 'com.smallgiantgames.empires'

export interface AppRecord {
  name: string
  packageName: string
}

export interface AndroidSessionTimings {
  sessionAttempts: number
  sessionIntervalMs: number
  /** Pause after stopping a stale session */
  staleStopDelayMs: number
  /** Pause between the session reporting RUNNING and showing the UI */
  sessionSettleMs: number
  readyAttempts: number
  readyIntervalMs: number
  readySettleMs: number
  /** Time the launched app gets to draw its first frames */
  renderDelayMs: number
}

export const DEFAULT_ANDROID_TIMINGS: AndroidSessionTimings = {
  sessionAttempts: 24,
  sessionIntervalMs: 5000,
  staleStopDelayMs: 2000,
  sessionSettleMs: 2000,
  readyAttempts: 30,
  readyIntervalMs: 2000,
  readySettleMs: 3000,
  renderDelayMs: 10000,
}

/**
 * Parse `waydroid app list`, which prints a "Name: ..." line followed
 * (eventually) by a "packageName: ..." line per app.
 */
export function parseAppList(listing: string): AppRecord[] {
  const records: AppRecord[] = []
  let name: string | undefined

  for (const raw of listing.split('\n')) {
    const line = raw.trim()
    const nameMatch = /^Name:\s*(.+)$/.exec(line)
    if (nameMatch) {
      name = nameMatch[1].trim()
      continue
    }
    const packageMatch = /^packageName:\s*(\S+)/.exec(line)
    if (packageMatch && name !== undefined) {
      records.push({ name, packageName: packageMatch[1] })
      name = undefined
    }
  }

  return records
}

export function findAppPackage(records: readonly AppRecord[], namePattern: string): string | undefined {
  const needle = namePattern.toLowerCase()
  return records.find((record) => record.name.toLowerCase().includes(needle))?.packageName
}

/**
 * Waydroid session bring-up. Everything here is an external `waydroid`
 * invocation observed through its status output.
 */
export class AndroidSession {
  private readonly timings: AndroidSessionTimings

  constructor(
    private readonly host: SystemHost,
    private readonly env: NodeJS.ProcessEnv,
    timings: Partial<AndroidSessionTimings> = {}
  ) {
    this.timings = { ...DEFAULT_ANDROID_TIMINGS, ...timings }
  }

  async status(): Promise<string> {
    const result = await this.host.exec(WAYDROID, ['status'], { env: this.env })
    return `${result.stdout}\n${result.stderr}`
  }

  async isRunning(): Promise<boolean> {
    return /RUNNING/.test(await this.status())
  }

  /**
   * A session started against an earlier compositor will not render into
   * a new one, so it has to go before the headless compositor starts.
   */
  async stopStaleSession(): Promise<boolean> {
    if (!(await this.isRunning())) {
      return false
    }
    log.info('Stopping stale Waydroid session...')
    const result = await this.host.exec(WAYDROID, ['session', 'stop'], { env: this.env })
    if (result.exitCode !== 0) {
      log.warn(`waydroid session stop exited with ${String(result.exitCode)}`)
    }
    await this.host.sleep(this.timings.staleStopDelayMs)
    return true
  }

  async ensureRunning(): Promise<void> {
    log.info('Checking Waydroid status...')
    if (await this.isRunning()) {
      log.info('Waydroid session already running.')
      return
    }

    log.info('Starting Waydroid session...')
    await this.host.spawnDetached(WAYDROID, ['session', 'start'], { env: this.env })

    const { sessionAttempts, sessionIntervalMs } = this.timings
    try {
      await poll(() => this.isRunning(), {
        maxAttempts: sessionAttempts,
        intervalMs: sessionIntervalMs,
        label: 'Waydroid session',
        sleep: (ms) => this.host.sleep(ms),
      })
    } catch (error) {
      if (isPollTimeoutError(error)) {
        const seconds = Math.round((sessionAttempts * sessionIntervalMs) / 1000)
        throw new StartupTimeoutError(`Waydroid did not start within ${seconds} seconds`, { cause: error })
      }
      throw error
    }
    log.info('Waydroid session is running.')
  }

  async showFullUi(): Promise<void> {
    log.info('Launching Waydroid full UI...')
    await this.host.spawnDetached(WAYDROID, ['show-full-ui'], { env: this.env })
  }

  /**
   * Resolves false when Android never reported ready; the caller carries on,
   * since a slow boot usually still gets there.
   */
  async waitUntilReady(): Promise<boolean> {
    log.info('Waiting for Android to be ready...')
    try {
      await poll(async () => /Android.*ready/.test(await this.status()), {
        maxAttempts: this.timings.readyAttempts,
        intervalMs: this.timings.readyIntervalMs,
        label: 'Android',
        sleep: (ms) => this.host.sleep(ms),
      })
    } catch (error) {
      if (isPollTimeoutError(error)) {
        log.warn('Android did not report ready, continuing anyway')
        return false
      }
      throw error
    }
    log.info('Android is ready.')
    return true
  }

  async listApps(): Promise<AppRecord[]> {
    const result = await this.host.exec(WAYDROID, ['app', 'list'], { env: this.env })
    return parseAppList(`${result.stdout}\n${result.stderr}`)
  }

  async resolvePackage(app: SenderConfig['app']): Promise<string> {
    if (app.packageOverride) {
      return app.packageOverride
    }
    const found = findAppPackage(await this.listApps(), app.namePattern)
    if (found) {
      return found
    }
    log.info(`No installed app matches "${app.namePattern}", using ${FALLBACK_PACKAGE}`)
    return FALLBACK_PACKAGE
  }

  async launchApp(packageName: string): Promise<void> {
    log.info(`Launching package: ${packageName}`)
    const result = await this.host.exec(WAYDROID, ['app', 'launch', packageName], { env: this.env })
    if (result.exitCode !== 0) {
      log.warn(`waydroid app launch exited with ${String(result.exitCode)}; the app may still start`)
    }
  }

  /**
   * Session, full UI, readiness, app launch, then a pause for the app to
   * render.
   */
  async bringUp(app: SenderConfig['app']): Promise<void> {
    await this.ensureRunning()
    await this.host.sleep(this.timings.sessionSettleMs)
    await this.showFullUi()
    await this.waitUntilReady()
    await this.host.sleep(this.timings.readySettleMs)
    await this.launchApp(await this.resolvePackage(app))
    log.info(`Waiting ${Math.round(this.timings.renderDelayMs / 1000)} seconds for the app to render...`)
    await this.host.sleep(this.timings.renderDelayMs)
  }
}
