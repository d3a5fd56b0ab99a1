/**
 * Debug flags for droidcast
 *
 * Raw bus traffic and external commands are noisy, so they are printed only
 * when asked for via argv (--debug, --debug-bus, --debug-process) or the
 * DEBUG environment variable (DEBUG=bus,process or DEBUG=all).
 */

import { timestamp } from './time-utils.js'

export interface DebugFlags {
  bus: boolean
  process: boolean
  all: boolean
}

const flags: DebugFlags = {
  bus: false,
  process: false,
  all: false,
}

function strToBool(v: string | undefined): boolean {
  if (!v) return false
  const s = v.toLowerCase()
  return s === '1' || s === 'true' || s === 'yes' || s === 'on'
}

export function initDebugFlags(
  argv: readonly string[] = process.argv,
  env: NodeJS.ProcessEnv = process.env
): DebugFlags {
  const hasAny = (...names: string[]) => names.some((name) => argv.includes(name))

  const envDebug = (env.DEBUG || '').toLowerCase()
  const envParts = envDebug.split(/[,:\s]+/).filter(Boolean)

  const all = hasAny('--debug', '-d') || envDebug === '*' || envParts.includes('all')

  flags.bus = all || hasAny('--debug-bus') || strToBool(env.DEBUG_BUS) || envParts.includes('bus')
  flags.process =
    all || hasAny('--debug-process') || strToBool(env.DEBUG_PROCESS) || envParts.includes('process')
  flags.all = all

  return { ...flags }
}

export function isDebugBus(): boolean {
  return flags.bus || flags.all
}

export function isDebugProcess(): boolean {
  return flags.process || flags.all
}

export function logBus(direction: 'CALL' | 'SIGNAL' | 'REPLY', member: string, data: unknown): void {
  if (!isDebugBus()) return
  const prefix = direction === 'CALL' ? '→' : '←'
  const formatted =
    typeof data === 'object' && data !== null ? JSON.stringify(data, null, 2) : String(data)
  console.error(`[${timestamp()}] [BUS] ${prefix} ${member}\n${formatted}`)
}

export function logProcess(...args: unknown[]): void {
  if (!isDebugProcess()) return
  console.error(`[${timestamp()}] [DEBUG][PROCESS]`, ...args)
}
