import path from 'path'
import { z } from 'zod'
import { ConfigError } from './utils/errors.js'

function strToBool(v: string): boolean {
  const s = v.trim().toLowerCase()
  return s === '1' || s === 'true' || s === 'yes' || s === 'on'
}

function integer(fallback: number, { min = 1, max = Number.MAX_SAFE_INTEGER } = {}) {
  return z
    .string()
    .trim()
    .default(String(fallback))
    .transform((value) => (value === '' ? fallback : Number(value)))
    .pipe(z.number().int().min(min).max(max))
}

const envSchema = z.object({
  STREAM_HOST: z.string().trim().min(1).default('127.0.0.1'),
  STREAM_PORT: integer(9000, { max: 65535 }),
  CAPTURE_METHOD: z.string().trim().default('portal'),
  FRAMERATE: integer(30, { max: 240 }),
  BITRATE: integer(4000),
  HEADLESS_WIDTH: integer(1280, { max: 7680 }),
  HEADLESS_HEIGHT: integer(720, { max: 4320 }),
  INPUT_SERVER: z.string().default('1').transform(strToBool),
  INPUT_PORT: integer(9001, { max: 65535 }),
  INPUT_SERVER_SCRIPT: z.string().trim().min(1).default('input_server.py'),
  GAME_PACKAGE: z
    .string()
    .trim()
    .optional()
    .transform((value) => value || undefined),
  GAME_NAME_PATTERN: z.string().trim().min(1).default('empire'),
  DISPLAY: z.string().trim().min(1).default(':0'),
  XDG_RUNTIME_DIR: z.string().trim().optional(),
})

export interface SenderConfig {
  receiver: {
    host: string
    port: number
  }
  /** Raw method name; resolved (and rejected when unknown) by the backend selector */
  captureMethod: string
  framerate: number
  bitrateKbps: number
  headless: {
    width: number
    height: number
    runtimeDir: string
  }
  inputRelay: {
    enabled: boolean
    port: number
    script: string
  }
  app: {
    packageOverride?: string
    namePattern: string
  }
  x11Display: string
}

function defaultRuntimeDir(): string {
  return `/run/user/${process.getuid?.() ?? 0}`
}

/**
 * Build the run configuration from environment variables.
 * Throws ConfigError listing every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): SenderConfig {
  const result = envSchema.safeParse(env)
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ')
    throw new ConfigError(`Invalid configuration: ${details}`, { cause: result.error })
  }

  const parsed = result.data
  return {
    receiver: {
      host: parsed.STREAM_HOST,
      port: parsed.STREAM_PORT,
    },
    captureMethod: parsed.CAPTURE_METHOD,
    framerate: parsed.FRAMERATE,
    bitrateKbps: parsed.BITRATE,
    headless: {
      width: parsed.HEADLESS_WIDTH,
      height: parsed.HEADLESS_HEIGHT,
      runtimeDir: parsed.XDG_RUNTIME_DIR || defaultRuntimeDir(),
    },
    inputRelay: {
      enabled: parsed.INPUT_SERVER,
      port: parsed.INPUT_PORT,
      script: path.resolve(cwd, parsed.INPUT_SERVER_SCRIPT),
    },
    app: {
      packageOverride: parsed.GAME_PACKAGE,
      namePattern: parsed.GAME_NAME_PATTERN,
    },
    x11Display: parsed.DISPLAY,
  }
}
