import type { BackendKind } from '../types/index.js'
import { ConfigError } from '../utils/errors.js'
import { headlessBackend } from './headless/index.js'
import { portalBackend } from './portal/index.js'
import { testPatternBackend } from './test-pattern.js'
import type { CaptureBackend } from './types.js'
import { x11Backend } from './x11.js'

export type { AcquiredSource, BackendContext, CaptureBackend } from './types.js'

const BACKENDS: Record<BackendKind, CaptureBackend> = {
  portal: portalBackend,
  headless: headlessBackend,
  x11: x11Backend,
  test: testPatternBackend,
}

/** Older name of the x11 method, still accepted */
const ALIASES = new Map<string, BackendKind>([['x11grab', 'x11']])

function isBackendKind(method: string): method is BackendKind {
  return Object.hasOwn(BACKENDS, method)
}

export function availableMethods(): string[] {
  return [...Object.keys(BACKENDS), ...ALIASES.keys()]
}

/**
 * Resolve CAPTURE_METHOD to its backend. Runs before anything is started,
 * so an unknown method never leaves a process behind.
 */
export function selectBackend(method: string): CaptureBackend {
  const normalized = method.trim().toLowerCase()
  const kind = isBackendKind(normalized) ? normalized : ALIASES.get(normalized)
  if (!kind) {
    throw new ConfigError(`Unknown CAPTURE_METHOD: ${method} (use ${availableMethods().join(', ')})`)
  }
  return BACKENDS[kind]
}
