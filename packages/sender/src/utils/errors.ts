/**
 * Terminal error taxonomy. Every one of these ends the run: the caller
 * shuts supervised processes down and exits with `exitCode`.
 */
export class SenderError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly exitCode: number = 1,
    options?: { cause?: unknown }
  ) {
    super(message, options)
    this.name = new.target.name
  }
}

/** Unknown capture method or malformed configuration; raised before any process starts */
export class ConfigError extends SenderError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'CONFIG_ERROR', 2, options)
  }
}

/** A capture broker handshake step answered with a nonzero response code */
export class NegotiationError extends SenderError {
  constructor(
    message: string,
    public readonly step?: string,
    public readonly responseCode?: number,
    options?: { cause?: unknown }
  ) {
    super(message, 'NEGOTIATION_ERROR', 1, options)
  }
}

export class NoSourceError extends SenderError {
  constructor(message = 'Capture broker returned no streams') {
    super(message, 'NO_SOURCE')
  }
}

/** A bounded poll ran out waiting on a readiness artifact */
export class StartupTimeoutError extends SenderError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'STARTUP_TIMEOUT', 1, options)
  }
}

export class NodeNotFoundError extends SenderError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'NODE_NOT_FOUND', 1, options)
  }
}

export class ProcessSpawnError extends SenderError {
  constructor(
    message: string,
    public readonly command: string,
    options?: { cause?: unknown }
  ) {
    super(message, 'PROCESS_SPAWN_ERROR', 1, options)
  }
}

export function isSenderError(error: unknown): error is SenderError {
  return error instanceof SenderError
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
