import type { SyncPhase } from './types.js'

/**
 * Base class for every failure the sync pipeline raises on purpose.
 */
export class SyncError extends Error {
  public readonly code: string
  public readonly context?: Record<string, unknown>

  constructor(message: string, code: string, context?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, options)
    this.name = this.constructor.name
    this.code = code
    this.context = context

    Error.captureStackTrace(this, this.constructor)
  }
}

export class NetworkError extends SyncError {
  constructor(message: string, context?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, 'NETWORK', context, options)
  }
}

export class MalformedInputError extends SyncError {
  constructor(message: string, context?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, 'MALFORMED_INPUT', context, options)
  }
}

export class FilesystemError extends SyncError {
  constructor(message: string, context?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, 'FILESYSTEM', context, options)
  }
}

export class ConfigurationError extends SyncError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONFIGURATION', context)
  }
}

export class SyncPhaseError extends SyncError {
  public readonly phase: SyncPhase

  constructor(phase: SyncPhase, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause)
    super(`${phase} failed: ${detail}`, 'PHASE_FAILED', { phase }, { cause })
    this.phase = phase
  }
}

/**
 * Wraps a Node.js system error so callers see which path failed.
 */
export function toFilesystemError(action: string, path: string, error: unknown): FilesystemError {
  if (error instanceof FilesystemError) return error
  const code = error instanceof Error && 'code' in error ? String(error.code) : undefined
  const detail = error instanceof Error ? error.message : String(error)
  return new FilesystemError(`Cannot ${action} ${path}: ${detail}`, { code, path }, { cause: error })
}
