/**
 * Error types surfaced by the scanner and its adapters.
 *
 * Probe failures are never represented here: a refused or timed out
 * connection is a `closed` outcome, not an error.
 */

export interface SerializedScanError {
  readonly type: 'invalid-port-spec' | 'invalid-configuration' | 'output-write' | 'report-format'
  readonly message: string
  readonly code?: string
}

/**
 * Base class for all expected scanner failures.
 */
export abstract class ScanError extends Error {
  abstract readonly type: SerializedScanError['type']
  readonly code: string | undefined

  constructor(message: string, code?: string) {
    super(message)
    this.name = this.constructor.name
    this.code = code
    Object.setPrototypeOf(this, new.target.prototype)
  }

  toJSON(): SerializedScanError {
    const result: SerializedScanError = {
      type: this.type,
      message: this.message,
    }
    if (this.code !== undefined) {
      return { ...result, code: this.code }
    }
    return result
  }
}

/**
 * Malformed port specification (non-numeric token, bad range, start > end).
 */
export class InvalidPortSpecError extends ScanError {
  readonly type = 'invalid-port-spec' as const
}

/**
 * Bad worker count, timeout, or environment setting.
 */
export class InvalidConfigurationError extends ScanError {
  readonly type = 'invalid-configuration' as const
}

/**
 * A report could not be persisted (or read back from) the given path.
 */
export class OutputWriteError extends ScanError {
  readonly type = 'output-write' as const
  readonly path: string

  constructor(path: string, message: string, code?: string) {
    super(message, code)
    this.path = path
  }
}

/**
 * A persisted report is not valid JSON or does not match the report shape.
 */
export class ReportFormatError extends ScanError {
  readonly type = 'report-format' as const
}

export function isScanError(error: unknown): error is ScanError {
  return error instanceof ScanError
}

/**
 * Extract the errno-style code (ENOENT, EACCES, ...) from an unknown error
 */
export function getErrorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code
  }
  return undefined
}

export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
