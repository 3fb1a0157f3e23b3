/**
 * Error codes for manifest operations
 */
export const ManifestErrorCode = {
  NOT_FOUND: 'NOT_FOUND',
  SCAN_FAILED: 'SCAN_FAILED',
  IO_FAILED: 'IO_FAILED',
  INVALID_CONFIG: 'INVALID_CONFIG',
} as const

export type ManifestErrorCode = (typeof ManifestErrorCode)[keyof typeof ManifestErrorCode]

/**
 * Error raised by scanning, building and writing. Every one is terminal for the
 * current invocation.
 */
export class ManifestError extends Error {
  constructor(
    public code: ManifestErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options)
    this.name = 'ManifestError'
  }
}

export function isManifestError(error: unknown, code?: ManifestErrorCode): error is ManifestError {
  return error instanceof ManifestError && (code === undefined || error.code === code)
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause)
}

/**
 * Create a not found error for a missing directory, or a path that is not a directory
 */
export function notFoundError(path: string, cause?: unknown): ManifestError {
  return new ManifestError(ManifestErrorCode.NOT_FOUND, `Directory not found: ${path}`, { cause })
}

/**
 * Create a scan error for a failed directory enumeration
 */
export function scanError(path: string, cause: unknown): ManifestError {
  return new ManifestError(
    ManifestErrorCode.SCAN_FAILED,
    `Failed to scan ${path}: ${describeCause(cause)}`,
    { cause },
  )
}

/**
 * Create an I/O error for an output that could not be written
 */
export function ioError(path: string, cause: unknown): ManifestError {
  return new ManifestError(
    ManifestErrorCode.IO_FAILED,
    `Failed to write ${path}: ${describeCause(cause)}`,
    { cause },
  )
}

/**
 * Create an invalid configuration error
 */
export function invalidConfigError(reason: string): ManifestError {
  return new ManifestError(ManifestErrorCode.INVALID_CONFIG, `Invalid configuration: ${reason}`)
}
