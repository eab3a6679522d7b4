/**
 * Error taxonomy
 *
 * Failures inside batch operations are reported as strings on result
 * records; the kinds below name them so callers can tell them apart.
 */

export type ErrorKind =
  | 'NotFound'
  | 'PermissionDenied'
  | 'UnsafePath'
  | 'CommandFailure'
  | 'SafetyLimitExceeded'
  | 'ConfigCorrupt';

/**
 * Error carrying a taxonomy kind. Thrown only across internal seams and
 * always converted to a result's `error` field before it leaves the core.
 */
export class DiskwardError extends Error {
  readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string) {
    super(message);
    this.name = 'DiskwardError';
    this.kind = kind;
  }
}

/**
 * Narrow an unknown value to a Node.js errno exception.
 */
export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error && typeof error.code === 'string';
}

/**
 * Classify an unknown error into a taxonomy kind, when one applies.
 */
export function classifyError(error: unknown): ErrorKind | undefined {
  if (error instanceof DiskwardError) return error.kind;
  if (!isErrnoException(error)) return undefined;

  switch (error.code) {
    case 'ENOENT':
    case 'ENOTDIR':
      return 'NotFound';
    case 'EACCES':
    case 'EPERM':
      return 'PermissionDenied';
    default:
      return undefined;
  }
}

/**
 * Extract a message from anything that was thrown.
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/**
 * Describe a deletion failure in the form shown to users.
 *
 * @param error - Error raised by fs.rm / fs.unlink
 * @returns "Permission denied: ..." or "OS error: ..."
 */
export function describeDeletionError(error: unknown): string {
  const message = errorMessage(error);

  if (classifyError(error) === 'PermissionDenied') {
    return `Permission denied: ${message}`;
  }

  if (isErrnoException(error)) {
    if (error.code === 'EBUSY') {
      return `OS error: directory in use (${message})`;
    }
    if (error.code === 'ENOTEMPTY') {
      return `OS error: directory not empty, may contain read-only files (${message})`;
    }
  }

  return `OS error: ${message}`;
}
