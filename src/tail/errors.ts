/**
 * Tail Errors
 *
 * Error types raised while acquiring or reading a tailed file.
 */

/**
 * Why a file could not be opened for tailing
 */
export enum AcquisitionErrorKind {
  /** EACCES / EPERM */
  PERMISSION_DENIED = 'PERMISSION_DENIED',
  /** Path names a directory (or EISDIR) */
  IS_A_DIRECTORY = 'IS_A_DIRECTORY',
  /** ENOENT */
  NOT_FOUND = 'NOT_FOUND',
  /** Anything else */
  OTHER = 'OTHER',
}

/**
 * A discovered path could not be opened. Fatal to its session only.
 */
export class AcquisitionError extends Error {
  constructor(
    public readonly path: string,
    public readonly kind: AcquisitionErrorKind,
    cause?: unknown,
  ) {
    super(`${kind} while trying to tail ${path}${describeCause(cause)}`, { cause });
    this.name = 'AcquisitionError';
  }
}

/**
 * A file produced more bytes without a line feed than the assembler may buffer.
 * The buffered fragment was discarded.
 */
export class LineOverflowError extends Error {
  readonly code = 'LINE_OVERFLOW';

  constructor(
    public readonly discardedBytes: number,
    public readonly maxBufferedBytes: number,
  ) {
    super(
      `Line exceeds ${maxBufferedBytes} bytes without a line feed; discarded ${discardedBytes} buffered bytes`,
    );
    this.name = 'LineOverflowError';
  }
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    return `: ${cause.message}`;
  }
  return '';
}

/**
 * Node errno errors carry a string `code`
 */
export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error && typeof error.code === 'string';
}

/**
 * Map a failure from fs.open/fs.stat onto an AcquisitionError
 */
export function toAcquisitionError(path: string, error: unknown): AcquisitionError {
  if (error instanceof AcquisitionError) {
    return error;
  }

  const code = isErrnoException(error) ? error.code : undefined;
  switch (code) {
    case 'EACCES':
    case 'EPERM':
      return new AcquisitionError(path, AcquisitionErrorKind.PERMISSION_DENIED, error);
    case 'EISDIR':
      return new AcquisitionError(path, AcquisitionErrorKind.IS_A_DIRECTORY, error);
    case 'ENOENT':
      return new AcquisitionError(path, AcquisitionErrorKind.NOT_FOUND, error);
    default:
      return new AcquisitionError(path, AcquisitionErrorKind.OTHER, error);
  }
}

/**
 * Normalize a thrown value into an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
