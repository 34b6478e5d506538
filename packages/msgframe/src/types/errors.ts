/**
 * Error codes for msgframe.
 * Transport failures are always fatal to the connection; length violations
 * are fatal only on the read path.
 */

export enum ErrorCode {
  /** A non-Error value was thrown */
  ERR_UNKNOWN = 1,

  /** Underlying read/write primitive failed */
  ERR_TRANSPORT = 2,

  /** Connection closed before the requested bytes arrived */
  ERR_CONNECTION_CLOSED = 3,

  /** Transport-level timeout */
  ERR_TIMEOUT = 4,

  /** Body length above the configured maximum */
  ERR_MESSAGE_TOO_LONG = 5,

  /** Body length below the configured minimum */
  ERR_MESSAGE_TOO_SHORT = 6,

  /** Frame too short to hold the length prefix */
  ERR_INVALID_FRAME = 7,

  /** Message envelope or payload could not be decoded */
  ERR_INVALID_MESSAGE = 8,
}

/**
 * Get human-readable description for error code
 */
export function getErrorMessage(code: ErrorCode): string {
  const messages: Record<ErrorCode, string> = {
    [ErrorCode.ERR_UNKNOWN]: 'Unknown error',
    [ErrorCode.ERR_TRANSPORT]: 'Transport error',
    [ErrorCode.ERR_CONNECTION_CLOSED]: 'Connection closed',
    [ErrorCode.ERR_TIMEOUT]: 'Operation timed out',
    [ErrorCode.ERR_MESSAGE_TOO_LONG]: 'Message too long',
    [ErrorCode.ERR_MESSAGE_TOO_SHORT]: 'Message too short',
    [ErrorCode.ERR_INVALID_FRAME]: 'Invalid frame',
    [ErrorCode.ERR_INVALID_MESSAGE]: 'Invalid message format',
  };
  return messages[code] ?? 'Unknown error';
}

/**
 * Custom error class for msgframe errors
 */
export class FrameError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message?: string,
    options?: { cause?: unknown }
  ) {
    super(message ?? getErrorMessage(code), options);
    this.name = 'FrameError';
  }
}

/**
 * Wrap an arbitrary failure from a transport primitive.
 * FrameErrors raised by an adapter pass through unchanged.
 */
export function toTransportError(err: unknown, context: string): FrameError {
  if (err instanceof FrameError) {
    return err;
  }
  const detail = err instanceof Error ? err.message : String(err);
  return new FrameError(ErrorCode.ERR_TRANSPORT, `${context}: ${detail}`, { cause: err });
}

/**
 * True for the two bounds violations
 */
export function isLengthError(err: unknown): boolean {
  return (
    err instanceof FrameError &&
    (err.code === ErrorCode.ERR_MESSAGE_TOO_LONG || err.code === ErrorCode.ERR_MESSAGE_TOO_SHORT)
  );
}

/**
 * Whether the connection an error came from must be closed.
 *
 * On the read path every failure is fatal: once the prefix has been consumed
 * the stream has lost its byte boundary. On the write path only transport
 * failures are; a rejected length leaves nothing written.
 */
export function isConnectionFatal(err: unknown, direction: 'read' | 'write'): boolean {
  if (direction === 'read') {
    return true;
  }
  if (!(err instanceof FrameError)) {
    return true;
  }
  switch (err.code) {
    case ErrorCode.ERR_MESSAGE_TOO_LONG:
    case ErrorCode.ERR_MESSAGE_TOO_SHORT:
    case ErrorCode.ERR_INVALID_MESSAGE:
      return false;
    default:
      return true;
  }
}
