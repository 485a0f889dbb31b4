/**
 * Thrown when a required argument is absent or a raw message is neither a
 * payload nor an error. Nothing about the stream changes when this is thrown.
 */
export class InvalidArgumentError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message);
    this.name = 'InvalidArgumentError';
    this.cause = cause;
  }
}

/**
 * Thrown when an operation targets a half that is already closed, and used
 * to reject a sender that was still blocked when its half closed.
 */
export class StreamClosedError extends Error {
  constructor(message: string = 'stream is closed') {
    super(message);
    this.name = 'StreamClosedError';
  }
}

/**
 * Thrown by callers layered above the streams when a half ended with
 * {@link EOF} where exactly one terminal message was expected.
 */
export class UnexpectedEndOfStreamError extends Error {
  constructor(message: string = 'stream ended without a terminal message') {
    super(message);
    this.name = 'UnexpectedEndOfStreamError';
  }
}

export function isStreamClosedError(err: unknown): err is StreamClosedError {
  return err instanceof StreamClosedError;
}

export function isInvalidArgumentError(
  err: unknown,
): err is InvalidArgumentError {
  return err instanceof InvalidArgumentError;
}
