/**
 * Represents a value that can be either synchronous (`T`) or asynchronous (`Promise<T>`).
 * Used for listeners and server handlers that may or may not await anything.
 *
 * @template T The type of the value.
 */
export type MaybePromise<T> = T | Promise<T>;

/**
 * The sentinel a receiver observes once a half is closed and drained.
 *
 * @remarks
 * `EOF` is a value, not an error: it is the normal completion signal of a
 * stream. Callers that expect a terminal message (an upload waiting for its
 * result) decide for themselves whether `EOF` means an abrupt termination.
 */
export const EOF: unique symbol = Symbol('EOF');

/** The result of a receive: the next message, or {@link EOF}. */
export type Received<T> = T | typeof EOF;

/** Narrows a {@link Received} value to its message. */
export function isEOF<T>(value: Received<T>): value is typeof EOF {
  return value === EOF;
}
