/**
 * A message routed through the raw `sendMsg` entry point of a stream: either
 * a payload or a terminal error, never both.
 *
 * @remarks
 * Delivering an `error` message always closes the half that carried it.
 */
export type StreamMessage<T> =
  | { readonly kind: 'payload'; readonly payload: T }
  | { readonly kind: 'error'; readonly error: Error };

export function payloadMessage<T>(payload: T): StreamMessage<T> {
  return { kind: 'payload', payload };
}

export function errorMessage<T = never>(error: Error): StreamMessage<T> {
  return { kind: 'error', error };
}
