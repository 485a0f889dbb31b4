import { EventEmitter, type DefaultEventMap } from 'tseep';

/**
 * A `tseep` event emitter whose emissions can be awaited. Stream lifecycle
 * notifications go through it so that a slow or failing listener surfaces
 * as a rejected promise instead of an unhandled exception.
 *
 * @template EventMap - A map of event names to their listener signatures.
 */
export class AsyncEventEmitter<
  EventMap extends DefaultEventMap = DefaultEventMap,
> extends EventEmitter<EventMap> {
  /**
   * Emits an event and waits for all listeners to complete concurrently.
   *
   * @example
   * ```ts
   * guard.events.on('close', async () => await releaseBuffers());
   * await guard.events.emitAsync('close');
   * ```
   *
   * @returns A promise that resolves when every listener has settled, or
   * rejects with the first listener failure.
   */
  async emitAsync<E extends keyof EventMap>(
    event: E,
    ...args: Parameters<EventMap[E]>
  ): Promise<void> {
    // Copied: `once` listeners unregister themselves while being called.
    const listeners = [...this.listeners(event)];
    // Promise.resolve() lets sync and async listeners be awaited alike.
    await Promise.all(listeners.map((fn) => Promise.resolve(fn(...args))));
  }
}
