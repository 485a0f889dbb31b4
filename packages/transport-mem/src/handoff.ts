import { EOF, StreamClosedError, type Received } from '@objstream/transport';

/** A sender parked until a receiver takes its item. @internal */
type PendingSend<T> = {
  item: T;
  resolve: () => void;
  reject: (err: Error) => void;
};

/**
 * An unbuffered, FIFO channel between one producer and one consumer.
 *
 * A `send` completes only once a `receive` has taken the item, so a producer
 * can never run ahead of its consumer; this is how the in-memory streams
 * apply back-pressure. Closing the channel wakes every parked receiver with
 * {@link EOF} and rejects every parked sender.
 *
 * @remarks
 * Closing is not idempotent: a second `close` throws, as closing a closed
 * conduit is a programming error. Streams route every close through a
 * {@link StreamGuard} so that this can never be observed.
 */
export class HandoffChannel<T> {
  private readonly senders: PendingSend<T>[] = [];
  private readonly receivers: Array<(value: Received<T>) => void> = [];
  private _closed = false;

  public get closed(): boolean {
    return this._closed;
  }

  /**
   * Offers `item` to the consumer and waits until it has been taken.
   * @returns A promise that rejects with `StreamClosedError` if the channel
   * is closed before the item is taken.
   */
  public send(item: T): Promise<void> {
    if (this._closed) {
      return Promise.reject(new StreamClosedError());
    }

    // A consumer is already waiting: hand the item over directly.
    const receiver = this.receivers.shift();
    if (receiver) {
      receiver(item);
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      this.senders.push({ item, resolve, reject });
    });
  }

  /**
   * Takes the next item, waiting for a producer if none is parked.
   * @returns The item, or `EOF` once the channel is closed.
   */
  public receive(): Promise<Received<T>> {
    const sender = this.senders.shift();
    if (sender) {
      sender.resolve();
      return Promise.resolve(sender.item);
    }
    if (this._closed) {
      return Promise.resolve(EOF);
    }
    return new Promise<Received<T>>((resolve) => {
      this.receivers.push(resolve);
    });
  }

  /**
   * Closes the channel.
   * @returns The number of parked senders whose items were dropped.
   * @throws StreamClosedError if the channel was already closed.
   */
  public close(): number {
    if (this._closed) {
      throw new StreamClosedError('close of closed channel');
    }
    this._closed = true;

    for (const receiver of this.receivers.splice(0)) {
      receiver(EOF);
    }

    const dropped = this.senders.splice(0);
    const error = new StreamClosedError();
    for (const sender of dropped) {
      sender.reject(error);
    }
    return dropped.length;
  }
}
