import { v4 as uuid } from 'uuid';
import {
  EOF,
  InvalidArgumentError,
  StreamClosedError,
  errorMessage,
  payloadMessage,
  type DownloadClient,
  type DownloadServer,
  type MaybePromise,
  type Received,
  type StreamMessage,
} from '@objstream/transport';
import { MemoryClientStream, MemoryServerStream } from './adapters.js';
import { StreamGuard } from './guard.js';
import { HandoffChannel } from './handoff.js';

// #region Facades

/**
 * The consumer end of an in-memory download.
 * @internal
 */
class MemoryDownloadClient<Res>
  extends MemoryClientStream
  implements DownloadClient<Res>
{
  constructor(
    private readonly channel: HandoffChannel<StreamMessage<Res>>,
    private readonly guard: StreamGuard,
  ) {
    super();
  }

  public async recv(): Promise<Received<Res>> {
    const msg = await this.channel.receive();
    if (msg === EOF) return EOF;
    if (msg.kind === 'error') {
      this.guard.close();
      throw msg.error;
    }
    return msg.payload;
  }

  public recvMsg(): Promise<Received<Res>> {
    return this.recv();
  }

  /** The request travels with the call; resolves immediately. */
  public sendMsg(): Promise<void> {
    return Promise.resolve();
  }

  /** Abandons the download; the producer's pending and future sends fail. */
  public async closeSend(): Promise<void> {
    if (this.guard.isClosed) throw new StreamClosedError();
    this.guard.close();
  }
}

/**
 * The producer end of an in-memory download.
 * @internal
 */
class MemoryDownloadServer<Res>
  extends MemoryServerStream
  implements DownloadServer<Res>
{
  constructor(
    private readonly channel: HandoffChannel<StreamMessage<Res>>,
    private readonly guard: StreamGuard,
  ) {
    super();
  }

  public async send(res: Res): Promise<void> {
    if (res === null || res === undefined) {
      throw new InvalidArgumentError('parameter "res" cannot be null or undefined');
    }
    if (this.guard.isClosed) throw new StreamClosedError();
    await this.channel.send(payloadMessage(res));
  }

  public async sendError(err: Error): Promise<void> {
    if (!(err instanceof Error)) {
      throw new InvalidArgumentError('parameter "err" must be an Error');
    }
    if (this.guard.isClosed) throw new StreamClosedError();
    try {
      await this.channel.send(errorMessage<Res>(err));
    } finally {
      // The error terminates the stream even if the client closed first.
      this.guard.close();
    }
  }

  public sendMsg(msg: StreamMessage<Res>): Promise<void> {
    if (msg === null || msg === undefined) {
      return Promise.reject(new InvalidArgumentError('invalid argument: no message'));
    }
    switch (msg.kind) {
      case 'payload':
        return this.send(msg.payload);
      case 'error':
        return this.sendError(msg.error);
      default:
        return Promise.reject(
          new InvalidArgumentError(`invalid argument: ${String(msg)}`),
        );
    }
  }

  public recvMsg(): Promise<void> {
    return Promise.resolve();
  }

  public async close(): Promise<void> {
    this.guard.close();
  }
}

// #endregion

/**
 * An in-memory download: one channel of responses flowing from server to
 * client, closed at most once by either end.
 *
 * The `client` and `server` handles share the channel and its guard; hand
 * each one to the party playing that role.
 *
 * @example
 * ```ts
 * const stream = createDownloadStream<Chunk>();
 * void (async () => {
 *   for (const chunk of chunks) await stream.server.send(chunk);
 *   await stream.server.close();
 * })();
 * for (let c = await stream.client.recv(); c !== EOF; c = await stream.client.recv()) {
 *   consume(c);
 * }
 * ```
 */
export class MemoryDownloadStream<Res> {
  public readonly id: string = uuid();
  public readonly client: DownloadClient<Res>;
  public readonly server: DownloadServer<Res>;

  private readonly channel = new HandoffChannel<StreamMessage<Res>>();
  private readonly guard: StreamGuard;

  constructor() {
    const label = `DownloadStream ${this.id}`;
    this.guard = new StreamGuard(() => {
      const dropped = this.channel.close();
      if (dropped > 0) {
        console.debug(`[${label}] Closed with ${dropped} undelivered message(s).`);
      }
    }, label);
    this.client = new MemoryDownloadClient(this.channel, this.guard);
    this.server = new MemoryDownloadServer(this.channel, this.guard);
  }

  public get isClosed(): boolean {
    return this.guard.isClosed;
  }

  /** Closes the stream from outside either role. Idempotent. */
  public close(): void {
    this.guard.close();
  }

  /** Registers a handler that runs once the stream is closed. */
  public onClose(handler: () => MaybePromise<void>): void {
    this.guard.onClose(handler);
  }
}

export function createDownloadStream<Res>(): MemoryDownloadStream<Res> {
  return new MemoryDownloadStream<Res>();
}
