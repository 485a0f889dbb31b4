import { v4 as uuid } from 'uuid';
import {
  EOF,
  InvalidArgumentError,
  StreamClosedError,
  errorMessage,
  payloadMessage,
  type MaybePromise,
  type Received,
  type StreamMessage,
  type UploadClient,
  type UploadServer,
} from '@objstream/transport';
import { MemoryClientStream, MemoryServerStream } from './adapters.js';
import { StreamGuard } from './guard.js';
import { HandoffChannel } from './handoff.js';

/** One half of an upload: its channel and the guard that closes it. @internal */
type Half<T> = {
  channel: HandoffChannel<StreamMessage<T>>;
  guard: StreamGuard;
};

/**
 * Pulls one message off a half, unwrapping payloads. A carried error closes
 * the half before it is thrown.
 */
async function receiveFrom<T>(half: Half<T>): Promise<Received<T>> {
  const msg = await half.channel.receive();
  if (msg === EOF) return EOF;
  if (msg.kind === 'error') {
    half.guard.close();
    throw msg.error;
  }
  return msg.payload;
}

/** Hands a terminal message to the other end, then closes the half regardless. */
async function sendTerminal<T>(half: Half<T>, msg: StreamMessage<T>): Promise<void> {
  try {
    await half.channel.send(msg);
  } finally {
    half.guard.close();
  }
}

// #region Facades

/**
 * The uploading end: sends requests and awaits the single response.
 * @internal
 */
class MemoryUploadClient<Req, Res>
  extends MemoryClientStream
  implements UploadClient<Req, Res>
{
  constructor(
    private readonly requests: Half<Req>,
    private readonly responses: Half<Res>,
  ) {
    super();
  }

  public async send(req: Req): Promise<void> {
    if (req === null || req === undefined) {
      throw new InvalidArgumentError('parameter "req" cannot be null or undefined');
    }
    if (this.requests.guard.isClosed) throw new StreamClosedError();
    await this.requests.channel.send(payloadMessage(req));
  }

  public async sendMsg(msg: StreamMessage<Req>): Promise<void> {
    if (msg === null || msg === undefined) {
      throw new InvalidArgumentError('invalid argument: no message');
    }
    switch (msg.kind) {
      case 'payload':
        return this.send(msg.payload);
      case 'error':
        if (!(msg.error instanceof Error)) {
          throw new InvalidArgumentError('invalid argument: error message without an Error');
        }
        if (this.requests.guard.isClosed) throw new StreamClosedError();
        return sendTerminal(this.requests, msg);
      default:
        throw new InvalidArgumentError(`invalid argument: ${String(msg)}`);
    }
  }

  public async closeSend(): Promise<void> {
    if (this.requests.guard.isClosed) throw new StreamClosedError();
    this.requests.guard.close();
  }

  public closeAndRecv(): Promise<Received<Res>> {
    this.requests.guard.close();
    return receiveFrom(this.responses);
  }

  /** The response is read by `closeAndRecv`; resolves immediately. */
  public recvMsg(): Promise<void> {
    return Promise.resolve();
  }
}

/**
 * The receiving end: drains requests and completes the call.
 * @internal
 */
class MemoryUploadServer<Req, Res>
  extends MemoryServerStream
  implements UploadServer<Req, Res>
{
  constructor(
    private readonly requests: Half<Req>,
    private readonly responses: Half<Res>,
  ) {
    super();
  }

  public recv(): Promise<Received<Req>> {
    return receiveFrom(this.requests);
  }

  public recvMsg(): Promise<Received<Req>> {
    return this.recv();
  }

  public async sendAndClose(res: Res): Promise<void> {
    if (res === null || res === undefined) {
      throw new InvalidArgumentError('parameter "res" cannot be null or undefined');
    }
    if (this.responses.guard.isClosed) throw new StreamClosedError();
    await sendTerminal(this.responses, payloadMessage(res));
  }

  public async sendError(err: Error): Promise<void> {
    if (!(err instanceof Error)) {
      throw new InvalidArgumentError('parameter "err" must be an Error');
    }
    if (this.responses.guard.isClosed) throw new StreamClosedError();
    await sendTerminal(this.responses, errorMessage<Res>(err));
  }

  public sendMsg(msg: StreamMessage<Res>): Promise<void> {
    if (msg === null || msg === undefined) {
      return Promise.reject(new InvalidArgumentError('invalid argument: no message'));
    }
    switch (msg.kind) {
      case 'payload':
        return this.sendAndClose(msg.payload);
      case 'error':
        return this.sendError(msg.error);
      default:
        return Promise.reject(
          new InvalidArgumentError(`invalid argument: ${String(msg)}`),
        );
    }
  }
}

// #endregion

/**
 * An in-memory upload: a request half flowing client to server and a
 * response half carrying one terminal message back. Each half has its own
 * guard, so either can be closed without touching the other.
 */
export class MemoryUploadStream<Req, Res> {
  public readonly id: string = uuid();
  public readonly client: UploadClient<Req, Res>;
  public readonly server: UploadServer<Req, Res>;

  private readonly requests: Half<Req>;
  private readonly responses: Half<Res>;

  constructor() {
    this.requests = this.createHalf<Req>('requests');
    this.responses = this.createHalf<Res>('responses');
    this.client = new MemoryUploadClient(this.requests, this.responses);
    this.server = new MemoryUploadServer(this.requests, this.responses);
  }

  private createHalf<T>(name: string): Half<T> {
    const label = `UploadStream ${this.id} ${name}`;
    const channel = new HandoffChannel<StreamMessage<T>>();
    const guard = new StreamGuard(() => {
      const dropped = channel.close();
      if (dropped > 0) {
        console.debug(`[${label}] Closed with ${dropped} undelivered message(s).`);
      }
    }, label);
    return { channel, guard };
  }

  public get isRequestsClosed(): boolean {
    return this.requests.guard.isClosed;
  }

  public get isResponsesClosed(): boolean {
    return this.responses.guard.isClosed;
  }

  /** Closes the request half from outside either role. Idempotent. */
  public closeRequests(): void {
    this.requests.guard.close();
  }

  /** Closes the response half from outside either role. Idempotent. */
  public closeResponses(): void {
    this.responses.guard.close();
  }

  /** Registers a handler that runs once both halves are closed. */
  public onClose(handler: () => MaybePromise<void>): void {
    let open = 2;
    const onHalfClosed = () => (--open === 0 ? handler() : undefined);
    this.requests.guard.onClose(onHalfClosed);
    this.responses.guard.onClose(onHalfClosed);
  }
}

export function createUploadStream<Req, Res>(): MemoryUploadStream<Req, Res> {
  return new MemoryUploadStream<Req, Res>();
}
