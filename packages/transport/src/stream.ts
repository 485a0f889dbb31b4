import type { StreamMessage } from './message.js';
import type { Received } from './types.js';

/**
 * Request or response metadata, keyed by lower-case header name.
 *
 * @remarks
 * The in-memory streams never carry metadata; the accessors exist so that
 * code written against a networked transport runs unchanged against them.
 */
export type Metadata = Map<string, string[]>;

export function emptyMetadata(): Metadata {
  return new Map();
}

/**
 * The lifetime handle of a single call. A transport aborts `signal` when the
 * call is cancelled or its deadline passes.
 */
export interface CallScope {
  readonly signal: AbortSignal;
  readonly deadline: Date | undefined;
}

/**
 * A scope that is never cancelled and has no deadline. Every in-memory
 * stream reports this scope; callers that need timeouts layer them on top
 * and close the stream themselves.
 */
export function backgroundScope(): CallScope {
  return { signal: new AbortController().signal, deadline: undefined };
}

/**
 * The members every client-side stream handle exposes, regardless of the
 * method's cardinality.
 */
export interface ClientStream {
  /** Resolves to the response header metadata sent by the server. */
  header(): Promise<Metadata>;

  /** Returns the trailer metadata. Only meaningful after the stream ended. */
  trailer(): Metadata;

  /** Returns the scope of the call this stream belongs to. */
  context(): CallScope;

  /**
   * Half-closes the client's side of the stream.
   *
   * @returns A promise that rejects with `StreamClosedError` when that side
   * was already closed.
   */
  closeSend(): Promise<void>;
}

/**
 * The members every server-side stream handle exposes, regardless of the
 * method's cardinality.
 */
export interface ServerStream {
  /** Merges `md` into the header metadata to be sent with the first message. */
  setHeader(md: Metadata): Promise<void>;

  /** Sends the header metadata immediately. */
  sendHeader(md: Metadata): Promise<void>;

  /** Merges `md` into the trailer metadata sent when the call ends. */
  setTrailer(md: Metadata): void;

  /** Returns the scope of the call this stream belongs to. */
  context(): CallScope;
}

// #region Download (one request, many responses)

/**
 * The client's view of a download: it pulls response messages until
 * {@link EOF} or a carried error.
 */
export interface DownloadClient<Res> extends ClientStream {
  /**
   * Waits for the next response.
   *
   * @returns The next response, or `EOF` once the server finished and every
   * response was consumed.
   * @throws The error the server delivered with `sendError`.
   */
  recv(): Promise<Received<Res>>;

  /** Raw receive; behaves exactly like {@link DownloadClient.recv}. */
  recvMsg(): Promise<Received<Res>>;

  /** The client sends nothing after its request; resolves immediately. */
  sendMsg(): Promise<void>;
}

/**
 * The server's view of a download: it pushes responses, then either closes
 * the stream or ends it with a carried error.
 */
export interface DownloadServer<Res> extends ServerStream {
  /**
   * Hands `res` to the client. Resolves once the client has taken it; the
   * stream stays open.
   *
   * @throws InvalidArgumentError when `res` is null or undefined.
   * @throws StreamClosedError when the stream is, or becomes, closed.
   */
  send(res: Res): Promise<void>;

  /** Delivers `err` as the final message, then closes the stream. */
  sendError(err: Error): Promise<void>;

  /** Routes a payload to {@link DownloadServer.send} and an error to {@link DownloadServer.sendError}. */
  sendMsg(msg: StreamMessage<Res>): Promise<void>;

  /** The client sends nothing after its request; resolves immediately. */
  recvMsg(): Promise<void>;

  /** Ends the download normally. Idempotent. */
  close(): Promise<void>;
}

// #endregion

// #region Upload (many requests, one response)

/**
 * The client's view of an upload: it pushes request messages, then waits for
 * the single terminal response.
 */
export interface UploadClient<Req, Res> extends ClientStream {
  /**
   * Hands `req` to the server. Resolves once the server has taken it.
   *
   * @throws InvalidArgumentError when `req` is null or undefined.
   * @throws StreamClosedError when the request half is, or becomes, closed.
   */
  send(req: Req): Promise<void>;

  /**
   * Routes a payload to {@link UploadClient.send}. An error aborts the
   * upload: the server's next receive rejects with it and the request half
   * closes.
   */
  sendMsg(msg: StreamMessage<Req>): Promise<void>;

  /**
   * Closes the request half, if still open, and waits for the terminal
   * response.
   *
   * @returns The result, or `EOF` when the response half closed without one.
   * @throws The error the server delivered with `sendError`.
   */
  closeAndRecv(): Promise<Received<Res>>;

  /** The response arrives through {@link UploadClient.closeAndRecv}; resolves immediately. */
  recvMsg(): Promise<void>;
}

/**
 * The server's view of an upload: it drains the requests, then completes
 * the call with exactly one result or error.
 */
export interface UploadServer<Req, Res> extends ServerStream {
  /**
   * Waits for the next request.
   *
   * @returns The next request, or `EOF` once the client half-closed.
   * @throws The error the client aborted the upload with.
   */
  recv(): Promise<Received<Req>>;

  /** Raw receive; behaves exactly like {@link UploadServer.recv}. */
  recvMsg(): Promise<Received<Req>>;

  /** Delivers the result, then closes the response half. */
  sendAndClose(res: Res): Promise<void>;

  /** Delivers `err` as the terminal response, then closes the response half. */
  sendError(err: Error): Promise<void>;

  /** Routes a payload to {@link UploadServer.sendAndClose} and an error to {@link UploadServer.sendError}. */
  sendMsg(msg: StreamMessage<Res>): Promise<void>;
}

// #endregion
