import {
  backgroundScope,
  emptyMetadata,
  type CallScope,
  type ClientStream,
  type Metadata,
  type ServerStream,
} from '@objstream/transport';

/**
 * The fixed-behavior part of every in-memory client handle. In-memory calls
 * carry no metadata and run in a background scope.
 * @internal
 */
export abstract class MemoryClientStream implements ClientStream {
  /** Always resolves to empty metadata. */
  public header(): Promise<Metadata> {
    return Promise.resolve(emptyMetadata());
  }

  /** Always returns empty metadata. */
  public trailer(): Metadata {
    return emptyMetadata();
  }

  public context(): CallScope {
    return backgroundScope();
  }

  public abstract closeSend(): Promise<void>;
}

/**
 * The fixed-behavior part of every in-memory server handle. Metadata is
 * accepted and discarded.
 * @internal
 */
export abstract class MemoryServerStream implements ServerStream {
  public setHeader(): Promise<void> {
    return Promise.resolve();
  }

  public sendHeader(): Promise<void> {
    return Promise.resolve();
  }

  public setTrailer(): void {}

  public context(): CallScope {
    return backgroundScope();
  }
}
