import { isStreamClosedError } from '@objstream/transport';
import { createDownloadStream, createUploadStream } from '@objstream/transport-mem';
import { toError } from './errors.js';
import type {
  GetObjectRequest,
  GetObjectResponse,
  PutObjectRequest,
  PutObjectResponse,
} from './messages.js';
import type {
  GetObjectClient,
  PutObjectClient,
  StoragePluginClient,
  StoragePluginServer,
} from './service.js';

/**
 * Connects a host to a storage plugin running in the same process. Every call
 * gets a fresh in-memory stream and runs the plugin's handler concurrently
 * with the caller.
 */
export class InMemoryStoragePluginClient implements StoragePluginClient {
  private readonly active = new Set<string>();

  constructor(private readonly plugin: StoragePluginServer) {}

  /** The number of calls whose streams are not yet fully closed. */
  public get activeStreams(): number {
    return this.active.size;
  }

  public getObject(req: GetObjectRequest): GetObjectClient {
    const stream = createDownloadStream<GetObjectResponse>();
    this.track(stream.id, (handler) => stream.onClose(handler));

    this.dispatch(
      `getObject ${stream.id}`,
      () => this.plugin.getObject(req, stream.server),
      async (err) => {
        if (!stream.isClosed) await stream.server.sendError(err);
      },
      () => stream.close(),
    );
    return stream.client;
  }

  public putObject(): PutObjectClient {
    const stream = createUploadStream<PutObjectRequest, PutObjectResponse>();
    this.track(stream.id, (handler) => stream.onClose(handler));

    this.dispatch(
      `putObject ${stream.id}`,
      () => this.plugin.putObject(stream.server),
      async (err) => {
        // Unblock a client still sending so it can read the error.
        stream.closeRequests();
        if (!stream.isResponsesClosed) await stream.server.sendError(err);
      },
      () => {
        stream.closeRequests();
        stream.closeResponses();
      },
    );
    return stream.client;
  }

  private track(id: string, onClose: (handler: () => void) => void): void {
    this.active.add(id);
    onClose(() => {
      this.active.delete(id);
    });
  }

  /**
   * Runs a handler; a failure is delivered to the caller as a carried error
   * and whatever the handler left open is closed afterwards.
   */
  private dispatch(
    label: string,
    handler: () => Promise<void>,
    deliverError: (err: Error) => Promise<void>,
    finish: () => void,
  ): void {
    const run = async () => {
      try {
        await handler();
      } catch (err) {
        if (isStreamClosedError(err)) {
          console.debug(`[InMemoryStoragePlugin] Caller abandoned ${label}.`);
          return;
        }
        console.error(`[InMemoryStoragePlugin] Handler for ${label} failed:`, err);
        await deliverError(toError(err));
      } finally {
        finish();
      }
    };

    run().catch((err) => {
      if (isStreamClosedError(err)) {
        console.debug(`[InMemoryStoragePlugin] Caller closed ${label} before the error was delivered.`);
        return;
      }
      console.error(`[InMemoryStoragePlugin] Failed to deliver error for ${label}:`, err);
    });
  }
}

/** Returns a client whose calls are served by `plugin` in this process. */
export function connectInMemory(
  plugin: StoragePluginServer,
): InMemoryStoragePluginClient {
  return new InMemoryStoragePluginClient(plugin);
}
