import type {
  DownloadClient,
  DownloadServer,
  UploadClient,
  UploadServer,
} from '@objstream/transport';
import type {
  GetObjectRequest,
  GetObjectResponse,
  PutObjectRequest,
  PutObjectResponse,
} from './messages.js';

export type GetObjectClient = DownloadClient<GetObjectResponse>;
export type GetObjectServer = DownloadServer<GetObjectResponse>;
export type PutObjectClient = UploadClient<PutObjectRequest, PutObjectResponse>;
export type PutObjectServer = UploadServer<PutObjectRequest, PutObjectResponse>;

/**
 * The object-transfer methods a storage plugin implements.
 *
 * @remarks
 * A handler owns its stream for the duration of the call. It should end a
 * download with `close()` or `sendError()`, and an upload with
 * `sendAndClose()` or `sendError()`; whatever it leaves open is closed by the
 * transport once the returned promise settles.
 */
export interface StoragePluginServer {
  /** Streams the requested object to the host, chunk by chunk. */
  getObject(req: GetObjectRequest, stream: GetObjectServer): Promise<void>;

  /** Receives an object from the host and acknowledges it once stored. */
  putObject(stream: PutObjectServer): Promise<void>;
}

/** The host's view of a storage plugin. */
export interface StoragePluginClient {
  getObject(req: GetObjectRequest): GetObjectClient;
  putObject(): PutObjectClient;
}
