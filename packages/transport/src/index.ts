export { AsyncEventEmitter } from './events.js';
export type { DefaultEventMap } from 'tseep';

export {
  InvalidArgumentError,
  StreamClosedError,
  UnexpectedEndOfStreamError,
  isInvalidArgumentError,
  isStreamClosedError,
} from './errors.js';

export {
  errorMessage,
  payloadMessage,
  type StreamMessage,
} from './message.js';

export {
  backgroundScope,
  emptyMetadata,
  type CallScope,
  type ClientStream,
  type DownloadClient,
  type DownloadServer,
  type Metadata,
  type ServerStream,
  type UploadClient,
  type UploadServer,
} from './stream.js';

export {
  EOF,
  isEOF,
  type MaybePromise,
  type Received,
} from './types.js';
