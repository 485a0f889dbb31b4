export type {
  GetObjectRequest,
  GetObjectResponse,
  PutObjectRequest,
  PutObjectResponse,
} from './messages.js';

export type {
  GetObjectClient,
  GetObjectServer,
  PutObjectClient,
  PutObjectServer,
  StoragePluginClient,
  StoragePluginServer,
} from './service.js';

export { BucketNotFoundError, ObjectNotFoundError, toError } from './errors.js';
export { connectInMemory, InMemoryStoragePluginClient } from './connect.js';
export { readObject, writeObject } from './objects.js';

export {
  DEFAULT_LOOPBACK_CONFIG,
  loadLoopbackConfig,
  loopbackConfigSchema,
  resolveLoopbackConfig,
  type LoopbackConfig,
} from './loopback/config.js';
export { LoopbackStoragePlugin } from './loopback/plugin.js';
