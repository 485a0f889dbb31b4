import { createHash } from 'node:crypto';
import { EOF, InvalidArgumentError, type Received } from '@objstream/transport';
import { BucketNotFoundError, ObjectNotFoundError } from '../errors.js';
import type { GetObjectRequest, PutObjectRequest } from '../messages.js';
import type {
  GetObjectServer,
  PutObjectServer,
  StoragePluginServer,
} from '../service.js';
import { resolveLoopbackConfig, type LoopbackConfig } from './config.js';

/**
 * A storage plugin that keeps objects in memory. It behaves like a real
 * backend from the host's side of the streams, which makes it the reference
 * counterpart for host code under test.
 */
export class LoopbackStoragePlugin implements StoragePluginServer {
  private readonly buckets = new Map<string, Map<string, Uint8Array>>();
  private readonly config: LoopbackConfig;

  /**
   * @param config A partial configuration, merged over the defaults.
   * @throws InvalidArgumentError if the configuration is invalid.
   */
  constructor(config: Partial<LoopbackConfig> = {}) {
    this.config = resolveLoopbackConfig(config);
    for (const bucket of this.config.buckets) {
      this.buckets.set(bucket, new Map());
    }
  }

  public hasObject(bucket: string, key: string): boolean {
    return this.buckets.get(bucket)?.has(key) ?? false;
  }

  /** Returns the keys stored in `bucket`, in insertion order. */
  public objectKeys(bucket: string): string[] {
    return [...(this.buckets.get(bucket)?.keys() ?? [])];
  }

  public async getObject(req: GetObjectRequest, stream: GetObjectServer): Promise<void> {
    const objects = this.buckets.get(req.bucket);
    if (!objects) {
      await stream.sendError(new BucketNotFoundError(req.bucket));
      return;
    }
    const data = objects.get(req.key);
    if (!data) {
      await stream.sendError(new ObjectNotFoundError(req.bucket, req.key));
      return;
    }

    const { chunkSize } = this.config;
    for (let offset = 0; offset < data.length; offset += chunkSize) {
      await stream.send({ fileChunk: data.slice(offset, offset + chunkSize) });
    }
    await stream.close();
  }

  public async putObject(stream: PutObjectServer): Promise<void> {
    let target: { bucket: string; key: string } | undefined;
    let failure: Error | undefined;
    const chunks: Uint8Array[] = [];

    // Keep draining after a bad chunk: the client only reads the response
    // once it has sent everything.
    while (true) {
      let req: Received<PutObjectRequest>;
      try {
        req = await stream.recv();
      } catch (err) {
        console.debug('[LoopbackStorage] Upload aborted by the client:', err);
        return;
      }
      if (req === EOF) break;
      if (failure) continue;

      if (!target) {
        target = { bucket: req.bucket, key: req.key };
      } else if (req.bucket !== target.bucket || req.key !== target.key) {
        failure = new InvalidArgumentError(
          `chunk for ${req.bucket}/${req.key} in upload of ${target.bucket}/${target.key}`,
        );
        continue;
      }
      chunks.push(req.fileChunk);
    }

    if (failure) {
      await stream.sendError(failure);
      return;
    }
    if (!target) {
      await stream.sendError(new InvalidArgumentError('upload contained no chunks'));
      return;
    }

    let objects = this.buckets.get(target.bucket);
    if (!objects) {
      if (!this.config.autoCreateBuckets) {
        await stream.sendError(new BucketNotFoundError(target.bucket));
        return;
      }
      objects = new Map();
      this.buckets.set(target.bucket, objects);
    }

    const data = new Uint8Array(Buffer.concat(chunks));
    objects.set(target.key, data);
    const checksumSha256 = new Uint8Array(createHash('sha256').update(data).digest());
    await stream.sendAndClose({ checksumSha256 });
  }
}
