import {
  EOF,
  UnexpectedEndOfStreamError,
  errorMessage,
  isStreamClosedError,
} from '@objstream/transport';
import { toError } from './errors.js';
import type { PutObjectResponse } from './messages.js';
import type { GetObjectClient, PutObjectClient } from './service.js';

/**
 * Drains a download into a single buffer.
 * @throws The carried error if the plugin failed the download.
 */
export async function readObject(client: GetObjectClient): Promise<Uint8Array> {
  const chunks: Uint8Array[] = [];
  while (true) {
    const res = await client.recv();
    if (res === EOF) break;
    chunks.push(res.fileChunk);
  }
  return new Uint8Array(Buffer.concat(chunks));
}

/**
 * Uploads `chunks` as the object `bucket`/`key` and returns the plugin's
 * acknowledgement.
 *
 * If reading `chunks` fails, the upload is aborted with that error and the
 * error is rethrown.
 *
 * @throws The carried error if the plugin rejected the object.
 * @throws UnexpectedEndOfStreamError if the plugin ended the call without
 * a response.
 */
export async function writeObject(
  client: PutObjectClient,
  bucket: string,
  key: string,
  chunks: Iterable<Uint8Array> | AsyncIterable<Uint8Array>,
): Promise<PutObjectResponse> {
  try {
    for await (const fileChunk of chunks) {
      try {
        await client.send({ bucket, key, fileChunk });
      } catch (err) {
        // The plugin stopped reading; its response says why.
        if (isStreamClosedError(err)) break;
        throw err;
      }
    }
  } catch (err) {
    const error = toError(err);
    try {
      await client.sendMsg(errorMessage(error));
    } catch (abortErr) {
      if (!isStreamClosedError(abortErr)) {
        console.debug(`[writeObject] Could not abort upload of ${bucket}/${key}:`, abortErr);
      } else {
        // The plugin already ended the upload; take its response so the call can finish.
        await client.closeAndRecv().catch((pluginErr) => {
          console.debug(`[writeObject] Plugin ended upload of ${bucket}/${key} first:`, pluginErr);
        });
      }
    }
    throw error;
  }

  const res = await client.closeAndRecv();
  if (res === EOF) {
    throw new UnexpectedEndOfStreamError(
      `upload of ${bucket}/${key} ended without a response`,
    );
  }
  return res;
}
