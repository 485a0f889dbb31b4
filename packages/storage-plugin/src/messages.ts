/** Asks the plugin to stream the object stored under `bucket`/`key`. */
export interface GetObjectRequest {
  bucket: string;
  key: string;
}

/** One chunk of the requested object, in order. */
export interface GetObjectResponse {
  fileChunk: Uint8Array;
}

/**
 * One chunk of an object being uploaded. Every chunk of an upload names the
 * same `bucket` and `key`.
 */
export interface PutObjectRequest {
  bucket: string;
  key: string;
  fileChunk: Uint8Array;
}

/** Acknowledges a stored object with the SHA-256 of its full contents. */
export interface PutObjectResponse {
  checksumSha256: Uint8Array;
}
