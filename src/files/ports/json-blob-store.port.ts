import type { Result } from 'neverthrow';
import type { BlobCodec } from '../durable-core/marshal/index.js';

export type BlobStoreError =
  | { readonly code: 'BLOB_DESERIALIZATION_ERROR'; readonly name: string; readonly message: string }
  | { readonly code: 'BLOB_ENCODE_ERROR'; readonly name: string; readonly message: string }
  | { readonly code: 'BLOB_IO_READ_ERROR'; readonly name: string; readonly message: string }
  | { readonly code: 'BLOB_IO_WRITE_ERROR'; readonly name: string; readonly message: string };

/**
 * Port: Flat JSON blobs under the durable root.
 *
 * Guarantees:
 * - read() returns Ok(null) when the blob does not exist
 * - write() replaces the whole file (tmp -> rename); there is no merge, and a
 *   failed rename removes the tmp file and leaves the previous value in place
 * - write() of null/undefined is a no-op
 * - the empty name never exists: read() gives Ok(null), write() is a no-op
 * - remove() of a missing blob is a no-op
 */
export interface JsonBlobStorePort {
  exists(name: string): boolean;
  read<T>(name: string, codec: BlobCodec<T>): Result<T | null, BlobStoreError>;
  write<T>(name: string, codec: BlobCodec<T>, value: T | null | undefined): Result<void, BlobStoreError>;
  remove(name: string): Result<void, BlobStoreError>;
}
