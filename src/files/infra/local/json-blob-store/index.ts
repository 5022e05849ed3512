import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import type { BlobCodec } from '../../../durable-core/marshal/index.js';
import { marshal, unmarshal } from '../../../durable-core/marshal/index.js';
import type { FileSystemPort, FsError } from '../../../ports/fs.port.js';
import type { BlobStoreError, JsonBlobStorePort } from '../../../ports/json-blob-store.port.js';
import type { StorageRootPort } from '../../../ports/storage-root.port.js';

function readError(name: string, e: FsError): BlobStoreError {
  return { code: 'BLOB_IO_READ_ERROR', name, message: e.message };
}

function writeError(name: string, e: FsError): BlobStoreError {
  return { code: 'BLOB_IO_WRITE_ERROR', name, message: e.message };
}

export class LocalJsonBlobStore implements JsonBlobStorePort {
  constructor(
    private readonly root: StorageRootPort,
    private readonly fs: FileSystemPort
  ) {}

  exists(name: string): boolean {
    const filePath = this.root.fileForFilename(name);
    return filePath !== null && this.fs.exists(filePath);
  }

  read<T>(name: string, codec: BlobCodec<T>): Result<T | null, BlobStoreError> {
    const filePath = this.root.fileForFilename(name);
    if (filePath === null) return ok(null);

    const text = this.fs.readFileUtf8(filePath);
    if (text.isErr()) {
      // Missing blob is "nothing saved yet", not a failure (branch on code, not message)
      if (text.error.code === 'FS_NOT_FOUND') return ok(null);
      return err(readError(name, text.error));
    }

    return unmarshal(codec, text.value).mapErr(
      (e): BlobStoreError => ({ code: 'BLOB_DESERIALIZATION_ERROR', name, message: e.message })
    );
  }

  write<T>(name: string, codec: BlobCodec<T>, value: T | null | undefined): Result<void, BlobStoreError> {
    if (value === null || value === undefined) return ok(undefined);
    const filePath = this.root.fileForFilename(name);
    if (filePath === null) return ok(undefined);

    const text = marshal(codec, value);
    if (text.isErr()) return err({ code: 'BLOB_ENCODE_ERROR', name, message: text.error.message });

    // durableRoot() recreates the base if something removed it
    this.root.durableRoot();
    const tmpPath = `${filePath}.tmp`;

    // Whole-file replace: write tmp, then rename over the target
    const written = this.fs.writeFileUtf8(tmpPath, text.value);
    if (written.isErr()) return err(writeError(name, written.error));

    const renamed = this.fs.rename(tmpPath, filePath);
    if (renamed.isOk()) return ok(undefined);

    // The target keeps its previous value; no tmp file is left behind
    const cleanup = this.fs.unlink(tmpPath);
    if (cleanup.isOk()) return err(writeError(name, renamed.error));
    return err({
      code: 'BLOB_IO_WRITE_ERROR',
      name,
      message: `${renamed.error.message}; ${tmpPath} not removed: ${cleanup.error.message}`,
    });
  }

  remove(name: string): Result<void, BlobStoreError> {
    const filePath = this.root.fileForFilename(name);
    if (filePath === null) return ok(undefined);

    return this.fs.unlink(filePath).orElse((e) => {
      if (e.code === 'FS_NOT_FOUND') return ok(undefined);
      return err(writeError(name, e));
    });
  }
}
