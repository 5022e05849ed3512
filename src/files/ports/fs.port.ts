import type { Result } from 'neverthrow';

export type FsError =
  | { readonly code: 'FS_IO_ERROR'; readonly message: string }
  | { readonly code: 'FS_NOT_FOUND'; readonly message: string }
  | { readonly code: 'FS_ALREADY_EXISTS'; readonly message: string }
  | { readonly code: 'FS_PERMISSION_DENIED'; readonly message: string };

/**
 * Port: Directory creation.
 * Used by: storage-root, file-locator.
 *
 * `mkdirp` creates every missing parent and is a no-op for an existing directory.
 */
export interface DirectoryOpsPort {
  mkdirp(dirPath: string): Result<void, FsError>;
}

/**
 * Port: Whole-file reads and metadata.
 * Used by: json-blob-store, bundled-assets, content-resolver.
 */
export interface FileReadPort {
  exists(filePath: string): boolean;
  readFileUtf8(filePath: string): Result<string, FsError>;
  readFileBytes(filePath: string): Result<Uint8Array, FsError>;
  stat(filePath: string): Result<{ readonly sizeBytes: number; readonly isFile: boolean }, FsError>;
}

/**
 * Port: Descriptor-based sequential reads.
 * Used by: content-inspector (hashing and magic-byte sniffing without loading
 * the whole file).
 *
 * Callers own the descriptor and must close it on every path.
 */
export interface FileDescriptorPort {
  openRead(filePath: string): Result<{ readonly fd: number }, FsError>;
  /** Reads up to `length` bytes at the current position; 0 means end of file. */
  readChunk(fd: number, buffer: Uint8Array, offset: number, length: number): Result<number, FsError>;
  closeFile(fd: number): Result<void, FsError>;
}

/**
 * Port: Writes, renames, deletes.
 * Used by: json-blob-store.
 */
export interface FileManipulationPort {
  writeFileUtf8(filePath: string, text: string): Result<void, FsError>;
  rename(fromPath: string, toPath: string): Result<void, FsError>;
  unlink(filePath: string): Result<void, FsError>;
}

export interface FileSystemPort
  extends DirectoryOpsPort,
    FileReadPort,
    FileDescriptorPort,
    FileManipulationPort {}
