import type { RelativePath } from '../durable-core/ids/index.js';
import type { StorageBase } from '../durable-core/path-scheme/index.js';

/**
 * The two base directories, resolved once per process.
 */
export interface StorageRoot {
  /** Survives app updates; holds everything user data needs. */
  readonly durable: string;
  /** May be wiped by the OS under storage pressure; regenerable data only. */
  readonly cache: string;
}

export type DirectoryCreationError = {
  readonly code: 'DIRECTORY_CREATION_ERROR';
  readonly message: string;
  readonly path: string;
};

/**
 * Port: Root resolver.
 *
 * Guarantees:
 * - `durableRoot()` / `cacheRoot()` (re)create their directory on each call.
 *   A creation failure is logged, not returned: the write that follows fails
 *   on its own, at the point of actual I/O.
 * - `resolve` and `pathForFilename` are pure joins and never check existence.
 */
export interface StorageRootPort {
  readonly root: StorageRoot;
  durableRoot(): string;
  cacheRoot(): string;
  /** Create `relative` (and parents) under `base`. Failure is logged and swallowed. */
  ensureDirectory(base: StorageBase, relative: RelativePath): void;
  resolve(base: StorageBase, relative: RelativePath): string;
  /** Absolute durable path of a flat name. */
  pathForFilename(filename: string): string;
  /** Like `pathForFilename`, but null for a missing or empty name. */
  fileForFilename(filename: string | null | undefined): string | null;
}
