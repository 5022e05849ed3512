import * as path from 'path';
import type { Logger } from '../../../../core/logging/index.js';
import type { RelativePath } from '../../../durable-core/ids/index.js';
import type { StorageBase } from '../../../durable-core/path-scheme/index.js';
import { pathSegments, relativePath } from '../../../durable-core/path-scheme/index.js';
import type { DirectoryOpsPort } from '../../../ports/fs.port.js';
import type { DirectoryCreationError, StorageRoot, StorageRootPort } from '../../../ports/storage-root.port.js';

/** Name of the purgeable directory inside the platform cache area. */
export const CACHE_DIR_NAME = 'cache';

export interface StorageRootDirs {
  readonly dataDir: string;
  readonly cacheBaseDir: string;
}

/**
 * Create a directory chain; a failure is logged and returned as data, never thrown.
 */
export function ensureDir(fs: DirectoryOpsPort, logger: Logger, dirPath: string): DirectoryCreationError | null {
  const created = fs.mkdirp(dirPath);
  if (created.isOk()) return null;

  const failure: DirectoryCreationError = {
    code: 'DIRECTORY_CREATION_ERROR',
    message: created.error.message,
    path: dirPath,
  };
  logger.warn({ path: dirPath, cause: created.error.code }, 'Directory could not be created; continuing');
  return failure;
}

/**
 * Resolve and create both base directories. Runs once per process; the
 * returned value is then passed to everything that needs it.
 *
 * Creation failures do not fail initialization.
 */
export function initializeStorageRoot(dirs: StorageRootDirs, fs: DirectoryOpsPort, logger: Logger): StorageRoot {
  const root: StorageRoot = {
    durable: path.resolve(dirs.dataDir),
    cache: path.resolve(dirs.cacheBaseDir, CACHE_DIR_NAME),
  };

  ensureDir(fs, logger, root.durable);
  ensureDir(fs, logger, root.cache);
  logger.debug({ durable: root.durable, cache: root.cache }, 'Storage root initialized');

  return root;
}

export class LocalStorageRoot implements StorageRootPort {
  constructor(
    readonly root: StorageRoot,
    private readonly fs: DirectoryOpsPort,
    private readonly logger: Logger
  ) {}

  durableRoot(): string {
    ensureDir(this.fs, this.logger, this.root.durable);
    return this.root.durable;
  }

  cacheRoot(): string {
    ensureDir(this.fs, this.logger, this.root.cache);
    return this.root.cache;
  }

  ensureDirectory(base: StorageBase, relative: RelativePath): void {
    ensureDir(this.fs, this.logger, this.resolve(base, relative));
  }

  resolve(base: StorageBase, relative: RelativePath): string {
    const dir = base === 'durable' ? this.root.durable : this.root.cache;
    return path.join(dir, ...pathSegments(relative));
  }

  pathForFilename(filename: string): string {
    return this.resolve('durable', relativePath(filename));
  }

  fileForFilename(filename: string | null | undefined): string | null {
    if (filename === null || filename === undefined || filename.length === 0) return null;
    return this.pathForFilename(filename);
  }
}
