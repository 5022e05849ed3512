import 'reflect-metadata';
import { container, instanceCachingFactory } from 'tsyringe';
import type { DependencyContainer } from 'tsyringe';
import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import { DI } from './tokens.js';
import type { ValidatedConfig } from '../config/app-config.js';
import { loadConfig } from '../config/app-config.js';
import type { AppError, ConfigInvalidError } from '../errors/app-error.js';
import { Err } from '../errors/factories.js';
import type { ILoggerFactory } from '../core/logging/index.js';
import { createBootstrapLogger, PinoLoggerFactory } from '../core/logging/index.js';
import type { FileSystemPort } from '../files/ports/fs.port.js';
import type { StorageRootPort } from '../files/ports/storage-root.port.js';
import type { FileLocatorPort } from '../files/ports/file-locator.port.js';
import type { JsonBlobStorePort } from '../files/ports/json-blob-store.port.js';
import type { AuxiliaryStateStorePort } from '../files/ports/aux-state-store.port.js';
import type { ContentInspectorPort } from '../files/ports/content-inspector.port.js';
import type { ContentResolverPort } from '../files/ports/content-resolver.port.js';
import type { BundledAssetsPort } from '../files/ports/bundled-assets.port.js';
import type { BundledSchemaPort } from '../files/ports/bundled-schema.port.js';
import { NodeFileSystem } from '../files/infra/local/fs/index.js';
import { initializeStorageRoot, LocalStorageRoot } from '../files/infra/local/storage-root/index.js';
import { LocalFileLocator } from '../files/infra/local/file-locator/index.js';
import { LocalJsonBlobStore } from '../files/infra/local/json-blob-store/index.js';
import { LocalAuxiliaryStateStore } from '../files/infra/local/aux-state-store/index.js';
import { LocalContentInspector } from '../files/infra/local/content-inspector/index.js';
import { LocalContentResolver } from '../files/infra/local/content-resolver/index.js';
import { LocalBundledAssets } from '../files/infra/local/bundled-assets/index.js';
import { LocalBundledSchema } from '../files/infra/local/bundled-schema/index.js';
import { FileStore } from '../files/file-store.js';

// ═══════════════════════════════════════════════════════════════════════════
// STATE
// ═══════════════════════════════════════════════════════════════════════════

let initialized = false;

export interface ContainerInitOptions {
  /** Defaults to process.env. */
  readonly env?: Record<string, string | undefined>;
  /** Base for relative directories. Defaults to process.cwd(). */
  readonly cwd?: string;
}

// ═══════════════════════════════════════════════════════════════════════════
// CONFIGURATION REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function registerConfig(options: ContainerInitOptions): Result<void, ConfigInvalidError> {
  // Tests may register a config before initialization; keep theirs.
  if (container.isRegistered(DI.Config.App)) return ok(undefined);

  return loadConfig({ env: options.env ?? process.env, cwd: options.cwd ?? process.cwd() }).map((config) => {
    container.register<ValidatedConfig>(DI.Config.App, { useValue: config });
  });
}

function registerLogging(): void {
  if (container.isRegistered(DI.Logging.Factory)) return;
  container.register<ILoggerFactory>(DI.Logging.Factory, {
    useFactory: instanceCachingFactory((c) => c.resolve(PinoLoggerFactory)),
  });
}

// ═══════════════════════════════════════════════════════════════════════════
// FILE STORE REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function logger(c: DependencyContainer, component: string) {
  return c.resolve<ILoggerFactory>(DI.Logging.Factory).create(component);
}

function config(c: DependencyContainer): ValidatedConfig {
  return c.resolve<ValidatedConfig>(DI.Config.App);
}

/**
 * Dependency levels:
 * - Level 1: FileSystem, StorageRoot (creates both roots on first resolve)
 * - Level 2: Locator, BlobStore, ContentInspector, BundledAssets
 * - Level 3: AuxState, ContentResolver, BundledSchema
 * - Level 4: FileStore facade
 *
 * Tokens already registered (fakes in tests, a host's content resolver) are
 * left in place.
 */
function registerFileStore(): void {
  const registerIfMissing = <T>(token: symbol, factory: (c: DependencyContainer) => T): void => {
    if (container.isRegistered(token)) return;
    container.register<T>(token, { useFactory: instanceCachingFactory(factory) });
  };

  // Level 1
  registerIfMissing<FileSystemPort>(DI.Files.FileSystem, () => new NodeFileSystem());
  registerIfMissing<StorageRootPort>(DI.Files.StorageRoot, (c) => {
    const fs = c.resolve<FileSystemPort>(DI.Files.FileSystem);
    const log = logger(c, 'storage-root');
    const { storage } = config(c);
    const root = initializeStorageRoot({ dataDir: storage.dataDir, cacheBaseDir: storage.cacheBaseDir }, fs, log);
    return new LocalStorageRoot(root, fs, log);
  });

  // Level 2
  registerIfMissing<FileLocatorPort>(DI.Files.Locator, (c) => {
    const { session, database } = config(c);
    return new LocalFileLocator(c.resolve<StorageRootPort>(DI.Files.StorageRoot), {
      userId: session.userId,
      extension: database.extension,
    });
  });
  registerIfMissing<JsonBlobStorePort>(DI.Files.BlobStore, (c) =>
    new LocalJsonBlobStore(c.resolve<StorageRootPort>(DI.Files.StorageRoot), c.resolve<FileSystemPort>(DI.Files.FileSystem))
  );
  registerIfMissing<ContentInspectorPort>(DI.Files.ContentInspector, (c) =>
    new LocalContentInspector(c.resolve<FileSystemPort>(DI.Files.FileSystem), logger(c, 'content-inspector'))
  );
  registerIfMissing<BundledAssetsPort>(DI.Files.BundledAssets, (c) =>
    new LocalBundledAssets(config(c).storage.assetsDir, c.resolve<FileSystemPort>(DI.Files.FileSystem))
  );

  // Level 3
  registerIfMissing<AuxiliaryStateStorePort>(DI.Files.AuxState, (c) =>
    new LocalAuxiliaryStateStore(c.resolve<JsonBlobStorePort>(DI.Files.BlobStore), logger(c, 'aux-state'))
  );
  registerIfMissing<ContentResolverPort>(DI.Files.ContentResolver, (c) =>
    new LocalContentResolver(
      c.resolve<FileSystemPort>(DI.Files.FileSystem),
      c.resolve<ContentInspectorPort>(DI.Files.ContentInspector),
      logger(c, 'content-resolver')
    )
  );
  registerIfMissing<BundledSchemaPort>(DI.Files.BundledSchema, (c) =>
    new LocalBundledSchema(
      c.resolve<BundledAssetsPort>(DI.Files.BundledAssets),
      c.resolve<JsonBlobStorePort>(DI.Files.BlobStore),
      logger(c, 'bundled-schema')
    )
  );

  // Level 4
  registerIfMissing<FileStore>(DI.Files.FileStore, (c) =>
    new FileStore(
      {
        root: c.resolve<StorageRootPort>(DI.Files.StorageRoot),
        locator: c.resolve<FileLocatorPort>(DI.Files.Locator),
        blobs: c.resolve<JsonBlobStorePort>(DI.Files.BlobStore),
        auxState: c.resolve<AuxiliaryStateStorePort>(DI.Files.AuxState),
        inspector: c.resolve<ContentInspectorPort>(DI.Files.ContentInspector),
        contentResolver: c.resolve<ContentResolverPort>(DI.Files.ContentResolver),
        schema: c.resolve<BundledSchemaPort>(DI.Files.BundledSchema),
      },
      logger(c, 'file-store')
    )
  );
}

// ═══════════════════════════════════════════════════════════════════════════
// PUBLIC API
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Initialize the DI container and the storage root.
 *
 * Idempotent: calls after a successful initialization return ok immediately.
 * Invalid config is returned, never thrown; the caller decides whether to exit.
 */
export function initializeContainer(options: ContainerInitOptions = {}): Result<void, AppError> {
  if (initialized) return ok(undefined);

  const configured = registerConfig(options);
  if (configured.isErr()) {
    createBootstrapLogger('di').error({ issues: configured.error.issues }, configured.error.message);
    return err(configured.error);
  }

  try {
    registerLogging();
    registerFileStore();
  } catch (e) {
    return err(Err.startupFailed('container', 'Service registration failed', e));
  }

  // Resolve once so both roots exist before anyone asks for a path.
  try {
    container.resolve<StorageRootPort>(DI.Files.StorageRoot);
  } catch (e) {
    return err(Err.startupFailed('storage_root', 'Storage root could not be initialized', e));
  }

  initialized = true;
  logger(container, 'di').debug('Container initialized');
  return ok(undefined);
}

/**
 * Reset container (for testing).
 */
export function resetContainer(): void {
  container.reset();
  initialized = false;
}

/**
 * Check initialization state.
 */
export function isInitialized(): boolean {
  return initialized;
}

// Export container for direct access when needed
export { container };
