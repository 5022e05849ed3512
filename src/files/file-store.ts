/**
 * FileStore: one object handing callers every file-store capability.
 *
 * The ports stay individually injectable; this facade composes them for
 * callers that need several at once, and owns the one-time startup steps.
 *
 * Nothing here throws. Reads answer null when there is nothing usable;
 * writes log and move on.
 */
import type { Readable } from 'stream';
import type { Logger } from '../core/logging/index.js';
import type { Md5Digest } from './durable-core/ids/index.js';
import type { BlobCodec, JsonObject } from './durable-core/marshal/index.js';
import type { BackgroundUploads } from './durable-core/schemas/index.js';
import { BLOB_NAMES } from './durable-core/blob-names.js';
import type { AuxiliaryStateStorePort } from './ports/aux-state-store.port.js';
import type { BundledSchemaPort } from './ports/bundled-schema.port.js';
import type { ContentInspectorPort } from './ports/content-inspector.port.js';
import type { ContentResolverPort } from './ports/content-resolver.port.js';
import type { FileLocatorPort } from './ports/file-locator.port.js';
import type { FileSystemPort } from './ports/fs.port.js';
import type { JsonBlobStorePort } from './ports/json-blob-store.port.js';
import type { StorageRootPort } from './ports/storage-root.port.js';
import { initializeStorageRoot, LocalStorageRoot } from './infra/local/storage-root/index.js';
import { LocalFileLocator } from './infra/local/file-locator/index.js';
import { LocalJsonBlobStore } from './infra/local/json-blob-store/index.js';
import { LocalAuxiliaryStateStore } from './infra/local/aux-state-store/index.js';
import { LocalContentInspector } from './infra/local/content-inspector/index.js';
import { LocalContentResolver } from './infra/local/content-resolver/index.js';
import { LocalBundledAssets } from './infra/local/bundled-assets/index.js';
import { LocalBundledSchema } from './infra/local/bundled-schema/index.js';

export interface FileStorePorts {
  readonly root: StorageRootPort;
  readonly locator: FileLocatorPort;
  readonly blobs: JsonBlobStorePort;
  readonly auxState: AuxiliaryStateStorePort;
  readonly inspector: ContentInspectorPort;
  readonly contentResolver: ContentResolverPort;
  readonly schema: BundledSchemaPort;
}

export interface FileStoreSettings {
  readonly dataDir: string;
  readonly cacheBaseDir: string;
  readonly assetsDir: string;
  readonly userId: number;
  readonly dbExtension: string;
}

/**
 * Wire the local adapters. `contentResolver` can be replaced by a host
 * that has its own notion of content handles.
 */
export function createLocalFileStorePorts(
  settings: FileStoreSettings,
  fs: FileSystemPort,
  logger: Logger,
  overrides: { readonly contentResolver?: ContentResolverPort } = {}
): FileStorePorts {
  const root = new LocalStorageRoot(
    initializeStorageRoot({ dataDir: settings.dataDir, cacheBaseDir: settings.cacheBaseDir }, fs, logger),
    fs,
    logger
  );
  const blobs = new LocalJsonBlobStore(root, fs);
  const inspector = new LocalContentInspector(fs, logger);

  return {
    root,
    locator: new LocalFileLocator(root, { userId: settings.userId, extension: settings.dbExtension }),
    blobs,
    auxState: new LocalAuxiliaryStateStore(blobs, logger),
    inspector,
    contentResolver: overrides.contentResolver ?? new LocalContentResolver(fs, inspector, logger),
    schema: new LocalBundledSchema(new LocalBundledAssets(settings.assetsDir, fs), blobs, logger),
  };
}

export class FileStore {
  constructor(
    readonly ports: FileStorePorts,
    private readonly logger: Logger
  ) {}

  // ── startup ────────────────────────────────────────────────────────────

  /**
   * Copy the bundled schema into the schema blob when no copy exists yet.
   * Returns true when a copy was written.
   */
  seedSchemaCache(): boolean {
    if (this.ports.blobs.exists(BLOB_NAMES.schema)) return false;

    const bundled = this.ports.schema.loadBundledSchema();
    if (bundled === null) return false;

    this.ports.schema.saveBundledSchema(bundled);
    return this.ports.blobs.exists(BLOB_NAMES.schema);
  }

  // ── roots & flat names ─────────────────────────────────────────────────

  getRootDirectory(): string {
    return this.ports.root.durableRoot();
  }

  getCachesDirectory(): string {
    return this.ports.root.cacheRoot();
  }

  getDbFile(): string {
    return this.ports.locator.mainDatabaseFile();
  }

  getBundledDataDbFile(): string {
    return this.ports.locator.bundledDataDatabaseFile();
  }

  fileExists(filename: string): boolean {
    return this.ports.blobs.exists(filename);
  }

  // ── generic JSON blobs ─────────────────────────────────────────────────

  saveObject<T>(value: T | null | undefined, codec: BlobCodec<T>, filename: string): void {
    const result = this.ports.blobs.write(filename, codec, value);
    if (result.isErr()) {
      this.logger.error({ blob: filename, code: result.error.code, reason: result.error.message }, 'Unable to write data to file');
    }
  }

  loadObject<T>(codec: BlobCodec<T>, filename: string): T | null {
    const result = this.ports.blobs.read(filename, codec);
    if (result.isOk()) return result.value;
    this.logger.warn({ blob: filename, code: result.error.code, reason: result.error.message }, 'Stored data discarded');
    return null;
  }

  deleteDataWithFilename(filename: string | null | undefined): void {
    if (filename === null || filename === undefined) return;
    const result = this.ports.blobs.remove(filename);
    if (result.isErr()) {
      this.logger.error({ blob: filename, code: result.error.code, reason: result.error.message }, 'Unable to delete file');
    }
  }

  // ── auxiliary state ────────────────────────────────────────────────────

  getUploads(): BackgroundUploads | null {
    return this.ports.auxState.uploads.load();
  }

  saveUploads(uploads: BackgroundUploads): void {
    this.ports.auxState.uploads.save(uploads);
  }

  deleteAllUploads(): void {
    this.ports.auxState.uploads.deleteAll();
  }

  getSessionIds(): readonly string[] | null {
    return this.ports.auxState.sessionIds.load();
  }

  saveSessions(identifiers: readonly string[]): void {
    this.ports.auxState.sessionIds.save(identifiers);
  }

  deleteAllSessionIds(): void {
    this.ports.auxState.sessionIds.deleteAll();
  }

  getShareExtensionSessionIds(): readonly string[] | null {
    return this.ports.auxState.shareExtensionSessionIds.load();
  }

  saveShareExtensionSessions(identifiers: readonly string[]): void {
    this.ports.auxState.shareExtensionSessionIds.save(identifiers);
  }

  deleteAllShareExtensionSessionIds(): void {
    this.ports.auxState.shareExtensionSessionIds.deleteAll();
  }

  // ── bundled schema ─────────────────────────────────────────────────────

  getBundledSchema(): JsonObject | null {
    return this.ports.schema.loadBundledSchema();
  }

  saveBundledSchema(schema: JsonObject): void {
    this.ports.schema.saveBundledSchema(schema);
  }

  // ── content ────────────────────────────────────────────────────────────

  md5(filePath: string): Md5Digest | null {
    const result = this.ports.inspector.contentHash(filePath);
    if (result.isOk()) return result.value;
    this.logger.warn({ path: filePath, code: result.error.code }, 'Unable to hash file');
    return null;
  }

  isPdf(filePath: string): boolean {
    return this.ports.inspector.looksLikePdf(filePath);
  }

  getFileSize(handle: string): number | null {
    return this.ports.contentResolver.size(handle);
  }

  openInputStream(handle: string): Readable | null {
    return this.ports.contentResolver.openStream(handle);
  }

  getType(handle: string): string | null {
    return this.ports.contentResolver.mimeType(handle);
  }
}
