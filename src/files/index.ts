// Pure core
export * from './durable-core/ids/index.js';
export * from './durable-core/library/index.js';
export * as PathScheme from './durable-core/path-scheme/index.js';
export type { PathPlan, StorageBase } from './durable-core/path-scheme/index.js';
export * from './durable-core/marshal/index.js';
export * from './durable-core/schemas/index.js';
export { BLOB_NAMES, BUNDLED_SCHEMA_ASSET } from './durable-core/blob-names.js';
export type { BlobName } from './durable-core/blob-names.js';

// Ports
export type { FsError, FileSystemPort, DirectoryOpsPort, FileReadPort, FileDescriptorPort, FileManipulationPort } from './ports/fs.port.js';
export type { StorageRoot, StorageRootPort, DirectoryCreationError } from './ports/storage-root.port.js';
export type { FileLocatorPort } from './ports/file-locator.port.js';
export type { BlobStoreError, JsonBlobStorePort } from './ports/json-blob-store.port.js';
export type { PersistedCollection, AuxiliaryStateStorePort } from './ports/aux-state-store.port.js';
export type { ContentInspectorPort } from './ports/content-inspector.port.js';
export type { ContentResolverPort } from './ports/content-resolver.port.js';
export type { AssetError, BundledAssetsPort } from './ports/bundled-assets.port.js';
export type { BundledSchemaPort } from './ports/bundled-schema.port.js';

// Local adapters
export { NodeFileSystem } from './infra/local/fs/index.js';
export { initializeStorageRoot, LocalStorageRoot, CACHE_DIR_NAME } from './infra/local/storage-root/index.js';
export { LocalFileLocator } from './infra/local/file-locator/index.js';
export { LocalJsonBlobStore } from './infra/local/json-blob-store/index.js';
export { LocalAuxiliaryStateStore, UPLOADS_CODEC, SESSION_IDS_CODEC } from './infra/local/aux-state-store/index.js';
export { LocalContentInspector } from './infra/local/content-inspector/index.js';
export { LocalContentResolver, PDF_MIME_TYPE } from './infra/local/content-resolver/index.js';
export { LocalBundledAssets } from './infra/local/bundled-assets/index.js';
export { LocalBundledSchema } from './infra/local/bundled-schema/index.js';

// Facade
export { FileStore, createLocalFileStorePorts } from './file-store.js';
export type { FileStorePorts, FileStoreSettings } from './file-store.js';
