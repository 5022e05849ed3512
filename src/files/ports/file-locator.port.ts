import type { LibraryIdentifier, ObjectKind } from '../durable-core/library/index.js';

/**
 * Port: Canonical locations for derived files.
 *
 * Every returned path is absolute. Before returning, each operation creates
 * the directory chain the path lives in (for directory operations, the
 * directory itself), so callers can write immediately.
 *
 * Same inputs give the same path, across restarts too.
 */
export interface FileLocatorPort {
  /** downloads/<library>/<itemKey>/<stem>; the extension is not part of the stored name. */
  attachmentFile(libraryId: LibraryIdentifier, itemKey: string, filename: string): string;

  /** annotations/<library>/<documentKey>/<annotationKey>[_dark].png */
  annotationPreview(annotationKey: string, documentKey: string, libraryId: LibraryIdentifier, isDark: boolean): string;
  annotationPreviewsForDocument(documentKey: string, libraryId: LibraryIdentifier): string;
  annotationPreviewsForLibrary(libraryId: LibraryIdentifier): string;
  annotationPreviewsRoot(): string;

  /** jsons/<library>/<kindFolder>/<key>.json */
  jsonCacheFile(kind: ObjectKind, libraryId: LibraryIdentifier, key: string): string;

  blobFile(name: string): string;
  cacheFile(name: string): string;

  /** maindb_<userId>.<ext> for the active user. */
  mainDatabaseFile(): string;
  /** translators.<ext> */
  bundledDataDatabaseFile(): string;
}
