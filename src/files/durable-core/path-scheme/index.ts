/**
 * Path scheme: pure mapping from logical identity to a location relative to
 * one of the two storage bases.
 *
 * Layout under the durable root:
 * - downloads/<libraryFolder>/<itemKey>/<filename stem>
 * - annotations/<libraryFolder>/<documentKey>/<annotationKey>[_dark].png
 * - jsons/<libraryFolder>/<kindFolder>/<key>.json
 * - <blob name> (flat: uploads, activeUrlSessionIds, schema.json, ...)
 * - maindb_<userId>.<ext>, translators.<ext>
 *
 * Under the cache root: <name>, structure left to callers.
 *
 * Nothing here touches the filesystem. A plan names the directory that must
 * exist before the target is handed out; the file locator creates it.
 */
import type { RelativePath } from '../ids/index.js';
import type { LibraryIdentifier, ObjectKind } from '../library/index.js';
import { libraryFolderName, kindFolder } from '../library/index.js';
import { relativePath, childPath } from './segments.js';
import { splitFilename } from './filename.js';

export { sanitizeSegment, relativePath, childPath, pathSegments } from './segments.js';
export { splitFilename } from './filename.js';
export type { SplitFilename } from './filename.js';

export type StorageBase = 'durable' | 'cache';

export interface PathPlan {
  readonly base: StorageBase;
  /** Directory chain to create first. Null when the base directory suffices. */
  readonly directory: RelativePath | null;
  /** Returned location. Same as `directory` for directory plans. */
  readonly target: RelativePath;
}

export const DOWNLOADS_DIR = 'downloads';
export const ANNOTATIONS_DIR = 'annotations';
export const JSONS_DIR = 'jsons';

export const DARK_PREVIEW_SUFFIX = '_dark';
export const PREVIEW_EXTENSION = 'png';

export const MAIN_DB_PREFIX = 'maindb_';
export const BUNDLED_DATA_DB_NAME = 'translators';

function filePlan(base: StorageBase, directory: RelativePath | null, target: RelativePath): PathPlan {
  return { base, directory, target };
}

function directoryPlan(directory: RelativePath): PathPlan {
  return { base: 'durable', directory, target: directory };
}

/**
 * The stored name drops the extension: `paper.pdf` is kept as `paper`.
 * The content type is recorded elsewhere and does not affect the path.
 */
export function attachmentFile(libraryId: LibraryIdentifier, itemKey: string, filename: string): PathPlan {
  const directory = relativePath(DOWNLOADS_DIR, libraryFolderName(libraryId), itemKey);
  return filePlan('durable', directory, childPath(directory, splitFilename(filename).stem));
}

export function annotationPreviewName(annotationKey: string, isDark: boolean): string {
  return `${annotationKey}${isDark ? DARK_PREVIEW_SUFFIX : ''}.${PREVIEW_EXTENSION}`;
}

export function annotationPreview(
  annotationKey: string,
  documentKey: string,
  libraryId: LibraryIdentifier,
  isDark: boolean
): PathPlan {
  const directory = relativePath(ANNOTATIONS_DIR, libraryFolderName(libraryId), documentKey);
  return filePlan('durable', directory, childPath(directory, annotationPreviewName(annotationKey, isDark)));
}

export function annotationPreviewsForDocument(documentKey: string, libraryId: LibraryIdentifier): PathPlan {
  return directoryPlan(relativePath(ANNOTATIONS_DIR, libraryFolderName(libraryId), documentKey));
}

export function annotationPreviewsForLibrary(libraryId: LibraryIdentifier): PathPlan {
  return directoryPlan(relativePath(ANNOTATIONS_DIR, libraryFolderName(libraryId)));
}

export function annotationPreviewsRoot(): PathPlan {
  return directoryPlan(relativePath(ANNOTATIONS_DIR));
}

export function jsonCacheFile(kind: ObjectKind, libraryId: LibraryIdentifier, key: string): PathPlan {
  const directory = relativePath(JSONS_DIR, libraryFolderName(libraryId), kindFolder(kind));
  return filePlan('durable', directory, childPath(directory, `${key}.json`));
}

export function blobFile(name: string): PathPlan {
  return filePlan('durable', null, relativePath(name));
}

export function cacheFile(name: string): PathPlan {
  return filePlan('cache', null, relativePath(name));
}

export function mainDatabaseFile(userId: number, extension: string): PathPlan {
  return blobFile(`${MAIN_DB_PREFIX}${userId}.${extension}`);
}

export function bundledDataDatabaseFile(extension: string): PathPlan {
  return blobFile(`${BUNDLED_DATA_DB_NAME}.${extension}`);
}
