import type { LibraryIdentifier, ObjectKind } from '../../../durable-core/library/index.js';
import type { PathPlan } from '../../../durable-core/path-scheme/index.js';
import * as Scheme from '../../../durable-core/path-scheme/index.js';
import type { FileLocatorPort } from '../../../ports/file-locator.port.js';
import type { StorageRootPort } from '../../../ports/storage-root.port.js';

export interface DatabaseFileOptions {
  readonly userId: number;
  readonly extension: string;
}

export class LocalFileLocator implements FileLocatorPort {
  constructor(
    private readonly root: StorageRootPort,
    private readonly database: DatabaseFileOptions
  ) {}

  attachmentFile(libraryId: LibraryIdentifier, itemKey: string, filename: string): string {
    return this.materialize(Scheme.attachmentFile(libraryId, itemKey, filename));
  }

  annotationPreview(annotationKey: string, documentKey: string, libraryId: LibraryIdentifier, isDark: boolean): string {
    return this.materialize(Scheme.annotationPreview(annotationKey, documentKey, libraryId, isDark));
  }

  annotationPreviewsForDocument(documentKey: string, libraryId: LibraryIdentifier): string {
    return this.materialize(Scheme.annotationPreviewsForDocument(documentKey, libraryId));
  }

  annotationPreviewsForLibrary(libraryId: LibraryIdentifier): string {
    return this.materialize(Scheme.annotationPreviewsForLibrary(libraryId));
  }

  annotationPreviewsRoot(): string {
    return this.materialize(Scheme.annotationPreviewsRoot());
  }

  jsonCacheFile(kind: ObjectKind, libraryId: LibraryIdentifier, key: string): string {
    return this.materialize(Scheme.jsonCacheFile(kind, libraryId, key));
  }

  blobFile(name: string): string {
    return this.materialize(Scheme.blobFile(name));
  }

  cacheFile(name: string): string {
    return this.materialize(Scheme.cacheFile(name));
  }

  mainDatabaseFile(): string {
    return this.materialize(Scheme.mainDatabaseFile(this.database.userId, this.database.extension));
  }

  bundledDataDatabaseFile(): string {
    return this.materialize(Scheme.bundledDataDatabaseFile(this.database.extension));
  }

  private materialize(plan: PathPlan): string {
    if (plan.directory === null) {
      // Flat names live directly in the base; make sure the base is there.
      if (plan.base === 'durable') this.root.durableRoot();
      else this.root.cacheRoot();
    } else {
      this.root.ensureDirectory(plan.base, plan.directory);
    }
    return this.root.resolve(plan.base, plan.target);
  }
}
