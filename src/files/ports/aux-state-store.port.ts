import type { BackgroundUploads } from '../durable-core/schemas/index.js';

/**
 * One persisted collection with fixed name and shape.
 *
 * - load(): null when nothing was saved, or when what was saved no longer
 *   decodes (logged). Never throws.
 * - save(): overwrites; last writer wins. Failures are logged and swallowed;
 *   the caller's in-memory state stays authoritative and is written again on
 *   the next save.
 */
export interface PersistedCollection<T> {
  load(): T | null;
  save(value: T): void;
  deleteAll(): void;
}

/**
 * Port: Auxiliary state kept outside the main database.
 */
export interface AuxiliaryStateStorePort {
  /** Pending background uploads, keyed by OS task id. */
  readonly uploads: PersistedCollection<BackgroundUploads>;
  /** Identifiers of network sessions this process started. */
  readonly sessionIds: PersistedCollection<readonly string[]>;
  /** Session identifiers observed from the share extension. */
  readonly shareExtensionSessionIds: PersistedCollection<readonly string[]>;
}
