import { z } from 'zod';
import type { Logger } from '../../../../core/logging/index.js';
import { BLOB_NAMES } from '../../../durable-core/blob-names.js';
import type { BlobCodec } from '../../../durable-core/marshal/index.js';
import { intKeyedMapCodec, listCodec } from '../../../durable-core/marshal/index.js';
import type { BackgroundUploads } from '../../../durable-core/schemas/index.js';
import { BackgroundUploadSchema } from '../../../durable-core/schemas/index.js';
import type { AuxiliaryStateStorePort, PersistedCollection } from '../../../ports/aux-state-store.port.js';
import type { JsonBlobStorePort } from '../../../ports/json-blob-store.port.js';

export const UPLOADS_CODEC: BlobCodec<BackgroundUploads> = intKeyedMapCodec(BackgroundUploadSchema);
export const SESSION_IDS_CODEC: BlobCodec<readonly string[]> = listCodec(z.string());

/**
 * A named blob with a fixed codec. Errors stop here: they are logged and
 * turned into "absent" (load) or dropped (save/deleteAll).
 */
export class JsonBlobCollection<T> implements PersistedCollection<T> {
  constructor(
    private readonly name: string,
    private readonly codec: BlobCodec<T>,
    private readonly store: JsonBlobStorePort,
    private readonly logger: Logger
  ) {}

  load(): T | null {
    const result = this.store.read(this.name, this.codec);
    if (result.isOk()) return result.value;

    const level = result.error.code === 'BLOB_DESERIALIZATION_ERROR' ? 'warn' : 'error';
    this.logger[level]({ blob: this.name, code: result.error.code, reason: result.error.message }, 'Stored state discarded');
    return null;
  }

  save(value: T): void {
    const result = this.store.write(this.name, this.codec, value);
    if (result.isErr()) {
      this.logger.error({ blob: this.name, code: result.error.code, reason: result.error.message }, 'Unable to persist state');
    }
  }

  deleteAll(): void {
    const result = this.store.remove(this.name);
    if (result.isErr()) {
      this.logger.error({ blob: this.name, code: result.error.code, reason: result.error.message }, 'Unable to delete state');
    }
  }
}

export class LocalAuxiliaryStateStore implements AuxiliaryStateStorePort {
  readonly uploads: PersistedCollection<BackgroundUploads>;
  readonly sessionIds: PersistedCollection<readonly string[]>;
  readonly shareExtensionSessionIds: PersistedCollection<readonly string[]>;

  constructor(store: JsonBlobStorePort, logger: Logger) {
    this.uploads = new JsonBlobCollection(BLOB_NAMES.uploads, UPLOADS_CODEC, store, logger);
    this.sessionIds = new JsonBlobCollection(BLOB_NAMES.sessionIds, SESSION_IDS_CODEC, store, logger);
    this.shareExtensionSessionIds = new JsonBlobCollection(
      BLOB_NAMES.shareExtensionSessionIds,
      SESSION_IDS_CODEC,
      store,
      logger
    );
  }
}
