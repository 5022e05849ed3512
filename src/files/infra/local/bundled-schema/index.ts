import type { Logger } from '../../../../core/logging/index.js';
import { BLOB_NAMES, BUNDLED_SCHEMA_ASSET } from '../../../durable-core/blob-names.js';
import type { JsonObject } from '../../../durable-core/marshal/index.js';
import { JsonObjectSchema, objectCodec, unmarshal } from '../../../durable-core/marshal/index.js';
import type { BundledAssetsPort } from '../../../ports/bundled-assets.port.js';
import type { BundledSchemaPort } from '../../../ports/bundled-schema.port.js';
import type { JsonBlobStorePort } from '../../../ports/json-blob-store.port.js';

export const SCHEMA_CODEC = objectCodec(JsonObjectSchema);

export class LocalBundledSchema implements BundledSchemaPort {
  private readonly decoder = new TextDecoder('utf-8', { fatal: true });

  constructor(
    private readonly assets: BundledAssetsPort,
    private readonly store: JsonBlobStorePort,
    private readonly logger: Logger
  ) {}

  loadBundledSchema(): JsonObject | null {
    const bytes = this.assets.readAsset(BUNDLED_SCHEMA_ASSET);
    if (bytes.isErr()) {
      this.logger.debug({ asset: BUNDLED_SCHEMA_ASSET, code: bytes.error.code }, 'Failed to load bundled schema');
      return null;
    }

    let text: string;
    try {
      text = this.decoder.decode(bytes.value);
    } catch (e) {
      this.logger.debug({ asset: BUNDLED_SCHEMA_ASSET, err: e }, 'Bundled schema is not UTF-8');
      return null;
    }

    const parsed = unmarshal(SCHEMA_CODEC, text);
    if (parsed.isErr()) {
      this.logger.debug({ asset: BUNDLED_SCHEMA_ASSET, code: parsed.error.code }, 'Bundled schema is not a JSON object');
      return null;
    }
    return parsed.value;
  }

  saveBundledSchema(schema: JsonObject): void {
    const result = this.store.write(BLOB_NAMES.schema, SCHEMA_CODEC, schema);
    if (result.isErr()) {
      this.logger.error({ blob: BLOB_NAMES.schema, code: result.error.code, reason: result.error.message }, 'Failed to cache bundled schema');
    }
  }

  loadCachedSchema(): JsonObject | null {
    const result = this.store.read(BLOB_NAMES.schema, SCHEMA_CODEC);
    if (result.isOk()) return result.value;

    this.logger.warn({ blob: BLOB_NAMES.schema, code: result.error.code }, 'Cached schema discarded');
    return null;
  }
}
