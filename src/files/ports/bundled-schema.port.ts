import type { JsonObject } from '../durable-core/marshal/index.js';

/**
 * Port: API schema cache.
 *
 * The application ships a schema snapshot as an asset. At startup it is read
 * from the bundle and copied into the `schema.json` blob, where the sync layer
 * later replaces it with fresher copies from the server.
 *
 * Failures are logged and reported as null / ignored.
 */
export interface BundledSchemaPort {
  loadBundledSchema(): JsonObject | null;
  saveBundledSchema(schema: JsonObject): void;
  loadCachedSchema(): JsonObject | null;
}
