/**
 * Flat blob names under the durable root. These are on-disk identifiers:
 * renaming one orphans every file already written under the old name.
 */
export const BLOB_NAMES = {
  uploads: 'uploads',
  sessionIds: 'activeUrlSessionIds',
  shareExtensionSessionIds: 'shareExtensionObservedUrlSessionIds',
  schema: 'schema.json',
} as const;

export type BlobName = (typeof BLOB_NAMES)[keyof typeof BLOB_NAMES];

/** Bundled asset seeded into the schema blob at startup. */
export const BUNDLED_SCHEMA_ASSET = 'schema.json';
