import type { Result } from 'neverthrow';
import type { Md5Digest } from '../durable-core/ids/index.js';
import type { FsError } from './fs.port.js';

/**
 * Port: Identity checks on already-resolved files.
 *
 * - contentHash(): MD5 for dedup and upload integrity, not security. Streams
 *   the file in fixed chunks.
 * - looksLikePdf(): compares the first 4 bytes with `%PDF`. Short files and
 *   unreadable files are "not a PDF"; this never throws.
 */
export interface ContentInspectorPort {
  contentHash(filePath: string): Result<Md5Digest, FsError>;
  looksLikePdf(filePath: string): boolean;
}
