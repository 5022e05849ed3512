import type { Readable } from 'stream';

/**
 * Port: Platform content handles (external collaborator).
 *
 * A handle is opaque to the file store. The local adapter understands
 * `file:` URLs and plain paths; hosts with their own content system supply
 * their own adapter.
 *
 * All three answer null when the handle cannot be resolved.
 */
export interface ContentResolverPort {
  openStream(handle: string): Readable | null;
  size(handle: string): number | null;
  mimeType(handle: string): string | null;
}
