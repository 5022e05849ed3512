import { Readable } from 'stream';
import type { ContentResolverPort } from '../../src/files/ports/content-resolver.port.js';

interface Entry {
  readonly bytes: Uint8Array;
  readonly mimeType: string | null;
}

/**
 * In-memory content resolver. Handles are arbitrary strings registered with put().
 */
export class InMemoryContentResolver implements ContentResolverPort {
  private readonly entries = new Map<string, Entry>();

  put(handle: string, bytes: Uint8Array, mimeType: string | null = null): void {
    this.entries.set(handle, { bytes, mimeType });
  }

  openStream(handle: string): Readable | null {
    const entry = this.entries.get(handle);
    return entry ? Readable.from([Buffer.from(entry.bytes)]) : null;
  }

  size(handle: string): number | null {
    return this.entries.get(handle)?.bytes.byteLength ?? null;
  }

  mimeType(handle: string): string | null {
    return this.entries.get(handle)?.mimeType ?? null;
  }
}
