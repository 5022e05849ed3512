import { createHash } from 'crypto';
import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import type { Logger } from '../../../../core/logging/index.js';
import type { Md5Digest } from '../../../durable-core/ids/index.js';
import { asMd5Digest } from '../../../durable-core/ids/index.js';
import type { ContentInspectorPort } from '../../../ports/content-inspector.port.js';
import type { FileDescriptorPort, FsError } from '../../../ports/fs.port.js';

export const HASH_CHUNK_BYTES = 64 * 1024;

/** `%PDF` */
export const PDF_MAGIC: readonly number[] = [0x25, 0x50, 0x44, 0x46];

export class LocalContentInspector implements ContentInspectorPort {
  constructor(
    private readonly fs: FileDescriptorPort,
    private readonly logger: Logger
  ) {}

  contentHash(filePath: string): Result<Md5Digest, FsError> {
    const opened = this.fs.openRead(filePath);
    if (opened.isErr()) return err(opened.error);
    const { fd } = opened.value;

    const hash = createHash('md5');
    const buffer = new Uint8Array(HASH_CHUNK_BYTES);
    try {
      for (;;) {
        const read = this.fs.readChunk(fd, buffer, 0, buffer.length);
        if (read.isErr()) return err(read.error);
        if (read.value === 0) break;
        hash.update(buffer.subarray(0, read.value));
      }
    } finally {
      this.close(fd, filePath);
    }

    return ok(asMd5Digest(hash.digest('hex')));
  }

  looksLikePdf(filePath: string): boolean {
    const opened = this.fs.openRead(filePath);
    if (opened.isErr()) {
      this.logger.debug({ path: filePath, code: opened.error.code }, 'PDF sniff: file not readable');
      return false;
    }
    const { fd } = opened.value;

    const head = new Uint8Array(PDF_MAGIC.length);
    let filled = 0;
    try {
      while (filled < head.length) {
        const read = this.fs.readChunk(fd, head, filled, head.length - filled);
        if (read.isErr()) {
          this.logger.debug({ path: filePath, code: read.error.code }, 'PDF sniff: read failed');
          return false;
        }
        if (read.value === 0) break;
        filled += read.value;
      }
    } finally {
      this.close(fd, filePath);
    }

    // Short file: not a PDF
    if (filled < head.length) return false;
    return PDF_MAGIC.every((byte, i) => head[i] === byte);
  }

  private close(fd: number, filePath: string): void {
    const closed = this.fs.closeFile(fd);
    if (closed.isErr()) {
      this.logger.warn({ path: filePath, code: closed.error.code }, 'File descriptor close failed');
    }
  }
}
