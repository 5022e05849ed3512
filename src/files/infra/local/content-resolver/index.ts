import * as fs from 'fs';
import type { Readable } from 'stream';
import { fileURLToPath } from 'url';
import type { Logger } from '../../../../core/logging/index.js';
import type { ContentInspectorPort } from '../../../ports/content-inspector.port.js';
import type { ContentResolverPort } from '../../../ports/content-resolver.port.js';
import type { FileReadPort } from '../../../ports/fs.port.js';

export const PDF_MIME_TYPE = 'application/pdf';

/**
 * Content handles backed by the local filesystem: `file:` URLs or paths.
 *
 * Only the PDF type is recognized (by magic bytes); anything else is
 * reported as unknown.
 */
export class LocalContentResolver implements ContentResolverPort {
  constructor(
    private readonly files: FileReadPort,
    private readonly inspector: ContentInspectorPort,
    private readonly logger: Logger
  ) {}

  openStream(handle: string): Readable | null {
    const filePath = this.regularFile(handle);
    return filePath === null ? null : fs.createReadStream(filePath);
  }

  size(handle: string): number | null {
    const filePath = this.toPath(handle);
    if (filePath === null) return null;
    const stat = this.files.stat(filePath);
    return stat.isOk() && stat.value.isFile ? stat.value.sizeBytes : null;
  }

  mimeType(handle: string): string | null {
    const filePath = this.regularFile(handle);
    if (filePath === null) return null;
    return this.inspector.looksLikePdf(filePath) ? PDF_MIME_TYPE : null;
  }

  private regularFile(handle: string): string | null {
    const filePath = this.toPath(handle);
    if (filePath === null) return null;
    const stat = this.files.stat(filePath);
    return stat.isOk() && stat.value.isFile ? filePath : null;
  }

  private toPath(handle: string): string | null {
    if (handle.length === 0) return null;
    if (!handle.startsWith('file:')) return handle;
    try {
      return fileURLToPath(handle);
    } catch (e) {
      this.logger.debug({ handle, err: e }, 'Content handle is not a usable file URL');
      return null;
    }
  }
}
