import * as fs from 'fs';
import * as path from 'path';
import type { Readable } from 'stream';
import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import { sanitizeSegment } from '../../../durable-core/path-scheme/index.js';
import type { AssetError, BundledAssetsPort } from '../../../ports/bundled-assets.port.js';
import type { FileReadPort, FsError } from '../../../ports/fs.port.js';

function toAssetError(name: string, e: FsError): AssetError {
  if (e.code === 'FS_NOT_FOUND') return { code: 'ASSET_NOT_FOUND', name, message: `Bundled asset not found: ${name}` };
  return { code: 'ASSET_IO_ERROR', name, message: e.message };
}

/**
 * Assets shipped in a directory next to the application. Names are flat;
 * a name cannot reach outside the assets directory.
 */
export class LocalBundledAssets implements BundledAssetsPort {
  constructor(
    private readonly assetsDir: string,
    private readonly files: FileReadPort
  ) {}

  openAsset(name: string): Result<Readable, AssetError> {
    const assetPath = this.assetPath(name);
    const stat = this.files.stat(assetPath);
    if (stat.isErr()) return err(toAssetError(name, stat.error));
    if (!stat.value.isFile) return err({ code: 'ASSET_NOT_FOUND', name, message: `Bundled asset is not a file: ${name}` });
    return ok(fs.createReadStream(assetPath));
  }

  readAsset(name: string): Result<Uint8Array, AssetError> {
    return this.files.readFileBytes(this.assetPath(name)).mapErr((e) => toAssetError(name, e));
  }

  private assetPath(name: string): string {
    return path.join(this.assetsDir, sanitizeSegment(name));
  }
}
