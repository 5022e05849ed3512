import type { Result } from 'neverthrow';
import type { Readable } from 'stream';

export type AssetError =
  | { readonly code: 'ASSET_NOT_FOUND'; readonly name: string; readonly message: string }
  | { readonly code: 'ASSET_IO_ERROR'; readonly name: string; readonly message: string };

/**
 * Port: Read-only assets shipped with the application.
 */
export interface BundledAssetsPort {
  openAsset(name: string): Result<Readable, AssetError>;
  readAsset(name: string): Result<Uint8Array, AssetError>;
}
