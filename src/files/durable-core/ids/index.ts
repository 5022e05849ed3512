import type { Brand } from '../../../runtime/brand.js';

// Branded primitives for the file store
export type Md5Digest = Brand<string, 'files.Md5Digest'>; // 32 lowercase hex chars
export type RelativePath = Brand<string, 'files.RelativePath'>; // '/'-joined sanitized segments
export type LibraryFolderName = Brand<string, 'files.LibraryFolderName'>;

export function asMd5Digest(value: string): Md5Digest {
  return value as Md5Digest;
}

export function asRelativePath(value: string): RelativePath {
  return value as RelativePath;
}

export function asLibraryFolderName(value: string): LibraryFolderName {
  return value as LibraryFolderName;
}
