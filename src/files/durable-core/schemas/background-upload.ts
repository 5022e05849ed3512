import { z } from 'zod';
import { LibraryIdentifierSchema } from '../library/index.js';

/**
 * Where an upload goes once the OS background session finishes it:
 * - `api`: authorized against the sync API, registered with `uploadKey`
 * - `webdav`: stored on the user's WebDAV server, stamped with `mtime`
 */
export const BackgroundUploadKindSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('api'), uploadKey: z.string().min(1) }),
  z.object({ kind: z.literal('webdav'), mtime: z.number().int().nonnegative() }),
]);

export const BackgroundUploadSchema = z.object({
  type: BackgroundUploadKindSchema,
  /** Attachment item key */
  key: z.string().min(1),
  libraryId: LibraryIdentifierSchema,
  userId: z.number().int().nonnegative(),
  remoteUrl: z.string().url(),
  /** Absolute path of the local file being uploaded */
  fileUrl: z.string().min(1),
  md5: z.string().regex(/^[0-9a-f]{32}$/, 'md5 must be 32 lowercase hex chars'),
  /** ISO 8601 with `Z` or a UTC offset, when the upload was enqueued */
  date: z.string().datetime({ offset: true }),
  size: z.number().int().nonnegative().optional(),
});

export type BackgroundUploadKind = z.infer<typeof BackgroundUploadKindSchema>;
export type BackgroundUpload = z.infer<typeof BackgroundUploadSchema>;

/** Upload queue keyed by the OS task id. */
export type BackgroundUploads = ReadonlyMap<number, BackgroundUpload>;
