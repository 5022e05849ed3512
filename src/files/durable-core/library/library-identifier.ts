import { z } from 'zod';
import { assertNever } from '../../../runtime/assert-never.js';
import type { LibraryFolderName } from '../ids/index.js';
import { asLibraryFolderName } from '../ids/index.js';

/**
 * Identity of a library: the user's own library, or a shared group library.
 *
 * The folder-name projection is used as a durable path component, so it must
 * stay stable across releases and be injective:
 * - custom/myLibrary -> `custom_my_library`
 * - group/<id>       -> `group_<id>`
 *
 * The two prefixes never overlap and group ids are printed in canonical
 * decimal, so distinct identifiers never share a folder.
 */
export const CustomLibraryTypeSchema = z.enum(['myLibrary']);
export type CustomLibraryType = z.infer<typeof CustomLibraryTypeSchema>;

export const LibraryIdentifierSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('custom'), type: CustomLibraryTypeSchema }),
  z.object({ kind: z.literal('group'), groupId: z.number().int().nonnegative() }),
]);

export type LibraryIdentifier = z.infer<typeof LibraryIdentifierSchema>;

const CUSTOM_TYPE_FOLDERS: Record<CustomLibraryType, string> = {
  myLibrary: 'custom_my_library',
};

const GROUP_FOLDER_PATTERN = /^group_(0|[1-9][0-9]*)$/;

export const LibraryId = {
  myLibrary: (): LibraryIdentifier => ({ kind: 'custom', type: 'myLibrary' }),
  group: (groupId: number): LibraryIdentifier => ({ kind: 'group', groupId }),
} as const;

export function libraryFolderName(libraryId: LibraryIdentifier): LibraryFolderName {
  switch (libraryId.kind) {
    case 'custom':
      return asLibraryFolderName(CUSTOM_TYPE_FOLDERS[libraryId.type]);
    case 'group':
      return asLibraryFolderName(`group_${libraryId.groupId}`);
    default:
      return assertNever(libraryId);
  }
}

/**
 * Inverse of {@link libraryFolderName}. Returns null for names this projection
 * never produces.
 */
export function parseLibraryFolderName(folder: string): LibraryIdentifier | null {
  for (const type of CustomLibraryTypeSchema.options) {
    if (CUSTOM_TYPE_FOLDERS[type] === folder) return { kind: 'custom', type };
  }

  const match = GROUP_FOLDER_PATTERN.exec(folder);
  if (!match) return null;

  const groupId = Number(match[1]);
  return Number.isSafeInteger(groupId) ? { kind: 'group', groupId } : null;
}
