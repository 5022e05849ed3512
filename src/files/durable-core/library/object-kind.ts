import { z } from 'zod';

/**
 * Categories of synced objects that get a per-object JSON cache.
 */
export const ObjectKindSchema = z.enum(['collection', 'item', 'trash', 'search', 'settings']);
export type ObjectKind = z.infer<typeof ObjectKindSchema>;

export type KindFolder = 'collection' | 'item' | 'search' | 'settings';

/**
 * Cache sub-folder per kind. Trashed items share the item folder: an item
 * keeps its key when it moves to the trash, so its cached JSON stays put.
 */
export const OBJECT_KIND_FOLDERS = {
  collection: 'collection',
  item: 'item',
  trash: 'item',
  search: 'search',
  settings: 'settings',
} as const satisfies Record<ObjectKind, KindFolder>;

export function kindFolder(kind: ObjectKind): KindFolder {
  return OBJECT_KIND_FOLDERS[kind];
}
