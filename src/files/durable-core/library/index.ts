export {
  CustomLibraryTypeSchema,
  LibraryIdentifierSchema,
  LibraryId,
  libraryFolderName,
  parseLibraryFolderName,
} from './library-identifier.js';
export type { CustomLibraryType, LibraryIdentifier } from './library-identifier.js';

export { ObjectKindSchema, OBJECT_KIND_FOLDERS, kindFolder } from './object-kind.js';
export type { ObjectKind, KindFolder } from './object-kind.js';
