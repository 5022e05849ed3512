export { BackgroundUploadKindSchema, BackgroundUploadSchema } from './background-upload.js';
export type { BackgroundUpload, BackgroundUploadKind, BackgroundUploads } from './background-upload.js';
