export interface SplitFilename {
  readonly stem: string;
  readonly extension: string;
}

/**
 * Split on the last `.` only. No dot: the whole name is the stem and the
 * extension is empty.
 */
export function splitFilename(filename: string): SplitFilename {
  const index = filename.lastIndexOf('.');
  if (index === -1) return { stem: filename, extension: '' };
  return { stem: filename.slice(0, index), extension: filename.slice(index + 1) };
}
