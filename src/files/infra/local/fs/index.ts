import * as fs from 'fs';
import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import type { FileSystemPort, FsError } from '../../../ports/fs.port.js';

function nodeErrorCode(e: unknown): string | undefined {
  // Node fs errors carry a string `code`
  if (typeof e !== 'object' || e === null || !('code' in e)) return undefined;
  return typeof e.code === 'string' ? e.code : undefined;
}

export function mapFsError(e: unknown, filePath: string): FsError {
  const code = nodeErrorCode(e);

  if (code === 'ENOENT') return { code: 'FS_NOT_FOUND', message: `Not found: ${filePath}` };
  if (code === 'EEXIST') return { code: 'FS_ALREADY_EXISTS', message: `Already exists: ${filePath}` };
  if (code === 'EACCES' || code === 'EPERM') return { code: 'FS_PERMISSION_DENIED', message: `Permission denied: ${filePath}` };
  return { code: 'FS_IO_ERROR', message: `FS error at ${filePath}: ${e instanceof Error ? e.message : String(e)}` };
}

function attempt<T>(where: string, run: () => T): Result<T, FsError> {
  try {
    return ok(run());
  } catch (e) {
    return err(mapFsError(e, where));
  }
}

/**
 * Synchronous Node adapter. Every call blocks; nothing is scheduled.
 */
export class NodeFileSystem implements FileSystemPort {
  mkdirp(dirPath: string): Result<void, FsError> {
    return attempt(dirPath, () => {
      fs.mkdirSync(dirPath, { recursive: true });
    });
  }

  exists(filePath: string): boolean {
    return fs.existsSync(filePath);
  }

  readFileUtf8(filePath: string): Result<string, FsError> {
    return attempt(filePath, () => fs.readFileSync(filePath, 'utf8'));
  }

  readFileBytes(filePath: string): Result<Uint8Array, FsError> {
    return attempt(filePath, () => new Uint8Array(fs.readFileSync(filePath)));
  }

  stat(filePath: string): Result<{ readonly sizeBytes: number; readonly isFile: boolean }, FsError> {
    return attempt(filePath, () => {
      const s = fs.statSync(filePath);
      return { sizeBytes: s.size, isFile: s.isFile() };
    });
  }

  openRead(filePath: string): Result<{ readonly fd: number }, FsError> {
    return attempt(filePath, () => ({ fd: fs.openSync(filePath, 'r') }));
  }

  readChunk(fd: number, buffer: Uint8Array, offset: number, length: number): Result<number, FsError> {
    return attempt(`fd:${fd}`, () => fs.readSync(fd, buffer, offset, length, null));
  }

  closeFile(fd: number): Result<void, FsError> {
    return attempt(`fd:${fd}`, () => {
      fs.closeSync(fd);
    });
  }

  writeFileUtf8(filePath: string, text: string): Result<void, FsError> {
    return attempt(filePath, () => {
      fs.writeFileSync(filePath, text, { encoding: 'utf8', mode: 0o600 });
    });
  }

  rename(fromPath: string, toPath: string): Result<void, FsError> {
    return attempt(`${fromPath} -> ${toPath}`, () => {
      fs.renameSync(fromPath, toPath);
    });
  }

  unlink(filePath: string): Result<void, FsError> {
    return attempt(filePath, () => {
      fs.unlinkSync(filePath);
    });
  }
}
