import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';

export async function makeTempDir(prefix: string): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), `${prefix}-`));
}

export async function removeTempDir(dir: string | undefined): Promise<void> {
  if (dir === undefined) return;
  try {
    await fs.rm(dir, { recursive: true, force: true });
  } catch {
    // Ignore cleanup errors
  }
}
