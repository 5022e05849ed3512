import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, writeFileSync } from 'fs';
import * as path from 'path';
import { pathToFileURL } from 'url';
import type { Readable } from 'stream';
import { NodeFileSystem } from '../../../src/files/infra/local/fs/index.js';
import { LocalContentInspector } from '../../../src/files/infra/local/content-inspector/index.js';
import { LocalContentResolver, PDF_MIME_TYPE } from '../../../src/files/infra/local/content-resolver/index.js';
import { FakeLogger } from '../../helpers/FakeLogger.js';
import { makeTempDir, removeTempDir } from '../../helpers/temp-dir.js';

async function readAll(stream: Readable): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf-8');
}

describe('local content resolver', () => {
  let tempDir: string;
  let resolver: LocalContentResolver;

  beforeEach(async () => {
    tempDir = await makeTempDir('refstore-resolver');
    const nodeFs = new NodeFileSystem();
    const logger = new FakeLogger().asLogger();
    resolver = new LocalContentResolver(nodeFs, new LocalContentInspector(nodeFs, logger), logger);
  });

  afterEach(async () => {
    await removeTempDir(tempDir);
  });

  function file(name: string, content: string): string {
    const filePath = path.join(tempDir, name);
    writeFileSync(filePath, content);
    return filePath;
  }

  it('reports the size of plain paths and file URLs', () => {
    const filePath = file('notes.txt', 'twelve bytes');

    expect(resolver.size(filePath)).toBe(12);
    expect(resolver.size(pathToFileURL(filePath).href)).toBe(12);
  });

  it('reports PDFs by magic bytes and nothing else', () => {
    expect(resolver.mimeType(file('paper', '%PDF-1.5'))).toBe(PDF_MIME_TYPE);
    expect(resolver.mimeType(file('notes.txt', 'hello'))).toBeNull();
  });

  it('opens a stream over the file content', async () => {
    const stream = resolver.openStream(file('notes.txt', 'stream me'));

    expect(stream).not.toBeNull();
    if (stream === null) return;
    expect(await readAll(stream)).toBe('stream me');
  });

  it('answers null for unresolvable handles', () => {
    const missing = path.join(tempDir, 'missing');
    const dir = path.join(tempDir, 'folder');
    mkdirSync(dir);

    for (const handle of ['', missing, dir, 'file://remote-host/share/x.pdf']) {
      expect(resolver.size(handle)).toBeNull();
      expect(resolver.mimeType(handle)).toBeNull();
      expect(resolver.openStream(handle)).toBeNull();
    }
  });
});
