import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, readFileSync, readdirSync, writeFileSync, mkdirSync } from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { NodeFileSystem } from '../../../src/files/infra/local/fs/index.js';
import { initializeStorageRoot, LocalStorageRoot } from '../../../src/files/infra/local/storage-root/index.js';
import { LocalJsonBlobStore } from '../../../src/files/infra/local/json-blob-store/index.js';
import { listCodec, objectCodec } from '../../../src/files/durable-core/marshal/index.js';
import { FakeLogger } from '../../helpers/FakeLogger.js';
import { expectErr, expectOk } from '../../helpers/result-helpers.js';
import { makeTempDir, removeTempDir } from '../../helpers/temp-dir.js';

const NAMES = listCodec(z.string());

describe('JSON blob store', () => {
  let tempDir: string;
  let dataDir: string;
  let store: LocalJsonBlobStore;

  beforeEach(async () => {
    tempDir = await makeTempDir('refstore-blobs');
    dataDir = path.join(tempDir, 'data');

    const nodeFs = new NodeFileSystem();
    const logger = new FakeLogger().asLogger();
    const root = new LocalStorageRoot(
      initializeStorageRoot({ dataDir, cacheBaseDir: path.join(tempDir, 'caches') }, nodeFs, logger),
      nodeFs,
      logger
    );
    store = new LocalJsonBlobStore(root, nodeFs);
  });

  afterEach(async () => {
    await removeTempDir(tempDir);
  });

  it('reads null when nothing was saved', () => {
    expect(store.exists('names')).toBe(false);
    expect(expectOk(store.read('names', NAMES), 'read missing')).toBeNull();
  });

  it('writes one JSON value per file and reads it back', () => {
    expectOk(store.write('names', NAMES, ['a', 'b']), 'write');

    expect(readFileSync(path.join(dataDir, 'names'), 'utf-8')).toBe('["a","b"]');
    expect(existsSync(path.join(dataDir, 'names.tmp'))).toBe(false);
    expect(store.exists('names')).toBe(true);
    expect(expectOk(store.read('names', NAMES), 'read')).toEqual(['a', 'b']);
  });

  it('replaces the previous value on write', () => {
    expectOk(store.write('names', NAMES, ['a']), 'first write');
    expectOk(store.write('names', NAMES, ['b', 'c']), 'second write');

    expect(expectOk(store.read('names', NAMES), 'read')).toEqual(['b', 'c']);
  });

  it('skips null and undefined values', () => {
    expectOk(store.write('names', NAMES, null), 'write null');
    expectOk(store.write('names', NAMES, undefined), 'write undefined');

    expect(store.exists('names')).toBe(false);
  });

  it('reports a truncated blob as a deserialization error', () => {
    writeFileSync(path.join(dataDir, 'names'), '["a", "b"');

    const error = expectErr(store.read('names', NAMES), 'read truncated');
    expect(error.code).toBe('BLOB_DESERIALIZATION_ERROR');
    expect(error.name).toBe('names');
  });

  it('reports a blob of the wrong shape as a deserialization error', () => {
    writeFileSync(path.join(dataDir, 'names'), '{"a":1}');

    expect(expectErr(store.read('names', NAMES), 'read wrong shape').code).toBe('BLOB_DESERIALIZATION_ERROR');
  });

  it('reports an unreadable blob as a read error', () => {
    mkdirSync(path.join(dataDir, 'names'));

    expect(expectErr(store.read('names', NAMES), 'read directory').code).toBe('BLOB_IO_READ_ERROR');
  });

  it('reports values JSON cannot represent as encode errors', () => {
    const codec = objectCodec(z.unknown());

    expect(expectErr(store.write('big', codec, 10n), 'write bigint').code).toBe('BLOB_ENCODE_ERROR');
    expect(store.exists('big')).toBe(false);
  });

  it('refuses values the codec schema rejects without touching the file', () => {
    expectOk(store.write('names', NAMES, ['a']), 'write');

    const error = expectErr(store.write('names', listCodec(z.string().min(2)), ['ok', 'x']), 'write short name');
    expect(error).toEqual({
      code: 'BLOB_ENCODE_ERROR',
      name: 'names',
      message: 'Value does not match list at 1: String must contain at least 2 character(s)',
    });
    expect(readFileSync(path.join(dataDir, 'names'), 'utf-8')).toBe('["a"]');
  });

  it('reports a failed replace as a write error and removes the tmp file', () => {
    mkdirSync(path.join(dataDir, 'names'));

    const error = expectErr(store.write('names', NAMES, ['a']), 'write over directory');
    expect(error.code).toBe('BLOB_IO_WRITE_ERROR');
    expect(error.name).toBe('names');
    expect(existsSync(path.join(dataDir, 'names.tmp'))).toBe(false);
  });

  it('treats the empty name as absent for every operation', () => {
    expectOk(store.write('', NAMES, ['a']), 'write empty name');

    expect(readdirSync(dataDir)).toEqual([]);
    expect(store.exists('')).toBe(false);
    expect(expectOk(store.read('', NAMES), 'read empty name')).toBeNull();
  });

  it('removes blobs, and treats removing a missing blob as success', () => {
    expectOk(store.write('names', NAMES, ['a']), 'write');

    expectOk(store.remove('names'), 'remove');
    expect(store.exists('names')).toBe(false);
    expectOk(store.remove('names'), 'remove again');
    expectOk(store.remove(''), 'remove empty name');
  });
});
