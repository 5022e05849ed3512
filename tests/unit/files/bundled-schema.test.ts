import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, writeFileSync } from 'fs';
import * as path from 'path';
import type { Readable } from 'stream';
import { NodeFileSystem } from '../../../src/files/infra/local/fs/index.js';
import { initializeStorageRoot, LocalStorageRoot } from '../../../src/files/infra/local/storage-root/index.js';
import { LocalJsonBlobStore } from '../../../src/files/infra/local/json-blob-store/index.js';
import { LocalBundledAssets } from '../../../src/files/infra/local/bundled-assets/index.js';
import { LocalBundledSchema } from '../../../src/files/infra/local/bundled-schema/index.js';
import { FakeLogger } from '../../helpers/FakeLogger.js';
import { expectErr, expectOk } from '../../helpers/result-helpers.js';
import { makeTempDir, removeTempDir } from '../../helpers/temp-dir.js';

async function readAll(stream: Readable): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf-8');
}

describe('bundled assets', () => {
  let tempDir: string;
  let assetsDir: string;
  let assets: LocalBundledAssets;

  beforeEach(async () => {
    tempDir = await makeTempDir('refstore-assets');
    assetsDir = path.join(tempDir, 'assets');
    mkdirSync(assetsDir);
    assets = new LocalBundledAssets(assetsDir, new NodeFileSystem());
  });

  afterEach(async () => {
    await removeTempDir(tempDir);
  });

  it('opens and reads an asset by name', async () => {
    writeFileSync(path.join(assetsDir, 'styles.txt'), 'bundled');

    expect(await readAll(expectOk(assets.openAsset('styles.txt'), 'open'))).toBe('bundled');
    expect(Buffer.from(expectOk(assets.readAsset('styles.txt'), 'read')).toString('utf-8')).toBe('bundled');
  });

  it('reports missing assets', () => {
    expect(expectErr(assets.openAsset('missing.json'), 'open missing')).toEqual({
      code: 'ASSET_NOT_FOUND',
      name: 'missing.json',
      message: 'Bundled asset not found: missing.json',
    });
    expect(expectErr(assets.readAsset('missing.json'), 'read missing').code).toBe('ASSET_NOT_FOUND');
  });

  it('does not reach outside the assets directory', () => {
    writeFileSync(path.join(tempDir, 'secret.txt'), 'outside');

    expect(expectErr(assets.readAsset('../secret.txt'), 'read outside').code).toBe('ASSET_NOT_FOUND');
  });
});

describe('bundled schema cache', () => {
  let tempDir: string;
  let assetsDir: string;
  let dataDir: string;
  let logger: FakeLogger;
  let schema: LocalBundledSchema;

  beforeEach(async () => {
    tempDir = await makeTempDir('refstore-schema');
    assetsDir = path.join(tempDir, 'assets');
    dataDir = path.join(tempDir, 'data');
    mkdirSync(assetsDir);
    logger = new FakeLogger();

    const nodeFs = new NodeFileSystem();
    const root = new LocalStorageRoot(
      initializeStorageRoot({ dataDir, cacheBaseDir: path.join(tempDir, 'caches') }, nodeFs, logger.asLogger()),
      nodeFs,
      logger.asLogger()
    );
    schema = new LocalBundledSchema(
      new LocalBundledAssets(assetsDir, nodeFs),
      new LocalJsonBlobStore(root, nodeFs),
      logger.asLogger()
    );
  });

  afterEach(async () => {
    await removeTempDir(tempDir);
  });

  it('loads the bundled schema as a JSON object', () => {
    writeFileSync(path.join(assetsDir, 'schema.json'), '{"version":3,"itemTypes":[{"itemType":"book"}]}');

    expect(schema.loadBundledSchema()).toEqual({ version: 3, itemTypes: [{ itemType: 'book' }] });
  });

  it('returns null when the asset is missing', () => {
    expect(schema.loadBundledSchema()).toBeNull();
    expect(logger.hasEntry('debug', 'Failed to load bundled schema')).toBe(true);
  });

  it('returns null when the asset is not a JSON object', () => {
    writeFileSync(path.join(assetsDir, 'schema.json'), '[1,2,3]');

    expect(schema.loadBundledSchema()).toBeNull();
    expect(logger.hasEntry('debug', 'Bundled schema is not a JSON object')).toBe(true);
  });

  it('returns null when the asset is not UTF-8', () => {
    writeFileSync(path.join(assetsDir, 'schema.json'), Buffer.from([0x7b, 0xff, 0xfe, 0x7d]));

    expect(schema.loadBundledSchema()).toBeNull();
    expect(logger.hasEntry('debug', 'Bundled schema is not UTF-8')).toBe(true);
  });

  it('saves the schema as the schema.json blob and reads it back', () => {
    schema.saveBundledSchema({ version: 4 });

    expect(new NodeFileSystem().readFileUtf8(path.join(dataDir, 'schema.json'))._unsafeUnwrap()).toBe('{"version":4}');
    expect(schema.loadCachedSchema()).toEqual({ version: 4 });
  });

  it('loads no cached schema before one is saved', () => {
    expect(schema.loadCachedSchema()).toBeNull();
  });
});
