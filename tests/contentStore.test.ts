import assert from 'node:assert/strict';
import { createHash } from 'node:crypto';
import fs from 'node:fs/promises';
import path from 'node:path';
import { Readable } from 'node:stream';
import { test } from './testHarness';
import { withTempDir } from './helpers/tempDir';
import { failingStream, readAll } from './helpers/streams';
import { FileContentStore } from '../src/adapters/storage/fileContentStore';
import { formatTagFromContainer } from '../src/adapters/storage/audioFormat';
import {
  ContentNotFoundError,
  SourceUnavailableError,
  StorageError,
} from '../src/domain/errors';

const sha256 = (bytes: Buffer): string => createHash('sha256').update(bytes).digest('hex');

async function openStore(dir: string): Promise<FileContentStore> {
  const store = new FileContentStore(path.join(dir, 'content'));
  await store.init();
  return store;
}

test('content store returns exactly the bytes that were put', async () => {
  await withTempDir(async (dir) => {
    const store = await openStore(dir);
    const large = Buffer.alloc(3 * 1024 * 1024);
    for (let i = 0; i < large.length; i += 1) {
      large[i] = i % 251;
    }
    for (const payload of [Buffer.from('tapdeck sample'), Buffer.alloc(0), large]) {
      const ref = await store.put(payload);
      assert.equal(ref, sha256(payload));
      const { entry, stream } = await store.get(ref);
      assert.equal(entry.byteSize, payload.length);
      assert.ok((await readAll(stream)).equals(payload));
    }
  });
});

test('putting identical bytes twice stores one payload', async () => {
  await withTempDir(async (dir) => {
    const store = await openStore(dir);
    const payload = Buffer.from('same bytes twice');
    const first = await store.put(payload);
    const second = await store.put(payload);
    assert.equal(first, second);

    const shard = path.join(dir, 'content', 'objects', first.slice(0, 2));
    assert.deepEqual((await fs.readdir(shard)).sort(), [first, `${first}.json`]);
    assert.deepEqual(await fs.readdir(path.join(dir, 'content', 'tmp')), []);
  });
});

test('streams are hashed while written and publish the same reference', async () => {
  await withTempDir(async (dir) => {
    const store = await openStore(dir);
    const ref = await store.putStream(Readable.from([Buffer.from('part one, '), Buffer.from('part two')]));
    assert.equal(ref, sha256(Buffer.from('part one, part two')));
    assert.equal(await store.put(Buffer.from('part one, part two')), ref);
    const entry = await store.describe(ref);
    assert.deepEqual(entry, { contentHash: ref, byteSize: 18, format: 'unknown', refCount: 0 });
  });
});

test('a failing source stream leaves nothing behind', async () => {
  await withTempDir(async (dir) => {
    const store = await openStore(dir);
    const sourceError = new SourceUnavailableError('youtube:failfailfai', 'connection reset');
    await assert.rejects(store.putStream(failingStream('partial', sourceError)), (error: unknown) => error === sourceError);
    await assert.rejects(store.putStream(failingStream('partial', new Error('disk gone'))), (error: unknown) => {
      return error instanceof StorageError && error.message === 'content write failed: disk gone';
    });

    assert.deepEqual(await fs.readdir(path.join(dir, 'content', 'tmp')), []);
    assert.deepEqual(await fs.readdir(path.join(dir, 'content', 'objects')), []);
    assert.equal(await store.exists(sha256(Buffer.from('partial'))), false);
  });
});

test('missing and malformed references are absent', async () => {
  await withTempDir(async (dir) => {
    const store = await openStore(dir);
    const missing = sha256(Buffer.from('never stored'));
    for (const ref of [missing, '../../etc/passwd', 'NOT-A-HASH', '']) {
      assert.equal(await store.exists(ref), false, ref);
      assert.equal(await store.describe(ref), null, ref);
      await assert.rejects(
        store.get(ref),
        (error: unknown) => error instanceof ContentNotFoundError && error.kind === 'content-missing',
      );
    }
    assert.equal(store.pathFor('../../etc/passwd'), null);
    assert.equal(store.pathFor(missing), path.join(dir, 'content', 'objects', missing.slice(0, 2), missing));
  });
});

test('init removes temporary files left by an interrupted write', async () => {
  await withTempDir(async (dir) => {
    const store = await openStore(dir);
    const tmpDir = path.join(dir, 'content', 'tmp');
    await fs.writeFile(path.join(tmpDir, 'interrupted.part'), 'half a download');
    await store.init();
    assert.deepEqual(await fs.readdir(tmpDir), []);
  });
});

test('container labels map to short format tags', () => {
  assert.equal(formatTagFromContainer('MPEG'), 'mpeg');
  assert.equal(formatTagFromContainer('EBML/webm'), 'webm');
  assert.equal(formatTagFromContainer('M4A/isom/iso2'), 'm4a');
  assert.equal(formatTagFromContainer('WAVE'), 'wav');
  assert.equal(formatTagFromContainer('Ogg'), 'ogg');
  assert.equal(formatTagFromContainer('ADTS'), 'aac');
  assert.equal(formatTagFromContainer(undefined), 'unknown');
  assert.equal(formatTagFromContainer('  '), 'unknown');
});
