import assert from 'node:assert/strict';
import { test } from './testHarness';
import { createPipeline, type Pipeline } from './helpers/pipeline';
import { delay } from './helpers/deferred';
import { withTempDir } from './helpers/tempDir';
import { sha256Hex } from '../src/domain/track/contentRef';
import { SourceUnavailableError, UnknownCardError } from '../src/domain/errors';
import { isAbortError } from '../src/shared/abort';

const VIDEO = 'track000003';
const SOURCE_KEY = `youtube:${VIDEO}`;

async function withPipeline(fn: (pipeline: Pipeline) => Promise<void>): Promise<void> {
  await withTempDir(async (dir) => {
    let now = 1_000;
    const pipeline = await createPipeline(dir, { now: () => (now += 1) });
    try {
      await fn(pipeline);
    } finally {
      pipeline.close();
    }
  });
}

async function lastPlayedAt(pipeline: Pipeline, cardId: string): Promise<number | null> {
  for (let attempt = 0; attempt < 200; attempt += 1) {
    const record = await pipeline.registry.lookup(cardId);
    if (record?.lastPlayedAt) {
      return record.lastPlayedAt;
    }
    await delay(5);
  }
  return null;
}

async function boundContentRef(pipeline: Pipeline, cardId: string): Promise<string | null> {
  for (let attempt = 0; attempt < 200; attempt += 1) {
    const record = await pipeline.registry.lookup(cardId);
    if (record?.contentRef) {
      return record.contentRef;
    }
    await delay(5);
  }
  return null;
}

test('first tap on an unbound card fetches once, later taps resolve locally', async () => {
  await withPipeline(async (pipeline) => {
    pipeline.downloader.setPayload(VIDEO, 'fallback audio');
    const expected = sha256Hex('fallback audio');

    assert.equal(await pipeline.engine.resolve('A1', VIDEO), expected);
    assert.equal(await pipeline.engine.resolve('A1', VIDEO), expected);
    assert.equal(await pipeline.engine.resolve('A1'), expected);

    assert.equal(pipeline.downloader.openCount(SOURCE_KEY), 1);
    const record = await pipeline.registry.lookup('A1');
    assert.equal(record?.contentRef, expected);
    assert.equal(record?.sourceRef, SOURCE_KEY);
  });
});

test('a bound card never touches the fallback even when a hint is given', async () => {
  await withPipeline(async (pipeline) => {
    const contentRef = await pipeline.store.put(Buffer.from('local audio'));
    await pipeline.registry.upsert('B1', contentRef);

    assert.equal(await pipeline.engine.resolve('B1', 'track000004'), contentRef);
    assert.deepEqual(pipeline.downloader.opened, []);
  });
});

test('an unbound card without a usable hint is unknown', async () => {
  await withPipeline(async (pipeline) => {
    await assert.rejects(
      pipeline.engine.resolve('B2'),
      (error: unknown) => error instanceof UnknownCardError && error.cardId === 'B2',
    );
    await assert.rejects(pipeline.engine.resolve('B2', '   '), UnknownCardError);
    await assert.rejects(pipeline.engine.resolve('B2', null), UnknownCardError);
    assert.deepEqual(pipeline.downloader.opened, []);
    assert.equal(await pipeline.registry.lookup('B2'), null);
  });
});

test('a binding to missing content behaves as unbound', async () => {
  await withPipeline(async (pipeline) => {
    await pipeline.registry.upsert('C3', 'deadbeef');
    await assert.rejects(pipeline.engine.resolve('C3'), UnknownCardError);

    pipeline.downloader.setPayload(VIDEO, 'replacement audio');
    const contentRef = await pipeline.engine.resolve('C3', VIDEO);
    assert.equal(contentRef, sha256Hex('replacement audio'));
    assert.equal((await pipeline.registry.lookup('C3'))?.contentRef, contentRef);
  });
});

test('two cards naming the same source share one download and one payload', async () => {
  await withPipeline(async (pipeline) => {
    pipeline.downloader.setPayload(VIDEO, 'shared audio');
    const release = pipeline.downloader.hold();
    const first = pipeline.engine.resolve('D4', VIDEO);
    const second = pipeline.engine.resolve('E5', `https://www.youtube.com/watch?v=${VIDEO}`);
    await delay(10);
    release();

    const [firstRef, secondRef] = await Promise.all([first, second]);
    assert.equal(firstRef, sha256Hex('shared audio'));
    assert.equal(secondRef, firstRef);
    assert.equal(pipeline.downloader.openCount(SOURCE_KEY), 1);
    assert.equal(await pipeline.registry.countReferences(firstRef), 2);

    const described = await pipeline.engine.describe('D4');
    assert.deepEqual(described?.entry, {
      contentHash: firstRef,
      byteSize: Buffer.byteLength('shared audio'),
      format: 'unknown',
      refCount: 2,
    });
  });
});

test('a failed fallback leaves the registry untouched', async () => {
  await withPipeline(async (pipeline) => {
    pipeline.downloader.setFailure(VIDEO, new Error('geo blocked'));
    await assert.rejects(pipeline.engine.resolve('F6', VIDEO), SourceUnavailableError);
    assert.equal(await pipeline.registry.lookup('F6'), null);
  });
});

test('resolving records the play time', async () => {
  await withPipeline(async (pipeline) => {
    const contentRef = await pipeline.store.put(Buffer.from('played audio'));
    await pipeline.registry.upsert('G7', contentRef);
    assert.equal((await pipeline.registry.lookup('G7'))?.lastPlayedAt, null);

    await pipeline.engine.resolve('G7');
    const playedAt = await lastPlayedAt(pipeline, 'G7');
    assert.ok(playedAt !== null && playedAt > 1_000);
  });
});

test('describe reports unknown cards and bindings without content', async () => {
  await withPipeline(async (pipeline) => {
    assert.equal(await pipeline.engine.describe('nobody'), null);
    await pipeline.registry.upsert('H8', 'deadbeef');
    const described = await pipeline.engine.describe('H8');
    assert.equal(described?.record.contentRef, 'deadbeef');
    assert.equal(described?.entry, null);
  });
});

test('concurrent taps of one new card download once and bind once', async () => {
  await withPipeline(async (pipeline) => {
    pipeline.downloader.setPayload('track000009', 'one card, many taps');
    const release = pipeline.downloader.hold();
    const pending = Array.from({ length: 8 }, () => pipeline.engine.resolve('Z9', 'track000009'));
    await delay(10);
    release();

    const refs = await Promise.all(pending);
    const expected = sha256Hex('one card, many taps');
    assert.deepEqual(new Set(refs), new Set([expected]));
    assert.equal(pipeline.downloader.openCount('youtube:track000009'), 1);
    assert.equal(await pipeline.registry.countReferences(expected), 1);
    const page = await pipeline.registry.list({ limit: 10, offset: 0 });
    assert.deepEqual(
      page.items.map((item) => [item.cardId, item.contentRef]),
      [['Z9', expected]],
    );
  });
});

test('an abandoned resolve still binds the card once the download lands', async () => {
  await withPipeline(async (pipeline) => {
    pipeline.downloader.setPayload('track000008', 'bound after abort');
    const release = pipeline.downloader.hold();
    const controller = new AbortController();
    const pending = pipeline.engine.resolve('Y8', 'track000008', { signal: controller.signal });
    await delay(10);
    controller.abort();
    await assert.rejects(pending, (error: unknown) => isAbortError(error));

    release();
    const expected = sha256Hex('bound after abort');
    assert.equal(await boundContentRef(pipeline, 'Y8'), expected);
    assert.equal(pipeline.downloader.openCount('youtube:track000008'), 1);
  });
});

test('track listings flag cards whose content is gone', async () => {
  await withPipeline(async (pipeline) => {
    const present = await pipeline.store.put(Buffer.from('still here'));
    await pipeline.registry.upsert('P1', present);
    await pipeline.registry.upsert('L1', 'deadbeef');
    await pipeline.registry.upsert('L2', 'cafebabe');

    const all = await pipeline.engine.listTracks({ limit: 10, offset: 0 });
    assert.equal(all.total, 3);
    assert.deepEqual(
      all.items.map((item) => [item.cardId, item.available]),
      [
        ['L2', false],
        ['L1', false],
        ['P1', true],
      ],
    );

    const unavailable = await pipeline.engine.listTracks({ limit: 1, offset: 1, unavailableOnly: true });
    assert.equal(unavailable.total, 2);
    assert.deepEqual(
      unavailable.items.map((item) => item.cardId),
      ['L1'],
    );
  });
});
