import assert from 'node:assert/strict';
import path from 'node:path';
import { test } from './testHarness';
import { withTempDir } from './helpers/tempDir';
import { SqliteTrackRegistry } from '../src/adapters/registry/sqliteTrackRegistry';
import { StorageError } from '../src/domain/errors';

const REF_A = 'a'.repeat(64);
const REF_B = 'b'.repeat(64);

function createClock(start = 1_000): { now: () => number; advance: (ms: number) => void } {
  let current = start;
  return {
    now: () => current,
    advance: (ms) => {
      current += ms;
    },
  };
}

test('registry upsert keeps createdAt and the previous source when omitted', async () => {
  const clock = createClock();
  const registry = new SqliteTrackRegistry(':memory:', clock.now);
  await registry.init();
  try {
    assert.equal(await registry.lookup('A1'), null);

    await registry.upsert('A1', REF_A, 'youtube:dQw4w9WgXcQ');
    assert.deepEqual(await registry.lookup('A1'), {
      cardId: 'A1',
      contentRef: REF_A,
      sourceRef: 'youtube:dQw4w9WgXcQ',
      createdAt: 1_000,
      lastPlayedAt: null,
    });

    clock.advance(500);
    await registry.touch('A1');
    clock.advance(500);
    await registry.upsert('A1', REF_B);
    assert.deepEqual(await registry.lookup('A1'), {
      cardId: 'A1',
      contentRef: REF_B,
      sourceRef: 'youtube:dQw4w9WgXcQ',
      createdAt: 1_000,
      lastPlayedAt: 1_500,
    });
  } finally {
    registry.close();
  }
});

test('touching an unknown card does not create it', async () => {
  const registry = new SqliteTrackRegistry(':memory:');
  await registry.init();
  try {
    await registry.touch('ghost');
    assert.equal(await registry.lookup('ghost'), null);
    assert.equal((await registry.list({ limit: 10, offset: 0 })).total, 0);
  } finally {
    registry.close();
  }
});

test('registry counts references and lists most recently played first', async () => {
  const clock = createClock();
  const registry = new SqliteTrackRegistry(':memory:', clock.now);
  await registry.init();
  try {
    await registry.upsert('old', REF_A);
    clock.advance(10);
    await registry.upsert('new', REF_A);
    clock.advance(10);
    await registry.upsert('played', REF_B);
    clock.advance(10);
    await registry.touch('played');

    assert.equal(await registry.countReferences(REF_A), 2);
    assert.equal(await registry.countReferences(REF_B), 1);
    assert.equal(await registry.countReferences('c'.repeat(64)), 0);

    const page = await registry.list({ limit: 10, offset: 0 });
    assert.equal(page.total, 3);
    assert.deepEqual(
      page.items.map((item) => item.cardId),
      ['played', 'new', 'old'],
    );
    const second = await registry.list({ limit: 1, offset: 1 });
    assert.deepEqual(
      second.items.map((item) => item.cardId),
      ['new'],
    );
  } finally {
    registry.close();
  }
});

test('registry bindings survive a reopen', async () => {
  await withTempDir(async (dir) => {
    const dbPath = path.join(dir, 'nested', 'tapdeck.db');
    const first = new SqliteTrackRegistry(dbPath);
    await first.init();
    await first.upsert('A1', REF_A, 'youtube:dQw4w9WgXcQ');
    first.close();

    const second = new SqliteTrackRegistry(dbPath);
    await second.init();
    try {
      assert.equal((await second.lookup('A1'))?.contentRef, REF_A);
    } finally {
      second.close();
    }
  });
});

test('registry calls before init fail with a storage error', async () => {
  const registry = new SqliteTrackRegistry(':memory:');
  await assert.rejects(
    registry.lookup('A1'),
    (error: unknown) => error instanceof StorageError && error.message === 'track registry not initialized',
  );
});
