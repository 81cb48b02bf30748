import { describe, it, expect, beforeEach } from 'vitest';
import { Firestore } from '@google-cloud/firestore';
import { createFirestoreCacheEntryRepository } from './firestore-cache-entry.repository.js';

describe('FirestoreCacheEntryRepository (integration)', () => {
  const db = new Firestore({ projectId: 'crosscheck-test' });
  const repo = createFirestoreCacheEntryRepository(db, 'cache-entries-test');

  beforeEach(async () => {
    const docs = await db.collection('cache-entries-test').listDocuments();
    for (const doc of docs) {
      await doc.delete();
    }
  });

  it('should return null for a cache miss', async () => {
    expect(await repo.get('news-events:nothing:000000000000')).toBeNull();
  });

  it('should store and retrieve an entry', async () => {
    await repo.put({
      key: 'news-events:gazprom:abc123abc123',
      payload: { records: [{ title: 'Export volumes fall', tags: ['energy'] }], sourceUrl: 'https://news.example.org' },
      createdAt: new Date('2024-05-01T10:00:00Z'),
      ttlSeconds: 600,
      sourceTag: 'news-events',
    });

    const result = await repo.get('news-events:gazprom:abc123abc123');
    expect(result?.payload).toEqual({
      records: [{ title: 'Export volumes fall', tags: ['energy'] }],
      sourceUrl: 'https://news.example.org',
    });
    expect(result?.createdAt.toISOString()).toBe('2024-05-01T10:00:00.000Z');
  });

  it('should not replace a newer entry', async () => {
    const base = {
      key: 'k',
      ttlSeconds: 60,
      sourceTag: 'news-events',
    };
    await repo.put({ ...base, payload: { records: [{ v: 'new' }] }, createdAt: new Date('2024-05-02T00:00:00Z') });
    const written = await repo.put({
      ...base,
      payload: { records: [{ v: 'old' }] },
      createdAt: new Date('2024-05-01T00:00:00Z'),
    });

    expect(written).toBe(false);
    expect((await repo.get('k'))?.payload.records).toEqual([{ v: 'new' }]);
  });

  it('should invalidate by source tag', async () => {
    const createdAt = new Date();
    await repo.put({ key: 'a', payload: { records: [] }, createdAt, ttlSeconds: 60, sourceTag: 'news-events' });
    await repo.put({ key: 'b', payload: { records: [] }, createdAt, ttlSeconds: 60, sourceTag: 'sanctions-registry' });

    expect(await repo.deleteBySource('news-events')).toEqual(['a']);
    expect((await repo.stats()).entryCount).toBe(1);
  });
});
