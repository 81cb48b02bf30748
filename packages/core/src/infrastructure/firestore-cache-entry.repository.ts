import { createHash } from 'node:crypto';
import type { CollectionReference, DocumentData, Firestore } from '@google-cloud/firestore';
import { Timestamp } from '@google-cloud/firestore';
import { z } from 'zod';
import type { CacheEntry, CacheStoreStats } from '@crosscheck/shared/src/types/cache.types.js';
import { createChildLogger } from '@crosscheck/shared/src/logger.js';
import { PersistenceError } from '@crosscheck/shared/src/utils/errors.js';
import { SourcePayloadSchema } from '@crosscheck/schemas/src/source-payload.schema.js';
import type { CacheEntryRepository } from '../repositories/cache-entry.repository.js';
import { payloadSize, summarizeEntries } from '../repositories/cache-stats.js';

const log = createChildLogger('firestore:cache-entries');

const DEFAULT_COLLECTION = 'cache-entries';
const BATCH_LIMIT = 400;

const CacheDocumentSchema = z.object({
  key: z.string(),
  sourceTag: z.string(),
  payload: z.string(),
  createdAt: z.instanceof(Timestamp),
  ttlSeconds: z.number(),
  sizeBytes: z.number(),
});

type CacheDocument = z.infer<typeof CacheDocumentSchema>;

function docIdFor(key: string): string {
  return createHash('sha256').update(key).digest('hex');
}

function toDoc(entry: CacheEntry): CacheDocument {
  return {
    key: entry.key,
    sourceTag: entry.sourceTag,
    payload: JSON.stringify(entry.payload),
    createdAt: Timestamp.fromDate(entry.createdAt),
    ttlSeconds: entry.ttlSeconds,
    sizeBytes: payloadSize(entry),
  };
}

function parseDoc(id: string, data: DocumentData | undefined): CacheDocument | null {
  const result = CacheDocumentSchema.safeParse(data);
  if (!result.success) {
    log.warn({ docId: id, issues: result.error.errors.length }, 'Ignoring malformed cache document');
    return null;
  }
  return result.data;
}

function fromDoc(id: string, doc: CacheDocument): CacheEntry | null {
  const payload = SourcePayloadSchema.safeParse(JSON.parse(doc.payload));
  if (!payload.success) {
    log.warn({ docId: id, key: doc.key }, 'Ignoring cache document with malformed payload');
    return null;
  }
  return {
    key: doc.key,
    sourceTag: doc.sourceTag,
    payload: payload.data,
    createdAt: doc.createdAt.toDate(),
    ttlSeconds: doc.ttlSeconds,
  };
}

async function deleteInBatches(
  db: Firestore,
  collectionRef: CollectionReference,
  sourceTag?: string,
): Promise<string[]> {
  const query = sourceTag === undefined ? collectionRef : collectionRef.where('sourceTag', '==', sourceTag);
  const snapshot = await query.get();
  const removed: string[] = [];

  for (let i = 0; i < snapshot.docs.length; i += BATCH_LIMIT) {
    const batch = db.batch();
    for (const doc of snapshot.docs.slice(i, i + BATCH_LIMIT)) {
      const parsed = parseDoc(doc.id, doc.data());
      batch.delete(doc.ref);
      if (parsed) {
        removed.push(parsed.key);
      }
    }
    await batch.commit();
  }

  return removed;
}

export function createFirestoreCacheEntryRepository(
  db: Firestore,
  collection: string = DEFAULT_COLLECTION,
): CacheEntryRepository {
  const collectionRef = db.collection(collection);

  async function guarded<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      const cause = error instanceof Error ? error : undefined;
      throw new PersistenceError(`Cache ${operation} failed: ${cause?.message ?? String(error)}`, cause);
    }
  }

  return {
    get(key: string): Promise<CacheEntry | null> {
      return guarded('read', async () => {
        const doc = await collectionRef.doc(docIdFor(key)).get();
        if (!doc.exists) {
          return null;
        }
        const parsed = parseDoc(doc.id, doc.data());
        return parsed ? fromDoc(doc.id, parsed) : null;
      });
    },

    put(entry: CacheEntry): Promise<boolean> {
      return guarded('write', () =>
        db.runTransaction(async (tx) => {
          const ref = collectionRef.doc(docIdFor(entry.key));
          const existing = await tx.get(ref);
          const current = existing.exists ? parseDoc(existing.id, existing.data()) : null;

          if (current && current.createdAt.toMillis() > entry.createdAt.getTime()) {
            log.debug({ key: entry.key }, 'Skipping cache write older than stored entry');
            return false;
          }

          tx.set(ref, toDoc(entry));
          return true;
        }),
      );
    },

    delete(key: string): Promise<boolean> {
      return guarded('delete', async () => {
        const ref = collectionRef.doc(docIdFor(key));
        const doc = await ref.get();
        if (!doc.exists) {
          return false;
        }
        await ref.delete();
        return true;
      });
    },

    deleteBySource(sourceTag?: string): Promise<readonly string[]> {
      return guarded('invalidation', async () => {
        const removed = await deleteInBatches(db, collectionRef, sourceTag);
        log.info({ sourceTag: sourceTag ?? '*', removed: removed.length }, 'Durable cache entries removed');
        return removed;
      });
    },

    stats(): Promise<CacheStoreStats> {
      return guarded('stats', async () => {
        const snapshot = await collectionRef.select('sourceTag', 'createdAt', 'sizeBytes').get();
        const rows = snapshot.docs.flatMap((doc) => {
          const data = doc.data();
          const createdAt = data['createdAt'];
          const sourceTag = data['sourceTag'];
          const sizeBytes = data['sizeBytes'];
          if (!(createdAt instanceof Timestamp) || typeof sourceTag !== 'string' || typeof sizeBytes !== 'number') {
            return [];
          }
          return [{ createdAt: createdAt.toDate(), sourceTag, sizeBytes }];
        });
        return summarizeEntries(rows);
      });
    },
  };
}
