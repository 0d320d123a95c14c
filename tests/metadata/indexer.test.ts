import { IndexPersistenceError } from '@errors/index';
import { MetadataIndexer } from '@metadata/indexer';
import { InMemoryIndexStore } from '@metadata/memoryStore';
import { IndexEntry, IndexEntryFields, IndexFilter, IndexPersistence, matchesFilter } from '@metadata/types';
import { sleep } from '@utils/async';
import { NO_DELAY } from '../utils/fakes';

const fields = (filename: string, overrides: Partial<IndexEntryFields> = {}): IndexEntryFields => ({
  filename,
  kind: 'media',
  categoryOrSchema: 'nature',
  storageLocation: `/storage/nature/${filename}`,
  ...overrides,
});

/** Reads the current maximum and writes max + 1 after a pause, so unserialized callers collide. */
class LaggyStore implements IndexPersistence {
  readonly sequenced: boolean;
  entries: IndexEntry[] = [];
  inFlight = 0;
  maxInFlight = 0;
  private highest = 0;

  constructor(sequenced = false) {
    this.sequenced = sequenced;
  }

  async nextId() {
    this.inFlight += 1;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    const current = this.highest;
    await sleep(2);
    this.highest = current + 1;
    this.inFlight -= 1;
    return this.highest;
  }

  async append(entry: IndexEntry) {
    this.entries.push(entry);
  }

  async query(filter: IndexFilter) {
    return this.entries.filter((entry) => matchesFilter(entry, filter));
  }
}

class FlakyStore extends InMemoryIndexStore {
  failures: number;

  constructor(failures: number) {
    super();
    this.failures = failures;
  }

  async append(entry: IndexEntry) {
    if (this.failures > 0) {
      this.failures -= 1;
      throw new Error('index write failed');
    }
    return super.append(entry);
  }
}

describe('Metadata indexer', () => {
  it('assigns ids 1..N to concurrent callers without duplicates or gaps', async () => {
    const store = new LaggyStore();
    const indexer = new MetadataIndexer(store, { retry: NO_DELAY });
    const entries = await Promise.all(
      Array.from({ length: 25 }, (_, index) => indexer.record(fields(`photo-${index}.jpg`))),
    );
    expect(entries.map((entry) => entry.id)).toEqual(Array.from({ length: 25 }, (_, index) => index + 1));
    expect(store.maxInFlight).toBe(1);
  });

  it('leaves id assignment to sequenced stores', async () => {
    const store = new LaggyStore(true);
    const indexer = new MetadataIndexer(store, { retry: NO_DELAY });
    await Promise.all([indexer.record(fields('a.jpg')), indexer.record(fields('b.jpg'))]);
    expect(store.maxInFlight).toBe(2);
  });

  it('stamps entries with the injected clock and freezes them', async () => {
    const indexer = new MetadataIndexer(new InMemoryIndexStore(), {
      now: () => new Date('2024-01-01T00:00:00Z'),
    });
    const entry = await indexer.record(fields('a.jpg', { mimeType: 'image/jpeg' }));
    expect(entry).toEqual({
      id: 1,
      filename: 'a.jpg',
      kind: 'media',
      categoryOrSchema: 'nature',
      storageLocation: '/storage/nature/a.jpg',
      mimeType: 'image/jpeg',
      createdAt: '2024-01-01T00:00:00.000Z',
    });
    expect(Object.isFrozen(entry)).toBe(true);
  });

  it('retries failed appends', async () => {
    const store = new FlakyStore(2);
    const indexer = new MetadataIndexer(store, { retry: NO_DELAY });
    const entry = await indexer.record(fields('a.jpg'));
    expect(await indexer.search()).toEqual([entry]);
  });

  it('raises IndexPersistenceError when appends keep failing', async () => {
    const indexer = new MetadataIndexer(new FlakyStore(10), { retry: NO_DELAY });
    await expect(indexer.record(fields('a.jpg'))).rejects.toMatchObject({
      name: 'IndexPersistenceError',
      context: { operation: 'append', filename: 'a.jpg', reason: 'index write failed' },
    });
    await expect(indexer.record(fields('b.jpg'))).rejects.toBeInstanceOf(IndexPersistenceError);
  });

  it('searches newest first with a default limit', async () => {
    const indexer = new MetadataIndexer(new InMemoryIndexStore());
    for (let index = 0; index < 25; index++) {
      await indexer.record(fields(`photo-${index}.jpg`));
    }
    const results = await indexer.search();
    expect(results).toHaveLength(20);
    expect(results[0].id).toBe(25);
    expect(results[19].id).toBe(6);
    expect(await indexer.search({ limit: 3 })).toHaveLength(3);
  });

  it('filters by kind, category, storage type and text', async () => {
    const indexer = new MetadataIndexer(new InMemoryIndexStore());
    await indexer.record(fields('forest.jpg'));
    await indexer.record(fields('cat.png', { categoryOrSchema: 'animals' }));
    await indexer.record(
      fields('orders.json', { kind: 'json', categoryOrSchema: 'json_data_abc', storageType: 'sql' }),
    );
    await indexer.record(
      fields('notes.txt', { kind: 'document', categoryOrSchema: 'food', text: 'Recipes for Pasta night' }),
    );

    expect((await indexer.search({ kind: 'media' })).map((entry) => entry.filename)).toEqual(['cat.png', 'forest.jpg']);
    expect((await indexer.search({ categoryOrSchema: 'animals' })).map((entry) => entry.id)).toEqual([2]);
    expect((await indexer.search({ storageType: 'sql' })).map((entry) => entry.id)).toEqual([3]);
    expect((await indexer.search({ text: 'pasta' })).map((entry) => entry.id)).toEqual([4]);
    expect((await indexer.search({ text: 'FOREST' })).map((entry) => entry.id)).toEqual([1]);
  });

  it('summarizes the index', async () => {
    const indexer = new MetadataIndexer(new InMemoryIndexStore());
    await indexer.record(fields('b.jpg', { categoryOrSchema: 'nature' }));
    await indexer.record(fields('a.jpg', { categoryOrSchema: 'animals' }));
    await indexer.record(fields('c.jpg', { categoryOrSchema: 'nature' }));
    await indexer.record(fields('d.json', { kind: 'json', categoryOrSchema: 'json_data_x', storageType: 'nosql' }));
    expect(await indexer.stats()).toEqual({
      total: 4,
      counts: { media: 3, document: 0, json: 1 },
      categories: ['animals', 'nature'],
      schemas: ['json_data_x'],
    });
  });
});
