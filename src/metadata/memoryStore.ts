import { IndexEntry, IndexFilter, IndexPersistence, matchesFilter } from './types';

export class InMemoryIndexStore implements IndexPersistence {
  readonly sequenced = false;
  private entries: IndexEntry[] = [];
  private highestId = 0;

  async nextId() {
    this.highestId += 1;
    return this.highestId;
  }

  async append(entry: IndexEntry) {
    this.entries.push({ ...entry });
    this.highestId = Math.max(this.highestId, entry.id);
  }

  async query(filter: IndexFilter) {
    const matches = this.entries
      .filter((entry) => matchesFilter(entry, filter))
      .sort((a, b) => b.id - a.id);
    return (filter.limit === undefined ? matches : matches.slice(0, filter.limit)).map((entry) => ({
      ...entry,
    }));
  }
}
