import config from '@config';
import { IndexPersistenceError } from '@errors/index';
import { logger, metrics } from '@telemetry/index';
import { Mutex, RetryExhaustedError, RetryOptions, retry } from '@utils/async';
import {
  IndexEntry,
  IndexEntryFields,
  IndexFilter,
  IndexPersistence,
  IndexStats,
  IngestKind,
} from './types';

export type MetadataIndexerOptions = {
  now?: () => Date;
  retry?: Partial<RetryOptions>;
  defaultLimit?: number;
};

/**
 * Records one entry per ingestion and answers searches over them. Id assignment
 * is the only serialized step; the write to persistence happens outside the lock.
 */
export class MetadataIndexer {
  private readonly idLock = new Mutex();
  private readonly now: () => Date;
  private readonly retryOptions: Partial<RetryOptions>;
  private readonly defaultLimit: number;

  constructor(private readonly persistence: IndexPersistence, options: MetadataIndexerOptions = {}) {
    this.now = options.now ?? (() => new Date());
    this.retryOptions = {
      maxAttempts: config.storage.applyAttempts,
      initialDelayMs: config.storage.retryDelayMs,
      maxDelayMs: config.storage.maxRetryDelayMs,
      ...options.retry,
    };
    this.defaultLimit = options.defaultLimit ?? config.search.defaultLimit;
  }

  private assignId(): Promise<number> {
    if (this.persistence.sequenced) {
      return this.persistence.nextId();
    }
    return this.idLock.runExclusive(() => this.persistence.nextId());
  }

  async record(fields: IndexEntryFields): Promise<IndexEntry> {
    let id: number;
    try {
      id = await this.assignId();
    } catch (err) {
      throw new IndexPersistenceError('id assignment', fields.filename, err);
    }
    const entry: IndexEntry = Object.freeze({ ...fields, id, createdAt: this.now().toISOString() });
    try {
      await retry(() => this.persistence.append(entry), this.retryOptions);
    } catch (err) {
      throw new IndexPersistenceError(
        'append',
        fields.filename,
        err instanceof RetryExhaustedError ? err.lastError : err,
      );
    }
    metrics.incrementCounter(`indexed_${entry.kind}`);
    logger.info(
      { id, filename: entry.filename, kind: entry.kind, categoryOrSchema: entry.categoryOrSchema },
      'Indexed ingestion',
    );
    return entry;
  }

  search(filter: IndexFilter = {}): Promise<IndexEntry[]> {
    return this.persistence.query({ ...filter, limit: filter.limit ?? this.defaultLimit });
  }

  async stats(): Promise<IndexStats> {
    const entries = await this.persistence.query({});
    const counts: Record<IngestKind, number> = { media: 0, document: 0, json: 0 };
    const categories = new Set<string>();
    const schemas = new Set<string>();
    for (const entry of entries) {
      counts[entry.kind] += 1;
      (entry.kind === 'json' ? schemas : categories).add(entry.categoryOrSchema);
    }
    return {
      total: entries.length,
      counts,
      categories: [...categories].sort(),
      schemas: [...schemas].sort(),
    };
  }
}
