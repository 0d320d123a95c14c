import { StorageType } from '@schema/types';

export type IngestKind = 'media' | 'document' | 'json';

export const INGEST_KINDS: readonly IngestKind[] = ['media', 'document', 'json'];

export type IndexEntry = {
  id: number;
  filename: string;
  kind: IngestKind;
  /** Category for media and documents, schema name for JSON. */
  categoryOrSchema: string;
  storageType?: StorageType;
  storageLocation: string;
  createdAt: string;
  mimeType?: string;
  /** Extracted document text, searched by free-text filters. */
  text?: string;
  metadata?: Record<string, unknown>;
};

export type IndexEntryFields = Omit<IndexEntry, 'id' | 'createdAt'>;

export type IndexFilter = {
  kind?: IngestKind;
  categoryOrSchema?: string;
  storageType?: StorageType;
  /** Case-insensitive substring over filename and extracted text. */
  text?: string;
  limit?: number;
};

export type IndexStats = {
  total: number;
  counts: Record<IngestKind, number>;
  categories: string[];
  schemas: string[];
};

/**
 * Storage for index entries. A `sequenced` store hands out ids from an atomic
 * counter of its own (a database sequence); other stores rely on the indexer to
 * serialize `nextId` calls.
 */
export interface IndexPersistence {
  readonly sequenced: boolean;
  nextId(): Promise<number>;
  append(entry: IndexEntry): Promise<void>;
  /** Matching entries, newest first. */
  query(filter: IndexFilter): Promise<IndexEntry[]>;
}

export const matchesFilter = (entry: IndexEntry, filter: IndexFilter) => {
  if (filter.kind && entry.kind !== filter.kind) return false;
  if (filter.categoryOrSchema && entry.categoryOrSchema !== filter.categoryOrSchema) return false;
  if (filter.storageType && entry.storageType !== filter.storageType) return false;
  if (filter.text) {
    const needle = filter.text.toLowerCase();
    const haystacks = [entry.filename, entry.text ?? ''];
    if (!haystacks.some((value) => value.toLowerCase().includes(needle))) return false;
  }
  return true;
};
