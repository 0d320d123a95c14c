import { DocumentSchema, RelationalSchema } from '@schema/types';

export type Row = Record<string, unknown>;

export type TableRows = {
  table: string;
  rows: Row[];
};

export type StorageLocation = {
  backend: string;
  kind: 'table' | 'collection';
  /** Table or collection that receives the top-level records. */
  name: string;
  /** Every table the schema spans, parent first. Relational only. */
  tables?: string[];
};

export const describeLocation = (location: StorageLocation) =>
  `${location.backend}:${location.kind}/${location.name}`;

/**
 * Applies relational schemas. `apply` and `insert` are each a single unit:
 * either every table (or every row, parent tables first) is written or the
 * call fails, and concurrent identical `apply` calls succeed.
 */
export interface RelationalBackend {
  readonly name: string;
  apply(schema: RelationalSchema): Promise<StorageLocation>;
  insert(batches: TableRows[]): Promise<number>;
}

export interface DocumentBackend {
  readonly name: string;
  apply(schema: DocumentSchema): Promise<StorageLocation>;
  insert(collectionName: string, documents: Row[]): Promise<number>;
}
