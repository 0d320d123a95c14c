import { FieldType, Pattern } from '@analyzer/types';

export type StorageType = 'sql' | 'nosql';

export type SqlType = 'UUID' | 'TEXT' | 'BIGINT' | 'DOUBLE PRECISION' | 'BOOLEAN';

export type ForeignKey = {
  table: string;
  column: string;
};

export type Column = {
  name: string;
  type: SqlType;
  nullable: boolean;
  primaryKey: boolean;
  foreignKey?: ForeignKey;
  /** Descriptive only; never changes `type`. */
  pattern?: Pattern;
  /** Raw key in the owning JSON object; absent on system columns. */
  source?: string;
  /** Set when the value is stored as JSON text because its type is not stable. */
  fallback?: 'json_text';
};

export type Relationship = {
  type: 'one-to-one' | 'one-to-many';
  fromTable: string;
  fromColumn: string;
  toTable: string;
  toColumn: string;
  /** Field path in the source records that produced the relationship. */
  field: string;
};

export type RelationalSchema = {
  kind: 'relational';
  tableName: string;
  primaryKey: string;
  columns: Column[];
  nestedTables: RelationalSchema[];
  /** Relationships from this table's nested tables back to it. */
  relationships: Relationship[];
  /** `object` rows map JSON objects; `scalar` rows hold one array element in `value`. */
  rowShape: 'object' | 'scalar';
  parentField?: string;
  isArray?: boolean;
};

export type DocumentField = {
  type: FieldType;
  nested: boolean;
  itemType?: FieldType;
  fields?: FieldStructure;
};

export type FieldStructure = Record<string, DocumentField>;

export type DocumentSchema = {
  kind: 'document';
  collectionName: string;
  fieldStructure: FieldStructure;
};

export type StorageSchema = RelationalSchema | DocumentSchema;
