import { v4 as uuidv4 } from 'uuid';
import { isJsonObject, leafName } from '@analyzer/types';
import { VALUE_COLUMN, flattenTables } from '@schema/relational';
import { Column, RelationalSchema } from '@schema/types';
import { setOwn } from '@utils/objects';
import { Row } from './types';

export type KeyFactory = () => string;

const columnValue = (column: Column, value: unknown) => {
  if (value === undefined || value === null) return null;
  if (column.fallback === 'json_text') return JSON.stringify(value);
  return value;
};

/**
 * Splits records into per-table rows following a relational schema. Generated
 * keys come from `newKey`, so parent and child rows are linked before any round
 * trip to the database.
 */
export const shredRecords = (
  schema: RelationalSchema,
  records: readonly unknown[],
  newKey: KeyFactory = uuidv4,
): Map<string, Row[]> => {
  const rowsByTable = new Map<string, Row[]>(
    flattenTables(schema).map((table) => [table.tableName, []]),
  );

  const emit = (table: RelationalSchema, value: unknown, parentKey?: unknown) => {
    if (table.rowShape === 'object' && !isJsonObject(value)) return;
    const row: Row = {};
    for (const column of table.columns) {
      if (column.primaryKey) {
        setOwn<unknown>(row, column.name, newKey());
      } else if (column.foreignKey) {
        setOwn<unknown>(row, column.name, parentKey ?? null);
      } else if (table.rowShape === 'scalar' && column.name === VALUE_COLUMN) {
        setOwn<unknown>(row, column.name, columnValue(column, value));
      } else if (column.source !== undefined && isJsonObject(value)) {
        setOwn<unknown>(row, column.name, columnValue(column, value[column.source]));
      }
    }
    rowsByTable.get(table.tableName)?.push(row);

    if (!isJsonObject(value)) return;
    const ownKey = row[table.primaryKey];
    for (const nested of table.nestedTables) {
      const child = value[leafName(nested.parentField ?? '')];
      if (nested.isArray && Array.isArray(child)) {
        child.forEach((item) => emit(nested, item, ownKey));
      } else if (!nested.isArray && isJsonObject(child)) {
        emit(nested, child, ownKey);
      }
    }
  };

  records.forEach((record) => emit(schema, record));
  return rowsByTable;
};
