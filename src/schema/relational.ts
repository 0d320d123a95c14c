import {
  FieldProfile,
  FieldType,
  StructuralDescriptor,
  directChildren,
  leafName,
} from '@analyzer/types';
import { DEFAULT_MAX_IDENTIFIER_LENGTH, IdentifierScope, fitIdentifier, normalizeIdentifier } from './naming';
import { Column, ForeignKey, Relationship, RelationalSchema, SqlType } from './types';

export const PRIMARY_KEY = 'id';
export const VALUE_COLUMN = 'value';

export type RelationalBuildOptions = {
  maxIdentifierLength?: number;
};

type TableContext = {
  tableName: string;
  /** Path whose children become this table's columns; '' for the root. */
  containerPath: string;
  viaArray: boolean;
  parent?: { tableName: string; primaryKey: Column };
  parentField?: string;
  rowShape: 'object' | 'scalar';
  elementProfile?: FieldProfile;
};

export const sqlTypeFor = (type: FieldType | undefined, integer?: boolean): SqlType => {
  switch (type) {
    case 'number':
      return integer ? 'BIGINT' : 'DOUBLE PRECISION';
    case 'boolean':
      return 'BOOLEAN';
    default:
      return 'TEXT';
  }
};

const STABLE_SCALARS: ReadonlySet<FieldType | undefined> = new Set<FieldType | undefined>([
  'string',
  'number',
  'boolean',
  'null',
]);

const foreignKeyName = (parentTable: string, parentKey: string, max: number) =>
  fitIdentifier(`${parentTable}_${parentKey}`, max);

class RelationalBuilder {
  private readonly paths: string[];
  private readonly tableNames: IdentifierScope;

  constructor(private readonly descriptor: StructuralDescriptor, private readonly max: number) {
    this.paths = Object.keys(descriptor.fields);
    this.tableNames = new IdentifierScope(max);
  }

  buildRoot(tableName: string) {
    return this.buildTable({
      tableName: this.tableNames.claim(fitIdentifier(normalizeIdentifier(tableName), this.max)),
      containerPath: '',
      viaArray: false,
      rowShape: 'object',
    });
  }

  private buildTable(ctx: TableContext): RelationalSchema {
    const children =
      ctx.rowShape === 'object' ? directChildren(this.paths, ctx.containerPath, ctx.viaArray) : [];
    // A record's own `id` stays a data column (`data_id`) so that one field
    // set always maps to one table layout.
    const primaryKey: Column = { name: PRIMARY_KEY, type: 'UUID', nullable: false, primaryKey: true };

    const columns: Column[] = [primaryKey];
    const reserved = [PRIMARY_KEY];
    if (ctx.parent) {
      const foreignKey: ForeignKey = { table: ctx.parent.tableName, column: ctx.parent.primaryKey.name };
      const foreignKeyColumn: Column = {
        name: foreignKeyName(ctx.parent.tableName, ctx.parent.primaryKey.name, this.max),
        type: ctx.parent.primaryKey.type,
        nullable: false,
        primaryKey: false,
        foreignKey,
      };
      columns.push(foreignKeyColumn);
      reserved.push(foreignKeyColumn.name);
    }
    if (ctx.rowShape === 'scalar') {
      reserved.push(VALUE_COLUMN);
      columns.push(this.valueColumn(ctx.elementProfile));
    }

    const columnNames = new IdentifierScope(this.max, reserved);
    const nestedTables: RelationalSchema[] = [];
    const relationships: Relationship[] = [];

    for (const path of children) {
      const profile = this.descriptor.fields[path];
      const key = leafName(path);

      if (profile.inferredType === 'object' || profile.inferredType === 'array') {
        const nested = this.buildNested(ctx, path, profile, primaryKey);
        nestedTables.push(nested);
        relationships.push({
          type: nested.isArray ? 'one-to-many' : 'one-to-one',
          fromTable: nested.tableName,
          fromColumn: foreignKeyName(ctx.tableName, primaryKey.name, this.max),
          toTable: ctx.tableName,
          toColumn: primaryKey.name,
          field: path,
        });
        continue;
      }

      const column: Column = {
        name: columnNames.allocate(key),
        type: profile.inferredType === 'mixed' ? 'TEXT' : sqlTypeFor(profile.inferredType, profile.integer),
        nullable: profile.inferredType === 'mixed' ? true : profile.nullable,
        primaryKey: false,
        source: key,
      };
      if (profile.inferredType === 'mixed') {
        column.fallback = 'json_text';
      }
      if (profile.pattern) {
        column.pattern = profile.pattern;
      }
      columns.push(column);
    }

    const table: RelationalSchema = {
      kind: 'relational',
      tableName: ctx.tableName,
      primaryKey: primaryKey.name,
      columns,
      nestedTables,
      relationships,
      rowShape: ctx.rowShape,
    };
    if (ctx.parentField !== undefined) {
      table.parentField = ctx.parentField;
      table.isArray = ctx.viaArray;
    }
    return table;
  }

  private buildNested(
    ctx: TableContext,
    path: string,
    profile: FieldProfile,
    parentKey: Column,
  ): RelationalSchema {
    const tableName = this.tableNames.allocate(`${ctx.tableName}_${leafName(path)}`);
    const parent = { tableName: ctx.tableName, primaryKey: parentKey };
    if (profile.inferredType === 'object') {
      return this.buildTable({ tableName, containerPath: path, viaArray: false, parent, parentField: path, rowShape: 'object' });
    }
    if (profile.itemType === 'object') {
      return this.buildTable({ tableName, containerPath: path, viaArray: true, parent, parentField: path, rowShape: 'object' });
    }
    return this.buildTable({
      tableName,
      containerPath: path,
      viaArray: true,
      parent,
      parentField: path,
      rowShape: 'scalar',
      elementProfile: profile,
    });
  }

  private valueColumn(profile: FieldProfile | undefined): Column {
    const itemType = profile?.itemType;
    const stable = STABLE_SCALARS.has(itemType);
    const column: Column = {
      name: VALUE_COLUMN,
      type: stable ? sqlTypeFor(itemType, profile?.integer) : 'TEXT',
      nullable: true,
      primaryKey: false,
    };
    if (!stable) {
      column.fallback = 'json_text';
    }
    if (profile?.pattern) {
      column.pattern = profile.pattern;
    }
    return column;
  }
}

/**
 * Relational layout for a descriptor: object and array fields become nested
 * tables linked to their parent through `<parent>_id`, scalars become columns.
 */
export const buildRelationalSchema = (
  descriptor: StructuralDescriptor,
  tableName: string,
  options: RelationalBuildOptions = {},
): RelationalSchema =>
  new RelationalBuilder(descriptor, options.maxIdentifierLength ?? DEFAULT_MAX_IDENTIFIER_LENGTH).buildRoot(
    tableName,
  );

/** Tables in parent-before-child order. */
export const flattenTables = (schema: RelationalSchema): RelationalSchema[] => [
  schema,
  ...schema.nestedTables.flatMap(flattenTables),
];
