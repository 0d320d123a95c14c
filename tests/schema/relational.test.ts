import { analyze, analyzePayload } from '@analyzer/structure';
import { buildRelationalSchema, flattenTables, sqlTypeFor } from '@schema/relational';

describe('Relational schema builder', () => {
  it('keeps a record id as a data column beside the generated key', () => {
    const schema = buildRelationalSchema(
      analyze([
        { id: 1, name: 'a' },
        { id: 2, name: 'b' },
      ]),
      'people',
    );
    expect(schema.tableName).toBe('people');
    expect(schema.primaryKey).toBe('id');
    expect(schema.columns).toEqual([
      { name: 'id', type: 'UUID', nullable: false, primaryKey: true },
      { name: 'data_id', type: 'BIGINT', nullable: false, primaryKey: false, source: 'id' },
      { name: 'name', type: 'TEXT', nullable: false, primaryKey: false, source: 'name' },
    ]);
    expect(schema.nestedTables).toEqual([]);
    expect(schema.relationships).toEqual([]);
  });

  it('builds exactly one nested table for an array of objects', () => {
    const schema = buildRelationalSchema(
      analyze([{ order: 'A-1', items: [{ sku: 'x', qty: 2 }] }]),
      'orders',
    );
    expect(schema.columns[0]).toEqual({ name: 'id', type: 'UUID', nullable: false, primaryKey: true });
    expect(schema.nestedTables).toHaveLength(1);

    const [items] = schema.nestedTables;
    expect(items.tableName).toBe('orders_items');
    expect(items.isArray).toBe(true);
    expect(items.parentField).toBe('items');
    const foreignKey = items.columns.find((column) => column.foreignKey);
    expect(foreignKey).toEqual({
      name: 'orders_id',
      type: 'UUID',
      nullable: false,
      primaryKey: false,
      foreignKey: { table: 'orders', column: schema.primaryKey },
    });
    expect(items.columns.map((column) => column.name)).toEqual(['id', 'orders_id', 'qty', 'sku']);
    expect(schema.relationships).toEqual([
      {
        type: 'one-to-many',
        fromTable: 'orders_items',
        fromColumn: 'orders_id',
        toTable: 'orders',
        toColumn: 'id',
        field: 'items',
      },
    ]);
  });

  it('gives nested objects one-to-one tables and scalar arrays value tables', () => {
    const schema = buildRelationalSchema(analyzePayload({ user: { id: 1, tags: ['x', 'y'] } }), 'root');
    const [user] = schema.nestedTables;
    expect(user.tableName).toBe('root_user');
    expect(user.isArray).toBe(false);
    expect(user.columns.map((column) => column.name)).toEqual(['id', 'root_id', 'data_id']);
    expect(user.columns[2]).toEqual({
      name: 'data_id',
      type: 'BIGINT',
      nullable: false,
      primaryKey: false,
      source: 'id',
    });

    const [tags] = user.nestedTables;
    expect(tags.tableName).toBe('root_user_tags');
    expect(tags.isArray).toBe(true);
    expect(tags.rowShape).toBe('scalar');
    expect(tags.columns).toEqual([
      { name: 'id', type: 'UUID', nullable: false, primaryKey: true },
      {
        name: 'root_user_id',
        type: 'UUID',
        nullable: false,
        primaryKey: false,
        foreignKey: { table: 'root_user', column: 'id' },
      },
      { name: 'value', type: 'TEXT', nullable: true, primaryKey: false },
    ]);
    expect(schema.relationships[0].type).toBe('one-to-one');
    expect(flattenTables(schema).map((table) => table.tableName)).toEqual([
      'root',
      'root_user',
      'root_user_tags',
    ]);
  });

  it('stores mixed fields as JSON text', () => {
    const schema = buildRelationalSchema(analyze([{ v: 1 }, { v: 'x' }]), 'mixed');
    expect(schema.columns[1]).toEqual({
      name: 'v',
      type: 'TEXT',
      nullable: true,
      primaryKey: false,
      source: 'v',
      fallback: 'json_text',
    });
  });

  it('keeps detected patterns as hints without changing the type', () => {
    const schema = buildRelationalSchema(analyze([{ code: '42' }, { code: '7' }]), 'codes');
    expect(schema.columns[1]).toMatchObject({ type: 'TEXT', pattern: 'integer_string' });
  });

  it('lays out one field set the same way whatever the id values look like', () => {
    const layouts = [
      [{ id: 1, name: 'a' }, { id: 2, name: 'b' }],
      [{ id: 1, name: 'a' }, { name: 'b' }],
      [{ id: 'x', name: 'a' }],
    ].map((records) =>
      buildRelationalSchema(analyze(records), 'people').columns.map((column) => [column.name, column.primaryKey]),
    );
    const expected = [
      ['id', true],
      ['data_id', false],
      ['name', false],
    ];
    layouts.forEach((layout) => expect(layout).toEqual(expected));
  });

  it('normalizes and bounds identifiers', () => {
    const schema = buildRelationalSchema(analyze([{ 'First Name': 'a', ['x'.repeat(80)]: 1 }]), 'People List', {
      maxIdentifierLength: 20,
    });
    expect(schema.tableName).toBe('people_list');
    const names = schema.columns.map((column) => column.name);
    expect(names[1]).toBe('first_name');
    expect(names[2]).toHaveLength(20);
    expect(names[2]).toMatch(/^x{11}_[0-9a-f]{8}$/);
  });

  it('maps field types to column types', () => {
    expect(sqlTypeFor('number', true)).toBe('BIGINT');
    expect(sqlTypeFor('number', false)).toBe('DOUBLE PRECISION');
    expect(sqlTypeFor('boolean')).toBe('BOOLEAN');
    expect(sqlTypeFor('null')).toBe('TEXT');
  });
});
