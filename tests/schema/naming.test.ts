import {
  IdentifierScope,
  allocateFieldNames,
  fitIdentifier,
  normalizeIdentifier,
  sanitizeCollectionName,
  shapeFingerprint,
} from '@schema/naming';

describe('Identifier naming', () => {
  it('normalizes raw keys into SQL identifiers', () => {
    expect(normalizeIdentifier('Order ID')).toBe('order_id');
    expect(normalizeIdentifier('2nd')).toBe('_2nd');
    expect(normalizeIdentifier('')).toBe('field');
  });

  it('leaves short identifiers alone and hashes long ones', () => {
    expect(fitIdentifier('short', 10)).toBe('short');
    const long = fitIdentifier('a'.repeat(70));
    expect(long).toHaveLength(63);
    expect(long).toBe(fitIdentifier('a'.repeat(70)));
  });

  it('prefixes data columns that collide with system columns', () => {
    const scope = new IdentifierScope(63, ['id', 'parent_id']);
    expect(scope.allocate('id')).toBe('data_id');
    expect(scope.allocate('parent_id')).toBe('data_parent_id');
    expect(scope.allocate('name')).toBe('name');
  });

  it('suffixes keys that normalize to the same identifier', () => {
    const scope = new IdentifierScope();
    expect(scope.allocate('First Name')).toBe('first_name');
    const second = scope.allocate('first-name');
    expect(second).toMatch(/^first_name_[0-9a-f]{6}$/);
  });

  it('allocates document field names in sorted order', () => {
    const names = allocateFieldNames(['b.c', 'bc', '$']);
    expect(names.get('$')).toBe('_');
    expect(names.get('b.c')).toBe('bc');
    expect(names.get('bc')).toBe('bc_2');
  });

  it('fingerprints path sets regardless of order', () => {
    expect(shapeFingerprint(['b', 'a'])).toBe(shapeFingerprint(['a', 'b']));
    expect(shapeFingerprint(['a'])).not.toBe(shapeFingerprint(['a', 'b']));
    expect(shapeFingerprint(['a'])).toMatch(/^[0-9a-f]{12}$/);
  });

  it('sanitizes collection names', () => {
    expect(sanitizeCollectionName('json-data.1')).toBe('json_data_1');
  });
});
