export type FieldType = 'string' | 'number' | 'boolean' | 'null' | 'object' | 'array' | 'mixed';

export type Pattern = 'uuid' | 'email' | 'url' | 'datetime' | 'integer_string';

export type FieldProfile = {
  inferredType: FieldType;
  nullable: boolean;
  pattern?: Pattern;
  isArray: boolean;
  /** Element type for array fields; absent while only empty arrays were seen. */
  itemType?: FieldType;
  /** Set on number fields: true when every observed value was an integer. */
  integer?: boolean;
};

export type StructuralDescriptor = {
  fieldCount: number;
  nestingDepth: number;
  /** Keyed by field path, sorted. `.` separates object levels, `[]` marks array-of-object elements. */
  fields: Record<string, FieldProfile>;
  consistency: number;
  isArrayRoot: boolean;
  recordCount: number;
  /** The most common top-level key set, sorted. */
  topLevelFields: string[];
};

export type JsonObject = { [key: string]: unknown };

export const isJsonObject = (value: unknown): value is JsonObject =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export const typeOf = (value: unknown): FieldType => {
  if (value === null || value === undefined) return 'null';
  if (Array.isArray(value)) return 'array';
  switch (typeof value) {
    case 'string':
      return 'string';
    case 'number':
    case 'bigint':
      return 'number';
    case 'boolean':
      return 'boolean';
    case 'object':
      return 'object';
    default:
      return 'mixed';
  }
};

/**
 * Equal types stay, `null` yields to the other side, anything else is `mixed`.
 */
export const widen = (left: FieldType, right: FieldType): FieldType => {
  if (left === right) return left;
  if (left === 'null') return right;
  if (right === 'null') return left;
  return 'mixed';
};

const ARRAY_MARKER = '[]';

const EMPTY_KEY = '%00';

/**
 * Keys are escaped so that a literal `.` or `[]` inside a key cannot fake a path
 * level, and an empty key cannot stand for its container.
 */
export const escapeKey = (key: string) =>
  key === ''
    ? EMPTY_KEY
    : key.replace(/%/g, '%25').replace(/\./g, '%2E').replace(/\[\]/g, '%5B%5D');

export const unescapeKey = (segment: string) =>
  segment === EMPTY_KEY
    ? ''
    : segment.replace(/%5B%5D/g, '[]').replace(/%2E/g, '.').replace(/%25/g, '%');

export const childPath = (parent: string, key: string) => {
  const segment = escapeKey(key);
  return parent ? `${parent}.${segment}` : segment;
};

export const elementPath = (path: string) => `${path}${ARRAY_MARKER}`;

/** Number of name segments in a path: `a` is 1, `a.b` and `items[].sku` are 2. */
export const pathDepth = (path: string) => (path ? path.split('.').length : 0);

/** Raw object key of the last path segment. */
export const leafName = (path: string) => {
  const segments = path.split('.');
  const last = segments[segments.length - 1];
  return unescapeKey(last.endsWith(ARRAY_MARKER) ? last.slice(0, -ARRAY_MARKER.length) : last);
};

/** Direct children of `parent` among `paths`, looking through array markers. */
export const directChildren = (paths: string[], parent: string, viaArray: boolean): string[] => {
  const prefix = parent === '' ? '' : `${viaArray ? elementPath(parent) : parent}.`;
  return paths.filter((path) => {
    if (!path.startsWith(prefix) || path === parent) return false;
    const rest = path.slice(prefix.length);
    return rest.length > 0 && !rest.includes('.');
  });
};
