import crypto from 'crypto';

export const DEFAULT_MAX_IDENTIFIER_LENGTH = 63;

export const shortHash = (text: string, length = 8) =>
  crypto.createHash('sha256').update(text).digest('hex').slice(0, length);

/** Stable hash of a field-path set; order of the input does not matter. */
export const shapeFingerprint = (paths: Iterable<string>) =>
  shortHash([...paths].sort().join('\n'), 12);

export const normalizeIdentifier = (raw: string) => {
  const normalized = raw.toLowerCase().replace(/[^a-z0-9_]/g, '_');
  if (!normalized) return 'field';
  return /^[0-9]/.test(normalized) ? `_${normalized}` : normalized;
};

/** Cuts identifiers longer than `max` and appends a hash of the full name. */
export const fitIdentifier = (name: string, max = DEFAULT_MAX_IDENTIFIER_LENGTH) => {
  if (name.length <= max) return name;
  const suffix = shortHash(name);
  return `${name.slice(0, max - suffix.length - 1)}_${suffix}`;
};

/**
 * Hands out unique identifiers within one scope (the columns of a table, or the
 * tables of a schema). Names taken by system columns are reserved up front.
 */
export class IdentifierScope {
  private readonly taken = new Set<string>();

  constructor(private readonly max = DEFAULT_MAX_IDENTIFIER_LENGTH, private readonly reserved: string[] = []) {
    reserved.forEach((name) => this.taken.add(name));
  }

  claim(name: string) {
    this.taken.add(name);
    return name;
  }

  allocate(raw: string) {
    const base = fitIdentifier(normalizeIdentifier(raw), this.max);
    if (!this.taken.has(base)) return this.claim(base);
    if (this.reserved.includes(base)) {
      const prefixed = fitIdentifier(`data_${base}`, this.max);
      if (!this.taken.has(prefixed)) return this.claim(prefixed);
    }
    const hashed = fitIdentifier(`${base}_${shortHash(raw, 6)}`, this.max);
    if (!this.taken.has(hashed)) return this.claim(hashed);
    let counter = 2;
    while (this.taken.has(fitIdentifier(`${hashed}_${counter}`, this.max))) {
      counter += 1;
    }
    return this.claim(fitIdentifier(`${hashed}_${counter}`, this.max));
  }
}

const INVALID_FIELD_CHARS = /[.$\u0000]/g;

export const sanitizeFieldName = (raw: string) => raw.replace(INVALID_FIELD_CHARS, '') || '_';

export const sanitizeCollectionName = (raw: string) =>
  raw.replace(/[^A-Za-z0-9_]/g, '_') || 'collection';

/**
 * Maps raw object keys to document-safe field names. Keys are processed in sorted
 * order so that the schema builder and the document writer agree on suffixes.
 */
export const allocateFieldNames = (rawKeys: Iterable<string>) => {
  const names = new Map<string, string>();
  const taken = new Set<string>();
  for (const raw of [...new Set(rawKeys)].sort()) {
    const base = sanitizeFieldName(raw);
    let name = base;
    let counter = 2;
    while (taken.has(name)) {
      name = `${base}_${counter}`;
      counter += 1;
    }
    taken.add(name);
    names.set(raw, name);
  }
  return names;
};
