import { CollisionPolicy } from '@config';
import { SchemaNameCollisionError } from '@errors/index';

export const SCHEMA_NAME_PREFIX = 'json_data_';

type RegistryEntry = {
  /** Canonical key of the sorted path set. */
  shapeKey: string;
  paths: string[];
  schemaName: string;
};

/**
 * Owns the mapping from shape fingerprint to schema name for one process.
 * Identical path sets always get the same name; a different path set hashing to
 * a known fingerprint is a collision.
 */
export class SchemaNameRegistry {
  private byFingerprint = new Map<string, RegistryEntry[]>();

  constructor(private readonly policy: CollisionPolicy = 'error') {}

  resolve(fingerprint: string, paths: string[]): string {
    const sorted = [...paths].sort();
    const shapeKey = sorted.join('\n');
    const entries = this.byFingerprint.get(fingerprint) ?? [];
    const known = entries.find((entry) => entry.shapeKey === shapeKey);
    if (known) return known.schemaName;

    const baseName = `${SCHEMA_NAME_PREFIX}${fingerprint}`;
    if (entries.length > 0 && this.policy === 'error') {
      throw new SchemaNameCollisionError(baseName, fingerprint, entries[0].paths, sorted);
    }
    const schemaName = entries.length === 0 ? baseName : `${baseName}_${entries.length + 1}`;
    entries.push({ shapeKey, paths: sorted, schemaName });
    this.byFingerprint.set(fingerprint, entries);
    return schemaName;
  }

  size() {
    let total = 0;
    this.byFingerprint.forEach((entries) => {
      total += entries.length;
    });
    return total;
  }

  reset() {
    this.byFingerprint = new Map();
  }
}
