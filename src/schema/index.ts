import { StructuralDescriptor } from '@analyzer/types';
import { buildDocumentSchema } from './document';
import { RelationalBuildOptions, buildRelationalSchema } from './relational';
import { DocumentSchema, RelationalSchema, StorageType } from './types';

export function buildSchema(
  descriptor: StructuralDescriptor,
  storageType: 'sql',
  name: string,
  options?: RelationalBuildOptions,
): RelationalSchema;
export function buildSchema(
  descriptor: StructuralDescriptor,
  storageType: 'nosql',
  name: string,
  options?: RelationalBuildOptions,
): DocumentSchema;
export function buildSchema(
  descriptor: StructuralDescriptor,
  storageType: StorageType,
  name: string,
  options?: RelationalBuildOptions,
): RelationalSchema | DocumentSchema;
export function buildSchema(
  descriptor: StructuralDescriptor,
  storageType: StorageType,
  name: string,
  options: RelationalBuildOptions = {},
): RelationalSchema | DocumentSchema {
  return storageType === 'sql'
    ? buildRelationalSchema(descriptor, name, options)
    : buildDocumentSchema(descriptor, name);
}
