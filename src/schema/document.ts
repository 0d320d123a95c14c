import { FieldType, StructuralDescriptor, directChildren, isJsonObject, leafName } from '@analyzer/types';
import { setOwn } from '@utils/objects';
import { allocateFieldNames, sanitizeCollectionName } from './naming';
import { DocumentField, DocumentSchema, FieldStructure } from './types';

const buildFields = (
  descriptor: StructuralDescriptor,
  paths: string[],
  containerPath: string,
  viaArray: boolean,
): FieldStructure => {
  const children = directChildren(paths, containerPath, viaArray);
  const names = allocateFieldNames(children.map(leafName));
  const structure: FieldStructure = {};

  for (const path of children) {
    const profile = descriptor.fields[path];
    const name = names.get(leafName(path)) ?? leafName(path);
    const field: DocumentField = { type: profile.inferredType, nested: false };
    const objectChildren = directChildren(paths, path, false);
    const elementChildren = directChildren(paths, path, true);

    if (profile.inferredType === 'object') {
      field.nested = true;
      field.fields = buildFields(descriptor, paths, path, false);
    } else if (profile.inferredType === 'array') {
      const itemType: FieldType = profile.itemType ?? 'mixed';
      field.itemType = itemType;
      if (itemType === 'object') {
        field.nested = true;
        field.fields = buildFields(descriptor, paths, path, true);
      }
    } else if (profile.inferredType === 'mixed') {
      field.itemType = 'mixed';
      if (objectChildren.length > 0) {
        field.fields = buildFields(descriptor, paths, path, false);
      } else if (elementChildren.length > 0) {
        field.fields = buildFields(descriptor, paths, path, true);
      }
    }
    setOwn(structure, name, field);
  }
  return structure;
};

/**
 * Document layout for a descriptor. Nested objects and arrays of objects carry
 * their own field trees; arrays carry the element type.
 */
export const buildDocumentSchema = (
  descriptor: StructuralDescriptor,
  collectionName: string,
): DocumentSchema => ({
  kind: 'document',
  collectionName: sanitizeCollectionName(collectionName),
  fieldStructure: buildFields(descriptor, Object.keys(descriptor.fields), '', false),
});

/** Rewrites object keys the same way the schema builder names fields. */
export const toDocument = (value: unknown): unknown => {
  if (Array.isArray(value)) return value.map(toDocument);
  if (!isJsonObject(value)) return value;
  const names = allocateFieldNames(Object.keys(value));
  const result: Record<string, unknown> = {};
  for (const [key, inner] of Object.entries(value)) {
    setOwn(result, names.get(key) ?? key, toDocument(inner));
  }
  return result;
};
