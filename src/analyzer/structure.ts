import config from '@config';
import { EmptyInputError, InconsistentArrayError, NestingLimitError } from '@errors/index';
import { setOwn } from '@utils/objects';
import { detect } from './patterns';
import {
  FieldProfile,
  FieldType,
  JsonObject,
  Pattern,
  StructuralDescriptor,
  childPath,
  elementPath,
  isJsonObject,
  pathDepth,
  typeOf,
  widen,
} from './types';

export type AnalyzeOptions = {
  /** Hard recursion ceiling; deeper payloads are rejected. */
  maxDepth?: number;
  /** Whether the records came from a JSON array. Defaults to true. */
  isArrayRoot?: boolean;
};

type FieldAccumulator = {
  type?: FieldType;
  sawNull: boolean;
  sawArray: boolean;
  itemType?: FieldType;
  present: number;
  allIntegers: boolean;
  pattern: Pattern | null | 'unset';
};

const SCALAR_TYPES: ReadonlySet<FieldType> = new Set(['string', 'number', 'boolean']);

class StructureWalker {
  /** Field accumulators keyed by path. */
  readonly fields = new Map<string, FieldAccumulator>();
  /** Object instances seen per container path ('' is the root, `items[]` an element). */
  readonly containers = new Map<string, number>();

  constructor(private readonly maxDepth: number) {}

  walkRecord(record: JsonObject) {
    this.walkObject(record, '', 1);
  }

  private accumulator(path: string): FieldAccumulator {
    let acc = this.fields.get(path);
    if (!acc) {
      acc = { sawNull: false, sawArray: false, present: 0, allIntegers: true, pattern: 'unset' };
      this.fields.set(path, acc);
    }
    return acc;
  }

  private walkObject(obj: JsonObject, containerPath: string, level: number) {
    this.containers.set(containerPath, (this.containers.get(containerPath) ?? 0) + 1);
    for (const [key, value] of Object.entries(obj)) {
      const path = childPath(containerPath, key);
      if (level > this.maxDepth) {
        throw new NestingLimitError(path, this.maxDepth);
      }
      const acc = this.accumulator(path);
      acc.present += 1;
      this.observe(acc, path, value, level);
    }
  }

  private observe(acc: FieldAccumulator, path: string, value: unknown, level: number) {
    const type = typeOf(value);
    if (type === 'null') {
      acc.sawNull = true;
    }
    acc.type = acc.type === undefined ? type : widen(acc.type, type);

    if (type === 'number') {
      acc.allIntegers = acc.allIntegers && Number.isInteger(Number(value));
    } else if (type === 'string') {
      this.notePattern(acc, value);
    } else if (Array.isArray(value)) {
      acc.sawArray = true;
      this.observeArray(acc, path, value, level);
    } else if (isJsonObject(value)) {
      this.walkObject(value, path, level + 1);
    }
  }

  private observeArray(acc: FieldAccumulator, path: string, items: unknown[], level: number) {
    const elementTypes = new Set<FieldType>();
    for (const item of items) {
      elementTypes.add(typeOf(item));
    }
    const hasObjects = elementTypes.has('object');
    const scalars = [...elementTypes].filter((type) => SCALAR_TYPES.has(type));
    if (hasObjects && scalars.length > 0) {
      throw new InconsistentArrayError(path, ['object', ...scalars.sort()]);
    }

    let itemType: FieldType | undefined;
    for (const item of items) {
      const type = typeOf(item);
      itemType = itemType === undefined ? type : widen(itemType, type);
      if (type === 'number') {
        acc.allIntegers = acc.allIntegers && Number.isInteger(Number(item));
      } else if (type === 'string') {
        this.notePattern(acc, item);
      } else if (isJsonObject(item)) {
        this.walkObject(item, elementPath(path), level + 1);
      }
    }
    if (itemType !== undefined) {
      acc.itemType = acc.itemType === undefined ? itemType : widen(acc.itemType, itemType);
    }
  }

  private notePattern(acc: FieldAccumulator, value: unknown) {
    if (acc.pattern === null) return;
    const pattern = detect(value);
    if (acc.pattern === 'unset') {
      acc.pattern = pattern;
    } else if (acc.pattern !== pattern) {
      acc.pattern = null;
    }
  }
}

const containerOf = (path: string) => {
  const cut = path.lastIndexOf('.');
  return cut === -1 ? '' : path.slice(0, cut);
};

const toProfile = (acc: FieldAccumulator, containerCount: number): FieldProfile => {
  const inferredType = acc.type ?? 'null';
  const profile: FieldProfile = {
    inferredType,
    nullable: acc.sawNull || acc.present < containerCount,
    isArray: inferredType === 'array',
  };
  if (acc.sawArray && acc.itemType !== undefined) {
    profile.itemType = acc.itemType;
  }
  const carriesStrings =
    inferredType === 'string' || (inferredType === 'array' && acc.itemType === 'string');
  if (carriesStrings && acc.pattern !== 'unset' && acc.pattern !== null) {
    profile.pattern = acc.pattern;
  }
  const carriesNumbers =
    inferredType === 'number' || (inferredType === 'array' && acc.itemType === 'number');
  if (carriesNumbers) {
    profile.integer = acc.allIntegers;
  }
  return profile;
};

const keySetOf = (record: JsonObject) => Object.keys(record).sort();

/** Most common top-level key set; ties go to the one seen first. */
const modeKeySet = (records: JsonObject[]) => {
  const counts = new Map<string, { keys: string[]; count: number }>();
  let best: { keys: string[]; count: number } | undefined;
  for (const record of records) {
    const keys = keySetOf(record);
    const signature = keys.join('\u0000');
    const entry = counts.get(signature) ?? { keys, count: 0 };
    entry.count += 1;
    counts.set(signature, entry);
    if (!best || entry.count > best.count) {
      best = entry;
    }
  }
  return best ?? { keys: [], count: 0 };
};

const ensureObjectRecords = (records: readonly unknown[]): JsonObject[] => {
  const nonObjects = new Set<FieldType>();
  for (const record of records) {
    if (!isJsonObject(record)) nonObjects.add(typeOf(record));
  }
  if (nonObjects.size > 0) {
    const hasObjects = records.some(isJsonObject);
    throw new InconsistentArrayError('', [...(hasObjects ? ['object'] : []), ...[...nonObjects].sort()]);
  }
  return records.filter(isJsonObject);
};

export const analyze = (
  records: readonly unknown[],
  options: AnalyzeOptions = {},
): StructuralDescriptor => {
  if (records.length === 0) {
    throw new EmptyInputError({ records: 0 });
  }
  const objects = ensureObjectRecords(records);
  const walker = new StructureWalker(options.maxDepth ?? config.analyzer.maxDepth);
  objects.forEach((record) => walker.walkRecord(record));

  const paths = [...walker.fields.keys()].sort();
  const fields: Record<string, FieldProfile> = {};
  let nestingDepth = 0;
  for (const path of paths) {
    const acc = walker.fields.get(path);
    if (!acc) continue;
    setOwn(fields, path, toProfile(acc, walker.containers.get(containerOf(path)) ?? 0));
    nestingDepth = Math.max(nestingDepth, pathDepth(path));
  }

  const mode = modeKeySet(objects);
  const consistency = objects.length > 1 ? mode.count / objects.length : 1;

  return {
    fieldCount: paths.length,
    nestingDepth,
    fields,
    consistency,
    isArrayRoot: options.isArrayRoot ?? true,
    recordCount: objects.length,
    topLevelFields: mode.keys,
  };
};

/**
 * Splits a parsed JSON payload into records: arrays are batches, anything else
 * is a single record.
 */
export const toRecords = (payload: unknown): { records: unknown[]; isArrayRoot: boolean } =>
  Array.isArray(payload)
    ? { records: payload, isArrayRoot: true }
    : { records: payload === undefined ? [] : [payload], isArrayRoot: false };

export const analyzePayload = (payload: unknown, options: Omit<AnalyzeOptions, 'isArrayRoot'> = {}) => {
  const { records, isArrayRoot } = toRecords(payload);
  return analyze(records, { ...options, isArrayRoot });
};
