import config, { DecisionPolicy } from '@config';
import { AnalyzeOptions, analyze as analyzeRecords } from '@analyzer/structure';
import { StructuralDescriptor } from '@analyzer/types';
import { buildSchema } from '@schema/index';
import { shapeFingerprint } from '@schema/naming';
import { DocumentSchema, RelationalSchema } from '@schema/types';
import { logger } from '@telemetry/index';
import { SchemaNameRegistry } from './registry';

export type DecisionReasoning = {
  consistency: number;
  nestingDepth: number;
  fieldCount: number;
};

type DecisionCommon = {
  schemaName: string;
  fingerprint: string;
  reasoning: DecisionReasoning;
  policy: DecisionPolicy;
};

export type SchemaDecision =
  | (DecisionCommon & { storageType: 'sql'; schema: RelationalSchema })
  | (DecisionCommon & { storageType: 'nosql'; schema: DocumentSchema });

export type DecisionEngineOptions = {
  policy?: Partial<DecisionPolicy>;
  registry?: SchemaNameRegistry;
  analyzer?: Omit<AnalyzeOptions, 'isArrayRoot'>;
  maxIdentifierLength?: number;
};

const deepFreeze = <T>(value: T): T => {
  if (value && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.values(value).forEach(deepFreeze);
    Object.freeze(value);
  }
  return value;
};

export const prefersSql = (reasoning: DecisionReasoning, policy: DecisionPolicy) =>
  reasoning.consistency >= policy.sqlConsistencyThreshold &&
  reasoning.nestingDepth <= policy.sqlMaxNestingDepth &&
  reasoning.fieldCount <= policy.sqlMaxFieldCount;

export class StorageDecisionEngine {
  readonly policy: DecisionPolicy;
  readonly registry: SchemaNameRegistry;

  constructor(private readonly options: DecisionEngineOptions = {}) {
    this.policy = { ...config.decision, ...options.policy };
    this.registry = options.registry ?? new SchemaNameRegistry(config.schemaNames.onCollision);
  }

  analyze(records: readonly unknown[], isArrayRoot = true): StructuralDescriptor {
    return analyzeRecords(records, { ...this.options.analyzer, isArrayRoot });
  }

  decide(records: readonly unknown[], isArrayRoot = true): SchemaDecision {
    return this.decideFromDescriptor(this.analyze(records, isArrayRoot));
  }

  decideFromDescriptor(descriptor: StructuralDescriptor): SchemaDecision {
    const reasoning: DecisionReasoning = {
      consistency: descriptor.consistency,
      nestingDepth: descriptor.nestingDepth,
      fieldCount: descriptor.fieldCount,
    };
    const paths = Object.keys(descriptor.fields);
    const fingerprint = shapeFingerprint(paths);
    const schemaName = this.registry.resolve(fingerprint, paths);
    const policy = { ...this.policy };
    const buildOptions = {
      maxIdentifierLength: this.options.maxIdentifierLength ?? config.schemaNames.maxIdentifierLength,
    };

    const decision: SchemaDecision = prefersSql(reasoning, policy)
      ? {
          storageType: 'sql',
          schema: buildSchema(descriptor, 'sql', schemaName, buildOptions),
          schemaName,
          fingerprint,
          reasoning,
          policy,
        }
      : {
          storageType: 'nosql',
          schema: buildSchema(descriptor, 'nosql', schemaName),
          schemaName,
          fingerprint,
          reasoning,
          policy,
        };

    logger.debug(
      { schemaName, storageType: decision.storageType, reasoning },
      'Storage decision made',
    );
    return deepFreeze(decision);
  }
}
