import { CategoryCatalog } from '@config';
import { logger } from '@telemetry/index';

export const UNCATEGORIZED = 'uncategorized';

export type Classification = {
  label: string;
  confidence: number;
};

/** Media classifier. May reject; the resolver falls back when it does. */
export type ClassifyFn = (bytes: Buffer) => Promise<Classification>;

export type ExtractedText = {
  text: string;
  properties: Record<string, unknown>;
};

export type ExtractTextFn = (bytes: Buffer, mimeType?: string) => Promise<ExtractedText>;

export type ResolveInput = {
  bytes: Buffer;
  filename: string;
  /** Extracted document text, when there is any. */
  text?: string;
};

export interface CategoryStrategy {
  readonly name: string;
  resolve(input: ResolveInput): Promise<string | null>;
}

export type CategoryResolution = {
  category: string;
  /** Name of the strategy that produced the category, or 'fallback'. */
  strategy: string;
};

const firstTermIn = (vocabulary: readonly string[], haystack: string) => {
  const lower = haystack.toLowerCase();
  return vocabulary.find((term) => lower.includes(term)) ?? null;
};

export class ClassifierStrategy implements CategoryStrategy {
  readonly name = 'classifier';

  constructor(
    private readonly classify: ClassifyFn,
    private readonly catalog: CategoryCatalog,
    private readonly confidenceFloor: number,
  ) {}

  /** Label -> category through the label map, or the label itself when it is a vocabulary term. */
  mapLabel(label: string): string | null {
    const normalized = label.trim().toLowerCase();
    const mapped = this.catalog.labelMap[normalized];
    if (mapped) return mapped;
    return this.catalog.vocabulary.includes(normalized) ? normalized : null;
  }

  async resolve({ bytes, filename }: ResolveInput) {
    let result: Classification;
    try {
      result = await this.classify(bytes);
    } catch (err) {
      logger.warn({ err, filename }, 'Classifier failed, falling back');
      return null;
    }
    if (!Number.isFinite(result.confidence) || result.confidence < this.confidenceFloor) {
      logger.debug(
        { filename, label: result.label, confidence: result.confidence, floor: this.confidenceFloor },
        'Classification below confidence floor',
      );
      return null;
    }
    return this.mapLabel(result.label);
  }
}

export class FilenameKeywordStrategy implements CategoryStrategy {
  readonly name = 'filename';

  constructor(private readonly vocabulary: readonly string[]) {}

  async resolve({ filename }: ResolveInput) {
    return firstTermIn(this.vocabulary, filename);
  }
}

export class TextKeywordStrategy implements CategoryStrategy {
  readonly name = 'text';

  constructor(private readonly vocabulary: readonly string[]) {}

  async resolve({ text }: ResolveInput) {
    return text ? firstTermIn(this.vocabulary, text) : null;
  }
}

/**
 * Runs strategies in order and returns the first category any of them
 * produces, or `uncategorized`.
 */
export class CategoryResolver {
  constructor(private readonly strategies: readonly CategoryStrategy[]) {}

  async resolve(input: ResolveInput): Promise<CategoryResolution> {
    for (const strategy of this.strategies) {
      const category = await strategy.resolve(input);
      if (category) {
        return { category, strategy: strategy.name };
      }
    }
    return { category: UNCATEGORIZED, strategy: 'fallback' };
  }
}

export type MediaResolverOptions = {
  catalog: CategoryCatalog;
  confidenceFloor: number;
  /** Without a classifier only the filename is consulted. */
  classify?: ClassifyFn;
};

export const createMediaResolver = ({ catalog, confidenceFloor, classify }: MediaResolverOptions) =>
  new CategoryResolver([
    ...(classify ? [new ClassifierStrategy(classify, catalog, confidenceFloor)] : []),
    new FilenameKeywordStrategy(catalog.vocabulary),
  ]);

export const createDocumentResolver = (catalog: CategoryCatalog) =>
  new CategoryResolver([
    new FilenameKeywordStrategy(catalog.vocabulary),
    new TextKeywordStrategy(catalog.vocabulary),
  ]);
