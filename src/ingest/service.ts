import { StorageCore } from '@core/index';
import { InvalidJsonError, UnsupportedFileTypeError, isStoreSenseError } from '@errors/index';
import { toRecords } from '@analyzer/structure';
import { ExtractTextFn, ExtractedText } from '@media/resolver';
import { CategoryDirectoryStore } from '@storage/directory';
import { describeLocation } from '@storage/types';
import { StorageType } from '@schema/types';
import { logger, metrics, telemetryBus } from '@telemetry/index';
import { detectKind } from './detector';
import { formatDimensions, readImageDimensions } from './dimensions';
import { countWords, extractText as defaultExtractText } from './extractor';

export const TEXT_PREVIEW_LENGTH = 500;
export const SAMPLE_KEY_COUNT = 5;

export type UploadedFile = {
  filename: string;
  bytes: Buffer;
  mimeType?: string;
};

type ResultBase = {
  status: 'success';
  filename: string;
  category: string;
  location: string;
  indexId: number;
  mimeType: string;
};

export type JsonIngestResult = ResultBase & {
  type: 'json';
  storageType: StorageType;
  summary: {
    structure: 'single' | 'batch';
    fieldCount: number;
    nestingDepth: number;
    consistency: number;
    storageType: StorageType;
    recordsInserted: number;
    rowsWritten: number;
    sampleKeys: string[];
  };
};

export type MediaIngestResult = ResultBase & {
  type: 'media';
  summary: {
    format: string;
    /** `<width>x<height>` for readable images, otherwise null. */
    dimensions: string | null;
    sizeBytes: number;
    resolvedBy: string;
  };
};

export type DocumentIngestResult = ResultBase & {
  type: 'document';
  summary: {
    wordCount: number;
    characterCount: number;
    textPreview: string;
    properties: Record<string, unknown>;
    resolvedBy: string;
  };
};

export type IngestResult = JsonIngestResult | MediaIngestResult | DocumentIngestResult;

export type IngestFailure = {
  status: 'error';
  filename: string;
  error: string;
  code?: string;
};

export type IngestionServiceOptions = {
  extractText?: ExtractTextFn;
};

export const previewText = (text: string) =>
  text.length > TEXT_PREVIEW_LENGTH ? `${text.slice(0, TEXT_PREVIEW_LENGTH)}...` : text;

const formatOf = (mimeType: string) => mimeType.split('/').pop()?.toUpperCase() ?? 'UNKNOWN';

/**
 * Upload pipeline: sniff the file, run the processor for its kind, record the
 * result in the index. Nothing is indexed when any earlier step fails.
 */
export class IngestionService {
  private readonly extractText: ExtractTextFn;

  constructor(
    private readonly core: StorageCore,
    private readonly files: CategoryDirectoryStore,
    options: IngestionServiceOptions = {},
  ) {
    this.extractText = options.extractText ?? defaultExtractText;
  }

  async ingest(file: UploadedFile): Promise<IngestResult> {
    try {
      const result = await this.process(file);
      metrics.incrementCounter(`ingest_${result.type}`);
      telemetryBus.publish({
        type: 'ingest.completed',
        payload: { filename: file.filename, kind: result.type, indexId: result.indexId, location: result.location },
      });
      return result;
    } catch (err) {
      metrics.incrementCounter('ingest_failed');
      telemetryBus.publish({
        type: 'ingest.failed',
        payload: {
          filename: file.filename,
          error: err instanceof Error ? err.message : String(err),
          code: isStoreSenseError(err) ? err.code : undefined,
        },
      });
      logger.error({ err, filename: file.filename }, 'Ingestion failed');
      throw err;
    }
  }

  /** Every file gets a result; one failing file does not fail the batch. */
  async ingestBatch(files: UploadedFile[]): Promise<Array<IngestResult | IngestFailure>> {
    return Promise.all(
      files.map((file) =>
        this.ingest(file).catch(
          (err: unknown): IngestFailure => ({
            status: 'error',
            filename: file.filename,
            error: err instanceof Error ? err.message : String(err),
            ...(isStoreSenseError(err) ? { code: err.code } : {}),
          }),
        ),
      ),
    );
  }

  private async process(file: UploadedFile): Promise<IngestResult> {
    const detection = await detectKind(file.bytes, file.filename, file.mimeType);
    logger.info({ filename: file.filename, kind: detection.kind, mimeType: detection.mimeType }, 'Received upload');
    switch (detection.kind) {
      case 'json':
        return this.processJson(file, detection.mimeType);
      case 'media':
        return this.processMedia(file, detection.mimeType);
      case 'document':
        return this.processDocument(file, detection.mimeType);
      default:
        throw new UnsupportedFileTypeError(file.filename, detection.mimeType);
    }
  }

  private async processJson(file: UploadedFile, mimeType: string): Promise<JsonIngestResult> {
    let payload: unknown;
    try {
      payload = JSON.parse(file.bytes.toString('utf8'));
    } catch (err) {
      throw new InvalidJsonError(file.filename, err);
    }
    const { records, isArrayRoot } = toRecords(payload);
    const { descriptor, decision } = this.core.inspect(records, isArrayRoot);
    const location = await this.core.applySchema(decision);
    const inserted = await this.core.insertRecords(decision, records);
    const storageLocation = describeLocation(location);
    const indexId = await this.core.recordIngestion({
      filename: file.filename,
      kind: 'json',
      categoryOrSchema: decision.schemaName,
      storageType: decision.storageType,
      storageLocation,
      mimeType,
      metadata: { records: inserted.records, rows: inserted.rows, tables: inserted.tables },
    });

    return {
      status: 'success',
      type: 'json',
      filename: file.filename,
      category: decision.schemaName,
      location: storageLocation,
      indexId,
      mimeType,
      storageType: decision.storageType,
      summary: {
        structure: isArrayRoot ? 'batch' : 'single',
        fieldCount: descriptor.fieldCount,
        nestingDepth: descriptor.nestingDepth,
        consistency: descriptor.consistency,
        storageType: decision.storageType,
        recordsInserted: inserted.records,
        rowsWritten: inserted.rows,
        sampleKeys: descriptor.topLevelFields.slice(0, SAMPLE_KEY_COUNT),
      },
    };
  }

  private async processMedia(file: UploadedFile, mimeType: string): Promise<MediaIngestResult> {
    const resolution = await this.core.resolveMedia(file.bytes, file.filename);
    const dimensions = readImageDimensions(file.bytes, mimeType);
    const location = await this.files.store(resolution.category, file.filename, file.bytes);
    const indexId = await this.core.recordIngestion({
      filename: file.filename,
      kind: 'media',
      categoryOrSchema: resolution.category,
      storageLocation: location,
      mimeType,
      metadata: {
        sizeBytes: file.bytes.length,
        resolvedBy: resolution.strategy,
        ...(dimensions ? { width: dimensions.width, height: dimensions.height } : {}),
      },
    });
    return {
      status: 'success',
      type: 'media',
      filename: file.filename,
      category: resolution.category,
      location,
      indexId,
      mimeType,
      summary: {
        format: dimensions?.format?.toUpperCase() ?? formatOf(mimeType),
        dimensions: formatDimensions(dimensions),
        sizeBytes: file.bytes.length,
        resolvedBy: resolution.strategy,
      },
    };
  }

  private async processDocument(file: UploadedFile, mimeType: string): Promise<DocumentIngestResult> {
    const extracted = await this.extract(file, mimeType);
    const resolution = await this.core.resolveDocument(file.bytes, file.filename, extracted.text);
    const location = await this.files.store(resolution.category, file.filename, file.bytes);
    const wordCount = countWords(extracted.text);
    const indexId = await this.core.recordIngestion({
      filename: file.filename,
      kind: 'document',
      categoryOrSchema: resolution.category,
      storageLocation: location,
      mimeType,
      text: extracted.text,
      metadata: { ...extracted.properties, wordCount, sizeBytes: file.bytes.length },
    });
    return {
      status: 'success',
      type: 'document',
      filename: file.filename,
      category: resolution.category,
      location,
      indexId,
      mimeType,
      summary: {
        wordCount,
        characterCount: extracted.text.length,
        textPreview: previewText(extracted.text),
        properties: extracted.properties,
        resolvedBy: resolution.strategy,
      },
    };
  }

  private async extract(file: UploadedFile, mimeType: string): Promise<ExtractedText> {
    try {
      return await this.extractText(file.bytes, mimeType);
    } catch (err) {
      logger.warn({ err, filename: file.filename, mimeType }, 'Text extraction failed, continuing without text');
      return { text: '', properties: {} };
    }
  }
}
