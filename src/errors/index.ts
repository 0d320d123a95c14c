/**
 * Error taxonomy for the ingestion core.
 * Every error carries a stable code and the structured context needed to debug it.
 */

export enum ErrorCode {
  // Payload errors (1xxx)
  EMPTY_INPUT = 'E1000',
  INCONSISTENT_ARRAY = 'E1001',
  NESTING_LIMIT = 'E1002',
  INVALID_JSON = 'E1003',
  UNSUPPORTED_FILE_TYPE = 'E1004',

  // Schema errors (2xxx)
  SCHEMA_NAME_COLLISION = 'E2000',

  // Backend errors (3xxx)
  BACKEND_APPLY_FAILED = 'E3000',
  BACKEND_INSERT_FAILED = 'E3001',

  // Index errors (4xxx)
  INDEX_PERSISTENCE_FAILED = 'E4000',
}

export type ErrorContext = Record<string, unknown>;

export class StoreSenseError extends Error {
  public readonly code: ErrorCode;
  public readonly context: ErrorContext;

  constructor(message: string, code: ErrorCode, context: ErrorContext = {}, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'StoreSenseError';
    this.code = code;
    this.context = context;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
    };
  }

  toString(): string {
    return `[${this.code}] ${this.name}: ${this.message}`;
  }
}

/**
 * Input that cannot be analyzed. The HTTP layer maps this family to 4xx.
 */
export class PayloadRejectedError extends StoreSenseError {
  constructor(message: string, code: ErrorCode, context: ErrorContext = {}, cause?: unknown) {
    super(message, code, context, cause);
    this.name = 'PayloadRejectedError';
  }
}

export class EmptyInputError extends PayloadRejectedError {
  constructor(context: ErrorContext = {}) {
    super('No records to analyze', ErrorCode.EMPTY_INPUT, context);
    this.name = 'EmptyInputError';
  }
}

export class InconsistentArrayError extends PayloadRejectedError {
  constructor(path: string, elementTypes: string[]) {
    super(
      `Array at "${path || '<root>'}" mixes objects and scalars (${elementTypes.join(', ')})`,
      ErrorCode.INCONSISTENT_ARRAY,
      { path, elementTypes },
    );
    this.name = 'InconsistentArrayError';
  }
}

export class NestingLimitError extends PayloadRejectedError {
  constructor(path: string, limit: number) {
    super(`Nesting at "${path}" exceeds the limit of ${limit}`, ErrorCode.NESTING_LIMIT, {
      path,
      limit,
    });
    this.name = 'NestingLimitError';
  }
}

export class InvalidJsonError extends PayloadRejectedError {
  constructor(filename: string, cause: unknown) {
    super(
      `Invalid JSON in ${filename}: ${cause instanceof Error ? cause.message : String(cause)}`,
      ErrorCode.INVALID_JSON,
      { filename },
      cause,
    );
    this.name = 'InvalidJsonError';
  }
}

export class UnsupportedFileTypeError extends PayloadRejectedError {
  constructor(filename: string, mimeType: string) {
    super(`Unsupported file type: ${mimeType}`, ErrorCode.UNSUPPORTED_FILE_TYPE, {
      filename,
      mimeType,
    });
    this.name = 'UnsupportedFileTypeError';
  }
}

export class SchemaNameCollisionError extends StoreSenseError {
  constructor(schemaName: string, fingerprint: string, existingPaths: string[], incomingPaths: string[]) {
    super(
      `Schema name ${schemaName} already belongs to a different field set`,
      ErrorCode.SCHEMA_NAME_COLLISION,
      { schemaName, fingerprint, existingPaths, incomingPaths },
    );
    this.name = 'SchemaNameCollisionError';
  }
}

export class BackendApplyError extends StoreSenseError {
  constructor(backend: string, schemaName: string, attempts: number, cause: unknown) {
    super(
      `Backend ${backend} failed to apply ${schemaName} after ${attempts} attempt(s)`,
      ErrorCode.BACKEND_APPLY_FAILED,
      {
        backend,
        schemaName,
        attempts,
        reason: cause instanceof Error ? cause.message : String(cause),
      },
      cause,
    );
    this.name = 'BackendApplyError';
  }
}

export class BackendInsertError extends StoreSenseError {
  constructor(backend: string, target: string, rows: number, cause: unknown) {
    super(
      `Backend ${backend} failed to insert ${rows} row(s) into ${target}`,
      ErrorCode.BACKEND_INSERT_FAILED,
      {
        backend,
        target,
        rows,
        reason: cause instanceof Error ? cause.message : String(cause),
      },
      cause,
    );
    this.name = 'BackendInsertError';
  }
}

export class IndexPersistenceError extends StoreSenseError {
  constructor(operation: string, filename: string, cause: unknown) {
    super(
      `Index ${operation} failed for ${filename}`,
      ErrorCode.INDEX_PERSISTENCE_FAILED,
      { operation, filename, reason: cause instanceof Error ? cause.message : String(cause) },
      cause,
    );
    this.name = 'IndexPersistenceError';
  }
}

export const isStoreSenseError = (error: unknown): error is StoreSenseError =>
  error instanceof StoreSenseError;
