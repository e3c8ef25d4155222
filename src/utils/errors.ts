/**
 * Error taxonomy for the knowledge base.
 *
 * Structural errors (NotFoundError, InvalidParentError, AmbiguousQuestionError,
 * DuplicateRecordError, ValidationError) are thrown before anything is mutated. EmbeddingError and VectorIndexError
 * wrap failures of external collaborators and reach the caller unchanged.
 * GenerationError is raised by the generators and recovered inside the
 * retrieval core.
 */

export type ErrorCode =
  | 'NOT_FOUND'
  | 'INVALID_PARENT'
  | 'AMBIGUOUS_QUESTION'
  | 'DUPLICATE_RECORD'
  | 'VALIDATION_ERROR'
  | 'EMBEDDING_ERROR'
  | 'INDEX_ERROR'
  | 'GENERATION_ERROR'
  | 'CONFIG_ERROR';

export class KnowledgeBaseError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'KnowledgeBaseError';
    this.code = code;
  }
}

export class NotFoundError extends KnowledgeBaseError {
  constructor(entity: string, key: string | number) {
    super('NOT_FOUND', `${entity} not found: ${key}`);
    this.name = 'NotFoundError';
  }
}

export class InvalidParentError extends KnowledgeBaseError {
  readonly parentId: number;

  constructor(parentId: number) {
    super('INVALID_PARENT', `Parent question does not exist: ${parentId}`);
    this.name = 'InvalidParentError';
    this.parentId = parentId;
  }
}

export class AmbiguousQuestionError extends KnowledgeBaseError {
  readonly recordIds: string[];

  constructor(question: string, recordIds: string[]) {
    super(
      'AMBIGUOUS_QUESTION',
      `Question "${question}" matches ${recordIds.length} records: ${recordIds.join(', ')}`
    );
    this.name = 'AmbiguousQuestionError';
    this.recordIds = recordIds;
  }
}

export class DuplicateRecordError extends KnowledgeBaseError {
  constructor(recordId: string) {
    super('DUPLICATE_RECORD', `QA record already exists: ${recordId}`);
    this.name = 'DuplicateRecordError';
  }
}

export class ValidationError extends KnowledgeBaseError {
  constructor(message: string) {
    super('VALIDATION_ERROR', message);
    this.name = 'ValidationError';
  }
}

export class EmbeddingError extends KnowledgeBaseError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('EMBEDDING_ERROR', message, options);
    this.name = 'EmbeddingError';
  }
}

export class VectorIndexError extends KnowledgeBaseError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('INDEX_ERROR', message, options);
    this.name = 'VectorIndexError';
  }
}

export class GenerationError extends KnowledgeBaseError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('GENERATION_ERROR', message, options);
    this.name = 'GenerationError';
  }
}

export class ConfigError extends KnowledgeBaseError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('CONFIG_ERROR', `Configuration validation failed:\n${issues.map((i) => `  - ${i}`).join('\n')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/**
 * Message of an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
