/**
 * Error taxonomy for the screening pipeline.
 *
 * Ingestion errors are contained per document, retrieval errors become typed
 * empty results at the service boundary, and synthesis failures never leave
 * the synthesizer (they resolve to the fallback report).
 */
export class ScreeningError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ConfigurationError extends ScreeningError {
  constructor(message: string) {
    super('CONFIGURATION_ERROR', message);
  }
}

export class InvalidRequestError extends ScreeningError {
  constructor(message: string) {
    super('INVALID_REQUEST', message);
  }
}

// Ingestion

export class IngestionError extends ScreeningError {}

export class DocumentNotFoundError extends IngestionError {
  constructor(path: string) {
    super('NOT_FOUND', `Document not found: ${path}`);
  }
}

export class UnreadableDocumentError extends IngestionError {
  constructor(message: string, cause?: unknown) {
    super('UNREADABLE_DOCUMENT', message, { cause });
  }
}

export class EmptyDocumentError extends IngestionError {
  constructor(filename: string) {
    super('EMPTY_DOCUMENT', `No text extracted from ${filename}`);
  }
}

export class ArityMismatchError extends IngestionError {
  constructor(chunkCount: number, embeddingCount: number) {
    super('ARITY_MISMATCH', `Chunk count (${chunkCount}) does not match embedding count (${embeddingCount})`);
  }
}

export class VectorDimensionError extends IngestionError {
  constructor(expected: number, actual: number) {
    super('DIMENSION_MISMATCH', `Vector dimension mismatch: expected ${expected} but found ${actual}`);
  }
}

export class EmptyBatchError extends IngestionError {
  constructor() {
    super('EMPTY_BATCH', 'Chunks and embeddings cannot be empty');
  }
}

// Retrieval

export class RetrievalError extends ScreeningError {}

export class EmptyCorpusError extends RetrievalError {
  constructor() {
    super('EMPTY_CORPUS', 'No resumes found in the index. Please upload resumes first.');
  }
}

// Synthesis (absorbed by the fallback report)

export class SynthesisFailure extends ScreeningError {}

export class OracleUnavailableError extends SynthesisFailure {
  constructor(message: string) {
    super('ORACLE_UNAVAILABLE', message);
  }
}

export class GenerationError extends SynthesisFailure {
  constructor(message: string, cause?: unknown) {
    super('GENERATION_ERROR', message, { cause });
  }
}

export class OracleTimeoutError extends SynthesisFailure {
  constructor(timeoutMs: number) {
    super('ORACLE_TIMEOUT', `Oracle did not respond within ${timeoutMs}ms`);
  }
}

export class MalformedResponseError extends SynthesisFailure {
  constructor(reason: string) {
    super('MALFORMED_RESPONSE', reason);
  }
}

// Errors raised in another realm (Jest's sandbox, vm contexts) fail `instanceof Error`,
// so these read the fields structurally.
export function errorMessage(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return typeof error === 'string' ? error : 'Unknown error';
}

export function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
