// Stored alongside each chunk vector. A type alias (not an interface) so it
// satisfies the index's record-metadata constraint.
export type ChunkMetadata = {
  // Document identification
  doc_id: string; // e.g., "resume:1234"
  doc_type: 'resume';
  chunk_index: number;
  text: string;

  filename: string;
  pages: number;
  ingested_at: string; // ISO timestamp
  mimetype: string;
  full_text_length: number;
  embedding_model: string;
  embedding_dimension: number;
};

/** Metadata shared by every chunk of one document. */
export type DocumentMetadata = Omit<ChunkMetadata, 'doc_id' | 'doc_type' | 'chunk_index' | 'text'>;

export interface StoredChunk {
  chunkId: string;
  documentId: string;
  ordinal: number;
  text: string;
  metadata: ChunkMetadata;
}

export interface RetrievalHit {
  chunkId: string;
  documentId: string;
  filename: string;
  ordinal: number;
  text: string;
  distance: number;
  relevanceScore?: number;
}

export interface CandidateContext {
  documentId: string;
  filename: string;
  chunks: Array<{ text: string; relevanceScore?: number }>;
}

export type MetadataFilter = Partial<Pick<ChunkMetadata, 'doc_id' | 'doc_type' | 'filename'>>;

export interface DocumentHint {
  filename?: string;
  mimetype?: string;
}

export interface ExtractionResult {
  text: string;
  pages: number;
}

export interface DocumentSource {
  extract(path: string, hint?: DocumentHint): Promise<ExtractionResult>;
  extractText(path: string, hint?: DocumentHint): Promise<string>;
  extractPageCount(path: string, hint?: DocumentHint): Promise<number>;
}

export interface EmbeddingProvider {
  readonly modelName: string;
  embed(texts: string[]): Promise<number[][]>;
  embedOne(text: string): Promise<number[]>;
  getDimension(): number;
}

export interface VectorIndex {
  upsert(documentId: string, chunks: string[], embeddings: number[][], metadata: DocumentMetadata): Promise<void>;
  query(embedding: number[], topK: number, filter?: MetadataFilter): Promise<RetrievalHit[]>;
  getChunks(documentId: string): Promise<StoredChunk[]>;
  delete(documentId: string): Promise<void>;
  listDocumentIds(): Promise<Set<string>>;
}

export interface GenerationOptions {
  temperature: number;
  maxOutputTokens: number;
}

export interface TextGenerationOracle {
  readonly name: string;
  generate(prompt: string, options: GenerationOptions): Promise<string>;
}

export interface IngestResult {
  document_id: string;
  chunk_count: number;
  filename: string;
}

export interface DocumentSummary {
  document_id: string;
  filename: string;
  pages: number;
  ingested_at: string;
  chunk_count: number;
}

export interface DocumentDetail extends DocumentSummary {
  chunks: Array<{ chunk_id: string; ordinal: number; text: string }>;
}

export function chunkIdFor(documentId: string, ordinal: number): string {
  return `${documentId}::chunk::${ordinal}`;
}
