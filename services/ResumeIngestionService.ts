import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { DocumentHint, DocumentMetadata, DocumentSource, EmbeddingProvider, IngestResult, VectorIndex } from '../types';
import { EmptyDocumentError, IngestionError, errorMessage } from '../utils/errors';
import { sleep } from '../utils/timeout';
import { ChunkingService } from './ChunkingService';
import { TextCleaningService } from './TextCleaningService';

export interface IngestionOptions {
  maxAttempts: number;
  retryDelayMs: number;
}

export class ResumeIngestionService {
  private documentSource: DocumentSource;
  private textCleaner: TextCleaningService;
  private chunker: ChunkingService;
  private embeddingProvider: EmbeddingProvider;
  private vectorIndex: VectorIndex;
  private options: IngestionOptions;

  constructor(
    documentSource: DocumentSource,
    textCleaner: TextCleaningService,
    chunker: ChunkingService,
    embeddingProvider: EmbeddingProvider,
    vectorIndex: VectorIndex,
    options: IngestionOptions = { maxAttempts: 3, retryDelayMs: 1000 }
  ) {
    this.documentSource = documentSource;
    this.textCleaner = textCleaner;
    this.chunker = chunker;
    this.embeddingProvider = embeddingProvider;
    this.vectorIndex = vectorIndex;
    this.options = options;
  }

  async ingest(filePath: string, hint: DocumentHint = {}): Promise<IngestResult> {
    const filename = hint.filename || path.basename(filePath);
    const documentId = `resume:${uuidv4()}`;
    console.log(`[ResumeIngestionService] Starting ingestion - Doc ID: ${documentId}, File: ${filename}`);

    const extraction = await this.documentSource.extract(filePath, hint);
    const cleanedText = this.textCleaner.cleanText(extraction.text);
    const chunks = cleanedText ? this.chunker.chunk(cleanedText) : [];
    if (chunks.length === 0) {
      throw new EmptyDocumentError(filename);
    }

    const metadata: DocumentMetadata = {
      filename,
      pages: extraction.pages,
      ingested_at: new Date().toISOString(),
      mimetype: hint.mimetype || 'application/octet-stream',
      full_text_length: cleanedText.length,
      embedding_model: this.embeddingProvider.modelName,
      embedding_dimension: this.embeddingProvider.getDimension()
    };

    await this.indexChunks(documentId, chunks, metadata);
    console.log(`[ResumeIngestionService] Ingested ${filename} as ${documentId} with ${chunks.length} chunks`);

    return {
      document_id: documentId,
      chunk_count: chunks.length,
      filename
    };
  }

  private async indexChunks(documentId: string, chunks: string[], metadata: DocumentMetadata): Promise<void> {
    const { maxAttempts, retryDelayMs } = this.options;

    for (let attempt = 1; ; attempt++) {
      try {
        const embeddings = await this.embeddingProvider.embed(chunks);
        await this.vectorIndex.upsert(documentId, chunks, embeddings, metadata);
        return;
      } catch (error) {
        console.error(`[ResumeIngestionService] ERROR indexing ${documentId} (attempt ${attempt}/${maxAttempts}):`, error);

        // Contract violations will not succeed on retry
        if (error instanceof IngestionError || attempt >= maxAttempts) {
          await this.discardPartialDocument(documentId);
          if (error instanceof IngestionError) {
            throw error;
          }
          throw new IngestionError(
            'INDEXING_FAILED',
            `Failed to index ${metadata.filename} after ${attempt} attempts: ${errorMessage(error)}`,
            { cause: error }
          );
        }

        const delay = retryDelayMs * attempt;
        console.log(`[ResumeIngestionService] Retrying in ${delay}ms...`);
        await sleep(delay);
      }
    }
  }

  // A document is stored as a unit, so a failed upsert must not leave stray chunks
  private async discardPartialDocument(documentId: string): Promise<void> {
    try {
      await this.vectorIndex.delete(documentId);
    } catch (error) {
      console.error(`[ResumeIngestionService] ERROR removing partial chunks for ${documentId}:`, error);
    }
  }
}
