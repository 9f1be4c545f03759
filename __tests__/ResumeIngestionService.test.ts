import * as os from 'os';
import * as path from 'path';
import { ChunkingService } from '../services/ChunkingService';
import { ResumeIngestionService } from '../services/ResumeIngestionService';
import { TextCleaningService } from '../services/TextCleaningService';
import { TextExtractionService } from '../services/TextExtractionService';
import { DocumentMetadata, DocumentSource } from '../types';
import { ArityMismatchError, DocumentNotFoundError, EmptyDocumentError, IngestionError, VectorDimensionError } from '../utils/errors';
import { InMemoryVectorIndex, KeywordEmbeddingProvider, StaticDocumentSource } from './support/fakes';

class FailingEmbeddingProvider extends KeywordEmbeddingProvider {
  constructor(private failures: number) {
    super();
  }

  async embed(texts: string[]): Promise<number[][]> {
    if (this.failures > 0) {
      this.failures--;
      this.calls.push(texts);
      throw new Error('socket hang up');
    }
    return super.embed(texts);
  }
}

class ShortEmbeddingProvider extends KeywordEmbeddingProvider {
  async embed(texts: string[]): Promise<number[][]> {
    const embeddings = await super.embed(texts);
    return embeddings.slice(1);
  }
}

/** Writes the first chunk, then fails, leaving a partial document behind. */
class PartialWriteIndex extends InMemoryVectorIndex {
  deletes: string[] = [];

  async upsert(documentId: string, chunks: string[], embeddings: number[][], metadata: DocumentMetadata): Promise<void> {
    await super.upsert(documentId, chunks.slice(0, 1), embeddings.slice(0, 1), metadata);
    throw new Error('upsert timed out');
  }

  async delete(documentId: string): Promise<void> {
    this.deletes.push(documentId);
    return super.delete(documentId);
  }
}

class WrongDimensionIndex extends InMemoryVectorIndex {
  upserts = 0;

  async upsert(): Promise<void> {
    this.upserts++;
    throw new VectorDimensionError(768, 6);
  }
}

describe('ResumeIngestionService', () => {
  const resumeText = 'abcdefghij'.repeat(250);
  let index: InMemoryVectorIndex;

  function createService(
    source: DocumentSource,
    embeddingProvider: KeywordEmbeddingProvider = new KeywordEmbeddingProvider(),
    vectorIndex: InMemoryVectorIndex = index
  ): ResumeIngestionService {
    return new ResumeIngestionService(
      source,
      new TextCleaningService(),
      new ChunkingService({ chunkSize: 1000, chunkOverlap: 200 }),
      embeddingProvider,
      vectorIndex,
      { maxAttempts: 3, retryDelayMs: 0 }
    );
  }

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
    index = new InMemoryVectorIndex();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should chunk, embed and index a 2500-character resume', async () => {
    const service = createService(new StaticDocumentSource({ text: resumeText, pages: 2 }));

    const result = await service.ingest('/uploads/tmp-123', { filename: 'jordan.pdf', mimetype: 'application/pdf' });

    expect(result.document_id).toMatch(/^resume:[0-9a-f-]{36}$/);
    expect(result).toEqual({ document_id: result.document_id, chunk_count: 3, filename: 'jordan.pdf' });

    expect(await index.listDocumentIds()).toEqual(new Set([result.document_id]));
    const chunks = await index.getChunks(result.document_id);
    expect(chunks.map(chunk => chunk.ordinal)).toEqual([0, 1, 2]);
    expect(chunks.map(chunk => chunk.chunkId)).toEqual([0, 1, 2].map(i => `${result.document_id}::chunk::${i}`));
    for (let i = 0; i < chunks.length; i++) {
      expect(chunks[i].text.length).toBeLessThanOrEqual(1000);
      if (i > 0) {
        expect(chunks[i].text.slice(0, 200)).toBe(chunks[i - 1].text.slice(-200));
      }
    }
  });

  it('should store document metadata on every chunk', async () => {
    const service = createService(new StaticDocumentSource({ text: resumeText, pages: 2 }));

    const result = await service.ingest('/uploads/tmp-123', { filename: 'jordan.pdf', mimetype: 'application/pdf' });
    const [first] = await index.getChunks(result.document_id);

    expect(first.metadata).toMatchObject({
      doc_id: result.document_id,
      doc_type: 'resume',
      chunk_index: 0,
      filename: 'jordan.pdf',
      pages: 2,
      mimetype: 'application/pdf',
      full_text_length: 2500,
      embedding_model: 'keyword-test-embedding',
      embedding_dimension: 6
    });
    expect(Number.isNaN(Date.parse(first.metadata.ingested_at))).toBe(false);
  });

  it('should name the document after the file when no hint is given', async () => {
    const service = createService(new StaticDocumentSource({ text: 'Python developer', pages: 1 }));

    const result = await service.ingest('/uploads/casey.txt');

    expect(result.filename).toBe('casey.txt');
    const [chunk] = await index.getChunks(result.document_id);
    expect(chunk.metadata.mimetype).toBe('application/octet-stream');
  });

  it('should reject a document with no text', async () => {
    const service = createService(new StaticDocumentSource({ text: '  \n\n Page 1 of 2 \n', pages: 1 }));

    await expect(service.ingest('/uploads/blank.pdf')).rejects.toBeInstanceOf(EmptyDocumentError);
    expect(index.size).toBe(0);
  });

  it('should reject a missing file as DocumentNotFoundError', async () => {
    const service = createService(new TextExtractionService());
    const missing = path.join(os.tmpdir(), 'no-such-resume-9f2c.txt');

    await expect(service.ingest(missing)).rejects.toBeInstanceOf(DocumentNotFoundError);
  });

  it('should retry a transient embedding failure', async () => {
    const embeddingProvider = new FailingEmbeddingProvider(1);
    const service = createService(new StaticDocumentSource({ text: resumeText, pages: 2 }), embeddingProvider);

    const result = await service.ingest('/uploads/tmp-123');

    expect(embeddingProvider.calls).toHaveLength(2);
    expect(result.chunk_count).toBe(3);
    expect(index.size).toBe(3);
  });

  it('should remove partial chunks and report INDEXING_FAILED after the last attempt', async () => {
    const partialIndex = new PartialWriteIndex();
    const service = createService(
      new StaticDocumentSource({ text: resumeText, pages: 2 }),
      new KeywordEmbeddingProvider(),
      partialIndex
    );

    const failure = service.ingest('/uploads/tmp-123', { filename: 'jordan.pdf' });

    await expect(failure).rejects.toBeInstanceOf(IngestionError);
    await expect(failure).rejects.toMatchObject({ code: 'INDEXING_FAILED' });
    expect(partialIndex.deletes).toHaveLength(1);
    expect(partialIndex.size).toBe(0);
  });

  it('should not retry an arity mismatch', async () => {
    const embeddingProvider = new ShortEmbeddingProvider();
    const service = createService(new StaticDocumentSource({ text: resumeText, pages: 2 }), embeddingProvider);

    await expect(service.ingest('/uploads/tmp-123')).rejects.toBeInstanceOf(ArityMismatchError);
    expect(embeddingProvider.calls).toHaveLength(1);
    expect(index.size).toBe(0);
  });

  it('should not retry a vector dimension mismatch', async () => {
    const wrongDimension = new WrongDimensionIndex();
    const service = createService(
      new StaticDocumentSource({ text: resumeText, pages: 2 }),
      new KeywordEmbeddingProvider(),
      wrongDimension
    );

    await expect(service.ingest('/uploads/tmp-123')).rejects.toBeInstanceOf(VectorDimensionError);
    expect(wrongDimension.upserts).toBe(1);
  });
});
