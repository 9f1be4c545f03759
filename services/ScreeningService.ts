import {
  CandidateContext,
  DocumentDetail,
  DocumentHint,
  DocumentSummary,
  EmbeddingProvider,
  IngestResult,
  RetrievalHit,
  VectorIndex
} from '../types';
import { AnalysisReport } from '../types/report';
import { EmptyCorpusError, InvalidRequestError } from '../utils/errors';
import { RankingService } from './RankingService';
import { ReportGenerator } from './ReportSynthesizer';
import { ResumeIngestionService } from './ResumeIngestionService';
import { RetrievalAggregator } from './RetrievalAggregator';

const LISTING_CONCURRENCY = 10;

export type EmptyReason = 'empty_corpus' | 'no_hits';

export type AnalyzeResult =
  | { status: 'ok'; report: AnalysisReport; contexts: CandidateContext[] }
  | { status: 'empty'; reason: EmptyReason };

export type RankResult =
  | { status: 'ok'; reports: AnalysisReport[] }
  | { status: 'empty'; reason: 'empty_corpus' };

export interface ScreeningServiceDeps {
  ingestion: ResumeIngestionService;
  embeddingProvider: EmbeddingProvider;
  vectorIndex: VectorIndex;
  aggregator: RetrievalAggregator;
  synthesizer: ReportGenerator;
  ranker: RankingService;
  defaultTopK: number;
}

function requireText(value: string, field: string): string {
  const trimmed = typeof value === 'string' ? value.trim() : '';
  if (!trimmed) {
    throw new InvalidRequestError(`${field} is required`);
  }
  return trimmed;
}

/**
 * Entry point for callers: ingestion, raw retrieval, single-context analysis
 * and corpus ranking. Empty conditions come back as `status: 'empty'`; only
 * failures reject.
 */
export class ScreeningService {
  private deps: ScreeningServiceDeps;

  constructor(deps: ScreeningServiceDeps) {
    this.deps = deps;
  }

  ingest(filePath: string, hint?: DocumentHint): Promise<IngestResult> {
    return this.deps.ingestion.ingest(filePath, hint);
  }

  async query(keywords: string, topK: number = this.deps.defaultTopK): Promise<RetrievalHit[]> {
    const text = requireText(keywords, 'keywords');
    const embedding = await this.deps.embeddingProvider.embedOne(text);
    return this.deps.vectorIndex.query(embedding, topK);
  }

  /**
   * One report over the combined top-k window. When the hits span several
   * resumes the report covers all of them; use `rank` to compare candidates.
   */
  async analyze(jobDescription: string, topK: number = this.deps.defaultTopK): Promise<AnalyzeResult> {
    const text = requireText(jobDescription, 'jobDescription');

    const hits = await this.query(text, topK);
    if (hits.length === 0) {
      // Only an empty result needs the listing to tell the two cases apart
      const documentIds = await this.deps.vectorIndex.listDocumentIds();
      if (documentIds.size === 0) {
        return { status: 'empty', reason: 'empty_corpus' };
      }
      console.warn(`[ScreeningService] No matching resume chunks for job description`);
      return { status: 'empty', reason: 'no_hits' };
    }

    const contexts = Array.from(this.deps.aggregator.aggregate(hits).values());
    const combinedContext = this.deps.aggregator.combineContexts(contexts);
    const report = await this.deps.synthesizer.synthesize(text, combinedContext);

    return { status: 'ok', report, contexts };
  }

  async rank(jobDescription: string, topKPerDocument: number = 3, maxDocuments?: number): Promise<RankResult> {
    const text = requireText(jobDescription, 'jobDescription');
    try {
      const reports = await this.deps.ranker.rankAll(text, topKPerDocument, maxDocuments);
      return { status: 'ok', reports };
    } catch (error) {
      if (error instanceof EmptyCorpusError) {
        return { status: 'empty', reason: 'empty_corpus' };
      }
      throw error;
    }
  }

  /** One summary per indexed resume, ordered by document id. */
  async listDocuments(): Promise<DocumentSummary[]> {
    const ids = Array.from(await this.deps.vectorIndex.listDocumentIds()).sort();
    const summaries: DocumentSummary[] = [];

    for (let i = 0; i < ids.length; i += LISTING_CONCURRENCY) {
      const batch = await Promise.all(ids.slice(i, i + LISTING_CONCURRENCY).map(id => this.getDocument(id)));
      for (const detail of batch) {
        if (detail) {
          const { chunks: _chunks, ...summary } = detail;
          summaries.push(summary);
        }
      }
    }
    return summaries;
  }

  /** A resume's metadata and its chunks in ordinal order, or null when it is not indexed. */
  async getDocument(documentId: string): Promise<DocumentDetail | null> {
    const chunks = await this.deps.vectorIndex.getChunks(requireText(documentId, 'documentId'));
    if (chunks.length === 0) {
      return null;
    }

    const { metadata } = chunks[0];
    return {
      document_id: chunks[0].documentId,
      filename: metadata.filename,
      pages: metadata.pages,
      ingested_at: metadata.ingested_at,
      chunk_count: chunks.length,
      chunks: chunks.map(chunk => ({
        chunk_id: chunk.chunkId,
        ordinal: chunk.ordinal,
        text: chunk.text
      }))
    };
  }

  deleteDocument(documentId: string): Promise<void> {
    return this.deps.vectorIndex.delete(requireText(documentId, 'documentId'));
  }
}
