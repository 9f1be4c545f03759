import { Index, Pinecone, PineconeRecord } from '@pinecone-database/pinecone';
import {
  ChunkMetadata,
  DocumentMetadata,
  MetadataFilter,
  RetrievalHit,
  StoredChunk,
  VectorIndex,
  chunkIdFor
} from '../types';
import { ArityMismatchError, EmptyBatchError, VectorDimensionError, errorMessage } from '../utils/errors';
import { IndexMetric, relevanceFromDistance, scoreToDistance } from '../utils/scoreNormalization';

const UPSERT_BATCH_SIZE = 50;
// Pinecone has limits on URL length, so large fetches are split
const FETCH_BATCH_SIZE = 100;
const DOCUMENT_ID_PREFIX = 'resume:';
const CHUNK_SEPARATOR = '::chunk::';

export class PineconeService implements VectorIndex {
  private pinecone: Pinecone;
  private index: Index<ChunkMetadata>;
  private indexName: string;
  private dimension: number;
  private metric: IndexMetric | null = null;

  constructor(apiKey: string, indexName: string, dimension: number) {
    this.pinecone = new Pinecone({ apiKey });
    this.index = this.pinecone.index<ChunkMetadata>(indexName);
    this.indexName = indexName;
    this.dimension = dimension;
  }

  async upsert(documentId: string, chunks: string[], embeddings: number[][], metadata: DocumentMetadata): Promise<void> {
    if (chunks.length === 0 || embeddings.length === 0) {
      throw new EmptyBatchError();
    }
    if (chunks.length !== embeddings.length) {
      throw new ArityMismatchError(chunks.length, embeddings.length);
    }

    // The index only accepts vectors of its configured dimension
    for (const vector of embeddings) {
      if (vector.length !== this.dimension) {
        console.error(`[PineconeService] ERROR: Vector dimension (${vector.length}) doesn't match configured dimension (${this.dimension})`);
        throw new VectorDimensionError(this.dimension, vector.length);
      }
    }

    const records: Array<PineconeRecord<ChunkMetadata>> = chunks.map((text, ordinal) => ({
      id: chunkIdFor(documentId, ordinal),
      values: embeddings[ordinal],
      metadata: {
        ...metadata,
        doc_id: documentId,
        doc_type: 'resume',
        chunk_index: ordinal,
        text
      }
    }));

    try {
      for (let i = 0; i < records.length; i += UPSERT_BATCH_SIZE) {
        await this.index.upsert(records.slice(i, i + UPSERT_BATCH_SIZE));
      }
    } catch (error) {
      console.error(`[PineconeService] ERROR: Failed to upsert vectors for ${documentId}:`, error);
      throw new Error(`Failed to upsert vectors to Pinecone: ${errorMessage(error)}`, { cause: error });
    }
  }

  async query(embedding: number[], topK: number, filter?: MetadataFilter): Promise<RetrievalHit[]> {
    try {
      const metric = await this.getIndexMetric();
      const queryResponse = await this.index.query({
        vector: embedding,
        topK,
        includeMetadata: true,
        includeValues: false,
        ...(filter ? { filter: this.buildFilter(filter) } : {})
      });

      const hits: RetrievalHit[] = [];
      for (const match of queryResponse.matches) {
        if (!match.metadata || match.score === undefined) {
          continue;
        }
        const distance = scoreToDistance(match.score, metric);
        hits.push({
          chunkId: match.id,
          documentId: match.metadata.doc_id,
          filename: match.metadata.filename,
          ordinal: match.metadata.chunk_index,
          text: match.metadata.text,
          distance,
          relevanceScore: relevanceFromDistance(distance)
        });
      }
      return hits;
    } catch (error) {
      console.error(`[PineconeService] ERROR: Failed to query Pinecone:`, error);
      throw new Error(`Failed to query Pinecone: ${errorMessage(error)}`, { cause: error });
    }
  }

  async getChunks(documentId: string): Promise<StoredChunk[]> {
    const ids = await this.listIds(`${documentId}${CHUNK_SEPARATOR}`);
    if (ids.length === 0) {
      return [];
    }

    const chunks: StoredChunk[] = [];
    try {
      for (let i = 0; i < ids.length; i += FETCH_BATCH_SIZE) {
        const fetchResponse = await this.index.fetch(ids.slice(i, i + FETCH_BATCH_SIZE));
        for (const record of Object.values(fetchResponse.records ?? {})) {
          if (!record.metadata) {
            continue;
          }
          chunks.push({
            chunkId: record.id,
            documentId,
            ordinal: record.metadata.chunk_index,
            text: record.metadata.text,
            metadata: record.metadata
          });
        }
      }
    } catch (error) {
      console.error(`[PineconeService] ERROR: Failed to fetch chunks for ${documentId}:`, error);
      throw new Error(`Failed to fetch chunks from Pinecone: ${errorMessage(error)}`, { cause: error });
    }

    return chunks.sort((a, b) => a.ordinal - b.ordinal);
  }

  async delete(documentId: string): Promise<void> {
    const ids = await this.listIds(`${documentId}${CHUNK_SEPARATOR}`);
    if (ids.length === 0) {
      return;
    }
    try {
      for (let i = 0; i < ids.length; i += FETCH_BATCH_SIZE) {
        await this.index.deleteMany(ids.slice(i, i + FETCH_BATCH_SIZE));
      }
    } catch (error) {
      console.error(`[PineconeService] ERROR: Failed to delete ${documentId}:`, error);
      throw new Error(`Failed to delete vectors from Pinecone: ${errorMessage(error)}`, { cause: error });
    }
  }

  async listDocumentIds(): Promise<Set<string>> {
    const ids = await this.listIds(DOCUMENT_ID_PREFIX);
    const documentIds = new Set<string>();
    for (const id of ids) {
      const separatorIndex = id.indexOf(CHUNK_SEPARATOR);
      if (separatorIndex > 0) {
        documentIds.add(id.substring(0, separatorIndex));
      }
    }
    return documentIds;
  }

  async getIndexMetric(): Promise<IndexMetric> {
    if (this.metric !== null) {
      return this.metric;
    }
    try {
      const description = await this.pinecone.describeIndex(this.indexName);
      const metric = String(description.metric);
      this.metric = metric === 'euclidean' || metric === 'dotproduct' ? metric : 'cosine';
      console.log('[PineconeService] Detected metric:', this.metric);
    } catch (error) {
      console.warn('[PineconeService] Failed to get metric, defaulting to cosine', error);
      this.metric = 'cosine';
    }
    return this.metric;
  }

  private async listIds(prefix: string): Promise<string[]> {
    const ids: string[] = [];
    let paginationToken: string | undefined;
    try {
      do {
        const page = await this.index.listPaginated({ prefix, paginationToken });
        for (const vector of page.vectors ?? []) {
          if (vector.id) ids.push(vector.id);
        }
        paginationToken = page.pagination?.next;
      } while (paginationToken);
    } catch (error) {
      console.error(`[PineconeService] ERROR: Failed to list vector ids with prefix '${prefix}':`, error);
      throw new Error(`Failed to list vectors in Pinecone: ${errorMessage(error)}`, { cause: error });
    }
    return ids;
  }

  private buildFilter(filter: MetadataFilter): Record<string, { $eq: string }> {
    const clauses: Record<string, { $eq: string }> = {};
    for (const [key, value] of Object.entries(filter)) {
      if (value !== undefined) {
        clauses[key] = { $eq: value };
      }
    }
    return clauses;
  }
}
