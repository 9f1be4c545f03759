import { GenerativeModel, GoogleGenerativeAI } from '@google/generative-ai';
import { EmbeddingProvider } from '../types';
import { ConfigurationError, errorMessage } from '../utils/errors';
import { sleep } from '../utils/timeout';

export interface EmbeddingServiceOptions {
  model?: string;
  dimension?: number;
  maxConcurrent?: number;
}

const CACHE_LIMIT = 1000;

export class EmbeddingService implements EmbeddingProvider {
  readonly modelName: string;
  private modelInstance: GenerativeModel;
  private configuredDimension: number;
  private maxConcurrent: number;
  private dimensionWarned: boolean = false;
  private readonly MAX_RETRIES = 3;
  private readonly INITIAL_RETRY_DELAY_MS = 1000;
  private embeddingCache: Map<string, number[]> = new Map();

  constructor(apiKey: string | undefined, options: EmbeddingServiceOptions = {}) {
    if (!apiKey) {
      throw new ConfigurationError('GEMINI_API_KEY is required for embedding generation');
    }
    const genAI = new GoogleGenerativeAI(apiKey);
    this.modelName = options.model || 'text-embedding-004';
    this.configuredDimension = options.dimension ?? 768;
    this.maxConcurrent = options.maxConcurrent ?? 10;
    this.modelInstance = genAI.getGenerativeModel({ model: this.modelName });
  }

  async embedOne(text: string): Promise<number[]> {
    const [embedding] = await this.embed([text]);
    return embedding;
  }

  /**
   * Embeds every text, preserving input order. Any failure rejects the whole
   * batch so callers never receive fewer vectors than texts.
   */
  async embed(texts: string[]): Promise<number[][]> {
    const embeddings: number[][] = new Array(texts.length);

    for (let i = 0; i < texts.length; i += this.maxConcurrent) {
      const batch = texts.slice(i, i + this.maxConcurrent);
      const results = await Promise.allSettled(batch.map(text => this.embedText(text)));

      const failures = results.filter((result): result is PromiseRejectedResult => result.status === 'rejected');
      if (failures.length > 0) {
        console.error(`[EmbeddingService] ${failures.length}/${batch.length} embeddings failed in batch starting at ${i}`);
        throw failures[0].reason;
      }

      results.forEach((result, offset) => {
        if (result.status === 'fulfilled') {
          embeddings[i + offset] = result.value;
        }
      });
    }

    return embeddings;
  }

  getDimension(): number {
    return this.configuredDimension;
  }

  private async embedText(text: string, retryCount: number = 0): Promise<number[]> {
    const cached = this.embeddingCache.get(text);
    if (cached && retryCount === 0) {
      return [...cached];
    }

    try {
      if (retryCount > 0) {
        console.log(`[EmbeddingService] Retry ${retryCount}/${this.MAX_RETRIES}...`);
      }

      const result = await this.modelInstance.embedContent(text);
      const values = result.embedding?.values;
      if (!Array.isArray(values) || values.length === 0) {
        throw new Error('Unexpected embedding response format');
      }

      const embedding = this.fitDimension(values);
      this.remember(text, embedding);
      return embedding;
    } catch (error) {
      const message = errorMessage(error);
      const isNetworkError = message.includes('fetch failed') ||
        message.includes('ECONNRESET') ||
        message.includes('ETIMEDOUT') ||
        message.includes('network');

      if (isNetworkError && retryCount < this.MAX_RETRIES) {
        const delay = this.INITIAL_RETRY_DELAY_MS * Math.pow(2, retryCount);
        console.warn(`[EmbeddingService] Network error (attempt ${retryCount + 1}/${this.MAX_RETRIES + 1}), retrying in ${delay}ms:`, message);
        await sleep(delay);
        return this.embedText(text, retryCount + 1);
      }

      console.error(`[EmbeddingService] ERROR: Failed to generate embedding after ${retryCount} retries:`, error);
      throw new Error(`Failed to generate embedding: ${message}`, { cause: error });
    }
  }

  // The index is created for one dimension, so every vector is truncated or zero-padded to it
  private fitDimension(values: number[]): number[] {
    if (values.length === this.configuredDimension) {
      return values;
    }
    if (!this.dimensionWarned) {
      console.warn(`[EmbeddingService] Dimension mismatch: configured ${this.configuredDimension}, model returned ${values.length}`);
      this.dimensionWarned = true;
    }
    if (values.length > this.configuredDimension) {
      return values.slice(0, this.configuredDimension);
    }
    return [...values, ...new Array<number>(this.configuredDimension - values.length).fill(0)];
  }

  private remember(text: string, embedding: number[]): void {
    if (this.embeddingCache.has(text)) {
      return;
    }
    if (this.embeddingCache.size >= CACHE_LIMIT) {
      const firstKey = this.embeddingCache.keys().next().value;
      if (firstKey !== undefined) this.embeddingCache.delete(firstKey);
    }
    this.embeddingCache.set(text, [...embedding]);
  }
}
