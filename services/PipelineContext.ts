import { DocumentSource, EmbeddingProvider, TextGenerationOracle, VectorIndex } from '../types';
import { AppConfig } from '../utils/config';
import { ConfigurationError } from '../utils/errors';
import { ChunkingService } from './ChunkingService';
import { EmbeddingService } from './EmbeddingService';
import { GeminiOracleService } from './GeminiOracleService';
import { OllamaOracleService } from './OllamaOracleService';
import { OpenAIOracleService } from './OpenAIOracleService';
import { PineconeService } from './PineconeService';
import { RankingService } from './RankingService';
import { ReportSynthesizer } from './ReportSynthesizer';
import { ResumeIngestionService } from './ResumeIngestionService';
import { RetrievalAggregator } from './RetrievalAggregator';
import { ScreeningService } from './ScreeningService';
import { TextCleaningService } from './TextCleaningService';
import { TextExtractionService } from './TextExtractionService';

export interface PipelineContext {
  config: AppConfig;
  documentSource: DocumentSource;
  embeddingProvider: EmbeddingProvider;
  vectorIndex: VectorIndex;
  oracle: TextGenerationOracle | null;
  synthesizer: ReportSynthesizer;
  ranker: RankingService;
  screening: ScreeningService;
}

/** Collaborators that can be swapped out, e.g. for in-process stand-ins. */
export interface PipelineOverrides {
  documentSource?: DocumentSource;
  embeddingProvider?: EmbeddingProvider;
  vectorIndex?: VectorIndex;
  oracle?: TextGenerationOracle | null;
}

export function createOracle(config: AppConfig): TextGenerationOracle | null {
  const { provider, model, timeoutMs } = config.llm;
  if (provider === 'none') {
    console.warn('[PipelineContext] LLM_PROVIDER=none, reports will use the keyword fallback');
    return null;
  }
  if (provider === 'ollama') {
    return new OllamaOracleService(config.ollamaBaseUrl, model, timeoutMs);
  }

  const apiKey = provider === 'openai' ? config.openaiApiKey : config.geminiApiKey;
  if (!apiKey) {
    console.warn(`[PipelineContext] WARNING: no API key for LLM provider '${provider}', reports will use the keyword fallback`);
    return null;
  }

  return provider === 'openai'
    ? new OpenAIOracleService(apiKey, model, timeoutMs)
    : new GeminiOracleService(apiKey, model, timeoutMs);
}

/**
 * Builds every pipeline component once. The result is passed explicitly to
 * whoever needs it; nothing here is held in module state.
 */
export function createPipelineContext(config: AppConfig, overrides: PipelineOverrides = {}): PipelineContext {
  const documentSource = overrides.documentSource ?? new TextExtractionService();
  const embeddingProvider = overrides.embeddingProvider ?? new EmbeddingService(config.geminiApiKey, {
    model: config.embedding.model,
    dimension: config.embedding.dimension,
    maxConcurrent: config.embedding.maxConcurrent
  });
  const vectorIndex = overrides.vectorIndex ?? createPineconeIndex(config);
  const oracle = overrides.oracle !== undefined ? overrides.oracle : createOracle(config);

  const synthesizer = new ReportSynthesizer(oracle, {
    temperature: config.llm.temperature,
    maxOutputTokens: config.llm.maxOutputTokens,
    timeoutMs: config.llm.timeoutMs
  });
  const aggregator = new RetrievalAggregator();
  const ranker = new RankingService(vectorIndex, synthesizer, config.rankConcurrency);
  const ingestion = new ResumeIngestionService(
    documentSource,
    new TextCleaningService(),
    new ChunkingService(config.chunking),
    embeddingProvider,
    vectorIndex,
    config.ingest
  );

  const screening = new ScreeningService({
    ingestion,
    embeddingProvider,
    vectorIndex,
    aggregator,
    synthesizer,
    ranker,
    defaultTopK: config.topK
  });

  return { config, documentSource, embeddingProvider, vectorIndex, oracle, synthesizer, ranker, screening };
}

function createPineconeIndex(config: AppConfig): PineconeService {
  if (!config.pinecone.apiKey) {
    throw new ConfigurationError('PINECONE_API_KEY is required');
  }
  return new PineconeService(config.pinecone.apiKey, config.pinecone.indexName, config.embedding.dimension);
}
