import { PipelineContext, createPipelineContext } from '../services/PipelineContext';
import { buildFallbackReport } from '../services/FallbackReportService';
import { RetrievalHit } from '../types';
import { loadConfig } from '../utils/config';
import { InvalidRequestError } from '../utils/errors';
import {
  InMemoryVectorIndex,
  KeywordEmbeddingProvider,
  ScriptedOracle,
  StaticDocumentSource,
  sampleReport,
  seedResume
} from './support/fakes';

class NoHitIndex extends InMemoryVectorIndex {
  async query(): Promise<RetrievalHit[]> {
    return [];
  }
}

describe('ScreeningService', () => {
  let index: InMemoryVectorIndex;
  let oracle: ScriptedOracle;
  let context: PipelineContext;

  function buildContext(vectorIndex: InMemoryVectorIndex, withOracle: boolean = true): PipelineContext {
    return createPipelineContext(loadConfig({ LLM_PROVIDER: 'none' }), {
      documentSource: new StaticDocumentSource({ text: 'Python developer with SQL experience.', pages: 1 }),
      embeddingProvider: new KeywordEmbeddingProvider(),
      vectorIndex,
      oracle: withOracle ? oracle : null
    });
  }

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
    index = new InMemoryVectorIndex();
    oracle = new ScriptedOracle(async () => JSON.stringify(sampleReport()));
    context = buildContext(index);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('analyze', () => {
    it('should report an empty corpus without calling the oracle', async () => {
      await expect(context.screening.analyze('Python engineer')).resolves.toEqual({ status: 'empty', reason: 'empty_corpus' });
      expect(oracle.prompts).toEqual([]);
    });

    it('should report no hits when retrieval finds nothing', async () => {
      const noHits = new NoHitIndex();
      await seedResume(noHits, 'resume:a', ['Python engineer']);

      await expect(buildContext(noHits).screening.analyze('Python engineer')).resolves.toEqual({ status: 'empty', reason: 'no_hits' });
    });

    it('should synthesize one report over the aggregated top-k chunks', async () => {
      await seedResume(index, 'resume:a', ['Python and SQL engineer', 'Sales manager']);
      await seedResume(index, 'resume:b', ['Kubernetes design']);

      const result = await context.screening.analyze('python sql', 2);

      expect(result.status).toBe('ok');
      if (result.status === 'ok') {
        expect(result.report).toEqual(sampleReport());
        expect(result.contexts.map(candidate => candidate.documentId)).toEqual(['resume:a']);
        expect(result.contexts[0].chunks.map(chunk => chunk.text)).toEqual(['Python and SQL engineer', 'Sales manager']);
      }
      expect(oracle.prompts).toHaveLength(1);
      expect(oracle.prompts[0]).toContain('[Resume: a.pdf]\nPython and SQL engineer\nSales manager');
    });

    it('should return the fallback report when no oracle is configured', async () => {
      const offline = buildContext(index, false);
      await seedResume(index, 'resume:a', ['Python and SQL engineer']);

      const result = await offline.screening.analyze('python sql', 1);

      expect(result).toMatchObject({
        status: 'ok',
        report: buildFallbackReport('python sql', '[Resume: a.pdf]\nPython and SQL engineer')
      });
    });

    it('should not list the whole index when retrieval finds chunks', async () => {
      await seedResume(index, 'resume:a', ['Python and SQL engineer']);
      const listing = jest.spyOn(index, 'listDocumentIds');

      const result = await context.screening.analyze('python sql', 2);

      expect(result.status).toBe('ok');
      expect(listing).not.toHaveBeenCalled();
    });

    it('should reject a blank job description', async () => {
      await expect(context.screening.analyze('   ')).rejects.toBeInstanceOf(InvalidRequestError);
    });
  });

  describe('rank', () => {
    it('should report an empty corpus as an empty result', async () => {
      await expect(context.screening.rank('Python engineer')).resolves.toEqual({ status: 'empty', reason: 'empty_corpus' });
    });

    it('should rank every indexed resume', async () => {
      oracle = new ScriptedOracle(async prompt =>
        JSON.stringify(sampleReport({ overall_score: prompt.includes('Kubernetes') ? 0.9 : 0.3 }))
      );
      context = buildContext(index);
      await seedResume(index, 'resume:a', ['Python and SQL engineer']);
      await seedResume(index, 'resume:b', ['Kubernetes design']);

      const result = await context.screening.rank('Platform engineer');

      expect(result.status).toBe('ok');
      if (result.status === 'ok') {
        expect(result.reports.map(report => [report.document_id, report.filename, report.overall_score])).toEqual([
          ['resume:b', 'b.pdf', 0.9],
          ['resume:a', 'a.pdf', 0.3]
        ]);
      }
    });
  });

  describe('documents', () => {
    it('should ingest, list and delete resumes', async () => {
      const first = await context.screening.ingest('/uploads/tmp-1', { filename: 'jordan.txt' });
      const second = await context.screening.ingest('/uploads/tmp-2', { filename: 'casey.txt' });

      expect(first.chunk_count).toBe(1);
      const listed = await context.screening.listDocuments();
      expect(listed.map(summary => summary.document_id)).toEqual([first.document_id, second.document_id].sort());

      await context.screening.deleteDocument(first.document_id);

      expect((await context.screening.listDocuments()).map(summary => summary.document_id)).toEqual([second.document_id]);
    });

    it('should summarize each indexed resume', async () => {
      await seedResume(index, 'resume:b', ['Sales manager']);
      await seedResume(index, 'resume:a', ['Python engineer', 'SQL analyst']);

      expect(await context.screening.listDocuments()).toEqual([
        { document_id: 'resume:a', filename: 'a.pdf', pages: 1, ingested_at: '2026-01-05T10:00:00.000Z', chunk_count: 2 },
        { document_id: 'resume:b', filename: 'b.pdf', pages: 1, ingested_at: '2026-01-05T10:00:00.000Z', chunk_count: 1 }
      ]);
    });

    it('should return a resume with its chunks in order', async () => {
      await seedResume(index, 'resume:a', ['Python engineer', 'SQL analyst'], 'jordan.pdf');

      expect(await context.screening.getDocument('resume:a')).toEqual({
        document_id: 'resume:a',
        filename: 'jordan.pdf',
        pages: 1,
        ingested_at: '2026-01-05T10:00:00.000Z',
        chunk_count: 2,
        chunks: [
          { chunk_id: 'resume:a::chunk::0', ordinal: 0, text: 'Python engineer' },
          { chunk_id: 'resume:a::chunk::1', ordinal: 1, text: 'SQL analyst' }
        ]
      });
    });

    it('should return null for a resume that is not indexed', async () => {
      await expect(context.screening.getDocument('resume:missing')).resolves.toBeNull();
    });

    it('should return raw hits for a keyword query', async () => {
      await seedResume(index, 'resume:a', ['Python and SQL engineer', 'Sales manager']);

      const hits = await context.screening.query('sales', 1);

      expect(hits.map(hit => hit.chunkId)).toEqual(['resume:a::chunk::1']);
    });

    it('should reject blank keywords', async () => {
      await expect(context.screening.query('')).rejects.toBeInstanceOf(InvalidRequestError);
    });
  });
});
