import { VectorIndex } from '../types';
import { AnalysisReport } from '../types/report';
import { EmptyCorpusError } from '../utils/errors';
import { ReportGenerator } from './ReportSynthesizer';

export class RankingService {
  private vectorIndex: VectorIndex;
  private synthesizer: ReportGenerator;
  private concurrency: number;

  constructor(vectorIndex: VectorIndex, synthesizer: ReportGenerator, concurrency: number = 4) {
    this.vectorIndex = vectorIndex;
    this.synthesizer = synthesizer;
    this.concurrency = Math.max(1, concurrency);
  }

  /**
   * Synthesizes one report per indexed resume from all of its chunks and
   * returns them by `overall_score`, highest first. Resumes that fail are
   * skipped; ties keep the ascending document-id order.
   *
   * `_topKPerDocument` belongs to retrieval-mode queries; ranking always reads
   * whole documents.
   */
  async rankAll(jobDescription: string, _topKPerDocument: number, maxDocuments?: number): Promise<AnalysisReport[]> {
    const listed = await this.vectorIndex.listDocumentIds();
    if (listed.size === 0) {
      throw new EmptyCorpusError();
    }

    let documentIds = Array.from(listed).sort();
    if (maxDocuments) {
      documentIds = documentIds.slice(0, maxDocuments);
    }
    console.log(`[RankingService] Ranking ${documentIds.length} of ${listed.size} resumes`);

    const results: Array<AnalysisReport | null> = new Array(documentIds.length).fill(null);
    for (let i = 0; i < documentIds.length; i += this.concurrency) {
      const batch = documentIds.slice(i, i + this.concurrency);
      await Promise.all(batch.map(async (documentId, offset) => {
        results[i + offset] = await this.analyzeDocument(jobDescription, documentId);
      }));
    }

    const reports = results.filter((report): report is AnalysisReport => report !== null);
    const skipped = documentIds.length - reports.length;
    if (skipped > 0) {
      console.warn(`[RankingService] Skipped ${skipped}/${documentIds.length} resumes`);
    }

    // Array.prototype.sort is stable, so equal scores keep listing order
    return reports.sort((a, b) => b.overall_score - a.overall_score);
  }

  private async analyzeDocument(jobDescription: string, documentId: string): Promise<AnalysisReport | null> {
    try {
      const chunks = await this.vectorIndex.getChunks(documentId);
      if (chunks.length === 0) {
        console.warn(`[RankingService] No chunks found for ${documentId}, skipping`);
        return null;
      }

      const filename = chunks[0].metadata.filename || 'Unknown';
      const resumeText = chunks.map(chunk => chunk.text).join('\n\n');
      const report = await this.synthesizer.synthesize(jobDescription, resumeText);

      return { ...report, document_id: documentId, filename };
    } catch (error) {
      console.error(`[RankingService] ERROR analyzing resume ${documentId}:`, error);
      return null;
    }
  }
}
