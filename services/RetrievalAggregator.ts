import { CandidateContext, RetrievalHit } from '../types';

export class RetrievalAggregator {
  /**
   * Groups hits by document. Groups appear in order of their first hit and
   * keep the index's ordering within each group.
   */
  aggregate(hits: RetrievalHit[]): Map<string, CandidateContext> {
    const contexts = new Map<string, CandidateContext>();

    for (const hit of hits) {
      let context = contexts.get(hit.documentId);
      if (!context) {
        context = {
          documentId: hit.documentId,
          filename: hit.filename,
          chunks: []
        };
        contexts.set(hit.documentId, context);
      }
      context.chunks.push({ text: hit.text, relevanceScore: hit.relevanceScore });
    }

    return contexts;
  }

  combinedContext(context: CandidateContext): string {
    return `[Resume: ${context.filename}]\n` + context.chunks.map(chunk => chunk.text).join('\n');
  }

  combineContexts(contexts: Iterable<CandidateContext>): string {
    return Array.from(contexts, context => this.combinedContext(context)).join('\n\n');
  }
}
