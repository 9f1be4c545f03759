export type IndexMetric = 'cosine' | 'euclidean' | 'dotproduct';

/**
 * Converts an index similarity score into a non-negative distance
 * (smaller = closer), so hits compare the same way across metrics.
 */
export function scoreToDistance(rawScore: number, metric: IndexMetric = 'cosine'): number {
  if (!Number.isFinite(rawScore)) return Number.POSITIVE_INFINITY;

  if (metric === 'euclidean') {
    // Pinecone already reports euclidean results as distances
    return Math.max(0, rawScore);
  }
  // cosine similarity lies in [-1, 1], so the distance lies in [0, 2]
  return Math.max(0, 1 - rawScore);
}

/**
 * `1 - distance` when the distance is bounded in [0, 1], otherwise undefined.
 */
export function relevanceFromDistance(distance: number): number | undefined {
  if (!Number.isFinite(distance) || distance < 0 || distance > 1) {
    return undefined;
  }
  return 1 - distance;
}
