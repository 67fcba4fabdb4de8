/**
 * Similarity Resolver: nearest alias by cosine similarity.
 *
 * A linear scan over the vector store. The alias store grows with the
 * number of topics, not with query volume; an ANN index can replace the
 * scan behind the same `resolve()` contract.
 */

import { cosineSimilarity } from './embeddings';
import { createLogger, type Logger } from './logger';
import type { SimilarityMatch, TieBreak } from './types';
import type { VectorStore } from './vector-store';

export const NO_MATCH: Readonly<SimilarityMatch> = Object.freeze({
  alias: null,
  canonicalId: null,
  score: 0,
  createdAt: null,
  scanned: 0,
  skipped: 0,
});

export interface SimilarityResolverOptions {
  tieBreak?: TieBreak;
  logger?: Logger;
}

export class SimilarityResolver {
  private store: VectorStore;
  private tieBreak: TieBreak;
  private logger: Logger;

  constructor(store: VectorStore, options: SimilarityResolverOptions = {}) {
    this.store = store;
    this.tieBreak = options.tieBreak ?? 'oldest';
    this.logger = options.logger ?? createLogger('resolver');
  }

  /**
   * Best-scoring alias for `queryVector`. Scores are cosine similarity
   * clamped to [0, 1]. Throws StoreUnavailable if the scan fails.
   */
  async resolve(queryVector: number[]): Promise<SimilarityMatch> {
    let best: SimilarityMatch = { ...NO_MATCH };
    let scanned = 0;
    let skipped = 0;

    for await (const entry of this.store.all()) {
      if (entry.vector.length !== queryVector.length) {
        // Left over from a different embedding model
        skipped++;
        continue;
      }
      scanned++;

      const score = Math.max(0, cosineSimilarity(queryVector, entry.vector));
      if (best.alias === null || score > best.score || (score === best.score && this.wins(entry.createdAt, best.createdAt))) {
        best = {
          alias: entry.aliasText,
          canonicalId: entry.canonicalId,
          score,
          createdAt: entry.createdAt,
          scanned: 0,
          skipped: 0,
        };
      }
    }

    if (skipped > 0) {
      this.logger.warn('Skipped aliases with mismatched vector dimension', {
        skipped,
        dimension: queryVector.length,
      });
    }

    this.logger.debug('Similarity scan complete', {
      alias: best.alias,
      canonicalId: best.canonicalId,
      score: best.score,
      scanned,
    });

    return { ...best, scanned, skipped };
  }

  private wins(candidate: number, current: number | null): boolean {
    if (current === null) return true;
    return this.tieBreak === 'oldest' ? candidate < current : candidate > current;
  }
}
