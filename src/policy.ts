/**
 * Resolution Policy: three-tier decision over a similarity match.
 *
 *   score >= 0.70        confident  -> resolved; query stored as an alias
 *   0.50 <= score < 0.70 ambiguous  -> arbiter decides (yes = confident, no = none)
 *   score < 0.50         none       -> caller acquires fresh data
 *
 * Any collaborator or store failure lowers the outcome to `none`.
 */

import type { Arbiter, Embedder } from './collaborators';
import { ArbiterFailed, ArbiterTimeout, StoreUnavailable, toError } from './errors';
import { createLogger, type Logger } from './logger';
import { summarizePayload } from './payload';
import type { SimilarityResolver } from './resolver';
import { withTimeout } from './retry';
import type { TopicStore } from './topic-store';
import {
  AMBIGUOUS_THRESHOLD,
  CONFIDENT_THRESHOLD,
  DEFAULT_CONFIG,
  type DegradationReason,
  type ResolutionResult,
  type SimilarityMatch,
  type Tier,
} from './types';
import type { VectorStore } from './vector-store';

/** Map a similarity score onto its tier */
export function classifyTier(score: number): Tier {
  if (score >= CONFIDENT_THRESHOLD) return 'confident';
  if (score >= AMBIGUOUS_THRESHOLD) return 'ambiguous';
  return 'none';
}

export interface ResolutionPolicyDeps {
  embedder: Embedder;
  arbiter: Arbiter;
  resolver: SimilarityResolver;
  vectorStore: VectorStore;
  topicStore: TopicStore;
}

export interface ResolutionPolicyOptions {
  arbiterTimeoutMs?: number;
  aliasTtlMs?: number;
  logger?: Logger;
}

export class ResolutionPolicy {
  private deps: ResolutionPolicyDeps;
  private arbiterTimeoutMs: number;
  private aliasTtlMs: number;
  private logger: Logger;

  constructor(deps: ResolutionPolicyDeps, options: ResolutionPolicyOptions = {}) {
    this.deps = deps;
    this.arbiterTimeoutMs = options.arbiterTimeoutMs ?? DEFAULT_CONFIG.arbiterTimeoutMs;
    this.aliasTtlMs = options.aliasTtlMs ?? DEFAULT_CONFIG.aliasTtlMs;
    this.logger = options.logger ?? createLogger('policy');
  }

  /** Resolve `queryText` to a canonical topic. Never throws. */
  async resolve(queryText: string): Promise<ResolutionResult> {
    let queryVector: number[];
    try {
      queryVector = await this.deps.embedder.embed(queryText);
    } catch (err) {
      this.logger.warn('Embedding failed; treating query as unresolved', { query: queryText, error: toError(err) });
      return degraded('embedding-failed');
    }

    let match: SimilarityMatch;
    try {
      match = await this.deps.resolver.resolve(queryVector);
    } catch (err) {
      this.logger.warn('Similarity scan failed; treating query as unresolved', { query: queryText, error: toError(err) });
      return degraded('store-unavailable', queryVector);
    }

    const tier = classifyTier(match.score);
    this.logger.info('Similarity match', {
      query: queryText,
      alias: match.alias,
      canonicalId: match.canonicalId,
      score: Number(match.score.toFixed(4)),
      tier,
    });

    if (match.alias === null || match.canonicalId === null || tier === 'none') {
      return { alias: match.alias, score: match.score, canonicalId: null, tier: 'none', arbiterConsulted: false, queryVector };
    }

    if (tier === 'confident') {
      await this.reinforce(queryText, match.canonicalId, queryVector);
      return { alias: match.alias, score: match.score, canonicalId: match.canonicalId, tier, arbiterConsulted: false, queryVector };
    }

    return this.arbitrate(queryText, match.alias, match.canonicalId, match.score, queryVector);
  }

  private async arbitrate(
    queryText: string,
    alias: string,
    canonicalId: string,
    score: number,
    queryVector: number[]
  ): Promise<ResolutionResult> {
    const unresolved = (reason?: DegradationReason): ResolutionResult => ({
      alias,
      score,
      canonicalId: null,
      tier: 'none',
      arbiterConsulted: reason !== 'candidate-missing',
      queryVector,
      candidateId: canonicalId,
      ...(reason && { degraded: reason }),
    });

    let summary: string;
    try {
      const candidate = await this.deps.topicStore.get(canonicalId);
      if (!candidate) {
        this.logger.info('Ambiguous candidate has no payload; treating as unresolved', { canonicalId });
        return unresolved('candidate-missing');
      }
      summary = summarizePayload(candidate.payload);
    } catch (err) {
      this.logger.warn('Could not load ambiguous candidate', { canonicalId, error: toError(err) });
      return { ...unresolved('store-unavailable'), arbiterConsulted: false };
    }

    let same: boolean;
    try {
      same = await withTimeout(
        async (signal) => {
          try {
            return await this.deps.arbiter.confirm(queryText, alias, summary, signal);
          } catch (err) {
            throw err instanceof ArbiterTimeout ? err : new ArbiterFailed(err);
          }
        },
        this.arbiterTimeoutMs,
        () => new ArbiterTimeout(this.arbiterTimeoutMs)
      );
    } catch (err) {
      const reason: DegradationReason = err instanceof ArbiterTimeout ? 'arbiter-timeout' : 'arbiter-failed';
      this.logger.warn('Arbiter unavailable; treating ambiguous match as unresolved', {
        query: queryText,
        alias,
        error: toError(err),
      });
      return unresolved(reason);
    }

    this.logger.info('Arbiter decision', { query: queryText, alias, canonicalId, same });

    if (!same) {
      return unresolved();
    }

    await this.reinforce(queryText, canonicalId, queryVector);
    return { alias, score, canonicalId, tier: 'confident', arbiterConsulted: true, queryVector };
  }

  /** Store the query itself as an alias of the resolved topic */
  private async reinforce(queryText: string, canonicalId: string, queryVector: number[]): Promise<void> {
    try {
      await this.deps.vectorStore.put(queryText, canonicalId, queryVector, this.aliasTtlMs);
      await this.deps.topicStore.addAlias(canonicalId, queryText);
    } catch (err) {
      const level = err instanceof StoreUnavailable ? 'warn' : 'error';
      this.logger[level]('Could not store query as alias', { canonicalId, error: toError(err) });
    }
  }
}

function degraded(reason: DegradationReason, queryVector?: number[]): ResolutionResult {
  return {
    alias: null,
    score: 0,
    canonicalId: null,
    tier: 'none',
    arbiterConsulted: false,
    degraded: reason,
    ...(queryVector && { queryVector }),
  };
}
