/**
 * Query Orchestrator: resolve a question, answer it from the cache or from
 * freshly acquired data, then grow the cache in the background.
 */

import { BackgroundQueue } from './background';
import { mintCanonicalId, slugFromQuery } from './canonical-id';
import type { Acquirer, AnswerSynthesizer, Embedder } from './collaborators';
import { detectLanguage } from './embeddings';
import { toError } from './errors';
import { createLogger, type Logger } from './logger';
import { fallbackAnswer, unavailablePayload } from './payload';
import type { ResolutionPolicy } from './policy';
import type { PopulationPipeline } from './population';
import type { ResourceCatalog } from './resources';
import { seedTopics, type SeedTopic } from './seeding';
import type { TopicStore } from './topic-store';
import {
  DEFAULT_CONFIG,
  type AnswerEvent,
  type AnswerResult,
  type CanonicalTopic,
  type ResolutionResult,
  type Tier,
  type TopicPayload,
} from './types';
import type { VectorStore } from './vector-store';

export interface QueryOrchestratorDeps {
  policy: ResolutionPolicy;
  population: PopulationPipeline;
  embedder: Embedder;
  acquirer: Acquirer;
  synthesizer: AnswerSynthesizer;
  vectorStore: VectorStore;
  topicStore: TopicStore;
  background?: BackgroundQueue;
  resources?: ResourceCatalog;
}

export interface QueryOrchestratorOptions {
  topicTtlMs?: number;
  aliasTtlMs?: number;
  logger?: Logger;
}

export interface CacheStats {
  topicCount: number;
  aliasCount: number;
  avgAliasesPerTopic: number;
  inFlightPopulations: number;
  pendingBackgroundTasks: number;
}

/** What a query will be answered from */
interface PreparedAnswer {
  canonicalId: string;
  payload: TopicPayload;
  source: 'cache' | 'live';
  tier: Tier;
  score: number;
  /** False when the topic is not in the cache, so there is nothing to grow */
  populate: boolean;
}

export class QueryOrchestrator {
  private deps: QueryOrchestratorDeps;
  private background: BackgroundQueue;
  private topicTtlMs: number;
  private aliasTtlMs: number;
  private logger: Logger;

  constructor(deps: QueryOrchestratorDeps, options: QueryOrchestratorOptions = {}) {
    this.deps = deps;
    this.logger = options.logger ?? createLogger('orchestrator');
    this.background = deps.background ?? new BackgroundQueue({ logger: this.logger.child('background') });
    this.topicTtlMs = options.topicTtlMs ?? DEFAULT_CONFIG.topicTtlMs;
    this.aliasTtlMs = options.aliasTtlMs ?? DEFAULT_CONFIG.aliasTtlMs;
  }

  /** Answer a question. Never throws for a normal query. */
  async resolveAndAnswer(queryText: string): Promise<AnswerResult> {
    const started = Date.now();
    const prepared = await this.prepare(queryText);
    const answer = await this.synthesize(prepared.payload, queryText);

    this.logger.info('Answered query', {
      query: queryText,
      language: detectLanguage(queryText),
      canonicalId: prepared.canonicalId,
      source: prepared.source,
      tier: prepared.tier,
      durationMs: Date.now() - started,
    });

    if (prepared.populate) {
      this.schedulePopulation(prepared.canonicalId, queryText);
    }

    return {
      answer,
      canonicalId: prepared.canonicalId,
      source: prepared.source,
      tier: prepared.tier,
      score: prepared.score,
      payload: prepared.payload,
    };
  }

  /**
   * Streaming variant: one `meta` event, the answer as `chunk` events, then
   * `end`. Population is scheduled once `end` has been consumed.
   */
  async *resolveAndAnswerStream(queryText: string): AsyncGenerator<AnswerEvent> {
    const prepared = await this.prepare(queryText);
    yield {
      type: 'meta',
      canonicalId: prepared.canonicalId,
      source: prepared.source,
      tier: prepared.tier,
      score: prepared.score,
    };

    let length = 0;
    try {
      for await (const text of this.deps.synthesizer.synthesizeStream(prepared.payload, queryText)) {
        length += text.length;
        yield { type: 'chunk', text };
      }
    } catch (err) {
      this.logger.warn('Answer stream failed', { canonicalId: prepared.canonicalId, sent: length, error: toError(err) });
      if (length === 0) {
        const text = fallbackAnswer(prepared.payload);
        length = text.length;
        yield { type: 'chunk', text };
      }
    }

    try {
      yield { type: 'end', length };
    } finally {
      if (prepared.populate) {
        this.schedulePopulation(prepared.canonicalId, queryText);
      }
    }
  }

  /** Remove a topic and every alias pointing at it */
  async invalidateTopic(canonicalId: string): Promise<{ topicRemoved: boolean; aliasesRemoved: number }> {
    const aliasesRemoved = await this.deps.vectorStore.deleteByCanonical(canonicalId);
    const topicRemoved = await this.deps.topicStore.delete(canonicalId);
    this.logger.info('Invalidated topic', { canonicalId, topicRemoved, aliasesRemoved });
    return { topicRemoved, aliasesRemoved };
  }

  async getCacheStats(): Promise<CacheStats> {
    const [topicCount, aliasCount] = await Promise.all([
      this.deps.topicStore.count(),
      this.deps.vectorStore.count(),
    ]);
    return {
      topicCount,
      aliasCount,
      avgAliasesPerTopic: topicCount > 0 ? aliasCount / topicCount : 0,
      inFlightPopulations: this.deps.population.inFlight.size,
      pendingBackgroundTasks: this.background.size,
    };
  }

  /** Sweep expired entries from both stores now, instead of waiting for lazy expiry */
  async evictExpired(): Promise<{ aliases: number; topics: number }> {
    const aliases = await this.deps.vectorStore.expire();
    const topics = await this.deps.topicStore.expire();
    if (aliases + topics > 0) {
      this.logger.info('Evicted expired entries', { aliases, topics });
    }
    return { aliases, topics };
  }

  /** Pre-load known topics with their aliases */
  async seed(topics: SeedTopic[]): Promise<{ topics: number; aliases: number }> {
    const { embedder, vectorStore, topicStore } = this.deps;
    return seedTopics({ embedder, vectorStore, topicStore }, topics, this.logger.child('seed'));
  }

  /** Wait for scheduled background work to settle */
  async drain(): Promise<void> {
    await this.background.drain();
  }

  private async prepare(queryText: string): Promise<PreparedAnswer> {
    const resolution = await this.deps.policy.resolve(queryText);

    if (resolution.canonicalId) {
      const topic = await this.loadTopic(resolution.canonicalId);
      if (topic) {
        return {
          canonicalId: topic.id,
          payload: topic.payload,
          source: 'cache',
          tier: resolution.tier,
          score: resolution.score,
          populate: true,
        };
      }
      this.logger.info('Resolved topic has no payload; acquiring again', { canonicalId: resolution.canonicalId });
      return this.acquire(queryText, resolution, resolution.canonicalId);
    }

    return this.acquire(queryText, resolution, await this.mint(queryText, resolution.candidateId));
  }

  private async loadTopic(canonicalId: string): Promise<CanonicalTopic | null> {
    try {
      return await this.deps.topicStore.get(canonicalId);
    } catch (err) {
      this.logger.warn('Could not read topic; treating as miss', { canonicalId, error: toError(err) });
      return null;
    }
  }

  private async mint(queryText: string, avoid: string | undefined): Promise<string> {
    try {
      return await mintCanonicalId(queryText, this.deps.topicStore, avoid);
    } catch (err) {
      const slug = slugFromQuery(queryText);
      this.logger.warn('Could not check existing ids; using bare slug', { slug, error: toError(err) });
      return slug === avoid ? `${slug}_2` : slug;
    }
  }

  private async acquire(queryText: string, resolution: ResolutionResult, canonicalId: string): Promise<PreparedAnswer> {
    const base = { canonicalId, source: 'live' as const, tier: resolution.tier, score: resolution.score };
    const resourceUrls = this.deps.resources?.select(canonicalId, queryText) ?? [];

    let payload: TopicPayload;
    try {
      payload = await this.deps.acquirer.acquire(queryText, { canonicalId, resourceUrls });
    } catch (err) {
      this.logger.warn('Acquisition failed; answering without caching', { canonicalId, error: toError(err) });
      return { ...base, payload: unavailablePayload(canonicalId, queryText), populate: false };
    }

    const cached = await this.persist(canonicalId, queryText, payload, resolution.queryVector);
    return { ...base, payload, populate: cached };
  }

  /**
   * Store the query as the topic's first alias, then the payload. Returns
   * false when the topic could not be cached.
   */
  private async persist(
    canonicalId: string,
    queryText: string,
    payload: TopicPayload,
    queryVector: number[] | undefined
  ): Promise<boolean> {
    try {
      const vector = queryVector ?? (await this.deps.embedder.embed(queryText));
      await this.deps.vectorStore.put(queryText, canonicalId, vector, this.aliasTtlMs);
      await this.deps.topicStore.put(canonicalId, payload, this.topicTtlMs);
    } catch (err) {
      this.logger.warn('Could not cache topic', { canonicalId, error: toError(err) });
      return false;
    }

    try {
      await this.deps.topicStore.addAlias(canonicalId, queryText);
    } catch (err) {
      this.logger.warn('Could not record alias on topic', { canonicalId, error: toError(err) });
    }

    this.logger.info('Cached new topic', { canonicalId, fields: Object.keys(payload).length });
    return true;
  }

  private async synthesize(payload: TopicPayload, queryText: string): Promise<string> {
    try {
      return await this.deps.synthesizer.synthesize(payload, queryText);
    } catch (err) {
      this.logger.warn('Answer synthesis failed; using fallback answer', { error: toError(err) });
      return fallbackAnswer(payload);
    }
  }

  private schedulePopulation(canonicalId: string, queryText: string): void {
    this.background.schedule(`populate:${canonicalId}`, () => this.deps.population.populate(canonicalId, queryText));
  }
}
