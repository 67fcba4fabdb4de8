/**
 * Semantic Topic Cache
 *
 * Resolves free-text questions to known canonical topics through alias
 * embeddings stored in ArangoDB, answers from the cached topic when one
 * matches, and learns new aliases in the background.
 */

import type { Database } from 'arangojs';
import { CompositeAliasGenerator, RuleBasedAliasGenerator } from './alias-generators';
import { BackgroundQueue } from './background';
import { loadConfig, type AppConfig } from './config';
import { createDatabase, setupTopicCache } from './db';
import { OpenAIEmbedder, createOpenAIClient } from './embeddings';
import { OpenAIAcquirer, OpenAIAliasGenerator, OpenAIAnswerSynthesizer, OpenAIArbiter } from './llm';
import { createLogger, setDefaultLogLevel, type Logger } from './logger';
import { QueryOrchestrator } from './orchestrator';
import { ResolutionPolicy } from './policy';
import { PopulationPipeline } from './population';
import { SimilarityResolver } from './resolver';
import { ResourceCatalog } from './resources';
import { ArangoTopicStore } from './topic-store';
import { ArangoVectorStore } from './vector-store';

export { CompositeAliasGenerator, RuleBasedAliasGenerator, type AliasRules } from './alias-generators';
export { BackgroundQueue } from './background';
export { FALLBACK_ID, MAX_ID_LENGTH, mintCanonicalId, slugFromQuery, transliterate } from './canonical-id';
export type {
  AcquisitionHints,
  Acquirer,
  AliasGenerator,
  AnswerSynthesizer,
  Arbiter,
  Embedder,
} from './collaborators';
export { ConfigError, EMBEDDING_DIMENSIONS, loadConfig, type AppConfig, type ArangoConnectionConfig } from './config';
export { COLLECTIONS, aliasKey, createDatabase, dropTopicCache, setupTopicCache } from './db';
export {
  OpenAIEmbedder,
  cosineSimilarity,
  createOpenAIClient,
  detectLanguage,
  normalizeText,
  type Language,
} from './embeddings';
export {
  ArbiterFailed,
  ArbiterTimeout,
  EmbeddingFailed,
  ExtractionFailed,
  PopulationFailed,
  StoreUnavailable,
  TopicCacheError,
  type TopicCacheErrorCode,
} from './errors';
export { InFlightPopulation } from './inflight';
export { OpenAIAcquirer, OpenAIAliasGenerator, OpenAIAnswerSynthesizer, OpenAIArbiter } from './llm';
export { createLogger, setDefaultLogLevel, silentLogger, type LogLevel, type Logger } from './logger';
export { QueryOrchestrator, type CacheStats } from './orchestrator';
export { fallbackAnswer, sanitizePayload, summarizePayload, unavailablePayload } from './payload';
export { ResolutionPolicy, classifyTier } from './policy';
export { PopulationPipeline } from './population';
export { NO_MATCH, SimilarityResolver } from './resolver';
export { ResourceCatalog } from './resources';
export { loadSeedTopics, seedTopics, type SeedTopic, type Volatility } from './seeding';
export { ArangoTopicStore, InMemoryTopicStore, type TopicStore } from './topic-store';
export * from './types';
export { ArangoVectorStore, InMemoryVectorStore, type Clock, type VectorStore } from './vector-store';

export interface TopicCache {
  orchestrator: QueryOrchestrator;
  db: Database;
  /** Let background population finish, then close the database connection */
  close(): Promise<void>;
}

export interface CreateTopicCacheOptions {
  /** Create collections and indexes if missing (default true) */
  setup?: boolean;
  logger?: Logger;
}

/** Wire the ArangoDB stores and OpenAI collaborators into an orchestrator */
export async function createTopicCache(
  config: Readonly<AppConfig> = loadConfig(),
  options: CreateTopicCacheOptions = {}
): Promise<TopicCache> {
  setDefaultLogLevel(config.logLevel);
  const logger = options.logger ?? createLogger('topic-cache');
  const { cache } = config;

  const db = createDatabase(config.arango);
  if (options.setup ?? true) {
    await setupTopicCache(db, logger.child('db'));
  }

  const client = createOpenAIClient(config.openaiApiKey);
  const chat = {
    client,
    model: cache.chatModel,
    maxRetries: cache.maxRetries,
    retryDelayMs: cache.retryDelayMs,
  };

  const embedder = new OpenAIEmbedder({
    client,
    model: cache.embeddingModel,
    dimension: cache.vectorDimension,
    maxRetries: cache.maxRetries,
    retryDelayMs: cache.retryDelayMs,
    logger: logger.child('embeddings'),
  });
  const vectorStore = new ArangoVectorStore(db);
  const topicStore = new ArangoTopicStore(db);

  const policy = new ResolutionPolicy(
    {
      embedder,
      arbiter: new OpenAIArbiter({ ...chat, logger: logger.child('arbiter') }),
      resolver: new SimilarityResolver(vectorStore, { tieBreak: cache.tieBreak, logger: logger.child('resolver') }),
      vectorStore,
      topicStore,
    },
    { arbiterTimeoutMs: cache.arbiterTimeoutMs, aliasTtlMs: cache.aliasTtlMs, logger: logger.child('policy') }
  );

  const generator = new CompositeAliasGenerator(
    [new OpenAIAliasGenerator({ ...chat, logger: logger.child('alias-generator') }), RuleBasedAliasGenerator.load()],
    { logger: logger.child('alias-generator') }
  );

  const population = new PopulationPipeline(
    { generator, embedder, vectorStore, topicStore },
    { aliasesPerTopic: cache.aliasesPerTopic, aliasTtlMs: cache.aliasTtlMs, logger: logger.child('population') }
  );

  const orchestrator = new QueryOrchestrator(
    {
      policy,
      population,
      embedder,
      acquirer: new OpenAIAcquirer({ ...chat, logger: logger.child('acquirer') }),
      synthesizer: new OpenAIAnswerSynthesizer({ ...chat, logger: logger.child('synthesizer') }),
      vectorStore,
      topicStore,
      background: new BackgroundQueue({ logger: logger.child('background') }),
      resources: ResourceCatalog.load(),
    },
    { topicTtlMs: cache.topicTtlMs, aliasTtlMs: cache.aliasTtlMs, logger: logger.child('orchestrator') }
  );

  return {
    orchestrator,
    db,
    async close() {
      await orchestrator.drain();
      db.close();
    },
  };
}
