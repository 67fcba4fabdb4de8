/**
 * Semantic Topic Cache Types
 */

/** Supported embedding models */
export type EmbeddingModelType =
  | 'text-embedding-3-small'
  | 'text-embedding-3-large'
  | 'text-embedding-ada-002';

/**
 * Value of a single payload field. The payload is open-ended (titles,
 * requirements, fees, deadlines, steps, contacts...), but every value is
 * one of these three shapes.
 */
export type PayloadValue = string | string[] | Record<string, string>;

/** Structured facts about a canonical topic */
export type TopicPayload = Record<string, PayloadValue>;

/** Resolution confidence bucket */
export type Tier = 'confident' | 'ambiguous' | 'none';

/** Tie-breaking policy when two aliases score identically */
export type TieBreak = 'oldest' | 'newest';

/** Canonical topic as held by the canonical data store */
export interface CanonicalTopic {
  id: string;
  payload: TopicPayload;
  aliases: string[];
  createdAt: number;
  expiresAt: number;
}

/** Alias entry as yielded by the vector store */
export interface AliasEntry {
  aliasText: string;
  canonicalId: string;
  vector: number[];
  createdAt: number;
  expiresAt: number;
}

/** Stored alias document in ArangoDB */
export interface AliasDocument {
  _key: string;
  _id?: string;
  _rev?: string;
  alias_text: string;
  canonical_id: string;
  vec: number[];
  created_at: number;
  ttl_at: string; // ISO date string for TTL index
}

/** Stored topic document in ArangoDB */
export interface TopicDocument {
  _key: string;
  _id?: string;
  _rev?: string;
  payload: TopicPayload;
  aliases: string[];
  created_at: number;
  ttl_at: string;
}

/** Result of a similarity scan */
export interface SimilarityMatch {
  alias: string | null;
  canonicalId: string | null;
  score: number;
  createdAt: number | null;
  scanned: number;
  skipped: number;
}

/** Why a resolution was forced down to the `none` tier */
export type DegradationReason =
  | 'embedding-failed'
  | 'store-unavailable'
  | 'arbiter-failed'
  | 'arbiter-timeout'
  | 'candidate-missing';

/** Outcome of resolving one query */
export interface ResolutionResult {
  alias: string | null;
  score: number;
  canonicalId: string | null;
  tier: Tier;
  arbiterConsulted: boolean;
  /** Present when the tier was lowered by a failure rather than by the score */
  degraded?: DegradationReason;
  /** Near-match topic that was considered in the ambiguous tier but not accepted */
  candidateId?: string;
  /** Query embedding, when one was computed */
  queryVector?: number[];
}

/** Outcome of a population run */
export interface PopulationReport {
  canonicalId: string;
  status: 'completed' | 'skipped' | 'failed';
  added: string[];
  rejected: string[];
  error?: Error;
}

/** Answer returned to the caller */
export interface AnswerResult {
  answer: string;
  canonicalId: string;
  source: 'cache' | 'live';
  tier: Tier;
  score: number;
  payload: TopicPayload;
}

/** Events emitted by the streaming answer path */
export type AnswerEvent =
  | { type: 'meta'; canonicalId: string; source: 'cache' | 'live'; tier: Tier; score: number }
  | { type: 'chunk'; text: string }
  | { type: 'end'; length: number };

/** Configuration for the topic cache */
export interface TopicCacheConfig {
  /** Embedding model identifier */
  embeddingModel: EmbeddingModelType;
  /** Chat model used by the arbiter, acquisition, alias generation and synthesis */
  chatModel: string;
  /** Vector dimension (must match embedding model) */
  vectorDimension: number;
  /** TTL of topic payloads in milliseconds */
  topicTtlMs: number;
  /** TTL of alias entries in milliseconds */
  aliasTtlMs: number;
  /** Time budget for one arbiter call */
  arbiterTimeoutMs: number;
  /** Maximum number of generated aliases accepted per population run */
  aliasesPerTopic: number;
  /** Tie-breaking policy for equal similarity scores */
  tieBreak: TieBreak;
  /** Attempts for model calls before giving up */
  maxRetries: number;
  /** Base delay between retries in milliseconds */
  retryDelayMs: number;
}

/** Default configuration values */
export const DEFAULT_CONFIG: TopicCacheConfig = {
  embeddingModel: 'text-embedding-3-small',
  chatModel: 'gpt-4o',
  vectorDimension: 1536, // text-embedding-3-small dimension
  topicTtlMs: 24 * 60 * 60 * 1000, // 24 hours
  aliasTtlMs: 24 * 60 * 60 * 1000,
  arbiterTimeoutMs: 10_000,
  aliasesPerTopic: 20,
  tieBreak: 'oldest',
  maxRetries: 3,
  retryDelayMs: 1000,
};

/** Tier boundaries; not configurable */
export const CONFIDENT_THRESHOLD = 0.7;
export const AMBIGUOUS_THRESHOLD = 0.5;

/** TTL presets based on content volatility */
export const TTL_PRESETS = {
  static: 30 * 24 * 60 * 60 * 1000,      // 30 days
  semiDynamic: 7 * 24 * 60 * 60 * 1000,  // 7 days
  dynamic: 24 * 60 * 60 * 1000,           // 24 hours
  realtime: 2 * 60 * 60 * 1000,           // 2 hours
} as const;
