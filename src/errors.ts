/**
 * Error taxonomy for the topic cache.
 *
 * None of these reach the caller of `resolveAndAnswer`: each is caught at
 * the layer that can degrade (treat as miss, lower the tier, fall back to a
 * generic answer) and logged there.
 */

export type TopicCacheErrorCode =
  | 'STORE_UNAVAILABLE'
  | 'EMBEDDING_FAILED'
  | 'ARBITER_TIMEOUT'
  | 'ARBITER_FAILED'
  | 'EXTRACTION_FAILED'
  | 'POPULATION_FAILED'
  | 'CONFIG_INVALID';

export class TopicCacheError extends Error {
  readonly code: TopicCacheErrorCode;

  constructor(code: TopicCacheErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TopicCacheError';
    this.code = code;
  }
}

/** Either store cannot be reached */
export class StoreUnavailable extends TopicCacheError {
  readonly store: 'vector' | 'topic';

  constructor(store: 'vector' | 'topic', operation: string, cause?: unknown) {
    super('STORE_UNAVAILABLE', `${store} store unavailable during ${operation}: ${describe(cause)}`, { cause });
    this.name = 'StoreUnavailable';
    this.store = store;
  }
}

export class EmbeddingFailed extends TopicCacheError {
  constructor(text: string, cause?: unknown) {
    super('EMBEDDING_FAILED', `Embedding failed for "${preview(text)}": ${describe(cause)}`, { cause });
    this.name = 'EmbeddingFailed';
  }
}

export class ArbiterTimeout extends TopicCacheError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super('ARBITER_TIMEOUT', `Arbiter did not answer within ${timeoutMs}ms`);
    this.name = 'ArbiterTimeout';
    this.timeoutMs = timeoutMs;
  }
}

export class ArbiterFailed extends TopicCacheError {
  constructor(cause?: unknown) {
    super('ARBITER_FAILED', `Arbiter failed: ${describe(cause)}`, { cause });
    this.name = 'ArbiterFailed';
  }
}

export class ExtractionFailed extends TopicCacheError {
  constructor(query: string, cause?: unknown) {
    super('EXTRACTION_FAILED', `Extraction failed for "${preview(query)}": ${describe(cause)}`, { cause });
    this.name = 'ExtractionFailed';
  }
}

export class PopulationFailed extends TopicCacheError {
  readonly canonicalId: string;

  constructor(canonicalId: string, cause?: unknown) {
    super('POPULATION_FAILED', `Population failed for ${canonicalId}: ${describe(cause)}`, { cause });
    this.name = 'PopulationFailed';
    this.canonicalId = canonicalId;
  }
}

/** Coerce an unknown thrown value into an Error */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

function describe(cause: unknown): string {
  if (cause === undefined) return 'unknown cause';
  return cause instanceof Error ? cause.message : String(cause);
}

function preview(text: string): string {
  return text.length > 50 ? `${text.slice(0, 50)}...` : text;
}
