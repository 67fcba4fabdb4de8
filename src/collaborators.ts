/**
 * Contracts for the external collaborators the cache core consumes.
 * OpenAI-backed implementations live in embeddings.ts and llm.ts.
 */

import type { TopicPayload } from './types';

export interface Embedder {
  /** Repeated calls on identical text yield vectors with cosine 1.0 */
  embed(text: string): Promise<number[]>;
  /** Vectors in the same order as `texts` */
  embedBatch?(texts: string[]): Promise<number[][]>;
}

export interface Arbiter {
  /** Decide whether `queryText` asks about the same topic as the candidate alias */
  confirm(
    queryText: string,
    candidateAliasText: string,
    candidatePayloadSummary: string,
    signal?: AbortSignal
  ): Promise<boolean>;
}

export interface AcquisitionHints {
  canonicalId?: string;
  resourceUrls?: string[];
}

export interface Acquirer {
  /** Throws ExtractionFailed when no payload could be produced */
  acquire(queryText: string, hints?: AcquisitionHints): Promise<TopicPayload>;
}

export interface AliasGenerator {
  /** Finite candidate sequence, consumed once */
  generateAliases(
    canonicalId: string,
    originatingQueryText: string
  ): AsyncIterable<string> | Iterable<string> | Promise<string[]>;
}

export interface AnswerSynthesizer {
  synthesize(payload: TopicPayload, queryText: string): Promise<string>;
  /** Ordered, non-seekable chunks; the iterator finishing is the end-of-answer signal */
  synthesizeStream(payload: TopicPayload, queryText: string): AsyncIterable<string>;
}
