/**
 * OpenAI Embeddings Integration
 */

import OpenAI from 'openai';
import type { Embedder } from './collaborators';
import { EmbeddingFailed } from './errors';
import { createLogger, type Logger } from './logger';
import { withRetry } from './retry';
import { DEFAULT_CONFIG, type EmbeddingModelType } from './types';

const ARABIC_CHAR = /[\u0600-\u06FF]/;
const LATIN_LETTER = /[A-Za-z]/;
const ARABIC_DIACRITICS = /[\u064B-\u065F\u0670\u0640]/g; // harakat, superscript alef, tatweel

/**
 * Normalize text for consistent alias keys.
 * Latin letters are lowercased; Arabic script is kept, minus diacritics.
 */
export function normalizeText(text: string): string {
  return text
    .normalize('NFKC')
    .replace(ARABIC_DIACRITICS, '')
    .toLowerCase()
    .replace(/[?!.,;:\u060C\u061F"'()[\]{}]/g, ' ') // punctuation, including Arabic comma and question mark
    .replace(/\s+/g, ' ')
    .trim();
}

export type Language = 'arabic' | 'english' | 'mixed' | 'unknown';

/** Classify a text by the share of Arabic letters among all letters */
export function detectLanguage(text: string): Language {
  let arabic = 0;
  let latin = 0;

  for (const char of text) {
    if (ARABIC_CHAR.test(char)) arabic++;
    else if (LATIN_LETTER.test(char)) latin++;
  }

  const total = arabic + latin;
  if (total === 0) return 'unknown';

  const ratio = arabic / total;
  if (ratio > 0.5) return 'arabic';
  if (ratio > 0) return 'mixed';
  return 'english';
}

/** Calculate cosine similarity between two vectors */
export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length) {
    throw new Error(`Vector dimension mismatch: ${a.length} vs ${b.length}`);
  }

  let dotProduct = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i++) {
    dotProduct += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  const magnitude = Math.sqrt(normA) * Math.sqrt(normB);
  if (magnitude === 0) return 0;

  // Rounding can push |a·a| / (|a||a|) a hair past 1
  return Math.max(-1, Math.min(1, dotProduct / magnitude));
}

export interface OpenAIEmbedderOptions {
  client: OpenAI;
  model?: EmbeddingModelType;
  /** Expected vector length; vectors of any other length are rejected */
  dimension?: number;
  maxRetries?: number;
  retryDelayMs?: number;
  logger?: Logger;
}

/** Embedder backed by the OpenAI embeddings endpoint */
export class OpenAIEmbedder implements Embedder {
  private client: OpenAI;
  private model: EmbeddingModelType;
  private dimension: number | undefined;
  private maxRetries: number;
  private retryDelayMs: number;
  private logger: Logger;

  constructor(options: OpenAIEmbedderOptions) {
    this.client = options.client;
    this.model = options.model ?? DEFAULT_CONFIG.embeddingModel;
    this.dimension = options.dimension;
    this.maxRetries = options.maxRetries ?? DEFAULT_CONFIG.maxRetries;
    this.retryDelayMs = options.retryDelayMs ?? DEFAULT_CONFIG.retryDelayMs;
    this.logger = options.logger ?? createLogger('embeddings');
  }

  /** Generate embedding for text */
  async embed(text: string): Promise<number[]> {
    const input = normalizeText(text);
    if (!input) {
      throw new EmbeddingFailed(text, new Error('empty input'));
    }

    try {
      const response = await withRetry(
        () =>
          this.client.embeddings.create({
            model: this.model,
            input,
            encoding_format: 'float',
          }),
        { attempts: this.maxRetries, delayMs: this.retryDelayMs }
      );
      const first = response.data[0];
      if (!first) {
        throw new Error('no embedding returned');
      }
      this.checkDimension(first.embedding);
      this.logger.debug('Generated embedding', { dimension: first.embedding.length });
      return first.embedding;
    } catch (err) {
      throw new EmbeddingFailed(text, err);
    }
  }

  /** Batch embed multiple texts */
  async embedBatch(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];

    const inputs = texts.map(normalizeText);
    const emptyAt = inputs.findIndex((input) => input === '');
    if (emptyAt !== -1) {
      throw new EmbeddingFailed(texts[emptyAt], new Error('empty input'));
    }

    try {
      const response = await withRetry(
        () =>
          this.client.embeddings.create({
            model: this.model,
            input: inputs,
            encoding_format: 'float',
          }),
        { attempts: this.maxRetries, delayMs: this.retryDelayMs }
      );

      // Sort by index to maintain order
      const vectors = [...response.data].sort((a, b) => a.index - b.index).map((d) => d.embedding);
      if (vectors.length !== texts.length) {
        throw new Error(`expected ${texts.length} embeddings, got ${vectors.length}`);
      }
      vectors.forEach((vector) => this.checkDimension(vector));
      return vectors;
    } catch (err) {
      throw new EmbeddingFailed(texts.join(' | '), err);
    }
  }

  private checkDimension(vector: number[]): void {
    if (this.dimension !== undefined && vector.length !== this.dimension) {
      throw new Error(`expected ${this.dimension} dimensions from ${this.model}, got ${vector.length}`);
    }
  }
}

/** Create an OpenAI client from an API key (falls back to OPENAI_API_KEY) */
export function createOpenAIClient(apiKey?: string): OpenAI {
  return new OpenAI(apiKey ? { apiKey } : {});
}
