/**
 * Environment loading and validation.
 */

import 'dotenv/config';
import { z, type ZodIssue } from 'zod';
import { TopicCacheError } from './errors';
import type { LogLevel } from './logger';
import { DEFAULT_CONFIG, type EmbeddingModelType, type TopicCacheConfig } from './types';

export interface ConfigValidationIssue {
  path: (string | number)[];
  message: string;
}

export class ConfigError extends TopicCacheError {
  readonly issues: ConfigValidationIssue[];

  constructor(issues: ConfigValidationIssue[]) {
    super('CONFIG_INVALID', formatIssues(issues));
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

function formatIssues(issues: ConfigValidationIssue[]): string {
  const lines = ['Environment configuration is invalid:'];
  for (const issue of issues) {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    lines.push(`  - ${path}: ${issue.message}`);
  }
  return lines.join('\n');
}

function toIssues(zodIssues: ZodIssue[]): ConfigValidationIssue[] {
  return zodIssues.map((issue) => ({
    path: issue.path.filter(
      (p): p is string | number => typeof p === 'string' || typeof p === 'number'
    ),
    message: issue.message,
  }));
}

const EMBEDDING_MODELS = ['text-embedding-3-small', 'text-embedding-3-large', 'text-embedding-ada-002'] as const;

/** Treats empty strings as unset so `.default()` applies */
const optional = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess((value) => (value === '' ? undefined : value), schema);

const seconds = (fallbackMs: number) =>
  optional(z.coerce.number().int().positive().default(fallbackMs / 1000));

const EnvSchema = z.object({
  ARANGODB_URL: optional(z.string().url().default('http://localhost:8529')),
  ARANGODB_DATABASE: optional(z.string().default('_system')),
  ARANGODB_USERNAME: optional(z.string().default('root')),
  ARANGODB_PASSWORD: optional(z.string().default('')),
  OPENAI_API_KEY: optional(z.string().optional()),
  OPENAI_MODEL: optional(z.string().default(DEFAULT_CONFIG.chatModel)),
  EMBEDDING_MODEL: optional(z.enum(EMBEDDING_MODELS).default(DEFAULT_CONFIG.embeddingModel)),
  CACHE_TTL_SECONDS: seconds(DEFAULT_CONFIG.topicTtlMs),
  ALIAS_TTL_SECONDS: optional(z.coerce.number().int().positive().optional()),
  ARBITER_TIMEOUT_MS: optional(z.coerce.number().int().positive().default(DEFAULT_CONFIG.arbiterTimeoutMs)),
  ALIASES_PER_TOPIC: optional(z.coerce.number().int().min(0).default(DEFAULT_CONFIG.aliasesPerTopic)),
  SIMILARITY_TIE_BREAK: optional(z.enum(['oldest', 'newest']).default(DEFAULT_CONFIG.tieBreak)),
  LOG_LEVEL: optional(z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info')),
  MAX_RETRIES: optional(z.coerce.number().int().min(1).default(DEFAULT_CONFIG.maxRetries)),
  RETRY_DELAY_MS: optional(z.coerce.number().int().min(0).default(DEFAULT_CONFIG.retryDelayMs)),
});

export interface ArangoConnectionConfig {
  url: string;
  databaseName: string;
  username: string;
  password: string;
}

export interface AppConfig {
  arango: ArangoConnectionConfig;
  openaiApiKey: string | undefined;
  logLevel: LogLevel;
  cache: TopicCacheConfig;
}

/** Embedding dimensions by model */
export const EMBEDDING_DIMENSIONS: Record<EmbeddingModelType, number> = {
  'text-embedding-3-small': 1536,
  'text-embedding-3-large': 3072,
  'text-embedding-ada-002': 1536,
};

/**
 * Parse and validate configuration from environment variables.
 * Throws ConfigError listing every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Readonly<AppConfig> {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(toIssues(parsed.error.issues));
  }

  const e = parsed.data;
  const topicTtlMs = e.CACHE_TTL_SECONDS * 1000;

  return Object.freeze({
    arango: Object.freeze({
      url: e.ARANGODB_URL,
      databaseName: e.ARANGODB_DATABASE,
      username: e.ARANGODB_USERNAME,
      password: e.ARANGODB_PASSWORD,
    }),
    openaiApiKey: e.OPENAI_API_KEY,
    logLevel: e.LOG_LEVEL,
    cache: Object.freeze({
      embeddingModel: e.EMBEDDING_MODEL,
      chatModel: e.OPENAI_MODEL,
      vectorDimension: EMBEDDING_DIMENSIONS[e.EMBEDDING_MODEL],
      topicTtlMs,
      aliasTtlMs: e.ALIAS_TTL_SECONDS !== undefined ? e.ALIAS_TTL_SECONDS * 1000 : topicTtlMs,
      arbiterTimeoutMs: e.ARBITER_TIMEOUT_MS,
      aliasesPerTopic: e.ALIASES_PER_TOPIC,
      tieBreak: e.SIMILARITY_TIE_BREAK,
      maxRetries: e.MAX_RETRIES,
      retryDelayMs: e.RETRY_DELAY_MS,
    }),
  });
}
