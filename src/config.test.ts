import { describe, expect, test } from 'vitest';
import { ConfigError, loadConfig } from './config';
import { DEFAULT_CONFIG } from './types';

function configError(env: NodeJS.ProcessEnv): ConfigError {
  try {
    loadConfig(env);
  } catch (err) {
    if (err instanceof ConfigError) return err;
    throw err;
  }
  throw new Error('expected loadConfig to throw');
}

describe('loadConfig', () => {
  test('applies defaults to an empty environment', () => {
    const config = loadConfig({});

    expect(config.arango).toEqual({
      url: 'http://localhost:8529',
      databaseName: '_system',
      username: 'root',
      password: '',
    });
    expect(config.openaiApiKey).toBeUndefined();
    expect(config.logLevel).toBe('info');
    expect(config.cache).toEqual(DEFAULT_CONFIG);
  });

  test('reads overrides', () => {
    const config = loadConfig({
      ARANGODB_PASSWORD: 'test-password',
      OPENAI_API_KEY: 'test-key',
      CACHE_TTL_SECONDS: '60',
      ALIAS_TTL_SECONDS: '30',
      SIMILARITY_TIE_BREAK: 'newest',
      EMBEDDING_MODEL: 'text-embedding-3-large',
      ARBITER_TIMEOUT_MS: '',
      LOG_LEVEL: 'silent',
    });

    expect(config.arango.password).toBe('test-password');
    expect(config.openaiApiKey).toBe('test-key');
    expect(config.logLevel).toBe('silent');
    expect(config.cache.topicTtlMs).toBe(60_000);
    expect(config.cache.aliasTtlMs).toBe(30_000);
    expect(config.cache.tieBreak).toBe('newest');
    expect(config.cache.vectorDimension).toBe(3072);
    expect(config.cache.arbiterTimeoutMs).toBe(10_000);
  });

  test('alias TTL follows the topic TTL when unset', () => {
    expect(loadConfig({ CACHE_TTL_SECONDS: '60' }).cache.aliasTtlMs).toBe(60_000);
  });

  test('reports every invalid variable', () => {
    const error = configError({ MAX_RETRIES: '0', SIMILARITY_TIE_BREAK: 'random' });

    expect(error.code).toBe('CONFIG_INVALID');
    expect(error.issues.map((issue) => issue.path.join('.')).sort()).toEqual([
      'MAX_RETRIES',
      'SIMILARITY_TIE_BREAK',
    ]);
    expect(error.message.startsWith('Environment configuration is invalid:')).toBe(true);
  });

  test('returns a frozen config', () => {
    const config = loadConfig({});
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.cache)).toBe(true);
  });
});
