/**
 * Wiring and ArangoDB integration tests.
 *
 * The integration suites need a running ArangoDB (ARANGODB_URL) and, for the
 * end-to-end flow, an OpenAI key. They are skipped otherwise.
 */

import { afterAll, beforeAll, describe, expect, test } from 'vitest';
import type { Database } from 'arangojs';
import {
  ArangoTopicStore,
  ArangoVectorStore,
  QueryOrchestrator,
  createDatabase,
  createTopicCache,
  loadConfig,
  setupTopicCache,
  silentLogger,
} from './index';
import { unit } from './test-fakes';

const hasArango = !!process.env.ARANGODB_URL;
const hasOpenAIKey = !!process.env.OPENAI_API_KEY;

describe('createTopicCache', () => {
  test('wires an orchestrator without touching the network', async () => {
    const config = { ...loadConfig({}), openaiApiKey: 'test-key', logLevel: 'silent' as const };
    const cache = await createTopicCache(config, { setup: false, logger: silentLogger });

    expect(cache.orchestrator).toBeInstanceOf(QueryOrchestrator);
    await cache.close();
  });
});

describe.skipIf(!hasArango)('ArangoDB stores', () => {
  let db: Database;
  let vectors: ArangoVectorStore;
  let topics: ArangoTopicStore;

  beforeAll(async () => {
    db = createDatabase(loadConfig().arango);
    await setupTopicCache(db, silentLogger);
    vectors = new ArangoVectorStore(db);
    topics = new ArangoTopicStore(db);
    await vectors.clear();
    await topics.clear();
  });

  afterAll(async () => {
    await vectors.clear();
    await topics.clear();
    db.close();
  });

  test('alias put is an upsert keyed by normalized text', async () => {
    await vectors.put('Course Registration?', 'course_registration', unit(0), 60_000);
    await vectors.put('course registration', 'course_registration_2', unit(1), 60_000);

    const entry = await vectors.get('course registration');
    expect(entry?.canonicalId).toBe('course_registration_2');
    expect(entry?.vector).toEqual(unit(1));
  });

  test('scan returns live aliases only', async () => {
    await vectors.put('expired alias', 'old_topic', unit(2), -1000);

    const seen: string[] = [];
    for await (const entry of vectors.all()) {
      seen.push(entry.aliasText);
    }
    expect(seen).toContain('course registration');
    expect(seen).not.toContain('expired alias');
    expect(await vectors.expire()).toBe(1);
  });

  test('topic put keeps the alias index', async () => {
    await topics.put('course_registration', { title: 'Registration' }, 60_000);
    expect(await topics.addAlias('course_registration', 'Course Registration')).toBe(true);
    expect(await topics.addAlias('course_registration', 'course registration')).toBe(false);

    await topics.put('course_registration', { title: 'Registration', summary: 'Updated' }, 60_000);
    const topic = await topics.get('course_registration');
    expect(topic?.payload).toEqual({ title: 'Registration', summary: 'Updated' });
    expect(topic?.aliases).toEqual(['course registration']);
  });

  test('delete by canonical id removes every alias of the topic', async () => {
    await vectors.put('registration for courses', 'course_registration_2', unit(3), 60_000);

    expect(await vectors.deleteByCanonical('course_registration_2')).toBe(2);
    expect(await topics.delete('course_registration')).toBe(true);
    expect(await topics.exists('course_registration')).toBe(false);
  });
});

describe.skipIf(!hasArango || !hasOpenAIKey)('End-to-end', () => {
  test('second asking of a question is served from the cache', async () => {
    const cache = await createTopicCache(loadConfig(), { logger: silentLogger });
    try {
      await cache.orchestrator.invalidateTopic('academic_calendar_dates');

      const first = await cache.orchestrator.resolveAndAnswer('academic calendar dates');
      expect(first.source).toBe('live');
      await cache.orchestrator.drain();

      const second = await cache.orchestrator.resolveAndAnswer('academic calendar dates');
      expect(second.source).toBe('cache');
      expect(second.canonicalId).toBe(first.canonicalId);
    } finally {
      await cache.orchestrator.invalidateTopic('academic_calendar_dates');
      await cache.close();
    }
  }, 60_000);
});
