import { describe, expect, test } from 'vitest';
import { EmbeddingFailed } from './errors';
import { silentLogger } from './logger';
import { loadSeedTopics, seedTopics, type SeedTopic } from './seeding';
import { FakeEmbedder } from './test-fakes';
import { InMemoryTopicStore } from './topic-store';
import { TTL_PRESETS } from './types';
import { InMemoryVectorStore } from './vector-store';

const FEES: SeedTopic = {
  id: 'tuition_fees',
  volatility: 'static',
  payload: { title: 'Tuition Fees' },
  aliases: ['tuition fees', 'الرسوم الجامعية'],
};

describe('loadSeedTopics', () => {
  test('loads the bundled seed file', () => {
    expect(loadSeedTopics().map((topic) => topic.id)).toEqual([
      'course_registration',
      'tuition_fees',
      'academic_calendar',
    ]);
  });
});

describe('seedTopics', () => {
  test('writes the topic and its aliases with the volatility TTL', async () => {
    const now = () => 0;
    const topicStore = new InMemoryTopicStore({ now });
    const vectorStore = new InMemoryVectorStore({ now });

    const result = await seedTopics({ embedder: new FakeEmbedder(), vectorStore, topicStore }, [FEES], silentLogger);

    expect(result).toEqual({ topics: 1, aliases: 2 });
    const topic = await topicStore.get('tuition_fees');
    expect(topic?.aliases).toEqual(['tuition fees', 'الرسوم الجامعية']);
    expect(topic?.expiresAt).toBe(TTL_PRESETS.static);
    expect((await vectorStore.get('الرسوم الجامعية'))?.canonicalId).toBe('tuition_fees');
  });

  test('an embedding failure leaves no topic behind', async () => {
    const embedder = new FakeEmbedder();
    embedder.failing = true;
    const topicStore = new InMemoryTopicStore();
    const vectorStore = new InMemoryVectorStore();

    await expect(seedTopics({ embedder, vectorStore, topicStore }, [FEES], silentLogger)).rejects.toBeInstanceOf(
      EmbeddingFailed
    );
    expect(await topicStore.exists('tuition_fees')).toBe(false);
    expect(await vectorStore.count()).toBe(0);
  });
});
