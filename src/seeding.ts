/**
 * Seed topics: pre-load known topics and their aliases so the first
 * questions about them are already cache hits.
 */

import { z } from 'zod';
import type { Embedder } from './collaborators';
import { readDataFile, readJsonFile } from './data-files';
import { createLogger, type Logger } from './logger';
import { sanitizePayload } from './payload';
import type { TopicStore } from './topic-store';
import { TTL_PRESETS, type TopicPayload } from './types';
import type { VectorStore } from './vector-store';

const SeedTopicSchema = z.object({
  id: z.string().regex(/^[a-z0-9_]+$/),
  volatility: z.enum(['static', 'semiDynamic', 'dynamic', 'realtime']).default('dynamic'),
  payload: z.record(z.unknown()).transform(sanitizePayload),
  aliases: z.array(z.string()).min(1),
});

const SeedFileSchema = z.array(SeedTopicSchema);

export type Volatility = keyof typeof TTL_PRESETS;

export interface SeedTopic {
  id: string;
  volatility: Volatility;
  payload: TopicPayload;
  aliases: string[];
}

/** Load seed topics; defaults to data/seed-topics.json */
export function loadSeedTopics(path?: string | URL): SeedTopic[] {
  return path ? readJsonFile(path, SeedFileSchema) : readDataFile('seed-topics.json', SeedFileSchema);
}

export interface SeedDeps {
  embedder: Embedder;
  vectorStore: VectorStore;
  topicStore: TopicStore;
}

/**
 * Write each topic's payload and aliases. Aliases are embedded before
 * anything is written. TTLs follow the topic's volatility.
 */
export async function seedTopics(
  deps: SeedDeps,
  topics: SeedTopic[],
  logger: Logger = createLogger('seed')
): Promise<{ topics: number; aliases: number }> {
  let aliasCount = 0;

  for (const topic of topics) {
    const ttlMs = TTL_PRESETS[topic.volatility];
    const vectors = deps.embedder.embedBatch
      ? await deps.embedder.embedBatch(topic.aliases)
      : await Promise.all(topic.aliases.map((alias) => deps.embedder.embed(alias)));

    await deps.topicStore.put(topic.id, topic.payload, ttlMs);

    for (const [i, alias] of topic.aliases.entries()) {
      await deps.vectorStore.put(alias, topic.id, vectors[i], ttlMs);
      await deps.topicStore.addAlias(topic.id, alias);
      aliasCount++;
    }

    logger.info(`Seeded ${topic.id}`, { aliases: topic.aliases.length, volatility: topic.volatility });
  }

  return { topics: topics.length, aliases: aliasCount };
}
