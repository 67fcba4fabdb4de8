/**
 * Load data/seed-topics.json (or the file given as the first argument)
 * into the topic cache.
 */

import { createTopicCache } from './index';
import { loadSeedTopics } from './seeding';

async function main() {
  const path = process.argv[2];
  const topics = loadSeedTopics(path);
  console.log(`🌱 Seeding ${topics.length} topics${path ? ` from ${path}` : ''}\n`);

  const { orchestrator, close } = await createTopicCache();
  const result = await orchestrator.seed(topics);

  console.log(`\n✓ Seeded ${result.topics} topics with ${result.aliases} aliases`);
  await close();
}

main().catch((err) => {
  console.error(err);
  process.exitCode = 1;
});
