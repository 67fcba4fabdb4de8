/**
 * End-to-end demo against a live ArangoDB and OpenAI.
 *
 * Asks a few related questions in both languages and shows which ones are
 * answered from the cache.
 */

import { createTopicCache } from './index';

const QUERIES = [
  'How do I register for courses?',
  'course registration steps',
  'تسجيل مواد دراسية',
  'What are the tuition fees for engineering?',
  'كم رسوم الساعة المعتمدة',
];

async function main() {
  console.log('🚀 Semantic Topic Cache Demo\n');
  console.log('='.repeat(60));

  const { orchestrator, close } = await createTopicCache();
  console.log('✓ Connected to ArangoDB\n');

  for (const query of QUERIES) {
    console.log(`Query: "${query}"`);
    const start = performance.now();

    const result = await orchestrator.resolveAndAnswer(query);

    const elapsed = (performance.now() - start).toFixed(0);
    console.log(`  ✅ Source: ${result.source} (${result.canonicalId})`);
    console.log(`  📐 Tier: ${result.tier}, score ${result.score.toFixed(4)}`);
    console.log(`  ⏱️  Time: ${elapsed}ms`);
    console.log(`  💬 ${result.answer.slice(0, 160).replace(/\s+/g, ' ')}...`);
    console.log();

    // Let background population land before the next, related question
    await orchestrator.drain();
  }

  console.log('📝 Streaming answer:\n');
  for await (const event of orchestrator.resolveAndAnswerStream('when does the semester start')) {
    if (event.type === 'meta') console.log(`  [${event.source}] ${event.canonicalId}`);
    if (event.type === 'chunk') process.stdout.write(event.text);
    if (event.type === 'end') console.log(`\n  (${event.length} characters)\n`);
  }

  const stats = await orchestrator.getCacheStats();
  console.log('📈 Cache Statistics:');
  console.log(`  Topics: ${stats.topicCount}`);
  console.log(`  Aliases: ${stats.aliasCount}`);
  console.log(`  Aliases per topic: ${stats.avgAliasesPerTopic.toFixed(1)}`);

  await close();
}

main().catch((err) => {
  console.error(err);
  process.exitCode = 1;
});
