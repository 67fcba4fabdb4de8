import { beforeEach, describe, expect, test } from 'vitest';
import { PopulationFailed } from './errors';
import { InFlightPopulation } from './inflight';
import { silentLogger } from './logger';
import { PopulationPipeline } from './population';
import { BatchingFakeEmbedder, StaticAliasGenerator, createHarness, type Harness } from './test-fakes';
import { InMemoryTopicStore } from './topic-store';
import { InMemoryVectorStore } from './vector-store';

const HOUR = 60 * 60 * 1000;
const ID = 'course_registration';
const QUERY = 'course registration';

describe('PopulationPipeline', () => {
  let h: Harness;

  beforeEach(async () => {
    h = createHarness({
      aliases: ['  registration for courses  ', '', 'Course Registration', 'تسجيل المواد', 'تسجيل المواد'],
    });
    await h.topicStore.put(ID, { title: 'Course Registration' }, HOUR);
    await h.topicStore.addAlias(ID, QUERY);
  });

  test('stores new aliases in both stores', async () => {
    const report = await h.population.populate(ID, QUERY);

    expect(report).toEqual({
      canonicalId: ID,
      status: 'completed',
      added: ['registration for courses', 'تسجيل المواد'],
      rejected: ['Course Registration', 'تسجيل المواد'],
    });
    expect((await h.vectorStore.get('registration for courses'))?.canonicalId).toBe(ID);
    expect((await h.vectorStore.get('تسجيل المواد'))?.canonicalId).toBe(ID);
    expect(await h.topicStore.listAliasesFor(ID)).toEqual([QUERY, 'registration for courses', 'تسجيل المواد']);
  });

  test('caps accepted aliases per topic', async () => {
    h = createHarness({ aliases: ['first alias', 'second alias', 'third alias'], aliasesPerTopic: 2 });
    await h.topicStore.put(ID, { title: 'Course Registration' }, HOUR);

    const report = await h.population.populate(ID, QUERY);
    expect(report.added).toEqual(['first alias', 'second alias']);
    expect(report.rejected).toEqual(['third alias']);
  });

  test('concurrent triggers for one topic run once', async () => {
    const [a, b] = await Promise.all([h.population.populate(ID, QUERY), h.population.populate(ID, QUERY)]);

    expect([a.status, b.status].sort()).toEqual(['completed', 'skipped']);
    expect(h.generator.calls).toEqual([ID]);
  });

  test('holds the topic in flight until the run finishes', async () => {
    h.generator.hold();
    const running = h.population.populate(ID, QUERY);

    expect(h.population.inFlight.has(ID)).toBe(true);
    expect((await h.population.populate(ID, QUERY)).status).toBe('skipped');

    h.generator.release();
    expect((await running).status).toBe('completed');
    expect(h.population.inFlight.has(ID)).toBe(false);
  });

  test('different topics populate independently', async () => {
    await h.topicStore.put('tuition_fees', { title: 'Fees' }, HOUR);
    const [a, b] = await Promise.all([
      h.population.populate(ID, QUERY),
      h.population.populate('tuition_fees', 'fees'),
    ]);

    expect(a.status).toBe('completed');
    expect(b.status).toBe('completed');
  });

  test('a failed run releases the topic and a retry succeeds', async () => {
    h.generator.failing = true;
    const failed = await h.population.populate(ID, QUERY);

    expect(failed.status).toBe('failed');
    expect(failed.error).toBeInstanceOf(PopulationFailed);
    expect(h.population.inFlight.has(ID)).toBe(false);

    h.generator.failing = false;
    const retried = await h.population.populate(ID, QUERY);
    expect(retried.status).toBe('completed');
    expect(retried.added).toEqual(['registration for courses', 'تسجيل المواد']);
  });

  test('embedding failure fails the run without writing', async () => {
    h.embedder.failing = true;
    const report = await h.population.populate(ID, QUERY);

    expect(report.status).toBe('failed');
    expect(report.added).toEqual([]);
    expect(await h.topicStore.listAliasesFor(ID)).toEqual([QUERY]);
  });

  test('store failure fails the run', async () => {
    h.vectorStore.failing.add('put');
    const report = await h.population.populate(ID, QUERY);

    expect(report.status).toBe('failed');
    expect(h.population.inFlight.size).toBe(0);
  });

  test('uses batch embedding when the embedder has it', async () => {
    const embedder = new BatchingFakeEmbedder();
    const topicStore = new InMemoryTopicStore();
    await topicStore.put(ID, { title: 'Course Registration' }, HOUR);
    const population = new PopulationPipeline(
      {
        generator: new StaticAliasGenerator(['registration for courses', 'enrollment']),
        embedder,
        vectorStore: new InMemoryVectorStore(),
        topicStore,
        inFlight: new InFlightPopulation(),
      },
      { logger: silentLogger }
    );

    await population.populate(ID, QUERY);
    expect(embedder.batches).toEqual([['registration for courses', 'enrollment']]);
  });

  test('nothing to add still completes', async () => {
    h.generator.aliases = [QUERY];
    const report = await h.population.populate(ID, QUERY);

    expect(report).toEqual({ canonicalId: ID, status: 'completed', added: [], rejected: [QUERY] });
    expect(h.embedder.calls).toEqual([]);
  });
});

describe('PopulationPipeline with a shared in-flight set', () => {
  test('skips a topic another holder has in flight, and runs once it is released', async () => {
    const inFlight = new InFlightPopulation();
    const generator = new StaticAliasGenerator(['enrollment']);
    const topicStore = new InMemoryTopicStore();
    await topicStore.put(ID, { title: 'Course Registration' }, HOUR);
    const population = new PopulationPipeline(
      { generator, embedder: new BatchingFakeEmbedder(), vectorStore: new InMemoryVectorStore(), topicStore, inFlight },
      { logger: silentLogger }
    );

    inFlight.tryAcquire(ID);
    expect(await population.populate(ID, QUERY)).toEqual({ canonicalId: ID, status: 'skipped', added: [], rejected: [] });
    expect(generator.calls).toEqual([]);

    inFlight.release(ID);
    expect((await population.populate(ID, QUERY)).added).toEqual(['enrollment']);
    expect(inFlight.has(ID)).toBe(false);
  });
});
