/**
 * In-process stand-ins for the model collaborators, plus a fully wired
 * in-memory orchestrator. Used by the test suites.
 */

import { BackgroundQueue } from './background';
import type {
  AcquisitionHints,
  Acquirer,
  AliasGenerator,
  AnswerSynthesizer,
  Arbiter,
  Embedder,
} from './collaborators';
import { normalizeText } from './embeddings';
import { EmbeddingFailed, ExtractionFailed, StoreUnavailable } from './errors';
import { silentLogger } from './logger';
import { QueryOrchestrator } from './orchestrator';
import { ResolutionPolicy } from './policy';
import { PopulationPipeline } from './population';
import { SimilarityResolver } from './resolver';
import type { ResourceCatalog } from './resources';
import { InMemoryTopicStore } from './topic-store';
import type { AliasEntry, TieBreak, TopicPayload } from './types';
import { InMemoryVectorStore, type Clock } from './vector-store';

export const DIMENSION = 64;
/** Axes below this are left for hand-built vectors */
const FIRST_AUTO_AXIS = 16;

export function unit(axis: number): number[] {
  const vector = new Array<number>(DIMENSION).fill(0);
  vector[axis] = 1;
  return vector;
}

/** Unit vector whose cosine similarity with `unit(a)` is `cos` */
export function blend(a: number, b: number, cos: number): number[] {
  const vector = new Array<number>(DIMENSION).fill(0);
  vector[a] = cos;
  vector[b] = Math.sqrt(1 - cos * cos);
  return vector;
}

/**
 * Texts registered up front get their given vector. Any other text gets a
 * fresh axis the first time it is seen, so unknown texts are orthogonal to
 * each other and identical texts embed identically.
 */
export class FakeEmbedder implements Embedder {
  readonly calls: string[] = [];
  failing = false;
  private vectors = new Map<string, number[]>();
  private nextAxis = FIRST_AUTO_AXIS;

  constructor(known: Record<string, number[]> = {}) {
    for (const [text, vector] of Object.entries(known)) {
      this.vectors.set(normalizeText(text), vector);
    }
  }

  async embed(text: string): Promise<number[]> {
    this.calls.push(text);
    if (this.failing) {
      throw new EmbeddingFailed(text, new Error('embedding service down'));
    }
    const key = normalizeText(text);
    let vector = this.vectors.get(key);
    if (!vector) {
      vector = unit(this.nextAxis++ % DIMENSION);
      this.vectors.set(key, vector);
    }
    return vector;
  }
}

export class BatchingFakeEmbedder extends FakeEmbedder {
  readonly batches: string[][] = [];

  async embedBatch(texts: string[]): Promise<number[][]> {
    this.batches.push([...texts]);
    return Promise.all(texts.map((text) => this.embed(text)));
  }
}

export type Verdict = boolean | 'fail' | 'hang';

export class ScriptedArbiter implements Arbiter {
  readonly calls: Array<{ query: string; alias: string; summary: string }> = [];
  verdict: Verdict;

  constructor(verdict: Verdict = true) {
    this.verdict = verdict;
  }

  async confirm(query: string, alias: string, summary: string, signal?: AbortSignal): Promise<boolean> {
    this.calls.push({ query, alias, summary });
    if (this.verdict === 'fail') {
      throw new Error('arbiter service down');
    }
    if (this.verdict === 'hang') {
      return new Promise<boolean>((_, reject) => {
        signal?.addEventListener('abort', () => reject(new Error('aborted')));
      });
    }
    return this.verdict;
  }
}

export class FakeAcquirer implements Acquirer {
  readonly calls: Array<{ query: string; hints?: AcquisitionHints }> = [];
  failing = false;

  async acquire(query: string, hints?: AcquisitionHints): Promise<TopicPayload> {
    this.calls.push({ query, hints });
    if (this.failing) {
      throw new ExtractionFailed(query, new Error('source unreachable'));
    }
    return { title: `About ${query}`, summary: `Facts about ${query}` };
  }
}

export class FakeSynthesizer implements AnswerSynthesizer {
  failing = false;
  chunks = ['Answer ', 'text'];

  async synthesize(_payload: TopicPayload, query: string): Promise<string> {
    if (this.failing) {
      throw new Error('model down');
    }
    return `Answer for "${query}"`;
  }

  async *synthesizeStream(): AsyncGenerator<string> {
    if (this.failing) {
      throw new Error('model down');
    }
    yield* this.chunks;
  }
}

/** Returns a fixed list; `hold()` parks every call until `release()` */
export class StaticAliasGenerator implements AliasGenerator {
  readonly calls: string[] = [];
  aliases: string[];
  failing = false;
  private gate: Promise<void> | null = null;
  private open: (() => void) | null = null;

  constructor(aliases: string[] = []) {
    this.aliases = aliases;
  }

  hold(): void {
    this.gate = new Promise<void>((resolve) => {
      this.open = resolve;
    });
  }

  release(): void {
    this.open?.();
    this.gate = null;
    this.open = null;
  }

  async generateAliases(canonicalId: string): Promise<string[]> {
    this.calls.push(canonicalId);
    if (this.gate) await this.gate;
    if (this.failing) {
      throw new Error('generator down');
    }
    return [...this.aliases];
  }
}

/** In-memory vector store whose scan or writes can be switched to fail */
export class FlakyVectorStore extends InMemoryVectorStore {
  readonly failing = new Set<'scan' | 'put'>();

  all(): AsyncIterable<AliasEntry> {
    const inner = super.all();
    const failing = this.failing.has('scan');
    return {
      async *[Symbol.asyncIterator]() {
        if (failing) {
          throw new StoreUnavailable('vector', 'scan', new Error('connection refused'));
        }
        yield* inner;
      },
    };
  }

  async put(aliasText: string, canonicalId: string, vector: number[], ttlMs: number): Promise<void> {
    if (this.failing.has('put')) {
      throw new StoreUnavailable('vector', 'put', new Error('connection refused'));
    }
    return super.put(aliasText, canonicalId, vector, ttlMs);
  }
}

export interface HarnessOptions {
  known?: Record<string, number[]>;
  aliases?: string[];
  verdict?: Verdict;
  arbiterTimeoutMs?: number;
  aliasesPerTopic?: number;
  tieBreak?: TieBreak;
  resources?: ResourceCatalog;
  now?: Clock;
}

export interface Harness {
  embedder: FakeEmbedder;
  arbiter: ScriptedArbiter;
  acquirer: FakeAcquirer;
  synthesizer: FakeSynthesizer;
  generator: StaticAliasGenerator;
  vectorStore: FlakyVectorStore;
  topicStore: InMemoryTopicStore;
  policy: ResolutionPolicy;
  population: PopulationPipeline;
  background: BackgroundQueue;
  orchestrator: QueryOrchestrator;
}

export function createHarness(options: HarnessOptions = {}): Harness {
  const embedder = new FakeEmbedder(options.known);
  const arbiter = new ScriptedArbiter(options.verdict);
  const acquirer = new FakeAcquirer();
  const synthesizer = new FakeSynthesizer();
  const generator = new StaticAliasGenerator(options.aliases);
  const vectorStore = new FlakyVectorStore({ now: options.now });
  const topicStore = new InMemoryTopicStore({ now: options.now });
  const background = new BackgroundQueue({ logger: silentLogger });

  const policy = new ResolutionPolicy(
    {
      embedder,
      arbiter,
      resolver: new SimilarityResolver(vectorStore, { tieBreak: options.tieBreak, logger: silentLogger }),
      vectorStore,
      topicStore,
    },
    { arbiterTimeoutMs: options.arbiterTimeoutMs ?? 50, logger: silentLogger }
  );

  const population = new PopulationPipeline(
    { generator, embedder, vectorStore, topicStore },
    { aliasesPerTopic: options.aliasesPerTopic, logger: silentLogger }
  );

  const orchestrator = new QueryOrchestrator(
    {
      policy,
      population,
      embedder,
      acquirer,
      synthesizer,
      vectorStore,
      topicStore,
      background,
      resources: options.resources,
    },
    { logger: silentLogger }
  );

  return {
    embedder,
    arbiter,
    acquirer,
    synthesizer,
    generator,
    vectorStore,
    topicStore,
    policy,
    population,
    background,
    orchestrator,
  };
}
