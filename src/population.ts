/**
 * Population Pipeline: fold generated aliases back into the cache.
 *
 * Runs detached from the request that triggered it. At most one run per
 * canonical id is active at a time; a second trigger while one is running
 * is a no-op.
 */

import type { AliasGenerator, Embedder } from './collaborators';
import { normalizeText } from './embeddings';
import { PopulationFailed, toError } from './errors';
import { InFlightPopulation } from './inflight';
import { createLogger, type Logger } from './logger';
import type { TopicStore } from './topic-store';
import { DEFAULT_CONFIG, type PopulationReport } from './types';
import type { VectorStore } from './vector-store';

export interface PopulationPipelineDeps {
  generator: AliasGenerator;
  embedder: Embedder;
  vectorStore: VectorStore;
  topicStore: TopicStore;
  inFlight?: InFlightPopulation;
}

export interface PopulationPipelineOptions {
  aliasesPerTopic?: number;
  aliasTtlMs?: number;
  logger?: Logger;
}

/** Drain whichever shape the generator returned */
async function collect(source: ReturnType<AliasGenerator['generateAliases']>): Promise<string[]> {
  const items: string[] = [];
  for await (const item of await source) {
    items.push(item);
  }
  return items;
}

export class PopulationPipeline {
  readonly inFlight: InFlightPopulation;
  private deps: PopulationPipelineDeps;
  private aliasesPerTopic: number;
  private aliasTtlMs: number;
  private logger: Logger;

  constructor(deps: PopulationPipelineDeps, options: PopulationPipelineOptions = {}) {
    this.deps = deps;
    this.inFlight = deps.inFlight ?? new InFlightPopulation();
    this.aliasesPerTopic = options.aliasesPerTopic ?? DEFAULT_CONFIG.aliasesPerTopic;
    this.aliasTtlMs = options.aliasTtlMs ?? DEFAULT_CONFIG.aliasTtlMs;
    this.logger = options.logger ?? createLogger('population');
  }

  /** Never throws; failures are logged and reported as `failed` */
  async populate(canonicalId: string, originatingQuery: string): Promise<PopulationReport> {
    const outcome = await this.inFlight.run(canonicalId, () => this.run(canonicalId, originatingQuery));
    if (!outcome.acquired) {
      this.logger.debug('Population already in flight', { canonicalId });
      return { canonicalId, status: 'skipped', added: [], rejected: [] };
    }
    return outcome.value;
  }

  private async run(canonicalId: string, originatingQuery: string): Promise<PopulationReport> {
    const added: string[] = [];
    const rejected: string[] = [];

    try {
      const candidates = await collect(this.deps.generator.generateAliases(canonicalId, originatingQuery));
      const accepted = await this.selectCandidates(canonicalId, candidates, rejected);

      if (accepted.length > 0) {
        await this.store(canonicalId, accepted, added);
      }

      this.logger.info('Population completed', {
        canonicalId,
        generated: candidates.length,
        added: added.length,
        rejected: rejected.length,
      });
      return { canonicalId, status: 'completed', added, rejected };
    } catch (err) {
      const error = new PopulationFailed(canonicalId, err);
      this.logger.error(error.message, { canonicalId, added: added.length, error: toError(err) });
      return { canonicalId, status: 'failed', added, rejected, error };
    }
  }

  /** Trim, drop empties, dedupe against known aliases and within the batch, then cap */
  private async selectCandidates(canonicalId: string, candidates: string[], rejected: string[]): Promise<string[]> {
    const seen = new Set((await this.deps.topicStore.listAliasesFor(canonicalId)).map(normalizeText));
    const accepted: string[] = [];

    for (const raw of candidates) {
      const text = raw.trim();
      const key = normalizeText(text);
      if (!key || seen.has(key)) {
        if (text) rejected.push(text);
        continue;
      }
      if (accepted.length >= this.aliasesPerTopic) {
        rejected.push(text);
        continue;
      }
      seen.add(key);
      accepted.push(text);
    }

    return accepted;
  }

  private async store(canonicalId: string, aliases: string[], added: string[]): Promise<void> {
    const { embedder, vectorStore, topicStore } = this.deps;
    const vectors = embedder.embedBatch
      ? await embedder.embedBatch(aliases)
      : await Promise.all(aliases.map((alias) => embedder.embed(alias)));

    for (const [i, alias] of aliases.entries()) {
      await vectorStore.put(alias, canonicalId, vectors[i], this.aliasTtlMs);
      await topicStore.addAlias(canonicalId, alias);
      added.push(alias);
    }
  }
}
