/**
 * Alias generators that need no model call, and a combinator.
 */

import { z } from 'zod';
import type { AliasGenerator } from './collaborators';
import { readDataFile, readJsonFile } from './data-files';
import { normalizeText } from './embeddings';
import { toError } from './errors';
import { createLogger, type Logger } from './logger';

const AliasRulesSchema = z.object({
  /** word -> common misspellings */
  typos: z.record(z.array(z.string())).default({}),
  /** canonical id -> known phrasings */
  predefined: z.record(z.array(z.string())).default({}),
});

export type AliasRules = z.infer<typeof AliasRulesSchema>;

/** Predefined phrasings for well-known topics plus misspellings of the query */
export class RuleBasedAliasGenerator implements AliasGenerator {
  private rules: AliasRules;

  constructor(rules: AliasRules) {
    this.rules = rules;
  }

  /** Load from a JSON file; defaults to data/alias-rules.json */
  static load(path?: string | URL): RuleBasedAliasGenerator {
    return new RuleBasedAliasGenerator(
      path ? readJsonFile(path, AliasRulesSchema) : readDataFile('alias-rules.json', AliasRulesSchema)
    );
  }

  *generateAliases(canonicalId: string, originatingQueryText: string): Generator<string> {
    yield* this.rules.predefined[canonicalId] ?? [];

    const query = normalizeText(originatingQueryText);
    for (const [word, variants] of Object.entries(this.rules.typos)) {
      if (!query.includes(word)) continue;
      for (const variant of variants) {
        yield query.replaceAll(word, variant);
      }
    }
  }
}

/**
 * Concatenates the candidates of several generators in order. A generator
 * that fails is logged and skipped; the whole run fails only when every
 * generator does.
 */
export class CompositeAliasGenerator implements AliasGenerator {
  private generators: AliasGenerator[];
  private logger: Logger;

  constructor(generators: AliasGenerator[], options: { logger?: Logger } = {}) {
    this.generators = generators;
    this.logger = options.logger ?? createLogger('alias-generator');
  }

  async generateAliases(canonicalId: string, originatingQueryText: string): Promise<string[]> {
    const aliases: string[] = [];
    let lastError: Error | undefined;
    let failures = 0;

    for (const generator of this.generators) {
      try {
        for await (const alias of await generator.generateAliases(canonicalId, originatingQueryText)) {
          aliases.push(alias);
        }
      } catch (err) {
        failures++;
        lastError = toError(err);
        this.logger.warn('Alias generator failed; continuing with the rest', { canonicalId, error: lastError });
      }
    }

    if (lastError && failures === this.generators.length) {
      throw lastError;
    }
    return aliases;
  }
}
