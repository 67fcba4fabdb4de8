/**
 * Resource catalog: known source URLs per topic, handed to the acquirer as
 * hints.
 */

import { z } from 'zod';
import { readDataFile, readJsonFile } from './data-files';
import { normalizeText } from './embeddings';

const CatalogSchema = z.object({
  resources: z.record(z.string().url()),
  keywords: z.record(z.array(z.string())).default({}),
});

export type ResourceCatalogData = z.infer<typeof CatalogSchema>;

export class ResourceCatalog {
  private resources: Map<string, string>;
  private keywords: Array<[resourceKey: string, keywords: string[]]>;

  constructor(data: ResourceCatalogData) {
    this.resources = new Map(Object.entries(data.resources));
    this.keywords = Object.entries(data.keywords).map(([key, words]) => [key, words.map(normalizeText)]);
  }

  /** Load from a JSON file; defaults to data/resources.json */
  static load(path?: string | URL): ResourceCatalog {
    return new ResourceCatalog(path ? readJsonFile(path, CatalogSchema) : readDataFile('resources.json', CatalogSchema));
  }

  /**
   * URLs for a topic: a direct entry for the canonical id, else the first
   * resource whose keywords occur in the query. Empty when nothing fits.
   */
  select(canonicalId: string, queryText: string): string[] {
    const direct = this.resources.get(canonicalId);
    if (direct) return [direct];

    const query = normalizeText(queryText);
    for (const [key, words] of this.keywords) {
      const url = this.resources.get(key);
      if (url && words.some((word) => word && query.includes(word))) {
        return [url];
      }
    }
    return [];
  }

  get size(): number {
    return this.resources.size;
  }
}
