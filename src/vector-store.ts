/**
 * Vector Store: alias text -> (canonical id, embedding), with TTL.
 */

import { Database, aql } from 'arangojs';
import { COLLECTIONS, aliasKey } from './db';
import { normalizeText } from './embeddings';
import { StoreUnavailable } from './errors';
import type { AliasDocument, AliasEntry } from './types';

export interface VectorStore {
  /**
   * Upsert; a second put for the same alias text replaces the first. The
   * creation time survives a put that keeps the alias on the same topic.
   */
  put(aliasText: string, canonicalId: string, vector: number[], ttlMs: number): Promise<void>;
  get(aliasText: string): Promise<AliasEntry | null>;
  /** Restartable snapshot of live entries; each iteration re-reads the store */
  all(): AsyncIterable<AliasEntry>;
  delete(aliasText: string): Promise<boolean>;
  deleteByCanonical(canonicalId: string): Promise<number>;
  /** Drop entries past their TTL; returns how many were removed */
  expire(): Promise<number>;
  count(): Promise<number>;
  clear(): Promise<void>;
}

export type Clock = () => number;

/** In-memory vector store (tests and local use) */
export class InMemoryVectorStore implements VectorStore {
  private entries = new Map<string, AliasEntry>();
  private now: Clock;

  constructor(options: { now?: Clock } = {}) {
    this.now = options.now ?? Date.now;
  }

  async put(aliasText: string, canonicalId: string, vector: number[], ttlMs: number): Promise<void> {
    const text = normalizeText(aliasText);
    const now = this.now();
    const existing = this.entries.get(text);
    const sameMapping = existing !== undefined && existing.expiresAt > now && existing.canonicalId === canonicalId;
    this.entries.set(text, {
      aliasText: text,
      canonicalId,
      vector: [...vector],
      createdAt: sameMapping && existing ? existing.createdAt : now,
      expiresAt: now + ttlMs,
    });
  }

  async get(aliasText: string): Promise<AliasEntry | null> {
    const entry = this.entries.get(normalizeText(aliasText));
    if (!entry) return null;
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(entry.aliasText);
      return null;
    }
    return entry;
  }

  all(): AsyncIterable<AliasEntry> {
    return {
      [Symbol.asyncIterator]: () => this.scan(),
    };
  }

  private async *scan(): AsyncGenerator<AliasEntry> {
    const snapshot = [...this.entries.values()];
    const now = this.now();
    for (const entry of snapshot) {
      if (entry.expiresAt > now) {
        yield entry;
      }
    }
  }

  async delete(aliasText: string): Promise<boolean> {
    return this.entries.delete(normalizeText(aliasText));
  }

  async deleteByCanonical(canonicalId: string): Promise<number> {
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (entry.canonicalId === canonicalId) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  async expire(): Promise<number> {
    const now = this.now();
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt <= now) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  async count(): Promise<number> {
    const now = this.now();
    let live = 0;
    for (const entry of this.entries.values()) {
      if (entry.expiresAt > now) live++;
    }
    return live;
  }

  async clear(): Promise<void> {
    this.entries.clear();
  }
}

function fromDocument(doc: AliasDocument): AliasEntry {
  return {
    aliasText: doc.alias_text,
    canonicalId: doc.canonical_id,
    vector: doc.vec,
    createdAt: doc.created_at,
    expiresAt: Date.parse(doc.ttl_at),
  };
}

/** Vector store on the `tc_aliases` collection */
export class ArangoVectorStore implements VectorStore {
  private db: Database;
  private batchSize: number;

  constructor(db: Database, options: { batchSize?: number } = {}) {
    this.db = db;
    this.batchSize = options.batchSize ?? 500;
  }

  private get collection() {
    return this.db.collection<AliasDocument>(COLLECTIONS.aliases);
  }

  async put(aliasText: string, canonicalId: string, vector: number[], ttlMs: number): Promise<void> {
    const text = normalizeText(aliasText);
    const now = Date.now();
    const key = aliasKey(text);
    const ttlAt = new Date(now + ttlMs).toISOString();

    try {
      await this.db.query(aql`
        UPSERT { _key: ${key} }
          INSERT { _key: ${key}, alias_text: ${text}, canonical_id: ${canonicalId}, vec: ${vector}, created_at: ${now}, ttl_at: ${ttlAt} }
          UPDATE {
            canonical_id: ${canonicalId},
            vec: ${vector},
            created_at: (OLD.canonical_id == ${canonicalId} AND OLD.ttl_at > ${new Date(now).toISOString()}) ? OLD.created_at : ${now},
            ttl_at: ${ttlAt}
          }
          IN ${this.collection}
          OPTIONS { mergeObjects: false }
      `);
    } catch (err) {
      throw new StoreUnavailable('vector', 'put', err);
    }
  }

  async get(aliasText: string): Promise<AliasEntry | null> {
    let doc: AliasDocument | null;
    try {
      doc = await this.collection.document(aliasKey(normalizeText(aliasText)), { graceful: true });
    } catch (err) {
      throw new StoreUnavailable('vector', 'get', err);
    }
    if (!doc) return null;
    const entry = fromDocument(doc);
    return entry.expiresAt > Date.now() ? entry : null;
  }

  all(): AsyncIterable<AliasEntry> {
    return {
      [Symbol.asyncIterator]: () => this.scan(),
    };
  }

  private async *scan(): AsyncGenerator<AliasEntry> {
    const now = new Date().toISOString();
    try {
      const cursor = await this.db.query<AliasDocument>(
        aql`
          FOR a IN ${this.collection}
            FILTER a.ttl_at > ${now}
            RETURN a
        `,
        { batchSize: this.batchSize }
      );
      for await (const doc of cursor) {
        yield fromDocument(doc);
      }
    } catch (err) {
      throw new StoreUnavailable('vector', 'scan', err);
    }
  }

  async delete(aliasText: string): Promise<boolean> {
    const removed = await this.removeWhere('delete', aql`FILTER a._key == ${aliasKey(normalizeText(aliasText))}`);
    return removed > 0;
  }

  async deleteByCanonical(canonicalId: string): Promise<number> {
    return this.removeWhere('deleteByCanonical', aql`FILTER a.canonical_id == ${canonicalId}`);
  }

  async expire(): Promise<number> {
    return this.removeWhere('expire', aql`FILTER a.ttl_at <= ${new Date().toISOString()}`);
  }

  async count(): Promise<number> {
    try {
      const cursor = await this.db.query<number>(aql`
        RETURN LENGTH(
          FOR a IN ${this.collection}
            FILTER a.ttl_at > ${new Date().toISOString()}
            RETURN 1
        )
      `);
      return (await cursor.next()) ?? 0;
    } catch (err) {
      throw new StoreUnavailable('vector', 'count', err);
    }
  }

  async clear(): Promise<void> {
    try {
      await this.db.query(aql`FOR a IN ${this.collection} REMOVE a IN ${this.collection}`);
    } catch (err) {
      throw new StoreUnavailable('vector', 'clear', err);
    }
  }

  private async removeWhere(operation: string, filter: ReturnType<typeof aql>): Promise<number> {
    try {
      const cursor = await this.db.query<string>(aql`
        FOR a IN ${this.collection}
          ${filter}
          REMOVE a IN ${this.collection}
          RETURN OLD._key
      `);
      return (await cursor.all()).length;
    } catch (err) {
      throw new StoreUnavailable('vector', operation, err);
    }
  }
}
