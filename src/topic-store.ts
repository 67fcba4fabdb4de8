/**
 * Canonical Data Store: canonical id -> payload, plus the alias reverse index.
 */

import { Database, aql } from 'arangojs';
import { COLLECTIONS } from './db';
import { normalizeText } from './embeddings';
import { StoreUnavailable } from './errors';
import type { CanonicalTopic, TopicDocument, TopicPayload } from './types';
import type { Clock } from './vector-store';

export interface TopicStore {
  /** null when the topic does not exist or has expired */
  get(canonicalId: string): Promise<CanonicalTopic | null>;
  /** Replace the payload wholesale and refresh the TTL; keeps the alias index */
  put(canonicalId: string, payload: TopicPayload, ttlMs: number): Promise<void>;
  exists(canonicalId: string): Promise<boolean>;
  listAliasesFor(canonicalId: string): Promise<string[]>;
  /** Returns false when the alias was already registered or the topic is gone */
  addAlias(canonicalId: string, aliasText: string): Promise<boolean>;
  delete(canonicalId: string): Promise<boolean>;
  list(): Promise<string[]>;
  expire(): Promise<number>;
  count(): Promise<number>;
  clear(): Promise<void>;
}

/** In-memory topic store (tests and local use) */
export class InMemoryTopicStore implements TopicStore {
  private topics = new Map<string, CanonicalTopic>();
  private now: Clock;

  constructor(options: { now?: Clock } = {}) {
    this.now = options.now ?? Date.now;
  }

  private live(canonicalId: string): CanonicalTopic | null {
    const topic = this.topics.get(canonicalId);
    if (!topic) return null;
    if (topic.expiresAt <= this.now()) {
      this.topics.delete(canonicalId);
      return null;
    }
    return topic;
  }

  async get(canonicalId: string): Promise<CanonicalTopic | null> {
    const topic = this.live(canonicalId);
    return topic ? { ...topic, payload: { ...topic.payload }, aliases: [...topic.aliases] } : null;
  }

  async put(canonicalId: string, payload: TopicPayload, ttlMs: number): Promise<void> {
    const now = this.now();
    const existing = this.live(canonicalId);
    this.topics.set(canonicalId, {
      id: canonicalId,
      payload: { ...payload },
      aliases: existing?.aliases ?? [],
      createdAt: existing?.createdAt ?? now,
      expiresAt: now + ttlMs,
    });
  }

  async exists(canonicalId: string): Promise<boolean> {
    return this.live(canonicalId) !== null;
  }

  async listAliasesFor(canonicalId: string): Promise<string[]> {
    return [...(this.live(canonicalId)?.aliases ?? [])];
  }

  async addAlias(canonicalId: string, aliasText: string): Promise<boolean> {
    const topic = this.live(canonicalId);
    const text = normalizeText(aliasText);
    if (!topic || !text || topic.aliases.includes(text)) return false;
    topic.aliases.push(text);
    return true;
  }

  async delete(canonicalId: string): Promise<boolean> {
    return this.topics.delete(canonicalId);
  }

  async list(): Promise<string[]> {
    return [...this.topics.keys()].filter((id) => this.live(id) !== null);
  }

  async expire(): Promise<number> {
    const now = this.now();
    let removed = 0;
    for (const [id, topic] of this.topics) {
      if (topic.expiresAt <= now) {
        this.topics.delete(id);
        removed++;
      }
    }
    return removed;
  }

  async count(): Promise<number> {
    return (await this.list()).length;
  }

  async clear(): Promise<void> {
    this.topics.clear();
  }
}

function fromDocument(doc: TopicDocument): CanonicalTopic {
  return {
    id: doc._key,
    payload: doc.payload,
    aliases: doc.aliases,
    createdAt: doc.created_at,
    expiresAt: Date.parse(doc.ttl_at),
  };
}

/** Topic store on the `tc_topics` collection; `_key` is the canonical id */
export class ArangoTopicStore implements TopicStore {
  private db: Database;

  constructor(db: Database) {
    this.db = db;
  }

  private get collection() {
    return this.db.collection<TopicDocument>(COLLECTIONS.topics);
  }

  private async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      throw new StoreUnavailable('topic', operation, err);
    }
  }

  async get(canonicalId: string): Promise<CanonicalTopic | null> {
    const doc: TopicDocument | null = await this.run('get', () =>
      this.collection.document(canonicalId, { graceful: true })
    );
    if (!doc) return null;
    const topic = fromDocument(doc);
    return topic.expiresAt > Date.now() ? topic : null;
  }

  async put(canonicalId: string, payload: TopicPayload, ttlMs: number): Promise<void> {
    const now = Date.now();
    const ttlAt = new Date(now + ttlMs).toISOString();

    // UPSERT keeps the reverse index and creation time of an existing topic
    await this.run('put', () =>
      this.db.query(aql`
        UPSERT { _key: ${canonicalId} }
          INSERT { _key: ${canonicalId}, payload: ${payload}, aliases: [], created_at: ${now}, ttl_at: ${ttlAt} }
          UPDATE { payload: ${payload}, ttl_at: ${ttlAt} }
          IN ${this.collection}
          OPTIONS { mergeObjects: false }
      `)
    );
  }

  async exists(canonicalId: string): Promise<boolean> {
    return (await this.get(canonicalId)) !== null;
  }

  async listAliasesFor(canonicalId: string): Promise<string[]> {
    return (await this.get(canonicalId))?.aliases ?? [];
  }

  async addAlias(canonicalId: string, aliasText: string): Promise<boolean> {
    const text = normalizeText(aliasText);
    if (!text) return false;

    const added = await this.run('addAlias', async () => {
      const cursor = await this.db.query<boolean>(aql`
        FOR t IN ${this.collection}
          FILTER t._key == ${canonicalId}
          FILTER t.ttl_at > ${new Date().toISOString()}
          FILTER ${text} NOT IN t.aliases
          UPDATE t WITH { aliases: PUSH(t.aliases, ${text}, true) } IN ${this.collection}
          RETURN true
      `);
      return cursor.all();
    });
    return added.length > 0;
  }

  async delete(canonicalId: string): Promise<boolean> {
    const removed = await this.run('delete', async () => {
      const cursor = await this.db.query<string>(aql`
        FOR t IN ${this.collection}
          FILTER t._key == ${canonicalId}
          REMOVE t IN ${this.collection}
          RETURN OLD._key
      `);
      return cursor.all();
    });
    return removed.length > 0;
  }

  async list(): Promise<string[]> {
    return this.run('list', async () => {
      const cursor = await this.db.query<string>(aql`
        FOR t IN ${this.collection}
          FILTER t.ttl_at > ${new Date().toISOString()}
          SORT t.created_at
          RETURN t._key
      `);
      return cursor.all();
    });
  }

  async expire(): Promise<number> {
    const removed = await this.run('expire', async () => {
      const cursor = await this.db.query<string>(aql`
        FOR t IN ${this.collection}
          FILTER t.ttl_at <= ${new Date().toISOString()}
          REMOVE t IN ${this.collection}
          RETURN OLD._key
      `);
      return cursor.all();
    });
    return removed.length;
  }

  async count(): Promise<number> {
    return (await this.list()).length;
  }

  async clear(): Promise<void> {
    await this.run('clear', () =>
      this.db.query(aql`FOR t IN ${this.collection} REMOVE t IN ${this.collection}`)
    );
  }
}
