/**
 * ArangoDB Database Setup and Client
 */

import { createHash } from 'node:crypto';
import { Database } from 'arangojs';
import type { ArangoConnectionConfig } from './config';
import { createLogger, type Logger } from './logger';

/** Create ArangoDB database connection */
export function createDatabase(connection: ArangoConnectionConfig): Database {
  return new Database({
    url: connection.url,
    databaseName: connection.databaseName,
    auth: {
      username: connection.username,
      password: connection.password,
    },
  });
}

/** Collection names */
export const COLLECTIONS = {
  aliases: 'tc_aliases',
  topics: 'tc_topics',
} as const;

/** Document key for an alias: stable across runs, safe for any script */
export function aliasKey(normalizedAlias: string): string {
  return createHash('sha256').update(normalizedAlias, 'utf8').digest('hex');
}

/** Setup topic cache collections and indexes */
export async function setupTopicCache(db: Database, logger: Logger = createLogger('db')): Promise<void> {
  logger.info('Setting up topic cache collections...');

  for (const name of Object.values(COLLECTIONS)) {
    const collection = db.collection(name);
    if (!(await collection.exists())) {
      await collection.create();
      logger.info(`Created collection: ${name}`);
    } else {
      logger.debug(`Collection exists: ${name}`);
    }
  }

  const aliases = db.collection(COLLECTIONS.aliases);
  await aliases.ensureIndex({
    type: 'persistent',
    fields: ['canonical_id'],
    name: 'idx_canonical_id',
  });
  await aliases.ensureIndex({
    type: 'persistent',
    fields: ['created_at'],
    name: 'idx_created_at',
  });
  await aliases.ensureIndex({
    type: 'ttl',
    fields: ['ttl_at'],
    name: 'idx_alias_ttl',
    expireAfter: 0,
  });

  const topics = db.collection(COLLECTIONS.topics);
  await topics.ensureIndex({
    type: 'ttl',
    fields: ['ttl_at'],
    name: 'idx_topic_ttl',
    expireAfter: 0,
  });

  logger.info('Topic cache setup complete.');
}

/** Drop topic cache collections (for testing/reset) */
export async function dropTopicCache(db: Database, logger: Logger = createLogger('db')): Promise<void> {
  for (const name of Object.values(COLLECTIONS)) {
    const collection = db.collection(name);
    if (await collection.exists()) {
      await collection.drop();
      logger.info(`Dropped collection: ${name}`);
    }
  }
}
