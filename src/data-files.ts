/**
 * JSON tables shipped under data/.
 */

import { readFileSync } from 'node:fs';
import type { z } from 'zod';

export const DATA_DIR = new URL('../data/', import.meta.url);

/** Read a JSON file and validate it against `schema` */
export function readJsonFile<T extends z.ZodTypeAny>(path: string | URL, schema: T): z.output<T> {
  return schema.parse(JSON.parse(readFileSync(path, 'utf8')));
}

/** Read `data/<name>` */
export function readDataFile<T extends z.ZodTypeAny>(name: string, schema: T): z.output<T> {
  return readJsonFile(new URL(name, DATA_DIR), schema);
}
