/**
 * Topic payload schema and helpers.
 *
 * Acquisition output is free-form JSON from a model. It is coerced into
 * the closed value shapes of `PayloadValue`; anything that does not fit
 * (nested objects, nulls, empty values) is dropped.
 */

import { z } from 'zod';
import type { PayloadValue, TopicPayload } from './types';

const Scalar = z.union([z.string(), z.number(), z.boolean()]).transform((v) => String(v).trim());

const Text = Scalar.refine((v) => v.length > 0);

const TextList = z
  .array(z.unknown())
  .transform((items) =>
    items.flatMap((item) => {
      const parsed = Text.safeParse(item);
      return parsed.success ? [parsed.data] : [];
    })
  )
  .refine((items) => items.length > 0);

const Pairs = z
  .record(z.unknown())
  .transform((record) => {
    const out: Record<string, string> = {};
    for (const [key, value] of Object.entries(record)) {
      const parsed = Text.safeParse(value);
      if (parsed.success) out[key] = parsed.data;
    }
    return out;
  })
  .refine((record) => Object.keys(record).length > 0);

export const PayloadValueSchema = z.union([Text, TextList, Pairs]);

/** Coerce arbitrary JSON into a TopicPayload, dropping fields that fit no shape */
export function sanitizePayload(raw: unknown): TopicPayload {
  const record = z.record(z.unknown()).safeParse(raw);
  if (!record.success) return {};

  const payload: TopicPayload = {};
  for (const [key, value] of Object.entries(record.data)) {
    const parsed = PayloadValueSchema.safeParse(value);
    if (parsed.success) payload[key] = parsed.data;
  }
  return payload;
}

function renderValue(value: PayloadValue): string {
  if (typeof value === 'string') return value;
  if (Array.isArray(value)) return value.join('; ');
  return Object.entries(value)
    .map(([k, v]) => `${k}: ${v}`)
    .join('; ');
}

/** Short description of a payload for the arbiter */
export function summarizePayload(payload: TopicPayload, maxLength = 500): string {
  const preferred = ['title', 'summary'].filter((key) => key in payload);
  const keys = preferred.length > 0 ? preferred : Object.keys(payload).slice(0, 3);

  const summary = keys.map((key) => `${key}: ${renderValue(payload[key])}`).join('\n');
  return summary.length > maxLength ? `${summary.slice(0, maxLength - 3)}...` : summary;
}

/** Minimal payload used when acquisition produced nothing */
export function unavailablePayload(canonicalId: string, query: string): TopicPayload {
  return {
    topic: canonicalId,
    query,
    message: 'Unable to retrieve information at this time.',
  };
}

/** Plain answer built from the payload alone, used when synthesis fails */
export function fallbackAnswer(payload: TopicPayload): string {
  const parts = ["Here's the information you're looking for:\n"];

  const text = (key: string): string | null => {
    const value = payload[key];
    return typeof value === 'string' ? value : null;
  };

  const title = text('title');
  if (title) parts.push(`**${title}**\n`);

  const summary = text('summary') ?? text('message');
  if (summary) parts.push(`${summary}\n`);

  const sections: Array<[key: string, heading: string, numbered: boolean]> = [
    ['requirements', 'Requirements', false],
    ['fees', 'Fees', false],
    ['steps', 'Steps', true],
    ['deadlines', 'Deadlines', false],
    ['contacts', 'Contacts', false],
  ];

  for (const [key, heading, numbered] of sections) {
    const value = payload[key];
    if (value === undefined || typeof value === 'string') continue;

    parts.push(`\n**${heading}:**`);
    if (Array.isArray(value)) {
      value.forEach((item, i) => parts.push(numbered ? `${i + 1}. ${item}` : `• ${item}`));
    } else {
      for (const [k, v] of Object.entries(value)) {
        parts.push(`• ${k}: ${v}`);
      }
    }
  }

  const url = text('url') ?? text('website');
  if (url) parts.push(`\nFor more details, visit: ${url}`);

  return parts.join('\n');
}
