/**
 * OpenAI chat-completion collaborators: arbiter, acquirer, alias generator
 * and answer synthesizer.
 */

import type OpenAI from 'openai';
import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';
import { z } from 'zod';
import type {
  AcquisitionHints,
  Acquirer,
  AliasGenerator,
  AnswerSynthesizer,
  Arbiter,
} from './collaborators';
import { ExtractionFailed } from './errors';
import { createLogger, type Logger } from './logger';
import { sanitizePayload } from './payload';
import { withRetry } from './retry';
import { DEFAULT_CONFIG, type TopicPayload } from './types';

export interface ChatCollaboratorOptions {
  client: OpenAI;
  model?: string;
  /** Short description of the knowledge domain, used in prompts */
  domain?: string;
  maxRetries?: number;
  retryDelayMs?: number;
  logger?: Logger;
}

const DEFAULT_DOMAIN = 'a university help desk answering student questions in Arabic and English';

type ChatMessage = ChatCompletionMessageParam;

/** Shared plumbing: one JSON-mode completion with retries */
abstract class ChatCollaborator {
  protected client: OpenAI;
  protected model: string;
  protected domain: string;
  protected maxRetries: number;
  protected retryDelayMs: number;
  protected logger: Logger;

  constructor(options: ChatCollaboratorOptions, scope: string) {
    this.client = options.client;
    this.model = options.model ?? DEFAULT_CONFIG.chatModel;
    this.domain = options.domain ?? DEFAULT_DOMAIN;
    this.maxRetries = options.maxRetries ?? DEFAULT_CONFIG.maxRetries;
    this.retryDelayMs = options.retryDelayMs ?? DEFAULT_CONFIG.retryDelayMs;
    this.logger = options.logger ?? createLogger(scope);
  }

  protected async completeJson(messages: ChatMessage[], signal?: AbortSignal): Promise<unknown> {
    const response = await withRetry(
      () =>
        this.client.chat.completions.create(
          { model: this.model, messages, response_format: { type: 'json_object' } },
          { signal }
        ),
      { attempts: this.maxRetries, delayMs: this.retryDelayMs, shouldRetry: () => !signal?.aborted }
    );

    const content = response.choices[0]?.message.content;
    if (!content) {
      throw new Error('empty completion');
    }
    return JSON.parse(content);
  }
}

const ArbiterVerdict = z.object({
  match: z.boolean(),
  reasoning: z.string().optional(),
});

/** Decides ambiguous matches with a yes/no JSON verdict */
export class OpenAIArbiter extends ChatCollaborator implements Arbiter {
  constructor(options: ChatCollaboratorOptions) {
    super(options, 'arbiter');
  }

  async confirm(
    queryText: string,
    candidateAliasText: string,
    candidatePayloadSummary: string,
    signal?: AbortSignal
  ): Promise<boolean> {
    const raw = await this.completeJson(
      [
        {
          role: 'system',
          content: `You match questions to known topics for ${this.domain}. Be strict: only match when the intent is the same.`,
        },
        {
          role: 'user',
          content: [
            `Question: "${queryText}"`,
            `Known question: "${candidateAliasText}"`,
            `Known topic content:\n${candidatePayloadSummary}`,
            'Does the question ask about the same topic as the known question?',
            'Respond in JSON: {"match": true|false, "reasoning": "..."}',
          ].join('\n\n'),
        },
      ],
      signal
    );

    const verdict = ArbiterVerdict.parse(raw);
    this.logger.debug('Arbiter verdict', { query: queryText, alias: candidateAliasText, ...verdict });
    return verdict.match;
  }
}

/** Produces the structured payload for a topic not yet cached */
export class OpenAIAcquirer extends ChatCollaborator implements Acquirer {
  constructor(options: ChatCollaboratorOptions) {
    super(options, 'acquirer');
  }

  async acquire(queryText: string, hints: AcquisitionHints = {}): Promise<TopicPayload> {
    const sources = hints.resourceUrls?.length
      ? `Prefer information published at:\n${hints.resourceUrls.map((url) => `- ${url}`).join('\n')}`
      : 'No specific source is known; use general knowledge of the domain.';

    let payload: TopicPayload;
    try {
      const raw = await this.completeJson([
        {
          role: 'system',
          content: `You extract structured facts for ${this.domain}. Answer with a single JSON object.`,
        },
        {
          role: 'user',
          content: [
            `Question: "${queryText}"`,
            hints.canonicalId ? `Topic id: ${hints.canonicalId}` : '',
            sources,
            'Return JSON with a "title", a "summary", and whichever of these apply:',
            '"requirements" (list), "fees" (object of label to amount), "steps" (ordered list),',
            '"deadlines" (object of label to date), "contacts" (object of label to value), "url".',
            'Values must be strings, lists of strings, or objects of strings.',
          ]
            .filter(Boolean)
            .join('\n'),
        },
      ]);
      payload = sanitizePayload(raw);
    } catch (err) {
      throw new ExtractionFailed(queryText, err);
    }

    if (Object.keys(payload).length === 0) {
      throw new ExtractionFailed(queryText, new Error('no usable fields in extraction'));
    }

    this.logger.info('Acquired payload', { query: queryText, fields: Object.keys(payload) });
    return payload;
  }
}

const AliasLists = z.object({
  arabic_aliases: z.array(z.string()).optional(),
  english_aliases: z.array(z.string()).optional(),
  aliases: z.array(z.string()).optional(),
});

/** Ten Arabic and ten English phrasings of the topic */
export class OpenAIAliasGenerator extends ChatCollaborator implements AliasGenerator {
  private perLanguage: number;

  constructor(options: ChatCollaboratorOptions & { perLanguage?: number }) {
    super(options, 'alias-generator');
    this.perLanguage = options.perLanguage ?? 10;
  }

  async generateAliases(canonicalId: string, originatingQueryText: string): Promise<string[]> {
    const n = this.perLanguage;
    const raw = await this.completeJson([
      {
        role: 'system',
        content: `You write the different ways users phrase questions for ${this.domain}, in formal Arabic, local dialect, Arabizi and English.`,
      },
      {
        role: 'user',
        content: [
          `Topic: ${canonicalId}`,
          `Original question: "${originatingQueryText}"`,
          `Write ${n} Arabic and ${n} English phrasings a user might type for this topic:`,
          'formal, colloquial, abbreviations and common misspellings. No duplicates.',
          'Respond in JSON: {"arabic_aliases": [...], "english_aliases": [...]}',
        ].join('\n'),
      },
    ]);

    const lists = AliasLists.parse(raw);
    const aliases = [...(lists.arabic_aliases ?? []).slice(0, n), ...(lists.english_aliases ?? []).slice(0, n)];
    const result = aliases.length > 0 ? aliases : (lists.aliases ?? []).slice(0, n * 2);

    this.logger.debug('Generated aliases', { canonicalId, count: result.length });
    return result;
  }
}

function synthesisMessages(domain: string, payload: TopicPayload, queryText: string): ChatMessage[] {
  return [
    {
      role: 'system',
      content: `You are ${domain}. Answer only from the provided data, in the language of the question. If the data does not cover something, say so.`,
    },
    {
      role: 'user',
      content: `Question: "${queryText}"\n\nData:\n${JSON.stringify(payload, null, 2)}`,
    },
  ];
}

/** Writes the natural-language answer from a payload */
export class OpenAIAnswerSynthesizer extends ChatCollaborator implements AnswerSynthesizer {
  private temperature: number;
  private maxTokens: number;

  constructor(options: ChatCollaboratorOptions & { temperature?: number; maxTokens?: number }) {
    super(options, 'synthesizer');
    this.temperature = options.temperature ?? 0.7;
    this.maxTokens = options.maxTokens ?? 4000;
  }

  async synthesize(payload: TopicPayload, queryText: string): Promise<string> {
    const response = await withRetry(
      () =>
        this.client.chat.completions.create({
          model: this.model,
          messages: synthesisMessages(this.domain, payload, queryText),
          temperature: this.temperature,
          max_tokens: this.maxTokens,
        }),
      { attempts: this.maxRetries, delayMs: this.retryDelayMs }
    );

    const answer = response.choices[0]?.message.content?.trim();
    if (!answer) {
      throw new Error('empty answer');
    }
    return answer;
  }

  async *synthesizeStream(payload: TopicPayload, queryText: string): AsyncGenerator<string> {
    const stream = await this.client.chat.completions.create({
      model: this.model,
      messages: synthesisMessages(this.domain, payload, queryText),
      temperature: this.temperature,
      max_tokens: this.maxTokens,
      stream: true,
    });

    for await (const chunk of stream) {
      const text = chunk.choices[0]?.delta?.content;
      if (text) yield text;
    }
  }
}
