import { describe, expect, test, vi } from 'vitest';
import type { CreateEmbeddingResponse } from 'openai/resources/embeddings';
import { EmbeddingFailed } from './errors';
import { OpenAIEmbedder, cosineSimilarity, createOpenAIClient, detectLanguage, normalizeText } from './embeddings';
import { silentLogger } from './logger';

describe('Text Normalization', () => {
  test('lowercases text', () => {
    expect(normalizeText('Hello World')).toBe('hello world');
  });

  test('trims whitespace', () => {
    expect(normalizeText('  hello  ')).toBe('hello');
  });

  test('collapses multiple spaces', () => {
    expect(normalizeText('hello   world')).toBe('hello world');
  });

  test('removes punctuation', () => {
    expect(normalizeText('hello! world?')).toBe('hello world');
  });

  test('preserves hyphens', () => {
    expect(normalizeText('add-drop period')).toBe('add-drop period');
  });

  test('strips Arabic diacritics, tatweel and the Arabic question mark', () => {
    expect(normalizeText('مَا هِيَ الرُّسُوم؟')).toBe('ما هي الرسوم');
    expect(normalizeText('تـسجيل')).toBe('تسجيل');
  });

  test('lowercases Latin letters inside Arabic text', () => {
    expect(normalizeText('خطة SE')).toBe('خطة se');
  });
});

describe('Language Detection', () => {
  test('detects English', () => {
    expect(detectLanguage('course registration')).toBe('english');
  });

  test('detects Arabic', () => {
    expect(detectLanguage('تسجيل المواد')).toBe('arabic');
  });

  test('mostly Arabic letters count as Arabic', () => {
    expect(detectLanguage('خطة SE')).toBe('arabic');
  });

  test('detects mixed text', () => {
    expect(detectLanguage('تسجيل courses')).toBe('mixed');
  });

  test('returns unknown without letters', () => {
    expect(detectLanguage('123 ?')).toBe('unknown');
  });
});

describe('Cosine Similarity', () => {
  test('identical vectors have similarity 1', () => {
    const vec = [1, 2, 3, 4, 5];
    expect(cosineSimilarity(vec, vec)).toBeCloseTo(1, 10);
  });

  test('orthogonal vectors have similarity 0', () => {
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
  });

  test('opposite vectors have similarity -1', () => {
    expect(cosineSimilarity([1, 0], [-1, 0])).toBe(-1);
  });

  test('is symmetric', () => {
    const a = [0.3, -0.2, 0.9];
    const b = [0.1, 0.4, -0.5];
    expect(cosineSimilarity(a, b)).toBe(cosineSimilarity(b, a));
  });

  test('ignores magnitude', () => {
    expect(cosineSimilarity([1, 2, 3], [2, 4, 6])).toBeCloseTo(1, 10);
  });

  test('is 0 when either vector has zero norm', () => {
    expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
    expect(cosineSimilarity([1, 1], [0, 0])).toBe(0);
  });

  test('throws on dimension mismatch', () => {
    expect(() => cosineSimilarity([1, 2], [1, 2, 3])).toThrow('Vector dimension mismatch: 2 vs 3');
  });
});

function embeddingResponse(vectors: Array<[index: number, embedding: number[]]>): CreateEmbeddingResponse {
  return {
    object: 'list',
    model: 'text-embedding-3-small',
    data: vectors.map(([index, embedding]) => ({ object: 'embedding' as const, index, embedding })),
    usage: { prompt_tokens: 2, total_tokens: 2 },
  };
}

describe('OpenAIEmbedder', () => {
  function setup(maxRetries = 3, dimension?: number) {
    const client = createOpenAIClient('test-key');
    const create = vi.spyOn(client.embeddings, 'create');
    const embedder = new OpenAIEmbedder({ client, dimension, maxRetries, retryDelayMs: 0, logger: silentLogger });
    return { create, embedder };
  }

  test('embeds the normalized text', async () => {
    const { create, embedder } = setup();
    create.mockResolvedValue(embeddingResponse([[0, [0.1, 0.2]]]));

    expect(await embedder.embed('Hello World?')).toEqual([0.1, 0.2]);
    expect(create).toHaveBeenCalledWith({
      model: 'text-embedding-3-small',
      input: 'hello world',
      encoding_format: 'float',
    });
  });

  test('retries transient failures', async () => {
    const { create, embedder } = setup();
    create
      .mockRejectedValueOnce(new Error('rate limited'))
      .mockResolvedValueOnce(embeddingResponse([[0, [0.5]]]));

    expect(await embedder.embed('fees')).toEqual([0.5]);
    expect(create).toHaveBeenCalledTimes(2);
  });

  test('gives up with EmbeddingFailed after the last attempt', async () => {
    const { create, embedder } = setup(2);
    create.mockRejectedValue(new Error('service down'));

    await expect(embedder.embed('fees')).rejects.toBeInstanceOf(EmbeddingFailed);
    expect(create).toHaveBeenCalledTimes(2);
  });

  test('rejects text that normalizes to nothing without calling the API', async () => {
    const { create, embedder } = setup();

    await expect(embedder.embed(' ?! ')).rejects.toBeInstanceOf(EmbeddingFailed);
    expect(create).not.toHaveBeenCalled();
  });

  test('batch results come back in input order', async () => {
    const { create, embedder } = setup();
    create.mockResolvedValue(
      embeddingResponse([
        [1, [2]],
        [0, [1]],
      ])
    );

    expect(await embedder.embedBatch(['first', 'second'])).toEqual([[1], [2]]);
  });

  test('empty batch makes no call', async () => {
    const { create, embedder } = setup();

    expect(await embedder.embedBatch([])).toEqual([]);
    expect(create).not.toHaveBeenCalled();
  });

  test('rejects vectors of the wrong dimension without retrying', async () => {
    const { create, embedder } = setup(3, 3);
    create.mockResolvedValue(embeddingResponse([[0, [0.1, 0.2]]]));

    await expect(embedder.embed('fees')).rejects.toBeInstanceOf(EmbeddingFailed);
    expect(create).toHaveBeenCalledTimes(1);
  });

  test('accepts vectors of the configured dimension', async () => {
    const { create, embedder } = setup(3, 2);
    create.mockResolvedValue(
      embeddingResponse([
        [0, [0.1, 0.2]],
        [1, [0.3, 0.4]],
      ])
    );

    expect(await embedder.embedBatch(['fees', 'housing'])).toEqual([
      [0.1, 0.2],
      [0.3, 0.4],
    ]);
  });
});
