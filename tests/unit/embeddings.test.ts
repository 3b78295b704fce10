import { describe, it, expect, afterEach, vi } from 'vitest';
import { HashingEmbedder, OllamaEmbedder, createEmbedder, tokenize } from '../../src/memory/embeddings.js';
import { cosineSimilarity } from '../../src/memory/vector-store.js';
import { BackendUnavailableError } from '../../src/core/errors.js';

describe('tokenize', () => {
  it('lowercases and splits on non-alphanumerics', () => {
    expect(tokenize('Hello, World! 42')).toEqual(['hello', 'world', '42']);
  });

  it('keeps non-ASCII letters', () => {
    expect(tokenize('Café crème')).toEqual(['café', 'crème']);
  });

  it('returns nothing for punctuation only', () => {
    expect(tokenize('?!...')).toEqual([]);
  });
});

describe('HashingEmbedder', () => {
  const embedder = new HashingEmbedder();

  it('has correct dimension', () => {
    expect(embedder.dimensions).toBe(384);
    expect(embedder.name).toBe('simple');
  });

  it('produces normalized vectors', async () => {
    const emb = await embedder.embed('test input');
    let norm = 0;
    for (let i = 0; i < emb.length; i++) {
      norm += emb[i] * emb[i];
    }
    expect(Math.sqrt(norm)).toBeCloseTo(1.0, 5);
  });

  it('gives identical texts cosine similarity 1', async () => {
    const a = await embedder.embed('same input');
    const b = await embedder.embed('same input');
    expect(cosineSimilarity(a, b)).toBeCloseTo(1, 5);
  });

  it('ignores case and punctuation', async () => {
    const a = await embedder.embed('Morning walks!');
    const b = await embedder.embed('morning walks');
    expect(cosineSimilarity(a, b)).toBeCloseTo(1, 5);
  });

  it('scores shared vocabulary above unrelated text', async () => {
    const query = await embedder.embed('coffee in the morning');
    const related = await embedder.embed('the user drinks coffee every morning');
    const unrelated = await embedder.embed('quantum physics theory');
    expect(cosineSimilarity(query, related)).toBeGreaterThan(cosineSimilarity(query, unrelated));
  });

  it('returns a zero vector for empty text', async () => {
    const emb = await embedder.embed('');
    expect(emb.length).toBe(384);
    expect(emb.every((v) => v === 0)).toBe(true);
  });

  it('batch embeds multiple texts', async () => {
    const results = await embedder.embedBatch(['hello', 'world', 'test']);
    expect(results).toHaveLength(3);
    expect(results[0].length).toBe(384);
  });

  it('honours a custom dimension', async () => {
    const small = new HashingEmbedder(16);
    expect((await small.embed('hello world')).length).toBe(16);
  });
});

describe('OllamaEmbedder', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('embeds through the local API', async () => {
    const fetchMock = vi.fn(async () => new Response(JSON.stringify({ embeddings: [[1, 0], [0, 1]] })));
    vi.stubGlobal('fetch', fetchMock);

    const embedder = new OllamaEmbedder('http://ollama.test', 'nomic-embed-text');
    const vectors = await embedder.embedBatch(['a', 'b']);

    expect(vectors.map((v) => Array.from(v))).toEqual([[1, 0], [0, 1]]);
    expect(fetchMock).toHaveBeenCalledWith('http://ollama.test/api/embed', expect.objectContaining({ method: 'POST' }));
  });

  it('reports a model that has not been pulled', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response(JSON.stringify({ models: [{ name: 'llama3:latest' }] }))));

    const embedder = new OllamaEmbedder('http://ollama.test', 'nomic-embed-text');
    await expect(embedder.initialize()).rejects.toThrow('model nomic-embed-text is not pulled');
  });

  it('turns HTTP failures into backend errors', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('boom', { status: 500 })));

    const embedder = new OllamaEmbedder('http://ollama.test');
    await expect(embedder.embed('x')).rejects.toThrow(BackendUnavailableError);
  });
});

describe('createEmbedder', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('creates simple embedder', async () => {
    const embedder = await createEmbedder({ provider: 'simple' });
    expect(embedder.name).toBe('simple');
  });

  it('rejects openai without API key', async () => {
    vi.stubEnv('OPENAI_API_KEY', '');
    await expect(createEmbedder({ provider: 'openai' })).rejects.toThrow('API key');
  });
});
