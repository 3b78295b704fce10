import { BackendUnavailableError, ValidationError } from '../core/errors.js';

export const HASHING_EMBEDDING_DIM = 384;

// nomic-embed-text
export const OLLAMA_EMBEDDING_DIM = 768;

// text-embedding-3-small
export const OPENAI_EMBEDDING_DIM = 1536;

export interface Embedder {
  readonly dimensions: number;
  readonly name: string;
  initialize(): Promise<void>;
  embed(text: string): Promise<Float32Array>;
  embedBatch(texts: string[]): Promise<Float32Array[]>;
}

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^\p{L}\p{N}]+/u)
    .filter((token) => token.length > 0);
}

function fnv1a(str: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < str.length; i++) {
    hash ^= str.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

/**
 * Offline feature-hashing embedder. Words and character trigrams are hashed
 * into signed buckets, so texts sharing vocabulary land close together and
 * identical texts have cosine similarity 1.
 */
export class HashingEmbedder implements Embedder {
  readonly name = 'simple';

  constructor(readonly dimensions: number = HASHING_EMBEDDING_DIM) {}

  async initialize(): Promise<void> {}

  async embed(text: string): Promise<Float32Array> {
    return this.hashToEmbedding(text);
  }

  async embedBatch(texts: string[]): Promise<Float32Array[]> {
    return texts.map((text) => this.hashToEmbedding(text));
  }

  private hashToEmbedding(text: string): Float32Array {
    const embedding = new Float32Array(this.dimensions);
    const words = tokenize(text);

    for (const word of words) {
      this.addFeature(embedding, `w:${word}`, 1.0);

      const padded = `#${word}#`;
      for (let i = 0; i + 3 <= padded.length; i++) {
        this.addFeature(embedding, `c:${padded.slice(i, i + 3)}`, 0.3);
      }
    }

    let norm = 0;
    for (let i = 0; i < embedding.length; i++) {
      norm += embedding[i] * embedding[i];
    }
    norm = Math.sqrt(norm);

    if (norm > 0) {
      for (let i = 0; i < embedding.length; i++) {
        embedding[i] /= norm;
      }
    }

    return embedding;
  }

  private addFeature(embedding: Float32Array, feature: string, weight: number): void {
    const hash = fnv1a(feature);
    const bucket = hash % this.dimensions;
    const sign = (hash & 0x80000000) === 0 ? 1 : -1;
    embedding[bucket] += sign * weight;
  }
}

async function postJson<T>(backend: string, url: string, body: unknown, headers: Record<string, string> = {}): Promise<T> {
  let response: Response;
  try {
    response = await fetch(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', ...headers },
      body: JSON.stringify(body),
    });
  } catch (error) {
    throw new BackendUnavailableError(backend, error);
  }

  if (!response.ok) {
    const detail = await response.text();
    throw new BackendUnavailableError(backend, new Error(`HTTP ${response.status}: ${detail}`));
  }

  return (await response.json()) as T;
}

export class OllamaEmbedder implements Embedder {
  readonly dimensions = OLLAMA_EMBEDDING_DIM;
  readonly name = 'ollama';

  constructor(
    private baseUrl: string = 'http://127.0.0.1:11434',
    private model: string = 'nomic-embed-text'
  ) {}

  async initialize(): Promise<void> {
    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}/api/tags`);
    } catch (error) {
      throw new BackendUnavailableError(`Ollama at ${this.baseUrl}`, error);
    }
    if (!response.ok) {
      throw new BackendUnavailableError(`Ollama at ${this.baseUrl}`, new Error(`HTTP ${response.status}`));
    }

    const data = (await response.json()) as { models?: Array<{ name: string }> };
    const hasModel = data.models?.some((m) => m.name.includes(this.model)) ?? false;
    if (!hasModel) {
      throw new BackendUnavailableError(
        `Ollama at ${this.baseUrl}`,
        new Error(`model ${this.model} is not pulled (run \`ollama pull ${this.model}\`)`)
      );
    }
  }

  async embed(text: string): Promise<Float32Array> {
    const [embedding] = await this.embedBatch([text]);
    return embedding;
  }

  async embedBatch(texts: string[]): Promise<Float32Array[]> {
    const data = await postJson<{ embeddings: number[][] }>('Ollama embeddings', `${this.baseUrl}/api/embed`, {
      model: this.model,
      input: texts,
    });
    return data.embeddings.map((e) => new Float32Array(e));
  }
}

export class OpenAIEmbedder implements Embedder {
  readonly dimensions = OPENAI_EMBEDDING_DIM;
  readonly name = 'openai';

  constructor(
    private apiKey: string,
    private model: string = 'text-embedding-3-small'
  ) {}

  async initialize(): Promise<void> {
    await this.embed('ping');
  }

  async embed(text: string): Promise<Float32Array> {
    const [embedding] = await this.embedBatch([text]);
    return embedding;
  }

  async embedBatch(texts: string[]): Promise<Float32Array[]> {
    const data = await postJson<{ data: Array<{ embedding: number[]; index: number }> }>(
      'OpenAI embeddings',
      'https://api.openai.com/v1/embeddings',
      { model: this.model, input: texts },
      { Authorization: `Bearer ${this.apiKey}` }
    );

    // Responses are not guaranteed to be in request order
    const sorted = [...data.data].sort((a, b) => a.index - b.index);
    return sorted.map((d) => new Float32Array(d.embedding));
  }
}

export interface EmbedderConfig {
  provider: 'simple' | 'ollama' | 'openai';
  model?: string;
  url?: string;
  apiKey?: string;
}

export async function createEmbedder(config: EmbedderConfig): Promise<Embedder> {
  let embedder: Embedder;

  switch (config.provider) {
    case 'simple':
      embedder = new HashingEmbedder();
      break;

    case 'ollama':
      embedder = new OllamaEmbedder(
        config.url ?? 'http://127.0.0.1:11434',
        config.model ?? 'nomic-embed-text'
      );
      break;

    case 'openai': {
      const apiKey = config.apiKey ?? process.env.OPENAI_API_KEY;
      if (!apiKey) {
        throw new ValidationError('OpenAI API key required for OpenAI embeddings (set OPENAI_API_KEY)');
      }
      embedder = new OpenAIEmbedder(apiKey, config.model ?? 'text-embedding-3-small');
      break;
    }

    default: {
      const unknown: never = config.provider;
      throw new ValidationError(`Unknown embedder provider: ${String(unknown)}`);
    }
  }

  await embedder.initialize();
  return embedder;
}
