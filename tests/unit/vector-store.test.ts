import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import { VectorStore, cosineSimilarity, type SimilaritySearch } from '../../src/memory/vector-store.js';
import { HashingEmbedder } from '../../src/memory/embeddings.js';
import { BackendUnavailableError, ValidationError } from '../../src/core/errors.js';
import { removeDb, tmpDb } from './helpers.js';

describe('VectorStore', () => {
  let store: VectorStore;
  let dbPath: string;
  let facts: SimilaritySearch;

  beforeEach(() => {
    dbPath = tmpDb('vectors');
    store = new VectorStore(dbPath, new HashingEmbedder());
    facts = store.collection('semantic_memories');
  });

  afterEach(() => {
    store.close();
    removeDb(dbPath);
  });

  describe('add + get', () => {
    it('stores and retrieves documents', async () => {
      await facts.add('f1', 'The user prefers dark roast coffee', { tier: 'semantic' });
      const [doc] = await facts.get(['f1']);
      expect(doc).toEqual({ id: 'f1', text: 'The user prefers dark roast coffee', metadata: { tier: 'semantic' } });
    });

    it('returns documents in the order asked for and skips unknown ids', async () => {
      await facts.add('f1', 'one', {});
      await facts.add('f2', 'two', {});
      const docs = await facts.get(['f2', 'missing', 'f1']);
      expect(docs.map((d) => d.id)).toEqual(['f2', 'f1']);
    });

    it('rejects duplicate ids', async () => {
      await facts.add('f1', 'one', {});
      await expect(facts.add('f1', 'again', {})).rejects.toThrow(ValidationError);
    });

    it('keeps collections apart', async () => {
      const episodes = store.collection('episodic_memories');
      await facts.add('shared', 'fact text', {});
      await episodes.add('shared', 'episode text', {});

      expect(await facts.count()).toBe(1);
      expect((await episodes.get(['shared']))[0].text).toBe('episode text');
    });

    it('returns the same collection object per name', () => {
      expect(store.collection('semantic_memories')).toBe(facts);
    });
  });

  describe('query', () => {
    beforeEach(async () => {
      await facts.add('coffee', 'The user prefers dark roast coffee', { category: 'user_preference' });
      await facts.add('rust', 'Rust has a borrow checker', { category: 'technical' });
      await facts.add('tea', 'Green tea has less caffeine than coffee', { category: 'world_knowledge' });
    });

    it('ranks the identical text first', async () => {
      const matches = await facts.query('Rust has a borrow checker', 3);
      expect(matches[0].id).toBe('rust');
      expect(matches[0].similarity).toBeCloseTo(1, 5);
    });

    it('sorts by similarity descending', async () => {
      const matches = await facts.query('coffee', 3);
      for (let i = 1; i < matches.length; i++) {
        expect(matches[i - 1].similarity).toBeGreaterThanOrEqual(matches[i].similarity);
      }
    });

    it('limits to k', async () => {
      expect(await facts.query('coffee', 2)).toHaveLength(2);
      expect(await facts.query('coffee', 0)).toEqual([]);
    });

    it('filters on metadata', async () => {
      const matches = await facts.query('coffee', 5, { category: 'technical' });
      expect(matches.map((m) => m.id)).toEqual(['rust']);
    });
  });

  describe('where filters', () => {
    beforeEach(async () => {
      await facts.add('a', 'alpha', { metadata: { deprecated: false, category: 'technical' } });
      await facts.add('b', 'beta', { metadata: { deprecated: true, category: 'technical' } });
      await facts.add('c', 'gamma', { metadata: { deprecated: false, category: 'user_fact', supersedes: 'b' } });
    });

    it('matches nested keys and booleans', async () => {
      const docs = await facts.list({ where: { 'metadata.deprecated': false } });
      expect(docs.map((d) => d.id)).toEqual(['a', 'c']);
    });

    it('combines keys with AND', async () => {
      const count = await facts.count({ 'metadata.deprecated': false, 'metadata.category': 'technical' });
      expect(count).toBe(1);
    });

    it('matches missing values with null', async () => {
      const docs = await facts.list({ where: { 'metadata.supersedes': null } });
      expect(docs.map((d) => d.id)).toEqual(['a', 'b']);
    });

    it('rejects malformed keys', async () => {
      await expect(facts.list({ where: { "x') OR 1=1 --": 'y' } })).rejects.toThrow('Invalid filter key');
    });

    it('lists in insertion order up to a limit', async () => {
      const docs = await facts.list({ limit: 2 });
      expect(docs.map((d) => d.id)).toEqual(['a', 'b']);
    });
  });

  describe('update + delete', () => {
    it('replaces metadata', async () => {
      await facts.add('f1', 'one', { importance: 0.5 });
      expect(await facts.update('f1', { importance: 0.9 })).toBe(true);
      expect((await facts.get(['f1']))[0].metadata).toEqual({ importance: 0.9 });
    });

    it('re-embeds when the text changes', async () => {
      await facts.add('f1', 'old text about gardens', {});
      await facts.update('f1', {}, 'new text about compilers');

      const [match] = await facts.query('new text about compilers', 1);
      expect(match.text).toBe('new text about compilers');
      expect(match.similarity).toBeCloseTo(1, 5);
    });

    it('reports a missing id on update', async () => {
      expect(await facts.update('nope', {})).toBe(false);
    });

    it('deletes and reports the count removed', async () => {
      await facts.add('f1', 'one', {});
      await facts.add('f2', 'two', {});
      expect(await facts.delete(['f1', 'missing'])).toBe(1);
      expect(await facts.count()).toBe(1);
      expect(await facts.delete([])).toBe(0);
    });
  });

  it('reports metadata that is not JSON as a validation error', async () => {
    await facts.add('f1', 'one', {});
    const raw = new Database(dbPath);
    try {
      raw.prepare('UPDATE documents SET metadata = ? WHERE id = ?').run('not json', 'f1');
    } finally {
      raw.close();
    }

    await expect(facts.get(['f1'])).rejects.toThrow(ValidationError);
    await expect(facts.list()).rejects.toThrow('Unreadable metadata of semantic_memories/f1');
  });

  it('persists across reopen', async () => {
    await facts.add('f1', 'durable', { tier: 'semantic' });
    store.close();

    store = new VectorStore(dbPath, new HashingEmbedder());
    const docs = await store.collection('semantic_memories').get(['f1']);
    expect(docs[0].text).toBe('durable');
  });

  it('surfaces embedder failures as backend errors', async () => {
    const failing = new VectorStore(':memory:', {
      name: 'broken',
      dimensions: 4,
      initialize: async () => {},
      embed: async () => {
        throw new Error('connection refused');
      },
      embedBatch: async () => [],
    });
    try {
      await expect(failing.collection('x').add('a', 'text', {})).rejects.toThrow(BackendUnavailableError);
      await expect(failing.collection('x').add('a', 'text', {})).rejects.toThrow(
        'broken embedder unavailable: connection refused'
      );
    } finally {
      failing.close();
    }
  });
});

describe('cosineSimilarity', () => {
  it('is 1 for parallel vectors and 0 for orthogonal ones', () => {
    expect(cosineSimilarity(new Float32Array([1, 2]), new Float32Array([2, 4]))).toBeCloseTo(1);
    expect(cosineSimilarity(new Float32Array([1, 0]), new Float32Array([0, 1]))).toBe(0);
  });

  it('is 0 for mismatched lengths or zero vectors', () => {
    expect(cosineSimilarity(new Float32Array([1]), new Float32Array([1, 1]))).toBe(0);
    expect(cosineSimilarity(new Float32Array([0, 0]), new Float32Array([1, 1]))).toBe(0);
  });
});
