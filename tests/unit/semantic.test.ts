import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { SemanticMemory, factCategory, factConfidence, isDeprecated } from '../../src/memory/semantic.js';
import { VectorStore } from '../../src/memory/vector-store.js';
import { HashingEmbedder } from '../../src/memory/embeddings.js';
import { ManualClock } from '../../src/core/clock.js';
import { silentLogger } from '../../src/core/logger.js';
import { ConcurrentModificationError, NotFoundError, ValidationError } from '../../src/core/errors.js';
import { removeDb, tmpDb } from './helpers.js';

describe('SemanticMemory', () => {
  let store: VectorStore;
  let dbPath: string;
  let clock: ManualClock;
  let semantic: SemanticMemory;

  beforeEach(() => {
    dbPath = tmpDb('semantic');
    store = new VectorStore(dbPath, new HashingEmbedder());
    clock = new ManualClock();
    semantic = new SemanticMemory(store.collection('semantic_memories'), { clock: clock.now, logger: silentLogger });
  });

  afterEach(() => {
    store.close();
    removeDb(dbPath);
  });

  describe('store', () => {
    it('applies fact defaults', async () => {
      const fact = await semantic.store('The Danube flows into the Black Sea');

      expect(fact.id.startsWith('fact_')).toBe(true);
      expect(fact.emotionalValence).toBe('neutral');
      expect(fact.emotionalIntensity).toBe(0);
      expect(fact.metadata).toEqual({
        category: 'world_knowledge',
        confidence: 1,
        supersedes: null,
        verified: false,
        deprecated: false,
      });
      expect(factCategory(fact)).toBe('world_knowledge');
      expect(factConfidence(fact)).toBe(1);
    });

    it('rejects confidence outside [0, 1]', async () => {
      await expect(semantic.store('x', { confidence: 1.2 })).rejects.toThrow(ValidationError);
      expect(await semantic.count()).toBe(0);
    });

    it('stores user preferences with their tags', async () => {
      const pref = await semantic.storeUserPreference('short answers');
      expect(pref.content).toBe('User preference: short answers');
      expect(pref.importance).toBe(0.7);
      expect(pref.tags).toEqual(['preference', 'user']);
      expect(pref.source).toBe('observed');
      expect(pref.metadata.confidence).toBe(0.8);
    });

    it('stores user facts and learned patterns', async () => {
      const fact = await semantic.storeUserFact('lives in Porto');
      expect(fact.content).toBe('About user: lives in Porto');
      expect(factCategory(fact)).toBe('user_fact');
      expect(fact.metadata.confidence).toBe(0.9);

      const pattern = await semantic.storeLearnedPattern('asks follow-ups after code');
      expect(pattern.content).toBe('Learned pattern: asks follow-ups after code');
      expect(factCategory(pattern)).toBe('learned_behavior');
      expect(pattern.source).toBe('observation');
    });
  });

  describe('supersede', () => {
    it('deprecates the old fact and hides it from recall', async () => {
      const old = await semantic.store('The meeting is on Monday', { importance: 0.5 });
      const replacement = await semantic.store('The meeting is on Tuesday', { supersedes: old.id });

      const previous = await semantic.getById(old.id);
      expect(previous && isDeprecated(previous)).toBe(true);
      expect(previous?.importance).toBeCloseTo(0.15);
      expect(previous?.metadata.supersededBy).toBe(replacement.id);
      expect(replacement.metadata.supersedes).toBe(old.id);

      const results = await semantic.recall('meeting Monday', 5);
      expect(results.map((e) => e.id)).toEqual([replacement.id]);
    });

    it('fails for an unknown fact without storing the replacement', async () => {
      await expect(semantic.store('new', { supersedes: 'fact_missing' })).rejects.toThrow(NotFoundError);
      expect(await semantic.count()).toBe(0);
    });

    it('lets only one of two concurrent replacements win', async () => {
      const old = await semantic.store('Coffee at 8');
      const outcomes = await Promise.allSettled([
        semantic.store('Coffee at 9', { supersedes: old.id }),
        semantic.store('Coffee at 10', { supersedes: old.id }),
      ]);

      expect(outcomes[0].status).toBe('fulfilled');
      expect(outcomes[1].status).toBe('rejected');
      if (outcomes[1].status === 'rejected') {
        expect(outcomes[1].reason).toBeInstanceOf(ConcurrentModificationError);
      }
      expect(await semantic.count()).toBe(2);
    });
  });

  describe('recall', () => {
    it('filters by category and confidence', async () => {
      await semantic.store('Tea is brewed with hot water', { category: 'world_knowledge' });
      const pref = await semantic.store('User likes tea', { category: 'user_preference', confidence: 0.9 });
      await semantic.store('User likes green tea maybe', { category: 'user_preference', confidence: 0.3 });

      const results = await semantic.recall('tea', 5, { category: 'user_preference', minConfidence: 0.5 });
      expect(results.map((e) => e.id)).toEqual([pref.id]);
    });

    it('records access on recalled facts', async () => {
      const fact = await semantic.store('Paris is in France');
      await semantic.recall('Paris is in France', 1);
      expect((await semantic.getById(fact.id))?.accessCount).toBe(1);
    });

    it('lists a category without deprecated facts', async () => {
      const a = await semantic.storeUserPreference('tabs');
      await semantic.store('User preference: spaces', { category: 'user_preference', supersedes: a.id });
      await semantic.storeUserFact('has a cat');

      const prefs = await semantic.getUserPreferences();
      expect(prefs.map((e) => e.content)).toEqual(['User preference: spaces']);
      expect((await semantic.getUserFacts()).map((e) => e.content)).toEqual(['About user: has a cat']);
      expect(await semantic.getRelationshipContext()).toEqual([]);
    });
  });

  describe('updateConfidence', () => {
    it('marks facts verified at 0.95 and above', async () => {
      const fact = await semantic.store('Water boils at 100C at sea level', { confidence: 0.6 });

      const mid = await semantic.updateConfidence(fact.id, 0.8);
      expect(mid.metadata.confidence).toBe(0.8);
      expect(mid.metadata.verified).toBe(false);

      const high = await semantic.updateConfidence(fact.id, 0.95);
      expect(high.metadata.verified).toBe(true);
      expect((await semantic.getById(fact.id))?.metadata.verified).toBe(true);
    });

    it('fails for unknown facts and bad values', async () => {
      await expect(semantic.updateConfidence('fact_missing', 0.5)).rejects.toThrow(NotFoundError);
      const fact = await semantic.store('x');
      await expect(semantic.updateConfidence(fact.id, -0.1)).rejects.toThrow(ValidationError);
    });
  });

  describe('findContradictions', () => {
    it('finds facts using the opposite word', async () => {
      const morning = await semantic.store('User prefers working in the morning', { category: 'user_preference' });
      await semantic.store('User prefers working with music', { category: 'user_preference' });

      const conflicts = await semantic.findContradictions('User prefers working in the evening', 'user_preference');
      expect(conflicts.map((e) => e.id)).toEqual([morning.id]);
    });

    it('finds nothing without an opposite pair', async () => {
      await semantic.store('User drinks coffee', { category: 'user_fact' });
      expect(await semantic.findContradictions('User drinks coffee daily', 'user_fact')).toEqual([]);
    });
  });
});
