import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { BeliefEvolution, GROWTH_COLLECTIONS, SurpriseJournal, surpriseDocument } from '../../src/memory/growth.js';
import { VectorStore } from '../../src/memory/vector-store.js';
import { HashingEmbedder } from '../../src/memory/embeddings.js';
import { ManualClock } from '../../src/core/clock.js';
import { silentLogger } from '../../src/core/logger.js';
import { ValidationError } from '../../src/core/errors.js';
import { removeDb, tmpDb } from './helpers.js';

describe('growth', () => {
  let store: VectorStore;
  let dbPath: string;
  let clock: ManualClock;

  beforeEach(() => {
    dbPath = tmpDb('growth');
    store = new VectorStore(dbPath, new HashingEmbedder());
    clock = new ManualClock();
  });

  afterEach(() => {
    store.close();
    removeDb(dbPath);
  });

  describe('BeliefEvolution', () => {
    let beliefs: BeliefEvolution;

    beforeEach(() => {
      beliefs = new BeliefEvolution(store.collection(GROWTH_COLLECTIONS.beliefs), { clock: clock.now, logger: silentLogger });
    });

    it('starts a thread at version 1', async () => {
      const belief = await beliefs.evolveBelief({ newBelief: 'Short answers are best', reason: 'Users skim' });

      expect(belief.id.startsWith('belief_')).toBe(true);
      expect(belief.beliefThreadId.startsWith('belief_thread_')).toBe(true);
      expect(belief.version).toBe(1);
      expect(belief.previousContent).toBeNull();
      expect(belief.reasonForChange).toBe('Users skim');
      expect(belief.confidence).toBe(0.8);
      expect(belief.timestamp.toISOString()).toBe('2026-01-01T09:00:00.000Z');
    });

    it('keeps the old belief text when nothing matches it yet', async () => {
      const belief = await beliefs.evolveBelief({
        newBelief: 'Short answers are best',
        oldBelief: 'Long answers are best',
        reason: 'Users skim',
      });

      expect(belief.version).toBe(1);
      expect(belief.previousContent).toBe('Long answers are best');
    });

    it('continues the thread of the belief it replaces', async () => {
      const first = await beliefs.evolveBelief({ newBelief: 'Long answers are best', reason: 'Thoroughness' });
      clock.advanceHours(1);
      const second = await beliefs.evolveBelief({
        newBelief: 'Short answers are best',
        oldBelief: 'Long answers are best',
        reason: 'Users skim',
      });
      clock.advanceHours(1);
      const third = await beliefs.evolveBelief({
        newBelief: 'Answer length should follow the question',
        oldBelief: 'Short answers are best',
        reason: 'Some questions need depth',
        confidence: 0.9,
      });

      expect(second.beliefThreadId).toBe(first.beliefThreadId);
      expect(third.beliefThreadId).toBe(first.beliefThreadId);
      expect([second.version, third.version]).toEqual([2, 3]);

      const thread = await beliefs.getThreadEvolution(first.beliefThreadId);
      expect(thread.map((v) => v.content)).toEqual([
        'Long answers are best',
        'Short answers are best',
        'Answer length should follow the question',
      ]);
      expect(thread[2]).toEqual(third);
    });

    it('lists recent changes newest first', async () => {
      await beliefs.evolveBelief({ newBelief: 'Long answers are best', reason: 'Thoroughness' });
      clock.advanceHours(1);
      const second = await beliefs.evolveBelief({
        newBelief: 'Short answers are best',
        oldBelief: 'Long answers are best',
        reason: 'Users skim',
      });

      const recent = await beliefs.getRecentEvolutions(1);
      expect(recent.map((v) => v.id)).toEqual([second.id]);
      expect(await beliefs.count()).toBe(2);
    });

    it('finds history by topic', async () => {
      await beliefs.evolveBelief({ newBelief: 'Tabs are better than spaces', reason: 'Accessibility' });
      const match = await beliefs.evolveBelief({ newBelief: 'Short answers are best', reason: 'Users skim' });

      const [closest] = await beliefs.getBeliefHistory('Short answers are best', 1);
      expect(closest.id).toBe(match.id);
    });

    it('rejects a blank belief or reason', async () => {
      await expect(beliefs.evolveBelief({ newBelief: '  ', reason: 'x' })).rejects.toThrow(ValidationError);
      await expect(beliefs.evolveBelief({ newBelief: 'x', reason: '' })).rejects.toThrow(ValidationError);
      expect(await beliefs.count()).toBe(0);
    });
  });

  describe('SurpriseJournal', () => {
    let journal: SurpriseJournal;
    const warn = vi.fn();

    beforeEach(() => {
      warn.mockReset();
      journal = new SurpriseJournal(store.collection(GROWTH_COLLECTIONS.surprises), {
        clock: clock.now,
        logger: { warn, debug: () => {} },
      });
    });

    it('records a surprise with defaults', async () => {
      const surprise = await journal.recordSurprise({
        whatHappened: 'The build passed first time',
        whatExpected: 'A failing build',
        whySurprising: 'The cache was cold',
      });

      expect(surprise.id.startsWith('surprise_')).toBe(true);
      expect(surprise.whatLearned).toBeNull();
      expect(surprise.emotionalImpact).toBe('neutral');
      expect(surprise.intensity).toBe(0.5);
      expect(surprise.tags).toEqual([]);
    });

    it('indexes the whole story and reads it back', async () => {
      const surprise = await journal.recordSurprise({
        whatHappened: 'The user laughed',
        whatExpected: 'Annoyance',
        whySurprising: 'The bug report was blunt',
        whatLearned: 'Bluntness is not hostility',
        emotionalImpact: 'positive',
        intensity: 0.8,
        tags: ['humor'],
      });

      expect(surpriseDocument(surprise)).toBe(
        'The user laughed. Expected: Annoyance. Surprising because: The bug report was blunt. Learned: Bluntness is not hostility'
      );
      const [found] = await journal.recallSurprises(surpriseDocument(surprise), 1);
      expect(found).toEqual(surprise);
    });

    it('ranks high-intensity surprises and lists recent ones', async () => {
      const mild = await journal.recordSurprise({ whatHappened: 'a', whatExpected: 'b', whySurprising: 'c', intensity: 0.3 });
      clock.advanceHours(1);
      const strong = await journal.recordSurprise({ whatHappened: 'd', whatExpected: 'e', whySurprising: 'f', intensity: 0.9 });
      clock.advanceHours(1);
      const notable = await journal.recordSurprise({ whatHappened: 'g', whatExpected: 'h', whySurprising: 'i', intensity: 0.7 });

      expect((await journal.getHighIntensitySurprises()).map((s) => s.id)).toEqual([strong.id, notable.id]);
      expect((await journal.getRecentSurprises(2)).map((s) => s.id)).toEqual([notable.id, strong.id]);
      expect(await journal.count()).toBe(3);
      expect(mild.intensity).toBe(0.3);
    });

    it('skips records it cannot read', async () => {
      await store.collection(GROWTH_COLLECTIONS.surprises).add('stray', 'not a surprise', { kind: 'other' });
      await journal.recordSurprise({ whatHappened: 'a', whatExpected: 'b', whySurprising: 'c' });

      const recent = await journal.getRecentSurprises();
      expect(recent.map((s) => s.whatHappened)).toEqual(['a']);
      expect(warn).toHaveBeenCalledWith('Skipping unreadable surprise record stray', expect.anything());
    });
  });
});
