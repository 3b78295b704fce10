import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import Database from 'better-sqlite3';
import { ExplorationTracker, buildThreadNarrative } from '../../src/exploration/tracker.js';
import type { IntrospectionJournal } from '../../src/exploration/types.js';
import { ManualClock } from '../../src/core/clock.js';
import { NotFoundError, ValidationError } from '../../src/core/errors.js';
import { removeDb, tmpDb } from './helpers.js';

describe('ExplorationTracker', () => {
  let tracker: ExplorationTracker;
  let dbPath: string;
  let clock: ManualClock;

  beforeEach(() => {
    dbPath = tmpDb('threads');
    clock = new ManualClock();
    tracker = new ExplorationTracker(dbPath, { clock: clock.now });
  });

  afterEach(() => {
    tracker.close();
    removeDb(dbPath);
  });

  function startCuriosity() {
    return tracker.startThread({
      name: 'curiosity',
      question: 'What makes a question interesting?',
      introspectionId: 'i1',
      insightSummary: 'Novelty matters',
      tags: ['meta'],
    });
  }

  describe('startThread', () => {
    it('creates an active thread with a root link', () => {
      const thread = startCuriosity();

      expect(thread.id.startsWith('thread_')).toBe(true);
      expect(thread.status).toBe('active');
      expect(thread.depth).toBe(1);
      expect(thread.rootIntrospectionId).toBe('i1');
      expect(thread.currentIntrospectionId).toBe('i1');
      expect(thread.branchedFromThreadId).toBeNull();

      const [root] = tracker.getThreadChain(thread.id);
      expect(root).toMatchObject({
        threadId: thread.id,
        introspectionId: 'i1',
        parentLinkId: null,
        depth: 0,
        question: 'What makes a question interesting?',
        insightSummary: 'Novelty matters',
        leadsToBranchIds: [],
      });
      expect(tracker.getThread(thread.id)).toEqual(thread);
    });

    it('rejects blank fields', () => {
      expect(() => tracker.startThread({ name: ' ', question: 'q', introspectionId: 'i1' })).toThrow(ValidationError);
    });
  });

  describe('continueThread', () => {
    it('appends links in order', () => {
      const thread = startCuriosity();
      clock.advanceHours(1);
      const second = tracker.continueThread(thread.id, { introspectionId: 'i2', question: 'Is novelty enough?' });
      const third = tracker.continueThread('curiosity', { introspectionId: 'i3', question: 'What about depth?' });

      const [root] = tracker.getThreadChain(thread.id);
      expect(second.depth).toBe(1);
      expect(second.parentLinkId).toBe(root.id);
      expect(third.depth).toBe(2);
      expect(third.parentLinkId).toBe(second.id);

      const updated = tracker.getThread(thread.id);
      expect(updated?.depth).toBe(3);
      expect(updated?.currentIntrospectionId).toBe('i3');
      expect(updated?.updatedAt).toEqual(clock.now());
      expect(tracker.getThreadChain(thread.id).map((l) => l.introspectionId)).toEqual(['i1', 'i2', 'i3']);
    });

    it('fails for an unknown thread under the strict policy', () => {
      expect(() => tracker.continueThread('nowhere', { introspectionId: 'i2', question: 'q' })).toThrow(NotFoundError);
    });

    it('starts the thread under the start-new policy', () => {
      const lenient = new ExplorationTracker(':memory:', { clock: clock.now, missingThreadPolicy: 'start-new' });
      try {
        const link = lenient.continueThread('fresh idea', { introspectionId: 'i9', question: 'Where does this go?' });
        expect(link.depth).toBe(0);
        expect(link.parentLinkId).toBeNull();
        expect(lenient.getThread('fresh idea')?.question).toBe('Where does this go?');
      } finally {
        lenient.close();
      }
    });
  });

  describe('branchThread', () => {
    it('forks from a link and records the branch on it', () => {
      const parent = startCuriosity();
      const [root] = tracker.getThreadChain(parent.id);

      const branch = tracker.branchThread({
        fromThread: 'curiosity',
        fromLinkId: root.id,
        name: 'novelty',
        question: 'Why does novelty feel good?',
        introspectionId: 'i5',
      });

      expect(branch.branchedFromThreadId).toBe(parent.id);
      expect(branch.branchedFromLinkId).toBe(root.id);
      expect(branch.depth).toBe(1);
      expect(tracker.getLink(root.id)?.leadsToBranchIds).toEqual([branch.id]);
      expect(tracker.getThread(parent.id)?.depth).toBe(1);
      expect(tracker.getThread(parent.id)?.currentIntrospectionId).toBe('i1');
    });

    it('keeps every branch taken from the same link', () => {
      const parent = startCuriosity();
      const [root] = tracker.getThreadChain(parent.id);
      const a = tracker.branchThread({ fromThread: parent.id, fromLinkId: root.id, name: 'a', question: 'qa', introspectionId: 'ia' });
      const b = tracker.branchThread({ fromThread: parent.id, fromLinkId: root.id, name: 'b', question: 'qb', introspectionId: 'ib' });

      expect(tracker.getLink(root.id)?.leadsToBranchIds).toEqual([a.id, b.id]);
    });

    it('requires the origin link to belong to the parent thread', () => {
      const parent = startCuriosity();
      const other = tracker.startThread({ name: 'other', question: 'q', introspectionId: 'i7' });
      const [otherRoot] = tracker.getThreadChain(other.id);

      expect(() =>
        tracker.branchThread({ fromThread: parent.id, fromLinkId: otherRoot.id, name: 'x', question: 'q', introspectionId: 'i8' })
      ).toThrow(`Link not found: ${otherRoot.id} in thread ${parent.id}`);
    });

    it('starts an unbranched thread under the start-new policy', () => {
      const lenient = new ExplorationTracker(':memory:', { clock: clock.now, missingThreadPolicy: 'start-new' });
      try {
        const thread = lenient.branchThread({
          fromThread: 'missing',
          fromLinkId: 'link_missing',
          name: 'orphan',
          question: 'q',
          introspectionId: 'i1',
        });
        expect(thread.branchedFromThreadId).toBeNull();
        expect(lenient.getThread('orphan')?.id).toBe(thread.id);
      } finally {
        lenient.close();
      }
    });
  });

  describe('setThreadStatus', () => {
    it('updates status and conclusion', () => {
      const thread = startCuriosity();
      clock.advanceHours(2);

      const concluded = tracker.setThreadStatus(thread.id, 'concluded', 'Novelty plus relevance');
      expect(concluded.status).toBe('concluded');
      expect(concluded.conclusion).toBe('Novelty plus relevance');
      expect(tracker.getThread(thread.id)).toEqual(concluded);

      const reopened = tracker.setThreadStatus(thread.id, 'active');
      expect(reopened.conclusion).toBeNull();
    });

    it('fails for an unknown thread', () => {
      expect(() => tracker.setThreadStatus('nope', 'dormant')).toThrow(NotFoundError);
    });
  });

  describe('listing and search', () => {
    it('lists most recently updated first and filters by status', () => {
      const a = tracker.startThread({ name: 'a', question: 'qa', introspectionId: 'i1' });
      clock.advanceHours(1);
      const b = tracker.startThread({ name: 'b', question: 'qb', introspectionId: 'i2' });
      clock.advanceHours(1);
      tracker.continueThread(a.id, { introspectionId: 'i3', question: 'more a' });
      tracker.setThreadStatus(b.id, 'dormant');

      expect(tracker.listThreads().map((t) => t.name)).toEqual(['b', 'a']);
      expect(tracker.listActiveThreads().map((t) => t.name)).toEqual(['a']);
      expect(tracker.listThreads('dormant').map((t) => t.id)).toEqual([b.id]);
      expect(tracker.listThreads(undefined, 1)).toHaveLength(1);
    });

    it('resolves a shared name to the most recently updated thread', () => {
      tracker.startThread({ name: 'dup', question: 'first', introspectionId: 'i1' });
      clock.advanceHours(1);
      const second = tracker.startThread({ name: 'dup', question: 'second', introspectionId: 'i2' });

      expect(tracker.getThread('dup')?.id).toBe(second.id);
    });

    it('searches names and questions literally', () => {
      tracker.startThread({ name: 'certainty', question: 'Is 100% certainty possible?', introspectionId: 'i1' });
      tracker.startThread({ name: 'reasons', question: 'Are there 1000 reasons?', introspectionId: 'i2' });

      expect(tracker.searchThreads('100%').map((t) => t.name)).toEqual(['certainty']);
      expect(tracker.searchThreads('REASONS').map((t) => t.name)).toEqual(['reasons']);
      expect(tracker.searchThreads('nothing like this')).toEqual([]);
    });

    it('returns an empty chain for an unknown thread', () => {
      expect(tracker.getThreadChain('nope')).toEqual([]);
    });
  });

  describe('getThreadContext', () => {
    it('summarizes the path of inquiry', async () => {
      const thread = startCuriosity();
      tracker.continueThread(thread.id, { introspectionId: 'i2', question: 'Is novelty enough?' });

      const context = await tracker.getThreadContext('curiosity');
      expect(context.chainLength).toBe(2);
      expect(context.questionsExplored).toEqual(['What makes a question interesting?', 'Is novelty enough?']);
      expect(context.introspections).toBeUndefined();
      expect(context.narrative).toBe(
        [
          'Thread: curiosity',
          'Core question: What makes a question interesting?',
          'Depth: 2 thoughts deep',
          'Status: active',
          '',
          'Path of inquiry:',
          '  • What makes a question interesting?',
          '    (Novelty matters)',
          '  → Is novelty enough?',
        ].join('\n')
      );
    });

    it('limits recent links', async () => {
      const thread = startCuriosity();
      for (let i = 2; i <= 4; i++) {
        tracker.continueThread(thread.id, { introspectionId: `i${i}`, question: `q${i}` });
      }

      const context = await tracker.getThreadContext(thread.id, { maxIntrospections: 2 });
      expect(context.recentLinks.map((l) => l.introspectionId)).toEqual(['i3', 'i4']);
      expect(context.chainLength).toBe(4);
    });

    it('fetches introspections from the journal and skips failures', async () => {
      const warn = vi.fn();
      const journal: IntrospectionJournal = {
        fetch: async (id) => {
          if (id === 'i1') return { text: 'Novelty is a pull toward the unknown' };
          if (id === 'i3') throw new Error('journal offline');
          return null;
        },
      };
      const withJournal = new ExplorationTracker(':memory:', { clock: clock.now, journal, logger: { warn, debug: () => {} } });
      try {
        const thread = withJournal.startThread({ name: 't', question: 'q1', introspectionId: 'i1', insightSummary: 'pull' });
        withJournal.continueThread(thread.id, { introspectionId: 'i2', question: 'q2' });
        withJournal.continueThread(thread.id, { introspectionId: 'i3', question: 'q3' });

        const context = await withJournal.getThreadContext(thread.id);
        expect(context.introspections).toEqual([
          { linkId: context.recentLinks[0].id, question: 'q1', insight: 'pull', introspection: { text: 'Novelty is a pull toward the unknown' } },
        ]);
        expect(warn).toHaveBeenCalledWith('Could not fetch introspection i3', expect.any(Error));

        const bare = await withJournal.getThreadContext(thread.id, { includeContent: false });
        expect(bare.introspections).toBeUndefined();
      } finally {
        withJournal.close();
      }
    });

    it('fails for an unknown thread', async () => {
      await expect(tracker.getThreadContext('nope')).rejects.toThrow(NotFoundError);
    });
  });

  it('reports stats', () => {
    const parent = startCuriosity();
    tracker.continueThread(parent.id, { introspectionId: 'i2', question: 'next' });
    const [root] = tracker.getThreadChain(parent.id);
    const branch = tracker.branchThread({ fromThread: parent.id, fromLinkId: root.id, name: 'b', question: 'qb', introspectionId: 'i3' });
    tracker.setThreadStatus(branch.id, 'concluded', 'done');

    expect(tracker.getStats()).toEqual({
      totalThreads: 2,
      activeThreads: 1,
      dormantThreads: 0,
      concludedThreads: 1,
      totalLinks: 3,
      averageDepth: 1.5,
      branchedThreads: 1,
    });
  });

  it('reports zeroes for an empty index', () => {
    expect(tracker.getStats()).toEqual({
      totalThreads: 0,
      activeThreads: 0,
      dormantThreads: 0,
      concludedThreads: 0,
      totalLinks: 0,
      averageDepth: 0,
      branchedThreads: 0,
    });
  });

  it('reports a corrupt tags column as a validation error', () => {
    const thread = startCuriosity();
    const raw = new Database(dbPath);
    try {
      raw.prepare('UPDATE threads SET tags = ? WHERE id = ?').run('{broken', thread.id);
    } finally {
      raw.close();
    }

    expect(() => tracker.getThread(thread.id)).toThrow(ValidationError);
    expect(() => tracker.getThread(thread.id)).toThrow(`Unreadable tags of thread ${thread.id}`);
  });

  it('persists across reopen', () => {
    const thread = startCuriosity();
    tracker.close();

    tracker = new ExplorationTracker(dbPath, { clock: clock.now });
    expect(tracker.getThread(thread.id)?.name).toBe('curiosity');
  });
});

describe('buildThreadNarrative', () => {
  it('marks branches and conclusions', () => {
    const now = new Date('2026-01-01T09:00:00.000Z');
    const text = buildThreadNarrative(
      {
        id: 'thread_1',
        name: 'fork',
        question: 'q',
        createdAt: now,
        updatedAt: now,
        status: 'concluded',
        depth: 1,
        rootIntrospectionId: 'i1',
        currentIntrospectionId: 'i1',
        branchedFromThreadId: 'thread_0',
        branchedFromLinkId: 'link_0',
        conclusion: 'It was worth it',
        tags: [],
      },
      []
    );

    expect(text).toBe(
      'Thread: fork\nCore question: q\nDepth: 1 thoughts deep\nStatus: concluded\n(Branched from another exploration)\n\nConclusion reached: It was worth it'
    );
  });
});
