import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { applySeed, parseSeed, seedFromFile } from '../../src/memory/seed.js';
import { MemoryManager } from '../../src/memory/manager.js';
import { VectorStore } from '../../src/memory/vector-store.js';
import { HashingEmbedder } from '../../src/memory/embeddings.js';
import { InMemorySharedState } from '../../src/memory/shared-state.js';
import { ManualClock } from '../../src/core/clock.js';
import { silentLogger } from '../../src/core/logger.js';
import { NotFoundError, ValidationError } from '../../src/core/errors.js';
import { cleanup, removeDb, tmpDb, tmpDir } from './helpers.js';

const EXAMPLE_SEED = fileURLToPath(new URL('../../seeds/example.json', import.meta.url));

describe('parseSeed', () => {
  it('defaults every section to empty', () => {
    expect(parseSeed({})).toEqual({
      identity: [],
      beliefs: [],
      relationship: [],
      lessons: [],
      milestones: [],
      facts: [],
      preferences: [],
    });
  });

  it('accepts plain strings and fills in defaults', () => {
    const seed = parseSeed({
      identity: ['I am patient'],
      relationship: ['We are friends'],
      milestones: ['First chat'],
      facts: [{ content: 'Sky is blue' }],
      preferences: ['tea'],
    });

    expect(seed.identity).toEqual([{ content: 'I am patient', importance: 0.9 }]);
    expect(seed.relationship).toEqual([{ content: 'We are friends', valence: 'positive', intensity: 0.5 }]);
    expect(seed.milestones[0]).toMatchObject({ content: 'First chat', valence: 'positive' });
    expect(seed.facts).toEqual([{ content: 'Sky is blue', category: 'world_knowledge', confidence: 0.9, tags: [] }]);
    expect(seed.preferences).toEqual([{ content: 'tea', confidence: 0.8 }]);
  });

  it('rejects blank content and bad dates', () => {
    expect(() => parseSeed({ beliefs: ['  '] })).toThrow(ValidationError);
    expect(() => parseSeed({ milestones: [{ content: 'x', date: 'last spring' }] })).toThrow('Invalid seed file');
  });
});

describe('seeding a manager', () => {
  let store: VectorStore;
  let dbPath: string;
  let manager: MemoryManager;

  beforeEach(() => {
    const clock = new ManualClock();
    dbPath = tmpDb('seed');
    store = new VectorStore(dbPath, new HashingEmbedder());
    manager = new MemoryManager({
      backend: store,
      sharedState: new InMemorySharedState({}, clock.now),
      logger: silentLogger,
      clock: clock.now,
    });
  });

  afterEach(() => {
    store.close();
    removeDb(dbPath);
  });

  it('loads the example seed', async () => {
    const result = await seedFromFile(manager, EXAMPLE_SEED);

    expect(result).toEqual({
      identity: 2,
      beliefs: 2,
      relationship: 1,
      lessons: 1,
      milestones: 1,
      facts: 2,
      preferences: 1,
    });
    expect(await manager.longterm.count()).toBe(7);
    expect(await manager.semantic.count()).toBe(3);
    expect((await manager.longterm.getMilestones()).map((e) => e.content)).toEqual([
      'Milestone (2026-01-01): First session with persistent memory enabled',
    ]);
  });

  it('marks seeded facts as foundational', async () => {
    await applySeed(manager, parseSeed({ facts: [{ content: 'Sky is blue', tags: ['nature'] }], preferences: ['tea'] }));

    const [fact] = await manager.semantic.recallByCategory('world_knowledge');
    expect(fact.source).toBe('foundational');
    expect(fact.tags).toEqual(['nature']);
    expect(fact.metadata.confidence).toBe(0.9);

    const [pref] = await manager.semantic.getUserPreferences();
    expect(pref.content).toBe('User preference: tea');
    expect(pref.source).toBe('foundational');
  });

  it('builds the identity prompt from seeded memories', async () => {
    await applySeed(manager, parseSeed({ identity: ['I am patient'], beliefs: ['Kindness first'] }));
    expect(await manager.buildSystemPromptAdditions()).toBe('## Who I Am\n- I am patient\n\n## What I Believe\n- Kindness first');
  });

  describe('file errors', () => {
    let dir: string;

    beforeEach(() => { dir = tmpDir(); });
    afterEach(() => cleanup(dir));

    it('fails for a missing file', async () => {
      await expect(seedFromFile(manager, path.join(dir, 'missing.json'))).rejects.toThrow(NotFoundError);
    });

    it('fails for invalid JSON', async () => {
      const file = path.join(dir, 'broken.json');
      fs.writeFileSync(file, '{ identity: ');
      await expect(seedFromFile(manager, file)).rejects.toThrow(`Seed file ${file} is not valid JSON`);
    });
  });
});
