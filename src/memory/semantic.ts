import { ConcurrentModificationError, NotFoundError, ValidationError } from '../core/errors.js';
import { KeyedLock } from '../core/lock.js';
import { tokenize } from './embeddings.js';
import { createEntry, metadataBoolean, metadataNumber, metadataString } from './entry.js';
import { PersistentTier } from './base-tier.js';
import type { WhereFilter } from './vector-store.js';
import {
  KNOWLEDGE_CATEGORIES,
  type KnowledgeCategory,
  type MemoryEntry,
  type SemanticRecallOptions,
  type SemanticStoreOptions,
} from './types.js';

const DEPRECATION_FACTOR = 0.3;
const VERIFIED_CONFIDENCE = 0.95;

const OPPOSITE_PAIRS: ReadonlyArray<readonly [string, string]> = [
  ['prefer', 'dislike'],
  ['like', 'hate'],
  ['always', 'never'],
  ['love', 'hate'],
  ['yes', 'no'],
  ['true', 'false'],
  ['morning', 'evening'],
  ['fast', 'slow'],
];

export function factConfidence(entry: MemoryEntry): number {
  return metadataNumber(entry.metadata, 'confidence') ?? 1;
}

export function factCategory(entry: MemoryEntry): KnowledgeCategory | undefined {
  const category = metadataString(entry.metadata, 'category');
  return KNOWLEDGE_CATEGORIES.find((c) => c === category);
}

export function isDeprecated(entry: MemoryEntry): boolean {
  return metadataBoolean(entry.metadata, 'deprecated');
}

/**
 * Facts and knowledge without a point in time. Superseded facts stay on
 * disk, flagged deprecated, and never come back from recall.
 */
export class SemanticMemory extends PersistentTier {
  readonly tier = 'semantic';

  private supersedeLocks = new KeyedLock();

  async store(content: string, options: SemanticStoreOptions = {}): Promise<MemoryEntry> {
    const { category = 'world_knowledge', confidence = 1, supersedes, metadata, ...input } = options;

    if (!(confidence >= 0 && confidence <= 1)) {
      throw new ValidationError('Invalid semantic memory', [`confidence must be within [0, 1], got ${confidence}`]);
    }

    const entry = createEntry(
      'semantic',
      {
        ...input,
        content,
        emotionalValence: 'neutral',
        emotionalIntensity: 0,
        metadata: {
          ...metadata,
          category,
          confidence,
          supersedes: supersedes ?? null,
          verified: false,
          deprecated: false,
        },
      },
      { now: this.now() }
    );

    if (!supersedes) {
      return this.persist(entry);
    }

    return this.supersedeLocks.run(supersedes, () => this.replaceFact(supersedes, entry));
  }

  private async replaceFact(oldId: string, replacement: MemoryEntry): Promise<MemoryEntry> {
    const previous = await this.getById(oldId);
    if (!previous) {
      throw new NotFoundError('Fact', oldId);
    }
    if (isDeprecated(previous)) {
      const by = metadataString(previous.metadata, 'supersededBy') ?? 'another fact';
      throw new ConcurrentModificationError('Fact', oldId, `already superseded by ${by}`);
    }

    await this.persist(replacement);

    try {
      const updated = await this.mutate(oldId, (current) => ({
        ...current,
        importance: current.importance * DEPRECATION_FACTOR,
        metadata: { ...current.metadata, deprecated: true, supersededBy: replacement.id },
      }));
      if (!updated) {
        throw new NotFoundError('Fact', oldId);
      }
    } catch (error) {
      await this.collection.delete([replacement.id]);
      throw error;
    }

    return replacement;
  }

  async recall(query: string, limit: number = 5, options: SemanticRecallOptions = {}): Promise<MemoryEntry[]> {
    if (limit <= 0) return [];

    const where: WhereFilter = { 'metadata.deprecated': false };
    if (options.category) {
      where['metadata.category'] = options.category;
    }

    const minConfidence = options.minConfidence ?? 0;
    const results = (await this.search(query, limit * 2, where))
      .filter((e) => !isDeprecated(e) && factConfidence(e) >= minConfidence)
      .slice(0, limit);

    await this.touch(results);
    return results;
  }

  async recallByCategory(category: KnowledgeCategory, limit: number = 10): Promise<MemoryEntry[]> {
    return this.listEntries({ 'metadata.category': category, 'metadata.deprecated': false }, limit);
  }

  async getUserPreferences(): Promise<MemoryEntry[]> {
    return this.recallByCategory('user_preference', 20);
  }

  async getUserFacts(): Promise<MemoryEntry[]> {
    return this.recallByCategory('user_fact', 20);
  }

  async getRelationshipContext(): Promise<MemoryEntry[]> {
    return this.recallByCategory('relationship', 10);
  }

  async storeUserPreference(preference: string, confidence: number = 0.8, source: string = 'observed'): Promise<MemoryEntry> {
    return this.store(`User preference: ${preference}`, {
      category: 'user_preference',
      importance: 0.7,
      confidence,
      tags: ['preference', 'user'],
      source,
    });
  }

  async storeUserFact(fact: string, confidence: number = 0.9, source: string = 'stated'): Promise<MemoryEntry> {
    return this.store(`About user: ${fact}`, {
      category: 'user_fact',
      importance: 0.6,
      confidence,
      tags: ['fact', 'user'],
      source,
    });
  }

  async storeLearnedPattern(pattern: string, confidence: number = 0.7): Promise<MemoryEntry> {
    return this.store(`Learned pattern: ${pattern}`, {
      category: 'learned_behavior',
      importance: 0.5,
      confidence,
      tags: ['pattern', 'behavior'],
      source: 'observation',
    });
  }

  /**
   * Set the confidence of a fact; 0.95 and above marks it verified.
   */
  async updateConfidence(factId: string, confidence: number): Promise<MemoryEntry> {
    if (!(confidence >= 0 && confidence <= 1)) {
      throw new ValidationError('Invalid confidence', [`must be within [0, 1], got ${confidence}`]);
    }

    const updated = await this.mutate(factId, (current) => ({
      ...current,
      metadata: {
        ...current.metadata,
        confidence,
        ...(confidence >= VERIFIED_CONFIDENCE ? { verified: true } : {}),
      },
    }));
    if (!updated) {
      throw new NotFoundError('Fact', factId);
    }
    return updated;
  }

  /**
   * Similar facts in `category` that use the opposite word of a known
   * pair (always/never, morning/evening) to `newFact`.
   */
  async findContradictions(newFact: string, category: KnowledgeCategory): Promise<MemoryEntry[]> {
    const existing = await this.recall(newFact, 5, { category });
    const newWords = new Set(tokenize(newFact));

    return existing.filter((entry) => {
      const words = new Set(tokenize(entry.content));
      return OPPOSITE_PAIRS.some(
        ([a, b]) => (newWords.has(a) && words.has(b)) || (newWords.has(b) && words.has(a))
      );
    });
  }
}
