import { createEntry, metadataString } from './entry.js';
import { PersistentTier } from './base-tier.js';
import type { WhereFilter } from './vector-store.js';
import type {
  ConsolidationType,
  EmotionalValence,
  LongTermStoreOptions,
  MemoryEntry,
  SessionFoundation,
} from './types.js';

export const LONGTERM_IMPORTANCE_FLOOR = 0.8;

export function consolidationTypeOf(entry: MemoryEntry): string | undefined {
  return metadataString(entry.metadata, 'consolidationType');
}

function isoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

function section(title: string, items: string[]): string[] {
  return items.length > 0 ? [title, ...items.map((item) => `- ${item}`)] : [];
}

/**
 * Consolidated memories that never fade: identity, relationship, beliefs,
 * lessons, milestones and pattern summaries.
 */
export class LongTermMemory extends PersistentTier {
  readonly tier = 'longterm';

  async store(content: string, options: LongTermStoreOptions = {}): Promise<MemoryEntry> {
    const { consolidationType = 'lesson', sourceIds = [], importance = 0.9, metadata, ...input } = options;
    const now = this.now();

    const entry = createEntry(
      'longterm',
      {
        ...input,
        content,
        importance: Math.max(LONGTERM_IMPORTANCE_FLOOR, Math.min(1, importance)),
        source: 'consolidation',
        relatedIds: sourceIds,
        metadata: {
          ...metadata,
          consolidationType,
          consolidatedAt: now.toISOString(),
          sourceCount: sourceIds.length,
        },
      },
      { now, decayRate: 0 }
    );

    return this.persist(entry);
  }

  /**
   * Store under a stable key, or rewrite the entry already stored under it.
   */
  async storeOrRefresh(key: string, content: string, options: LongTermStoreOptions = {}): Promise<MemoryEntry> {
    const [existing] = await this.listEntries({ 'metadata.consolidationKey': key }, 1);
    if (!existing) {
      return this.store(content, { ...options, metadata: { ...options.metadata, consolidationKey: key } });
    }

    const now = this.now();
    const refreshed = await this.mutate(existing.id, (current) => ({
      ...current,
      content,
      importance: Math.max(LONGTERM_IMPORTANCE_FLOOR, Math.min(1, options.importance ?? current.importance)),
      emotionalValence: options.emotionalValence ?? current.emotionalValence,
      emotionalIntensity: options.emotionalIntensity ?? current.emotionalIntensity,
      relatedIds: options.sourceIds ?? current.relatedIds,
      metadata: {
        ...current.metadata,
        consolidatedAt: now.toISOString(),
        sourceCount: (options.sourceIds ?? current.relatedIds).length,
      },
    }));

    // Deleted between lookup and rewrite
    return refreshed ?? this.store(content, { ...options, metadata: { ...options.metadata, consolidationKey: key } });
  }

  async recall(query: string, limit: number = 5, type?: ConsolidationType): Promise<MemoryEntry[]> {
    if (limit <= 0) return [];

    const where: WhereFilter | undefined = type ? { 'metadata.consolidationType': type } : undefined;
    const results = await this.search(query, limit, where);
    await this.touch(results);
    return results;
  }

  /** Newest first. */
  async getByType(type: ConsolidationType, limit: number = 10): Promise<MemoryEntry[]> {
    return (await this.listEntries({ 'metadata.consolidationType': type }))
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
      .slice(0, limit);
  }

  getCoreIdentity(): Promise<MemoryEntry[]> {
    return this.getByType('identity');
  }

  getRelationshipEssence(): Promise<MemoryEntry[]> {
    return this.getByType('relationship');
  }

  getCoreBeliefs(): Promise<MemoryEntry[]> {
    return this.getByType('core_belief');
  }

  getLessonsLearned(): Promise<MemoryEntry[]> {
    return this.getByType('lesson');
  }

  getMilestones(): Promise<MemoryEntry[]> {
    return this.getByType('milestone');
  }

  async getSessionFoundation(): Promise<SessionFoundation> {
    const [identity, relationship, beliefs, lessons, milestones] = await Promise.all([
      this.getCoreIdentity(),
      this.getRelationshipEssence(),
      this.getCoreBeliefs(),
      this.getByType('lesson', 3),
      this.getByType('milestone', 3),
    ]);

    const text = (entries: MemoryEntry[]) => entries.map((e) => e.content);
    return {
      identity: text(identity),
      relationship: text(relationship),
      beliefs: text(beliefs),
      recentLessons: text(lessons),
      milestones: text(milestones),
    };
  }

  storeIdentityMarker(content: string, importance: number = 0.9): Promise<MemoryEntry> {
    return this.store(content, {
      consolidationType: 'identity',
      importance,
      tags: ['identity', 'self'],
    });
  }

  storeRelationshipEssence(
    content: string,
    valence: EmotionalValence = 'positive',
    intensity: number = 0.5
  ): Promise<MemoryEntry> {
    return this.store(content, {
      consolidationType: 'relationship',
      importance: 0.95,
      emotionalValence: valence,
      emotionalIntensity: intensity,
      tags: ['relationship', 'user'],
    });
  }

  storeCoreBelief(content: string): Promise<MemoryEntry> {
    return this.store(content, {
      consolidationType: 'core_belief',
      importance: 1,
      tags: ['belief', 'value', 'core'],
    });
  }

  storeLesson(lesson: string, sourceIds: string[] = [], valence: EmotionalValence = 'neutral'): Promise<MemoryEntry> {
    return this.store(`Lesson: ${lesson}`, {
      consolidationType: 'lesson',
      importance: 0.85,
      emotionalValence: valence,
      tags: ['lesson', 'wisdom'],
      sourceIds,
    });
  }

  storeMilestone(milestone: string, date: Date = this.now(), valence: EmotionalValence = 'positive'): Promise<MemoryEntry> {
    return this.store(`Milestone (${isoDate(date)}): ${milestone}`, {
      consolidationType: 'milestone',
      importance: 0.9,
      emotionalValence: valence,
      emotionalIntensity: 0.7,
      tags: ['milestone', 'achievement'],
    });
  }

  /**
   * Markdown sections describing identity, relationship, beliefs and
   * recent lessons; empty when nothing has been consolidated yet.
   */
  async buildIdentityPrompt(): Promise<string> {
    const foundation = await this.getSessionFoundation();

    const blocks = [
      section('## Who I Am', foundation.identity),
      section('## Our Relationship', foundation.relationship),
      section('## What I Believe', foundation.beliefs),
      section("## What I've Learned", foundation.recentLessons),
    ].filter((lines) => lines.length > 0);

    return blocks.map((lines) => lines.join('\n')).join('\n\n');
  }
}
