import { z } from 'zod';
import { ValidationError } from '../core/errors.js';
import { generateId } from '../core/ids.js';
import { KeyedLock } from '../core/lock.js';
import type { TierContext } from './base-tier.js';
import { EMOTIONAL_VALENCES, type EmotionalValence } from './types.js';
import type { IndexedDocument, SimilaritySearch } from './vector-store.js';

export const GROWTH_COLLECTIONS = {
  beliefs: 'belief_evolution',
  surprises: 'surprises',
} as const;

// An old belief must be at least this close to a stored version to join its thread
const THREAD_MATCH_SIMILARITY = 0.5;

export interface BeliefVersion {
  id: string;
  beliefThreadId: string;
  version: number;
  content: string;
  previousContent: string | null;
  reasonForChange: string | null;
  timestamp: Date;
  confidence: number;
}

export interface EvolveBeliefInput {
  newBelief: string;
  reason: string;
  oldBelief?: string;
  confidence?: number;
}

export interface Surprise {
  id: string;
  whatHappened: string;
  whatExpected: string;
  whySurprising: string;
  whatLearned: string | null;
  emotionalImpact: EmotionalValence;
  intensity: number;
  timestamp: Date;
  tags: string[];
}

export type SurpriseInput = Omit<Surprise, 'id' | 'timestamp' | 'whatLearned' | 'emotionalImpact' | 'intensity' | 'tags'> & {
  whatLearned?: string;
  emotionalImpact?: EmotionalValence;
  intensity?: number;
  tags?: string[];
};

const unit = z.number().min(0).max(1);
const notBlank = (s: string) => s.trim().length > 0;

const BeliefRecordSchema = z.object({
  beliefThreadId: z.string(),
  version: z.number().int().min(1),
  previousContent: z.string().nullable(),
  reasonForChange: z.string().nullable(),
  timestamp: z.string().datetime(),
  confidence: unit,
});

const SurpriseRecordSchema = z.object({
  whatHappened: z.string(),
  whatExpected: z.string(),
  whySurprising: z.string(),
  whatLearned: z.string().nullable(),
  emotionalImpact: z.enum(EMOTIONAL_VALENCES),
  intensity: unit,
  timestamp: z.string().datetime(),
  tags: z.array(z.string()),
});

const EvolveBeliefSchema = z.object({
  newBelief: z.string().refine(notBlank, 'must not be blank'),
  reason: z.string().refine(notBlank, 'must not be blank'),
  oldBelief: z.string().optional(),
  confidence: unit.default(0.8),
});

const SurpriseInputSchema = z.object({
  whatHappened: z.string().refine(notBlank, 'must not be blank'),
  whatExpected: z.string().refine(notBlank, 'must not be blank'),
  whySurprising: z.string().refine(notBlank, 'must not be blank'),
  whatLearned: z.string().optional(),
  emotionalImpact: z.enum(EMOTIONAL_VALENCES).default('neutral'),
  intensity: unit.default(0.5),
  tags: z.array(z.string()).default([]),
});

function parse<S extends z.ZodTypeAny>(schema: S, input: unknown, context: string): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw ValidationError.fromZod(context, result.error);
  }
  return result.data;
}

function newestFirst<T extends { timestamp: Date }>(a: T, b: T): number {
  return b.timestamp.getTime() - a.timestamp.getTime();
}

/**
 * Versioned beliefs. Versions of the same belief share a thread id, so a
 * change of mind can be traced from the first version to the latest.
 */
export class BeliefEvolution {
  // Version numbers are read then written; one evolution at a time
  private lock = new KeyedLock();

  constructor(
    private collection: SimilaritySearch,
    private context: TierContext
  ) {}

  /**
   * Record a new version. When `oldBelief` matches a stored version closely
   * enough, the new one continues that thread; otherwise a thread starts.
   */
  async evolveBelief(input: EvolveBeliefInput): Promise<BeliefVersion> {
    const value = parse(EvolveBeliefSchema, input, 'belief evolution');

    return this.lock.run('evolve', async () => {
      const now = this.context.clock();
      let beliefThreadId: string | null = null;
      let version = 1;

      if (value.oldBelief && value.oldBelief.trim().length > 0) {
        const [closest] = await this.collection.query(value.oldBelief, 1);
        if (closest && closest.similarity >= THREAD_MATCH_SIMILARITY) {
          const previous = this.toVersion(closest);
          beliefThreadId = previous.beliefThreadId;
          const thread = await this.getThreadEvolution(beliefThreadId);
          version = thread.reduce((max, v) => Math.max(max, v.version), previous.version) + 1;
        }
      }

      const belief: BeliefVersion = {
        id: generateId('belief', now),
        beliefThreadId: beliefThreadId ?? generateId('belief_thread', now),
        version,
        content: value.newBelief,
        previousContent: value.oldBelief ?? null,
        reasonForChange: value.reason,
        timestamp: now,
        confidence: value.confidence,
      };

      await this.collection.add(belief.id, belief.content, {
        beliefThreadId: belief.beliefThreadId,
        version: belief.version,
        previousContent: belief.previousContent,
        reasonForChange: belief.reasonForChange,
        timestamp: belief.timestamp.toISOString(),
        confidence: belief.confidence,
      });
      this.context.logger.debug(`Belief ${belief.beliefThreadId} now at version ${belief.version}`);
      return belief;
    });
  }

  async getBeliefHistory(query: string, limit: number = 10): Promise<BeliefVersion[]> {
    const matches = await this.collection.query(query, limit);
    return this.toVersions(matches);
  }

  /**
   * Every version of one belief, oldest first.
   */
  async getThreadEvolution(beliefThreadId: string): Promise<BeliefVersion[]> {
    const docs = await this.collection.list({ where: { beliefThreadId } });
    return this.toVersions(docs).sort((a, b) => a.version - b.version);
  }

  // Only actual changes: later versions, or versions that carry a reason
  async getRecentEvolutions(limit: number = 5): Promise<BeliefVersion[]> {
    const docs = await this.collection.list();
    return this.toVersions(docs)
      .filter((v) => v.version > 1 || v.reasonForChange)
      .sort(newestFirst)
      .slice(0, limit);
  }

  count(): Promise<number> {
    return this.collection.count();
  }

  private toVersion(doc: IndexedDocument): BeliefVersion {
    const record = parse(BeliefRecordSchema, doc.metadata, `belief record ${doc.id}`);
    return { id: doc.id, content: doc.text, ...record, timestamp: new Date(record.timestamp) };
  }

  private toVersions(docs: IndexedDocument[]): BeliefVersion[] {
    const versions: BeliefVersion[] = [];
    for (const doc of docs) {
      try {
        versions.push(this.toVersion(doc));
      } catch (error) {
        this.context.logger.warn(`Skipping unreadable belief record ${doc.id}`, error);
      }
    }
    return versions;
  }
}

export function surpriseDocument(surprise: Pick<Surprise, 'whatHappened' | 'whatExpected' | 'whySurprising' | 'whatLearned'>): string {
  let text = `${surprise.whatHappened}. Expected: ${surprise.whatExpected}. Surprising because: ${surprise.whySurprising}`;
  if (surprise.whatLearned) {
    text += `. Learned: ${surprise.whatLearned}`;
  }
  return text;
}

/**
 * Moments where what happened did not match what was expected.
 */
export class SurpriseJournal {
  constructor(
    private collection: SimilaritySearch,
    private context: TierContext
  ) {}

  async recordSurprise(input: SurpriseInput): Promise<Surprise> {
    const value = parse(SurpriseInputSchema, input, 'surprise');
    const now = this.context.clock();

    const surprise: Surprise = {
      id: generateId('surprise', now),
      whatHappened: value.whatHappened,
      whatExpected: value.whatExpected,
      whySurprising: value.whySurprising,
      whatLearned: value.whatLearned && value.whatLearned.trim().length > 0 ? value.whatLearned : null,
      emotionalImpact: value.emotionalImpact,
      intensity: value.intensity,
      timestamp: now,
      tags: value.tags,
    };

    await this.collection.add(surprise.id, surpriseDocument(surprise), {
      whatHappened: surprise.whatHappened,
      whatExpected: surprise.whatExpected,
      whySurprising: surprise.whySurprising,
      whatLearned: surprise.whatLearned,
      emotionalImpact: surprise.emotionalImpact,
      intensity: surprise.intensity,
      timestamp: surprise.timestamp.toISOString(),
      tags: surprise.tags,
    });
    return surprise;
  }

  async recallSurprises(query: string, limit: number = 5): Promise<Surprise[]> {
    return this.toSurprises(await this.collection.query(query, limit));
  }

  async getRecentSurprises(limit: number = 5): Promise<Surprise[]> {
    return this.toSurprises(await this.collection.list()).sort(newestFirst).slice(0, limit);
  }

  async getHighIntensitySurprises(minIntensity: number = 0.7, limit: number = 5): Promise<Surprise[]> {
    return this.toSurprises(await this.collection.list())
      .filter((s) => s.intensity >= minIntensity)
      .sort((a, b) => b.intensity - a.intensity)
      .slice(0, limit);
  }

  count(): Promise<number> {
    return this.collection.count();
  }

  private toSurprises(docs: IndexedDocument[]): Surprise[] {
    const surprises: Surprise[] = [];
    for (const doc of docs) {
      const parsed = SurpriseRecordSchema.safeParse(doc.metadata);
      if (!parsed.success) {
        this.context.logger.warn(`Skipping unreadable surprise record ${doc.id}`, parsed.error);
        continue;
      }
      surprises.push({ id: doc.id, ...parsed.data, timestamp: new Date(parsed.data.timestamp) });
    }
    return surprises;
  }
}
