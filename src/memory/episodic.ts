import { createEntry, effectiveImportance, toMetadata } from './entry.js';
import { PersistentTier } from './base-tier.js';
import type {
  EmotionalValence,
  EntryInput,
  EpisodicRecallOptions,
  EpisodicStoreOptions,
  MemoryEntry,
  TimeWindow,
} from './types.js';

const DAY_MS = 86_400_000;

const WINDOW_DAYS: Record<Exclude<TimeWindow, 'all'>, number> = {
  today: 1,
  week: 7,
  month: 30,
};

const WEEKDAYS = ['Sunday', 'Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday'];

export interface ConversationEpisode {
  summary: string;
  topics: string[];
  valence: EmotionalValence;
  intensity: number;
  keyMoments?: string[];
  durationMinutes?: number;
}

/**
 * Importance of a whole conversation: longer and more intense sessions matter more.
 */
export function conversationImportance(intensity: number, durationMinutes: number): number {
  return Math.min(1, 0.4 + 0.3 * intensity + 0.3 * Math.min(1, durationMinutes / 60));
}

function pad2(n: number): string {
  return n.toString().padStart(2, '0');
}

/**
 * Time-stamped experiences ("remember when...").
 */
export class EpisodicMemory extends PersistentTier {
  readonly tier = 'episodic';

  async store(content: string, options: EpisodicStoreOptions = {}): Promise<MemoryEntry> {
    const input: EntryInput = { ...options, content };
    const entry = createEntry('episodic', input, { now: this.now() });
    return this.persist(entry);
  }

  async recall(query: string, limit: number = 5, options: EpisodicRecallOptions = {}): Promise<MemoryEntry[]> {
    if (limit <= 0) return [];

    const now = this.now();
    // Over-fetch so the filters below still leave enough
    let entries = await this.search(query, limit * 2);

    const window = options.timeWindow ?? 'all';
    if (window !== 'all') {
      const cutoff = now.getTime() - WINDOW_DAYS[window] * DAY_MS;
      entries = entries.filter((e) => e.createdAt.getTime() >= cutoff);
    }

    const minImportance = options.minImportance ?? 0;
    if (minImportance > 0) {
      entries = entries.filter((e) => effectiveImportance(e, now) >= minImportance);
    }

    const results = entries.slice(0, limit);
    await this.touch(results);
    return results;
  }

  /**
   * Episodes created within [start, end], newest first.
   */
  async recallByTime(start: Date, end: Date = this.now(), limit: number = 10): Promise<MemoryEntry[]> {
    return (await this.listEntries())
      .filter((e) => e.createdAt >= start && e.createdAt <= end)
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
      .slice(0, limit);
  }

  async recallEmotional(
    valence: EmotionalValence,
    minIntensity: number = 0.3,
    limit: number = 5
  ): Promise<MemoryEntry[]> {
    return (await this.listEntries({ emotionalValence: valence }))
      .filter((e) => e.emotionalIntensity >= minIntensity)
      .sort((a, b) => b.emotionalIntensity - a.emotionalIntensity)
      .slice(0, limit);
  }

  async getRecent(n: number = 5): Promise<MemoryEntry[]> {
    const now = this.now();
    return this.recallByTime(new Date(now.getTime() - 30 * DAY_MS), now, n);
  }

  /**
   * Episodes reachable from `episodeId` through `relatedIds`, at most
   * `depth` levels deep (the start episode is level one), oldest first.
   * A lookup failure ends the walk with whatever was already collected.
   */
  async getNarrativeThread(episodeId: string, depth: number = 3): Promise<MemoryEntry[]> {
    const visited = new Set<string>();
    const arena = new Map<string, MemoryEntry>();
    let frontier = [episodeId];

    for (let level = 0; level < depth && frontier.length > 0; level++) {
      const pending = frontier.filter((id) => !visited.has(id));
      pending.forEach((id) => visited.add(id));
      if (pending.length === 0) break;

      let found: MemoryEntry[];
      try {
        found = await this.getMany(pending);
      } catch (error) {
        this.context.logger.warn(`Narrative walk from ${episodeId} stopped early`, error);
        break;
      }

      const next: string[] = [];
      for (const entry of found) {
        arena.set(entry.id, entry);
        next.push(...entry.relatedIds.filter((id) => !visited.has(id)));
      }
      frontier = [...new Set(next)];
    }

    return [...arena.values()].sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime());
  }

  /**
   * Record a whole conversation as one episode, tagged with its topics.
   */
  async storeConversationEpisode(episode: ConversationEpisode): Promise<MemoryEntry> {
    const now = this.now();
    const durationMinutes = episode.durationMinutes ?? 0;

    return this.store(episode.summary, {
      importance: conversationImportance(episode.intensity, durationMinutes),
      emotionalValence: episode.valence,
      emotionalIntensity: episode.intensity,
      tags: episode.topics,
      source: 'conversation',
      metadata: toMetadata({
        type: 'conversation',
        topics: episode.topics,
        durationMinutes,
        keyMoments: episode.keyMoments ?? [],
        timeOfDay: `${pad2(now.getHours())}:${pad2(now.getMinutes())}`,
        dayOfWeek: WEEKDAYS[now.getDay()],
      }),
    });
  }
}
