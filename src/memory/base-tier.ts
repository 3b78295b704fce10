import type { Clock } from '../core/clock.js';
import { KeyedLock } from '../core/lock.js';
import type { Logger } from '../core/logger.js';
import type { IndexedDocument, SimilaritySearch, WhereFilter } from './vector-store.js';
import type { DurableTier, MemoryEntry, TierStore } from './types.js';
import { effectiveImportance, entryToRecord, markAccessed, recordToEntry } from './entry.js';

export interface TierContext {
  clock: Clock;
  logger: Logger;
}

/**
 * Shared plumbing for the tiers persisted in a similarity index.
 */
export abstract class PersistentTier implements TierStore {
  abstract readonly tier: DurableTier;

  // Serialises read-modify-write of a single entry
  private entryLocks = new KeyedLock();

  constructor(
    protected readonly collection: SimilaritySearch,
    protected readonly context: TierContext
  ) {}

  abstract recall(query: string, limit?: number): Promise<MemoryEntry[]>;

  protected now(): Date {
    return this.context.clock();
  }

  effectiveImportance(entry: MemoryEntry): number {
    return effectiveImportance(entry, this.now());
  }

  protected async persist(entry: MemoryEntry): Promise<MemoryEntry> {
    await this.collection.add(entry.id, entry.content, entryToRecord(entry));
    return entry;
  }

  protected async search(query: string, k: number, where?: WhereFilter): Promise<MemoryEntry[]> {
    const matches = await this.collection.query(query, k, where);
    return this.toEntries(matches);
  }

  protected async listEntries(where?: WhereFilter, limit?: number): Promise<MemoryEntry[]> {
    const docs = await this.collection.list({ where, limit });
    return this.toEntries(docs);
  }

  async getById(id: string): Promise<MemoryEntry | null> {
    const [entry] = await this.getMany([id]);
    return entry ?? null;
  }

  async getMany(ids: string[]): Promise<MemoryEntry[]> {
    const docs = await this.collection.get(ids);
    return this.toEntries(docs);
  }

  /**
   * Apply `change` to the freshest stored copy of an entry.
   * Returns null when the entry does not exist.
   */
  protected async mutate(
    id: string,
    change: (current: MemoryEntry) => MemoryEntry
  ): Promise<MemoryEntry | null> {
    return this.entryLocks.run(id, async () => {
      const current = await this.getById(id);
      if (!current) return null;

      const next = change(current);
      const contentChanged = next.content !== current.content;
      await this.collection.update(id, entryToRecord(next), contentChanged ? next.content : undefined);
      return next;
    });
  }

  /**
   * Bump access count and timestamp. Best effort: a failing backend is
   * logged and never fails the recall that triggered it.
   */
  protected async touch(entries: MemoryEntry[]): Promise<void> {
    const now = this.now();
    await Promise.all(
      entries.map(async (entry) => {
        try {
          await this.mutate(entry.id, (current) => markAccessed(current, now));
        } catch (error) {
          this.context.logger.warn(`Could not record access to ${entry.id}`, error);
        }
      })
    );
  }

  async delete(id: string): Promise<boolean> {
    return (await this.collection.delete([id])) > 0;
  }

  async count(): Promise<number> {
    return this.collection.count();
  }

  async list(limit?: number): Promise<MemoryEntry[]> {
    return this.listEntries(undefined, limit);
  }

  /**
   * Entries whose effective importance is at least `minImportance`, highest first.
   */
  async getByImportance(minImportance: number = 0.7, limit: number = 10): Promise<MemoryEntry[]> {
    const now = this.now();
    return (await this.listEntries())
      .map((entry) => ({ entry, score: effectiveImportance(entry, now) }))
      .filter(({ score }) => score >= minImportance)
      .sort((a, b) => b.score - a.score)
      .slice(0, limit)
      .map(({ entry }) => entry);
  }

  // Unreadable records are skipped rather than failing the whole read
  private toEntries(docs: IndexedDocument[]): MemoryEntry[] {
    const entries: MemoryEntry[] = [];
    for (const doc of docs) {
      try {
        entries.push(recordToEntry(doc.id, doc.text, doc.metadata));
      } catch (error) {
        this.context.logger.warn(`Skipping unreadable ${this.tier} record ${doc.id}`, error);
      }
    }
    return entries;
  }
}
