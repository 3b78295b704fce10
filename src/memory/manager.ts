import { systemClock, type Clock } from '../core/clock.js';
import { ContextBuilder, type ContextConfig } from '../core/context-builder.js';
import { SessionStateError } from '../core/errors.js';
import { generateId } from '../core/ids.js';
import { createConsoleLogger, type Logger } from '../core/logger.js';
import type { PersistentTier, TierContext } from './base-tier.js';
import { effectiveImportance } from './entry.js';
import { EpisodicMemory } from './episodic.js';
import { BeliefEvolution, GROWTH_COLLECTIONS, SurpriseJournal } from './growth.js';
import { LongTermMemory } from './longterm.js';
import { isDeprecated, SemanticMemory } from './semantic.js';
import type { LastSessionRecord, SharedStateStore } from './shared-state.js';
import {
  DURABLE_TIERS,
  MEMORY_TIERS,
  type DurableTier,
  type EmotionalValence,
  type EntryInput,
  type EpisodicStoreOptions,
  type LongTermStoreOptions,
  type MemoryEntry,
  type MemoryTier,
  type SemanticStoreOptions,
  type SessionFoundation,
} from './types.js';
import type { CollectionProvider } from './vector-store.js';
import { WorkingMemory, type ChatMessage, type TurnRole, type WorkingMemorySettings } from './working.js';

interface ActiveSession {
  id: string;
  startedAt: Date;
  // Set once the closing episode is stored, so a retried endSession does not store it twice
  closing?: { episode: MemoryEntry; record: LastSessionRecord };
}

export type SessionRestartPolicy = 'close-previous' | 'reject';

export interface MemoryManagerSettings {
  working: Partial<WorkingMemorySettings>;
  consolidationInterval: number;
  sessionRestart: SessionRestartPolicy;
  context: Partial<ContextConfig>;
}

export const DEFAULT_MANAGER_SETTINGS: MemoryManagerSettings = {
  working: {},
  consolidationInterval: 10,
  sessionRestart: 'close-previous',
  context: {},
};

export interface MemoryManagerOptions {
  backend: CollectionProvider;
  sharedState: SharedStateStore;
  logger?: Logger;
  clock?: Clock;
  settings?: Partial<MemoryManagerSettings>;
}

export const TIER_COLLECTIONS: Record<DurableTier, string> = {
  episodic: 'episodic',
  semantic: 'semantic',
  longterm: 'longterm',
};

export type RememberRequest =
  | ({ tier: 'episodic' } & EpisodicStoreOptions)
  | ({ tier: 'semantic' } & SemanticStoreOptions)
  | ({ tier: 'longterm' } & LongTermStoreOptions)
  | ({ tier: 'working' } & Omit<EntryInput, 'content'>);

export interface RecallOptions {
  limit?: number;
  tiers?: readonly DurableTier[];
  includeWorking?: boolean;
}

export interface SessionContext {
  sessionId: string;
  isFirstSession: boolean;
  timeSince: string | null;
  lastSession: LastSessionRecord | null;
  foundation: SessionFoundation;
  recentEpisodes: string[];
}

export interface EndSessionOptions {
  summary?: string;
  topics?: string[];
  emotionalSummary?: { valence: EmotionalValence; intensity: number };
}

export interface ConsolidationResult {
  importantEpisodes: number;
  positiveEpisodes: number;
  patternSummary: MemoryEntry | null;
  relationshipEssence: MemoryEntry | null;
}

export type RecentMood = 'positive' | 'challenging' | 'mixed';

export interface Reflection {
  counts: Record<DurableTier, number>;
  consolidationSuggested: boolean;
  consolidation: ConsolidationResult | null;
  recentMood: RecentMood | null;
  insights: string[];
  summary: string;
}

export interface MemoryStats {
  episodic: number;
  semantic: number;
  longterm: number;
  workingTurns: number;
  workingRetrieved: number;
  sessionActive: boolean;
  sessionDurationMinutes: number;
}

const CONSOLIDATION_MIN_IMPORTANCE = 0.7;
const CONSOLIDATION_EPISODE_CAP = 20;
const POSITIVE_MIN_INTENSITY = 0.5;
const POSITIVE_EPISODE_CAP = 10;
const REFLECT_CONSOLIDATION_THRESHOLD = 50;
const RELATIONSHIP_KEY = 'positive-moments';

/**
 * Falls back to semantic for anything that is not a known tier name.
 */
export function resolveTier(value: string | undefined): MemoryTier {
  return MEMORY_TIERS.find((tier) => tier === value) ?? 'semantic';
}

function plural(n: number, unit: string): string {
  return `${n} ${unit}${n === 1 ? '' : 's'}`;
}

/**
 * Human-readable gap between two instants: "2 days", "1 hour", "just now".
 */
export function describeTimeSince(then: Date, now: Date): string {
  const seconds = Math.floor((now.getTime() - then.getTime()) / 1000);
  const days = Math.floor(seconds / 86_400);

  if (days > 0) return plural(days, 'day');
  if (seconds >= 3600) return plural(Math.floor(seconds / 3600), 'hour');
  if (seconds >= 60) return plural(Math.floor(seconds / 60), 'minute');
  return 'just now';
}

/**
 * Coordinates the four tiers: session lifecycle, routing of stores,
 * cross-tier recall and consolidation into long-term memory.
 */
export class MemoryManager {
  readonly working: WorkingMemory;
  readonly episodic: EpisodicMemory;
  readonly semantic: SemanticMemory;
  readonly longterm: LongTermMemory;
  readonly beliefs: BeliefEvolution;
  readonly surprises: SurpriseJournal;

  private sharedState: SharedStateStore;
  private logger: Logger;
  private clock: Clock;
  private settings: MemoryManagerSettings;
  private contextBuilder: ContextBuilder;

  private session: ActiveSession | null = null;

  constructor(options: MemoryManagerOptions) {
    this.sharedState = options.sharedState;
    this.logger = options.logger ?? createConsoleLogger();
    this.clock = options.clock ?? systemClock;
    this.settings = { ...DEFAULT_MANAGER_SETTINGS, ...options.settings };

    const context: TierContext = { clock: this.clock, logger: this.logger };
    this.working = new WorkingMemory(this.settings.working, this.clock);
    this.episodic = new EpisodicMemory(options.backend.collection(TIER_COLLECTIONS.episodic), context);
    this.semantic = new SemanticMemory(options.backend.collection(TIER_COLLECTIONS.semantic), context);
    this.longterm = new LongTermMemory(options.backend.collection(TIER_COLLECTIONS.longterm), context);
    this.beliefs = new BeliefEvolution(options.backend.collection(GROWTH_COLLECTIONS.beliefs), context);
    this.surprises = new SurpriseJournal(options.backend.collection(GROWTH_COLLECTIONS.surprises), context);
    this.contextBuilder = new ContextBuilder(this.settings.context);
  }

  get sessionId(): string | null {
    return this.session?.id ?? null;
  }

  // ===========================================================================
  // Session lifecycle
  // ===========================================================================

  async startSession(): Promise<SessionContext> {
    if (this.session) {
      if (this.settings.sessionRestart === 'reject') {
        throw new SessionStateError(`Session ${this.session.id} is still active`);
      }
      this.logger.debug(`Closing session ${this.session.id} before starting a new one`);
      await this.endSession();
    }

    const now = this.clock();
    this.working.clear();

    const [foundation, state, recent] = await Promise.all([
      this.longterm.getSessionFoundation(),
      this.sharedState.read(),
      this.episodic.getRecent(3),
    ]);

    for (const episode of recent) {
      this.working.addRetrieved(episode);
    }

    const lastSession = state.lastConversation ?? null;
    const timeSince = lastSession ? describeTimeSince(new Date(lastSession.endedAt), now) : null;

    this.working.flags = {
      ...this.working.flags,
      isFirstSession: timeSince === null,
      timeSinceLast: timeSince,
      lastSession,
    };

    this.session = { id: generateId('session', now), startedAt: now };

    return {
      sessionId: this.session.id,
      isFirstSession: timeSince === null,
      timeSince,
      lastSession,
      foundation,
      recentEpisodes: recent.map((e) => e.content),
    };
  }

  /**
   * Store the session as one conversation episode and publish it to the
   * shared state. Returns null when no session is active.
   *
   * If publishing fails the session stays active; calling again publishes
   * the episode already stored instead of storing another.
   */
  async endSession(options: EndSessionOptions = {}): Promise<MemoryEntry | null> {
    const session = this.session;
    if (!session) return null;

    if (!session.closing) {
      session.closing = await this.storeClosingEpisode(session, options);
    }
    const { episode, record } = session.closing;

    await this.sharedState.merge({ lastConversation: record });
    await this.afterEpisodicStore();

    this.working.clear();
    this.session = null;
    return episode;
  }

  private async storeClosingEpisode(
    session: ActiveSession,
    options: EndSessionOptions
  ): Promise<{ episode: MemoryEntry; record: LastSessionRecord }> {
    const summary = options.summary ?? this.generateSessionSummary();
    const topics = options.topics ?? [...this.working.activeTopics];
    const { valence, intensity } = options.emotionalSummary ?? this.working.emotionalState;
    const durationMinutes = this.working.getSessionDuration();

    const episode = await this.episodic.storeConversationEpisode({
      summary,
      topics,
      valence,
      intensity,
      keyMoments: this.extractKeyMoments(),
      durationMinutes,
    });

    return {
      episode,
      record: {
        endedAt: this.clock().toISOString(),
        sessionId: session.id,
        summary,
        topics,
        durationMinutes,
        emotionalValence: valence,
        messageCount: this.working.conversation.length,
      },
    };
  }

  // ===========================================================================
  // Memory operations
  // ===========================================================================

  async remember(content: string, request: RememberRequest = { tier: 'semantic' }): Promise<MemoryEntry> {
    switch (request.tier) {
      case 'episodic': {
        const { tier: _tier, ...options } = request;
        const entry = await this.episodic.store(content, options);
        await this.afterEpisodicStore();
        return entry;
      }
      case 'semantic': {
        const { tier: _tier, ...options } = request;
        return this.semantic.store(content, options);
      }
      case 'longterm': {
        const { tier: _tier, ...options } = request;
        return this.longterm.store(content, options);
      }
      case 'working': {
        const { tier: _tier, ...options } = request;
        return this.working.store({ ...options, content });
      }
    }
  }

  /**
   * Search the selected tiers, merge by id and rank by effective
   * importance. Results are echoed into working memory.
   */
  async recall(query: string, options: RecallOptions = {}): Promise<MemoryEntry[]> {
    const limit = options.limit ?? 5;
    const tiers = options.tiers ?? DURABLE_TIERS;
    const includeWorking = options.includeWorking ?? true;
    if (limit <= 0) return [];

    const results: MemoryEntry[] = [];

    if (tiers.length > 0) {
      const perStore = Math.max(2, Math.floor(limit / tiers.length));
      const byTier = await Promise.all([
        tiers.includes('longterm') ? this.longterm.recall(query, perStore) : [],
        tiers.includes('semantic') ? this.semantic.recall(query, perStore) : [],
        tiers.includes('episodic') ? this.episodic.recall(query, perStore) : [],
      ]);
      results.push(...byTier.flat());
    }

    if (includeWorking) {
      const allowed = new Set<MemoryTier>(['working', ...tiers]);
      const echoes = this.working.getRelevantRetrieved(query, 2).filter((e) => allowed.has(e.tier));
      results.push(...(await this.refreshEchoes(echoes)));
    }

    const seen = new Set<string>();
    const now = this.clock();
    const ranked = results
      .filter((entry) => {
        if (seen.has(entry.id)) return false;
        seen.add(entry.id);
        return true;
      })
      .map((entry) => ({ entry, score: effectiveImportance(entry, now) }))
      .sort((a, b) => b.score - a.score)
      .slice(0, limit)
      .map(({ entry }) => entry);

    for (const entry of ranked) {
      this.working.addRetrieved(entry);
    }
    return ranked;
  }

  addConversationTurn(
    role: TurnRole,
    content: string,
    options: { topics?: string[]; emotionalTone?: EmotionalValence } = {}
  ): void {
    this.working.addTurn(role, content, options);
  }

  updateEmotionalState(valence: EmotionalValence, intensity: number, trigger?: string): void {
    this.working.updateEmotionalState(valence, intensity, trigger);
  }

  setFocus(focus: string | null): void {
    this.working.currentFocus = focus;
  }

  getConversationHistory(lastN: number = 10): ChatMessage[] {
    return this.working.getConversationHistory(lastN);
  }

  // ===========================================================================
  // Context building
  // ===========================================================================

  async buildContextForMessage(message: string): Promise<string> {
    const memories = await this.recall(message, { limit: 5 });
    const state = this.working.emotionalState;

    return this.contextBuilder.build({
      memories,
      mood: this.working.isMoodSignificant() ? { valence: state.valence, intensity: state.intensity } : null,
      activeTopics: this.working.activeTopics,
    }).text;
  }

  buildSystemPromptAdditions(): Promise<string> {
    return this.longterm.buildIdentityPrompt();
  }

  // ===========================================================================
  // Consolidation
  // ===========================================================================

  /**
   * Consolidates once `consolidationInterval` episodes have been stored
   * since the last run. The watermark lives in the shared state.
   */
  private async maybeConsolidate(): Promise<ConsolidationResult | null> {
    const count = await this.episodic.count();
    const state = await this.sharedState.read();
    let watermark = state.consolidation?.lastEpisodicCount ?? 0;

    // Episodes were purged since the last run
    if (count < watermark) {
      watermark = count;
      await this.sharedState.merge({
        consolidation: { ...state.consolidation, lastEpisodicCount: count },
      });
    }

    if (count - watermark < this.settings.consolidationInterval) {
      return null;
    }
    return this.consolidateMemories();
  }

  // A failed automatic consolidation never fails the store that triggered it
  private async afterEpisodicStore(): Promise<void> {
    try {
      const result = await this.maybeConsolidate();
      if (result) {
        this.logger.debug(`Consolidated ${result.importantEpisodes} important episodes`);
      }
    } catch (error) {
      this.logger.warn('Automatic consolidation failed', error);
    }
  }

  async consolidateMemories(): Promise<ConsolidationResult> {
    const [important, positive] = await Promise.all([
      this.episodic.getByImportance(CONSOLIDATION_MIN_IMPORTANCE, CONSOLIDATION_EPISODE_CAP),
      this.episodic.recallEmotional('positive', POSITIVE_MIN_INTENSITY, POSITIVE_EPISODE_CAP),
    ]);

    let patternSummary: MemoryEntry | null = null;
    if (important.length >= 3) {
      const top = important.slice(0, 5);
      const combined = top.map((e) => e.content).join(' | ');
      patternSummary = await this.longterm.store(`Recent significant experiences: ${combined.slice(0, 500)}`, {
        consolidationType: 'pattern',
        sourceIds: top.map((e) => e.id),
      });
    }

    let relationshipEssence: MemoryEntry | null = null;
    if (positive.length > 0) {
      const top = positive.slice(0, 3);
      const combined = top.map((e) => e.content).join(' | ');
      relationshipEssence = await this.longterm.storeOrRefresh(
        RELATIONSHIP_KEY,
        `Positive moments: ${combined.slice(0, 400)}`,
        {
          consolidationType: 'relationship',
          importance: 0.95,
          emotionalValence: 'positive',
          emotionalIntensity: 0.7,
          tags: ['relationship', 'user'],
          sourceIds: top.map((e) => e.id),
        }
      );
    }

    const count = await this.episodic.count();
    await this.sharedState.merge({
      consolidation: { lastEpisodicCount: count, lastRunAt: this.clock().toISOString() },
    });

    return {
      importantEpisodes: important.length,
      positiveEpisodes: positive.length,
      patternSummary,
      relationshipEssence,
    };
  }

  async reflect(): Promise<Reflection> {
    const counts = await this.countTiers();
    const insights = [
      `Memory stats: ${counts.episodic} episodes, ${counts.semantic} facts, ${counts.longterm} core memories`,
    ];

    const consolidationSuggested = counts.episodic > REFLECT_CONSOLIDATION_THRESHOLD;
    let consolidation: ConsolidationResult | null = null;
    if (consolidationSuggested) {
      insights.push('Many episodic memories - consolidation recommended');
      consolidation = await this.consolidateMemories();
    }

    let recentMood: RecentMood | null = null;
    const recent = await this.episodic.getRecent(5);
    if (recent.length > 0) {
      const positive = recent.filter((e) => e.emotionalValence === 'positive').length;
      if (positive >= 3) {
        recentMood = 'positive';
        insights.push('Recent conversations have been positive');
      } else if (positive <= 1) {
        recentMood = 'challenging';
        insights.push('Recent conversations have had some challenges');
      } else {
        recentMood = 'mixed';
      }
    }

    return {
      counts,
      consolidationSuggested,
      consolidation,
      recentMood,
      insights,
      summary: insights.join(' | '),
    };
  }

  async getStats(): Promise<MemoryStats> {
    const counts = await this.countTiers();
    return {
      ...counts,
      workingTurns: this.working.conversation.length,
      workingRetrieved: this.working.retrievedMemories.length,
      sessionActive: this.session !== null,
      sessionDurationMinutes: this.session ? this.working.getSessionDuration() : 0,
    };
  }

  // ===========================================================================
  // Helpers
  // ===========================================================================

  private tierStore(tier: DurableTier): PersistentTier {
    switch (tier) {
      case 'episodic':
        return this.episodic;
      case 'semantic':
        return this.semantic;
      case 'longterm':
        return this.longterm;
    }
  }

  /**
   * Working memory holds copies taken at recall time. Re-read each from its
   * tier; copies whose entry was deleted or superseded since are dropped
   * from working memory too.
   */
  private async refreshEchoes(echoes: MemoryEntry[]): Promise<MemoryEntry[]> {
    const fresh: MemoryEntry[] = [];
    for (const echo of echoes) {
      if (echo.tier === 'working') {
        fresh.push(echo);
        continue;
      }
      const current = await this.tierStore(echo.tier).getById(echo.id);
      if (!current || isDeprecated(current)) {
        await this.working.delete(echo.id);
        continue;
      }
      fresh.push(current);
    }
    return fresh;
  }

  private async countTiers(): Promise<Record<DurableTier, number>> {
    const [episodic, semantic, longterm] = await Promise.all([
      this.episodic.count(),
      this.semantic.count(),
      this.longterm.count(),
    ]);
    return { episodic, semantic, longterm };
  }

  private generateSessionSummary(): string {
    const turns = this.working.conversation;
    if (turns.length === 0) return 'No conversation occurred.';

    const firstUser = turns.find((t) => t.role === 'user');
    const firstTopic = firstUser ? firstUser.content.slice(0, 100) : 'general chat';
    const topics = this.working.activeTopics.length > 0
      ? this.working.activeTopics.slice(0, 3).join(', ')
      : 'various topics';
    const duration = this.working.getSessionDuration().toFixed(1);

    return `Conversation with ${turns.length} messages over ${duration} minutes. Started with: ${firstTopic}. Topics: ${topics}`;
  }

  private extractKeyMoments(): string[] {
    const moments: string[] = [];

    for (const turn of this.working.conversation) {
      if (turn.content.length > 200) {
        moments.push(`${turn.content.slice(0, 100)}...`);
      }
      if (turn.emotionalTone === 'positive' || turn.emotionalTone === 'negative') {
        moments.push(`[${turn.emotionalTone}] ${turn.content.slice(0, 80)}...`);
      }
    }

    return moments.slice(0, 5);
  }
}
