import { systemClock, type Clock } from '../core/clock.js';
import { tokenize } from './embeddings.js';
import { createEntry, effectiveImportance } from './entry.js';
import type { LastSessionRecord } from './shared-state.js';
import type { EmotionalValence, EntryInput, MemoryEntry, TierStore } from './types.js';

export type TurnRole = 'user' | 'assistant';

export interface ConversationTurn {
  role: TurnRole;
  content: string;
  timestamp: Date;
  emotionalTone?: EmotionalValence;
  topics: string[];
}

export interface ChatMessage {
  role: TurnRole;
  content: string;
}

export interface EmotionalState {
  valence: EmotionalValence;
  intensity: number;
  triggers: string[];
}

export interface SessionFlags {
  isFirstSession: boolean;
  timeSinceLast: string | null;
  lastSession: LastSessionRecord | null;
  conversationDepth: number;
}

export interface WorkingMemorySettings {
  maxTurns: number;
  maxRetrieved: number;
  topicWindow: number;
}

export const DEFAULT_WORKING_SETTINGS: WorkingMemorySettings = {
  maxTurns: 20,
  maxRetrieved: 10,
  topicWindow: 10,
};

const MAX_TRIGGERS = 5;
const MOOD_THRESHOLD = 0.3;

export interface WorkingSnapshot {
  sessionStart: string;
  conversationTurns: number;
  retrievedMemories: number;
  emotionalState: { valence: EmotionalValence; intensity: number };
  activeTopics: string[];
  currentFocus: string | null;
  flags: SessionFlags;
}

function freshEmotionalState(): EmotionalState {
  return { valence: 'neutral', intensity: 0, triggers: [] };
}

function freshFlags(): SessionFlags {
  return { isFirstSession: false, timeSinceLast: null, lastSession: null, conversationDepth: 0 };
}

/**
 * Session-scoped context: recent turns, memories pulled in from the durable
 * tiers, emotional state and active topics. Nothing here is persisted.
 */
export class WorkingMemory implements TierStore {
  readonly tier = 'working';

  private settings: WorkingMemorySettings;
  private clock: Clock;

  private turns: ConversationTurn[] = [];
  private retrieved: MemoryEntry[] = [];
  private topics: string[] = [];
  private emotional: EmotionalState = freshEmotionalState();
  private sessionStart: Date;

  currentFocus: string | null = null;
  flags: SessionFlags = freshFlags();

  constructor(settings: Partial<WorkingMemorySettings> = {}, clock: Clock = systemClock) {
    this.settings = { ...DEFAULT_WORKING_SETTINGS, ...settings };
    this.clock = clock;
    this.sessionStart = clock();
  }

  get activeTopics(): readonly string[] {
    return this.topics;
  }

  get emotionalState(): Readonly<EmotionalState> {
    return this.emotional;
  }

  get conversation(): readonly ConversationTurn[] {
    return this.turns;
  }

  get retrievedMemories(): readonly MemoryEntry[] {
    return this.retrieved;
  }

  addTurn(
    role: TurnRole,
    content: string,
    options: { emotionalTone?: EmotionalValence; topics?: string[] } = {}
  ): ConversationTurn {
    const turn: ConversationTurn = {
      role,
      content,
      timestamp: this.clock(),
      emotionalTone: options.emotionalTone,
      topics: options.topics ?? [],
    };
    this.turns.push(turn);

    for (const topic of turn.topics) {
      if (!this.topics.includes(topic)) {
        this.topics.push(topic);
      }
    }
    this.topics = this.topics.slice(-this.settings.topicWindow);

    if (this.turns.length > this.settings.maxTurns) {
      this.turns = this.turns.slice(-this.settings.maxTurns);
    }

    this.flags.conversationDepth = this.turns.length;
    return turn;
  }

  /**
   * Pull an entry into the session. A copy already present is refreshed;
   * over capacity, the lowest effective importance is evicted.
   */
  addRetrieved(entry: MemoryEntry): void {
    const existing = this.retrieved.findIndex((m) => m.id === entry.id);
    if (existing >= 0) {
      this.retrieved[existing] = entry;
      return;
    }

    this.retrieved.push(entry);

    if (this.retrieved.length > this.settings.maxRetrieved) {
      const now = this.clock();
      this.retrieved = this.retrieved
        .map((m) => ({ m, score: effectiveImportance(m, now) }))
        .sort((a, b) => b.score - a.score)
        .slice(0, this.settings.maxRetrieved)
        .map(({ m }) => m);
    }
  }

  /** Note a session-only thought; it is dropped when the session ends. */
  store(input: EntryInput): MemoryEntry {
    const entry = createEntry('working', input, { now: this.clock() });
    this.addRetrieved(entry);
    return entry;
  }

  async recall(query: string, limit: number = 5): Promise<MemoryEntry[]> {
    return this.getRelevantRetrieved(query, limit);
  }

  /**
   * Rank pulled-in entries by word overlap with `query` blended with
   * effective importance.
   */
  getRelevantRetrieved(query: string, n: number = 3): MemoryEntry[] {
    if (this.retrieved.length === 0 || n <= 0) return [];

    const now = this.clock();
    const queryWords = new Set(tokenize(query));

    return this.retrieved
      .map((entry) => {
        const overlap = new Set(tokenize(entry.content).filter((w) => queryWords.has(w))).size;
        return { entry, score: overlap * 0.5 + effectiveImportance(entry, now) * 0.5 };
      })
      .sort((a, b) => b.score - a.score)
      .slice(0, n)
      .map(({ entry }) => entry);
  }

  getConversationHistory(lastN?: number): ChatMessage[] {
    const turns = lastN !== undefined && lastN > 0 ? this.turns.slice(-lastN) : this.turns;
    return turns.map((t) => ({ role: t.role, content: t.content }));
  }

  updateEmotionalState(valence: EmotionalValence, intensity: number, trigger?: string): void {
    // Smoothed so a single turn cannot swing the mood outright
    this.emotional.intensity = this.emotional.intensity * 0.3 + intensity * 0.7;
    this.emotional.valence = valence;

    if (trigger) {
      this.emotional.triggers = [...this.emotional.triggers, trigger].slice(-MAX_TRIGGERS);
    }
  }

  isMoodSignificant(): boolean {
    return this.emotional.intensity > MOOD_THRESHOLD;
  }

  getSessionDuration(): number {
    return (this.clock().getTime() - this.sessionStart.getTime()) / 60_000;
  }

  getWordCount(): number {
    return this.turns.reduce((sum, t) => sum + t.content.split(/\s+/).filter(Boolean).length, 0);
  }

  getContextSummary(): string {
    const parts: string[] = [];

    if (this.isMoodSignificant()) {
      parts.push(`Current mood: ${this.emotional.valence} (intensity: ${this.emotional.intensity.toFixed(1)})`);
    }
    if (this.topics.length > 0) {
      parts.push(`Active topics: ${this.topics.slice(-5).join(', ')}`);
    }
    if (this.currentFocus) {
      parts.push(`Current focus: ${this.currentFocus}`);
    }
    if (this.retrieved.length > 0) {
      parts.push(`Relevant memories loaded: ${this.retrieved.length}`);
    }

    return parts.length > 0 ? parts.join(' | ') : 'Fresh conversation';
  }

  async count(): Promise<number> {
    return this.retrieved.length;
  }

  async delete(id: string): Promise<boolean> {
    const before = this.retrieved.length;
    this.retrieved = this.retrieved.filter((m) => m.id !== id);
    return this.retrieved.length < before;
  }

  clear(): void {
    this.turns = [];
    this.retrieved = [];
    this.topics = [];
    this.currentFocus = null;
    this.emotional = freshEmotionalState();
    this.flags = freshFlags();
    this.sessionStart = this.clock();
  }

  snapshot(): WorkingSnapshot {
    return {
      sessionStart: this.sessionStart.toISOString(),
      conversationTurns: this.turns.length,
      retrievedMemories: this.retrieved.length,
      emotionalState: { valence: this.emotional.valence, intensity: this.emotional.intensity },
      activeTopics: [...this.topics],
      currentFocus: this.currentFocus,
      flags: { ...this.flags },
    };
  }
}
