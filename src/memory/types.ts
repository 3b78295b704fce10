// Four tiers: Working (session only), Episodic (experiences), Semantic (facts),
// LongTerm (consolidated, never decays)

export const MEMORY_TIERS = ['working', 'episodic', 'semantic', 'longterm'] as const;
export type MemoryTier = (typeof MEMORY_TIERS)[number];

/** Tiers backed by a persisted similarity index. */
export type DurableTier = Exclude<MemoryTier, 'working'>;
export const DURABLE_TIERS: readonly DurableTier[] = ['episodic', 'semantic', 'longterm'];

export const EMOTIONAL_VALENCES = ['positive', 'negative', 'neutral', 'mixed'] as const;
export type EmotionalValence = (typeof EMOTIONAL_VALENCES)[number];

export const KNOWLEDGE_CATEGORIES = [
  'user_preference',  // "Prefers concise answers"
  'user_fact',        // "Works on embedded tooling"
  'project_info',     // "The chat bot stores vectors in SQLite"
  'technical',
  'relationship',     // "We have been pairing since spring"
  'world_knowledge',
  'learned_behavior', // "'quick question' means a short answer"
] as const;
export type KnowledgeCategory = (typeof KNOWLEDGE_CATEGORIES)[number];

export const CONSOLIDATION_TYPES = [
  'core_belief',
  'relationship',
  'identity',
  'milestone',
  'lesson',
  'pattern',
] as const;
export type ConsolidationType = (typeof CONSOLIDATION_TYPES)[number];

export type MetadataValue =
  | string
  | number
  | boolean
  | null
  | MetadataValue[]
  | { [key: string]: MetadataValue };

export type EntryMetadata = { [key: string]: MetadataValue };

export interface MemoryEntry {
  id: string;
  content: string;
  tier: MemoryTier;
  createdAt: Date;
  importance: number;          // 0..1, before decay
  emotionalValence: EmotionalValence;
  emotionalIntensity: number;  // 0..1
  tags: string[];              // unique
  source: string;              // conversation, reflection, observation, consolidation...
  relatedIds: string[];        // weak references, may dangle
  accessCount: number;
  lastAccessedAt?: Date;
  decayRate: number;           // 0 = never fades
  metadata: EntryMetadata;
}

/**
 * Fields a caller may supply when storing. Tier stores fill in the rest.
 */
export interface EntryInput {
  content: string;
  importance?: number;
  emotionalValence?: EmotionalValence;
  emotionalIntensity?: number;
  tags?: string[];
  source?: string;
  relatedIds?: string[];
  metadata?: EntryMetadata;
}

export type TimeWindow = 'today' | 'week' | 'month' | 'all';

export interface EpisodicRecallOptions {
  timeWindow?: TimeWindow;
  minImportance?: number;
}

export interface SemanticRecallOptions {
  category?: KnowledgeCategory;
  minConfidence?: number;
}

export interface SemanticStoreOptions extends Omit<EntryInput, 'content' | 'emotionalValence' | 'emotionalIntensity'> {
  category?: KnowledgeCategory;
  confidence?: number;
  supersedes?: string;
}

export interface EpisodicStoreOptions extends Omit<EntryInput, 'content'> {}

export interface LongTermStoreOptions extends Omit<EntryInput, 'content' | 'source' | 'relatedIds'> {
  consolidationType?: ConsolidationType;
  sourceIds?: string[];
}

export interface SessionFoundation {
  identity: string[];
  relationship: string[];
  beliefs: string[];
  recentLessons: string[];
  milestones: string[];
}

/**
 * Common contract of every tier.
 */
export interface TierStore {
  readonly tier: MemoryTier;
  recall(query: string, limit?: number): Promise<MemoryEntry[]>;
  count(): Promise<number>;
  delete(id: string): Promise<boolean>;
}
