import { z } from 'zod';
import { ValidationError } from '../core/errors.js';
import { generateId } from '../core/ids.js';
import {
  EMOTIONAL_VALENCES,
  MEMORY_TIERS,
  type EntryInput,
  type EntryMetadata,
  type MemoryEntry,
  type MemoryTier,
  type MetadataValue,
} from './types.js';

export const DEFAULT_DECAY_RATE: Record<MemoryTier, number> = {
  working: 0.1,
  episodic: 0.05,
  semantic: 0.01,
  longterm: 0,
};

export const ID_PREFIX: Record<MemoryTier, string> = {
  working: 'work',
  episodic: 'episode',
  semantic: 'fact',
  longterm: 'core',
};

const MIN_DECAY_FACTOR = 0.1;
const MAX_ACCESS_BOOST = 0.3;
const ACCESS_BOOST_STEP = 0.02;

export function clamp01(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

export function decayFactor(hoursSinceAccess: number, decayRate: number): number {
  const hours = Math.max(0, hoursSinceAccess);
  return Math.max(MIN_DECAY_FACTOR, 1 - (decayRate * hours) / 24);
}

export function accessBoost(accessCount: number): number {
  return Math.min(MAX_ACCESS_BOOST, Math.max(0, accessCount) * ACCESS_BOOST_STEP);
}

/**
 * Time- and access-adjusted ranking score in [0, 1].
 *
 * Decay runs from the last access, or from creation for entries never recalled.
 */
export function effectiveImportance(entry: MemoryEntry, now: Date = new Date()): number {
  const reference = entry.lastAccessedAt ?? entry.createdAt;
  const hours = (now.getTime() - reference.getTime()) / 3_600_000;
  const score = entry.importance * decayFactor(hours, entry.decayRate) + accessBoost(entry.accessCount);
  return clamp01(Math.min(1, score));
}

export function markAccessed(entry: MemoryEntry, now: Date): MemoryEntry {
  return { ...entry, accessCount: entry.accessCount + 1, lastAccessedAt: now };
}

const MetadataValueSchema: z.ZodType<MetadataValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(MetadataValueSchema),
    z.record(MetadataValueSchema),
  ])
);

export const EntryMetadataSchema = z.record(MetadataValueSchema);

const unit = z.number().min(0).max(1);

export const EntryInputSchema = z.object({
  content: z.string().refine((s) => s.trim().length > 0, 'must not be blank'),
  importance: unit.optional(),
  emotionalValence: z.enum(EMOTIONAL_VALENCES).optional(),
  emotionalIntensity: unit.optional(),
  tags: z.array(z.string()).optional(),
  source: z.string().min(1).optional(),
  relatedIds: z.array(z.string()).optional(),
  metadata: EntryMetadataSchema.optional(),
});

function unique(values: string[]): string[] {
  return [...new Set(values.filter((v) => v.length > 0))];
}

export interface EntryDefaults {
  now: Date;
  importance?: number;
  source?: string;
  decayRate?: number;
}

/**
 * Validate caller input and build a fresh entry for `tier`.
 */
export function createEntry(tier: MemoryTier, input: EntryInput, defaults: EntryDefaults): MemoryEntry {
  const parsed = EntryInputSchema.safeParse(input);
  if (!parsed.success) {
    throw ValidationError.fromZod(`${tier} memory`, parsed.error);
  }
  const value = parsed.data;

  return {
    id: generateId(ID_PREFIX[tier], defaults.now),
    content: value.content,
    tier,
    createdAt: defaults.now,
    importance: value.importance ?? defaults.importance ?? 0.5,
    emotionalValence: value.emotionalValence ?? 'neutral',
    emotionalIntensity: value.emotionalIntensity ?? 0,
    tags: unique(value.tags ?? []),
    source: value.source ?? defaults.source ?? 'conversation',
    relatedIds: unique(value.relatedIds ?? []),
    accessCount: 0,
    decayRate: defaults.decayRate ?? DEFAULT_DECAY_RATE[tier],
    metadata: value.metadata ?? {},
  };
}

// Persisted shape: everything but id and content, which the index keeps itself.
export const EntryRecordSchema = z.object({
  tier: z.enum(MEMORY_TIERS),
  createdAt: z.string().datetime(),
  importance: unit,
  emotionalValence: z.enum(EMOTIONAL_VALENCES),
  emotionalIntensity: unit,
  tags: z.array(z.string()),
  source: z.string(),
  relatedIds: z.array(z.string()),
  accessCount: z.number().int().min(0),
  lastAccessedAt: z.string().datetime().nullable(),
  decayRate: unit,
  metadata: EntryMetadataSchema,
});

export type EntryRecord = z.infer<typeof EntryRecordSchema>;

export function entryToRecord(entry: MemoryEntry): EntryRecord {
  return {
    tier: entry.tier,
    createdAt: entry.createdAt.toISOString(),
    importance: entry.importance,
    emotionalValence: entry.emotionalValence,
    emotionalIntensity: entry.emotionalIntensity,
    tags: [...entry.tags],
    source: entry.source,
    relatedIds: [...entry.relatedIds],
    accessCount: entry.accessCount,
    lastAccessedAt: entry.lastAccessedAt ? entry.lastAccessedAt.toISOString() : null,
    decayRate: entry.decayRate,
    metadata: entry.metadata,
  };
}

export function recordToEntry(id: string, content: string, raw: EntryMetadata): MemoryEntry {
  const parsed = EntryRecordSchema.safeParse(raw);
  if (!parsed.success) {
    throw ValidationError.fromZod(`stored memory ${id}`, parsed.error);
  }
  const record = parsed.data;

  const entry: MemoryEntry = {
    id,
    content,
    tier: record.tier,
    createdAt: new Date(record.createdAt),
    importance: record.importance,
    emotionalValence: record.emotionalValence,
    emotionalIntensity: record.emotionalIntensity,
    tags: record.tags,
    source: record.source,
    relatedIds: record.relatedIds,
    accessCount: record.accessCount,
    decayRate: record.decayRate,
    metadata: record.metadata,
  };
  if (record.lastAccessedAt) {
    entry.lastAccessedAt = new Date(record.lastAccessedAt);
  }
  return entry;
}

export function metadataString(metadata: EntryMetadata, key: string): string | undefined {
  const value = metadata[key];
  return typeof value === 'string' ? value : undefined;
}

export function metadataNumber(metadata: EntryMetadata, key: string): number | undefined {
  const value = metadata[key];
  return typeof value === 'number' ? value : undefined;
}

export function metadataBoolean(metadata: EntryMetadata, key: string): boolean {
  return metadata[key] === true;
}

export function toMetadata(value: Record<string, MetadataValue | undefined>): EntryMetadata {
  const out: EntryMetadata = {};
  for (const [key, v] of Object.entries(value)) {
    if (v !== undefined) out[key] = v;
  }
  return out;
}
