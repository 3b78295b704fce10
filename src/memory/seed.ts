import * as fs from 'fs';
import { z } from 'zod';
import { errorMessage, NotFoundError, ValidationError } from '../core/errors.js';
import type { MemoryManager } from './manager.js';
import { EMOTIONAL_VALENCES, KNOWLEDGE_CATEGORIES } from './types.js';

const unit = z.number().min(0).max(1);
const content = z.string().trim().min(1);

const IdentitySeedSchema = z.union([
  content.transform((c) => ({ content: c, importance: 0.9 })),
  z.object({ content, importance: unit.default(0.9) }),
]);

const RelationshipSeedSchema = z.union([
  content.transform((c) => ({ content: c, valence: 'positive' as const, intensity: 0.5 })),
  z.object({
    content,
    valence: z.enum(EMOTIONAL_VALENCES).default('positive'),
    intensity: unit.default(0.5),
  }),
]);

const MilestoneSeedSchema = z.union([
  content.transform((c) => ({ content: c, valence: 'positive' as const, date: undefined })),
  z.object({
    content,
    valence: z.enum(EMOTIONAL_VALENCES).default('positive'),
    date: z.string().date().optional(),
  }),
]);

const FactSeedSchema = z.object({
  content,
  category: z.enum(KNOWLEDGE_CATEGORIES).default('world_knowledge'),
  confidence: unit.default(0.9),
  importance: unit.optional(),
  tags: z.array(z.string()).default([]),
});

const PreferenceSeedSchema = z.union([
  content.transform((c) => ({ content: c, confidence: 0.8 })),
  z.object({ content, confidence: unit.default(0.8) }),
]);

export const SeedFileSchema = z.object({
  identity: z.array(IdentitySeedSchema).default([]),
  beliefs: z.array(content).default([]),
  relationship: z.array(RelationshipSeedSchema).default([]),
  lessons: z.array(content).default([]),
  milestones: z.array(MilestoneSeedSchema).default([]),
  facts: z.array(FactSeedSchema).default([]),
  preferences: z.array(PreferenceSeedSchema).default([]),
});

export type SeedFile = z.infer<typeof SeedFileSchema>;

export interface SeedResult {
  identity: number;
  beliefs: number;
  relationship: number;
  lessons: number;
  milestones: number;
  facts: number;
  preferences: number;
}

const SEED_SOURCE = 'foundational';

export function parseSeed(raw: unknown): SeedFile {
  const result = SeedFileSchema.safeParse(raw);
  if (!result.success) {
    throw ValidationError.fromZod('seed file', result.error);
  }
  return result.data;
}

/**
 * Store a parsed seed. Entries are written in file order, section by
 * section; a failure stops the run with earlier entries kept.
 */
export async function applySeed(manager: MemoryManager, seed: SeedFile): Promise<SeedResult> {
  const { longterm, semantic } = manager;

  for (const item of seed.identity) {
    await longterm.storeIdentityMarker(item.content, item.importance);
  }
  for (const belief of seed.beliefs) {
    await longterm.storeCoreBelief(belief);
  }
  for (const item of seed.relationship) {
    await longterm.storeRelationshipEssence(item.content, item.valence, item.intensity);
  }
  for (const lesson of seed.lessons) {
    await longterm.storeLesson(lesson);
  }
  for (const item of seed.milestones) {
    await longterm.storeMilestone(item.content, item.date ? new Date(item.date) : undefined, item.valence);
  }
  for (const fact of seed.facts) {
    await semantic.store(fact.content, {
      category: fact.category,
      confidence: fact.confidence,
      importance: fact.importance,
      tags: fact.tags,
      source: SEED_SOURCE,
    });
  }
  for (const item of seed.preferences) {
    await semantic.storeUserPreference(item.content, item.confidence, SEED_SOURCE);
  }

  return {
    identity: seed.identity.length,
    beliefs: seed.beliefs.length,
    relationship: seed.relationship.length,
    lessons: seed.lessons.length,
    milestones: seed.milestones.length,
    facts: seed.facts.length,
    preferences: seed.preferences.length,
  };
}

export async function seedFromFile(manager: MemoryManager, filePath: string): Promise<SeedResult> {
  if (!fs.existsSync(filePath)) {
    throw new NotFoundError('Seed file', filePath);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new ValidationError(`Seed file ${filePath} is not valid JSON: ${errorMessage(error)}`);
  }

  return applySeed(manager, parseSeed(raw));
}
