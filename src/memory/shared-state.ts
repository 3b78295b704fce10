import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { systemClock, type Clock } from '../core/clock.js';
import { silentLogger, type Logger } from '../core/logger.js';
import { EMOTIONAL_VALENCES } from './types.js';

export const LastSessionSchema = z.object({
  endedAt: z.string().datetime(),
  sessionId: z.string(),
  summary: z.string(),
  topics: z.array(z.string()),
  durationMinutes: z.number(),
  emotionalValence: z.enum(EMOTIONAL_VALENCES),
  messageCount: z.number().int().min(0),
});

export type LastSessionRecord = z.infer<typeof LastSessionSchema>;

export const ConsolidationWatermarkSchema = z.object({
  lastEpisodicCount: z.number().int().min(0),
  lastRunAt: z.string().optional(),
});

export type ConsolidationWatermark = z.infer<typeof ConsolidationWatermarkSchema>;

export const SharedStateSchema = z
  .object({
    lastConversation: LastSessionSchema.optional(),
    consolidation: ConsolidationWatermarkSchema.optional(),
    lastUpdated: z.string().optional(),
  })
  .passthrough();

export type SharedState = z.infer<typeof SharedStateSchema>;
export interface SharedStatePatch {
  lastConversation?: LastSessionRecord;
  consolidation?: ConsolidationWatermark;
}

/**
 * One document shared with out-of-process readers (a scheduler, another
 * session). Top-level keys are merged; nested values are replaced whole.
 */
export interface SharedStateStore {
  read(): Promise<SharedState>;
  merge(patch: SharedStatePatch): Promise<SharedState>;
}

function applyPatch(state: SharedState, patch: SharedStatePatch, now: Date): SharedState {
  return { ...state, ...patch, lastUpdated: now.toISOString() };
}

export class FileSharedState implements SharedStateStore {
  constructor(
    private filePath: string,
    private logger: Logger = silentLogger,
    private clock: Clock = systemClock
  ) {}

  async read(): Promise<SharedState> {
    if (!fs.existsSync(this.filePath)) {
      return {};
    }

    try {
      const raw: unknown = JSON.parse(fs.readFileSync(this.filePath, 'utf-8'));
      const parsed = SharedStateSchema.safeParse(raw);
      if (parsed.success) {
        return parsed.data;
      }
      this.logger.warn(`Ignoring malformed shared state at ${this.filePath}`, parsed.error);
    } catch (error) {
      this.logger.warn(`Could not read shared state at ${this.filePath}`, error);
    }
    return {};
  }

  async merge(patch: SharedStatePatch): Promise<SharedState> {
    const next = applyPatch(await this.read(), patch, this.clock());

    const dir = path.dirname(this.filePath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true, mode: 0o700 });
    }

    // Readers in other processes never see a half-written document
    const tmpPath = `${this.filePath}.${process.pid}.tmp`;
    fs.writeFileSync(tmpPath, JSON.stringify(next, null, 2), { mode: 0o600 });
    fs.renameSync(tmpPath, this.filePath);

    return next;
  }
}

export class InMemorySharedState implements SharedStateStore {
  private state: SharedState;

  constructor(
    initial: SharedState = {},
    private clock: Clock = systemClock
  ) {
    this.state = initial;
  }

  async read(): Promise<SharedState> {
    return structuredClone(this.state);
  }

  async merge(patch: SharedStatePatch): Promise<SharedState> {
    this.state = applyPatch(this.state, patch, this.clock());
    return structuredClone(this.state);
  }
}
