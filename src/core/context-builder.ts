import type { EmotionalValence, MemoryEntry, MemoryTier } from '../memory/types.js';

export interface ContextConfig {
  maxTokens: number;        // Total token budget
  memoryTokens: number;     // Reserved for recalled memories
  memoryPreviewChars: number;
}

export const DEFAULT_CONTEXT_CONFIG: ContextConfig = {
  maxTokens: 1500,
  memoryTokens: 1200,
  memoryPreviewChars: 200,
};

export interface ContextInput {
  memories: MemoryEntry[];
  mood: { valence: EmotionalValence; intensity: number } | null;
  activeTopics: readonly string[];
}

export interface BuiltContext {
  text: string;
  tokenEstimate: number;
  memoriesIncluded: number;
}

const TIER_LABELS: Record<MemoryTier, string> = {
  working: 'Working',
  episodic: 'Episodic',
  semantic: 'Semantic',
  longterm: 'Longterm',
};

export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}

function preview(content: string, maxChars: number): string {
  return content.length > maxChars ? `${content.slice(0, maxChars)}...` : content;
}

/**
 * Renders recalled memories and session state into a prompt section that
 * fits a token budget. Memories arrive ranked; the tail is dropped first.
 */
export class ContextBuilder {
  private config: ContextConfig;

  constructor(config: Partial<ContextConfig> = {}) {
    this.config = { ...DEFAULT_CONTEXT_CONFIG, ...config };
  }

  build(input: ContextInput): BuiltContext {
    const trailer: string[] = [];

    if (input.mood) {
      trailer.push('', '## Current Emotional Context', `Mood: ${input.mood.valence}`);
    }
    if (input.activeTopics.length > 0) {
      trailer.push('', `## Active Topics: ${input.activeTopics.slice(-5).join(', ')}`);
    }

    const trailerTokens = estimateTokens(trailer.join('\n'));
    const memoryBudget = Math.min(this.config.memoryTokens, this.config.maxTokens - trailerTokens);

    const memoryLines = this.fitMemories(input.memories, memoryBudget);
    const lines = memoryLines.length > 0 ? ['## Relevant Memories', ...memoryLines] : [];

    // Without memories the trailer leads, so drop its spacer line
    const body = lines.length > 0 ? [...lines, ...trailer] : trailer.filter((line, i) => i > 0 || line !== '');
    const text = body.join('\n');

    return {
      text,
      tokenEstimate: estimateTokens(text),
      memoriesIncluded: memoryLines.length,
    };
  }

  private fitMemories(memories: MemoryEntry[], budget: number): string[] {
    const result: string[] = [];
    let used = estimateTokens('## Relevant Memories');

    for (const memory of memories) {
      const line = `[${TIER_LABELS[memory.tier]}] ${preview(memory.content, this.config.memoryPreviewChars)}`;
      const cost = estimateTokens(line);
      if (used + cost > budget) break;
      result.push(line);
      used += cost;
    }

    return result;
  }

  setConfig(config: Partial<ContextConfig>): void {
    this.config = { ...this.config, ...config };
  }
}
