import { z } from 'zod';
import { errorMessage, ValidationError } from '../core/errors.js';
import type { ExplorationTracker } from '../exploration/tracker.js';
import { THREAD_STATUSES } from '../exploration/types.js';
import type { MemoryManager } from '../memory/manager.js';
import { DURABLE_TIERS, EMOTIONAL_VALENCES, KNOWLEDGE_CATEGORIES } from '../memory/types.js';

export interface ToolResult {
  success: boolean;
  message: string;
  data?: unknown;
}

interface JsonSchemaProperty {
  type: string;
  description?: string;
  enum?: string[];
  items?: JsonSchemaProperty;
  minimum?: number;
  maximum?: number;
  default?: string | number | boolean;
}

export interface ToolDefinition {
  name: string;
  description: string;
  inputSchema: {
    type: 'object';
    properties: Record<string, JsonSchemaProperty>;
    required: string[];
  };
}

const MAX_CONTENT_LENGTH = 4000;
const MAX_QUERY_LENGTH = 500;

const text = (max: number = MAX_CONTENT_LENGTH) => z.string().trim().min(1).max(max);
const unit = z.number().min(0).max(1);

const RememberExperienceSchema = z.object({
  content: text(),
  importance: unit.default(0.5),
  emotion: z.enum(EMOTIONAL_VALENCES).default('neutral'),
  tags: z.array(z.string()).default([]),
});

const LearnFactSchema = z.object({
  fact: text(),
  category: z.enum(KNOWLEDGE_CATEGORIES).default('world_knowledge'),
  confidence: unit.default(0.8),
});

const LearnPreferenceSchema = z.object({
  preference: text(),
  confidence: unit.default(0.8),
});

const UpdateBeliefSchema = z.object({
  belief: text(),
  replaces: z.string().trim().max(MAX_CONTENT_LENGTH).optional(),
});

const EvolveBeliefSchema = z.object({
  new_belief: text(),
  reason: text(),
  old_belief: z.string().trim().max(MAX_CONTENT_LENGTH).optional(),
  confidence: unit.default(0.8),
});

const BeliefHistorySchema = z.object({
  topic: text(MAX_QUERY_LENGTH),
  limit: z.number().int().min(1).max(50).default(5),
});

const RecordSurpriseSchema = z.object({
  what_happened: text(),
  what_i_expected: text(),
  why_surprising: text(),
  what_i_learned: z.string().trim().max(MAX_CONTENT_LENGTH).optional(),
  intensity: unit.default(0.5),
  emotion: z.enum(EMOTIONAL_VALENCES).default('neutral'),
  tags: z.array(z.string()).default([]),
});

const RecallSurprisesSchema = z.object({
  query: text(MAX_QUERY_LENGTH),
  limit: z.number().int().min(1).max(50).default(5),
});

const RecordLessonSchema = z.object({
  lesson: text(),
  context: z.string().max(MAX_CONTENT_LENGTH).optional(),
});

const RecallSchema = z.object({
  query: text(MAX_QUERY_LENGTH),
  memory_types: z.array(z.enum(['episodic', 'semantic', 'longterm'])).optional(),
  limit: z.number().int().min(1).max(50).default(5),
});

const ReflectSchema = z.object({
  topic: z.string().trim().max(MAX_QUERY_LENGTH).optional(),
});

const StartThreadSchema = z.object({
  name: text(200),
  question: text(),
  introspection_id: text(200),
  insight_summary: z.string().max(MAX_CONTENT_LENGTH).optional(),
  tags: z.array(z.string()).optional(),
});

const ContinueThreadSchema = z.object({
  thread: text(200),
  introspection_id: text(200),
  question: text(),
  insight_summary: z.string().max(MAX_CONTENT_LENGTH).optional(),
});

const BranchThreadSchema = StartThreadSchema.extend({
  from_thread: text(200),
  from_link_id: text(200),
});

const ListThreadsSchema = z.object({
  status: z.enum(THREAD_STATUSES).optional(),
  limit: z.number().int().min(1).max(100).default(10),
});

const ThreadContextSchema = z.object({
  thread: text(200),
  include_content: z.boolean().default(true),
  max_introspections: z.number().int().min(0).max(50).default(5),
});

const SetThreadStatusSchema = z.object({
  thread: text(200),
  status: z.enum(THREAD_STATUSES),
  conclusion: z.string().max(MAX_CONTENT_LENGTH).optional(),
});

export const TOOL_DEFINITIONS: ToolDefinition[] = [
  {
    name: 'remember_experience',
    description: 'Store an experience or event that happened. Use this for significant moments, conversations or events worth recalling later.',
    inputSchema: {
      type: 'object',
      properties: {
        content: { type: 'string', description: 'What happened' },
        importance: { type: 'number', description: '0.0 (trivial) to 1.0 (very important)', minimum: 0, maximum: 1 },
        emotion: { type: 'string', enum: [...EMOTIONAL_VALENCES], description: 'Emotional tone of the experience' },
        tags: { type: 'array', items: { type: 'string' }, description: 'Tags to categorize this memory' },
      },
      required: ['content'],
    },
  },
  {
    name: 'learn_fact',
    description: 'Store a fact or piece of knowledge about the user, a project or the world.',
    inputSchema: {
      type: 'object',
      properties: {
        fact: { type: 'string', description: 'The fact to remember' },
        category: { type: 'string', enum: [...KNOWLEDGE_CATEGORIES], description: 'Category of this knowledge' },
        confidence: { type: 'number', description: 'Confidence from 0.0 to 1.0', minimum: 0, maximum: 1 },
      },
      required: ['fact'],
    },
  },
  {
    name: 'learn_user_preference',
    description: 'Store something the user likes, prefers or wants.',
    inputSchema: {
      type: 'object',
      properties: {
        preference: { type: 'string', description: "e.g. 'prefers concise responses'" },
        confidence: { type: 'number', description: 'Confidence from 0.0 to 1.0', minimum: 0, maximum: 1 },
      },
      required: ['preference'],
    },
  },
  {
    name: 'update_belief',
    description: 'Add a core belief about yourself, your values or your understanding. Use sparingly.',
    inputSchema: {
      type: 'object',
      properties: {
        belief: { type: 'string', description: 'The belief or value to store' },
        replaces: { type: 'string', description: 'An earlier belief this one replaces, if any' },
      },
      required: ['belief'],
    },
  },
  {
    name: 'evolve_belief',
    description: 'Record how a belief has changed. Use this when you change your mind about something; the versions of a belief are kept together.',
    inputSchema: {
      type: 'object',
      properties: {
        new_belief: { type: 'string', description: 'What you now believe' },
        old_belief: { type: 'string', description: 'What you used to believe, if applicable' },
        reason: { type: 'string', description: 'What caused the change' },
        confidence: { type: 'number', description: 'Confidence in the new belief, 0.0 to 1.0', minimum: 0, maximum: 1 },
      },
      required: ['new_belief', 'reason'],
    },
  },
  {
    name: 'get_belief_history',
    description: 'See how beliefs about a topic have changed over time.',
    inputSchema: {
      type: 'object',
      properties: {
        topic: { type: 'string', description: 'The topic or belief to trace' },
        limit: { type: 'integer', description: 'Maximum belief versions to return', default: 5 },
      },
      required: ['topic'],
    },
  },
  {
    name: 'record_surprise',
    description: 'Record a moment when what happened did not match what you expected.',
    inputSchema: {
      type: 'object',
      properties: {
        what_happened: { type: 'string', description: 'What actually happened' },
        what_i_expected: { type: 'string', description: 'What you expected instead' },
        why_surprising: { type: 'string', description: 'Which assumption was challenged' },
        what_i_learned: { type: 'string', description: 'What the surprise taught you' },
        intensity: { type: 'number', description: '0.0 (mildly unexpected) to 1.0 (completely shocked)', minimum: 0, maximum: 1 },
        emotion: { type: 'string', enum: [...EMOTIONAL_VALENCES], description: 'Emotional impact of the surprise' },
        tags: { type: 'array', items: { type: 'string' }, description: 'Tags to categorize this surprise' },
      },
      required: ['what_happened', 'what_i_expected', 'why_surprising'],
    },
  },
  {
    name: 'recall_surprises',
    description: 'Search past surprises for a topic.',
    inputSchema: {
      type: 'object',
      properties: {
        query: { type: 'string', description: 'Topic to search for' },
        limit: { type: 'integer', description: 'Maximum surprises to return', default: 5 },
      },
      required: ['query'],
    },
  },
  {
    name: 'record_lesson',
    description: 'Record a lesson learned from experience.',
    inputSchema: {
      type: 'object',
      properties: {
        lesson: { type: 'string', description: 'The lesson learned' },
        context: { type: 'string', description: 'What led to this lesson' },
      },
      required: ['lesson'],
    },
  },
  {
    name: 'recall_memories',
    description: 'Search memories for information relevant to a topic or question.',
    inputSchema: {
      type: 'object',
      properties: {
        query: { type: 'string', description: 'What to search for' },
        memory_types: {
          type: 'array',
          items: { type: 'string', enum: [...DURABLE_TIERS] },
          description: 'Which memory stores to search (default: all)',
        },
        limit: { type: 'integer', description: 'Maximum memories to return', default: 5 },
      },
      required: ['query'],
    },
  },
  {
    name: 'reflect',
    description: 'Reflect on memories and consolidate insights. Run periodically.',
    inputSchema: {
      type: 'object',
      properties: {
        topic: { type: 'string', description: 'Optional topic to focus on' },
      },
      required: [],
    },
  },
  {
    name: 'get_memory_stats',
    description: 'Get statistics about the memory system.',
    inputSchema: { type: 'object', properties: {}, required: [] },
  },
  {
    name: 'start_thread',
    description: 'Start a new exploration thread around a question.',
    inputSchema: {
      type: 'object',
      properties: {
        name: { type: 'string', description: 'Short name for the thread' },
        question: { type: 'string', description: 'The driving question' },
        introspection_id: { type: 'string', description: 'Id of the introspection that opens the thread' },
        insight_summary: { type: 'string', description: 'What the first introspection found' },
        tags: { type: 'array', items: { type: 'string' } },
      },
      required: ['name', 'question', 'introspection_id'],
    },
  },
  {
    name: 'continue_thread',
    description: 'Follow up on an existing thread. Use the EXACT thread id (or name) from list_threads.',
    inputSchema: {
      type: 'object',
      properties: {
        thread: { type: 'string', description: 'Thread id or name' },
        introspection_id: { type: 'string', description: 'Id of the new introspection' },
        question: { type: 'string', description: 'The question explored this time' },
        insight_summary: { type: 'string', description: 'What was found' },
      },
      required: ['thread', 'introspection_id', 'question'],
    },
  },
  {
    name: 'branch_thread',
    description: 'Fork a new thread from a specific point in an existing one.',
    inputSchema: {
      type: 'object',
      properties: {
        from_thread: { type: 'string', description: 'Parent thread id or name' },
        from_link_id: { type: 'string', description: 'Link in the parent thread to branch from' },
        name: { type: 'string', description: 'Name for the new thread' },
        question: { type: 'string', description: 'The new driving question' },
        introspection_id: { type: 'string', description: 'Id of the introspection that opens the branch' },
        insight_summary: { type: 'string' },
        tags: { type: 'array', items: { type: 'string' } },
      },
      required: ['from_thread', 'from_link_id', 'name', 'question', 'introspection_id'],
    },
  },
  {
    name: 'list_threads',
    description: 'List exploration threads, most recently updated first.',
    inputSchema: {
      type: 'object',
      properties: {
        status: { type: 'string', enum: [...THREAD_STATUSES] },
        limit: { type: 'integer', default: 10 },
      },
      required: [],
    },
  },
  {
    name: 'get_thread_context',
    description: 'Get the path of inquiry so far for a thread, to pick it up again.',
    inputSchema: {
      type: 'object',
      properties: {
        thread: { type: 'string', description: 'Thread id or name' },
        include_content: { type: 'boolean', default: true },
        max_introspections: { type: 'integer', default: 5 },
      },
      required: ['thread'],
    },
  },
  {
    name: 'set_thread_status',
    description: 'Mark a thread active, dormant or concluded.',
    inputSchema: {
      type: 'object',
      properties: {
        thread: { type: 'string', description: 'Thread id or name' },
        status: { type: 'string', enum: [...THREAD_STATUSES] },
        conclusion: { type: 'string', description: 'What the thread concluded' },
      },
      required: ['thread', 'status'],
    },
  },
];

export function getToolDefinitions(): ToolDefinition[] {
  return TOOL_DEFINITIONS;
}

/**
 * Markdown description of the tools for a system prompt.
 */
export function getToolPromptSection(): string {
  const lines = [
    '## Your Memory Tools',
    'You can actively manage your own memories using these capabilities:',
    '',
    ...TOOL_DEFINITIONS.map((tool) => `- **${tool.name}**: ${tool.description}`),
    '',
    'Use these tools to:',
    '- Remember important experiences and conversations',
    '- Learn facts about the user and projects',
    '- Record lessons and beliefs as you grow',
    '- Follow threads of thought across sessions',
    '',
    'Be thoughtful about what you store - focus on genuinely important information.',
  ];
  return lines.join('\n');
}

function parseArgs<S extends z.ZodTypeAny>(schema: S, args: unknown, tool: string): z.output<S> {
  const result = schema.safeParse(args ?? {});
  if (!result.success) {
    throw ValidationError.fromZod(`arguments for ${tool}`, result.error);
  }
  return result.data;
}

type ToolHandler = (args: unknown) => Promise<ToolResult>;

/**
 * Executes the memory and thread tools an LLM calls. Failures never throw;
 * they come back as `{ success: false }` with the reason in the message.
 */
export class MemoryToolExecutor {
  private handlers: Record<string, ToolHandler>;

  constructor(
    private manager: MemoryManager,
    private tracker: ExplorationTracker
  ) {
    this.handlers = {
      remember_experience: (args) => this.rememberExperience(args),
      learn_fact: (args) => this.learnFact(args),
      learn_user_preference: (args) => this.learnUserPreference(args),
      update_belief: (args) => this.updateBelief(args),
      evolve_belief: (args) => this.evolveBelief(args),
      get_belief_history: (args) => this.getBeliefHistory(args),
      record_surprise: (args) => this.recordSurprise(args),
      recall_surprises: (args) => this.recallSurprises(args),
      record_lesson: (args) => this.recordLesson(args),
      recall_memories: (args) => this.recallMemories(args),
      reflect: (args) => this.reflect(args),
      get_memory_stats: () => this.getMemoryStats(),
      start_thread: async (args) => this.startThread(args),
      continue_thread: async (args) => this.continueThread(args),
      branch_thread: async (args) => this.branchThread(args),
      list_threads: async (args) => this.listThreads(args),
      get_thread_context: (args) => this.getThreadContext(args),
      set_thread_status: async (args) => this.setThreadStatus(args),
    };
  }

  async execute(name: string, args: unknown): Promise<ToolResult> {
    const handler = Object.hasOwn(this.handlers, name) ? this.handlers[name] : undefined;
    if (!handler) {
      return { success: false, message: `Unknown tool: ${name}` };
    }

    try {
      return await handler(args);
    } catch (error) {
      return { success: false, message: `Error executing ${name}: ${errorMessage(error)}` };
    }
  }

  // ===========================================================================
  // Memory tools
  // ===========================================================================

  private async rememberExperience(args: unknown): Promise<ToolResult> {
    const input = parseArgs(RememberExperienceSchema, args, 'remember_experience');
    const entry = await this.manager.remember(input.content, {
      tier: 'episodic',
      importance: input.importance,
      emotionalValence: input.emotion,
      tags: input.tags,
    });
    return {
      success: true,
      message: `Stored experience: '${input.content.slice(0, 50)}...' (importance: ${input.importance})`,
      data: { memoryId: entry.id },
    };
  }

  private async learnFact(args: unknown): Promise<ToolResult> {
    const input = parseArgs(LearnFactSchema, args, 'learn_fact');
    const entry = await this.manager.remember(input.fact, {
      tier: 'semantic',
      category: input.category,
      confidence: input.confidence,
    });
    return {
      success: true,
      message: `Learned: '${input.fact.slice(0, 50)}...' (category: ${input.category}, confidence: ${input.confidence})`,
      data: { memoryId: entry.id },
    };
  }

  private async learnUserPreference(args: unknown): Promise<ToolResult> {
    const input = parseArgs(LearnPreferenceSchema, args, 'learn_user_preference');
    const entry = await this.manager.semantic.storeUserPreference(input.preference, input.confidence, 'llm_observed');
    return {
      success: true,
      message: `Learned user preference: '${input.preference}' (confidence: ${input.confidence})`,
      data: { memoryId: entry.id },
    };
  }

  private async updateBelief(args: unknown): Promise<ToolResult> {
    const input = parseArgs(UpdateBeliefSchema, args, 'update_belief');
    const entry = await this.manager.longterm.storeCoreBelief(input.belief);

    if (!input.replaces) {
      return {
        success: true,
        message: `Updated core belief: '${input.belief.slice(0, 50)}...'`,
        data: { memoryId: entry.id },
      };
    }

    const version = await this.manager.beliefs.evolveBelief({
      newBelief: input.belief,
      oldBelief: input.replaces,
      reason: 'Replaced an earlier core belief',
    });
    return {
      success: true,
      message: `Updated core belief: '${input.belief.slice(0, 50)}...' (version ${version.version} of this belief)`,
      data: { memoryId: entry.id, beliefVersion: version },
    };
  }

  private async evolveBelief(args: unknown): Promise<ToolResult> {
    const input = parseArgs(EvolveBeliefSchema, args, 'evolve_belief');
    const version = await this.manager.beliefs.evolveBelief({
      newBelief: input.new_belief,
      oldBelief: input.old_belief,
      reason: input.reason,
      confidence: input.confidence,
    });
    return {
      success: true,
      message: `Belief evolved to version ${version.version}: '${input.new_belief.slice(0, 50)}...'`,
      data: version,
    };
  }

  private async getBeliefHistory(args: unknown): Promise<ToolResult> {
    const input = parseArgs(BeliefHistorySchema, args, 'get_belief_history');
    const versions = await this.manager.beliefs.getBeliefHistory(input.topic, input.limit);
    if (versions.length === 0) {
      return { success: true, message: `No belief history for '${input.topic}'`, data: [] };
    }

    const lines = versions.map((v) => {
      const reason = v.reasonForChange ? ` (because: ${v.reasonForChange})` : '';
      return `- v${v.version} ${v.content}${reason}`;
    });
    return { success: true, message: `Belief history:\n${lines.join('\n')}`, data: versions };
  }

  private async recordSurprise(args: unknown): Promise<ToolResult> {
    const input = parseArgs(RecordSurpriseSchema, args, 'record_surprise');
    const surprise = await this.manager.surprises.recordSurprise({
      whatHappened: input.what_happened,
      whatExpected: input.what_i_expected,
      whySurprising: input.why_surprising,
      whatLearned: input.what_i_learned,
      emotionalImpact: input.emotion,
      intensity: input.intensity,
      tags: input.tags,
    });
    return {
      success: true,
      message: `Recorded surprise: '${input.what_happened.slice(0, 50)}...' (intensity: ${input.intensity})`,
      data: { surpriseId: surprise.id },
    };
  }

  private async recallSurprises(args: unknown): Promise<ToolResult> {
    const input = parseArgs(RecallSurprisesSchema, args, 'recall_surprises');
    const surprises = await this.manager.surprises.recallSurprises(input.query, input.limit);
    if (surprises.length === 0) {
      return { success: true, message: `No surprises found for '${input.query}'`, data: [] };
    }

    const lines = surprises.map((s) => `- ${s.whatHappened} (expected: ${s.whatExpected})`);
    return { success: true, message: `Found ${surprises.length} surprises:\n${lines.join('\n')}`, data: surprises };
  }

  private async recordLesson(args: unknown): Promise<ToolResult> {
    const input = parseArgs(RecordLessonSchema, args, 'record_lesson');
    const content = input.context ? `${input.lesson} (Context: ${input.context})` : input.lesson;
    const entry = await this.manager.longterm.storeLesson(content);
    return {
      success: true,
      message: `Recorded lesson: '${input.lesson.slice(0, 50)}...'`,
      data: { memoryId: entry.id },
    };
  }

  private async recallMemories(args: unknown): Promise<ToolResult> {
    const input = parseArgs(RecallSchema, args, 'recall_memories');
    const results = await this.manager.recall(input.query, {
      limit: input.limit,
      tiers: input.memory_types && input.memory_types.length > 0 ? input.memory_types : undefined,
      includeWorking: true,
    });

    if (results.length === 0) {
      return { success: true, message: `No memories found for '${input.query}'`, data: { count: 0, memories: [] } };
    }

    const lines = results.map((m) => `[${m.tier}] ${m.content}`);
    return {
      success: true,
      message: `Found ${results.length} memories:\n${lines.join('\n')}`,
      data: { count: results.length, memories: results },
    };
  }

  private async reflect(args: unknown): Promise<ToolResult> {
    const input = parseArgs(ReflectSchema, args, 'reflect');

    if (input.topic) {
      const memories = await this.manager.recall(input.topic, { limit: 10 });
      return { success: true, message: `Reflected on '${input.topic}': found ${memories.length} related memories` };
    }

    const reflection = await this.manager.reflect();
    return { success: true, message: reflection.summary, data: reflection };
  }

  private async getMemoryStats(): Promise<ToolResult> {
    const stats = await this.manager.getStats();
    const message = [
      'Memory Statistics:',
      `  Episodic memories: ${stats.episodic}`,
      `  Semantic memories: ${stats.semantic}`,
      `  Long-term memories: ${stats.longterm}`,
      `  Current session turns: ${stats.workingTurns}`,
      `  Retrieved memories in context: ${stats.workingRetrieved}`,
    ].join('\n');
    return { success: true, message, data: stats };
  }

  // ===========================================================================
  // Thread tools
  // ===========================================================================

  private startThread(args: unknown): ToolResult {
    const input = parseArgs(StartThreadSchema, args, 'start_thread');
    const thread = this.tracker.startThread({
      name: input.name,
      question: input.question,
      introspectionId: input.introspection_id,
      insightSummary: input.insight_summary,
      tags: input.tags,
    });
    return { success: true, message: `Started thread '${thread.name}' [${thread.id}]`, data: thread };
  }

  private continueThread(args: unknown): ToolResult {
    const input = parseArgs(ContinueThreadSchema, args, 'continue_thread');
    const link = this.tracker.continueThread(input.thread, {
      introspectionId: input.introspection_id,
      question: input.question,
      insightSummary: input.insight_summary,
    });
    return {
      success: true,
      message: `Continued thread [${link.threadId}] at depth ${link.depth} (link ${link.id})`,
      data: link,
    };
  }

  private branchThread(args: unknown): ToolResult {
    const input = parseArgs(BranchThreadSchema, args, 'branch_thread');
    const thread = this.tracker.branchThread({
      fromThread: input.from_thread,
      fromLinkId: input.from_link_id,
      name: input.name,
      question: input.question,
      introspectionId: input.introspection_id,
      insightSummary: input.insight_summary,
      tags: input.tags,
    });
    const message = thread.branchedFromThreadId
      ? `Branched thread '${thread.name}' [${thread.id}] from [${thread.branchedFromThreadId}]`
      : `Started thread '${thread.name}' [${thread.id}] (branch origin not found)`;
    return { success: true, message, data: thread };
  }

  private listThreads(args: unknown): ToolResult {
    const input = parseArgs(ListThreadsSchema, args, 'list_threads');
    const threads = this.tracker.listThreads(input.status, input.limit);
    if (threads.length === 0) {
      return { success: true, message: 'No exploration threads.', data: [] };
    }

    const lines = threads.map(
      (t) => `- [${t.id}] ${t.name}: ${t.question.slice(0, 60)} (depth: ${t.depth}, ${t.status})`
    );
    return { success: true, message: `Exploration threads:\n${lines.join('\n')}`, data: threads };
  }

  private async getThreadContext(args: unknown): Promise<ToolResult> {
    const input = parseArgs(ThreadContextSchema, args, 'get_thread_context');
    const context = await this.tracker.getThreadContext(input.thread, {
      includeContent: input.include_content,
      maxIntrospections: input.max_introspections,
    });

    let message = context.narrative;
    if (context.introspections && context.introspections.length > 0) {
      const notes = context.introspections.map((i) => `- ${i.question}: ${i.introspection.text.slice(0, 200)}`);
      message += `\n\nRecent introspections:\n${notes.join('\n')}`;
    }
    return { success: true, message, data: context };
  }

  private setThreadStatus(args: unknown): ToolResult {
    const input = parseArgs(SetThreadStatusSchema, args, 'set_thread_status');
    const thread = this.tracker.setThreadStatus(input.thread, input.status, input.conclusion);
    return { success: true, message: `Thread '${thread.name}' is now ${thread.status}`, data: thread };
  }
}
