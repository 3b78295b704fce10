import * as fs from 'fs';
import type Database from 'better-sqlite3';
import { z } from 'zod';
import { systemClock, type Clock } from '../core/clock.js';
import {
  BackendUnavailableError,
  ConcurrentModificationError,
  errorMessage,
  NotFoundError,
  ValidationError,
} from '../core/errors.js';
import { generateId } from '../core/ids.js';
import { silentLogger, type Logger } from '../core/logger.js';
import { openDatabase } from '../memory/vector-store.js';
import {
  THREAD_STATUSES,
  type BranchThreadInput,
  type ContinueThreadInput,
  type ExplorationStats,
  type ExplorationThread,
  type IntrospectionJournal,
  type LinkedIntrospection,
  type MissingThreadPolicy,
  type StartThreadInput,
  type ThreadContext,
  type ThreadContextOptions,
  type ThreadLink,
  type ThreadStatus,
} from './types.js';

interface ThreadRow {
  id: string;
  name: string;
  question: string;
  created_at: string;
  updated_at: string;
  status: string;
  depth: number;
  root_introspection_id: string;
  current_introspection_id: string;
  branched_from_thread_id: string | null;
  branched_from_link_id: string | null;
  conclusion: string | null;
  tags: string;
}

interface LinkRow {
  id: string;
  thread_id: string;
  introspection_id: string;
  parent_link_id: string | null;
  depth: number;
  question: string;
  insight_summary: string | null;
  created_at: string;
  leads_to_branches: string;
}

const required = (field: string) => z.string().refine((s) => s.trim().length > 0, `${field} must not be blank`);

const StartThreadSchema = z.object({
  name: required('name'),
  question: required('question'),
  introspectionId: required('introspectionId'),
  insightSummary: z.string().optional(),
  tags: z.array(z.string()).optional(),
});

const ContinueThreadSchema = z.object({
  introspectionId: required('introspectionId'),
  question: required('question'),
  insightSummary: z.string().optional(),
});

const BranchThreadSchema = StartThreadSchema.extend({
  fromThread: required('fromThread'),
  fromLinkId: required('fromLinkId'),
});

const StringArraySchema = z.array(z.string());

function parse<T>(schema: z.ZodType<T>, input: unknown, context: string): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw ValidationError.fromZod(context, result.error);
  }
  return result.data;
}

function parseStringArray(json: string, context: string): string[] {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (error) {
    throw new ValidationError(`Unreadable ${context}`, [errorMessage(error)]);
  }
  const result = StringArraySchema.safeParse(raw);
  return result.success ? result.data : [];
}

function toStatus(value: string): ThreadStatus {
  const status = THREAD_STATUSES.find((s) => s === value);
  if (!status) {
    throw new ValidationError(`Unknown thread status: ${value}`);
  }
  return status;
}

function isUniqueViolation(error: unknown): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    typeof error.code === 'string' &&
    error.code.startsWith('SQLITE_CONSTRAINT')
  );
}

function escapeLike(text: string): string {
  return text.replace(/[\\%_]/g, (c) => `\\${c}`);
}

export interface ExplorationTrackerOptions {
  clock?: Clock;
  logger?: Logger;
  journal?: IntrospectionJournal;
  missingThreadPolicy?: MissingThreadPolicy;
}

/**
 * Named, branchable chains of introspection ids kept in SQLite. The
 * introspection text itself lives in an external journal.
 */
export class ExplorationTracker {
  private db: Database.Database;
  private clock: Clock;
  private logger: Logger;
  private journal: IntrospectionJournal | null;
  readonly missingThreadPolicy: MissingThreadPolicy;

  constructor(dbPath: string, options: ExplorationTrackerOptions = {}) {
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? silentLogger;
    this.journal = options.journal ?? null;
    this.missingThreadPolicy = options.missingThreadPolicy ?? 'strict';

    this.db = openDatabase(dbPath, 'thread index');
    try {
      this.runMigrations();
    } catch (error) {
      this.db.close();
      throw new BackendUnavailableError(`thread index at ${dbPath}`, error);
    }

    if (dbPath !== ':memory:') {
      try {
        fs.chmodSync(dbPath, 0o600);
      } catch {
        // Not every filesystem supports modes; the index still works
      }
    }
  }

  private runMigrations(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS migrations (
        id INTEGER PRIMARY KEY,
        name TEXT NOT NULL,
        applied_at TEXT DEFAULT (datetime('now'))
      );
    `);

    const appliedMigrations = new Set(
      this.db.prepare('SELECT name FROM migrations').all()
        .map((row) => (row as { name: string }).name)
    );

    if (!appliedMigrations.has('001_threads')) {
      this.db.exec(`
        CREATE TABLE threads (
          id TEXT PRIMARY KEY,
          name TEXT NOT NULL,
          question TEXT NOT NULL,
          created_at TEXT NOT NULL,
          updated_at TEXT NOT NULL,
          status TEXT NOT NULL DEFAULT 'active' CHECK (status IN ('active', 'dormant', 'concluded')),
          depth INTEGER NOT NULL DEFAULT 0,
          root_introspection_id TEXT NOT NULL,
          current_introspection_id TEXT NOT NULL,
          branched_from_thread_id TEXT,
          branched_from_link_id TEXT,
          conclusion TEXT,
          tags TEXT NOT NULL DEFAULT '[]'
        );

        CREATE TABLE thread_links (
          id TEXT PRIMARY KEY,
          thread_id TEXT NOT NULL REFERENCES threads(id) ON DELETE CASCADE,
          introspection_id TEXT NOT NULL,
          parent_link_id TEXT,
          depth INTEGER NOT NULL,
          question TEXT NOT NULL,
          insight_summary TEXT,
          created_at TEXT NOT NULL,
          leads_to_branches TEXT NOT NULL DEFAULT '[]',
          UNIQUE (thread_id, depth)
        );

        CREATE INDEX idx_threads_status ON threads(status);
        CREATE INDEX idx_threads_updated ON threads(updated_at);
        CREATE INDEX idx_threads_name ON threads(name);
        CREATE INDEX idx_links_thread ON thread_links(thread_id);
        CREATE INDEX idx_links_introspection ON thread_links(introspection_id);
      `);

      this.db.prepare('INSERT INTO migrations (name) VALUES (?)').run('001_threads');
    }
  }

  close(): void {
    this.db.close();
  }

  // ===========================================================================
  // Thread management
  // ===========================================================================

  startThread(input: StartThreadInput): ExplorationThread {
    const value = parse(StartThreadSchema, input, 'thread');
    return this.guard(() => this.db.transaction(() => this.insertThread(value, null, null))());
  }

  /**
   * Append an introspection to the end of a thread. The thread is found by
   * id, then by name.
   */
  continueThread(threadRef: string, input: ContinueThreadInput): ThreadLink {
    const value = parse(ContinueThreadSchema, input, 'thread continuation');

    const thread = this.getThread(threadRef);
    if (!thread) {
      if (this.missingThreadPolicy === 'start-new') {
        this.logger.debug(`Thread ${threadRef} not found; starting it`);
        const started = this.startThread({ name: threadRef, ...value });
        return this.rootLink(started.id);
      }
      throw new NotFoundError('Thread', threadRef);
    }

    const now = this.clock().toISOString();
    const append = this.db.transaction((): ThreadLink => {
      const tail = this.db.prepare(`
        SELECT id FROM thread_links WHERE thread_id = ? ORDER BY depth DESC LIMIT 1
      `).get(thread.id) as { id: string } | undefined;

      const link: ThreadLink = {
        id: generateId('link', this.clock()),
        threadId: thread.id,
        introspectionId: value.introspectionId,
        parentLinkId: tail?.id ?? null,
        depth: thread.depth,
        question: value.question,
        insightSummary: value.insightSummary ?? null,
        createdAt: new Date(now),
        leadsToBranchIds: [],
      };

      try {
        this.insertLink(link);
      } catch (error) {
        if (isUniqueViolation(error)) {
          throw new ConcurrentModificationError('Thread', thread.id, `depth ${thread.depth} was already taken`);
        }
        throw error;
      }

      // Compare-and-set on the depth read above
      const result = this.db.prepare(`
        UPDATE threads SET depth = ?, current_introspection_id = ?, updated_at = ?
        WHERE id = ? AND depth = ?
      `).run(thread.depth + 1, value.introspectionId, now, thread.id, thread.depth);

      if (result.changes === 0) {
        throw new ConcurrentModificationError('Thread', thread.id, 'depth changed while appending');
      }
      return link;
    });

    return this.guard(() => append());
  }

  /**
   * Fork a new thread off `fromLinkId`. The parent thread keeps its depth
   * and current introspection; the origin link records the new thread.
   */
  branchThread(input: BranchThreadInput): ExplorationThread {
    const value = parse(BranchThreadSchema, input, 'thread branch');
    const { fromThread, fromLinkId, ...start } = value;

    const parent = this.getThread(fromThread);
    const origin = parent ? this.getLink(fromLinkId) : null;

    if (!parent || !origin || origin.threadId !== parent.id) {
      if (this.missingThreadPolicy === 'start-new') {
        this.logger.debug(`Branch origin ${fromThread}/${fromLinkId} not found; starting an unbranched thread`);
        return this.startThread(start);
      }
      if (!parent) throw new NotFoundError('Thread', fromThread);
      throw new NotFoundError('Link', `${fromLinkId} in thread ${parent.id}`);
    }

    const branch = this.db.transaction((): ExplorationThread => {
      const thread = this.insertThread(start, parent.id, origin.id);

      // Re-read inside the transaction so concurrent branches are all kept
      const current = this.db.prepare('SELECT leads_to_branches FROM thread_links WHERE id = ?')
        .get(origin.id) as { leads_to_branches: string } | undefined;
      const branches = current ? parseStringArray(current.leads_to_branches, `branches of link ${origin.id}`) : [];
      this.db.prepare('UPDATE thread_links SET leads_to_branches = ? WHERE id = ?')
        .run(JSON.stringify([...branches, thread.id]), origin.id);

      return thread;
    });

    return this.guard(() => branch());
  }

  /**
   * Change status (and conclusion) only; the chain is untouched.
   */
  setThreadStatus(threadRef: string, status: ThreadStatus, conclusion?: string): ExplorationThread {
    const thread = this.getThread(threadRef);
    if (!thread) {
      throw new NotFoundError('Thread', threadRef);
    }

    const now = this.clock();
    this.guard(() =>
      this.db.prepare('UPDATE threads SET status = ?, conclusion = ?, updated_at = ? WHERE id = ?')
        .run(status, conclusion ?? null, now.toISOString(), thread.id)
    );

    return { ...thread, status, conclusion: conclusion ?? null, updatedAt: now };
  }

  // ===========================================================================
  // Retrieval
  // ===========================================================================

  getThread(threadRef: string): ExplorationThread | null {
    const row = this.guard(() => {
      const byId = this.db.prepare('SELECT * FROM threads WHERE id = ?').get(threadRef) as ThreadRow | undefined;
      if (byId) return byId;
      return this.db.prepare('SELECT * FROM threads WHERE name = ? ORDER BY updated_at DESC, rowid DESC LIMIT 1')
        .get(threadRef) as ThreadRow | undefined;
    });
    return row ? this.rowToThread(row) : null;
  }

  getLink(linkId: string): ThreadLink | null {
    const row = this.guard(() =>
      this.db.prepare('SELECT * FROM thread_links WHERE id = ?').get(linkId) as LinkRow | undefined
    );
    return row ? this.rowToLink(row) : null;
  }

  /** Most recently updated first. */
  listThreads(status?: ThreadStatus, limit: number = 20): ExplorationThread[] {
    const rows = this.guard(() => {
      if (status) {
        return this.db.prepare(`
          SELECT * FROM threads WHERE status = ?
          ORDER BY updated_at DESC, rowid DESC LIMIT ?
        `).all(status, limit) as ThreadRow[];
      }
      return this.db.prepare(`
        SELECT * FROM threads ORDER BY updated_at DESC, rowid DESC LIMIT ?
      `).all(limit) as ThreadRow[];
    });
    return rows.map((row) => this.rowToThread(row));
  }

  listActiveThreads(limit: number = 10): ExplorationThread[] {
    return this.listThreads('active', limit);
  }

  /**
   * Links from root to tip. Empty for an unknown thread.
   */
  getThreadChain(threadRef: string): ThreadLink[] {
    const thread = this.getThread(threadRef);
    if (!thread) return [];

    const rows = this.guard(() =>
      this.db.prepare('SELECT * FROM thread_links WHERE thread_id = ? ORDER BY depth ASC')
        .all(thread.id) as LinkRow[]
    );
    return rows.map((row) => this.rowToLink(row));
  }

  /**
   * Everything needed to resume a thread: recent links, every question
   * asked so far, journal summaries when requested, and a narrative.
   */
  async getThreadContext(threadRef: string, options: ThreadContextOptions = {}): Promise<ThreadContext> {
    const { includeContent = true, maxIntrospections = 5 } = options;

    const thread = this.getThread(threadRef);
    if (!thread) {
      throw new NotFoundError('Thread', threadRef);
    }

    const chain = this.getThreadChain(thread.id);
    const recentLinks = maxIntrospections > 0 ? chain.slice(-maxIntrospections) : [];

    const context: ThreadContext = {
      thread,
      chainLength: chain.length,
      recentLinks,
      questionsExplored: chain.map((link) => link.question),
      narrative: buildThreadNarrative(thread, chain),
    };

    if (includeContent && this.journal) {
      context.introspections = await this.fetchIntrospections(this.journal, recentLinks);
    }

    return context;
  }

  // Journal lookups are enrichment; a failing journal yields fewer entries
  private async fetchIntrospections(journal: IntrospectionJournal, links: ThreadLink[]): Promise<LinkedIntrospection[]> {
    const fetched = await Promise.all(
      links.map(async (link) => {
        try {
          const introspection = await journal.fetch(link.introspectionId);
          return introspection
            ? { linkId: link.id, question: link.question, insight: link.insightSummary, introspection }
            : null;
        } catch (error) {
          this.logger.warn(`Could not fetch introspection ${link.introspectionId}`, error);
          return null;
        }
      })
    );
    return fetched.filter((item): item is LinkedIntrospection => item !== null);
  }

  getStats(): ExplorationStats {
    return this.guard(() => {
      const counts = this.db.prepare(`
        SELECT
          COUNT(*) as total,
          SUM(CASE WHEN status = 'active' THEN 1 ELSE 0 END) as active,
          SUM(CASE WHEN status = 'dormant' THEN 1 ELSE 0 END) as dormant,
          SUM(CASE WHEN status = 'concluded' THEN 1 ELSE 0 END) as concluded,
          AVG(depth) as avg_depth,
          SUM(CASE WHEN branched_from_thread_id IS NOT NULL THEN 1 ELSE 0 END) as branched
        FROM threads
      `).get() as {
        total: number;
        active: number | null;
        dormant: number | null;
        concluded: number | null;
        avg_depth: number | null;
        branched: number | null;
      };

      const links = this.db.prepare('SELECT COUNT(*) as count FROM thread_links').get() as { count: number };

      return {
        totalThreads: counts.total,
        activeThreads: counts.active ?? 0,
        dormantThreads: counts.dormant ?? 0,
        concludedThreads: counts.concluded ?? 0,
        totalLinks: links.count,
        averageDepth: Math.round((counts.avg_depth ?? 0) * 10) / 10,
        branchedThreads: counts.branched ?? 0,
      };
    });
  }

  /**
   * Substring match over name and question, most recently updated first.
   */
  searchThreads(text: string, limit: number = 5): ExplorationThread[] {
    const pattern = `%${escapeLike(text)}%`;
    const rows = this.guard(() =>
      this.db.prepare(`
        SELECT * FROM threads
        WHERE name LIKE ? ESCAPE '\\' OR question LIKE ? ESCAPE '\\'
        ORDER BY updated_at DESC, rowid DESC LIMIT ?
      `).all(pattern, pattern, limit) as ThreadRow[]
    );
    return rows.map((row) => this.rowToThread(row));
  }

  // ===========================================================================
  // Helpers
  // ===========================================================================

  private insertThread(
    input: StartThreadInput,
    branchedFromThreadId: string | null,
    branchedFromLinkId: string | null
  ): ExplorationThread {
    const now = this.clock();
    const thread: ExplorationThread = {
      id: generateId('thread', now),
      name: input.name,
      question: input.question,
      createdAt: now,
      updatedAt: now,
      status: 'active',
      depth: 1,
      rootIntrospectionId: input.introspectionId,
      currentIntrospectionId: input.introspectionId,
      branchedFromThreadId,
      branchedFromLinkId,
      conclusion: null,
      tags: input.tags ?? [],
    };

    this.db.prepare(`
      INSERT INTO threads (id, name, question, created_at, updated_at, status, depth,
                           root_introspection_id, current_introspection_id,
                           branched_from_thread_id, branched_from_link_id, conclusion, tags)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      thread.id, thread.name, thread.question, now.toISOString(), now.toISOString(),
      thread.status, thread.depth, thread.rootIntrospectionId, thread.currentIntrospectionId,
      thread.branchedFromThreadId, thread.branchedFromLinkId, thread.conclusion,
      JSON.stringify(thread.tags)
    );

    this.insertLink({
      id: generateId('link', now),
      threadId: thread.id,
      introspectionId: input.introspectionId,
      parentLinkId: null,
      depth: 0,
      question: input.question,
      insightSummary: input.insightSummary ?? null,
      createdAt: now,
      leadsToBranchIds: [],
    });

    return thread;
  }

  private insertLink(link: ThreadLink): void {
    this.db.prepare(`
      INSERT INTO thread_links (id, thread_id, introspection_id, parent_link_id, depth,
                                question, insight_summary, created_at, leads_to_branches)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      link.id, link.threadId, link.introspectionId, link.parentLinkId, link.depth,
      link.question, link.insightSummary, link.createdAt.toISOString(),
      JSON.stringify(link.leadsToBranchIds)
    );
  }

  private rootLink(threadId: string): ThreadLink {
    const row = this.guard(() =>
      this.db.prepare('SELECT * FROM thread_links WHERE thread_id = ? AND depth = 0').get(threadId) as LinkRow | undefined
    );
    if (!row) {
      throw new NotFoundError('Link', `root of thread ${threadId}`);
    }
    return this.rowToLink(row);
  }

  private rowToThread(row: ThreadRow): ExplorationThread {
    return {
      id: row.id,
      name: row.name,
      question: row.question,
      createdAt: new Date(row.created_at),
      updatedAt: new Date(row.updated_at),
      status: toStatus(row.status),
      depth: row.depth,
      rootIntrospectionId: row.root_introspection_id,
      currentIntrospectionId: row.current_introspection_id,
      branchedFromThreadId: row.branched_from_thread_id,
      branchedFromLinkId: row.branched_from_link_id,
      conclusion: row.conclusion,
      tags: parseStringArray(row.tags, `tags of thread ${row.id}`),
    };
  }

  private rowToLink(row: LinkRow): ThreadLink {
    return {
      id: row.id,
      threadId: row.thread_id,
      introspectionId: row.introspection_id,
      parentLinkId: row.parent_link_id,
      depth: row.depth,
      question: row.question,
      insightSummary: row.insight_summary,
      createdAt: new Date(row.created_at),
      leadsToBranchIds: parseStringArray(row.leads_to_branches, `branches of link ${row.id}`),
    };
  }

  private guard<T>(fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      if (error instanceof ValidationError || error instanceof NotFoundError || error instanceof ConcurrentModificationError) {
        throw error;
      }
      throw new BackendUnavailableError('thread index', error);
    }
  }
}

/**
 * Plain-text summary of a thread for resuming it: header lines, the last
 * five questions with their insights, and the conclusion if any.
 */
export function buildThreadNarrative(thread: ExplorationThread, chain: ThreadLink[]): string {
  const parts = [
    `Thread: ${thread.name}`,
    `Core question: ${thread.question}`,
    `Depth: ${thread.depth} thoughts deep`,
    `Status: ${thread.status}`,
  ];

  if (thread.branchedFromThreadId) {
    parts.push('(Branched from another exploration)');
  }

  if (chain.length > 0) {
    parts.push('\nPath of inquiry:');
    chain.slice(-5).forEach((link, i) => {
      parts.push(`${i > 0 ? '  → ' : '  • '}${link.question}`);
      if (link.insightSummary) {
        parts.push(`    (${link.insightSummary})`);
      }
    });
  }

  if (thread.conclusion) {
    parts.push(`\nConclusion reached: ${thread.conclusion}`);
  }

  return parts.join('\n');
}
