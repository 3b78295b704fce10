export const THREAD_STATUSES = ['active', 'dormant', 'concluded'] as const;
export type ThreadStatus = (typeof THREAD_STATUSES)[number];

/**
 * What happens when continue/branch cannot resolve the thread it names.
 * `strict` raises NotFoundError; `start-new` opens a fresh thread instead.
 */
export type MissingThreadPolicy = 'strict' | 'start-new';

export interface ExplorationThread {
  id: string;
  name: string;
  question: string;                    // driving question
  createdAt: Date;
  updatedAt: Date;
  status: ThreadStatus;
  depth: number;                       // number of links in the chain
  rootIntrospectionId: string;
  currentIntrospectionId: string;
  branchedFromThreadId: string | null;
  branchedFromLinkId: string | null;
  conclusion: string | null;
  tags: string[];
}

export interface ThreadLink {
  id: string;
  threadId: string;
  introspectionId: string;             // owned by the introspection journal
  parentLinkId: string | null;         // null for the root link
  depth: number;                       // 0 = root
  question: string;
  insightSummary: string | null;
  createdAt: Date;
  leadsToBranchIds: string[];
}

export interface StartThreadInput {
  name: string;
  question: string;
  introspectionId: string;
  insightSummary?: string;
  tags?: string[];
}

export interface ContinueThreadInput {
  introspectionId: string;
  question: string;
  insightSummary?: string;
}

export interface BranchThreadInput extends StartThreadInput {
  fromThread: string;
  fromLinkId: string;
}

/**
 * Read access to the journal that owns the introspection text.
 */
export interface IntrospectionJournal {
  fetch(introspectionId: string): Promise<IntrospectionSummary | null>;
}

export interface IntrospectionSummary {
  text: string;
  awarenessNotes?: string;
  tensionLevel?: number;
}

export interface LinkedIntrospection {
  linkId: string;
  question: string;
  insight: string | null;
  introspection: IntrospectionSummary;
}

export interface ThreadContext {
  thread: ExplorationThread;
  chainLength: number;
  recentLinks: ThreadLink[];
  questionsExplored: string[];
  introspections?: LinkedIntrospection[];
  narrative: string;
}

export interface ThreadContextOptions {
  includeContent?: boolean;
  maxIntrospections?: number;
}

export interface ExplorationStats {
  totalThreads: number;
  activeThreads: number;
  dormantThreads: number;
  concludedThreads: number;
  totalLinks: number;
  averageDepth: number;
  branchedThreads: number;
}
