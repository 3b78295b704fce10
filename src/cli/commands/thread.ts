import { Argument, Command, Option } from '@commander-js/extra-typings';
import chalk from 'chalk';
import { generateId } from '../../core/ids.js';
import { THREAD_STATUSES } from '../../exploration/types.js';
import { exitWithError, parseList, parsePositiveInt, withRuntime } from '../context.js';
import { emptyState, formatThread, header, icons, keyValue, success } from '../ui.js';

export const threadCommand = new Command('thread')
  .description('Manage exploration threads (branchable chains of introspection)');

// Manual entries have no journal behind them, so they get a fresh id
function introspectionId(given: string | undefined): string {
  return given ?? generateId('introspection', new Date());
}

// mnemos thread start <name> <question>
threadCommand
  .command('start')
  .argument('<name>', 'Short name for the thread')
  .argument('<question>', 'The driving question')
  .option('--introspection <id>', 'Introspection that opens the thread')
  .option('--insight <text>', 'What the first introspection found')
  .option('--tags <tags>', 'Comma-separated tags', parseList)
  .description('Start a new thread')
  .action(async (name, question, options) => {
    try {
      const thread = await withRuntime(({ tracker }) =>
        tracker.startThread({
          name,
          question,
          introspectionId: introspectionId(options.introspection),
          insightSummary: options.insight,
          tags: options.tags,
        })
      );
      console.log(success('Started thread:'));
      console.log(formatThread(thread));
    } catch (error) {
      exitWithError(error);
    }
  });

// mnemos thread continue <thread> <question>
threadCommand
  .command('continue')
  .argument('<thread>', 'Thread id or name')
  .argument('<question>', 'The question explored this time')
  .option('--introspection <id>', 'Introspection being appended')
  .option('--insight <text>', 'What was found')
  .description('Append an introspection to a thread')
  .action(async (ref, question, options) => {
    try {
      const link = await withRuntime(({ tracker }) =>
        tracker.continueThread(ref, {
          question,
          introspectionId: introspectionId(options.introspection),
          insightSummary: options.insight,
        })
      );
      console.log(success(`Continued thread ${chalk.gray(`[${link.threadId}]`)} at depth ${link.depth}`));
      console.log(chalk.gray(`  Link: ${link.id}`));
    } catch (error) {
      exitWithError(error);
    }
  });

// mnemos thread branch <from-thread> <from-link> <name> <question>
threadCommand
  .command('branch')
  .argument('<from-thread>', 'Parent thread id or name')
  .argument('<from-link>', 'Link id to branch from')
  .argument('<name>', 'Name for the new thread')
  .argument('<question>', 'The new driving question')
  .option('--introspection <id>', 'Introspection that opens the branch')
  .option('--insight <text>', 'What the first introspection found')
  .option('--tags <tags>', 'Comma-separated tags', parseList)
  .description('Fork a new thread from a link in an existing one')
  .action(async (fromThread, fromLinkId, name, question, options) => {
    try {
      const thread = await withRuntime(({ tracker }) =>
        tracker.branchThread({
          fromThread,
          fromLinkId,
          name,
          question,
          introspectionId: introspectionId(options.introspection),
          insightSummary: options.insight,
          tags: options.tags,
        })
      );
      console.log(success(thread.branchedFromThreadId ? 'Branched thread:' : 'Branch origin not found; started thread:'));
      console.log(formatThread(thread));
    } catch (error) {
      exitWithError(error);
    }
  });

// mnemos thread status <thread> <status>
threadCommand
  .command('status')
  .argument('<thread>', 'Thread id or name')
  .addArgument(new Argument('<status>', 'New status').choices(THREAD_STATUSES))
  .option('--conclusion <text>', 'What the thread concluded')
  .description('Mark a thread active, dormant or concluded')
  .action(async (ref, status, options) => {
    try {
      const thread = await withRuntime(({ tracker }) => tracker.setThreadStatus(ref, status, options.conclusion));
      console.log(success(`Thread '${thread.name}' is now ${thread.status}`));
    } catch (error) {
      exitWithError(error);
    }
  });

// mnemos thread list
threadCommand
  .command('list')
  .addOption(new Option('-s, --status <status>', 'Filter by status').choices(THREAD_STATUSES))
  .option('-n, --limit <n>', 'Maximum threads', parsePositiveInt, 20)
  .description('List threads, most recently updated first')
  .action(async (options) => {
    try {
      const threads = await withRuntime(({ tracker }) => tracker.listThreads(options.status, options.limit));
      if (threads.length === 0) {
        emptyState('No exploration threads yet.', 'Start one with `mnemos thread start <name> <question>`.');
        return;
      }
      console.log();
      for (const thread of threads) {
        console.log(formatThread(thread));
        console.log();
      }
    } catch (error) {
      exitWithError(error);
    }
  });

// mnemos thread show <thread>
threadCommand
  .command('show')
  .argument('<thread>', 'Thread id or name')
  .option('-n, --recent <n>', 'Recent links to list', parsePositiveInt, 5)
  .description('Show the path of inquiry for a thread')
  .action(async (ref, options) => {
    try {
      const context = await withRuntime(({ tracker }) =>
        tracker.getThreadContext(ref, { includeContent: false, maxIntrospections: options.recent })
      );
      console.log(header(context.thread.name, icons.thread));
      console.log(context.narrative);
      console.log();
      console.log(chalk.gray('Links:'));
      for (const link of context.recentLinks) {
        const branches = link.leadsToBranchIds.length > 0 ? chalk.yellow(` → ${link.leadsToBranchIds.length} branch(es)`) : '';
        console.log(chalk.gray(`  ${link.depth}. [${link.id}] `) + link.question + branches);
      }
      console.log();
    } catch (error) {
      exitWithError(error);
    }
  });

// mnemos thread search <text>
threadCommand
  .command('search')
  .argument('<text>', 'Text to look for in names and questions')
  .option('-n, --limit <n>', 'Maximum threads', parsePositiveInt, 5)
  .description('Find threads by name or question')
  .action(async (text, options) => {
    try {
      const threads = await withRuntime(({ tracker }) => tracker.searchThreads(text, options.limit));
      if (threads.length === 0) {
        emptyState(`No threads match "${text}"`);
        return;
      }
      console.log();
      for (const thread of threads) {
        console.log(formatThread(thread));
        console.log();
      }
    } catch (error) {
      exitWithError(error);
    }
  });

// mnemos thread stats
threadCommand
  .command('stats')
  .description('Show thread statistics')
  .action(async () => {
    try {
      const stats = await withRuntime(({ tracker }) => tracker.getStats());
      console.log(keyValue('Threads', String(stats.totalThreads)));
      console.log(keyValue('Active', String(stats.activeThreads)));
      console.log(keyValue('Dormant', String(stats.dormantThreads)));
      console.log(keyValue('Concluded', String(stats.concludedThreads)));
      console.log(keyValue('Branched', String(stats.branchedThreads)));
      console.log(keyValue('Links', String(stats.totalLinks)));
      console.log(keyValue('Average depth', String(stats.averageDepth)));
    } catch (error) {
      exitWithError(error);
    }
  });
