/**
 * Terminal formatting helpers
 */

import chalk from 'chalk';
import type { ExplorationThread, ThreadStatus } from '../exploration/types.js';
import type { MemoryEntry, MemoryTier } from '../memory/types.js';

export const icons = {
  // Tiers
  working: '\u{1F4AD}',   // thought balloon
  episodic: '\u{1F4D6}',  // open book
  semantic: '\u{1F4A1}',  // lightbulb
  longterm: '\u{2B50}',   // star

  thread: '\u{1F9F5}',    // thread
  brain: '\u{1F9E0}',
  search: '\u{1F50D}',
};

const tierColors: Record<MemoryTier, typeof chalk> = {
  working: chalk.gray,
  episodic: chalk.blue,
  semantic: chalk.green,
  longterm: chalk.magenta,
};

const statusColors: Record<ThreadStatus, typeof chalk> = {
  active: chalk.green,
  dormant: chalk.yellow,
  concluded: chalk.gray,
};

export function formatMemory(entry: MemoryEntry, options: { showId?: boolean } = {}): string {
  const colorFn = tierColors[entry.tier];
  let output = `${icons[entry.tier]} ${colorFn(`[${entry.tier}]`)} ${chalk.white(entry.content)}`;

  const details = [`importance ${entry.importance.toFixed(2)}`];
  if (entry.emotionalValence !== 'neutral') {
    details.push(entry.emotionalValence);
  }
  if (entry.tags.length > 0) {
    details.push(entry.tags.map((t) => `#${t}`).join(' '));
  }
  output += `\n   ${chalk.gray(details.join(' | '))}`;

  if (options.showId) {
    output += `\n   ${chalk.dim(`ID: ${entry.id}`)}`;
  }
  return output;
}

export function formatThread(thread: ExplorationThread): string {
  const status = statusColors[thread.status](thread.status);
  const branched = thread.branchedFromThreadId ? chalk.gray(' (branch)') : '';
  return `${icons.thread} ${chalk.bold(thread.name)}${branched} ${chalk.gray(`[${thread.id}]`)}\n` +
    `   ${thread.question}\n` +
    `   ${chalk.gray(`depth ${thread.depth} |`)} ${status}`;
}

export function emptyState(message: string, hint?: string): void {
  console.log();
  console.log(chalk.gray(`   ${message}`));
  if (hint) {
    console.log(chalk.gray.dim(`   ${hint}`));
  }
  console.log();
}

export function success(message: string): string {
  return chalk.green('✓') + ' ' + message;
}

export function info(message: string): string {
  return chalk.blue('ℹ') + ' ' + message;
}

export function header(text: string, emoji?: string): string {
  const decoration = chalk.gray('─'.repeat(40));
  const prefix = emoji ? emoji + ' ' : '';
  return `\n${decoration}\n${prefix}${chalk.bold.cyan(text)}\n${decoration}\n`;
}

export function list(items: string[], options?: { bullet?: string; indent?: number }): string {
  const bullet = options?.bullet ?? chalk.cyan('•');
  const indent = ' '.repeat(options?.indent ?? 2);
  return items.map(item => `${indent}${bullet} ${item}`).join('\n');
}

export function keyValue(key: string, value: string, keyWidth?: number): string {
  const width = keyWidth ?? 15;
  const paddedKey = key.padEnd(width);
  return `${chalk.cyan(paddedKey)} ${value}`;
}

export function dim(text: string): string {
  return chalk.gray(text);
}
