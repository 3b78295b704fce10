import { InvalidArgumentError } from '@commander-js/extra-typings';
import chalk from 'chalk';
import { findProjectRoot } from '../config/index.js';
import { MnemosError } from '../core/errors.js';
import { openRuntime, type Runtime } from '../runtime.js';

export function requireProjectRoot(): string {
  const root = findProjectRoot();
  if (!root) {
    throw new MnemosError('NOT_FOUND', 'No memory store here. Run `mnemos init` first.');
  }
  return root;
}

/**
 * Open the project's stores for one command and close them afterwards.
 */
export async function withRuntime<T>(fn: (runtime: Runtime) => Promise<T> | T): Promise<T> {
  const runtime = await openRuntime(requireProjectRoot());
  try {
    return await fn(runtime);
  } finally {
    runtime.close();
  }
}

export function exitWithError(error: unknown): never {
  const message = error instanceof Error ? error.message : String(error);
  console.error(chalk.red(`Error: ${message}`));
  process.exit(1);
}

// Option parsers

export function parseUnit(value: string): number {
  const parsed = Number(value);
  if (Number.isNaN(parsed) || parsed < 0 || parsed > 1) {
    throw new InvalidArgumentError('Expected a number between 0 and 1.');
  }
  return parsed;
}

export function parsePositiveInt(value: string): number {
  const parsed = parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

export function parseList(value: string): string[] {
  return value.split(',').map((s) => s.trim()).filter((s) => s.length > 0);
}
