import chalk from 'chalk';

export interface Logger {
  warn(message: string, error?: unknown): void;
  debug(message: string): void;
}

function describe(error: unknown): string {
  if (error === undefined) return '';
  return `: ${error instanceof Error ? error.message : String(error)}`;
}

/**
 * Console logger, silent unless MNEMOS_DEBUG is set.
 */
export function createConsoleLogger(enabled: boolean = Boolean(process.env.MNEMOS_DEBUG)): Logger {
  return {
    warn(message, error) {
      if (!enabled) return;
      console.error(chalk.yellow('⚠') + ' ' + message + chalk.gray(describe(error)));
    },
    debug(message) {
      if (!enabled) return;
      console.error(chalk.gray(`[mnemos] ${message}`));
    },
  };
}

export const silentLogger: Logger = {
  warn() {},
  debug() {},
};
