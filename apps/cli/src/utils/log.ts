import chalk from 'chalk';

let verbose = process.env.DOCSCORE_DEBUG === '1';

export function setVerbose(enabled: boolean): void {
  verbose = enabled || process.env.DOCSCORE_DEBUG === '1';
}

export function isVerbose(): boolean {
  return verbose;
}

/**
 * Dimmed diagnostic line on stderr, shown only in verbose mode.
 * stdout stays clean for JSON and markdown reports.
 */
export function log(message: string): void {
  if (verbose) {
    console.error(chalk.dim(message));
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message || 'Unknown error';
  }
  return String(error);
}
