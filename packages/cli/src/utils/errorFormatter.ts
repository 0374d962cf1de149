/**
 * Standardized error formatting for the CLI
 *
 * Format:
 *   ✗ Main error message (1 line, concise)
 *
 *   → Next action 1
 *   → Next action 2
 */

import { ArchconfError } from '@archconf/core';

/** Exit status for every failure: usage, I/O, parse and config errors */
export const EXIT_FAILURE = 2;

/**
 * Print a standardized error message to stderr.
 *
 * @param title - Main error message (should be under 80 chars)
 * @param nextSteps - Optional actionable suggestions
 *
 * @example
 * printError('Missing input file name', ['Usage: archconf <database>.db']);
 */
export function printError(title: string, nextSteps?: string[]): void {
  console.error(`✗ ${title}`);

  if (nextSteps && nextSteps.length > 0) {
    console.error('');
    for (const step of nextSteps) {
      console.error(`→ ${step}`);
    }
  }
}

/**
 * Print any thrown value in the standard format and return EXIT_FAILURE.
 */
export function reportFailure(err: unknown): number {
  if (err instanceof ArchconfError) {
    const steps: string[] = [];
    const { filePath, lineNumber } = err.context;
    if (filePath) {
      steps.push(lineNumber ? `At ${filePath}:${lineNumber}` : `At ${filePath}`);
    }
    if (err.suggestion) {
      steps.push(err.suggestion);
    }
    printError(`${err.code}: ${err.message}`, steps);
  } else {
    printError(err instanceof Error ? err.message : String(err));
  }
  return EXIT_FAILURE;
}
