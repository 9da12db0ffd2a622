/**
 * Standardized error formatting for CLI commands
 *
 * Format:
 *   ✗ Main error message (1 line, concise)
 *
 *   → Next action 1
 *   → Next action 2
 */

import { HandlerKitError } from '@handlerkit/core';

export interface FormattedError {
  title: string;
  nextSteps: string[];
}

/**
 * Turn a thrown value into a title and next steps.
 * HandlerKitErrors contribute their code, source file and suggestion.
 */
export function describeError(err: unknown): FormattedError {
  if (err instanceof HandlerKitError) {
    const nextSteps: string[] = [];
    if (err.context.source) {
      nextSteps.push(`In: ${err.context.source.file}`);
    }
    if (err.suggestion) {
      nextSteps.push(err.suggestion);
    }
    return { title: `${err.message} (${err.code})`, nextSteps };
  }
  return { title: err instanceof Error ? err.message : String(err), nextSteps: [] };
}

/**
 * Print a standardized error message and exit.
 *
 * @example
 * exitWithError('Schema document not found', [
 *   'Run: handlerkit check schemas/world.yaml'
 * ]);
 */
export function exitWithError(title: string, nextSteps?: string[]): never {
  console.error(`✗ ${title}`);

  if (nextSteps && nextSteps.length > 0) {
    console.error('');
    for (const step of nextSteps) {
      console.error(`→ ${step}`);
    }
  }

  process.exit(1);
}

export function exitWithFailure(err: unknown): never {
  const { title, nextSteps } = describeError(err);
  return exitWithError(title, nextSteps);
}
