/**
 * Check command - validate schema documents
 *
 * Loads and synthesizes each document; reports one line per file.
 * Without arguments, checks the `schemas` listed in .handlerkit/config.yaml.
 */

import { Command } from 'commander';
import { resolve } from 'path';
import { loadSystemSpec, synthesize, type Logger, type NamingOptions } from '@handlerkit/core';
import { createCommandContext, type CommonOptions } from '../utils/commandContext.js';
import { describeError, exitWithError } from '../utils/errorFormatter.js';

interface CheckCommandOptions extends CommonOptions {
  quiet?: boolean;
}

export type SchemaCheckResult =
  | { file: string; ok: true; system: string; handlers: number; checksum: string }
  | { file: string; ok: false; error: string };

/**
 * Load and synthesize each schema; never throws for a bad document.
 */
export function checkSchemas(
  files: readonly string[],
  naming: Partial<NamingOptions>,
  logger?: Logger
): SchemaCheckResult[] {
  return files.map((file): SchemaCheckResult => {
    try {
      const spec = loadSystemSpec(file, logger);
      const declarations = synthesize(spec, { naming, logger });
      return {
        file,
        ok: true,
        system: spec.name,
        handlers: spec.handlers.length,
        checksum: declarations.checksum,
      };
    } catch (err) {
      return { file, ok: false, error: describeError(err).title };
    }
  });
}

export function formatCheckResult(result: SchemaCheckResult, displayPath: string): string {
  if (result.ok) {
    return `✓ ${displayPath} (${result.system}: ${result.handlers} handler${result.handlers === 1 ? '' : 's'})`;
  }
  return `✗ ${displayPath}: ${result.error}`;
}

export const checkCommand = new Command('check')
  .description('Validate schema documents')
  .argument('[schemas...]', 'Schema documents (default: schemas from config)')
  .option('-p, --project <path>', 'Project path', '.')
  .option('-q, --quiet', 'Only output failures')
  .option('--log-level <level>', 'Log level: silent, errors, warnings, info, debug')
  .addHelpText('after', `
Examples:
  handlerkit check                       Check schemas listed in .handlerkit/config.yaml
  handlerkit check schemas/world.yaml    Check one document
  handlerkit check -q a.yaml b.yaml      Only report failures
`)
  .action((schemas: string[], options: CheckCommandOptions) => {
    const { projectPath, config, logger } = createCommandContext(options);
    const targets = schemas.length > 0 ? schemas : config.schemas;

    if (targets.length === 0) {
      exitWithError('No schema documents to check', [
        'Pass schema paths: handlerkit check schemas/world.yaml',
        'Or list them under "schemas" in .handlerkit/config.yaml',
      ]);
    }

    const results = checkSchemas(targets.map((t) => resolve(projectPath, t)), config.naming, logger);

    results.forEach((result, i) => {
      if (result.ok && options.quiet) return;
      console.log(formatCheckResult(result, targets[i]));
    });

    const failed = results.filter((r) => !r.ok).length;
    if (failed > 0) {
      console.log('');
      console.log(`${failed} of ${results.length} schema document(s) failed`);
      process.exitCode = 1;
    }
  });
