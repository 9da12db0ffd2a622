/**
 * Bind command - emit the capability accessors of one object type
 *
 * Usage:
 *   handlerkit bind schemas/world.yaml --type Sprite --implements Drawable,Updatable
 */

import { Command } from 'commander';
import { resolve } from 'path';
import { bindObjectType, loadSystemSpec, synthesize } from '@handlerkit/core';
import { createCommandContext, type CommonOptions } from '../utils/commandContext.js';
import { exitWithError, exitWithFailure } from '../utils/errorFormatter.js';
import { formatBindingSummary, isOutputFormat } from '../utils/formatDeclarations.js';

interface BindCommandOptions extends CommonOptions {
  type: string;
  implements: string;
  format: string;
}

/** "Drawable, Updatable" -> ['Drawable', 'Updatable'] */
export function parseHandlerList(value: string): string[] {
  return value
    .split(',')
    .map((name) => name.trim())
    .filter((name) => name.length > 0);
}

export const bindCommand = new Command('bind')
  .description('Emit the capability accessors of an object type')
  .argument('<schema>', 'Schema document (YAML or JSON)')
  .requiredOption('-t, --type <name>', 'Object type name')
  .option('-i, --implements <handlers>', 'Comma-separated handlers the type implements', '')
  .option('-p, --project <path>', 'Project path', '.')
  .option('-f, --format <format>', 'Output format: summary or json', 'json')
  .option('--log-level <level>', 'Log level: silent, errors, warnings, info, debug')
  .addHelpText('after', `
Examples:
  handlerkit bind world.yaml -t Sprite -i Drawable           Sprite supports Drawable only
  handlerkit bind world.yaml -t Ghost                        Ghost supports nothing
  handlerkit bind world.yaml -t Hero -i Drawable,Updatable -f summary
`)
  .action((schema: string, options: BindCommandOptions) => {
    const { projectPath, config, logger } = createCommandContext(options);

    if (!isOutputFormat(options.format)) {
      exitWithError(`Unknown format: ${options.format}`, ['Use --format summary or --format json']);
    }

    try {
      const spec = loadSystemSpec(resolve(projectPath, schema), logger);
      const declarations = synthesize(spec, { naming: config.naming, logger });
      const binding = bindObjectType(declarations, options.type, parseHandlerList(options.implements));

      console.log(options.format === 'json' ? JSON.stringify(binding, null, 2) : formatBindingSummary(binding));
    } catch (err) {
      exitWithFailure(err);
    }
  });
