/**
 * Synthesize command - print the declarations derived from a schema document
 *
 * Usage:
 *   handlerkit synthesize schemas/world.yaml
 *   handlerkit synthesize schemas/world.yaml --format json --output world.decl.json
 */

import { Command } from 'commander';
import { resolve } from 'path';
import { writeFileSync } from 'fs';
import { loadSystemSpec, synthesize } from '@handlerkit/core';
import { createCommandContext, type CommonOptions } from '../utils/commandContext.js';
import { exitWithError, exitWithFailure } from '../utils/errorFormatter.js';
import { formatSummary, isOutputFormat } from '../utils/formatDeclarations.js';

interface SynthesizeCommandOptions extends CommonOptions {
  format: string;
  output?: string;
}

export const synthesizeCommand = new Command('synthesize')
  .description('Synthesize registry declarations from a schema document')
  .argument('<schema>', 'Schema document (YAML or JSON)')
  .option('-p, --project <path>', 'Project path', '.')
  .option('-f, --format <format>', 'Output format: summary or json', 'summary')
  .option('-o, --output <file>', 'Output file (default: stdout)')
  .option('--log-level <level>', 'Log level: silent, errors, warnings, info, debug')
  .addHelpText('after', `
Examples:
  handlerkit synthesize schemas/world.yaml             Outline interfaces and registry
  handlerkit synthesize schemas/world.yaml -f json     Full declaration set as JSON
  handlerkit synthesize world.yaml -o world.decl.json  Write JSON to a file
`)
  .action((schema: string, options: SynthesizeCommandOptions) => {
    const { projectPath, config, logger } = createCommandContext(options);

    if (!isOutputFormat(options.format)) {
      exitWithError(`Unknown format: ${options.format}`, ['Use --format summary or --format json']);
    }

    try {
      const spec = loadSystemSpec(resolve(projectPath, schema), logger);
      const declarations = synthesize(spec, { naming: config.naming, logger });
      const output = options.format === 'json'
        ? JSON.stringify(declarations, null, 2)
        : formatSummary(declarations);

      if (options.output) {
        const outPath = resolve(projectPath, options.output);
        writeFileSync(outPath, output + '\n');
        logger.info('Wrote declarations', { file: outPath, checksum: declarations.checksum });
      } else {
        console.log(output);
      }
    } catch (err) {
      exitWithFailure(err);
    }
  });
