#!/usr/bin/env node
/**
 * @handlerkit/cli - CLI for the handlerkit registry generator
 */

import { Command } from 'commander';
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import { synthesizeCommand } from './commands/synthesize.js';
import { bindCommand } from './commands/bind.js';
import { checkCommand } from './commands/check.js';

// Read version from package.json
const __dirname = dirname(fileURLToPath(import.meta.url));
const pkg: { version: string } = JSON.parse(readFileSync(join(__dirname, '..', 'package.json'), 'utf-8'));

const program = new Command();

program
  .name('handlerkit')
  .description('Generate capability registries from handler schemas')
  .version(pkg.version);

program.addCommand(synthesizeCommand);
program.addCommand(bindCommand);
program.addCommand(checkCommand);

program.parse();
