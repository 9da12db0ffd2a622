/**
 * Shared setup for commands: project config and logger.
 */

import { resolve } from 'path';
import {
  createLogger,
  isLogLevel,
  loadConfig,
  LOG_LEVELS,
  type HandlerKitConfig,
  type Logger,
} from '@handlerkit/core';
import { exitWithError, exitWithFailure } from './errorFormatter.js';

export interface CommonOptions {
  project: string;
  logLevel?: string;
}

export interface CommandContext {
  projectPath: string;
  config: HandlerKitConfig;
  logger: Logger;
}

export function createCommandContext(options: CommonOptions): CommandContext {
  const projectPath = resolve(options.project);

  let config: HandlerKitConfig;
  try {
    config = loadConfig(projectPath);
  } catch (err) {
    return exitWithFailure(err);
  }

  const level = options.logLevel ?? config.logLevel;
  if (!isLogLevel(level)) {
    return exitWithError(`Unknown log level: ${level}`, [`Use one of: ${LOG_LEVELS.join(', ')}`]);
  }

  return { projectPath, config, logger: createLogger(level) };
}
