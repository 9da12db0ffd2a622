/**
 * SchemaLoader - reads structured schema documents (YAML or JSON)
 *
 * Example document:
 *
 * ```yaml
 * name: World
 * requirements: [Debug]
 * handlers:
 *   - name: Drawable
 *     functions:
 *       - name: draw
 *   - name: Updatable
 *     functions:
 *       - source: tick
 *         dest: update
 *         params:
 *           - { name: dt, type: number }
 * ```
 *
 * A function entry uses either `name` (source and dest alike) or
 * `source` + `dest`. YAML is a superset of JSON, so one parser covers both.
 */

import { readFileSync } from 'fs';
import { parse as parseYAML } from 'yaml';
import type { ParameterSpec, SourceLocation, SystemSpec } from '@handlerkit/types';
import { SchemaError, type ErrorContext } from '../errors/HandlerKitError.js';
import { silentLogger, type Logger } from '../logging/Logger.js';
import { HandlerSpecBuilder, SystemSpecBuilder } from './SchemaBuilder.js';

type DocumentRecord = Record<string, unknown>;

function isRecord(value: unknown): value is DocumentRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function documentError(message: string, context: ErrorContext): SchemaError {
  return new SchemaError(message, 'ERR_SCHEMA_DOCUMENT', context);
}

function readString(record: DocumentRecord, key: string, path: string, context: ErrorContext): string {
  const value = record[key];
  if (typeof value !== 'string' || !value.trim()) {
    throw documentError(`${path}.${key} must be a non-empty string`, context);
  }
  return value;
}

function readList(record: DocumentRecord, key: string, path: string, context: ErrorContext): unknown[] {
  const value = record[key];
  if (value === undefined || value === null) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw documentError(`${path}.${key} must be an array, got ${typeof value}`, context);
  }
  return value;
}

function readParams(entry: DocumentRecord, path: string, context: ErrorContext): ParameterSpec[] {
  return readList(entry, 'params', path, context).map((param, i) => {
    const paramPath = `${path}.params[${i}]`;
    if (!isRecord(param)) {
      throw documentError(`${paramPath} must be an object`, context);
    }
    return {
      name: readString(param, 'name', paramPath, context),
      type: readString(param, 'type', paramPath, context),
    };
  });
}

/**
 * Parse a schema document into a SystemSpec.
 *
 * Only the document shape is checked here. Identifier and uniqueness rules
 * belong to validateSystemSpec(), which synthesis runs.
 *
 * @throws SchemaError (ERR_SCHEMA_DOCUMENT) on unparsable text or wrong shape
 */
export function parseSystemDocument(text: string, file?: string): SystemSpec {
  const context: ErrorContext = file ? { source: { file } } : {};

  let doc: unknown;
  try {
    doc = parseYAML(text);
  } catch (err) {
    const error = err instanceof Error ? err : new Error(String(err));
    throw documentError(`Failed to parse schema document: ${error.message}`, context);
  }

  if (!isRecord(doc)) {
    throw documentError('Schema document must be a mapping with name and handlers', context);
  }

  const source: SourceLocation | undefined = file ? { file } : undefined;
  const system = new SystemSpecBuilder(readString(doc, 'name', 'schema', context), source);

  for (const [i, requirement] of readList(doc, 'requirements', 'schema', context).entries()) {
    if (typeof requirement !== 'string') {
      throw documentError(`schema.requirements[${i}] must be a string`, context);
    }
    system.addRequirement(requirement);
  }

  for (const [i, handlerEntry] of readList(doc, 'handlers', 'schema', context).entries()) {
    const handlerPath = `handlers[${i}]`;
    if (!isRecord(handlerEntry)) {
      throw documentError(`${handlerPath} must be an object`, context);
    }
    const handler = new HandlerSpecBuilder(readString(handlerEntry, 'name', handlerPath, context));

    for (const [j, fnEntry] of readList(handlerEntry, 'functions', handlerPath, context).entries()) {
      const fnPath = `${handlerPath}.functions[${j}]`;
      if (!isRecord(fnEntry)) {
        throw documentError(`${fnPath} must be an object`, context);
      }

      const hasName = fnEntry.name !== undefined;
      const sourceName = hasName
        ? readString(fnEntry, 'name', fnPath, context)
        : readString(fnEntry, 'source', fnPath, context);
      const destName = fnEntry.dest !== undefined
        ? readString(fnEntry, 'dest', fnPath, context)
        : sourceName;

      handler.fn(sourceName, destName, readParams(fnEntry, fnPath, context));
    }

    system.addHandler(handler);
  }

  return system.build();
}

/**
 * Read and parse a schema document from disk.
 */
export function loadSystemSpec(filePath: string, logger: Logger = silentLogger): SystemSpec {
  let text: string;
  try {
    text = readFileSync(filePath, 'utf-8');
  } catch (err) {
    const error = err instanceof Error ? err : new Error(String(err));
    throw documentError(`Cannot read schema document: ${error.message}`, { source: { file: filePath } });
  }

  const spec = parseSystemDocument(text, filePath);
  logger.debug('Loaded schema document', {
    file: filePath,
    system: spec.name,
    handlers: spec.handlers.length,
  });
  return spec;
}
