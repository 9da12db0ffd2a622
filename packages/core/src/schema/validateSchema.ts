/**
 * Schema validation - rejects schemas whose declarations would be ambiguous
 *
 * Runs before synthesis. Every rule throws a SchemaError on the first
 * violation; nothing is renamed or dropped to make a schema fit.
 */

import * as t from '@babel/types';
import type { SystemSpec } from '@handlerkit/types';
import { SchemaError, type ErrorContext } from '../errors/HandlerKitError.js';
import type { NamingConvention } from '../naming.js';

/**
 * Built-in operations of the synthesized registry. A dispatch method may not
 * take one of their names.
 */
export const RESERVED_OPERATIONS: readonly string[] = [
  'create',
  'add',
  'iterate',
  'iterateMut',
];

function assertIdentifier(name: unknown, what: string, context: ErrorContext): void {
  if (typeof name !== 'string' || !t.isValidIdentifier(name)) {
    throw new SchemaError(
      `Invalid ${what} name: ${JSON.stringify(name)}`,
      'ERR_INVALID_IDENTIFIER',
      context,
      'Names must be identifiers that are not reserved words'
    );
  }
}

/**
 * Validate a SystemSpec.
 *
 * @throws SchemaError - invalid identifier, duplicate handler, duplicate
 *   function or parameter, or a dispatch name used twice across the registry
 */
export function validateSystemSpec(spec: SystemSpec): void {
  const base: ErrorContext = { system: spec.name, ...(spec.source && { source: spec.source }) };

  assertIdentifier(spec.name, 'system', base);
  for (const requirement of spec.requirements) {
    assertIdentifier(requirement, 'requirement', base);
  }

  const handlerNames = new Set<string>();
  const dispatchOwners = new Map<string, string>();

  for (const handler of spec.handlers) {
    const handlerContext: ErrorContext = { ...base, handler: handler.name };
    assertIdentifier(handler.name, 'handler', handlerContext);

    if (handlerNames.has(handler.name)) {
      throw new SchemaError(
        `Duplicate handler "${handler.name}" in system "${spec.name}"`,
        'ERR_DUPLICATE_HANDLER',
        handlerContext
      );
    }
    handlerNames.add(handler.name);

    const destNames = new Set<string>();
    for (const fn of handler.functions) {
      const fnContext: ErrorContext = { ...handlerContext, function: fn.sourceName };
      assertIdentifier(fn.sourceName, 'function', fnContext);
      assertIdentifier(fn.destName, 'function', fnContext);

      if (destNames.has(fn.destName)) {
        throw new SchemaError(
          `Duplicate function "${fn.destName}" in handler "${handler.name}"`,
          'ERR_DUPLICATE_FUNCTION',
          fnContext
        );
      }
      destNames.add(fn.destName);

      if (RESERVED_OPERATIONS.includes(fn.sourceName)) {
        throw new SchemaError(
          `Dispatch method "${fn.sourceName}" collides with a built-in registry operation`,
          'ERR_DUPLICATE_DISPATCH',
          fnContext,
          `Give the function a different source name, e.g. "${fn.sourceName}All"`
        );
      }

      const owner = dispatchOwners.get(fn.sourceName);
      if (owner !== undefined) {
        throw new SchemaError(
          `Dispatch method "${fn.sourceName}" is declared by both "${owner}" and "${handler.name}"`,
          'ERR_DUPLICATE_DISPATCH',
          fnContext
        );
      }
      dispatchOwners.set(fn.sourceName, handler.name);

      const paramNames = new Set<string>();
      for (const param of fn.params) {
        assertIdentifier(param.name, 'parameter', fnContext);
        assertIdentifier(param.type, 'parameter type', fnContext);
        if (paramNames.has(param.name)) {
          throw new SchemaError(
            `Duplicate parameter "${param.name}" in "${handler.name}.${fn.destName}"`,
            'ERR_DUPLICATE_PARAMETER',
            fnContext
          );
        }
        paramNames.add(param.name);
      }
    }
  }
}

/**
 * Names of one kind that must not repeat: owner is a readable description
 * of what generated the name.
 */
class NameScope {
  private readonly owners = new Map<string, string>();

  constructor(private readonly base: ErrorContext) {}

  claim(name: string, owner: string, handler?: string): void {
    const existing = this.owners.get(name);
    if (existing !== undefined) {
      throw new SchemaError(
        `Generated name "${name}" is used by both ${existing} and ${owner}`,
        'ERR_NAME_COLLISION',
        { ...this.base, ...(handler !== undefined ? { handler } : {}), name },
        'Rename a handler or change the naming options'
      );
    }
    this.owners.set(name, owner);
  }
}

/**
 * Reject schemas whose derived names collide once the naming convention is
 * applied, e.g. handlers `Foo` and `FooMut` (both yield `asFooMut`) or `Foo`
 * and `foo` (both yield `fooIdxs`).
 *
 * Type names, capability accessors and registry fields are checked as three
 * separate scopes.
 *
 * @throws SchemaError (ERR_NAME_COLLISION)
 */
export function validateGeneratedNames(spec: SystemSpec, naming: NamingConvention): void {
  const base: ErrorContext = { system: spec.name, ...(spec.source && { source: spec.source }) };

  const types = new NameScope(base);
  types.claim(spec.name, `registry "${spec.name}"`);
  types.claim(naming.capabilityInterface(spec.name), 'the capability interface');
  for (const handler of spec.handlers) {
    types.claim(handler.name, `handler interface "${handler.name}"`, handler.name);
  }

  const accessors = new NameScope(base);
  for (const handler of spec.handlers) {
    accessors.claim(naming.readAccessor(handler.name), `read accessor of "${handler.name}"`, handler.name);
    accessors.claim(naming.writeAccessor(handler.name), `write accessor of "${handler.name}"`, handler.name);
  }

  const fields = new NameScope(base);
  fields.claim('objects', 'the objects field');
  for (const handler of spec.handlers) {
    fields.claim(naming.indexCache(handler.name), `index cache of "${handler.name}"`, handler.name);
  }
}
