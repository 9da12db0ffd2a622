/**
 * ObjectBinder - capability-query implementation for concrete object types
 *
 * For every handler in a system's vocabulary, a bound type answers
 * `asH()` / `asHMut()` with itself when it implements H, and with
 * `undefined` otherwise. The implemented set is fixed per type: it is
 * written once onto the prototype and never consulted again.
 *
 * Pair applyBinding() with interface merging so the accessors are typed:
 *
 * @example
 * class Sprite implements Drawable { draw(): void {} }
 * interface Sprite extends WorldObject {}
 * bindCapabilities(declarations, Sprite, ['Drawable']);
 */

import type { AccessorDeclaration, DeclarationSet, ObjectBindingDeclaration } from '@handlerkit/types';
import { SchemaError } from '../errors/HandlerKitError.js';
import { resolveNaming, type NamingOptions } from '../naming.js';

/**
 * Handler names of a system, or the declarations synthesized for it
 */
export type HandlerVocabulary = readonly string[] | DeclarationSet;

function isDeclarationSet(vocabulary: HandlerVocabulary): vocabulary is DeclarationSet {
  return !Array.isArray(vocabulary);
}

/**
 * Emit the binding declaration for one object type.
 *
 * A DeclarationSet vocabulary carries its own accessor names; a plain list of
 * handler names uses `naming` (default convention when omitted).
 *
 * @throws SchemaError (ERR_UNKNOWN_HANDLER) if `implemented` names a handler
 *   outside the vocabulary, (ERR_DUPLICATE_HANDLER) if it names one twice,
 *   (ERR_NAME_COLLISION) if two vocabulary handlers derive the same accessor
 */
export function bindObjectType(
  vocabulary: HandlerVocabulary,
  typeName: string,
  implemented: readonly string[],
  naming?: Partial<NamingOptions>
): ObjectBindingDeclaration {
  const convention = resolveNaming(naming);
  const accessors: readonly AccessorDeclaration[] = isDeclarationSet(vocabulary)
    ? vocabulary.capabilityInterface.accessors
    : vocabulary.flatMap((handler) => [
      { name: convention.readAccessor(handler), handler, mode: 'read' as const },
      { name: convention.writeAccessor(handler), handler, mode: 'write' as const },
    ]);
  const known = new Set(accessors.map((a) => a.handler));
  const system = isDeclarationSet(vocabulary) ? vocabulary.system : undefined;

  const accessorOwners = new Map<string, string>();
  for (const accessor of accessors) {
    const owner = accessorOwners.get(accessor.name);
    if (owner !== undefined) {
      throw new SchemaError(
        `Accessor "${accessor.name}" is generated for both "${owner}" and "${accessor.handler}"`,
        'ERR_NAME_COLLISION',
        { handler: accessor.handler, type: typeName, ...(system !== undefined ? { system } : {}) },
        'Rename a handler or change the naming options'
      );
    }
    accessorOwners.set(accessor.name, accessor.handler);
  }

  const seen = new Set<string>();
  for (const handler of implemented) {
    if (!known.has(handler)) {
      throw new SchemaError(
        `Type "${typeName}" implements unknown handler "${handler}"`,
        'ERR_UNKNOWN_HANDLER',
        { handler, type: typeName, ...(system !== undefined ? { system } : {}) },
        `Known handlers: ${[...known].join(', ') || '(none)'}`
      );
    }
    if (seen.has(handler)) {
      throw new SchemaError(
        `Type "${typeName}" lists handler "${handler}" twice`,
        'ERR_DUPLICATE_HANDLER',
        { handler, type: typeName, ...(system !== undefined ? { system } : {}) }
      );
    }
    seen.add(handler);
  }

  return {
    typeName,
    ...(system !== undefined ? { system } : {}),
    implemented: [...implemented],
    accessors: accessors.map((a) => ({
      name: a.name,
      handler: a.handler,
      mode: a.mode,
      present: seen.has(a.handler),
    })),
  };
}

function presentAccessor(this: object): object {
  return this;
}

function absentAccessor(): undefined {
  return undefined;
}

/**
 * Install a binding's accessors on a class prototype.
 *
 * Accessors are non-enumerable, non-writable and non-configurable: a class is
 * bound once.
 *
 * @throws SchemaError (ERR_BINDING_CONFLICT) if the prototype already defines
 *   one of the accessors
 */
export function applyBinding<C extends abstract new (...args: never[]) => object>(
  ctor: C,
  binding: ObjectBindingDeclaration
): C {
  const proto: object = ctor.prototype;
  const taken = binding.accessors.find((a) => Object.prototype.hasOwnProperty.call(proto, a.name));
  if (taken) {
    throw new SchemaError(
      `"${binding.typeName}" already defines accessor "${taken.name}"`,
      'ERR_BINDING_CONFLICT',
      { handler: taken.handler, type: binding.typeName }
    );
  }

  for (const accessor of binding.accessors) {
    Object.defineProperty(proto, accessor.name, {
      value: accessor.present ? presentAccessor : absentAccessor,
      enumerable: false,
      writable: false,
      configurable: false,
    });
  }
  return ctor;
}

/**
 * bindObjectType() + applyBinding() for a class, named after the class.
 */
export function bindCapabilities<C extends abstract new (...args: never[]) => object>(
  declarations: DeclarationSet,
  ctor: C,
  implemented: readonly string[]
): ObjectBindingDeclaration {
  const binding = bindObjectType(declarations, ctor.name, implemented);
  applyBinding(ctor, binding);
  return binding;
}
