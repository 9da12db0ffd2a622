/**
 * Declaration model - abstract output of synthesis
 *
 * Declarations are language-neutral descriptions of the interfaces and the
 * registry type derived from a SystemSpec. The runtime Registry consumes
 * them directly; a source backend could render them instead.
 */

import type { ParameterSpec } from './schema.js';

/**
 * Optional accessor on the capability interface.
 * `read` yields a read view of the handler, `write` a mutable one.
 */
export interface AccessorDeclaration {
  name: string;
  handler: string;
  mode: 'read' | 'write';
}

/**
 * Method on a handler interface (mutating, no return value)
 */
export interface HandlerMethodDeclaration {
  name: string;
  params: ParameterSpec[];
}

export interface HandlerInterfaceDeclaration {
  kind: 'handler-interface';
  name: string;
  methods: HandlerMethodDeclaration[];
}

export interface CapabilityInterfaceDeclaration {
  kind: 'capability-interface';
  name: string;
  extends: string[];
  accessors: AccessorDeclaration[];
}

/**
 * Field of the registry type.
 * `objects` holds the owned values; every other field is an index cache.
 */
export type RegistryFieldDeclaration =
  | { kind: 'objects'; name: string; elementType: string }
  | { kind: 'index-cache'; name: string; handler: string };

export interface DispatchMethodDeclaration {
  kind: 'dispatch';
  name: string;
  handler: string;
  /** Index cache field the method walks */
  cache: string;
  /** Write accessor used to reach the handler view */
  accessor: string;
  target: string;
  params: ParameterSpec[];
}

export type BuiltinOperation = 'create' | 'add' | 'iterate' | 'iterateMut';

export interface BuiltinMethodDeclaration {
  kind: 'builtin';
  name: BuiltinOperation;
}

export type RegistryMethodDeclaration = BuiltinMethodDeclaration | DispatchMethodDeclaration;

export interface RegistryDeclaration {
  kind: 'registry';
  name: string;
  objectType: string;
  fields: RegistryFieldDeclaration[];
  methods: RegistryMethodDeclaration[];
}

/**
 * Complete synthesis output for one SystemSpec.
 *
 * `checksum` is computed over the normalized declarations, so two syntheses
 * of the same spec compare equal by checksum alone.
 */
export interface DeclarationSet {
  system: string;
  handlerInterfaces: HandlerInterfaceDeclaration[];
  capabilityInterface: CapabilityInterfaceDeclaration;
  registry: RegistryDeclaration;
  checksum: string;
}

export interface BoundAccessorDeclaration extends AccessorDeclaration {
  present: boolean;
}

/**
 * Capability-query implementation for one concrete object type
 */
export interface ObjectBindingDeclaration {
  typeName: string;
  system?: string;
  implemented: string[];
  accessors: BoundAccessorDeclaration[];
}
