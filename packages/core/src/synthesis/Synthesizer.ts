/**
 * Synthesizer - derives registry declarations from a SystemSpec
 *
 * Output, in declaration order:
 *   1. one handler interface per handler (its functions' dest names)
 *   2. the capability interface `<System>Object`: extends the requirements,
 *      two optional accessors per handler
 *   3. the registry `<System>`: an owned object sequence, one index cache per
 *      handler, the built-in operations and one dispatch method per function
 *
 * synthesize() is pure: the same spec always yields structurally identical
 * declarations and the same checksum.
 */

import { createHash } from 'crypto';
import type {
  AccessorDeclaration,
  BuiltinMethodDeclaration,
  CapabilityInterfaceDeclaration,
  DeclarationSet,
  DispatchMethodDeclaration,
  HandlerInterfaceDeclaration,
  HandlerSpec,
  RegistryDeclaration,
  RegistryFieldDeclaration,
  SystemSpec,
} from '@handlerkit/types';
import { silentLogger, type Logger } from '../logging/Logger.js';
import { resolveNaming, type NamingConvention, type NamingOptions } from '../naming.js';
import { validateGeneratedNames, validateSystemSpec } from '../schema/validateSchema.js';

export interface SynthesizeOptions {
  naming?: Partial<NamingOptions>;
  logger?: Logger;
}

const BUILTIN_METHODS: BuiltinMethodDeclaration[] = [
  { kind: 'builtin', name: 'create' },
  { kind: 'builtin', name: 'add' },
  { kind: 'builtin', name: 'iterate' },
  { kind: 'builtin', name: 'iterateMut' },
];

function handlerInterface(handler: HandlerSpec): HandlerInterfaceDeclaration {
  return {
    kind: 'handler-interface',
    name: handler.name,
    methods: handler.functions.map((fn) => ({
      name: fn.destName,
      params: fn.params.map((p) => ({ name: p.name, type: p.type })),
    })),
  };
}

function capabilityInterface(spec: SystemSpec, naming: NamingConvention): CapabilityInterfaceDeclaration {
  const accessors: AccessorDeclaration[] = [];

  for (const handler of spec.handlers) {
    accessors.push(
      { name: naming.readAccessor(handler.name), handler: handler.name, mode: 'read' },
      { name: naming.writeAccessor(handler.name), handler: handler.name, mode: 'write' }
    );
  }

  return {
    kind: 'capability-interface',
    name: naming.capabilityInterface(spec.name),
    extends: [...spec.requirements],
    accessors,
  };
}

function dispatchMethods(handler: HandlerSpec, naming: NamingConvention): DispatchMethodDeclaration[] {
  return handler.functions.map((fn): DispatchMethodDeclaration => ({
    kind: 'dispatch',
    name: fn.sourceName,
    handler: handler.name,
    cache: naming.indexCache(handler.name),
    accessor: naming.writeAccessor(handler.name),
    target: fn.destName,
    params: fn.params.map((p) => ({ name: p.name, type: p.type })),
  }));
}

function registry(spec: SystemSpec, naming: NamingConvention): RegistryDeclaration {
  const objectType = naming.capabilityInterface(spec.name);

  const fields: RegistryFieldDeclaration[] = [
    { kind: 'objects', name: 'objects', elementType: objectType },
    ...spec.handlers.map((handler): RegistryFieldDeclaration => ({
      kind: 'index-cache',
      name: naming.indexCache(handler.name),
      handler: handler.name,
    })),
  ];

  return {
    kind: 'registry',
    name: spec.name,
    objectType,
    fields,
    methods: [
      ...BUILTIN_METHODS.map((m) => ({ ...m })),
      ...spec.handlers.flatMap((handler) => dispatchMethods(handler, naming)),
    ],
  };
}

/**
 * sha256 over the declarations. Key order is fixed by construction, so
 * JSON.stringify is a stable normal form here.
 */
export function computeChecksum(declarations: Omit<DeclarationSet, 'checksum'>): string {
  const content = {
    system: declarations.system,
    handlerInterfaces: declarations.handlerInterfaces,
    capabilityInterface: declarations.capabilityInterface,
    registry: declarations.registry,
  };
  return `sha256:${createHash('sha256').update(JSON.stringify(content)).digest('hex')}`;
}

/**
 * Synthesize the declaration set for a system.
 *
 * @throws SchemaError if the SystemSpec is ill-formed or its derived names
 *   collide (see validateSystemSpec, validateGeneratedNames)
 */
export function synthesize(spec: SystemSpec, options: SynthesizeOptions = {}): DeclarationSet {
  const logger = options.logger ?? silentLogger;
  validateSystemSpec(spec);

  const naming = resolveNaming(options.naming);
  validateGeneratedNames(spec, naming);
  const body = {
    system: spec.name,
    handlerInterfaces: spec.handlers.map(handlerInterface),
    capabilityInterface: capabilityInterface(spec, naming),
    registry: registry(spec, naming),
  };
  const declarations: DeclarationSet = { ...body, checksum: computeChecksum(body) };

  logger.debug('Synthesized registry', {
    system: spec.name,
    handlers: spec.handlers.length,
    dispatchMethods: declarations.registry.methods.length - BUILTIN_METHODS.length,
    checksum: declarations.checksum,
  });

  return declarations;
}
