/**
 * @handlerkit/types - Type definitions for the handlerkit registry generator
 */

// Schema model
export type { SourceLocation, ParameterSpec, FunctionSpec, HandlerSpec, SystemSpec } from './schema.js';

// Synthesis output
export type {
  AccessorDeclaration,
  HandlerMethodDeclaration,
  HandlerInterfaceDeclaration,
  CapabilityInterfaceDeclaration,
  RegistryFieldDeclaration,
  DispatchMethodDeclaration,
  BuiltinOperation,
  BuiltinMethodDeclaration,
  RegistryMethodDeclaration,
  RegistryDeclaration,
  DeclarationSet,
  BoundAccessorDeclaration,
  ObjectBindingDeclaration,
} from './declarations.js';

// Runtime capability contract
export type {
  HandlerMap,
  ReadAccessors,
  WriteAccessors,
  CapabilityAccessors,
  DispatchSignatures,
} from './capabilities.js';
