/**
 * Schema model - declarative description of a capability registry
 *
 * A SystemSpec names the registry, the interfaces every stored object must
 * already satisfy, and the handlers (capabilities) objects may opt into.
 * Values are plain data; builders in @handlerkit/core produce them.
 */

/**
 * Where a system was declared (schema document path, optional position)
 */
export interface SourceLocation {
  file: string;
  line?: number;
  column?: number;
}

/**
 * One argument of a handler function
 */
export interface ParameterSpec {
  readonly name: string;
  readonly type: string;
}

/**
 * One operation a handler exposes.
 *
 * `sourceName` is the registry-level dispatch method; `destName` is the
 * per-object method it fans out to. They may differ.
 */
export interface FunctionSpec {
  readonly sourceName: string;
  readonly destName: string;
  readonly params: readonly ParameterSpec[];
}

/**
 * One capability: a name and the functions it declares, in order
 */
export interface HandlerSpec {
  readonly name: string;
  readonly functions: readonly FunctionSpec[];
}

/**
 * The whole registry description
 */
export interface SystemSpec {
  readonly name: string;
  /** Interfaces every stored object must satisfy. Set semantics, first-seen order. */
  readonly requirements: readonly string[];
  readonly handlers: readonly HandlerSpec[];
  readonly source?: SourceLocation;
}
