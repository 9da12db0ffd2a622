/**
 * SchemaBuilder - incremental construction of a SystemSpec
 *
 * Builders only accumulate. Uniqueness and identifier checks run in
 * validateSystemSpec(), which synthesize() calls before producing anything,
 * so a builder never silently overwrites an earlier handler or function.
 *
 * @example
 * const drawable = new HandlerSpecBuilder('Drawable').fn('draw');
 * const updatable = new HandlerSpecBuilder('Updatable')
 *   .fn('update', 'update', [{ name: 'dt', type: 'number' }]);
 *
 * const spec = new SystemSpecBuilder('World')
 *   .addHandler(drawable.build())
 *   .addHandler(updatable.build())
 *   .build();
 */

import type {
  FunctionSpec,
  HandlerSpec,
  ParameterSpec,
  SourceLocation,
  SystemSpec,
} from '@handlerkit/types';

export class HandlerSpecBuilder {
  private readonly functions: FunctionSpec[] = [];

  constructor(readonly name: string) {}

  addFunction(fn: FunctionSpec): this {
    this.functions.push({
      sourceName: fn.sourceName,
      destName: fn.destName,
      params: fn.params.map((p) => ({ name: p.name, type: p.type })),
    });
    return this;
  }

  /**
   * Shorthand for addFunction(). `destName` defaults to `sourceName`.
   */
  fn(sourceName: string, destName: string = sourceName, params: readonly ParameterSpec[] = []): this {
    return this.addFunction({ sourceName, destName, params });
  }

  build(): HandlerSpec {
    return Object.freeze({
      name: this.name,
      functions: Object.freeze(this.functions.map((f) => Object.freeze({
        ...f,
        params: Object.freeze(f.params.map((p) => Object.freeze({ ...p }))),
      }))),
    });
  }
}

export class SystemSpecBuilder {
  private readonly requirements: string[] = [];
  private readonly handlers: HandlerSpec[] = [];

  constructor(readonly name: string, private readonly source?: SourceLocation) {}

  /**
   * Requirements are a set: repeating one keeps the first occurrence.
   */
  addRequirement(requirement: string): this {
    if (!this.requirements.includes(requirement)) {
      this.requirements.push(requirement);
    }
    return this;
  }

  addHandler(handler: HandlerSpec | HandlerSpecBuilder): this {
    this.handlers.push(handler instanceof HandlerSpecBuilder ? handler.build() : handler);
    return this;
  }

  build(): SystemSpec {
    return Object.freeze({
      name: this.name,
      requirements: Object.freeze([...this.requirements]),
      handlers: Object.freeze([...this.handlers]),
      ...(this.source && { source: { ...this.source } }),
    });
  }
}
