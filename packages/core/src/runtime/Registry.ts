/**
 * Registry - runtime realization of a synthesized registry declaration
 *
 * Owns an append-only sequence of capability objects plus one index cache
 * per handler. `add` is the only place caches grow: for each handler, in
 * declaration order, it asks the new object's read accessor and records the
 * object's position when a view is present. Dispatch walks a cache in stored
 * (= insertion) order, so its cost follows the number of capable objects,
 * not the population.
 *
 * Cached capability facts are never revalidated. An object whose write
 * accessor comes back empty at dispatch time means the cache no longer
 * describes the registry; that is fatal (InvariantViolationError), never
 * skipped.
 *
 * Single-threaded and synchronous: every call runs to completion.
 *
 * @example
 * const registry = createRegistry<WorldObject, { draw: []; update: [number] }>(declarations);
 * registry.add(new Sprite());
 * registry.dispatch('update', 0.016);
 */

import type { DeclarationSet, DispatchSignatures } from '@handlerkit/types';
import {
  ConformanceError,
  DispatchError,
  InvariantViolationError,
} from '../errors/HandlerKitError.js';
import { silentLogger, type Logger } from '../logging/Logger.js';

export interface RegistryOptions {
  logger?: Logger;
}

/** Per-handler registration check run by add() */
interface CapabilityProbe {
  handler: string;
  readAccessor: string;
  cache: number[];
}

/** Resolved dispatch method */
interface DispatchPlan {
  handler: string;
  writeAccessor: string;
  target: string;
  arity: number;
  cache: number[];
}

function isView(value: unknown): value is object {
  return (typeof value === 'object' && value !== null) || typeof value === 'function';
}

function callAccessor(object: object, accessor: string): unknown {
  const fn: unknown = Reflect.get(object, accessor);
  if (typeof fn !== 'function') {
    return undefined;
  }
  return Reflect.apply(fn, object, []);
}

export class Registry<O extends object = object, D extends DispatchSignatures = DispatchSignatures> {
  readonly name: string;
  private readonly objects: O[] = [];
  private readonly caches = new Map<string, number[]>();
  private readonly probes: CapabilityProbe[] = [];
  private readonly plans = new Map<string, DispatchPlan>();
  private readonly requiredAccessors: string[];
  private readonly logger: Logger;

  constructor(declarations: DeclarationSet, options: RegistryOptions = {}) {
    this.name = declarations.registry.name;
    this.logger = options.logger ?? silentLogger;
    this.requiredAccessors = declarations.capabilityInterface.accessors.map((a) => a.name);

    for (const accessor of declarations.capabilityInterface.accessors) {
      if (accessor.mode !== 'read') continue;
      const cache: number[] = [];
      this.caches.set(accessor.handler, cache);
      this.probes.push({ handler: accessor.handler, readAccessor: accessor.name, cache });
    }

    for (const method of declarations.registry.methods) {
      if (method.kind !== 'dispatch') continue;
      const cache = this.caches.get(method.handler);
      if (!cache) {
        throw new DispatchError(
          `Dispatch method "${method.name}" refers to unknown handler "${method.handler}"`,
          'ERR_UNKNOWN_HANDLER',
          { system: this.name, handler: method.handler }
        );
      }
      this.plans.set(method.name, {
        handler: method.handler,
        writeAccessor: method.accessor,
        target: method.target,
        arity: method.params.length,
        cache,
      });
    }
  }

  /** Number of stored objects */
  get size(): number {
    return this.objects.length;
  }

  /**
   * Take ownership of `object` and record which handlers it supports.
   *
   * @throws ConformanceError if the object lacks a capability accessor.
   *   Errors thrown by the object's own accessors propagate unchanged; the
   *   object is then not stored.
   */
  add(object: O): void {
    const missing = this.requiredAccessors.filter(
      (name) => typeof Reflect.get(object, name) !== 'function'
    );
    if (missing.length > 0) {
      throw new ConformanceError(
        `Object does not implement the ${this.name} capability interface`,
        'ERR_NOT_CAPABILITY_OBJECT',
        { system: this.name, missing },
        'Bind the object type with bindCapabilities() or implement the accessors'
      );
    }

    // No state changes until every accessor has answered
    const capable = this.probes.filter((probe) => isView(callAccessor(object, probe.readAccessor)));

    const idx = this.objects.length;
    this.objects.push(object);
    for (const probe of capable) {
      probe.cache.push(idx);
    }
    const supported = capable.map((probe) => probe.handler);

    this.logger.debug('Registered object', { system: this.name, index: idx, handlers: supported });
  }

  /** Read views over every object, in insertion order */
  *iterate(): Generator<Readonly<O>, void, undefined> {
    for (let i = 0; i < this.objects.length; i++) {
      yield this.objectAt(i);
    }
  }

  /** Write views over every object, in insertion order */
  *iterateMut(): Generator<O, void, undefined> {
    for (let i = 0; i < this.objects.length; i++) {
      yield this.objectAt(i);
    }
  }

  /**
   * Invoke a synthesized dispatch method: call its target on every object
   * cached as supporting its handler, in insertion order.
   *
   * @throws DispatchError for an unknown method or wrong argument count
   * @throws InvariantViolationError if a cached object no longer yields the handler
   */
  dispatch<K extends keyof D & string>(name: K, ...args: D[K]): void {
    const plan = this.plans.get(name);
    if (!plan) {
      throw new DispatchError(
        `Unknown dispatch method "${name}" on ${this.name}`,
        'ERR_UNKNOWN_OPERATION',
        { system: this.name, operation: name },
        `Available: ${[...this.plans.keys()].join(', ') || '(none)'}`
      );
    }
    if (args.length !== plan.arity) {
      throw new DispatchError(
        `${this.name}.${name} expects ${plan.arity} argument(s), got ${args.length}`,
        'ERR_ARITY_MISMATCH',
        { system: this.name, handler: plan.handler, operation: name }
      );
    }

    for (const idx of plan.cache) {
      const view = callAccessor(this.objectAt(idx), plan.writeAccessor);
      if (!isView(view)) {
        throw new InvariantViolationError(
          `Object ${idx} in ${this.name} was cached for ${plan.handler} but ${plan.writeAccessor}() returned nothing`,
          { system: this.name, handler: plan.handler, index: idx, operation: name }
        );
      }

      const method: unknown = Reflect.get(view, plan.target);
      if (typeof method !== 'function') {
        throw new InvariantViolationError(
          `Object ${idx} in ${this.name} has a ${plan.handler} view without ${plan.target}()`,
          { system: this.name, handler: plan.handler, index: idx, operation: name }
        );
      }
      Reflect.apply(method, view, args);
    }
  }

  /**
   * Snapshot of a handler's index cache.
   *
   * @throws DispatchError (ERR_UNKNOWN_HANDLER)
   */
  indexCache(handler: string): readonly number[] {
    const cache = this.caches.get(handler);
    if (!cache) {
      throw new DispatchError(
        `Unknown handler "${handler}" on ${this.name}`,
        'ERR_UNKNOWN_HANDLER',
        { system: this.name, handler }
      );
    }
    return Object.freeze([...cache]);
  }

  /** Bounds-checked position lookup */
  private objectAt(idx: number): O {
    if (!Number.isInteger(idx) || idx < 0 || idx >= this.objects.length) {
      throw new RangeError(`Index ${idx} is outside ${this.name} (size ${this.objects.length})`);
    }
    return this.objects[idx];
  }
}

/**
 * create() of the synthesized registry: empty objects, empty caches.
 */
export function createRegistry<O extends object = object, D extends DispatchSignatures = DispatchSignatures>(
  declarations: DeclarationSet,
  options: RegistryOptions = {}
): Registry<O, D> {
  return new Registry<O, D>(declarations, options);
}
