/**
 * Capability contract - compile-time view of the generated accessors
 *
 * @example
 * interface Drawable { draw(): void }
 * interface Updatable { update(dt: number): void }
 *
 * type WorldObject = CapabilityAccessors<{ Drawable: Drawable; Updatable: Updatable }>;
 * // { asDrawable(): Readonly<Drawable> | undefined; asDrawableMut(): Drawable | undefined; ... }
 */

/**
 * Handler name -> handler interface type
 */
export type HandlerMap = { [handler: string]: object };

export type ReadAccessors<H extends HandlerMap> = {
  [K in keyof H & string as `as${K}`]: () => Readonly<H[K]> | undefined;
};

export type WriteAccessors<H extends HandlerMap> = {
  [K in keyof H & string as `as${K}Mut`]: () => H[K] | undefined;
};

/**
 * The capability interface every stored object implements
 */
export type CapabilityAccessors<H extends HandlerMap> = ReadAccessors<H> & WriteAccessors<H>;

/**
 * Dispatch method name -> parameter tuple.
 * Types `Registry.dispatch` when the caller knows the schema statically.
 */
export type DispatchSignatures = { [sourceName: string]: unknown[] };
