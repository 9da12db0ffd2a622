/**
 * Naming contract shared by the Synthesizer, the ObjectBinder and the
 * runtime Registry. All three must derive the same accessor and cache names
 * from a handler name, so they all go through resolveNaming().
 */

export interface NamingOptions {
  /** Prefix of both accessors (`as` -> `asDrawable`) */
  readPrefix: string;
  /** Suffix of the write accessor (`Mut` -> `asDrawableMut`) */
  writeSuffix: string;
  /** Suffix of the index cache field (`Idxs` -> `drawableIdxs`) */
  cacheSuffix: string;
  /** Suffix of the capability interface (`Object` -> `WorldObject`) */
  objectSuffix: string;
}

export interface NamingConvention {
  readAccessor(handler: string): string;
  writeAccessor(handler: string): string;
  indexCache(handler: string): string;
  capabilityInterface(system: string): string;
}

export const DEFAULT_NAMING: NamingOptions = {
  readPrefix: 'as',
  writeSuffix: 'Mut',
  cacheSuffix: 'Idxs',
  objectSuffix: 'Object',
};

function lowerFirst(name: string): string {
  return name.charAt(0).toLowerCase() + name.slice(1);
}

export function resolveNaming(options: Partial<NamingOptions> = {}): NamingConvention {
  const opts: NamingOptions = { ...DEFAULT_NAMING, ...options };

  return {
    readAccessor: (handler) => `${opts.readPrefix}${handler}`,
    writeAccessor: (handler) => `${opts.readPrefix}${handler}${opts.writeSuffix}`,
    indexCache: (handler) => `${lowerFirst(handler)}${opts.cacheSuffix}`,
    capabilityInterface: (system) => `${system}${opts.objectSuffix}`,
  };
}
