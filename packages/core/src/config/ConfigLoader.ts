import { readFileSync, existsSync } from 'fs';
import { join, isAbsolute } from 'path';
import { parse as parseYAML } from 'yaml';
import { ConfigError } from '../errors/HandlerKitError.js';
import { isLogLevel, LOG_LEVELS, type LogLevel } from '../logging/Logger.js';
import { DEFAULT_NAMING, type NamingOptions } from '../naming.js';
import { HANDLERKIT_VERSION, getSchemaVersion } from '../version.js';

/**
 * handlerkit configuration schema.
 *
 * YAML Location: .handlerkit/config.yaml
 *
 * Example config.yaml:
 *
 * ```yaml
 * version: "0.3.0"
 * logLevel: info
 *
 * # Accessor and cache names derived from handler names
 * naming:
 *   readPrefix: as        # asDrawable()
 *   writeSuffix: Mut      # asDrawableMut()
 *   cacheSuffix: Idxs     # drawableIdxs
 *   objectSuffix: Object  # WorldObject
 *
 * # Schema documents checked by `handlerkit check`
 * schemas:
 *   - schemas/world.yaml
 * ```
 */
export interface HandlerKitConfig {
  /**
   * Config schema version (major.minor.patch, no pre-release tag).
   * If omitted, no version check is performed.
   */
  version?: string;

  logLevel: LogLevel;

  naming: NamingOptions;

  /** Schema document paths, relative to the project root */
  schemas: string[];
}

export const DEFAULT_CONFIG: HandlerKitConfig = {
  version: getSchemaVersion(HANDLERKIT_VERSION),
  logLevel: 'info',
  naming: { ...DEFAULT_NAMING },
  schemas: [],
};

/** Fresh copy of DEFAULT_CONFIG; callers may mutate what loadConfig returns */
function defaultConfig(): HandlerKitConfig {
  return { ...DEFAULT_CONFIG, naming: { ...DEFAULT_CONFIG.naming }, schemas: [...DEFAULT_CONFIG.schemas] };
}

type ParsedConfig = Record<string, unknown>;

function isRecord(value: unknown): value is ParsedConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Load handlerkit config from a project directory.
 *
 * - No .handlerkit/config.yaml: a copy of DEFAULT_CONFIG
 * - Unparsable YAML: warning, then a copy of DEFAULT_CONFIG
 * - Parsable but invalid values: throws ConfigError
 *
 * @param projectPath - Absolute path to project root
 * @param logger - Receives warnings (defaults to console)
 */
export function loadConfig(
  projectPath: string,
  logger: { warn: (msg: string) => void } = console
): HandlerKitConfig {
  const yamlPath = join(projectPath, '.handlerkit', 'config.yaml');

  if (!existsSync(yamlPath)) {
    return defaultConfig();
  }

  let parsed: unknown;
  try {
    parsed = parseYAML(readFileSync(yamlPath, 'utf-8'));
  } catch (err) {
    const error = err instanceof Error ? err : new Error(String(err));
    logger.warn(`Failed to parse config.yaml: ${error.message}`);
    logger.warn('Using default configuration');
    return defaultConfig();
  }

  // Empty or comment-only file
  if (parsed === null || parsed === undefined) {
    return defaultConfig();
  }

  if (!isRecord(parsed)) {
    throw new ConfigError(
      `Config error: config.yaml must be a mapping, got ${Array.isArray(parsed) ? 'array' : typeof parsed}`,
      'ERR_CONFIG_INVALID',
      { file: yamlPath }
    );
  }

  // Validation is outside the try/catch: invalid values must throw
  validateVersion(parsed.version);
  const naming = validateNaming(parsed.naming);
  const schemas = validateSchemaPaths(parsed.schemas);

  let logLevel = DEFAULT_CONFIG.logLevel;
  if (parsed.logLevel !== undefined && parsed.logLevel !== null) {
    if (!isLogLevel(parsed.logLevel)) {
      throw new ConfigError(
        `Config error: logLevel must be one of ${LOG_LEVELS.join(', ')}, got ${JSON.stringify(parsed.logLevel)}`,
        'ERR_CONFIG_INVALID',
        { file: yamlPath }
      );
    }
    logLevel = parsed.logLevel;
  }

  return {
    version: typeof parsed.version === 'string' ? parsed.version : DEFAULT_CONFIG.version,
    logLevel,
    naming,
    schemas,
  };
}

/**
 * Validate config version compatibility with the running version.
 * Compares major.minor.patch; a missing version passes.
 *
 * @param configVersion - Version string from config file (may be undefined)
 * @param currentVersion - Override for testing (defaults to HANDLERKIT_VERSION)
 */
export function validateVersion(configVersion: unknown, currentVersion?: string): void {
  if (configVersion === undefined || configVersion === null) {
    return;
  }

  if (typeof configVersion !== 'string') {
    throw new ConfigError(`Config error: version must be a string, got ${typeof configVersion}`, 'ERR_CONFIG_INVALID');
  }

  if (!configVersion.trim()) {
    throw new ConfigError('Config error: version cannot be empty', 'ERR_CONFIG_INVALID');
  }

  const current = currentVersion ?? HANDLERKIT_VERSION;
  const currentSchema = getSchemaVersion(current);

  if (getSchemaVersion(configVersion) !== currentSchema) {
    throw new ConfigError(
      `Config error: config version "${configVersion}" is not compatible with ` +
      `handlerkit ${current}. Expected "${currentSchema}".`,
      'ERR_CONFIG_INVALID',
      {},
      `Set version: "${currentSchema}" in .handlerkit/config.yaml`
    );
  }
}

/**
 * Validate the naming section and merge it over DEFAULT_NAMING.
 */
export function validateNaming(naming: unknown): NamingOptions {
  if (naming === undefined || naming === null) {
    return { ...DEFAULT_NAMING };
  }

  if (!isRecord(naming)) {
    throw new ConfigError(`Config error: naming must be an object, got ${typeof naming}`, 'ERR_CONFIG_INVALID');
  }

  const result: NamingOptions = { ...DEFAULT_NAMING };
  for (const key of ['readPrefix', 'writeSuffix', 'cacheSuffix', 'objectSuffix'] as const) {
    const value = naming[key];
    if (value === undefined) continue;
    if (typeof value !== 'string' || !value.trim()) {
      throw new ConfigError(`Config error: naming.${key} must be a non-empty string`, 'ERR_CONFIG_INVALID');
    }
    if (!/^[A-Za-z_$][A-Za-z0-9_$]*$/.test(value)) {
      throw new ConfigError(
        `Config error: naming.${key} "${value}" can only contain identifier characters`,
        'ERR_CONFIG_INVALID'
      );
    }
    result[key] = value;
  }

  return result;
}

/**
 * Validate the schemas list: relative, non-empty, unique paths.
 */
export function validateSchemaPaths(schemas: unknown): string[] {
  if (schemas === undefined || schemas === null) {
    return [];
  }

  if (!Array.isArray(schemas)) {
    throw new ConfigError(`Config error: schemas must be an array, got ${typeof schemas}`, 'ERR_CONFIG_INVALID');
  }

  const seen = new Set<string>();
  return schemas.map((entry: unknown, i) => {
    if (typeof entry !== 'string' || !entry.trim()) {
      throw new ConfigError(`Config error: schemas[${i}] must be a non-empty string`, 'ERR_CONFIG_INVALID');
    }
    if (isAbsolute(entry) || entry.startsWith('~')) {
      throw new ConfigError(
        `Config error: schemas[${i}] must be relative to project root, got "${entry}"`,
        'ERR_CONFIG_INVALID'
      );
    }
    if (seen.has(entry)) {
      throw new ConfigError(`Config error: schemas[${i}] "${entry}" is listed twice`, 'ERR_CONFIG_INVALID');
    }
    seen.add(entry);
    return entry;
  });
}
