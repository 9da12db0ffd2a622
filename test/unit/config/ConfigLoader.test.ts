/**
 * ConfigLoader Tests
 *
 * Tests:
 * - No config returns defaults
 * - Valid, partial and empty YAML configs
 * - Unparsable YAML warns and falls back to defaults
 * - Invalid values throw ConfigError
 * - validateVersion / validateNaming / validateSchemaPaths
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { mkdirSync, mkdtempSync, writeFileSync, rmSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import {
  loadConfig,
  DEFAULT_CONFIG,
  DEFAULT_NAMING,
  validateVersion,
  validateNaming,
  validateSchemaPaths,
  ConfigError,
  HANDLERKIT_VERSION,
  getSchemaVersion,
} from '@handlerkit/core';

// =============================================================================
// Test Helpers
// =============================================================================

/**
 * Captures warnings from logger during test execution
 */
interface LoggerMock {
  warnings: string[];
  warn: (msg: string) => void;
}

function createLoggerMock(): LoggerMock {
  const warnings: string[] = [];
  return {
    warnings,
    warn: (msg: string) => warnings.push(msg),
  };
}

function isConfigError(message: string) {
  return (err: unknown) => err instanceof ConfigError && err.code === 'ERR_CONFIG_INVALID' && err.message === message;
}

// =============================================================================
// TESTS: loadConfig
// =============================================================================

describe('ConfigLoader', () => {
  let testDir: string;
  let configDir: string;

  const writeConfig = (content: string) => writeFileSync(join(configDir, 'config.yaml'), content);

  beforeEach(() => {
    testDir = mkdtempSync(join(tmpdir(), 'handlerkit-config-'));
    configDir = join(testDir, '.handlerkit');
    mkdirSync(configDir);
  });

  afterEach(() => {
    rmSync(testDir, { recursive: true, force: true });
  });

  describe('missing or empty config', () => {
    it('should return defaults when no config file exists', () => {
      const logger = createLoggerMock();
      assert.deepStrictEqual(loadConfig(testDir, logger), DEFAULT_CONFIG);
      assert.deepStrictEqual(logger.warnings, []);
    });

    it('should return defaults for an empty file', () => {
      writeConfig('');
      assert.deepStrictEqual(loadConfig(testDir, createLoggerMock()), DEFAULT_CONFIG);
    });

    it('should return defaults for a comments-only file', () => {
      writeConfig('# nothing configured yet\n');
      assert.deepStrictEqual(loadConfig(testDir, createLoggerMock()), DEFAULT_CONFIG);
    });

    it('should hand out copies of the defaults', () => {
      const first = loadConfig(testDir, createLoggerMock());
      first.naming.readPrefix = 'get';
      first.schemas.push('extra.yaml');

      const second = loadConfig(testDir, createLoggerMock());

      assert.notStrictEqual(first, DEFAULT_CONFIG);
      assert.deepStrictEqual(second, DEFAULT_CONFIG);
      assert.strictEqual(DEFAULT_CONFIG.naming.readPrefix, 'as');
      assert.deepStrictEqual(DEFAULT_CONFIG.schemas, []);
    });

    it('should default to info level and the standard naming', () => {
      assert.strictEqual(DEFAULT_CONFIG.logLevel, 'info');
      assert.deepStrictEqual(DEFAULT_CONFIG.naming, DEFAULT_NAMING);
      assert.deepStrictEqual(DEFAULT_CONFIG.schemas, []);
      assert.strictEqual(DEFAULT_CONFIG.version, getSchemaVersion(HANDLERKIT_VERSION));
    });
  });

  describe('valid YAML config', () => {
    it('should load every section', () => {
      writeConfig([
        `version: "${getSchemaVersion(HANDLERKIT_VERSION)}"`,
        'logLevel: debug',
        'naming:',
        '  readPrefix: get',
        '  writeSuffix: Mutable',
        'schemas:',
        '  - schemas/world.yaml',
        '  - schemas/audio.yaml',
      ].join('\n'));

      assert.deepStrictEqual(loadConfig(testDir, createLoggerMock()), {
        version: getSchemaVersion(HANDLERKIT_VERSION),
        logLevel: 'debug',
        naming: { readPrefix: 'get', writeSuffix: 'Mutable', cacheSuffix: 'Idxs', objectSuffix: 'Object' },
        schemas: ['schemas/world.yaml', 'schemas/audio.yaml'],
      });
    });

    it('should merge a partial config over defaults', () => {
      writeConfig('logLevel: warnings\n');

      const config = loadConfig(testDir, createLoggerMock());

      assert.strictEqual(config.logLevel, 'warnings');
      assert.deepStrictEqual(config.naming, DEFAULT_NAMING);
      assert.deepStrictEqual(config.schemas, []);
      assert.strictEqual(config.version, DEFAULT_CONFIG.version);
    });
  });

  describe('unparsable YAML', () => {
    it('should warn and return defaults', () => {
      writeConfig('naming: [unclosed\n');
      const logger = createLoggerMock();

      const config = loadConfig(testDir, logger);

      assert.deepStrictEqual(config, DEFAULT_CONFIG);
      assert.notStrictEqual(config.naming, DEFAULT_CONFIG.naming);
      assert.strictEqual(logger.warnings.length, 2);
      assert.ok(logger.warnings[0].startsWith('Failed to parse config.yaml: '));
      assert.strictEqual(logger.warnings[1], 'Using default configuration');
    });
  });

  describe('invalid values', () => {
    it('should reject a non-mapping document', () => {
      writeConfig('- a\n- b\n');
      assert.throws(
        () => loadConfig(testDir, createLoggerMock()),
        isConfigError('Config error: config.yaml must be a mapping, got array')
      );
    });

    it('should reject an unknown log level', () => {
      writeConfig('logLevel: verbose\n');
      assert.throws(
        () => loadConfig(testDir, createLoggerMock()),
        isConfigError('Config error: logLevel must be one of silent, errors, warnings, info, debug, got "verbose"')
      );
    });

    it('should reject an incompatible version', () => {
      writeConfig('version: "99.0.0"\n');
      assert.throws(() => loadConfig(testDir, createLoggerMock()), ConfigError);
    });

    it('should reject invalid naming values', () => {
      writeConfig('naming:\n  cacheSuffix: "-idx"\n');
      assert.throws(
        () => loadConfig(testDir, createLoggerMock()),
        isConfigError('Config error: naming.cacheSuffix "-idx" can only contain identifier characters')
      );
    });
  });
});

// =============================================================================
// TESTS: validators
// =============================================================================

describe('validateVersion', () => {
  it('should accept a missing version', () => {
    assert.doesNotThrow(() => validateVersion(undefined, '1.2.3'));
    assert.doesNotThrow(() => validateVersion(null, '1.2.3'));
  });

  it('should compare without pre-release tags', () => {
    assert.doesNotThrow(() => validateVersion('1.2.3', '1.2.3-beta'));
    assert.doesNotThrow(() => validateVersion('1.2.3-rc.1', '1.2.3'));
  });

  it('should reject a different version with a suggestion', () => {
    assert.throws(
      () => validateVersion('1.2.4', '1.2.3'),
      (err: unknown) => err instanceof ConfigError
        && err.message === 'Config error: config version "1.2.4" is not compatible with handlerkit 1.2.3. Expected "1.2.3".'
        && err.suggestion === 'Set version: "1.2.3" in .handlerkit/config.yaml'
    );
  });

  it('should reject non-string and empty versions', () => {
    assert.throws(() => validateVersion(1.2, '1.2.3'), isConfigError('Config error: version must be a string, got number'));
    assert.throws(() => validateVersion('  ', '1.2.3'), isConfigError('Config error: version cannot be empty'));
  });
});

describe('validateNaming', () => {
  it('should return defaults when absent', () => {
    assert.deepStrictEqual(validateNaming(undefined), DEFAULT_NAMING);
  });

  it('should not share the defaults object', () => {
    const naming = validateNaming(null);
    naming.readPrefix = 'get';
    assert.strictEqual(DEFAULT_NAMING.readPrefix, 'as');
  });

  it('should override only the given keys', () => {
    assert.deepStrictEqual(validateNaming({ objectSuffix: 'Entity' }), {
      readPrefix: 'as',
      writeSuffix: 'Mut',
      cacheSuffix: 'Idxs',
      objectSuffix: 'Entity',
    });
  });

  it('should reject non-object and empty values', () => {
    assert.throws(() => validateNaming('as'), isConfigError('Config error: naming must be an object, got string'));
    assert.throws(
      () => validateNaming({ writeSuffix: '' }),
      isConfigError('Config error: naming.writeSuffix must be a non-empty string')
    );
  });
});

describe('validateSchemaPaths', () => {
  it('should return an empty list when absent', () => {
    assert.deepStrictEqual(validateSchemaPaths(undefined), []);
  });

  it('should keep relative paths in order', () => {
    assert.deepStrictEqual(validateSchemaPaths(['b.yaml', 'dir/a.yaml']), ['b.yaml', 'dir/a.yaml']);
  });

  it('should reject absolute and home-relative paths', () => {
    assert.throws(
      () => validateSchemaPaths(['/etc/world.yaml']),
      isConfigError('Config error: schemas[0] must be relative to project root, got "/etc/world.yaml"')
    );
    assert.throws(() => validateSchemaPaths(['~/world.yaml']), ConfigError);
  });

  it('should reject duplicates and non-strings', () => {
    assert.throws(
      () => validateSchemaPaths(['a.yaml', 'a.yaml']),
      isConfigError('Config error: schemas[1] "a.yaml" is listed twice')
    );
    assert.throws(() => validateSchemaPaths([3]), isConfigError('Config error: schemas[0] must be a non-empty string'));
    assert.throws(() => validateSchemaPaths('a.yaml'), isConfigError('Config error: schemas must be an array, got string'));
  });
});
