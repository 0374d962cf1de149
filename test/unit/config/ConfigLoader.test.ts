/**
 * ConfigLoader Tests
 *
 * - No config returns defaults
 * - Valid YAML is merged over defaults
 * - Unparseable YAML warns and falls back to defaults
 * - Invalid values throw ConfigError
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { mkdirSync, writeFileSync, rmSync, mkdtempSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { loadConfig, validateConfig, DEFAULT_CONFIG, ConfigError } from '@archconf/core';

interface LoggerMock {
  warnings: string[];
  warn: (msg: string) => void;
}

function createLoggerMock(): LoggerMock {
  const mock: LoggerMock = {
    warnings: [],
    warn(msg: string) {
      mock.warnings.push(msg);
    },
  };
  return mock;
}

describe('loadConfig', () => {
  let projectPath: string;

  function writeConfig(text: string): void {
    mkdirSync(join(projectPath, '.archconf'), { recursive: true });
    writeFileSync(join(projectPath, '.archconf', 'config.yaml'), text);
  }

  beforeEach(() => {
    projectPath = mkdtempSync(join(tmpdir(), 'archconf-config-'));
  });

  afterEach(() => {
    rmSync(projectPath, { recursive: true, force: true });
  });

  it('should return defaults when no config exists', () => {
    const logger = createLoggerMock();
    assert.deepStrictEqual(loadConfig(projectPath, logger), {
      groupName: 'Default_Group',
      logLevel: 'info',
      strict: false,
    });
    assert.deepStrictEqual(logger.warnings, []);
  });

  it('should merge a full config over defaults', () => {
    writeConfig(
      [
        '# archive engine group',
        'groupName: "  Motors  "',
        'logLevel: debug',
        'logFile: .archconf/convert.log',
        'strict: true',
        '',
      ].join('\n')
    );

    assert.deepStrictEqual(loadConfig(projectPath, createLoggerMock()), {
      groupName: 'Motors',
      logLevel: 'debug',
      logFile: '.archconf/convert.log',
      strict: true,
    });
  });

  it('should keep defaults for keys not given', () => {
    writeConfig('strict: true\n');
    const config = loadConfig(projectPath, createLoggerMock());
    assert.strictEqual(config.groupName, DEFAULT_CONFIG.groupName);
    assert.strictEqual(config.logLevel, 'info');
    assert.strictEqual(config.strict, true);
  });

  it('should treat an empty or comment-only file as defaults', () => {
    writeConfig('# nothing here\n');
    assert.deepStrictEqual(loadConfig(projectPath, createLoggerMock()), DEFAULT_CONFIG);
  });

  it('should warn and fall back to defaults on unparseable YAML', () => {
    writeConfig('groupName: [unclosed\n');
    const logger = createLoggerMock();

    assert.deepStrictEqual(loadConfig(projectPath, logger), DEFAULT_CONFIG);
    assert.strictEqual(logger.warnings.length, 2);
    assert.match(logger.warnings[0], /^Failed to parse config\.yaml: /);
    assert.strictEqual(logger.warnings[1], 'Using default configuration');
  });

  it('should throw ConfigError on invalid values', () => {
    writeConfig('strict: "yes"\n');
    assert.throws(
      () => loadConfig(projectPath, createLoggerMock()),
      (err: unknown) => {
        assert.ok(err instanceof ConfigError);
        assert.strictEqual(err.code, 'ERR_CONFIG_INVALID');
        assert.strictEqual(err.message, 'Config error: strict must be a boolean, got string');
        assert.strictEqual(err.context.filePath, join(projectPath, '.archconf', 'config.yaml'));
        return true;
      }
    );
  });
});

describe('validateConfig', () => {
  it('should reject a non-mapping document', () => {
    assert.throws(() => validateConfig(['a']), {
      message: 'Config error: config must be a mapping, got array',
    });
  });

  it('should reject unknown keys', () => {
    assert.throws(() => validateConfig({ group: 'x' }), {
      message: 'Config error: unknown key "group"',
    });
  });

  it('should reject a blank group name', () => {
    assert.throws(() => validateConfig({ groupName: '   ' }), {
      message: 'Config error: groupName cannot be empty or whitespace-only',
    });
  });

  it('should reject an unknown log level', () => {
    assert.throws(() => validateConfig({ logLevel: 'verbose' }), {
      message: 'Config error: logLevel must be one of silent, errors, warnings, info, debug, got "verbose"',
    });
  });

  it('should reject a blank log file', () => {
    assert.throws(() => validateConfig({ logFile: '' }), {
      message: 'Config error: logFile must be a non-empty string',
    });
  });

  it('should not mutate DEFAULT_CONFIG', () => {
    validateConfig({ groupName: 'Other' });
    assert.strictEqual(DEFAULT_CONFIG.groupName, 'Default_Group');
  });
});
