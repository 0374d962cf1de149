import { readFileSync, existsSync } from 'fs';
import { join } from 'path';
import { parse as parseYAML } from 'yaml';
import type { LogLevel } from '@archconf/types';
import { ConfigError } from '../errors/ArchconfError.js';
import { isLogLevel, LOG_LEVELS } from '../logging/Logger.js';
import { DEFAULT_GROUP_NAME } from '../expand/ChannelExpander.js';

/**
 * Converter configuration.
 *
 * YAML Location: .archconf/config.yaml in the working directory (optional)
 *
 * Example config.yaml:
 *
 * ```yaml
 * # Name of the single <group> in the generated file
 * groupName: Motors
 * logLevel: warnings
 * logFile: .archconf/convert.log
 * # Abort on the first malformed archive annotation instead of skipping it
 * strict: true
 * ```
 */
export interface ArchconfConfig {
  groupName: string;
  logLevel: LogLevel;
  /** Also write a debug-level log to this file */
  logFile?: string;
  /**
   * When true, an archive annotation whose value does not parse fails the
   * whole conversion. When false (default), it is skipped and reported.
   */
  strict: boolean;
}

export const DEFAULT_CONFIG: ArchconfConfig = {
  groupName: DEFAULT_GROUP_NAME,
  logLevel: 'info',
  strict: false,
};

export const CONFIG_DIR = '.archconf';
export const CONFIG_FILE = 'config.yaml';

/**
 * Load config from `<projectPath>/.archconf/config.yaml`.
 *
 * - No file: DEFAULT_CONFIG
 * - Unparseable YAML: warning, DEFAULT_CONFIG
 * - Parseable YAML with invalid values: throws ConfigError
 *
 * @param projectPath - Directory holding .archconf/ (usually process.cwd())
 * @param logger - Receives warnings (defaults to console)
 */
export function loadConfig(
  projectPath: string,
  logger: { warn: (msg: string) => void } = console
): ArchconfConfig {
  const configPath = join(projectPath, CONFIG_DIR, CONFIG_FILE);

  if (!existsSync(configPath)) {
    return DEFAULT_CONFIG;
  }

  let parsed: unknown;
  try {
    parsed = parseYAML(readFileSync(configPath, 'utf-8'));
  } catch (err) {
    const error = err instanceof Error ? err : new Error(String(err));
    logger.warn(`Failed to parse ${CONFIG_FILE}: ${error.message}`);
    logger.warn('Using default configuration');
    return DEFAULT_CONFIG;
  }

  // Empty file
  if (parsed === null || parsed === undefined) {
    return DEFAULT_CONFIG;
  }

  // Validation is OUTSIDE try-catch - bad values MUST throw
  return validateConfig(parsed, configPath);
}

/**
 * Check the parsed YAML document and merge it over DEFAULT_CONFIG.
 * THROWS ConfigError on the first invalid value.
 */
export function validateConfig(parsed: unknown, configPath = CONFIG_FILE): ArchconfConfig {
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw invalid(`config must be a mapping, got ${describe(parsed)}`, configPath);
  }

  const raw = new Map<string, unknown>(Object.entries(parsed));
  const config: ArchconfConfig = { ...DEFAULT_CONFIG };

  for (const key of raw.keys()) {
    if (!['groupName', 'logLevel', 'logFile', 'strict'].includes(key)) {
      throw invalid(`unknown key "${key}"`, configPath);
    }
  }

  const groupName = raw.get('groupName');
  if (groupName !== undefined) {
    if (typeof groupName !== 'string') {
      throw invalid(`groupName must be a string, got ${describe(groupName)}`, configPath);
    }
    if (!groupName.trim()) {
      throw invalid('groupName cannot be empty or whitespace-only', configPath);
    }
    config.groupName = groupName.trim();
  }

  const logLevel = raw.get('logLevel');
  if (logLevel !== undefined) {
    if (!isLogLevel(logLevel)) {
      throw invalid(
        `logLevel must be one of ${LOG_LEVELS.join(', ')}, got ${JSON.stringify(logLevel)}`,
        configPath
      );
    }
    config.logLevel = logLevel;
  }

  const logFile = raw.get('logFile');
  if (logFile !== undefined) {
    if (typeof logFile !== 'string' || !logFile.trim()) {
      throw invalid('logFile must be a non-empty string', configPath);
    }
    config.logFile = logFile;
  }

  const strict = raw.get('strict');
  if (strict !== undefined) {
    if (typeof strict !== 'boolean') {
      throw invalid(`strict must be a boolean, got ${describe(strict)}`, configPath);
    }
    config.strict = strict;
  }

  return config;
}

function describe(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

function invalid(message: string, configPath: string): ConfigError {
  return new ConfigError(
    `Config error: ${message}`,
    'ERR_CONFIG_INVALID',
    { filePath: configPath },
    `Fix or remove ${configPath}`
  );
}
