/**
 * @archconf/core - Database parser and archive configuration generator
 */

// Error types
export {
  ArchconfError,
  UsageError,
  FileAccessError,
  ParseError,
  PolicyError,
  ConfigError,
} from './errors/ArchconfError.js';
export type { ErrorContext, ErrorSeverity, ArchconfErrorJSON } from './errors/ArchconfError.js';

// Logging
export {
  ConsoleLogger,
  FileLogger,
  MultiLogger,
  createLogger,
  closeLogger,
  isLogLevel,
  LOG_LEVELS,
} from './logging/Logger.js';
export type { Logger, LogLevel } from './logging/Logger.js';

// Diagnostics
export { DiagnosticCollector, DiagnosticReporter } from './diagnostics/index.js';
export type { Diagnostic, DiagnosticInput } from './diagnostics/index.js';

// Config
export { loadConfig, validateConfig, DEFAULT_CONFIG, CONFIG_DIR, CONFIG_FILE } from './config/index.js';
export type { ArchconfConfig } from './config/index.js';

// Scanning and parsing
export { LineScanner } from './scanner/LineScanner.js';
export {
  matchRecordHeader,
  matchAttribute,
  looksLikeRecordHeader,
  looksLikeAttribute,
  findUnquoted,
} from './parser/matchers.js';
export type { RecordHeaderMatch, AttributeMatch } from './parser/matchers.js';
export { parseArchivePolicy } from './parser/ArchivePolicyParser.js';
export type { PolicyParseResult } from './parser/ArchivePolicyParser.js';
export { RecordParser, parseDatabase, parseDatabaseText } from './parser/RecordParser.js';
export type { ParseOptions } from './parser/RecordParser.js';

// Channel expansion and output
export {
  expandChannels,
  expandPolicy,
  countChannels,
  groupChannels,
  DEFAULT_GROUP_NAME,
} from './expand/ChannelExpander.js';
export { renderEngineConfig } from './render/EngineConfigRenderer.js';

// Conversion pipeline
export {
  convertDatabase,
  convertScanner,
  convertText,
  deriveOutputPath,
  OUTPUT_SUFFIX,
} from './convert/convertDatabase.js';
export type { ConvertOptions, ConversionResult, ConvertedDocument } from './convert/convertDatabase.js';

// Types re-exported for convenience
export type {
  ArchivePolicy,
  Attribute,
  ArchiveAttribute,
  FieldAttribute,
  ChannelDescriptor,
  ChannelGroup,
  DbRecord,
  ParsedDatabase,
  SampleMode,
  SkippedAttribute,
} from '@archconf/types';
export { isArchiveAttribute } from '@archconf/types';
