/**
 * convertDatabase - file to file conversion
 *
 *   parse(input) -> records
 *   expand(records) -> channels
 *   render(channels) -> document
 *
 * Each step is a plain function of the previous step's output. The output
 * file is written only after every step has succeeded.
 */

import { writeFileSync } from 'fs';
import type { ChannelDescriptor, DbRecord, Logger, SkippedAttribute } from '@archconf/types';
import { FileAccessError } from '../errors/ArchconfError.js';
import { DiagnosticCollector } from '../diagnostics/DiagnosticCollector.js';
import { ConsoleLogger } from '../logging/Logger.js';
import { LineScanner } from '../scanner/LineScanner.js';
import { parseDatabase } from '../parser/RecordParser.js';
import { DEFAULT_GROUP_NAME, expandChannels, groupChannels } from '../expand/ChannelExpander.js';
import { renderEngineConfig } from '../render/EngineConfigRenderer.js';

export const OUTPUT_SUFFIX = '_arch.xml';

export interface ConvertOptions {
  logger?: Logger;
  diagnostics?: DiagnosticCollector;
  groupName?: string;
  strict?: boolean;
  /** Defaults to deriveOutputPath(inputPath) */
  outputPath?: string;
}

export interface ConversionResult {
  inputPath: string;
  outputPath: string;
  records: readonly DbRecord[];
  channels: readonly ChannelDescriptor[];
  skipped: readonly SkippedAttribute[];
  diagnostics: DiagnosticCollector;
}

/**
 * `motors.db` -> `motors_arch.xml`; a path without `.db` gets the suffix appended.
 */
export function deriveOutputPath(inputPath: string): string {
  const base = inputPath.endsWith('.db') ? inputPath.slice(0, -'.db'.length) : inputPath;
  return base + OUTPUT_SUFFIX;
}

export interface ConvertedDocument {
  document: string;
  records: readonly DbRecord[];
  channels: readonly ChannelDescriptor[];
  skipped: readonly SkippedAttribute[];
}

/**
 * Run parse, expand and render over a scanner. No file output.
 */
export function convertScanner(scanner: LineScanner, options: Omit<ConvertOptions, 'outputPath'> = {}): ConvertedDocument {
  const { records, skipped } = parseDatabase(scanner, {
    logger: options.logger,
    diagnostics: options.diagnostics,
    strict: options.strict,
  });
  const channels = expandChannels(records);
  const document = renderEngineConfig([groupChannels(channels, options.groupName ?? DEFAULT_GROUP_NAME)]);

  options.logger?.debug('Expanded channels', { records: records.length, channels: channels.length });

  return { document, records, channels, skipped };
}

/**
 * Database text to XML document text.
 */
export function convertText(
  text: string,
  options: Omit<ConvertOptions, 'outputPath'> & { source?: string } = {}
): ConvertedDocument {
  return convertScanner(new LineScanner(text, options.source), options);
}

/**
 * Read a database file and write its archive configuration next to it.
 *
 * @throws FileAccessError when the input cannot be read or the output cannot be written
 * @throws ParseError when a record is not terminated
 * @throws PolicyError in strict mode
 */
export function convertDatabase(inputPath: string, options: ConvertOptions = {}): ConversionResult {
  const logger = options.logger ?? new ConsoleLogger('silent');
  const diagnostics = options.diagnostics ?? new DiagnosticCollector();
  const outputPath = options.outputPath ?? deriveOutputPath(inputPath);

  const scanner = LineScanner.fromFile(inputPath);
  logger.debug('Reading database', { inputPath });

  const { document, records, channels, skipped } = convertScanner(scanner, {
    logger,
    diagnostics,
    groupName: options.groupName,
    strict: options.strict,
  });

  try {
    writeFileSync(outputPath, document, 'utf-8');
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new FileAccessError(
      `Cannot write archive configuration: ${outputPath}`,
      'ERR_OUTPUT_UNWRITABLE',
      { filePath: outputPath, reason },
      'Check that the directory exists and is writable'
    );
  }

  return { inputPath, outputPath, records, channels, skipped, diagnostics };
}
