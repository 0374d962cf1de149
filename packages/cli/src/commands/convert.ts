/**
 * Convert command - database file to archive engine configuration
 *
 * Reads <database>, writes <database minus .db>_arch.xml next to it.
 */

import { resolve } from 'path';
import {
  DiagnosticCollector,
  DiagnosticReporter,
  UsageError,
  closeLogger,
  convertDatabase,
  createLogger,
  loadConfig,
  type ArchconfConfig,
  type Logger,
} from '@archconf/core';
import { reportFailure } from '../utils/errorFormatter.js';

export interface ConvertCommandOptions {
  /** Directory holding .archconf/config.yaml; relative input paths resolve against it */
  cwd?: string;
}

/**
 * Run one conversion and return the process exit status (0 or 2).
 * Never calls process.exit, so it can be driven from tests.
 */
export async function runConvert(
  database: string | undefined,
  options: ConvertCommandOptions = {}
): Promise<number> {
  if (!database) {
    return reportFailure(
      new UsageError('Missing input file name', 'ERR_MISSING_ARGUMENT', {}, 'Usage: archconf <database>.db')
    );
  }

  const cwd = options.cwd ?? process.cwd();

  let config: ArchconfConfig;
  let logger: Logger;
  try {
    config = loadConfig(cwd);
    logger = createLogger(config.logLevel, {
      logFile: config.logFile ? resolve(cwd, config.logFile) : undefined,
    });
  } catch (err) {
    return reportFailure(err);
  }

  const diagnostics = new DiagnosticCollector();

  try {
    const result = convertDatabase(resolve(cwd, database), {
      logger,
      diagnostics,
      groupName: config.groupName,
      strict: config.strict,
    });

    if (diagnostics.count() > 0) {
      logger.warn(new DiagnosticReporter(diagnostics).report());
    }
    if (result.skipped.length > 0) {
      logger.warn(`Skipped ${result.skipped.length} archive attribute(s)`);
    }
    logger.info(
      `Wrote ${result.channels.length} channel(s) from ${result.records.length} record(s) to ${result.outputPath}`
    );
    return 0;
  } catch (err) {
    logger.debug('Conversion failed', { error: err instanceof Error ? err.message : String(err) });
    return reportFailure(err);
  } finally {
    await closeLogger(logger);
  }
}
