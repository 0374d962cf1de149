/**
 * RecordParser - builds the record list from a line stream
 *
 * Reads records one at a time:
 *   1. a header line `record(type, name)`
 *   2. lines up to and including the one with the opening brace
 *   3. body lines up to the one with the closing brace, each offered to the
 *      attribute matcher
 *
 * Lines outside records are ignored. A record still open at end of input is
 * fatal (ParseError). A malformed archive value only drops that attribute,
 * unless `strict` is set.
 */

import type {
  ArchiveAttribute,
  Attribute,
  DbRecord,
  FieldAttribute,
  Logger,
  ParsedDatabase,
  SkippedAttribute,
} from '@archconf/types';
import { ParseError } from '../errors/ArchconfError.js';
import { DiagnosticCollector } from '../diagnostics/DiagnosticCollector.js';
import { ConsoleLogger } from '../logging/Logger.js';
import { LineScanner } from '../scanner/LineScanner.js';
import {
  findUnquoted,
  looksLikeAttribute,
  looksLikeRecordHeader,
  matchAttribute,
  matchRecordHeader,
  type RecordHeaderMatch,
} from './matchers.js';
import { parseArchivePolicy } from './ArchivePolicyParser.js';

export interface ParseOptions {
  logger?: Logger;
  /** Receives warnings for near-miss lines and errors for skipped attributes */
  diagnostics?: DiagnosticCollector;
  /** Throw the first PolicyError instead of skipping the attribute */
  strict?: boolean;
}

export class RecordParser {
  private readonly logger: Logger;
  private readonly diagnostics: DiagnosticCollector;
  private readonly strict: boolean;
  private readonly skipped: SkippedAttribute[] = [];

  constructor(private readonly scanner: LineScanner, options: ParseOptions = {}) {
    this.logger = options.logger ?? new ConsoleLogger('silent');
    this.diagnostics = options.diagnostics ?? new DiagnosticCollector();
    this.strict = options.strict ?? false;
  }

  /**
   * Consume the whole scanner.
   * @throws ParseError when a record is not terminated
   * @throws PolicyError in strict mode
   */
  parse(): ParsedDatabase {
    const records: DbRecord[] = [];

    for (let line = this.scanner.next(); line !== null; line = this.scanner.next()) {
      const header = matchRecordHeader(line);
      if (header) {
        records.push(this.readRecord(header));
      } else if (looksLikeRecordHeader(line)) {
        this.nearMiss('WARN_MALFORMED_RECORD', `Line looks like a record header but does not parse: ${line.trim()}`);
      }
    }

    this.logger.debug('Parsed database', {
      source: this.scanner.source,
      records: records.length,
      skipped: this.skipped.length,
    });

    return { records, skipped: [...this.skipped] };
  }

  private readRecord(header: RecordHeaderMatch): DbRecord {
    const headerLine = this.scanner.lineNumber;
    const attributes: Attribute[] = [];

    // Opening brace: on the header line or any line after it
    let text = header.rest;
    let open = findUnquoted(text, '{');
    while (open === -1) {
      text = this.nextOrFail(header, headerLine, '{');
      open = findUnquoted(text, '{');
    }

    // Body: from just after "{" up to "}"
    let body = text.slice(open + 1);
    for (;;) {
      const close = findUnquoted(body, '}');
      const attribute = this.readAttribute(close === -1 ? body : body.slice(0, close), header.name);
      if (attribute) {
        attributes.push(attribute);
      }
      if (close !== -1) {
        this.checkAfterClose(body.slice(close + 1), header.name);
        break;
      }
      body = this.nextOrFail(header, headerLine, '}');
    }

    this.logger.trace('Record', { type: header.type, name: header.name, attributes: attributes.length });

    return Object.freeze({
      type: header.type,
      name: header.name,
      attributes: Object.freeze(attributes),
    });
  }

  private readAttribute(text: string, recordName: string): Attribute | null {
    const match = matchAttribute(text);

    if (!match) {
      if (looksLikeAttribute(text)) {
        this.nearMiss(
          'WARN_MALFORMED_ATTRIBUTE',
          `Line looks like an attribute but does not parse: ${text.trim()}`,
          recordName
        );
      }
      return null;
    }

    if (match.kind === 'field') {
      const field: FieldAttribute = { kind: 'field', name: match.name, value: match.value };
      return Object.freeze(field);
    }

    if (match.name !== 'archive') {
      this.logger.debug('Ignoring info attribute', { record: recordName, name: match.name });
      return null;
    }

    const lineNumber = this.scanner.lineNumber;
    const result = parseArchivePolicy(match.value, {
      filePath: this.scanner.source,
      lineNumber,
      recordName,
    });

    if (!result.ok) {
      if (this.strict) {
        throw result.error;
      }
      this.diagnostics.addFromError(result.error);
      this.skipped.push({
        recordName,
        lineNumber,
        value: match.value,
        code: result.error.code,
        reason: result.error.message,
      });
      this.logger.debug('Skipping archive attribute', { record: recordName, line: lineNumber, code: result.error.code });
      return null;
    }

    const archive: ArchiveAttribute = { kind: 'info', name: 'archive', value: match.value, policy: result.policy };
    return Object.freeze(archive);
  }

  /**
   * Next line inside an open record. End of input, or a line that starts a
   * new record, means the open record was never terminated.
   */
  private nextOrFail(header: RecordHeaderMatch, headerLine: number, expected: '{' | '}'): string {
    const line = this.scanner.next();
    if (line === null) {
      throw this.unterminated(header, headerLine, expected, 'end of input reached');
    }
    const next = matchRecordHeader(line);
    if (next) {
      throw this.unterminated(
        header,
        headerLine,
        expected,
        `record "${next.name}" starts at line ${this.scanner.lineNumber}`
      );
    }
    return line;
  }

  private unterminated(
    header: RecordHeaderMatch,
    headerLine: number,
    expected: '{' | '}',
    reason: string
  ): ParseError {
    return new ParseError(
      `Record "${header.name}" is not terminated: ${reason} before "${expected}"`,
      'ERR_UNTERMINATED_RECORD',
      { filePath: this.scanner.source, lineNumber: headerLine, recordName: header.name },
      `Add the missing "${expected}" to the record starting at line ${headerLine}`
    );
  }

  /** Anything but a comment after "}" is ignored, so say so. */
  private checkAfterClose(text: string, recordName: string): void {
    const rest = text.trim();
    if (rest && !rest.startsWith('#')) {
      this.nearMiss(
        'WARN_TEXT_AFTER_RECORD',
        `Text after the closing brace of record "${recordName}" is ignored: ${rest}`,
        recordName
      );
    }
  }

  private nearMiss(code: string, message: string, recordName?: string): void {
    this.diagnostics.add({
      code,
      severity: 'warning',
      message,
      file: this.scanner.source,
      line: this.scanner.lineNumber,
      record: recordName,
    });
    this.logger.debug(message, { line: this.scanner.lineNumber });
  }
}

/**
 * Parse every record from a scanner.
 */
export function parseDatabase(scanner: LineScanner, options: ParseOptions = {}): ParsedDatabase {
  return new RecordParser(scanner, options).parse();
}

/**
 * Parse database text held in memory.
 */
export function parseDatabaseText(text: string, options: ParseOptions & { source?: string } = {}): ParsedDatabase {
  return parseDatabase(new LineScanner(text, options.source), options);
}
