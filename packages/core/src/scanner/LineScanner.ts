import { readFileSync } from 'fs';
import { FileAccessError } from '../errors/ArchconfError.js';

/**
 * Forward-only reader over the lines of a database file.
 *
 * Lines are returned raw (no trimming, line terminator removed). `next()`
 * returns `null` once input is exhausted; a blank line is `''`. The scanner
 * cannot be rewound.
 */
export class LineScanner {
  private position = 0;
  private line = 0;

  constructor(
    private readonly text: string,
    /** Path or label used in diagnostics */
    readonly source: string = '<input>'
  ) {}

  /**
   * Read a whole file as UTF-8.
   * @throws FileAccessError (ERR_INPUT_UNREADABLE)
   */
  static fromFile(filePath: string): LineScanner {
    let text: string;
    try {
      text = readFileSync(filePath, 'utf-8');
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new FileAccessError(
        `Cannot read database file: ${filePath}`,
        'ERR_INPUT_UNREADABLE',
        { filePath, reason },
        'Check that the path exists and is readable'
      );
    }
    return new LineScanner(text, filePath);
  }

  /** 1-based number of the line most recently returned by next() (0 before the first) */
  get lineNumber(): number {
    return this.line;
  }

  get done(): boolean {
    return this.position >= this.text.length;
  }

  next(): string | null {
    if (this.done) {
      return null;
    }

    const end = this.text.indexOf('\n', this.position);
    let raw: string;
    if (end === -1) {
      raw = this.text.slice(this.position);
      this.position = this.text.length;
    } else {
      raw = this.text.slice(this.position, end);
      this.position = end + 1;
    }

    this.line++;
    return raw.endsWith('\r') ? raw.slice(0, -1) : raw;
  }
}
