/**
 * Line matchers for the database grammar.
 *
 *   record(<type>, "<name>") {
 *     field(<name>, "<value>")
 *     info(<name>, "<value>")
 *   }
 *
 * Matchers look at one line (or the part of a line between braces) and never
 * consume input themselves; RecordParser decides what to do with the result.
 */

/** `record ( type , name )`, name optionally quoted */
const RECORD_HEADER = /^\s*record\s*\(\s*([^,()]+?)\s*,\s*("?)([^"()]+?)\2\s*\)/;
/** `field(NAME, "value")` / `info(NAME, "value")`; `\"` allowed inside value */
const ATTRIBUTE = /^\s*(field|info)\s*\(\s*([^,]+?)\s*,\s*"((?:[^"\\]|\\.)*)"\s*\)/;

const RECORD_LIKE = /^\s*record\b/;
const ATTRIBUTE_LIKE = /^\s*(field|info)\s*\(/;

export interface RecordHeaderMatch {
  type: string;
  name: string;
  /** Text after the closing parenthesis, where the opening brace may be */
  rest: string;
}

export interface AttributeMatch {
  kind: 'field' | 'info';
  name: string;
  value: string;
}

export function matchRecordHeader(line: string): RecordHeaderMatch | null {
  const m = RECORD_HEADER.exec(line);
  if (!m) {
    return null;
  }
  const [whole, type, , name] = m;
  return { type, name: name.trim(), rest: line.slice(whole.length) };
}

export function matchAttribute(text: string): AttributeMatch | null {
  const m = ATTRIBUTE.exec(text);
  if (!m) {
    return null;
  }
  const [, kind, name, value] = m;
  return { kind: kind === 'field' ? 'field' : 'info', name, value };
}

/**
 * Starts with the `record` keyword but did not match the header grammar.
 */
export function looksLikeRecordHeader(line: string): boolean {
  return RECORD_LIKE.test(line) && matchRecordHeader(line) === null;
}

/**
 * Starts like `field(` or `info(` but did not match the attribute grammar.
 */
export function looksLikeAttribute(text: string): boolean {
  return ATTRIBUTE_LIKE.test(text) && matchAttribute(text) === null;
}

/**
 * Index of the first `ch` outside double quotes, or -1.
 * An unquoted `#` starts a comment and ends the search.
 */
export function findUnquoted(text: string, ch: '{' | '}'): number {
  let inQuotes = false;

  for (let i = 0; i < text.length; i++) {
    const c = text[i];
    if (inQuotes) {
      if (c === '\\') {
        i++;
      } else if (c === '"') {
        inQuotes = false;
      }
      continue;
    }
    if (c === '"') {
      inQuotes = true;
    } else if (c === '#') {
      return -1;
    } else if (c === ch) {
      return i;
    }
  }

  return -1;
}
