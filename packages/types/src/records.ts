/**
 * Record model - parsed contents of a configuration database file
 *
 * A database is a flat list of records:
 *
 *   record(ai, "BL7:Mot:Parker:HROT.RBV") {
 *     field(DESC, "Motor position")
 *     info(archive, "monitor, 00:00:10")
 *   }
 *
 * Each record owns its attributes in source order. Attributes are a tagged
 * union selected at parse time: plain `field` entries, and `info(archive, ...)`
 * entries whose value has been parsed into an ArchivePolicy.
 */

/**
 * Sampling trigger. `monitor` samples on change, `scan` samples periodically.
 */
export type SampleMode = 'monitor' | 'scan';

/**
 * Sampling configuration carried by an `info(archive, "...")` annotation.
 */
export interface ArchivePolicy {
  readonly mode: SampleMode;
  /** HH:MM:SS, each component two digits in [00, 59] */
  readonly period: string;
  /**
   * Record properties to archive as separate channels (VAL, HIHI, ...).
   * `null` means no property list was given: the record itself is archived.
   * An empty array is a list that names nothing.
   */
  readonly properties: readonly string[] | null;
}

/**
 * `field(NAME, "value")`
 */
export interface FieldAttribute {
  readonly kind: 'field';
  readonly name: string;
  readonly value: string;
}

/**
 * `info(archive, "mode, period[, props]")` with its value already parsed
 */
export interface ArchiveAttribute {
  readonly kind: 'info';
  readonly name: 'archive';
  readonly value: string;
  readonly policy: ArchivePolicy;
}

export type Attribute = FieldAttribute | ArchiveAttribute;

/**
 * One `record(type, name) { ... }` block.
 */
export interface DbRecord {
  readonly type: string;
  readonly name: string;
  readonly attributes: readonly Attribute[];
}

/**
 * Archive annotation that was dropped because its value did not parse.
 */
export interface SkippedAttribute {
  readonly recordName: string;
  readonly lineNumber: number;
  readonly value: string;
  readonly code: string;
  readonly reason: string;
}

/**
 * Result of parsing a whole database file.
 */
export interface ParsedDatabase {
  readonly records: readonly DbRecord[];
  readonly skipped: readonly SkippedAttribute[];
}

export function isArchiveAttribute(attribute: Attribute): attribute is ArchiveAttribute {
  return attribute.kind === 'info' && attribute.name === 'archive';
}
