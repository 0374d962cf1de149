/**
 * Sampling-policy grammar embedded in `info(archive, "...")` values:
 *
 *   <mode>, <period>[, <prop> <prop> ...]
 *
 *   monitor, 00:00:05
 *   scan, 00:01:00, HIHI LOLO HIGH LOW
 *
 * mode is `monitor` or `scan` in any letter case, period is HH:MM:SS with
 * every component in [00, 59].
 */

import type { ArchivePolicy, SampleMode } from '@archconf/types';
import { PolicyError, type ErrorContext } from '../errors/ArchconfError.js';

const PERIOD = '[0-5][0-9]:[0-5][0-9]:[0-5][0-9]';

const POLICY = new RegExp(`^\\s*(monitor|scan)\\s*,\\s*(${PERIOD})\\s*(?:,(.*))?$`, 'i');
const MODE_PREFIX = /^\s*(monitor|scan)\b/i;
const PERIOD_PREFIX = new RegExp(`^\\s*(?:monitor|scan)\\s*,\\s*${PERIOD}(?![0-9:])`, 'i');

export type PolicyParseResult =
  | { ok: true; policy: ArchivePolicy }
  | { ok: false; error: PolicyError };

/**
 * Parse an archive annotation value.
 *
 * Never throws: a value outside the grammar yields `{ ok: false }` with a
 * PolicyError whose code names the first part that is wrong.
 */
export function parseArchivePolicy(value: string, context: ErrorContext = {}): PolicyParseResult {
  const m = POLICY.exec(value);

  if (m) {
    const [, mode, period, trailing] = m;
    const properties = trailing === undefined ? [] : trailing.split(/\s+/).filter(Boolean);
    return {
      ok: true,
      policy: Object.freeze({
        mode: normalizeMode(mode),
        period,
        // "monitor, 00:00:05," lists nothing: same as no list at all
        properties: properties.length > 0 ? Object.freeze(properties) : null,
      }),
    };
  }

  return { ok: false, error: diagnose(value, context) };
}

function normalizeMode(mode: string): SampleMode {
  return mode.toLowerCase() === 'scan' ? 'scan' : 'monitor';
}

function diagnose(value: string, context: ErrorContext): PolicyError {
  const errorContext = { ...context, value };
  const suggestion = 'Expected "<monitor|scan>, HH:MM:SS[, PROP ...]"';

  if (!value.trim()) {
    return new PolicyError('Archive policy is empty', 'ERR_POLICY_EMPTY', errorContext, suggestion);
  }

  if (!MODE_PREFIX.test(value)) {
    const mode = value.split(',')[0].trim();
    return new PolicyError(
      `Unknown sampling mode "${mode}"`,
      'ERR_POLICY_MODE',
      errorContext,
      'Sampling mode must be "monitor" or "scan"'
    );
  }

  if (!PERIOD_PREFIX.test(value)) {
    return new PolicyError(
      `Missing or malformed sampling period in "${value}"`,
      'ERR_POLICY_PERIOD',
      errorContext,
      'Sampling period must be HH:MM:SS with each part between 00 and 59'
    );
  }

  return new PolicyError(
    `Unexpected text after sampling period in "${value}"`,
    'ERR_POLICY_SYNTAX',
    errorContext,
    suggestion
  );
}
