/**
 * DiagnosticReporter - end-of-run listing of collected diagnostics
 *
 *   [ERROR] ERR_POLICY_MODE (motors.db:7) [M1] Unknown sampling mode "poll"
 *      Suggestion: Sampling mode must be "monitor" or "scan"
 *
 *   Errors: 1
 */

import type { Diagnostic, DiagnosticCollector } from './DiagnosticCollector.js';

const SEVERITY_TAG: Record<Diagnostic['severity'], string> = {
  error: '[ERROR]',
  warning: '[WARN]',
};

export class DiagnosticReporter {
  constructor(private readonly collector: DiagnosticCollector) {}

  /**
   * One line per diagnostic (plus its suggestion), a blank line, then summary().
   */
  report(): string {
    const diagnostics = this.collector.getAll();
    if (diagnostics.length === 0) {
      return this.summary();
    }

    const lines = diagnostics.flatMap(describeDiagnostic);
    return [...lines, '', this.summary()].join('\n');
  }

  /**
   * "Errors: 1, Warnings: 2", omitting zero counts, or "No issues found."
   */
  summary(): string {
    const diagnostics = this.collector.getAll();
    const errors = diagnostics.filter(d => d.severity === 'error').length;
    const warnings = diagnostics.length - errors;

    const parts: string[] = [];
    if (errors > 0) parts.push(`Errors: ${errors}`);
    if (warnings > 0) parts.push(`Warnings: ${warnings}`);
    return parts.length > 0 ? parts.join(', ') : 'No issues found.';
  }
}

function describeDiagnostic(diag: Diagnostic): string[] {
  let where = '';
  if (diag.file) {
    where = diag.line ? ` (${diag.file}:${diag.line})` : ` (${diag.file})`;
  }
  const record = diag.record ? ` [${diag.record}]` : '';
  const head = `${SEVERITY_TAG[diag.severity]} ${diag.code}${where}${record} ${diag.message}`;
  return diag.suggestion ? [head, `   Suggestion: ${diag.suggestion}`] : [head];
}
