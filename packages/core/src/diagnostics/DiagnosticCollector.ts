/**
 * DiagnosticCollector - problems found while converting that did not stop the run
 *
 * Near-miss record headers and attributes arrive as warnings; archive values
 * that fail the sampling-policy grammar arrive as errors (via addFromError).
 */

import { ArchconfError } from '../errors/ArchconfError.js';

export interface Diagnostic {
  code: string;
  severity: 'error' | 'warning';
  message: string;
  file?: string;
  line?: number;
  record?: string;
  suggestion?: string;
  timestamp: number;
}

export type DiagnosticInput = Omit<Diagnostic, 'timestamp'>;

export class DiagnosticCollector {
  private readonly diagnostics: Diagnostic[] = [];

  /**
   * Record a thrown error. Anything that is not an ArchconfError becomes
   * ERR_UNKNOWN; fatal severities are recorded as errors.
   */
  addFromError(error: Error): void {
    if (!(error instanceof ArchconfError)) {
      this.add({ code: 'ERR_UNKNOWN', severity: 'error', message: error.message });
      return;
    }
    const { filePath, lineNumber, recordName } = error.context;
    this.add({
      code: error.code,
      severity: error.severity === 'warning' ? 'warning' : 'error',
      message: error.message,
      file: filePath,
      line: lineNumber,
      record: recordName,
      suggestion: error.suggestion,
    });
  }

  add(diagnostic: DiagnosticInput): void {
    this.diagnostics.push({ ...diagnostic, timestamp: Date.now() });
  }

  /** Snapshot in insertion order */
  getAll(): Diagnostic[] {
    return [...this.diagnostics];
  }

  hasErrors(): boolean {
    return this.diagnostics.some(d => d.severity === 'error');
  }

  count(): number {
    return this.diagnostics.length;
  }
}
