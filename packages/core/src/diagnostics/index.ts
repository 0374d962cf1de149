export { DiagnosticCollector } from './DiagnosticCollector.js';
export type { Diagnostic, DiagnosticInput } from './DiagnosticCollector.js';
export { DiagnosticReporter } from './DiagnosticReporter.js';
