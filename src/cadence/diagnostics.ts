import { compareLocations, defaultLocation, type Location } from '../utils/types.js';
import type { StreamId } from './ir.js';

export type DiagnosticKind =
  | 'SyntaxError'
  | 'DuplicateDeclaration'
  | 'UndeclaredStream'
  | 'UndeclaredFunction'
  | 'UnknownType'
  | 'UnknownModule'
  | 'TypeMismatch'
  | 'AmbiguousType'
  | 'UnitMismatch'
  | 'InconsistentPacing'
  | 'IncompatibleFrequency'
  | 'IllegalCycle'
  | 'IllegalLookahead'
  | 'InvalidWindow'
  | 'UnusedStream';

export type Severity = 'error' | 'warning';

export interface DiagnosticRelatedInformation {
  location: Location;
  message: string;
}

export interface Diagnostic {
  severity: Severity;
  /** Stable kind tag, safe to match on. */
  code: DiagnosticKind;
  message: string;
  location: Location;
  streams: StreamId[];
  source: 'cadence';
  relatedInformation?: DiagnosticRelatedInformation[];
}

export interface ReportOptions {
  streams?: StreamId[];
  related?: DiagnosticRelatedInformation[];
}

const severityRank: Record<Severity, number> = { error: 0, warning: 1 };

/**
 * Collects diagnostics for a whole run. Nothing is thrown on a user error:
 * stages report here and continue with placeholder bindings.
 */
export class DiagnosticCollector {
  private readonly diagnostics: Diagnostic[] = [];

  report(severity: Severity, code: DiagnosticKind, message: string, location?: Location, options: ReportOptions = {}): void {
    this.diagnostics.push({
      severity,
      code,
      message,
      location: location ?? defaultLocation,
      streams: options.streams ?? [],
      source: 'cadence',
      ...(options.related && options.related.length > 0 ? { relatedInformation: options.related } : {}),
    });
  }

  error(code: DiagnosticKind, message: string, location?: Location, options?: ReportOptions): void {
    this.report('error', code, message, location, options);
  }

  warning(code: DiagnosticKind, message: string, location?: Location, options?: ReportOptions): void {
    this.report('warning', code, message, location, options);
  }

  hasErrors(): boolean {
    return this.diagnostics.some(d => d.severity === 'error');
  }

  count(code: DiagnosticKind): number {
    return this.diagnostics.filter(d => d.code === code).length;
  }

  getDiagnostics(): Diagnostic[] {
    return [...this.diagnostics];
  }

  /** Errors first, then by position in the source, then in reporting order. */
  sorted(): Diagnostic[] {
    return this.diagnostics
      .map((diagnostic, index) => ({ diagnostic, index }))
      .sort((a, b) =>
        severityRank[a.diagnostic.severity] - severityRank[b.diagnostic.severity] ||
        compareLocations(a.diagnostic.location, b.diagnostic.location) ||
        a.index - b.index
      )
      .map(entry => entry.diagnostic);
  }
}
