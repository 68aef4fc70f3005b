import type { Location } from './types.js';
import type { Diagnostic } from '../cadence/diagnostics.js';
import { highlightSnippet } from './highlight.js';
import { createColors } from 'colorette';

export interface FormatOptions {
  useColors?: boolean;
  /** Shown in front of the position, e.g. `monitor.cdc:3:8`. */
  file?: string;
  /** Omit the source excerpt. */
  snippet?: boolean;
}

export function formatLocation(location: Location): string {
  const { start, end } = location;
  return start.line === end.line && start.column === end.column
    ? `${start.line}:${start.column}`
    : `${start.line}:${start.column}-${end.line}:${end.column}`;
}

/**
 * Renders one diagnostic:
 *
 *   error[UndeclaredStream]: Undeclared stream 'y'
 *     --> monitor.cdc:2:13
 *   2 | output x := y
 *     |             ^
 */
export function formatDiagnostic(diagnostic: Diagnostic, source: string | undefined, options: FormatOptions = {}): string {
  const { useColors = true, file, snippet = true } = options;
  const colors = createColors({ useColor: useColors });

  const position = `${diagnostic.location.start.line}:${diagnostic.location.start.column}`;
  const label = diagnostic.severity === 'error' ? colors.red(colors.bold('error')) : colors.yellow(colors.bold('warning'));
  const parts = [`${label}[${diagnostic.code}]: ${diagnostic.message}`, colors.dim(`  --> ${file ? `${file}:${position}` : position}`)];

  if (snippet && source !== undefined) {
    const excerpt = highlightSnippet(source, diagnostic.location, { useColor: useColors, contextLines: 0 });
    if (excerpt) parts.push(excerpt);
  }

  for (const related of diagnostic.relatedInformation ?? []) {
    parts.push(`  ${colors.cyan('note')}: ${related.message} (${formatLocation(related.location)})`);
  }

  return parts.join('\n');
}

export function formatSummary(diagnostics: readonly Diagnostic[], useColors = true): string {
  const colors = createColors({ useColor: useColors });
  const errors = diagnostics.filter(d => d.severity === 'error').length;
  const warnings = diagnostics.length - errors;
  if (diagnostics.length === 0) return colors.green('no problems found');

  const counts: string[] = [];
  if (errors > 0) counts.push(colors.red(`${errors} error${errors === 1 ? '' : 's'}`));
  if (warnings > 0) counts.push(colors.yellow(`${warnings} warning${warnings === 1 ? '' : 's'}`));
  return counts.join(', ');
}

export function formatDiagnostics(diagnostics: readonly Diagnostic[], source: string | undefined, options: FormatOptions = {}): string {
  if (diagnostics.length === 0) return formatSummary(diagnostics, options.useColors);
  const rendered = diagnostics.map(diagnostic => formatDiagnostic(diagnostic, source, options));
  return [...rendered, formatSummary(diagnostics, options.useColors)].join('\n\n');
}

/** Message of anything thrown, for the command line. */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return typeof error === 'string' ? error : 'Unknown error';
}
