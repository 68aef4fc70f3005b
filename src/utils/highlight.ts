import type { Location } from './types.js';
import chalk from 'chalk';

export interface SnippetOptions {
  useColor?: boolean;
  /** Lines shown before and after the highlighted range. */
  contextLines?: number;
  maxLineLength?: number;
}

/**
 * Source excerpt around `location` with numbered lines and a caret row under
 * the first highlighted line.
 */
export function highlightSnippet(input: string, location: Location, options: SnippetOptions = {}): string {
  const { useColor = true, contextLines = 1, maxLineLength = 120 } = options;

  const lines = input.split('\n');
  const startLine = location.start.line;
  const endLine = Math.max(startLine, location.end.line);

  if (startLine < 1 || startLine > lines.length) return '';

  const firstLine = Math.max(1, startLine - contextLines);
  const lastLine = Math.min(lines.length, endLine + contextLines);
  const gutterWidth = lastLine.toString().length;
  const emptyGutter = `${' '.repeat(gutterWidth)} | `;

  const resultLines: string[] = [];
  for (let i = firstLine; i <= lastLine; i++) {
    const line = lines[i - 1];
    const shown = line.length > maxLineLength ? line.substring(0, maxLineLength) + '...' : line;
    const gutter = `${i.toString().padStart(gutterWidth)} | `;
    const inRange = i >= startLine && i <= endLine;

    resultLines.push(gutter + (useColor && inRange ? chalk.redBright(shown) : shown));

    if (i === startLine) {
      const startCol = location.start.column;
      const endCol = startLine === location.end.line ? location.end.column : line.length + 1;
      const pointer = ' '.repeat(Math.max(0, startCol - 1)) + '^'.repeat(Math.max(1, endCol - startCol));
      resultLines.push(emptyGutter + (useColor ? chalk.yellow(pointer) : pointer));
    }
  }

  return resultLines.join('\n');
}

/** 1-based line and column of a character offset. */
export function getLocationFromOffset(input: string, offset: number): { line: number; column: number } {
  const before = input.substring(0, Math.max(0, offset)).split('\n');
  return { line: before.length, column: before[before.length - 1].length + 1 };
}
