import { existsSync, readFileSync } from 'node:fs';
import path from 'node:path';
import { generate, type LocationRange } from 'peggy';

/**
 * The shape peggy gives both grammar errors and syntax errors of a
 * generated parser.
 */
export interface PeggyError extends Error {
  location: LocationRange;
  expected?: unknown[];
  found?: string | null;
}

export function isPeggyError(error: unknown): error is PeggyError {
  return (
    error instanceof Error &&
    'location' in error &&
    typeof error.location === 'object' &&
    error.location !== null
  );
}

export interface CompiledGrammar {
  parse: (input: string, startRule?: string) => unknown;
  source: string;
  grammarSource: string;
}

export interface CompileOptions {
  allowedStartRules?: string[];
  cache?: boolean;
  grammarSource?: string;
}

export class GrammarCompilationError extends Error {
  readonly grammarSource: string;

  constructor(grammarSource: string, cause: unknown) {
    const where = isPeggyError(cause)
      ? ` (${grammarSource}:${cause.location.start.line}:${cause.location.start.column})`
      : ` (${grammarSource})`;
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Grammar compilation failed${where}: ${detail}`);
    this.grammarSource = grammarSource;
  }
}

export function compileGrammar(grammar: string, options: CompileOptions = {}): CompiledGrammar {
  const grammarSource = options.grammarSource ?? 'inline';
  try {
    const parser = generate(grammar, {
      allowedStartRules: options.allowedStartRules ?? ['*'],
      cache: options.cache ?? false,
      grammarSource,
    });
    return {
      parse: (input: string, startRule?: string) => parser.parse(input, startRule ? { startRule } : {}),
      source: grammar,
      grammarSource,
    };
  } catch (error: unknown) {
    throw new GrammarCompilationError(grammarSource, error);
  }
}

/** Returns the first candidate path that exists on disk. */
export function resolveGrammarPath(candidates: string[]): string {
  for (const candidate of candidates) {
    if (existsSync(candidate)) return candidate;
  }
  throw new Error(`Grammar not found. Looked in:\n${candidates.map(c => `  - ${c}`).join('\n')}`);
}

export function compileGrammarFromFile(filePath: string, options: CompileOptions = {}): CompiledGrammar {
  const grammar = readFileSync(filePath, 'utf-8');
  return compileGrammar(grammar, { ...options, grammarSource: options.grammarSource ?? path.basename(filePath) });
}
