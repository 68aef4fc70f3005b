import path from 'node:path';
import { compileGrammarFromFile, isPeggyError, resolveGrammarPath, type CompiledGrammar } from '../grammar/index.js';
import { toLocation } from '../utils/types.js';
import { isCadenceSpec, type CadenceSpec } from './ast.js';
import type { Diagnostic } from './diagnostics.js';

// Sources run from src/ under Jest and from dist/src/ once built.
const GRAMMAR_CANDIDATES = [
  path.resolve(__dirname, '../grammar/cadence.peg'),
  path.resolve(__dirname, '../../../src/grammar/cadence.peg'),
];

let cachedGrammar: CompiledGrammar | null = null;

function cadenceGrammar(): CompiledGrammar {
  if (!cachedGrammar) {
    cachedGrammar = compileGrammarFromFile(resolveGrammarPath(GRAMMAR_CANDIDATES), {
      allowedStartRules: ['Spec'],
    });
  }
  return cachedGrammar;
}

export type ParseOutcome =
  | { success: true; spec: CadenceSpec }
  | { success: false; diagnostic: Diagnostic };

function describeExpected(expected: unknown[] | undefined): string {
  if (!expected || expected.length === 0) return '';
  const names = new Set<string>();
  for (const entry of expected) {
    if (typeof entry !== 'object' || entry === null) continue;
    if ('description' in entry && typeof entry.description === 'string') {
      names.add(entry.description);
    } else if ('text' in entry && typeof entry.text === 'string') {
      names.add(`"${entry.text}"`);
    }
  }
  return names.size > 0 ? `expected ${Array.from(names).slice(0, 6).join(', ')}` : '';
}

/** Parses Cadence source text; a syntax error comes back as a single diagnostic. */
export function parseCadence(source: string): ParseOutcome {
  let result: unknown;
  try {
    result = cadenceGrammar().parse(source);
  } catch (error: unknown) {
    if (!isPeggyError(error)) throw error;
    const expected = describeExpected(error.expected);
    const found = error.found == null ? 'end of input' : `"${error.found}"`;
    return {
      success: false,
      diagnostic: {
        severity: 'error',
        code: 'SyntaxError',
        message: expected ? `Syntax error: ${expected} but found ${found}` : `Syntax error: ${error.message}`,
        location: toLocation(error.location),
        streams: [],
        source: 'cadence',
      },
    };
  }
  if (!isCadenceSpec(result)) {
    throw new Error('Cadence grammar produced an unexpected result');
  }
  return { success: true, spec: result };
}
