import type { CadenceSpec } from './ast.js';
import { resolveAnalysisConfig, type AnalysisConfig } from './config.js';
import { DiagnosticCollector, type Diagnostic } from './diagnostics.js';
import { computeEvaluationOrder, computeMemoryBounds, detectIllegalCycles } from './graph-analysis.js';
import type { AnalyzedProgram, AnalyzedStream } from './ir.js';
import { lowerSpec } from './lower.js';
import { analyzePacing } from './pacing.js';
import { parseCadence } from './parser.js';
import { checkTypes } from './type-check.js';

export type AnalysisResult =
  | { success: true; program: AnalyzedProgram; diagnostics: Diagnostic[] }
  | { success: false; diagnostics: Diagnostic[] };

/**
 * Runs naming, typing, pacing and graph analysis over a parsed
 * specification. Every stage runs even after earlier errors, so one pass
 * reports as many independent problems as possible; memory bounds and the
 * evaluation order are only computed for an error-free program.
 */
export function analyzeSpec(spec: CadenceSpec, overrides: Partial<AnalysisConfig> = {}): AnalysisResult {
  const config = resolveAnalysisConfig(overrides);
  const diagnostics = new DiagnosticCollector();

  const { graph, functions } = lowerSpec(spec, diagnostics, config);
  const { streamTypes, exprTypes } = checkTypes(graph, functions, diagnostics);
  const { pacings } = analyzePacing(graph, diagnostics, config);
  detectIllegalCycles(graph, diagnostics);

  if (diagnostics.hasErrors()) {
    return { success: false, diagnostics: diagnostics.sorted() };
  }

  const { memory, futureDependent } = computeMemoryBounds(graph, pacings);
  const schedule = computeEvaluationOrder(graph);

  const streams = graph.streams().map((node): AnalyzedStream => {
    const type = streamTypes.get(node.id);
    const pacing = pacings.get(node.id);
    const bound = memory.get(node.id);
    if (!type || !pacing || !bound) {
      throw new Error(`Stream '${node.name}' left analysis without a type, clock or memory bound`);
    }
    return {
      id: node.id,
      name: node.name,
      kind: node.kind,
      type,
      pacing,
      memory: bound,
      layer: schedule.layerOf.get(node.id) ?? 0,
      futureDependent: futureDependent.has(node.id),
      expr: node.expr,
      message: node.message,
      location: node.location,
    };
  });

  return {
    success: true,
    program: {
      streams,
      references: graph.references(),
      evaluationOrder: schedule.order,
      layers: schedule.layers,
      exprTypes,
    },
    diagnostics: diagnostics.sorted(),
  };
}

/** Parses and analyzes Cadence source text. */
export function checkSource(source: string, overrides: Partial<AnalysisConfig> = {}): AnalysisResult {
  const parsed = parseCadence(source);
  if (!parsed.success) {
    return { success: false, diagnostics: [parsed.diagnostic] };
  }
  return analyzeSpec(parsed.spec, overrides);
}
