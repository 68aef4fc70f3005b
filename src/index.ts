// src/index.ts
// ============================================
// 🌐 Cadence Frontend API Surface (Public Entry)
// ============================================

// 🧠 Grammar
export { compileGrammar, compileGrammarFromFile, GrammarCompilationError, type CompiledGrammar } from './grammar/index.js';
export { parseCadence, type ParseOutcome } from './cadence/parser.js';
export type * from './cadence/ast.js';

// 🔍 Analysis pipeline
export { analyzeSpec, checkSource, type AnalysisResult } from './cadence/analyze.js';
export {
  defaultAnalysisConfig,
  resolveAnalysisConfig,
  validateAnalysisConfig,
  type AnalysisConfig,
  type ConfigValidation,
} from './cadence/config.js';
export {
  DiagnosticCollector,
  type Diagnostic,
  type DiagnosticKind,
  type DiagnosticRelatedInformation,
  type Severity,
} from './cadence/diagnostics.js';
export type {
  AnalyzedProgram,
  AnalyzedStream,
  MemoryBound,
  Offset,
  Pacing,
  Reference,
  StreamExpr,
  StreamId,
  StreamKind,
} from './cadence/ir.js';
export { childExprs, forEachExpr } from './cadence/ir.js';

// 🧩 Building blocks
export { StreamGraph, GraphSealedError, type StreamNode } from './cadence/graph.js';
export { lowerSpec } from './cadence/lower.js';
export { checkTypes, type TypeCheckResult } from './cadence/type-check.js';
export { analyzePacing, clockLattice, frequenciesCompatible, type Clock } from './cadence/pacing.js';
export {
  computeEvaluationOrder,
  computeMemoryBounds,
  detectIllegalCycles,
  stronglyConnectedComponents,
  SchedulingCycleError,
} from './cadence/graph-analysis.js';
export { Unifier, SnapshotOrderError, type Lattice, type Mark, type VarId } from './cadence/unifier.js';
export { Rational, gcdAll, lcmAll } from './cadence/rational.js';
export { Quantity, UnitMismatchError, UnknownUnitError, formatFrequency } from './cadence/units.js';
export { formatStreamType, formatValueType, type StreamType, type ValueType } from './cadence/types.js';
export { formatActivation, type Activation } from './cadence/activation.js';

// 📤 Output
export { streamGraphToDot, formatPacing } from './cadence/graph-dot.js';
export { buildSchedule, type Deadline, type Schedule } from './cadence/schedule.js';
export { formatDiagnostic, formatDiagnostics, formatSummary, highlightSnippet } from './utils/index.js';
