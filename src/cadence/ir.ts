import type { Location } from '../utils/index.js';
import type { Activation } from './activation.js';
import type { CadenceBinaryOp, CadenceUnaryOp, CadenceWindowOp } from './ast.js';
import type { Rational } from './rational.js';
import type { StreamType } from './types.js';
import type { Quantity } from './units.js';

export type StreamId = number;
export type ReferenceId = number;
export type StreamKind = 'input' | 'output' | 'trigger';

export type WindowOp = CadenceWindowOp;

/** How a reader accesses the stream it references. */
export type Offset =
  | { kind: 'current' }
  | { kind: 'lookback'; steps: number }
  | { kind: 'lookahead'; steps: number }
  | { kind: 'hold' }
  | { kind: 'window'; duration: Quantity; op: WindowOp };

export type OffsetKind = Offset['kind'];

/** `target` reads `source` at `offset`. */
export interface Reference {
  id: ReferenceId;
  source: StreamId;
  target: StreamId;
  offset: Offset;
  location?: Location;
}

export type Pacing =
  | { kind: 'periodic'; frequency: Rational }
  | { kind: 'event'; activation: Activation };

export type LiteralValue =
  | { kind: 'number'; value: Rational; isFloat: boolean; unit: number }
  | { kind: 'string'; value: string }
  | { kind: 'bool'; value: boolean };

export type ExprId = number;

interface ExprBase {
  id: ExprId;
  location?: Location;
}

export interface LiteralExpr extends ExprBase {
  kind: 'Literal';
  value: LiteralValue;
}

export interface StreamLookupExpr extends ExprBase {
  kind: 'StreamLookup';
  stream: StreamId;
  reference: ReferenceId;
  offset: Offset;
}

export interface UnaryExpr extends ExprBase {
  kind: 'Unary';
  op: CadenceUnaryOp;
  operand: StreamExpr;
}

export interface BinaryExpr extends ExprBase {
  kind: 'Binary';
  op: CadenceBinaryOp;
  left: StreamExpr;
  right: StreamExpr;
}

export interface IteExpr extends ExprBase {
  kind: 'Ite';
  condition: StreamExpr;
  consequence: StreamExpr;
  alternative: StreamExpr;
}

export interface TupleExpr extends ExprBase {
  kind: 'Tuple';
  elements: StreamExpr[];
}

export interface ProjectionExpr extends ExprBase {
  kind: 'Projection';
  target: StreamExpr;
  index: number;
}

export interface CallExpr extends ExprBase {
  kind: 'Call';
  callee: string;
  args: StreamExpr[];
}

export interface DefaultExpr extends ExprBase {
  kind: 'Default';
  expr: StreamExpr;
  fallback: StreamExpr;
}

/** Stands in for a use that failed to resolve; it type-checks as anything. */
export interface ErrorExpr extends ExprBase {
  kind: 'Error';
}

export type StreamExpr =
  | LiteralExpr
  | StreamLookupExpr
  | UnaryExpr
  | BinaryExpr
  | IteExpr
  | TupleExpr
  | ProjectionExpr
  | CallExpr
  | DefaultExpr
  | ErrorExpr;

export function childExprs(expr: StreamExpr): StreamExpr[] {
  switch (expr.kind) {
    case 'Unary':
      return [expr.operand];
    case 'Binary':
      return [expr.left, expr.right];
    case 'Ite':
      return [expr.condition, expr.consequence, expr.alternative];
    case 'Tuple':
      return expr.elements;
    case 'Projection':
      return [expr.target];
    case 'Call':
      return expr.args;
    case 'Default':
      return [expr.expr, expr.fallback];
    default:
      return [];
  }
}

/** Pre-order walk over `expr` and its sub-expressions. */
export function forEachExpr(expr: StreamExpr, visit: (node: StreamExpr) => void): void {
  visit(expr);
  for (const child of childExprs(expr)) forEachExpr(child, visit);
}

/** Values a stream must retain for its readers. */
export type MemoryBound =
  | { kind: 'samples'; samples: number }
  | { kind: 'timed'; samples: number; duration: Quantity };

export interface AnalyzedStream {
  readonly id: StreamId;
  readonly name: string;
  readonly kind: StreamKind;
  readonly type: StreamType;
  readonly pacing: Pacing;
  readonly memory: MemoryBound;
  /** Depth in the graph of `current` references; inputs sit at layer 0. */
  readonly layer: number;
  /** Reads a value that lies in the future, directly or through other streams. */
  readonly futureDependent: boolean;
  readonly expr: StreamExpr | null;
  readonly message: string | null;
  readonly location?: Location;
}

export interface AnalyzedProgram {
  readonly streams: readonly AnalyzedStream[];
  readonly references: readonly Reference[];
  readonly evaluationOrder: readonly StreamId[];
  readonly layers: readonly (readonly StreamId[])[];
  /** Static type of every sub-expression, keyed by expression id. */
  readonly exprTypes: ReadonlyMap<ExprId, StreamType>;
}
