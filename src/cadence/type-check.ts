import type { Location } from '../utils/index.js';
import type { CadenceBinaryOp } from './ast.js';
import type { DiagnosticCollector } from './diagnostics.js';
import type { StreamGraph, StreamNode } from './graph.js';
import { forEachExpr, type ExprId, type LiteralValue, type StreamExpr, type StreamId, type StreamLookupExpr, type WindowOp } from './ir.js';
import type { FunctionSignature, SignatureType } from './stdlib.js';
import {
  constraintTerm,
  formatValueType,
  numericFamilies,
  type ConstraintName,
  type StreamType,
  type TypeFamily,
  type TypeTerm,
  type UnitTerm,
  type ValueType,
} from './types.js';
import { Unifier, type Lattice, type MergeResult, type VarId } from './unifier.js';
import { UnitMismatchError, describeExponent, type TimeExponent } from './units.js';

export interface TypeCheckResult {
  streamTypes: Map<StreamId, StreamType>;
  /** Every sub-expression whose type could be determined. */
  exprTypes: Map<ExprId, StreamType>;
}

interface Slot {
  type: VarId;
  unit: VarId;
}

/** Constraints that can only be solved once more of the program is known. */
type Deferred =
  | { kind: 'unit-product'; op: '*' | '/'; left: VarId; right: VarId; result: VarId; streams: StreamId[]; location?: Location }
  | { kind: 'projection'; tuple: VarId; index: number; result: VarId; streams: StreamId[]; location?: Location };

const ok = <V>(value: V): MergeResult<V> => ({ ok: true, value });
const fail: MergeResult<never> = { ok: false };

const unitLattice: Lattice<UnitTerm> = {
  merge(left, right) {
    if (left.kind === 'infer') return ok(right);
    if (right.kind === 'infer') return ok(left);
    // A known unit wins over an error.
    if (left.kind === 'error') return ok(right);
    if (right.kind === 'error') return ok(left);
    return left.exponent === right.exponent ? ok(left) : fail;
  },
  equals(left, right) {
    if (left.kind === 'exponent' && right.kind === 'exponent') return left.exponent === right.exponent;
    return left.kind === right.kind;
  },
};

function termsEqual(a: TypeTerm, b: TypeTerm): boolean {
  switch (a.kind) {
    case 'constraint':
      return b.kind === 'constraint' && a.families.size === b.families.size && [...a.families].every(f => b.families.has(f));
    case 'int':
    case 'uint':
    case 'float':
      return b.kind === a.kind && 'bits' in b && b.bits === a.bits;
    case 'tuple':
      return b.kind === 'tuple' && a.elements.length === b.elements.length && a.elements.every((e, i) => e === b.elements[i]);
    case 'option':
      return b.kind === 'option' && a.inner === b.inner;
    default:
      return a.kind === b.kind;
  }
}

type NumericType = Extract<ValueType, { kind: 'int' | 'uint' | 'float' }>;

function defaultFor(families: ReadonlySet<TypeFamily>): NumericType | null {
  if (![...families].every(family => numericFamilies.has(family))) return null;
  if (families.has('int')) return { kind: 'int', bits: 64 };
  if (families.has('uint')) return { kind: 'uint', bits: 64 };
  return { kind: 'float', bits: 64 };
}

const exponentOf = (term: UnitTerm): TimeExponent => (term.kind === 'exponent' ? term.exponent : 0);

const arithmeticVerbs: Record<'+' | '-' | '%', string> = { '+': 'add', '-': 'subtract', '%': 'take the remainder of' };

/**
 * Infers value types and time units of every stream and sub-expression.
 *
 * Each sub-expression gets one variable in the type table and one in the
 * unit table. Unit products and tuple projections depend on information
 * that may only arrive later in the walk, so they are queued and solved
 * after all streams have been visited.
 */
export function checkTypes(
  graph: StreamGraph,
  functions: ReadonlyMap<string, FunctionSignature>,
  diagnostics: DiagnosticCollector
): TypeCheckResult {
  return new TypeChecker(graph, functions, diagnostics).check();
}

class TypeChecker {
  private readonly types: Unifier<TypeTerm>;
  private readonly units = new Unifier<UnitTerm>(unitLattice);
  private readonly streamSlots = new Map<StreamId, Slot>();
  private readonly exprSlots = new Map<ExprId, Slot>();
  /** Roots already reported as infinite types. */
  private readonly cyclic = new Set<VarId>();
  private deferred: Deferred[] = [];

  constructor(
    private readonly graph: StreamGraph,
    private readonly functions: ReadonlyMap<string, FunctionSignature>,
    private readonly diagnostics: DiagnosticCollector
  ) {
    this.types = new Unifier<TypeTerm>({
      merge: (left, right) => this.mergeTypes(left, right),
      equals: termsEqual,
    });
  }

  check(): TypeCheckResult {
    for (const node of this.graph.streams()) {
      this.streamSlots.set(node.id, this.declareStream(node));
    }
    for (const node of this.graph.streams()) {
      this.checkStream(node);
    }
    this.solveDeferred();
    return this.finalize();
  }

  // Lattice

  private mergeTypes(left: TypeTerm, right: TypeTerm): MergeResult<TypeTerm> {
    if (left.kind === 'infer') return ok(right);
    if (right.kind === 'infer') return ok(left);
    // Errors absorb what is still open but give way to a concrete type.
    if (left.kind === 'error') return ok(right.kind === 'constraint' ? left : right);
    if (right.kind === 'error') return ok(left.kind === 'constraint' ? right : left);

    if (left.kind === 'constraint') {
      if (right.kind === 'constraint') {
        const families = new Set([...left.families].filter(family => right.families.has(family)));
        if (families.size === 0) return fail;
        const label =
          families.size === left.families.size
            ? left.label
            : families.size === right.families.size
              ? right.label
              : `${left.label} ${right.label}`;
        return ok<TypeTerm>({ kind: 'constraint', families, label });
      }
      return left.families.has(right.kind) ? ok(right) : fail;
    }
    if (right.kind === 'constraint') {
      return right.families.has(left.kind) ? ok(left) : fail;
    }

    switch (left.kind) {
      case 'bool':
      case 'string':
        return right.kind === left.kind ? ok(left) : fail;
      case 'int':
      case 'uint':
      case 'float':
        return right.kind === left.kind && 'bits' in right && right.bits === left.bits ? ok(left) : fail;
      case 'tuple': {
        if (right.kind !== 'tuple' || right.elements.length !== left.elements.length) return fail;
        for (let i = 0; i < left.elements.length; i++) {
          if (!this.types.unify(left.elements[i], right.elements[i]).ok) return fail;
        }
        return ok(left);
      }
      case 'option':
        if (right.kind !== 'option') return fail;
        return this.types.unify(left.inner, right.inner).ok ? ok(left) : fail;
    }
  }

  // Variables

  private instantiate(type: ValueType): VarId {
    switch (type.kind) {
      case 'tuple':
        return this.types.newVar({ kind: 'tuple', elements: type.elements.map(element => this.instantiate(element)) });
      case 'option':
        return this.types.newVar({ kind: 'option', inner: this.instantiate(type.inner) });
      default:
        return this.types.newVar(type);
    }
  }

  private fresh(type: TypeTerm, unit: TimeExponent | null): Slot {
    return {
      type: this.types.newVar(type),
      unit: this.units.newVar(unit === null ? { kind: 'infer' } : { kind: 'exponent', exponent: unit }),
    };
  }

  private errorSlot(): Slot {
    return { type: this.types.newVar({ kind: 'error' }), unit: this.units.newVar({ kind: 'error' }) };
  }

  private boolSlot(): Slot {
    return this.fresh({ kind: 'bool' }, 0);
  }

  private slotOf(stream: StreamId): Slot {
    const slot = this.streamSlots.get(stream);
    if (!slot) throw new Error(`No type variables allocated for stream ${stream}`);
    return slot;
  }

  private declareStream(node: StreamNode): Slot {
    if (node.declaredType) {
      return {
        type: this.instantiate(node.declaredType.value),
        unit: this.units.newVar({ kind: 'exponent', exponent: node.declaredType.unit }),
      };
    }
    // An input whose declared type failed to resolve has already been reported.
    return node.kind === 'input' ? this.errorSlot() : this.fresh({ kind: 'infer' }, null);
  }

  // Reporting helpers

  private renderTerm(term: TypeTerm, depth = 0): string {
    switch (term.kind) {
      case 'infer':
        return '_';
      case 'constraint':
        return `{${term.label}}`;
      case 'error':
        return '{error}';
      case 'tuple':
        if (depth > 4) return '(...)';
        return `(${term.elements.map(element => this.renderTerm(this.types.probe(element), depth + 1)).join(', ')})`;
      case 'option':
        if (depth > 4) return 'Option<...>';
        return `Option<${this.renderTerm(this.types.probe(term.inner), depth + 1)}>`;
      default:
        return formatValueType(term);
    }
  }

  private unifyTypes(
    a: VarId,
    b: VarId,
    location: Location | undefined,
    streams: StreamId[],
    describe: (left: string, right: string) => string
  ): boolean {
    const result = this.types.unify(a, b);
    if (result.ok) return true;
    const message = describe(this.renderTerm(result.conflict.left), this.renderTerm(result.conflict.right));
    this.diagnostics.error('TypeMismatch', message, location, { streams });
    return false;
  }

  private requireType(
    id: VarId,
    term: TypeTerm,
    location: Location | undefined,
    streams: StreamId[],
    describe: (found: string) => string
  ): boolean {
    const result = this.types.unifyValue(id, term);
    if (result.ok) return true;
    this.diagnostics.error('TypeMismatch', describe(this.renderTerm(result.conflict.left)), location, { streams });
    return false;
  }

  private unifyUnits(
    a: VarId,
    b: VarId,
    location: Location | undefined,
    streams: StreamId[],
    describe: (left: TimeExponent, right: TimeExponent) => string
  ): boolean {
    const result = this.units.unify(a, b);
    if (result.ok) return true;
    const message = describe(exponentOf(result.conflict.left), exponentOf(result.conflict.right));
    this.diagnostics.error('UnitMismatch', message, location, { streams });
    return false;
  }

  private requireUnit(
    id: VarId,
    exponent: TimeExponent,
    location: Location | undefined,
    streams: StreamId[],
    describe: (found: TimeExponent) => string
  ): boolean {
    const result = this.units.unifyValue(id, { kind: 'exponent', exponent });
    if (result.ok) return true;
    this.diagnostics.error('UnitMismatch', describe(exponentOf(result.conflict.left)), location, { streams });
    return false;
  }

  // Walk

  private checkStream(node: StreamNode): void {
    if (!node.expr) return;
    const own = this.slotOf(node.id);
    const value = this.infer(node.expr, node);
    const streams = [node.id];
    const location = node.expr.location;

    if (node.kind === 'trigger') {
      this.unifyTypes(own.type, value.type, location, streams, (_, found) => `Trigger condition must be Bool, found ${found}`);
      return;
    }
    this.unifyTypes(own.type, value.type, location, streams, (declared, found) =>
      `Stream '${node.name}' is declared as ${declared} but its expression has type ${found}`
    );
    this.unifyUnits(own.unit, value.unit, location, streams, (declared, found) =>
      `Stream '${node.name}' is declared as a ${describeExponent(declared)} value but its expression is a ${describeExponent(found)} value`
    );
  }

  private infer(expr: StreamExpr, owner: StreamNode): Slot {
    const slot = this.inferUncached(expr, owner);
    this.exprSlots.set(expr.id, slot);
    return slot;
  }

  private inferUncached(expr: StreamExpr, owner: StreamNode): Slot {
    const streams = [owner.id];
    switch (expr.kind) {
      case 'Literal':
        return this.inferLiteral(expr.value);

      case 'StreamLookup':
        return this.inferLookup(expr, owner);

      case 'Unary': {
        const operand = this.infer(expr.operand, owner);
        if (expr.op === '!') {
          this.requireType(operand.type, { kind: 'bool' }, expr.operand.location, streams, found =>
            `Operator '!' needs a Bool operand, found ${found}`
          );
          return this.boolSlot();
        }
        const signed = this.requireType(operand.type, constraintTerm('signed'), expr.operand.location, streams, found =>
          `Operator '-' needs a signed numeric operand, found ${found}`
        );
        return signed ? operand : { type: this.types.newVar({ kind: 'error' }), unit: operand.unit };
      }

      case 'Binary':
        return this.inferBinary(expr.op, expr.left, expr.right, expr.location, owner);

      case 'Ite': {
        const condition = this.infer(expr.condition, owner);
        const consequence = this.infer(expr.consequence, owner);
        const alternative = this.infer(expr.alternative, owner);
        this.requireType(condition.type, { kind: 'bool' }, expr.condition.location, streams, found =>
          `Condition of if-then-else must be Bool, found ${found}`
        );
        const same = this.unifyTypes(consequence.type, alternative.type, expr.location, streams, (left, right) =>
          `Branches of if-then-else have different types: ${left} and ${right}`
        );
        this.unifyUnits(consequence.unit, alternative.unit, expr.location, streams, (left, right) =>
          `Branches of if-then-else have different units: a ${describeExponent(left)} value and a ${describeExponent(right)} value`
        );
        return same ? consequence : { type: this.types.newVar({ kind: 'error' }), unit: consequence.unit };
      }

      case 'Tuple': {
        const elements = expr.elements.map(element => this.infer(element, owner));
        return this.fresh({ kind: 'tuple', elements: elements.map(element => element.type) }, 0);
      }

      case 'Projection': {
        const target = this.infer(expr.target, owner);
        const result = this.fresh({ kind: 'infer' }, null);
        this.deferred.push({ kind: 'projection', tuple: target.type, index: expr.index, result: result.type, streams, location: expr.location });
        return result;
      }

      case 'Call':
        return this.inferCall(expr.callee, expr.args, expr.location, owner);

      case 'Default': {
        const inner = this.infer(expr.expr, owner);
        const fallback = this.infer(expr.fallback, owner);
        const payload = this.types.newVar({ kind: 'infer' });
        const optional = this.types.newVar({ kind: 'option', inner: payload });
        if (
          !this.unifyTypes(inner.type, optional, expr.expr.location, streams, found =>
            `defaults(to:) needs an optional value, found ${found}`
          )
        ) {
          return this.errorSlot();
        }
        this.unifyTypes(payload, fallback.type, expr.fallback.location, streams, (expected, found) =>
          `Default value has type ${found} but the stream yields ${expected}`
        );
        this.unifyUnits(inner.unit, fallback.unit, expr.fallback.location, streams, (expected, found) =>
          `Default value is a ${describeExponent(found)} value but the stream yields a ${describeExponent(expected)} value`
        );
        return { type: payload, unit: inner.unit };
      }

      case 'Error':
        return this.errorSlot();
    }
  }

  private inferLiteral(value: LiteralValue): Slot {
    switch (value.kind) {
      case 'number':
        return this.fresh(constraintTerm(value.isFloat ? 'float' : 'numeric'), value.unit);
      case 'string':
        return this.fresh({ kind: 'string' }, 0);
      case 'bool':
        return this.boolSlot();
    }
  }

  private inferLookup(expr: StreamLookupExpr, owner: StreamNode): Slot {
    const target = this.slotOf(expr.stream);
    switch (expr.offset.kind) {
      case 'current':
        return target;
      case 'lookback':
      case 'lookahead':
      case 'hold':
        return { type: this.types.newVar({ kind: 'option', inner: target.type }), unit: target.unit };
      case 'window':
        return this.inferWindow(expr.offset.op, target, expr.location, owner);
    }
  }

  private inferWindow(op: WindowOp, target: Slot, location: Location | undefined, owner: StreamNode): Slot {
    const streams = [owner.id];
    if (op === 'count') {
      return this.fresh({ kind: 'uint', bits: 64 }, 0);
    }
    const numeric = this.requireType(target.type, constraintTerm('numeric'), location, streams, found =>
      `Window operation '${op}' needs a numeric stream, found ${found}`
    );
    if (!numeric) return this.errorSlot();

    switch (op) {
      case 'sum':
        return target;
      case 'product':
        this.requireUnit(target.unit, 0, location, streams, found =>
          `Window operation 'product' needs a dimensionless stream, found a ${describeExponent(found)} value`
        );
        return target;
      case 'avg':
      case 'min':
      case 'max':
        return { type: this.types.newVar({ kind: 'option', inner: target.type }), unit: target.unit };
      case 'integral': {
        const result = this.fresh({ kind: 'float', bits: 64 }, null);
        const seconds = this.units.newVar({ kind: 'exponent', exponent: 1 });
        this.deferred.push({ kind: 'unit-product', op: '*', left: target.unit, right: seconds, result: result.unit, streams, location });
        return result;
      }
    }
  }

  private inferBinary(
    op: CadenceBinaryOp,
    leftExpr: StreamExpr,
    rightExpr: StreamExpr,
    location: Location | undefined,
    owner: StreamNode
  ): Slot {
    const streams = [owner.id];
    const left = this.infer(leftExpr, owner);
    const right = this.infer(rightExpr, owner);

    switch (op) {
      case '&&':
      case '||': {
        for (const [operand, operandExpr] of [[left, leftExpr], [right, rightExpr]] as const) {
          this.requireType(operand.type, { kind: 'bool' }, operandExpr.location, streams, found =>
            `Operator '${op}' needs Bool operands, found ${found}`
          );
        }
        return this.boolSlot();
      }

      case '==':
      case '!=':
      case '<':
      case '<=':
      case '>':
      case '>=': {
        const equality = op === '==' || op === '!=';
        const constraint: ConstraintName = equality ? 'equatable' : 'comparable';
        const admitted = this.requireType(left.type, constraintTerm(constraint), leftExpr.location, streams, found =>
          `Operator '${op}' cannot compare values of type ${found}`
        );
        if (admitted) {
          this.unifyTypes(left.type, right.type, location, streams, (l, r) => `Cannot compare ${l} with ${r}`);
        }
        this.unifyUnits(left.unit, right.unit, location, streams, (l, r) => new UnitMismatchError('compare', l, r).message);
        return this.boolSlot();
      }

      case '**': {
        const numeric = this.requireType(left.type, constraintTerm('numeric'), leftExpr.location, streams, found =>
          `Operator '**' needs numeric operands, found ${found}`
        );
        const same =
          numeric &&
          this.unifyTypes(left.type, right.type, location, streams, (l, r) => `Operands of '**' have different types: ${l} and ${r}`);
        for (const [operand, operandExpr] of [[left, leftExpr], [right, rightExpr]] as const) {
          this.requireUnit(operand.unit, 0, operandExpr.location, streams, found =>
            `Operator '**' needs dimensionless operands, found a ${describeExponent(found)} value`
          );
        }
        return same ? { type: left.type, unit: this.units.newVar({ kind: 'exponent', exponent: 0 }) } : this.errorSlot();
      }

      default: {
        const numeric = this.requireType(left.type, constraintTerm('numeric'), leftExpr.location, streams, found =>
          `Operator '${op}' needs numeric operands, found ${found}`
        );
        const same =
          numeric &&
          this.unifyTypes(left.type, right.type, location, streams, (l, r) => `Operands of '${op}' have different types: ${l} and ${r}`);
        const type = same ? left.type : this.types.newVar({ kind: 'error' });

        if (op === '*' || op === '/') {
          const unit = this.units.newVar({ kind: 'infer' });
          this.deferred.push({ kind: 'unit-product', op, left: left.unit, right: right.unit, result: unit, streams, location });
          return { type, unit };
        }
        this.unifyUnits(left.unit, right.unit, location, streams, (l, r) => new UnitMismatchError(arithmeticVerbs[op], l, r).message);
        return { type, unit: left.unit };
      }
    }
  }

  private inferCall(callee: string, argExprs: StreamExpr[], location: Location | undefined, owner: StreamNode): Slot {
    const streams = [owner.id];
    const signature = this.functions.get(callee);
    if (!signature) throw new Error(`Call to unresolved function '${callee}' survived lowering`);
    const args = argExprs.map(arg => this.infer(arg, owner));

    if (args.length !== signature.params.length) {
      const expected = signature.params.length;
      this.diagnostics.error(
        'TypeMismatch',
        `Function '${callee}' takes ${expected} argument${expected === 1 ? '' : 's'} but ${args.length} ${args.length === 1 ? 'was' : 'were'} given`,
        location,
        { streams }
      );
      return this.errorSlot();
    }

    const generics = signature.generics.map(constraint => this.types.newVar(constraintTerm(constraint)));
    const typeOf = (param: SignatureType): VarId => (param.kind === 'generic' ? generics[param.index] : this.instantiate(param.type));

    let matched = true;
    args.forEach((arg, i) => {
      const param = signature.params[i];
      matched =
        this.unifyTypes(typeOf(param), arg.type, argExprs[i].location, streams, (expected, found) =>
          `Argument ${i + 1} of '${callee}' must be ${param.kind === 'generic' ? signature.generics[param.index] : expected}, found ${found}`
        ) && matched;
    });
    const type = matched ? typeOf(signature.returns) : this.types.newVar({ kind: 'error' });

    if (signature.units === 'dimensionless') {
      args.forEach((arg, i) =>
        this.requireUnit(arg.unit, 0, argExprs[i].location, streams, found =>
          `Argument ${i + 1} of '${callee}' must be dimensionless, found a ${describeExponent(found)} value`
        )
      );
      return { type, unit: this.units.newVar({ kind: 'exponent', exponent: 0 }) };
    }

    const unit = args.length > 0 ? args[0].unit : this.units.newVar({ kind: 'infer' });
    for (let i = 1; i < args.length; i++) {
      this.unifyUnits(unit, args[i].unit, argExprs[i].location, streams, (l, r) =>
        `Arguments of '${callee}' have different units: a ${describeExponent(l)} value and a ${describeExponent(r)} value`
      );
    }
    return { type, unit };
  }

  // Deferred constraints

  private solveDeferred(): void {
    for (;;) {
      this.runDeferred();
      const open = this.deferred.find(
        (constraint): constraint is Extract<Deferred, { kind: 'unit-product' }> =>
          constraint.kind === 'unit-product' &&
          (this.units.probe(constraint.left).kind === 'infer' || this.units.probe(constraint.right).kind === 'infer')
      );
      if (!open) break;
      // Nothing else will pin the operand down; treat it as a plain number.
      const operand = this.units.probe(open.left).kind === 'infer' ? open.left : open.right;
      this.units.unifyValue(operand, { kind: 'exponent', exponent: 0 });
    }

    for (const constraint of this.deferred) {
      if (constraint.kind !== 'projection') continue;
      this.diagnostics.error(
        'AmbiguousType',
        `Cannot infer the tuple type that field ${constraint.index} is projected from`,
        constraint.location,
        { streams: constraint.streams }
      );
      this.types.unifyValue(constraint.tuple, { kind: 'error' });
      this.types.unifyValue(constraint.result, { kind: 'error' });
    }
    this.deferred = [];
  }

  private runDeferred(): void {
    let progress = true;
    while (progress) {
      progress = false;
      const pending: Deferred[] = [];
      for (const constraint of this.deferred) {
        const solved = constraint.kind === 'unit-product' ? this.applyUnitProduct(constraint) : this.applyProjection(constraint);
        if (solved) progress = true;
        else pending.push(constraint);
      }
      this.deferred = pending;
    }
  }

  private applyUnitProduct(constraint: Extract<Deferred, { kind: 'unit-product' }>): boolean {
    const { op, streams, location } = constraint;
    const left = this.units.probe(constraint.left);
    const right = this.units.probe(constraint.right);
    const result = this.units.probe(constraint.result);

    if (left.kind === 'error' || right.kind === 'error') {
      this.units.unifyValue(constraint.result, { kind: 'error' });
      return true;
    }
    const assign = (id: VarId, exponent: TimeExponent): true => {
      this.requireUnit(id, exponent, location, streams, found =>
        `Result of '${op}' is a ${describeExponent(exponent)} value where a ${describeExponent(found)} value is required`
      );
      return true;
    };
    if (left.kind === 'exponent' && right.kind === 'exponent') {
      return assign(constraint.result, op === '*' ? left.exponent + right.exponent : left.exponent - right.exponent);
    }
    if (result.kind !== 'exponent') return false;
    if (left.kind === 'exponent') {
      return assign(constraint.right, op === '*' ? result.exponent - left.exponent : left.exponent - result.exponent);
    }
    if (right.kind === 'exponent') {
      return assign(constraint.left, op === '*' ? result.exponent - right.exponent : result.exponent + right.exponent);
    }
    return false;
  }

  private applyProjection(constraint: Extract<Deferred, { kind: 'projection' }>): boolean {
    const { index, streams, location } = constraint;
    const target = this.types.probe(constraint.tuple);
    switch (target.kind) {
      case 'infer':
      case 'constraint':
        return false;
      case 'error':
        this.types.unifyValue(constraint.result, { kind: 'error' });
        return true;
      case 'tuple':
        if (index >= target.elements.length) {
          this.diagnostics.error('TypeMismatch', `Tuple of ${target.elements.length} elements has no field ${index}`, location, { streams });
          this.types.unifyValue(constraint.result, { kind: 'error' });
          return true;
        }
        this.unifyTypes(target.elements[index], constraint.result, location, streams, (element, used) =>
          `Field ${index} has type ${element} but is used as ${used}`
        );
        return true;
      default:
        this.diagnostics.error('TypeMismatch', `Cannot project field ${index} out of ${this.renderTerm(target)}`, location, { streams });
        this.types.unifyValue(constraint.result, { kind: 'error' });
        return true;
    }
  }

  // Resolution

  private finalize(): TypeCheckResult {
    const streamTypes = new Map<StreamId, StreamType>();
    const exprTypes = new Map<ExprId, StreamType>();

    for (const node of this.graph.streams()) {
      const type = this.resolveSlot(this.slotOf(node.id), node.nameLocation ?? node.location, `stream '${node.name}'`, node.id);
      if (type) streamTypes.set(node.id, type);
      if (!node.expr) continue;
      forEachExpr(node.expr, expr => {
        const slot = this.exprSlots.get(expr.id);
        if (!slot) return;
        const exprType = this.resolveSlot(slot, expr.location, 'this expression', node.id);
        if (exprType) exprTypes.set(expr.id, exprType);
      });
    }
    return { streamTypes, exprTypes };
  }

  private resolveSlot(slot: Slot, location: Location | undefined, what: string, stream: StreamId): StreamType | null {
    const value = this.resolveValue(slot.type, location, what, stream, new Set());
    const unit = this.resolveUnit(slot.unit);
    return value ? { value, unit } : null;
  }

  private resolveUnit(id: VarId): TimeExponent {
    const term = this.units.probe(id);
    if (term.kind === 'exponent') return term.exponent;
    if (term.kind === 'infer') this.units.unifyValue(id, { kind: 'exponent', exponent: 0 });
    return 0;
  }

  private resolveValue(
    id: VarId,
    location: Location | undefined,
    what: string,
    stream: StreamId,
    visiting: Set<VarId>
  ): ValueType | null {
    const root = this.types.find(id);
    if (this.cyclic.has(root)) return null;
    if (visiting.has(root)) {
      this.diagnostics.error('TypeMismatch', `Type of ${what} would have to contain itself`, location, { streams: [stream] });
      this.cyclic.add(root);
      return null;
    }
    const term = this.types.probe(root);
    switch (term.kind) {
      case 'error':
        return null;
      case 'infer':
      case 'constraint': {
        const fallback = term.kind === 'constraint' ? defaultFor(term.families) : null;
        if (fallback) {
          this.types.unifyValue(root, fallback);
          return fallback;
        }
        const hint = term.kind === 'constraint' ? ` beyond '${term.label}'` : '';
        this.diagnostics.error('AmbiguousType', `Cannot infer the type of ${what}${hint}; add a type annotation`, location, {
          streams: [stream],
        });
        this.types.unifyValue(root, { kind: 'error' });
        return null;
      }
      case 'tuple': {
        visiting.add(root);
        const elements: ValueType[] = [];
        for (const element of term.elements) {
          const resolved = this.resolveValue(element, location, what, stream, visiting);
          if (!resolved) {
            visiting.delete(root);
            return null;
          }
          elements.push(resolved);
        }
        visiting.delete(root);
        return { kind: 'tuple', elements };
      }
      case 'option': {
        visiting.add(root);
        const inner = this.resolveValue(term.inner, location, what, stream, visiting);
        visiting.delete(root);
        return inner ? { kind: 'option', inner } : null;
      }
      default:
        return term;
    }
  }
}
