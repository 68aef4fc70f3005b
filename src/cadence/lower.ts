import { defaultLocation, type Location } from '../utils/index.js';
import { allOf, anyOf, streamActivation, type Activation } from './activation.js';
import type {
  CadenceActivationExpr,
  CadenceDeclaration,
  CadenceExpr,
  CadenceIdentifier,
  CadenceNumberLiteral,
  CadencePacingExpr,
  CadenceSpec,
  CadenceTypeExpr,
} from './ast.js';
import type { AnalysisConfig } from './config.js';
import type { DiagnosticCollector } from './diagnostics.js';
import { StreamGraph, type PacingAnnotation, type StreamNode } from './graph.js';
import type { ExprId, Offset, StreamExpr, StreamId } from './ir.js';
import { functionScope, knownModules, moduleProviding, type FunctionSignature } from './stdlib.js';
import { isNumericType, lookupScalarType, type StreamType, type ValueType } from './types.js';
import { Quantity, UnknownUnitError, describeExponent } from './units.js';

export interface LoweredSpec {
  graph: StreamGraph;
  functions: Map<string, FunctionSignature>;
}

interface LowerContext {
  graph: StreamGraph;
  diagnostics: DiagnosticCollector;
  functions: Map<string, FunctionSignature>;
  nextExprId: number;
}

/**
 * Resolves every name of the specification and builds the stream graph.
 * Problems are reported and lowered to placeholders; the graph that comes
 * back is always structurally sound.
 */
export function lowerSpec(spec: CadenceSpec, diagnostics: DiagnosticCollector, config: AnalysisConfig): LoweredSpec {
  const graph = new StreamGraph();
  const imports = new Set<string>();
  for (const imp of spec.imports) {
    if (!knownModules.has(imp.module)) {
      diagnostics.error('UnknownModule', `Unknown module '${imp.module}'`, imp.location);
      continue;
    }
    imports.add(imp.module);
  }
  const ctx: LowerContext = { graph, diagnostics, functions: functionScope(imports), nextExprId: 0 };

  const declared = declareStreams(spec.declarations, ctx);
  for (const [decl, node] of declared) {
    lowerDeclarationTypes(decl, node, ctx);
  }
  const activationReaders = new Set<StreamId>();
  for (const [decl, node] of declared) {
    node.pacingAnnotation = decl.pacing ? lowerPacing(decl.pacing, node, ctx, activationReaders) : null;
  }
  for (const [decl, node] of declared) {
    if (decl.type === 'OutputDecl') {
      node.expr = lowerExpr(decl.expr, node, ctx);
    } else if (decl.type === 'TriggerDecl') {
      node.expr = lowerExpr(decl.condition, node, ctx);
      node.message = decl.message;
    }
  }
  graph.seal();

  if (config.warnUnusedInputs) {
    for (const node of graph.streams()) {
      if (node.kind !== 'input') continue;
      if (graph.readersOf(node.id).length > 0 || activationReaders.has(node.id)) continue;
      diagnostics.warning('UnusedStream', `Input stream '${node.name}' is never used`, node.nameLocation ?? node.location, {
        streams: [node.id],
      });
    }
  }

  return { graph, functions: ctx.functions };
}

function declareStreams(declarations: CadenceDeclaration[], ctx: LowerContext): Array<[CadenceDeclaration, StreamNode]> {
  const result: Array<[CadenceDeclaration, StreamNode]> = [];
  let triggerCount = 0;
  for (const decl of declarations) {
    const kind = decl.type === 'InputDecl' ? 'input' : decl.type === 'OutputDecl' ? 'output' : 'trigger';
    const anonymous = decl.type === 'TriggerDecl' && decl.name === null;
    const name = decl.name ?? `trigger#${triggerCount}`;
    if (kind === 'trigger') triggerCount++;

    const previous = anonymous ? undefined : ctx.graph.lookup(name);
    if (previous) {
      ctx.diagnostics.error('DuplicateDeclaration', `Stream '${name}' is declared more than once`, decl.nameLocation ?? decl.location, {
        streams: [previous.id],
        related: [{ location: previous.nameLocation ?? previous.location ?? defaultLocation, message: `'${name}' is first declared here` }],
      });
    }
    const node = ctx.graph.addStream({ name, kind, location: decl.location, nameLocation: decl.nameLocation });
    result.push([decl, node]);
  }
  return result;
}

function lowerDeclarationTypes(decl: CadenceDeclaration, node: StreamNode, ctx: LowerContext): void {
  if (decl.type === 'TriggerDecl') {
    node.declaredType = { value: { kind: 'bool' }, unit: 0 };
    node.declaredTypeLocation = decl.condition.location;
    return;
  }
  if (decl.valueType) {
    node.declaredType = resolveTypeExpr(decl.valueType, ctx);
    node.declaredTypeLocation = decl.valueType.location;
  }
}

/** Resolves a type annotation; `null` when it names something unknown. */
export function resolveTypeExpr(expr: CadenceTypeExpr, ctx: Pick<LowerContext, 'diagnostics'>): StreamType | null {
  const value = resolveValueType(expr, ctx);
  if (!value) return null;
  if (expr.type !== 'NamedType' || !expr.unit) return { value, unit: 0 };

  let unit: number;
  try {
    unit = Quantity.parse('1', expr.unit).exponent;
  } catch (error: unknown) {
    if (!(error instanceof UnknownUnitError)) throw error;
    ctx.diagnostics.error('UnitMismatch', error.message, expr.location);
    return { value, unit: 0 };
  }
  if (!isNumericType(value)) {
    ctx.diagnostics.error('UnitMismatch', `Only numeric types carry a unit, but '${expr.name}' was given [${expr.unit}]`, expr.location);
    return { value, unit: 0 };
  }
  return { value, unit };
}

function resolveValueType(expr: CadenceTypeExpr, ctx: Pick<LowerContext, 'diagnostics'>): ValueType | null {
  switch (expr.type) {
    case 'NamedType': {
      const scalar = lookupScalarType(expr.name);
      if (!scalar) {
        ctx.diagnostics.error('UnknownType', `Unknown type '${expr.name}'`, expr.location);
        return null;
      }
      return scalar;
    }
    case 'TupleType': {
      const elements = expr.elements.map(element => resolveValueType(element, ctx));
      const resolved = elements.filter((element): element is ValueType => element !== null);
      return resolved.length === elements.length ? { kind: 'tuple', elements: resolved } : null;
    }
    case 'OptionType': {
      const inner = resolveValueType(expr.inner, ctx);
      return inner ? { kind: 'option', inner } : null;
    }
  }
}

function lowerPacing(
  pacing: CadencePacingExpr,
  node: StreamNode,
  ctx: LowerContext,
  activationReaders: Set<StreamId>
): PacingAnnotation | null {
  if (pacing.type === 'FrequencyPacing') {
    let quantity: Quantity;
    try {
      quantity = Quantity.parse(pacing.value.raw, pacing.value.unit);
    } catch (error: unknown) {
      if (!(error instanceof UnknownUnitError)) throw error;
      ctx.diagnostics.error('UnitMismatch', error.message, pacing.location, { streams: [node.id] });
      return null;
    }
    if (!quantity.isFrequency() && !quantity.isDuration()) {
      ctx.diagnostics.error(
        'UnitMismatch',
        `Pacing of '${node.name}' needs a frequency or a period, found a ${describeExponent(quantity.exponent)} value`,
        pacing.location,
        { streams: [node.id] }
      );
      return null;
    }
    if (!quantity.value.isPositive()) {
      ctx.diagnostics.error('InconsistentPacing', `Pacing of '${node.name}' must be positive`, pacing.location, {
        streams: [node.id],
      });
      return null;
    }
    return { kind: 'periodic', frequency: quantity.toFrequency(), location: pacing.location };
  }

  if (node.kind === 'input') {
    ctx.diagnostics.error(
      'InconsistentPacing',
      `Input stream '${node.name}' can only be annotated with a frequency; inputs are otherwise event-driven by arrival`,
      pacing.location,
      { streams: [node.id] }
    );
    return null;
  }
  const activation = lowerActivation(pacing.condition, ctx, activationReaders);
  return activation ? { kind: 'event', activation, location: pacing.location } : null;
}

function lowerActivation(
  expr: CadenceActivationExpr,
  ctx: LowerContext,
  activationReaders: Set<StreamId>
): Activation | null {
  switch (expr.type) {
    case 'ActivationStream': {
      const target = ctx.graph.lookup(expr.name);
      if (!target) {
        ctx.diagnostics.error('UndeclaredStream', `Undeclared stream '${expr.name}'`, expr.location);
        return null;
      }
      activationReaders.add(target.id);
      return streamActivation(target.id);
    }
    case 'ActivationAll':
    case 'ActivationAny': {
      const operands = expr.operands.map(operand => lowerActivation(operand, ctx, activationReaders));
      const resolved = operands.filter((operand): operand is Activation => operand !== null);
      if (resolved.length !== operands.length) return null;
      return expr.type === 'ActivationAll' ? allOf(...resolved) : anyOf(...resolved);
    }
  }
}

function nextId(ctx: LowerContext): ExprId {
  return ctx.nextExprId++;
}

function errorExpr(ctx: LowerContext, location?: Location): StreamExpr {
  return { kind: 'Error', id: nextId(ctx), location };
}

function lowerExpr(expr: CadenceExpr, owner: StreamNode, ctx: LowerContext): StreamExpr {
  switch (expr.type) {
    case 'Number': {
      let quantity: Quantity;
      try {
        quantity = Quantity.parse(expr.raw, expr.unit);
      } catch (error: unknown) {
        if (!(error instanceof UnknownUnitError)) throw error;
        ctx.diagnostics.error('UnitMismatch', error.message, expr.location, { streams: [owner.id] });
        return errorExpr(ctx, expr.location);
      }
      return {
        kind: 'Literal',
        id: nextId(ctx),
        value: { kind: 'number', value: quantity.value, isFloat: expr.isFloat, unit: quantity.exponent },
        location: expr.location,
      };
    }
    case 'String':
      return { kind: 'Literal', id: nextId(ctx), value: { kind: 'string', value: expr.value }, location: expr.location };
    case 'Boolean':
      return { kind: 'Literal', id: nextId(ctx), value: { kind: 'bool', value: expr.value }, location: expr.location };
    case 'Identifier':
      return lookupStream(expr, { kind: 'current' }, owner, ctx, expr.location);
    case 'OffsetAccess': {
      const offset = lowerDiscreteOffset(expr.offset, expr.negative, owner, ctx);
      if (!offset) {
        resolveName(expr.stream, ctx);
        return errorExpr(ctx, expr.location);
      }
      return lookupStream(expr.stream, offset, owner, ctx, expr.location);
    }
    case 'HoldAccess':
      return lookupStream(expr.stream, { kind: 'hold' }, owner, ctx, expr.location);
    case 'WindowAccess': {
      const duration = lowerWindowDuration(expr.duration, owner, ctx);
      if (!duration) {
        resolveName(expr.stream, ctx);
        return errorExpr(ctx, expr.location);
      }
      return lookupStream(expr.stream, { kind: 'window', duration, op: expr.op }, owner, ctx, expr.location);
    }
    case 'Unary':
      return { kind: 'Unary', id: nextId(ctx), op: expr.op, operand: lowerExpr(expr.operand, owner, ctx), location: expr.location };
    case 'Binary':
      return {
        kind: 'Binary',
        id: nextId(ctx),
        op: expr.op,
        left: lowerExpr(expr.left, owner, ctx),
        right: lowerExpr(expr.right, owner, ctx),
        location: expr.location,
      };
    case 'If':
      return {
        kind: 'Ite',
        id: nextId(ctx),
        condition: lowerExpr(expr.condition, owner, ctx),
        consequence: lowerExpr(expr.thenExpr, owner, ctx),
        alternative: lowerExpr(expr.elseExpr, owner, ctx),
        location: expr.location,
      };
    case 'Tuple':
      return {
        kind: 'Tuple',
        id: nextId(ctx),
        elements: expr.elements.map(element => lowerExpr(element, owner, ctx)),
        location: expr.location,
      };
    case 'Projection':
      return { kind: 'Projection', id: nextId(ctx), target: lowerExpr(expr.target, owner, ctx), index: expr.index, location: expr.location };
    case 'Default':
      return {
        kind: 'Default',
        id: nextId(ctx),
        expr: lowerExpr(expr.expr, owner, ctx),
        fallback: lowerExpr(expr.fallback, owner, ctx),
        location: expr.location,
      };
    case 'Call': {
      const args = expr.args.map(arg => lowerExpr(arg, owner, ctx));
      if (!ctx.functions.has(expr.callee)) {
        const module = moduleProviding(expr.callee);
        const hint = module ? `; add 'import ${module}'` : '';
        ctx.diagnostics.error('UndeclaredFunction', `Unknown function '${expr.callee}'${hint}`, expr.location, {
          streams: [owner.id],
        });
        return errorExpr(ctx, expr.location);
      }
      return { kind: 'Call', id: nextId(ctx), callee: expr.callee, args, location: expr.location };
    }
  }
}

function resolveName(ident: CadenceIdentifier, ctx: LowerContext): StreamNode | undefined {
  const target = ctx.graph.lookup(ident.name);
  if (!target) {
    ctx.diagnostics.error('UndeclaredStream', `Undeclared stream '${ident.name}'`, ident.location);
  }
  return target;
}

function lookupStream(
  ident: CadenceIdentifier,
  offset: Offset,
  owner: StreamNode,
  ctx: LowerContext,
  location?: Location
): StreamExpr {
  const target = resolveName(ident, ctx);
  if (!target) return errorExpr(ctx, location);
  const reference = ctx.graph.addReference(target.id, owner.id, offset, location);
  return { kind: 'StreamLookup', id: nextId(ctx), stream: target.id, reference: reference.id, offset, location };
}

function lowerDiscreteOffset(
  literal: CadenceNumberLiteral,
  negative: boolean,
  owner: StreamNode,
  ctx: LowerContext
): Offset | null {
  let quantity: Quantity;
  try {
    quantity = Quantity.parse(literal.raw, literal.unit);
  } catch (error: unknown) {
    if (!(error instanceof UnknownUnitError)) throw error;
    ctx.diagnostics.error('UnitMismatch', error.message, literal.location, { streams: [owner.id] });
    return null;
  }
  if (!quantity.isDimensionless()) {
    ctx.diagnostics.error('UnitMismatch', `Offset must be a plain number of steps, found a ${describeExponent(quantity.exponent)} value`, literal.location, {
      streams: [owner.id],
    });
    return null;
  }
  if (!quantity.value.isInteger()) {
    ctx.diagnostics.error('TypeMismatch', `Offset must be a whole number of steps, found ${literal.raw}`, literal.location, {
      streams: [owner.id],
    });
    return null;
  }
  const steps = Number(quantity.value.num);
  if (steps === 0) return { kind: 'current' };
  return negative ? { kind: 'lookback', steps } : { kind: 'lookahead', steps };
}

function lowerWindowDuration(literal: CadenceNumberLiteral, owner: StreamNode, ctx: LowerContext): Quantity | null {
  let quantity: Quantity;
  try {
    quantity = Quantity.parse(literal.raw, literal.unit);
  } catch (error: unknown) {
    if (!(error instanceof UnknownUnitError)) throw error;
    ctx.diagnostics.error('UnitMismatch', error.message, literal.location, { streams: [owner.id] });
    return null;
  }
  if (!quantity.isDuration()) {
    ctx.diagnostics.error('UnitMismatch', `Window length must be a duration, found a ${describeExponent(quantity.exponent)} value`, literal.location, {
      streams: [owner.id],
    });
    return null;
  }
  if (!quantity.value.isPositive()) {
    ctx.diagnostics.error('InvalidWindow', 'Window duration must be positive', literal.location, { streams: [owner.id] });
    return null;
  }
  return quantity;
}
