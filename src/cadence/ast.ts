import type { Location } from '../utils/index.js';

export interface CadenceNode {
  location?: Location;
}

export interface CadenceSpec extends CadenceNode {
  type: 'Spec';
  imports: CadenceImport[];
  declarations: CadenceDeclaration[];
}

export interface CadenceImport extends CadenceNode {
  type: 'Import';
  module: string;
}

export type CadenceDeclaration = CadenceInputDecl | CadenceOutputDecl | CadenceTriggerDecl;

export interface CadenceInputDecl extends CadenceNode {
  type: 'InputDecl';
  name: string;
  nameLocation?: Location;
  valueType: CadenceTypeExpr;
  pacing: CadencePacingExpr | null;
}

export interface CadenceOutputDecl extends CadenceNode {
  type: 'OutputDecl';
  name: string;
  nameLocation?: Location;
  valueType: CadenceTypeExpr | null;
  pacing: CadencePacingExpr | null;
  expr: CadenceExpr;
}

export interface CadenceTriggerDecl extends CadenceNode {
  type: 'TriggerDecl';
  name: string | null;
  nameLocation?: Location;
  pacing: CadencePacingExpr | null;
  condition: CadenceExpr;
  message: string | null;
}

// Types

export interface CadenceNamedType extends CadenceNode {
  type: 'NamedType';
  name: string;
  /** Unit symbol in brackets, e.g. `Float64[ms]`. */
  unit: string | null;
}

export interface CadenceTupleType extends CadenceNode {
  type: 'TupleType';
  elements: CadenceTypeExpr[];
}

export interface CadenceOptionType extends CadenceNode {
  type: 'OptionType';
  inner: CadenceTypeExpr;
}

export type CadenceTypeExpr = CadenceNamedType | CadenceTupleType | CadenceOptionType;

// Pacing annotations

export interface CadenceQuantityLiteral extends CadenceNode {
  raw: string;
  unit: string | null;
}

export interface CadenceFrequencyPacing extends CadenceNode {
  type: 'FrequencyPacing';
  value: CadenceQuantityLiteral;
}

export interface CadenceActivationPacing extends CadenceNode {
  type: 'ActivationPacing';
  condition: CadenceActivationExpr;
}

export type CadencePacingExpr = CadenceFrequencyPacing | CadenceActivationPacing;

export interface CadenceActivationStream extends CadenceNode {
  type: 'ActivationStream';
  name: string;
}

export interface CadenceActivationAll extends CadenceNode {
  type: 'ActivationAll';
  operands: CadenceActivationExpr[];
}

export interface CadenceActivationAny extends CadenceNode {
  type: 'ActivationAny';
  operands: CadenceActivationExpr[];
}

export type CadenceActivationExpr = CadenceActivationStream | CadenceActivationAll | CadenceActivationAny;

// Expressions

export type CadenceUnaryOp = '!' | '-';

export type CadenceBinaryOp =
  | '+'
  | '-'
  | '*'
  | '/'
  | '%'
  | '**'
  | '&&'
  | '||'
  | '=='
  | '!='
  | '<'
  | '<='
  | '>'
  | '>=';

export type CadenceWindowOp = 'sum' | 'product' | 'count' | 'avg' | 'min' | 'max' | 'integral';

export interface CadenceNumberLiteral extends CadenceNode {
  type: 'Number';
  raw: string;
  isFloat: boolean;
  unit: string | null;
}

export interface CadenceStringLiteral extends CadenceNode {
  type: 'String';
  value: string;
}

export interface CadenceBooleanLiteral extends CadenceNode {
  type: 'Boolean';
  value: boolean;
}

export interface CadenceIdentifier extends CadenceNode {
  type: 'Identifier';
  name: string;
}

export interface CadenceUnary extends CadenceNode {
  type: 'Unary';
  op: CadenceUnaryOp;
  operand: CadenceExpr;
}

export interface CadenceBinary extends CadenceNode {
  type: 'Binary';
  op: CadenceBinaryOp;
  left: CadenceExpr;
  right: CadenceExpr;
}

export interface CadenceIf extends CadenceNode {
  type: 'If';
  condition: CadenceExpr;
  thenExpr: CadenceExpr;
  elseExpr: CadenceExpr;
}

export interface CadenceTuple extends CadenceNode {
  type: 'Tuple';
  elements: CadenceExpr[];
}

export interface CadenceProjection extends CadenceNode {
  type: 'Projection';
  target: CadenceExpr;
  index: number;
}

export interface CadenceCall extends CadenceNode {
  type: 'Call';
  callee: string;
  args: CadenceExpr[];
}

/** `x.offset(by: n)`; a negative `n` looks into the past. */
export interface CadenceOffsetAccess extends CadenceNode {
  type: 'OffsetAccess';
  stream: CadenceIdentifier;
  offset: CadenceNumberLiteral;
  negative: boolean;
}

/** `x.hold()`: last known value, whether or not `x` fired in this cycle. */
export interface CadenceHoldAccess extends CadenceNode {
  type: 'HoldAccess';
  stream: CadenceIdentifier;
}

/** `x.aggregate(over: 5s, using: avg)` */
export interface CadenceWindowAccess extends CadenceNode {
  type: 'WindowAccess';
  stream: CadenceIdentifier;
  duration: CadenceNumberLiteral;
  op: CadenceWindowOp;
}

/** `e.defaults(to: d)` */
export interface CadenceDefault extends CadenceNode {
  type: 'Default';
  expr: CadenceExpr;
  fallback: CadenceExpr;
}

export type CadenceExpr =
  | CadenceNumberLiteral
  | CadenceStringLiteral
  | CadenceBooleanLiteral
  | CadenceIdentifier
  | CadenceUnary
  | CadenceBinary
  | CadenceIf
  | CadenceTuple
  | CadenceProjection
  | CadenceCall
  | CadenceOffsetAccess
  | CadenceHoldAccess
  | CadenceWindowAccess
  | CadenceDefault;

export function isCadenceSpec(value: unknown): value is CadenceSpec {
  return (
    typeof value === 'object' &&
    value !== null &&
    'type' in value &&
    value.type === 'Spec' &&
    'declarations' in value &&
    Array.isArray(value.declarations)
  );
}
