/**
 * Core type definitions for formula-gate
 */

// ============================================================================
// Expression Tree Types
// ============================================================================

export interface SourcePosition {
  line: number;    // 1-indexed
  column: number;  // 1-indexed
}

export type ArithmeticOperator = '+' | '-' | '*' | '/';
export type ComparisonOperator = '>' | '<' | '>=' | '<=' | '==' | '!=';
export type LogicalOperator = '&&' | '||';
export type UnaryOperator = '-' | '+' | '!';

export type LiteralType = 'bool' | 'int' | 'float' | 'str';
export type LiteralValue = boolean | number | string;

export interface NameNode {
  kind: 'name';
  id: string;
  position: SourcePosition;
}

export interface LiteralNode {
  kind: 'literal';
  literalType: LiteralType;
  value: LiteralValue;
  /** Source text of the literal, sign included when folded */
  raw: string;
  position: SourcePosition;
}

export interface KeywordArgument {
  name: string;
  value: ExprNode;
  position: SourcePosition;
}

export interface CallNode {
  kind: 'call';
  callee: string;
  args: ExprNode[];
  /** In source order; repeats are kept here and collapsed on the CallSite */
  keywords: KeywordArgument[];
  position: SourcePosition;
}

export interface BinaryNode {
  kind: 'binary';
  operator: ArithmeticOperator;
  left: ExprNode;
  right: ExprNode;
  position: SourcePosition;
}

export interface CompareNode {
  kind: 'compare';
  operator: ComparisonOperator;
  left: ExprNode;
  right: ExprNode;
  position: SourcePosition;
}

/**
 * `a && b && c` is one node with three operands.
 */
export interface LogicalNode {
  kind: 'logical';
  operator: LogicalOperator;
  operands: ExprNode[];
  position: SourcePosition;
}

export interface UnaryNode {
  kind: 'unary';
  operator: UnaryOperator;
  operand: ExprNode;
  position: SourcePosition;
}

export type ExprNode =
  | NameNode
  | LiteralNode
  | CallNode
  | BinaryNode
  | CompareNode
  | LogicalNode
  | UnaryNode;

export interface AssignStatement {
  kind: 'assign';
  /** `a = b = expr` has targets ['a', 'b'] */
  targets: string[];
  /** Set for augmented assignment (`x += 1` has operator '+') */
  operator?: ArithmeticOperator;
  value: ExprNode;
  position: SourcePosition;
}

export interface ExpressionStatement {
  kind: 'expr';
  value: ExprNode;
  position: SourcePosition;
}

export type Statement = AssignStatement | ExpressionStatement;

// ============================================================================
// Extraction Types
// ============================================================================

export type OperatorKind = 'call' | 'arithmetic' | 'comparison' | 'logical' | 'unary';

/** One occurrence of an operator token */
export interface OperatorUse {
  operator: string;
  kind: OperatorKind;
  /** Positional args for calls, operands for everything else */
  operandCount: number;
  /** Set for call occurrences */
  callIndex?: number;
  position: SourcePosition;
}

export interface CallSite {
  index: number;
  operator: string;
  args: ExprNode[];
  /** Last occurrence wins when a keyword is repeated */
  keywords: ReadonlyMap<string, ExprNode>;
  duplicateKeywords: string[];
  position: SourcePosition;
}

/** One occurrence of a free variable */
export interface DatafieldRef {
  name: string;
  /** Index of the nearest enclosing call, null when used outside any call */
  enclosingCall: number | null;
  position: SourcePosition;
}

export interface Extraction {
  /** Unique, in order of first appearance */
  operators: string[];
  /** Unique, in order of first appearance */
  datafields: string[];
  callSites: CallSite[];
  operatorUses: OperatorUse[];
  datafieldRefs: DatafieldRef[];
}

// ============================================================================
// Rule Schema Types
// ============================================================================

export type KwargType = 'bool' | 'int' | 'float' | 'str' | 'number' | 'any';

export interface KwargRule {
  type: KwargType;
  allowed?: readonly LiteralValue[];
  minVal?: number;
  maxVal?: number;
  minInclusive: boolean;
  maxInclusive: boolean;
}

export interface OperatorRule {
  name: string;
  minArgs: number;
  /** -1 means unbounded */
  maxArgs: number;
  /** Positional indexes (0-based) that take only int literals */
  intArgs: readonly number[];
  kwargs: ReadonlyMap<string, KwargRule>;
}

export enum DatafieldKind {
  MATRIX = 'MATRIX',
  VECTOR = 'VECTOR',
  GROUP = 'GROUP'
}

export interface DatafieldDecl {
  id: string;
  kind: DatafieldKind;
}

// ============================================================================
// Validation Types
// ============================================================================

export enum ViolationCategory {
  UNKNOWN_OPERATOR = 'unknown_operator',
  UNKNOWN_DATAFIELD = 'unknown_datafield',
  ARITY = 'arity',
  ARG_TYPE = 'arg_type',
  UNKNOWN_KWARG = 'unknown_kwarg',
  DUPLICATE_KWARG = 'duplicate_kwarg',
  KWARG_TYPE = 'kwarg_type',
  KWARG_RANGE = 'kwarg_range',
  KWARG_ALLOWED = 'kwarg_allowed',
  VECTOR_SCOPE = 'vector_scope'
}

/** Report order of the categories */
export const VIOLATION_ORDER: readonly ViolationCategory[] = [
  ViolationCategory.UNKNOWN_OPERATOR,
  ViolationCategory.UNKNOWN_DATAFIELD,
  ViolationCategory.ARITY,
  ViolationCategory.ARG_TYPE,
  ViolationCategory.UNKNOWN_KWARG,
  ViolationCategory.DUPLICATE_KWARG,
  ViolationCategory.KWARG_TYPE,
  ViolationCategory.KWARG_RANGE,
  ViolationCategory.KWARG_ALLOWED,
  ViolationCategory.VECTOR_SCOPE
];

export type ViolationDetail =
  | { category: ViolationCategory.UNKNOWN_OPERATOR }
  | { category: ViolationCategory.UNKNOWN_DATAFIELD }
  | { category: ViolationCategory.ARITY; observed: number; minArgs: number; maxArgs: number }
  | { category: ViolationCategory.ARG_TYPE; argIndex: number; actual: LiteralType }
  | { category: ViolationCategory.UNKNOWN_KWARG; allowedKeywords: string[] }
  | { category: ViolationCategory.DUPLICATE_KWARG }
  | { category: ViolationCategory.KWARG_TYPE; expected: KwargType; actual: LiteralType | 'expression' }
  | {
      category: ViolationCategory.KWARG_RANGE;
      value: number;
      minVal?: number;
      maxVal?: number;
      minInclusive: boolean;
      maxInclusive: boolean;
    }
  | { category: ViolationCategory.KWARG_ALLOWED; value: LiteralValue; allowed: LiteralValue[] }
  | { category: ViolationCategory.VECTOR_SCOPE; enclosingOperator: string | null; vectorPrefix: string };

export interface Violation {
  category: ViolationCategory;
  /** Operator name or datafield name */
  subject: string;
  callIndex?: number;
  keyword?: string;
  position: SourcePosition;
  detail: ViolationDetail;
}

export interface ValidationReport {
  valid: boolean;
  violations: Violation[];
}

export interface ValidationOutcome {
  expression: string;
  extraction: Extraction;
  report: ValidationReport;
}

export interface RuleEngineOptions {
  /** Operator name prefix marking vector-aware functions (default: 'vec_') */
  vectorPrefix?: string;
}

// ============================================================================
// CLI Types
// ============================================================================

export type CLICommand = 'check' | 'extract' | 'schema';

export interface CLIOptions {
  command: CLICommand;
  expression?: string;
  operatorsPath?: string;   // Override operator table location
  datafieldsPath?: string;  // Override datafield table location
  schemaDir?: string;       // Directory holding both tables
  vectorPrefix?: string;    // Override the vector-aware operator prefix
  json: boolean;            // Machine-readable output
  color: boolean;
}

// ============================================================================
// Configuration Types
// ============================================================================

export interface FormulaGateConfig {
  schema: {
    operatorsPath: string;
    datafieldsPath: string;
  };
  engine: Required<RuleEngineOptions>;
  output: {
    json: boolean;
    color: boolean;
  };
}
