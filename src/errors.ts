/**
 * Error taxonomy for formula-gate
 *
 * Fatal errors only. Rule violations found in a well-formed expression are
 * reported as Violations, never thrown.
 */

import { SourcePosition } from './types';

export const ErrorCode = {
  EXPRESSION_SYNTAX: 'EXPRESSION_SYNTAX',
  UNSUPPORTED_CONSTRUCT: 'UNSUPPORTED_CONSTRUCT',
  SCHEMA_INVALID: 'SCHEMA_INVALID'
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

export abstract class FormulaGateError extends Error {
  abstract readonly code: ErrorCode;
}

/**
 * The expression text could not be parsed
 */
export class ExpressionSyntaxError extends FormulaGateError {
  readonly code = ErrorCode.EXPRESSION_SYNTAX;
  readonly line: number;
  readonly column: number;

  constructor(message: string, position: SourcePosition) {
    super(`Syntax error at line ${position.line}, column ${position.column}: ${message}`);
    this.name = 'ExpressionSyntaxError';
    this.line = position.line;
    this.column = position.column;
  }
}

/**
 * The expression parsed, but uses a construct outside the supported grammar
 */
export class UnsupportedConstructError extends FormulaGateError {
  readonly code = ErrorCode.UNSUPPORTED_CONSTRUCT;
  readonly construct: string;
  readonly fragment: string;
  readonly line: number;
  readonly column: number;

  constructor(construct: string, fragment: string, position: SourcePosition) {
    super(`Unsupported construct at line ${position.line}, column ${position.column}: ${construct} in '${fragment}'`);
    this.name = 'UnsupportedConstructError';
    this.construct = construct;
    this.fragment = fragment;
    this.line = position.line;
    this.column = position.column;
  }
}

export interface SchemaIssue {
  path: string;
  message: string;
}

/**
 * The operator or datafield table is malformed
 */
export class SchemaError extends FormulaGateError {
  readonly code = ErrorCode.SCHEMA_INVALID;
  readonly issues: SchemaIssue[];

  constructor(issues: SchemaIssue[]) {
    const summary = issues
      .map((issue) => `  - ${issue.path}: ${issue.message}`)
      .join('\n');
    super(`Invalid rule schema:\n${summary}`);
    this.name = 'SchemaError';
    this.issues = issues;
  }
}
