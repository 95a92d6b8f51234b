/**
 * Expression Parser - Turns formula text into a closed statement/node tree
 *
 * Lexing and grammar are delegated to the TypeScript compiler's parser. This
 * module only interprets the resulting tree: every supported node kind maps to
 * one ExprNode variant and anything else is rejected with
 * UnsupportedConstructError.
 */

import * as ts from 'typescript';
import {
  Statement,
  ExprNode,
  KeywordArgument,
  SourcePosition,
  ArithmeticOperator,
  ComparisonOperator,
  LogicalOperator,
  UnaryOperator,
  LiteralNode
} from './types';
import { ExpressionSyntaxError, UnsupportedConstructError } from './errors';

// Parsed as a script so the grammar carries no type syntax
const FILE_NAME = 'expression.js';

/** Everything after this marker is a trailing comment */
export const COMMENT_MARKER = '-->';

const ARITHMETIC_TOKENS = new Map<ts.SyntaxKind, ArithmeticOperator>([
  [ts.SyntaxKind.PlusToken, '+'],
  [ts.SyntaxKind.MinusToken, '-'],
  [ts.SyntaxKind.AsteriskToken, '*'],
  [ts.SyntaxKind.SlashToken, '/']
]);

const AUGMENTED_TOKENS = new Map<ts.SyntaxKind, ArithmeticOperator>([
  [ts.SyntaxKind.PlusEqualsToken, '+'],
  [ts.SyntaxKind.MinusEqualsToken, '-'],
  [ts.SyntaxKind.AsteriskEqualsToken, '*'],
  [ts.SyntaxKind.SlashEqualsToken, '/']
]);

const COMPARISON_TOKENS = new Map<ts.SyntaxKind, ComparisonOperator>([
  [ts.SyntaxKind.GreaterThanToken, '>'],
  [ts.SyntaxKind.LessThanToken, '<'],
  [ts.SyntaxKind.GreaterThanEqualsToken, '>='],
  [ts.SyntaxKind.LessThanEqualsToken, '<='],
  [ts.SyntaxKind.EqualsEqualsToken, '=='],
  [ts.SyntaxKind.ExclamationEqualsToken, '!=']
]);

const LOGICAL_TOKENS = new Map<ts.SyntaxKind, LogicalOperator>([
  [ts.SyntaxKind.AmpersandAmpersandToken, '&&'],
  [ts.SyntaxKind.BarBarToken, '||']
]);

const UNARY_TOKENS = new Map<ts.SyntaxKind, UnaryOperator>([
  [ts.SyntaxKind.MinusToken, '-'],
  [ts.SyntaxKind.PlusToken, '+'],
  [ts.SyntaxKind.ExclamationToken, '!']
]);

export class ExpressionParser {
  /**
   * Parse expression text into top-level statements
   * @throws ExpressionSyntaxError when the text is not well-formed
   * @throws UnsupportedConstructError when a construct outside the grammar is used
   */
  parse(expression: string): Statement[] {
    const source = terminateLines(stripComment(expression));
    if (source.trim() === '') {
      return [];
    }

    const sourceFile = ts.createSourceFile(FILE_NAME, source, ts.ScriptTarget.ES2020, true, ts.ScriptKind.JS);
    checkSyntax(source, sourceFile);

    const converter = new TreeConverter(sourceFile);
    const statements: Statement[] = [];

    for (const statement of sourceFile.statements) {
      // Stray separators (`a = 1;;`) parse as empty statements
      if (ts.isEmptyStatement(statement)) {
        continue;
      }
      if (!ts.isExpressionStatement(statement)) {
        throw converter.unsupported(describeNode(statement), statement);
      }
      statements.push(converter.convertStatement(statement.expression));
    }

    return statements;
  }
}

/**
 * Drop the trailing comment, if any
 */
export function stripComment(expression: string): string {
  const markerIndex = expression.indexOf(COMMENT_MARKER);
  return markerIndex === -1 ? expression : expression.slice(0, markerIndex);
}

const OPENING_TOKENS = new Set<ts.SyntaxKind>([
  ts.SyntaxKind.OpenParenToken,
  ts.SyntaxKind.OpenBracketToken,
  ts.SyntaxKind.OpenBraceToken
]);

const CLOSING_TOKENS = new Set<ts.SyntaxKind>([
  ts.SyntaxKind.CloseParenToken,
  ts.SyntaxKind.CloseBracketToken,
  ts.SyntaxKind.CloseBraceToken
]);

/**
 * End every line break outside brackets with `;`, so that a line starting
 * with `(`, `-` or `+` is its own statement and never continues the line
 * before it. Breaks inside brackets and string literals are kept as they are.
 * The `;` goes right before the break, so line and column numbers do not move.
 */
export function terminateLines(source: string): string {
  const scanner = ts.createScanner(ts.ScriptTarget.ES2020, false, ts.LanguageVariant.Standard, source);
  const breaks: number[] = [];
  let depth = 0;

  for (let token = scanner.scan(); token !== ts.SyntaxKind.EndOfFileToken; token = scanner.scan()) {
    if (OPENING_TOKENS.has(token)) {
      depth++;
    } else if (CLOSING_TOKENS.has(token)) {
      depth = Math.max(0, depth - 1);
    } else if (token === ts.SyntaxKind.NewLineTrivia && depth === 0) {
      breaks.push(scanner.getTextPos() - scanner.getTokenText().length);
    }
  }

  let result = '';
  let last = 0;
  for (const offset of breaks) {
    result += `${source.slice(last, offset)};`;
    last = offset;
  }
  return result + source.slice(last);
}

/**
 * Surface the first parse diagnostic as an ExpressionSyntaxError
 */
function checkSyntax(source: string, sourceFile: ts.SourceFile): void {
  const output = ts.transpileModule(source, {
    fileName: FILE_NAME,
    reportDiagnostics: true,
    compilerOptions: { target: ts.ScriptTarget.ES2020, allowJs: true }
  });

  const diagnostic = (output.diagnostics ?? []).find(
    d => d.category === ts.DiagnosticCategory.Error && d.file !== undefined
  );
  if (!diagnostic) {
    return;
  }

  const message = ts.flattenDiagnosticMessageText(diagnostic.messageText, '\n');
  const position = toPosition(sourceFile, diagnostic.start ?? 0);
  throw new ExpressionSyntaxError(message, position);
}

function toPosition(sourceFile: ts.SourceFile, offset: number): SourcePosition {
  const { line, character } = sourceFile.getLineAndCharacterOfPosition(offset);
  return { line: line + 1, column: character + 1 };
}

/**
 * Human-readable name for a rejected node
 */
function describeNode(node: ts.Node): string {
  if (ts.isArrowFunction(node) || ts.isFunctionExpression(node) || ts.isFunctionDeclaration(node)) {
    return 'function definition';
  }
  if (ts.isPropertyAccessExpression(node)) return 'attribute access';
  if (ts.isElementAccessExpression(node)) return 'subscript';
  if (ts.isTemplateExpression(node) || ts.isNoSubstitutionTemplateLiteral(node) || ts.isTaggedTemplateExpression(node)) {
    return 'template string';
  }
  if (ts.isConditionalExpression(node)) return 'conditional expression';
  if (ts.isIfStatement(node)) return 'if statement';
  if (ts.isForStatement(node) || ts.isForInStatement(node) || ts.isForOfStatement(node)
    || ts.isWhileStatement(node) || ts.isDoStatement(node)) {
    return 'loop';
  }
  if (ts.isVariableStatement(node)) return 'variable declaration';
  if (ts.isArrayLiteralExpression(node)) return 'list literal';
  if (ts.isObjectLiteralExpression(node)) return 'object literal';
  if (ts.isSpreadElement(node)) return 'spread argument';
  if (node.kind === ts.SyntaxKind.NullKeyword) return 'null literal';
  return ts.SyntaxKind[node.kind];
}

/**
 * Converts one parsed source file. Instances live for a single parse call.
 */
class TreeConverter {
  private readonly sourceFile: ts.SourceFile;

  constructor(sourceFile: ts.SourceFile) {
    this.sourceFile = sourceFile;
  }

  convertStatement(expression: ts.Expression): Statement {
    const position = this.positionOf(expression);

    if (ts.isBinaryExpression(expression)) {
      const tokenKind = expression.operatorToken.kind;

      if (tokenKind === ts.SyntaxKind.EqualsToken) {
        const targets: string[] = [];
        let current: ts.Expression = expression;

        // Right-associative chain: a = b = expr
        while (ts.isBinaryExpression(current) && current.operatorToken.kind === ts.SyntaxKind.EqualsToken) {
          targets.push(this.targetName(current.left));
          current = current.right;
        }

        return { kind: 'assign', targets, value: this.convertValue(current), position };
      }

      const augmented = AUGMENTED_TOKENS.get(tokenKind);
      if (augmented) {
        return {
          kind: 'assign',
          targets: [this.targetName(expression.left)],
          operator: augmented,
          value: this.convertValue(expression.right),
          position
        };
      }
    }

    return { kind: 'expr', value: this.convertValue(expression), position };
  }

  convertValue(node: ts.Expression): ExprNode {
    const position = this.positionOf(node);

    if (ts.isParenthesizedExpression(node)) {
      return this.convertValue(node.expression);
    }

    if (ts.isIdentifier(node)) {
      return { kind: 'name', id: node.text, position };
    }

    if (ts.isNumericLiteral(node) || ts.isStringLiteral(node)
      || node.kind === ts.SyntaxKind.TrueKeyword || node.kind === ts.SyntaxKind.FalseKeyword) {
      return this.convertLiteral(node);
    }

    if (ts.isPrefixUnaryExpression(node)) {
      const operator = UNARY_TOKENS.get(node.operator);
      if (!operator) {
        throw this.unsupported(`unary operator '${ts.tokenToString(node.operator)}'`, node);
      }
      // -1 is a literal, not an operator applied to one
      if (operator !== '!' && ts.isNumericLiteral(node.operand)) {
        const literal = this.convertLiteral(node.operand);
        const magnitude = Number(literal.value);
        return {
          ...literal,
          value: operator === '-' ? -magnitude : magnitude,
          raw: `${operator}${literal.raw}`,
          position
        };
      }
      return { kind: 'unary', operator, operand: this.convertValue(node.operand), position };
    }

    if (ts.isBinaryExpression(node)) {
      return this.convertBinary(node);
    }

    if (ts.isCallExpression(node)) {
      return this.convertCall(node);
    }

    throw this.unsupported(describeNode(node), node);
  }

  unsupported(construct: string, node: ts.Node): UnsupportedConstructError {
    return new UnsupportedConstructError(construct, node.getText(this.sourceFile), this.positionOf(node));
  }

  private convertBinary(node: ts.BinaryExpression): ExprNode {
    const tokenKind = node.operatorToken.kind;
    const position = this.positionOf(node.operatorToken);

    const arithmetic = ARITHMETIC_TOKENS.get(tokenKind);
    if (arithmetic) {
      return {
        kind: 'binary',
        operator: arithmetic,
        left: this.convertValue(node.left),
        right: this.convertValue(node.right),
        position
      };
    }

    const comparison = COMPARISON_TOKENS.get(tokenKind);
    if (comparison) {
      return {
        kind: 'compare',
        operator: comparison,
        left: this.convertValue(node.left),
        right: this.convertValue(node.right),
        position
      };
    }

    const logical = LOGICAL_TOKENS.get(tokenKind);
    if (logical) {
      return {
        kind: 'logical',
        operator: logical,
        operands: this.flattenLogical(node, tokenKind).map(operand => this.convertValue(operand)),
        position
      };
    }

    if (tokenKind === ts.SyntaxKind.EqualsToken || AUGMENTED_TOKENS.has(tokenKind)) {
      throw this.unsupported('assignment inside an expression', node);
    }

    throw this.unsupported(`operator '${node.operatorToken.getText(this.sourceFile)}'`, node);
  }

  /**
   * Collect the operands of an unparenthesized run of the same logical operator
   */
  private flattenLogical(node: ts.Expression, tokenKind: ts.SyntaxKind): ts.Expression[] {
    if (ts.isBinaryExpression(node) && node.operatorToken.kind === tokenKind) {
      return [...this.flattenLogical(node.left, tokenKind), ...this.flattenLogical(node.right, tokenKind)];
    }
    return [node];
  }

  private convertCall(node: ts.CallExpression): ExprNode {
    if (!ts.isIdentifier(node.expression)) {
      throw this.unsupported(`call on ${describeNode(node.expression)}`, node);
    }
    if (node.questionDotToken) {
      throw this.unsupported('optional call', node);
    }

    const args: ExprNode[] = [];
    const keywords: KeywordArgument[] = [];

    for (const argument of node.arguments) {
      if (ts.isSpreadElement(argument)) {
        throw this.unsupported(describeNode(argument), argument);
      }

      if (ts.isBinaryExpression(argument) && argument.operatorToken.kind === ts.SyntaxKind.EqualsToken) {
        if (!ts.isIdentifier(argument.left)) {
          throw this.unsupported('keyword argument with a non-name key', argument);
        }
        keywords.push({
          name: argument.left.text,
          value: this.convertValue(argument.right),
          position: this.positionOf(argument)
        });
        continue;
      }

      if (keywords.length > 0) {
        throw new ExpressionSyntaxError('positional argument follows keyword argument', this.positionOf(argument));
      }
      args.push(this.convertValue(argument));
    }

    return {
      kind: 'call',
      callee: node.expression.text,
      args,
      keywords,
      position: this.positionOf(node)
    };
  }

  private convertLiteral(node: ts.Expression): LiteralNode {
    const position = this.positionOf(node);
    const raw = node.getText(this.sourceFile);

    if (ts.isNumericLiteral(node)) {
      const literalType = isFloatLiteral(raw) ? 'float' : 'int';
      const value = Number(node.text);
      if (literalType === 'int' ? !Number.isSafeInteger(value) : !Number.isFinite(value)) {
        throw this.unsupported('numeric literal out of range', node);
      }
      return { kind: 'literal', literalType, value, raw, position };
    }

    if (ts.isStringLiteral(node)) {
      return { kind: 'literal', literalType: 'str', value: node.text, raw, position };
    }

    return {
      kind: 'literal',
      literalType: 'bool',
      value: node.kind === ts.SyntaxKind.TrueKeyword,
      raw,
      position
    };
  }

  private targetName(node: ts.Expression): string {
    if (!ts.isIdentifier(node)) {
      throw this.unsupported(`assignment to ${describeNode(node)}`, node);
    }
    return node.text;
  }

  private positionOf(node: ts.Node): SourcePosition {
    return toPosition(this.sourceFile, node.getStart(this.sourceFile));
  }
}

/**
 * A decimal literal with a fraction or exponent is a float; everything else
 * (including hex/octal/binary) is an int
 */
function isFloatLiteral(raw: string): boolean {
  if (/^0[xXoObB]/.test(raw)) {
    return false;
  }
  return /[.eE]/.test(raw);
}
