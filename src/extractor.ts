/**
 * Extractor - Walks parsed statements and collects operators, free variables
 * and call sites
 */

import {
  Statement,
  ExprNode,
  CallNode,
  CallSite,
  OperatorUse,
  DatafieldRef,
  Extraction,
  OperatorKind,
  SourcePosition
} from './types';
import { ExpressionParser } from './expression-parser';

/**
 * Mutable state for one extraction pass
 */
interface WalkState {
  boundNames: Set<string>;
  operators: Set<string>;
  datafields: Set<string>;
  callSites: CallSite[];
  operatorUses: OperatorUse[];
  datafieldRefs: DatafieldRef[];
  nextCallIndex: number;
}

export class Extractor {
  private parser: ExpressionParser;

  constructor(parser: ExpressionParser = new ExpressionParser()) {
    this.parser = parser;
  }

  /**
   * Extract operators, datafields and call sites from expression text.
   * Syntax and unsupported-construct errors from the parser propagate.
   */
  extract(expression: string): Extraction {
    return this.extractStatements(this.parser.parse(expression));
  }

  /**
   * Walk already-parsed statements in order. A name assigned in one statement
   * is a local binding for every later statement.
   */
  extractStatements(statements: Statement[]): Extraction {
    const state: WalkState = {
      boundNames: new Set(),
      operators: new Set(),
      datafields: new Set(),
      callSites: [],
      operatorUses: [],
      datafieldRefs: [],
      nextCallIndex: 0
    };

    for (const statement of statements) {
      if (statement.kind === 'assign') {
        if (statement.operator) {
          // x += y reads x before writing it
          for (const target of statement.targets) {
            this.visitName(state, target, null, statement.position);
          }
          this.recordOperator(state, statement.operator, 'arithmetic', 2, statement.position);
        }
        // Right-hand side first: a self-reference to an unbound name is a datafield
        this.walk(state, statement.value, null);
        for (const target of statement.targets) {
          state.boundNames.add(target);
        }
      } else {
        this.walk(state, statement.value, null);
      }
    }

    return {
      operators: Array.from(state.operators),
      datafields: Array.from(state.datafields),
      callSites: state.callSites,
      operatorUses: state.operatorUses,
      datafieldRefs: state.datafieldRefs
    };
  }

  /**
   * Operators are recorded in source order: infix symbols between their
   * operands, call names and prefix symbols before them
   */
  private walk(state: WalkState, node: ExprNode, enclosingCall: number | null): void {
    switch (node.kind) {
      case 'name':
        this.visitName(state, node.id, enclosingCall, node.position);
        return;

      case 'literal':
        return;

      case 'call':
        this.visitCall(state, node);
        return;

      case 'binary':
        this.walk(state, node.left, enclosingCall);
        this.recordOperator(state, node.operator, 'arithmetic', 2, node.position);
        this.walk(state, node.right, enclosingCall);
        return;

      case 'compare':
        this.walk(state, node.left, enclosingCall);
        this.recordOperator(state, node.operator, 'comparison', 2, node.position);
        this.walk(state, node.right, enclosingCall);
        return;

      case 'logical':
        node.operands.forEach((operand, i) => {
          if (i === 1) {
            this.recordOperator(state, node.operator, 'logical', node.operands.length, node.position);
          }
          this.walk(state, operand, enclosingCall);
        });
        return;

      case 'unary':
        this.recordOperator(state, node.operator, 'unary', 1, node.position);
        this.walk(state, node.operand, enclosingCall);
        return;

      default: {
        const unreachable: never = node;
        throw new Error(`Unhandled node: ${JSON.stringify(unreachable)}`);
      }
    }
  }

  private visitName(state: WalkState, name: string, enclosingCall: number | null, position: SourcePosition): void {
    if (state.boundNames.has(name)) {
      return;
    }
    state.datafields.add(name);
    state.datafieldRefs.push({ name, enclosingCall, position });
  }

  private visitCall(state: WalkState, node: CallNode): void {
    // Reserve the index before the arguments so outer calls precede inner ones
    const index = state.nextCallIndex++;
    this.recordOperator(state, node.callee, 'call', node.args.length, node.position, index);

    for (const arg of node.args) {
      this.walk(state, arg, index);
    }

    const keywords = new Map<string, ExprNode>();
    const duplicateKeywords: string[] = [];
    for (const keyword of node.keywords) {
      this.walk(state, keyword.value, index);
      if (keywords.has(keyword.name) && !duplicateKeywords.includes(keyword.name)) {
        duplicateKeywords.push(keyword.name);
      }
      keywords.set(keyword.name, keyword.value);
    }

    state.callSites[index] = {
      index,
      operator: node.callee,
      args: node.args,
      keywords,
      duplicateKeywords,
      position: node.position
    };
  }

  private recordOperator(
    state: WalkState,
    operator: string,
    kind: OperatorKind,
    operandCount: number,
    position: SourcePosition,
    callIndex?: number
  ): void {
    state.operators.add(operator);
    const use: OperatorUse = { operator, kind, operandCount, position };
    if (callIndex !== undefined) {
      use.callIndex = callIndex;
    }
    state.operatorUses.push(use);
  }
}
