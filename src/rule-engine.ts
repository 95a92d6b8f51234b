/**
 * Rule Engine - Checks an extraction against a rule schema
 */

import {
  Extraction,
  CallSite,
  ExprNode,
  OperatorRule,
  KwargRule,
  DatafieldKind,
  RuleEngineOptions,
  ValidationReport,
  Violation,
  ViolationCategory,
  VIOLATION_ORDER,
  SourcePosition
} from './types';
import { RuleSchema, literalSatisfies } from './rule-schema';

export const DEFAULT_VECTOR_PREFIX = 'vec_';

const START: SourcePosition = { line: 1, column: 1 };

export class RuleEngine {
  private readonly vectorPrefix: string;

  constructor(options: RuleEngineOptions = {}) {
    this.vectorPrefix = options.vectorPrefix ?? DEFAULT_VECTOR_PREFIX;
  }

  /**
   * Validate an extraction against a schema
   * Every check runs, in this order:
   * 1. Operator membership
   * 2. Datafield membership
   * 3. Arity of calls (and of logical operator chains)
   * 4. Integer-only positional arguments
   * 5. Keyword names
   * 6. Repeated keywords
   * 7. Keyword literal types
   * 8. Keyword numeric ranges
   * 9. Keyword allowed values
   * 10. VECTOR datafields only inside vector-aware calls
   *
   * Violations are grouped by category, then ordered by source position.
   * Only a missing extraction or schema throws.
   */
  validate(extraction: Extraction, schema: RuleSchema): ValidationReport {
    if (!extraction) {
      throw new TypeError('validate requires an extraction');
    }
    if (!schema) {
      throw new TypeError('validate requires a rule schema');
    }

    const violations: Violation[] = [
      ...this.checkOperators(extraction, schema),
      ...this.checkDatafields(extraction, schema),
      ...this.checkArity(extraction, schema),
      ...this.checkArgTypes(extraction, schema),
      ...this.checkKeywords(extraction, schema),
      ...this.checkVectorScope(extraction, schema)
    ];

    const ordered = orderViolations(violations);
    return { valid: ordered.length === 0, violations: ordered };
  }

  private checkOperators(extraction: Extraction, schema: RuleSchema): Violation[] {
    const violations: Violation[] = [];

    for (const operator of extraction.operators) {
      if (schema.hasOperator(operator)) {
        continue;
      }
      const firstUse = extraction.operatorUses.find(use => use.operator === operator);
      const violation: Violation = {
        category: ViolationCategory.UNKNOWN_OPERATOR,
        subject: operator,
        position: firstUse ? firstUse.position : START,
        detail: { category: ViolationCategory.UNKNOWN_OPERATOR }
      };
      if (firstUse?.callIndex !== undefined) {
        violation.callIndex = firstUse.callIndex;
      }
      violations.push(violation);
    }

    return violations;
  }

  private checkDatafields(extraction: Extraction, schema: RuleSchema): Violation[] {
    const violations: Violation[] = [];

    for (const name of extraction.datafields) {
      if (schema.hasDatafield(name)) {
        continue;
      }
      const firstRef = extraction.datafieldRefs.find(ref => ref.name === name);
      violations.push({
        category: ViolationCategory.UNKNOWN_DATAFIELD,
        subject: name,
        position: firstRef ? firstRef.position : START,
        detail: { category: ViolationCategory.UNKNOWN_DATAFIELD }
      });
    }

    return violations;
  }

  private checkArity(extraction: Extraction, schema: RuleSchema): Violation[] {
    const violations: Violation[] = [];

    for (const use of extraction.operatorUses) {
      if (use.kind !== 'call' && use.kind !== 'logical') {
        continue;
      }
      const rule = schema.lookupOperator(use.operator);
      if (!rule || withinArity(use.operandCount, rule)) {
        continue;
      }

      const violation: Violation = {
        category: ViolationCategory.ARITY,
        subject: use.operator,
        position: use.position,
        detail: {
          category: ViolationCategory.ARITY,
          observed: use.operandCount,
          minArgs: rule.minArgs,
          maxArgs: rule.maxArgs
        }
      };
      if (use.callIndex !== undefined) {
        violation.callIndex = use.callIndex;
      }
      violations.push(violation);
    }

    return violations;
  }

  private checkArgTypes(extraction: Extraction, schema: RuleSchema): Violation[] {
    const violations: Violation[] = [];

    for (const site of extraction.callSites) {
      const rule = schema.lookupOperator(site.operator);
      if (!rule) {
        continue;
      }

      for (const argIndex of rule.intArgs) {
        const arg = site.args[argIndex];
        // Only literals are typed; an expression is left to run time
        if (!arg || arg.kind !== 'literal' || arg.literalType === 'int') {
          continue;
        }
        violations.push({
          category: ViolationCategory.ARG_TYPE,
          subject: site.operator,
          callIndex: site.index,
          position: arg.position,
          detail: { category: ViolationCategory.ARG_TYPE, argIndex, actual: arg.literalType }
        });
      }
    }

    return violations;
  }

  private checkKeywords(extraction: Extraction, schema: RuleSchema): Violation[] {
    const violations: Violation[] = [];

    for (const site of extraction.callSites) {
      for (const keyword of site.duplicateKeywords) {
        violations.push({
          category: ViolationCategory.DUPLICATE_KWARG,
          subject: site.operator,
          callIndex: site.index,
          keyword,
          position: site.position,
          detail: { category: ViolationCategory.DUPLICATE_KWARG }
        });
      }

      const rule = schema.lookupOperator(site.operator);
      if (!rule) {
        // Already reported as an unknown operator
        continue;
      }

      for (const [keyword, value] of site.keywords) {
        const kwargRule = rule.kwargs.get(keyword);
        if (!kwargRule) {
          violations.push({
            category: ViolationCategory.UNKNOWN_KWARG,
            subject: site.operator,
            callIndex: site.index,
            keyword,
            position: value.position,
            detail: {
              category: ViolationCategory.UNKNOWN_KWARG,
              allowedKeywords: Array.from(rule.kwargs.keys())
            }
          });
          continue;
        }
        violations.push(...this.checkKeywordValue(site, keyword, value, kwargRule));
      }
    }

    return violations;
  }

  /**
   * Type, then range and allowed set. A value of the wrong type is not
   * checked further.
   */
  private checkKeywordValue(site: CallSite, keyword: string, value: ExprNode, rule: KwargRule): Violation[] {
    const base = {
      subject: site.operator,
      callIndex: site.index,
      keyword,
      position: value.position
    };

    if (value.kind !== 'literal') {
      return [{
        ...base,
        category: ViolationCategory.KWARG_TYPE,
        detail: { category: ViolationCategory.KWARG_TYPE, expected: rule.type, actual: 'expression' }
      }];
    }

    if (!literalSatisfies(rule.type, value.literalType)) {
      return [{
        ...base,
        category: ViolationCategory.KWARG_TYPE,
        detail: { category: ViolationCategory.KWARG_TYPE, expected: rule.type, actual: value.literalType }
      }];
    }

    const violations: Violation[] = [];

    if (typeof value.value === 'number' && !withinRange(value.value, rule)) {
      violations.push({
        ...base,
        category: ViolationCategory.KWARG_RANGE,
        detail: {
          category: ViolationCategory.KWARG_RANGE,
          value: value.value,
          minVal: rule.minVal,
          maxVal: rule.maxVal,
          minInclusive: rule.minInclusive,
          maxInclusive: rule.maxInclusive
        }
      });
    }

    if (rule.allowed && !rule.allowed.includes(value.value)) {
      violations.push({
        ...base,
        category: ViolationCategory.KWARG_ALLOWED,
        detail: {
          category: ViolationCategory.KWARG_ALLOWED,
          value: value.value,
          allowed: [...rule.allowed]
        }
      });
    }

    return violations;
  }

  private checkVectorScope(extraction: Extraction, schema: RuleSchema): Violation[] {
    const violations: Violation[] = [];

    for (const ref of extraction.datafieldRefs) {
      const decl = schema.lookupDatafield(ref.name);
      if (!decl || decl.kind !== DatafieldKind.VECTOR) {
        continue;
      }

      const enclosing = ref.enclosingCall === null ? null : extraction.callSites[ref.enclosingCall];
      if (enclosing && enclosing.operator.startsWith(this.vectorPrefix)) {
        continue;
      }

      const violation: Violation = {
        category: ViolationCategory.VECTOR_SCOPE,
        subject: ref.name,
        position: ref.position,
        detail: {
          category: ViolationCategory.VECTOR_SCOPE,
          enclosingOperator: enclosing ? enclosing.operator : null,
          vectorPrefix: this.vectorPrefix
        }
      };
      if (enclosing) {
        violation.callIndex = enclosing.index;
      }
      violations.push(violation);
    }

    return violations;
  }
}

function withinArity(count: number, rule: OperatorRule): boolean {
  if (count < rule.minArgs) {
    return false;
  }
  return rule.maxArgs === -1 || count <= rule.maxArgs;
}

function withinRange(value: number, rule: KwargRule): boolean {
  if (rule.minVal !== undefined) {
    if (rule.minInclusive ? value < rule.minVal : value <= rule.minVal) {
      return false;
    }
  }
  if (rule.maxVal !== undefined) {
    if (rule.maxInclusive ? value > rule.maxVal : value >= rule.maxVal) {
      return false;
    }
  }
  return true;
}

function comparePositions(a: SourcePosition, b: SourcePosition): number {
  return a.line - b.line || a.column - b.column;
}

/**
 * Group by category in report order, then by position within a category
 */
function orderViolations(violations: Violation[]): Violation[] {
  return VIOLATION_ORDER.flatMap(category =>
    violations
      .filter(v => v.category === category)
      .sort((a, b) => comparePositions(a.position, b.position))
  );
}
