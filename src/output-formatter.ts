/**
 * OutputFormatter - Handles console output formatting for formula-gate
 *
 * Provides consistent, visually clear feedback:
 * - Valid expressions with ✅ emoji
 * - Invalid expressions with 🚫 emoji and one line per violation
 * - Extraction and schema listings
 * - Machine-readable JSON for --json
 */

import {
  Extraction,
  OperatorRule,
  SourcePosition,
  ValidationOutcome,
  Violation,
  ViolationCategory,
  KwargRule,
  DatafieldDecl
} from './types';
import { RuleSchema } from './rule-schema';

const RED = 31;
const GREEN = 32;

export class OutputFormatter {
  private colorEnabled: boolean;

  constructor(colorEnabled: boolean = true) {
    this.colorEnabled = colorEnabled;
  }

  /**
   * Display the outcome of a check
   * Valid results go to stdout, invalid ones to stderr
   */
  displayReport(outcome: ValidationOutcome): void {
    const { expression, report } = outcome;

    if (report.valid) {
      console.log(`${this.paint('✅ VALID', GREEN)}: ${expression}`);
      return;
    }

    const lines = [
      `${this.paint('🚫 INVALID', RED)}: ${expression}`,
      `Violations: ${report.violations.length}`,
      ...report.violations.map(violation => `  - ${this.formatViolationLine(violation)}`)
    ];

    console.error(lines.join('\n'));
  }

  /**
   * Display operators, datafields and call sites found in an expression
   */
  displayExtraction(extraction: Extraction): void {
    const lines = [
      `Operators: ${listOrNone(extraction.operators)}`,
      `Datafields: ${listOrNone(extraction.datafields)}`,
      `Calls: ${extraction.callSites.length}`
    ];

    for (const site of extraction.callSites) {
      const keywords = Array.from(site.keywords.keys());
      const suffix = keywords.length > 0 ? `, keywords: ${keywords.join(', ')}` : '';
      lines.push(`  #${site.index} ${site.operator} at ${formatPosition(site.position)} (${site.args.length} positional${suffix})`);
    }

    console.log(lines.join('\n'));
  }

  /**
   * Display the loaded operator rules and datafield declarations
   */
  displaySchema(schema: RuleSchema): void {
    const operators = schema.operators();
    const datafields = schema.datafields();

    const lines = [`Operators (${operators.length}):`];
    for (const rule of operators) {
      lines.push(`  ${formatOperatorRule(rule)}`);
    }
    lines.push(`Datafields (${datafields.length}):`);
    for (const decl of datafields) {
      lines.push(`  ${decl.id} ${decl.kind}`);
    }

    console.log(lines.join('\n'));
  }

  /**
   * Display a value as indented JSON on stdout
   */
  displayJson(value: unknown): void {
    console.log(JSON.stringify(value, null, 2));
  }

  /**
   * `[category] line L, column C: message`
   */
  formatViolationLine(violation: Violation): string {
    const label = this.paint(`[${violation.category}]`, RED);
    return `${label} ${formatPosition(violation.position)}: ${formatViolation(violation)}`;
  }

  private paint(text: string, color: number): string {
    if (!this.colorEnabled) {
      return text;
    }
    return `\x1b[${color}m${text}\x1b[0m`;
  }
}

// ============================================================================
// Message formatting
// ============================================================================

export function formatPosition(position: SourcePosition): string {
  return `line ${position.line}, column ${position.column}`;
}

/**
 * Human-readable message for one violation
 */
export function formatViolation(violation: Violation): string {
  const { subject, detail } = violation;
  const keyword = violation.keyword ?? '';

  switch (detail.category) {
    case ViolationCategory.UNKNOWN_OPERATOR:
      return `unknown operator '${subject}'`;

    case ViolationCategory.UNKNOWN_DATAFIELD:
      return `unknown datafield '${subject}'`;

    case ViolationCategory.ARITY:
      return `'${subject}' expects ${formatArity(detail.minArgs, detail.maxArgs)} argument(s), got ${detail.observed}`;

    case ViolationCategory.ARG_TYPE:
      return `argument ${detail.argIndex + 1} of '${subject}' must be an int literal, got ${detail.actual}`;

    case ViolationCategory.UNKNOWN_KWARG:
      return detail.allowedKeywords.length > 0
        ? `'${subject}' has no keyword '${keyword}' (allowed: ${detail.allowedKeywords.join(', ')})`
        : `'${subject}' has no keyword '${keyword}' (takes no keywords)`;

    case ViolationCategory.DUPLICATE_KWARG:
      return `keyword '${keyword}' repeated in call to '${subject}'`;

    case ViolationCategory.KWARG_TYPE: {
      const actual = detail.actual === 'expression' ? 'an expression' : detail.actual;
      return `keyword '${keyword}' of '${subject}' must be a ${detail.expected} literal, got ${actual}`;
    }

    case ViolationCategory.KWARG_RANGE: {
      const lower = detail.minVal !== undefined
        ? `${detail.minInclusive ? '[' : '('}${detail.minVal}`
        : '(-inf';
      const upper = detail.maxVal !== undefined
        ? `${detail.maxVal}${detail.maxInclusive ? ']' : ')'}`
        : 'inf)';
      return `keyword '${keyword}' of '${subject}' is ${detail.value}, outside ${lower}, ${upper}`;
    }

    case ViolationCategory.KWARG_ALLOWED: {
      const allowed = detail.allowed.map(value => JSON.stringify(value)).join(', ');
      return `keyword '${keyword}' of '${subject}' is ${JSON.stringify(detail.value)}, expected one of ${allowed}`;
    }

    case ViolationCategory.VECTOR_SCOPE:
      return detail.enclosingOperator === null
        ? `vector datafield '${subject}' used outside a '${detail.vectorPrefix}*' call`
        : `vector datafield '${subject}' used inside '${detail.enclosingOperator}', expected a '${detail.vectorPrefix}*' call`;

    default: {
      const unreachable: never = detail;
      return String(unreachable);
    }
  }
}

function formatArity(minArgs: number, maxArgs: number): string {
  if (maxArgs === -1) {
    return `at least ${minArgs}`;
  }
  if (minArgs === maxArgs) {
    return `${minArgs}`;
  }
  return `${minArgs} to ${maxArgs}`;
}

function formatOperatorRule(rule: OperatorRule): string {
  const max = rule.maxArgs === -1 ? '*' : String(rule.maxArgs);
  const keywords = Array.from(rule.kwargs.keys());
  const ints = rule.intArgs.length > 0 ? ` int args: ${rule.intArgs.join(', ')}` : '';
  const suffix = keywords.length > 0 ? ` kwargs: ${keywords.join(', ')}` : '';
  return `${rule.name} args ${rule.minArgs}..${max}${ints}${suffix}`;
}

function listOrNone(items: string[]): string {
  return items.length > 0 ? items.join(', ') : '(none)';
}

// ============================================================================
// JSON shapes
// ============================================================================

/**
 * Extraction with keyword maps turned into plain objects
 */
export function serializeExtraction(extraction: Extraction): Record<string, unknown> {
  return {
    operators: extraction.operators,
    datafields: extraction.datafields,
    callSites: extraction.callSites.map(site => ({
      index: site.index,
      operator: site.operator,
      args: site.args,
      keywords: Object.fromEntries(site.keywords),
      duplicateKeywords: site.duplicateKeywords,
      position: site.position
    })),
    operatorUses: extraction.operatorUses,
    datafieldRefs: extraction.datafieldRefs
  };
}

export function serializeOutcome(outcome: ValidationOutcome): Record<string, unknown> {
  return {
    expression: outcome.expression,
    valid: outcome.report.valid,
    violations: outcome.report.violations.map(violation => ({
      ...violation,
      message: formatViolation(violation)
    })),
    operators: outcome.extraction.operators,
    datafields: outcome.extraction.datafields
  };
}

interface SerializedOperatorRule {
  minArgs: number;
  maxArgs: number;
  intArgs: number[];
  kwargs: Record<string, KwargRule>;
}

export function serializeSchema(schema: RuleSchema): { operators: Record<string, SerializedOperatorRule>; datafields: DatafieldDecl[] } {
  const operators: Record<string, SerializedOperatorRule> = {};
  for (const rule of schema.operators()) {
    operators[rule.name] = {
      minArgs: rule.minArgs,
      maxArgs: rule.maxArgs,
      intArgs: [...rule.intArgs],
      kwargs: Object.fromEntries(rule.kwargs)
    };
  }
  return { operators, datafields: schema.datafields() };
}
