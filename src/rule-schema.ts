/**
 * Rule Schema - Immutable operator rules and datafield declarations
 *
 * Built once from the operator and datafield tables; shape and consistency
 * are checked up front so that validation never meets a malformed rule.
 */

import { z } from 'zod';
import {
  OperatorRule,
  KwargRule,
  KwargType,
  DatafieldDecl,
  DatafieldKind,
  LiteralType,
  LiteralValue
} from './types';
import { SchemaError, SchemaIssue } from './errors';

// ============================================================================
// Literal typing
// ============================================================================

/**
 * Literal kind of a table value. Integral numbers count as int.
 */
export function literalTypeOf(value: LiteralValue): LiteralType {
  if (typeof value === 'boolean') return 'bool';
  if (typeof value === 'string') return 'str';
  return Number.isInteger(value) ? 'int' : 'float';
}

/**
 * Whether a literal of the given kind satisfies a declared keyword type.
 * An int widens to float; bool never counts as a number.
 */
export function literalSatisfies(declared: KwargType, actual: LiteralType): boolean {
  switch (declared) {
    case 'any':
      return true;
    case 'number':
      return actual === 'int' || actual === 'float';
    case 'float':
      return actual === 'float' || actual === 'int';
    default:
      return declared === actual;
  }
}

const NUMERIC_TYPES: readonly KwargType[] = ['int', 'float', 'number', 'any'];

// ============================================================================
// Table schemas
// ============================================================================

const LiteralSchema = z.union([z.boolean(), z.number(), z.string()]);

const KwargRuleSchema = z.object({
  type: z.enum(['bool', 'int', 'float', 'str', 'number', 'any']),
  allowed: z.array(LiteralSchema).optional(),
  min_val: z.number().optional(),
  max_val: z.number().optional(),
  min_inclusive: z.boolean().optional(),
  max_inclusive: z.boolean().optional()
}).superRefine((rule, ctx) => {
  const hasRange = rule.min_val !== undefined || rule.max_val !== undefined;
  if (hasRange && !NUMERIC_TYPES.includes(rule.type)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `range bounds need a numeric type, not '${rule.type}'`,
      path: ['type']
    });
  }
  if (rule.min_val !== undefined && rule.max_val !== undefined && rule.min_val > rule.max_val) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `min_val ${rule.min_val} is greater than max_val ${rule.max_val}`,
      path: ['min_val']
    });
  }
  (rule.allowed ?? []).forEach((value, i) => {
    if (!literalSatisfies(rule.type, literalTypeOf(value))) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `allowed value ${JSON.stringify(value)} is not of type '${rule.type}'`,
        path: ['allowed', i]
      });
    }
  });
});

const OperatorRuleSchema = z.object({
  min_args: z.number().int().min(0).optional(),
  max_args: z.number().int().min(-1).optional(),
  int_args: z.array(z.number().int().min(0)).optional(),
  kwargs: z.record(z.string(), KwargRuleSchema).optional()
}).refine(
  rule => rule.max_args === undefined || rule.max_args < 0 || rule.max_args >= (rule.min_args ?? 0),
  { message: 'max_args must be -1 (unbounded) or at least min_args', path: ['max_args'] }
).superRefine((rule, ctx) => {
  const maxArgs = rule.max_args ?? -1;
  (rule.int_args ?? []).forEach((index, i) => {
    if (maxArgs >= 0 && index >= maxArgs) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `argument index ${index} is beyond max_args ${maxArgs}`,
        path: ['int_args', i]
      });
    }
  });
});

export const OperatorTableSchema = z.record(z.string(), OperatorRuleSchema);

export const DatafieldTableSchema = z.array(z.object({
  id: z.string().min(1),
  type: z.nativeEnum(DatafieldKind)
})).superRefine((entries, ctx) => {
  const seen = new Set<string>();
  entries.forEach((entry, i) => {
    if (seen.has(entry.id)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `duplicate datafield id '${entry.id}'`,
        path: [i, 'id']
      });
    }
    seen.add(entry.id);
  });
});

export type OperatorTable = z.input<typeof OperatorTableSchema>;
export type DatafieldTable = z.input<typeof DatafieldTableSchema>;

function toIssues(root: string, error: z.ZodError): SchemaIssue[] {
  return error.issues.map(issue => ({
    path: [root, ...issue.path].map(String).join('.'),
    message: issue.message
  }));
}

// ============================================================================
// RuleSchema
// ============================================================================

export class RuleSchema {
  private readonly operatorRules: ReadonlyMap<string, OperatorRule>;
  private readonly datafieldDecls: ReadonlyMap<string, DatafieldDecl>;

  private constructor(operators: OperatorRule[], datafields: DatafieldDecl[]) {
    this.operatorRules = new Map(operators.map(rule => [rule.name, rule]));
    this.datafieldDecls = new Map(datafields.map(decl => [decl.id, decl]));
    Object.freeze(this);
  }

  /**
   * Build a schema from the raw operator and datafield tables
   * @throws SchemaError listing every problem found in either table
   */
  static fromTables(operatorTable: unknown, datafieldTable: unknown): RuleSchema {
    const operators = OperatorTableSchema.safeParse(operatorTable);
    const datafields = DatafieldTableSchema.safeParse(datafieldTable);

    const issues: SchemaIssue[] = [];
    if (!operators.success) {
      issues.push(...toIssues('operators', operators.error));
    }
    if (!datafields.success) {
      issues.push(...toIssues('datafields', datafields.error));
    }
    if (!operators.success || !datafields.success) {
      throw new SchemaError(issues);
    }

    const rules = Object.entries(operators.data).map(([name, entry]) => {
      const kwargs = new Map<string, KwargRule>();
      for (const [keyword, kwarg] of Object.entries(entry.kwargs ?? {})) {
        const kwargRule: KwargRule = {
          type: kwarg.type,
          minInclusive: kwarg.min_inclusive ?? true,
          maxInclusive: kwarg.max_inclusive ?? true
        };
        if (kwarg.allowed) kwargRule.allowed = Object.freeze([...kwarg.allowed]);
        if (kwarg.min_val !== undefined) kwargRule.minVal = kwarg.min_val;
        if (kwarg.max_val !== undefined) kwargRule.maxVal = kwarg.max_val;
        kwargs.set(keyword, Object.freeze(kwargRule));
      }

      return Object.freeze({
        name,
        minArgs: entry.min_args ?? 0,
        maxArgs: entry.max_args ?? -1,
        intArgs: Object.freeze([...new Set(entry.int_args ?? [])].sort((a, b) => a - b)),
        kwargs
      });
    });

    const decls = datafields.data.map(entry => Object.freeze({ id: entry.id, kind: entry.type }));

    return new RuleSchema(rules, decls);
  }

  lookupOperator(name: string): OperatorRule | undefined {
    return this.operatorRules.get(name);
  }

  lookupDatafield(id: string): DatafieldDecl | undefined {
    return this.datafieldDecls.get(id);
  }

  hasOperator(name: string): boolean {
    return this.operatorRules.has(name);
  }

  hasDatafield(id: string): boolean {
    return this.datafieldDecls.has(id);
  }

  /** Operator names in table order */
  operatorNames(): string[] {
    return Array.from(this.operatorRules.keys());
  }

  /** Operator rules in table order */
  operators(): OperatorRule[] {
    return Array.from(this.operatorRules.values());
  }

  /** Datafield declarations in table order */
  datafields(): DatafieldDecl[] {
    return Array.from(this.datafieldDecls.values());
  }
}
