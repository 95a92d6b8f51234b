/**
 * Validator - Main validation orchestrator
 */

import { RuleEngineOptions, ValidationOutcome } from './types';
import { RuleSchema } from './rule-schema';
import { Extractor } from './extractor';
import { RuleEngine } from './rule-engine';

export class Validator {
  private schema: RuleSchema;
  private extractor: Extractor;
  private engine: RuleEngine;

  constructor(schema: RuleSchema, options: RuleEngineOptions = {}) {
    this.schema = schema;
    this.extractor = new Extractor();
    this.engine = new RuleEngine(options);
  }

  /**
   * Extract, then validate. Syntax and unsupported-construct errors abort
   * before any validation runs.
   */
  validate(expression: string): ValidationOutcome {
    const extraction = this.extractor.extract(expression);
    const report = this.engine.validate(extraction, this.schema);
    return { expression, extraction, report };
  }
}
