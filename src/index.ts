#!/usr/bin/env node
/**
 * formula-gate - Main entry point
 */

import { CLI } from './cli';

export async function main(args: string[]): Promise<number> {
  const cli = new CLI();
  return await cli.run(args);
}

// Run if called directly
if (require.main === module) {
  main(process.argv.slice(2))
    .then((exitCode) => {
      process.exit(exitCode);
    })
    .catch((error) => {
      console.error('Fatal error:', error);
      process.exit(1);
    });
}

// Export for library use and testing
export * from './types';
export * from './errors';
export { ExpressionParser, stripComment, terminateLines, COMMENT_MARKER } from './expression-parser';
export { Extractor } from './extractor';
export { RuleSchema, OperatorTableSchema, DatafieldTableSchema, literalSatisfies, literalTypeOf } from './rule-schema';
export type { OperatorTable, DatafieldTable } from './rule-schema';
export { RuleEngine, DEFAULT_VECTOR_PREFIX } from './rule-engine';
export { Validator } from './validator';
export { SchemaLoader } from './schema-loader';
export { createDefaultConfig, resolveConfig } from './config';
export { OutputFormatter, formatViolation, serializeExtraction, serializeOutcome, serializeSchema } from './output-formatter';
export { CLI, VERSION, EXIT_INVALID } from './cli';
