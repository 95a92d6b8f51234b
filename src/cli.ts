/**
 * CLI Interface - Main command-line interface
 */

import { CLIOptions, CLICommand } from './types';
import { resolveConfig } from './config';
import { SchemaLoader } from './schema-loader';
import { Validator } from './validator';
import { Extractor } from './extractor';
import {
  OutputFormatter,
  serializeExtraction,
  serializeOutcome,
  serializeSchema
} from './output-formatter';

export const VERSION = '1.0.0';

/** Exit code for an expression that was analysed and found invalid */
export const EXIT_INVALID = 2;

const COMMANDS: readonly CLICommand[] = ['check', 'extract', 'schema'];

function isCommand(value: string): value is CLICommand {
  return COMMANDS.some(command => command === value);
}

export class CLI {
  /**
   * Main entry point for CLI
   *
   * Parses arguments and routes to the matching handler:
   * - check: Validate an expression against the rule schema
   * - extract: List operators and datafields without validating
   * - schema: Show the loaded rule schema
   *
   * Returns 0 on success, 1 on a fatal error, 2 for an invalid expression.
   */
  async run(args: string[]): Promise<number> {
    try {
      // Handle help flag
      if (args.length === 0 || args[0] === '--help' || args[0] === '-h') {
        this.displayUsage();
        return args.length === 0 ? 1 : 0;
      }

      // Handle version flag
      if (args[0] === '--version' || args[0] === '-v' || args[0] === 'version') {
        console.log(`formula-gate v${VERSION}`);
        return 0;
      }

      const options = this.parseArgs(args);

      switch (options.command) {
        case 'check':
          return this.handleCheck(options);
        case 'extract':
          return this.handleExtract(options);
        case 'schema':
          return this.handleSchema(options);
      }
    } catch (error) {
      console.error('Error:', error instanceof Error ? error.message : String(error));
      return 1;
    }
  }

  /**
   * Parse command-line arguments
   *
   * Supports:
   * - --operators <path>: Operator table location
   * - --datafields <path>: Datafield table location
   * - --schema-dir <dir>: Directory holding both tables
   * - --vector-prefix <prefix>: Prefix of vector-aware operators
   * - --json: Machine-readable output
   * - --no-color: Plain output
   */
  parseArgs(args: string[]): CLIOptions {
    const [subcommand, ...rest] = args;

    if (!isCommand(subcommand)) {
      throw new Error(`Unknown command: ${subcommand}`);
    }

    const options: CLIOptions = {
      command: subcommand,
      json: false,
      color: true
    };

    for (let i = 0; i < rest.length; i++) {
      const arg = rest[i];

      if (arg === '--json') {
        options.json = true;
      } else if (arg === '--no-color') {
        options.color = false;
      } else if (arg === '--operators') {
        options.operatorsPath = this.flagValue(rest, ++i, arg);
      } else if (arg === '--datafields') {
        options.datafieldsPath = this.flagValue(rest, ++i, arg);
      } else if (arg === '--schema-dir') {
        options.schemaDir = this.flagValue(rest, ++i, arg);
      } else if (arg === '--vector-prefix') {
        options.vectorPrefix = this.flagValue(rest, ++i, arg);
      } else if (arg.startsWith('--')) {
        throw new Error(`Unknown flag: ${arg}`);
      } else if (options.expression === undefined && subcommand !== 'schema') {
        options.expression = arg;
      } else {
        throw new Error(`Unexpected argument: ${arg}`);
      }
    }

    if (subcommand !== 'schema' && options.expression === undefined) {
      throw new Error(`${subcommand} command requires an expression argument\nUsage: formula-gate ${subcommand} "<expression>"`);
    }

    return options;
  }

  private flagValue(args: string[], index: number, flag: string): string {
    if (index >= args.length) {
      throw new Error(`${flag} requires a value`);
    }
    return args[index];
  }

  /**
   * Display usage information
   */
  private displayUsage(): void {
    console.log(`
formula-gate - Validate formula expressions against an operator and datafield schema

Usage:
  formula-gate check "<expression>"     Validate an expression
  formula-gate extract "<expression>"   List operators and datafields
  formula-gate schema                   Show the loaded rule schema

Flags:
  --operators <path>                    Operator table (default: .formula-gate/operators.json)
  --datafields <path>                   Datafield table (default: .formula-gate/datafields.json)
  --schema-dir <dir>                    Directory holding both tables
  --vector-prefix <prefix>              Prefix of vector-aware operators (default: vec_)
  --json                                Machine-readable output
  --no-color                            Disable colored output

Exit codes:
  0                                     Valid expression / success
  1                                     Error (arguments, syntax, schema)
  2                                     Expression violates the schema

Examples:
  formula-gate check "ts_mean(close, 5) > open"
  formula-gate check "vec_sum(tgr_price)" --schema-dir ./rules
  formula-gate extract "a = close - open; a / open" --json
    `.trim());
  }

  /**
   * Handle check command - extract, validate, report
   */
  private handleCheck(options: CLIOptions): number {
    const config = resolveConfig(options);
    const schema = new SchemaLoader().load(config.schema.operatorsPath, config.schema.datafieldsPath);
    const validator = new Validator(schema, config.engine);
    const outcome = validator.validate(options.expression ?? '');

    const formatter = new OutputFormatter(config.output.color);
    if (config.output.json) {
      formatter.displayJson(serializeOutcome(outcome));
    } else {
      formatter.displayReport(outcome);
    }

    return outcome.report.valid ? 0 : EXIT_INVALID;
  }

  /**
   * Handle extract command - no schema needed
   */
  private handleExtract(options: CLIOptions): number {
    const extraction = new Extractor().extract(options.expression ?? '');

    const formatter = new OutputFormatter(options.color);
    if (options.json) {
      formatter.displayJson(serializeExtraction(extraction));
    } else {
      formatter.displayExtraction(extraction);
    }

    return 0;
  }

  /**
   * Handle schema command - load and list the tables
   */
  private handleSchema(options: CLIOptions): number {
    const config = resolveConfig(options);
    const schema = new SchemaLoader().load(config.schema.operatorsPath, config.schema.datafieldsPath);

    const formatter = new OutputFormatter(config.output.color);
    if (config.output.json) {
      formatter.displayJson(serializeSchema(schema));
    } else {
      formatter.displaySchema(schema);
    }

    return 0;
  }
}
