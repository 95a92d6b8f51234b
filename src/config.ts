/**
 * Configuration - Default locations and CLI overrides
 */

import * as path from 'path';
import { CLIOptions, FormulaGateConfig } from './types';
import { DEFAULT_VECTOR_PREFIX } from './rule-engine';

/** Directory, relative to the working directory, holding the rule tables */
export const SCHEMA_DIR_NAME = '.formula-gate';
export const OPERATORS_FILE_NAME = 'operators.json';
export const DATAFIELDS_FILE_NAME = 'datafields.json';

/**
 * Defaults: both tables under ./.formula-gate, JSON output off, color on
 */
export function createDefaultConfig(cwd: string = process.cwd()): FormulaGateConfig {
  const schemaDir = path.join(cwd, SCHEMA_DIR_NAME);
  return {
    schema: {
      operatorsPath: path.join(schemaDir, OPERATORS_FILE_NAME),
      datafieldsPath: path.join(schemaDir, DATAFIELDS_FILE_NAME)
    },
    engine: {
      vectorPrefix: DEFAULT_VECTOR_PREFIX
    },
    output: {
      json: false,
      color: true
    }
  };
}

/**
 * Apply CLI overrides on top of the defaults.
 * Precedence: --operators/--datafields > --schema-dir > ./.formula-gate
 */
export function resolveConfig(options: CLIOptions, cwd: string = process.cwd()): FormulaGateConfig {
  const config = createDefaultConfig(cwd);

  if (options.schemaDir) {
    const schemaDir = path.resolve(cwd, options.schemaDir);
    config.schema.operatorsPath = path.join(schemaDir, OPERATORS_FILE_NAME);
    config.schema.datafieldsPath = path.join(schemaDir, DATAFIELDS_FILE_NAME);
  }
  if (options.operatorsPath) {
    config.schema.operatorsPath = path.resolve(cwd, options.operatorsPath);
  }
  if (options.datafieldsPath) {
    config.schema.datafieldsPath = path.resolve(cwd, options.datafieldsPath);
  }
  if (options.vectorPrefix) {
    config.engine.vectorPrefix = options.vectorPrefix;
  }

  config.output.json = options.json;
  config.output.color = options.color;

  return config;
}
