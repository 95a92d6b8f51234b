/**
 * Schema Loader - Reads the operator and datafield tables from disk
 */

import * as fs from 'fs';
import { RuleSchema } from './rule-schema';
import { SchemaError } from './errors';

export class SchemaLoader {
  /**
   * Read both tables and build a schema
   * @throws SchemaError when a file is missing, is not JSON, or fails validation
   */
  load(operatorsPath: string, datafieldsPath: string): RuleSchema {
    const operatorTable = this.readTable(operatorsPath);
    const datafieldTable = this.readTable(datafieldsPath);

    this.warnIfEmpty(operatorTable, operatorsPath, 'operator');
    this.warnIfEmpty(datafieldTable, datafieldsPath, 'datafield');

    return RuleSchema.fromTables(operatorTable, datafieldTable);
  }

  /**
   * Read and parse one JSON table
   */
  readTable(filePath: string): unknown {
    if (!fs.existsSync(filePath)) {
      throw new SchemaError([{ path: filePath, message: 'file not found' }]);
    }

    let content: string;
    try {
      content = fs.readFileSync(filePath, 'utf-8');
    } catch (error) {
      throw new SchemaError([{
        path: filePath,
        message: `cannot read file: ${error instanceof Error ? error.message : String(error)}`
      }]);
    }

    try {
      return JSON.parse(content);
    } catch (error) {
      throw new SchemaError([{
        path: filePath,
        message: `invalid JSON: ${error instanceof Error ? error.message : String(error)}`
      }]);
    }
  }

  /**
   * An empty table is legal but rejects every expression that uses it
   */
  private warnIfEmpty(table: unknown, filePath: string, label: string): void {
    const empty = Array.isArray(table)
      ? table.length === 0
      : typeof table === 'object' && table !== null && Object.keys(table).length === 0;

    if (empty) {
      console.error(`Warning: ${label} table is empty (${filePath})`);
    }
  }
}
