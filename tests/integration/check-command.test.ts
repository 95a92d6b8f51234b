/**
 * Integration tests for the check, extract and schema commands
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { CLI } from '../../src/cli';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';

describe('CLI Integration', () => {
  let testDir: string;
  let capturedOutput: string[];
  let capturedErrors: string[];
  let originalLog: typeof console.log;
  let originalError: typeof console.error;

  function writeSchema(dir: string, operators: unknown, datafields: unknown): void {
    fs.mkdirSync(dir, { recursive: true });
    fs.writeFileSync(path.join(dir, 'operators.json'), JSON.stringify(operators, null, 2));
    fs.writeFileSync(path.join(dir, 'datafields.json'), JSON.stringify(datafields, null, 2));
  }

  beforeEach(() => {
    // Create temporary test directory
    testDir = fs.mkdtempSync(path.join(os.tmpdir(), 'formula-gate-cli-test-'));

    // Mock process.cwd() to return test directory
    vi.spyOn(process, 'cwd').mockReturnValue(testDir);

    writeSchema(
      path.join(testDir, '.formula-gate'),
      {
        '+': {},
        '-': {},
        '>': {},
        ts_mean: { min_args: 2, max_args: 2 },
        vec_sum: { min_args: 1, max_args: 1 },
        v_sum: { min_args: 1, max_args: 1 }
      },
      [
        { id: 'close', type: 'MATRIX' },
        { id: 'open', type: 'MATRIX' },
        { id: 'tgr_price', type: 'VECTOR' }
      ]
    );

    // Capture console output
    capturedOutput = [];
    capturedErrors = [];
    originalLog = console.log;
    originalError = console.error;
    console.log = (...args: unknown[]) => {
      capturedOutput.push(args.map(String).join(' '));
    };
    console.error = (...args: unknown[]) => {
      capturedErrors.push(args.map(String).join(' '));
    };
  });

  afterEach(() => {
    // Restore console
    console.log = originalLog;
    console.error = originalError;

    // Restore mocks
    vi.restoreAllMocks();

    // Cleanup test directory
    fs.rmSync(testDir, { recursive: true, force: true });
  });

  describe('check', () => {
    it('should report a valid expression and exit 0', async () => {
      const exitCode = await new CLI().run(['check', 'close - open', '--no-color']);

      expect(exitCode).toBe(0);
      expect(capturedOutput).toEqual(['✅ VALID: close - open']);
      expect(capturedErrors).toEqual([]);
    });

    it('should report violations and exit 2', async () => {
      const exitCode = await new CLI().run(['check', 'ts_mean(close) + zz', '--no-color']);

      expect(exitCode).toBe(2);
      expect(capturedErrors.join('\n').split('\n')).toEqual([
        '🚫 INVALID: ts_mean(close) + zz',
        'Violations: 2',
        "  - [unknown_datafield] line 1, column 18: unknown datafield 'zz'",
        "  - [arity] line 1, column 1: 'ts_mean' expects 2 argument(s), got 1"
      ]);
    });

    it('should color output by default', async () => {
      await new CLI().run(['check', 'close']);

      expect(capturedOutput).toEqual(['\x1b[32m✅ VALID\x1b[0m: close']);
    });

    it('should print a JSON report with --json', async () => {
      const exitCode = await new CLI().run(['check', 'tgr_price + 1', '--json']);

      expect(exitCode).toBe(2);
      const result = JSON.parse(capturedOutput.join('\n'));
      expect(result.valid).toBe(false);
      expect(result.operators).toEqual(['+']);
      expect(result.datafields).toEqual(['tgr_price']);
      expect(result.violations).toHaveLength(1);
      expect(result.violations[0].category).toBe('vector_scope');
      expect(result.violations[0].message).toBe("vector datafield 'tgr_price' used outside a 'vec_*' call");
    });

    it('should honor --vector-prefix', async () => {
      expect(await new CLI().run(['check', 'v_sum(tgr_price)', '--no-color'])).toBe(2);
      expect(await new CLI().run(['check', 'v_sum(tgr_price)', '--no-color', '--vector-prefix', 'v_'])).toBe(0);
    });

    it('should read tables from --schema-dir', async () => {
      writeSchema(path.join(testDir, 'rules'), { '*': {} }, [{ id: 'volume', type: 'MATRIX' }]);

      expect(await new CLI().run(['check', 'volume * 2', '--schema-dir', 'rules', '--no-color'])).toBe(0);
      expect(await new CLI().run(['check', 'close - open', '--schema-dir', 'rules', '--no-color'])).toBe(2);
    });

    it('should read individual tables from --operators and --datafields', async () => {
      const alt = path.join(testDir, 'alt');
      writeSchema(alt, { abs: { min_args: 1, max_args: 1 } }, [{ id: 'volume', type: 'MATRIX' }]);

      const exitCode = await new CLI().run([
        'check', 'abs(volume)',
        '--operators', path.join(alt, 'operators.json'),
        '--datafields', path.join(alt, 'datafields.json'),
        '--no-color'
      ]);

      expect(exitCode).toBe(0);
    });

    it('should exit 1 on a syntax error', async () => {
      const exitCode = await new CLI().run(['check', 'close +']);

      expect(exitCode).toBe(1);
      expect(capturedErrors).toHaveLength(1);
      expect(capturedErrors[0].startsWith('Error: Syntax error at line 1, column ')).toBe(true);
    });

    it('should exit 1 on an unsupported construct', async () => {
      const exitCode = await new CLI().run(['check', 'close.shift(1)']);

      expect(exitCode).toBe(1);
      expect(capturedErrors).toEqual([
        "Error: Unsupported construct at line 1, column 1: call on attribute access in 'close.shift(1)'"
      ]);
    });

    it('should exit 1 when the schema is missing', async () => {
      const exitCode = await new CLI().run(['check', 'close', '--schema-dir', 'missing']);

      expect(exitCode).toBe(1);
      expect(capturedErrors).toEqual([
        `Error: Invalid rule schema:\n  - ${path.join(testDir, 'missing', 'operators.json')}: file not found`
      ]);
    });

    it('should exit 1 when the schema is malformed', async () => {
      writeSchema(path.join(testDir, 'bad'), { f: { min_args: 3, max_args: 1 } }, [{ id: 'close', type: 'MATRIX' }]);

      const exitCode = await new CLI().run(['check', 'close', '--schema-dir', 'bad']);

      expect(exitCode).toBe(1);
      expect(capturedErrors).toEqual([
        'Error: Invalid rule schema:\n  - operators.f.max_args: max_args must be -1 (unbounded) or at least min_args'
      ]);
    });

    it('should require an expression', async () => {
      const exitCode = await new CLI().run(['check']);

      expect(exitCode).toBe(1);
      expect(capturedErrors).toEqual([
        'Error: check command requires an expression argument\nUsage: formula-gate check "<expression>"'
      ]);
    });
  });

  describe('extract', () => {
    it('should list operators and datafields without a schema', async () => {
      fs.rmSync(path.join(testDir, '.formula-gate'), { recursive: true, force: true });

      const exitCode = await new CLI().run(['extract', 'a = foo(x, k=1); a + y', '--no-color']);

      expect(exitCode).toBe(0);
      expect(capturedOutput.join('\n').split('\n')).toEqual([
        'Operators: foo, +',
        'Datafields: x, y',
        'Calls: 1',
        '  #0 foo at line 1, column 5 (1 positional, keywords: k)'
      ]);
    });

    it('should print JSON with --json', async () => {
      const exitCode = await new CLI().run(['extract', 'x + y', '--json']);

      expect(exitCode).toBe(0);
      const result = JSON.parse(capturedOutput.join('\n'));
      expect(result.operators).toEqual(['+']);
      expect(result.datafields).toEqual(['x', 'y']);
      expect(result.callSites).toEqual([]);
    });
  });

  describe('schema', () => {
    it('should list the loaded tables', async () => {
      const exitCode = await new CLI().run(['schema', '--no-color']);

      expect(exitCode).toBe(0);
      expect(capturedOutput.join('\n').split('\n')).toEqual([
        'Operators (6):',
        '  + args 0..*',
        '  - args 0..*',
        '  > args 0..*',
        '  ts_mean args 2..2',
        '  vec_sum args 1..1',
        '  v_sum args 1..1',
        'Datafields (3):',
        '  close MATRIX',
        '  open MATRIX',
        '  tgr_price VECTOR'
      ]);
    });

    it('should reject an expression argument', async () => {
      const exitCode = await new CLI().run(['schema', 'close']);

      expect(exitCode).toBe(1);
      expect(capturedErrors).toEqual(['Error: Unexpected argument: close']);
    });
  });

  describe('arguments', () => {
    it('should print the version', async () => {
      expect(await new CLI().run(['--version'])).toBe(0);
      expect(capturedOutput).toEqual(['formula-gate v1.0.0']);
    });

    it('should print usage for --help and exit 0', async () => {
      expect(await new CLI().run(['--help'])).toBe(0);
      expect(capturedOutput[0].startsWith('formula-gate - ')).toBe(true);
    });

    it('should print usage and exit 1 without arguments', async () => {
      expect(await new CLI().run([])).toBe(1);
      expect(capturedOutput).toHaveLength(1);
    });

    it('should reject an unknown command', async () => {
      expect(await new CLI().run(['frobnicate'])).toBe(1);
      expect(capturedErrors).toEqual(['Error: Unknown command: frobnicate']);
    });

    it('should reject an unknown flag', async () => {
      expect(await new CLI().run(['check', 'close', '--bogus'])).toBe(1);
      expect(capturedErrors).toEqual(['Error: Unknown flag: --bogus']);
    });

    it('should reject a flag without its value', async () => {
      expect(await new CLI().run(['check', 'close', '--schema-dir'])).toBe(1);
      expect(capturedErrors).toEqual(['Error: --schema-dir requires a value']);
    });
  });
});
