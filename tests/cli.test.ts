/**
 * CLI Tests
 *
 * Drives the commander program in process and checks what it prints.
 */

import { describe, it, expect, beforeAll, afterAll, vi } from 'vitest';
import { CommanderError } from 'commander';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { createProgram, VERSION } from '../src/program.js';

const TEMP_DIR = path.join(os.tmpdir(), 'abbrev-pairs-cli-tests');

interface RunResult {
  logs: string[];
  stdout: string;
  stderr: string;
  error: CommanderError | null;
}

function runCLI(args: string[]): RunResult {
  const program = createProgram();
  const stdout: string[] = [];
  const stderr: string[] = [];
  for (const command of [program, ...program.commands]) {
    command.exitOverride().configureOutput({
      writeOut: str => stdout.push(str),
      writeErr: str => stderr.push(str),
    });
  }

  const log = vi.spyOn(console, 'log').mockImplementation(() => {});
  let logs: string[] = [];
  let error: CommanderError | null = null;
  try {
    program.parse(args, { from: 'user' });
  } catch (err) {
    if (!(err instanceof CommanderError)) throw err;
    error = err;
  } finally {
    logs = log.mock.calls.map(call => call.join(' '));
    log.mockRestore();
  }

  return {
    logs,
    stdout: stdout.join(''),
    stderr: stderr.join(''),
    error,
  };
}

describe('CLI', () => {
  beforeAll(() => {
    fs.mkdirSync(TEMP_DIR, { recursive: true });
  });

  afterAll(() => {
    fs.rmSync(TEMP_DIR, { recursive: true, force: true });
  });

  // ============================================================================
  // HELP & VERSION
  // ============================================================================

  describe('help and version', () => {
    it('shows version with --version', () => {
      const result = runCLI(['--version']);
      expect(result.stdout).toBe(`${VERSION}\n`);
      expect(result.error?.code).toBe('commander.version');
    });

    it('shows command-specific help', () => {
      const result = runCLI(['extract', '--help']);
      expect(result.stdout).toContain('Extract abbreviation/definition pairs');
      expect(result.stdout).toContain('--format');
      expect(result.stdout).toContain('--offsets');
    });
  });

  // ============================================================================
  // EXTRACT COMMAND
  // ============================================================================

  describe('extract command', () => {
    it('prints pairs as JSON', () => {
      const result = runCLI(['extract', '--text', 'World Health Organization (WHO)', '--quiet']);
      expect(result.error).toBeNull();
      expect(result.logs).toEqual([JSON.stringify({ WHO: 'World Health Organization' }, null, 2)]);
    });

    it('prints pairs as TSV with offsets', () => {
      const result = runCLI([
        'extract',
        '--text',
        'World Health Organization (WHO)',
        '--format',
        'tsv',
        '--offsets',
        '--quiet',
      ]);
      expect(result.logs).toEqual(['WHO\tWorld Health Organization\t0\t27\t30\t0\t25']);
    });

    it('prints pairs as a table', () => {
      const result = runCLI(['extract', '-t', 'World Health Organization (WHO)', '-f', 'table', '-q']);
      expect(result.logs).toEqual([
        [
          'Abbreviation | Definition',
          '-------------------------',
          'WHO          | World Health Organization',
        ].join('\n'),
      ]);
    });

    it('includes spans in JSON with --offsets', () => {
      const result = runCLI(['extract', '-t', 'World Health Organization (WHO)', '--offsets', '-q']);
      expect(JSON.parse(result.logs[0])).toEqual({
        WHO: {
          abbreviation: { value: 'WHO', start: 27, stop: 30 },
          definition: { value: 'World Health Organization', start: 0, stop: 25 },
          line: 0,
        },
      });
    });

    it('reads files and writes the output file', () => {
      const input = path.join(TEMP_DIR, 'input.txt');
      const output = path.join(TEMP_DIR, 'output.json');
      fs.writeFileSync(input, 'World Health Organization (WHO)\nInterleukin 2 (IL-2)\n');

      const result = runCLI(['extract', input, '--output', output, '--quiet']);
      expect(result.error).toBeNull();
      expect(JSON.parse(fs.readFileSync(output, 'utf-8'))).toEqual({
        'IL-2': 'Interleukin 2',
        WHO: 'World Health Organization',
      });
    });

    it('fails without files or text', () => {
      const result = runCLI(['extract', '--quiet']);
      expect(result.error?.exitCode).toBe(1);
      expect(result.stderr).toContain('give at least one file or --text');
    });

    it('fails for a missing file', () => {
      const result = runCLI(['extract', path.join(TEMP_DIR, 'missing.txt'), '--quiet']);
      expect(result.error?.exitCode).toBe(1);
      expect(result.stderr).toContain('ENOENT');
    });

    it('rejects unknown formats', () => {
      const result = runCLI(['extract', '-t', 'x', '-f', 'xml', '-q']);
      expect(result.error?.code).toBe('commander.invalidArgument');
    });
  });

  // ============================================================================
  // EXPLAIN COMMAND
  // ============================================================================

  describe('explain command', () => {
    it('shows kept and omitted candidates', () => {
      const result = runCLI(['explain', 'World Health Organization (WHO) and the xyz (ABC)']);
      expect(result.logs).toContain('  Candidate "WHO" [27, 30)');
      expect(result.logs).toContain('    Kept:    "World Health Organization" [0, 25)');
      expect(result.logs).toContain('    Window:  "and the xyz" [32, 43)');
      expect(result.logs).toContain(
        '    Omitted: alignment-out-of-bounds (Alignment of ABC ran past the start of and the xyz)'
      );
      expect(result.logs).toContain('Kept: 1, omitted: 1');
    });

    it('shows why a line was skipped', () => {
      const result = runCLI(['explain', 'bad ( line']);
      expect(result.logs).toContain('Line skipped: unbalanced-parentheses (Unbalanced parentheses: bad ( line)');
    });
  });
});
