/**
 * Tests for the rainbow-check CLI
 *
 * Argument parsing, exit codes, and text and JSON output.
 */

import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  executeCheck,
  HELP_TEXT,
  parseCheckArgs,
} from '../../src/cli-check.js';
import { CONFIG_FILE_NAME } from '../../src/cli-config.js';

const DIVIDE_CONFIG = [
  'functions:',
  '  divide:',
  '    params:',
  '      - { name: divide, type: number }',
  '      - { name: by, type: number }',
  '    returns: number',
  '    partial: true',
  '  fetch:',
  '    params:',
  '      - { name: fetch, type: string }',
  '    returns: string',
  '    partial: true',
  '    effects: [Network]',
].join('\n');

describe('parseCheckArgs', () => {
  it('returns help mode for -h and --help', () => {
    expect(parseCheckArgs(['-h'])).toEqual({ mode: 'help' });
    expect(parseCheckArgs(['script.rbw', '--help'])).toEqual({ mode: 'help' });
  });

  it('returns version mode for -v and --version', () => {
    expect(parseCheckArgs(['--version'])).toEqual({ mode: 'version' });
  });

  it('reads the file and options', () => {
    expect(
      parseCheckArgs(['--prelude', 'script.rbw', '--format', 'json', '--config', 'c.yaml'])
    ).toEqual({
      mode: 'check',
      file: 'script.rbw',
      config: 'c.yaml',
      prelude: true,
      format: 'json',
    });
  });

  it('defaults to text output without the prelude', () => {
    expect(parseCheckArgs(['script.rbw'])).toEqual({
      mode: 'check',
      file: 'script.rbw',
      config: undefined,
      prelude: false,
      format: 'text',
    });
  });

  it('rejects unknown options', () => {
    expect(() => parseCheckArgs(['--fix', 'script.rbw'])).toThrow(
      'Unknown option: --fix'
    );
  });

  it('rejects an invalid format', () => {
    expect(() => parseCheckArgs(['--format', 'xml', 'script.rbw'])).toThrow(
      'Invalid format: xml. Expected text or json'
    );
  });

  it('requires a file', () => {
    expect(() => parseCheckArgs(['--prelude'])).toThrow('Missing file argument');
  });

  it('requires a value after --config', () => {
    expect(() => parseCheckArgs(['script.rbw', '--config'])).toThrow(
      '--config requires a path argument'
    );
  });
});

describe('executeCheck', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'rainbow-check-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function write(name: string, content: string): void {
    writeFileSync(join(dir, name), content);
  }

  it('prints the type and effects of a valid script', () => {
    write(CONFIG_FILE_NAME, DIVIDE_CONFIG);
    write('ok.rbw', 'try: { divide: 10 by: 0 } or: { 0 }');
    expect(executeCheck(['ok.rbw'], dir)).toEqual({
      exitCode: 0,
      stdout: 'OK: number\nEffects: none',
      stderr: '',
    });
  });

  it('lists effects', () => {
    write(CONFIG_FILE_NAME, DIVIDE_CONFIG);
    write('net.rbw', 'try: { fetch: "http://x" } or: { "" }');
    expect(executeCheck(['net.rbw'], dir).stdout).toBe(
      'OK: string\nEffects: Network'
    );
  });

  it('reports type errors with exit code 1', () => {
    write('bad.rbw', 'upperCase: 1');
    expect(executeCheck(['--prelude', 'bad.rbw'], dir)).toEqual({
      exitCode: 1,
      stdout: 'bad.rbw:1:12: error: Expected string, found number (RBW-T006)',
      stderr: '',
    });
  });

  it('reports unguarded partial calls', () => {
    write(CONFIG_FILE_NAME, DIVIDE_CONFIG);
    write('partial.rbw', 'divide: 10 by: 0');
    const result = executeCheck(['partial.rbw'], dir);
    expect(result.exitCode).toBe(1);
    expect(result.stdout).toBe(
      'partial.rbw:1:1: error: Partial function divide must be the body of a try: block with an or: fallback (RBW-T008)'
    );
  });

  it('reports syntax errors with exit code 3', () => {
    write('syntax.rbw', '{');
    expect(executeCheck(['syntax.rbw'], dir)).toEqual({
      exitCode: 3,
      stdout:
        'syntax.rbw:1:2: error: Unexpected end of input, expected a term (RBW-P002)',
      stderr: '',
    });
  });

  it('applies maxDepth from the configuration', () => {
    write(CONFIG_FILE_NAME, 'maxDepth: 3');
    write('deep.rbw', '[ [ [ 1 ] ] ]');
    expect(executeCheck(['deep.rbw'], dir).exitCode).toBe(3);
  });

  it('writes JSON diagnostics', () => {
    write('bad.rbw', 'upperCase: 1');
    const result = executeCheck(['bad.rbw', '--prelude', '--format', 'json'], dir);
    expect(JSON.parse(result.stdout)).toEqual({
      file: 'bad.rbw',
      success: false,
      type: null,
      effects: [],
      errors: [
        {
          location: { line: 1, column: 12, offset: 11 },
          severity: 'error',
          code: 'RBW-T006',
          message: 'Expected string, found number',
          context: 'upperCase: 1',
        },
      ],
      summary: { total: 1 },
    });
  });

  it('writes JSON for a valid script', () => {
    write('ok.rbw', 'sum: [ 1 2 ]');
    const result = executeCheck(['--format', 'json', '--prelude', 'ok.rbw'], dir);
    expect(JSON.parse(result.stdout)).toMatchObject({
      success: true,
      type: 'number',
      effects: [],
      summary: { total: 0 },
    });
  });

  it('reads an explicit configuration file', () => {
    mkdirSync(join(dir, 'conf'));
    write(join('conf', 'custom.yaml'), DIVIDE_CONFIG);
    write('ok.rbw', 'try: { divide: 1 by: 2 } or: { 0 }');
    expect(executeCheck(['--config', 'conf/custom.yaml', 'ok.rbw'], dir).exitCode).toBe(
      0
    );
  });

  it('fails with exit code 2 for a missing file', () => {
    expect(executeCheck(['missing.rbw'], dir)).toEqual({
      exitCode: 2,
      stdout: '',
      stderr: 'Error: File not found: missing.rbw',
    });
  });

  it('fails with exit code 2 for a directory', () => {
    mkdirSync(join(dir, 'scripts'));
    expect(executeCheck(['scripts'], dir)).toEqual({
      exitCode: 2,
      stdout: '',
      stderr: 'Error: Path is a directory: scripts',
    });
  });

  it('fails with exit code 2 for an invalid configuration', () => {
    write(CONFIG_FILE_NAME, 'bogus: 1');
    write('ok.rbw', '1');
    expect(executeCheck(['ok.rbw'], dir)).toEqual({
      exitCode: 2,
      stdout: '',
      stderr: `Error: Invalid configuration in ${join(dir, CONFIG_FILE_NAME)}: unknown key bogus`,
    });
  });

  it('fails with exit code 1 for usage errors', () => {
    expect(executeCheck([], dir)).toEqual({
      exitCode: 1,
      stdout: '',
      stderr: 'Error: Missing file argument',
    });
  });

  it('prints help and version', () => {
    expect(executeCheck(['--help'], dir)).toEqual({
      exitCode: 0,
      stdout: HELP_TEXT,
      stderr: '',
    });
    expect(executeCheck(['-v'], dir).stdout).toBe('0.1.0');
  });
});
