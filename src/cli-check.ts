#!/usr/bin/env node
/**
 * CLI Check Entry Point
 *
 * Implements argument parsing and output for rainbow-check.
 * Type checks a Rainbow script against configured host signatures.
 */

import { existsSync, readFileSync, statSync } from 'node:fs';
import { resolve } from 'node:path';
import {
  createDefaultConfig,
  createSignatureTable,
  findConfig,
  loadConfigFile,
  type RainbowConfig,
} from './cli-config.js';
import {
  formatError,
  readVersion,
  START_OF_FILE,
  stripLocation,
} from './cli-shared.js';
import {
  ConfigurationError,
  LexerError,
  ParseError,
  type RainbowError,
  type SourceLocation,
} from './types.js';
import { checkScript, formatType, type CheckResult } from './typing/index.js';

/**
 * Parsed command-line arguments for rainbow-check
 */
export type ParsedCheckArgs =
  | {
      mode: 'check';
      file: string;
      config: string | undefined;
      prelude: boolean;
      format: 'text' | 'json';
    }
  | { mode: 'help' }
  | { mode: 'version' };

/** Everything a run of rainbow-check prints, and its exit code */
export interface CheckOutcome {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export const HELP_TEXT = `rainbow-check - Type check Rainbow scripts

Usage: rainbow-check [options] <file>

Options:
  --config <path>  Configuration file (default: ./rainbow.config.yaml)
  --prelude        Install the standard prelude functions
  --format <fmt>   Output format: text (default) or json
  -h, --help       Show this help message
  -v, --version    Show version number`;

/** Options followed by a value */
const VALUE_FLAGS = new Set(['--format', '--config']);

/**
 * Parse command-line arguments for rainbow-check
 *
 * @param argv - Raw command-line arguments (typically process.argv.slice(2))
 * @returns Parsed command object
 */
export function parseCheckArgs(argv: string[]): ParsedCheckArgs {
  if (argv.includes('--help') || argv.includes('-h')) {
    return { mode: 'help' };
  }
  if (argv.includes('--version') || argv.includes('-v')) {
    return { mode: 'version' };
  }

  let format: 'text' | 'json' = 'text';
  let config: string | undefined;
  let prelude = false;
  let file: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === undefined) continue;

    if (VALUE_FLAGS.has(arg)) {
      const value = argv[i + 1];
      if (value === undefined || value.startsWith('-')) {
        throw new Error(
          arg === '--format'
            ? '--format requires argument: text or json'
            : `${arg} requires a path argument`
        );
      }
      if (arg === '--format') {
        if (value !== 'text' && value !== 'json') {
          throw new Error(`Invalid format: ${value}. Expected text or json`);
        }
        format = value;
      } else {
        config = value;
      }
      i++;
      continue;
    }

    if (arg === '--prelude') {
      prelude = true;
      continue;
    }

    if (arg.startsWith('-')) {
      throw new Error(`Unknown option: ${arg}`);
    }

    // First non-flag argument is the file
    file ??= arg;
  }

  if (!file) {
    throw new Error('Missing file argument');
  }

  return { mode: 'check', file, config, prelude, format };
}

// ============================================================
// DIAGNOSTIC FORMATTING
// ============================================================

/** One reported problem, flattened for output */
export interface Diagnostic {
  readonly location: SourceLocation;
  readonly severity: 'error';
  /** Error ID, e.g. RBW-T006 */
  readonly code: string;
  readonly message: string;
  /** Source line containing the issue */
  readonly context: string;
}

export function toDiagnostic(error: RainbowError, source: string): Diagnostic {
  const location = error.location ?? START_OF_FILE;
  return {
    location,
    severity: 'error',
    code: error.errorId,
    message: stripLocation(error),
    context: source.split('\n')[location.line - 1]?.trim() ?? '',
  };
}

/**
 * Format a check result for output
 *
 * Text format: file:line:col: severity: message (code), or the script type
 * and effects on success.
 * JSON format: file, success, type, effects, errors and summary.
 */
export function formatCheckResult(
  file: string,
  result: CheckResult,
  source: string,
  format: 'text' | 'json'
): string {
  const diagnostics = result.success
    ? []
    : result.errors.map((error) => toDiagnostic(error, source));

  if (format === 'json') {
    return JSON.stringify(
      {
        file,
        success: result.success,
        type: result.success ? formatType(result.type) : null,
        effects: result.success ? [...result.effects] : [],
        errors: diagnostics,
        summary: { total: diagnostics.length },
      },
      null,
      2
    );
  }

  if (result.success) {
    const effects = [...result.effects];
    return `OK: ${formatType(result.type)}\nEffects: ${
      effects.length > 0 ? effects.join(', ') : 'none'
    }`;
  }

  return diagnostics
    .map((d) => {
      const { line, column } = d.location;
      return `${file}:${line}:${column}: ${d.severity}: ${d.message} (${d.code})`;
    })
    .join('\n');
}

// ============================================================
// EXECUTION
// ============================================================

function outcome(exitCode: number, stdout = '', stderr = ''): CheckOutcome {
  return { exitCode, stdout, stderr };
}

function loadConfiguration(
  cwd: string,
  configPath: string | undefined
): RainbowConfig {
  if (configPath !== undefined) {
    return loadConfigFile(resolve(cwd, configPath));
  }
  return findConfig(cwd) ?? createDefaultConfig();
}

/**
 * Run rainbow-check without touching the process.
 *
 * Exit codes: 0 success, 1 type errors or usage error, 2 file or
 * configuration problem, 3 lexer or parse error.
 */
export function executeCheck(argv: string[], cwd: string): CheckOutcome {
  let args: ParsedCheckArgs;
  try {
    args = parseCheckArgs(argv);
  } catch (err) {
    return outcome(1, '', `Error: ${err instanceof Error ? err.message : String(err)}`);
  }

  if (args.mode === 'help') return outcome(0, HELP_TEXT);
  if (args.mode === 'version') return outcome(0, readVersion());

  const path = resolve(cwd, args.file);
  if (!existsSync(path)) {
    return outcome(2, '', `Error: File not found: ${args.file}`);
  }
  if (statSync(path).isDirectory()) {
    return outcome(2, '', `Error: Path is a directory: ${args.file}`);
  }
  const source = readFileSync(path, 'utf-8');

  let result: CheckResult;
  try {
    const config = loadConfiguration(cwd, args.config);
    const table = createSignatureTable(config, { prelude: args.prelude });
    result = checkScript(source, table, {
      globals: config.globals,
      maxDepth: config.maxDepth,
    });
  } catch (err) {
    if (err instanceof ConfigurationError) {
      return outcome(2, '', `Error: ${stripLocation(err)}`);
    }
    throw err;
  }

  const output = formatCheckResult(args.file, result, source, args.format);
  if (result.success) return outcome(0, output);

  const [first] = result.errors;
  const syntaxError = first instanceof LexerError || first instanceof ParseError;
  return outcome(syntaxError ? 3 : 1, output);
}

// ============================================================
// MAIN ENTRY POINT
// ============================================================

/**
 * Main entry point for rainbow-check CLI.
 */
function main(): void {
  try {
    const result = executeCheck(process.argv.slice(2), process.cwd());
    if (result.stdout) console.log(result.stdout);
    if (result.stderr) console.error(result.stderr);
    process.exit(result.exitCode);
  } catch (err) {
    console.error(
      `Error: ${err instanceof Error ? formatError(err) : String(err)}`
    );
    process.exit(1);
  }
}

// Only run main if this is the entry point (not imported)
const shouldRunMain =
  process.env['NODE_ENV'] !== 'test' &&
  !process.env['VITEST'] &&
  !process.env['VITEST_WORKER_ID'];

if (shouldRunMain) {
  main();
}
