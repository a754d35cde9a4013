/**
 * CLI Shared Utilities
 * Common formatting functions for CLI tools
 */

import { existsSync, readFileSync } from 'node:fs';
import type { RainbowError, SourceLocation } from './types.js';
import { LexerError, ParseError, TypeCheckError } from './types.js';

/**
 * Read the package version from package.json
 *
 * @returns Version string, or "0.0.0" if it cannot be determined
 */
export function readVersion(): string {
  const packageJson = new URL('../package.json', import.meta.url);
  if (!existsSync(packageJson)) return '0.0.0';
  const data: unknown = JSON.parse(readFileSync(packageJson, 'utf-8'));
  if (typeof data === 'object' && data !== null && 'version' in data) {
    const { version } = data;
    if (typeof version === 'string') return version;
  }
  return '0.0.0';
}

/** Error message without the trailing " at line:col" */
export function stripLocation(err: RainbowError): string {
  return err.toData().message;
}

/**
 * Format error for stderr output
 *
 * @param err - The error to format
 * @returns Formatted error message
 */
export function formatError(err: Error): string {
  if (err instanceof LexerError) {
    return `Lexer error at line ${err.location.line}: ${stripLocation(err)}`;
  }
  if (err instanceof ParseError) {
    return `Parse error at line ${err.location.line}: ${stripLocation(err)}`;
  }
  if (err instanceof TypeCheckError) {
    return `Type error at line ${err.location.line}: ${stripLocation(err)}`;
  }

  // Handle file not found errors (ENOENT)
  if ('code' in err && err.code === 'ENOENT' && 'path' in err) {
    return `File not found: ${String(err.path)}`;
  }

  return err.message;
}

/** Location used when an error carries none */
export const START_OF_FILE: SourceLocation = { line: 1, column: 1, offset: 0 };
