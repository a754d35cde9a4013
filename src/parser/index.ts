/**
 * Rainbow Parser
 * Main entry point and re-exports
 */

import { tokenize } from '../lexer/index.js';
import type { ScriptNode } from '../types.js';
import { Parser } from './parser.js';
import type { ParserStateOptions } from './state.js';

// Import extension modules to register prototype methods on Parser.
// These must be imported AFTER parser.js to ensure the class is defined.
import './parser-script.js';
import './parser-literals.js';

// ============================================================
// MAIN ENTRY POINT
// ============================================================

export type ParseOptions = ParserStateOptions;

/**
 * Parse Rainbow source code into an AST.
 *
 * Throws LexerError or ParseError on the first syntax error.
 *
 * @example
 * ```typescript
 * const ast = parse('divide: 10 by: 2');
 * ```
 */
export function parse(source: string, options: ParseOptions = {}): ScriptNode {
  const tokens = tokenize(source);
  const parser = new Parser(tokens, options);
  return parser.parse();
}

// ============================================================
// RE-EXPORTS
// ============================================================

export {
  createParserState,
  DEFAULT_MAX_DEPTH,
  type ParserState,
  type ParserStateOptions,
} from './state.js';
export { Parser } from './parser.js';
export { printScript, printTerm } from './printer.js';
