/**
 * Parser Class - Core
 *
 * Defines the Parser class structure. Methods are added via prototype
 * extension from separate modules, using TypeScript declaration merging
 * for type safety.
 */

import type { ScriptNode, Token } from '../types.js';
import {
  type ParserState,
  type ParserStateOptions,
  createParserState,
} from './state.js';

/**
 * Parser class that converts tokens into an AST.
 *
 * Methods are organized across multiple files:
 * - parser-script.ts: Script, terms, keyword application
 * - parser-literals.ts: Literals, variables, lists, records, blocks
 *
 * @example
 * ```typescript
 * const parser = new Parser(tokens, { maxDepth: 64 });
 * const ast = parser.parse();
 * ```
 */
export class Parser {
  /** Parser state including tokens, position and nesting depth */
  state: ParserState;

  constructor(tokens: Token[], options?: ParserStateOptions) {
    this.state = createParserState(tokens, options);
  }

  /**
   * Parse tokens into a complete AST.
   * Throws ParseError on the first syntax error.
   */
  parse(): ScriptNode {
    return this.parseScript();
  }
}
