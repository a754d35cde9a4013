/**
 * Parser Helpers
 * Lookahead predicates
 * @internal This module contains internal parser utilities
 */

import { TOKEN_TYPES } from '../types.js';
import { type ParserState, check, peek } from './state.js';

// ============================================================
// LOOKAHEAD PREDICATES
// ============================================================

/**
 * Check for keyword argument: identifier:
 * @internal
 */
export function isKeywordArg(state: ParserState): boolean {
  return (
    check(state, TOKEN_TYPES.IDENTIFIER) &&
    peek(state, 1).type === TOKEN_TYPES.COLON
  );
}

/**
 * Check for block parameter list after `{`: IDENT+ =>
 * @internal
 */
export function isBlockParams(state: ParserState): boolean {
  let offset = 0;
  while (peek(state, offset).type === TOKEN_TYPES.IDENTIFIER) {
    offset++;
  }
  return offset > 0 && peek(state, offset).type === TOKEN_TYPES.ARROW;
}

/** What an opening `[` introduces */
export type BracketKind = 'empty-list' | 'empty-record' | 'record' | 'list';

/**
 * Classify the bracket form after `[` has been consumed.
 * - `]` empty list
 * - `= ]` empty record
 * - `IDENT =` record
 * - anything else is a list
 * @internal
 */
export function classifyBracket(state: ParserState): BracketKind {
  if (check(state, TOKEN_TYPES.RBRACKET)) return 'empty-list';
  if (
    check(state, TOKEN_TYPES.ASSIGN) &&
    peek(state, 1).type === TOKEN_TYPES.RBRACKET
  ) {
    return 'empty-record';
  }
  if (
    check(state, TOKEN_TYPES.IDENTIFIER) &&
    peek(state, 1).type === TOKEN_TYPES.ASSIGN
  ) {
    return 'record';
  }
  return 'list';
}
