/**
 * Parser State
 * Core state management and token navigation utilities
 */

import type { SourceLocation, SourceSpan, Token } from '../types.js';
import { createError, TOKEN_TYPES } from '../types.js';

// ============================================================
// PARSER STATE
// ============================================================

/** Nesting limit applied when no maxDepth option is given */
export const DEFAULT_MAX_DEPTH = 256;

export interface ParserState {
  readonly tokens: Token[];
  pos: number;
  /** Current term nesting depth */
  depth: number;
  readonly maxDepth: number;
}

export interface ParserStateOptions {
  /** Maximum term nesting depth before RBW-P004 */
  maxDepth?: number | undefined;
}

export function createParserState(
  tokens: Token[],
  options: ParserStateOptions = {}
): ParserState {
  return {
    tokens,
    pos: 0,
    depth: 0,
    maxDepth: options.maxDepth ?? DEFAULT_MAX_DEPTH,
  };
}

// ============================================================
// TOKEN NAVIGATION
// ============================================================

/** @internal */
export function current(state: ParserState): Token {
  return peek(state, 0);
}

/** @internal */
export function peek(state: ParserState, offset = 0): Token {
  const token = state.tokens[state.pos + offset];
  if (token) return token;
  const last = state.tokens[state.tokens.length - 1];
  if (last) return last;
  throw new Error('No tokens available');
}

/** @internal */
export function isAtEnd(state: ParserState): boolean {
  return current(state).type === TOKEN_TYPES.EOF;
}

/** @internal */
export function check(state: ParserState, ...types: string[]): boolean {
  return types.includes(current(state).type);
}

/** @internal */
export function advance(state: ParserState): Token {
  const token = current(state);
  if (!isAtEnd(state)) state.pos++;
  return token;
}

/**
 * Consume a token of the given type or throw.
 * End of input raises RBW-P002, any other token RBW-P005.
 * @internal
 */
export function expect(
  state: ParserState,
  type: string,
  expected: string
): Token {
  if (check(state, type)) return advance(state);
  const token = current(state);
  if (token.type === TOKEN_TYPES.EOF) {
    throw createError('RBW-P002', { expected }, token.span.start, [expected]);
  }
  throw createError(
    'RBW-P005',
    { expected, found: describeToken(token) },
    token.span.start,
    [expected]
  );
}

// ============================================================
// NESTING
// ============================================================

/**
 * Track one more level of term nesting.
 * @internal
 */
export function enterNesting(state: ParserState): void {
  state.depth++;
  if (state.depth > state.maxDepth) {
    throw createError(
      'RBW-P004',
      { maxDepth: state.maxDepth },
      current(state).span.start
    );
  }
}

/** @internal */
export function exitNesting(state: ParserState): void {
  state.depth--;
}

// ============================================================
// SPAN UTILITIES
// ============================================================

/** @internal */
export function makeSpan(
  start: SourceLocation,
  end: SourceLocation
): SourceSpan {
  return { start, end };
}

/**
 * Human-readable token description for error messages.
 * @internal
 */
export function describeToken(token: Token): string {
  switch (token.type) {
    case TOKEN_TYPES.EOF:
      return 'end of input';
    case TOKEN_TYPES.STRING:
      return `string ${JSON.stringify(token.value)}`;
    case TOKEN_TYPES.NUMBER:
      return `number ${token.value}`;
    default:
      return `"${token.value}"`;
  }
}
