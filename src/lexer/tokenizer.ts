/**
 * Tokenizer
 * Main tokenization logic
 */

import type { Token } from '../types.js';
import { createError, TOKEN_TYPES } from '../types.js';
import {
  advanceAndMakeToken,
  isDigit,
  isIdentifierStart,
  isWhitespace,
  makeToken,
} from './helpers.js';
import {
  SINGLE_CHAR_OPERATORS,
  THREE_CHAR_OPERATORS,
  TWO_CHAR_OPERATORS,
} from './operators.js';
import { readIdentifier, readNumber, readString } from './readers.js';
import {
  advance,
  createLexerState,
  currentLocation,
  isAtEnd,
  type LexerState,
  peek,
} from './state.js';

function skipWhitespace(state: LexerState): void {
  while (!isAtEnd(state) && isWhitespace(peek(state))) {
    advance(state);
  }
}

function peekString(state: LexerState, length: number): string {
  return state.source.slice(state.pos, state.pos + length);
}

export function nextToken(state: LexerState): Token {
  skipWhitespace(state);

  if (isAtEnd(state)) {
    const loc = currentLocation(state);
    return makeToken(TOKEN_TYPES.EOF, '', loc, loc);
  }

  const start = currentLocation(state);
  const ch = peek(state);

  // String
  if (ch === '"') {
    return readString(state);
  }

  // Number (leading minus belongs to the literal)
  if (isDigit(ch) || (ch === '-' && isDigit(peek(state, 1)))) {
    return readNumber(state);
  }

  // Identifier or keyword
  if (isIdentifierStart(ch)) {
    return readIdentifier(state);
  }

  const threeChar = peekString(state, 3);
  const threeCharType = Object.hasOwn(THREE_CHAR_OPERATORS, threeChar)
    ? THREE_CHAR_OPERATORS[threeChar]
    : undefined;
  if (threeCharType) {
    return advanceAndMakeToken(state, 3, threeCharType, threeChar, start);
  }

  const twoChar = peekString(state, 2);
  const twoCharType = Object.hasOwn(TWO_CHAR_OPERATORS, twoChar)
    ? TWO_CHAR_OPERATORS[twoChar]
    : undefined;
  if (twoCharType) {
    return advanceAndMakeToken(state, 2, twoCharType, twoChar, start);
  }

  const singleCharType = Object.hasOwn(SINGLE_CHAR_OPERATORS, ch)
    ? SINGLE_CHAR_OPERATORS[ch]
    : undefined;
  if (singleCharType) {
    return advanceAndMakeToken(state, 1, singleCharType, ch, start);
  }

  throw createError('RBW-L002', { char: JSON.stringify(ch) }, start);
}

export function tokenize(source: string): Token[] {
  const state = createLexerState(source);
  const tokens: Token[] = [];
  let token: Token;

  do {
    token = nextToken(state);
    tokens.push(token);
  } while (token.type !== TOKEN_TYPES.EOF);

  return tokens;
}
