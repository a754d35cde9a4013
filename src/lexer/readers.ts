/**
 * Token Readers
 * Functions to read specific token types from source
 */

import type { SourceLocation, Token } from '../types.js';
import { createError, TOKEN_TYPES } from '../types.js';
import { isDigit, isIdentifierChar, makeToken } from './helpers.js';
import { KEYWORDS } from './operators.js';
import {
  advance,
  currentLocation,
  isAtEnd,
  type LexerState,
  peek,
} from './state.js';

/** Process escape sequence and return the unescaped character */
function processEscape(state: LexerState): string {
  const location = currentLocation(state);
  const escaped = advance(state);
  switch (escaped) {
    case 'n':
      return '\n';
    case 'r':
      return '\r';
    case 't':
      return '\t';
    case '\\':
      return '\\';
    case '/':
      return '/';
    case '"':
      return '"';
    default:
      throw createError('RBW-L004', { char: escaped }, location);
  }
}

export function readString(state: LexerState): Token {
  const start = currentLocation(state);
  advance(state); // consume opening "

  let value = '';
  while (!isAtEnd(state) && peek(state) !== '"') {
    if (peek(state) === '\\') {
      advance(state); // consume backslash
      if (isAtEnd(state)) break;
      value += processEscape(state);
    } else {
      value += advance(state);
    }
  }

  if (isAtEnd(state)) {
    throw createError('RBW-L001', {}, start);
  }
  advance(state); // consume closing "

  return makeToken(TOKEN_TYPES.STRING, value, start, currentLocation(state));
}

function readDigits(state: LexerState): string {
  let digits = '';
  while (!isAtEnd(state) && isDigit(peek(state))) {
    digits += advance(state);
  }
  return digits;
}

function readExponent(
  state: LexerState,
  start: SourceLocation,
  prefix: string
): string {
  let value = advance(state); // consume e/E
  if (peek(state) === '+' || peek(state) === '-') {
    value += advance(state);
  }
  const digits = readDigits(state);
  if (digits === '') {
    throw createError('RBW-L003', { value: prefix + value }, start);
  }
  return value + digits;
}

/** Reads `-?int(.digits exp? | exp)?` */
export function readNumber(state: LexerState): Token {
  const start = currentLocation(state);
  let value = '';

  if (peek(state) === '-') {
    value += advance(state);
  }
  value += readDigits(state);

  if (peek(state) === '.' && peek(state, 1) !== '.') {
    value += advance(state); // consume .
    const fraction = readDigits(state);
    if (fraction === '') {
      throw createError('RBW-L003', { value }, start);
    }
    value += fraction;
  }

  if (peek(state) === 'e' || peek(state) === 'E') {
    value += readExponent(state, start, value);
  }

  if (isIdentifierChar(peek(state))) {
    throw createError('RBW-L003', { value: value + peek(state) }, start);
  }

  return makeToken(TOKEN_TYPES.NUMBER, value, start, currentLocation(state));
}

export function readIdentifier(state: LexerState): Token {
  const start = currentLocation(state);
  let value = '';

  while (!isAtEnd(state) && isIdentifierChar(peek(state))) {
    value += advance(state);
  }

  const type = Object.hasOwn(KEYWORDS, value)
    ? KEYWORDS[value]
    : TOKEN_TYPES.IDENTIFIER;
  return makeToken(type, value, start, currentLocation(state));
}
