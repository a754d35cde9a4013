/**
 * Operator and Keyword Tables
 */

import { TOKEN_TYPES, type TokenType } from '../types.js';

export const KEYWORDS: Readonly<Record<string, TokenType>> = {
  true: TOKEN_TYPES.TRUE,
  false: TOKEN_TYPES.FALSE,
};

export const THREE_CHAR_OPERATORS: Readonly<Record<string, TokenType>> = {
  '...': TOKEN_TYPES.ELLIPSIS,
};

export const TWO_CHAR_OPERATORS: Readonly<Record<string, TokenType>> = {
  '=>': TOKEN_TYPES.ARROW,
};

export const SINGLE_CHAR_OPERATORS: Readonly<Record<string, TokenType>> = {
  ':': TOKEN_TYPES.COLON,
  '.': TOKEN_TYPES.DOT,
  '=': TOKEN_TYPES.ASSIGN,
  '?': TOKEN_TYPES.QUESTION,
  '{': TOKEN_TYPES.LBRACE,
  '}': TOKEN_TYPES.RBRACE,
  '[': TOKEN_TYPES.LBRACKET,
  ']': TOKEN_TYPES.RBRACKET,
};
