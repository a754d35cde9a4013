/**
 * Parser Extension: Script Parsing
 * Script, terms, and keyword application
 */

import { Parser } from './parser.js';
import type {
  ApplyNode,
  KeywordArgNode,
  ScriptNode,
  TermNode,
} from '../types.js';
import { createError, TOKEN_TYPES } from '../types.js';
import { isKeywordArg } from './helpers.js';
import {
  advance,
  check,
  current,
  enterNesting,
  exitNesting,
  isAtEnd,
  makeSpan,
} from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseScript(): ScriptNode;
    parseTerm(): TermNode;
    parseApply(): ApplyNode;
    parseKeywordArg(): KeywordArgNode;
  }
}

// ============================================================
// SCRIPT PARSING
// ============================================================

Parser.prototype.parseScript = function (this: Parser): ScriptNode {
  const start = current(this.state).span.start;

  if (isAtEnd(this.state)) {
    throw createError(
      'RBW-P002',
      { expected: 'a term' },
      current(this.state).span.start,
      ['a term']
    );
  }

  const terms: TermNode[] = [];
  while (!isAtEnd(this.state)) {
    terms.push(this.parseTerm());
  }

  const last = terms[terms.length - 1];
  return {
    type: 'Script',
    terms,
    span: makeSpan(start, last ? last.span.end : start),
  };
};

// ============================================================
// TERMS
// ============================================================

/**
 * term = apply | value | block
 *
 * Every term counts one nesting level; exceeding maxDepth raises RBW-P004.
 */
Parser.prototype.parseTerm = function (this: Parser): TermNode {
  enterNesting(this.state);
  try {
    if (isKeywordArg(this.state)) {
      return this.parseApply();
    }
    if (check(this.state, TOKEN_TYPES.LBRACE)) {
      return this.parseBlock();
    }
    return this.parseValue();
  } finally {
    exitNesting(this.state);
  }
};

// ============================================================
// KEYWORD APPLICATION
// ============================================================

/**
 * apply = ident ":" term (ident ":" term)*
 *
 * Greedy: a nested apply in argument position consumes every following
 * keyword pair, so `a: b: 1 c: 2` reads as `a: (b: 1 c: 2)`.
 */
Parser.prototype.parseApply = function (this: Parser): ApplyNode {
  const start = current(this.state).span.start;
  const args: KeywordArgNode[] = [];

  while (isKeywordArg(this.state)) {
    args.push(this.parseKeywordArg());
  }

  const last = args[args.length - 1];
  return {
    type: 'Apply',
    args,
    span: makeSpan(start, last ? last.span.end : start),
  };
};

Parser.prototype.parseKeywordArg = function (this: Parser): KeywordArgNode {
  const keyword = advance(this.state);
  advance(this.state); // consume :
  const value = this.parseTerm();
  return {
    type: 'KeywordArg',
    keyword: keyword.value,
    value,
    span: makeSpan(keyword.span.start, value.span.end),
  };
};
