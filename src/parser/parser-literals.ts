/**
 * Parser Extension: Literal Parsing
 * Scalars, variables, lists, records, and blocks
 */

import { Parser } from './parser.js';
import type {
  BlockNode,
  ListNode,
  RecordEntryNode,
  RecordNode,
  SourceLocation,
  TermNode,
  ValueNode,
  VariableNode,
} from '../types.js';
import { createError, TOKEN_TYPES } from '../types.js';
import { classifyBracket, isBlockParams } from './helpers.js';
import {
  advance,
  check,
  current,
  describeToken,
  expect,
  isAtEnd,
  makeSpan,
} from './state.js';

declare module './parser.js' {
  interface Parser {
    parseValue(): ValueNode;
    parseVariable(): VariableNode;
    parseBracket(): ListNode | RecordNode;
    parseListElements(start: SourceLocation): ListNode;
    parseRecordEntries(start: SourceLocation): RecordNode;
    parseBlock(): BlockNode;
  }
}

// ============================================================
// VALUES
// ============================================================

Parser.prototype.parseValue = function (this: Parser): ValueNode {
  const token = current(this.state);

  switch (token.type) {
    case TOKEN_TYPES.TRUE:
    case TOKEN_TYPES.FALSE:
      advance(this.state);
      return {
        type: 'BoolLiteral',
        value: token.type === TOKEN_TYPES.TRUE,
        span: token.span,
      };

    case TOKEN_TYPES.STRING:
      advance(this.state);
      return { type: 'StringLiteral', value: token.value, span: token.span };

    case TOKEN_TYPES.NUMBER:
      advance(this.state);
      return {
        type: 'NumberLiteral',
        value: Number(token.value),
        raw: token.value,
        span: token.span,
      };

    case TOKEN_TYPES.IDENTIFIER:
      return this.parseVariable();

    case TOKEN_TYPES.LBRACKET:
      return this.parseBracket();

    case TOKEN_TYPES.EOF:
      throw createError('RBW-P002', { expected: 'a term' }, token.span.start, [
        'a term',
      ]);

    default:
      throw createError(
        'RBW-P001',
        { token: describeToken(token) },
        token.span.start,
        ['a term']
      );
  }
};

/** variable = ident ("." ident)* */
Parser.prototype.parseVariable = function (this: Parser): VariableNode {
  const first = advance(this.state);
  const path = [first.value];
  let end = first.span.end;

  while (check(this.state, TOKEN_TYPES.DOT)) {
    advance(this.state); // consume .
    const segment = expect(this.state, TOKEN_TYPES.IDENTIFIER, 'field name');
    path.push(segment.value);
    end = segment.span.end;
  }

  return { type: 'Variable', path, span: makeSpan(first.span.start, end) };
};

// ============================================================
// LISTS AND RECORDS
// ============================================================

Parser.prototype.parseBracket = function (this: Parser): ListNode | RecordNode {
  const start = advance(this.state).span.start; // consume [

  switch (classifyBracket(this.state)) {
    case 'empty-list': {
      const close = advance(this.state);
      return { type: 'List', elements: [], span: makeSpan(start, close.span.end) };
    }
    case 'empty-record': {
      advance(this.state); // consume =
      const close = advance(this.state);
      return { type: 'Record', entries: [], span: makeSpan(start, close.span.end) };
    }
    case 'record':
      return this.parseRecordEntries(start);
    case 'list':
      return this.parseListElements(start);
  }
};

/** list = "[" term term* "]" */
Parser.prototype.parseListElements = function (
  this: Parser,
  start: SourceLocation
): ListNode {
  const elements: TermNode[] = [];
  while (!check(this.state, TOKEN_TYPES.RBRACKET) && !isAtEnd(this.state)) {
    elements.push(this.parseTerm());
  }
  const close = expect(this.state, TOKEN_TYPES.RBRACKET, '"]"');
  return { type: 'List', elements, span: makeSpan(start, close.span.end) };
};

/** record = "[" entry entry* "]"; entry = ident "=" term */
Parser.prototype.parseRecordEntries = function (
  this: Parser,
  start: SourceLocation
): RecordNode {
  const entries: RecordEntryNode[] = [];
  const seen = new Set<string>();

  while (!check(this.state, TOKEN_TYPES.RBRACKET)) {
    const name = expect(this.state, TOKEN_TYPES.IDENTIFIER, 'field name or "]"');
    if (seen.has(name.value)) {
      throw createError(
        'RBW-P006',
        { what: 'field', name: name.value },
        name.span.start
      );
    }
    seen.add(name.value);
    expect(this.state, TOKEN_TYPES.ASSIGN, '"="');
    const value = this.parseTerm();
    entries.push({
      type: 'RecordEntry',
      name: name.value,
      value,
      span: makeSpan(name.span.start, value.span.end),
    });
  }

  const close = advance(this.state); // consume ]
  return { type: 'Record', entries, span: makeSpan(start, close.span.end) };
};

// ============================================================
// BLOCKS
// ============================================================

/** block = "{" (ident+ "=>")? term "}" */
Parser.prototype.parseBlock = function (this: Parser): BlockNode {
  const start = advance(this.state).span.start; // consume {
  const params: string[] = [];

  if (isBlockParams(this.state)) {
    while (check(this.state, TOKEN_TYPES.IDENTIFIER)) {
      const param = advance(this.state);
      if (params.includes(param.value)) {
        throw createError(
          'RBW-P006',
          { what: 'block parameter', name: param.value },
          param.span.start
        );
      }
      params.push(param.value);
    }
    advance(this.state); // consume =>
  }

  const body = this.parseTerm();
  const close = expect(this.state, TOKEN_TYPES.RBRACE, '"}"');
  return { type: 'Block', params, body, span: makeSpan(start, close.span.end) };
};
