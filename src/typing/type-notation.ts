/**
 * Type Notation
 *
 * Text form of types, shared by error messages, host registration and
 * the CLI configuration file:
 *
 * ```
 * number | string | boolean | time      primitives
 * A, In, Out                            variables (uppercase initial)
 * [ T... ]                              list
 * [ name=T other?=U ]   [=]             record, empty record
 * { T }   { A B => C }                  block
 * ```
 */

import { tokenize } from '../lexer/index.js';
import type { SourceLocation, Token } from '../types.js';
import { createError, LexerError, ParseError, TOKEN_TYPES } from '../types.js';
import {
  blockOf,
  isPrimitiveName,
  listOf,
  primitive,
  typeVar,
  type FieldType,
  type ParamType,
  type Type,
} from './types.js';

// ============================================================
// FORMATTING
// ============================================================

export function formatType(type: Type): string {
  switch (type.kind) {
    case 'primitive':
      return type.name;
    case 'var':
      return type.name;
    case 'list':
      return `[ ${formatType(type.element)}... ]`;
    case 'record': {
      if (type.fields.size === 0) return '[=]';
      // required fields first, then by name
      const entries = [...type.fields.entries()].sort(([an, af], [bn, bf]) => {
        if (af.optional !== bf.optional) return af.optional ? 1 : -1;
        return an < bn ? -1 : an > bn ? 1 : 0;
      });
      const rendered = entries.map(
        ([name, field]) =>
          `${name}${field.optional ? '?' : ''}=${formatType(field.type)}`
      );
      return `[ ${rendered.join(' ')} ]`;
    }
    case 'block':
      if (type.inputs.length === 0) return `{ ${formatType(type.output)} }`;
      return `{ ${type.inputs.map(formatType).join(' ')} => ${formatType(type.output)} }`;
    case 'function': {
      const params = type.params.map(formatParam).join(' ');
      const partial = type.partial ? ' partial' : '';
      const effects =
        type.effects.size > 0 ? ` ! ${[...type.effects].sort().join(' ')}` : '';
      return `${params} => ${formatType(type.output)}${partial}${effects}`;
    }
  }
}

function formatParam(param: ParamType): string {
  const name = param.variadic ? `[${param.name}]` : param.name;
  const marker = param.optional ? '?' : '';
  return `${name}: ${marker}${formatType(param.type)}`;
}

// ============================================================
// PARSING
// ============================================================

interface NotationState {
  readonly text: string;
  readonly tokens: Token[];
  pos: number;
}

function fail(state: NotationState, reason: string, location?: SourceLocation): never {
  const at = location ?? currentToken(state).span.start;
  throw createError('RBW-P003', { text: state.text, reason }, at);
}

function currentToken(state: NotationState): Token {
  const token = state.tokens[state.pos] ?? state.tokens[state.tokens.length - 1];
  if (token === undefined) throw new Error('No tokens available');
  return token;
}

function peekType(state: NotationState, offset: number): string {
  return state.tokens[state.pos + offset]?.type ?? TOKEN_TYPES.EOF;
}

function accept(state: NotationState, type: string): boolean {
  if (currentToken(state).type !== type) return false;
  state.pos++;
  return true;
}

function expectToken(state: NotationState, type: string, what: string): void {
  if (!accept(state, type)) fail(state, `expected ${what}`);
}

/**
 * Read a type from its notation.
 *
 * @throws ParseError RBW-P003 when the notation is malformed
 *
 * @example
 * parseType('{ In => Out }')  // block type with one input
 * parseType('[ name=string age?=number ]')
 */
export function parseType(text: string): Type {
  let tokens: Token[];
  try {
    tokens = tokenize(text);
  } catch (error) {
    if (error instanceof LexerError) {
      throw createError(
        'RBW-P003',
        { text, reason: error.toData().message },
        error.location
      );
    }
    throw error;
  }

  const state: NotationState = { text, tokens, pos: 0 };
  const type = readType(state);
  if (currentToken(state).type !== TOKEN_TYPES.EOF) {
    fail(state, `unexpected "${currentToken(state).value}"`);
  }
  return type;
}

/** `parseType` that accepts an already-built type */
export function toType(value: Type | string): Type {
  return typeof value === 'string' ? parseType(value) : value;
}

export function isTypeNotationError(error: unknown): error is ParseError {
  return error instanceof ParseError && error.errorId === 'RBW-P003';
}

function readType(state: NotationState): Type {
  const token = currentToken(state);
  switch (token.type) {
    case TOKEN_TYPES.IDENTIFIER:
      state.pos++;
      return readNamedType(state, token);
    case TOKEN_TYPES.LBRACKET:
      state.pos++;
      return readBracketType(state);
    case TOKEN_TYPES.LBRACE:
      state.pos++;
      return readBlockType(state);
    case TOKEN_TYPES.EOF:
      return fail(state, 'expected a type');
    default:
      return fail(state, `unexpected "${token.value}"`);
  }
}

function readNamedType(state: NotationState, token: Token): Type {
  const name = token.value;
  if (isPrimitiveName(name)) return primitive(name);
  const initial = name.charAt(0);
  if (initial >= 'A' && initial <= 'Z') return typeVar(name);
  return fail(state, `unknown type name ${name}`, token.span.start);
}

function readBracketType(state: NotationState): Type {
  if (accept(state, TOKEN_TYPES.ASSIGN)) {
    expectToken(state, TOKEN_TYPES.RBRACKET, '"]"');
    return { kind: 'record', fields: new Map() };
  }

  const isRecord =
    currentToken(state).type === TOKEN_TYPES.IDENTIFIER &&
    (peekType(state, 1) === TOKEN_TYPES.ASSIGN ||
      peekType(state, 1) === TOKEN_TYPES.QUESTION);
  if (isRecord) return readRecordFields(state);

  const element = readType(state);
  accept(state, TOKEN_TYPES.ELLIPSIS);
  expectToken(state, TOKEN_TYPES.RBRACKET, '"]"');
  return listOf(element);
}

function readRecordFields(state: NotationState): Type {
  const fields = new Map<string, FieldType>();
  while (!accept(state, TOKEN_TYPES.RBRACKET)) {
    const nameToken = currentToken(state);
    expectToken(state, TOKEN_TYPES.IDENTIFIER, 'field name or "]"');
    if (fields.has(nameToken.value)) {
      fail(state, `duplicate field ${nameToken.value}`, nameToken.span.start);
    }
    const optional = accept(state, TOKEN_TYPES.QUESTION);
    expectToken(state, TOKEN_TYPES.ASSIGN, '"="');
    fields.set(nameToken.value, { type: readType(state), optional });
  }
  return { kind: 'record', fields };
}

function readBlockType(state: NotationState): Type {
  const parts: Type[] = [];
  while (
    currentToken(state).type !== TOKEN_TYPES.ARROW &&
    currentToken(state).type !== TOKEN_TYPES.RBRACE
  ) {
    if (currentToken(state).type === TOKEN_TYPES.EOF) fail(state, 'expected "}"');
    parts.push(readType(state));
  }

  if (accept(state, TOKEN_TYPES.ARROW)) {
    const output = readType(state);
    expectToken(state, TOKEN_TYPES.RBRACE, '"}"');
    return blockOf(parts, output);
  }

  state.pos++; // consume }
  const [output, ...extra] = parts;
  if (output === undefined || extra.length > 0) {
    return fail(state, 'block needs exactly one output type');
  }
  return blockOf([], output);
}
