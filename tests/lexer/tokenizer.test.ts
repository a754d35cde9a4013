/**
 * Tests for the tokenizer
 *
 * Covers token kinds, number and string literal forms, escape handling,
 * source locations, and lexer error IDs RBW-L001 through RBW-L004.
 */

import { describe, expect, it } from 'vitest';
import { LexerError, tokenize } from '../../src/index.js';

function kinds(source: string): string[] {
  return tokenize(source).map((t) => t.type);
}

function lexError(source: string): LexerError {
  try {
    tokenize(source);
  } catch (err) {
    if (err instanceof LexerError) return err;
    throw err;
  }
  throw new Error(`Expected a lexer error for ${source}`);
}

describe('tokenize', () => {
  describe('token kinds', () => {
    it('reads a keyword application', () => {
      expect(kinds('greet: "hi"')).toEqual([
        'IDENTIFIER',
        'COLON',
        'STRING',
        'EOF',
      ]);
    });

    it('reads variable paths', () => {
      expect(kinds('user.name')).toEqual(['IDENTIFIER', 'DOT', 'IDENTIFIER', 'EOF']);
    });

    it('reads booleans as keywords', () => {
      expect(kinds('true false truthy')).toEqual([
        'TRUE',
        'FALSE',
        'IDENTIFIER',
        'EOF',
      ]);
    });

    it('reads block and record punctuation', () => {
      expect(kinds('{ x => x } [ a=1 ] [=]')).toEqual([
        'LBRACE',
        'IDENTIFIER',
        'ARROW',
        'IDENTIFIER',
        'RBRACE',
        'LBRACKET',
        'IDENTIFIER',
        'ASSIGN',
        'NUMBER',
        'RBRACKET',
        'LBRACKET',
        'ASSIGN',
        'RBRACKET',
        'EOF',
      ]);
    });

    it('reads type notation punctuation', () => {
      expect(kinds('[ age?=number ] [ string... ]')).toEqual([
        'LBRACKET',
        'IDENTIFIER',
        'QUESTION',
        'ASSIGN',
        'IDENTIFIER',
        'RBRACKET',
        'LBRACKET',
        'IDENTIFIER',
        'ELLIPSIS',
        'RBRACKET',
        'EOF',
      ]);
    });

    it('returns only EOF for blank input', () => {
      expect(kinds('  \n\t ')).toEqual(['EOF']);
    });
  });

  describe('numbers', () => {
    it('keeps the literal text', () => {
      const values = tokenize('42 -7 3.25 1e3 -2.5E-2').map((t) => t.value);
      expect(values).toEqual(['42', '-7', '3.25', '1e3', '-2.5E-2', '']);
    });

    it('rejects a missing fraction [RBW-L003]', () => {
      const err = lexError('1.');
      expect(err.errorId).toBe('RBW-L003');
      expect(err.toData().message).toBe('Invalid number format: 1.');
    });

    it('rejects a missing exponent [RBW-L003]', () => {
      expect(lexError('1e').toData().message).toBe('Invalid number format: 1e');
    });

    it('rejects letters glued to a number [RBW-L003]', () => {
      expect(lexError('12abc').toData().message).toBe(
        'Invalid number format: 12a'
      );
    });
  });

  describe('strings', () => {
    it('processes escapes', () => {
      const [token] = tokenize('"a\\nb\\"c\\\\d\\/e\\t"');
      expect(token?.value).toBe('a\nb"c\\d/e\t');
    });

    it('rejects an unknown escape [RBW-L004]', () => {
      const err = lexError('"\\q"');
      expect(err.errorId).toBe('RBW-L004');
      expect(err.message).toBe('Invalid escape sequence: \\q at 1:3');
    });

    it('rejects an unterminated string [RBW-L001]', () => {
      const err = lexError('say: "abc');
      expect(err.errorId).toBe('RBW-L001');
      expect(err.location).toEqual({ line: 1, column: 6, offset: 5 });
    });
  });

  describe('errors and locations', () => {
    it('rejects unknown characters [RBW-L002]', () => {
      const err = lexError('a: @');
      expect(err.errorId).toBe('RBW-L002');
      expect(err.toData().message).toBe('Invalid character "@"');
    });

    it('rejects a lone minus [RBW-L002]', () => {
      expect(lexError('- x').toData().message).toBe('Invalid character "-"');
    });

    it('tracks lines and columns', () => {
      const tokens = tokenize('a:\n  b');
      expect(tokens[2]?.span).toEqual({
        start: { line: 2, column: 3, offset: 5 },
        end: { line: 2, column: 4, offset: 6 },
      });
    });
  });
});
