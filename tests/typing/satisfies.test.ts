/**
 * Tests for the type algebra
 *
 * satisfies: reflexivity, list covariance, record width subtyping and field
 * optionality, block arity in both directions, functions and variables.
 * satisfiesWith: variable binding and rollback. substitute and
 * freeTypeVariables.
 */

import { describe, expect, it } from 'vitest';
import {
  BOOLEAN,
  blockOf,
  formatType,
  freeTypeVariables,
  isZeroInputBlock,
  listOf,
  NUMBER,
  optionalField,
  quoted,
  recordOf,
  satisfies,
  satisfiesWith,
  STRING,
  substitute,
  TIME,
  TRY_SIGNATURE,
  typesEqual,
  typeVar,
  type Type,
  type TypeBindings,
} from '../../src/index.js';

const A = typeVar('A');
const B = typeVar('B');

describe('satisfies', () => {
  it('is reflexive for value types', () => {
    const samples: Type[] = [
      NUMBER,
      TIME,
      listOf(STRING),
      recordOf({ a: NUMBER, b: optionalField(STRING) }),
      blockOf([NUMBER, BOOLEAN], listOf(STRING)),
    ];
    for (const type of samples) {
      expect(satisfies(type, type)).toBe(true);
    }
  });

  it('compares primitives by name', () => {
    expect(satisfies(NUMBER, STRING)).toBe(false);
    expect(satisfies(STRING, TIME)).toBe(false);
  });

  it('treats lists covariantly', () => {
    const narrow = listOf(recordOf({ a: NUMBER }));
    const wide = listOf(recordOf({ a: NUMBER, b: STRING }));
    expect(satisfies(narrow, wide)).toBe(true);
    expect(satisfies(wide, narrow)).toBe(false);
  });

  describe('records', () => {
    it('accepts extra fields on the given side', () => {
      expect(
        satisfies(recordOf({ a: NUMBER }), recordOf({ a: NUMBER, b: STRING }))
      ).toBe(true);
    });

    it('requires every required expected field', () => {
      expect(
        satisfies(recordOf({ a: NUMBER, b: STRING }), recordOf({ a: NUMBER }))
      ).toBe(false);
    });

    it('ignores optional expected fields', () => {
      expect(
        satisfies(
          recordOf({ a: NUMBER, b: optionalField(STRING) }),
          recordOf({ a: NUMBER })
        )
      ).toBe(true);
    });

    it('does not let an optional field fill a required one', () => {
      expect(
        satisfies(recordOf({ a: NUMBER }), recordOf({ a: optionalField(NUMBER) }))
      ).toBe(false);
    });

    it('compares field types', () => {
      expect(satisfies(recordOf({ a: NUMBER }), recordOf({ a: STRING }))).toBe(
        false
      );
    });
  });

  describe('blocks', () => {
    it('accepts a block that takes fewer inputs', () => {
      expect(satisfies(blockOf([NUMBER], STRING), quoted(STRING))).toBe(true);
    });

    it('rejects a block that takes more inputs', () => {
      expect(satisfies(quoted(STRING), blockOf([NUMBER], STRING))).toBe(false);
    });

    it('compares inputs and outputs', () => {
      expect(
        satisfies(blockOf([NUMBER], STRING), blockOf([STRING], STRING))
      ).toBe(false);
      expect(satisfies(quoted(NUMBER), quoted(STRING))).toBe(false);
    });

    it('does not equate a block with its output', () => {
      expect(satisfies(NUMBER, quoted(NUMBER))).toBe(false);
      expect(satisfies(quoted(NUMBER), NUMBER)).toBe(false);
    });
  });

  it('never relates function types', () => {
    expect(satisfies(TRY_SIGNATURE, TRY_SIGNATURE)).toBe(false);
  });

  it('relates a variable only to itself', () => {
    expect(satisfies(A, A)).toBe(true);
    expect(satisfies(A, B)).toBe(false);
    expect(satisfies(A, NUMBER)).toBe(false);
  });
});

describe('satisfiesWith', () => {
  it('binds variables of the expected type', () => {
    const bindings: TypeBindings = new Map();
    expect(satisfiesWith(listOf(A), listOf(NUMBER), bindings)).toBe(true);
    expect(bindings.get('A')).toBe(NUMBER);
  });

  it('compares later occurrences through the binding', () => {
    const bindings: TypeBindings = new Map([['A', NUMBER]]);
    expect(satisfiesWith(A, STRING, bindings)).toBe(false);
    expect(satisfiesWith(A, NUMBER, bindings)).toBe(true);
    expect([...bindings.keys()]).toEqual(['A']);
  });

  it('leaves bindings untouched on failure', () => {
    const bindings: TypeBindings = new Map();
    const expected = recordOf({ x: A, y: STRING });
    const given = recordOf({ x: NUMBER, y: NUMBER });
    expect(satisfiesWith(expected, given, bindings)).toBe(false);
    expect(bindings.size).toBe(0);
  });
});

describe('type helpers', () => {
  it('substitutes bound variables only', () => {
    const type = substitute(blockOf([A], listOf(B)), new Map([['A', NUMBER]]));
    expect(formatType(type)).toBe('{ number => [ B... ] }');
  });

  it('stops on self-referencing bindings', () => {
    const type = substitute(A, new Map([['A', listOf(A)]]));
    expect(formatType(type)).toBe('[ A... ]');
  });

  it('recognizes zero-input blocks', () => {
    expect(isZeroInputBlock(quoted(NUMBER))).toBe(true);
    expect(isZeroInputBlock(blockOf([NUMBER], NUMBER))).toBe(false);
    expect(isZeroInputBlock(listOf(NUMBER))).toBe(false);
  });

  it('collects free variables', () => {
    const names = freeTypeVariables(blockOf([A], recordOf({ x: B, y: NUMBER })));
    expect([...names].sort()).toEqual(['A', 'B']);
  });

  it('distinguishes field optionality in equality', () => {
    expect(
      typesEqual(recordOf({ a: NUMBER }), recordOf({ a: optionalField(NUMBER) }))
    ).toBe(false);
    expect(typesEqual(listOf(A), listOf(typeVar('A')))).toBe(true);
  });
});
