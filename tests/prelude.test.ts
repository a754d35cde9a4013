/**
 * Tests for the standard prelude
 */

import { describe, expect, it } from 'vitest';
import {
  installPrelude,
  PRELUDE_FUNCTIONS,
  SignatureTable,
} from '../src/index.js';
import { errorIds, typeOf, type TestOptions } from './helpers/checker.js';

const OPTIONS: TestOptions = { functions: { ...PRELUDE_FUNCTIONS } };

describe('installPrelude', () => {
  it('registers every prelude function', () => {
    const table = new SignatureTable();
    installPrelude(table);
    expect(table.names()).toEqual(Object.keys(PRELUDE_FUNCTIONS));
    expect(table.get('calc')?.partial).toBe(true);
  });

  it('keeps host definitions of the same name', () => {
    const table = new SignatureTable();
    table.registerFunction('sum', {
      params: [{ name: 'sum', type: 'string' }],
      returns: 'string',
    });
    installPrelude(table);
    expect(table.get('sum')?.output).toEqual({ kind: 'primitive', name: 'string' });
    expect(table.size).toBe(Object.keys(PRELUDE_FUNCTIONS).length);
  });
});

describe('prelude scripts', () => {
  it('maps over a counted range', () => {
    expect(
      typeOf('each: { countFrom: 1 to: 3 } do: { n => stringify: n }', OPTIONS)
    ).toBe('[ string... ]');
  });

  it('threads a record through with', () => {
    expect(typeOf('with: [ a=1 b="x" ] do: { r => r.b }', OPTIONS)).toBe('string');
  });

  it('chooses between branches', () => {
    expect(
      typeOf('if: { compare: 1 atLeast: 0 } then: "yes" else: "no"', OPTIONS)
    ).toBe('string');
  });

  it('accepts extra conditions on if', () => {
    expect(
      typeOf('if: true and: false or: { not: false } then: 1 else: 2', OPTIONS)
    ).toBe('number');
  });

  it('requires else on if', () => {
    expect(errorIds('if: true then: 1', OPTIONS)).toEqual(['RBW-T005']);
  });

  it('requires try around calc', () => {
    expect(errorIds('calc: 1 dividedBy: 0', OPTIONS)).toEqual(['RBW-T008']);
    expect(typeOf('try: { calc: 1 dividedBy: 0 } or: { 0 }', OPTIONS)).toBe(
      'number'
    );
  });
});
