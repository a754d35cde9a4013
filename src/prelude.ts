/**
 * Standard Prelude
 * Signatures of the functions every Rainbow host is expected to provide.
 */

import type { FunctionDefinition, SignatureTable } from './typing/index.js';

/**
 * Prelude signatures by name.
 *
 * `calc` is partial (division by zero); everything else is total and
 * effect-free.
 */
export const PRELUDE_FUNCTIONS: Readonly<Record<string, FunctionDefinition>> = {
  not: {
    params: [{ name: 'not', type: 'boolean' }],
    returns: 'boolean',
  },
  if: {
    params: [
      { name: 'if', type: 'boolean' },
      { name: 'and', type: '{ boolean }', variadic: true },
      { name: 'or', type: '{ boolean }', variadic: true },
      { name: 'then', type: '{ A }' },
      { name: 'else', type: '{ A }' },
    ],
    returns: 'A',
  },
  compare: {
    params: [
      { name: 'compare', type: 'number' },
      { name: 'biggerThan', type: 'number', optional: true },
      { name: 'atLeast', type: 'number', optional: true },
      { name: 'smallerThan', type: 'number', optional: true },
      { name: 'atMost', type: 'number', optional: true },
    ],
    returns: 'boolean',
  },
  each: {
    params: [
      { name: 'each', type: '[ In... ]' },
      { name: 'do', type: '{ In => Out }' },
    ],
    returns: '[ Out... ]',
  },
  sum: {
    params: [{ name: 'sum', type: '[ number... ]' }],
    returns: 'number',
  },
  countFrom: {
    params: [
      { name: 'countFrom', type: 'number' },
      { name: 'to', type: 'number' },
      { name: 'by', type: 'number', optional: true },
    ],
    returns: '[ number... ]',
  },
  calc: {
    params: [
      { name: 'calc', type: 'number' },
      { name: 'plus', type: 'number', variadic: true },
      { name: 'subtract', type: 'number', variadic: true },
      { name: 'times', type: 'number', variadic: true },
      { name: 'dividedBy', type: 'number', variadic: true },
    ],
    returns: 'number',
    partial: true,
  },
  with: {
    params: [
      { name: 'with', type: 'In' },
      { name: 'do', type: '{ In => Out }' },
    ],
    returns: 'Out',
  },
  upperCase: {
    params: [{ name: 'upperCase', type: 'string' }],
    returns: 'string',
  },
  stringify: {
    params: [{ name: 'stringify', type: 'A' }],
    returns: 'string',
  },
};

/** Register every prelude function that the table does not define yet */
export function installPrelude(table: SignatureTable): void {
  for (const [name, definition] of Object.entries(PRELUDE_FUNCTIONS)) {
    if (!table.has(name)) table.registerFunction(name, definition);
  }
}
