/**
 * Term Printer
 * Canonical single-line rendering of a term tree.
 *
 * Applications are parenthesized so that two trees print the same text
 * exactly when they have the same shape.
 */

import type { ScriptNode, TermNode } from '../types.js';

export function printTerm(term: TermNode): string {
  switch (term.type) {
    case 'Apply':
      return `(${term.args
        .map((arg) => `${arg.keyword}: ${printTerm(arg.value)}`)
        .join(' ')})`;
    case 'Block': {
      const params = term.params.length > 0 ? `${term.params.join(' ')} => ` : '';
      return `{ ${params}${printTerm(term.body)} }`;
    }
    case 'Variable':
      return term.path.join('.');
    case 'Record':
      if (term.entries.length === 0) return '[=]';
      return `[ ${term.entries
        .map((entry) => `${entry.name}=${printTerm(entry.value)}`)
        .join(' ')} ]`;
    case 'List':
      if (term.elements.length === 0) return '[]';
      return `[ ${term.elements.map(printTerm).join(' ')} ]`;
    case 'StringLiteral':
      return JSON.stringify(term.value);
    case 'NumberLiteral':
      return term.raw;
    case 'BoolLiteral':
      return term.value ? 'true' : 'false';
  }
}

/** One line per script term */
export function printScript(script: ScriptNode): string {
  return script.terms.map(printTerm).join('\n');
}
