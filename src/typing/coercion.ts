/**
 * Block Coercion Resolver
 *
 * Rewrites call arguments so their syntactic shape matches the parameter:
 *
 * 1. a zero-input block parameter given a non-block term wraps it:
 *    `then: bar` becomes `then: { bar }`
 * 2. a non-block parameter given a zero-parameter block unwraps it,
 *    repeatedly: `to: { { max } }` becomes `to: max`
 *
 * Only declared parameter types are consulted, never checked types.
 * Unknown functions and keywords leave their arguments as written.
 */

import type {
  ApplyNode,
  BlockNode,
  KeywordArgNode,
  ScriptNode,
  TermNode,
} from '../types.js';
import { resolveSignature, type SignatureTable } from './signatures.js';
import { isZeroInputBlock, type Type } from './types.js';

export function resolveCoercions(
  script: ScriptNode,
  table: SignatureTable
): ScriptNode {
  return {
    ...script,
    terms: script.terms.map((term) => resolveTerm(term, table)),
  };
}

/** Coerce one argument against its declared parameter type */
export function coerceArgument(value: TermNode, expected: Type): TermNode {
  if (isZeroInputBlock(expected)) {
    if (value.type === 'Block') return value;
    const wrapped: BlockNode = {
      type: 'Block',
      params: [],
      body: value,
      span: value.span,
    };
    return wrapped;
  }
  if (expected.kind === 'block') return value;

  let current = value;
  while (current.type === 'Block' && current.params.length === 0) {
    current = current.body;
  }
  return current;
}

function resolveTerm(term: TermNode, table: SignatureTable): TermNode {
  switch (term.type) {
    case 'Apply':
      return resolveApply(term, table);
    case 'Block':
      return { ...term, body: resolveTerm(term.body, table) };
    case 'List':
      return {
        ...term,
        elements: term.elements.map((element) => resolveTerm(element, table)),
      };
    case 'Record':
      return {
        ...term,
        entries: term.entries.map((entry) => ({
          ...entry,
          value: resolveTerm(entry.value, table),
        })),
      };
    case 'Variable':
    case 'StringLiteral':
    case 'NumberLiteral':
    case 'BoolLiteral':
      return term;
  }
}

function resolveApply(node: ApplyNode, table: SignatureTable): ApplyNode {
  const head = node.args[0];
  const signature = head ? resolveSignature(table, head.keyword) : undefined;

  const args = node.args.map((arg): KeywordArgNode => {
    const param = signature?.params.find((p) => p.name === arg.keyword);
    const value = param ? coerceArgument(arg.value, param.type) : arg.value;
    return { ...arg, value: resolveTerm(value, table) };
  });

  return { ...node, args };
}
