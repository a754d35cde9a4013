/**
 * Effect Aggregator
 *
 * Static upper bound of the side effects a script may request: the union of
 * the declared effects of every resolved call, in every block body and both
 * arms of try/or.
 */

import type { ScriptNode, TermNode } from '../types.js';
import type { SignatureTable } from './signatures.js';
import type { EffectTag } from './types.js';
import { visitTerm } from './visitor.js';

export function collectEffects(
  root: ScriptNode | TermNode,
  table: SignatureTable
): ReadonlySet<EffectTag> {
  const found = new Set<EffectTag>();

  visitTerm(root, {
    enter(node) {
      if (node.type !== 'Apply') return;
      const head = node.args[0];
      const signature = head ? table.get(head.keyword) : undefined;
      if (signature === undefined) return;
      for (const effect of signature.effects) found.add(effect);
    },
  });

  return new Set([...found].sort());
}
