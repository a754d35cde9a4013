/**
 * Term Visitor
 * Pre-order traversal with enter/exit callbacks.
 *
 * Uses an explicit work stack, so traversal depth is not limited by the
 * call stack.
 */

import type { ScriptNode, TermNode } from '../types.js';

// ============================================================
// VISITOR INTERFACE
// ============================================================

export interface TermVisitor {
  /** Called before visiting a term's children */
  enter(node: TermNode, depth: number): void;
  /** Called after all of a term's children have been visited */
  exit?(node: TermNode, depth: number): void;
}

interface WorkItem {
  readonly phase: 'enter' | 'exit';
  readonly node: TermNode;
  readonly depth: number;
}

// ============================================================
// TRAVERSAL
// ============================================================

/** Direct subterms, in source order */
export function childTerms(node: TermNode): readonly TermNode[] {
  switch (node.type) {
    case 'Apply':
      return node.args.map((arg) => arg.value);
    case 'Block':
      return [node.body];
    case 'List':
      return node.elements;
    case 'Record':
      return node.entries.map((entry) => entry.value);
    case 'Variable':
    case 'StringLiteral':
    case 'NumberLiteral':
    case 'BoolLiteral':
      return [];
  }
}

/**
 * Visit a term or every term of a script.
 *
 * Traversal order per node:
 * 1. visitor.enter(node)
 * 2. children, left to right
 * 3. visitor.exit(node)
 */
export function visitTerm(root: TermNode | ScriptNode, visitor: TermVisitor): void {
  const roots = root.type === 'Script' ? root.terms : [root];
  const stack: WorkItem[] = [];
  for (let i = roots.length - 1; i >= 0; i--) {
    const node = roots[i];
    if (node !== undefined) stack.push({ phase: 'enter', node, depth: 0 });
  }

  let item = stack.pop();
  while (item !== undefined) {
    if (item.phase === 'exit') {
      visitor.exit?.(item.node, item.depth);
    } else {
      visitor.enter(item.node, item.depth);
      stack.push({ phase: 'exit', node: item.node, depth: item.depth });
      const children = childTerms(item.node);
      for (let i = children.length - 1; i >= 0; i--) {
        const child = children[i];
        if (child !== undefined) {
          stack.push({ phase: 'enter', node: child, depth: item.depth + 1 });
        }
      }
    }
    item = stack.pop();
  }
}
