import type { SourceSpan } from './source-location.js';

// ============================================================
// AST NODE TYPES
// ============================================================

export type NodeType =
  | 'Script'
  | 'Apply'
  | 'KeywordArg'
  | 'Variable'
  | 'Record'
  | 'RecordEntry'
  | 'List'
  | 'StringLiteral'
  | 'NumberLiteral'
  | 'BoolLiteral'
  | 'Block';

interface BaseNode {
  readonly type: NodeType;
  readonly span: SourceSpan;
}

// ============================================================
// SCRIPT STRUCTURE
// ============================================================

/** A script is one or more terms; its value is the value of the last term */
export interface ScriptNode extends BaseNode {
  readonly type: 'Script';
  readonly terms: readonly TermNode[];
}

// ============================================================
// TERMS
// ============================================================

export type TermNode = ApplyNode | BlockNode | ValueNode;

export type ValueNode =
  | VariableNode
  | RecordNode
  | ListNode
  | StringLiteralNode
  | NumberLiteralNode
  | BoolLiteralNode;

/**
 * Keyword application: `divide: 10 by: 0`.
 * The first keyword names the function and carries its head argument.
 */
export interface ApplyNode extends BaseNode {
  readonly type: 'Apply';
  readonly args: readonly KeywordArgNode[];
}

export interface KeywordArgNode extends BaseNode {
  readonly type: 'KeywordArg';
  readonly keyword: string;
  readonly value: TermNode;
}

/** Dotted variable path: `employee.office.name` */
export interface VariableNode extends BaseNode {
  readonly type: 'Variable';
  readonly path: readonly string[];
}

/** Record literal: `[ name="Ann" age=40 ]`, empty form `[=]` */
export interface RecordNode extends BaseNode {
  readonly type: 'Record';
  readonly entries: readonly RecordEntryNode[];
}

export interface RecordEntryNode extends BaseNode {
  readonly type: 'RecordEntry';
  readonly name: string;
  readonly value: TermNode;
}

/** List literal: `[ 1 2 3 ]`, empty form `[]` */
export interface ListNode extends BaseNode {
  readonly type: 'List';
  readonly elements: readonly TermNode[];
}

export interface StringLiteralNode extends BaseNode {
  readonly type: 'StringLiteral';
  readonly value: string;
}

export interface NumberLiteralNode extends BaseNode {
  readonly type: 'NumberLiteral';
  readonly value: number;
  /** Source text of the literal, preserved for printing */
  readonly raw: string;
}

export interface BoolLiteralNode extends BaseNode {
  readonly type: 'BoolLiteral';
  readonly value: boolean;
}

/** Deferred computation: `{ x y => body }` or `{ body }` */
export interface BlockNode extends BaseNode {
  readonly type: 'Block';
  readonly params: readonly string[];
  readonly body: TermNode;
}

export type ASTNode =
  | ScriptNode
  | TermNode
  | KeywordArgNode
  | RecordEntryNode;
