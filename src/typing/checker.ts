/**
 * Type Checker
 *
 * Bidirectional checking over a coerced term tree. `infer` synthesizes a
 * type; `checkAgainst` pushes an expected type into list, record and block
 * literals. Both return `null` once an error has been reported for the
 * subterm, and callers never report a second error for a `null` result.
 */

import type {
  ApplyNode,
  BlockNode,
  KeywordArgNode,
  ListNode,
  RecordNode,
  ScriptNode,
  SourceSpan,
  TermNode,
  VariableNode,
} from '../types.js';
import { TypeCheckError, type TypeErrorKind } from '../types.js';
import type { Scope } from './scope.js';
import {
  resolveSignature,
  TRY_KEYWORD,
  TRY_SIGNATURE,
  type SignatureTable,
} from './signatures.js';
import { formatType } from './type-notation.js';
import {
  BOOLEAN,
  blockOf,
  freeTypeVariables,
  listOf,
  NUMBER,
  satisfies,
  satisfiesWith,
  STRING,
  substitute,
  type FieldType,
  type FunctionType,
  type ParamType,
  type RecordType,
  type Type,
  type TypeBindings,
} from './types.js';

// ============================================================
// TYPES
// ============================================================

/** Reported once per call whose signature resolved */
export interface CallResolvedEvent {
  readonly name: string;
  readonly span: SourceSpan;
  readonly partial: boolean;
  readonly type: Type | null;
}

export interface CheckerHooks {
  onCallResolved?: ((event: CallResolvedEvent) => void) | undefined;
}

export interface ArgumentAssignment {
  readonly arg: KeywordArgNode;
  readonly param: ParamType;
}

export type ArgumentMatch =
  | { readonly ok: true; readonly assignments: readonly ArgumentAssignment[] }
  | { readonly ok: false; readonly detail: string; readonly span: SourceSpan };

// ============================================================
// ARGUMENT MATCHING
// ============================================================

/**
 * Pair keyword arguments with declared parameters.
 *
 * Keywords follow declaration order. Adjacent variadic parameters form one
 * group whose keywords may repeat and interleave. Variadic parameters may
 * be absent; other parameters are required unless optional.
 */
export function matchArguments(
  node: ApplyNode,
  signature: FunctionType
): ArgumentMatch {
  const groups = new Map<string, number>();
  let group = -1;
  let previousVariadic = false;
  for (const param of signature.params) {
    if (!(param.variadic && previousVariadic)) group++;
    groups.set(param.name, group);
    previousVariadic = param.variadic;
  }

  const assignments: ArgumentAssignment[] = [];
  const seen = new Set<string>();
  let lastGroup = -1;

  for (const arg of node.args) {
    const param = signature.params.find((p) => p.name === arg.keyword);
    if (param === undefined) {
      return { ok: false, detail: `unknown keyword ${arg.keyword}`, span: arg.span };
    }
    if (!param.variadic && seen.has(param.name)) {
      return { ok: false, detail: `repeated keyword ${arg.keyword}`, span: arg.span };
    }
    const paramGroup = groups.get(param.name) ?? 0;
    if (paramGroup < lastGroup) {
      return { ok: false, detail: `keyword ${arg.keyword} out of order`, span: arg.span };
    }
    lastGroup = paramGroup;
    seen.add(param.name);
    assignments.push({ arg, param });
  }

  for (const param of signature.params) {
    if (!param.optional && !param.variadic && !seen.has(param.name)) {
      return { ok: false, detail: `missing keyword ${param.name}`, span: node.span };
    }
  }

  return { ok: true, assignments };
}

// ============================================================
// CHECKER
// ============================================================

export class TypeChecker {
  private readonly errors: TypeCheckError[] = [];

  constructor(
    private readonly table: SignatureTable,
    private readonly hooks: CheckerHooks = {}
  ) {}

  /** Errors reported so far, in discovery order */
  get diagnostics(): readonly TypeCheckError[] {
    return this.errors;
  }

  /** Check every term; the script's type is the type of its last term */
  checkScript(script: ScriptNode, scope: Scope): Type | null {
    let last: Type | null = null;
    for (const term of script.terms) {
      last = this.infer(term, scope, false);
    }
    return last;
  }

  private report(
    kind: TypeErrorKind,
    context: Record<string, unknown>,
    span: SourceSpan
  ): null {
    this.errors.push(new TypeCheckError(kind, context, span));
    return null;
  }

  // ============================================================
  // INFERENCE
  // ============================================================

  /**
   * Synthesize the type of a term.
   *
   * @param guarded - the term is the direct body of a try arm
   */
  infer(term: TermNode, scope: Scope, guarded: boolean): Type | null {
    switch (term.type) {
      case 'StringLiteral':
        return STRING;
      case 'NumberLiteral':
        return NUMBER;
      case 'BoolLiteral':
        return BOOLEAN;
      case 'Variable':
        return this.inferVariable(term, scope);
      case 'List':
        return this.inferList(term, scope);
      case 'Record':
        return this.inferRecord(term, scope);
      case 'Block':
        return this.report('BlockNotAllowed', {}, term.span);
      case 'Apply':
        return this.inferApply(term, scope, guarded);
    }
  }

  private inferVariable(node: VariableNode, scope: Scope): Type | null {
    const [name, ...fields] = node.path;
    if (name === undefined) return null;
    let type = scope.lookup(name);
    if (type === undefined) {
      return this.report('UnknownIdentifier', { name }, node.span);
    }

    for (const field of fields) {
      const entry: FieldType | undefined =
        type.kind === 'record' ? type.fields.get(field) : undefined;
      if (entry === undefined || entry.optional) {
        return this.report(
          'FieldMissing',
          { field, type: formatType(type) },
          node.span
        );
      }
      type = entry.type;
    }
    return type;
  }

  private inferList(node: ListNode, scope: Scope): Type | null {
    const [first, ...rest] = node.elements;
    if (first === undefined) {
      return this.report('EmptyListWithoutContext', {}, node.span);
    }

    const elementType = this.infer(first, scope, false);
    let ok = elementType !== null;
    for (const element of rest) {
      const type = this.infer(element, scope, false);
      if (type === null) {
        ok = false;
      } else if (elementType !== null && !satisfies(elementType, type)) {
        this.report(
          'ElementTypeMismatch',
          { expected: formatType(elementType), found: formatType(type) },
          element.span
        );
        ok = false;
      }
    }
    return ok && elementType !== null ? listOf(elementType) : null;
  }

  private inferRecord(node: RecordNode, scope: Scope): Type | null {
    const fields = new Map<string, FieldType>();
    let ok = true;
    for (const entry of node.entries) {
      const type = this.infer(entry.value, scope, false);
      if (type === null) {
        ok = false;
      } else {
        fields.set(entry.name, { type, optional: false });
      }
    }
    return ok ? { kind: 'record', fields } : null;
  }

  private inferApply(node: ApplyNode, scope: Scope, guarded: boolean): Type | null {
    const head = node.args[0];
    if (head === undefined) return null;
    if (head.keyword === TRY_KEYWORD) return this.inferTry(node, scope);

    const signature = resolveSignature(this.table, head.keyword);
    if (signature === undefined) {
      this.report('UnknownFunction', { name: head.keyword }, head.span);
      this.inferValues(node, scope);
      return null;
    }

    const type = this.checkCall(node, signature, scope, guarded);
    this.hooks.onCallResolved?.({
      name: signature.name,
      span: node.span,
      partial: signature.partial,
      type,
    });
    return type;
  }

  /**
   * Surface errors inside arguments of a call that cannot be checked.
   * Blocks with parameters are skipped: their inputs have no type.
   */
  private inferValues(node: ApplyNode, scope: Scope): void {
    for (const arg of node.args) {
      const value = arg.value;
      if (value.type !== 'Block') {
        this.infer(value, scope, false);
      } else if (value.params.length === 0) {
        this.infer(value.body, scope, false);
      }
    }
  }

  private checkCall(
    node: ApplyNode,
    signature: FunctionType,
    scope: Scope,
    guarded: boolean
  ): Type | null {
    const matched = matchArguments(node, signature);
    if (!matched.ok) {
      this.report(
        'ArityMismatch',
        { signature: formatType(signature), detail: matched.detail },
        matched.span
      );
      this.inferValues(node, scope);
      return null;
    }

    let ok = true;
    if (signature.partial && !guarded) {
      this.report('UnhandledPartiality', { name: signature.name }, node.span);
      ok = false;
    }

    // values first so type variables bind before block inputs need them
    const ordered = [
      ...matched.assignments.filter((a) => a.param.type.kind !== 'block'),
      ...matched.assignments.filter((a) => a.param.type.kind === 'block'),
    ];
    const bindings: TypeBindings = new Map();
    const deferred: ArgumentAssignment[] = [];
    let valuesOk = true;
    for (const assignment of ordered) {
      const { arg, param } = assignment;
      if (awaitsContext(arg.value, param.type, bindings)) {
        deferred.push(assignment);
        continue;
      }
      // a failed value leaves its variables unbound; blocks reading them are skipped
      if (!valuesOk && readsUnbound(arg.value, param.type, bindings)) continue;
      const found = this.checkAgainst(
        arg.value,
        param.type,
        scope,
        bindings,
        signature.name
      );
      if (found === null) {
        ok = false;
        if (param.type.kind !== 'block') valuesOk = false;
      }
    }
    for (const { arg, param } of deferred) {
      const found = this.checkAgainst(
        arg.value,
        param.type,
        scope,
        bindings,
        signature.name
      );
      if (found === null) ok = false;
    }
    if (!ok) return null;

    const output = substitute(signature.output, bindings);
    const [unresolved] = freeTypeVariables(output);
    if (unresolved !== undefined) {
      return this.report(
        'UnresolvedTypeVariable',
        { name: unresolved, function: signature.name },
        node.span
      );
    }
    return output;
  }

  /**
   * `try: { T } or: { F }`: the try arm may call one partial function
   * directly; both arms must have interchangeable types.
   */
  private inferTry(node: ApplyNode, scope: Scope): Type | null {
    const matched = matchArguments(node, TRY_SIGNATURE);
    if (!matched.ok) {
      this.report(
        'ArityMismatch',
        { signature: formatType(TRY_SIGNATURE), detail: matched.detail },
        matched.span
      );
      this.inferValues(node, scope);
      return null;
    }

    const [tryArg, orArg] = matched.assignments;
    if (tryArg === undefined || orArg === undefined) return null;
    const tryBody = this.armBody(tryArg.arg.value);
    const orBody = this.armBody(orArg.arg.value);

    const tryType = tryBody ? this.infer(tryBody, scope, true) : null;
    let orType: Type | null;
    if (
      orBody !== null &&
      orBody.type === 'List' &&
      orBody.elements.length === 0 &&
      tryType !== null &&
      tryType.kind === 'list'
    ) {
      orType = tryType;
    } else {
      orType = orBody ? this.infer(orBody, scope, false) : null;
    }

    if (tryType === null || orType === null) return null;
    if (!satisfies(tryType, orType) || !satisfies(orType, tryType)) {
      return this.report(
        'BranchTypeDivergence',
        { tryType: formatType(tryType), orType: formatType(orType) },
        node.span
      );
    }
    return tryType;
  }

  /** Body of a try/or arm; arms take no parameters */
  private armBody(arm: TermNode): TermNode | null {
    if (arm.type !== 'Block') return arm;
    if (arm.params.length > 0) {
      return this.report(
        'BlockArityMismatch',
        { declared: arm.params.length, allowed: 0 },
        arm.span
      );
    }
    return arm.body;
  }

  // ============================================================
  // CHECKING
  // ============================================================

  /**
   * Check a term against an expected type, binding type variables of
   * `expected` in `bindings`. Returns the term's type on success.
   */
  checkAgainst(
    term: TermNode,
    expected: Type,
    scope: Scope,
    bindings: TypeBindings,
    callee: string
  ): Type | null {
    const target = substitute(expected, bindings);

    if (term.type === 'Block') {
      return this.checkBlock(term, target, scope, bindings, callee);
    }
    if (term.type === 'List' && target.kind === 'list') {
      return this.checkList(term, target.element, scope, bindings, callee);
    }
    if (term.type === 'Record' && target.kind === 'record') {
      return this.checkRecord(term, target, scope, bindings, callee);
    }

    const found = this.infer(term, scope, false);
    if (found === null) return null;
    if (!satisfiesWith(target, found, bindings)) {
      return this.report(
        'Mismatch',
        { expected: formatType(target), found: formatType(found) },
        term.span
      );
    }
    return found;
  }

  private checkList(
    node: ListNode,
    element: Type,
    scope: Scope,
    bindings: TypeBindings,
    callee: string
  ): Type | null {
    let ok = true;
    for (const item of node.elements) {
      if (this.checkAgainst(item, element, scope, bindings, callee) === null) {
        ok = false;
      }
    }
    return ok ? listOf(substitute(element, bindings)) : null;
  }

  private checkRecord(
    node: RecordNode,
    expected: RecordType,
    scope: Scope,
    bindings: TypeBindings,
    callee: string
  ): Type | null {
    const fields = new Map<string, FieldType>();
    let ok = true;
    for (const entry of node.entries) {
      const declared = expected.fields.get(entry.name);
      // optional fields impose nothing; the final satisfiesWith decides
      const type =
        declared !== undefined && !declared.optional
          ? this.checkAgainst(entry.value, declared.type, scope, bindings, callee)
          : this.infer(entry.value, scope, false);
      if (type === null) {
        ok = false;
      } else {
        fields.set(entry.name, { type, optional: false });
      }
    }
    if (!ok) return null;

    const found: Type = { kind: 'record', fields };
    if (!satisfiesWith(expected, found, bindings)) {
      return this.report(
        'Mismatch',
        {
          expected: formatType(substitute(expected, bindings)),
          found: formatType(found),
        },
        node.span
      );
    }
    return found;
  }

  private checkBlock(
    node: BlockNode,
    expected: Type,
    scope: Scope,
    bindings: TypeBindings,
    callee: string
  ): Type | null {
    if (expected.kind !== 'block') {
      return this.report(
        'Mismatch',
        { expected: formatType(expected), found: 'a block' },
        node.span
      );
    }
    if (node.params.length > expected.inputs.length) {
      return this.report(
        'BlockArityMismatch',
        { declared: node.params.length, allowed: expected.inputs.length },
        node.span
      );
    }

    const params: [string, Type][] = [];
    for (const [i, name] of node.params.entries()) {
      const declared = expected.inputs[i];
      if (declared === undefined) return null;
      const input = substitute(declared, bindings);
      const [unresolved] = freeTypeVariables(input);
      if (unresolved !== undefined) {
        return this.report(
          'UnresolvedTypeVariable',
          { name: unresolved, function: callee },
          node.span
        );
      }
      params.push([name, input]);
    }

    const inner = scope.extend(params);
    const output = this.checkAgainst(
      node.body,
      expected.output,
      inner,
      bindings,
      callee
    );
    return output === null
      ? null
      : blockOf(
          params.map(([, type]) => type),
          output
        );
  }
}

// ============================================================
// ARGUMENT ORDERING
// ============================================================

/**
 * A zero-parameter block holding an empty list whose expected type is
 * still an unbound variable. Checked after the call's other arguments.
 */
function awaitsContext(term: TermNode, expected: Type, bindings: TypeBindings): boolean {
  const target = substitute(expected, bindings);
  return (
    term.type === 'Block' &&
    term.params.length === 0 &&
    term.body.type === 'List' &&
    term.body.elements.length === 0 &&
    target.kind === 'block' &&
    target.output.kind === 'var'
  );
}

/** A block whose parameters would take a still-unbound type variable */
function readsUnbound(term: TermNode, expected: Type, bindings: TypeBindings): boolean {
  if (term.type !== 'Block' || expected.kind !== 'block') return false;
  return expected.inputs
    .slice(0, term.params.length)
    .some((input) => freeTypeVariables(substitute(input, bindings)).size > 0);
}
