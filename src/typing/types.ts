/**
 * Type Algebra
 *
 * Rainbow's value types and the structural satisfaction relation between
 * them. `satisfies(left, right)` answers: may a value declared as `right`
 * be used where `left` is expected?
 */

// ============================================================
// TYPE MODEL
// ============================================================

export type PrimitiveName = 'number' | 'string' | 'boolean' | 'time';

/** Opaque label of a side effect declared by a host function */
export type EffectTag = string;

export interface PrimitiveType {
  readonly kind: 'primitive';
  readonly name: PrimitiveName;
}

export interface ListType {
  readonly kind: 'list';
  readonly element: Type;
}

export interface FieldType {
  readonly type: Type;
  readonly optional: boolean;
}

export interface RecordType {
  readonly kind: 'record';
  readonly fields: ReadonlyMap<string, FieldType>;
}

/** Deferred computation taking `inputs` and producing `output` */
export interface BlockType {
  readonly kind: 'block';
  readonly inputs: readonly Type[];
  readonly output: Type;
}

export interface ParamType {
  readonly name: string;
  readonly type: Type;
  readonly variadic: boolean;
  readonly optional: boolean;
  readonly description?: string | undefined;
}

/**
 * Signature of a registered host function.
 * Only the signature table produces these; no value has a function type.
 */
export interface FunctionType {
  readonly kind: 'function';
  readonly name: string;
  readonly params: readonly ParamType[];
  readonly output: Type;
  readonly partial: boolean;
  readonly effects: ReadonlySet<EffectTag>;
  readonly description?: string | undefined;
}

/** Type variable, instantiated per call. Only legal inside signatures. */
export interface TypeVariable {
  readonly kind: 'var';
  readonly name: string;
}

export type Type =
  | PrimitiveType
  | ListType
  | RecordType
  | BlockType
  | FunctionType
  | TypeVariable;

/** Type variable instantiations for one call */
export type TypeBindings = Map<string, Type>;

// ============================================================
// CONSTRUCTORS
// ============================================================

export const NUMBER: PrimitiveType = { kind: 'primitive', name: 'number' };
export const STRING: PrimitiveType = { kind: 'primitive', name: 'string' };
export const BOOLEAN: PrimitiveType = { kind: 'primitive', name: 'boolean' };
export const TIME: PrimitiveType = { kind: 'primitive', name: 'time' };

const PRIMITIVES: Readonly<Record<PrimitiveName, PrimitiveType>> = {
  number: NUMBER,
  string: STRING,
  boolean: BOOLEAN,
  time: TIME,
};

export function primitive(name: PrimitiveName): PrimitiveType {
  return PRIMITIVES[name];
}

export function isPrimitiveName(name: string): name is PrimitiveName {
  return Object.hasOwn(PRIMITIVES, name);
}

export function listOf(element: Type): ListType {
  return { kind: 'list', element };
}

/** Field marked optional, for use with recordOf */
export function optionalField(type: Type): FieldType {
  return { type, optional: true };
}

/**
 * Build a record type. Plain types are required fields.
 *
 * @example
 * recordOf({ name: STRING, nickname: optionalField(STRING) })
 */
export function recordOf(
  fields: Readonly<Record<string, Type | FieldType>>
): RecordType {
  const map = new Map<string, FieldType>();
  for (const [name, field] of Object.entries(fields)) {
    map.set(name, 'kind' in field ? { type: field, optional: false } : field);
  }
  return { kind: 'record', fields: map };
}

export function blockOf(inputs: readonly Type[], output: Type): BlockType {
  return { kind: 'block', inputs, output };
}

/** Zero-input block: `{ T }` */
export function quoted(output: Type): BlockType {
  return blockOf([], output);
}

export function typeVar(name: string): TypeVariable {
  return { kind: 'var', name };
}

export function isZeroInputBlock(type: Type): boolean {
  return type.kind === 'block' && type.inputs.length === 0;
}

// ============================================================
// SATISFACTION
// ============================================================

/**
 * Structural satisfaction, no coercion.
 *
 * - primitives: same name
 * - lists: covariant in the element
 * - records: each required field of `left` is required in `right` and
 *   satisfied; optional fields of `left` and extra fields of `right` are
 *   ignored
 * - blocks: `right` takes no more inputs than `left`; inputs compare
 *   pairwise in the same direction as outputs
 * - functions: never
 * - variables: only the same variable
 */
export function satisfies(left: Type, right: Type): boolean {
  return match(left, right, null);
}

/**
 * Like `satisfies`, instantiating variables of `left`.
 *
 * An unbound variable binds to `right`; a bound one is compared through its
 * binding. On failure `bindings` is left as it was before the call.
 */
export function satisfiesWith(
  left: Type,
  right: Type,
  bindings: TypeBindings
): boolean {
  const snapshot = new Map(bindings);
  if (match(left, right, bindings)) return true;
  bindings.clear();
  for (const [name, type] of snapshot) bindings.set(name, type);
  return false;
}

function match(left: Type, right: Type, bindings: TypeBindings | null): boolean {
  if (left.kind === 'var') {
    if (right.kind === 'var' && right.name === left.name) return true;
    if (bindings === null) return false;
    const bound = bindings.get(left.name);
    if (bound !== undefined) return match(bound, right, bindings);
    bindings.set(left.name, right);
    return true;
  }

  switch (left.kind) {
    case 'primitive':
      return right.kind === 'primitive' && right.name === left.name;

    case 'list':
      return right.kind === 'list' && match(left.element, right.element, bindings);

    case 'record': {
      if (right.kind !== 'record') return false;
      for (const [name, field] of left.fields) {
        if (field.optional) continue;
        const other = right.fields.get(name);
        if (other === undefined || other.optional) return false;
        if (!match(field.type, other.type, bindings)) return false;
      }
      return true;
    }

    case 'block': {
      if (right.kind !== 'block') return false;
      if (right.inputs.length > left.inputs.length) return false;
      for (let i = 0; i < right.inputs.length; i++) {
        const expected = left.inputs[i];
        const given = right.inputs[i];
        if (expected === undefined || given === undefined) return false;
        if (!match(expected, given, bindings)) return false;
      }
      return match(left.output, right.output, bindings);
    }

    case 'function':
      return false;
  }
}

// ============================================================
// STRUCTURAL HELPERS
// ============================================================

/** Exact structural equality, including field optionality */
export function typesEqual(a: Type, b: Type): boolean {
  switch (a.kind) {
    case 'primitive':
      return b.kind === 'primitive' && a.name === b.name;
    case 'var':
      return b.kind === 'var' && a.name === b.name;
    case 'list':
      return b.kind === 'list' && typesEqual(a.element, b.element);
    case 'record': {
      if (b.kind !== 'record' || a.fields.size !== b.fields.size) return false;
      for (const [name, field] of a.fields) {
        const other = b.fields.get(name);
        if (
          other === undefined ||
          other.optional !== field.optional ||
          !typesEqual(field.type, other.type)
        ) {
          return false;
        }
      }
      return true;
    }
    case 'block':
      return (
        b.kind === 'block' &&
        a.inputs.length === b.inputs.length &&
        a.inputs.every((input, i) => {
          const other = b.inputs[i];
          return other !== undefined && typesEqual(input, other);
        }) &&
        typesEqual(a.output, b.output)
      );
    case 'function':
      return a === b;
  }
}

/** Replace bound variables; unbound ones stay as they are */
export function substitute(type: Type, bindings: ReadonlyMap<string, Type>): Type {
  return substituteSeen(type, bindings, new Set());
}

function substituteSeen(
  type: Type,
  bindings: ReadonlyMap<string, Type>,
  seen: ReadonlySet<string>
): Type {
  switch (type.kind) {
    case 'primitive':
      return type;
    case 'var': {
      const bound = bindings.get(type.name);
      if (bound === undefined || seen.has(type.name)) return type;
      return substituteSeen(bound, bindings, new Set([...seen, type.name]));
    }
    case 'list':
      return listOf(substituteSeen(type.element, bindings, seen));
    case 'record': {
      const fields = new Map<string, FieldType>();
      for (const [name, field] of type.fields) {
        fields.set(name, {
          type: substituteSeen(field.type, bindings, seen),
          optional: field.optional,
        });
      }
      return { kind: 'record', fields };
    }
    case 'block':
      return blockOf(
        type.inputs.map((input) => substituteSeen(input, bindings, seen)),
        substituteSeen(type.output, bindings, seen)
      );
    case 'function':
      return {
        ...type,
        params: type.params.map((param) => ({
          ...param,
          type: substituteSeen(param.type, bindings, seen),
        })),
        output: substituteSeen(type.output, bindings, seen),
      };
  }
}

/** Names of all variables occurring in a type */
export function freeTypeVariables(type: Type): Set<string> {
  const names = new Set<string>();
  const pending: Type[] = [type];
  let next = pending.pop();
  while (next !== undefined) {
    switch (next.kind) {
      case 'var':
        names.add(next.name);
        break;
      case 'list':
        pending.push(next.element);
        break;
      case 'record':
        for (const field of next.fields.values()) pending.push(field.type);
        break;
      case 'block':
        pending.push(...next.inputs, next.output);
        break;
      case 'function':
        for (const param of next.params) pending.push(param.type);
        pending.push(next.output);
        break;
      case 'primitive':
        break;
    }
    next = pending.pop();
  }
  return names;
}

/** Whether a function type appears anywhere inside `type` */
export function containsFunctionType(type: Type): boolean {
  switch (type.kind) {
    case 'function':
      return true;
    case 'list':
      return containsFunctionType(type.element);
    case 'record':
      return [...type.fields.values()].some((field) =>
        containsFunctionType(field.type)
      );
    case 'block':
      return (
        type.inputs.some(containsFunctionType) ||
        containsFunctionType(type.output)
      );
    case 'primitive':
    case 'var':
      return false;
  }
}
