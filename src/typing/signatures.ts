/**
 * Function Signature Table
 *
 * Host-registered function types, looked up by the dispatch keyword.
 * The table is built before checking and frozen once checking starts.
 */

import { ConfigurationError } from '../types.js';
import { isTypeNotationError, toType } from './type-notation.js';
import {
  containsFunctionType,
  freeTypeVariables,
  quoted,
  typeVar,
  type EffectTag,
  type FunctionType,
  type ParamType,
  type Type,
} from './types.js';

// ============================================================
// DEFINITIONS
// ============================================================

/** Parameter declaration accepted by registerFunction */
export interface ParamDefinition {
  readonly name: string;
  /** Type value or type notation, e.g. `'{ In => Out }'` */
  readonly type: Type | string;
  /** Keyword may repeat; zero or more occurrences */
  readonly variadic?: boolean | undefined;
  /** Keyword may be left out */
  readonly optional?: boolean | undefined;
  readonly description?: string | undefined;
}

/**
 * Function declaration accepted by registerFunction.
 *
 * The first parameter carries the value after the dispatch keyword and must
 * be named like the function.
 *
 * @example
 * ```typescript
 * table.registerFunction('divide', {
 *   params: [
 *     { name: 'divide', type: 'number' },
 *     { name: 'by', type: 'number' },
 *   ],
 *   returns: 'number',
 *   partial: true,
 * });
 * ```
 */
export interface FunctionDefinition {
  readonly params: readonly ParamDefinition[];
  readonly returns: Type | string;
  /** May fail at run time; calls must be guarded by try/or */
  readonly partial?: boolean | undefined;
  readonly effects?: readonly EffectTag[] | undefined;
  /** Shown in the function's documentation */
  readonly description?: string | undefined;
}

/** Name of the built-in fallback construct */
export const TRY_KEYWORD = 'try';

/** Signature of `try: { A } or: { A } => A` */
export const TRY_SIGNATURE: FunctionType = {
  kind: 'function',
  name: TRY_KEYWORD,
  params: [
    { name: TRY_KEYWORD, type: quoted(typeVar('A')), variadic: false, optional: false },
    { name: 'or', type: quoted(typeVar('A')), variadic: false, optional: false },
  ],
  output: typeVar('A'),
  partial: false,
  effects: new Set(),
};

const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

// ============================================================
// SIGNATURE TABLE
// ============================================================

export class SignatureTable {
  private readonly functions = new Map<string, FunctionType>();
  private frozen = false;

  /**
   * Register a host function.
   *
   * @throws ConfigurationError RBW-C001 after freeze(), RBW-C002 when the
   * definition is malformed
   */
  registerFunction(name: string, definition: FunctionDefinition): void {
    if (this.frozen) {
      throw new ConfigurationError('RBW-C001', { name });
    }
    this.functions.set(name, buildSignature(name, definition, this.functions));
  }

  /** Stop accepting registrations. Idempotent. */
  freeze(): void {
    this.frozen = true;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  get(name: string): FunctionType | undefined {
    return this.functions.get(name);
  }

  has(name: string): boolean {
    return this.functions.has(name);
  }

  /** Registered names in registration order */
  names(): string[] {
    return [...this.functions.keys()];
  }

  get size(): number {
    return this.functions.size;
  }
}

/**
 * Signature for a dispatch keyword, including the built-in `try`.
 */
export function resolveSignature(
  table: SignatureTable,
  keyword: string
): FunctionType | undefined {
  return keyword === TRY_KEYWORD ? TRY_SIGNATURE : table.get(keyword);
}

// ============================================================
// VALIDATION
// ============================================================

function invalid(name: string, reason: string): ConfigurationError {
  return new ConfigurationError('RBW-C002', { name, reason });
}

function resolveType(name: string, what: string, value: Type | string): Type {
  let type: Type;
  try {
    type = toType(value);
  } catch (error) {
    if (isTypeNotationError(error)) {
      throw invalid(name, `${what}: ${error.toData().message}`);
    }
    throw error;
  }
  if (containsFunctionType(type)) {
    throw invalid(name, `${what} must not contain a function type`);
  }
  return type;
}

function buildSignature(
  name: string,
  definition: FunctionDefinition,
  existing: ReadonlyMap<string, FunctionType>
): FunctionType {
  if (!IDENTIFIER_PATTERN.test(name)) {
    throw invalid(name, 'name is not an identifier');
  }
  if (name === TRY_KEYWORD) {
    throw invalid(name, `${TRY_KEYWORD} is reserved`);
  }
  if (existing.has(name)) {
    throw invalid(name, `function ${name} already defined`);
  }

  const [head] = definition.params;
  if (head === undefined) {
    throw invalid(name, 'at least one parameter is required');
  }
  if (head.name !== name) {
    throw invalid(name, `first parameter must be named ${name}, got ${head.name}`);
  }
  if (head.optional === true || head.variadic === true) {
    throw invalid(name, 'first parameter must be required and not variadic');
  }

  const params: ParamType[] = [];
  const seen = new Set<string>();
  for (const param of definition.params) {
    if (!IDENTIFIER_PATTERN.test(param.name)) {
      throw invalid(name, `parameter ${param.name} is not an identifier`);
    }
    if (seen.has(param.name)) {
      throw invalid(name, `duplicate parameter ${param.name}`);
    }
    seen.add(param.name);
    params.push({
      name: param.name,
      type: resolveType(name, `parameter ${param.name}`, param.type),
      variadic: param.variadic === true,
      optional: param.optional === true,
      description: param.description,
    });
  }

  const output = resolveType(name, 'return type', definition.returns);

  // every output variable must be fixed by an argument that is always present
  const determined = new Set<string>();
  for (const param of params) {
    if (param.optional || param.variadic) continue;
    for (const variable of freeTypeVariables(param.type)) determined.add(variable);
  }
  for (const variable of freeTypeVariables(output)) {
    if (!determined.has(variable)) {
      throw invalid(
        name,
        `type variable ${variable} in return type does not occur in a required parameter`
      );
    }
  }

  const effects = new Set<EffectTag>();
  for (const effect of definition.effects ?? []) {
    if (effect.length === 0) {
      throw invalid(name, 'effect tags must not be empty');
    }
    effects.add(effect);
  }

  return {
    kind: 'function',
    name,
    params,
    output,
    partial: definition.partial === true,
    effects,
    description: definition.description,
  };
}
