/**
 * Script Checking
 *
 * Entry point tying the phases together:
 * tokenize → parse → resolve coercions → check → aggregate effects.
 */

import { parse } from '../parser/index.js';
import type { ScriptNode } from '../types.js';
import {
  ConfigurationError,
  LexerError,
  ParseError,
  type RainbowError,
  sortErrors,
} from '../types.js';
import { TypeChecker, type CallResolvedEvent } from './checker.js';
import { resolveCoercions } from './coercion.js';
import { collectEffects } from './effects.js';
import { Scope } from './scope.js';
import type { SignatureTable } from './signatures.js';
import { isTypeNotationError, toType } from './type-notation.js';
import type { EffectTag, Type } from './types.js';

// ============================================================
// OPTIONS AND RESULTS
// ============================================================

/**
 * Observability callbacks for monitoring checks.
 * All callbacks are optional.
 */
export interface ObservabilityCallbacks {
  /** Called once the source has been parsed */
  onCheckStart?: (event: CheckStartEvent) => void;
  /** Called for each call whose signature resolved */
  onCallResolved?: (event: CallResolvedEvent) => void;
  /** Called for each error, in source order */
  onError?: (event: CheckErrorEvent) => void;
  /** Called when checking finishes */
  onCheckEnd?: (event: CheckEndEvent) => void;
}

/** Event emitted before type checking */
export interface CheckStartEvent {
  /** Number of top-level terms */
  termCount: number;
}

/** Event emitted per reported error */
export interface CheckErrorEvent {
  error: RainbowError;
}

/** Event emitted after checking */
export interface CheckEndEvent {
  success: boolean;
  /** Number of errors reported */
  errorCount: number;
  /** Check time in milliseconds */
  durationMs: number;
}

export interface CheckOptions {
  /** Types of the script's input variables, as types or type notation */
  globals?: Readonly<Record<string, Type | string>> | undefined;
  /** Maximum term nesting depth (default 256) */
  maxDepth?: number | undefined;
  observability?: ObservabilityCallbacks | undefined;
}

export type CheckResult =
  | {
      readonly success: true;
      /** Type of the last script term */
      readonly type: Type;
      readonly effects: ReadonlySet<EffectTag>;
      /** Script after block coercion */
      readonly ast: ScriptNode;
    }
  | {
      readonly success: false;
      /** Ordered by line, then column */
      readonly errors: readonly RainbowError[];
    };

// ============================================================
// CHECKING
// ============================================================

/**
 * Resolve global declarations into a root scope.
 *
 * @throws ConfigurationError RBW-C002 for malformed type notation
 */
export function createRootScope(
  globals: Readonly<Record<string, Type | string>> = {}
): Scope {
  const entries: [string, Type][] = [];
  for (const [name, declared] of Object.entries(globals)) {
    try {
      entries.push([name, toType(declared)]);
    } catch (error) {
      if (isTypeNotationError(error)) {
        throw new ConfigurationError('RBW-C002', {
          name,
          reason: error.toData().message,
        });
      }
      throw error;
    }
  }
  return Scope.root(entries);
}

/**
 * Type check a script against a signature table.
 *
 * Freezes the table. Script problems come back in the result; only invalid
 * host input (`options.globals`) throws.
 *
 * @example
 * ```typescript
 * const result = checkScript('try: { divide: 10 by: 0 } or: { 0 }', table);
 * if (result.success) console.log(formatType(result.type)); // number
 * ```
 */
export function checkScript(
  source: string,
  table: SignatureTable,
  options: CheckOptions = {}
): CheckResult {
  const startTime = performance.now();
  const observability = options.observability ?? {};
  const scope = createRootScope(options.globals);
  table.freeze();

  const finish = (result: CheckResult): CheckResult => {
    const errors = result.success ? [] : result.errors;
    for (const error of errors) observability.onError?.({ error });
    observability.onCheckEnd?.({
      success: result.success,
      errorCount: errors.length,
      durationMs: performance.now() - startTime,
    });
    return result;
  };

  let script: ScriptNode;
  try {
    script = parse(source, { maxDepth: options.maxDepth });
  } catch (error) {
    if (error instanceof LexerError || error instanceof ParseError) {
      return finish({ success: false, errors: [error] });
    }
    throw error;
  }
  observability.onCheckStart?.({ termCount: script.terms.length });

  const coerced = resolveCoercions(script, table);
  const checker = new TypeChecker(table, {
    onCallResolved: observability.onCallResolved,
  });
  const type = checker.checkScript(coerced, scope);

  if (checker.diagnostics.length > 0 || type === null) {
    return finish({ success: false, errors: sortErrors(checker.diagnostics) });
  }

  return finish({
    success: true,
    type,
    effects: collectEffects(coerced, table),
    ast: coerced,
  });
}
