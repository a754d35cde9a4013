/**
 * Rainbow Error Classes and Factory
 * Structured error types with registry-based error codes
 */

import type { SourceLocation, SourceSpan } from './source-location.js';
import { compareLocations } from './source-location.js';
import {
  ERROR_REGISTRY,
  renderMessage,
  type ErrorCategory,
  type ErrorDefinition,
} from './error-registry.js';

// ============================================================
// ERROR DATA
// ============================================================

/** Structured error data for host applications */
export interface RainbowErrorData {
  readonly errorId: string;
  readonly message: string;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;
}

interface RainbowErrorInit extends RainbowErrorData {
  readonly span?: SourceSpan | undefined;
}

function lookupDefinition(
  errorId: string,
  category?: ErrorCategory
): ErrorDefinition {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }
  if (category !== undefined && definition.category !== category) {
    throw new TypeError(`Expected ${category} error ID, got: ${errorId}`);
  }
  return definition;
}

// ============================================================
// BASE ERROR CLASS
// ============================================================

/**
 * Base error class for all Rainbow errors.
 * Provides structured data for host applications to format as needed.
 */
export class RainbowError extends Error {
  readonly errorId: string;
  readonly location?: SourceLocation | undefined;
  readonly span?: SourceSpan | undefined;
  readonly context?: Record<string, unknown> | undefined;

  constructor(data: RainbowErrorInit) {
    if (!data.errorId) {
      throw new TypeError('errorId is required');
    }
    lookupDefinition(data.errorId);

    const locationStr = data.location
      ? ` at ${data.location.line}:${data.location.column}`
      : '';
    super(`${data.message}${locationStr}`);
    this.name = 'RainbowError';
    this.errorId = data.errorId;
    this.location = data.location;
    this.span = data.span;
    this.context = data.context;
  }

  /** Get structured error data for custom formatting */
  toData(): RainbowErrorData {
    return {
      errorId: this.errorId,
      message: this.message.replace(/ at \d+:\d+$/, ''),
      location: this.location,
      context: this.context,
    };
  }

  /** Format error for display (can be overridden by host) */
  format(formatter?: (data: RainbowErrorData) => string): string {
    if (formatter) return formatter(this.toData());
    return this.message;
  }
}

// ============================================================
// SPECIALIZED ERROR CLASSES
// ============================================================

/** Tokenization errors; always located */
export class LexerError extends RainbowError {
  override readonly location: SourceLocation;

  constructor(
    errorId: string,
    message: string,
    location: SourceLocation,
    context?: Record<string, unknown>
  ) {
    lookupDefinition(errorId, 'lexer');
    super({ errorId, message, location, context });
    this.name = 'LexerError';
    this.location = location;
  }
}

/** Parse-time errors */
export class ParseError extends RainbowError {
  override readonly location: SourceLocation;
  /** Token descriptions that would have been accepted */
  readonly expected: readonly string[];

  constructor(
    errorId: string,
    message: string,
    location: SourceLocation,
    context?: Record<string, unknown>,
    expected: readonly string[] = []
  ) {
    lookupDefinition(errorId, 'parse');
    super({ errorId, message, location, context });
    this.name = 'ParseError';
    this.location = location;
    this.expected = expected;
  }
}

/** Error IDs of the type checker, by kind */
export const TYPE_ERROR_IDS = {
  UnknownIdentifier: 'RBW-T001',
  UnknownFunction: 'RBW-T002',
  FieldMissing: 'RBW-T003',
  ElementTypeMismatch: 'RBW-T004',
  ArityMismatch: 'RBW-T005',
  Mismatch: 'RBW-T006',
  BlockArityMismatch: 'RBW-T007',
  UnhandledPartiality: 'RBW-T008',
  BranchTypeDivergence: 'RBW-T009',
  BlockNotAllowed: 'RBW-T010',
  EmptyListWithoutContext: 'RBW-T011',
  UnresolvedTypeVariable: 'RBW-T012',
} as const;

export type TypeErrorKind = keyof typeof TYPE_ERROR_IDS;

/**
 * Static type error.
 * The message is rendered from the registry template with `context`.
 */
export class TypeCheckError extends RainbowError {
  readonly kind: TypeErrorKind;
  override readonly location: SourceLocation;
  override readonly span: SourceSpan;

  constructor(
    kind: TypeErrorKind,
    context: Record<string, unknown>,
    span: SourceSpan
  ) {
    const errorId = TYPE_ERROR_IDS[kind];
    const definition = lookupDefinition(errorId, 'type');
    super({
      errorId,
      message: renderMessage(definition.messageTemplate, context),
      location: span.start,
      span,
      context,
    });
    this.name = 'TypeCheckError';
    this.kind = kind;
    this.location = span.start;
    this.span = span;
  }
}

/** Host configuration errors: signature registration and config files */
export class ConfigurationError extends RainbowError {
  constructor(
    errorId: string,
    context: Record<string, unknown>,
    location?: SourceLocation
  ) {
    const definition = lookupDefinition(errorId, 'config');
    super({
      errorId,
      message: renderMessage(definition.messageTemplate, context),
      location,
      context,
    });
    this.name = 'ConfigurationError';
  }
}

// ============================================================
// ERROR FACTORY
// ============================================================

/**
 * Create a lexer or parse error from the registry template.
 *
 * @example
 * createError('RBW-P006', { what: 'field', name: 'a' }, location)
 * // ParseError: "Duplicate field a at 1:7"
 */
export function createError(
  errorId: string,
  context: Record<string, unknown>,
  location: SourceLocation,
  expected: readonly string[] = []
): LexerError | ParseError {
  const definition = lookupDefinition(errorId);
  const message = renderMessage(definition.messageTemplate, context);
  switch (definition.category) {
    case 'lexer':
      return new LexerError(errorId, message, location, context);
    case 'parse':
      return new ParseError(errorId, message, location, context, expected);
    default:
      throw new TypeError(
        `createError expects a lexer or parse error ID, got: ${errorId}`
      );
  }
}

/**
 * Stable sort by source location (line, then column).
 * Unlocated errors sort last.
 */
export function sortErrors<T extends RainbowError>(errors: readonly T[]): T[] {
  return errors
    .map((error, index) => ({ error, index }))
    .sort((a, b) => {
      const la = a.error.location;
      const lb = b.error.location;
      if (la && lb) {
        const byLocation = compareLocations(la, lb);
        if (byLocation !== 0) return byLocation;
      } else if (la) {
        return -1;
      } else if (lb) {
        return 1;
      }
      return a.index - b.index;
    })
    .map((entry) => entry.error);
}
