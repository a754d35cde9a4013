/**
 * Error Registry
 * Central error definition registry with template rendering.
 */

// ============================================================
// ERROR CATEGORIES
// ============================================================

/** Error category determining error ID prefix */
export type ErrorCategory = 'lexer' | 'parse' | 'type' | 'config';

/**
 * Example demonstrating an error condition.
 * Used in error documentation to show common scenarios.
 */
export interface ErrorExample {
  /** Description of the example scenario */
  readonly description: string;
  /** Example code demonstrating the error */
  readonly code: string;
}

/** Error registry entry containing all metadata for a single error condition */
export interface ErrorDefinition {
  /** Format: RBW-{category}{3-digit} (e.g., RBW-T006) */
  readonly errorId: string;
  readonly category: ErrorCategory;
  /** Human-readable description */
  readonly description: string;
  /** Message template with {placeholder} syntax */
  readonly messageTemplate: string;
  /** What causes this error */
  readonly cause?: string | undefined;
  /** How to resolve this error */
  readonly resolution?: string | undefined;
  readonly examples?: readonly ErrorExample[] | undefined;
}

// ============================================================
// ERROR REGISTRY
// ============================================================

/**
 * Central registry for all error definitions with O(1) lookup.
 * Immutable after initialization.
 */
export interface ErrorRegistry {
  get(errorId: string): ErrorDefinition | undefined;
  has(errorId: string): boolean;
  readonly size: number;
  entries(): IterableIterator<[string, ErrorDefinition]>;
}

class ErrorRegistryImpl implements ErrorRegistry {
  private readonly byId: ReadonlyMap<string, ErrorDefinition>;

  constructor(definitions: readonly ErrorDefinition[]) {
    const idMap = new Map<string, ErrorDefinition>();
    for (const def of definitions) {
      idMap.set(def.errorId, def);
    }
    this.byId = idMap;
  }

  get(errorId: string): ErrorDefinition | undefined {
    return this.byId.get(errorId);
  }

  has(errorId: string): boolean {
    return this.byId.has(errorId);
  }

  get size(): number {
    return this.byId.size;
  }

  entries(): IterableIterator<[string, ErrorDefinition]> {
    return this.byId.entries();
  }
}

const ERROR_DEFINITIONS: readonly ErrorDefinition[] = [
  // Lexer Errors (RBW-L0xx)
  {
    errorId: 'RBW-L001',
    category: 'lexer',
    description: 'Unterminated string literal',
    messageTemplate: 'Unterminated string literal',
    cause: 'String opened with a quote but never closed before end of input.',
    resolution: 'Add the closing quote.',
    examples: [{ description: 'Missing closing quote', code: 'upperCase: "hello' }],
  },
  {
    errorId: 'RBW-L002',
    category: 'lexer',
    description: 'Invalid character',
    messageTemplate: 'Invalid character {char}',
    cause: 'Character is not part of Rainbow syntax.',
    resolution:
      'Remove the character. Keywords end with ":", records use "=", blocks use "{" and "}".',
    examples: [{ description: 'Parenthesis', code: 'not: (true)' }],
  },
  {
    errorId: 'RBW-L003',
    category: 'lexer',
    description: 'Invalid number format',
    messageTemplate: 'Invalid number format: {value}',
    cause: 'A decimal point or exponent is not followed by digits.',
    resolution: 'Write digits after "." and after "e".',
    examples: [{ description: 'Trailing decimal point', code: 'sum: [ 1. 2 ]' }],
  },
  {
    errorId: 'RBW-L004',
    category: 'lexer',
    description: 'Invalid escape sequence',
    messageTemplate: 'Invalid escape sequence: \\{char}',
    cause: 'Backslash followed by a character that is not a known escape.',
    resolution: 'Use one of \\" \\\\ \\/ \\n \\r \\t.',
  },

  // Parse Errors (RBW-P0xx)
  {
    errorId: 'RBW-P001',
    category: 'parse',
    description: 'Unexpected token',
    messageTemplate: 'Unexpected token {token}',
    cause: 'Token cannot start or continue a term at this position.',
    resolution: 'Check the term syntax near the reported position.',
    examples: [{ description: 'Keyword without a value', code: 'not: :' }],
  },
  {
    errorId: 'RBW-P002',
    category: 'parse',
    description: 'Unexpected end of input',
    messageTemplate: 'Unexpected end of input, expected {expected}',
    cause: 'Input ended in the middle of a term.',
    resolution: 'Complete the term or remove the dangling keyword.',
    examples: [{ description: 'Dangling keyword', code: 'not:' }],
  },
  {
    errorId: 'RBW-P003',
    category: 'parse',
    description: 'Invalid type notation',
    messageTemplate: 'Invalid type notation "{text}": {reason}',
    cause: 'A type written in signature notation could not be read.',
    resolution:
      'Use number, string, boolean, time, [ T... ], [ name=T ], { T } or { A => B }.',
    examples: [{ description: 'Unknown primitive', code: 'integer' }],
  },
  {
    errorId: 'RBW-P004',
    category: 'parse',
    description: 'Nesting too deep',
    messageTemplate: 'Terms nested deeper than {maxDepth} levels',
    cause: 'Blocks, lists, records or applications are nested beyond the limit.',
    resolution: 'Flatten the script or raise maxDepth.',
  },
  {
    errorId: 'RBW-P005',
    category: 'parse',
    description: 'Missing delimiter',
    messageTemplate: 'Expected {expected}, found {found}',
    cause: 'Required delimiter such as "]", "}" or "=>" is missing.',
    resolution: 'Add the missing delimiter.',
    examples: [{ description: 'Unclosed block', code: 'if: true then: { 1' }],
  },
  {
    errorId: 'RBW-P006',
    category: 'parse',
    description: 'Duplicate name',
    messageTemplate: 'Duplicate {what} {name}',
    cause: 'Record field or block parameter names repeat.',
    resolution: 'Give each record field and block parameter a distinct name.',
    examples: [{ description: 'Repeated field', code: '[ a=1 a=2 ]' }],
  },

  // Type Errors (RBW-T0xx)
  {
    errorId: 'RBW-T001',
    category: 'type',
    description: 'Unknown identifier',
    messageTemplate: 'Unknown identifier {name}',
    cause: 'Variable is neither a global input nor a block parameter in scope.',
    resolution: 'Check the spelling or declare the input.',
  },
  {
    errorId: 'RBW-T002',
    category: 'type',
    description: 'Unknown function',
    messageTemplate: 'Unknown function {name}',
    cause: 'No signature is registered under the first keyword.',
    resolution: 'Register the function with the host or fix the keyword.',
  },
  {
    errorId: 'RBW-T003',
    category: 'type',
    description: 'Field missing',
    messageTemplate: 'Field {field} is missing from {type}',
    cause: 'Dotted path names a field the record type does not declare.',
    resolution: 'Check the field name, or guard optional fields.',
  },
  {
    errorId: 'RBW-T004',
    category: 'type',
    description: 'List element type mismatch',
    messageTemplate: 'List element has type {found}, expected {expected}',
    cause: 'List elements must all satisfy the type of the first element.',
    resolution: 'Make every element the same type.',
    examples: [{ description: 'Mixed list', code: '[ 1 "two" ]' }],
  },
  {
    errorId: 'RBW-T005',
    category: 'type',
    description: 'Arity mismatch',
    messageTemplate: 'Arguments do not match {signature}: {detail}',
    cause: 'Keywords are unknown, repeated, out of order or missing.',
    resolution: 'Pass the keywords the signature declares, in order.',
  },
  {
    errorId: 'RBW-T006',
    category: 'type',
    description: 'Type mismatch',
    messageTemplate: 'Expected {expected}, found {found}',
    cause: 'Argument type does not satisfy the parameter type.',
    resolution: 'Pass a value of the expected type.',
    examples: [{ description: 'String where a number is expected', code: 'sum: [ "1" ]' }],
  },
  {
    errorId: 'RBW-T007',
    category: 'type',
    description: 'Block arity mismatch',
    messageTemplate: 'Block declares {declared} parameters, at most {allowed} are provided',
    cause: 'Block declares more parameters than its caller passes.',
    resolution: 'Remove the extra block parameters.',
  },
  {
    errorId: 'RBW-T008',
    category: 'type',
    description: 'Unhandled partiality',
    messageTemplate:
      'Partial function {name} must be the body of a try: block with an or: fallback',
    cause: 'A function that may fail is called outside a try/or construct.',
    resolution: 'Write try: { ... } or: { fallback }.',
    examples: [{ description: 'Bare partial call', code: 'divide: 10 by: 0' }],
  },
  {
    errorId: 'RBW-T009',
    category: 'type',
    description: 'Branch type divergence',
    messageTemplate: 'try: has type {tryType} but or: has type {orType}',
    cause: 'Both arms of try/or must produce interchangeable types.',
    resolution: 'Make the fallback produce the same type.',
  },
  {
    errorId: 'RBW-T010',
    category: 'type',
    description: 'Block not allowed',
    messageTemplate: 'Block is only allowed as a function argument',
    cause: 'A block appears as a script term, list element or record field.',
    resolution: 'Pass the block to a function, or remove the braces.',
  },
  {
    errorId: 'RBW-T011',
    category: 'type',
    description: 'Empty list without context',
    messageTemplate: 'Cannot infer the element type of an empty list',
    cause: 'Nothing around the empty list determines its element type.',
    resolution: 'Pass the empty list where a list type is expected.',
  },
  {
    errorId: 'RBW-T012',
    category: 'type',
    description: 'Unresolved type variable',
    messageTemplate: 'Cannot infer type variable {name} in call to {function}',
    cause: 'A generic parameter is not determined by any argument.',
    resolution: 'Pass an argument that fixes the type variable.',
  },

  // Configuration Errors (RBW-C0xx)
  {
    errorId: 'RBW-C001',
    category: 'config',
    description: 'Signature table frozen',
    messageTemplate: 'Cannot register {name}: signature table is frozen',
    cause: 'Functions were registered after checking started.',
    resolution: 'Register every function before the first check.',
  },
  {
    errorId: 'RBW-C002',
    category: 'config',
    description: 'Invalid signature',
    messageTemplate: 'Invalid signature for {name}: {reason}',
    cause: 'Function definition is malformed.',
    resolution: 'Fix the definition passed to registerFunction.',
  },
  {
    errorId: 'RBW-C003',
    category: 'config',
    description: 'Invalid configuration',
    messageTemplate: 'Invalid configuration in {path}: {reason}',
    cause: 'Configuration file is not valid YAML or has the wrong shape.',
    resolution: 'Fix the file according to the configuration format.',
  },
];

/**
 * Global error registry instance.
 * Read-only singleton initialized at module load.
 */
export const ERROR_REGISTRY: ErrorRegistry = new ErrorRegistryImpl(
  ERROR_DEFINITIONS
);

// ============================================================
// TEMPLATE RENDERING
// ============================================================

/**
 * Renders a message template by replacing placeholders with context values.
 *
 * Missing context values render as empty string. Non-string values are
 * coerced via String(). A placeholder without a closing brace is kept as
 * written.
 *
 * @example
 * renderMessage("Expected {expected}, found {found}", { expected: "number", found: "string" })
 * // Returns: "Expected number, found string"
 */
export function renderMessage(
  template: string,
  context: Record<string, unknown>
): string {
  return template.replace(/\{([A-Za-z_][A-Za-z0-9_]*)\}/g, (_match, name: string) => {
    const value = context[name];
    return value === undefined ? '' : String(value);
  });
}
