/**
 * Rainbow Module
 * Exports lexer, parser, type checker, prelude, and AST types
 */

export { LexerError, tokenize } from './lexer/index.js';
export {
  DEFAULT_MAX_DEPTH,
  parse,
  printScript,
  printTerm,
  type ParseOptions,
} from './parser/index.js';
export {
  BOOLEAN,
  blockOf,
  checkScript,
  coerceArgument,
  collectEffects,
  createRootScope,
  formatType,
  freeTypeVariables,
  isZeroInputBlock,
  listOf,
  matchArguments,
  NUMBER,
  optionalField,
  parseType,
  primitive,
  quoted,
  recordOf,
  resolveCoercions,
  resolveSignature,
  satisfies,
  satisfiesWith,
  Scope,
  SignatureTable,
  STRING,
  substitute,
  TIME,
  toType,
  TRY_KEYWORD,
  TRY_SIGNATURE,
  TypeChecker,
  typesEqual,
  typeVar,
  visitTerm,
  type BlockType,
  type CallResolvedEvent,
  type CheckEndEvent,
  type CheckErrorEvent,
  type CheckOptions,
  type CheckResult,
  type CheckStartEvent,
  type EffectTag,
  type FieldType,
  type FunctionDefinition,
  type FunctionType,
  type ListType,
  type ObservabilityCallbacks,
  type ParamDefinition,
  type ParamType,
  type PrimitiveName,
  type PrimitiveType,
  type RecordType,
  type TermVisitor,
  type Type,
  type TypeBindings,
  type TypeVariable,
} from './typing/index.js';
export { installPrelude, PRELUDE_FUNCTIONS } from './prelude.js';

// ============================================================
// ERROR TAXONOMY
// ============================================================
export {
  type ErrorCategory,
  type ErrorDefinition,
  ERROR_REGISTRY,
  renderMessage,
  createError,
} from './types.js';

// ============================================================
// AST AND ERROR TYPES
// ============================================================
export type {
  ApplyNode,
  ASTNode,
  BlockNode,
  BoolLiteralNode,
  KeywordArgNode,
  ListNode,
  NodeType,
  NumberLiteralNode,
  RecordEntryNode,
  RecordNode,
  ScriptNode,
  SourceLocation,
  SourceSpan,
  StringLiteralNode,
  TermNode,
  Token,
  TokenType,
  ValueNode,
  VariableNode,
  RainbowErrorData,
  TypeErrorKind,
} from './types.js';
export {
  compareLocations,
  ConfigurationError,
  ParseError,
  RainbowError,
  sortErrors,
  TYPE_ERROR_IDS,
  TypeCheckError,
  TOKEN_TYPES,
} from './types.js';
