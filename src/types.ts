/**
 * Rainbow AST Types
 * Shared data model re-exported from its defining modules
 */

export type { SourceLocation, SourceSpan } from './source-location.js';
export { compareLocations } from './source-location.js';
export { TOKEN_TYPES, type Token, type TokenType } from './token-types.js';
export type * from './ast-nodes.js';
export {
  ERROR_REGISTRY,
  renderMessage,
  type ErrorCategory,
  type ErrorDefinition,
  type ErrorExample,
  type ErrorRegistry,
} from './error-registry.js';
export {
  ConfigurationError,
  createError,
  LexerError,
  ParseError,
  RainbowError,
  sortErrors,
  TYPE_ERROR_IDS,
  TypeCheckError,
  type RainbowErrorData,
  type TypeErrorKind,
} from './error-classes.js';
