/**
 * Rainbow Typing
 * Type algebra, signatures, coercion, checking and effects
 */

export {
  BOOLEAN,
  blockOf,
  containsFunctionType,
  freeTypeVariables,
  isPrimitiveName,
  isZeroInputBlock,
  listOf,
  NUMBER,
  optionalField,
  primitive,
  quoted,
  recordOf,
  satisfies,
  satisfiesWith,
  STRING,
  substitute,
  TIME,
  typesEqual,
  typeVar,
  type BlockType,
  type EffectTag,
  type FieldType,
  type FunctionType,
  type ListType,
  type ParamType,
  type PrimitiveName,
  type PrimitiveType,
  type RecordType,
  type Type,
  type TypeBindings,
  type TypeVariable,
} from './types.js';
export { formatType, parseType, toType } from './type-notation.js';
export {
  resolveSignature,
  SignatureTable,
  TRY_KEYWORD,
  TRY_SIGNATURE,
  type FunctionDefinition,
  type ParamDefinition,
} from './signatures.js';
export { Scope } from './scope.js';
export { coerceArgument, resolveCoercions } from './coercion.js';
export {
  matchArguments,
  TypeChecker,
  type ArgumentAssignment,
  type ArgumentMatch,
  type CallResolvedEvent,
  type CheckerHooks,
} from './checker.js';
export { collectEffects } from './effects.js';
export { childTerms, visitTerm, type TermVisitor } from './visitor.js';
export {
  checkScript,
  createRootScope,
  type CheckEndEvent,
  type CheckErrorEvent,
  type CheckOptions,
  type CheckResult,
  type CheckStartEvent,
  type ObservabilityCallbacks,
} from './check.js';
