/**
 * Skiff Module
 * Exports lexer, parser, printer, static checks, runtime, and AST types
 */

export { tokenize } from './lexer/index.js';
export { parse, parseExpression } from './parser/index.js';

// ============================================================
// PRINTING
// ============================================================
export {
  type Appendable,
  DEFAULT_DIAGNOSTIC_LIMITS,
  type DiagnosticLimits,
  ELLIPSIS,
  MISSING_ELEMENT,
  prettyPrint,
  printAbbreviatedList,
  printExpression,
  StringSink,
  toDiagnosticString,
} from './printer/index.js';

// ============================================================
// STATIC CHECKS
// ============================================================
export {
  accept,
  collectDiagnostics,
  createValidationEnvironment,
  type NodeVisitor,
  type RuleVisitor,
  validateExpression,
  validateScript,
  type ValidationEnvironment,
  visitNode,
} from './check/index.js';

// ============================================================
// RUNTIME
// ============================================================
export {
  argumentTypeError,
  BUILTIN_FUNCTIONS,
  type CallableFn,
  createRuntimeContext,
  createStepper,
  deepEquals,
  type ErrorEvent,
  evaluate,
  execute,
  type ExecutionResult,
  type ExecutionStepper,
  expectArity,
  formatValue,
  type FunctionReturnEvent,
  type HostCallEvent,
  isList,
  isSequence,
  isTruthy,
  isTuple,
  Mutability,
  type ObservabilityCallbacks,
  type RuntimeCallbacks,
  type RuntimeContext,
  type RuntimeOptions,
  type SequenceValue,
  SkiffList,
  SkiffTuple,
  type SkiffTypeName,
  type SkiffValue,
  type StepEndEvent,
  type StepResult,
  type StepStartEvent,
  typeName,
} from './runtime/index.js';

// ============================================================
// CONFIGURATION
// ============================================================
export {
  CONFIG_FILE_NAME,
  loadConfig,
  parseConfig,
  type SkiffConfig,
} from './config.js';

export * from './types.js';
