/**
 * Skiff Runtime
 *
 * Public API for executing Skiff scripts.
 *
 * Module Structure:
 * - core/: Essential execution engine
 *   - types.ts: Public types (RuntimeContext, RuntimeOptions, etc.)
 *   - callable.ts: Host function signature and argument helpers
 *   - values.ts: SkiffValue, SkiffList, SkiffTuple and value utilities
 *   - context.ts: Runtime context factory
 *   - execute.ts: Script execution (execute, createStepper)
 *   - eval/: Mixin-composed evaluator (internal)
 * - ext/: Self-contained extensions
 *   - builtins.ts: Built-in functions
 */

// ============================================================
// PUBLIC TYPES
// ============================================================

export type {
  ErrorEvent,
  ExecutionResult,
  ExecutionStepper,
  FunctionReturnEvent,
  HostCallEvent,
  ObservabilityCallbacks,
  RuntimeCallbacks,
  RuntimeContext,
  RuntimeOptions,
  StepEndEvent,
  StepResult,
  StepStartEvent,
} from './core/types.js';

export type { CallableFn } from './core/callable.js';
export { argumentTypeError, expectArity } from './core/callable.js';

// ============================================================
// VALUE TYPES AND UTILITIES
// ============================================================

export type {
  SequenceValue,
  SkiffTypeName,
  SkiffValue,
} from './core/values.js';

export {
  deepEquals,
  formatValue,
  isList,
  isSequence,
  isTruthy,
  isTuple,
  Mutability,
  SkiffList,
  SkiffTuple,
  typeName,
} from './core/values.js';

// ============================================================
// EXECUTION
// ============================================================

export { createRuntimeContext } from './core/context.js';
export { createStepper, evaluate, execute } from './core/execute.js';
export { BUILTIN_FUNCTIONS } from './ext/builtins.js';
