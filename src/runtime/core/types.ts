/**
 * Runtime Types
 *
 * Public types for runtime configuration and execution results.
 * These types are the primary interface for host applications.
 */

import type { DiagnosticLimits } from '../../printer/abbreviated.js';
import type { CallableFn } from './callable.js';
import type { Mutability, SkiffValue } from './values.js';

/** I/O callbacks for runtime operations */
export interface RuntimeCallbacks {
  /** Called when print() is invoked */
  onLog: (value: SkiffValue) => void;
}

/** Observability callbacks for monitoring execution */
export interface ObservabilityCallbacks {
  /** Called before each statement executes */
  onStepStart?: (event: StepStartEvent) => void;
  /** Called after each statement executes */
  onStepEnd?: (event: StepEndEvent) => void;
  /** Called before a function is invoked */
  onHostCall?: (event: HostCallEvent) => void;
  /** Called after a function returns */
  onFunctionReturn?: (event: FunctionReturnEvent) => void;
  /** Called when a statement fails */
  onError?: (event: ErrorEvent) => void;
}

/** Event emitted before a statement executes */
export interface StepStartEvent {
  /** Statement index (0-based) */
  index: number;
  /** Total statements */
  total: number;
}

/** Event emitted after a statement executes */
export interface StepEndEvent {
  index: number;
  total: number;
  /** Value produced by the statement */
  value: SkiffValue;
  /** Execution time in milliseconds */
  durationMs: number;
}

/** Event emitted before a function call */
export interface HostCallEvent {
  name: string;
  args: SkiffValue[];
}

/** Event emitted after a function returns */
export interface FunctionReturnEvent {
  name: string;
  value: SkiffValue;
  durationMs: number;
}

/** Event emitted on error */
export interface ErrorEvent {
  error: Error;
  /** Statement index where error occurred (if available) */
  index?: number;
}

/** Runtime context with variables, functions, and callbacks */
export interface RuntimeContext {
  /** Global variables, assigned by scripts or seeded by the host */
  readonly variables: Map<string, SkiffValue>;
  /** Builtins and host functions */
  readonly functions: Map<string, CallableFn>;
  readonly callbacks: RuntimeCallbacks;
  readonly observability: ObservabilityCallbacks;
  /** Ownership domain of every list created in this context */
  readonly mutability: Mutability;
  /** Timeout in milliseconds for host functions (undefined = no timeout) */
  readonly timeout: number | undefined;
  /** AbortSignal for cancellation (undefined = no cancellation) */
  readonly signal: AbortSignal | undefined;
  /** Truncation limits for sequences rendered inside error messages */
  readonly diagnostics: DiagnosticLimits;
}

/** Options for creating a runtime context */
export interface RuntimeOptions {
  /** Initial variables */
  variables?: Record<string, SkiffValue>;
  /** Host functions; a name matching a builtin replaces it */
  functions?: Record<string, CallableFn>;
  callbacks?: Partial<RuntimeCallbacks>;
  observability?: ObservabilityCallbacks;
  /** Timeout in milliseconds for host functions */
  timeout?: number;
  /** AbortSignal for cancellation support */
  signal?: AbortSignal;
  diagnostics?: Partial<DiagnosticLimits>;
}

/** Result of script execution */
export interface ExecutionResult {
  /** Value of the last statement (None for an empty script) */
  value: SkiffValue;
  /** All global variables after execution */
  variables: Record<string, SkiffValue>;
}

/** Result of a single step execution */
export interface StepResult {
  value: SkiffValue;
  /** Whether execution is complete (no more statements) */
  done: boolean;
  /** Index of the statement just executed (0-based) */
  index: number;
  total: number;
}

/** Stepper for controlled step-by-step execution */
export interface ExecutionStepper {
  readonly done: boolean;
  readonly index: number;
  readonly total: number;
  readonly context: RuntimeContext;
  /** Execute the next statement */
  step(): Promise<StepResult>;
  getResult(): ExecutionResult;
}
