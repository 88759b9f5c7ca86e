/**
 * Runtime Context Factory
 *
 * Creates and configures the runtime context for script execution.
 * Public API for host applications.
 */

import { DEFAULT_DIAGNOSTIC_LIMITS } from '../../printer/abbreviated.js';
import { BUILTIN_FUNCTIONS } from '../ext/builtins.js';
import type { CallableFn } from './callable.js';
import type {
  RuntimeCallbacks,
  RuntimeContext,
  RuntimeOptions,
} from './types.js';
import { formatValue, Mutability, type SkiffValue } from './values.js';

const defaultCallbacks: RuntimeCallbacks = {
  onLog: (value) => {
    console.log(typeof value === 'string' ? value : formatValue(value));
  },
};

/**
 * Create a runtime context for script execution.
 * This is the main entry point for configuring the Skiff runtime.
 *
 * @example
 * ```typescript
 * const ctx = createRuntimeContext({
 *   variables: { limit: 10 },
 *   functions: { now: () => Date.now() },
 * });
 * ```
 */
export function createRuntimeContext(
  options: RuntimeOptions = {}
): RuntimeContext {
  const variables = new Map<string, SkiffValue>(
    Object.entries(options.variables ?? {})
  );

  const functions = new Map<string, CallableFn>(
    Object.entries(BUILTIN_FUNCTIONS)
  );
  // Custom functions can override built-ins
  for (const [name, fn] of Object.entries(options.functions ?? {})) {
    functions.set(name, fn);
  }

  return {
    variables,
    functions,
    callbacks: { ...defaultCallbacks, ...options.callbacks },
    observability: options.observability ?? {},
    mutability: new Mutability(),
    timeout: options.timeout,
    signal: options.signal,
    diagnostics: { ...DEFAULT_DIAGNOSTIC_LIMITS, ...options.diagnostics },
  };
}
