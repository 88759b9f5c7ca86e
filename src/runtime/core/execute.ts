/**
 * Script Execution
 *
 * Public API for executing Skiff scripts.
 * Provides both full execution and step-by-step execution.
 */

import type { ExpressionNode, ScriptNode } from '../../types.js';
import { AbortError, isSyntheticSpan } from '../../types.js';
import { getEvaluator } from './eval/index.js';
import type {
  ExecutionResult,
  ExecutionStepper,
  RuntimeContext,
  StepResult,
} from './types.js';
import type { SkiffValue } from './values.js';

/**
 * Execute a parsed Skiff script.
 *
 * Once execution ends, successfully or not, the context's mutability
 * domain is frozen: lists the script created can be read but no longer
 * changed.
 *
 * @param script The parsed AST (from parse())
 * @param context The runtime context (from createRuntimeContext())
 * @returns The final value and all global variables
 */
export async function execute(
  script: ScriptNode,
  context: RuntimeContext
): Promise<ExecutionResult> {
  const stepper = createStepper(script, context);
  try {
    while (!stepper.done) {
      await stepper.step();
    }
    return stepper.getResult();
  } finally {
    context.mutability.freeze();
  }
}

/**
 * Evaluate a single expression tree against a context.
 * Unlike execute(), this leaves the context unfrozen, so hosts can
 * evaluate several trees that share state.
 */
export async function evaluate(
  node: ExpressionNode,
  context: RuntimeContext
): Promise<SkiffValue> {
  return getEvaluator(context).evaluateExpression(node);
}

/**
 * Create a stepper for controlled step-by-step execution.
 * Allows the caller to control the execution loop and inspect state between steps.
 * The context is frozen when the last statement completes or a step fails.
 *
 * @param script The parsed AST (from parse())
 * @param context The runtime context (from createRuntimeContext())
 */
export function createStepper(
  script: ScriptNode,
  context: RuntimeContext
): ExecutionStepper {
  const statements = script.statements;
  const total = statements.length;
  const evaluator = getEvaluator(context);
  let index = 0;
  let lastValue: SkiffValue = null;
  let isDone = total === 0;

  const finish = (): void => {
    isDone = true;
    context.mutability.freeze();
  };

  const collectVariables = (): Record<string, SkiffValue> => {
    const vars: Record<string, SkiffValue> = {};
    for (const [name, value] of context.variables) {
      vars[name] = value;
    }
    return vars;
  };

  return {
    get done() {
      return isDone;
    },
    get index() {
      return index;
    },
    get total() {
      return total;
    },
    get context() {
      return context;
    },

    async step(): Promise<StepResult> {
      const stmt = statements[index];
      if (isDone || !stmt) {
        finish();
        return { value: lastValue, done: true, index, total };
      }

      // Check for abort before each step
      if (context.signal?.aborted) {
        finish();
        throw new AbortError(
          isSyntheticSpan(stmt.span) ? undefined : stmt.span.start
        );
      }

      const startTime = Date.now();
      context.observability.onStepStart?.({ index, total });

      try {
        const value = await evaluator.executeStatement(stmt);
        lastValue = value;

        context.observability.onStepEnd?.({
          index,
          total,
          value,
          durationMs: Date.now() - startTime,
        });

        index++;
        if (index >= total) finish();

        return { value, done: isDone, index: index - 1, total };
      } catch (error) {
        finish();
        context.observability.onError?.({
          error: error instanceof Error ? error : new Error(String(error)),
          index,
        });
        throw error;
      }
    },

    getResult(): ExecutionResult {
      return {
        value: lastValue,
        variables: collectVariables(),
      };
    },
  };
}
