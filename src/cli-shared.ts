/**
 * CLI Shared Utilities
 * Common formatting and evaluation helpers for CLI tools
 */

import { createValidationEnvironment, validateScript } from './check/index.js';
import type { SkiffConfig } from './config.js';
import { parse } from './parser/index.js';
import {
  createRuntimeContext,
  execute,
  formatValue,
  isTuple,
  type ExecutionResult,
  type RuntimeCallbacks,
  type SkiffValue,
} from './runtime/index.js';
import {
  LexerError,
  ParseError,
  RuntimeError,
  SkiffError,
  ValidationError,
} from './types.js';

export type CliCommand =
  | { mode: 'eval' | 'check'; expression: string }
  | { mode: 'help' }
  | { mode: 'version' };

/**
 * Parse skiff-eval arguments. Options start with `--`, so expressions
 * such as `-1` are positional; `--` ends option parsing.
 */
export function parseArgs(argv: readonly string[]): CliCommand {
  let check = false;
  let optionsDone = false;
  const positional: string[] = [];

  for (const arg of argv) {
    if (optionsDone || !arg.startsWith('--')) {
      positional.push(arg);
      continue;
    }
    switch (arg) {
      case '--':
        optionsDone = true;
        break;
      case '--help':
        return { mode: 'help' };
      case '--version':
        return { mode: 'version' };
      case '--check':
        check = true;
        break;
      default:
        throw new Error(`Unknown option: ${arg}`);
    }
  }

  const [expression, ...extra] = positional;
  if (expression === undefined) {
    return { mode: 'help' };
  }
  if (extra.length > 0) {
    throw new Error(`Unexpected argument: ${extra[0]}`);
  }
  return { mode: check ? 'check' : 'eval', expression };
}

/**
 * Convert execution result to human-readable string.
 * Strings print bare; everything else prints in source form.
 */
export function formatOutput(value: SkiffValue): string {
  if (typeof value === 'string') return value;
  return formatValue(value);
}

/**
 * Format error for stderr output
 *
 * @param err - The error to format
 * @returns Formatted error message
 */
export function formatError(err: Error): string {
  if (!(err instanceof SkiffError)) {
    return err.message;
  }

  const label = errorLabel(err);
  const { errorId, message, location } = err.toData();
  if (location) {
    return `${label} at line ${location.line}: ${message} [${errorId}]`;
  }
  return `${label}: ${message} [${errorId}]`;
}

function errorLabel(err: SkiffError): string {
  if (err instanceof LexerError) return 'Lexer error';
  if (err instanceof ParseError) return 'Parse error';
  if (err instanceof ValidationError) return 'Validation error';
  if (err instanceof RuntimeError) return 'Runtime error';
  return 'Error';
}

/**
 * Determine exit code from script result
 *
 * - False: exit 1
 * - (0, "message") / (1, "message"): that code, printing the message
 * - anything else: exit 0
 */
export function determineExitCode(value: SkiffValue): {
  code: number;
  message?: string;
} {
  if (isTuple(value) && value.length === 2) {
    const code = value.get(0);
    const message = value.get(1);
    if (code === 0 || code === 1) {
      if (typeof message === 'string' && message !== '') {
        return { code, message };
      }
      return { code };
    }
    return { code: 0 };
  }

  if (value === false) {
    return { code: 1 };
  }

  return { code: 0 };
}

/**
 * Parse, validate and execute source text with configuration applied.
 * Errors from any phase propagate to the caller.
 */
export async function evaluateSource(
  source: string,
  config: SkiffConfig | null,
  callbacks?: Partial<RuntimeCallbacks>
): Promise<ExecutionResult> {
  const ctx = createRuntimeContext({ ...config, callbacks });
  const ast = parse(source);
  validateScript(ast, createValidationEnvironment(ctx));
  return execute(ast, ctx);
}
