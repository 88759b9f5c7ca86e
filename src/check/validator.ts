/**
 * Static Validation
 *
 * Checks names before execution. `validateExpression` and
 * `validateScript` stop at the first problem and throw it;
 * `collectDiagnostics` walks the whole tree and reports every problem.
 */

import type {
  ASTNode,
  AssignmentNode,
  CallNode,
  ExpressionNode,
  IdentifierNode,
  ScriptNode,
  SourceLocation,
} from '../types.js';
import { isSyntheticSpan, ValidationError } from '../types.js';
import type { RuntimeContext } from '../runtime/core/types.js';
import { BUILTIN_FUNCTIONS } from '../runtime/ext/builtins.js';
import { accept, visitNode, type NodeVisitor } from './visitor.js';

// ============================================================
// ENVIRONMENT
// ============================================================

/** Names known while validating, in one flat global namespace */
export interface ValidationEnvironment {
  isDefined(name: string): boolean;
  define(name: string): void;
  /** True for names reserved by builtin functions */
  isBuiltin(name: string): boolean;
}

/**
 * Environment seeded with the builtins, plus the host functions and
 * variables of `ctx` when given.
 */
export function createValidationEnvironment(
  ctx?: RuntimeContext
): ValidationEnvironment {
  const builtins = new Set(Object.keys(BUILTIN_FUNCTIONS));
  const names = new Set<string>(builtins);
  if (ctx) {
    for (const name of ctx.functions.keys()) names.add(name);
    for (const name of ctx.variables.keys()) names.add(name);
  }

  return {
    isDefined: (name) => names.has(name),
    define: (name) => {
      names.add(name);
    },
    isBuiltin: (name) => builtins.has(name),
  };
}

// ============================================================
// NAME CHECKS
// ============================================================

function locationOf(node: ASTNode): SourceLocation | undefined {
  return isSyntheticSpan(node.span) ? undefined : node.span.start;
}

function checkName(
  node: IdentifierNode | CallNode,
  env: ValidationEnvironment
): ValidationError | undefined {
  const name = node.type === 'Call' ? node.callee : node.name;
  if (env.isDefined(name)) return undefined;
  return new ValidationError(
    'SKIFF-V001',
    `Name ${name} is not defined`,
    locationOf(node),
    { name }
  );
}

function checkTarget(
  node: AssignmentNode,
  env: ValidationEnvironment
): ValidationError | undefined {
  if (!env.isBuiltin(node.target)) return undefined;
  return new ValidationError(
    'SKIFF-V002',
    `Cannot assign to builtin ${node.target}`,
    locationOf(node),
    { name: node.target }
  );
}

// ============================================================
// FAIL-FAST VALIDATION
// ============================================================

function failFastVisitor(env: ValidationEnvironment): NodeVisitor<void> {
  const visitor: NodeVisitor<void> = {
    Script(node) {
      for (const stmt of node.statements) accept(stmt, visitor);
    },
    ExpressionStatement(node) {
      accept(node.expression, visitor);
    },
    Assignment(node) {
      const error = checkTarget(node, env);
      if (error) throw error;
      accept(node.value, visitor);
      // Defined only after its value, so `x = [x]` needs an earlier x
      env.define(node.target);
    },
    SequenceLiteral(node) {
      // No checks of its own; an empty slot is left for the evaluator
      for (const element of node.elements) {
        if (element) accept(element, visitor);
      }
    },
    NumberLiteral() {},
    StringLiteral() {},
    BoolLiteral() {},
    NoneLiteral() {},
    Identifier(node) {
      const error = checkName(node, env);
      if (error) throw error;
    },
    Call(node) {
      const error = checkName(node, env);
      if (error) throw error;
      for (const arg of node.args) accept(arg, visitor);
    },
    Subscript(node) {
      accept(node.object, visitor);
      accept(node.index, visitor);
    },
    Unary(node) {
      accept(node.operand, visitor);
    },
  };
  return visitor;
}

/**
 * Validate an expression tree. Children are checked in order and the
 * first failure is thrown; later siblings are not visited.
 *
 * @throws ValidationError SKIFF-V001 for an unknown name
 */
export function validateExpression(
  node: ExpressionNode,
  env: ValidationEnvironment
): void {
  accept(node, failFastVisitor(env));
}

/**
 * Validate statements in order. Assignments define their target for
 * the statements that follow.
 *
 * @throws ValidationError SKIFF-V001 or SKIFF-V002 on the first problem
 */
export function validateScript(
  script: ScriptNode,
  env: ValidationEnvironment = createValidationEnvironment()
): void {
  accept(script, failFastVisitor(env));
}

// ============================================================
// DIAGNOSTIC COLLECTION
// ============================================================

/**
 * Validate the whole tree, collecting every error instead of throwing.
 * Errors come back in traversal order.
 */
export function collectDiagnostics(
  node: ASTNode,
  env: ValidationEnvironment = createValidationEnvironment()
): ValidationError[] {
  const diagnostics: ValidationError[] = [];

  visitNode(node, diagnostics, {
    enter(current, found) {
      let error: ValidationError | undefined;
      if (current.type === 'Identifier' || current.type === 'Call') {
        error = checkName(current, env);
      } else if (current.type === 'Assignment') {
        error = checkTarget(current, env);
      }
      if (error) found.push(error);
    },
    exit(current) {
      // Assignment targets become visible after their value
      if (current.type === 'Assignment') {
        env.define(current.target);
      }
    },
  });

  return diagnostics;
}
