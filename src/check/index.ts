/**
 * Static Checks
 * Tree traversal and name validation run before execution.
 */

export {
  accept,
  visitNode,
  type NodeVisitor,
  type RuleVisitor,
} from './visitor.js';
export {
  collectDiagnostics,
  createValidationEnvironment,
  validateExpression,
  validateScript,
  type ValidationEnvironment,
} from './validator.js';
