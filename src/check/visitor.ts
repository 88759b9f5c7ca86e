/**
 * AST Visitor
 * Single-dispatch `accept` over a per-node-type table, and recursive
 * traversal with enter/exit callbacks.
 */

import type {
  ASTNode,
  AssignmentNode,
  BoolLiteralNode,
  CallNode,
  ExpressionStatementNode,
  IdentifierNode,
  NoneLiteralNode,
  NumberLiteralNode,
  ScriptNode,
  SequenceLiteralNode,
  StringLiteralNode,
  SubscriptNode,
  UnaryNode,
} from '../types.js';
import { unreachableNode } from '../types.js';

// ============================================================
// DOUBLE DISPATCH
// ============================================================

/**
 * One handler per node type. Adding a node type to the AST makes every
 * visitor that lacks a handler for it fail to compile.
 */
export interface NodeVisitor<R> {
  Script(node: ScriptNode): R;
  ExpressionStatement(node: ExpressionStatementNode): R;
  Assignment(node: AssignmentNode): R;
  SequenceLiteral(node: SequenceLiteralNode): R;
  NumberLiteral(node: NumberLiteralNode): R;
  StringLiteral(node: StringLiteralNode): R;
  BoolLiteral(node: BoolLiteralNode): R;
  NoneLiteral(node: NoneLiteralNode): R;
  Identifier(node: IdentifierNode): R;
  Call(node: CallNode): R;
  Subscript(node: SubscriptNode): R;
  Unary(node: UnaryNode): R;
}

/** Call the handler for `node`'s type and return its result */
export function accept<R>(node: ASTNode, visitor: NodeVisitor<R>): R {
  switch (node.type) {
    case 'Script':
      return visitor.Script(node);
    case 'ExpressionStatement':
      return visitor.ExpressionStatement(node);
    case 'Assignment':
      return visitor.Assignment(node);
    case 'SequenceLiteral':
      return visitor.SequenceLiteral(node);
    case 'NumberLiteral':
      return visitor.NumberLiteral(node);
    case 'StringLiteral':
      return visitor.StringLiteral(node);
    case 'BoolLiteral':
      return visitor.BoolLiteral(node);
    case 'NoneLiteral':
      return visitor.NoneLiteral(node);
    case 'Identifier':
      return visitor.Identifier(node);
    case 'Call':
      return visitor.Call(node);
    case 'Subscript':
      return visitor.Subscript(node);
    case 'Unary':
      return visitor.Unary(node);
    default:
      return unreachableNode(node);
  }
}

// ============================================================
// TRAVERSAL
// ============================================================

/**
 * Visitor pattern interface for AST traversal.
 * Provides enter/exit callbacks invoked before and after visiting children.
 */
export interface RuleVisitor<C> {
  /** Called before visiting node's children */
  enter(node: ASTNode, context: C): void;

  /** Called after visiting node's children */
  exit(node: ASTNode, context: C): void;
}

/**
 * Recursively visit AST nodes with enter/exit callbacks.
 * Children are visited in source order. Empty element slots in
 * host-built sequence literals are skipped.
 *
 * Traversal order:
 * 1. visitor.enter(node)
 * 2. Recurse into children
 * 3. visitor.exit(node)
 */
export function visitNode<C>(
  node: ASTNode,
  context: C,
  visitor: RuleVisitor<C>
): void {
  visitor.enter(node, context);

  switch (node.type) {
    case 'Script':
      for (const stmt of node.statements) {
        visitNode(stmt, context, visitor);
      }
      break;

    case 'ExpressionStatement':
      visitNode(node.expression, context, visitor);
      break;

    case 'Assignment':
      visitNode(node.value, context, visitor);
      break;

    case 'SequenceLiteral':
      for (const element of node.elements) {
        if (element) visitNode(element, context, visitor);
      }
      break;

    case 'Call':
      for (const arg of node.args) {
        visitNode(arg, context, visitor);
      }
      break;

    case 'Subscript':
      visitNode(node.object, context, visitor);
      visitNode(node.index, context, visitor);
      break;

    case 'Unary':
      visitNode(node.operand, context, visitor);
      break;

    case 'NumberLiteral':
    case 'StringLiteral':
    case 'BoolLiteral':
    case 'NoneLiteral':
    case 'Identifier':
      // Leaf nodes - no children
      break;

    default:
      unreachableNode(node);
  }

  visitor.exit(node, context);
}
