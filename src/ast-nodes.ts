/**
 * Skiff AST Types
 * Closed union of node shapes; every pass switches on `type`.
 */

import type { SourceSpan } from './source-location.js';
import { SYNTHETIC_SPAN } from './source-location.js';

// ============================================================
// AST NODE TYPES
// ============================================================

export type NodeType =
  | 'Script'
  | 'ExpressionStatement'
  | 'Assignment'
  | 'SequenceLiteral'
  | 'NumberLiteral'
  | 'StringLiteral'
  | 'BoolLiteral'
  | 'NoneLiteral'
  | 'Identifier'
  | 'Call'
  | 'Subscript'
  | 'Unary';

interface BaseNode {
  readonly span: SourceSpan;
}

// ============================================================
// SCRIPT STRUCTURE
// ============================================================

export interface ScriptNode extends BaseNode {
  readonly type: 'Script';
  readonly statements: StatementNode[];
}

export interface ExpressionStatementNode extends BaseNode {
  readonly type: 'ExpressionStatement';
  readonly expression: ExpressionNode;
}

/** name = expression */
export interface AssignmentNode extends BaseNode {
  readonly type: 'Assignment';
  readonly target: string;
  readonly value: ExpressionNode;
}

export type StatementNode = ExpressionStatementNode | AssignmentNode;

// ============================================================
// SEQUENCE LITERALS
// ============================================================

export type SequenceKind = 'list' | 'tuple';

/**
 * List or tuple display: `[a, b]` or `(a, b)`.
 *
 * Both kinds share one syntactic shape; `kind` decides whether evaluation
 * produces a mutable list or an immutable tuple, and which brackets print.
 */
export interface SequenceLiteralNode extends BaseNode {
  readonly type: 'SequenceLiteral';
  readonly kind: SequenceKind;
  readonly elements: readonly ExpressionNode[];
}

// ============================================================
// SCALAR LITERALS AND NAMES
// ============================================================

export interface NumberLiteralNode extends BaseNode {
  readonly type: 'NumberLiteral';
  readonly value: number;
}

export interface StringLiteralNode extends BaseNode {
  readonly type: 'StringLiteral';
  readonly value: string;
}

export interface BoolLiteralNode extends BaseNode {
  readonly type: 'BoolLiteral';
  readonly value: boolean;
}

export interface NoneLiteralNode extends BaseNode {
  readonly type: 'NoneLiteral';
}

export interface IdentifierNode extends BaseNode {
  readonly type: 'Identifier';
  readonly name: string;
}

// ============================================================
// COMPOUND EXPRESSIONS
// ============================================================

/** Function call: name(args) */
export interface CallNode extends BaseNode {
  readonly type: 'Call';
  readonly callee: string;
  readonly args: readonly ExpressionNode[];
}

/** Index access: object[index] */
export interface SubscriptNode extends BaseNode {
  readonly type: 'Subscript';
  readonly object: ExpressionNode;
  readonly index: ExpressionNode;
}

export type UnaryOp = '-' | 'not';

export interface UnaryNode extends BaseNode {
  readonly type: 'Unary';
  readonly op: UnaryOp;
  readonly operand: ExpressionNode;
}

export type LiteralNode =
  | NumberLiteralNode
  | StringLiteralNode
  | BoolLiteralNode
  | NoneLiteralNode;

export type ExpressionNode =
  | SequenceLiteralNode
  | LiteralNode
  | IdentifierNode
  | CallNode
  | SubscriptNode
  | UnaryNode;

export type ASTNode = ScriptNode | StatementNode | ExpressionNode;

// ============================================================
// SEQUENCE LITERAL CONSTRUCTION
// ============================================================

export function makeList(
  elements: readonly ExpressionNode[],
  span: SourceSpan = SYNTHETIC_SPAN
): SequenceLiteralNode {
  return { type: 'SequenceLiteral', kind: 'list', elements, span };
}

export function makeTuple(
  elements: readonly ExpressionNode[],
  span: SourceSpan = SYNTHETIC_SPAN
): SequenceLiteralNode {
  return { type: 'SequenceLiteral', kind: 'tuple', elements, span };
}

/**
 * A new literal for an empty list, for code paths that synthesize a
 * list rather than parse one. Attach a location with `withSpan`.
 */
export function emptyList(): SequenceLiteralNode {
  return makeList([]);
}

/** Copy of `node` placed at `span` */
export function withSpan<T extends ASTNode>(node: T, span: SourceSpan): T {
  return { ...node, span };
}

export function isTupleLiteral(node: SequenceLiteralNode): boolean {
  return node.kind === 'tuple';
}

/** Exhaustiveness guard for switches over node unions */
export function unreachableNode(node: never): never {
  throw new Error(`Unknown node type: ${JSON.stringify(node)}`);
}
