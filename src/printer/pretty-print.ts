/**
 * AST Pretty Printer
 * Writes nodes back out as canonical source text.
 */

import type {
  ASTNode,
  ExpressionNode,
  SequenceLiteralNode,
} from '../types.js';
import { isTupleLiteral, unreachableNode } from '../types.js';
import {
  DEFAULT_DIAGNOSTIC_LIMITS,
  printAbbreviatedList,
  type DiagnosticLimits,
} from './abbreviated.js';
import { quoteString } from './quote.js';

/** Destination for printed text. Errors thrown by `append` propagate. */
export interface Appendable {
  append(text: string): void;
}

/** Appendable that collects everything written to it */
export class StringSink implements Appendable {
  private readonly parts: string[] = [];

  append(text: string): void {
    this.parts.push(text);
  }

  toString(): string {
    return this.parts.join('');
  }
}

/** Rendering used for element slots that hold no expression */
export const MISSING_ELEMENT = '<missing>';

// ============================================================
// PRETTY PRINTING
// ============================================================

/**
 * Write `node` to `sink` as source text.
 *
 * Sequence literals print with `[]` or `()`; a one-element tuple gets a
 * trailing comma so it reads back as a tuple rather than a grouping.
 */
export function prettyPrint(node: ASTNode, sink: Appendable): void {
  switch (node.type) {
    case 'Script':
      node.statements.forEach((stmt, i) => {
        if (i > 0) sink.append('\n');
        prettyPrint(stmt, sink);
      });
      return;

    case 'ExpressionStatement':
      prettyPrint(node.expression, sink);
      return;

    case 'Assignment':
      sink.append(`${node.target} = `);
      prettyPrint(node.value, sink);
      return;

    case 'SequenceLiteral':
      printSequenceLiteral(node, sink);
      return;

    case 'NumberLiteral':
      sink.append(String(node.value));
      return;

    case 'StringLiteral':
      sink.append(quoteString(node.value));
      return;

    case 'BoolLiteral':
      sink.append(node.value ? 'True' : 'False');
      return;

    case 'NoneLiteral':
      sink.append('None');
      return;

    case 'Identifier':
      sink.append(node.name);
      return;

    case 'Call':
      sink.append(`${node.callee}(`);
      node.args.forEach((arg, i) => {
        if (i > 0) sink.append(', ');
        prettyPrint(arg, sink);
      });
      sink.append(')');
      return;

    case 'Subscript':
      // -x[0] would index x, not -x
      if (node.object.type === 'Unary') {
        sink.append('(');
        prettyPrint(node.object, sink);
        sink.append(')');
      } else {
        prettyPrint(node.object, sink);
      }
      sink.append('[');
      prettyPrint(node.index, sink);
      sink.append(']');
      return;

    case 'Unary':
      sink.append(node.op === 'not' ? 'not ' : '-');
      prettyPrint(node.operand, sink);
      return;

    default:
      unreachableNode(node);
  }
}

function printSequenceLiteral(
  node: SequenceLiteralNode,
  sink: Appendable
): void {
  const tuple = isTupleLiteral(node);
  sink.append(tuple ? '(' : '[');
  let sep = '';
  for (const element of node.elements) {
    sink.append(sep);
    // Host-built trees can leave holes
    if (element) prettyPrint(element, sink);
    else sink.append(MISSING_ELEMENT);
    sep = ', ';
  }
  if (tuple && node.elements.length === 1) {
    sink.append(',');
  }
  sink.append(tuple ? ')' : ']');
}

/** Pretty-print `node` into a string */
export function printExpression(node: ASTNode): string {
  const sink = new StringSink();
  prettyPrint(node, sink);
  return sink.toString();
}

// ============================================================
// DIAGNOSTIC FORM
// ============================================================

/**
 * Abbreviated single-line rendering of a sequence literal for error
 * messages. Nested literals are abbreviated with the same limits.
 */
export function toDiagnosticString(
  node: SequenceLiteralNode,
  limits: DiagnosticLimits = DEFAULT_DIAGNOSTIC_LIMITS
): string {
  const items: string[] = [];
  for (const element of node.elements) {
    items.push(renderElement(element, limits));
  }
  return printAbbreviatedList(
    items,
    isTupleLiteral(node),
    limits.maxElements,
    limits.maxLength
  );
}

function renderElement(
  element: ExpressionNode | undefined | null,
  limits: DiagnosticLimits
): string {
  // Host-built trees can leave holes
  if (element === undefined || element === null) {
    return MISSING_ELEMENT;
  }
  if (element.type === 'SequenceLiteral') {
    return toDiagnosticString(element, limits);
  }
  return printExpression(element);
}
