/**
 * Printer Tests: Diagnostic Summaries
 */

import { describe, expect, it } from 'vitest';
import {
  ELLIPSIS,
  type ExpressionNode,
  makeList,
  makeTuple,
  parseExpression,
  printAbbreviatedList,
  SYNTHETIC_SPAN,
  toDiagnosticString,
} from '../../src/index.js';

function num(value: number): ExpressionNode {
  return { type: 'NumberLiteral', value, span: SYNTHETIC_SPAN };
}

function range(n: number): ExpressionNode[] {
  return Array.from({ length: n }, (_, i) => num(i + 1));
}

describe('printAbbreviatedList', () => {
  it('returns short lists unchanged', () => {
    expect(printAbbreviatedList(['1', '2'], false, 4, 32)).toBe('[1, 2]');
  });

  it('keeps the singleton tuple comma when nothing is cut', () => {
    expect(printAbbreviatedList(['1'], true, 4, 32)).toBe('(1,)');
  });

  it('cuts to maxElements and appends the marker', () => {
    expect(
      printAbbreviatedList(['1', '2', '3', '4', '5', '6'], false, 4, 32)
    ).toBe('[1, 2, 3, 4, ...]');
  });

  it('drops elements until the summary fits maxLength', () => {
    const items = ['"alpha"', '"beta"', '"gamma"', '"delta"'];
    const summary = printAbbreviatedList(items, false, 4, 24);
    expect(summary).toBe('["alpha", "beta", ...]');
    expect(summary.length).toBeLessThanOrEqual(24);
  });

  it('never shrinks below the bare marker', () => {
    expect(printAbbreviatedList(['"a long element"'], true, 4, 3)).toBe(
      `(${ELLIPSIS})`
    );
  });

  it('omits the singleton comma once truncated', () => {
    expect(printAbbreviatedList(['123456789'], true, 4, 8)).toBe('(...)');
  });
});

describe('toDiagnosticString', () => {
  it('uses the default limits', () => {
    expect(toDiagnosticString(makeList(range(6)))).toBe('[1, 2, 3, 4, ...]');
  });

  it('accepts custom limits', () => {
    expect(
      toDiagnosticString(makeTuple(range(3)), { maxElements: 2, maxLength: 80 })
    ).toBe('(1, 2, ...)');
  });

  it('abbreviates nested literals with the same limits', () => {
    const node = parseExpression('[[1, 2, 3], 4]');
    if (node.type !== 'SequenceLiteral') throw new Error('expected a list');
    expect(toDiagnosticString(node, { maxElements: 2, maxLength: 80 })).toBe(
      '[[1, 2, ...], 4]'
    );
  });

  it('shows holes as <missing>', () => {
    const elements = new Array<ExpressionNode>(2);
    elements[0] = num(1);
    expect(toDiagnosticString(makeList(elements))).toBe('[1, <missing>]');
  });
});
