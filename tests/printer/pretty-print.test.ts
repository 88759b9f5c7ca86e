/**
 * Printer Tests: Pretty Printing
 */

import { describe, expect, it } from 'vitest';
import {
  type Appendable,
  emptyList,
  type ExpressionNode,
  makeList,
  makeTuple,
  parse,
  parseExpression,
  prettyPrint,
  printExpression,
  SYNTHETIC_SPAN,
} from '../../src/index.js';

function num(value: number): ExpressionNode {
  return { type: 'NumberLiteral', value, span: SYNTHETIC_SPAN };
}

describe('prettyPrint', () => {
  describe('sequence literals', () => {
    it('prints a list', () => {
      expect(printExpression(makeList([num(1), num(2), num(3)]))).toBe(
        '[1, 2, 3]'
      );
    });

    it('prints a tuple', () => {
      expect(printExpression(makeTuple([num(1), num(2), num(3)]))).toBe(
        '(1, 2, 3)'
      );
    });

    it('prints a one-element tuple with a trailing comma', () => {
      expect(printExpression(makeTuple([num(5)]))).toBe('(5,)');
    });

    it('prints a one-element list without one', () => {
      expect(printExpression(makeList([num(5)]))).toBe('[5]');
    });

    it('prints empty sequences', () => {
      expect(printExpression(emptyList())).toBe('[]');
      expect(printExpression(makeTuple([]))).toBe('()');
    });

    it('prints holes in host-built literals as <missing>', () => {
      const elements = new Array<ExpressionNode>(2);
      elements[0] = num(1);
      expect(printExpression(makeList(elements))).toBe('[1, <missing>]');
    });

    it('writes pieces to the sink in order', () => {
      const pieces: string[] = [];
      const sink: Appendable = { append: (text) => pieces.push(text) };
      prettyPrint(makeTuple([num(1), num(2)]), sink);
      expect(pieces).toEqual(['(', '', '1', ', ', '2', ')']);
    });

    it('propagates sink errors unchanged', () => {
      const failure = new Error('sink full');
      const sink: Appendable = {
        append: () => {
          throw failure;
        },
      };
      expect(() => prettyPrint(makeList([num(1)]), sink)).toThrow(failure);
    });
  });

  describe('round trips', () => {
    const cases = [
      '[1, (2,), ()]',
      'xs[-1]',
      '(-x)[0]',
      'not f("a\\"b", None, True)',
      'total = len([1, 2])',
    ];

    for (const source of cases) {
      it(`reprints ${source}`, () => {
        expect(printExpression(parse(source))).toBe(source);
      });
    }

    it('reads back numbers printed in exponent form', () => {
      const printed = printExpression(makeList([num(1e23), num(1e-7)]));
      expect(printed).toBe('[1e+23, 1e-7]');
      expect(parseExpression(printed)).toMatchObject({
        type: 'SequenceLiteral',
        elements: [
          { type: 'NumberLiteral', value: 1e23 },
          { type: 'NumberLiteral', value: 1e-7 },
        ],
      });
    });

    it('drops grouping parentheses', () => {
      expect(printExpression(parseExpression('((1))'))).toBe('1');
    });

    it('joins statements with newlines', () => {
      expect(printExpression(parse('a = 1\n\nb = (a,)'))).toBe(
        'a = 1\nb = (a,)'
      );
    });
  });
});
