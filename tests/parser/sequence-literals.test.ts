/**
 * Parser Tests: Sequence Literals
 * List displays, tuple displays and parenthesized grouping.
 */

import { describe, expect, it } from 'vitest';
import {
  isTupleLiteral,
  parse,
  parseExpression,
  ParseError,
  type ExpressionNode,
  type SequenceLiteralNode,
} from '../../src/index.js';

function sequence(source: string): SequenceLiteralNode {
  const node = parseExpression(source);
  if (node.type !== 'SequenceLiteral') {
    throw new Error(`Expected SequenceLiteral, got ${node.type}`);
  }
  return node;
}

function numbers(elements: readonly ExpressionNode[]): number[] {
  return elements.map((e) => (e.type === 'NumberLiteral' ? e.value : NaN));
}

describe('Parser: sequence literals', () => {
  describe('lists', () => {
    it('parses elements in order', () => {
      const node = sequence('[1, 2, 3]');
      expect(node.kind).toBe('list');
      expect(numbers(node.elements)).toEqual([1, 2, 3]);
    });

    it('parses an empty list', () => {
      const node = sequence('[]');
      expect(node.kind).toBe('list');
      expect(node.elements).toHaveLength(0);
    });

    it('allows a trailing comma', () => {
      expect(numbers(sequence('[1, 2,]').elements)).toEqual([1, 2]);
    });

    it('allows newlines between elements', () => {
      expect(numbers(sequence('[\n  1,\n  2\n]').elements)).toEqual([1, 2]);
    });

    it('records the span from [ to ]', () => {
      const node = sequence('[1, 2]');
      expect(node.span.start).toEqual({ line: 1, column: 1, offset: 0 });
      expect(node.span.end).toEqual({ line: 1, column: 7, offset: 6 });
    });

    it('nests sequences', () => {
      const node = sequence('[(1, 2), [3]]');
      const [first, second] = node.elements;
      expect(first?.type === 'SequenceLiteral' && first.kind).toBe('tuple');
      expect(second?.type === 'SequenceLiteral' && second.kind).toBe('list');
    });
  });

  describe('tuples', () => {
    it('parses (1, 2, 3) as a tuple', () => {
      const node = sequence('(1, 2, 3)');
      expect(isTupleLiteral(node)).toBe(true);
      expect(numbers(node.elements)).toEqual([1, 2, 3]);
    });

    it('parses () as the empty tuple', () => {
      const node = sequence('()');
      expect(node.kind).toBe('tuple');
      expect(node.elements).toHaveLength(0);
    });

    it('parses (5,) as a one-element tuple', () => {
      const node = sequence('(5,)');
      expect(node.kind).toBe('tuple');
      expect(numbers(node.elements)).toEqual([5]);
    });

    it('parses (5) as grouping, not a tuple', () => {
      const node = parseExpression('(5)');
      expect(node.type).toBe('NumberLiteral');
    });
  });

  describe('errors', () => {
    it('reports a missing closing bracket', () => {
      expect(() => parse('[1, 2')).toThrow(
        'Expected ]. Hint: Check for unclosed bracket at 1:6'
      );
    });

    it('reports a missing comma', () => {
      try {
        parse('[1 2]');
        expect.fail('Should have thrown');
      } catch (err) {
        expect(err).toBeInstanceOf(ParseError);
        if (err instanceof ParseError) {
          expect(err.errorId).toBe('SKIFF-P002');
          expect(err.message).toBe(
            'Expected ]. Hint: Separate elements with a comma at 1:4'
          );
        }
      }
    });

    it('rejects an empty slot between commas', () => {
      expect(() => parse('[1, , 2]')).toThrow('Unexpected token: , at 1:5');
    });

    it('rejects a lone comma in parentheses', () => {
      expect(() => parse('(,)')).toThrow('Unexpected token: , at 1:2');
    });
  });
});
