/**
 * Skiff Runtime Tests: Sequence Literal Evaluation
 * Element order, fresh instances, aliasing, freezing and missing slots.
 */

import { describe, expect, it } from 'vitest';
import {
  createRuntimeContext,
  evaluate,
  execute,
  type ExpressionNode,
  formatValue,
  isList,
  isTuple,
  makeList,
  makeTuple,
  parse,
  parseExpression,
  RuntimeError,
  type SkiffValue,
  SYNTHETIC_SPAN,
} from '../../src/index.js';
import { mockFn, run, runWithContext } from '../helpers/runtime.js';

function num(value: number): ExpressionNode {
  return { type: 'NumberLiteral', value, span: SYNTHETIC_SPAN };
}

function items(value: SkiffValue): SkiffValue[] {
  if (!isList(value) && !isTuple(value)) {
    throw new Error(`Expected a sequence, got ${formatValue(value)}`);
  }
  return value.toArray();
}

describe('Skiff Runtime: Sequence Literals', () => {
  describe('lists', () => {
    it('evaluates elements into a list', async () => {
      const value = await run('[1, "two", None]');
      expect(isList(value)).toBe(true);
      expect(items(value)).toEqual([1, 'two', null]);
    });

    it('evaluates an empty list', async () => {
      const value = await run('[]');
      expect(isList(value)).toBe(true);
      expect(items(value)).toEqual([]);
    });

    it('keeps nested sequences as values', async () => {
      expect(formatValue(await run('[[1], (2,), ()]'))).toBe(
        '[[1], (2,), ()]'
      );
    });
  });

  describe('tuples', () => {
    it('evaluates elements into a tuple', async () => {
      const value = await run('(1, 2, 3)');
      expect(isTuple(value)).toBe(true);
      expect(items(value)).toEqual([1, 2, 3]);
    });

    it('evaluates a one-element tuple', async () => {
      const value = await run('(5,)');
      expect(isTuple(value)).toBe(true);
      expect(formatValue(value)).toBe('(5,)');
    });

    it('evaluates grouping to the inner value', async () => {
      expect(await run('(5)')).toBe(5);
    });

    it('lets a tuple hold a mutable list', async () => {
      const value = await run('t = (1, [2])\nappend(t[1], 3)\nt');
      expect(formatValue(value)).toBe('(1, [2, 3])');
    });
  });

  describe('evaluation order', () => {
    it('evaluates elements left to right', async () => {
      const order: number[] = [];
      let next = 0;
      const tick = (): SkiffValue => {
        const n = next++;
        order.push(n);
        return n;
      };

      const value = await run('[tick(), tick(), tick()]', {
        functions: { tick },
      });

      expect(order).toEqual([0, 1, 2]);
      expect(items(value)).toEqual([0, 1, 2]);
    });

    it('waits for each async element before starting the next', async () => {
      const order: string[] = [];
      const slow = async (): Promise<SkiffValue> => {
        await new Promise((r) => setTimeout(r, 20));
        order.push('slow');
        return 'slow';
      };
      const fast = (): SkiffValue => {
        order.push('fast');
        return 'fast';
      };

      const value = await run('(slow(), fast())', {
        functions: { slow, fast },
      });

      expect(order).toEqual(['slow', 'fast']);
      expect(items(value)).toEqual(['slow', 'fast']);
    });

    it('stops at the first failing element', async () => {
      const after = mockFn(1);
      await expect(
        run('[1, missing, after()]', { functions: { after } })
      ).rejects.toThrow('Variable missing is not defined at 1:5');
      expect(after.calls).toHaveLength(0);
    });
  });

  describe('identity', () => {
    it('produces a distinct list on every evaluation', async () => {
      const ctx = createRuntimeContext();
      const node = parseExpression('[1, 2]');
      const first = await evaluate(node, ctx);
      const second = await evaluate(node, ctx);
      expect(first).not.toBe(second);
      expect(items(first)).toEqual(items(second));
    });

    it('produces a distinct tuple on every evaluation', async () => {
      const ctx = createRuntimeContext();
      const node = parseExpression('(1, 2)');
      expect(await evaluate(node, ctx)).not.toBe(await evaluate(node, ctx));
    });

    it('shares one list between aliases', async () => {
      const value = await run('xs = [1]\nys = xs\nappend(ys, 2)\nxs');
      expect(items(value)).toEqual([1, 2]);
    });

    it('does not share lists built from equal literals', async () => {
      const value = await run('xs = [1]\nys = [1]\nappend(ys, 2)\nxs');
      expect(items(value)).toEqual([1]);
    });
  });

  describe('freezing', () => {
    it('leaves lists mutable while the script runs', async () => {
      expect(items(await run('xs = []\nappend(xs, 1)\nxs'))).toEqual([1]);
    });

    it('freezes lists once execution ends', async () => {
      const { result, ctx } = await runWithContext('xs = [1]\nxs');
      const value = result.value;
      if (!isList(value)) throw new Error('expected a list');

      expect(ctx.mutability.isFrozen).toBe(true);
      expect(value.isFrozen).toBe(true);
      expect(() => value.append(2)).toThrow('Cannot mutate frozen list');
      expect(value.toArray()).toEqual([1]);
    });

    it('freezes even when execution fails', async () => {
      const ctx = createRuntimeContext();
      const node = parseExpression('[1]');
      const list = await evaluate(node, ctx);
      await expect(execute(parse('undefined_name'), ctx)).rejects.toThrow(
        RuntimeError
      );
      if (!isList(list)) throw new Error('expected a list');
      expect(() => list.append(2)).toThrow('Cannot mutate frozen list');
    });
  });

  describe('missing elements', () => {
    const span = {
      start: { line: 3, column: 7, offset: 20 },
      end: { line: 3, column: 16, offset: 29 },
    };

    it('throws SKIFF-R001 with the literal location', async () => {
      const elements = new Array<ExpressionNode>(2);
      elements[0] = num(1);
      const ctx = createRuntimeContext();

      try {
        await evaluate(makeList(elements, span), ctx);
        expect.fail('Should have thrown');
      } catch (err) {
        expect(err).toBeInstanceOf(RuntimeError);
        if (err instanceof RuntimeError) {
          expect(err.errorId).toBe('SKIFF-R001');
          expect(err.location).toEqual({ line: 3, column: 7, offset: 20 });
          expect(err.message).toBe(
            'Missing element expression in [1, <missing>] at 3:7'
          );
          expect(err.context).toEqual({
            literal: '[1, <missing>]',
            index: 1,
          });
        }
      }
    });

    it('evaluates the elements before the hole first', async () => {
      const before = mockFn(1);
      const elements = new Array<ExpressionNode>(2);
      elements[0] = { type: 'Call', callee: 'before', args: [], span };
      const ctx = createRuntimeContext({ functions: { before } });

      await expect(evaluate(makeTuple(elements), ctx)).rejects.toThrow(
        'Missing element expression in (before(), <missing>)'
      );
      expect(before.calls).toHaveLength(1);
    });

    it('uses the context diagnostic limits', async () => {
      const holey = new Array<ExpressionNode>(4);
      holey[0] = num(1);
      holey[1] = num(2);
      holey[2] = num(3);
      const ctx = createRuntimeContext({ diagnostics: { maxElements: 2 } });

      await expect(evaluate(makeList(holey), ctx)).rejects.toThrow(
        'Missing element expression in [1, 2, ...]'
      );
    });

    it('omits the location for synthetic literals', async () => {
      const ctx = createRuntimeContext();
      const holey = new Array<ExpressionNode>(1);
      try {
        await evaluate(makeList(holey), ctx);
        expect.fail('Should have thrown');
      } catch (err) {
        expect(err).toBeInstanceOf(RuntimeError);
        if (err instanceof RuntimeError) {
          expect(err.location).toBeUndefined();
          expect(err.message).toBe(
            'Missing element expression in [<missing>]'
          );
        }
      }
    });
  });
});
