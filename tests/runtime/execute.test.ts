/**
 * Skiff Runtime Tests: Execution, Stepping and Observability
 */

import { describe, expect, it } from 'vitest';
import {
  createRuntimeContext,
  createStepper,
  formatValue,
  parse,
} from '../../src/index.js';
import {
  createEventCollector,
  mockFn,
  run,
  runStepped,
} from '../helpers/runtime.js';

describe('Skiff Runtime: execute', () => {
  it('returns None for an empty script', async () => {
    expect(await run('')).toBeNull();
  });

  it('returns the value of the last statement', async () => {
    expect(formatValue(await run('a = (1,)\n[a, a]'))).toBe('[(1,), (1,)]');
  });
});

describe('Skiff Runtime: stepper', () => {
  it('steps through statements one at a time', async () => {
    const results = await runStepped('a = 1\n[a]\n(a, a)');
    expect(results.map((r) => r.index)).toEqual([0, 1, 2]);
    expect(results.map((r) => r.done)).toEqual([false, false, true]);
    expect(formatValue(results[2]?.value ?? null)).toBe('(1, 1)');
  });

  it('exposes state between steps', async () => {
    const ctx = createRuntimeContext();
    const stepper = createStepper(parse('xs = [1]\nappend(xs, 2)'), ctx);

    await stepper.step();
    expect(stepper.index).toBe(1);
    expect(stepper.done).toBe(false);
    expect(ctx.mutability.isFrozen).toBe(false);

    await stepper.step();
    expect(stepper.done).toBe(true);
    expect(ctx.mutability.isFrozen).toBe(true);
    expect(formatValue(stepper.getResult().variables['xs'] ?? null)).toBe(
      '[1, 2]'
    );
  });
});

describe('Skiff Runtime: observability', () => {
  it('fires step events with indexes', async () => {
    const { events, callbacks } = createEventCollector();
    await run('a = 1\n[a]', { observability: callbacks });

    expect(events.stepStart).toEqual([
      { index: 0, total: 2 },
      { index: 1, total: 2 },
    ]);
    expect(events.stepEnd.map((e) => e.index)).toEqual([0, 1]);
    expect(events.stepEnd[0]?.value).toBe(1);
  });

  it('fires call events for builtins and host functions', async () => {
    const { events, callbacks } = createEventCollector();
    const host = mockFn('h');
    await run('len([host(1)])', {
      observability: callbacks,
      functions: { host },
    });

    expect(events.hostCall.map((e) => e.name)).toEqual(['host', 'len']);
    expect(events.hostCall[0]?.args).toEqual([1]);
    expect(events.functionReturn.map((e) => e.value)).toEqual(['h', 1]);
  });

  it('reports a failing statement through onError and rethrows', async () => {
    const { events, callbacks } = createEventCollector();
    await expect(
      run('a = 1\nmissing', { observability: callbacks })
    ).rejects.toThrow('Variable missing is not defined at 2:1');

    expect(events.error).toHaveLength(1);
    expect(events.error[0]?.index).toBe(1);
    expect(events.stepEnd).toHaveLength(1);
  });
});
