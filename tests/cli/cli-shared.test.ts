/**
 * CLI Shared Utilities Tests
 */

import { describe, expect, it } from 'vitest';
import {
  determineExitCode,
  evaluateSource,
  formatError,
  formatOutput,
  parseArgs,
} from '../../src/cli-shared.js';
import {
  createError,
  Mutability,
  parse,
  SkiffList,
  SkiffTuple,
  type SkiffValue,
} from '../../src/index.js';

async function failure(run: () => unknown): Promise<Error> {
  try {
    await run();
  } catch (err) {
    if (err instanceof Error) return err;
  }
  throw new Error('Expected a failure');
}

describe('parseArgs', () => {
  it('takes an expression that starts with unary minus', () => {
    expect(parseArgs(['-1'])).toEqual({ mode: 'eval', expression: '-1' });
    expect(parseArgs(['--check', '-xs[0]'])).toEqual({
      mode: 'check',
      expression: '-xs[0]',
    });
  });

  it('treats everything after -- as positional', () => {
    expect(parseArgs(['--', '--help'])).toEqual({
      mode: 'eval',
      expression: '--help',
    });
  });

  it('rejects unknown double-dash options', () => {
    expect(() => parseArgs(['--fast', '[1]'])).toThrow(
      'Unknown option: --fast'
    );
  });

  it('rejects a second expression', () => {
    expect(() => parseArgs(['[1]', '[2]'])).toThrow(
      'Unexpected argument: [2]'
    );
  });

  it('shows help without an expression', () => {
    expect(parseArgs([])).toEqual({ mode: 'help' });
    expect(parseArgs(['--version'])).toEqual({ mode: 'version' });
  });
});

describe('formatOutput', () => {
  it('prints strings bare and other values in source form', () => {
    expect(formatOutput('hello')).toBe('hello');
    expect(formatOutput(null)).toBe('None');
    expect(formatOutput(SkiffTuple.of('a'))).toBe('("a",)');
    expect(formatOutput(new SkiffList([1], new Mutability()))).toBe('[1]');
  });
});

describe('formatError', () => {
  it('labels lexer errors with their line', async () => {
    const err = await failure(() => parse('\n"open'));
    expect(formatError(err)).toBe(
      'Lexer error at line 2: Unterminated string literal [SKIFF-L001]'
    );
  });

  it('labels parse errors', async () => {
    const err = await failure(() => parse('[1'));
    expect(formatError(err)).toBe(
      'Parse error at line 1: Expected ]. Hint: Check for unclosed bracket [SKIFF-P002]'
    );
  });

  it('labels registry errors without a location', () => {
    expect(formatError(createError('SKIFF-R002', { name: 'q' }))).toBe(
      'Error: Variable q is not defined [SKIFF-R002]'
    );
  });

  it('passes other errors through', () => {
    expect(formatError(new Error('plain'))).toBe('plain');
  });
});

describe('determineExitCode', () => {
  it('maps False to 1 and other values to 0', () => {
    expect(determineExitCode(false)).toEqual({ code: 1 });
    expect(determineExitCode(null)).toEqual({ code: 0 });
    expect(determineExitCode('')).toEqual({ code: 0 });
  });

  it('reads (code, message) tuples', () => {
    expect(determineExitCode(SkiffTuple.of(1, 'failed'))).toEqual({
      code: 1,
      message: 'failed',
    });
    expect(determineExitCode(SkiffTuple.of(0, ''))).toEqual({ code: 0 });
  });

  it('ignores lists and other tuple shapes', () => {
    const list: SkiffValue = new SkiffList([1, 'x'], new Mutability());
    expect(determineExitCode(list)).toEqual({ code: 0 });
    expect(determineExitCode(SkiffTuple.of(7, 'x'))).toEqual({ code: 0 });
  });
});

describe('evaluateSource', () => {
  it('evaluates a negated expression', async () => {
    const result = await evaluateSource('-(1, 2)[0]', null);
    expect(result.value).toBe(-1);
  });

  it('parses, validates and executes', async () => {
    const result = await evaluateSource('xs = [1]\nappend(xs, 2)\nxs', null);
    expect(formatOutput(result.value)).toBe('[1, 2]');
  });

  it('validates before running anything', async () => {
    const logs: SkiffValue[] = [];
    const err = await failure(() =>
      evaluateSource('print(1)\nnope', null, { onLog: (v) => logs.push(v) })
    );
    expect(formatError(err)).toBe(
      'Validation error at line 2: Name nope is not defined [SKIFF-V001]'
    );
    expect(logs).toEqual([]);
  });

  it('applies configured variables', async () => {
    const result = await evaluateSource('len(sizes)', {
      variables: { sizes: SkiffTuple.of(1, 2, 3) },
    });
    expect(result.value).toBe(3);
  });
});
