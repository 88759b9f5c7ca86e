/**
 * Error Taxonomy Tests
 * Registry lookups, template rendering and error classes.
 */

import { describe, expect, it } from 'vitest';
import {
  AbortError,
  createError,
  ERROR_REGISTRY,
  LexerError,
  renderMessage,
  RuntimeError,
  SkiffError,
  SYNTHETIC_SPAN,
  ValidationError,
} from '../src/index.js';

describe('ERROR_REGISTRY', () => {
  it('prefixes every ID with its category letter', () => {
    const prefixes = {
      lexer: 'L',
      parse: 'P',
      runtime: 'R',
      validation: 'V',
    } as const;
    for (const [id, definition] of ERROR_REGISTRY.entries()) {
      expect(id).toMatch(new RegExp(`^SKIFF-${prefixes[definition.category]}\\d{3}$`));
    }
  });

  it('defines the missing element error', () => {
    expect(ERROR_REGISTRY.get('SKIFF-R001')?.messageTemplate).toBe(
      'Missing element expression in {literal}'
    );
  });
});

describe('renderMessage', () => {
  it('fills placeholders', () => {
    expect(
      renderMessage('Index {index} out of range for {type}', {
        index: 4,
        type: 'tuple',
      })
    ).toBe('Index 4 out of range for tuple');
  });

  it('renders missing values as empty', () => {
    expect(renderMessage('a{x}b', {})).toBe('ab');
  });

  it('returns unclosed templates unchanged', () => {
    expect(renderMessage('a{x', { x: 1 })).toBe('a{x');
  });
});

describe('error classes', () => {
  it('appends the location to the message and strips it in toData', () => {
    const err = createError(
      'SKIFF-R006',
      { type: 'list' },
      { line: 4, column: 2, offset: 30 }
    );
    expect(err).toBeInstanceOf(SkiffError);
    expect(err.message).toBe('Cannot mutate frozen list at 4:2');
    expect(err.toData()).toEqual({
      errorId: 'SKIFF-R006',
      message: 'Cannot mutate frozen list',
      location: { line: 4, column: 2, offset: 30 },
      context: { type: 'list' },
    });
  });

  it('rejects IDs from another category', () => {
    expect(
      () => new LexerError('SKIFF-R001', 'x', { line: 1, column: 1, offset: 0 })
    ).toThrow('Expected lexer error ID, got: SKIFF-R001');
    expect(() => new ValidationError('SKIFF-P001', 'x')).toThrow(TypeError);
  });

  it('rejects unknown IDs', () => {
    expect(() => createError('SKIFF-X999', {})).toThrow(
      'Unknown error ID: SKIFF-X999'
    );
  });

  it('drops synthetic locations in fromNode', () => {
    const err = RuntimeError.fromNode('SKIFF-R004', 'bad', {
      span: SYNTHETIC_SPAN,
    });
    expect(err.location).toBeUndefined();
    expect(err.message).toBe('bad');
  });

  it('gives AbortError the abort ID', () => {
    const err = new AbortError();
    expect(err.errorId).toBe('SKIFF-R005');
    expect(err.message).toBe('Execution aborted');
  });
});
