import { describe, it, expect } from 'vitest';
import {
  booleanArg,
  errorPayload,
  integerArg,
  listArg,
  optionalIntegerArg,
  optionalStringArg,
  stringArg,
  toolError,
  toolOk,
} from '../tool-result.js';
import { ArgumentTypeError } from '../errors.js';

describe('toolOk / toolError', () => {
  it('omits an absent payload', () => {
    expect(toolOk('done')).toEqual({ status: 'ok', message: 'done' });
  });

  it('builds an error with code and hint', () => {
    const result = toolError({ code: 'FILE_NOT_FOUND', message: 'missing', hint: 'check the path' });
    expect(result).toEqual({
      status: 'error',
      message: 'missing',
      payload: { code: 'FILE_NOT_FOUND', hint: 'check the path' },
    });
    expect(errorPayload(result)).toEqual({ code: 'FILE_NOT_FOUND', hint: 'check the path' });
  });

  it('errorPayload ignores ok results', () => {
    expect(errorPayload(toolOk('done', { code: 'X' }))).toBeUndefined();
  });
});

describe('argument helpers', () => {
  const args = { path: 'a.txt', count: 3, force: true, items: ['one', 'two'] };

  it('return typed values', () => {
    expect(stringArg(args, 'path')).toBe('a.txt');
    expect(integerArg(args, 'count')).toBe(3);
    expect(booleanArg(args, 'force')).toBe(true);
    expect(listArg(args, 'items')).toEqual(['one', 'two']);
  });

  it('optional helpers return undefined for absent arguments', () => {
    expect(optionalStringArg(args, 'missing')).toBeUndefined();
    expect(optionalIntegerArg(args, 'missing')).toBeUndefined();
  });

  it('throw ArgumentTypeError on the wrong type', () => {
    expect(() => stringArg(args, 'count')).toThrow(ArgumentTypeError);
    expect(() => integerArg(args, 'path')).toThrow('Argument "path" must be an integer');
    expect(() => listArg(args, 'path')).toThrow(ArgumentTypeError);
  });
});
