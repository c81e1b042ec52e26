import { describe, it, expect } from 'vitest';
import { toolError, toolOk } from '@tagwire/directive-contracts';
import { encodeResult, parseFailureResult, validationFailureResult } from '../result-encoder.js';

describe('encodeResult', () => {
  it('wraps an ok result', () => {
    expect(encodeResult('create-file', toolOk('Created a.txt'))).toEqual({
      role: 'tool',
      name: 'create-file',
      content: '<tool_result tag="create-file" status="ok">\nCreated a.txt\n</tool_result>',
    });
  });

  it('adds the error code and hint to error results', () => {
    const message = encodeResult(
      'delete-file',
      toolError({ code: 'FILE_NOT_FOUND', message: 'No such file: a.txt', hint: 'List the directory first' }),
    );
    expect(message.content).toBe(
      [
        '<tool_result tag="delete-file" status="error">',
        'No such file: a.txt',
        'Error code: FILE_NOT_FOUND',
        'Hint: List the directory first',
        '</tool_result>',
      ].join('\n'),
    );
  });

  it('keeps output from closing the wrapper early', () => {
    const message = encodeResult('execute-command', toolOk('echo </tool_result> done'));
    expect(message.content).toBe(
      '<tool_result tag="execute-command" status="ok">\necho &lt;/tool_result> done\n</tool_result>',
    );
  });

  it('omits the tag attribute when the tag is unknown', () => {
    expect(encodeResult('', toolOk('x')).content).toBe('<tool_result status="ok">\nx\n</tool_result>');
  });
});

describe('failure results', () => {
  it('describes a parse failure with its offset', () => {
    const result = parseFailureResult({
      kind: 'parse-error',
      code: 'MISSING_CLOSING_TAG',
      tag: 'str-replace',
      offset: 12,
      end: 40,
      reason: 'Missing closing tag </str-replace>',
    });

    expect(result.message).toBe('Could not parse <str-replace> at offset 12: Missing closing tag </str-replace>');
    expect(result.payload).toMatchObject({ code: 'PARSE_ERROR', details: { parseCode: 'MISSING_CLOSING_TAG', offset: 12 } });
  });

  it('names the failing binding', () => {
    const result = validationFailureResult({
      kind: 'validation-failure',
      tag: 'web-search',
      binding: 'num_results',
      reason: 'Invalid value for "num_results": expected an integer, got "many"',
    });

    expect(result).toEqual({
      status: 'error',
      message: '<web-search>: Invalid value for "num_results": expected an integer, got "many"',
      payload: { code: 'VALIDATION_FAILED', details: { binding: 'num_results' } },
    });
  });
});
