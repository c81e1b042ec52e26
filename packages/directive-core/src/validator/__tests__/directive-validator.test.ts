import { describe, it, expect } from 'vitest';
import type { Invocation, ToolSchema } from '@tagwire/directive-contracts';
import { toolOk } from '@tagwire/directive-contracts';
import { parseDirectives } from '../../parser/directive-parser.js';
import { SchemaRegistry } from '../../registry/schema-registry.js';
import { validate, validateWithRegistry } from '../directive-validator.js';

function parseOne(text: string): Invocation {
  const [item] = [...parseDirectives(text)];
  if (item?.kind !== 'invocation') {
    throw new Error(`Expected an invocation in ${text}`);
  }
  return item;
}

const createFile: ToolSchema = {
  tag: 'create-file',
  bindings: [
    { name: 'file_path', source: 'attribute', path: 'file_path', required: true, valueType: 'string' },
    { name: 'file_contents', source: 'content', path: '.', required: true, valueType: 'string' },
  ],
};

const ensureTodo: ToolSchema = {
  tag: 'ensure-todo',
  bindings: [
    { name: 'overwrite', source: 'attribute', path: 'overwrite', required: true, valueType: 'boolean' },
    { name: 'description', source: 'content', path: '.', required: true, valueType: 'string' },
  ],
};

const clickElement: ToolSchema = {
  tag: 'browser-click-element',
  bindings: [{ name: 'index', source: 'content', path: '.', required: true, valueType: 'integer' }],
};

const webSearch: ToolSchema = {
  tag: 'web-search',
  bindings: [
    { name: 'query', source: 'attribute', path: 'query', required: true, valueType: 'string' },
    {
      name: 'num_results',
      source: 'attribute',
      path: 'num_results',
      required: false,
      valueType: 'integer',
      default: 20,
    },
  ],
};

const updateTodo: ToolSchema = {
  tag: 'update-todo',
  bindings: [
    { name: 'section', source: 'attribute', path: 'section', required: true, valueType: 'string' },
    { name: 'completed_tasks', source: 'element', path: 'completed_tasks', required: true, valueType: 'list' },
    { name: 'new_tasks', source: 'element', path: 'new_tasks', required: true, valueType: 'list' },
  ],
};

describe('validate', () => {
  it('builds a call from a trimmed attribute and content without the tag newlines', () => {
    const outcome = validate(createFile, parseOne('<create-file file_path=" a.txt ">\n  hello\n</create-file>'));
    expect(outcome).toEqual({
      kind: 'call',
      tag: 'create-file',
      args: { file_path: 'a.txt', file_contents: '  hello' },
    });
  });

  it('fails naming a missing required binding', () => {
    const outcome = validate(createFile, parseOne('<create-file>hello</create-file>'));
    expect(outcome).toEqual({
      kind: 'validation-failure',
      tag: 'create-file',
      binding: 'file_path',
      reason: 'Missing required attribute "file_path" for "file_path"',
    });
  });

  it('treats an empty body as missing content', () => {
    const outcome = validate(createFile, parseOne('<create-file file_path="a.txt">  \n </create-file>'));
    expect(outcome.kind === 'validation-failure' && outcome.binding).toBe('file_contents');
  });

  it('reports coercion failures as validation failures', () => {
    const outcome = validate(clickElement, parseOne('<browser-click-element>abc</browser-click-element>'));
    expect(outcome).toEqual({
      kind: 'validation-failure',
      tag: 'browser-click-element',
      binding: 'index',
      reason: 'Invalid value for "index": expected an integer, got "abc"',
    });
  });

  it('coerces booleans, including a valueless attribute', () => {
    const yes = validate(ensureTodo, parseOne('<ensure-todo overwrite="yes">Plan</ensure-todo>'));
    const bare = validate(ensureTodo, parseOne('<ensure-todo overwrite>Plan</ensure-todo>'));
    const bad = validate(ensureTodo, parseOne('<ensure-todo overwrite="maybe">Plan</ensure-todo>'));

    expect(yes.kind === 'call' && yes.args.overwrite).toBe(true);
    expect(bare.kind === 'call' && bare.args.overwrite).toBe(true);
    expect(bad.kind).toBe('validation-failure');
  });

  it('applies defaults to absent optional bindings and ignores unknown attributes', () => {
    const outcome = validate(webSearch, parseOne('<web-search query="tide tables" extra="1" />'));
    expect(outcome).toEqual({
      kind: 'call',
      tag: 'web-search',
      args: { query: 'tide tables', num_results: 20 },
    });
  });

  it('reads list elements, JSON or bulleted', () => {
    const text = [
      '<update-todo section="Implementation">',
      '<completed_tasks>["Set up project", "Write parser"]</completed_tasks>',
      '<new_tasks>',
      '- Add tests',
      '- [ ] Ship it',
      '</new_tasks>',
      '<notes>ignored</notes>',
      '</update-todo>',
    ].join('\n');

    expect(validate(updateTodo, parseOne(text))).toEqual({
      kind: 'call',
      tag: 'update-todo',
      args: {
        section: 'Implementation',
        completed_tasks: ['Set up project', 'Write parser'],
        new_tasks: ['Add tests', 'Ship it'],
      },
    });
  });

  it('accepts an empty list element for a required list', () => {
    const text = '<update-todo section="Testing"><completed_tasks></completed_tasks><new_tasks>[]</new_tasks></update-todo>';
    const outcome = validate(updateTodo, parseOne(text));
    expect(outcome.kind === 'call' && outcome.args).toEqual({
      section: 'Testing',
      completed_tasks: [],
      new_tasks: [],
    });
  });

  it('resolves element paths written with "/"', () => {
    const schema: ToolSchema = {
      tag: 'nested',
      bindings: [{ name: 'value', source: 'element', path: 'outer/inner', required: true, valueType: 'integer' }],
    };
    const outcome = validate(schema, parseOne('<nested><outer><inner> 42 </inner></outer></nested>'));
    expect(outcome.kind === 'call' && outcome.args).toEqual({ value: 42 });
  });

  it('rejects an invocation of a different tag', () => {
    expect(validate(createFile, parseOne('<delete-file />')).kind).toBe('validation-failure');
  });
});

describe('validateWithRegistry', () => {
  const registry = new SchemaRegistry().register(createFile, () => toolOk('created')).seal();

  it('reports unregistered tags as unknown tools', () => {
    expect(validateWithRegistry(registry, parseOne('<frobnicate/>'))).toEqual({
      kind: 'unknown-tool',
      tag: 'frobnicate',
      reason: 'Unknown tool "frobnicate"',
    });
  });

  it('validates registered tags against their schema', () => {
    const outcome = validateWithRegistry(registry, parseOne('<create-file file_path="b.txt">x</create-file>'));
    expect(outcome.kind).toBe('call');
  });
});
