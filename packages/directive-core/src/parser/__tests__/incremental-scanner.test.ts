import { describe, it, expect } from 'vitest';
import { IncrementalDirectiveScanner } from '../incremental-scanner.js';

describe('IncrementalDirectiveScanner', () => {
  it('holds back directives until they are complete', () => {
    const scanner = new IncrementalDirectiveScanner();

    expect(scanner.push('Sure. <create-file file_')).toEqual([]);
    expect(scanner.pending()).toBe('<create-file file_');

    expect(scanner.push('path="a.txt">hello</create')).toEqual([]);

    const items = scanner.push('-file> and <delete-file file_path="b.txt"/>');
    expect(items.map(i => i.tag)).toEqual(['create-file', 'delete-file']);
    expect(items[0]).toMatchObject({
      kind: 'invocation',
      attributes: { file_path: 'a.txt' },
      bodyText: 'hello',
      offset: 6,
    });
    expect(scanner.finish()).toEqual([]);
  });

  it('reports offsets relative to the whole stream', () => {
    const scanner = new IncrementalDirectiveScanner();

    expect(scanner.push('text <')).toEqual([]);
    expect(scanner.pending()).toBe('<');

    const items = scanner.push('browser-go-back/>');
    expect(items).toHaveLength(1);
    expect(items[0]).toMatchObject({ tag: 'browser-go-back', offset: 5, end: 23 });
  });

  it('reports truncated spans on finish', () => {
    const scanner = new IncrementalDirectiveScanner();

    expect(scanner.push('<str-replace file_path="x">partial')).toEqual([]);
    const tail = scanner.finish();

    expect(tail).toHaveLength(1);
    expect(tail[0]).toMatchObject({ kind: 'parse-error', code: 'MISSING_CLOSING_TAG', offset: 0 });
    expect(scanner.pending()).toBe('');
  });

  it('waits on a partial tag name that may grow into a filtered tag', () => {
    const scanner = new IncrementalDirectiveScanner({ tags: ['create-file'] });

    expect(scanner.push('a <cre')).toEqual([]);
    expect(scanner.pending()).toBe('<cre');

    const items = scanner.push('ate-file file_path="a">x</create-file> <b>bold</b>');
    expect(items.map(i => i.tag)).toEqual(['create-file']);
  });

  it('emits a malformed directive immediately', () => {
    const scanner = new IncrementalDirectiveScanner();

    const items = scanner.push('<x a=>body');
    expect(items).toHaveLength(1);
    expect(items[0]).toMatchObject({ kind: 'parse-error', code: 'MALFORMED_ATTRIBUTE' });
  });

  it('lets a stray element in prose pass when filtering by tag', () => {
    const scanner = new IncrementalDirectiveScanner({ tags: ['delete-file'] });

    expect(scanner.push('Use <b>bold text and ')).toEqual([]);
    expect(scanner.pending()).toBe('');

    const items = scanner.push('<delete-file file_path="a.txt"/>');
    expect(items.map(i => i.tag)).toEqual(['delete-file']);
  });

  it('keeps a complete child inside an open directive until the directive closes', () => {
    const scanner = new IncrementalDirectiveScanner();
    const open = '<update-todo section="Setup"><completed_tasks>- a</completed_tasks>';

    expect(scanner.push(open)).toEqual([]);
    expect(scanner.pending()).toBe(open);

    const items = scanner.push('</update-todo>');
    expect(items.map(i => i.tag)).toEqual(['update-todo']);
    expect(items[0]).toMatchObject({ offset: 0, end: open.length + '</update-todo>'.length });
  });

  it('finds a closing tag split over several chunks', () => {
    const scanner = new IncrementalDirectiveScanner();

    expect(scanner.push('<create-file file_path="a.txt">x</cr')).toEqual([]);
    expect(scanner.push('eate-')).toEqual([]);
    expect(scanner.pending()).toBe('<create-file file_path="a.txt">x</create-');

    const items = scanner.push('file> done');
    expect(items).toHaveLength(1);
    expect(items[0]).toMatchObject({ kind: 'invocation', tag: 'create-file', bodyText: 'x' });
    expect(scanner.pending()).toBe('');
  });
});
