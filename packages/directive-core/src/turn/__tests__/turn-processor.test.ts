import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync } from 'node:fs';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { stringArg, toolError, toolOk } from '@tagwire/directive-contracts';
import type { ToolResult } from '@tagwire/directive-contracts';
import { SchemaRegistry } from '../../registry/schema-registry.js';
import { DirectiveDispatcher } from '../../dispatcher/directive-dispatcher.js';
import { IncrementalDirectiveScanner } from '../../parser/incremental-scanner.js';
import { TurnProcessor } from '../turn-processor.js';

describe('TurnProcessor', () => {
  let dir: string;
  let processor: TurnProcessor;
  let observed: string[];

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'tagwire-turn-'));
    observed = [];

    const registry = new SchemaRegistry()
      .register(
        {
          tag: 'create-file',
          bindings: [
            { name: 'file_path', source: 'attribute', path: 'file_path', required: true, valueType: 'string' },
            { name: 'file_contents', source: 'content', path: '.', required: true, valueType: 'string' },
          ],
        },
        async args => {
          await writeFile(join(dir, stringArg(args, 'file_path')), stringArg(args, 'file_contents'));
          return toolOk(`Created ${stringArg(args, 'file_path')}`);
        },
      )
      .register(
        {
          tag: 'read-file',
          bindings: [{ name: 'file_path', source: 'attribute', path: 'file_path', required: true, valueType: 'string' }],
        },
        async (args): Promise<ToolResult> => {
          const file = join(dir, stringArg(args, 'file_path'));
          const exists = existsSync(file);
          observed.push(`${stringArg(args, 'file_path')} exists=${exists}`);
          if (!exists) {
            return toolError({ code: 'FILE_NOT_FOUND', message: 'missing' });
          }
          return toolOk(await readFile(file, 'utf-8'));
        },
      )
      .seal();

    processor = new TurnProcessor({ registry, dispatcher: new DirectiveDispatcher({ registry }) });
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('runs directives in order so later ones see earlier effects', async () => {
    const text = [
      'First I will write the file.',
      '<create-file file_path="notes.txt">remember the milk</create-file>',
      'Now let me read it back.',
      '<read-file file_path="notes.txt" />',
    ].join('\n');

    const outcome = await processor.processTurn(text);

    expect(observed).toEqual(['notes.txt exists=true']);
    expect(outcome.entries.map(e => [e.tag, e.result.status])).toEqual([
      ['create-file', 'ok'],
      ['read-file', 'ok'],
    ]);
    expect(outcome.entries[1]?.result.message).toBe('remember the milk');
  });

  it('recovers a valid directive next to a malformed one, in order', async () => {
    const text =
      'First <create-file file_path="a.txt">hello</create-file> and then <read-file file_path="a.txt';

    const outcome = await processor.processTurn(text);

    expect(outcome.entries.map(e => e.kind)).toEqual(['call', 'parse-error']);
    expect(outcome.entries[0]?.result.status).toBe('ok');
    expect(outcome.entries[1]?.result.status).toBe('error');
    expect(outcome.entries[1]?.result.message).toBe(
      `Could not parse <read-file> at offset ${text.indexOf('<read-file')}: Opening tag <read-file> is not terminated`,
    );
  });

  it('answers an unknown directive with an error result naming the tag', async () => {
    const outcome = await processor.processTurn('Trying <frobnicate/> now');

    expect(outcome.entries).toHaveLength(1);
    expect(outcome.entries[0]?.kind).toBe('unknown-tool');
    expect(outcome.entries[0]?.result.status).toBe('error');
    expect(outcome.entries[0]?.result.message).toContain('frobnicate');
    expect(outcome.transcript[0]?.content).toBe(
      [
        '<tool_result tag="frobnicate" status="error">',
        'Unknown tool "frobnicate": <frobnicate> is not a registered directive',
        'Error code: UNKNOWN_TOOL',
        'Hint: Available directives: create-file, read-file',
        '</tool_result>',
      ].join('\n'),
    );
  });

  it('reports validation failures without dispatching', async () => {
    const outcome = await processor.processTurn('<create-file>no path</create-file>');

    expect(outcome.entries[0]).toMatchObject({
      kind: 'validation-failure',
      tag: 'create-file',
      result: { status: 'error', message: '<create-file>: Missing required attribute "file_path" for "file_path"' },
    });
    expect(existsSync(join(dir, 'no path'))).toBe(false);
  });

  it('returns no entries for plain prose', async () => {
    const outcome = await processor.processTurn('Nothing to do here.');
    expect(outcome).toEqual({ entries: [], transcript: [] });
  });

  it('processes items from a streaming scanner', async () => {
    const scanner = new IncrementalDirectiveScanner();
    const items = [
      ...scanner.push('<create-file file_path="s.txt">stream'),
      ...scanner.push('ed</create-file>'),
      ...scanner.finish(),
    ];

    const outcome = await processor.processItems(items);

    expect(outcome.entries.map(e => e.kind)).toEqual(['call']);
    expect(await readFile(join(dir, 's.txt'), 'utf-8')).toBe('streamed');
  });
});
