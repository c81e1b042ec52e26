import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdirSync } from 'node:fs';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { errorPayload, noopLogger } from '@tagwire/directive-contracts';
import type { CapabilityContext, CleanupHandler } from '@tagwire/directive-contracts';
import { DirectiveDispatcher, InMemoryTodoStore, SchemaRegistry, TodoSessionManager } from '@tagwire/directive-core';
import { createExecuteCommandTool } from '../command.js';
import { COMMAND_CONFIG } from '../../config.js';
import type { ToolContext } from '../../types.js';

/** Shell command running an inline Node.js script */
const nodeScript = (script: string) => `exec "${process.execPath}" -e "${script}"`;

/** Same, but the shell stays in between, so Node.js runs as a grandchild */
const nestedNodeScript = (script: string) => `"${process.execPath}" -e "${script}" && echo done`;

const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

async function fileSize(file: string): Promise<number> {
  return (await readFile(file, 'utf-8')).length;
}

function ctx(signal = new AbortController().signal, cleanups: CleanupHandler[] = []): CapabilityContext {
  return {
    tag: 'execute-command',
    signal,
    logger: noopLogger,
    onCleanup: (handler) => {
      cleanups.push(handler);
    },
  };
}

describe('execute-command', () => {
  let dir: string;
  let context: ToolContext;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'tagwire-cmd-'));
    context = {
      workingDir: dir,
      sessionId: 'session-1',
      todo: new TodoSessionManager({ store: new InMemoryTodoStore() }),
    };
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('returns stdout with the folder', async () => {
    const result = await createExecuteCommandTool(context).capability(
      { command: nodeScript("process.stdout.write('hello')") },
      ctx(),
    );

    expect(result).toMatchObject({ status: 'ok', message: '[cwd: .]\nhello' });
  });

  it('runs inside the requested folder', async () => {
    mkdirSync(join(dir, 'pkg'));

    const result = await createExecuteCommandTool(context).capability(
      { command: nodeScript("process.stdout.write(require('path').basename(process.cwd()))"), folder: 'pkg' },
      ctx(),
    );

    expect(result.message).toBe('[cwd: pkg]\npkg');
  });

  it('reports a non-zero exit', async () => {
    const result = await createExecuteCommandTool(context).capability(
      { command: nodeScript("process.stderr.write('boom'); process.exit(3)") },
      ctx(),
    );

    expect(errorPayload(result)?.code).toBe('NON_ZERO_EXIT');
    expect(result.message).toBe('Command failed with exit code 3\nboom');
  });

  it('reports an unknown command', async () => {
    const result = await createExecuteCommandTool(context).capability({ command: 'tagwire-no-such-binary' }, ctx());

    expect(errorPayload(result)?.code).toBe('COMMAND_NOT_FOUND');
  });

  it('kills the command after its timeout attribute', async () => {
    const result = await createExecuteCommandTool(context).capability(
      { command: nodeScript('setTimeout(() => {}, 20000)'), timeout: 1 },
      ctx(),
    );

    expect(errorPayload(result)?.code).toBe('COMMAND_TIMEOUT');
    expect(result.message).toBe('Command timed out after 1s in .');
  });

  it('kills the command when the call is aborted', async () => {
    const controller = new AbortController();
    const cleanups: CleanupHandler[] = [];
    const pending = createExecuteCommandTool(context).capability(
      { command: nodeScript('setTimeout(() => {}, 20000)') },
      ctx(controller.signal, cleanups),
    );

    setTimeout(() => controller.abort(), 100);
    const result = await pending;

    expect(result.message).toBe('Command terminated by SIGTERM');
    expect(cleanups).toHaveLength(1);
  });

  it('kills every process the shell started when it times out', async () => {
    const ticker = nestedNodeScript("const fs = require('fs'); setInterval(() => fs.appendFileSync('ticks.txt', '.'), 50)");
    const startedAt = Date.now();

    const result = await createExecuteCommandTool(context).capability({ command: ticker, timeout: 1 }, ctx());

    expect(errorPayload(result)?.code).toBe('COMMAND_TIMEOUT');
    expect(Date.now() - startedAt).toBeLessThan(5_000);

    await sleep(300);
    const size = await fileSize(join(dir, 'ticks.txt'));
    await sleep(300);
    expect(await fileSize(join(dir, 'ticks.txt'))).toBe(size);
  });

  it('kills every process the shell started during cleanup', async () => {
    const cleanups: CleanupHandler[] = [];
    const ticker = nestedNodeScript("const fs = require('fs'); setInterval(() => fs.appendFileSync('ticks.txt', '.'), 50)");
    const pending = createExecuteCommandTool(context).capability({ command: ticker }, ctx(undefined, cleanups));

    await sleep(500);
    await Promise.all(cleanups.map(cleanup => cleanup()));
    const result = await pending;

    expect(errorPayload(result)?.code).toBe('NON_ZERO_EXIT');
    await sleep(300);
    const size = await fileSize(join(dir, 'ticks.txt'));
    await sleep(300);
    expect(await fileSize(join(dir, 'ticks.txt'))).toBe(size);
  });

  it('keeps its own timeout when it exceeds the default tool timeout', async () => {
    const registry = new SchemaRegistry();
    const tool = createExecuteCommandTool(context);
    registry.register(tool.schema, tool.capability).seal();
    const dispatcher = new DirectiveDispatcher({ registry, config: { defaultToolTimeoutMs: 200 } });

    const result = await dispatcher.execute({
      kind: 'call',
      tag: 'execute-command',
      args: { command: nodeScript("setTimeout(() => process.stdout.write('hi'), 500)"), timeout: 5 },
    });

    expect(result.message).toBe('[cwd: .]\nhi');
  });

  it('applies the default timeout and caps long ones', async () => {
    const tool = createExecuteCommandTool(context);

    const plain = await tool.capability({ command: 'echo ok' }, ctx());
    const long = await tool.capability({ command: 'echo ok', timeout: 100_000 }, ctx());

    expect(plain.payload).toMatchObject({ timeoutSeconds: COMMAND_CONFIG.defaultTimeoutSeconds });
    expect(long.payload).toMatchObject({ timeoutSeconds: COMMAND_CONFIG.maxTimeoutSeconds });
  });

  it('decodes multibyte characters split across chunks', async () => {
    const result = await createExecuteCommandTool(context).capability(
      {
        command: nodeScript(
          'process.stdout.write(Buffer.from([0xe2, 0x82])); setTimeout(() => process.stdout.write(Buffer.from([0xac])), 50)',
        ),
      },
      ctx(),
    );

    expect(result.message).toBe('[cwd: .]\n\u20ac');
  });

  it('keeps only the tail of long output', async () => {
    const result = await createExecuteCommandTool(context).capability(
      { command: nodeScript("process.stdout.write('x'.repeat(10000) + 'END')") },
      ctx(),
    );

    expect(result.message).toBe(`[cwd: .]\n${'x'.repeat(COMMAND_CONFIG.outputTailChars - 3)}END`);
  });

  it('refuses folders outside the working directory', async () => {
    const result = await createExecuteCommandTool(context).capability({ command: 'ls', folder: '..' }, ctx());
    expect(errorPayload(result)?.code).toBe('INVALID_CWD');
  });

  it('refuses a missing folder', async () => {
    const result = await createExecuteCommandTool(context).capability({ command: 'ls', folder: 'nope' }, ctx());
    expect(errorPayload(result)?.code).toBe('DIRECTORY_NOT_FOUND');
  });

  it('rejects a non-positive timeout', async () => {
    const result = await createExecuteCommandTool(context).capability({ command: 'ls', timeout: 0 }, ctx());
    expect(errorPayload(result)?.code).toBe('INVALID_TIMEOUT');
  });
});
