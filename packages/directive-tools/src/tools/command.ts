/**
 * Command execution tool
 */

import { spawn } from 'node:child_process';
import * as fs from 'node:fs';
import {
  errorMessage,
  optionalIntegerArg,
  optionalStringArg,
  stringArg,
  toolError,
  toolOk,
} from '@tagwire/directive-contracts';
import type { CapabilityContext, ToolResult, ToolSchema } from '@tagwire/directive-contracts';
import type { DirectiveTool, ToolContext } from '../types.js';
import { COMMAND_CONFIG } from '../config.js';
import { tail, validatePath } from '../utils.js';

export const executeCommandSchema: ToolSchema = {
  tag: 'execute-command',
  description: 'Run a shell command in the working directory (or a folder inside it).',
  bindings: [
    { name: 'command', source: 'content', path: '.', required: true, valueType: 'string' },
    {
      name: 'folder',
      source: 'attribute',
      path: 'folder',
      required: false,
      valueType: 'string',
      description: 'Directory relative to the working directory',
    },
    { name: 'session_name', source: 'attribute', path: 'session_name', required: false, valueType: 'string' },
    {
      name: 'timeout',
      source: 'attribute',
      path: 'timeout',
      required: false,
      valueType: 'integer',
      description: `Seconds before the command is killed (default ${COMMAND_CONFIG.defaultTimeoutSeconds}, at most ${COMMAND_CONFIG.maxTimeoutSeconds})`,
    },
  ],
  // Room for the longest command timeout plus the kill grace period
  timeoutMs: COMMAND_CONFIG.maxTimeoutSeconds * 1000 + COMMAND_CONFIG.killGraceMs + 5_000,
  example: '<execute-command folder="app" timeout="60">\nnpm test\n</execute-command>',
};

interface RunOptions {
  command: string;
  cwd: string;
  folder: string;
  timeoutSeconds: number;
  sessionName?: string;
}

/**
 * execute-command
 */
export function createExecuteCommandTool(context: ToolContext): DirectiveTool {
  return {
    schema: executeCommandSchema,
    capability: (args, ctx) => {
      const command = stringArg(args, 'command');
      const folder = optionalStringArg(args, 'folder') ?? '.';
      const requestedTimeout = optionalIntegerArg(args, 'timeout');

      if (requestedTimeout !== undefined && requestedTimeout <= 0) {
        return toolError({
          code: 'INVALID_TIMEOUT',
          message: `Timeout must be a positive number of seconds, got ${requestedTimeout}`,
        });
      }
      const timeoutSeconds = Math.min(
        requestedTimeout ?? COMMAND_CONFIG.defaultTimeoutSeconds,
        COMMAND_CONFIG.maxTimeoutSeconds,
      );

      const validation = validatePath(context.workingDir, folder);
      if (!validation.valid) {
        return toolError({
          code: 'INVALID_CWD',
          message: `Invalid folder "${folder}": outside working directory`,
          hint: 'Use a folder relative to the working directory.',
          details: { folder },
        });
      }
      if (!fs.existsSync(validation.resolved) || !fs.statSync(validation.resolved).isDirectory()) {
        return toolError({
          code: 'DIRECTORY_NOT_FOUND',
          message: `Folder "${folder}" does not exist`,
          details: { folder },
        });
      }

      return runCommand(
        {
          command,
          cwd: validation.resolved,
          folder,
          timeoutSeconds,
          sessionName: optionalStringArg(args, 'session_name'),
        },
        ctx,
      );
    },
  };
}

function isProcessGone(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ESRCH';
}

function runCommand(options: RunOptions, ctx: CapabilityContext): Promise<ToolResult> {
  const { command, cwd, folder, timeoutSeconds, sessionName } = options;
  ctx.logger.debug('Running command', { command, folder, timeoutSeconds, sessionName });

  return new Promise<ToolResult>((resolve) => {
    // Own process group, so a kill reaches everything the shell started
    const child = spawn(command, { cwd, shell: true, detached: true, stdio: ['ignore', 'pipe', 'pipe'] });
    let running = true;
    let killed = false;
    let timedOut = false;
    let exit: { code: number | null; signal: NodeJS.Signals | null } | undefined;
    let stdout = '';
    let stderr = '';

    const signalGroup = (signal: NodeJS.Signals) => {
      const pid = child.pid;
      if (pid === undefined) {
        return;
      }
      try {
        process.kill(-pid, signal);
      } catch (error) {
        if (!isProcessGone(error)) {
          ctx.logger.warn('Could not signal command', { pid, signal, error: errorMessage(error) });
        }
      }
    };

    const kill = () => {
      if (!running || killed) {
        return;
      }
      killed = true;
      signalGroup('SIGTERM');
      setTimeout(() => signalGroup('SIGKILL'), COMMAND_CONFIG.killGraceMs).unref();
      // The shell may be gone already while a grandchild keeps the pipes open
      if (exit) {
        settle(exit.code, exit.signal);
      }
    };

    ctx.onCleanup(kill);
    ctx.signal.addEventListener('abort', kill, { once: true });
    const timer = setTimeout(() => {
      timedOut = true;
      kill();
    }, timeoutSeconds * 1000);

    child.stdout.setEncoding('utf8');
    child.stderr.setEncoding('utf8');
    child.stdout.on('data', (chunk: string) => {
      stdout = tail(stdout + chunk, COMMAND_CONFIG.outputTailChars);
    });
    child.stderr.on('data', (chunk: string) => {
      stderr = tail(stderr + chunk, COMMAND_CONFIG.outputTailChars);
    });

    const finish = (result: ToolResult) => {
      if (!running) {
        return;
      }
      running = false;
      clearTimeout(timer);
      ctx.signal.removeEventListener('abort', kill);
      child.stdout.destroy();
      child.stderr.destroy();
      resolve(result);
    };

    child.on('error', (error) => {
      finish(
        toolError({
          code: 'SPAWN_FAILED',
          message: `Could not start command: ${error.message}`,
          details: { command, folder },
        }),
      );
    });

    child.on('exit', (code: number | null, signal: NodeJS.Signals | null) => {
      exit = { code, signal };
      if (killed) {
        settle(code, signal);
      }
    });
    child.on('close', (code: number | null, signal: NodeJS.Signals | null) => {
      settle(code, signal);
    });

    function settle(exitCode: number | null, signal: NodeJS.Signals | null): void {
      const details = {
        command,
        folder,
        exitCode,
        timeoutSeconds,
        sessionName,
        stdoutTail: stdout,
        stderrTail: stderr,
      };

      if (timedOut) {
        finish(
          toolError({
            code: 'COMMAND_TIMEOUT',
            message: `Command timed out after ${timeoutSeconds}s in ${folder}`,
            hint: 'Raise the timeout attribute or run a narrower command.',
            details,
          }),
        );
        return;
      }
      if (exitCode === 0) {
        finish(toolOk(`[cwd: ${folder}]\n${stdout || '(command completed with no output)'}`, details));
        return;
      }
      if (exitCode === 127 || /command not found/i.test(stderr)) {
        finish(
          toolError({
            code: 'COMMAND_NOT_FOUND',
            message: `Command not found: ${command}`,
            hint: 'Check the binary name or install it first.',
            details,
          }),
        );
        return;
      }
      if (exitCode === 126 || /permission denied/i.test(stderr)) {
        finish(
          toolError({
            code: 'PERMISSION_DENIED',
            message: `Permission denied while executing command in ${folder}`,
            hint: 'Check file permissions and executable bits.',
            details,
          }),
        );
        return;
      }
      finish(
        toolError({
          code: 'NON_ZERO_EXIT',
          message: signal
            ? `Command terminated by ${signal}`
            : `Command failed with exit code ${exitCode}\n${stderr}`.trimEnd(),
          hint: 'Inspect the stderr tail and adjust the command or folder.',
          details,
        }),
      );
    }
  });
}
