/**
 * File tools: create, rewrite, replace a string, delete.
 *
 * Paths are relative to the working directory; anything resolving outside
 * it is refused.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { stringArg, toolError, toolOk } from '@tagwire/directive-contracts';
import type { ToolResult, ToolSchema } from '@tagwire/directive-contracts';
import type { DirectiveTool, ToolContext } from '../types.js';
import { FILESYSTEM_CONFIG } from '../config.js';
import { countOccurrences, validatePath } from '../utils.js';

const filePathBinding = {
  name: 'file_path',
  source: 'attribute',
  path: 'file_path',
  required: true,
  valueType: 'string',
  description: 'Path relative to the working directory',
} as const;

const fileContentsBinding = {
  name: 'file_contents',
  source: 'content',
  path: '.',
  required: true,
  valueType: 'string',
} as const;

export const createFileSchema: ToolSchema = {
  tag: 'create-file',
  description: 'Create a new file. Fails if the file already exists.',
  bindings: [filePathBinding, fileContentsBinding],
  example: '<create-file file_path="src/hello.txt">\nHello, world\n</create-file>',
};

export const fullFileRewriteSchema: ToolSchema = {
  tag: 'full-file-rewrite',
  description: 'Replace the whole contents of an existing file.',
  bindings: [filePathBinding, fileContentsBinding],
};

export const strReplaceSchema: ToolSchema = {
  tag: 'str-replace',
  description: 'Replace one exact, unique occurrence of text in a file.',
  bindings: [
    filePathBinding,
    { name: 'old_str', source: 'element', path: 'old_str', required: true, valueType: 'string' },
    { name: 'new_str', source: 'element', path: 'new_str', required: true, valueType: 'string' },
  ],
  example: '<str-replace file_path="src/app.ts">\n<old_str>const a = 1;</old_str>\n<new_str>const a = 2;</new_str>\n</str-replace>',
};

export const deleteFileSchema: ToolSchema = {
  tag: 'delete-file',
  description: 'Delete a file.',
  bindings: [filePathBinding],
};

type Resolved = { ok: true; fullPath: string } | { ok: false; result: ToolResult };

function resolveFile(context: ToolContext, filePath: string): Resolved {
  const validation = validatePath(context.workingDir, filePath);
  if (!validation.valid) {
    return {
      ok: false,
      result: toolError({
        code: 'PATH_VALIDATION_FAILED',
        message: validation.error ?? 'Invalid path',
        hint: 'Use a path inside the working directory.',
        details: { filePath },
      }),
    };
  }
  return { ok: true, fullPath: validation.resolved };
}

function checkSize(content: string): ToolResult | undefined {
  const size = Buffer.byteLength(content, 'utf-8');
  if (size > FILESYSTEM_CONFIG.maxWriteSize) {
    return toolError({
      code: 'CONTENT_TOO_LARGE',
      message: `Content is ${size} bytes, exceeds limit of ${FILESYSTEM_CONFIG.maxWriteSize} bytes`,
      hint: 'Split the content into smaller files.',
    });
  }
  return undefined;
}

function fileNotFound(filePath: string): ToolResult {
  return toolError({
    code: 'FILE_NOT_FOUND',
    message: `File "${filePath}" does not exist`,
    hint: 'Use create-file to create it.',
    details: { filePath },
  });
}

/**
 * create-file
 */
export function createCreateFileTool(context: ToolContext): DirectiveTool {
  return {
    schema: createFileSchema,
    capability: (args) => {
      const filePath = stringArg(args, 'file_path');
      const content = stringArg(args, 'file_contents');

      const target = resolveFile(context, filePath);
      if (!target.ok) {
        return target.result;
      }
      const tooLarge = checkSize(content);
      if (tooLarge) {
        return tooLarge;
      }
      if (fs.existsSync(target.fullPath)) {
        return toolError({
          code: 'FILE_EXISTS',
          message: `File "${filePath}" already exists`,
          hint: 'Use full-file-rewrite or str-replace to change it.',
          details: { filePath },
        });
      }

      fs.mkdirSync(path.dirname(target.fullPath), { recursive: true });
      fs.writeFileSync(target.fullPath, content, 'utf-8');
      return toolOk(`Created file: ${filePath}`, { filePath, size: Buffer.byteLength(content, 'utf-8') });
    },
  };
}

/**
 * full-file-rewrite
 */
export function createFullFileRewriteTool(context: ToolContext): DirectiveTool {
  return {
    schema: fullFileRewriteSchema,
    capability: (args) => {
      const filePath = stringArg(args, 'file_path');
      const content = stringArg(args, 'file_contents');

      const target = resolveFile(context, filePath);
      if (!target.ok) {
        return target.result;
      }
      const tooLarge = checkSize(content);
      if (tooLarge) {
        return tooLarge;
      }
      if (!fs.existsSync(target.fullPath)) {
        return fileNotFound(filePath);
      }

      fs.writeFileSync(target.fullPath, content, 'utf-8');
      return toolOk(`Rewrote file: ${filePath}`, { filePath, size: Buffer.byteLength(content, 'utf-8') });
    },
  };
}

/**
 * str-replace
 */
export function createStrReplaceTool(context: ToolContext): DirectiveTool {
  return {
    schema: strReplaceSchema,
    capability: (args) => {
      const filePath = stringArg(args, 'file_path');
      const oldStr = stringArg(args, 'old_str');
      const newStr = stringArg(args, 'new_str');

      const target = resolveFile(context, filePath);
      if (!target.ok) {
        return target.result;
      }
      if (!fs.existsSync(target.fullPath)) {
        return fileNotFound(filePath);
      }

      const content = fs.readFileSync(target.fullPath, 'utf-8');
      const occurrences = countOccurrences(content, oldStr);
      if (occurrences === 0) {
        return toolError({
          code: 'STRING_NOT_FOUND',
          message: `"${oldStr}" not found in ${filePath}`,
          hint: 'Copy the exact text, including whitespace.',
          details: { filePath },
        });
      }
      if (occurrences > 1) {
        return toolError({
          code: 'STRING_NOT_UNIQUE',
          message: `"${oldStr}" occurs ${occurrences} times in ${filePath}`,
          hint: 'Include more surrounding text so the match is unique.',
          details: { filePath, occurrences },
        });
      }

      const index = content.indexOf(oldStr);
      const updated = content.slice(0, index) + newStr + content.slice(index + oldStr.length);
      fs.writeFileSync(target.fullPath, updated, 'utf-8');
      return toolOk(`Replaced text in ${filePath}`, { filePath });
    },
  };
}

/**
 * delete-file
 */
export function createDeleteFileTool(context: ToolContext): DirectiveTool {
  return {
    schema: deleteFileSchema,
    capability: (args) => {
      const filePath = stringArg(args, 'file_path');

      const target = resolveFile(context, filePath);
      if (!target.ok) {
        return target.result;
      }
      if (!fs.existsSync(target.fullPath)) {
        return fileNotFound(filePath);
      }
      if (!fs.statSync(target.fullPath).isFile()) {
        return toolError({
          code: 'NOT_A_FILE',
          message: `"${filePath}" is not a file`,
          details: { filePath },
        });
      }

      fs.unlinkSync(target.fullPath);
      return toolOk(`Deleted file: ${filePath}`, { filePath });
    },
  };
}
