/**
 * Shared utilities for tool implementations.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';

/**
 * Validate that a file path stays within the working directory.
 *
 * Resolves symlinks of existing paths before comparing.
 */
export function validatePath(
  workingDir: string,
  filePath: string,
): { valid: boolean; resolved: string; error?: string } {
  const root = realpathOrSelf(path.resolve(workingDir));
  const resolved = realpathOrSelf(path.resolve(root, filePath));
  const relative = path.relative(root, resolved);

  if (relative.startsWith('..') || path.isAbsolute(relative)) {
    return {
      valid: false,
      resolved,
      error: `Cannot access "${filePath}": path is outside the working directory`,
    };
  }

  return { valid: true, resolved };
}

function realpathOrSelf(target: string): string {
  return fs.existsSync(target) ? fs.realpathSync(target) : target;
}

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

/**
 * Count non-overlapping occurrences of `needle`
 */
export function countOccurrences(haystack: string, needle: string): number {
  if (needle === '') {
    return 0;
  }
  let count = 0;
  let index = haystack.indexOf(needle);
  while (index !== -1) {
    count++;
    index = haystack.indexOf(needle, index + needle.length);
  }
  return count;
}

export function tail(text: string, chars: number): string {
  return text.length > chars ? text.slice(-chars) : text;
}
