/**
 * Tool status tool: lets the model tell the user what it is doing.
 */

import { optionalStringArg, stringArg, toolOk } from '@tagwire/directive-contracts';
import type { ToolSchema } from '@tagwire/directive-contracts';
import type { DirectiveTool } from '../types.js';

export const toolStatusSchema: ToolSchema = {
  tag: 'tool-status',
  description: 'Show the user the status of a tool you are running (started, completed, failed).',
  bindings: [
    { name: 'status', source: 'attribute', path: 'status', required: true, valueType: 'string' },
    { name: 'tool_name', source: 'attribute', path: 'tool_name', required: true, valueType: 'string' },
    { name: 'details', source: 'content', path: '.', required: false, valueType: 'string' },
  ],
  example: '<tool-status status="started" tool_name="web-search">\nLooking up recent releases\n</tool-status>',
};

const HEADINGS = new Map<string, string>([
  ['started', 'TOOL STARTING'],
  ['completed', 'TOOL COMPLETED'],
  ['failed', 'TOOL FAILED'],
]);

export function formatToolStatus(status: string, toolName: string, details?: string): string {
  const heading = HEADINGS.get(status) ?? `TOOL STATUS [${status}]`;
  const lines = [`**${heading}: ${toolName}**`];
  if (details) {
    lines.push(`_${details}_`);
  }
  lines.push('---');
  return lines.join('\n');
}

/**
 * tool-status
 */
export function createToolStatusTool(): DirectiveTool {
  return {
    schema: toolStatusSchema,
    capability: (args, ctx) => {
      const status = stringArg(args, 'status');
      const toolName = stringArg(args, 'tool_name');
      const details = optionalStringArg(args, 'details')?.trim();

      ctx.logger.info('Tool status', { status, toolName, details });
      return toolOk(formatToolStatus(status, toolName, details), { status, toolName });
    },
  };
}
