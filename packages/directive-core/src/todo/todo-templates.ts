/**
 * Seed checklists for a new todo document, chosen from the task description.
 */

import type { TodoDocument, TodoSection } from './todo-document.js';

export interface TodoTemplate {
  name: string;
  matches(description: string): boolean;
  build(description: string): TodoDocument;
}

function section(name: string, pending: string[]): TodoSection {
  return { name, completed: [], pending };
}

export const marketResearchTemplate: TodoTemplate = {
  name: 'market-research',
  matches: description => /\bmarket (?:research|analysis)\b/i.test(description),
  build: description => {
    // "Market research for electric bikes" → "electric bikes"
    const subject = /\bfor\s+(.+)$/i.exec(description.trim())?.[1]?.trim() ?? description.trim();
    return {
      title: `${subject} Market Analysis`,
      sections: [
        section('Initial Research', [
          `Define key ${subject} industry segments`,
          `Research overall ${subject} market size and growth trends`,
          'Identify major players across different segments',
        ]),
        section('Detailed Analysis', [
          'Gather detailed information on major players (market share, strengths, weaknesses)',
          'Collect website URLs for each major company',
          'Analyze market trends and opportunities',
        ]),
        section('Report Creation', [
          'Create a structured report outline',
          'Write comprehensive market analysis content',
          'Format the report with proper styling',
        ]),
        section('Delivery', [
          'Review the final report for completeness and accuracy',
          'Share the report with the user',
        ]),
      ],
    };
  },
};

export const defaultTemplate: TodoTemplate = {
  name: 'default',
  matches: () => true,
  build: description => ({
    title: `Task: ${description.trim()}`,
    sections: [
      section('Initial Research', [
        'Understand the requirements',
        'Identify key components needed',
        'Research best practices and approaches',
      ]),
      section('Implementation', [
        'Set up project structure',
        'Implement core functionality',
        'Add error handling and validation',
      ]),
      section('Testing', ['Test functionality', 'Fix any bugs', 'Verify requirements are met']),
      section('Delivery', ['Clean up code', 'Add documentation', 'Prepare final deliverables']),
    ],
  }),
};

export const DEFAULT_TODO_TEMPLATES: readonly TodoTemplate[] = [marketResearchTemplate, defaultTemplate];

/**
 * Build a document from the first matching template.
 */
export function buildTodoFromTemplates(
  description: string,
  templates: readonly TodoTemplate[] = DEFAULT_TODO_TEMPLATES,
): TodoDocument {
  const template = templates.find(t => t.matches(description)) ?? defaultTemplate;
  return template.build(description);
}
