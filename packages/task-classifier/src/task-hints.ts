/**
 * @module @tagwire/task-classifier/task-hints
 * Sampling temperature and system instruction per task category.
 */

import type { TaskType } from './types.js';

export interface TaskHints {
  temperature: number;
  systemInstruction: string;
}

export const TASK_HINTS: Readonly<Record<TaskType, TaskHints>> = {
  coding: {
    temperature: 0.1,
    systemInstruction:
      'You are a careful software engineer. Write correct, readable code that handles errors, ' +
      'and state any assumption the code depends on.',
  },
  reasoning: {
    temperature: 0.2,
    systemInstruction:
      'Work through the problem step by step. Name your assumptions, weigh the evidence on each side ' +
      'and say how confident you are in the conclusion.',
  },
  creative: {
    temperature: 0.8,
    systemInstruction:
      'Be inventive. Prefer concrete images and an unexpected angle over the first idea that comes to mind.',
  },
  chat: {
    temperature: 0.5,
    systemInstruction: 'Answer in a friendly, conversational tone and keep replies short.',
  },
  general: {
    temperature: 0.5,
    systemInstruction: 'Give an accurate, direct answer and add context only where it helps.',
  },
};

export function getTaskHints(taskType: TaskType): TaskHints {
  return TASK_HINTS[taskType];
}

/**
 * The caller's temperature when given, otherwise the category's.
 */
export function resolveTemperature(taskType: TaskType, requested?: number): number {
  return requested ?? TASK_HINTS[taskType].temperature;
}

export interface ChatMessage {
  role: string;
  content: string;
}

/**
 * Add the category's instruction to the first system message, or insert a
 * system message at the start. Returns a new array.
 */
export function applyTaskInstruction<M extends ChatMessage>(messages: readonly M[], taskType: TaskType): Array<M | ChatMessage> {
  const instruction = TASK_HINTS[taskType].systemInstruction;
  const index = messages.findIndex((message) => message.role === 'system');

  if (index === -1) {
    return [{ role: 'system', content: instruction }, ...messages];
  }

  return messages.map((message, i) => {
    if (i !== index) {
      return message;
    }
    const current = message.content.trimEnd();
    const separator = current === '' ? '' : current.endsWith('.') ? ' ' : '. ';
    return { ...message, content: `${current}${separator}${instruction}` };
  });
}
