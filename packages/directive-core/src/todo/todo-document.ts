/**
 * TodoDocument: structured checklist plus its canonical markdown form.
 *
 *   # Task: Build a landing page
 *
 *   ## Implementation
 *   - [x] Set up project structure
 *   - [ ] Implement core functionality
 *
 * Merge logic works on the structure; text is produced and read only at
 * the edges (serializeTodo / parseTodo).
 */

export interface TodoSection {
  name: string;
  /** Completed tasks, in completion order */
  completed: string[];
  /** Pending tasks, in insertion order */
  pending: string[];
}

export interface TodoDocument {
  title: string;
  sections: TodoSection[];
}

export interface TodoUpdate {
  section: string;
  completedTasks: readonly string[];
  newTasks: readonly string[];
}

export interface TodoMergeResult {
  document: TodoDocument;
  /** Tasks appended to pending by this update */
  added: string[];
  /** Tasks moved from pending to completed by this update */
  completed: string[];
}

function cloneSection(section: TodoSection): TodoSection {
  return { name: section.name, completed: [...section.completed], pending: [...section.pending] };
}

export function cloneTodo(document: TodoDocument): TodoDocument {
  return { title: document.title, sections: document.sections.map(cloneSection) };
}

/**
 * Apply an update without mutating `document`.
 *
 * New tasks are appended first (unless already pending or completed), then
 * completed tasks move from pending to completed. A completion for a task
 * that is already completed or was never listed is a no-op, so applying the
 * same update twice gives the same document as applying it once.
 */
export function mergeTodo(document: TodoDocument, update: TodoUpdate): TodoMergeResult {
  const next = cloneTodo(document);
  const sectionName = update.section.trim();

  let section = next.sections.find(s => s.name === sectionName);
  if (!section) {
    section = { name: sectionName, completed: [], pending: [] };
    next.sections.push(section);
  }

  const added: string[] = [];
  for (const raw of update.newTasks) {
    const task = raw.trim();
    if (task === '' || section.pending.includes(task) || section.completed.includes(task)) {
      continue;
    }
    section.pending.push(task);
    added.push(task);
  }

  const completed: string[] = [];
  for (const raw of update.completedTasks) {
    const task = raw.trim();
    const index = section.pending.indexOf(task);
    if (index === -1) {
      continue;
    }
    section.pending.splice(index, 1);
    section.completed.push(task);
    completed.push(task);
  }

  return { document: next, added, completed };
}

/**
 * Canonical checklist text. Completed tasks precede pending ones in a section.
 */
export function serializeTodo(document: TodoDocument): string {
  const blocks = document.sections.map(section =>
    [
      `## ${section.name}`,
      ...section.completed.map(task => `- [x] ${task}`),
      ...section.pending.map(task => `- [ ] ${task}`),
    ].join('\n'),
  );
  return [`# ${document.title}`, ...blocks].join('\n\n') + '\n';
}

const TITLE_LINE = /^#\s+(.+?)\s*$/;
const SECTION_LINE = /^##\s+(.+?)\s*$/;
const TASK_LINE = /^[-*]\s+\[([ xX])\]\s+(.+?)\s*$/;

/**
 * Read checklist text back into a document. Lines that are neither a
 * heading nor a checklist item are ignored; tasks before the first section
 * heading go into an untitled "Tasks" section.
 */
export function parseTodo(text: string): TodoDocument {
  const document: TodoDocument = { title: '', sections: [] };
  let current: TodoSection | undefined;

  for (const line of text.split(/\r?\n/)) {
    const trimmed = line.trim();

    const sectionMatch = SECTION_LINE.exec(trimmed);
    if (sectionMatch?.[1]) {
      const name = sectionMatch[1];
      current = document.sections.find(s => s.name === name);
      if (!current) {
        current = { name, completed: [], pending: [] };
        document.sections.push(current);
      }
      continue;
    }

    const titleMatch = TITLE_LINE.exec(trimmed);
    if (titleMatch?.[1]) {
      if (document.title === '') {
        document.title = titleMatch[1];
      }
      continue;
    }

    const taskMatch = TASK_LINE.exec(trimmed);
    if (taskMatch?.[1] && taskMatch[2]) {
      if (!current) {
        current = { name: 'Tasks', completed: [], pending: [] };
        document.sections.push(current);
      }
      const task = taskMatch[2];
      const list = taskMatch[1] === ' ' ? current.pending : current.completed;
      if (!current.pending.includes(task) && !current.completed.includes(task)) {
        list.push(task);
      }
    }
  }

  return document;
}
