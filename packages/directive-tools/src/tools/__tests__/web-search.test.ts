import { describe, it, expect, vi } from 'vitest';
import { errorPayload, noopLogger } from '@tagwire/directive-contracts';
import type { CapabilityContext } from '@tagwire/directive-contracts';
import { InMemoryTodoStore, TodoSessionManager } from '@tagwire/directive-core';
import { createWebSearchTool } from '../web-search.js';
import { createToolStatusTool, formatToolStatus } from '../tool-status.js';
import type { SearchProvider, SearchResult } from '../../types.js';

function ctx(): CapabilityContext {
  return { tag: 'web-search', signal: new AbortController().signal, logger: noopLogger, onCleanup: vi.fn() };
}

const results: SearchResult[] = [
  { title: 'First', url: 'https://one.test', snippet: 'The first result' },
  { title: 'Second', url: 'https://two.test' },
];

function setup(search?: SearchProvider) {
  return createWebSearchTool({
    workingDir: '/unused',
    sessionId: 'session-1',
    todo: new TodoSessionManager({ store: new InMemoryTodoStore() }),
    search,
  });
}

describe('web-search', () => {
  it('formats the results', async () => {
    const search = vi.fn(async (): Promise<SearchResult[]> => results);

    const result = await setup({ search }).capability({ query: 'test query', num_results: 5 }, ctx());

    expect(result.message).toBe(
      'Found 2 results for "test query":\n1. First\n   https://one.test\n   The first result\n2. Second\n   https://two.test',
    );
    expect(search).toHaveBeenCalledWith('test query', expect.objectContaining({ maxResults: 5 }));
  });

  it.each([
    [undefined, 20],
    [0, 1],
    [500, 50],
  ])('clamps num_results %s to %s', async (requested, expected) => {
    const search = vi.fn(async (): Promise<SearchResult[]> => []);

    await setup({ search }).capability(
      requested === undefined ? { query: 'q' } : { query: 'q', num_results: requested },
      ctx(),
    );

    expect(search).toHaveBeenCalledWith('q', expect.objectContaining({ maxResults: expected }));
  });

  it('truncates a provider that returns too many results', async () => {
    const search = vi.fn(async (): Promise<SearchResult[]> => results);

    const result = await setup({ search }).capability({ query: 'q', num_results: 1 }, ctx());

    expect(result.message).toBe('Found 1 result for "q":\n1. First\n   https://one.test\n   The first result');
  });

  it('reports an empty result set', async () => {
    const result = await setup({ search: async () => [] }).capability({ query: 'q' }, ctx());
    expect(result.message).toBe('No search results found for "q". Try a broader query.');
  });

  it('reports a missing provider', async () => {
    const result = await setup().capability({ query: 'q' }, ctx());
    expect(errorPayload(result)?.code).toBe('SEARCH_UNAVAILABLE');
  });
});

describe('tool-status', () => {
  it('formats known statuses', () => {
    expect(formatToolStatus('started', 'web-search', 'Looking up releases')).toBe(
      '**TOOL STARTING: web-search**\n_Looking up releases_\n---',
    );
    expect(formatToolStatus('failed', 'create-file')).toBe('**TOOL FAILED: create-file**\n---');
  });

  it('passes other statuses through', () => {
    expect(formatToolStatus('paused', 'execute-command')).toBe('**TOOL STATUS [paused]: execute-command**\n---');
  });

  it('returns the formatted status', async () => {
    const result = await createToolStatusTool().capability({ status: 'completed', tool_name: 'web-search' }, ctx());
    expect(result).toEqual({
      status: 'ok',
      message: '**TOOL COMPLETED: web-search**\n---',
      payload: { status: 'completed', toolName: 'web-search' },
    });
  });
});
