/**
 * Web search tool
 */

import { optionalIntegerArg, stringArg, toolError, toolOk } from '@tagwire/directive-contracts';
import type { ToolSchema } from '@tagwire/directive-contracts';
import type { DirectiveTool, SearchResult, ToolContext } from '../types.js';
import { WEB_SEARCH_CONFIG } from '../config.js';
import { clamp } from '../utils.js';

export const webSearchSchema: ToolSchema = {
  tag: 'web-search',
  description: 'Search the web and return the top results.',
  bindings: [
    { name: 'query', source: 'attribute', path: 'query', required: true, valueType: 'string' },
    {
      name: 'num_results',
      source: 'attribute',
      path: 'num_results',
      required: false,
      valueType: 'integer',
      default: WEB_SEARCH_CONFIG.defaultResults,
      description: `Between ${WEB_SEARCH_CONFIG.minResults} and ${WEB_SEARCH_CONFIG.maxResults}`,
    },
  ],
  example: '<web-search query="current TypeScript release" num_results="5" />',
};

function formatResults(query: string, results: readonly SearchResult[]): string {
  if (results.length === 0) {
    return `No search results found for "${query}". Try a broader query.`;
  }
  const lines = results.map((result, i) => {
    const snippet = result.snippet ? `\n   ${result.snippet}` : '';
    return `${i + 1}. ${result.title}\n   ${result.url}${snippet}`;
  });
  const noun = results.length === 1 ? 'result' : 'results';
  return `Found ${results.length} ${noun} for "${query}":\n${lines.join('\n')}`;
}

/**
 * web-search
 */
export function createWebSearchTool(context: ToolContext): DirectiveTool {
  return {
    schema: webSearchSchema,
    capability: async (args, ctx) => {
      const query = stringArg(args, 'query').trim();
      if (query === '') {
        return toolError({ code: 'EMPTY_QUERY', message: 'Search query is empty' });
      }
      if (!context.search) {
        return toolError({
          code: 'SEARCH_UNAVAILABLE',
          message: 'No search provider is configured',
        });
      }

      const maxResults = clamp(
        optionalIntegerArg(args, 'num_results') ?? WEB_SEARCH_CONFIG.defaultResults,
        WEB_SEARCH_CONFIG.minResults,
        WEB_SEARCH_CONFIG.maxResults,
      );
      const results = (await context.search.search(query, { maxResults, signal: ctx.signal })).slice(0, maxResults);

      return toolOk(formatResults(query, results), { query, resultCount: results.length, results });
    },
  };
}
