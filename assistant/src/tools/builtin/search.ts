import { z } from 'zod';
import { defineTool } from '../definition.js';

const searchArgsSchema = z.object({
  query: z.string().min(1),
});

/**
 * Mock web search. Returns a canned line naming the query.
 */
export const SEARCH_TOOL = defineTool({
  name: 'search',
  description: 'Search for information on the web',
  parameterSchema: {
    type: 'object',
    properties: {
      query: { type: 'string', description: 'Search query' },
    },
    required: ['query'],
  },
  argsSchema: searchArgsSchema,
  execute: ({ query }) => `Search results for: ${query} (mock - implement with real search API)`,
});
