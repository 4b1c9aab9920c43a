import { z } from 'zod';
import { defineTool } from '../definition.js';

const weatherArgsSchema = z.object({
  location: z.string().min(1),
});

/**
 * Mock weather lookup with a fixed forecast.
 */
export const WEATHER_TOOL = defineTool({
  name: 'get_weather',
  description: 'Get current weather information for a location',
  parameterSchema: {
    type: 'object',
    properties: {
      location: { type: 'string', description: 'City name or location' },
    },
    required: ['location'],
  },
  argsSchema: weatherArgsSchema,
  execute: ({ location }) => `Weather in ${location}: Sunny, 72°F (mock - implement with real weather API)`,
});
