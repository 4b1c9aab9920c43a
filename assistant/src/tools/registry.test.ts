import { describe, expect, it } from 'vitest';
import { z } from 'zod';
import { defineTool } from './definition.js';
import { createDefaultToolRegistry, ToolRegistry } from './registry.js';

const echoTool = (name: string, reply: string) => defineTool({
  name,
  description: `Echo ${reply}`,
  parameterSchema: { type: 'object', properties: {} },
  argsSchema: z.object({}),
  execute: () => reply,
});

const toolNames = (registry: ToolRegistry): string[] => registry.list().map((tool) => tool.name);

describe('ToolRegistry', () => {
  it('returns undefined for unknown names', () => {
    const registry = new ToolRegistry();
    expect(registry.get('missing')).toBeUndefined();
    expect(registry.size).toBe(0);
  });

  it('lists tools in insertion order', () => {
    const registry = new ToolRegistry([echoTool('b', 'one'), echoTool('a', 'two')]);
    expect(toolNames(registry)).toEqual(['b', 'a']);
  });

  it('replaces a tool registered twice without error', () => {
    const registry = new ToolRegistry();
    registry.register(echoTool('echo', 'first'));
    registry.register(echoTool('other', 'x'));
    registry.register(echoTool('echo', 'second'));

    expect(registry.size).toBe(2);
    expect(registry.get('echo')?.handler({})).toBe('second');
    expect(toolNames(registry)).toEqual(['echo', 'other']);
  });

  it('exposes schemas mirroring the registered tools', () => {
    const registry = new ToolRegistry([echoTool('echo', 'hi')]);
    expect(registry.schemas()).toEqual([
      { name: 'echo', description: 'Echo hi', parameterSchema: { type: 'object', properties: {} } },
    ]);
  });

  it('returns frozen descriptors', () => {
    const tool = echoTool('echo', 'hi');
    expect(Object.isFrozen(tool)).toBe(true);
  });
});

describe('createDefaultToolRegistry', () => {
  it('registers calculate, search and get_weather', () => {
    expect(toolNames(createDefaultToolRegistry())).toEqual(['calculate', 'search', 'get_weather']);
  });

  it('returns the mock search and weather strings', async () => {
    const registry = createDefaultToolRegistry();
    expect(await registry.get('search')?.handler({ query: 'typescript' })).toBe(
      'Search results for: typescript (mock - implement with real search API)',
    );
    expect(await registry.get('get_weather')?.handler({ location: 'New York' })).toBe(
      'Weather in New York: Sunny, 72°F (mock - implement with real weather API)',
    );
  });
});
