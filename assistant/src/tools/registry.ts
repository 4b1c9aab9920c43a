import type { ToolSchema } from '../types.js';
import type { ToolDescriptor } from './definition.js';
import { CALCULATE_TOOL } from './builtin/calculate.js';
import { SEARCH_TOOL } from './builtin/search.js';
import { WEATHER_TOOL } from './builtin/weather.js';

/**
 * Name → tool mapping shared read-only by every engine built from it.
 * Registering a name twice silently replaces the first descriptor.
 */
export class ToolRegistry {
  private readonly tools = new Map<string, ToolDescriptor>();

  constructor(descriptors: Iterable<ToolDescriptor> = []) {
    for (const descriptor of descriptors) {
      this.register(descriptor);
    }
  }

  public register(descriptor: ToolDescriptor): void {
    this.tools.set(descriptor.name, descriptor);
  }

  public get(name: string): ToolDescriptor | undefined {
    return this.tools.get(name);
  }

  /**
   * Descriptors in insertion order. A replaced name keeps its original slot.
   */
  public list(): ToolDescriptor[] {
    return Array.from(this.tools.values());
  }

  /**
   * Tool offers for the backend, one per registered tool.
   */
  public schemas(): ToolSchema[] {
    return this.list().map((tool) => ({
      name: tool.name,
      description: tool.description,
      parameterSchema: tool.parameterSchema,
    }));
  }

  public get size(): number {
    return this.tools.size;
  }
}

export const DEFAULT_TOOLS: readonly ToolDescriptor[] = [CALCULATE_TOOL, SEARCH_TOOL, WEATHER_TOOL];

/**
 * Registry with the built-in calculate, search and get_weather tools.
 */
export const createDefaultToolRegistry = (): ToolRegistry => new ToolRegistry(DEFAULT_TOOLS);
