import type { BackendClient, StatefulnessMode } from '../types.js';
import { AgentNotFoundError } from '../errors.js';
import { generateId } from '../helpers.js';
import { Logger } from '../logger.js';
import { ConversationEngine } from '../engine/engine.js';
import { createDefaultToolRegistry, type ToolRegistry } from '../tools/registry.js';

export type AgentSpec = {
  model?: string;
  temperature?: number;
  maxIterations?: number;
  statefulness?: StatefulnessMode;
  conversationId?: string;
};

/**
 * Builds engines that share one backend client and one read-only tool registry.
 */
export class AgentFactory {
  public readonly toolRegistry: ToolRegistry;

  constructor(
    private readonly backend: BackendClient,
    toolRegistry?: ToolRegistry,
    private readonly defaults: AgentSpec = {},
  ) {
    this.toolRegistry = toolRegistry ?? createDefaultToolRegistry();
  }

  public create(spec: AgentSpec = {}): ConversationEngine {
    return new ConversationEngine({
      backend: this.backend,
      registry: this.toolRegistry,
      ...this.defaults,
      ...definedEntries(spec),
    });
  }
}

/**
 * Drops keys whose value is undefined so they don't shadow defaults when spread.
 */
const definedEntries = (spec: AgentSpec): AgentSpec => {
  const result: AgentSpec = {};
  if (spec.model !== undefined) result.model = spec.model;
  if (spec.temperature !== undefined) result.temperature = spec.temperature;
  if (spec.maxIterations !== undefined) result.maxIterations = spec.maxIterations;
  if (spec.statefulness !== undefined) result.statefulness = spec.statefulness;
  if (spec.conversationId !== undefined) result.conversationId = spec.conversationId;
  return result;
};

export type PooledAgent = {
  agentId: string;
  engine: ConversationEngine;
  spec: AgentSpec;
};

/**
 * Engines kept by id, in registration order.
 */
export class AgentPool {
  private readonly agents = new Map<string, PooledAgent>();

  constructor(private readonly factory: AgentFactory) {}

  /**
   * Registers a new engine. The id doubles as its initial conversation id;
   * an existing id is replaced.
   */
  public create(spec: AgentSpec = {}, agentId: string = generateId()): PooledAgent {
    const engine = this.factory.create({ conversationId: agentId, ...definedEntries(spec) });
    const pooled: PooledAgent = { agentId, engine, spec };
    this.agents.set(agentId, pooled);
    Logger.debug('agents', `Agent ${agentId} created`, engine.getConfig());
    return pooled;
  }

  public get(agentId: string): ConversationEngine | undefined {
    return this.agents.get(agentId)?.engine;
  }

  public require(agentId: string): PooledAgent {
    const pooled = this.agents.get(agentId);
    if (!pooled) {
      throw new AgentNotFoundError(agentId);
    }
    return pooled;
  }

  public remove(agentId: string): boolean {
    return this.agents.delete(agentId);
  }

  public reset(agentId: string, clearConversationId = false): boolean {
    const pooled = this.agents.get(agentId);
    if (!pooled) {
      return false;
    }
    pooled.engine.reset({ clearConversationId });
    return true;
  }

  public resetAll(clearConversationIds = false): void {
    for (const pooled of this.agents.values()) {
      pooled.engine.reset({ clearConversationId: clearConversationIds });
    }
  }

  public list(): string[] {
    return Array.from(this.agents.keys());
  }

  /**
   * `[agentId, engine]` pairs, ready for the multi-agent evaluator and trainer.
   */
  public entries(): [string, ConversationEngine][] {
    return Array.from(this.agents.values(), (pooled) => [pooled.agentId, pooled.engine]);
  }

  public get size(): number {
    return this.agents.size;
  }

  public get toolRegistry(): ToolRegistry {
    return this.factory.toolRegistry;
  }

  /**
   * A fresh engine with the same settings as the pooled one, sharing nothing but the registry.
   */
  public spawn(agentId: string, conversationId?: string): ConversationEngine {
    const pooled = this.require(agentId);
    return this.factory.create({ ...pooled.spec, conversationId });
  }
}
