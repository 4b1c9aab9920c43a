import { describe, expect, it } from 'vitest';
import { z } from 'zod';
import { BackendError, BackendUnavailableError, ConfigError } from '../errors.js';
import { createAbortError } from '../helpers.js';
import { defineTool } from '../tools/definition.js';
import { createDefaultToolRegistry, ToolRegistry } from '../tools/registry.js';
import {
  functionCallReply,
  ScriptedBackend,
  textReply,
} from '../test-helpers/scripted-backend.js';
import { ConversationEngine, NO_RESPONSE_TEXT } from './engine.js';

const inspectTool = defineTool({
  name: 'inspect',
  description: 'Returns its arguments',
  parameterSchema: { type: 'object' },
  argsSchema: z.record(z.unknown()),
  execute: (args) => args,
});

const failingTool = defineTool({
  name: 'boom',
  description: 'Always fails',
  parameterSchema: { type: 'object' },
  argsSchema: z.object({}),
  execute: () => {
    throw new Error('kaboom');
  },
});

const createEngine = (backend: ScriptedBackend, registry = createDefaultToolRegistry()) => (
  new ConversationEngine({ backend, registry })
);

describe('ConversationEngine', () => {
  it('returns final text from the first round without calling tools', async () => {
    const backend = new ScriptedBackend([textReply('Hello there!')]);
    const engine = createEngine(backend);

    const result = await engine.chat('Hi');

    expect(result).toEqual({
      text: 'Hello there!',
      toolCalls: [],
      rounds: 1,
      outcome: 'completed',
      finalState: 'has_final_text',
    });
    expect(backend.requests).toHaveLength(1);
    expect(engine.state).toBe('has_final_text');
  });

  it('executes requested tools and feeds results into the next round', async () => {
    const backend = new ScriptedBackend([
      functionCallReply('calculate', { expression: '15*23' }),
      textReply('345'),
    ]);
    const engine = createEngine(backend);

    const result = await engine.chat('What is 15 * 23?');

    expect(result.text).toBe('345');
    expect(result.rounds).toBe(2);
    expect(result.toolCalls).toEqual([{
      id: 'call_calculate',
      name: 'calculate',
      arguments: '{"expression":"15*23"}',
      resolvedArguments: { expression: '15*23' },
      output: '345',
      status: 'executed',
    }]);
    expect(engine.getLastToolCalls()).toEqual(result.toolCalls);
    expect(backend.requests[1]?.input).toEqual([
      { kind: 'user_text', text: 'What is 15 * 23?' },
      { kind: 'tool_invocation', callId: 'call_calculate', name: 'calculate', arguments: '{"expression":"15*23"}' },
      { kind: 'tool_result', callId: 'call_calculate', output: '345' },
    ]);
  });

  it('offers tools only until the first tool results are folded back', async () => {
    const backend = new ScriptedBackend([
      functionCallReply('search', { query: 'a' }, 'call_1'),
      functionCallReply('search', { query: 'b' }, 'call_2'),
      textReply('done'),
    ]);
    const engine = createEngine(backend);

    await engine.chat('Search twice');

    expect(backend.requests.map((request) => request.tools?.map((tool) => tool.name))).toEqual([
      ['calculate', 'search', 'get_weather'],
      undefined,
      undefined,
    ]);
  });

  it('reports unknown tools as result text instead of failing the turn', async () => {
    const backend = new ScriptedBackend([
      functionCallReply('teleport', { destination: 'Mars' }),
      textReply('I cannot do that.'),
    ]);
    const engine = createEngine(backend);

    const result = await engine.chat('Take me to Mars');

    expect(result.text).toBe('I cannot do that.');
    expect(result.toolCalls[0]?.output).toBe("Error: Tool 'teleport' not found");
    expect(result.toolCalls[0]?.status).toBe('failed');
  });

  it('reports tool exceptions as result text', async () => {
    const backend = new ScriptedBackend([functionCallReply('boom', {}), textReply('Sorry.')]);
    const engine = createEngine(backend, new ToolRegistry([failingTool]));

    const result = await engine.chat('Break something');

    expect(result.toolCalls[0]?.output).toBe("Error executing tool 'boom': kaboom");
    expect(result.toolCalls[0]?.status).toBe('failed');
  });

  describe('tool invocations without a name', () => {
    const namelessCall = { id: 'resp_1', output: [{ type: 'function_call', call_id: 'call_x', arguments: '{}' }] };
    const notFound = "Error: Tool '' not found";

    it('answers the call id with a not-found result', async () => {
      const backend = new ScriptedBackend([namelessCall, textReply('done')]);
      const engine = createEngine(backend);

      const result = await engine.chat('Run it');

      expect(result).toEqual({
        text: 'done',
        toolCalls: [{
          id: 'call_x',
          name: '',
          arguments: '{}',
          resolvedArguments: {},
          output: notFound,
          status: 'failed',
        }],
        rounds: 2,
        outcome: 'completed',
        finalState: 'has_final_text',
      });
      expect(backend.requests[1]?.input).toEqual([
        { kind: 'user_text', text: 'Run it' },
        { kind: 'tool_invocation', callId: 'call_x', name: '', arguments: '{}' },
        { kind: 'tool_result', callId: 'call_x', output: notFound },
      ]);
    });

    it('sends the result against the continuation token in backend_stateful mode', async () => {
      const backend = new ScriptedBackend([namelessCall, textReply('done')]);
      const engine = new ConversationEngine({
        backend,
        registry: createDefaultToolRegistry(),
        statefulness: 'backend_stateful',
      });

      const result = await engine.chat('Run it');

      expect(result.text).toBe('done');
      expect(result.toolCalls.map((call) => call.id)).toContain('call_x');
      expect(backend.requests[1]?.continuationToken).toBe('resp_1');
      expect(backend.requests[1]?.input).toEqual([
        { kind: 'tool_result', callId: 'call_x', output: notFound },
      ]);
    });
  });

  it('invokes tools with {} when arguments cannot be parsed', async () => {
    const backend = new ScriptedBackend([
      { id: 'resp_1', output: [{ type: 'function_call', call_id: 'call_1', name: 'inspect', arguments: '{not json' }] },
      { id: 'resp_2', output: [{ type: 'function_call', call_id: 'call_2', name: 'inspect', arguments: '[1, 2]' }] },
      textReply('ok'),
    ]);
    const engine = createEngine(backend, new ToolRegistry([inspectTool]));

    const result = await engine.chat('Inspect');

    expect(result.toolCalls.map((call) => [call.arguments, call.resolvedArguments, call.output])).toEqual([
      ['{not json', {}, '{}'],
      ['[1, 2]', {}, '{}'],
    ]);
  });

  it('executes a call id repeated within one response once', async () => {
    const backend = new ScriptedBackend([
      {
        id: 'resp_1',
        output: [
          { type: 'function_call', call_id: 'same', name: 'inspect', arguments: '{"n":1}' },
          { type: 'function_call', call_id: 'same', name: 'inspect', arguments: '{"n":2}' },
        ],
      },
      textReply('ok'),
    ]);
    const engine = createEngine(backend, new ToolRegistry([inspectTool]));

    const result = await engine.chat('Inspect');

    expect(result.toolCalls).toHaveLength(1);
    expect(result.toolCalls[0]?.output).toBe('{"n":1}');
  });

  it('stops at the budget with the fallback text when no text was seen', async () => {
    const backend = new ScriptedBackend([
      (_request, round) => functionCallReply('search', { query: 'loop' }, `call_${round}`),
    ]);
    const engine = createEngine(backend);

    const result = await engine.chat('Loop forever');

    expect(result.text).toBe(NO_RESPONSE_TEXT);
    expect(result.outcome).toBe('budget_exhausted');
    expect(result.finalState).toBe('budget_exhausted');
    expect(result.rounds).toBe(6);
    expect(result.toolCalls).toHaveLength(6);
    expect(backend.requests).toHaveLength(6);
  });

  it('stops at the budget with the last text seen', async () => {
    const backend = new ScriptedBackend([
      (_request, round) => ({
        id: `resp_${round}`,
        output: [
          { type: 'message', content: [{ type: 'output_text', text: `Still working (${round})` }] },
          { type: 'function_call', call_id: `call_${round}`, name: 'search', arguments: '{"query":"more"}' },
        ],
      }),
    ]);
    const engine = createEngine(backend);

    const result = await engine.chat('Keep going', { maxIterations: 3 });

    expect(result.text).toBe('Still working (3)');
    expect(result.rounds).toBe(3);
    expect(result.outcome).toBe('budget_exhausted');
  });

  it('falls back to text from an earlier round when the last round has none', async () => {
    const backend = new ScriptedBackend([
      {
        id: 'resp_1',
        output: [
          { type: 'message', content: 'Checking the weather.' },
          { type: 'function_call', call_id: 'call_1', name: 'get_weather', arguments: '{"location":"Paris"}' },
        ],
      },
      { id: 'resp_2', output: [] },
    ]);
    const engine = createEngine(backend);

    const result = await engine.chat('Weather in Paris?');

    expect(result.text).toBe('Checking the weather.');
    expect(result.outcome).toBe('completed');
  });

  it('retains prior turns and re-sends them in stateless mode', async () => {
    const backend = new ScriptedBackend([textReply('First answer'), textReply('Second answer')]);
    const engine = createEngine(backend);

    await engine.chat('First question');
    await engine.chat('Second question');

    expect(backend.requests[0]?.input).toBe('First question');
    expect(backend.requests[1]?.input).toEqual([
      { kind: 'user_text', text: 'First question' },
      { kind: 'assistant_text', text: 'First answer' },
      { kind: 'user_text', text: 'Second question' },
    ]);
    expect(backend.requests[1]?.continuationToken).toBeUndefined();
  });

  it('records output_text as assistant text when no message item carried it', async () => {
    const backend = new ScriptedBackend([{ id: 'resp_1', output_text: 'Bare answer' }]);
    const engine = createEngine(backend);

    await engine.chat('Question');

    expect(engine.getHistory()).toEqual([
      { kind: 'user_text', text: 'Question' },
      { kind: 'assistant_text', text: 'Bare answer' },
    ]);
  });

  it('sends only unseen items with the continuation token in backend_stateful mode', async () => {
    const backend = new ScriptedBackend([
      functionCallReply('calculate', { expression: '2+2' }, 'call_1', 'resp_1'),
      textReply('4', 'resp_2'),
      textReply('You are welcome.', 'resp_3'),
    ]);
    const engine = new ConversationEngine({
      backend,
      registry: createDefaultToolRegistry(),
      statefulness: 'backend_stateful',
    });

    await engine.chat('What is 2+2?');
    await engine.chat('Thanks');

    expect(backend.requests.map((request) => [request.input, request.continuationToken])).toEqual([
      ['What is 2+2?', undefined],
      [[{ kind: 'tool_result', callId: 'call_1', output: '4' }], 'resp_1'],
      ['Thanks', 'resp_2'],
    ]);
  });

  it('refuses backend_stateful mode on a backend without continuation support', () => {
    const backend = new ScriptedBackend([textReply('x')], false);
    expect(() => new ConversationEngine({ backend, statefulness: 'backend_stateful' })).toThrow(ConfigError);
  });

  it('clears context, tool calls and the continuation token on reset', async () => {
    const backend = new ScriptedBackend([
      functionCallReply('search', { query: 'x' }, 'call_1', 'resp_1'),
      textReply('found', 'resp_2'),
      textReply('fresh', 'resp_3'),
    ]);
    const engine = new ConversationEngine({
      backend,
      statefulness: 'backend_stateful',
      conversationId: 'conv-1',
    });

    await engine.chat('Find x');
    engine.reset();

    expect(engine.getHistory()).toEqual([]);
    expect(engine.getLastToolCalls()).toEqual([]);
    expect(engine.getConversationId()).toBe('conv-1');

    await engine.chat('Again');
    expect(backend.requests[2]?.continuationToken).toBeUndefined();

    engine.reset({ clearConversationId: true });
    expect(engine.getConversationId()).not.toBe('conv-1');
  });

  it('seeds context from loaded history', async () => {
    const backend = new ScriptedBackend([textReply('Noted')]);
    const engine = createEngine(backend);

    engine.loadHistory([
      { kind: 'user_text', text: 'My name is Ada' },
      { kind: 'assistant_text', text: 'Hello Ada' },
    ]);
    await engine.chat('What is my name?');

    expect(backend.requests[0]?.input).toEqual([
      { kind: 'user_text', text: 'My name is Ada' },
      { kind: 'assistant_text', text: 'Hello Ada' },
      { kind: 'user_text', text: 'What is my name?' },
    ]);
  });

  it('wraps unexpected backend exceptions in BackendError', async () => {
    const backend = new ScriptedBackend([() => {
      throw new TypeError('socket hang up');
    }]);
    const engine = createEngine(backend);

    await expect(engine.chat('Hi')).rejects.toBeInstanceOf(BackendError);
  });

  it('passes BackendUnavailableError through unchanged', async () => {
    const unavailable = new BackendUnavailableError('down', 503);
    const backend = new ScriptedBackend([() => {
      throw unavailable;
    }]);
    const engine = createEngine(backend);

    await expect(engine.chat('Hi')).rejects.toBe(unavailable);
  });

  it('turns error payloads into BackendError', async () => {
    const backend = new ScriptedBackend([{ error: { message: 'model overloaded' } }]);
    const engine = createEngine(backend);

    await expect(engine.chat('Hi')).rejects.toThrow('Backend scripted returned an error: model overloaded');
  });

  it('lets abort errors through untouched', async () => {
    const backend = new ScriptedBackend([() => {
      throw createAbortError();
    }]);
    const engine = createEngine(backend);

    await expect(engine.chat('Hi')).rejects.toMatchObject({ name: 'AbortError' });
  });

  it('does not call the backend when already aborted', async () => {
    const backend = new ScriptedBackend([textReply('never')]);
    const engine = createEngine(backend);
    const controller = new AbortController();
    controller.abort();

    await expect(engine.chat('Hi', { signal: controller.signal })).rejects.toMatchObject({ name: 'AbortError' });
    expect(backend.requests).toHaveLength(0);
  });

  it('rejects a non-positive round budget', async () => {
    const engine = createEngine(new ScriptedBackend([textReply('x')]));
    await expect(engine.chat('Hi', { maxIterations: 0 })).rejects.toBeInstanceOf(ConfigError);
  });

  it('reports its configuration', () => {
    const engine = new ConversationEngine({
      backend: new ScriptedBackend([textReply('x')]),
      model: 'test-model',
      temperature: 0.2,
      conversationId: 'conv-42',
    });

    expect(engine.getConfig()).toEqual({
      model: 'test-model',
      temperature: 0.2,
      conversationId: 'conv-42',
      statefulness: 'stateless',
      maxIterations: 6,
      backend: 'scripted',
    });
  });
});
