import { afterEach, describe, expect, it, vi } from 'vitest';
import { BackendError, BackendUnavailableError } from '../errors.js';
import { ResponsesClient, toResponsesInputItem } from './responses.js';

const jsonResponse = (body: unknown, status = 200) => new Response(JSON.stringify(body), {
  status,
  headers: { 'Content-Type': 'application/json' },
});

const stubFetch = (response: Response | Error) => {
  const fetchMock = vi.fn(async (_url: string | URL | Request, _init?: RequestInit) => {
    if (response instanceof Error) {
      throw response;
    }
    return response;
  });
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
};

const readBody = (fetchMock: ReturnType<typeof stubFetch>): unknown => {
  const init = fetchMock.mock.calls[0]?.[1];
  return typeof init?.body === 'string' ? JSON.parse(init.body) : undefined;
};

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('toResponsesInputItem', () => {
  it('encodes every turn item kind', () => {
    expect(toResponsesInputItem({ kind: 'user_text', text: 'hi' }))
      .toEqual({ type: 'message', role: 'user', content: 'hi' });
    expect(toResponsesInputItem({ kind: 'assistant_text', text: 'hello' }))
      .toEqual({ type: 'message', role: 'assistant', content: 'hello' });
    expect(toResponsesInputItem({ kind: 'tool_invocation', callId: 'c1', name: 'search', arguments: { query: 'x' } }))
      .toEqual({ type: 'function_call', call_id: 'c1', name: 'search', arguments: '{"query":"x"}' });
    expect(toResponsesInputItem({ kind: 'tool_result', callId: 'c1', output: 'done' }))
      .toEqual({ type: 'function_call_output', call_id: 'c1', output: 'done' });
  });
});

describe('ResponsesClient', () => {
  it('posts to /responses with tools, store and the continuation token', async () => {
    const fetchMock = stubFetch(jsonResponse({ id: 'resp_2', output_text: 'ok' }));
    const client = new ResponsesClient({ baseUrl: 'http://localhost:8080/v1/', apiKey: 'test-secret' });

    const payload = await client.send({
      model: 'test-model',
      input: [{ kind: 'tool_result', callId: 'c1', output: '4' }],
      tools: [{ name: 'calculate', description: 'Math', parameterSchema: { type: 'object' } }],
      temperature: 0.5,
      continuationToken: 'resp_1',
    });

    expect(payload).toEqual({ id: 'resp_2', output_text: 'ok' });
    expect(fetchMock.mock.calls[0]?.[0]).toBe('http://localhost:8080/v1/responses');
    expect(fetchMock.mock.calls[0]?.[1]?.headers).toEqual({
      'Content-Type': 'application/json',
      Authorization: 'Bearer test-secret',
    });
    expect(readBody(fetchMock)).toEqual({
      model: 'test-model',
      input: [{ type: 'function_call_output', call_id: 'c1', output: '4' }],
      store: true,
      tools: [{ type: 'function', name: 'calculate', description: 'Math', parameters: { type: 'object' } }],
      temperature: 0.5,
      previous_response_id: 'resp_1',
    });
  });

  it('omits the default temperature and sends string input as is', () => {
    const client = new ResponsesClient();
    expect(client.buildBody({ model: 'm', input: 'Hello', temperature: 1.0 })).toEqual({
      model: 'm',
      input: 'Hello',
      store: true,
    });
  });

  it('classifies auth failures and gateway errors as unavailable', async () => {
    stubFetch(jsonResponse({ error: 'bad key' }, 401));
    await expect(new ResponsesClient().send({ model: 'm', input: 'x' })).rejects.toBeInstanceOf(BackendUnavailableError);

    stubFetch(jsonResponse({ error: 'down' }, 503));
    await expect(new ResponsesClient().send({ model: 'm', input: 'x' })).rejects.toMatchObject({ status: 503 });
  });

  it('classifies other rejections as backend errors', async () => {
    stubFetch(jsonResponse({ error: 'slow down' }, 429));
    const error = await new ResponsesClient().send({ model: 'm', input: 'x' }).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(BackendError);
    expect(error).toMatchObject({ status: 429, code: 'BACKEND_ERROR' });
  });

  it('classifies transport failures as unavailable', async () => {
    stubFetch(new TypeError('fetch failed'));
    await expect(new ResponsesClient().send({ model: 'm', input: 'x' })).rejects.toMatchObject({
      code: 'BACKEND_UNAVAILABLE',
    });
  });

  it('rejects bodies that are not JSON', async () => {
    stubFetch(new Response('<html>oops</html>', { status: 200 }));
    await expect(new ResponsesClient().send({ model: 'm', input: 'x' })).rejects.toBeInstanceOf(BackendError);
  });
});
