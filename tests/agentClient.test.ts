import { AgentCallFailure } from '../src/core/errors';
import { loadConfig } from '../src/core/config';
import { resolveDispatch } from '../src/agents/dispatch';
import { OpenAICompatibleClient, getAgentClient } from '../src/agents/openaiCompatibleClient';
import { StubAgentClient } from '../src/agents/stubAgentClient';
import { makeDispatch } from './helpers';

interface RecordedRequest {
  url: string;
  init?: RequestInit;
}

const fakeFetch = (respond: () => Response | Promise<Response>) => {
  const requests: RecordedRequest[] = [];
  const fetchImpl: typeof fetch = async (input, init) => {
    requests.push({ url: String(input), init });
    return respond();
  };
  return { fetchImpl, requests };
};

const completion = (content: string) =>
  new Response(JSON.stringify({ choices: [{ message: { role: 'assistant', content } }] }), {
    status: 200,
    headers: { 'Content-Type': 'application/json' }
  });

describe('resolveDispatch', () => {
  it('binds every configured role to its provider and key', () => {
    const table = resolveDispatch(loadConfig(), { DEEPSEEK_API_KEY: 'test-secret' });

    expect(table.commander).toEqual({
      role: 'commander',
      provider: 'deepseek',
      baseUrl: 'https://api.deepseek.com/v1',
      model: 'deepseek-reasoner',
      modelTag: 'DeepSeek',
      apiKeyEnv: 'DEEPSEEK_API_KEY',
      apiKey: 'test-secret'
    });
    expect(table.auditor).toMatchObject({ provider: 'qwen', apiKeyEnv: 'DASHSCOPE_API_KEY', apiKey: undefined });
    expect(table.quant?.model).toBe('qwen-plus');
  });

  it('leaves out specialists that are not configured', () => {
    const config = loadConfig();
    const table = resolveDispatch({ ...config, roles: { commander: config.roles.commander, auditor: config.roles.auditor } }, {});
    expect(table.quant).toBeUndefined();
    expect(table.intel).toBeUndefined();
  });

  it('rejects a role bound to an unknown provider', () => {
    const config = loadConfig();
    const roles = { ...config.roles, auditor: { provider: 'nowhere', model: 'm', modelTag: 'M' } };
    expect(() => resolveDispatch({ ...config, roles }, {})).toThrow('Role auditor references unknown provider "nowhere"');
  });
});

describe('OpenAICompatibleClient', () => {
  it('posts a chat completion with the bound model and key', async () => {
    const { fetchImpl, requests } = fakeFetch(() => completion('{"verdict": "pass"}'));
    const client = new OpenAICompatibleClient(makeDispatch(), { timeoutMs: 1000, fetchImpl });

    const reply = await client.invoke('auditor', 'auditor-model', 'system text', 'Stage: audit1\nuser text');

    expect(reply).toBe('{"verdict": "pass"}');
    expect(requests).toHaveLength(1);
    expect(requests[0].url).toBe('http://localhost.invalid/v1/chat/completions');
    expect(requests[0].init?.headers).toEqual({ 'Content-Type': 'application/json', Authorization: 'Bearer test-secret' });
    expect(JSON.parse(String(requests[0].init?.body))).toEqual({
      model: 'auditor-model',
      messages: [
        { role: 'system', content: 'system text' },
        { role: 'user', content: 'Stage: audit1\nuser text' }
      ],
      temperature: 0.2,
      max_tokens: 2000
    });
  });

  it('reports provider errors with status and body', async () => {
    const { fetchImpl } = fakeFetch(() => new Response('rate limited', { status: 429 }));
    const client = new OpenAICompatibleClient(makeDispatch(), { timeoutMs: 1000, fetchImpl });
    await expect(client.invoke('commander', 'commander-model', 's', 'u')).rejects.toThrow('commander: test error 429: rate limited');
  });

  it('treats an empty reply as a failure', async () => {
    const { fetchImpl } = fakeFetch(() => completion('   '));
    const client = new OpenAICompatibleClient(makeDispatch(), { timeoutMs: 1000, fetchImpl });
    await expect(client.invoke('commander', 'commander-model', 's', 'u')).rejects.toThrow('commander: test returned empty content');
  });

  it('fails without calling out when the key is missing', async () => {
    const { fetchImpl, requests } = fakeFetch(() => completion('never'));
    const table = makeDispatch();
    const client = new OpenAICompatibleClient({ ...table, commander: { ...table.commander, apiKey: undefined } }, { timeoutMs: 1000, fetchImpl });
    await expect(client.invoke('commander', 'commander-model', 's', 'u')).rejects.toThrow('commander: missing API key (TEST_API_KEY)');
    expect(requests).toHaveLength(0);
  });

  it('fails a role with no binding', async () => {
    const { fetchImpl } = fakeFetch(() => completion('never'));
    const client = new OpenAICompatibleClient(makeDispatch(false), { timeoutMs: 1000, fetchImpl });
    await expect(client.invoke('quant', 'quant-model', 's', 'u')).rejects.toBeInstanceOf(AgentCallFailure);
  });

  it('gives up after the timeout', async () => {
    const fetchImpl: typeof fetch = (_input, init) =>
      new Promise<Response>((_resolve, reject) => {
        init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
      });
    const client = new OpenAICompatibleClient(makeDispatch(), { timeoutMs: 20, fetchImpl });
    await expect(client.invoke('commander', 'commander-model', 's', 'u')).rejects.toThrow('commander: timed out after 20ms');
  });
});

describe('getAgentClient', () => {
  const previous = process.env.AGENT_CLIENT;

  afterEach(() => {
    if (previous === undefined) delete process.env.AGENT_CLIENT;
    else process.env.AGENT_CLIENT = previous;
  });

  it('returns the offline stub when asked', async () => {
    process.env.AGENT_CLIENT = 'stub';
    const client = getAgentClient(makeDispatch(), { timeoutMs: 1000 });
    expect(client).toBeInstanceOf(StubAgentClient);
    expect(JSON.parse(await client.invoke('commander', 'c', 's', 'Stage: final_order\n...'))).toMatchObject({ action: 'hold', quantity: 0 });
    expect(await client.invoke('quant', 'q', 's', 'Stage: draft.quant\n...')).toBe('Stub quant report (q): no data source attached.');
  });

  it('returns the HTTP client otherwise', () => {
    delete process.env.AGENT_CLIENT;
    expect(getAgentClient(makeDispatch(), { timeoutMs: 1000 })).toBeInstanceOf(OpenAICompatibleClient);
  });
});
