import { OpenAIReasoningClient } from '../src/llm/openaiClient';
import { StubReasoningClient } from '../src/llm/stubReasoningClient';
import { instructionFor } from '../src/llm/prompts';

const completion = (content: string | null) =>
  new Response(JSON.stringify({ choices: [{ message: { content } }] }), {
    status: 200,
    headers: { 'Content-Type': 'application/json' }
  });

describe('OpenAIReasoningClient', () => {
  it('posts the instruction and context and returns the message content', async () => {
    const fetchImpl = jest.fn<Promise<Response>, Parameters<typeof fetch>>(async () => completion('{"ok": true}'));
    const client = new OpenAIReasoningClient({
      apiKey: 'test-secret',
      model: 'small-model',
      premiumModel: 'large-model',
      baseUrl: 'http://llm.local/v1/',
      fetchImpl
    });

    const text = await client.generate({ role: 'trader', instruction: 'Plan it.', context: { symbol: 'AAPL' } });
    expect(text).toBe('{"ok": true}');

    const [url, init] = fetchImpl.mock.calls[0];
    expect(url).toBe('http://llm.local/v1/chat/completions');
    expect(init?.headers).toEqual({ 'Content-Type': 'application/json', Authorization: 'Bearer test-secret' });
    const body: unknown = JSON.parse(String(init?.body));
    expect(body).toMatchObject({
      model: 'small-model',
      temperature: 0,
      messages: [
        { role: 'system', content: 'Plan it.' },
        { role: 'user', content: '{"symbol":"AAPL"}' }
      ]
    });
  });

  it('sends gate and strategy roles to the premium model', () => {
    const client = new OpenAIReasoningClient({ apiKey: 'test-secret', model: 'small-model', premiumModel: 'large-model' });
    const request = (role: 'strategist' | 'risk_manager' | 'bullish_researcher') => ({ role, instruction: '', context: {} });
    expect(client.modelFor(request('strategist'))).toBe('large-model');
    expect(client.modelFor(request('risk_manager'))).toBe('large-model');
    expect(client.modelFor(request('bullish_researcher'))).toBe('small-model');
  });

  it('throws on an HTTP error or empty content', async () => {
    const failing = new OpenAIReasoningClient({
      apiKey: 'test-secret',
      model: 'small-model',
      fetchImpl: async () => new Response('rate limited', { status: 429 })
    });
    await expect(failing.generate({ role: 'trader', instruction: '', context: {} })).rejects.toThrow(
      'OpenAI error 429: rate limited'
    );

    const empty = new OpenAIReasoningClient({
      apiKey: 'test-secret',
      model: 'small-model',
      fetchImpl: async () => completion(null)
    });
    await expect(empty.generate({ role: 'trader', instruction: '', context: {} })).rejects.toThrow(
      'OpenAI returned empty content'
    );
  });
});

describe('StubReasoningClient', () => {
  it('answers identically for identical requests', async () => {
    const request = { role: 'bullish_researcher' as const, instruction: '', context: { symbol: 'AAPL', round: 2 } };
    const a = await new StubReasoningClient().generate(request);
    const b = await new StubReasoningClient().generate(request);
    expect(a).toBe(b);
    expect(JSON.parse(a)).toMatchObject({ argument: 'Round 2: AAPL has room to rerate on steady execution.' });
  });

  it('follows the debate direction when proposing a strategy', async () => {
    const client = new StubReasoningClient();
    const answer = await client.generate({ role: 'strategist', instruction: '', context: { symbol: 'AAPL', direction: 'short' } });
    expect(JSON.parse(answer)).toMatchObject({ kind: 'short_equity', positionSizeFraction: 0.02 });
    expect(client.getCalls()).toEqual([{ role: 'strategist', symbol: 'AAPL' }]);
  });

  it('asks every role for JSON only', () => {
    expect(instructionFor('risk_manager').endsWith('Respond ONLY with a JSON object, no prose.')).toBe(true);
  });
});
