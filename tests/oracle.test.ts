import { describe, it, expect, vi } from 'vitest';
import { OpenAICompatibleOracle } from '../src/ranking/oracle.js';
import { OracleFailure } from '../src/utils/errors.js';
import { createSilentLogger } from '../src/utils/logger.js';

function fakeFetch(respond: () => Promise<Response>) {
  return vi.fn((_input: string | URL | Request, _init?: RequestInit) => respond());
}

function completion(content: string | null): Response {
  return new Response(JSON.stringify({ choices: [{ message: { role: 'assistant', content } }] }), { status: 200 });
}

const request = {
  systemPrompt: 'system text',
  userPrompt: 'user text',
  temperature: 0.7,
  maxTokens: 700,
};

function oracleWith(fetchMock: ReturnType<typeof fakeFetch>) {
  return new OpenAICompatibleOracle({
    baseUrl: 'https://oracle.test/',
    model: 'reasoner-small',
    apiKey: 'test-secret',
    fetch: fetchMock,
    logger: createSilentLogger('oracle'),
  });
}

describe('OpenAICompatibleOracle', () => {
  it('should send a chat completion request and return the content', async () => {
    const fetchMock = fakeFetch(async () => completion('{"matches":[]}'));

    expect(await oracleWith(fetchMock).complete(request)).toBe('{"matches":[]}');

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://oracle.test/chat/completions');
    expect(init?.headers).toEqual({ 'Content-Type': 'application/json', Authorization: 'Bearer test-secret' });
    expect(JSON.parse(String(init?.body))).toEqual({
      model: 'reasoner-small',
      messages: [
        { role: 'system', content: 'system text' },
        { role: 'user', content: 'user text' },
      ],
      temperature: 0.7,
      max_tokens: 700,
    });
  });

  it('should return an empty string for null content', async () => {
    expect(await oracleWith(fakeFetch(async () => completion(null))).complete(request)).toBe('');
  });

  it('should pass the abort signal through', async () => {
    const fetchMock = fakeFetch(async () => completion('ok'));
    const controller = new AbortController();

    await oracleWith(fetchMock).complete({ ...request, signal: controller.signal });
    expect(fetchMock.mock.calls[0][1]?.signal).toBe(controller.signal);
  });

  it('should report server errors as retryable transport failures', async () => {
    const error = await oracleWith(fakeFetch(async () => new Response('busy', { status: 503 })))
      .complete(request)
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(OracleFailure);
    expect(error).toMatchObject({ kind: 'transport', message: 'Oracle answered 503: busy', isRetryable: true });
  });

  it('should not retry client errors', async () => {
    const error = await oracleWith(fakeFetch(async () => new Response('bad key', { status: 401 })))
      .complete(request)
      .catch((caught: unknown) => caught);

    expect(error).toMatchObject({ kind: 'transport', isRetryable: false });
  });

  it('should report a body that is not JSON as malformed', async () => {
    const error = await oracleWith(fakeFetch(async () => new Response('<html>', { status: 200 })))
      .complete(request)
      .catch((caught: unknown) => caught);

    expect(error).toMatchObject({ kind: 'malformed', message: 'Oracle reply is not JSON' });
  });

  it('should report a reply without choices as malformed', async () => {
    const error = await oracleWith(fakeFetch(async () => new Response('{"choices":[]}', { status: 200 })))
      .complete(request)
      .catch((caught: unknown) => caught);

    expect(error).toMatchObject({ kind: 'malformed', message: 'Oracle reply has no completion' });
  });

  it('should wrap network errors', async () => {
    const fetchMock = fakeFetch(async () => {
      throw new TypeError('fetch failed');
    });
    const error = await oracleWith(fetchMock).complete(request).catch((caught: unknown) => caught);

    expect(error).toMatchObject({ kind: 'transport', message: 'Oracle request failed: fetch failed' });
  });
});
