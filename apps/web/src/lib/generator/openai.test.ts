import { describe, expect, it, vi } from 'vitest';
import type { GeneratorSettings } from '../config';
import type { FetchLike } from '../babbel/client';
import { OpenAiGenerator, retryDelayMs } from './openai';
import { DEFAULT_PROMPTS } from './prompts';

const settings: GeneratorSettings = {
  apiKey: 'test-key',
  apiUrl: 'https://llm.test/v1/chat/completions',
  model: 'gpt-4.1-mini',
  titlePrompt: null,
  speechPrompt: null,
};

function completion(content: string) {
  return new Response(JSON.stringify({ choices: [{ message: { role: 'assistant', content } }] }), { status: 200 });
}

function setup(overrides: Partial<GeneratorSettings> = {}) {
  const fetchImpl = vi.fn<FetchLike>();
  const sleep = vi.fn<(ms: number) => Promise<void>>().mockResolvedValue(undefined);
  const generator = new OpenAiGenerator({ settings: { ...settings, ...overrides }, fetchImpl, sleep });
  return { generator, fetchImpl, sleep };
}

describe('OpenAiGenerator', () => {
  it('sends the default prompt and returns trimmed content', async () => {
    const { generator, fetchImpl } = setup();
    fetchImpl.mockResolvedValueOnce(completion('  Storm closes harbour \n'));

    const result = await generator.generate('A storm closed the harbour today.', 'title');

    expect(result).toBe('Storm closes harbour');
    const [url, init] = fetchImpl.mock.calls[0];
    expect(url).toBe('https://llm.test/v1/chat/completions');
    expect(init).toMatchObject({ method: 'POST', headers: { Authorization: 'Bearer test-key' } });
    expect(JSON.parse(String(init?.body))).toEqual({
      model: 'gpt-4.1-mini',
      messages: [
        { role: 'system', content: DEFAULT_PROMPTS.title },
        { role: 'user', content: 'A storm closed the harbour today.' },
      ],
      max_tokens: 1000,
      temperature: 0.7,
    });
  });

  it('prefers a configured prompt', async () => {
    const { generator, fetchImpl } = setup({ speechPrompt: 'Write two sentences.' });
    fetchImpl.mockResolvedValueOnce(completion('Speech'));

    await generator.generate('Source', 'speech');

    const body = JSON.parse(String(fetchImpl.mock.calls[0][1]?.body));
    expect(body.messages[0]).toEqual({ role: 'system', content: 'Write two sentences.' });
  });

  it('waits 2s then 4s between attempts', async () => {
    const { generator, fetchImpl, sleep } = setup();
    fetchImpl
      .mockRejectedValueOnce(new Error('timeout'))
      .mockResolvedValueOnce(new Response('not json', { status: 502 }))
      .mockResolvedValueOnce(completion('Third time'));

    expect(await generator.generate('Source', 'title')).toBe('Third time');
    expect(sleep.mock.calls).toEqual([[2000], [4000]]);
  });

  it('gives up after three attempts', async () => {
    const { generator, fetchImpl, sleep } = setup();
    fetchImpl.mockImplementation(async () => new Response('{"error":{"message":"overloaded","type":"server_error"}}'));

    expect(await generator.generate('Source', 'speech')).toBeNull();
    expect(fetchImpl).toHaveBeenCalledTimes(3);
    expect(sleep).toHaveBeenCalledTimes(2);
  });

  it('returns null without calling out when no key is configured', async () => {
    const { generator, fetchImpl } = setup({ apiKey: null });

    expect(await generator.generate('Source', 'title')).toBeNull();
    expect(fetchImpl).not.toHaveBeenCalled();
  });

  it('rejects a response without message content', async () => {
    const { generator, fetchImpl } = setup();
    fetchImpl.mockImplementation(async () => new Response('{"choices":[]}'));

    expect(await generator.generate('Source', 'title')).toBeNull();
  });
});

describe('retryDelayMs', () => {
  it('doubles from two seconds', () => {
    expect([1, 2, 3].map(retryDelayMs)).toEqual([2000, 4000, 8000]);
  });
});
