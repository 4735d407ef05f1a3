import { HumanMessage, SystemMessage } from '@langchain/core/messages';
import { GenerationError } from '../../common/errors/domain-errors';
import { loadAppConfig } from '../../config/app-config';
import { GeminiGenerationAdapter, type ChatModel } from './gemini-generation.adapter';

const generation = loadAppConfig({
  GOOGLE_API_KEY: 'test-key',
  GEMINI_TIMEOUT_MS: '20',
}).generation;

function fakeModel(impl: ChatModel['invoke']) {
  const invoke = jest.fn(impl);
  const model: ChatModel = { invoke };
  return { model, invoke };
}

describe('GeminiGenerationAdapter', () => {
  it('sends a system and a human message and returns trimmed text', async () => {
    const { model, invoke } = fakeModel(async () => ({
      content: '  Subject: Hi\n\nBody  ',
    }));
    const adapter = new GeminiGenerationAdapter(generation, model);

    await expect(adapter.generate('the prompt', 'en')).resolves.toBe(
      'Subject: Hi\n\nBody',
    );

    const [messages, options] = invoke.mock.calls[0];
    expect(messages).toHaveLength(2);
    expect(messages[0]).toBeInstanceOf(SystemMessage);
    expect(messages[1]).toBeInstanceOf(HumanMessage);
    expect(messages[1].content).toBe('the prompt');
    expect(options?.signal).toBeInstanceOf(AbortSignal);
  });

  it('joins text parts of structured content', async () => {
    const { model } = fakeModel(async () => ({
      content: [
        { type: 'text', text: 'Subject: Hi' },
        { type: 'text', text: '\n\nBody' },
      ],
    }));
    const adapter = new GeminiGenerationAdapter(generation, model);

    await expect(adapter.generate('p', 'ar')).resolves.toBe(
      'Subject: Hi\n\nBody',
    );
  });

  it.each([
    ['429 Resource exhausted: check quota', 'Gemini quota exhausted'],
    ['Rate limit exceeded', 'Gemini rate limit reached'],
    ['socket hang up', 'Gemini request failed: socket hang up'],
  ])('wraps "%s" in a GenerationError', async (cause, message) => {
    const { model } = fakeModel(() => Promise.reject(new Error(cause)));
    const adapter = new GeminiGenerationAdapter(generation, model);

    const result = adapter.generate('p', 'en');

    await expect(result).rejects.toBeInstanceOf(GenerationError);
    await expect(result).rejects.toThrow(message);
  });

  it('fails on an empty reply', async () => {
    const { model } = fakeModel(async () => ({ content: '   ' }));
    const adapter = new GeminiGenerationAdapter(generation, model);

    await expect(adapter.generate('p', 'en')).rejects.toThrow(
      'Gemini returned an empty draft',
    );
  });

  it('gives up after the configured timeout and aborts the call', async () => {
    let aborted = false;
    const { model } = fakeModel(
      (_messages, options) =>
        new Promise((_resolve, reject) => {
          options?.signal?.addEventListener('abort', () => {
            aborted = true;
            reject(new Error('aborted'));
          });
        }),
    );
    const adapter = new GeminiGenerationAdapter(generation, model);

    await expect(adapter.generate('p', 'en')).rejects.toThrow(
      'Gemini did not answer within 20ms',
    );
    expect(aborted).toBe(true);
  });

  it('needs an API key when no model is injected', () => {
    expect(
      () => new GeminiGenerationAdapter(loadAppConfig({}).generation),
    ).toThrow('GOOGLE_API_KEY is required for live draft generation');
  });
});
