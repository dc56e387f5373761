import { beforeEach, describe, it, expect, vi } from 'vitest';

const { createCompletion, retrieveModel } = vi.hoisted(() => ({
  createCompletion: vi.fn(),
  retrieveModel: vi.fn()
}));

vi.mock('openai', () => ({
  default: class {
    chat = { completions: { create: createCompletion } };
    models = { retrieve: retrieveModel };
  }
}));

import { OpenAIChatClient } from './client';
import { CompletionServiceError } from '../core/errors';

describe('OpenAIChatClient', () => {
  beforeEach(() => {
    createCompletion.mockReset();
    retrieveModel.mockReset();
    vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  it('returns the first choice content', async () => {
    createCompletion.mockResolvedValue({ choices: [{ message: { role: 'assistant', content: 'Forty-two.' } }] });
    const client = new OpenAIChatClient('gpt-4o-mini', 0.7);

    const answer = await client.chat([{ role: 'user', content: 'What is the answer?' }]);

    expect(answer).toBe('Forty-two.');
    expect(createCompletion).toHaveBeenCalledWith({
      model: 'gpt-4o-mini',
      messages: [{ role: 'user', content: 'What is the answer?' }],
      temperature: 0.7
    });
  });

  it('lets callers override the temperature', async () => {
    createCompletion.mockResolvedValue({ choices: [{ message: { role: 'assistant', content: 'ok' } }] });
    const client = new OpenAIChatClient('gpt-4o-mini', 0.7);

    await client.chat([{ role: 'user', content: 'hi' }], { temperature: 0 });

    expect(createCompletion.mock.calls[0][0].temperature).toBe(0);
  });

  it('wraps API failures in CompletionServiceError', async () => {
    createCompletion.mockRejectedValue(new Error('500 upstream'));
    const client = new OpenAIChatClient();

    const result = client.chat([{ role: 'user', content: 'hi' }]);

    await expect(result).rejects.toBeInstanceOf(CompletionServiceError);
    await expect(result).rejects.toThrow('Failed to chat with OpenAI: 500 upstream');
  });

  it('treats an empty answer as a failure', async () => {
    createCompletion.mockResolvedValue({ choices: [{ message: { role: 'assistant', content: null } }] });

    await expect(new OpenAIChatClient().chat([{ role: 'user', content: 'hi' }])).rejects.toThrow(
      'OpenAI returned an empty answer'
    );
  });

  it('reports health from a model lookup', async () => {
    retrieveModel.mockResolvedValueOnce({ id: 'gpt-4o-mini' }).mockRejectedValueOnce(new Error('401'));
    const client = new OpenAIChatClient('gpt-4o-mini');

    expect(await client.checkHealth()).toBe(true);
    expect(await client.checkHealth()).toBe(false);
    expect(retrieveModel).toHaveBeenCalledWith('gpt-4o-mini');
  });
});
