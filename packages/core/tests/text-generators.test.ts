/**
 * Vendor adapter tests. The SDKs are mocked; nothing leaves the process.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';

const mocks = vi.hoisted(() => ({
  getGenerativeModel: vi.fn(),
  generateContentStream: vi.fn(),
  createCompletion: vi.fn(),
}));

vi.mock('@google/generative-ai', () => ({
  GoogleGenerativeAI: class {
    getGenerativeModel = mocks.getGenerativeModel;
  },
}));

vi.mock('openai', () => ({
  default: class {
    chat = { completions: { create: mocks.createCompletion } };
  },
}));

import { GeminiTextGenerator } from '../src/generation/gemini-generator.js';
import { OpenAITextGenerator } from '../src/generation/openai-generator.js';
import { createTextGenerator } from '../src/generation/factory.js';
import { DEFAULT_APP_CONFIG } from '../src/config.js';

async function* chunks(parts: string[]) {
  for (const part of parts) {
    yield { text: () => part };
  }
}

describe('GeminiTextGenerator', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    mocks.getGenerativeModel.mockReturnValue({ generateContentStream: mocks.generateContentStream });
  });

  it('should join streamed chunks into one response', async () => {
    mocks.generateContentStream.mockResolvedValue({ stream: chunks(['[{"a":', '1}', ']']) });

    const generator = new GeminiTextGenerator({ apiKey: 'test-key', model: 'gemini-test' });
    const text = await generator.generate('prompt', { temperature: 1.8, json: true });

    expect(text).toBe('[{"a":1}]');
    expect(mocks.getGenerativeModel).toHaveBeenCalledWith({
      model: 'gemini-test',
      generationConfig: { temperature: 1.8, responseMimeType: 'application/json' },
    });
    expect(mocks.generateContentStream).toHaveBeenCalledWith('prompt');
  });

  it('should request plain text outside JSON mode', async () => {
    mocks.generateContentStream.mockResolvedValue({ stream: chunks(['hello']) });

    const generator = new GeminiTextGenerator({ apiKey: 'test-key', model: 'gemini-test' });
    await generator.generate('prompt', { temperature: 1.2 });

    expect(mocks.getGenerativeModel).toHaveBeenCalledWith({
      model: 'gemini-test',
      generationConfig: { temperature: 1.2, responseMimeType: 'text/plain' },
    });
  });

  it('should propagate stream errors', async () => {
    mocks.generateContentStream.mockRejectedValue(new Error('SAFETY'));
    const generator = new GeminiTextGenerator({ apiKey: 'test-key', model: 'gemini-test' });
    await expect(generator.generate('prompt', { temperature: 1 })).rejects.toThrow('SAFETY');
  });
});

describe('OpenAITextGenerator', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('should return the first choice', async () => {
    mocks.createCompletion.mockResolvedValue({ choices: [{ message: { content: '["x"]' } }] });

    const generator = new OpenAITextGenerator({ apiKey: 'test-key', model: 'gpt-test' });
    const text = await generator.generate('prompt', { temperature: 0.5, json: true });

    expect(text).toBe('["x"]');
    const [params, options] = mocks.createCompletion.mock.calls[0];
    expect(params.model).toBe('gpt-test');
    expect(params.temperature).toBe(0.5);
    expect(params.messages[1]).toEqual({ role: 'user', content: 'prompt' });
    expect(options).toEqual({ timeout: 120000 });
  });

  it('should throw when the model returns no content', async () => {
    mocks.createCompletion.mockResolvedValue({ choices: [] });
    const generator = new OpenAITextGenerator({ apiKey: 'test-key', model: 'gpt-test' });
    await expect(generator.generate('prompt', { temperature: 0.5 })).rejects.toThrow('No response from OpenAI');
  });
});

describe('createTextGenerator', () => {
  it('should pick the adapter from the configured provider', () => {
    expect(createTextGenerator(DEFAULT_APP_CONFIG.models, 'test-key').name).toBe('gemini');
    expect(createTextGenerator({ ...DEFAULT_APP_CONFIG.models, textProvider: 'openai' }, 'test-key').name).toBe('openai');
  });
});
