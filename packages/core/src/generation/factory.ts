import type { AppConfig } from '../config.js';
import { GeminiTextGenerator } from './gemini-generator.js';
import { OpenAITextGenerator } from './openai-generator.js';
import type { TextGenerator } from './text-generator.js';

export function createTextGenerator(models: AppConfig['models'], apiKey: string): TextGenerator {
  if (models.textProvider === 'openai') {
    return new OpenAITextGenerator({ apiKey, model: models.openaiModel });
  }
  return new GeminiTextGenerator({ apiKey, model: models.geminiModel });
}
