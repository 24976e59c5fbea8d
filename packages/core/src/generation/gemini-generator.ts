/**
 * Gemini adapter for TextGenerator.
 */

import { GoogleGenerativeAI } from '@google/generative-ai';
import { logger } from '../logger.js';
import type { GenerateOptions, TextGenerator } from './text-generator.js';

export interface GeminiGeneratorConfig {
  apiKey: string;
  model: string;
}

export class GeminiTextGenerator implements TextGenerator {
  readonly name = 'gemini';
  private client: GoogleGenerativeAI;
  private model: string;

  constructor(config: GeminiGeneratorConfig) {
    this.client = new GoogleGenerativeAI(config.apiKey);
    this.model = config.model;
  }

  /**
   * Streams the response and joins the chunks.
   */
  async generate(prompt: string, options: GenerateOptions): Promise<string> {
    const model = this.client.getGenerativeModel({
      model: this.model,
      generationConfig: {
        temperature: options.temperature,
        responseMimeType: options.json ? 'application/json' : 'text/plain',
      },
    });

    logger.info(`[Gemini] Requesting ${this.model} (temperature ${options.temperature}, streaming)`);
    const result = await model.generateContentStream(prompt);

    let text = '';
    for await (const chunk of result.stream) {
      text += chunk.text();
    }
    logger.debug(`[Gemini] Received ${text.length} chars`);
    return text;
  }
}
