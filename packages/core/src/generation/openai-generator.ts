/**
 * OpenAI chat-completions adapter for TextGenerator.
 */

import OpenAI from 'openai';
import { logger } from '../logger.js';
import type { GenerateOptions, TextGenerator } from './text-generator.js';

export interface OpenAIGeneratorConfig {
  apiKey: string;
  model: string;
  timeoutMs?: number;
}

export class OpenAITextGenerator implements TextGenerator {
  readonly name = 'openai';
  private openai: OpenAI;
  private model: string;
  private timeoutMs: number;

  constructor(config: OpenAIGeneratorConfig) {
    this.openai = new OpenAI({ apiKey: config.apiKey });
    this.model = config.model;
    this.timeoutMs = config.timeoutMs ?? 120000;
  }

  async generate(prompt: string, options: GenerateOptions): Promise<string> {
    logger.info(`[OpenAI] Requesting ${this.model} (temperature ${options.temperature})`);

    // json_object mode only admits top-level objects; arrays are requested through the prompt.
    const response = await this.openai.chat.completions.create({
      model: this.model,
      messages: [
        {
          role: 'system',
          content: options.json
            ? 'You write content for English learners. Reply with raw JSON only, no markdown.'
            : 'You write content for English learners. Follow the requested output format exactly.',
        },
        { role: 'user', content: prompt },
      ],
      temperature: options.temperature,
    }, {
      timeout: this.timeoutMs,
    });

    const content = response.choices[0]?.message?.content;
    if (!content) throw new Error('No response from OpenAI');
    return content;
  }
}
