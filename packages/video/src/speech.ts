/**
 * Speech synthesis via the OpenAI audio API.
 */

import * as fs from 'fs';
import * as path from 'path';
import OpenAI from 'openai';
import { ConfigError, logger } from '@lingo-shorts/core';

export interface SpeechSynthesizer {
  /** Write narration for `text` to `outputPath` (MP3). Throws on failure. */
  synthesize(text: string, outputPath: string): Promise<void>;
}

export const TTS_VOICES = ['alloy', 'ash', 'ballad', 'coral', 'echo', 'fable', 'onyx', 'nova', 'sage', 'shimmer', 'verse'] as const;
export type TtsVoice = typeof TTS_VOICES[number];

export function isTtsVoice(value: string): value is TtsVoice {
  return TTS_VOICES.some(voice => voice === value);
}

export interface OpenAISpeechConfig {
  apiKey: string;
  model: string;
  voice: string;
}

export class OpenAISpeechSynthesizer implements SpeechSynthesizer {
  private openai: OpenAI;
  private model: string;
  private voice: TtsVoice;

  constructor(config: OpenAISpeechConfig) {
    if (!isTtsVoice(config.voice)) {
      throw new ConfigError(`Unsupported TTS voice "${config.voice}". Available: ${TTS_VOICES.join(', ')}`);
    }
    this.openai = new OpenAI({ apiKey: config.apiKey });
    this.model = config.model;
    this.voice = config.voice;
  }

  async synthesize(text: string, outputPath: string): Promise<void> {
    const response = await this.openai.audio.speech.create({
      model: this.model,
      voice: this.voice,
      input: text,
      response_format: 'mp3',
    });

    const audio = Buffer.from(await response.arrayBuffer());
    fs.mkdirSync(path.dirname(outputPath), { recursive: true });
    fs.writeFileSync(outputPath, audio);
    logger.debug(`[TTS] Wrote ${audio.length} bytes to ${outputPath}`);
  }
}
