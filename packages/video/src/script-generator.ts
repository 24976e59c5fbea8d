/**
 * Script Generator
 *
 * Asks the language model for a batch of shadowing scripts in JSON mode. Any
 * failure (request error, unparsable or non-array output) yields an empty
 * batch; the raw response is logged so a bad run can be diagnosed.
 */

import { logger, errorMessage, parseJsonArray } from '@lingo-shorts/core';
import type { TextGenerator } from '@lingo-shorts/core';
import { buildScriptPrompt } from './prompts.js';
import { isScriptItem } from './types.js';
import type { ScriptItem } from './types.js';

export interface ScriptGeneratorOptions {
  temperature: number;
}

export class ScriptGenerator {
  constructor(
    private text: TextGenerator,
    private options: ScriptGeneratorOptions,
  ) {}

  async generate(history: readonly ScriptItem[], count: number): Promise<ScriptItem[]> {
    logger.info(`[Scripts] Generating ${count} script(s) with ${this.text.name} (${history.length} in history)`);
    const prompt = buildScriptPrompt(history, { count });

    let raw: string;
    try {
      raw = await this.text.generate(prompt, { temperature: this.options.temperature, json: true });
    } catch (error) {
      logger.error(`[Scripts] Generation request failed: ${errorMessage(error)}`);
      return [];
    }

    const parsed = parseJsonArray(raw);
    if (!parsed.ok) {
      logger.error(`[Scripts] Could not use the model response (${parsed.error}). Raw response:\n${raw}`);
      return [];
    }

    const scripts: ScriptItem[] = [];
    parsed.items.forEach((item, index) => {
      if (isScriptItem(item)) {
        scripts.push({ english_script: item.english_script, japanese_translation: item.japanese_translation });
      } else {
        logger.warn(`[Scripts] Dropping entry ${index}: needs string "english_script" and "japanese_translation"`);
      }
    });

    if (scripts.length !== count) {
      logger.warn(`[Scripts] Asked for ${count} script(s), got ${scripts.length}`);
    }
    return scripts;
  }
}
