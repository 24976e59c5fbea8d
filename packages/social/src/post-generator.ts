/**
 * Post Generators
 *
 * Two ways of getting one new post out of the model:
 * - json: a one-element JSON array of `{ slang, post_text }` (JSON mode)
 * - template: free text in a fixed layout whose second line is the phrase
 *
 * Both return null when nothing usable came back. The already-posted keys go
 * into the prompt; nothing checks the reply against them.
 */

import { logger, errorMessage, extractTemplateKey, parseJsonArray } from '@lingo-shorts/core';
import type { AppConfig, PostVariant, TextGenerator } from '@lingo-shorts/core';
import { buildPhrasePrompt, buildSlangPrompt } from './prompts.js';
import type { PostItem } from './types.js';

export interface PostGenerator {
  readonly variant: PostVariant;
  generate(postedKeys: readonly string[]): Promise<PostItem | null>;
}

type PostSettings = Pick<AppConfig['post'], 'temperature' | 'hashtags' | 'maxLength'>;

async function requestText(
  text: TextGenerator,
  prompt: string,
  temperature: number,
  json: boolean,
): Promise<string | null> {
  try {
    return await text.generate(prompt, { temperature, json });
  } catch (error) {
    logger.error(`[Post] Generation request failed: ${errorMessage(error)}`);
    return null;
  }
}

export class JsonPostGenerator implements PostGenerator {
  readonly variant = 'json';

  constructor(
    private text: TextGenerator,
    private settings: PostSettings,
  ) {}

  async generate(postedKeys: readonly string[]): Promise<PostItem | null> {
    logger.info(`[Post] Asking ${this.text.name} for a new slang post (${postedKeys.length} already posted)`);
    const prompt = buildSlangPrompt(postedKeys, this.settings);
    const raw = await requestText(this.text, prompt, this.settings.temperature, true);
    if (raw === null) return null;

    const parsed = parseJsonArray(raw);
    if (!parsed.ok) {
      logger.error(`[Post] Could not use the model response (${parsed.error}). Raw response:\n${raw}`);
      return null;
    }

    for (const entry of parsed.items) {
      if (
        typeof entry === 'object' && entry !== null
        && 'slang' in entry && typeof entry.slang === 'string' && entry.slang.trim()
        && 'post_text' in entry && typeof entry.post_text === 'string' && entry.post_text.trim()
      ) {
        if (parsed.items.length > 1) {
          logger.warn(`[Post] Expected one post, got ${parsed.items.length}; using the first valid one`);
        }
        return { slang: entry.slang.trim(), post_text: entry.post_text.trim() };
      }
    }

    logger.error(`[Post] No entry has string "slang" and "post_text". Raw response:\n${raw}`);
    return null;
  }
}

export class TemplatePostGenerator implements PostGenerator {
  readonly variant = 'template';

  constructor(
    private text: TextGenerator,
    private settings: PostSettings & { marker: string },
  ) {}

  async generate(postedKeys: readonly string[]): Promise<PostItem | null> {
    logger.info(`[Post] Asking ${this.text.name} for a new phrase post (${postedKeys.length} already posted)`);
    const prompt = buildPhrasePrompt(postedKeys, this.settings);
    const raw = await requestText(this.text, prompt, this.settings.temperature, false);
    if (raw === null) return null;

    if (!raw.trim()) {
      logger.error('[Post] The model returned an empty post');
      return null;
    }

    const extracted = extractTemplateKey(raw, this.settings.marker);
    if (extracted.warning) {
      logger.warn(`[Post] Could not read the phrase (${extracted.warning}); it will be recorded without one`);
    }
    return { slang: extracted.key, post_text: extracted.text };
  }
}

export function createPostGenerator(text: TextGenerator, post: AppConfig['post']): PostGenerator {
  const settings = { temperature: post.temperature, hashtags: post.hashtags, maxLength: post.maxLength };
  if (post.variant === 'template') {
    return new TemplatePostGenerator(text, { ...settings, marker: post.templateMarker });
  }
  return new JsonPostGenerator(text, settings);
}
