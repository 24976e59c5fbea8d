/**
 * Post Pipeline
 *
 * load history → generate one post → publish → record.
 *
 * History only changes after a successful, real post. A failed generation or
 * publish leaves the file exactly as it was.
 */

import { logger } from '@lingo-shorts/core';
import type { HistoryStore } from '@lingo-shorts/core';
import type { PostGenerator } from './post-generator.js';
import type { SocialPoster } from './x-poster.js';
import type { PostItem, PostRunResult } from './types.js';

export interface PostPipelineDeps {
  generator: PostGenerator;
  history: HistoryStore<PostItem>;
  poster: SocialPoster;
  dryRun?: boolean;
  now?: () => Date;
}

export async function runPostPipeline(deps: PostPipelineDeps): Promise<PostRunResult> {
  const dryRun = deps.dryRun ?? false;
  const postedKeys = deps.history.keys(item => item.slang);

  const item = await deps.generator.generate(postedKeys);
  if (!item) {
    logger.warn('[Post] Nothing to post this time, skipping');
    return { posted: false, reason: 'generation' };
  }

  const result = await deps.poster.post(item.post_text);
  if (!result.success) {
    logger.warn('[Post] Publishing failed; history left unchanged');
    return { posted: false, reason: 'post', error: result.error };
  }

  const id = result.id ?? '';
  if (dryRun) {
    logger.info('[Post] Dry run: history not updated');
    return { posted: true, id, url: result.url, item, dryRun };
  }

  const recorded: PostItem = { ...item, posted_at: (deps.now ?? (() => new Date()))().toISOString() };
  deps.history.append([recorded]);
  logger.info(`[Post] Recorded "${item.slang ?? '(no key)'}"`);
  return { posted: true, id, url: result.url, item: recorded, dryRun };
}
