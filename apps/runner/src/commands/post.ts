/**
 * Post Command
 *
 * Generates one language tip and publishes it to X.
 */

import {
  ConfigError,
  HistoryStore,
  createTextGenerator,
  isPostVariant,
  loadPostSecrets,
  loadTextSecret,
  resolveWorkPath,
} from '@lingo-shorts/core';
import type { ConfigOverrides } from '@lingo-shorts/core';
import {
  DryRunPoster,
  XPoster,
  createPostGenerator,
  isPostItem,
  runPostPipeline,
} from '@lingo-shorts/social';
import type { PostRunResult, SocialPoster } from '@lingo-shorts/social';
import { commonOverrides, loadAppConfig } from './app-config.js';
import type { CommonOptions } from './app-config.js';

export interface PostCommandOptions extends CommonOptions {
  variant?: string;
  dryRun?: boolean;
}

export function postOverrides(options: PostCommandOptions): ConfigOverrides {
  const overrides = commonOverrides(options);
  if (options.variant !== undefined) {
    if (!isPostVariant(options.variant)) {
      throw new ConfigError(`Unknown post variant "${options.variant}". Use json or template.`);
    }
    overrides.post = { variant: options.variant };
  }
  return overrides;
}

export async function publishPost(options: PostCommandOptions): Promise<PostRunResult> {
  const config = loadAppConfig(postOverrides(options));
  const dryRun = options.dryRun ?? false;

  console.log(`\n📣 Lingo Shorts: ${config.post.variant} post${dryRun ? ' (dry run)' : ''}\n`);

  let textApiKey: string;
  let poster: SocialPoster;
  if (dryRun) {
    textApiKey = loadTextSecret(process.env, config.models.textProvider);
    poster = new DryRunPoster();
  } else {
    const secrets = loadPostSecrets(process.env, config.models.textProvider);
    textApiKey = secrets.textApiKey;
    poster = new XPoster(secrets.x);
    await poster.verify();
  }

  const result = await runPostPipeline({
    generator: createPostGenerator(createTextGenerator(config.models, textApiKey), config.post),
    history: new HistoryStore({
      filePath: resolveWorkPath(config, config.paths.postHistoryFile),
      isItem: isPostItem,
    }),
    poster,
    dryRun,
  });

  if (result.posted) {
    console.log(`\n✅ Posted ${result.item.slang ?? '(no key)'}${result.url ? `: ${result.url}` : ''}\n`);
  } else {
    console.log(`\n⏭️  Not posted (${result.reason === 'generation' ? 'nothing generated' : 'publish failed'})\n`);
  }
  return result;
}
