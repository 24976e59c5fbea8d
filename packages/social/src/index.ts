/**
 * Lingo Shorts Social
 *
 * One-a-run language-tip posts for X.
 */

export { runPostPipeline } from './post-pipeline.js';
export type { PostPipelineDeps } from './post-pipeline.js';
export { JsonPostGenerator, TemplatePostGenerator, createPostGenerator } from './post-generator.js';
export type { PostGenerator } from './post-generator.js';
export { XPoster, DryRunPoster, tweetUrl } from './x-poster.js';
export type { SocialPoster } from './x-poster.js';
export { buildSlangPrompt, buildPhrasePrompt } from './prompts.js';
export type { PostPromptOptions } from './prompts.js';
export { isPostItem } from './types.js';
export type { PostItem, PostResult, PostRunResult } from './types.js';
