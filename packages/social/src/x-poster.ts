/**
 * X Poster
 *
 * Publishes text through the X API v2 with OAuth 1.0a user credentials. The
 * app needs Read and Write permission.
 */

import { TwitterApi } from 'twitter-api-v2';
import type { TwitterApiReadWrite } from 'twitter-api-v2';
import { ConfigError, logger, errorMessage } from '@lingo-shorts/core';
import type { XCredentials } from '@lingo-shorts/core';
import type { PostResult } from './types.js';

export interface SocialPoster {
  readonly platform: string;
  /** Check the credentials; resolves to the account name. */
  verify(): Promise<string>;
  post(text: string): Promise<PostResult>;
}

export function tweetUrl(id: string): string {
  return `https://x.com/i/web/status/${id}`;
}

/** API error payload, when the failure came back from X rather than the network. */
function apiErrorDetails(error: unknown): string | null {
  if (typeof error !== 'object' || error === null || !('data' in error)) return null;
  try {
    return JSON.stringify(error.data);
  } catch {
    return null;
  }
}

export class XPoster implements SocialPoster {
  readonly platform = 'x';
  private client: TwitterApiReadWrite;

  constructor(credentials: XCredentials) {
    this.client = new TwitterApi({
      appKey: credentials.appKey,
      appSecret: credentials.appSecret,
      accessToken: credentials.accessToken,
      accessSecret: credentials.accessSecret,
    }).readWrite;
  }

  async verify(): Promise<string> {
    try {
      const me = await this.client.v2.me();
      logger.info(`[X] Authenticated as @${me.data.username}`);
      return me.data.username;
    } catch (error) {
      const details = apiErrorDetails(error);
      if (details) logger.error(`[X] ${details}`);
      throw new ConfigError(
        `X authentication failed: ${errorMessage(error)}. Check the four X_* keys and that the app has Read and Write permission.`,
      );
    }
  }

  async post(text: string): Promise<PostResult> {
    logger.info(`[X] Posting ${text.length} characters`);
    try {
      const { data } = await this.client.v2.tweet(text);
      const url = tweetUrl(data.id);
      logger.info(`[X] ✅ Posted ${data.id}: ${url}`);
      return { success: true, id: data.id, url };
    } catch (error) {
      const details = apiErrorDetails(error);
      logger.error(`[X] Post failed: ${errorMessage(error)}${details ? `\n${details}` : ''}`);
      return { success: false, error: errorMessage(error) };
    }
  }
}

/**
 * Logs instead of posting.
 */
export class DryRunPoster implements SocialPoster {
  readonly platform = 'dry-run';
  readonly posted: string[] = [];

  async verify(): Promise<string> {
    return 'dry-run';
  }

  async post(text: string): Promise<PostResult> {
    this.posted.push(text);
    logger.info(`[DryRun] Would post:\n${text}`);
    return { success: true, id: 'dry-run' };
  }
}
