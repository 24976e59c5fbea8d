/**
 * Social Post Types
 */

/** One recorded post; `slang` is its history key. */
export interface PostItem {
  /** The expression the post introduces, or null when it could not be extracted. */
  slang: string | null;
  post_text: string;
  /** ISO timestamp, set when the post is recorded. */
  posted_at?: string;
}

export function isPostItem(value: unknown): value is PostItem {
  if (typeof value !== 'object' || value === null) return false;
  if (!('slang' in value) || !('post_text' in value)) return false;
  if (value.slang !== null && typeof value.slang !== 'string') return false;
  if (typeof value.post_text !== 'string') return false;
  return !('posted_at' in value) || value.posted_at === undefined || typeof value.posted_at === 'string';
}

export interface PostResult {
  success: boolean;
  id?: string;
  url?: string;
  error?: string;
}

export type PostRunResult =
  | { posted: true; id: string; url?: string; item: PostItem; dryRun: boolean }
  | { posted: false; reason: 'generation' | 'post'; error?: string };
