/**
 * History Command
 *
 * Lists what has already been generated or posted, oldest first.
 */

import { ConfigError, HistoryStore, resolveWorkPath } from '@lingo-shorts/core';
import type { AppConfig } from '@lingo-shorts/core';
import { isScriptItem } from '@lingo-shorts/video';
import { isPostItem } from '@lingo-shorts/social';
import { commonOverrides, loadAppConfig } from './app-config.js';

export type HistoryKind = 'video' | 'post';

export interface HistoryOptions {
  limit?: number;
  workDir?: string;
}

function isHistoryKind(value: string): value is HistoryKind {
  return value === 'video' || value === 'post';
}

/** First line of a longer text, shortened for a one-line listing. */
function firstLine(text: string, max = 60): string {
  const line = text.split(/\r?\n/, 1)[0].trim();
  return line.length > max ? `${line.slice(0, max - 1)}…` : line;
}

export function historyLines(config: AppConfig, kind: HistoryKind, limit?: number): string[] {
  let lines: string[];
  if (kind === 'video') {
    const store = new HistoryStore({ filePath: resolveWorkPath(config, config.paths.scriptsFile), isItem: isScriptItem });
    lines = store.load().map(item => firstLine(item.english_script));
  } else {
    const store = new HistoryStore({ filePath: resolveWorkPath(config, config.paths.postHistoryFile), isItem: isPostItem });
    lines = store.load().map(item => {
      const key = item.slang ?? `(no key) ${firstLine(item.post_text, 40)}`;
      return item.posted_at ? `${item.posted_at}  ${key}` : key;
    });
  }
  return limit !== undefined && limit > 0 ? lines.slice(-limit) : lines;
}

export async function showHistory(kind: string, options: HistoryOptions): Promise<void> {
  if (!isHistoryKind(kind)) {
    throw new ConfigError(`Unknown history "${kind}". Use video or post.`);
  }
  const config = loadAppConfig(commonOverrides({ workDir: options.workDir }));
  const lines = historyLines(config, kind, options.limit);

  console.log(`\n📚 ${kind === 'video' ? 'Scripts' : 'Posts'} (${lines.length})\n`);
  if (lines.length === 0) {
    console.log('   Nothing recorded yet');
  }
  lines.forEach((line, index) => console.log(`   ${String(index + 1).padStart(3)}. ${line}`));
  console.log('');
}
