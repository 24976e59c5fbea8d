/**
 * History Store
 *
 * Append-only list of previously generated items, persisted as a pretty-printed
 * JSON array. Loaded in full before every generation request so the prompt can
 * list what to avoid.
 *
 * A file that is not valid JSON, or whose top level is not an array, is moved
 * aside to `<file>.corrupt-<timestamp>` and the history restarts empty. If it
 * cannot be moved, `load` throws rather than let a later save overwrite it.
 * Entries of an unexpected shape are skipped when reading and kept in the file.
 * Single process, single writer: there is no locking.
 */

import * as fs from 'fs';
import * as path from 'path';
import { logger, errorMessage } from './logger.js';

export type ItemGuard<T> = (value: unknown) => value is T;

export interface HistoryStoreOptions<T> {
  filePath: string;
  isItem: ItemGuard<T>;
  /** Label used in log lines. */
  name?: string;
}

export class HistoryStore<T> {
  readonly filePath: string;
  private readonly isItem: ItemGuard<T>;
  private readonly name: string;

  constructor(options: HistoryStoreOptions<T>) {
    this.filePath = path.resolve(options.filePath);
    this.isItem = options.isItem;
    this.name = options.name ?? path.basename(options.filePath);
  }

  /**
   * True when nothing has ever been recorded: the file is absent or zero bytes.
   */
  isFirstRun(): boolean {
    if (!fs.existsSync(this.filePath)) return true;
    return fs.statSync(this.filePath).size === 0;
  }

  load(): T[] {
    const items: T[] = [];
    let skipped = 0;
    for (const value of this.readEntries()) {
      if (this.isItem(value)) {
        items.push(value);
      } else {
        skipped++;
      }
    }

    if (skipped > 0) {
      logger.warn(`[History] Skipped ${skipped} entr${skipped === 1 ? 'y' : 'ies'} of an unexpected shape in ${this.name}`);
    }
    logger.debug(`[History] Loaded ${items.length} items from ${this.name}`);
    return items;
  }

  /**
   * Overwrite the file with `items`. Written to a sibling temp file first and
   * renamed into place.
   */
  save(items: readonly T[]): void {
    this.write(items);
    logger.debug(`[History] Saved ${items.length} items to ${this.name}`);
  }

  /**
   * Add `newItems` after everything already in the file, skipped entries
   * included. Returns the readable items.
   */
  append(newItems: readonly T[]): T[] {
    const entries = this.readEntries();
    this.write([...entries, ...newItems]);
    const all = [...entries.filter(this.isItem), ...newItems];
    logger.info(`[History] Recorded ${newItems.length} new item(s) in ${this.name} (${all.length} total)`);
    return all;
  }

  /**
   * Non-null keys of the recorded items, oldest first.
   */
  keys(keyOf: (item: T) => string | null | undefined): string[] {
    const keys: string[] = [];
    for (const item of this.load()) {
      const key = keyOf(item);
      if (key) keys.push(key);
    }
    return keys;
  }

  /**
   * Raw array entries of the file; [] on a first run or after a corrupt file
   * was moved aside.
   */
  private readEntries(): unknown[] {
    if (this.isFirstRun()) return [];

    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(this.filePath, 'utf-8'));
    } catch (error) {
      this.recoverCorrupted(`invalid JSON (${errorMessage(error)})`);
      return [];
    }

    if (!Array.isArray(parsed)) {
      this.recoverCorrupted('top-level value is not an array');
      return [];
    }
    return parsed;
  }

  private write(entries: readonly unknown[]): void {
    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    const tempPath = `${this.filePath}.${process.pid}.tmp`;
    fs.writeFileSync(tempPath, `${JSON.stringify(entries, null, 2)}\n`, 'utf-8');
    fs.renameSync(tempPath, this.filePath);
  }

  private recoverCorrupted(reason: string): void {
    const stamp = new Date().toISOString().replace(/[:.]/g, '-');
    const backupPath = `${this.filePath}.corrupt-${stamp}`;
    try {
      fs.renameSync(this.filePath, backupPath);
    } catch (error) {
      throw new Error(
        `${this.name} is unreadable (${reason}) and could not be moved to ${path.basename(backupPath)}: ${errorMessage(error)}`,
      );
    }
    logger.warn(`[History] ${this.name} is unreadable (${reason}); moved to ${path.basename(backupPath)} and starting empty`);
  }
}
