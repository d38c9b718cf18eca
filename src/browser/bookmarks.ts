/**
 * Bookmark store, persisted as plain text: one "<url> <description>" per
 * line. Duplicates are kept; deletion is by URL prefix, ignoring case.
 */

import { readFile, writeFile } from 'node:fs/promises';
import { isMissingFile } from './files';

export interface Bookmark {
  url: string;
  description: string;
}

export function parseBookmarkLine(line: string): Bookmark {
  const space = line.indexOf(' ');
  if (space === -1) {
    return { url: line, description: '' };
  }
  return {
    url: line.substring(0, space),
    description: line.substring(space + 1),
  };
}

export function formatBookmarkLine(bookmark: Bookmark): string {
  return `${bookmark.url} ${bookmark.description}`;
}

export class BookmarkStore {
  private bookmarks: Bookmark[];

  private constructor(private readonly file: string, bookmarks: Bookmark[]) {
    this.bookmarks = bookmarks;
  }

  /**
   * Load the store; a missing file is an empty store.
   */
  static async open(file: string): Promise<BookmarkStore> {
    let content = '';
    try {
      content = await readFile(file, 'utf8');
    } catch (error) {
      if (!isMissingFile(error)) throw error;
    }

    const bookmarks = content
      .split('\n')
      .map((line) => line.replace(/\r$/, ''))
      .filter((line) => line.trim().length > 0)
      .map(parseBookmarkLine);

    return new BookmarkStore(file, bookmarks);
  }

  list(): readonly Bookmark[] {
    return this.bookmarks;
  }

  async add(url: string, description = ''): Promise<void> {
    this.bookmarks.push({ url, description: description.trim() });
    await this.save();
  }

  /**
   * Remove every bookmark whose line starts with `url`, case-insensitively.
   * Returns how many were removed.
   */
  async removeByPrefix(url: string): Promise<number> {
    const prefix = url.toLowerCase();
    const kept = this.bookmarks.filter(
      (bookmark) => !formatBookmarkLine(bookmark).toLowerCase().startsWith(prefix),
    );
    const removed = this.bookmarks.length - kept.length;
    this.bookmarks = kept;
    await this.save();
    return removed;
  }

  private async save(): Promise<void> {
    const lines = this.bookmarks.map(formatBookmarkLine);
    await writeFile(this.file, lines.length > 0 ? `${lines.join('\n')}\n` : '', 'utf8');
  }
}
