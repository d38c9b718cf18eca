import { describe, it, expect } from 'vitest';
import { readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { BookmarkStore, parseBookmarkLine } from '../src/browser/bookmarks';
import { tempDir } from './helpers';

describe('BookmarkStore', () => {
  it('opens a missing file as an empty store', async () => {
    const store = await BookmarkStore.open(join(await tempDir(), 'bookmarks'));
    expect(store.list()).toEqual([]);
  });

  it('appends one "<url> <description>" line per bookmark', async () => {
    const file = join(await tempDir(), 'bookmarks');
    const store = await BookmarkStore.open(file);

    await store.add('gemini://a.example/', 'Alpha site');
    await store.add('gemini://a.example/', 'Alpha again');

    expect(await readFile(file, 'utf8')).toBe(
      'gemini://a.example/ Alpha site\ngemini://a.example/ Alpha again\n',
    );
  });

  it('reads back what it wrote', async () => {
    const file = join(await tempDir(), 'bookmarks');
    await writeFile(file, 'gemini://a.example/ Alpha site\r\n\ngemini://b.example/\n');

    const store = await BookmarkStore.open(file);

    expect(store.list()).toEqual([
      { url: 'gemini://a.example/', description: 'Alpha site' },
      { url: 'gemini://b.example/', description: '' },
    ]);
  });

  it('deletes by URL prefix ignoring case', async () => {
    const file = join(await tempDir(), 'bookmarks');
    const store = await BookmarkStore.open(file);
    await store.add('gemini://x.example/page', 'Page');
    await store.add('gemini://x.example/page/sub');
    await store.add('gemini://y.example/', 'Other');

    const removed = await store.removeByPrefix('GEMINI://X.EXAMPLE/page');

    expect(removed).toBe(2);
    expect(store.list()).toEqual([{ url: 'gemini://y.example/', description: 'Other' }]);
    expect(await readFile(file, 'utf8')).toBe('gemini://y.example/ Other\n');
  });

  it('parses a line without a description', () => {
    expect(parseBookmarkLine('gemini://a.example/')).toEqual({ url: 'gemini://a.example/', description: '' });
  });
});
