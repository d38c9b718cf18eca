import { describe, it, expect } from 'vitest';
import { DEFAULT_CONFIG } from '../src/browser/config';
import { buildKeyTable } from '../src/browser/input';
import { emptyPage, formatScreen, Pager, runPager, statusLine, type Page } from '../src/browser/pager';
import { FakeTerminal } from './helpers';

const lines = Array.from({ length: 10 }, (_, i) => `line ${i}`);
const keys = buildKeyTable(DEFAULT_CONFIG.keys);

function page(content: string[]): Page {
  return { ...emptyPage('gemini://h/'), lines: content };
}

describe('Pager', () => {
  describe('scrolling', () => {
    it('shows the first rows - 1 lines on entry', () => {
      const pager = new Pager(lines, 5);
      expect(pager.topLine).toBe(0);
      expect(pager.visibleLines()).toEqual(['line 0', 'line 1', 'line 2', 'line 3']);
    });

    it('does nothing when scrolling up at the first line', () => {
      const pager = new Pager(lines, 5);
      expect(pager.scroll('up')).toBe(false);
      expect(pager.topLine).toBe(0);
    });

    it('stops when the last line is on screen', () => {
      const pager = new Pager(lines, 5);
      for (let i = 0; i < 6; i++) {
        expect(pager.scroll('down')).toBe(true);
      }
      expect(pager.scroll('down')).toBe(false);
      expect(pager.topLine).toBe(6);
      expect(pager.visibleLines()).toEqual(['line 6', 'line 7', 'line 8', 'line 9']);
    });

    it('does not scroll a page shorter than the screen', () => {
      const pager = new Pager(['only'], 5);
      expect(pager.scroll('down')).toBe(false);
    });

    it('scrolls back up one line at a time', () => {
      const pager = new Pager(lines, 5);
      pager.scroll('down');
      pager.scroll('down');
      expect(pager.scroll('up')).toBe(true);
      expect(pager.topLine).toBe(1);
    });
  });

  describe('status line', () => {
    it('shows title, type, charset and position padded to the width', () => {
      const pager = new Pager(lines, 5);
      expect(statusLine(page(lines), pager, 48)).toBe(' gemini://h/  text/gemini; utf8  1-4/10 '.padEnd(48));
    });

    it('is cut to the width', () => {
      const pager = new Pager(lines, 5);
      expect(statusLine(page(lines), pager, 10)).toBe(' gemini://');
    });

    it('shows an empty range for an empty page', () => {
      expect(new Pager([], 5).position()).toEqual({ first: 0, last: 0, total: 0 });
    });
  });

  it('draws the visible lines and the status row', () => {
    const pager = new Pager(['a', 'b'], 3);
    expect(formatScreen(pager, 'S', 3)).toBe('\x1b[H\x1b[2Ja\r\nb\x1b[3;1H\x1b[7mS\x1b[0m');
  });

  describe('runPager', () => {
    it('returns the command for a bound key', async () => {
      const terminal = new FakeTerminal('zb');
      expect(await runPager(page(lines), terminal, keys)).toBe('back');
    });

    it('redraws after a scroll that moves', async () => {
      const terminal = new FakeTerminal('\x1b[Bq');
      expect(await runPager(page(lines), terminal, keys)).toBe('quit');
      expect(terminal.writes).toHaveLength(2);
    });

    it('does not redraw after a scroll that is clamped', async () => {
      const terminal = new FakeTerminal('\x1b[Aq');
      await runPager(page(lines), terminal, keys);
      expect(terminal.writes).toHaveLength(1);
    });
  });
});
