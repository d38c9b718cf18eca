/**
 * Pager
 *
 * Shows a rendered page one screen at a time. The bottom row is the status
 * line; the rows above it show lines [topLine, topLine + rows - 1).
 * Arrow keys scroll by one line and stop at either end without redrawing.
 * Any bound command ends the pager and is handed back to the navigator.
 */

import type { Command } from './config';
import type { Charset } from './gemini';
import type { Link } from './gemtext';
import { commandFor, readEvent, scrollDirection, type KeyTable, type ScrollDirection } from './input';
import type { Terminal } from './terminal';

export interface Page {
  title: string;
  lines: string[];
  links: Link[];
  contentType: string;
  charset: Charset;
}

export function emptyPage(title = ''): Page {
  return { title, lines: [], links: [], contentType: 'text/gemini', charset: 'utf8' };
}

export class Pager {
  private top = 0;

  constructor(
    private readonly lines: readonly string[],
    private readonly rows: number,
  ) {}

  get topLine(): number {
    return this.top;
  }

  /** Rows available for content (the last row is the status line). */
  get height(): number {
    return Math.max(1, this.rows - 1);
  }

  get lastTopLine(): number {
    return Math.max(0, this.lines.length - this.height);
  }

  /**
   * Move one line. Returns false, leaving the position as it was, at
   * either end.
   */
  scroll(direction: ScrollDirection): boolean {
    if (direction === 'up') {
      if (this.top === 0) return false;
      this.top--;
      return true;
    }

    if (this.top >= this.lastTopLine) return false;
    this.top++;
    return true;
  }

  visibleLines(): string[] {
    return this.lines.slice(this.top, this.top + this.height);
  }

  /** 1-based range of lines on screen, and the total. */
  position(): { first: number; last: number; total: number } {
    const total = this.lines.length;
    if (total === 0) return { first: 0, last: 0, total };
    return {
      first: this.top + 1,
      last: Math.min(total, this.top + this.height),
      total,
    };
  }
}

export function statusLine(page: Page, pager: Pager, columns: number): string {
  const { first, last, total } = pager.position();
  const text = ` ${page.title}  ${page.contentType}; ${page.charset}  ${first}-${last}/${total} `;
  return text.length > columns ? text.slice(0, columns) : text.padEnd(columns);
}

/**
 * Full-screen redraw: clear, content rows, status line in reverse video.
 */
export function formatScreen(pager: Pager, status: string, rows: number): string {
  return [
    '\x1b[H\x1b[2J',
    pager.visibleLines().join('\r\n'),
    `\x1b[${rows};1H\x1b[7m${status}\x1b[0m`,
  ].join('');
}

export async function runPager(page: Page, terminal: Terminal, keys: KeyTable): Promise<Command> {
  const rows = terminal.rows;
  const pager = new Pager(page.lines, rows);
  const draw = (): void => {
    terminal.write(formatScreen(pager, statusLine(page, pager, terminal.columns), rows));
  };

  draw();
  for (;;) {
    const event = await readEvent(terminal);

    const direction = scrollDirection(event);
    if (direction) {
      if (pager.scroll(direction)) draw();
      continue;
    }

    const command = commandFor(event, keys);
    if (command) return command;
  }
}
