/**
 * Navigator
 *
 * The browsing loop as a state machine:
 *
 *   Resolving ──> Fetching ──> Rendering ──> Paging ──> (command)
 *                   │  ^                                   │
 *                   │  └── redirect / back / refresh <─────┤
 *                   └──> InputPrompt ──> Fetching          └──> Done
 *
 * All browsing state lives in the Session; nothing is process-wide.
 */

import { readFile } from 'node:fs/promises';
import type { BookmarkStore } from './bookmarks';
import { certificateInstructions, type CertificateRegistry } from './certificates';
import type { Command, Config } from './config';
import {
  encodeQuery,
  type CertRequiredOutcome,
  type Charset,
  type FailureOutcome,
  type FetchOutcome,
} from './gemini';
import { renderGemtext, renderPlain } from './gemtext';
import type { HistoryStack } from './history';
import { buildKeyTable, type KeyTable } from './input';
import { emptyPage, runPager, type Page } from './pager';
import { TerminalClosedError, type Terminal } from './terminal';
import {
  contextOf,
  formatUrl,
  parentPath,
  resolve,
  ResolutionError,
  withDefaultScheme,
  withoutQuery,
  withQuery,
  type BrowsingContext,
  type GeminiUrl,
} from './url';

export const MAX_REDIRECTS = 5;

export interface Fetcher {
  fetch(url: GeminiUrl): Promise<FetchOutcome>;
}

export interface Session {
  readonly config: Config;
  readonly keys: KeyTable;
  readonly history: HistoryStack;
  readonly bookmarks: BookmarkStore;
  readonly certificates: CertificateRegistry;
  readonly client: Fetcher;
  /** URL of the page on screen; unset for a local file or before the first page. */
  url?: GeminiUrl;
  context?: BrowsingContext;
  page?: Page;
  redirects: number;
}

export interface SessionOptions {
  config: Config;
  history: HistoryStack;
  bookmarks: BookmarkStore;
  certificates: CertificateRegistry;
  client: Fetcher;
}

export function createSession(options: SessionOptions): Session {
  return {
    ...options,
    keys: buildKeyTable(options.config.keys),
    redirects: 0,
  };
}

export type NavigatorState =
  | { state: 'resolving'; raw: string }
  | { state: 'fetching'; url: GeminiUrl }
  | { state: 'input-prompt'; url: GeminiUrl; prompt: string; sensitive: boolean }
  | {
      state: 'rendering';
      url?: GeminiUrl;
      title: string;
      body: string;
      contentType: string;
      charset: Charset;
      gemtext: boolean;
    }
  | { state: 'paging' }
  | { state: 'done'; exitCode: number };

/**
 * Start state for a local file: straight to the renderer, no network.
 */
export async function localFileState(path: string): Promise<NavigatorState> {
  return {
    state: 'rendering',
    title: path,
    body: await readFile(path, 'utf8'),
    contentType: 'text/gemini',
    charset: 'utf8',
    gemtext: true,
  };
}

const FAILURE_TITLES: Record<FailureOutcome['failure'], string> = {
  'unsupported-scheme': 'Unsupported scheme',
  resolution: 'Cannot resolve URL',
  connect: 'Connection failed',
  'bad-response': 'Invalid response',
  temporary: 'Temporary failure',
  permanent: 'Permanent failure',
  'not-found': 'Not found',
  gone: 'Gone',
  'proxy-refused': 'Proxy request refused',
  'bad-request': 'Bad request',
};

export class Navigator {
  constructor(
    private readonly session: Session,
    private readonly terminal: Terminal,
  ) {}

  async run(initial: NavigatorState): Promise<number> {
    let state = initial;
    try {
      while (state.state !== 'done') {
        state = await this.step(state);
      }
      return state.exitCode;
    } catch (error) {
      if (error instanceof TerminalClosedError) return 0;
      throw error;
    }
  }

  step(state: NavigatorState): Promise<NavigatorState> {
    switch (state.state) {
      case 'resolving': return this.resolving(state.raw);
      case 'fetching': return this.fetching(state.url);
      case 'input-prompt': return this.inputPrompt(state.url, state.prompt, state.sensitive);
      case 'rendering': return Promise.resolve(this.rendering(state));
      case 'paging': return this.paging();
      case 'done': return Promise.resolve(state);
    }
  }

  private async resolving(raw: string): Promise<NavigatorState> {
    try {
      return { state: 'fetching', url: resolve(raw, this.session.context) };
    } catch (error) {
      if (!(error instanceof ResolutionError)) throw error;
      await this.report(FAILURE_TITLES.resolution, [error.message]);
      return { state: 'paging' };
    }
  }

  private async fetching(url: GeminiUrl): Promise<NavigatorState> {
    const outcome = await this.session.client.fetch(url);
    if (outcome.kind !== 'redirect') {
      this.session.redirects = 0;
    }

    switch (outcome.kind) {
      case 'rendered':
        return {
          state: 'rendering',
          url,
          title: formatUrl(url),
          body: outcome.body.toString('utf8'),
          contentType: outcome.contentType,
          charset: outcome.charset,
          gemtext: outcome.gemtext,
        };

      case 'input':
        return { state: 'input-prompt', url, prompt: outcome.prompt, sensitive: outcome.sensitive };

      case 'redirect':
        this.session.redirects++;
        if (this.session.redirects > MAX_REDIRECTS) {
          this.session.redirects = 0;
          return this.recover({ kind: 'failure', failure: 'bad-response', detail: 'Too many redirects' });
        }
        // The target takes the place of the redirecting entry.
        this.session.history.pop();
        return { state: 'fetching', url: outcome.url };

      case 'failure':
        return this.recover(outcome);

      case 'cert-required':
        return this.certificateRequired(outcome, url);
    }
  }

  private async inputPrompt(url: GeminiUrl, prompt: string, sensitive: boolean): Promise<NavigatorState> {
    this.terminal.write('\x1b[H\x1b[2J');
    const answer = await this.terminal.readLine(`${prompt || 'Input'}: `, { echo: !sensitive });
    if (answer === null) {
      return this.redisplay();
    }
    this.session.history.pop();
    return { state: 'fetching', url: withQuery(withoutQuery(url), encodeQuery(answer)) };
  }

  private rendering(state: Extract<NavigatorState, { state: 'rendering' }>): NavigatorState {
    const { margin, styles } = this.session.config;
    const document = state.gemtext
      ? renderGemtext(state.body, { columns: this.terminal.columns, margin, styles })
      : renderPlain(state.body, margin);

    this.session.page = {
      title: state.title,
      lines: document.lines,
      links: document.links,
      contentType: state.contentType,
      charset: state.charset,
    };
    this.session.url = state.url;
    this.session.context = state.url ? contextOf(state.url) : undefined;
    this.terminal.setTitle(state.title);

    return { state: 'paging' };
  }

  private async paging(): Promise<NavigatorState> {
    this.terminal.enterRawMode();
    const page = this.session.page ?? emptyPage();
    const command = await runPager(page, this.terminal, this.session.keys);
    return this.dispatch(command, page);
  }

  /**
   * Execute one pager command. Commands that only touch bookmarks or find
   * nothing to do redisplay the current page.
   */
  async dispatch(command: Command, page: Page): Promise<NavigatorState> {
    const { session, terminal } = this;
    const current = session.url;

    switch (command) {
      case 'quit':
        return { state: 'done', exitCode: 0 };

      case 'open': {
        const input = await terminal.readLine('\r\nGo to URL: ', { echo: true });
        if (!input || !input.trim()) return { state: 'paging' };
        return { state: 'resolving', raw: withDefaultScheme(input) };
      }

      case 'goto-link': {
        const input = await terminal.readLine('\r\nLink number: ', { echo: true });
        const link = input === null ? undefined : pickByNumber(page.links, input);
        if (!link) return { state: 'paging' };
        return { state: 'resolving', raw: link.target };
      }

      case 'refresh':
        if (!current) return { state: 'paging' };
        session.history.pop();
        return { state: 'fetching', url: current };

      case 'back':
        return this.back();

      case 'home':
        return { state: 'resolving', raw: withDefaultScheme(session.config.homepage) };

      case 'go-up':
        if (!current) return { state: 'paging' };
        return { state: 'fetching', url: { ...withoutQuery(current), path: parentPath(current.path) } };

      case 'set-bookmark': {
        if (!current) return { state: 'paging' };
        const description = await terminal.readLine('\r\nDescription (optional): ', { echo: true });
        if (description === null) return { state: 'paging' };
        await session.bookmarks.add(formatUrl(current), description);
        return { state: 'paging' };
      }

      case 'goto-bookmark': {
        const bookmarks = session.bookmarks.list();
        terminal.write('\x1b[H\x1b[2J');
        if (bookmarks.length === 0) {
          await this.acknowledge(['No bookmarks.']);
          return { state: 'paging' };
        }
        bookmarks.forEach((bookmark, i) => {
          const description = bookmark.description ? `  ${bookmark.description}` : '';
          terminal.write(`[${i + 1}] ${bookmark.url}${description}\r\n`);
        });
        const input = await terminal.readLine('\r\nBookmark number: ', { echo: true });
        const bookmark = input === null ? undefined : pickByNumber(bookmarks, input);
        if (!bookmark) return { state: 'paging' };
        return { state: 'resolving', raw: bookmark.url };
      }

      case 'delete-bookmark':
        if (current) {
          await session.bookmarks.removeByPrefix(formatUrl(current));
        }
        return { state: 'paging' };
    }
  }

  /**
   * Pop the attempted entry and the one beneath it, then re-request the
   * second; the fetch pushes it again.
   */
  back(): NavigatorState {
    const entry = this.session.history.back();
    if (!entry) return { state: 'paging' };
    return { state: 'fetching', url: entry };
  }

  /**
   * Drop the failed attempt and show the page that was on screen.
   */
  private redisplay(): NavigatorState {
    this.session.history.pop();
    return { state: 'paging' };
  }

  private async recover(outcome: FailureOutcome): Promise<NavigatorState> {
    const title = outcome.status === undefined
      ? FAILURE_TITLES[outcome.failure]
      : `${FAILURE_TITLES[outcome.failure]} (${outcome.status})`;
    const detail = outcome.failure === 'bad-request' ? `Reason: ${outcome.detail}` : outcome.detail;
    await this.report(title, [detail]);

    switch (outcome.failure) {
      case 'unsupported-scheme':
      case 'permanent':
      case 'not-found':
        return this.back();
      default:
        return this.redisplay();
    }
  }

  private async certificateRequired(outcome: CertRequiredOutcome, url: GeminiUrl): Promise<NavigatorState> {
    const { terminal, session } = this;
    terminal.write('\x1b[H\x1b[2J');
    terminal.write(`Certificate ${outcome.variant} (${outcome.status}): ${outcome.detail}\r\n\r\n`);
    for (const line of certificateInstructions(session.certificates, outcome.host)) {
      terminal.write(`${line}\r\n`);
    }
    terminal.write('\r\n[r] retry  [any other key] go back\r\n');

    terminal.enterRawMode();
    const key = await terminal.readByte();
    if (key === 0x72) { // 'r'
      session.history.pop();
      return { state: 'fetching', url };
    }
    return this.back();
  }

  private async report(title: string, lines: string[]): Promise<void> {
    this.terminal.write('\x1b[H\x1b[2J');
    this.terminal.write(`${title}\r\n`);
    await this.acknowledge(lines);
  }

  private async acknowledge(lines: string[]): Promise<void> {
    for (const line of lines) {
      this.terminal.write(`${line}\r\n`);
    }
    this.terminal.write('\r\nPress any key to continue.');
    this.terminal.enterRawMode();
    await this.terminal.readByte();
  }
}

/**
 * 1-based pick from a list; anything that is not an in-range number gives
 * undefined.
 */
export function pickByNumber<T>(items: readonly T[], input: string): T | undefined {
  const text = input.trim();
  if (!/^\d+$/.test(text)) return undefined;
  const index = parseInt(text, 10);
  if (index < 1 || index > items.length) return undefined;
  return items[index - 1];
}
