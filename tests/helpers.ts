/**
 * In-process stand-ins for the terminal and for Gemini servers.
 */

import { Duplex } from 'node:stream';
import { mkdtemp } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { ConnectOptions, Connector } from '../src/browser/gemini';
import { TerminalClosedError, type ReadLineOptions, type Terminal } from '../src/browser/terminal';

export function tempDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'gemterm-test-'));
}

export interface FakeServer {
  connector: Connector;
  /** Request lines received, CRLF included. */
  requests: string[];
  connections: ConnectOptions[];
}

/**
 * A server that answers each request line (CRLF stripped) with whatever
 * the handler returns, then closes. A handler returning null never answers.
 */
export function fakeServer(handler: (request: string) => string | Buffer | null): FakeServer {
  const requests: string[] = [];
  const connections: ConnectOptions[] = [];

  const connector: Connector = async (options) => {
    connections.push(options);
    return new Duplex({
      read() {},
      write(chunk: Buffer, _encoding, callback) {
        const request = chunk.toString('utf8');
        requests.push(request);
        const response = handler(request.replace(/\r\n$/, ''));
        if (response !== null) {
          this.push(typeof response === 'string' ? Buffer.from(response, 'utf8') : response);
          this.push(null);
        }
        callback();
      },
    });
  };

  return { connector, requests, connections };
}

/**
 * Serve gemtext pages by path (query included) on any host. `responses`
 * gives whole raw responses for other paths; anything else is 51.
 */
export function pageServer(
  pages: Record<string, string>,
  responses: Record<string, string> = {},
): FakeServer {
  return fakeServer((request) => {
    const path = request.replace(/^gemini:\/\/[^/]+\//, '');
    const page = pages[path];
    if (page !== undefined) return `20 text/gemini\r\n${page}`;
    return responses[path] ?? '51 Not found\r\n';
  });
}

export class FakeTerminal implements Terminal {
  rows = 10;
  columns = 40;
  readonly writes: string[] = [];
  readonly prompts: Array<{ prompt: string; echo: boolean }> = [];
  readonly titles: string[] = [];
  rawModeEntries = 0;
  restored = false;

  private readonly bytes: number[];
  private readonly lines: Array<string | null>;

  constructor(keys: string | number[] = [], lines: Array<string | null> = []) {
    this.bytes = typeof keys === 'string' ? [...keys].map((key) => key.charCodeAt(0)) : [...keys];
    this.lines = [...lines];
  }

  write(text: string): void {
    this.writes.push(text);
  }

  readByte(): Promise<number> {
    const byte = this.bytes.shift();
    if (byte === undefined) return Promise.reject(new TerminalClosedError());
    return Promise.resolve(byte);
  }

  readLine(prompt: string, options: ReadLineOptions): Promise<string | null> {
    this.prompts.push({ prompt, echo: options.echo });
    if (this.lines.length === 0) return Promise.reject(new TerminalClosedError());
    const line = this.lines.shift();
    return Promise.resolve(line ?? null);
  }

  enterRawMode(): void {
    this.rawModeEntries++;
  }

  setTitle(title: string): void {
    this.titles.push(title);
  }

  restore(): void {
    this.restored = true;
  }

  get output(): string {
    return this.writes.join('');
  }
}
