/**
 * Terminal access over process stdin/stdout.
 *
 * Input is read in raw mode throughout: unbuffered, no echo, one byte at a
 * time. Line prompts echo locally, so Ctrl-C at a prompt arrives as a
 * byte and cancels the read instead of raising SIGINT.
 *
 * restore() leaves the alternate screen, shows the cursor and turns raw
 * mode off. It runs on every exit path, signals included.
 */

import { CTRL_C, type ByteSource } from './input';

const ALTERNATE_SCREEN_ON = '\x1b[?1049h';
const ALTERNATE_SCREEN_OFF = '\x1b[?1049l';
const CURSOR_SHOW = '\x1b[?25h';
const CURSOR_HIDE = '\x1b[?25l';

const DEFAULT_COLUMNS = 80;
const DEFAULT_ROWS = 24;

export interface ReadLineOptions {
  echo: boolean;
}

export interface Terminal extends ByteSource {
  readonly rows: number;
  readonly columns: number;
  write(text: string): void;
  /**
   * Read one line of input. Resolves null when the read is cancelled
   * with Ctrl-C.
   */
  readLine(prompt: string, options: ReadLineOptions): Promise<string | null>;
  enterRawMode(): void;
  setTitle(title: string): void;
  restore(): void;
}

export class TerminalClosedError extends Error {
  constructor() {
    super('Terminal input closed');
    this.name = 'TerminalClosedError';
  }
}

/**
 * The parts of a TTY read stream the terminal uses.
 */
export interface TerminalInput {
  readonly isTTY?: boolean;
  setRawMode?(mode: boolean): unknown;
  on(event: 'data', listener: (chunk: Buffer | string) => void): unknown;
  on(event: 'end', listener: () => void): unknown;
  resume(): unknown;
  pause(): unknown;
}

export interface TerminalOutput {
  readonly rows?: number;
  readonly columns?: number;
  write(chunk: string | Uint8Array): unknown;
}

const BACKSPACE = 0x7f;
const CTRL_H = 0x08;

function isContinuationByte(byte: number): boolean {
  return (byte & 0xc0) === 0x80;
}

type Waiter = {
  resolve: (byte: number) => void;
  reject: (error: Error) => void;
};

export class NodeTerminal implements Terminal {
  private readonly queue: number[] = [];
  private readonly waiters: Waiter[] = [];
  private closed = false;
  private listening = false;
  private alternateScreen = false;

  constructor(
    private readonly input: TerminalInput = process.stdin,
    private readonly output: TerminalOutput = process.stdout,
  ) {}

  get rows(): number {
    const rows = this.output.rows;
    return rows && Number.isFinite(rows) ? rows : DEFAULT_ROWS;
  }

  get columns(): number {
    const columns = this.output.columns;
    return columns && Number.isFinite(columns) ? columns : DEFAULT_COLUMNS;
  }

  start(): void {
    if (!this.listening) {
      this.listening = true;
      this.listen();
    }
    this.input.resume();
    this.output.write(ALTERNATE_SCREEN_ON);
    this.alternateScreen = true;
  }

  private listen(): void {
    this.input.on('data', (chunk: Buffer | string) => {
      const bytes = typeof chunk === 'string' ? Buffer.from(chunk) : chunk;
      for (const byte of bytes) {
        const waiter = this.waiters.shift();
        if (waiter) {
          waiter.resolve(byte);
        } else {
          this.queue.push(byte);
        }
      }
    });
    this.input.on('end', () => {
      this.closed = true;
      for (const waiter of this.waiters.splice(0)) {
        waiter.reject(new TerminalClosedError());
      }
    });
  }

  write(text: string): void {
    this.output.write(text);
  }

  readByte(): Promise<number> {
    const byte = this.queue.shift();
    if (byte !== undefined) return Promise.resolve(byte);
    if (this.closed) return Promise.reject(new TerminalClosedError());

    return new Promise<number>((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  async readLine(prompt: string, options: ReadLineOptions): Promise<string | null> {
    this.setRawMode(true);
    this.output.write(CURSOR_SHOW + prompt);

    const bytes: number[] = [];
    for (;;) {
      const byte = await this.readByte();
      if (byte === 0x0a || byte === 0x0d) break;
      if (byte === CTRL_C) {
        this.output.write('\r\n');
        return null;
      }
      if (byte === BACKSPACE || byte === CTRL_H) {
        if (bytes.length === 0) continue;
        // Drop a whole UTF-8 character
        let last = bytes.pop();
        while (last !== undefined && isContinuationByte(last) && bytes.length > 0) {
          last = bytes.pop();
        }
        if (options.echo) this.output.write('\b \b');
        continue;
      }
      bytes.push(byte);
      if (options.echo) this.output.write(Uint8Array.of(byte));
    }

    this.output.write('\r\n');
    return Buffer.from(bytes).toString('utf8');
  }

  enterRawMode(): void {
    this.setRawMode(true);
    this.output.write(CURSOR_HIDE);
  }

  setTitle(title: string): void {
    this.output.write(`\x1b]0;${title}\x07`);
  }

  restore(): void {
    this.setRawMode(false);
    if (this.alternateScreen) {
      this.output.write(CURSOR_SHOW + ALTERNATE_SCREEN_OFF);
      this.alternateScreen = false;
    }
    this.input.pause();
  }

  private setRawMode(raw: boolean): void {
    if (this.input.isTTY && this.input.setRawMode) {
      this.input.setRawMode(raw);
    }
  }
}

/**
 * Restore the terminal before the process goes away, whichever way it
 * goes.
 */
export function installSignalHandlers(terminal: Terminal): void {
  const signals: Array<[NodeJS.Signals, number]> = [
    ['SIGINT', 130],
    ['SIGTERM', 143],
    ['SIGHUP', 129],
  ];

  for (const [signal, code] of signals) {
    process.once(signal, () => {
      terminal.restore();
      process.exit(code);
    });
  }
  process.once('exit', () => terminal.restore());
}
