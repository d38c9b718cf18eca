/**
 * Navigation history.
 *
 * Every navigation attempt is pushed before its outcome is known, so the
 * entry on top is always the one most recently requested. Going back pops
 * two entries and re-requests the second; that request pushes it again.
 */

import type { GeminiUrl } from './url';

export interface HistoryEntry {
  readonly scheme: string;
  readonly host: string;
  readonly port: number;
  readonly path: string;
}

export function toHistoryEntry(url: GeminiUrl): HistoryEntry {
  return { scheme: url.scheme, host: url.host, port: url.port, path: url.path };
}

export class HistoryStack {
  private readonly entries: HistoryEntry[] = [];

  push(entry: HistoryEntry): void {
    this.entries.push(entry);
  }

  pop(): HistoryEntry | undefined {
    return this.entries.pop();
  }

  peek(): HistoryEntry | undefined {
    return this.entries[this.entries.length - 1];
  }

  get size(): number {
    return this.entries.length;
  }

  toArray(): readonly HistoryEntry[] {
    return [...this.entries];
  }

  /**
   * Pop the attempted entry and the one beneath it; the second is the
   * target to re-request. With a single entry that entry is returned.
   */
  back(): HistoryEntry | undefined {
    const top = this.pop();
    const previous = this.pop();
    return previous ?? top;
  }
}
