/**
 * Terminal input events.
 *
 * Raw bytes are decoded once into events, then dispatched through a key
 * table built from the configured bindings. An escape byte is always
 * followed by two more bytes (ESC [ A, ESC O B, ...).
 */

import { COMMANDS, type Command, type KeyBindings } from './config';

export const ESC = 0x1b;
export const CTRL_C = 0x03;

export type InputEvent =
  | { type: 'key'; byte: number }
  | { type: 'escape'; bytes: [number, number] };

export type ScrollDirection = 'up' | 'down';

export interface ByteSource {
  readByte(): Promise<number>;
}

export async function readEvent(source: ByteSource): Promise<InputEvent> {
  const byte = await source.readByte();
  if (byte !== ESC) {
    return { type: 'key', byte };
  }

  const first = await source.readByte();
  const second = await source.readByte();
  return { type: 'escape', bytes: [first, second] };
}

/**
 * Arrow keys in normal (ESC [) and application (ESC O) cursor mode.
 */
export function scrollDirection(event: InputEvent): ScrollDirection | null {
  if (event.type !== 'escape') return null;

  const [introducer, final] = event.bytes;
  if (introducer !== 0x5b && introducer !== 0x4f) return null; // '[' or 'O'
  if (final === 0x41) return 'up'; // 'A'
  if (final === 0x42) return 'down'; // 'B'
  return null;
}

export type KeyTable = ReadonlyMap<string, Command>;

/**
 * Build the character -> command lookup. When two commands share a key the
 * first in command order wins.
 */
export function buildKeyTable(bindings: KeyBindings): KeyTable {
  const table = new Map<string, Command>();
  for (const command of COMMANDS) {
    const key = bindings[command];
    if (key && !table.has(key)) {
      table.set(key, command);
    }
  }
  return table;
}

export function commandFor(event: InputEvent, table: KeyTable): Command | null {
  if (event.type !== 'key') return null;
  if (event.byte === CTRL_C) return 'quit';
  return table.get(String.fromCharCode(event.byte)) ?? null;
}
