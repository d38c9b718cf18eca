/**
 * Configuration
 *
 * Read once at startup from `<config dir>/config` and never mutated. The
 * file is plain `key = value` lines with `#` comments:
 *
 *   margin = 4
 *   homepage = gemini://geminiprotocol.net/
 *   timeout = 10000
 *   key.quit = q
 *   style.header1 = 1;35
 *
 * Style values are SGR parameters; the renderer wraps them in ESC [ ... m.
 * A missing file is written out with the defaults on first run.
 */

import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { homedir } from 'node:os';
import { dirname, join } from 'node:path';
import { isMissingFile } from './files';

export const COMMANDS = [
  'quit',
  'open',
  'goto-link',
  'refresh',
  'back',
  'home',
  'go-up',
  'set-bookmark',
  'goto-bookmark',
  'delete-bookmark',
] as const;

export type Command = (typeof COMMANDS)[number];

export const STYLE_CATEGORIES = [
  'header1',
  'header2',
  'header3',
  'quote',
  'link-bullet',
  'link-text',
  'list-bullet',
  'list-text',
] as const;

export type StyleCategory = (typeof STYLE_CATEGORIES)[number];

export type StyleSet = Record<StyleCategory, string>;
export type KeyBindings = Record<Command, string>;

export interface Config {
  margin: number;
  homepage: string;
  /** Network timeout in milliseconds. */
  timeout: number;
  keys: KeyBindings;
  styles: StyleSet;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export const DEFAULT_CONFIG: Config = {
  margin: 4,
  homepage: 'gemini://geminiprotocol.net/',
  timeout: 10000,
  keys: {
    quit: 'q',
    open: 'o',
    'goto-link': 'l',
    refresh: 'r',
    back: 'b',
    home: 'h',
    'go-up': 'u',
    'set-bookmark': 'a',
    'goto-bookmark': 'm',
    'delete-bookmark': 'd',
  },
  styles: {
    header1: '1;35',
    header2: '1;36',
    header3: '1;34',
    quote: '3;37',
    'link-bullet': '1;33',
    'link-text': '4;36',
    'list-bullet': '1;32',
    'list-text': '',
  },
};

export interface ConfigPaths {
  directory: string;
  configFile: string;
  bookmarksFile: string;
  certificatesDirectory: string;
}

export function configPaths(env: NodeJS.ProcessEnv = process.env): ConfigPaths {
  const base = env.XDG_CONFIG_HOME || join(homedir(), '.config');
  const directory = join(base, 'gemterm');
  return {
    directory,
    configFile: join(directory, 'config'),
    bookmarksFile: join(directory, 'bookmarks'),
    certificatesDirectory: join(directory, 'certs'),
  };
}

const COMMAND_NAMES: readonly string[] = COMMANDS;
const STYLE_NAMES: readonly string[] = STYLE_CATEGORIES;

function isCommand(name: string): name is Command {
  return COMMAND_NAMES.includes(name);
}

function isStyleCategory(name: string): name is StyleCategory {
  return STYLE_NAMES.includes(name);
}

function parseInteger(key: string, value: string, lineNumber: number): number {
  if (!/^\d+$/.test(value)) {
    throw new ConfigError(`line ${lineNumber}: ${key} must be a non-negative integer, got "${value}"`);
  }
  return parseInt(value, 10);
}

/**
 * Parse config text over the defaults. Unknown keys are ignored; lines
 * without "=" and non-integer numbers are errors.
 */
export function parseConfig(text: string, defaults: Config = DEFAULT_CONFIG): Config {
  const config: Config = {
    ...defaults,
    keys: { ...defaults.keys },
    styles: { ...defaults.styles },
  };

  const lines = text.split('\n');
  lines.forEach((rawLine, index) => {
    const lineNumber = index + 1;
    const line = rawLine.trim();
    if (line.length === 0 || line.startsWith('#')) return;

    const equals = line.indexOf('=');
    if (equals === -1) {
      throw new ConfigError(`line ${lineNumber}: expected "key = value", got "${line}"`);
    }

    const key = line.substring(0, equals).trim();
    const value = line.substring(equals + 1).trim();

    if (key === 'margin') {
      config.margin = parseInteger(key, value, lineNumber);
    } else if (key === 'timeout') {
      config.timeout = parseInteger(key, value, lineNumber);
    } else if (key === 'homepage') {
      config.homepage = value;
    } else if (key.startsWith('key.')) {
      const command = key.substring(4);
      if (isCommand(command)) {
        if (value.length !== 1) {
          throw new ConfigError(`line ${lineNumber}: ${key} must be a single character`);
        }
        config.keys[command] = value;
      }
    } else if (key.startsWith('style.')) {
      const category = key.substring(6);
      if (isStyleCategory(category)) {
        config.styles[category] = value;
      }
    }
  });

  return config;
}

export function formatConfig(config: Config): string {
  const lines = [
    '# gemterm configuration',
    '',
    `margin = ${config.margin}`,
    `homepage = ${config.homepage}`,
    `timeout = ${config.timeout}`,
    '',
    '# Keybindings (one character each)',
    ...COMMANDS.map((command) => `key.${command} = ${config.keys[command]}`),
    '',
    '# Styles (SGR parameters, e.g. 1;35 for bold magenta)',
    ...STYLE_CATEGORIES.map((category) => `style.${category} = ${config.styles[category]}`),
  ];
  return `${lines.join('\n')}\n`;
}

/**
 * Read the config file, writing the defaults first if it does not exist.
 */
export async function loadConfig(file: string): Promise<Config> {
  try {
    return parseConfig(await readFile(file, 'utf8'));
  } catch (error) {
    if (!isMissingFile(error)) throw error;
  }

  await mkdir(dirname(file), { recursive: true });
  await writeFile(file, formatConfig(DEFAULT_CONFIG), 'utf8');
  return parseConfig(formatConfig(DEFAULT_CONFIG));
}
