#!/usr/bin/env node
/**
 * gemterm - a terminal client for the Gemini protocol
 *
 * Usage: gemterm [-f file] [url]
 */

import { parseArgs } from 'node:util';
import { version } from '../package.json';
import { BookmarkStore } from './browser/bookmarks';
import { CertificateRegistry } from './browser/certificates';
import { configPaths, loadConfig } from './browser/config';
import { GeminiClient } from './browser/gemini';
import { HistoryStack } from './browser/history';
import { createSession, localFileState, Navigator, type NavigatorState } from './browser/navigator';
import { installSignalHandlers, NodeTerminal } from './browser/terminal';
import { withDefaultScheme } from './browser/url';

const USAGE = `Usage: gemterm [options] [url]

Browse Gemini space from the terminal. Without a URL the configured
homepage is opened.

Options:
  -f, --file <path>  render a local gemtext file
  -h, --help         show this help
  -v, --version      show the version
`;

async function main(argv: string[]): Promise<number> {
  const { values, positionals } = parseArgs({
    args: argv,
    options: {
      file: { type: 'string', short: 'f' },
      help: { type: 'boolean', short: 'h' },
      version: { type: 'boolean', short: 'v' },
    },
    allowPositionals: true,
  });

  if (values.help) {
    process.stdout.write(USAGE);
    return 0;
  }
  if (values.version) {
    process.stdout.write(`gemterm ${version}\n`);
    return 0;
  }

  const paths = configPaths();
  const config = await loadConfig(paths.configFile);
  const history = new HistoryStack();
  const certificates = new CertificateRegistry(paths.certificatesDirectory);
  const session = createSession({
    config,
    history,
    certificates,
    bookmarks: await BookmarkStore.open(paths.bookmarksFile),
    client: new GeminiClient({ history, certificates, timeout: config.timeout }),
  });

  const initial: NavigatorState = values.file
    ? await localFileState(values.file)
    : { state: 'resolving', raw: withDefaultScheme(positionals[0] ?? config.homepage) };

  const terminal = new NodeTerminal();
  installSignalHandlers(terminal);
  terminal.start();
  try {
    return await new Navigator(session, terminal).run(initial);
  } finally {
    terminal.restore();
  }
}

main(process.argv.slice(2)).then(
  (code) => process.exit(code),
  (error: unknown) => {
    console.error('gemterm:', error instanceof Error ? error.message : error);
    process.exit(1);
  },
);
