/**
 * Gemini Protocol Client
 *
 * Protocol Flow:
 * 1. Client connects to server on port 1965 via TLS
 * 2. Client sends single-line URL request: "gemini://host/path\r\n"
 * 3. Server responds with: "<STATUS> <META>\r\n" + optional body
 * 4. Connection closes
 *
 * Status Codes:
 * - 1x: INPUT (prompt user for input, 11 = sensitive)
 * - 2x: SUCCESS (meta is the MIME type of the body)
 * - 3x: REDIRECT (meta is the new URL)
 * - 4x: TEMPORARY FAILURE
 * - 5x: PERMANENT FAILURE
 * - 6x: CLIENT CERTIFICATE REQUIRED
 *
 * Every attempt to fetch a Gemini URL is pushed onto the history stack
 * before the connection is opened.
 */

import { connect } from 'node:tls';
import { isIP } from 'node:net';
import type { Duplex } from 'node:stream';
import type { CertificateRegistry } from './certificates';
import { toHistoryEntry, type HistoryStack } from './history';
import { formatUrl, resolve, ResolutionError, type GeminiUrl } from './url';

export const MAX_RESPONSE_SIZE = 5242880; // 5MB
export const DEFAULT_TIMEOUT = 10000;

export type Charset = 'utf8' | 'iso8859' | 'ascii';

export type TemporaryVariant = 'general' | 'unavailable' | 'cgi-error' | 'proxy-error' | 'slow-down';
export type CertificateVariant = 'required' | 'unauthorized' | 'invalid';

export type FailureKind =
  | 'unsupported-scheme'
  | 'resolution'
  | 'connect'
  | 'bad-response'
  | 'temporary'
  | 'permanent'
  | 'not-found'
  | 'gone'
  | 'proxy-refused'
  | 'bad-request';

export interface RenderedOutcome {
  kind: 'rendered';
  body: Buffer;
  contentType: string;
  charset: Charset;
  /** True when the body is gemtext and goes through the renderer. */
  gemtext: boolean;
}

export interface InputOutcome {
  kind: 'input';
  prompt: string;
  sensitive: boolean;
}

export interface RedirectOutcome {
  kind: 'redirect';
  url: GeminiUrl;
  permanent: boolean;
}

export interface FailureOutcome {
  kind: 'failure';
  failure: FailureKind;
  detail: string;
  status?: number;
  variant?: TemporaryVariant;
}

export interface CertRequiredOutcome {
  kind: 'cert-required';
  host: string;
  variant: CertificateVariant;
  detail: string;
  status: number;
}

export type FetchOutcome =
  | RenderedOutcome
  | InputOutcome
  | RedirectOutcome
  | FailureOutcome
  | CertRequiredOutcome;

export interface GeminiResponse {
  status: number;
  meta: string;
  body: Buffer;
}

export interface ConnectOptions {
  host: string;
  port: number;
  timeout: number;
  cert?: Buffer;
  key?: Buffer;
}

/**
 * Opens a connected, ready-to-write socket.
 */
export type Connector = (options: ConnectOptions) => Promise<Duplex>;

export class ProtocolError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ProtocolError';
  }
}

/**
 * Human-readable description of a status family.
 */
export function describeStatus(code: number): string {
  const category = Math.floor(code / 10);
  switch (category) {
    case 1: return 'INPUT - Server requests input from user';
    case 2: return 'SUCCESS - Request completed successfully';
    case 3: return 'REDIRECT - Resource has moved';
    case 4: return 'TEMPORARY FAILURE - Try again later';
    case 5: return 'PERMANENT FAILURE - Do not retry';
    case 6: return 'CLIENT CERTIFICATE REQUIRED';
    default: return 'Unknown status';
  }
}

function isUnreserved(byte: number): boolean {
  return (
    (byte >= 0x30 && byte <= 0x39) || // 0-9
    (byte >= 0x41 && byte <= 0x5a) || // A-Z
    (byte >= 0x61 && byte <= 0x7a) || // a-z
    byte === 0x2e || // .
    byte === 0x7e || // ~
    byte === 0x5f || // _
    byte === 0x2d // -
  );
}

/**
 * Percent-encode user input for the query part of a request. Only
 * [A-Za-z0-9.~_-] pass through; every other UTF-8 byte becomes %XX.
 */
export function encodeQuery(input: string): string {
  let encoded = '';
  for (const byte of Buffer.from(input, 'utf8')) {
    encoded += isUnreserved(byte)
      ? String.fromCharCode(byte)
      : `%${byte.toString(16).toUpperCase().padStart(2, '0')}`;
  }
  return encoded;
}

export function buildRequestLine(url: GeminiUrl): string {
  return `${formatUrl(url)}\r\n`;
}

/**
 * Normalize the charset parameter of a MIME type. Defaults to utf8.
 */
export function normalizeCharset(meta: string): Charset {
  const match = /charset\s*=\s*"?([^;"\s]+)/i.exec(meta);
  if (!match) return 'utf8';

  const name = match[1].toLowerCase().replace(/[-_]/g, '');
  if (name.startsWith('iso8859') || name === 'latin1') return 'iso8859';
  if (name === 'usascii' || name === 'ascii') return 'ascii';
  return 'utf8';
}

/**
 * Split a raw response into header and body.
 * Format: <STATUS><SPACE><META><CR><LF>[BODY]
 */
export function parseResponse(raw: Buffer): GeminiResponse {
  let headerEnd = raw.indexOf('\r\n');
  let separatorLength = 2;
  if (headerEnd === -1) {
    // Tolerate servers that terminate the header with a bare LF
    headerEnd = raw.indexOf('\n');
    separatorLength = 1;
  }
  if (headerEnd === -1) {
    throw new ProtocolError('Invalid Gemini response format');
  }

  const headerLine = raw.subarray(0, headerEnd).toString('utf8');
  const match = /^(\d{2})(?:[ \t](.*))?$/.exec(headerLine);
  if (!match) {
    throw new ProtocolError(`Invalid Gemini header format: "${headerLine.slice(0, 80)}"`);
  }

  return {
    status: parseInt(match[1], 10),
    meta: (match[2] ?? '').trim(),
    body: raw.subarray(headerEnd + separatorLength),
  };
}

const TEMPORARY_VARIANTS: Record<number, TemporaryVariant> = {
  41: 'unavailable',
  42: 'cgi-error',
  43: 'proxy-error',
  44: 'slow-down',
};

/**
 * Map a parsed response onto a fetch outcome. Unknown codes fall back to
 * their family's base code.
 */
export function classifyResponse(response: GeminiResponse, requested: GeminiUrl): FetchOutcome {
  const { status, meta, body } = response;
  const detail = meta || describeStatus(status);

  switch (Math.floor(status / 10)) {
    case 1:
      return { kind: 'input', prompt: meta, sensitive: status === 11 };

    case 2: {
      const contentType = meta || 'text/gemini';
      return {
        kind: 'rendered',
        body,
        contentType,
        charset: normalizeCharset(contentType),
        gemtext: /^text\/gemini/i.test(contentType),
      };
    }

    case 3: {
      if (!meta) {
        return { kind: 'failure', failure: 'bad-response', status, detail: 'Redirect without a target' };
      }
      try {
        const url = resolve(meta, { scheme: requested.scheme, host: requested.host, port: requested.port, path: requested.path });
        return { kind: 'redirect', url, permanent: status === 31 };
      } catch (error) {
        if (!(error instanceof ResolutionError)) throw error;
        return { kind: 'failure', failure: 'resolution', status, detail: error.message };
      }
    }

    case 4:
      return {
        kind: 'failure',
        failure: 'temporary',
        status,
        variant: TEMPORARY_VARIANTS[status] ?? 'general',
        detail,
      };

    case 5:
      switch (status) {
        case 51: return { kind: 'failure', failure: 'not-found', status, detail };
        case 52: return { kind: 'failure', failure: 'gone', status, detail };
        case 53: return { kind: 'failure', failure: 'proxy-refused', status, detail };
        case 59: return { kind: 'failure', failure: 'bad-request', status, detail };
        default: return { kind: 'failure', failure: 'permanent', status, detail };
      }

    case 6:
      return {
        kind: 'cert-required',
        host: requested.host,
        status,
        variant: status === 61 ? 'unauthorized' : status === 62 ? 'invalid' : 'required',
        detail,
      };

    default:
      return { kind: 'failure', failure: 'bad-response', status, detail: `Unknown status ${status}` };
  }
}

/**
 * Default connector: TLS with SNI. Gemini servers use self-signed
 * certificates, so the chain is not checked against a CA.
 */
export const tlsConnector: Connector = (options) =>
  new Promise<Duplex>((resolvePromise, reject) => {
    const host = options.host.replace(/^\[(.*)\]$/, '$1');
    const socket = connect({
      host,
      port: options.port,
      servername: isIP(host) ? undefined : host,
      rejectUnauthorized: false,
      cert: options.cert,
      key: options.key,
    });

    const timer = setTimeout(() => {
      socket.destroy();
      reject(new Error('Connection timeout'));
    }, options.timeout);

    const onError = (error: Error): void => {
      clearTimeout(timer);
      reject(error);
    };

    socket.once('error', onError);
    socket.once('secureConnect', () => {
      clearTimeout(timer);
      socket.off('error', onError);
      resolvePromise(socket);
    });
  });

/**
 * Read until the server closes the connection. The timeout is an idle
 * timeout: it restarts with every chunk received.
 */
export function readResponse(
  socket: Duplex,
  timeout: number,
  maxResponseSize = MAX_RESPONSE_SIZE,
): Promise<Buffer> {
  return new Promise<Buffer>((resolvePromise, reject) => {
    const chunks: Buffer[] = [];
    let totalBytes = 0;
    let settled = false;
    let timer = setTimeout(() => fail(new Error('Connection timeout')), timeout);

    const finish = (): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      resolvePromise(Buffer.concat(chunks, totalBytes));
    };

    const fail = (error: Error): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      socket.destroy();
      reject(error);
    };

    socket.on('data', (chunk: Buffer | string) => {
      const bytes = typeof chunk === 'string' ? Buffer.from(chunk) : chunk;
      if (totalBytes + bytes.length > maxResponseSize) {
        fail(new Error('Response too large (max 5MB)'));
        return;
      }
      chunks.push(bytes);
      totalBytes += bytes.length;
      clearTimeout(timer);
      timer = setTimeout(() => fail(new Error('Connection timeout')), timeout);
    });

    socket.once('end', finish);
    socket.once('close', finish);
    socket.once('error', (error: Error) => {
      // Many servers drop the connection without a TLS close_notify
      if (totalBytes > 0) {
        finish();
      } else {
        fail(error);
      }
    });
  });
}

export interface GeminiClientOptions {
  history: HistoryStack;
  certificates?: CertificateRegistry;
  connector?: Connector;
  timeout?: number;
}

export class GeminiClient {
  private readonly history: HistoryStack;
  private readonly certificates?: CertificateRegistry;
  private readonly connector: Connector;
  private readonly timeout: number;

  constructor(options: GeminiClientOptions) {
    this.history = options.history;
    this.certificates = options.certificates;
    this.connector = options.connector ?? tlsConnector;
    this.timeout = options.timeout ?? DEFAULT_TIMEOUT;
  }

  async fetch(url: GeminiUrl): Promise<FetchOutcome> {
    if (url.scheme !== 'gemini') {
      return {
        kind: 'failure',
        failure: 'unsupported-scheme',
        detail: `Unsupported scheme "${url.scheme}": ${formatUrl(url)}`,
      };
    }

    this.history.push(toHistoryEntry(url));

    let raw: Buffer;
    try {
      raw = await this.exchange(url);
    } catch (error) {
      return {
        kind: 'failure',
        failure: 'connect',
        detail: error instanceof Error ? error.message : 'Unknown error',
      };
    }

    try {
      return classifyResponse(parseResponse(raw), url);
    } catch (error) {
      if (!(error instanceof ProtocolError)) throw error;
      return { kind: 'failure', failure: 'bad-response', detail: error.message };
    }
  }

  private async exchange(url: GeminiUrl): Promise<Buffer> {
    const material = this.certificates ? await this.certificates.load(url.host) : null;

    const socket = await this.connector({
      host: url.host,
      port: url.port,
      timeout: this.timeout,
      ...(material ?? {}),
    });

    try {
      const response = readResponse(socket, this.timeout);
      socket.write(buildRequestLine(url));
      return await response;
    } finally {
      socket.destroy();
    }
  }
}
