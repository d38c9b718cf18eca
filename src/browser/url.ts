/**
 * Gemini URL Resolver
 *
 * Turns raw user input, link targets and redirect targets into absolute
 * Gemini URLs. Pure string work: no network and no filesystem access.
 *
 * Grammar handled:
 *   [scheme "://"] [userinfo "@"] host [":" port] ["/" path] ["?" query] ["#" fragment]
 *
 * Relative references (no scheme marker) are resolved against the
 * browsing context of the page currently on screen:
 *   "//host/p"   -> another host, same scheme
 *   "/abs/path"  -> replaces the path on the context host
 *   "?query"     -> the context path with a new query
 *   "rel/path"   -> appended to the directory of the context path
 *
 * "." and ".." segments are removed from the resolved path.
 */

export const DEFAULT_SCHEME = 'gemini';
export const DEFAULT_PORT = 1965;

export interface GeminiUrl {
  readonly scheme: string;
  readonly host: string;
  readonly port: number;
  /** Always stored without a leading slash. */
  readonly path: string;
  readonly query?: string;
}

export interface BrowsingContext {
  readonly host: string;
  readonly path: string;
  readonly port?: number;
  readonly scheme?: string;
}

export class ResolutionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ResolutionError';
  }
}

interface Authority {
  host: string;
  port: number;
}

/**
 * Parse "user@host:port" into host and port. The userinfo segment is
 * recognised and dropped.
 */
function parseAuthority(authority: string): Authority {
  const at = authority.lastIndexOf('@');
  const hostPort = at === -1 ? authority : authority.substring(at + 1);

  // Bracketed IPv6 literal: the port can only follow the closing bracket
  const bracketEnd = hostPort.startsWith('[') ? hostPort.indexOf(']') : -1;
  const colon = hostPort.lastIndexOf(':');

  let host = hostPort;
  let port = DEFAULT_PORT;
  if (colon !== -1 && colon > bracketEnd) {
    host = hostPort.substring(0, colon);
    const portText = hostPort.substring(colon + 1);
    if (/^\d+$/.test(portText)) {
      port = parseInt(portText, 10);
    }
  }

  if (!host) {
    throw new ResolutionError(`Missing host in "${authority}"`);
  }

  return { host: host.toLowerCase(), port };
}

/**
 * Split "path?query#fragment". The fragment is never sent to a server.
 */
function splitPathAndQuery(reference: string): { path: string; query?: string } {
  const hash = reference.indexOf('#');
  const withoutFragment = hash === -1 ? reference : reference.substring(0, hash);

  const question = withoutFragment.indexOf('?');
  if (question === -1) {
    return { path: withoutFragment };
  }
  return {
    path: withoutFragment.substring(0, question),
    query: withoutFragment.substring(question + 1),
  };
}

function stripLeadingSlashes(path: string): string {
  return path.replace(/^\/+/, '');
}

/**
 * Directory part of a context path: everything up to and including the
 * final slash ("a/b" -> "a/", "a/b/" -> "a/b/", "a" -> "").
 */
export function directoryOf(path: string): string {
  const slash = path.lastIndexOf('/');
  return slash === -1 ? '' : path.substring(0, slash + 1);
}

/**
 * Remove "." and ".." segments. A dot segment at the end leaves a
 * trailing slash; ".." above the root is dropped.
 */
export function removeDotSegments(path: string): string {
  const segments = path.split('/');
  const output: string[] = [];
  segments.forEach((segment, index) => {
    if (segment !== '.' && segment !== '..') {
      output.push(segment);
      return;
    }
    if (segment === '..') output.pop();
    if (index === segments.length - 1) output.push('');
  });
  return output.join('/');
}

function build(scheme: string, authority: Authority, pathAndQuery: string): GeminiUrl {
  const { path, query } = splitPathAndQuery(pathAndQuery);
  const url: GeminiUrl = {
    scheme,
    host: authority.host,
    port: authority.port,
    path: removeDotSegments(stripLeadingSlashes(path)),
  };
  return query === undefined ? url : { ...url, query };
}

/** "host[:port][/path][?query]" with the scheme marker already removed. */
function buildFromAuthority(scheme: string, rest: string): GeminiUrl {
  const end = rest.search(/[/?#]/);
  const authorityText = end === -1 ? rest : rest.substring(0, end);
  const pathAndQuery = end === -1 ? '' : rest.substring(end);
  return build(scheme, parseAuthority(authorityText), pathAndQuery);
}

const SCHEME_MARKER = /^([A-Za-z][A-Za-z0-9+.-]*)?:\/\//;

/**
 * Resolve a raw URL string, optionally against the context of the page on
 * screen.
 */
export function resolve(raw: string, context?: BrowsingContext): GeminiUrl {
  const input = raw.trim();

  const marker = SCHEME_MARKER.exec(input);
  if (marker) {
    const scheme = (marker[1] || DEFAULT_SCHEME).toLowerCase();
    return buildFromAuthority(scheme, input.substring(marker[0].length));
  }

  if (!context) {
    throw new ResolutionError(`Cannot resolve relative reference "${input}" without a current page`);
  }

  const scheme = context.scheme ?? DEFAULT_SCHEME;
  if (input.startsWith('//')) {
    return buildFromAuthority(scheme, input.substring(2));
  }

  const authority: Authority = {
    host: context.host,
    port: context.port ?? DEFAULT_PORT,
  };

  if (input.startsWith('/')) {
    return build(scheme, authority, input);
  }
  if (input.startsWith('?') || input.startsWith('#')) {
    return build(scheme, authority, context.path + input);
  }

  return build(scheme, authority, directoryOf(context.path) + input);
}

/**
 * Format a URL the way it goes on the wire. The port is omitted when it is
 * the Gemini default.
 */
export function formatUrl(url: GeminiUrl): string {
  const port = url.port === DEFAULT_PORT ? '' : `:${url.port}`;
  const query = url.query === undefined ? '' : `?${url.query}`;
  return `${url.scheme}://${url.host}${port}/${url.path}${query}`;
}

export function withQuery(url: GeminiUrl, query: string): GeminiUrl {
  return { ...url, query };
}

export function withoutQuery(url: GeminiUrl): GeminiUrl {
  return { scheme: url.scheme, host: url.host, port: url.port, path: url.path };
}

/**
 * Strip the last path segment: "a/b/c" -> "a/b/", "a/b/" -> "a/", "a" -> "".
 */
export function parentPath(path: string): string {
  const trimmed = path.endsWith('/') ? path.slice(0, -1) : path;
  return directoryOf(trimmed);
}

export function contextOf(url: GeminiUrl): BrowsingContext {
  return { scheme: url.scheme, host: url.host, port: url.port, path: url.path };
}

/**
 * Prepend the default scheme to typed input that carries none.
 */
export function withDefaultScheme(input: string): string {
  const trimmed = input.trim();
  return SCHEME_MARKER.test(trimmed) ? trimmed : `${DEFAULT_SCHEME}://${trimmed}`;
}
