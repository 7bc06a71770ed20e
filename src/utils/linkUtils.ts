/**
 * Helpers shared by the layout parsers for turning listing links into entry names
 * and for telling entries apart from navigation links.
 */

/** Where a listing lives; either field lets absolute links be checked. */
export interface LinkScope {
  baseUrl: string | null;
  cwd: string | null;
}

const PARENT_LABELS = new Set(['Parent Directory', '.', './', '..', '../']);
const SELF_OR_PARENT = new Set(['.', './', '..', '../']);
const ABSOLUTE_LINK = /^(?:[a-z][a-z\d+.-]*:|\/)/i;

/** Placeholder origin used when only the heading path is known. */
const HEADING_ORIGIN = 'http://listing.invalid';

/**
 * `decodeURIComponent` that hands back its input when the escape is malformed.
 */
export function safeDecode(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}

/**
 * Entry name for a link target: the decoded last path segment, with a
 * trailing `/` when the target is a directory.
 *
 * @example hrefToName('/pub/My%20Docs/') === 'My Docs/'
 */
export function hrefToName(href: string): string {
  const target = href.split(/[?#]/, 1)[0];
  const isDir = target.endsWith('/');
  const trimmed = target.replace(/\/+$/, '');
  const base = safeDecode(trimmed.slice(trimmed.lastIndexOf('/') + 1));
  return base ? base + (isDir ? '/' : '') : '';
}

/**
 * Name for an anchor, falling back to its visible text when the target
 * yields none. A visible trailing `/` also marks a directory.
 */
export function entryName(href: string, text: string): string {
  const label = text.trim();
  const name = hrefToName(href) || label;
  return label.endsWith('/') && !name.endsWith('/') ? `${name}/` : name;
}

/**
 * True for links that are not listing entries: sort controls, in-page
 * anchors, parent-directory links and anything pointing outside the
 * listed directory.
 */
export function isNavigationLink(href: string, text: string, scope: LinkScope): boolean {
  const target = href.trim();
  if (!target || target.startsWith('?') || target.startsWith('#')) {return true;}
  if (PARENT_LABELS.has(text.trim()) || SELF_OR_PARENT.has(target)) {return true;}
  if (target.startsWith('../')) {return true;}
  if (ABSOLUTE_LINK.test(target)) {return !isChildLink(target, scope);}
  return false;
}

/**
 * Makes `href` absolute against `baseUrl`, leaving it untouched when either
 * side cannot be parsed.
 */
export function absoluteUrl(href: string, baseUrl: string): string {
  try {
    return new URL(href, baseUrl).toString();
  } catch {
    return href;
  }
}

/** Builds the URL of a named entry inside a directory URL. */
export function childUrl(directoryUrl: string, name: string): string {
  const encoded = name
    .replace(/^\/+/, '')
    .split('/')
    .map(encodeURIComponent)
    .join('/');
  return new URL(encoded, directoryUrl).toString();
}

/** Forces a URL's path to end with `/` so relative links resolve inside it. */
export function directoryUrl(url: string): string {
  const parsed = new URL(url);
  if (!parsed.pathname.endsWith('/')) {parsed.pathname += '/';}
  parsed.search = '';
  parsed.hash = '';
  return parsed.toString();
}

function isChildLink(href: string, scope: LinkScope): boolean {
  const root = scopeUrl(scope);
  if (!root) {return false;}

  let resolved: URL;
  try {
    resolved = new URL(href, root);
  } catch {
    return false;
  }
  if (resolved.origin !== root.origin) {return false;}

  const parent = safeDecode(root.pathname);
  const child = safeDecode(resolved.pathname);
  if (!child.startsWith(parent)) {return false;}

  const rest = child.slice(parent.length).replace(/\/$/, '');
  return rest.length > 0 && !rest.includes('/');
}

function scopeUrl(scope: LinkScope): URL | null {
  try {
    if (scope.baseUrl) {return new URL(directoryUrl(scope.baseUrl));}
    if (scope.cwd && scope.cwd.startsWith('/')) {
      const path = scope.cwd.endsWith('/') ? scope.cwd : `${scope.cwd}/`;
      return new URL(encodeURI(path), HEADING_ORIGIN);
    }
  } catch {
    return null;
  }
  return null;
}
