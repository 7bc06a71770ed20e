import type { CheerioAPI } from 'cheerio';
import { AnyNode, Element, isTag, isText } from 'domhandler';
import { FileEntry, LocalDateTime } from '../models/Models';
import { LinkScope, entryName, isNavigationLink } from '../../utils/linkUtils';
import { readDateTime } from './DateTimeParser';
import { LayoutStrategy, ParseContext } from './ParseContext';
import { readSizeToken } from './SizeParser';

/** Flattened `<pre>` content: links stay whole, everything else is text. */
type PreToken =
  | { kind: 'anchor'; element: Element }
  | { kind: 'text'; text: string };

/**
 * Finds the first `<pre>` holding at least one entry link with visible text
 * (classic Apache/nginx autoindex).
 */
export function findPreBlock($: CheerioAPI, scope: LinkScope): Element | null {
  const pre = $('pre')
    .filter((_, el) => $(el).find('a[href]').toArray().some((a) => {
      const text = $(a).text().trim();
      return text !== '' && !isNavigationLink(a.attribs.href, text, scope);
    }))
    .first();
  return pre.get(0) ?? null;
}

/**
 * Reads one entry per link. The text following a link up to the end of its
 * line holds, in order, an optional timestamp, an optional size and an
 * optional description.
 */
export function parsePreLayout(pre: Element, context: ParseContext): FileEntry[] {
  const { $ } = context;
  const rows: Array<{ name: string; trailing: string }> = [];
  let row: { name: string; trailing: string } | null = null;

  for (const token of flatten(pre)) {
    if (token.kind === 'text') {
      if (row) {row.trailing += token.text;}
      continue;
    }

    const href = token.element.attribs.href;
    const text = $(token.element).text().trim();
    // icon links carry no text and belong to the next entry
    if (href === undefined || !text) {continue;}

    row = isNavigationLink(href, text, context) ? null : { name: entryName(href, text), trailing: '' };
    if (row) {rows.push(row);}
  }

  return rows
    .filter((r) => r.name !== '')
    .map((r) => toEntry(r.name, r.trailing, context));
}

function toEntry(name: string, trailing: string, context: ParseContext): FileEntry {
  let line = trailing.replace(/\r/g, '').split('\n', 1)[0];

  // `<a href="dir">dir</a>/` prints the directory marker outside the link
  if (/^\/(?=\s|$)/.test(line)) {
    if (!name.endsWith('/')) {name += '/';}
    line = line.slice(1);
  }
  line = line.trimStart();

  let modified: LocalDateTime | null = null;
  const timestamp = readDateTime(line);
  if (timestamp) {
    modified = timestamp.modified;
    line = timestamp.rest.trimStart();
  }

  let size: number | null = null;
  const sizeToken = readSizeToken(line, context.sizeUnits);
  if (sizeToken) {
    size = sizeToken.size;
    line = sizeToken.rest.trimStart();
  }

  const description = line.trimEnd() || null;
  return { name, modified, size, description };
}

function flatten(node: Element, tokens: PreToken[] = []): PreToken[] {
  for (const child of node.children) {
    collect(child, tokens);
  }
  return tokens;
}

function collect(node: AnyNode, tokens: PreToken[]): void {
  if (isText(node)) {
    tokens.push({ kind: 'text', text: node.data });
  } else if (isTag(node)) {
    if (node.name === 'a') {
      tokens.push({ kind: 'anchor', element: node });
    } else if (node.name === 'br' || node.name === 'hr') {
      tokens.push({ kind: 'text', text: '\n' });
    } else {
      flatten(node, tokens);
    }
  }
}

export const preLayout: LayoutStrategy = {
  detect: findPreBlock,
  extract: parsePreLayout,
};
