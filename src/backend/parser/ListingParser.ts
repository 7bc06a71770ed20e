import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';
import { InvalidDocumentError } from '../errors';
import { Layout, ParsedListing } from '../models/Models';
import { LinkScope } from '../../utils/linkUtils';
import { parseCurrentDirectory } from './CurrentDirectoryParser';
import { listLayout } from './ListLayoutParser';
import { LayoutStrategy, ParseContext } from './ParseContext';
import { preLayout } from './PreLayoutParser';
import { SizeUnits } from './SizeParser';
import { tableLayout } from './TableLayoutParser';

export interface ParseOptions {
  /** Layout precedence; the first one detected wins. */
  layouts?: readonly Layout[];
  /** URL of the listed directory. */
  baseUrl?: string | null;
  sizeUnits?: SizeUnits;
}

/** Default precedence when a page matches several layouts. */
export const DEFAULT_LAYOUT_ORDER: readonly Layout[] = ['table', 'pre', 'list'];

const STRATEGIES: Record<Layout, LayoutStrategy> = {
  table: tableLayout,
  pre: preLayout,
  list: listLayout,
};

/**
 * Picks the layout used by a document. Only entry links count towards a
 * layout; `scope` decides which absolute links are entries and defaults to
 * the page's own heading path.
 *
 * @returns The layout and the element holding its entries,
 *          or `null` when the page matches none of them.
 */
export function classifyLayout(
  $: CheerioAPI,
  layouts: readonly Layout[] = DEFAULT_LAYOUT_ORDER,
  scope: LinkScope = { cwd: parseCurrentDirectory($), baseUrl: null },
): { layout: Layout; root: Element } | null {
  for (const layout of layouts) {
    const root = STRATEGIES[layout].detect($, scope);
    if (root) {return { layout, root };}
  }
  return null;
}

/**
 * Extracts the current directory and its entries from an autoindex page
 * (Apache, nginx, lighttpd, python `http.server` and look-alikes).
 *
 * Rows that cannot be read are skipped and unreadable fields become `null`;
 * an unrecognised page yields an empty listing.
 *
 * @param document A document loaded with `cheerio.load`.
 * @throws InvalidDocumentError when `document` is not a cheerio document.
 */
export function parse(document: CheerioAPI, options: ParseOptions = {}): ParsedListing {
  assertDocument(document);

  const cwd = parseCurrentDirectory(document);
  const scope: LinkScope = { cwd, baseUrl: options.baseUrl ?? null };
  const match = classifyLayout(document, options.layouts, scope);
  if (!match) {return { cwd, listing: [], layout: null };}

  const context: ParseContext = {
    ...scope,
    $: document,
    sizeUnits: options.sizeUnits ?? 'binary',
  };
  const listing = STRATEGIES[match.layout].extract(match.root, context);
  return { cwd, listing, layout: match.layout };
}

/** Loads `html` with cheerio and {@link parse}s it. */
export function parseHtml(html: string, options: ParseOptions = {}): ParsedListing {
  return parse(cheerio.load(html), options);
}

function assertDocument(document: unknown): asserts document is CheerioAPI {
  if (
    typeof document !== 'function' ||
    !('root' in document) ||
    typeof document.root !== 'function'
  ) {
    throw new InvalidDocumentError('Expected a document loaded with cheerio.load()');
  }
}
