import type { CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';
import { FileEntry } from '../models/Models';
import { LinkScope, entryName, isNavigationLink } from '../../utils/linkUtils';
import { LayoutStrategy, ParseContext } from './ParseContext';

/** First `<ul>` with at least one list item linking to an entry. */
export function findListContainer($: CheerioAPI, scope: LinkScope): Element | null {
  const ul = $('ul')
    .filter((_, el) => $(el).find('li a[href]').toArray()
      .some((a) => !isNavigationLink(a.attribs.href, $(a).text(), scope)))
    .first();
  return ul.get(0) ?? null;
}

/**
 * One entry per `<li>` wrapping exactly one link. This layout carries names
 * only (python `http.server`, many bare custom index pages).
 */
export function parseListLayout(ul: Element, context: ParseContext): FileEntry[] {
  const { $ } = context;
  const listing: FileEntry[] = [];

  $(ul).find('li').each((_, li) => {
    const anchors = $(li).find('a[href]');
    if (anchors.length !== 1) {return;}

    const href = anchors.attr('href') ?? '';
    const text = anchors.text();
    if (isNavigationLink(href, text, context)) {return;}

    const name = entryName(href, text);
    if (name) {listing.push({ name, modified: null, size: null, description: null });}
  });

  return listing;
}

export const listLayout: LayoutStrategy = {
  detect: findListContainer,
  extract: parseListLayout,
};
