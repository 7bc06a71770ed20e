import type { Cheerio, CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';
import { FileEntry, LocalDateTime } from '../models/Models';
import { LinkScope, absoluteUrl, entryName, isNavigationLink } from '../../utils/linkUtils';
import { fromEpochSeconds, parseDateTime } from './DateTimeParser';
import { LayoutStrategy, ParseContext } from './ParseContext';
import { isSizeLike, parseSize } from './SizeParser';

/** What a single non-name cell turned out to hold. */
type CellValue =
  | { field: 'modified'; value: LocalDateTime }
  | { field: 'size'; value: number | null }
  | { field: 'description'; value: string };

type CellMatcher = (cell: Cheerio<Element>, text: string, context: ParseContext) => CellValue | null;

/**
 * Cell classifiers, first match wins. Column order differs between
 * themes, so cells are recognised by their content, not their position.
 */
const CELL_MATCHERS: readonly CellMatcher[] = [
  matchTimeElement,
  matchDateTime,
  matchSize,
  matchDescription,
];

/**
 * Picks the table with the most listing-like rows: two or more cells, the
 * first linked one pointing at an entry rather than navigation.
 */
export function findListingTable($: CheerioAPI, scope: LinkScope): Element | null {
  let best: Element | null = null;
  let bestScore = 0;

  $('table').each((_, table) => {
    const score = ownRows($, table).filter((__, tr) => {
      const cells = $(tr).children('td').toArray();
      if (cells.length < 2) {return false;}
      const anchor = cells.map((td) => findAnchor($(td))).find((found) => found !== null);
      return !!anchor && !isNavigationLink(anchor.href, anchor.text, scope);
    }).length;

    if (score > bestScore) {
      best = table;
      bestScore = score;
    }
  });

  return best;
}

/**
 * Reads one entry per data row. Header/footer rows and rows without a
 * usable link are skipped.
 */
export function parseTableLayout(table: Element, context: ParseContext): FileEntry[] {
  const { $ } = context;
  const listing: FileEntry[] = [];

  ownRows($, table).each((_, tr) => {
    const entry = parseRow($(tr), context);
    if (entry) {listing.push(entry);}
  });

  return listing;
}

function parseRow(tr: Cheerio<Element>, context: ParseContext): FileEntry | null {
  const { $ } = context;
  if (tr.parent().is('thead, tfoot') || tr.children('th').length) {return null;}

  const cells = tr.children('td').toArray().map((td) => $(td));
  const nameIndex = cells.findIndex((td) => findAnchor(td) !== null);
  if (nameIndex < 0) {return null;}

  const anchor = findAnchor(cells[nameIndex]);
  if (!anchor) {return null;}
  if (isNavigationLink(anchor.href, anchor.text, context)) {return null;}

  let modified: LocalDateTime | null = null;
  let size: number | null = null;
  let sizeSeen = false;
  let description: string | null = null;

  for (const [index, td] of cells.entries()) {
    if (index === nameIndex) {continue;}

    const value = classifyCell(td, context);
    if (!value) {continue;}

    switch (value.field) {
      case 'modified':
        modified = modified ?? value.value;
        break;
      case 'size':
        if (!sizeSeen) {
          size = value.value;
          sizeSeen = true;
        }
        break;
      case 'description':
        description = value.value;
        break;
    }
  }

  const name = entryName(anchor.href, anchor.text);
  // directory rows sometimes print the `/` right after the link
  const isDir = !name.endsWith('/') && cells[nameIndex].text().trim().endsWith('/');
  return { name: isDir ? `${name}/` : name, modified, size, description };
}

function classifyCell(td: Cheerio<Element>, context: ParseContext): CellValue | null {
  const text = td.text().replace(/\s+/g, ' ').trim();
  for (const matcher of CELL_MATCHERS) {
    const value = matcher(td, text, context);
    if (value) {return value;}
  }
  return null;
}

function matchTimeElement(td: Cheerio<Element>): CellValue | null {
  const datetime = td.find('time[datetime]').first().attr('datetime');
  const value = datetime ? parseDateTime(datetime) : null;
  return value ? { field: 'modified', value } : null;
}

function matchDateTime(td: Cheerio<Element>, text: string): CellValue | null {
  if (!text) {return null;}
  const value = parseDateTime(text);
  if (value) {return { field: 'modified', value };}

  // sortable themes keep the epoch next to a relative label ("2 days ago")
  const sortValue = td.attr('data-sort-value');
  if (!isSizeLike(text) && sortValue && /^\d+$/.test(sortValue)) {
    return { field: 'modified', value: fromEpochSeconds(Number(sortValue)) };
  }
  return null;
}

function matchSize(td: Cheerio<Element>, text: string, context: ParseContext): CellValue | null {
  if (!text || !isSizeLike(text)) {return null;}

  const sortValue = td.attr('data-sort-value');
  if (text !== '-' && sortValue && /^\d+$/.test(sortValue)) {
    return { field: 'size', value: Number(sortValue) };
  }
  return { field: 'size', value: parseSize(text, context.sizeUnits) };
}

function matchDescription(td: Cheerio<Element>, text: string, context: ParseContext): CellValue | null {
  if (!text) {return null;}

  const cell = td.clone();
  const { baseUrl } = context;
  if (baseUrl) {
    cell.find('[href]').each((_, el) => {
      el.attribs.href = absoluteUrl(el.attribs.href, baseUrl);
    });
  }
  const markup = cell.html()?.trim();
  return { field: 'description', value: markup || text };
}

function findAnchor(td: Cheerio<Element>): { href: string; text: string } | null {
  for (const a of td.find('a[href]').toArray()) {
    const href = a.attribs.href;
    const text = td.find(a).text().trim();
    if (href && !href.startsWith('#') && text) {return { href, text };}
  }
  return null;
}

/** Rows of `table` itself, excluding rows of nested tables. */
function ownRows($: CheerioAPI, table: Element): Cheerio<Element> {
  return $(table)
    .find('tr')
    .filter((_, tr) => $(tr).closest('table').get(0) === table);
}

export const tableLayout: LayoutStrategy = {
  detect: findListingTable,
  extract: parseTableLayout,
};
