import type { CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';
import { FileEntry } from '../models/Models';
import { LinkScope } from '../../utils/linkUtils';
import { SizeUnits } from './SizeParser';

/** Per-call state shared by the layout parsers. */
export interface ParseContext extends LinkScope {
  $: CheerioAPI;
  sizeUnits: SizeUnits;
}

/**
 * One way of reading a listing: `detect` finds the element that holds the
 * entries, `extract` turns it into entries. Both skip navigation links the
 * same way, so a detected root always has at least one entry link.
 */
export interface LayoutStrategy {
  detect($: CheerioAPI, scope: LinkScope): Element | null;
  extract(root: Element, context: ParseContext): FileEntry[];
}
