import type { CheerioAPI } from 'cheerio';

const HEADING = /^(?:Index of|Directory listing for)\s+(\S.*)$/;

/**
 * Resolves the path a listing page describes from its `<title>` or `<h1>`,
 * e.g. `Index of /pub/linux/` → `/pub/linux/`.
 *
 * @returns The path, or `null` when neither element names one.
 */
export function parseCurrentDirectory($: CheerioAPI): string | null {
  for (const selector of ['title', 'h1']) {
    const heading = $(selector).first();
    if (!heading.length) {continue;}

    const cwd = extractPath(heading.text());
    if (cwd) {return cwd;}
  }
  return null;
}

function extractPath(text: string): string | null {
  const heading = text.replace(/\s+/g, ' ').trim();
  const match = HEADING.exec(heading);
  if (match) {return match[1];}
  // darkhttpd-style pages print the bare path
  return /^\/\S*$/.test(heading) ? heading : null;
}
