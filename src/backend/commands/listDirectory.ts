import { format } from 'date-fns';
import { FileEntry, RemoteListing } from '../models/Models';
import { toCalendarDate } from '../parser/DateTimeParser';
import { ListingService } from '../services/ListingService';
import { OutputChannel } from '../../utils/OutputChannel';

const log = new OutputChannel('ls');

/**
 * Prints the listing of every URL: the final URL, its `Cwd:` line, then one
 * tab-separated line per entry. With `json`, one JSON document per URL.
 *
 * @returns `false` when at least one URL failed.
 */
export async function listDirectory(
  service: ListingService,
  urls: string[],
  out: NodeJS.WritableStream,
  json = false,
): Promise<boolean> {
  let ok = true;

  for (const url of urls) {
    let page: RemoteListing;
    try {
      page = await service.fetchListing(url);
    } catch (err) {
      log.error(`Failed to list ${url}: ${err instanceof Error ? err.message : String(err)}`);
      ok = false;
      continue;
    }

    if (json) {
      out.write(`${JSON.stringify(page)}\n`);
      continue;
    }

    out.write(`${page.baseUrl}\n`);
    out.write(`Cwd: ${page.cwd ?? '-'}\n`);
    for (const entry of page.listing) {
      out.write(`${formatEntry(entry)}\n`);
    }
    out.write('\n');
  }

  return ok;
}

/** `name<TAB>modified<TAB>size<TAB>description`, `-` for missing fields. */
export function formatEntry(entry: FileEntry): string {
  const modified = entry.modified ? format(toCalendarDate(entry.modified), 'yyyy-MM-dd HH:mm:ss') : '-';
  const size = entry.size === null ? '-' : String(entry.size);
  return [entry.name, modified, size, entry.description ?? ''].join('\t');
}
