import { ListingService, WalkOptions } from '../services/ListingService';

/**
 * Prints every path below `url`, one per line (or the entries as a JSON array).
 */
export async function walkTree(
  service: ListingService,
  url: string,
  out: NodeJS.WritableStream,
  options: WalkOptions & { json?: boolean } = {},
): Promise<void> {
  const entries = await service.walk(url, options);
  if (options.json) {
    out.write(`${JSON.stringify(entries)}\n`);
    return;
  }
  for (const entry of entries) {
    out.write(`${entry.path}\n`);
  }
}
