import { createWriteStream, existsSync, mkdirSync } from 'fs';
import { utimes } from 'fs/promises';
import { dirname } from 'path';
import { pipeline } from 'stream/promises';
import pLimit from 'p-limit';
import { ListingFetch } from '../http/ListingFetch';

/** A file to fetch and where to put it. */
export interface DownloadItem {
  url: string;
  path: string;
  /** Epoch seconds applied as the local mtime once written. */
  mtime?: number | null;
}

/**
 * Downloads arbitrary files with concurrency control.
 */
export class DownloadService {
  /**
   * @param fetch          HTTP client.
   * @param concurrency    Max parallel downloads (`4` by default).
   */
  constructor(
    private readonly fetch: ListingFetch,
    private readonly concurrency = 4,
  ) {}

  /**
   * Downloads a single file to `savePath`.
   * Intermediate folders are created automatically.
   *
   * @returns  `true` on success, `false` on HTTP error.
   */
  async download(url: string, savePath: string, mtime?: number | null): Promise<boolean> {
    const res = await this.fetch.get(url);
    if (!res.ok) {return false;}

    ensureDir(dirname(savePath));
    await pipeline(res.body, createWriteStream(savePath));
    if (mtime !== undefined && mtime !== null) {await utimes(savePath, mtime, mtime);}
    return true;
  }

  /**
   * Downloads multiple files concurrently.
   *
   * @param items    Files to fetch.
   * @param onError  Called for every item that could not be saved.
   * @returns        Number of files written.
   */
  async downloadAll(
    items: DownloadItem[],
    onError?: (item: DownloadItem, reason: string) => void,
  ): Promise<number> {
    const limit = pLimit(this.concurrency);
    const results = await Promise.all(
      items.map((item) =>
        limit(async () => {
          try {
            const ok = await this.download(item.url, item.path, item.mtime);
            if (!ok) {onError?.(item, 'HTTP error');}
            return ok;
          } catch (err) {
            onError?.(item, err instanceof Error ? err.message : String(err));
            return false;
          }
        }),
      ),
    );
    return results.filter(Boolean).length;
  }
}

export function ensureDir(dir: string): void {
  if (!existsSync(dir)) {mkdirSync(dir, { recursive: true });}
}
