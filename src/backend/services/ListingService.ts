import * as cheerio from 'cheerio';
import pLimit from 'p-limit';
import { HttpStatusError } from '../errors';
import { parseHttpDate } from '../fs/FileStat';
import { ListingFetch } from '../http/ListingFetch';
import { FileEntry, Layout, RemoteEntry, RemoteListing, RemoteStat } from '../models/Models';
import { parse } from '../parser/ListingParser';
import { SizeUnits } from '../parser/SizeParser';
import { childUrl, directoryUrl } from '../../utils/linkUtils';
import { OutputChannel } from '../../utils/OutputChannel';

const log = new OutputChannel('ListingService');

const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);

export interface ListingServiceOptions {
  sizeUnits?: SizeUnits;
  layouts?: readonly Layout[];
}

export interface WalkOptions {
  /** Levels below the root to descend into; `1` lists the root only. */
  maxDepth?: number;
  /** Parallel listing requests (`4` by default). */
  concurrency?: number;
}

/**
 * High-level façade that coordinates HTTP calls and the listing parser.
 */
export class ListingService {
  /**
   * @param fetch   HTTP client.
   * @param options Parser settings applied to every page.
   */
  constructor(
    private readonly fetch: ListingFetch,
    private readonly options: ListingServiceOptions = {},
  ) {}

  /**
   * Downloads and parses one listing page.
   *
   * @throws HttpStatusError on a non-2xx response.
   */
  async fetchListing(url: string): Promise<RemoteListing> {
    const res = await this.fetch.get(url);
    if (!res.ok) {throw new HttpStatusError(url, res.status, res.statusText);}

    const baseUrl = directoryUrl(res.url || url);
    const html = await res.text();
    const parsed = parse(cheerio.load(html), {
      baseUrl,
      layouts: this.options.layouts,
      sizeUnits: this.options.sizeUnits,
    });

    log.debug(`${baseUrl}: ${parsed.listing.length} entries (${parsed.layout ?? 'no layout'})`);
    return { url, baseUrl, ...parsed };
  }

  /** Entries of one listing page. */
  async ls(url: string): Promise<FileEntry[]> {
    return (await this.fetchListing(url)).listing;
  }

  /**
   * Probes a single URL with HEAD.
   *
   * @returns `null` for 404, a directory stat for redirects.
   * @throws HttpStatusError for other failures.
   */
  async stat(url: string): Promise<RemoteStat | null> {
    const res = await this.fetch.head(url);
    if (res.status === 404) {return null;}
    if (REDIRECT_STATUSES.has(res.status)) {
      return { isDirectory: true, size: null, mtime: null, seekable: false };
    }
    if (!res.ok) {throw new HttpStatusError(url, res.status, res.statusText);}

    const length = res.headers.get('content-length');
    return {
      isDirectory: false,
      size: length && /^\d+$/.test(length) ? Number(length) : null,
      mtime: parseHttpDate(res.headers.get('last-modified')),
      seekable: res.headers.get('accept-ranges') === 'bytes',
    };
  }

  /**
   * Lists a directory tree. Each directory is followed by its own subtree.
   * Sub-directories that fail to load are logged and left empty; a failing
   * root propagates.
   */
  async walk(url: string, options: WalkOptions = {}): Promise<RemoteEntry[]> {
    const maxDepth = options.maxDepth ?? Infinity;
    const limit = pLimit(options.concurrency ?? 4);
    const visited = new Set<string>();

    const visit = async (dirUrl: string, prefix: string, depth: number): Promise<RemoteEntry[]> => {
      visited.add(dirUrl);
      const page = await limit(() => this.fetchListing(dirUrl));

      const children: RemoteEntry[] = page.listing.map((entry) => ({
        ...entry,
        url: childUrl(page.baseUrl, entry.name),
        path: prefix + entry.name,
      }));

      const subtrees = await Promise.all(children.map(async (child) => {
        if (!child.name.endsWith('/') || depth >= maxDepth || visited.has(child.url)) {
          return [child];
        }
        try {
          return [child, ...(await visit(child.url, child.path, depth + 1))];
        } catch (err) {
          log.warn(`Skipping ${child.url}: ${err instanceof Error ? err.message : String(err)}`);
          return [child];
        }
      }));
      return subtrees.flat();
    };

    return visit(directoryUrl(url), '', 1);
  }
}
