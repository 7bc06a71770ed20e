/**
 * Calendar timestamp exactly as the server printed it.
 * No timezone is attached; callers decide how to interpret it.
 */
export interface LocalDateTime {
  readonly year: number;
  /** 1-12. */
  readonly month: number;
  readonly day: number;
  readonly hour: number;
  readonly minute: number;
  readonly second: number;
}

/**
 * One file or sub-directory found on a listing page.
 */
export interface FileEntry {
  /** Decoded entry name. Ends with `/` for sub-directories. */
  readonly name: string;
  /** Last modification time, `null` when the row shows none. */
  readonly modified: LocalDateTime | null;
  /** Size in bytes (possibly approximated from `12K`-style values). */
  readonly size: number | null;
  /** Trailing label (file type, free-form note). Table layouts keep markup. */
  readonly description: string | null;
}

/** Structural pattern used to render an autoindex page. */
export type Layout = 'table' | 'pre' | 'list';

/**
 * Result of one parse call.
 */
export interface ParsedListing {
  /** Path the page describes, taken from its title or heading. */
  cwd: string | null;
  /** Entries in document order. Duplicated names are possible. */
  listing: FileEntry[];
  /** Strategy that produced {@link listing}; `null` when no layout applied. */
  layout: Layout | null;
}

/**
 * A parsed listing fetched over HTTP.
 */
export interface RemoteListing extends ParsedListing {
  /** URL that was requested. */
  url: string;
  /** Final directory URL after redirects, always ending in `/`. */
  baseUrl: string;
}

/**
 * Entry discovered while walking a remote tree.
 */
export interface RemoteEntry extends FileEntry {
  /** Absolute URL of the entry. */
  readonly url: string;
  /** Path relative to the walked root, e.g. `docs/guide.pdf`. */
  readonly path: string;
}

/**
 * Metadata obtained from a HEAD request.
 */
export interface RemoteStat {
  isDirectory: boolean;
  size: number | null;
  /** Epoch seconds from `Last-Modified`. */
  mtime: number | null;
  /** Server advertised byte ranges. */
  seekable: boolean;
}
