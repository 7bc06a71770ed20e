import fetch, { Headers, RequestInit, Response } from 'node-fetch';
import { DEFAULT_USER_AGENT } from '../../globalConfig';

/** Signature of the underlying fetch implementation. */
export type FetchFn = (url: string, init?: RequestInit) => Promise<Response>;

export interface ListingFetchOptions {
  userAgent?: string;
  /** Milliseconds; `0` disables the timeout. */
  timeout?: number;
}

/**
 * Thin wrapper around **`node-fetch`** that
 * 1. applies a consistent user-agent;
 * 2. applies a request timeout;
 * 3. follows redirects for GET and leaves them to the caller for HEAD.
 */
export class ListingFetch {
  private readonly userAgent: string;
  private readonly timeout: number;

  /**
   * @param options Request defaults.
   * @param client  Fetch implementation, `node-fetch` unless injected.
   */
  constructor(
    options: ListingFetchOptions = {},
    private readonly client: FetchFn = fetch,
  ) {
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
    this.timeout = options.timeout ?? 30_000;
  }

  /**
   * Sends a **GET** request.
   *
   * @param url   Absolute target URL.
   * @param init  Optional fetch options (overrides defaults).
   */
  async get(url: string, init: RequestInit = {}): Promise<Response> {
    return this.client(url, {
      ...init,
      redirect: init.redirect ?? 'follow',
      timeout: init.timeout ?? this.timeout,
      headers: this.headers(init),
    });
  }

  /**
   * Sends a **HEAD** request without following redirects,
   * so a `301` to `name/` can be told apart from a file.
   */
  async head(url: string, init: RequestInit = {}): Promise<Response> {
    return this.client(url, {
      ...init,
      method: 'HEAD',
      redirect: init.redirect ?? 'manual',
      timeout: init.timeout ?? this.timeout,
      headers: this.headers(init),
    });
  }

  private headers(init: RequestInit): Headers {
    const headers = new Headers(init.headers);
    if (!headers.has('User-Agent')) {headers.set('User-Agent', this.userAgent);}
    return headers;
  }
}
