import * as fs from 'fs';
import * as path from 'path';
import { Readable, Writable } from 'stream';
import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import { RequestInit, Response } from 'node-fetch';
import { FetchFn } from '../backend/http/ListingFetch';
import { LogLevel, OutputChannel } from '../utils/OutputChannel';

const FIXTURES = path.join(__dirname, 'fixtures');

export function readFixture(name: string): string {
  return fs.readFileSync(path.join(FIXTURES, name), 'utf8');
}

export function loadFixture(name: string): CheerioAPI {
  return cheerio.load(readFixture(name));
}

/** Collects everything written to it. */
export class MemoryStream extends Writable {
  chunks: string[] = [];

  override _write(chunk: Buffer | string, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    this.chunks.push(chunk.toString());
    callback();
  }

  get text(): string {
    return this.chunks.join('');
  }
}

/** Routes log lines into a {@link MemoryStream}. */
export function captureLogs(level: LogLevel = 'debug'): MemoryStream {
  const sink = new MemoryStream();
  OutputChannel.configure({ level, sink });
  return sink;
}

type Route = string | (() => Response);

/**
 * In-process stand-in for a web server: GETs answer with the route's HTML
 * (or the route's own response), unknown URLs with 404.
 */
export function fakeServer(routes: Record<string, Route>): FetchFn {
  return async (url: string, init?: RequestInit): Promise<Response> => {
    const route = routes[url];
    if (route === undefined) {
      return new Response('', { status: 404, statusText: 'Not Found', url });
    }
    if (typeof route === 'function') {return route();}
    const body = init?.method === 'HEAD' ? '' : route;
    return new Response(body, { status: 200, url, headers: { 'Content-Type': 'text/html' } });
  };
}

/** Streamed file response, as `node-fetch` hands out for real downloads. */
export function fileResponse(content: string): Response {
  return new Response(Readable.from([Buffer.from(content)]), { status: 200 });
}
