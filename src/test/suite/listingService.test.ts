import * as assert from 'assert';
import * as sinon from 'sinon';
import { Response } from 'node-fetch';
import { HttpStatusError } from '../../backend/errors';
import { ListingFetch } from '../../backend/http/ListingFetch';
import { ListingService } from '../../backend/services/ListingService';
import { OutputChannel } from '../../utils/OutputChannel';
import { captureLogs, fakeServer, readFixture } from '../helpers';

const ROOT = 'http://example.test/pub/';

function list(...hrefs: string[]): string {
  return `<ul>${hrefs.map((href) => `<li><a href="${href}">${href}</a></li>`).join('')}</ul>`;
}

const SITE = {
  [ROOT]: list('a.txt', 'docs/', 'broken/'),
  [`${ROOT}docs/`]: list('b.txt', 'deep/'),
  [`${ROOT}docs/deep/`]: list('c.txt'),
};

suite('ListingService Test Suite', () => {
  let logs: ReturnType<typeof captureLogs>;

  setup(() => {
    logs = captureLogs('warn');
  });

  teardown(() => {
    OutputChannel.configure({ level: 'info', sink: process.stderr });
  });

  suite('fetchListing', () => {
    test('parses the page against its final URL', async () => {
      const client = fakeServer({
        'http://example.test/pub': () =>
          new Response(readFixture('nginx.html'), { status: 200, url: ROOT }),
      });
      const service = new ListingService(new ListingFetch({}, client));

      const page = await service.fetchListing('http://example.test/pub');
      assert.strictEqual(page.url, 'http://example.test/pub');
      assert.strictEqual(page.baseUrl, ROOT);
      assert.strictEqual(page.cwd, '/pub/');
      assert.strictEqual(page.layout, 'pre');
      assert.deepStrictEqual(page.listing.map((entry) => entry.name), ['docs/', 'archive.tar.gz', 'My Notes.txt']);
    });

    test('applies the configured size units', async () => {
      const client = fakeServer({ [ROOT]: readFixture('apache-pre.html') });
      const service = new ListingService(new ListingFetch({}, client), { sizeUnits: 'decimal' });

      const listing = await service.ls(ROOT);
      assert.deepStrictEqual(listing.map((entry) => entry.size), [null, 1500, 12000000]);
    });

    test('rejects non-2xx responses', async () => {
      const client = fakeServer({
        [ROOT]: () => new Response('oops', { status: 500, statusText: 'Internal Server Error', url: ROOT }),
      });
      const service = new ListingService(new ListingFetch({}, client));

      await assert.rejects(service.fetchListing(ROOT), (err: unknown) => {
        assert.ok(err instanceof HttpStatusError);
        assert.strictEqual(err.status, 500);
        assert.strictEqual(err.message, `HTTP 500 Internal Server Error for ${ROOT}`);
        return true;
      });
    });
  });

  suite('stat', () => {
    test('reads file metadata from HEAD headers', async () => {
      const client = fakeServer({
        [`${ROOT}a.txt`]: () => new Response('', {
          status: 200,
          headers: {
            'Content-Length': '1234',
            'Last-Modified': 'Wed, 26 Apr 2023 14:10:00 GMT',
            'Accept-Ranges': 'bytes',
          },
        }),
      });
      const service = new ListingService(new ListingFetch({}, client));

      assert.deepStrictEqual(await service.stat(`${ROOT}a.txt`), {
        isDirectory: false,
        size: 1234,
        mtime: 1682518200,
        seekable: true,
      });
    });

    test('treats redirects as directories and 404 as missing', async () => {
      const client = fakeServer({
        [`${ROOT}docs`]: () => new Response('', { status: 301, headers: { Location: `${ROOT}docs/` } }),
      });
      const service = new ListingService(new ListingFetch({}, client));

      assert.deepStrictEqual(await service.stat(`${ROOT}docs`), {
        isDirectory: true,
        size: null,
        mtime: null,
        seekable: false,
      });
      assert.strictEqual(await service.stat(`${ROOT}missing`), null);
    });

    test('sends HEAD without following redirects', async () => {
      const client = sinon.spy(fakeServer({ [ROOT]: '' }));
      const service = new ListingService(new ListingFetch({}, client));

      await service.stat(ROOT);
      sinon.assert.calledOnce(client);
      const init = client.firstCall.args[1];
      assert.strictEqual(init?.method, 'HEAD');
      assert.strictEqual(init?.redirect, 'manual');
    });

    test('rejects server errors', async () => {
      const client = fakeServer({ [ROOT]: () => new Response('', { status: 503 }) });
      const service = new ListingService(new ListingFetch({}, client));
      await assert.rejects(service.stat(ROOT), HttpStatusError);
    });
  });

  suite('walk', () => {
    test('lists every directory below the root in document order', async () => {
      const service = new ListingService(new ListingFetch({}, fakeServer(SITE)));

      const entries = await service.walk(ROOT);
      assert.deepStrictEqual(entries.map((entry) => entry.path), [
        'a.txt',
        'docs/',
        'docs/b.txt',
        'docs/deep/',
        'docs/deep/c.txt',
        'broken/',
      ]);
      assert.strictEqual(entries[4].url, `${ROOT}docs/deep/c.txt`);
    });

    test('logs and skips sub-directories that fail to load', async () => {
      const service = new ListingService(new ListingFetch({}, fakeServer(SITE)));

      await service.walk(ROOT);
      assert.ok(logs.text.includes(
        `[WARN] [ListingService] Skipping ${ROOT}broken/: HTTP 404 Not Found for ${ROOT}broken/\n`,
      ));
    });

    test('stops at the requested depth', async () => {
      const service = new ListingService(new ListingFetch({}, fakeServer(SITE)));

      const shallow = await service.walk(ROOT, { maxDepth: 1 });
      assert.deepStrictEqual(shallow.map((entry) => entry.path), ['a.txt', 'docs/', 'broken/']);

      const two = await service.walk(ROOT, { maxDepth: 2 });
      assert.deepStrictEqual(two.map((entry) => entry.path), [
        'a.txt',
        'docs/',
        'docs/b.txt',
        'docs/deep/',
        'broken/',
      ]);
    });

    test('propagates a failing root', async () => {
      const service = new ListingService(new ListingFetch({}, fakeServer({})));
      await assert.rejects(service.walk(ROOT), HttpStatusError);
    });

    test('accepts a root URL without a trailing slash', async () => {
      const client = sinon.spy(fakeServer(SITE));
      const service = new ListingService(new ListingFetch({}, client));

      const entries = await service.walk('http://example.test/pub/docs/deep');
      assert.strictEqual(client.firstCall.args[0], `${ROOT}docs/deep/`);
      assert.deepStrictEqual(entries.map((entry) => entry.path), ['c.txt']);
    });
  });
});
