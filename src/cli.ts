#!/usr/bin/env node
import fetch from 'node-fetch';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { listDirectory } from './backend/commands/listDirectory';
import { mirrorTree } from './backend/commands/mirrorTree';
import { walkTree } from './backend/commands/walkTree';
import { FetchFn, ListingFetch } from './backend/http/ListingFetch';
import { DownloadService } from './backend/services/DownloadService';
import { ListingService } from './backend/services/ListingService';
import { GlobalConfig, loadConfig } from './globalConfig';
import { OutputChannel } from './utils/OutputChannel';

const log = new OutputChannel('cli');

/** Flags shared by every command. */
interface CommonArgs {
  timeout?: number;
  userAgent?: string;
  verbose: boolean;
  si: boolean;
  concurrency?: number;
}

/** Flags override the environment. */
function resolveConfig(base: GlobalConfig, args: CommonArgs): GlobalConfig {
  return {
    timeout: args.timeout !== undefined ? args.timeout * 1000 : base.timeout,
    userAgent: args.userAgent ?? base.userAgent,
    concurrency: args.concurrency ?? base.concurrency,
    sizeUnits: args.si ? 'decimal' : base.sizeUnits,
    logLevel: args.verbose ? 'debug' : base.logLevel,
  };
}

function createServices(
  config: GlobalConfig,
  client: FetchFn,
): { http: ListingFetch; listing: ListingService } {
  OutputChannel.configure({ level: config.logLevel });
  const http = new ListingFetch({ userAgent: config.userAgent, timeout: config.timeout }, client);
  return { http, listing: new ListingService(http, { sizeUnits: config.sizeUnits }) };
}

/**
 * Runs the `autoindex` command line.
 *
 * @returns Process exit code.
 */
export async function main(
  argv: string[],
  out: NodeJS.WritableStream = process.stdout,
  client: FetchFn = fetch,
): Promise<number> {
  let exitCode = 0;
  const base = loadConfig();

  const run = async (task: () => Promise<boolean>): Promise<void> => {
    try {
      if (!(await task())) {exitCode = 1;}
    } catch (err) {
      log.error(err instanceof Error ? err.message : String(err));
      exitCode = 1;
    }
  };

  await yargs(hideBin(argv))
    .scriptName('autoindex')
    .usage('$0 <command> [options]')
    .option('timeout', { alias: 't', type: 'number', describe: 'HTTP request timeout in seconds' })
    .option('user-agent', { alias: 'u', type: 'string', describe: 'HTTP User-Agent' })
    .option('verbose', { alias: 'v', type: 'boolean', default: false, describe: 'Enable debug logging' })
    .option('si', { type: 'boolean', default: false, describe: 'Read K/M/G as powers of 1000' })
    .option('concurrency', { alias: 'c', type: 'number', describe: 'Parallel requests' })
    .command(
      ['ls <urls..>', '$0'],
      'Print the listing of one or more directory pages',
      (y) => y
        .positional('urls', { type: 'string', array: true, demandOption: true })
        .option('json', { type: 'boolean', default: false }),
      (args) => run(async () => {
        const { listing } = createServices(resolveConfig(base, args), client);
        return listDirectory(listing, args.urls, out, args.json);
      }),
    )
    .command(
      'tree <url>',
      'Print every path below a directory page',
      (y) => y
        .positional('url', { type: 'string', demandOption: true })
        .option('depth', { alias: 'd', type: 'number', describe: 'Levels to descend' })
        .option('json', { type: 'boolean', default: false }),
      (args) => run(async () => {
        const config = resolveConfig(base, args);
        const { listing } = createServices(config, client);
        await walkTree(listing, args.url, out, {
          maxDepth: args.depth,
          concurrency: config.concurrency,
          json: args.json,
        });
        return true;
      }),
    )
    .command(
      'mirror <url> <dir>',
      'Download a directory tree',
      (y) => y
        .positional('url', { type: 'string', demandOption: true })
        .positional('dir', { type: 'string', demandOption: true })
        .option('depth', { alias: 'd', type: 'number', describe: 'Levels to descend' }),
      (args) => run(async () => {
        const config = resolveConfig(base, args);
        const { http, listing } = createServices(config, client);
        const downloads = new DownloadService(http, config.concurrency);
        const failed = await mirrorTree(listing, downloads, args.url, args.dir, {
          maxDepth: args.depth,
          concurrency: config.concurrency,
        });
        return failed === 0;
      }),
    )
    .demandCommand(1)
    .strict()
    .help()
    .parseAsync();

  return exitCode;
}

if (require.main === module) {
  main(process.argv).then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      log.error(err instanceof Error ? err.message : String(err));
      process.exitCode = 1;
    },
  );
}
