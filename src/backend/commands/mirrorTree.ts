import { RemoteEntry } from '../models/Models';
import { toEpochSeconds } from '../parser/DateTimeParser';
import { DownloadItem, DownloadService, ensureDir } from '../services/DownloadService';
import { ListingService, WalkOptions } from '../services/ListingService';
import { OutputChannel } from '../../utils/OutputChannel';
import { localPath } from '../../utils/pathUtils';

const log = new OutputChannel('mirror');

/** Local layout of a mirrored tree. */
export interface MirrorPlan {
  directories: string[];
  files: DownloadItem[];
}

/**
 * Maps walked entries to local folders and download jobs below `targetDir`.
 */
export function planMirror(entries: RemoteEntry[], targetDir: string): MirrorPlan {
  const plan: MirrorPlan = { directories: [], files: [] };
  for (const entry of entries) {
    const target = localPath(targetDir, entry.path);
    if (entry.name.endsWith('/')) {
      plan.directories.push(target);
    } else {
      plan.files.push({
        url: entry.url,
        path: target,
        mtime: entry.modified ? toEpochSeconds(entry.modified) : null,
      });
    }
  }
  return plan;
}

/**
 * Copies a remote directory tree to `targetDir`:
 * – Walks the listing pages
 * – Creates the folder structure
 * – Downloads all files
 *
 * @returns Number of files that could not be downloaded.
 */
export async function mirrorTree(
  listing: ListingService,
  downloads: DownloadService,
  url: string,
  targetDir: string,
  options: WalkOptions = {},
): Promise<number> {
  /* ── discover the tree ────────────────────────────────────── */
  const entries = await listing.walk(url, options);
  const plan = planMirror(entries, targetDir);
  log.info(`${plan.files.length} files in ${plan.directories.length} folders`);

  /* ── create folders, then fetch files ─────────────────────── */
  ensureDir(targetDir);
  plan.directories.forEach(ensureDir);

  let failed = 0;
  const saved = await downloads.downloadAll(plan.files, (item, reason) => {
    failed += 1;
    log.warn(`Download failed: ${item.url} (${reason})`);
  });
  log.info(`Saved ${saved} files to ${targetDir}`);
  return failed;
}
