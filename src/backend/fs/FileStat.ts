import { constants } from 'fs';
import { FileEntry } from '../models/Models';
import { toEpochSeconds } from '../parser/DateTimeParser';

/**
 * `stat`-like view of a listing entry, for consumers that expose a remote
 * listing as a read-only filesystem.
 */
export interface FileStat {
  mode: number;
  nlink: number;
  uid: number;
  gid: number;
  size: number;
  /** Epoch seconds. */
  atime: number;
  mtime: number;
  ctime: number;
}

const DIRECTORY_MODE = constants.S_IFDIR | 0o555;
const FILE_MODE = constants.S_IFREG | 0o444;
const SIZE_UNITS = ['', 'K', 'M', 'G', 'T', 'P', 'E', 'Z'];

/**
 * Maps an entry to filesystem metadata. Directories are entries whose
 * name ends in `/`; missing times fall back to `fallbackMtime`.
 */
export function toFileStat(entry: FileEntry, fallbackMtime = 0): FileStat {
  const isDirectory = entry.name.endsWith('/');
  const time = entry.modified ? toEpochSeconds(entry.modified) : fallbackMtime;
  return {
    mode: isDirectory ? DIRECTORY_MODE : FILE_MODE,
    nlink: isDirectory ? 2 : 1,
    uid: 0,
    gid: 0,
    size: entry.size ?? 0,
    atime: time,
    mtime: time,
    ctime: time,
  };
}

/** `482`, `1.5K`, `12.0M`… */
export function humanSize(bytes: number): string {
  let value = bytes;
  for (const unit of SIZE_UNITS) {
    if (Math.abs(value) < 1024) {
      return unit ? `${value.toFixed(1)}${unit}` : String(Math.trunc(value));
    }
    value /= 1024;
  }
  return `${value.toFixed(1)}Y`;
}

/**
 * Parses an HTTP date header (`Last-Modified`).
 *
 * @returns Epoch seconds, or `null` when absent or unreadable.
 */
export function parseHttpDate(value: string | null | undefined): number | null {
  if (!value) {return null;}
  const millis = Date.parse(value);
  return Number.isNaN(millis) ? null : Math.floor(millis / 1000);
}
