import * as path from 'path';

/**
 * Replace illegal characters in a name to make it filesystem-safe.
 */
export function safe(name: string): string {
  let sanitized = name.replace(/[<>:"/\\|?*\x00-\x1F]/g, '_');

  const reservedWords = ['CON', 'PRN', 'AUX', 'NUL',
    'COM1', 'COM2', 'COM3', 'COM4', 'COM5', 'COM6', 'COM7', 'COM8', 'COM9',
    'LPT1', 'LPT2', 'LPT3', 'LPT4', 'LPT5', 'LPT6', 'LPT7', 'LPT8', 'LPT9'];
  if (reservedWords.includes(sanitized.toUpperCase())) {
    sanitized = '_' + sanitized;
  }

  sanitized = sanitized.replace(/^[ .]+|[ .]+$/g, '');
  if (!sanitized) {sanitized = '_';}

  // 255 is the common per-segment limit
  return sanitized.substring(0, 255);
}

/**
 * Turns a `/`-separated remote path (`docs/My File.pdf`, `img/`) into a
 * local path below `root`, sanitising every segment.
 */
export function localPath(root: string, remotePath: string): string {
  const segments = remotePath
    .split('/')
    .filter((segment) => segment !== '')
    .map(safe);
  return path.join(root, ...segments);
}
