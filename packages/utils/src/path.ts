/**
 * Path Utilities
 */

import { extname } from 'node:path';

/**
 * Sanitize a filename to be safe for filesystem
 */
export function sanitizeFilename(filename: string): string {
  return filename
    // Remove null bytes
    .replace(/\0/g, '')
    // Replace Windows reserved characters
    .replace(/[<>:"/\\|?*]/g, '_')
    // Replace control characters
    .replace(/[\x00-\x1f\x80-\x9f]/g, '')
    // Trim whitespace and dots
    .trim()
    .replace(/^\.+|\.+$/g, '')
    // Limit length (preserve extension)
    .substring(0, 200);
}

/**
 * Get file extension (lowercase, without dot)
 */
export function getExtension(filename: string): string {
  const ext = extname(filename);
  return ext.toLowerCase().replace(/^\./, '');
}

/**
 * Last segment of a remote path that may use either separator
 * (peers on Windows report `Music\\Artist\\track.flac`)
 */
export function remoteBasename(remotePath: string): string {
  const segments = remotePath.split(/[\\/]/).filter((segment) => segment.length > 0);
  return segments[segments.length - 1] ?? '';
}

/**
 * Last directory segment of a remote path, or empty when there is none
 */
export function remoteParentDir(remotePath: string): string {
  const segments = remotePath.split(/[\\/]/).filter((segment) => segment.length > 0);
  return segments.length > 1 ? segments[segments.length - 2] ?? '' : '';
}
