/**
 * @file sanitize.ts
 * @module utils/sanitize
 * @author modsearch contributors
 * @created 2026-10-18
 * @license MIT
 *
 * @fileoverview Filename sanitization for files written to the download directory.
 */

/**
 * Reduce a server-provided file name to its final path component.
 *
 * Handles both `/` and `\` separators and ignores trailing ones, so
 * `mods/../../evil.jar` and `C:\\mods\\thing.jar\\` become `evil.jar` and
 * `thing.jar`. Control characters are replaced with `_`.
 *
 * @param name - File name as sent by the server
 * @returns Basename safe to join onto a local directory
 */
export function toLocalFileName(name: string): string {
  const parts = name
    .replace(/[\x00-\x1f\x7f]/g, '_')
    .split(/[/\\]+/)
    .filter(part => part !== '');
  const last = parts[parts.length - 1] ?? '';

  if (last === '' || last === '.' || last === '..') {
    return 'unnamed';
  }
  return last;
}

/**
 * Make an item slug usable as a single directory name.
 */
export function toDirectoryName(slug: string): string {
  const sanitized = slug
    .replace(/[<>:"/\\|?*]/g, '_')
    .replace(/\s+/g, '_')
    .replace(/^\.+/, '');

  return sanitized || 'unnamed';
}
