/**
 * Path Utilities
 */

import { basename, extname } from 'node:path';

const UNSAFE_CHARACTERS = /[\u0000-\u001f\u007f<>:"/\\|?*]+/g;

/**
 * Make a string usable as one path segment: unsafe characters collapse
 * to `_`, leading and trailing dots go, and the result stays under `maxLength`.
 */
export function sanitizeFilename(name: string, maxLength = 120): string {
  return name
    .replace(UNSAFE_CHARACTERS, '_')
    .trim()
    .replace(/^\.+|\.+$/g, '')
    .slice(0, maxLength);
}

/** Lowercase extension without the dot; '' when there is none */
export function getExtension(filePath: string): string {
  return extname(filePath).slice(1).toLowerCase();
}

/** File name without directory or extension */
export function getBasename(filePath: string): string {
  return basename(filePath, extname(filePath));
}

/**
 * `/dir/name.webm` with `m4a` becomes `/dir/name.m4a`
 */
export function replaceExtension(filePath: string, extension: string): string {
  const current = extname(filePath);
  const stem = current ? filePath.slice(0, filePath.length - current.length) : filePath;
  return `${stem}.${extension.replace(/^\./, '')}`;
}
