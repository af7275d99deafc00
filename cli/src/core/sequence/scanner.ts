/**
 * Input directory scanner.
 *
 * Lists the image files of one directory (non-recursive) and returns them in
 * the total order every later step relies on: raw filename order.
 */

import { readdirSync, statSync } from 'node:fs';
import { extname, join, resolve } from 'node:path';
import { InputValidationError } from '../errors.js';
import type { ImageRecord } from './types.js';

/** Extensions accepted as scan images (compared lower-cased). */
export const IMAGE_EXTENSIONS: readonly string[] = ['.jpeg', '.jpg', '.png'];

export function isImageFile(filename: string): boolean {
  return IMAGE_EXTENSIONS.includes(extname(filename).toLowerCase());
}

/** Code-unit comparison: case-sensitive, independent of locale. */
export function compareFilenames(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function sortByFilename(records: readonly ImageRecord[]): ImageRecord[] {
  return [...records].sort((a, b) => compareFilenames(a.filename, b.filename));
}

/**
 * Scan a directory for images and return them sorted by filename.
 *
 * @throws InputValidationError if the path is missing or not a directory.
 */
export function scanImageDirectory(dirPath: string): ImageRecord[] {
  const base = resolve(dirPath);

  let entries: string[];
  try {
    if (!statSync(base).isDirectory()) {
      throw new InputValidationError(`Input is not a directory: ${dirPath}`);
    }
    entries = readdirSync(base);
  } catch (err) {
    if (err instanceof InputValidationError) throw err;
    throw new InputValidationError(`Input directory not found: ${dirPath}`);
  }

  const records: ImageRecord[] = [];
  for (const entry of entries) {
    if (!isImageFile(entry)) continue;

    const fullPath = join(base, entry);
    let stat;
    try {
      stat = statSync(fullPath);
    } catch {
      continue; // Vanished or inaccessible between readdir and stat
    }
    if (!stat.isFile()) continue;

    records.push({ filename: entry, path: fullPath, sizeBytes: stat.size });
  }

  return sortByFilename(records);
}
