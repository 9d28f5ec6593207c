/**
 * Filesystem-safe names for materialized copies
 */

import { basename, extname } from 'path';

export const MAX_FILENAME_LENGTH = 200;
export const FALLBACK_FILENAME = 'unknown_file';

/**
 * Flatten an absolute path into a single file name, so the copy still tells
 * where the original lives: `/photos/2019/beach.jpg` -> `photos_2019_beach.jpg`.
 * Anything but letters, digits, `_`, `.` and `-` becomes `_`; runs of `_`
 * collapse and edge underscores are trimmed. Names that end up empty or
 * longer than MAX_FILENAME_LENGTH fall back to the base name.
 */
export function pathToFilename(filePath: string): string {
  const safeName = filePath
    .replace(/[^\p{L}\p{N}_.-]/gu, '_')
    .replace(/_{2,}/g, '_')
    .replace(/^_+|_+$/g, '');

  if (safeName.length > 0 && safeName.length <= MAX_FILENAME_LENGTH) {
    return safeName;
  }

  return basename(filePath) || FALLBACK_FILENAME;
}

/**
 * `photo.jpg`, 2 -> `photo_2.jpg`
 */
export function withCollisionSuffix(filename: string, counter: number): string {
  const ext = extname(filename);
  const stem = ext ? filename.slice(0, -ext.length) : filename;
  return `${stem}_${counter}${ext}`;
}

/**
 * First name in `filename`, `stem_1.ext`, `stem_2.ext`, ... not yet in `taken`.
 * Comparison ignores case; `taken` holds lower-cased names.
 */
export function reserveFilename(filename: string, taken: Set<string>): string {
  let candidate = filename;
  let counter = 1;

  while (taken.has(candidate.toLowerCase())) {
    candidate = withCollisionSuffix(filename, counter);
    counter++;
  }

  taken.add(candidate.toLowerCase());
  return candidate;
}
