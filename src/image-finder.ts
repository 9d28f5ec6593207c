/**
 * Locate image files under a directory tree
 */

import { statSync } from 'fs';
import { relative, resolve, isAbsolute } from 'path';
import fg from 'fast-glob';
import { Logger, errorMessage } from './logger.js';

const logger = new Logger({ context: 'image-finder' });

export const IMAGE_EXTENSIONS = ['.jpg', '.jpeg', '.png', '.bmp', '.gif', '.tiff', '.tif', '.webp'];

export interface FindImagesOptions {
  /** Directories to leave out, e.g. a results folder inside the input tree */
  exclude?: string[];
}

function isImagePath(path: string): boolean {
  const lowered = path.toLowerCase();
  return IMAGE_EXTENSIONS.some(ext => lowered.endsWith(ext));
}

/**
 * Absolute paths of every image below `directory`, sorted.
 * A missing or non-directory root is logged and yields no files.
 */
export async function findImageFiles(directory: string, options: FindImagesOptions = {}): Promise<string[]> {
  const root = resolve(directory);

  try {
    if (!statSync(root).isDirectory()) {
      logger.error(`Specified path is not a directory: ${root}`);
      return [];
    }
  } catch {
    logger.error(`Directory does not exist: ${root}`);
    return [];
  }

  const ignore = (options.exclude ?? [])
    .map(dir => relative(root, resolve(dir)))
    .filter(rel => rel !== '' && !rel.startsWith('..') && !isAbsolute(rel))
    .map(rel => `${fg.escapePath(rel.split('\\').join('/'))}/**`);

  try {
    const files = await fg('**/*', {
      cwd: root,
      onlyFiles: true,
      absolute: true,
      dot: false,
      followSymbolicLinks: false,
      ignore,
    });

    return files
      .filter(isImagePath)
      .map(file => resolve(file))
      .sort();
  } catch (error) {
    logger.error(`Error while searching files in ${root}: ${errorMessage(error)}`);
    return [];
  }
}
