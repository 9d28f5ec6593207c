/**
 * Delete the originals named in a deletion list
 */

import { lstat, unlink } from 'fs/promises';
import { resolve } from 'path';
import { Logger, errorCode, errorMessage } from './logger.js';
import { readDeletionList } from './deletion-reconciler.js';
import type { CleanupSummary } from './types.js';

const logger = new Logger({ context: 'Cleaner' });

async function pathExists(path: string): Promise<boolean> {
  try {
    await lstat(path);
    return true;
  } catch (error) {
    if (errorCode(error) === 'ENOENT') {
      return false;
    }
    throw error;
  }
}

export class Cleaner {
  private deletionListPath: string;

  constructor(deletionListPath: string = './to_delete.txt') {
    this.deletionListPath = resolve(deletionListPath);
  }

  /**
   * Remove every listed file that still exists. Files already gone are
   * skipped; a failed removal is recorded and the rest of the list goes on.
   */
  async clean(): Promise<CleanupSummary> {
    const summary: CleanupSummary = {
      listFound: false,
      deleted: 0,
      skipped: 0,
      failed: 0,
      deletedPaths: [],
      skippedPaths: [],
      failures: [],
    };

    const paths = readDeletionList(this.deletionListPath);
    if (paths === null) {
      logger.warn(`Deletion list ${this.deletionListPath} not found`);
      return summary;
    }
    summary.listFound = true;

    for (const path of paths) {
      try {
        if (!(await pathExists(path))) {
          logger.warn(`File does not exist anymore: ${path}`);
          summary.skipped++;
          summary.skippedPaths.push(path);
          continue;
        }

        await unlink(path);
        logger.info(`Deleted file: ${path}`);
        summary.deleted++;
        summary.deletedPaths.push(path);
      } catch (error) {
        const reason = errorMessage(error);
        logger.error(`Error deleting ${path}: ${reason}`);
        summary.failed++;
        summary.failures.push({ path, reason, code: errorCode(error) });
      }
    }

    logger.info('Deletion result', {
      deleted: summary.deleted,
      skipped: summary.skipped,
      failed: summary.failed,
    });

    return summary;
  }
}
