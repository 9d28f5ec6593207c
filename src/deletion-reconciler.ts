/**
 * Work out which originals the user rejected by deleting their copies
 */

import { existsSync, mkdirSync, readFileSync, rmSync, statSync, writeFileSync } from 'fs';
import { dirname, resolve } from 'path';
import fg from 'fast-glob';
import { Logger, errorMessage } from './logger.js';
import { MappingStore } from './mapping-store.js';
import type { Mapping, ReconcileResult } from './types.js';

const logger = new Logger({ context: 'DeletionReconciler' });

/**
 * Every file currently under `outputRoot`, as resolved absolute paths.
 * Always walks the tree again; nothing is cached between calls.
 */
export async function listOutputFiles(outputRoot: string): Promise<Set<string>> {
  const files = await fg('**/*', {
    cwd: resolve(outputRoot),
    onlyFiles: true,
    dot: true,
    absolute: true,
    followSymbolicLinks: false,
    unique: true,
  });

  return new Set(files.map(file => resolve(file)));
}

/**
 * Originals whose recorded copy is no longer present, in mapping order
 */
export function findDeletions(mapping: Mapping, existingFiles: ReadonlySet<string>): string[] {
  const deletions: string[] = [];

  for (const [original, destination] of mapping) {
    if (!existingFiles.has(resolve(destination))) {
      deletions.push(original);
    }
  }

  return deletions;
}

export function writeDeletionList(listPath: string, paths: ReadonlyArray<string>): void {
  mkdirSync(dirname(resolve(listPath)), { recursive: true });
  writeFileSync(listPath, paths.map(path => `${path}\n`).join(''), 'utf-8');
}

/**
 * Paths from a newline-delimited list, or null when there is no list.
 * An unreadable list is reported and read as no list.
 */
export function readDeletionList(listPath: string): string[] | null {
  if (!existsSync(listPath)) {
    return null;
  }

  let content: string;
  try {
    content = readFileSync(listPath, 'utf-8');
  } catch (error) {
    logger.warn(`Failed to read deletion list ${listPath}: ${errorMessage(error)}`);
    return null;
  }

  return content
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(line => line.length > 0);
}

export interface DeletionReconcilerOptions {
  mappingStore: MappingStore;
  outputRoot: string;
  deletionListPath: string;
}

export class DeletionReconciler {
  private mappingStore: MappingStore;
  private outputRoot: string;
  private deletionListPath: string;

  constructor(options: DeletionReconcilerOptions) {
    this.mappingStore = options.mappingStore;
    this.outputRoot = resolve(options.outputRoot);
    this.deletionListPath = resolve(options.deletionListPath);
  }

  getDeletionListPath(): string {
    return this.deletionListPath;
  }

  /**
   * Compare the stored mapping with the live output tree and write the
   * deletion list. When nothing was removed no list is written, and a list
   * left over from an earlier check is removed.
   */
  async reconcile(): Promise<ReconcileResult> {
    const mapping = this.mappingStore.load();
    if (!mapping) {
      return { status: 'no-mapping', deletions: [], mappingSize: 0, remainingFiles: 0 };
    }

    if (!existsSync(this.outputRoot) || !statSync(this.outputRoot).isDirectory()) {
      logger.warn(`Results folder ${this.outputRoot} not found`);
      return { status: 'no-output', deletions: [], mappingSize: mapping.size, remainingFiles: 0 };
    }

    const existing = await listOutputFiles(this.outputRoot);
    logger.info(`Found files in ${this.outputRoot}: ${existing.size}`);

    const deletions = findDeletions(mapping, existing);
    for (const original of deletions) {
      logger.debug(`Copy removed, marking original for deletion: ${original}`, {
        copy: mapping.get(original),
      });
    }

    const stats = {
      saved: mapping.size,
      remaining: existing.size,
      marked: deletions.length,
    };

    if (deletions.length === 0) {
      rmSync(this.deletionListPath, { force: true });
      logger.info('No files to delete', stats);
      return { status: 'none', deletions, mappingSize: mapping.size, remainingFiles: existing.size };
    }

    writeDeletionList(this.deletionListPath, deletions);
    logger.info(`Wrote ${deletions.length} paths for deletion to ${this.deletionListPath}`, stats);

    return {
      status: 'written',
      deletions,
      mappingSize: mapping.size,
      remainingFiles: existing.size,
      deletionListPath: this.deletionListPath,
    };
  }
}
