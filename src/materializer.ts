/**
 * Write similarity groups out as numbered folders of copies
 */

import { constants } from 'fs';
import { copyFile, mkdir, rm, stat, utimes } from 'fs/promises';
import { basename, join, relative, resolve, isAbsolute } from 'path';
import pLimit from 'p-limit';
import { AppError, Logger, errorCode, errorMessage } from './logger.js';
import { MappingStore } from './mapping-store.js';
import { pathToFilename, reserveFilename } from './safe-filename.js';
import type { Group, ItemFailure, Mapping, MaterializeResult } from './types.js';

const logger = new Logger({ context: 'materializer' });

export type NamingStrategy = 'full-path' | 'basename';

export interface MaterializeOptions {
  /** Where the mapping is written once every copy has settled */
  mappingStore?: MappingStore;
  /** Parallel copies (default 4) */
  concurrency?: number;
  /** `full-path` flattens the whole source path into the name (default) */
  naming?: NamingStrategy;
}

interface PlannedCopy {
  source: string;
  destination: string;
  groupNumber: number;
}

function isInside(parent: string, child: string): boolean {
  const rel = relative(parent, child);
  return rel === '' || (!rel.startsWith('..') && !isAbsolute(rel));
}

function assertNoOverlap(groups: ReadonlyArray<Group>, outputRoot: string): void {
  for (const group of groups) {
    for (const source of group) {
      const absolute = resolve(source);
      if (isInside(outputRoot, absolute) || isInside(absolute, outputRoot)) {
        throw new AppError(
          `Output folder ${outputRoot} overlaps source file ${absolute}`,
          'OUTPUT_OVERLAPS_INPUT',
          400,
          { outputRoot, source: absolute }
        );
      }
    }
  }
}

/**
 * Recreate `outputRoot` and create `1..count` group folders inside it
 */
export async function createOutputFolders(outputRoot: string, count: number): Promise<string[]> {
  const root = resolve(outputRoot);

  await rm(root, { recursive: true, force: true });
  await mkdir(root, { recursive: true });
  logger.info(`Created results folder: ${root}`);

  const folders: string[] = [];
  for (let groupNumber = 1; groupNumber <= count; groupNumber++) {
    const folder = join(root, String(groupNumber));
    await mkdir(folder);
    folders.push(folder);
  }

  return folders;
}

async function isRegularFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch {
    return false;
  }
}

async function copyPreservingTimes(source: string, destination: string): Promise<void> {
  await copyFile(source, destination, constants.COPYFILE_EXCL);
  const { atime, mtime } = await stat(source);
  await utimes(destination, atime, mtime);
}

/**
 * Copy every group into its own numbered folder under `outputRoot`.
 *
 * The folder is wiped first; group numbers are not stable between runs.
 * Missing sources and failed copies are reported and skipped. The returned
 * mapping holds exactly the copies that exist, and is persisted only after
 * all of them have finished.
 */
export async function materialize(
  groups: ReadonlyArray<Group>,
  outputRoot: string,
  options: MaterializeOptions = {}
): Promise<MaterializeResult> {
  const { mappingStore, concurrency = 4, naming = 'full-path' } = options;
  const root = resolve(outputRoot);

  if (groups.length === 0) {
    logger.warn('No groups to save');
    return { mapping: new Map(), groupDirs: [], copied: 0, missing: [], failures: [] };
  }

  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new AppError(`Copy concurrency must be a positive integer, got ${concurrency}`, 'INVALID_CONCURRENCY', 400);
  }

  assertNoOverlap(groups, root);

  const groupDirs = await createOutputFolders(root, groups.length);
  const limit = pLimit(concurrency);

  const sources = groups.map(group => group.map(source => resolve(source)));
  const available = await Promise.all(
    sources.map(group => Promise.all(group.map(source => limit(() => isRegularFile(source)))))
  );

  const missing: string[] = [];
  const plan: PlannedCopy[] = [];

  sources.forEach((group, index) => {
    const taken = new Set<string>();
    group.forEach((source, position) => {
      if (!available[index][position]) {
        logger.warn(`File not found: ${source}`);
        missing.push(source);
        return;
      }

      const preferred = naming === 'basename' ? basename(source) : pathToFilename(source);
      const filename = reserveFilename(preferred, taken);
      plan.push({ source, destination: join(groupDirs[index], filename), groupNumber: index + 1 });
    });
  });

  const outcomes = await Promise.allSettled(
    plan.map(entry => limit(() => copyPreservingTimes(entry.source, entry.destination)))
  );

  const mapping: Mapping = new Map();
  const failures: ItemFailure[] = [];

  outcomes.forEach((outcome, index) => {
    const entry = plan[index];
    if (outcome.status === 'fulfilled') {
      mapping.set(entry.source, entry.destination);
      logger.debug(`${basename(entry.source)} -> ${entry.destination}`, { group: entry.groupNumber });
      return;
    }

    const reason = errorMessage(outcome.reason);
    logger.error(`Error copying ${entry.source}: ${reason}`);
    failures.push({ path: entry.source, reason, code: errorCode(outcome.reason) });
  });

  logger.info(`Total files copied: ${mapping.size}`, {
    groups: groups.length,
    missing: missing.length,
    failed: failures.length,
  });

  const result: MaterializeResult = {
    mapping,
    groupDirs,
    copied: mapping.size,
    missing,
    failures,
  };

  if (mappingStore) {
    mappingStore.save(mapping);
    result.mappingPath = mappingStore.getPath();
  }

  return result;
}
