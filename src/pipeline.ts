/**
 * Entry operations of the duplicate finder: cluster, materialize,
 * reconcile-and-clean, plus the three CLI actions built on them
 */

import { resolve } from 'path';
import { Cleaner } from './cleaner.js';
import { MAX_GROUP_SIZE, splitOversizedGroups } from './cluster-splitter.js';
import type { DedupeConfig } from './config.js';
import { DeletionReconciler } from './deletion-reconciler.js';
import { buildGroups } from './group-builder.js';
import { findImageFiles } from './image-finder.js';
import { Logger } from './logger.js';
import { MappingStore } from './mapping-store.js';
import { materialize, type MaterializeOptions } from './materializer.js';
import { fingerprintImages } from './perceptual-hash.js';
import { findSimilarPairs } from './similarity.js';
import type {
  CleanupSummary,
  Fingerprint,
  Group,
  Item,
  ItemFailure,
  MaterializeResult,
  ReconcileResult,
} from './types.js';

const logger = new Logger({ context: 'pipeline' });

export interface ClusterOptions {
  maxGroupSize?: number;
}

/**
 * Similar pairs -> connected groups -> oversized groups split
 */
export function cluster<F extends Fingerprint<F>>(
  items: ReadonlyArray<Item<F>>,
  threshold: number,
  options: ClusterOptions = {}
): Group[] {
  const pairs = findSimilarPairs(items, threshold);
  if (pairs.length === 0) {
    logger.info('No similar images found', { items: items.length, threshold });
    return [];
  }
  logger.info(`Similar pairs found: ${pairs.length}`);

  const groups = buildGroups(pairs);
  const finalGroups = splitOversizedGroups(groups, pairs, options.maxGroupSize ?? MAX_GROUP_SIZE);

  logger.info(`Groups created: ${finalGroups.length}`, {
    sizes: finalGroups.map(group => group.length),
  });
  return finalGroups;
}

export { materialize };

export interface ReconcileAndCleanOptions {
  deletionListPath?: string;
}

export interface ReconcileAndCleanSummary {
  reconcile: ReconcileResult;
  cleanup: CleanupSummary | null;
}

/**
 * Infer deletions from the output tree and delete the matching originals.
 * The cleaner only runs on a list written by this reconciliation.
 */
export async function reconcileAndClean(
  mappingStore: MappingStore,
  outputRoot: string,
  options: ReconcileAndCleanOptions = {}
): Promise<ReconcileAndCleanSummary> {
  const reconciler = new DeletionReconciler({
    mappingStore,
    outputRoot,
    deletionListPath: options.deletionListPath ?? './to_delete.txt',
  });

  const reconcile = await reconciler.reconcile();
  if (reconcile.status !== 'written') {
    return { reconcile, cleanup: null };
  }

  const cleanup = await new Cleaner(reconciler.getDeletionListPath()).clean();
  return { reconcile, cleanup };
}

export type FindStage = 'no-images' | 'no-fingerprints' | 'no-groups' | 'saved';

export interface FindResult {
  stage: FindStage;
  imagesFound: number;
  fingerprinted: number;
  groups: Group[];
  fingerprintFailures: ItemFailure[];
  materialized: MaterializeResult | null;
}

export interface FindOptions {
  showProgress?: boolean;
}

/**
 * `find`: scan, fingerprint, cluster and copy groups for review
 */
export async function findDuplicates(config: DedupeConfig, options: FindOptions = {}): Promise<FindResult> {
  const { paths, clustering } = config;
  const inputDir = resolve(paths.inputDir);
  const outputDir = resolve(paths.outputDir);

  logger.info('=== Duplicate Image Finder ===', {
    input: inputDir,
    output: outputDir,
    threshold: clustering.threshold,
  });

  const result: FindResult = {
    stage: 'no-images',
    imagesFound: 0,
    fingerprinted: 0,
    groups: [],
    fingerprintFailures: [],
    materialized: null,
  };

  const imageFiles = await findImageFiles(inputDir, { exclude: [outputDir] });
  result.imagesFound = imageFiles.length;
  if (imageFiles.length === 0) {
    logger.error('No images found!');
    return result;
  }
  logger.info(`Images found: ${imageFiles.length}`);

  const { items, failures } = await fingerprintImages(imageFiles, {
    hashSize: clustering.hashSize,
    concurrency: config.materialize.concurrency,
    showProgress: options.showProgress,
  });
  result.fingerprinted = items.length;
  result.fingerprintFailures = failures;
  if (items.length === 0) {
    result.stage = 'no-fingerprints';
    logger.error('Failed to process any images!');
    return result;
  }
  logger.info(`Successfully processed: ${items.length} of ${imageFiles.length}`);

  result.groups = cluster(items, clustering.threshold, { maxGroupSize: clustering.maxGroupSize });
  if (result.groups.length === 0) {
    result.stage = 'no-groups';
    return result;
  }

  const materializeOptions: MaterializeOptions = {
    mappingStore: new MappingStore(paths.mappingFile),
    concurrency: config.materialize.concurrency,
    naming: config.materialize.naming,
  };
  result.materialized = await materialize(result.groups, outputDir, materializeOptions);
  result.stage = 'saved';

  logger.success(`Processing completed, results saved in ${outputDir}`);
  return result;
}

/**
 * `check-deleted`: write the list of originals whose copies were removed
 */
export async function checkDeleted(config: DedupeConfig): Promise<ReconcileResult> {
  const reconciler = new DeletionReconciler({
    mappingStore: new MappingStore(config.paths.mappingFile),
    outputRoot: config.paths.outputDir,
    deletionListPath: config.paths.deletionList,
  });
  return reconciler.reconcile();
}

/**
 * `cleanup`: delete the originals named in the deletion list
 */
export async function cleanupDeleted(config: DedupeConfig): Promise<CleanupSummary> {
  return new Cleaner(config.paths.deletionList).clean();
}
