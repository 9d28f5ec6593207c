/**
 * Perceptual hashes (pHash) for image files
 */

import sharp from 'sharp';
import pLimit from 'p-limit';
import { BitFingerprint } from './fingerprint.js';
import { AppError, Logger, errorCode, errorMessage } from './logger.js';
import { ProgressTracker, type ProgressStream } from './progress.js';
import type { Item, ItemFailure } from './types.js';

const logger = new Logger({ context: 'perceptual-hash' });

export const DEFAULT_HASH_SIZE = 16;

/** The image is sampled at this multiple of the hash size before the DCT */
export const HIGH_FREQUENCY_FACTOR = 4;

/**
 * Top-left `keep x keep` block of the (unnormalised) 2-D DCT-II of a
 * row-major `size x size` image, row-major
 */
export function lowFrequencyDct(pixels: ArrayLike<number>, size: number, keep: number): number[] {
  const cosines = Array.from({ length: keep }, (_, k) =>
    Float64Array.from({ length: size }, (_, n) => Math.cos((Math.PI * k * (2 * n + 1)) / (2 * size)))
  );

  // Down the columns first, keeping only the low vertical frequencies
  const columns = new Float64Array(keep * size);
  for (let k = 0; k < keep; k++) {
    for (let x = 0; x < size; x++) {
      let sum = 0;
      for (let y = 0; y < size; y++) {
        sum += pixels[y * size + x] * cosines[k][y];
      }
      columns[k * size + x] = sum;
    }
  }

  const block: number[] = [];
  for (let k = 0; k < keep; k++) {
    for (let l = 0; l < keep; l++) {
      let sum = 0;
      for (let x = 0; x < size; x++) {
        sum += columns[k * size + x] * cosines[l][x];
      }
      block.push(sum);
    }
  }
  return block;
}

function median(values: ReadonlyArray<number>): number {
  const sorted = [...values].sort((a, b) => a - b);
  const middle = sorted.length >> 1;
  return sorted.length % 2 === 0 ? (sorted[middle - 1] + sorted[middle]) / 2 : sorted[middle];
}

/**
 * Shrink to a `4 * hashSize` square greyscale image, ignoring aspect ratio,
 * take its DCT and set one bit per low-frequency coefficient above their
 * median. The result has `hashSize * hashSize` bits.
 */
export async function computePerceptualHash(
  imagePath: string,
  hashSize: number = DEFAULT_HASH_SIZE
): Promise<BitFingerprint> {
  if (!Number.isInteger(hashSize) || hashSize < 2) {
    throw new AppError(`Hash size must be an integer >= 2, got ${hashSize}`, 'INVALID_HASH_SIZE', 400);
  }

  const size = hashSize * HIGH_FREQUENCY_FACTOR;
  const { data, info } = await sharp(imagePath)
    .rotate()
    .flatten({ background: '#ffffff' })
    .greyscale()
    .resize(size, size, { fit: 'fill' })
    .raw()
    .toBuffer({ resolveWithObject: true });

  const luminance = Float64Array.from({ length: size * size }, (_, index) => data[index * info.channels]);
  const block = lowFrequencyDct(luminance, size, hashSize);
  const cutoff = median(block);

  return BitFingerprint.fromBits(block.map(value => value > cutoff));
}

export interface FingerprintOptions {
  hashSize?: number;
  concurrency?: number;
  showProgress?: boolean;
  /** Where the progress line is drawn (default stdout) */
  progressStream?: ProgressStream;
}

type HashOutcome = { path: string; fingerprint: BitFingerprint } | { path: string; error: unknown };

export interface FingerprintResult {
  items: Item<BitFingerprint>[];
  failures: ItemFailure[];
}

/**
 * Hash every image; unreadable files are reported and left out.
 * Items keep the order of `paths`.
 */
export async function fingerprintImages(
  paths: ReadonlyArray<string>,
  options: FingerprintOptions = {}
): Promise<FingerprintResult> {
  const { hashSize = DEFAULT_HASH_SIZE, concurrency = 4, showProgress, progressStream } = options;
  const limit = pLimit(concurrency);
  const progress = new ProgressTracker({
    total: paths.length,
    label: 'Processing images',
    unit: 'files',
    enabled: showProgress,
    stream: progressStream,
  });

  const outcomes = await Promise.all(
    paths.map(path =>
      limit(async (): Promise<HashOutcome> => {
        try {
          const fingerprint = await computePerceptualHash(path, hashSize);
          return { path, fingerprint };
        } catch (error) {
          return { path, error };
        } finally {
          progress.increment();
        }
      })
    )
  );
  progress.complete();

  const items: Item<BitFingerprint>[] = [];
  const failures: ItemFailure[] = [];

  for (const outcome of outcomes) {
    if ('fingerprint' in outcome) {
      items.push({ path: outcome.path, fingerprint: outcome.fingerprint });
      continue;
    }
    const reason = errorMessage(outcome.error);
    logger.warn(`Error loading image ${outcome.path}: ${reason}`);
    failures.push({ path: outcome.path, reason, code: errorCode(outcome.error) });
  }

  return { items, failures };
}
