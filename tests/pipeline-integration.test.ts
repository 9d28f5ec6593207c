import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { copyFileSync, existsSync, mkdirSync, readdirSync, rmSync, unlinkSync, writeFileSync } from 'fs';
import { join } from 'path';
import sharp from 'sharp';
import { DEFAULT_CONFIG, type DedupeConfig } from '../src/config.js';
import { MappingStore } from '../src/mapping-store.js';
import { checkDeleted, cleanupDeleted, cluster, findDuplicates, materialize, reconcileAndClean } from '../src/pipeline.js';
import { lineItems } from './helpers/fake-fingerprints.js';

describe('review workflow', () => {
  const tempDir = join(process.cwd(), '.test-tmp', 'pipeline-integration');
  const inputDir = join(tempDir, 'input');
  const outputDir = join(tempDir, 'output');
  const store = () => new MappingStore(join(tempDir, 'info.json'));
  const listPath = join(tempDir, 'to_delete.txt');

  function photo(name: string): string {
    const path = join(inputDir, name);
    writeFileSync(path, name);
    return path;
  }

  beforeEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
    mkdirSync(inputDir, { recursive: true });
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('should delete exactly the originals whose copies were removed', async () => {
    const p1 = photo('p1.jpg');
    const p2 = photo('p2.jpg');
    const p3 = photo('p3.jpg');
    const p4 = photo('p4.jpg');

    const groups = cluster(lineItems({ [p1]: 0, [p2]: 5, [p3]: 10, [p4]: 100 }), 5);
    expect(groups).toEqual([[p1, p2, p3]]);

    const { mapping } = await materialize(groups, outputDir, { mappingStore: store() });
    expect(readdirSync(join(outputDir, '1'))).toHaveLength(3);

    const copyOfP2 = mapping.get(p2);
    expect(copyOfP2).toBeDefined();
    unlinkSync(copyOfP2 ?? '');

    const { reconcile, cleanup } = await reconcileAndClean(store(), outputDir, { deletionListPath: listPath });

    expect(reconcile.deletions).toEqual([p2]);
    expect(cleanup?.deletedPaths).toEqual([p2]);
    expect(existsSync(p2)).toBe(false);
    expect([p1, p3, p4].every(path => existsSync(path))).toBe(true);
  });

  it('should not touch originals when no copy was removed', async () => {
    const a = photo('a.jpg');
    const b = photo('b.jpg');
    await materialize(cluster(lineItems({ [a]: 1, [b]: 2 }), 1), outputDir, { mappingStore: store() });

    const { reconcile, cleanup } = await reconcileAndClean(store(), outputDir, { deletionListPath: listPath });

    expect(reconcile.status).toBe('none');
    expect(cleanup).toBeNull();
    expect(existsSync(a) && existsSync(b)).toBe(true);
  });

  it('should split a large chain into capped clusters before copying', async () => {
    const positions: Record<string, number> = {};
    for (let index = 0; index < 25; index++) {
      positions[photo(`chain-${String(index).padStart(2, '0')}.jpg`)] = index;
    }

    const groups = cluster(lineItems(positions), 1, { maxGroupSize: 20 });
    const result = await materialize(groups, outputDir);

    expect(groups.length).toBeGreaterThan(1);
    expect(groups.every(group => group.length >= 2 && group.length <= 20)).toBe(true);
    expect(readdirSync(outputDir)).toHaveLength(groups.length);
    expect(result.copied).toBe(groups.flat().length);
  });

  describe('on real images', () => {
    async function scene(path: string, inverted: boolean): Promise<string> {
      const size = 64;
      const pixels = Buffer.alloc(size * size);
      for (let y = 0; y < size; y++) {
        for (let x = 0; x < size; x++) {
          const u = x / size;
          const v = y / size;
          const value = Math.round(
            128 + 70 * Math.sin(2 * Math.PI * (1.5 * u + 0.5 * v)) + 40 * Math.cos(2 * Math.PI * (0.7 * v - 1.2 * u))
          );
          pixels[y * size + x] = inverted ? 255 - value : value;
        }
      }
      await sharp(pixels, { raw: { width: size, height: size, channels: 1 } }).png().toFile(path);
      return path;
    }

    function config(): DedupeConfig {
      return {
        ...DEFAULT_CONFIG,
        paths: {
          inputDir,
          outputDir,
          mappingFile: join(tempDir, 'info.json'),
          deletionList: listPath,
          logFile: join(tempDir, 'app.log'),
        },
        clustering: { threshold: 4, hashSize: 8, maxGroupSize: 20 },
      };
    }

    it('should group duplicates, then remove the rejected original', async () => {
      const original = await scene(join(inputDir, 'sunrise.png'), false);
      const duplicate = join(inputDir, 'sunrise-copy.png');
      copyFileSync(original, duplicate);
      const different = await scene(join(inputDir, 'sunset.png'), true);

      const found = await findDuplicates(config(), { showProgress: false });

      expect(found.stage).toBe('saved');
      expect(found.imagesFound).toBe(3);
      expect(found.groups).toEqual([[duplicate, original]]);

      const copy = found.materialized?.mapping.get(duplicate);
      expect(copy).toBeDefined();
      unlinkSync(copy ?? '');

      const reconciled = await checkDeleted(config());
      expect(reconciled.deletions).toEqual([duplicate]);

      const summary = await cleanupDeleted(config());
      expect(summary.deleted).toBe(1);
      expect(existsSync(duplicate)).toBe(false);
      expect(existsSync(original)).toBe(true);
      expect(existsSync(different)).toBe(true);
    });

    it('should stop before copying when nothing is similar', async () => {
      await scene(join(inputDir, 'day.png'), false);
      await scene(join(inputDir, 'night.png'), true);

      const found = await findDuplicates(config(), { showProgress: false });

      expect(found.stage).toBe('no-groups');
      expect(existsSync(outputDir)).toBe(false);
    });
  });
});
