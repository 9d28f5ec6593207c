import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdirSync, readFileSync, rmSync, unlinkSync, writeFileSync } from 'fs';
import { join } from 'path';
import {
  DeletionReconciler,
  findDeletions,
  listOutputFiles,
  readDeletionList,
  writeDeletionList,
} from './deletion-reconciler.js';
import { MappingStore } from './mapping-store.js';

describe('findDeletions', () => {
  it('should return originals whose copy is gone, in mapping order', () => {
    const mapping = new Map([
      ['/photos/c.jpg', '/out/1/c.jpg'],
      ['/photos/a.jpg', '/out/1/a.jpg'],
      ['/photos/b.jpg', '/out/2/b.jpg'],
    ]);

    expect(findDeletions(mapping, new Set(['/out/1/a.jpg']))).toEqual(['/photos/c.jpg', '/photos/b.jpg']);
  });

  it('should ignore files in the output that the mapping does not know', () => {
    const mapping = new Map([['/photos/a.jpg', '/out/1/a.jpg']]);

    expect(findDeletions(mapping, new Set(['/out/1/a.jpg', '/out/1/extra.jpg']))).toEqual([]);
  });
});

describe('deletion list files', () => {
  const tempDir = join(process.cwd(), '.test-tmp', 'deletion-list');

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('should write one path per line', () => {
    const listPath = join(tempDir, 'list', 'to_delete.txt');
    writeDeletionList(listPath, ['/a.jpg', '/b c.jpg']);

    expect(readFileSync(listPath, 'utf-8')).toBe('/a.jpg\n/b c.jpg\n');
  });

  it('should read back trimmed lines without blanks', () => {
    mkdirSync(tempDir, { recursive: true });
    const listPath = join(tempDir, 'to_delete.txt');
    writeFileSync(listPath, '/a.jpg\r\n\n  /b.jpg  \n\n');

    expect(readDeletionList(listPath)).toEqual(['/a.jpg', '/b.jpg']);
  });

  it('should read a list that cannot be read as null', () => {
    const listFolder = join(tempDir, 'to_delete.txt');
    mkdirSync(listFolder, { recursive: true });

    expect(readDeletionList(listFolder)).toBeNull();
  });

  it('should read a missing list as null', () => {
    expect(readDeletionList(join(tempDir, 'absent.txt'))).toBeNull();
  });
});

describe('DeletionReconciler', () => {
  const tempDir = join(process.cwd(), '.test-tmp', 'deletion-reconciler');
  const outputDir = join(tempDir, 'output');
  const listPath = join(tempDir, 'to_delete.txt');
  let store: MappingStore;

  function copy(relativePath: string): string {
    const path = join(outputDir, relativePath);
    mkdirSync(join(path, '..'), { recursive: true });
    writeFileSync(path, relativePath);
    return path;
  }

  function reconciler(): DeletionReconciler {
    return new DeletionReconciler({ mappingStore: store, outputRoot: outputDir, deletionListPath: listPath });
  }

  beforeEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
    mkdirSync(tempDir, { recursive: true });
    store = new MappingStore(join(tempDir, 'info.json'));
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('should list only the original whose copy was deleted', async () => {
    const x = copy('1/x.jpg');
    const y = copy('1/y.jpg');
    store.save(new Map([['/photos/a.jpg', x], ['/photos/b.jpg', y]]));
    unlinkSync(y);

    const result = await reconciler().reconcile();

    expect(result.status).toBe('written');
    expect(result.deletions).toEqual(['/photos/b.jpg']);
    expect(result.mappingSize).toBe(2);
    expect(result.remainingFiles).toBe(1);
    expect(result.deletionListPath).toBe(listPath);
    expect(readFileSync(listPath, 'utf-8')).toBe('/photos/b.jpg\n');
  });

  it('should write nothing when every copy is still there', async () => {
    const x = copy('1/x.jpg');
    store.save(new Map([['/photos/a.jpg', x]]));

    const result = await reconciler().reconcile();

    expect(result.status).toBe('none');
    expect(result.deletions).toEqual([]);
    expect(existsSync(listPath)).toBe(false);
  });

  it('should remove a stale list when nothing is deleted any more', async () => {
    const x = copy('1/x.jpg');
    store.save(new Map([['/photos/a.jpg', x]]));
    writeFileSync(listPath, '/photos/old.jpg\n');

    const result = await reconciler().reconcile();

    expect(result.status).toBe('none');
    expect(existsSync(listPath)).toBe(false);
  });

  it('should see copies moved to another group folder as deleted', async () => {
    const x = copy('1/x.jpg');
    store.save(new Map([['/photos/a.jpg', x]]));
    unlinkSync(x);
    copy('2/x.jpg');

    const result = await reconciler().reconcile();

    expect(result.deletions).toEqual(['/photos/a.jpg']);
  });

  it('should infer nothing without a mapping', async () => {
    copy('1/x.jpg');

    const result = await reconciler().reconcile();

    expect(result.status).toBe('no-mapping');
    expect(result.deletions).toEqual([]);
    expect(existsSync(listPath)).toBe(false);
  });

  it('should infer nothing when the output folder is gone', async () => {
    store.save(new Map([['/photos/a.jpg', join(outputDir, '1', 'x.jpg')]]));

    const result = await reconciler().reconcile();

    expect(result.status).toBe('no-output');
    expect(result.mappingSize).toBe(1);
    expect(existsSync(listPath)).toBe(false);
  });

  it('should list hidden files in the output tree', async () => {
    const hidden = copy('1/.hidden.jpg');

    expect(await listOutputFiles(outputDir)).toEqual(new Set([hidden]));
  });
});
