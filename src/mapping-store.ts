/**
 * Persist the original -> copy mapping between runs
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { Logger, errorMessage } from './logger.js';
import type { Mapping } from './types.js';

const logger = new Logger({ context: 'MappingStore' });

function isStringRecord(value: unknown): value is Record<string, string> {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return false;
  }
  return Object.values(value).every(entry => typeof entry === 'string');
}

/**
 * One pretty-printed JSON object, original absolute path -> copy absolute path
 */
export class MappingStore {
  private storePath: string;

  constructor(storePath: string = './info.json') {
    this.storePath = resolve(storePath);
  }

  getPath(): string {
    return this.storePath;
  }

  exists(): boolean {
    return existsSync(this.storePath);
  }

  /**
   * Replace whatever mapping was stored before
   */
  save(mapping: Mapping): void {
    mkdirSync(dirname(this.storePath), { recursive: true });
    const record = Object.fromEntries(mapping);
    writeFileSync(this.storePath, JSON.stringify(record, null, 2) + '\n', 'utf-8');

    logger.info(`Saved mapping to ${this.storePath}`, { entries: mapping.size });
  }

  /**
   * Load the stored mapping. Missing, unreadable or malformed stores are
   * reported and read as "no mapping".
   */
  load(): Mapping | null {
    if (!this.exists()) {
      logger.warn(`Mapping file not found: ${this.storePath}`);
      return null;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(this.storePath, 'utf-8'));
    } catch (error) {
      logger.warn(`Failed to read mapping ${this.storePath}: ${errorMessage(error)}`);
      return null;
    }

    if (!isStringRecord(parsed)) {
      logger.warn(`Mapping file ${this.storePath} is not an object of path strings, ignoring it`);
      return null;
    }

    const mapping: Mapping = new Map(Object.entries(parsed));
    logger.info(`Loaded mapping from ${this.storePath}`, { entries: mapping.size });
    return mapping;
  }
}
