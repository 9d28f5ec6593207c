/**
 * Configuration system with YAML and JSON support
 */

import { readFileSync, writeFileSync, existsSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import YAML from 'js-yaml';
import { Logger, type LogLevel, errorMessage, isLogLevel } from './logger.js';
import type { NamingStrategy } from './materializer.js';

const logger = new Logger({ context: 'ConfigManager' });

export interface PathsConfig {
  /** Folder scanned for images */
  inputDir: string;
  /** Review folder, recreated on every `find` */
  outputDir: string;
  /** original -> copy mapping (JSON) */
  mappingFile: string;
  /** Newline-delimited originals to delete */
  deletionList: string;
  logFile: string;
}

export interface ClusteringConfig {
  /** Maximum fingerprint distance that still counts as similar */
  threshold: number;
  hashSize: number;
  maxGroupSize: number;
}

export interface MaterializeConfig {
  concurrency: number;
  naming: NamingStrategy;
}

export interface DedupeConfig {
  paths: PathsConfig;
  clustering: ClusteringConfig;
  materialize: MaterializeConfig;
  logLevel: LogLevel;
}

export const DEFAULT_CONFIG: DedupeConfig = {
  paths: {
    inputDir: 'input_dir',
    outputDir: 'output_dir',
    mappingFile: 'info.json',
    deletionList: 'to_delete.txt',
    logFile: 'app.log'
  },
  clustering: {
    // Recommended for 16x16 hashes (256 bits)
    threshold: 80,
    hashSize: 16,
    maxGroupSize: 20
  },
  materialize: {
    concurrency: 4,
    naming: 'full-path'
  },
  logLevel: 'info'
};

export const ENV_OVERRIDES = {
  DEDUPE_INPUT_DIR: 'paths.inputDir',
  DEDUPE_OUTPUT_DIR: 'paths.outputDir',
  DEDUPE_MAPPING_FILE: 'paths.mappingFile',
  DEDUPE_DELETION_LIST: 'paths.deletionList',
  DEDUPE_LOG_FILE: 'paths.logFile',
  DEDUPE_THRESHOLD: 'clustering.threshold',
  DEDUPE_HASH_SIZE: 'clustering.hashSize',
  DEDUPE_MAX_GROUP_SIZE: 'clustering.maxGroupSize',
  DEDUPE_CONCURRENCY: 'materialize.concurrency',
  LOG_LEVEL: 'logLevel'
} as const;

type Source = Record<string, unknown>;

function isRecord(value: unknown): value is Source {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function isNamingStrategy(value: unknown): value is NamingStrategy {
  return value === 'full-path' || value === 'basename';
}

function pickString(source: Source, key: string, fallback: string): string {
  const value = source[key];
  return typeof value === 'string' && value.trim().length > 0 ? value : fallback;
}

function pickNumber(source: Source, key: string, fallback: number): number {
  const value = source[key];
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string' && value.trim() !== '' && Number.isFinite(Number(value))) {
    return Number(value);
  }
  return fallback;
}

function section(source: Source, key: string): Source {
  const value = source[key];
  return isRecord(value) ? value : {};
}

function cloneConfig(config: DedupeConfig): DedupeConfig {
  return structuredClone(config);
}

/**
 * Merge user config over a base config (user values take precedence,
 * values of the wrong type are ignored)
 */
export function mergeConfig(base: DedupeConfig, user: unknown): DedupeConfig {
  if (!isRecord(user)) {
    return cloneConfig(base);
  }

  const paths = section(user, 'paths');
  const clustering = section(user, 'clustering');
  const materialize = section(user, 'materialize');

  return {
    paths: {
      inputDir: pickString(paths, 'inputDir', base.paths.inputDir),
      outputDir: pickString(paths, 'outputDir', base.paths.outputDir),
      mappingFile: pickString(paths, 'mappingFile', base.paths.mappingFile),
      deletionList: pickString(paths, 'deletionList', base.paths.deletionList),
      logFile: pickString(paths, 'logFile', base.paths.logFile)
    },
    clustering: {
      threshold: pickNumber(clustering, 'threshold', base.clustering.threshold),
      hashSize: pickNumber(clustering, 'hashSize', base.clustering.hashSize),
      maxGroupSize: pickNumber(clustering, 'maxGroupSize', base.clustering.maxGroupSize)
    },
    materialize: {
      concurrency: pickNumber(materialize, 'concurrency', base.materialize.concurrency),
      naming: isNamingStrategy(materialize.naming) ? materialize.naming : base.materialize.naming
    },
    logLevel: isLogLevel(user.logLevel) ? user.logLevel : base.logLevel
  };
}

/**
 * Turn `{ DEDUPE_THRESHOLD: '12' }` into `{ clustering: { threshold: '12' } }`
 */
export function envToConfig(env: NodeJS.ProcessEnv): Source {
  const result: Record<string, Source | string> = {};

  for (const [name, path] of Object.entries(ENV_OVERRIDES)) {
    const value = env[name];
    if (value === undefined || value === '') continue;

    const [head, tail] = path.split('.');
    if (!tail) {
      result[head] = value;
      continue;
    }
    const existing = result[head];
    const target = isRecord(existing) ? existing : {};
    target[tail] = value;
    result[head] = target;
  }

  return result;
}

/**
 * Configuration manager: defaults <- config file <- environment
 */
export class ConfigManager {
  private config: DedupeConfig;
  private configPath: string;
  private isDirty = false;

  constructor(configPath: string = './dedupe.config.yaml', env: NodeJS.ProcessEnv = process.env) {
    this.configPath = configPath;
    this.config = mergeConfig(this.loadConfig(), envToConfig(env));
  }

  /**
   * Load configuration from file or use defaults
   */
  private loadConfig(): DedupeConfig {
    if (!existsSync(this.configPath)) {
      logger.info(`Config file not found: ${this.configPath}, using defaults`, { path: this.configPath });
      return cloneConfig(DEFAULT_CONFIG);
    }

    try {
      const content = readFileSync(this.configPath, 'utf-8');
      let parsed: unknown;

      if (this.configPath.endsWith('.json')) {
        parsed = JSON.parse(content);
      } else if (this.configPath.endsWith('.yaml') || this.configPath.endsWith('.yml')) {
        parsed = YAML.load(content);
      } else {
        throw new Error(`Unsupported config format: ${this.configPath}`);
      }

      logger.info(`Loaded configuration from ${this.configPath}`);
      return mergeConfig(DEFAULT_CONFIG, parsed);
    } catch (error) {
      logger.warn(`Failed to load config: ${errorMessage(error)}`);
      return cloneConfig(DEFAULT_CONFIG);
    }
  }

  getAll(): DedupeConfig {
    return cloneConfig(this.config);
  }

  get<K extends keyof DedupeConfig>(key: K): DedupeConfig[K] {
    return cloneConfig(this.config)[key];
  }

  /**
   * Apply a partial configuration, e.g. command-line flags
   */
  update(overrides: unknown): void {
    this.config = mergeConfig(this.config, overrides);
    this.isDirty = true;
    logger.debug('Config updated', { overrides });
  }

  /**
   * Save configuration to file
   */
  save(): void {
    if (!this.isDirty && existsSync(this.configPath)) return;

    mkdirSync(dirname(this.configPath), { recursive: true });
    const content = this.configPath.endsWith('.json') ? this.toJSON() : this.toYAML();
    writeFileSync(this.configPath, content);
    this.isDirty = false;

    logger.info(`Configuration saved to ${this.configPath}`);
  }

  reset(): void {
    this.config = cloneConfig(DEFAULT_CONFIG);
    this.isDirty = true;
    logger.info('Configuration reset to defaults');
  }

  validate(): { valid: boolean; errors: string[] } {
    const errors: string[] = [];
    const { clustering, materialize, paths } = this.config;

    if (clustering.threshold < 0) {
      errors.push('Similarity threshold must be zero or greater');
    }

    if (!Number.isInteger(clustering.hashSize) || clustering.hashSize < 4 || clustering.hashSize > 64) {
      errors.push('Hash size must be an integer between 4 and 64');
    }

    if (!Number.isInteger(clustering.maxGroupSize) || clustering.maxGroupSize < 2) {
      errors.push('Maximum group size must be an integer of at least 2');
    }

    if (!Number.isInteger(materialize.concurrency) || materialize.concurrency < 1) {
      errors.push('Copy concurrency must be a positive integer');
    }

    if (paths.inputDir === paths.outputDir) {
      errors.push('Input and output folders must differ');
    }

    return {
      valid: errors.length === 0,
      errors
    };
  }

  toJSON(): string {
    return JSON.stringify(this.config, null, 2);
  }

  toYAML(): string {
    return YAML.dump(this.config, { indent: 2 });
  }

  getPath(): string {
    return this.configPath;
  }
}
