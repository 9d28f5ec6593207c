#!/usr/bin/env node
/**
 * dedupe-cli.ts — find similar images, then delete the originals whose
 * copies you removed from the review folder.
 */

import { config as loadEnv } from 'dotenv';
import { ConfigManager } from './config.js';
import { enableFileLogging, handleError, logger, setGlobalLogLevel } from './logger.js';
import { checkDeleted, cleanupDeleted, findDuplicates } from './pipeline.js';

export type CliAction = 'find' | 'check-deleted' | 'cleanup' | 'init-config';

const ACTIONS: CliAction[] = ['find', 'check-deleted', 'cleanup', 'init-config'];

export interface CliOptions {
  action: CliAction;
  configPath: string;
  input?: string;
  output?: string;
  threshold?: number;
  concurrency?: number;
  logFile?: string;
  progress: boolean;
  help: boolean;
}

export type ParseResult = { ok: true; options: CliOptions } | { ok: false; error: string };

function isAction(value: string | undefined): value is CliAction {
  return ACTIONS.some(action => action === value);
}

function parseNumber(flag: string, raw: string | undefined): number | string {
  const value = Number(raw);
  if (raw === undefined || raw.trim() === '' || !Number.isFinite(value) || value < 0) {
    return `${flag} expects a non-negative number, got ${raw ?? 'nothing'}`;
  }
  return value;
}

export function usage(): string {
  return `
Usage:
  photo-dedupe [--action find|check-deleted|cleanup|init-config] [options]

Actions:
  find            Group similar images into numbered folders under the output folder (default)
  check-deleted   List originals whose copies were deleted from the output folder
  cleanup         Delete the originals named in the deletion list
  init-config     Write the effective configuration to --config

Options:
  --config PATH       YAML or JSON config (default: ./dedupe.config.yaml)
  --input DIR         Folder to scan for images
  --output DIR        Results folder (recreated by find)
  --threshold N       Maximum hash distance for two images to count as similar
  --concurrency N     Parallel hashing and copy jobs
  --log-file PATH     Also write the log to PATH
  --no-progress       Do not draw the progress bar
  -h, --help          Show this message
`;
}

export function parseArgs(argv: string[]): ParseResult {
  const options: CliOptions = {
    action: 'find',
    configPath: './dedupe.config.yaml',
    progress: true,
    help: false,
  };

  const args = [...argv];
  while (args.length > 0) {
    const arg = args.shift();
    switch (arg) {
      case '--action': {
        const action = args.shift();
        if (!isAction(action)) {
          return { ok: false, error: `Unknown action: ${action ?? 'nothing'}` };
        }
        options.action = action;
        break;
      }
      case '--config':
        options.configPath = args.shift() ?? options.configPath;
        break;
      case '--input':
        options.input = args.shift();
        break;
      case '--output':
        options.output = args.shift();
        break;
      case '--log-file':
        options.logFile = args.shift();
        break;
      case '--threshold': {
        const value = parseNumber(arg, args.shift());
        if (typeof value === 'string') return { ok: false, error: value };
        options.threshold = value;
        break;
      }
      case '--concurrency': {
        const value = parseNumber(arg, args.shift());
        if (typeof value === 'string') return { ok: false, error: value };
        options.concurrency = value;
        break;
      }
      case '--no-progress':
        options.progress = false;
        break;
      case '-h':
      case '--help':
        options.help = true;
        break;
      default:
        return { ok: false, error: `Unknown argument: ${arg}` };
    }
  }

  return { ok: true, options };
}

/**
 * Run one CLI invocation and return the process exit code
 */
export async function run(argv: string[], env: NodeJS.ProcessEnv = process.env): Promise<number> {
  const parsed = parseArgs(argv);
  if (!parsed.ok) {
    console.error(`❌ ${parsed.error}`);
    console.log(usage());
    return 1;
  }

  const { options } = parsed;
  if (options.help) {
    console.log(usage());
    return 0;
  }

  try {
    const manager = new ConfigManager(options.configPath, env);
    manager.update({
      paths: {
        inputDir: options.input,
        outputDir: options.output,
        logFile: options.logFile,
      },
      clustering: { threshold: options.threshold },
      materialize: { concurrency: options.concurrency },
    });

    const { valid, errors } = manager.validate();
    if (!valid) {
      for (const error of errors) {
        console.error(`❌ ${error}`);
      }
      return 1;
    }

    const config = manager.getAll();
    setGlobalLogLevel(config.logLevel);
    enableFileLogging(config.paths.logFile);

    switch (options.action) {
      case 'find': {
        const result = await findDuplicates(config, { showProgress: options.progress });
        if (result.stage === 'saved' && result.materialized) {
          logger.info('Review the groups, delete unwanted copies, then run --action check-deleted', {
            groups: result.groups.length,
            copied: result.materialized.copied,
          });
        }
        return 0;
      }
      case 'check-deleted': {
        logger.info('🔍 Searching for files to delete...');
        await checkDeleted(config);
        return 0;
      }
      case 'cleanup': {
        logger.info('🗑️  Deleting files...');
        const summary = await cleanupDeleted(config);
        return summary.failed > 0 ? 2 : 0;
      }
      case 'init-config': {
        manager.save();
        console.log(`✅ Wrote configuration to ${manager.getPath()}`);
        return 0;
      }
    }
  } catch (error) {
    const appError = handleError(error, 'dedupe-cli');
    console.error(`❌ Critical error occurred: ${appError.message}`);
    return 1;
  }
}

export async function main(): Promise<void> {
  loadEnv();
  process.exitCode = await run(process.argv.slice(2));
}

const isDirectRun =
  process.argv[1] && (process.argv[1].includes('dedupe-cli') || process.argv[1].endsWith('photo-dedupe'));
if (isDirectRun) {
  main().catch(error => {
    handleError(error, 'dedupe-cli');
    process.exitCode = 1;
  });
}
