import { Command, InvalidArgumentError } from 'commander';

import { LogLevel, type CommandResult, type GenerateOptions } from '../types/index.js';
import { FILE_PATTERNS } from '../constants/index.js';
import { parseOutputFormat } from '../core/config.js';
import {
  runGeneratePipeline,
  type GenerateDependencies,
  type GenerateResult
} from '../core/generate-pipeline.js';
import { withErrorHandling } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

interface CommandOptions {
  output?: string;
  vendorDir?: string;
  gitDir?: string;
  format?: string;
  gitTarballs?: boolean;
  vendorConfig?: string;
  concurrency?: number;
  retries?: number;
  timeout?: number;
  config?: string;
  debug?: boolean;
}

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parsed;
}

export function toGenerateOptions(lockfilePath: string, options: CommandOptions): GenerateOptions {
  return {
    lockfilePath,
    outputPath: options.output,
    vendorConfigPath: options.vendorConfig,
    configPath: options.config,
    vendorDir: options.vendorDir,
    gitCheckoutDir: options.gitDir,
    format: options.format === undefined ? undefined : parseOutputFormat(options.format),
    gitTarballs: options.gitTarballs,
    concurrency: options.concurrency,
    retries: options.retries,
    timeoutMs: options.timeout,
    debug: options.debug
  };
}

/**
 * Run one generation, cancelling in-flight lookups on Ctrl-C.
 */
export async function generateCommand(
  options: GenerateOptions,
  context: { cwd?: string; dependencies?: GenerateDependencies } = {}
): Promise<CommandResult<GenerateResult>> {
  if (options.debug) {
    logger.setLevel(LogLevel.DEBUG);
  }

  const controller = new AbortController();
  const onInterrupt = (): void => {
    logger.warn('Interrupted, cancelling outstanding lookups');
    controller.abort();
  };
  process.once('SIGINT', onInterrupt);

  try {
    const result = await runGeneratePipeline(options, { ...context, signal: controller.signal });
    if (result.data) {
      const { sourceCount, outputPath, vendorConfigPath, localPackages } = result.data;
      console.log(`✓ Wrote ${sourceCount} source${sourceCount === 1 ? '' : 's'} to ${outputPath}`);
      if (vendorConfigPath) {
        console.log(`✓ Wrote vendor configuration to ${vendorConfigPath}`);
      }
      if (localPackages > 0) {
        console.log(`  (${localPackages} local package${localPackages === 1 ? '' : 's'} skipped)`);
      }
    }
    return result;
  } finally {
    process.removeListener('SIGINT', onInterrupt);
  }
}

export function setupGenerateCommand(program: Command): void {
  program
    .argument('<lockfile>', 'path to Cargo.lock')
    .option('-o, --output <path>', 'manifest output path', FILE_PATTERNS.DEFAULT_OUTPUT)
    .option('--vendor-dir <dir>', 'vendor directory, relative to the build directory')
    .option('--git-dir <dir>', 'directory for git checkouts, relative to the build directory')
    .option('--format <format>', 'output format: manifest or flatpak')
    .option('--git-tarballs', 'fetch git sources as host tarballs instead of checkouts')
    .option('--vendor-config <path>', 'also write the cargo vendor configuration to this file')
    .option('--concurrency <n>', 'maximum parallel metadata lookups', parseInteger)
    .option('--retries <n>', 'retries per network request', parseInteger)
    .option('--timeout <ms>', 'timeout per network request in milliseconds', parseInteger)
    .option('--config <path>', 'configuration file (default: lockvendor.jsonc or lockvendor.json)')
    .option('-d, --debug', 'print debug logging')
    .action(withErrorHandling(async (lockfile: string, options: CommandOptions) => {
      await generateCommand(toGenerateOptions(lockfile, options));
    }));
}
