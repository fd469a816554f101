import { resolve } from 'path';

import type {
  CommandResult,
  GenerateOptions,
  GeneratorConfig,
  GitResolution,
  SourceGroup,
  VendorConfig
} from '../types/index.js';
import { FILE_PATTERNS } from '../constants/index.js';
import { CancelledError } from '../utils/errors.js';
import { readTextFile } from '../utils/fs.js';
import { HttpClient, type FetchLike, type SleepFn } from '../utils/http.js';
import { logger } from '../utils/logger.js';
import { resolveGeneratorConfig } from './config.js';
import { groupSources } from './grouping/source-grouper.js';
import { parseLockfile } from './lockfile/lock-parser.js';
import { toFlatpakSources } from './manifest/flatpak-format.js';
import { buildManifest, serializeDocument, writeOutputs } from './manifest/manifest-writer.js';
import { createHostProviders, type GitHostProvider } from './resolution/hosts/index.js';
import { collectGitRequests, resolveGitGroups } from './resolution/metadata-resolver.js';
import { classifyPackages } from './sources/source-classifier.js';
import { emitVendorConfig } from './vendor/vendor-config.js';

/**
 * Seams for the network, so tests and embedders can run the pipeline
 * without reaching real hosts.
 */
export interface GenerateDependencies {
  fetch?: FetchLike;
  sleep?: SleepFn;
  createProviders?: (http: HttpClient) => GitHostProvider[];
  env?: Record<string, string | undefined>;
}

export interface GeneratedSources {
  groups: SourceGroup[];
  vendorConfig: VendorConfig;
  /** Serialized output document */
  content: string;
  localPackages: number;
}

export interface GenerateResult {
  outputPath: string;
  vendorConfigPath?: string;
  sourceCount: number;
  localPackages: number;
}

/**
 * Lock text in, rendered output out. Touches the network only to resolve
 * git checkouts and never writes to disk.
 */
export async function generateSources(
  lockText: string,
  config: GeneratorConfig,
  options: { signal?: AbortSignal; dependencies?: GenerateDependencies } = {}
): Promise<GeneratedSources> {
  const { signal, dependencies = {} } = options;

  const records = parseLockfile(lockText);
  const classified = classifyPackages(records, config);
  const requests = collectGitRequests(classified);

  const lookups = new AbortController();
  const http = new HttpClient({
    retries: config.retries,
    timeoutMs: config.timeoutMs,
    backoffMs: config.backoffMs,
    signal: signal ? AbortSignal.any([signal, lookups.signal]) : lookups.signal,
    fetch: dependencies.fetch,
    sleep: dependencies.sleep
  });
  const providers = dependencies.createProviders
    ? dependencies.createProviders(http)
    : createHostProviders(http, dependencies.env);

  const resolutions = requests.length > 0
    ? await resolveGitGroups(requests, {
        concurrency: config.concurrency,
        providers,
        http,
        gitTarballs: config.gitTarballs,
        signal,
        lookups
      })
    : new Map<string, GitResolution>();

  if (signal?.aborted) {
    throw new CancelledError();
  }

  const groups = groupSources(classified, resolutions, config);
  const vendorConfig = emitVendorConfig(groups, config);
  const document = config.format === 'flatpak'
    ? toFlatpakSources(groups, vendorConfig, config)
    : buildManifest(groups, vendorConfig);

  return {
    groups,
    vendorConfig,
    content: serializeDocument(document),
    localPackages: classified.filter(pkg => pkg.source.kind === 'local').length
  };
}

/**
 * Read the lockfile, generate, and write the output file(s). Nothing is
 * written unless every stage succeeds.
 */
export async function runGeneratePipeline(
  options: GenerateOptions,
  context: { cwd?: string; signal?: AbortSignal; dependencies?: GenerateDependencies } = {}
): Promise<CommandResult<GenerateResult>> {
  const cwd = context.cwd ?? process.cwd();
  const config = await resolveGeneratorConfig(options, cwd);

  const lockfilePath = resolve(cwd, options.lockfilePath);
  const outputPath = resolve(cwd, options.outputPath ?? FILE_PATTERNS.DEFAULT_OUTPUT);
  const vendorConfigPath = options.vendorConfigPath ? resolve(cwd, options.vendorConfigPath) : undefined;

  logger.debug(`Generating ${config.format} from ${lockfilePath}`);
  const lockText = await readTextFile(lockfilePath);
  const generated = await generateSources(lockText, config, {
    signal: context.signal,
    dependencies: context.dependencies
  });

  await writeOutputs([
    { path: outputPath, content: generated.content },
    ...(vendorConfigPath ? [{ path: vendorConfigPath, content: generated.vendorConfig.contents }] : [])
  ]);

  return {
    success: true,
    data: {
      outputPath,
      ...(vendorConfigPath ? { vendorConfigPath } : {}),
      sourceCount: generated.groups.length,
      localPackages: generated.localPackages
    }
  };
}
