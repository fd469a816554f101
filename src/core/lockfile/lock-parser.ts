import * as semver from 'semver';

import type { PackageRecord } from '../../types/index.js';
import { ParseError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { isTomlTable, parseToml, type TomlTable } from '../../utils/toml.js';

const LEGACY_CHECKSUM_KEY = /^checksum (\S+) (\S+) \((.+)\)$/;

/**
 * Legacy (format v1) lockfiles keep checksums in a `[metadata]` table keyed
 * `"checksum <name> <version> (<source>)"` instead of on each package.
 */
function collectLegacyChecksums(metadata: unknown): Map<string, string> {
  const checksums = new Map<string, string>();
  if (!isTomlTable(metadata)) {
    return checksums;
  }

  for (const [key, value] of Object.entries(metadata)) {
    const match = LEGACY_CHECKSUM_KEY.exec(key);
    if (!match || typeof value !== 'string') continue;
    const [, name, version, source] = match;
    checksums.set(legacyKey(name, version, source), value);
  }

  return checksums;
}

function legacyKey(name: string, version: string, source: string): string {
  return `${name}\u0000${version}\u0000${source}`;
}

function readOptionalString(table: TomlTable, field: string, index: number): string | undefined {
  const value = table[field];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new ParseError(`package #${index + 1} has a non-string '${field}' field`, { index, field });
  }
  return value;
}

function readPackage(entry: unknown, index: number, legacyChecksums: Map<string, string>): PackageRecord {
  if (!isTomlTable(entry)) {
    throw new ParseError(`package #${index + 1} is not a table`, { index });
  }

  const name = readOptionalString(entry, 'name', index);
  if (!name) {
    throw new ParseError(`package #${index + 1} is missing 'name'`, { index, field: 'name' });
  }

  const version = readOptionalString(entry, 'version', index);
  if (!version) {
    throw new ParseError(`package '${name}' is missing 'version'`, { index, name, field: 'version' });
  }
  if (!semver.valid(version)) {
    throw new ParseError(`package '${name}' has invalid version '${version}'`, { index, name, version });
  }

  const source = readOptionalString(entry, 'source', index);
  let checksum = readOptionalString(entry, 'checksum', index);
  if (checksum === undefined && source !== undefined) {
    checksum = legacyChecksums.get(legacyKey(name, version, source));
  }

  return Object.freeze({
    name,
    version,
    ...(source !== undefined ? { source } : {}),
    ...(checksum !== undefined ? { checksum } : {})
  });
}

/**
 * Parse Cargo.lock text into package records, in document order.
 */
export function parseLockfile(text: string): PackageRecord[] {
  let document: TomlTable;
  try {
    document = parseToml(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ParseError(`not well-formed TOML: ${reason}`);
  }

  const packages = document.package;
  if (packages === undefined) {
    logger.debug('Lockfile has no [[package]] entries');
    return [];
  }
  if (!Array.isArray(packages)) {
    throw new ParseError(`'package' must be an array of tables`);
  }

  const legacyChecksums = collectLegacyChecksums(document.metadata);
  const records = packages.map((entry: unknown, index) => readPackage(entry, index, legacyChecksums));

  logger.debug(`Parsed ${records.length} packages from lockfile`, {
    lockVersion: document.version,
    legacyChecksums: legacyChecksums.size
  });
  return records;
}
