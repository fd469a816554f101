import { CRATES_IO } from '../../constants/index.js';
import { ParseError } from '../../utils/errors.js';

const DOWNLOAD_MARKERS = ['{crate}', '{version}', '{prefix}', '{lowerprefix}', '{sha256-checksum}'];

function trimTrailingSlash(url: string): string {
  return url.replace(/\/+$/, '');
}

export function isCratesIo(indexUrl: string): boolean {
  const normalized = trimTrailingSlash(indexUrl);
  return CRATES_IO.INDEX_URLS.some(known => trimTrailingSlash(known) === normalized);
}

/**
 * Download base for a registry index. Configured registries win, crates.io
 * is built in, and anything else falls back to `https://static.<host>/crates`.
 */
export function registryDownloadBase(indexUrl: string, registries: Record<string, string> = {}): string {
  const normalized = trimTrailingSlash(indexUrl);
  for (const [index, base] of Object.entries(registries)) {
    if (trimTrailingSlash(index) === normalized) {
      return trimTrailingSlash(base);
    }
  }

  if (isCratesIo(indexUrl)) {
    return CRATES_IO.DOWNLOAD_BASE;
  }

  let host: string;
  try {
    host = new URL(indexUrl).host;
  } catch {
    throw new ParseError(`invalid registry index URL '${indexUrl}'`, { indexUrl });
  }
  return `https://static.${host}/crates`;
}

/**
 * Cargo's index prefix directory for a crate name.
 */
export function cratePrefix(name: string): string {
  switch (name.length) {
    case 1:
      return '1';
    case 2:
      return '2';
    case 3:
      return `3/${name.charAt(0)}`;
    default:
      return `${name.slice(0, 2)}/${name.slice(2, 4)}`;
  }
}

/**
 * Archive URL of one crate. A base carrying cargo's `dl` template markers is
 * expanded; a plain base uses the `<base>/<name>/<name>-<version>.crate`
 * layout of static.crates.io.
 */
export function crateDownloadUrl(base: string, name: string, version: string, sha256: string): string {
  if (!DOWNLOAD_MARKERS.some(marker => base.includes(marker))) {
    return `${base}/${name}/${name}-${version}.crate`;
  }

  const prefix = cratePrefix(name);
  return base
    .replaceAll('{crate}', name)
    .replaceAll('{version}', version)
    .replaceAll('{lowerprefix}', prefix.toLowerCase())
    .replaceAll('{prefix}', prefix)
    .replaceAll('{sha256-checksum}', sha256);
}
